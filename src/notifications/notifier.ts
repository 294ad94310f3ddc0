import type { Config } from '../config.js';
import type { DigestRecord } from '../types/index.js';
import { logger } from '../utils/logger.js';
import { TelegramNotifier } from './telegram.js';

export interface TimeoutEvent {
  teamId: number;
  gamePk: number;
  scheduledStart: Date;
  elapsedMs: number;
  /** Last status text seen on the feed, when any poll succeeded */
  lastDetailedState: string | null;
}

/** A game watch that exhausted its job retries. */
export interface AbandonedEvent {
  teamId: number;
  gamePk: number;
  attempts: number;
  error: string;
}

/** The operator channel. */
export interface Notifier {
  gameTimedOut(event: TimeoutEvent): Promise<void>;
  watchAbandoned(event: AbandonedEvent): Promise<void>;
  digestReady(record: DigestRecord): Promise<void>;
}

export class LogNotifier implements Notifier {
  private readonly log = logger.child({ module: 'notifier' });

  async gameTimedOut(event: TimeoutEvent): Promise<void> {
    this.log.error(
      {
        teamId: event.teamId,
        gamePk: event.gamePk,
        scheduledStart: event.scheduledStart.toISOString(),
        elapsedMinutes: Math.round(event.elapsedMs / 60_000),
        lastDetailedState: event.lastDetailedState,
      },
      'Game never reached Final, no digest produced',
    );
  }

  async watchAbandoned(event: AbandonedEvent): Promise<void> {
    this.log.error(
      { teamId: event.teamId, gamePk: event.gamePk, attempts: event.attempts, error: event.error },
      'Game watch gave up after retries, no digest produced',
    );
  }

  async digestReady(record: DigestRecord): Promise<void> {
    this.log.info(
      { teamId: record.team.id, gamePk: record.gamePk, playoffOdds: record.playoffOdds },
      record.finalScoreText,
    );
  }
}

/** Telegram when both credentials are set, the log otherwise. */
export function createNotifier(
  cfg: Pick<Config, 'TELEGRAM_BOT_TOKEN' | 'TELEGRAM_CHAT_ID'>,
): Notifier {
  if (cfg.TELEGRAM_BOT_TOKEN && cfg.TELEGRAM_CHAT_ID) {
    return new TelegramNotifier(cfg.TELEGRAM_BOT_TOKEN, cfg.TELEGRAM_CHAT_ID);
  }
  return new LogNotifier();
}
