import { decodeFeedStatus, decodeLiveFeed } from '../feed/decoder.js';
import type { GameFeed } from '../feed/statsapi-client.js';
import { finalKey, timeoutKey, type FireRegistry } from '../notifications/fire-registry.js';
import type { Notifier } from '../notifications/notifier.js';
import type { GameStatus, LiveFeed } from '../types/index.js';
import { addMs } from '../utils/date.js';
import { logger } from '../utils/logger.js';
import { systemClock, type Clock } from './clock.js';
import {
  DEFAULT_WATCH_TIMINGS,
  TERMINAL_PHASES,
  resolveWatchPhase,
  type WatchPhase,
  type WatchTimings,
} from './phase.js';

export interface WatchTarget {
  teamId: number;
  gamePk: number;
  scheduledStart: Date;
}

export interface WatchStep {
  phase: WatchPhase;
  wakeAt: Date | null;
  /** Status seen by this step's poll; null when it did not poll or the poll failed */
  status: GameStatus | null;
  /** Latest known feed text, carried between steps for the timeout report */
  detailedState: string | null;
  /** True only for the step that ran the final handler */
  fired: boolean;
}

export type FinalHandler = (feed: LiveFeed, target: WatchTarget) => Promise<void>;

export interface GameWatcherDeps {
  feed: Pick<GameFeed, 'fetchSchedule' | 'fetchLiveFeed'>;
  registry: FireRegistry;
  notifier: Pick<Notifier, 'gameTimedOut'>;
  onFinal: FinalHandler;
  clock?: Clock;
  timings?: WatchTimings;
}

export interface GameOutcome extends WatchStep {
  gamePk: number;
}

export class GameWatcher {
  private readonly clock: Clock;
  private readonly timings: WatchTimings;

  constructor(private readonly deps: GameWatcherDeps) {
    this.clock = deps.clock ?? systemClock;
    this.timings = deps.timings ?? DEFAULT_WATCH_TIMINGS;
  }

  /**
   * One transition: at most one live-feed fetch. FINAL runs the handler once
   * per (team, game) across every watcher sharing the registry. TIMEOUT is
   * reported only when that fetch does not show the game Final.
   */
  async step(target: WatchTarget, lastDetailedState: string | null = null): Promise<WatchStep> {
    const log = logger.child({ teamId: target.teamId, gamePk: target.gamePk });
    const now = this.clock.now();
    const current = resolveWatchPhase(
      { scheduledStart: target.scheduledStart, now, lastObservedStatus: null },
      this.timings,
    );
    const idle = { status: null, detailedState: lastDetailedState, fired: false };

    if (current.phase !== 'POLLING' && current.phase !== 'TIMEOUT') {
      return { ...current, ...idle };
    }

    // Past the cap the feed is still read once; FINAL wins over TIMEOUT.
    let payload: unknown;
    let observed: ReturnType<typeof decodeFeedStatus>;
    try {
      payload = await this.deps.feed.fetchLiveFeed(target.gamePk);
      observed = decodeFeedStatus(payload);
    } catch (err) {
      if (current.phase === 'TIMEOUT') {
        log.warn({ err }, 'Final check failed, reporting timeout');
        await this.reportTimeout(target, now, lastDetailedState);
        return { ...current, ...idle };
      }
      log.warn({ err }, 'Poll failed, retrying next cycle');
      return { phase: 'POLLING', wakeAt: addMs(now, this.timings.pollIntervalMs), ...idle };
    }

    const next = resolveWatchPhase(
      { scheduledStart: target.scheduledStart, now, lastObservedStatus: observed.status },
      this.timings,
    );
    const seen = { status: observed.status, detailedState: observed.detailedState };

    if (next.phase === 'TIMEOUT') {
      await this.reportTimeout(target, now, observed.detailedState);
      return { ...next, ...seen, fired: false };
    }
    if (next.phase !== 'FINAL') {
      log.debug({ detailedState: observed.detailedState }, 'Game not final yet');
      return { ...next, ...seen, fired: false };
    }

    const fired = await this.fire(target, payload);
    return { ...next, ...seen, fired };
  }

  /** Steps until FINAL or TIMEOUT, sleeping on the clock between steps. */
  async watch(target: WatchTarget): Promise<WatchStep> {
    let detailedState: string | null = null;
    while (true) {
      const result = await this.step(target, detailedState);
      detailedState = result.detailedState;
      if (TERMINAL_PHASES.has(result.phase) || !result.wakeAt) return result;
      await this.clock.sleepUntil(result.wakeAt);
    }
  }

  /** Watches every game the team plays on `date`, in start order. */
  async watchTeamDay(teamId: number, date: string): Promise<GameOutcome[]> {
    const log = logger.child({ teamId, date });
    const games = await this.deps.feed.fetchSchedule(teamId, date);
    if (!games.length) {
      log.info('No games scheduled');
      return [];
    }

    const outcomes: GameOutcome[] = [];
    for (const game of games) {
      log.info(
        { gamePk: game.gamePk, scheduledStart: game.scheduledStart.toISOString() },
        `Watching ${game.awayTeam.name} @ ${game.homeTeam.name}`,
      );
      const result = await this.watch({ teamId, gamePk: game.gamePk, scheduledStart: game.scheduledStart });
      outcomes.push({ gamePk: game.gamePk, ...result });
    }
    return outcomes;
  }

  private async fire(target: WatchTarget, payload: unknown): Promise<boolean> {
    const key = finalKey(target.teamId, target.gamePk);
    if (!(await this.deps.registry.claim(key))) {
      logger.debug({ key }, 'Final already handled');
      return false;
    }

    try {
      await this.deps.onFinal(decodeLiveFeed(payload), target);
    } catch (err) {
      await this.deps.registry.release(key);
      throw err;
    }
    return true;
  }

  private async reportTimeout(target: WatchTarget, now: Date, lastDetailedState: string | null): Promise<void> {
    const key = timeoutKey(target.teamId, target.gamePk);
    if (!(await this.deps.registry.claim(key))) return;

    try {
      await this.deps.notifier.gameTimedOut({
        teamId: target.teamId,
        gamePk: target.gamePk,
        scheduledStart: target.scheduledStart,
        elapsedMs: now.getTime() - target.scheduledStart.getTime(),
        lastDetailedState,
      });
    } catch (err) {
      await this.deps.registry.release(key);
      throw err;
    }
  }
}
