import { request, type Dispatcher } from 'undici';
import type { DigestRecord } from '../types/index.js';
import { logger } from '../utils/logger.js';
import type { AbandonedEvent, Notifier, TimeoutEvent } from './notifier.js';

const TELEGRAM_API = 'https://api.telegram.org';

export function escapeMarkdownV2(text: string): string {
  return text.replace(/([_*\[\]()~`>#+\-=|{}.!\\])/g, '\\$1');
}

export function formatTimeout(event: TimeoutEvent): string {
  const hours = (event.elapsedMs / 3_600_000).toFixed(1);
  return [
    `\u{23F1} *Watch timed out \\- game ${event.gamePk}*`,
    escapeMarkdownV2(
      `Team ${event.teamId}: no Final after ${hours}h ` +
        `(scheduled ${event.scheduledStart.toISOString()}, last state: ${event.lastDetailedState ?? 'unknown'})`,
    ),
  ].join('\n');
}

export function formatAbandoned(event: AbandonedEvent): string {
  return [
    `\u{1F6A8} *Watch abandoned \\- game ${event.gamePk}*`,
    escapeMarkdownV2(`Team ${event.teamId}: failed ${event.attempts} times, last error: ${event.error}`),
  ].join('\n');
}

export function formatDigest(record: DigestRecord): string {
  const emoji = record.result === 'W' ? '\u{2705}' : record.result === 'L' ? '\u{274C}' : '\u{2796}';
  const lines = [`${emoji} *${escapeMarkdownV2(record.finalScoreText)}*`];

  const [top] = record.topBatters;
  if (top) {
    lines.push(escapeMarkdownV2(`Top bat: ${top.name} (${top.score.toFixed(2)} BAT_SCORE)`));
  }
  if (record.mvp) {
    lines.push(escapeMarkdownV2(`MVP: ${record.mvp.name}`));
  }
  if (record.playoffOdds !== null) {
    lines.push(escapeMarkdownV2(`Postseason odds: ${record.playoffOdds.toFixed(1)}%`));
  }
  return lines.join('\n');
}

export class TelegramNotifier implements Notifier {
  private readonly log = logger.child({ module: 'telegram' });

  constructor(
    private readonly botToken: string,
    private readonly chatId: string,
    private readonly dispatcher?: Dispatcher,
  ) {}

  gameTimedOut(event: TimeoutEvent): Promise<void> {
    return this.send(formatTimeout(event));
  }

  watchAbandoned(event: AbandonedEvent): Promise<void> {
    return this.send(formatAbandoned(event));
  }

  digestReady(record: DigestRecord): Promise<void> {
    return this.send(formatDigest(record));
  }

  /** Delivery failures are logged; the operator channel never fails a digest run. */
  private async send(text: string): Promise<void> {
    try {
      const { statusCode, body } = await request(`${TELEGRAM_API}/bot${this.botToken}/sendMessage`, {
        method: 'POST',
        headers: { 'Content-Type': 'application/json' },
        body: JSON.stringify({
          chat_id: this.chatId,
          text,
          parse_mode: 'MarkdownV2',
        }),
        dispatcher: this.dispatcher,
      });
      const reply = await body.text();
      if (statusCode >= 400) {
        this.log.error({ statusCode, reply }, 'Telegram rejected message');
      }
    } catch (err) {
      this.log.error({ err }, 'Failed to send Telegram message');
    }
  }
}
