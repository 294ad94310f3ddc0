import { watchQueue } from './queues.js';
import { JOB_NAMES } from './constants.js';
import { config } from '../config.js';
import { logger } from '../utils/logger.js';

/**
 * One repeatable "watch the day" job per configured team. upsertJobScheduler
 * keeps restarts idempotent.
 */
export async function startScheduler(): Promise<void> {
  for (const teamId of config.TEAM_IDS) {
    const schedulerId = `watch-day-${teamId}`;

    await watchQueue.upsertJobScheduler(
      schedulerId,
      { pattern: config.WATCH_CRON, tz: config.BASEBALL_TZ },
      {
        name: JOB_NAMES.WATCH_DAY,
        data: { kind: 'day', teamId },
      },
    );

    logger.info({ schedulerId, cron: config.WATCH_CRON, tz: config.BASEBALL_TZ }, 'Registered job scheduler');
  }

  logger.info(`Scheduler initialized for ${config.TEAM_IDS.length} teams`);
}
