import { Worker, type Job } from 'bullmq';
import { config } from '../config.js';
import type { GameFeed } from '../feed/statsapi-client.js';
import type { Notifier } from '../notifications/notifier.js';
import {
  JOB_NAMES,
  QUEUE_NAMES,
  gameJobId,
  type WatchDayJobData,
  type WatchGameJobData,
  type WatchJobData,
} from '../scheduler/constants.js';
import type { GameWatcher } from '../watcher/game-watcher.js';
import { TERMINAL_PHASES, type WatchPhase } from '../watcher/phase.js';
import { todayDateString } from '../utils/date.js';
import { logger } from '../utils/logger.js';

const connection = { host: config.REDIS_HOST, port: config.REDIS_PORT };

/** Where follow-up jobs go; the watch queue in production. */
export interface JobSink {
  add(name: string, data: WatchJobData, opts: { jobId: string; delay?: number }): Promise<unknown>;
}

export interface WatchJobDeps {
  watcher: Pick<GameWatcher, 'step'>;
  feed: Pick<GameFeed, 'fetchSchedule'>;
  queue: JobSink;
  notifier: Pick<Notifier, 'watchAbandoned'>;
  now?: () => Date;
}

/** The parts of a failed BullMQ job the failure handler reads. */
export interface FailedJob {
  id?: string;
  data: WatchJobData;
  attemptsMade: number;
  opts: { attempts?: number };
}

/** Expands a team's day into one game job per scheduled game. */
export async function handleDayJob(data: WatchDayJobData, deps: WatchJobDeps): Promise<number> {
  const date = data.date ?? todayDateString(config.BASEBALL_TZ, deps.now?.());
  const games = await deps.feed.fetchSchedule(data.teamId, date);
  const log = logger.child({ teamId: data.teamId, date });

  for (const game of games) {
    const payload: WatchGameJobData = {
      kind: 'game',
      teamId: data.teamId,
      gamePk: game.gamePk,
      scheduledStart: game.scheduledStart.toISOString(),
      lastDetailedState: null,
    };
    await deps.queue.add(JOB_NAMES.WATCH_GAME, payload, {
      jobId: gameJobId(data.teamId, game.gamePk, 'start'),
    });
  }

  log.info({ games: games.length }, 'Enqueued game watches');
  return games.length;
}

/** Runs one watcher step and schedules the next as a delayed job. */
export async function handleGameJob(data: WatchGameJobData, deps: WatchJobDeps): Promise<WatchPhase> {
  const result = await deps.watcher.step(
    { teamId: data.teamId, gamePk: data.gamePk, scheduledStart: new Date(data.scheduledStart) },
    data.lastDetailedState,
  );

  if (TERMINAL_PHASES.has(result.phase) || !result.wakeAt) return result.phase;

  const now = deps.now?.() ?? new Date();
  await deps.queue.add(
    JOB_NAMES.WATCH_GAME,
    { ...data, lastDetailedState: result.detailedState },
    {
      jobId: gameJobId(data.teamId, data.gamePk, result.wakeAt),
      delay: Math.max(result.wakeAt.getTime() - now.getTime(), 0),
    },
  );
  return result.phase;
}

/**
 * Logs a failed attempt. Once a game job has used its last attempt no
 * follow-up job exists, so the operator is told the game will not be digested.
 * Returns true when the operator was notified.
 */
export async function handleFailedJob(
  job: FailedJob,
  err: Error,
  notifier: Pick<Notifier, 'watchAbandoned'>,
): Promise<boolean> {
  const attempts = job.opts.attempts ?? 1;
  logger.error(
    { job: job.id, kind: job.data.kind, attemptsMade: job.attemptsMade, attempts, err: err.message },
    'Watch job failed',
  );
  if (job.data.kind !== 'game' || job.attemptsMade < attempts) return false;

  await notifier.watchAbandoned({
    teamId: job.data.teamId,
    gamePk: job.data.gamePk,
    attempts: job.attemptsMade,
    error: err.message,
  });
  return true;
}

export function createWatchWorker(deps: WatchJobDeps) {
  const worker = new Worker<WatchJobData>(
    QUEUE_NAMES.WATCH,
    async (job: Job<WatchJobData>) => {
      if (job.data.kind === 'day') {
        return handleDayJob(job.data, deps);
      }
      return handleGameJob(job.data, deps);
    },
    { connection, concurrency: 4 },
  );

  worker.on('failed', (job, err) => {
    if (!job) {
      logger.error({ err: err.message }, 'Watch job failed');
      return;
    }
    handleFailedJob(job, err, deps.notifier).catch((notifyErr: unknown) => {
      logger.error({ job: job.id, err: notifyErr }, 'Failed to report abandoned watch');
    });
  });

  return worker;
}
