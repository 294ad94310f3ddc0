export const QUEUE_NAMES = {
  WATCH: 'watch-queue',
} as const;

export const JOB_NAMES = {
  WATCH_DAY: 'watch-day',
  WATCH_GAME: 'watch-game',
} as const;

export interface WatchDayJobData {
  kind: 'day';
  teamId: number;
  /** YYYY-MM-DD; the scheduler leaves it out and the worker uses today */
  date?: string;
}

export interface WatchGameJobData {
  kind: 'game';
  teamId: number;
  gamePk: number;
  scheduledStart: string;
  lastDetailedState: string | null;
}

export type WatchJobData = WatchDayJobData | WatchGameJobData;

/** BullMQ rejects ':' in custom job ids. */
export function gameJobId(teamId: number, gamePk: number, wakeAt: Date | 'start'): string {
  const suffix = wakeAt === 'start' ? wakeAt : String(wakeAt.getTime());
  return `${teamId}-${gamePk}-${suffix}`;
}
