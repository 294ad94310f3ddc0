import type { GameStatus } from '../types/index.js';
import { addMs } from '../utils/date.js';

export const GRACE_PERIOD_MS = 90 * 60_000;
export const POLL_INTERVAL_MS = 15 * 60_000;
export const MAX_WATCH_MS = 12 * 3_600_000;

export type WatchPhase = 'SCHEDULED' | 'WAITING_START' | 'POLLING' | 'FINAL' | 'TIMEOUT';

export const TERMINAL_PHASES: ReadonlySet<WatchPhase> = new Set(['FINAL', 'TIMEOUT']);

export interface WatchTimings {
  gracePeriodMs: number;
  pollIntervalMs: number;
  maxWatchMs: number;
}

export const DEFAULT_WATCH_TIMINGS: WatchTimings = {
  gracePeriodMs: GRACE_PERIOD_MS,
  pollIntervalMs: POLL_INTERVAL_MS,
  maxWatchMs: MAX_WATCH_MS,
};

export interface PhaseInput {
  scheduledStart: Date | null;
  now: Date;
  /** Status from the most recent successful poll, if this cycle made one */
  lastObservedStatus: GameStatus | null;
}

export interface PhaseResult {
  phase: WatchPhase;
  /** When the watcher should act next; null for terminal phases */
  wakeAt: Date | null;
}

/**
 * Where a watch stands, from the start time, the clock and the last status
 * seen. Nothing else is consulted, so a restarted watcher lands in the same
 * phase.
 */
export function resolveWatchPhase(
  input: PhaseInput,
  timings: WatchTimings = DEFAULT_WATCH_TIMINGS,
): PhaseResult {
  const { scheduledStart, now, lastObservedStatus } = input;

  if (lastObservedStatus === 'FINAL') return { phase: 'FINAL', wakeAt: null };
  if (!scheduledStart) return { phase: 'SCHEDULED', wakeAt: null };

  const elapsedMs = now.getTime() - scheduledStart.getTime();
  if (elapsedMs > timings.maxWatchMs) return { phase: 'TIMEOUT', wakeAt: null };

  if (elapsedMs < timings.gracePeriodMs) {
    return { phase: 'WAITING_START', wakeAt: addMs(scheduledStart, timings.gracePeriodMs) };
  }

  return {
    phase: 'POLLING',
    wakeAt: lastObservedStatus === null ? now : addMs(now, timings.pollIntervalMs),
  };
}
