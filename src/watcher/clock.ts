import { setTimeout as sleep } from 'node:timers/promises';

export interface Clock {
  now(): Date;
  sleepUntil(when: Date): Promise<void>;
}

export const systemClock: Clock = {
  now: () => new Date(),
  async sleepUntil(when) {
    const delayMs = when.getTime() - Date.now();
    if (delayMs > 0) await sleep(delayMs);
  },
};
