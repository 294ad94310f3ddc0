import type { Redis } from 'ioredis';

/**
 * One-shot claims for watcher triggers. `claim` returns true only for the
 * first caller per key; `release` hands the key back after a failed run.
 */
export interface FireRegistry {
  claim(key: string): Promise<boolean>;
  release(key: string): Promise<void>;
}

const PREFIX = 'digest:fired:';
const TTL_SECONDS = 7 * 86400;

export class RedisFireRegistry implements FireRegistry {
  constructor(
    private readonly redis: Redis,
    private readonly ttlSeconds = TTL_SECONDS,
  ) {}

  async claim(key: string): Promise<boolean> {
    const result = await this.redis.set(`${PREFIX}${key}`, '1', 'EX', this.ttlSeconds, 'NX');
    return result === 'OK';
  }

  async release(key: string): Promise<void> {
    await this.redis.del(`${PREFIX}${key}`);
  }
}

/** Process-local registry for one-off CLI runs and tests. */
export class MemoryFireRegistry implements FireRegistry {
  private readonly claimed = new Set<string>();

  async claim(key: string): Promise<boolean> {
    if (this.claimed.has(key)) return false;
    this.claimed.add(key);
    return true;
  }

  async release(key: string): Promise<void> {
    this.claimed.delete(key);
  }
}

export function finalKey(teamId: number, gamePk: number): string {
  return `final-${teamId}-${gamePk}`;
}

export function timeoutKey(teamId: number, gamePk: number): string {
  return `timeout-${teamId}-${gamePk}`;
}
