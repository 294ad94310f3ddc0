import type { Config } from '../config.js';
import { JsonFileDigestStore } from './json-store.js';
import type { DigestStore } from './store.js';

export type { DigestStore } from './store.js';
export { toGameRows } from './rows.js';
export type { GameRows } from './rows.js';

/** Picks the sink from OUTPUT_MODE. The Postgres client is only loaded when used. */
export async function createDigestStore(
  cfg: Pick<Config, 'OUTPUT_MODE' | 'DIGEST_JSON_DIR'>,
): Promise<DigestStore> {
  if (cfg.OUTPUT_MODE === 'postgres') {
    const { PostgresDigestStore } = await import('./postgres-store.js');
    return new PostgresDigestStore();
  }
  return new JsonFileDigestStore(cfg.DIGEST_JSON_DIR);
}
