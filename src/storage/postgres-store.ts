import { sql } from '../db/pool.js';
import { getDigest, getDigestsForDate, ping, replaceGameRows, upsertDigest } from '../db/queries.js';
import type { DigestRecord } from '../types/index.js';
import type { GameRows } from './rows.js';
import type { DigestStore } from './store.js';

export class PostgresDigestStore implements DigestStore {
  async saveGame(rows: GameRows): Promise<void> {
    await replaceGameRows(rows);
  }

  async saveDigest(record: DigestRecord): Promise<void> {
    await upsertDigest(record);
  }

  getDigest(teamId: number, gamePk: number): Promise<DigestRecord | null> {
    return getDigest(teamId, gamePk);
  }

  listDigests(officialDate: string): Promise<DigestRecord[]> {
    return getDigestsForDate(officialDate);
  }

  ping(): Promise<boolean> {
    return ping();
  }

  async close(): Promise<void> {
    await sql.end();
  }
}
