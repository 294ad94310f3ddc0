import type { DigestRecord } from '../types/index.js';
import type { GameRows } from './rows.js';

/**
 * Persistence sink for digests. Writes are upserts keyed by game (raw rows)
 * and by (team, gamePk) (digests), so re-running a game is safe.
 */
export interface DigestStore {
  saveGame(rows: GameRows): Promise<void>;
  saveDigest(record: DigestRecord): Promise<void>;
  getDigest(teamId: number, gamePk: number): Promise<DigestRecord | null>;
  /** Digests for an official date, ordered by gamePk then team id */
  listDigests(officialDate: string): Promise<DigestRecord[]>;
  ping(): Promise<boolean>;
  close(): Promise<void>;
}
