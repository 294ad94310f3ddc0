import fs from 'node:fs';
import path from 'node:path';
import crypto from 'node:crypto';
import type { DigestRecord } from '../types/index.js';
import type { GameRows } from './rows.js';
import type { DigestStore } from './store.js';

const DIGEST_SUFFIX = '_digest.json';

/**
 * Local-run sink: one JSON file per raw table per game, plus one file per
 * (gamePk, team) digest. Files are written to a temp name and renamed so a
 * concurrent reader never sees a partial file.
 */
export class JsonFileDigestStore implements DigestStore {
  constructor(private readonly dir: string) {}

  async saveGame(rows: GameRows): Promise<void> {
    const gamePk = rows.summary.game_pk;
    await this.writeJson(`${gamePk}_summary.json`, rows.summary);
    await this.writeJson(`${gamePk}_linescore.json`, rows.linescore);
    await this.writeJson(`${gamePk}_players.json`, rows.players);
  }

  async saveDigest(record: DigestRecord): Promise<void> {
    await this.writeJson(this.digestFile(record.team.id, record.gamePk), record);
  }

  async getDigest(teamId: number, gamePk: number): Promise<DigestRecord | null> {
    return this.readDigest(path.join(this.dir, this.digestFile(teamId, gamePk)));
  }

  async listDigests(officialDate: string): Promise<DigestRecord[]> {
    let files: string[];
    try {
      files = await fs.promises.readdir(this.dir);
    } catch (err) {
      if (isNotFound(err)) return [];
      throw err;
    }

    const records: DigestRecord[] = [];
    for (const file of files.filter((f) => f.endsWith(DIGEST_SUFFIX))) {
      const record = await this.readDigest(path.join(this.dir, file));
      if (record && record.officialDate === officialDate) records.push(record);
    }
    return records.sort((a, b) => a.gamePk - b.gamePk || a.team.id - b.team.id);
  }

  async ping(): Promise<boolean> {
    await fs.promises.mkdir(this.dir, { recursive: true });
    return true;
  }

  async close(): Promise<void> {}

  private digestFile(teamId: number, gamePk: number): string {
    return `${gamePk}_${teamId}${DIGEST_SUFFIX}`;
  }

  private async readDigest(file: string): Promise<DigestRecord | null> {
    let text: string;
    try {
      text = await fs.promises.readFile(file, 'utf-8');
    } catch (err) {
      if (isNotFound(err)) return null;
      throw err;
    }
    const record: DigestRecord = JSON.parse(text);
    return record;
  }

  private async writeJson(name: string, value: unknown): Promise<void> {
    await fs.promises.mkdir(this.dir, { recursive: true });
    const target = path.join(this.dir, name);
    const tmp = `${target}.${crypto.randomBytes(6).toString('hex')}.tmp`;
    await fs.promises.writeFile(tmp, `${JSON.stringify(value, null, 2)}\n`, 'utf-8');
    await fs.promises.rename(tmp, target);
  }
}

function isNotFound(err: unknown): boolean {
  return err instanceof Error && 'code' in err && err.code === 'ENOENT';
}
