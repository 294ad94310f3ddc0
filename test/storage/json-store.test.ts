import fs from 'node:fs';
import os from 'node:os';
import path from 'node:path';
import { afterEach, beforeEach, describe, it, expect } from 'vitest';
import { JsonFileDigestStore } from '../../src/storage/json-store.js';
import { toGameRows } from '../../src/storage/rows.js';
import { buildDigest } from '../../src/pipeline/digest.js';
import { decodeLiveFeed } from '../../src/feed/decoder.js';
import type { DigestRecord } from '../../src/types/index.js';
import { loadJsonFixture } from '../helpers/fixture-loader.js';

describe('JsonFileDigestStore', () => {
  let dir: string;
  let store: JsonFileDigestStore;

  beforeEach(() => {
    dir = fs.mkdtempSync(path.join(os.tmpdir(), 'digest-store-'));
    store = new JsonFileDigestStore(dir);
  });

  afterEach(() => {
    fs.rmSync(dir, { recursive: true, force: true });
  });

  function built(teamId: number) {
    const feed = decodeLiveFeed(loadJsonFixture('statsapi', 'live-feed-final.json'));
    return { feed, ...buildDigest(feed, teamId, null) };
  }

  it('should write one file per raw table', async () => {
    const { feed, lines } = built(112);
    await store.saveGame(toGameRows(feed, lines));

    expect(fs.readdirSync(dir).sort()).toEqual([
      '746123_linescore.json',
      '746123_players.json',
      '746123_summary.json',
    ]);
    const summary: unknown = JSON.parse(fs.readFileSync(path.join(dir, '746123_summary.json'), 'utf-8'));
    expect(summary).toMatchObject({ game_pk: 746123, home_team_name: 'Chicago Cubs', home_score: 5 });
  });

  it('should round-trip a digest', async () => {
    const { record } = built(112);
    await store.saveDigest(record);

    const loaded = await store.getDigest(112, 746123);
    expect(loaded).toEqual(record);
  });

  it('should overwrite the digest for the same team and game', async () => {
    const { record } = built(112);
    await store.saveDigest({ ...record, notables: [] });
    await store.saveDigest(record);

    expect((await store.getDigest(112, 746123))?.notables).toEqual(record.notables);
    expect(fs.readdirSync(dir)).toEqual(['746123_112_digest.json']);
  });

  it('should return null for an unknown digest', async () => {
    expect(await store.getDigest(112, 1)).toBeNull();
  });

  it('should list digests for a date in game and team order', async () => {
    const cubs = built(112).record;
    const cardinals = built(138).record;
    const otherDay: DigestRecord = { ...cubs, gamePk: 700000, officialDate: '2024-06-14' };
    await store.saveDigest(cubs);
    await store.saveDigest(otherDay);
    await store.saveDigest(cardinals);

    const listed = await store.listDigests('2024-06-15');
    expect(listed.map((d) => [d.gamePk, d.team.id])).toEqual([
      [746123, 112],
      [746123, 138],
    ]);
  });

  it('should list nothing when the directory does not exist yet', async () => {
    const missing = new JsonFileDigestStore(path.join(dir, 'nested', 'missing'));
    expect(await missing.listDigests('2024-06-15')).toEqual([]);
  });
});
