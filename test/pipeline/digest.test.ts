import { describe, it, expect } from 'vitest';
import { buildDigest, runDigest, DEFAULT_DIGEST_OPTIONS } from '../../src/pipeline/digest.js';
import { decodeLiveFeed, decodeStandings } from '../../src/feed/decoder.js';
import { TeamNotInGameError } from '../../src/errors.js';
import type { DigestStore, GameRows } from '../../src/storage/index.js';
import type { DigestRecord } from '../../src/types/index.js';
import { loadJsonFixture } from '../helpers/fixture-loader.js';

const CUBS = 112;
const CARDINALS = 138;

function fixtureFeed() {
  return decodeLiveFeed(loadJsonFixture('statsapi', 'live-feed-final.json'));
}

function fixtureStandings() {
  return decodeStandings(loadJsonFixture('statsapi', 'standings.json'));
}

class MemoryStore implements DigestStore {
  games: GameRows[] = [];
  digests: DigestRecord[] = [];

  async saveGame(rows: GameRows): Promise<void> {
    this.games.push(rows);
  }
  async saveDigest(record: DigestRecord): Promise<void> {
    this.digests.push(record);
  }
  async getDigest(): Promise<DigestRecord | null> {
    return null;
  }
  async listDigests(): Promise<DigestRecord[]> {
    return this.digests;
  }
  async ping(): Promise<boolean> {
    return true;
  }
  async close(): Promise<void> {}
}

describe('buildDigest', () => {
  it('should render the full digest for the home team', () => {
    const { record } = buildDigest(fixtureFeed(), CUBS, fixtureStandings());

    expect(record.renderedText.split('\n')).toEqual([
      '## Chicago Cubs W 5-3 vs St. Louis Cardinals',
      'Final · 2024-06-15 · gamePk 746123',
      '',
      '### Linescore',
      '| Team | 1 | 2 | 3 | 4 | 5 | 6 | 7 | 8 | 9 | R | H | E |',
      '| --- | --- | --- | --- | --- | --- | --- | --- | --- | --- | --- | --- | --- |',
      '| St. Louis Cardinals | 1 | 0 | 0 | 1 | 0 | 0 | 0 | 1 | 0 | 3 | 7 | 0 |',
      '| Chicago Cubs | 0 | 0 | 2 | 0 | 0 | 1 | 2 | 0 | – | 5 | 9 | 1 |',
      '',
      '### Team Totals',
      '- St. Louis Cardinals: 7-for-19, 3 R, 1 2B, 0 3B, 1 HR, 3 RBI, 2 BB, 11 SO, 0 SB · .368/.429/.579/1.008 · 8.0 IP, 5 ER, 5.63 ERA, 1.25 WHIP',
      '- Chicago Cubs: 9-for-22, 5 R, 1 2B, 0 3B, 2 HR, 5 RBI, 1 BB, 10 SO, 3 SB · .409/.435/.727/1.162 · 9.0 IP, 3 ER, 3.00 ERA, 1.00 WHIP',
      '',
      '### Top Batters: Chicago Cubs',
      '1. Ian Happ (LF): 11.00 BAT_SCORE · 1-for-3, 1 HR, 2 RBI, 1 R, 1 BB · .333/.500/1.333/1.833',
      '2. Seiya Suzuki (RF): 11.00 BAT_SCORE · 2-for-4, 1 HR, 2 RBI, 2 R · .500/.500/1.250/1.750',
      '3. Nico Hoerner (2B): 7.00 BAT_SCORE · 2-for-4, 1 2B, 0 RBI, 1 R, 1 SB · .500/.500/.750/1.250',
      '',
      '### Pitching',
      '- St. Louis Cardinals SP Sonny Gray: 19.00 PITCH_SCORE · 6.0 IP, 7 H, 4 ER, 1 BB, 7 SO · 6.00 ERA, 1.33 WHIP',
      '- Chicago Cubs SP Justin Steele: 38.98 PITCH_SCORE · 6.1 IP, 5 H, 2 ER, 1 BB, 8 SO · 2.84 ERA, 0.95 WHIP',
      '- Chicago Cubs RP Porter Hodge: 14.02 PITCH_SCORE · 1.2 IP, 1 H, 0 ER, 0 BB, 2 SO · 0.00 ERA, 0.60 WHIP',
      '',
      '### Notables',
      '- Ian Happ: 1 HR, 2 RBI',
      '- Seiya Suzuki: 1 HR, 2 RBI',
      '- Pete Crow-Armstrong: 2 SB',
      '- MVP: Justin Steele (pitcher, 38.98 PITCH_SCORE)',
      '',
      '### Postseason Odds',
      'Chicago Cubs: 79.1% to reach the postseason',
    ]);
  });

  it('should fill the structured record', () => {
    const { record, odds } = buildDigest(fixtureFeed(), CUBS, fixtureStandings());

    expect(record.finalScoreText).toBe('Chicago Cubs W 5-3 vs St. Louis Cardinals');
    expect(record.result).toBe('W');
    expect(record.side).toBe('home');
    expect(record.score).toEqual({ team: 5, opponent: 3 });
    expect(record.opponent).toEqual({ id: CARDINALS, name: 'St. Louis Cardinals' });
    expect(record.topBatters.map((b) => b.name)).toEqual(['Ian Happ', 'Seiya Suzuki', 'Nico Hoerner']);
    expect(record.pitchingHighlight.home?.name).toBe('Justin Steele');
    expect(record.pitchingHighlight.away?.name).toBe('Sonny Gray');
    expect(record.reliefHighlight?.name).toBe('Porter Hodge');
    expect(record.mvp).toEqual({ playerId: 657006, name: 'Justin Steele', role: 'pitcher', score: 38.98 });
    expect(odds?.isDivisionLeader).toBe(true);
    expect(record.playoffOdds).toBe(odds?.odds);
  });

  it('should render from the road team perspective', () => {
    const { record } = buildDigest(fixtureFeed(), CARDINALS, null);

    expect(record.finalScoreText).toBe('St. Louis Cardinals L 3-5 @ Chicago Cubs');
    expect(record.reliefHighlight?.name).toBe('Ryan Helsley');
    expect(record.topBatters.map((b) => b.name)).toEqual(['Willson Contreras', 'Lars Nootbaar', 'Masyn Winn']);
    expect(record.notables).toEqual([
      'Willson Contreras: 1 HR, 1 RBI',
      'MVP: Sonny Gray (pitcher, 19.00 PITCH_SCORE)',
    ]);
    expect(record.playoffOdds).toBeNull();
    expect(record.renderedText).not.toContain('### Postseason Odds');
  });

  it('should omit odds when the team is missing from the standings', () => {
    const { record } = buildDigest(fixtureFeed(), CUBS, []);
    expect(record.playoffOdds).toBeNull();
  });

  it('should honour the top-batter count', () => {
    const { record } = buildDigest(fixtureFeed(), CUBS, null, { ...DEFAULT_DIGEST_OPTIONS, topBatters: 1 });
    expect(record.topBatters).toHaveLength(1);
  });

  it('should render byte-identical text for identical input', () => {
    const first = buildDigest(fixtureFeed(), CUBS, fixtureStandings());
    const second = buildDigest(fixtureFeed(), CUBS, fixtureStandings());
    expect(second.record.renderedText).toBe(first.record.renderedText);
  });

  it('should reject a team that did not play', () => {
    expect(() => buildDigest(fixtureFeed(), 147, null)).toThrow(TeamNotInGameError);
  });
});

describe('runDigest', () => {
  it('should store rows and the digest, then notify', async () => {
    const store = new MemoryStore();
    const ready: DigestRecord[] = [];

    const record = await runDigest(fixtureFeed(), CUBS, {
      feed: { fetchStandings: async () => fixtureStandings() },
      store,
      notifier: { digestReady: async (r) => void ready.push(r) },
    });

    expect(store.digests).toEqual([record]);
    expect(ready).toEqual([record]);

    const [rows] = store.games;
    expect(rows?.summary).toMatchObject({ game_pk: 746123, home_score: 5, away_score: 3, status: 'FINAL' });
    expect(rows?.linescore).toHaveLength(18);
    expect(rows?.linescore.at(-1)).toEqual({ game_pk: 746123, inning_num: 9, is_home: true, runs: null });
    expect(rows?.players).toHaveLength(16);
    expect(rows?.players.find((p) => p.player_id === 657006)).toMatchObject({
      role: 'pitcher',
      team_id: CUBS,
      is_home: true,
      pitch_score: 38.98,
      bat_score: null,
    });
  });

  it('should still deliver the digest when standings cannot be fetched', async () => {
    const store = new MemoryStore();

    const record = await runDigest(fixtureFeed(), CUBS, {
      feed: {
        fetchStandings: async () => {
          throw new Error('connect ECONNREFUSED');
        },
      },
      store,
      notifier: { digestReady: async () => {} },
    });

    expect(record.playoffOdds).toBeNull();
    expect(store.digests).toHaveLength(1);
  });
});
