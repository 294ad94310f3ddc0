import { describe, it, expect } from 'vitest';
import {
  formatInningsPitched,
  ipToFloat,
  normalizeBoxScore,
  shorthandToOuts,
  toPitchingLine,
} from '../../src/pipeline/boxscore-normalizer.js';

describe('ipToFloat', () => {
  it('should convert outs to innings', () => {
    expect(ipToFloat(19)).toBe(6.33);
    expect(ipToFloat(21)).toBe(7);
    expect(ipToFloat(0)).toBe(0);
  });

  it('should read the shorthand as thirds', () => {
    expect(ipToFloat(null, '6.1')).toBe(6.33);
    expect(ipToFloat(null, '6.2')).toBe(6.67);
    expect(ipToFloat(undefined, '7')).toBe(7);
  });

  it('should prefer outs over the shorthand', () => {
    expect(ipToFloat(18, '6.2')).toBe(6);
  });

  it('should treat an unknown fraction as zero', () => {
    expect(ipToFloat(null, '6.5')).toBe(6);
  });

  it('should return 0 for missing or malformed input', () => {
    expect(ipToFloat(null)).toBe(0);
    expect(ipToFloat(null, null)).toBe(0);
    expect(ipToFloat(null, 'bad')).toBe(0);
    expect(ipToFloat(null, '')).toBe(0);
    expect(ipToFloat(null, '6.01')).toBe(0);
  });
});

describe('innings notation', () => {
  it('should format outs in tenths notation', () => {
    expect(formatInningsPitched(19)).toBe('6.1');
    expect(formatInningsPitched(27)).toBe('9.0');
    expect(formatInningsPitched(2)).toBe('0.2');
  });

  it('should derive outs from the shorthand', () => {
    expect(shorthandToOuts('6.1')).toBe(19);
    expect(shorthandToOuts('0.2')).toBe(2);
    expect(shorthandToOuts('x')).toBeNull();
    expect(shorthandToOuts('6.01')).toBeNull();
  });

  it('should derive outs when the feed sends only the shorthand', () => {
    const line = toPitchingLine({ inningsPitched: '5.2', hits: 4, baseOnBalls: '2' });
    expect(line.outs).toBe(17);
    expect(line.inningsPitched).toBe(5.67);
    expect(line.inningsPitchedText).toBe('5.2');
    expect(line.walks).toBe(2);
    expect(line.earnedRuns).toBe(0);
  });
});

describe('toPitchingLine', () => {
  it('should keep innings and outs in agreement when the shorthand is malformed', () => {
    const line = toPitchingLine({ inningsPitched: '6.01', hits: 5 });
    expect(line.outs).toBe(0);
    expect(line.inningsPitched).toBe(0);
    expect(line.inningsPitchedText).toBe('0.0');
  });

  it('should follow reported outs over a conflicting shorthand', () => {
    const line = toPitchingLine({ outs: 20, inningsPitched: '6.1' });
    expect(line.outs).toBe(20);
    expect(line.inningsPitched).toBe(6.67);
    expect(line.inningsPitchedText).toBe('6.2');
  });
});

describe('normalizeBoxScore', () => {
  const players = {
    ID30: {
      person: { id: 30, fullName: 'Relief Arm' },
      position: { abbreviation: 'P' },
      stats: { batting: {}, pitching: { outs: 3, inningsPitched: '1.0', strikeOuts: 2 } },
    },
    ID10: {
      person: { id: 10, fullName: 'Lead Off' },
      position: { abbreviation: 'CF' },
      battingOrder: '100',
      stats: {
        batting: { atBats: 4, hits: '2', doubles: null, baseOnBalls: 1, runs: -1, rbi: 1.9 },
        pitching: {},
      },
    },
    ID20: {
      person: { id: 20, fullName: 'Bench Guy' },
      position: { abbreviation: 'C' },
      stats: { batting: {}, pitching: {} },
    },
    ID40: {
      person: { id: 40 },
      stats: { pitching: { outs: 1 } },
    },
    broken: { person: { fullName: 'No Id' } },
  };

  it('should order lines by player id and skip entries without stats', () => {
    const lines = normalizeBoxScore(players, 'home');
    expect(lines.map((l) => l.playerId)).toEqual([10, 30, 40]);
  });

  it('should coerce counts and map feed field names', () => {
    const [leadOff] = normalizeBoxScore(players, 'home');
    expect(leadOff).toEqual({
      playerId: 10,
      name: 'Lead Off',
      position: 'CF',
      teamSide: 'home',
      battingOrder: 100,
      batting: {
        atBats: 4,
        hits: 2,
        doubles: 0,
        triples: 0,
        homeRuns: 0,
        walks: 1,
        hitByPitch: 0,
        runs: 0,
        rbi: 1,
        stolenBases: 0,
        sacFlies: 0,
        strikeOuts: 0,
        totalBases: null,
      },
      pitching: null,
    });
  });

  it('should fill in a missing name and pitcher position', () => {
    const unnamed = normalizeBoxScore(players, 'away').find((l) => l.playerId === 40);
    expect(unnamed?.name).toBe('Player 40');
    expect(unnamed?.position).toBe('P');
    expect(unnamed?.teamSide).toBe('away');
    expect(unnamed?.pitching?.inningsPitchedText).toBe('0.1');
  });

  it('should return nothing for an empty mapping', () => {
    expect(normalizeBoxScore({}, 'home')).toEqual([]);
  });
});
