import { describe, it, expect } from 'vitest';
import {
  decodeFeedStatus,
  decodeLiveFeed,
  decodeSchedule,
  decodeStandings,
  mapStatus,
} from '../../src/feed/decoder.js';
import { FeedDecodeError } from '../../src/errors.js';
import { loadJsonFixture } from '../helpers/fixture-loader.js';

function minimalFeed(datetime: Record<string, string>) {
  return {
    gamePk: 1,
    gameData: {
      status: { detailedState: 'In Progress' },
      datetime,
      teams: { home: { id: 112, name: 'Chicago Cubs' }, away: { id: 138, name: 'St. Louis Cardinals' } },
    },
    liveData: {
      boxscore: { teams: { home: { players: {} }, away: { players: {} } } },
    },
  };
}

describe('mapStatus', () => {
  it('should treat Final and Completed Early as final', () => {
    expect(mapStatus('Final')).toBe('FINAL');
    expect(mapStatus('Completed Early: Rain')).toBe('FINAL');
  });

  it('should keep Game Over in progress until the box score settles', () => {
    expect(mapStatus('Game Over')).toBe('IN_PROGRESS');
    expect(mapStatus('Manager challenge: Tag play')).toBe('IN_PROGRESS');
    expect(mapStatus('Delayed: Rain')).toBe('IN_PROGRESS');
  });

  it('should map pre-game states to SCHEDULED', () => {
    expect(mapStatus('Pre-Game')).toBe('SCHEDULED');
    expect(mapStatus('Warmup')).toBe('SCHEDULED');
    expect(mapStatus('Delayed Start: Rain')).toBe('SCHEDULED');
  });

  it('should map postponed and unknown states to OTHER', () => {
    expect(mapStatus('Postponed')).toBe('OTHER');
    expect(mapStatus('Suspended: Rain')).toBe('OTHER');
  });

  it('should fall back to the abstract state when detailed state is empty', () => {
    expect(mapStatus('', 'Live')).toBe('IN_PROGRESS');
    expect(mapStatus('', 'Final')).toBe('FINAL');
    expect(mapStatus('', 'Preview')).toBe('SCHEDULED');
    expect(mapStatus('', '')).toBe('OTHER');
  });
});

describe('decodeLiveFeed', () => {
  it('should decode game state, linescore and raw player maps', () => {
    const feed = decodeLiveFeed(loadJsonFixture('statsapi', 'live-feed-final.json'));

    expect(feed.game.gamePk).toBe(746123);
    expect(feed.game.officialDate).toBe('2024-06-15');
    expect(feed.game.status).toBe('FINAL');
    expect(feed.game.detailedState).toBe('Final');
    expect(feed.game.scheduledStart.toISOString()).toBe('2024-06-15T18:20:00.000Z');
    expect(feed.game.homeTeam).toEqual({ id: 112, name: 'Chicago Cubs' });
    expect(feed.game.awayTeam).toEqual({ id: 138, name: 'St. Louis Cardinals' });

    expect(feed.linescore.innings).toHaveLength(9);
    expect(feed.linescore.innings[0]).toEqual({ num: 1, away: 1, home: 0 });
    expect(feed.linescore.innings[8]).toEqual({ num: 9, away: 0, home: null });
    expect(feed.linescore.home).toEqual({ runs: 5, hits: 9, errors: 1 });
    expect(feed.linescore.away).toEqual({ runs: 3, hits: 7, errors: 0 });

    expect(Object.keys(feed.players.home)).toHaveLength(10);
    expect(Object.keys(feed.players.away)).toHaveLength(7);
  });

  it('should take officialDate from dateTime when it is missing', () => {
    const feed = decodeLiveFeed(minimalFeed({ dateTime: '2024-07-04T23:05:00Z' }));
    expect(feed.game.officialDate).toBe('2024-07-04');
    expect(feed.linescore.innings).toEqual([]);
    expect(feed.linescore.home).toEqual({ runs: 0, hits: 0, errors: 0 });
  });

  it('should reject a feed without any date', () => {
    expect(() => decodeLiveFeed(minimalFeed({}))).toThrow(FeedDecodeError);
  });

  it('should reject a feed without a boxscore', () => {
    const payload = { ...minimalFeed({ officialDate: '2024-07-04' }), liveData: {} };
    expect(() => decodeLiveFeed(payload)).toThrow(FeedDecodeError);
  });
});

describe('decodeFeedStatus', () => {
  it('should read only the status block', () => {
    expect(decodeFeedStatus({ gamePk: 5, gameData: { status: { detailedState: 'Final' } } })).toEqual({
      gamePk: 5,
      status: 'FINAL',
      detailedState: 'Final',
    });
  });

  it('should use the abstract state as text when detailed state is absent', () => {
    expect(decodeFeedStatus({ gamePk: 5, gameData: { status: { abstractGameState: 'Live' } } })).toEqual({
      gamePk: 5,
      status: 'IN_PROGRESS',
      detailedState: 'Live',
    });
  });
});

describe('decodeSchedule', () => {
  it('should keep only the team games in start order', () => {
    const games = decodeSchedule(loadJsonFixture('statsapi', 'schedule.json'), 112);

    expect(games.map((g) => g.gamePk)).toEqual([746123, 746200]);
    expect(games[0]?.status).toBe('FINAL');
    expect(games[1]?.status).toBe('SCHEDULED');
    expect(games[1]?.scheduledStart.toISOString()).toBe('2024-06-15T23:05:00.000Z');
  });

  it('should return nothing for an empty day', () => {
    expect(decodeSchedule({ dates: [] }, 112)).toEqual([]);
    expect(decodeSchedule({}, 112)).toEqual([]);
  });
});

describe('decodeStandings', () => {
  it('should inherit league and division from the record block', () => {
    const records = decodeStandings(loadJsonFixture('statsapi', 'standings.json'));

    expect(records).toHaveLength(13);
    expect(records[0]).toEqual({
      teamId: 112,
      teamName: 'Chicago Cubs',
      league: 'National League',
      division: 'National League Central',
      wins: 60,
      losses: 40,
    });
  });

  it('should accept flat snake_case rows', () => {
    const records = decodeStandings([
      { team_id: 1, team_name: 'A', league: 'L', division: 'East', w: 60, l: '40' },
      { teamId: 2, teamName: 'B', league: 'L', division: 'East', wins: null, losses: 42 },
    ]);

    expect(records).toEqual([
      { teamId: 1, teamName: 'A', league: 'L', division: 'East', wins: 60, losses: 40 },
      { teamId: 2, teamName: 'B', league: 'L', division: 'East', wins: null, losses: 42 },
    ]);
  });

  it('should reject a payload of the wrong shape', () => {
    expect(() => decodeStandings({ standings: 'nope' })).toThrow(FeedDecodeError);
  });
});
