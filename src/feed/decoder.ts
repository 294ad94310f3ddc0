import { z } from 'zod';
import { FeedDecodeError } from '../errors.js';
import type {
  GameState,
  GameStatus,
  Linescore,
  LinescoreTotals,
  LiveFeed,
  StandingRecord,
} from '../types/index.js';
import { toOptionalCount } from '../utils/numbers.js';

// ===== Shared pieces =====

const teamRefSchema = z.object({
  id: z.number().int(),
  name: z.string(),
});

const statusSchema = z
  .object({
    detailedState: z.string().nullish(),
    abstractGameState: z.string().nullish(),
  })
  .default({});

type RawStatus = z.infer<typeof statusSchema>;

const FINAL_STATES = new Set(['final']);
const SCHEDULED_STATES = new Set(['scheduled', 'pre-game', 'warmup']);

/**
 * Maps the feed's status text onto the watcher's status enum.
 * "Game Over" precedes "Final" while the scorers settle the box score, so it
 * is still treated as in progress.
 */
export function mapStatus(detailedState: string, abstractGameState = ''): GameStatus {
  const detailed = detailedState.trim().toLowerCase();

  if (!detailed) {
    const abstract = abstractGameState.trim().toLowerCase();
    if (abstract === 'final') return 'FINAL';
    if (abstract === 'live') return 'IN_PROGRESS';
    if (abstract === 'preview') return 'SCHEDULED';
    return 'OTHER';
  }

  if (FINAL_STATES.has(detailed) || detailed.startsWith('completed early')) return 'FINAL';
  if (SCHEDULED_STATES.has(detailed) || detailed.startsWith('delayed start')) return 'SCHEDULED';
  if (
    detailed === 'in progress' ||
    detailed === 'game over' ||
    detailed.startsWith('manager challenge') ||
    detailed.startsWith('umpire review') ||
    detailed.startsWith('delayed')
  ) {
    return 'IN_PROGRESS';
  }
  return 'OTHER';
}

function readStatus(raw: RawStatus): { status: GameStatus; detailedState: string } {
  const detailedState = raw.detailedState || raw.abstractGameState || '';
  return {
    status: mapStatus(raw.detailedState ?? '', raw.abstractGameState ?? ''),
    detailedState,
  };
}

function parseOrThrow<T extends z.ZodTypeAny>(schema: T, payload: unknown, feed: string): z.output<T> {
  const result = schema.safeParse(payload);
  if (!result.success) {
    throw new FeedDecodeError(feed, result.error.issues);
  }
  return result.data;
}

// ===== Live feed =====

const inningHalfSchema = z.object({ runs: z.unknown() }).partial().nullish();

const lineTotalsSchema = z
  .object({ runs: z.unknown(), hits: z.unknown(), errors: z.unknown() })
  .partial()
  .default({});

const boxscoreTeamSchema = z.object({
  players: z.record(z.unknown()).default({}),
});

const liveFeedSchema = z.object({
  gamePk: z.number().int(),
  gameData: z.object({
    status: statusSchema,
    datetime: z
      .object({
        officialDate: z.string().nullish(),
        dateTime: z.string().datetime({ offset: true }).nullish(),
      })
      .refine((dt) => Boolean(dt.officialDate || dt.dateTime), {
        message: 'officialDate or dateTime is required',
      }),
    teams: z.object({ home: teamRefSchema, away: teamRefSchema }),
  }),
  liveData: z.object({
    linescore: z
      .object({
        innings: z
          .array(z.object({ num: z.number().int(), home: inningHalfSchema, away: inningHalfSchema }))
          .default([]),
        teams: z.object({ home: lineTotalsSchema, away: lineTotalsSchema }).default({}),
      })
      .default({}),
    boxscore: z.object({
      teams: z.object({ home: boxscoreTeamSchema, away: boxscoreTeamSchema }),
    }),
  }),
});

const feedStatusSchema = z.object({
  gamePk: z.number().int(),
  gameData: z.object({ status: statusSchema }).default({}),
});

function toLineTotals(raw: z.infer<typeof lineTotalsSchema>): LinescoreTotals {
  return {
    runs: toOptionalCount(raw.runs) ?? 0,
    hits: toOptionalCount(raw.hits) ?? 0,
    errors: toOptionalCount(raw.errors) ?? 0,
  };
}

function toLinescore(raw: z.infer<typeof liveFeedSchema>['liveData']['linescore']): Linescore {
  return {
    innings: [...raw.innings]
      .sort((a, b) => a.num - b.num)
      .map((inning) => ({
        num: inning.num,
        away: toOptionalCount(inning.away?.runs),
        home: toOptionalCount(inning.home?.runs),
      })),
    away: toLineTotals(raw.teams.away),
    home: toLineTotals(raw.teams.home),
  };
}

/** Decodes a full `feed/live` payload. Player blocks are left raw for the normalizer. */
export function decodeLiveFeed(payload: unknown): LiveFeed {
  const feed = parseOrThrow(liveFeedSchema, payload, 'live feed');
  const { datetime, teams } = feed.gameData;
  const officialDate = datetime.officialDate || (datetime.dateTime ?? '').slice(0, 10);
  const scheduledStart = datetime.dateTime
    ? new Date(datetime.dateTime)
    : new Date(`${officialDate}T00:00:00Z`);

  return {
    game: {
      gamePk: feed.gamePk,
      officialDate,
      ...readStatus(feed.gameData.status),
      scheduledStart,
      homeTeam: teams.home,
      awayTeam: teams.away,
    },
    linescore: toLinescore(feed.liveData.linescore),
    players: {
      home: feed.liveData.boxscore.teams.home.players,
      away: feed.liveData.boxscore.teams.away.players,
    },
  };
}

/** Reads only the status block of a live feed; used on every poll. */
export function decodeFeedStatus(payload: unknown): {
  gamePk: number;
  status: GameStatus;
  detailedState: string;
} {
  const feed = parseOrThrow(feedStatusSchema, payload, 'live feed status');
  return { gamePk: feed.gamePk, ...readStatus(feed.gameData.status) };
}

// ===== Schedule =====

const scheduleGameSchema = z.object({
  gamePk: z.number().int(),
  gameDate: z.string().datetime({ offset: true }),
  officialDate: z.string().nullish(),
  status: statusSchema,
  teams: z.object({
    home: z.object({ team: teamRefSchema }),
    away: z.object({ team: teamRefSchema }),
  }),
});

const scheduleSchema = z.object({
  dates: z
    .array(z.object({ date: z.string().nullish(), games: z.array(scheduleGameSchema).default([]) }))
    .default([]),
});

/**
 * Decodes a schedule response into the games the team plays, ordered by
 * scheduled start (doubleheaders come back in play order).
 */
export function decodeSchedule(payload: unknown, teamId: number): GameState[] {
  const schedule = parseOrThrow(scheduleSchema, payload, 'schedule');
  const games: GameState[] = [];

  for (const day of schedule.dates) {
    for (const game of day.games) {
      const home = game.teams.home.team;
      const away = game.teams.away.team;
      if (home.id !== teamId && away.id !== teamId) continue;

      games.push({
        gamePk: game.gamePk,
        officialDate: game.officialDate || day.date || game.gameDate.slice(0, 10),
        ...readStatus(game.status),
        scheduledStart: new Date(game.gameDate),
        homeTeam: home,
        awayTeam: away,
      });
    }
  }

  return games.sort(
    (a, b) => a.scheduledStart.getTime() - b.scheduledStart.getTime() || a.gamePk - b.gamePk,
  );
}

// ===== Standings =====

const countish = z.union([z.number(), z.string()]).nullish();
const namedRef = z
  .union([
    z.string(),
    z.number(),
    z.object({ id: z.number().nullish(), name: z.string().nullish() }),
  ])
  .nullish();

const teamRecordSchema = z.object({
  team: z
    .object({
      id: z.number().nullish(),
      name: z.string().nullish(),
      league: namedRef,
      division: namedRef,
    })
    .nullish(),
  teamId: countish,
  team_id: countish,
  teamName: z.string().nullish(),
  team_name: z.string().nullish(),
  league: namedRef,
  division: namedRef,
  wins: countish,
  w: countish,
  losses: countish,
  l: countish,
  leagueRecord: z.object({ wins: countish, losses: countish }).nullish(),
});

type TeamRecordInput = z.infer<typeof teamRecordSchema>;
type NamedRefInput = z.infer<typeof namedRef>;

const standingsSchema = z.union([
  z.object({
    records: z.array(
      z.object({
        league: namedRef,
        division: namedRef,
        teamRecords: z.array(teamRecordSchema).default([]),
      }),
    ),
  }),
  z.array(teamRecordSchema),
]);

function refName(value: NamedRefInput): string | null {
  if (value === null || value === undefined) return null;
  if (typeof value === 'string') return value.trim() || null;
  if (typeof value === 'number') return String(value);
  if (value.name?.trim()) return value.name.trim();
  return value.id !== null && value.id !== undefined ? String(value.id) : null;
}

function firstCount(...values: unknown[]): number | null {
  for (const value of values) {
    const count = toOptionalCount(value);
    if (count !== null) return count;
  }
  return null;
}

function toStandingRecord(
  entry: TeamRecordInput,
  blockLeague: NamedRefInput = null,
  blockDivision: NamedRefInput = null,
): StandingRecord {
  const name = (entry.teamName ?? entry.team_name ?? entry.team?.name ?? '').trim();
  return {
    teamId: firstCount(entry.teamId, entry.team_id, entry.team?.id),
    teamName: name || null,
    league: refName(entry.league) ?? refName(blockLeague) ?? refName(entry.team?.league),
    division: refName(entry.division) ?? refName(blockDivision) ?? refName(entry.team?.division),
    wins: firstCount(entry.wins, entry.w, entry.leagueRecord?.wins),
    losses: firstCount(entry.losses, entry.l, entry.leagueRecord?.losses),
  };
}

/**
 * Decodes standings from the StatsAPI `records[].teamRecords[]` shape or a
 * flat list of camel/snake-case rows. Fields may come back null; the odds
 * estimator drops incomplete rows.
 */
export function decodeStandings(payload: unknown): StandingRecord[] {
  const standings = parseOrThrow(standingsSchema, payload, 'standings');
  if (Array.isArray(standings)) {
    return standings.map((entry) => toStandingRecord(entry));
  }
  return standings.records.flatMap((block) =>
    block.teamRecords.map((entry) => toStandingRecord(entry, block.league, block.division)),
  );
}
