import type { Config } from '../config.js';
import { StandingsUnavailableError, TeamNotInStandingsError } from '../errors.js';
import type { GameFeed } from '../feed/statsapi-client.js';
import type { Notifier } from '../notifications/notifier.js';
import { toGameRows, type DigestStore } from '../storage/index.js';
import type {
  BoxScoreLine,
  DigestRecord,
  LiveFeed,
  MvpTieBreak,
  StandingRecord,
  TeamSide,
} from '../types/index.js';
import { logger } from '../utils/logger.js';
import { normalizeBoxScore } from './boxscore-normalizer.js';
import { renderDigest, teamSide } from './digest-renderer.js';
import { computeTeamMetrics } from './metrics.js';
import { DEFAULT_ODDS_OPTIONS, estimatePlayoffOdds, type OddsOptions, type PlayoffOdds } from './playoff-odds.js';

export interface DigestOptions {
  topBatters: number;
  mvpTieBreak: MvpTieBreak;
  odds: OddsOptions;
}

export const DEFAULT_DIGEST_OPTIONS: DigestOptions = {
  topBatters: 3,
  mvpTieBreak: 'none',
  odds: DEFAULT_ODDS_OPTIONS,
};

export function digestOptionsFromConfig(
  cfg: Pick<Config, 'TOP_BATTERS' | 'MVP_TIE_BREAK' | 'ODDS_DIVISION_STEEPNESS' | 'ODDS_WILDCARD_STEEPNESS'>,
): DigestOptions {
  return {
    topBatters: cfg.TOP_BATTERS,
    mvpTieBreak: cfg.MVP_TIE_BREAK,
    odds: {
      divisionSteepness: cfg.ODDS_DIVISION_STEEPNESS,
      wildcardSteepness: cfg.ODDS_WILDCARD_STEEPNESS,
    },
  };
}

export interface BuiltDigest {
  record: DigestRecord;
  lines: Record<TeamSide, BoxScoreLine[]>;
  odds: PlayoffOdds | null;
}

function oddsOrNull(
  teamId: number,
  standings: StandingRecord[],
  options: OddsOptions,
): PlayoffOdds | null {
  try {
    return estimatePlayoffOdds(teamId, standings, options);
  } catch (err) {
    if (err instanceof StandingsUnavailableError || err instanceof TeamNotInStandingsError) {
      logger.warn({ teamId, err: err.message }, 'Postseason odds omitted');
      return null;
    }
    throw err;
  }
}

/**
 * Normalizes both box scores, scores them and renders the digest for
 * `teamId`. `standings` null means they could not be fetched; odds are
 * omitted then.
 */
export function buildDigest(
  feed: LiveFeed,
  teamId: number,
  standings: StandingRecord[] | null,
  options: DigestOptions = DEFAULT_DIGEST_OPTIONS,
): BuiltDigest {
  const { game } = feed;
  const side = teamSide(game, teamId);

  const lines: Record<TeamSide, BoxScoreLine[]> = {
    away: normalizeBoxScore(feed.players.away, 'away'),
    home: normalizeBoxScore(feed.players.home, 'home'),
  };
  const away = computeTeamMetrics(game.awayTeam, 'away', lines.away, options.mvpTieBreak);
  const home = computeTeamMetrics(game.homeTeam, 'home', lines.home, options.mvpTieBreak);
  const ours = side === 'home' ? home : away;

  const odds = standings ? oddsOrNull(teamId, standings, options.odds) : null;

  const record = renderDigest({
    teamId,
    game,
    linescore: feed.linescore,
    totals: { away: away.totals, home: home.totals },
    topBatters: ours.batters.slice(0, options.topBatters),
    pitchingHighlight: { away: away.starter, home: home.starter },
    reliefHighlight: ours.reliever,
    notables: ours.notables,
    mvp: ours.mvp,
    playoffOdds: odds ? odds.odds : null,
  });

  return { record, lines, odds };
}

export interface DigestDeps {
  feed: Pick<GameFeed, 'fetchStandings'>;
  store: DigestStore;
  notifier: Pick<Notifier, 'digestReady'>;
  options?: DigestOptions;
}

/** Builds, persists and announces the digest for a final game. */
export async function runDigest(feed: LiveFeed, teamId: number, deps: DigestDeps): Promise<DigestRecord> {
  const log = logger.child({ teamId, gamePk: feed.game.gamePk });

  let standings: StandingRecord[] | null = null;
  try {
    standings = await deps.feed.fetchStandings();
  } catch (err) {
    log.warn({ err }, 'Standings fetch failed, digest goes out without odds');
  }

  const { record, lines } = buildDigest(feed, teamId, standings, deps.options);

  await deps.store.saveGame(toGameRows(feed, lines));
  await deps.store.saveDigest(record);
  await deps.notifier.digestReady(record);

  log.info(
    { result: record.result, mvp: record.mvp?.name ?? null, playoffOdds: record.playoffOdds },
    'Digest stored',
  );
  return record;
}
