/**
 * Box-score metrics: team totals, rate stats, and the two single-game
 * impact scores.
 *
 *   BAT_SCORE   = 5·HR + 3·(2B+3B) + 2·(BB+HBP+SB) + 1·1B + 1.5·RBI + 1·R
 *   PITCH_SCORE = 6·IP + 3·SO − 4·ER − 2·(H+BB) − 3·HR
 *
 * Both scores are unscaled and live on the same numeric scale, which is
 * what MVP selection compares.
 */

import type {
  BatterSummary,
  BattingLine,
  BattingRates,
  BattingTotals,
  BoxScoreLine,
  MvpPick,
  MvpTieBreak,
  PitcherSummary,
  PitchingLine,
  PitchingRates,
  PitchingTotals,
  TeamRef,
  TeamSide,
  TeamTotals,
} from '../types/index.js';
import { ipToFloat } from './boxscore-normalizer.js';
import { roundTo, safeDiv } from '../utils/numbers.js';

type HitCounts = Pick<BattingLine, 'hits' | 'doubles' | 'triples' | 'homeRuns'>;
type RateInputs = HitCounts &
  Pick<BattingLine, 'atBats' | 'walks' | 'hitByPitch' | 'sacFlies'> & { totalBases: number | null };

// ===== Rate stats =====

export function singles(b: HitCounts): number {
  return Math.max(b.hits - b.doubles - b.triples - b.homeRuns, 0);
}

export function totalBases(b: HitCounts & { totalBases: number | null }): number {
  if (b.totalBases !== null) return b.totalBases;
  return singles(b) + 2 * b.doubles + 3 * b.triples + 4 * b.homeRuns;
}

export function battingRates(b: RateInputs): BattingRates {
  const avg = safeDiv(b.hits, b.atBats);
  const obp = safeDiv(b.hits + b.walks + b.hitByPitch, b.atBats + b.walks + b.hitByPitch + b.sacFlies);
  const slg = safeDiv(totalBases(b), b.atBats);
  return { avg, obp, slg, ops: obp + slg };
}

export function pitchingRates(p: Pick<PitchingLine, 'inningsPitched' | 'earnedRuns' | 'hits' | 'walks'>): PitchingRates {
  return {
    era: safeDiv(p.earnedRuns * 9, p.inningsPitched),
    whip: safeDiv(p.walks + p.hits, p.inningsPitched),
  };
}

// ===== Impact scores =====

export function batScore(b: BattingLine): number {
  const raw =
    5 * b.homeRuns +
    3 * (b.doubles + b.triples) +
    2 * (b.walks + b.hitByPitch + b.stolenBases) +
    singles(b) +
    1.5 * b.rbi +
    1.0 * b.runs;
  return roundTo(raw, 2);
}

export function pitchScore(p: PitchingLine): number {
  const raw =
    6 * p.inningsPitched +
    3 * p.strikeOuts -
    4 * p.earnedRuns -
    2 * (p.hits + p.walks) -
    3 * p.homeRuns;
  return roundTo(raw, 2);
}

// ===== Team totals =====

function emptyBattingTotals(): BattingTotals {
  return {
    atBats: 0,
    hits: 0,
    doubles: 0,
    triples: 0,
    homeRuns: 0,
    walks: 0,
    hitByPitch: 0,
    runs: 0,
    rbi: 0,
    stolenBases: 0,
    sacFlies: 0,
    strikeOuts: 0,
    totalBases: 0,
  };
}

function emptyPitchingTotals(): PitchingTotals {
  return {
    outs: 0,
    inningsPitched: 0,
    hits: 0,
    earnedRuns: 0,
    walks: 0,
    strikeOuts: 0,
    homeRuns: 0,
  };
}

export function computeTeamTotals(team: TeamRef, side: TeamSide, lines: BoxScoreLine[]): TeamTotals {
  const batting = emptyBattingTotals();
  const pitching = emptyPitchingTotals();

  for (const line of lines) {
    const b = line.batting;
    if (b) {
      batting.atBats += b.atBats;
      batting.hits += b.hits;
      batting.doubles += b.doubles;
      batting.triples += b.triples;
      batting.homeRuns += b.homeRuns;
      batting.walks += b.walks;
      batting.hitByPitch += b.hitByPitch;
      batting.runs += b.runs;
      batting.rbi += b.rbi;
      batting.stolenBases += b.stolenBases;
      batting.sacFlies += b.sacFlies;
      batting.strikeOuts += b.strikeOuts;
      batting.totalBases += totalBases(b);
    }

    const p = line.pitching;
    if (p) {
      pitching.outs += p.outs;
      pitching.hits += p.hits;
      pitching.earnedRuns += p.earnedRuns;
      pitching.walks += p.walks;
      pitching.strikeOuts += p.strikeOuts;
      pitching.homeRuns += p.homeRuns;
    }
  }
  pitching.inningsPitched = ipToFloat(pitching.outs);

  return {
    team,
    side,
    batting,
    battingRates: battingRates(batting),
    pitching,
    pitchingRates: pitchingRates(pitching),
  };
}

// ===== Player selection =====

function compareNames(a: string, b: string): number {
  return a < b ? -1 : a > b ? 1 : 0;
}

function appeared(b: BattingLine): boolean {
  return b.atBats + b.walks + b.hitByPitch + b.sacFlies + b.runs + b.stolenBases > 0;
}

function toBatterSummary(line: BoxScoreLine, batting: BattingLine): BatterSummary {
  return {
    playerId: line.playerId,
    name: line.name,
    position: line.position,
    score: batScore(batting),
    batting,
    rates: battingRates(batting),
  };
}

function toPitcherSummary(line: BoxScoreLine, pitching: PitchingLine): PitcherSummary {
  return {
    playerId: line.playerId,
    name: line.name,
    score: pitchScore(pitching),
    pitching,
    rates: pitchingRates(pitching),
  };
}

/** Batters by BAT_SCORE descending; ties go to more RBI, then name. */
export function rankBatters(lines: BoxScoreLine[]): BatterSummary[] {
  const batters: BatterSummary[] = [];
  for (const line of lines) {
    if (line.batting && appeared(line.batting)) {
      batters.push(toBatterSummary(line, line.batting));
    }
  }
  return batters.sort(
    (a, b) => b.score - a.score || b.batting.rbi - a.batting.rbi || compareNames(a.name, b.name),
  );
}

export function pitcherSummaries(lines: BoxScoreLine[]): PitcherSummary[] {
  const pitchers: PitcherSummary[] = [];
  for (const line of lines) {
    if (line.pitching) pitchers.push(toPitcherSummary(line, line.pitching));
  }
  return pitchers;
}

/** The presumptive starter: most outs recorded, then PITCH_SCORE, then name. */
export function pickPitchingHighlight(pitchers: PitcherSummary[]): PitcherSummary | null {
  const [first] = [...pitchers].sort(
    (a, b) =>
      b.pitching.outs - a.pitching.outs || b.score - a.score || compareNames(a.name, b.name),
  );
  return first ?? null;
}

/** Best PITCH_SCORE among everyone but the starter. */
export function pickReliefHighlight(
  pitchers: PitcherSummary[],
  starter: PitcherSummary | null,
): PitcherSummary | null {
  const [first] = pitchers
    .filter((p) => p.playerId !== starter?.playerId)
    .sort((a, b) => b.score - a.score || compareNames(a.name, b.name));
  return first ?? null;
}

/**
 * Highest score across batters and pitchers, comparing BAT_SCORE and
 * PITCH_SCORE directly. An exact cross-category tie is settled by
 * `tieBreak`; with `none` no MVP is named. Within a category the ranking
 * order already breaks ties.
 */
export function selectMvp(
  batters: BatterSummary[],
  pitchers: PitcherSummary[],
  tieBreak: MvpTieBreak,
): MvpPick | null {
  const [topBatter] = batters;
  const [topPitcher] = [...pitchers].sort((a, b) => b.score - a.score || compareNames(a.name, b.name));

  const batterPick: MvpPick | null = topBatter
    ? { playerId: topBatter.playerId, name: topBatter.name, role: 'batter', score: topBatter.score }
    : null;
  const pitcherPick: MvpPick | null = topPitcher
    ? { playerId: topPitcher.playerId, name: topPitcher.name, role: 'pitcher', score: topPitcher.score }
    : null;

  if (!batterPick || !pitcherPick) return batterPick ?? pitcherPick;
  if (batterPick.score > pitcherPick.score) return batterPick;
  if (pitcherPick.score > batterPick.score) return pitcherPick;

  if (tieBreak === 'batter') return batterPick;
  if (tieBreak === 'pitcher') return pitcherPick;
  return null;
}

// ===== Notables =====

const MULTI_HIT_THRESHOLD = 3;
const STOLEN_BASE_THRESHOLD = 2;
const STRIKEOUT_THRESHOLD = 10;

/**
 * Notable performances, in a fixed order: home runs (most HR, then RBI, then
 * name), three-hit games, multi-steal games, double-digit strikeouts, MVP.
 */
export function collectNotables(
  batters: BatterSummary[],
  pitchers: PitcherSummary[],
  mvp: MvpPick | null,
): string[] {
  const byName = (a: { name: string }, b: { name: string }) => compareNames(a.name, b.name);
  const notables: string[] = [];

  const homers = batters
    .filter((b) => b.batting.homeRuns > 0)
    .sort(
      (a, b) =>
        b.batting.homeRuns - a.batting.homeRuns || b.batting.rbi - a.batting.rbi || byName(a, b),
    );
  for (const b of homers) {
    notables.push(`${b.name}: ${b.batting.homeRuns} HR, ${b.batting.rbi} RBI`);
  }

  const multiHit = batters
    .filter((b) => b.batting.hits >= MULTI_HIT_THRESHOLD)
    .sort((a, b) => b.batting.hits - a.batting.hits || byName(a, b));
  for (const b of multiHit) {
    notables.push(`${b.name}: ${b.batting.hits}-for-${b.batting.atBats}`);
  }

  const steals = batters
    .filter((b) => b.batting.stolenBases >= STOLEN_BASE_THRESHOLD)
    .sort((a, b) => b.batting.stolenBases - a.batting.stolenBases || byName(a, b));
  for (const b of steals) {
    notables.push(`${b.name}: ${b.batting.stolenBases} SB`);
  }

  const strikeouts = pitchers
    .filter((p) => p.pitching.strikeOuts >= STRIKEOUT_THRESHOLD)
    .sort((a, b) => b.pitching.strikeOuts - a.pitching.strikeOuts || byName(a, b));
  for (const p of strikeouts) {
    notables.push(`${p.name}: ${p.pitching.strikeOuts} K in ${p.pitching.inningsPitchedText} IP`);
  }

  if (mvp) {
    const label = mvp.role === 'batter' ? 'BAT_SCORE' : 'PITCH_SCORE';
    notables.push(`MVP: ${mvp.name} (${mvp.role}, ${mvp.score.toFixed(2)} ${label})`);
  }

  return notables;
}

// ===== Per-team bundle =====

export interface TeamMetrics {
  totals: TeamTotals;
  batters: BatterSummary[];
  pitchers: PitcherSummary[];
  starter: PitcherSummary | null;
  reliever: PitcherSummary | null;
  mvp: MvpPick | null;
  notables: string[];
}

export function computeTeamMetrics(
  team: TeamRef,
  side: TeamSide,
  lines: BoxScoreLine[],
  tieBreak: MvpTieBreak,
): TeamMetrics {
  const batters = rankBatters(lines);
  const pitchers = pitcherSummaries(lines);
  const starter = pickPitchingHighlight(pitchers);
  const mvp = selectMvp(batters, pitchers, tieBreak);

  return {
    totals: computeTeamTotals(team, side, lines),
    batters,
    pitchers,
    starter,
    reliever: pickReliefHighlight(pitchers, starter),
    mvp,
    notables: collectNotables(batters, pitchers, mvp),
  };
}
