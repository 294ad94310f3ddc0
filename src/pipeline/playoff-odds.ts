/**
 * Postseason odds from standings.
 *
 * Division and wildcard chances are each a logistic curve over a games
 * margin, P = 1 / (1 + e^(−k·margin)), so a tie maps to 0.5. The two are
 * combined as 1 − (1 − P_div)(1 − P_wc). Division leaders skip the wildcard
 * path and keep their division probability as-is.
 */

import { StandingsUnavailableError, TeamNotInStandingsError } from '../errors.js';
import type { Standing, StandingRecord } from '../types/index.js';

export interface OddsOptions {
  /** k for the division curve, per game of margin */
  divisionSteepness: number;
  /** k for the wildcard curve, per game of margin */
  wildcardSteepness: number;
}

export const DEFAULT_ODDS_OPTIONS: OddsOptions = {
  divisionSteepness: 1 / 1.5,
  wildcardSteepness: 1 / 3,
};

export const WILDCARD_SLOTS = 3;

/** Wildcard chance for a team inside the cut when nobody trails the last slot. */
export const UNCONTESTED_WILDCARD_PROBABILITY = 0.8;

export interface PlayoffOdds {
  teamId: number;
  teamName: string;
  isDivisionLeader: boolean;
  division: number;
  /** null for division leaders, who never take the wildcard path */
  wildcard: number | null;
  /** Percentage in [0, 100] */
  odds: number;
}

export function logistic(margin: number, steepness: number): number {
  return 1 / (1 + Math.exp(-steepness * margin));
}

/** Games `trailing` sits behind `leader`; negative when it is ahead. */
export function gamesBack(trailing: Standing, leader: Standing): number {
  return (leader.wins - trailing.wins + (trailing.losses - leader.losses)) / 2;
}

/** Drops rows missing an id, name, league, division, wins or losses. */
export function usableStandings(records: StandingRecord[]): Standing[] {
  const standings: Standing[] = [];
  for (const r of records) {
    if (
      r.teamId === null ||
      !r.teamName ||
      !r.league ||
      !r.division ||
      r.wins === null ||
      r.losses === null
    ) {
      continue;
    }
    const played = r.wins + r.losses;
    standings.push({
      teamId: r.teamId,
      teamName: r.teamName,
      league: r.league,
      division: r.division,
      wins: r.wins,
      losses: r.losses,
      winPct: played ? r.wins / played : 0,
    });
  }
  return standings;
}

/** Best record first: win pct, then wins, then team id. */
export function rankStandings(teams: Standing[]): Standing[] {
  return [...teams].sort((a, b) => b.winPct - a.winPct || b.wins - a.wins || a.teamId - b.teamId);
}

export function divisionLeader(teams: Standing[]): Standing | null {
  return rankStandings(teams)[0] ?? null;
}

export function divisionProbability(team: Standing, divisionMates: Standing[], steepness: number): number {
  const [leader, runnerUp] = rankStandings(divisionMates);
  if (!leader) return 0;

  if (leader.teamId === team.teamId) {
    if (!runnerUp) return 1;
    return logistic(gamesBack(runnerUp, team), steepness);
  }
  return logistic(-gamesBack(team, leader), steepness);
}

export function wildcardProbability(team: Standing, leagueMates: Standing[], steepness: number): number {
  const divisions = new Map<string, Standing[]>();
  for (const t of leagueMates) {
    const list = divisions.get(t.division) ?? [];
    list.push(t);
    divisions.set(t.division, list);
  }

  const leaders = new Set<number>();
  for (const teams of divisions.values()) {
    const leader = divisionLeader(teams);
    if (leader) leaders.add(leader.teamId);
  }

  const candidates = rankStandings(leagueMates.filter((t) => !leaders.has(t.teamId)));
  const rank = candidates.findIndex((t) => t.teamId === team.teamId);
  if (rank === -1) return 0;

  if (rank < WILDCARD_SLOTS) {
    const nextBest = candidates[WILDCARD_SLOTS];
    if (!nextBest) return UNCONTESTED_WILDCARD_PROBABILITY;
    return logistic(gamesBack(nextBest, team), steepness);
  }

  const lastSlot = candidates[WILDCARD_SLOTS - 1];
  if (!lastSlot) return 0;
  return logistic(-gamesBack(team, lastSlot), steepness);
}

function findTeam(standings: Standing[], team: number | string): Standing | undefined {
  if (typeof team === 'number') return standings.find((s) => s.teamId === team);
  const key = team.trim().toLowerCase();
  return standings.find((s) => String(s.teamId) === key || s.teamName.toLowerCase() === key);
}

/**
 * Estimates the chance that `team` (id or name) reaches the postseason.
 *
 * Throws {@link StandingsUnavailableError} when no record survives
 * validation and {@link TeamNotInStandingsError} when the team is missing.
 */
export function estimatePlayoffOdds(
  team: number | string,
  records: StandingRecord[],
  options: OddsOptions = DEFAULT_ODDS_OPTIONS,
): PlayoffOdds {
  const standings = usableStandings(records);
  if (!standings.length) throw new StandingsUnavailableError();

  const subject = findTeam(standings, team);
  if (!subject) throw new TeamNotInStandingsError(team);

  const leagueMates = standings.filter((s) => s.league === subject.league);
  const divisionMates = leagueMates.filter((s) => s.division === subject.division);

  const division = divisionProbability(subject, divisionMates, options.divisionSteepness);
  const isDivisionLeader = divisionLeader(divisionMates)?.teamId === subject.teamId;

  if (isDivisionLeader) {
    return {
      teamId: subject.teamId,
      teamName: subject.teamName,
      isDivisionLeader,
      division,
      wildcard: null,
      odds: division * 100,
    };
  }

  const wildcard = wildcardProbability(subject, leagueMates, options.wildcardSteepness);
  const combined = 1 - (1 - division) * (1 - wildcard);

  return {
    teamId: subject.teamId,
    teamName: subject.teamName,
    isDivisionLeader,
    division,
    wildcard,
    odds: Math.min(Math.max(combined, 0), 1) * 100,
  };
}
