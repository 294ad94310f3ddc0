import type { BattingLine, BoxScoreLine, LiveFeed, PitchingLine, TeamSide } from '../types/index.js';
import { batScore, pitchScore } from '../pipeline/metrics.js';

export interface GameSummaryRow {
  game_pk: number;
  official_date: string;
  status: string;
  detailed_state: string;
  scheduled_start: string;
  home_team_id: number;
  home_team_name: string;
  away_team_id: number;
  away_team_name: string;
  home_score: number;
  away_score: number;
}

export interface LinescoreRow {
  game_pk: number;
  inning_num: number;
  is_home: boolean;
  /** null for an unplayed half-inning */
  runs: number | null;
}

export type PlayerRole = 'batter' | 'pitcher' | 'two-way';

export interface PlayerRow {
  game_pk: number;
  team_id: number;
  team_name: string;
  is_home: boolean;
  player_id: number;
  name: string;
  position: string;
  batting_order: number | null;
  role: PlayerRole;
  batting: BattingLine | null;
  pitching: PitchingLine | null;
  bat_score: number | null;
  pitch_score: number | null;
}

export interface GameRows {
  summary: GameSummaryRow;
  linescore: LinescoreRow[];
  players: PlayerRow[];
}

function roleOf(line: BoxScoreLine): PlayerRole {
  if (line.batting && line.pitching) return 'two-way';
  return line.pitching ? 'pitcher' : 'batter';
}

/** Flattens a final feed and its normalized box score into the three raw tables. */
export function toGameRows(feed: LiveFeed, lines: Record<TeamSide, BoxScoreLine[]>): GameRows {
  const { game, linescore } = feed;

  const summary: GameSummaryRow = {
    game_pk: game.gamePk,
    official_date: game.officialDate,
    status: game.status,
    detailed_state: game.detailedState,
    scheduled_start: game.scheduledStart.toISOString(),
    home_team_id: game.homeTeam.id,
    home_team_name: game.homeTeam.name,
    away_team_id: game.awayTeam.id,
    away_team_name: game.awayTeam.name,
    home_score: linescore.home.runs,
    away_score: linescore.away.runs,
  };

  const linescoreRows: LinescoreRow[] = linescore.innings.flatMap((inning) => [
    { game_pk: game.gamePk, inning_num: inning.num, is_home: false, runs: inning.away },
    { game_pk: game.gamePk, inning_num: inning.num, is_home: true, runs: inning.home },
  ]);

  const sides: TeamSide[] = ['away', 'home'];
  const players = sides.flatMap((side) => {
    const team = side === 'home' ? game.homeTeam : game.awayTeam;
    return lines[side].map(
      (line): PlayerRow => ({
        game_pk: game.gamePk,
        team_id: team.id,
        team_name: team.name,
        is_home: side === 'home',
        player_id: line.playerId,
        name: line.name,
        position: line.position,
        batting_order: line.battingOrder,
        role: roleOf(line),
        batting: line.batting,
        pitching: line.pitching,
        bat_score: line.batting ? batScore(line.batting) : null,
        pitch_score: line.pitching ? pitchScore(line.pitching) : null,
      }),
    );
  });

  return { summary, linescore: linescoreRows, players };
}
