import type { BattingLine, PitchingLine } from './boxscore.js';
import type { Linescore, TeamRef, TeamSide } from './game.js';

export type GameResult = 'W' | 'L' | 'T';

export interface BattingRates {
  avg: number;
  obp: number;
  slg: number;
  ops: number;
}

export interface PitchingRates {
  era: number;
  whip: number;
}

export interface BattingTotals extends Omit<BattingLine, 'totalBases'> {
  totalBases: number;
}

export type PitchingTotals = Omit<PitchingLine, 'inningsPitchedText'>;

export interface TeamTotals {
  team: TeamRef;
  side: TeamSide;
  batting: BattingTotals;
  battingRates: BattingRates;
  pitching: PitchingTotals;
  pitchingRates: PitchingRates;
}

export interface BatterSummary {
  playerId: number;
  name: string;
  position: string;
  /** BAT_SCORE */
  score: number;
  batting: BattingLine;
  rates: BattingRates;
}

export interface PitcherSummary {
  playerId: number;
  name: string;
  /** PITCH_SCORE */
  score: number;
  pitching: PitchingLine;
  rates: PitchingRates;
}

export type MvpRole = 'batter' | 'pitcher';

/** How to settle an exact BAT_SCORE / PITCH_SCORE tie; `none` names no MVP. */
export type MvpTieBreak = MvpRole | 'none';

export interface MvpPick {
  playerId: number;
  name: string;
  role: MvpRole;
  score: number;
}

export interface DigestRecord {
  team: TeamRef;
  opponent: TeamRef;
  side: TeamSide;
  gamePk: number;
  officialDate: string;
  result: GameResult;
  score: { team: number; opponent: number };
  finalScoreText: string;
  linescore: Linescore;
  teamTotals: Record<TeamSide, TeamTotals>;
  topBatters: BatterSummary[];
  pitchingHighlight: Record<TeamSide, PitcherSummary | null>;
  reliefHighlight: PitcherSummary | null;
  notables: string[];
  mvp: MvpPick | null;
  /** Postseason probability in [0, 100]; null when standings were unavailable */
  playoffOdds: number | null;
  renderedText: string;
}
