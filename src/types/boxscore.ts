import type { TeamSide } from './game.js';

export interface BattingLine {
  atBats: number;
  hits: number;
  doubles: number;
  triples: number;
  homeRuns: number;
  walks: number;
  hitByPitch: number;
  runs: number;
  rbi: number;
  stolenBases: number;
  sacFlies: number;
  strikeOuts: number;
  /** Reported total bases; derived from hit types when the feed omits it */
  totalBases: number | null;
}

export interface PitchingLine {
  outs: number;
  /** Innings pitched as a float with thirds rounded to two decimals */
  inningsPitched: number;
  /** Baseball shorthand, e.g. "6.1" */
  inningsPitchedText: string;
  hits: number;
  earnedRuns: number;
  walks: number;
  strikeOuts: number;
  homeRuns: number;
}

export interface BoxScoreLine {
  playerId: number;
  name: string;
  position: string;
  teamSide: TeamSide;
  battingOrder: number | null;
  batting: BattingLine | null;
  pitching: PitchingLine | null;
}
