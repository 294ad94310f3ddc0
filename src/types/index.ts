export type {
  GameStatus,
  TeamSide,
  TeamRef,
  GameState,
  Linescore,
  LinescoreInning,
  LinescoreTotals,
  LiveFeed,
} from './game.js';
export type { BattingLine, PitchingLine, BoxScoreLine } from './boxscore.js';
export type { StandingRecord, Standing } from './standings.js';
export type {
  GameResult,
  BattingRates,
  PitchingRates,
  BattingTotals,
  PitchingTotals,
  TeamTotals,
  BatterSummary,
  PitcherSummary,
  MvpRole,
  MvpTieBreak,
  MvpPick,
  DigestRecord,
} from './digest.js';
