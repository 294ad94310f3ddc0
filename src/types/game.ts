export type GameStatus = 'SCHEDULED' | 'IN_PROGRESS' | 'FINAL' | 'OTHER';
export type TeamSide = 'home' | 'away';

export interface TeamRef {
  id: number;
  name: string;
}

export interface GameState {
  gamePk: number;
  officialDate: string;
  status: GameStatus;
  /** Raw `detailedState` text from the feed, kept for logs */
  detailedState: string;
  scheduledStart: Date;
  homeTeam: TeamRef;
  awayTeam: TeamRef;
}

export interface LinescoreInning {
  num: number;
  /** null when the half-inning was not played */
  away: number | null;
  home: number | null;
}

export interface LinescoreTotals {
  runs: number;
  hits: number;
  errors: number;
}

export interface Linescore {
  innings: LinescoreInning[];
  away: LinescoreTotals;
  home: LinescoreTotals;
}

/** A decoded live feed. Player mappings stay raw until the box score is normalized. */
export interface LiveFeed {
  game: GameState;
  linescore: Linescore;
  players: Record<TeamSide, Record<string, unknown>>;
}
