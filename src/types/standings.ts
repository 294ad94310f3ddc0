/** A standings row as decoded from the feed; any field may be missing. */
export interface StandingRecord {
  teamId: number | null;
  teamName: string | null;
  league: string | null;
  division: string | null;
  wins: number | null;
  losses: number | null;
}

export interface Standing {
  teamId: number;
  teamName: string;
  league: string;
  division: string;
  wins: number;
  losses: number;
  winPct: number;
}
