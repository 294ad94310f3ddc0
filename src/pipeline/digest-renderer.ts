import { TeamNotInGameError } from '../errors.js';
import type {
  BatterSummary,
  BattingRates,
  DigestRecord,
  GameResult,
  GameState,
  Linescore,
  MvpPick,
  PitcherSummary,
  TeamRef,
  TeamSide,
  TeamTotals,
} from '../types/index.js';
import { formatInningsPitched } from './boxscore-normalizer.js';

export interface DigestInput {
  teamId: number;
  game: GameState;
  linescore: Linescore;
  totals: Record<TeamSide, TeamTotals>;
  topBatters: BatterSummary[];
  pitchingHighlight: Record<TeamSide, PitcherSummary | null>;
  reliefHighlight: PitcherSummary | null;
  notables: string[];
  mvp: MvpPick | null;
  playoffOdds: number | null;
}

const UNPLAYED = '–';

/** ".333" style: three places, no leading zero below 1. */
export function fmtRate(value: number): string {
  const text = value.toFixed(3);
  return text.startsWith('0.') ? text.slice(1) : text;
}

function fmtSlash(rates: BattingRates): string {
  return [rates.avg, rates.obp, rates.slg, rates.ops].map(fmtRate).join('/');
}

export function teamSide(game: GameState, teamId: number): TeamSide {
  if (game.homeTeam.id === teamId) return 'home';
  if (game.awayTeam.id === teamId) return 'away';
  throw new TeamNotInGameError(teamId, game.gamePk);
}

function otherSide(side: TeamSide): TeamSide {
  return side === 'home' ? 'away' : 'home';
}

function gameResult(us: number, them: number): GameResult {
  if (us > them) return 'W';
  if (us < them) return 'L';
  return 'T';
}

function renderLinescore(linescore: Linescore, away: TeamRef, home: TeamRef): string[] {
  const innings = linescore.innings.map((inning) => String(inning.num));
  const header = ['Team', ...innings, 'R', 'H', 'E'];
  const row = (team: TeamRef, side: TeamSide) => {
    const runs = linescore.innings.map((inning) => {
      const value = inning[side];
      return value === null ? UNPLAYED : String(value);
    });
    const totals = linescore[side];
    return [team.name, ...runs, String(totals.runs), String(totals.hits), String(totals.errors)];
  };
  const toLine = (cells: string[]) => `| ${cells.join(' | ')} |`;

  return [
    '### Linescore',
    toLine(header),
    toLine(header.map(() => '---')),
    toLine(row(away, 'away')),
    toLine(row(home, 'home')),
  ];
}

function renderTotals(t: TeamTotals): string {
  const b = t.batting;
  const p = t.pitching;
  return (
    `- ${t.team.name}: ${b.hits}-for-${b.atBats}, ${b.runs} R, ${b.doubles} 2B, ${b.triples} 3B, ` +
    `${b.homeRuns} HR, ${b.rbi} RBI, ${b.walks} BB, ${b.strikeOuts} SO, ${b.stolenBases} SB · ` +
    `${fmtSlash(t.battingRates)} · ` +
    `${formatInningsPitched(p.outs)} IP, ${p.earnedRuns} ER, ` +
    `${t.pitchingRates.era.toFixed(2)} ERA, ${t.pitchingRates.whip.toFixed(2)} WHIP`
  );
}

function renderBatter(b: BatterSummary, index: number): string {
  const s = b.batting;
  const parts = [`${s.hits}-for-${s.atBats}`];
  if (s.doubles) parts.push(`${s.doubles} 2B`);
  if (s.triples) parts.push(`${s.triples} 3B`);
  if (s.homeRuns) parts.push(`${s.homeRuns} HR`);
  parts.push(`${s.rbi} RBI`, `${s.runs} R`);
  if (s.walks) parts.push(`${s.walks} BB`);
  if (s.stolenBases) parts.push(`${s.stolenBases} SB`);

  const position = b.position ? ` (${b.position})` : '';
  return `${index + 1}. ${b.name}${position}: ${b.score.toFixed(2)} BAT_SCORE · ${parts.join(', ')} · ${fmtSlash(b.rates)}`;
}

function renderPitcher(team: TeamRef, role: 'SP' | 'RP', p: PitcherSummary): string {
  const s = p.pitching;
  return (
    `- ${team.name} ${role} ${p.name}: ${p.score.toFixed(2)} PITCH_SCORE · ` +
    `${s.inningsPitchedText} IP, ${s.hits} H, ${s.earnedRuns} ER, ${s.walks} BB, ${s.strikeOuts} SO · ` +
    `${p.rates.era.toFixed(2)} ERA, ${p.rates.whip.toFixed(2)} WHIP`
  );
}

/**
 * Composes the digest text and record. Pure: the same input always renders
 * the same bytes.
 */
export function renderDigest(input: DigestInput): DigestRecord {
  const { game, linescore } = input;
  const side = teamSide(game, input.teamId);
  const opponentSide = otherSide(side);
  const team = side === 'home' ? game.homeTeam : game.awayTeam;
  const opponent = side === 'home' ? game.awayTeam : game.homeTeam;

  const score = { team: linescore[side].runs, opponent: linescore[opponentSide].runs };
  const result = gameResult(score.team, score.opponent);
  const finalScoreText =
    `${team.name} ${result} ${score.team}-${score.opponent} ` +
    `${side === 'home' ? 'vs' : '@'} ${opponent.name}`;

  const sections: string[][] = [];
  sections.push([`## ${finalScoreText}`, `Final · ${game.officialDate} · gamePk ${game.gamePk}`]);
  sections.push(renderLinescore(linescore, game.awayTeam, game.homeTeam));
  sections.push(['### Team Totals', renderTotals(input.totals.away), renderTotals(input.totals.home)]);

  if (input.topBatters.length) {
    sections.push([`### Top Batters: ${team.name}`, ...input.topBatters.map(renderBatter)]);
  }

  const pitching: string[] = [];
  const awayStarter = input.pitchingHighlight.away;
  const homeStarter = input.pitchingHighlight.home;
  if (awayStarter) pitching.push(renderPitcher(game.awayTeam, 'SP', awayStarter));
  if (homeStarter) pitching.push(renderPitcher(game.homeTeam, 'SP', homeStarter));
  if (input.reliefHighlight) pitching.push(renderPitcher(team, 'RP', input.reliefHighlight));
  if (pitching.length) sections.push(['### Pitching', ...pitching]);

  if (input.notables.length) {
    sections.push(['### Notables', ...input.notables.map((n) => `- ${n}`)]);
  }

  if (input.playoffOdds !== null) {
    sections.push([
      '### Postseason Odds',
      `${team.name}: ${input.playoffOdds.toFixed(1)}% to reach the postseason`,
    ]);
  }

  return {
    team,
    opponent,
    side,
    gamePk: game.gamePk,
    officialDate: game.officialDate,
    result,
    score,
    finalScoreText,
    linescore,
    teamTotals: input.totals,
    topBatters: input.topBatters,
    pitchingHighlight: input.pitchingHighlight,
    reliefHighlight: input.reliefHighlight,
    notables: input.notables,
    mvp: input.mvp,
    playoffOdds: input.playoffOdds,
    renderedText: sections.map((lines) => lines.join('\n')).join('\n\n'),
  };
}
