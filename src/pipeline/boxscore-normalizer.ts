import { z } from 'zod';
import type { BattingLine, BoxScoreLine, PitchingLine, TeamSide } from '../types/index.js';
import { roundTo, toCount, toOptionalCount } from '../utils/numbers.js';
import { logger } from '../utils/logger.js';

const SHORTHAND_RE = /^\s*(\d+)(?:\.(\d))?\s*$/;
const THIRDS: Record<string, number> = { '0': 0, '1': 1 / 3, '2': 2 / 3 };

/**
 * Innings pitched as a float. `outs` wins when present; otherwise the
 * "<whole>.<frac>" shorthand is read with a single frac digit 0/1/2 as
 * thirds (any other digit counts as 0). Missing or malformed input, including
 * a multi-digit frac, gives 0.
 *
 * ipToFloat(19) === 6.33, ipToFloat(null, '6.2') === 6.67
 */
export function ipToFloat(outs: number | null | undefined, shorthand?: string | null): number {
  if (outs !== null && outs !== undefined && Number.isFinite(outs) && outs >= 0) {
    return roundTo(outs / 3, 2);
  }
  if (!shorthand) return 0;

  const match = SHORTHAND_RE.exec(shorthand);
  if (!match) return 0;

  const whole = Number(match[1]);
  const third = THIRDS[match[2] ?? '0'] ?? 0;
  return roundTo(whole + third, 2);
}

/** Outs recorded from the shorthand, or null when it can't be read. */
export function shorthandToOuts(shorthand: string | null | undefined): number | null {
  if (!shorthand) return null;
  const match = SHORTHAND_RE.exec(shorthand);
  if (!match) return null;
  const frac = Number(match[2] ?? '0');
  return Number(match[1]) * 3 + (frac <= 2 ? frac : 0);
}

/** Baseball tenths notation: 19 outs -> "6.1". */
export function formatInningsPitched(outs: number): string {
  return `${Math.floor(outs / 3)}.${outs % 3}`;
}

const statBlock = z.record(z.unknown()).nullish();

const playerEntrySchema = z.object({
  person: z.object({
    id: z.number().int(),
    fullName: z.string().nullish(),
  }),
  position: z.object({ abbreviation: z.string().nullish() }).nullish(),
  battingOrder: z.union([z.string(), z.number()]).nullish(),
  stats: z
    .object({
      batting: statBlock,
      pitching: statBlock,
    })
    .nullish(),
});

type StatBlock = z.infer<typeof statBlock>;

/** The feed sends `{}` for players who never batted or pitched. */
function hasStats(block: StatBlock): block is Record<string, unknown> {
  if (!block) return false;
  return Object.values(block).some((value) => value !== null && value !== undefined);
}

export function toBattingLine(raw: Record<string, unknown>): BattingLine {
  return {
    atBats: toCount(raw['atBats']),
    hits: toCount(raw['hits']),
    doubles: toCount(raw['doubles']),
    triples: toCount(raw['triples']),
    homeRuns: toCount(raw['homeRuns']),
    walks: toCount(raw['baseOnBalls'] ?? raw['walks']),
    hitByPitch: toCount(raw['hitByPitch']),
    runs: toCount(raw['runs']),
    rbi: toCount(raw['rbi']),
    stolenBases: toCount(raw['stolenBases']),
    sacFlies: toCount(raw['sacFlies']),
    strikeOuts: toCount(raw['strikeOuts']),
    totalBases: toOptionalCount(raw['totalBases']),
  };
}

export function toPitchingLine(raw: Record<string, unknown>): PitchingLine {
  const rawText = raw['inningsPitched'];
  const shorthand =
    typeof rawText === 'string' ? rawText : typeof rawText === 'number' ? rawText.toFixed(1) : null;
  const reportedOuts = toOptionalCount(raw['outs']);
  const outs = reportedOuts ?? shorthandToOuts(shorthand) ?? 0;

  return {
    outs,
    inningsPitched: ipToFloat(outs),
    inningsPitchedText: formatInningsPitched(outs),
    hits: toCount(raw['hits']),
    earnedRuns: toCount(raw['earnedRuns']),
    walks: toCount(raw['baseOnBalls'] ?? raw['walks']),
    strikeOuts: toCount(raw['strikeOuts']),
    homeRuns: toCount(raw['homeRuns']),
  };
}

/**
 * Normalizes one team's `players` mapping into box-score lines ordered by
 * player id. Entries without a batting or pitching block are dropped, as are
 * entries whose person block can't be read.
 */
export function normalizeBoxScore(players: Record<string, unknown>, teamSide: TeamSide): BoxScoreLine[] {
  const lines: BoxScoreLine[] = [];

  for (const [key, entry] of Object.entries(players)) {
    const parsed = playerEntrySchema.safeParse(entry);
    if (!parsed.success) {
      logger.debug({ key, teamSide }, 'Skipping unreadable player entry');
      continue;
    }

    const { person, position, battingOrder, stats } = parsed.data;
    const battingBlock = stats?.batting;
    const pitchingBlock = stats?.pitching;
    const batting = hasStats(battingBlock) ? toBattingLine(battingBlock) : null;
    const pitching = hasStats(pitchingBlock) ? toPitchingLine(pitchingBlock) : null;
    if (!batting && !pitching) continue;

    lines.push({
      playerId: person.id,
      name: person.fullName?.trim() || `Player ${person.id}`,
      position: position?.abbreviation?.trim() || (pitching && !batting ? 'P' : ''),
      teamSide,
      battingOrder: toOptionalCount(battingOrder),
      batting,
      pitching,
    });
  }

  return lines.sort((a, b) => a.playerId - b.playerId);
}
