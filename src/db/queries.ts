import type { TransactionSql } from 'postgres';
import { sql } from './pool.js';
import type { DigestRecord } from '../types/index.js';
import type { GameRows, GameSummaryRow, LinescoreRow, PlayerRow } from '../storage/rows.js';

// ===== Raw game tables =====

/**
 * Replaces a game's raw rows in one transaction. Linescore and player rows
 * are deleted first so a corrected box score leaves no stale players behind.
 */
export async function replaceGameRows(rows: GameRows): Promise<void> {
  const gamePk = rows.summary.game_pk;
  await sql.begin(async (tx) => {
    await upsertGameSummary(tx, rows.summary);
    await tx`DELETE FROM game_linescore WHERE game_pk = ${gamePk}`;
    await tx`DELETE FROM game_boxscore_players WHERE game_pk = ${gamePk}`;
    await insertLinescore(tx, rows.linescore);
    await insertBoxscorePlayers(tx, rows.players);
  });
}

async function upsertGameSummary(tx: TransactionSql, row: GameSummaryRow): Promise<void> {
  await tx`
    INSERT INTO game_summaries (
      game_pk, official_date, status, detailed_state, scheduled_start,
      home_team_id, home_team_name, away_team_id, away_team_name,
      home_score, away_score
    )
    VALUES (
      ${row.game_pk}, ${row.official_date}, ${row.status}, ${row.detailed_state},
      ${row.scheduled_start}, ${row.home_team_id}, ${row.home_team_name},
      ${row.away_team_id}, ${row.away_team_name}, ${row.home_score}, ${row.away_score}
    )
    ON CONFLICT (game_pk) DO UPDATE SET
      official_date = EXCLUDED.official_date,
      status = EXCLUDED.status,
      detailed_state = EXCLUDED.detailed_state,
      scheduled_start = EXCLUDED.scheduled_start,
      home_score = EXCLUDED.home_score,
      away_score = EXCLUDED.away_score,
      updated_at = NOW()
  `;
}

async function insertLinescore(tx: TransactionSql, rows: LinescoreRow[]): Promise<void> {
  for (const row of rows) {
    await tx`
      INSERT INTO game_linescore (game_pk, inning_num, is_home, runs)
      VALUES (${row.game_pk}, ${row.inning_num}, ${row.is_home}, ${row.runs})
    `;
  }
}

async function insertBoxscorePlayers(tx: TransactionSql, rows: PlayerRow[]): Promise<void> {
  for (const row of rows) {
    const batting = row.batting ? JSON.stringify(row.batting) : null;
    const pitching = row.pitching ? JSON.stringify(row.pitching) : null;
    await tx`
      INSERT INTO game_boxscore_players (
        game_pk, player_id, team_id, team_name, is_home, name, position,
        batting_order, role, batting, pitching, bat_score, pitch_score
      )
      VALUES (
        ${row.game_pk}, ${row.player_id}, ${row.team_id}, ${row.team_name}, ${row.is_home},
        ${row.name}, ${row.position}, ${row.batting_order}, ${row.role},
        ${batting}::jsonb, ${pitching}::jsonb, ${row.bat_score}, ${row.pitch_score}
      )
    `;
  }
}

// ===== Digests =====

export async function upsertDigest(record: DigestRecord): Promise<void> {
  await sql`
    INSERT INTO game_digests (
      team_id, game_pk, team_name, official_date, final_score_text,
      playoff_odds, digest_md, record
    )
    VALUES (
      ${record.team.id}, ${record.gamePk}, ${record.team.name}, ${record.officialDate},
      ${record.finalScoreText}, ${record.playoffOdds}, ${record.renderedText},
      ${JSON.stringify(record)}::jsonb
    )
    ON CONFLICT (team_id, game_pk) DO UPDATE SET
      team_name = EXCLUDED.team_name,
      official_date = EXCLUDED.official_date,
      final_score_text = EXCLUDED.final_score_text,
      playoff_odds = EXCLUDED.playoff_odds,
      digest_md = EXCLUDED.digest_md,
      record = EXCLUDED.record,
      updated_at = NOW()
  `;
}

export async function getDigest(teamId: number, gamePk: number): Promise<DigestRecord | null> {
  const [row] = await sql<{ record: DigestRecord }[]>`
    SELECT record FROM game_digests
    WHERE team_id = ${teamId} AND game_pk = ${gamePk}
  `;
  return row?.record ?? null;
}

export async function getDigestsForDate(officialDate: string): Promise<DigestRecord[]> {
  const rows = await sql<{ record: DigestRecord }[]>`
    SELECT record FROM game_digests
    WHERE official_date = ${officialDate}
    ORDER BY game_pk, team_id
  `;
  return rows.map((r) => r.record);
}

export async function ping(): Promise<boolean> {
  const rows = await sql`SELECT 1 as ok`.catch(() => null);
  return rows !== null;
}
