/**
 * Daily summary operations
 *
 * One row per day; an upsert replaces every field but keeps the row id.
 */

import type { DbClient } from './client';
import type { DailySummary, DailySummaryRow } from '~/types/daily-summary';
import { rowToDailySummary } from '~/types/daily-summary';
import { toMatchExpression } from './fts';

export type { DailySummary, DailySummaryRow };

const COLUMNS = 's.id, s.day, s.total_screen_time, s.narrative, s.activity_count, s.productivity_score';

export function upsertDailySummary(client: DbClient, summary: DailySummary): void {
  client.run(
    `INSERT INTO daily_summaries (id, day, total_screen_time, narrative, activity_count, productivity_score)
     VALUES (?, ?, ?, ?, ?, ?)
     ON CONFLICT(day) DO UPDATE SET
       total_screen_time = excluded.total_screen_time,
       narrative = excluded.narrative,
       activity_count = excluded.activity_count,
       productivity_score = excluded.productivity_score`,
    [
      summary.id,
      summary.day,
      summary.totalScreenTime,
      summary.narrative,
      summary.activityCount,
      summary.productivityScore,
    ]
  );
}

export function getDailySummary(client: DbClient, day: string): DailySummary | null {
  const row = client.selectOne<DailySummaryRow>(
    `SELECT ${COLUMNS} FROM daily_summaries s WHERE s.day = ?`,
    [day]
  );
  return row ? rowToDailySummary(row) : null;
}

/**
 * Summaries with fromDay <= day <= toDay, newest first
 */
export function listDailySummaries(client: DbClient, fromDay: string, toDay: string): DailySummary[] {
  return client
    .select<DailySummaryRow>(
      `SELECT ${COLUMNS} FROM daily_summaries s
       WHERE s.day >= ? AND s.day <= ?
       ORDER BY s.day DESC`,
      [fromDay, toDay]
    )
    .map(rowToDailySummary);
}

export function listAllDailySummaries(client: DbClient): DailySummary[] {
  return client
    .select<DailySummaryRow>(`SELECT ${COLUMNS} FROM daily_summaries s ORDER BY s.day DESC`)
    .map(rowToDailySummary);
}

export function deleteDailySummariesBefore(client: DbClient, day: string): number {
  return client.run('DELETE FROM daily_summaries WHERE day < ?', [day]).changes;
}

export function searchDailySummaries(client: DbClient, query: string, limit: number): DailySummary[] {
  const match = toMatchExpression(query);
  if (!match || limit <= 0) return [];

  return client
    .select<DailySummaryRow>(
      `SELECT ${COLUMNS} FROM daily_summaries_fts
       JOIN daily_summaries s ON s.seq = daily_summaries_fts.rowid
       WHERE daily_summaries_fts MATCH ?
       ORDER BY daily_summaries_fts.rank
       LIMIT ?`,
      [match, limit]
    )
    .map(rowToDailySummary);
}
