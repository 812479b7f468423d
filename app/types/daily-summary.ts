/**
 * Daily Summary - daily_summaries table models
 *
 * Exactly one row per local calendar day, replaced wholesale on each
 * aggregation run.
 */

/**
 * Daily summary row (snake_case - matches SQLite schema exactly)
 *
 * Unique constraint: day
 */
export interface DailySummaryRow {
  id: string;

  /** Local calendar day, YYYY-MM-DD */
  day: string;

  /** Seconds */
  total_screen_time: number;

  narrative: string;

  activity_count: number;

  /** 0-1 */
  productivity_score: number;
}

export interface DailySummary {
  id: string;
  day: string;
  totalScreenTime: number;
  narrative: string;
  activityCount: number;
  productivityScore: number;
}

export function rowToDailySummary(row: DailySummaryRow): DailySummary {
  return {
    id: row.id,
    day: row.day,
    totalScreenTime: row.total_screen_time,
    narrative: row.narrative,
    activityCount: row.activity_count,
    productivityScore: row.productivity_score,
  };
}
