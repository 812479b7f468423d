/**
 * App usage operations and the aggregate queries built on it
 */

import type { DbClient } from './client';
import type { AppTotal, AppUsage, AppUsageRow, DayTotal } from '~/types/app-usage';
import { rowToAppUsage } from '~/types/app-usage';
import type { ActivityCategory } from '~/types/activity-category';
import { toActivityCategory } from '~/types/activity-category';

export type { AppUsage, AppUsageRow };

export interface CategoryTotal {
  category: ActivityCategory;
  duration: number;
}

/**
 * Insert the (day, app) row or add `usage.duration` to the stored one.
 * Icon and category take the latest values; duration never decreases.
 */
export function accumulateAppUsage(client: DbClient, usage: AppUsage): void {
  client.run(
    `INSERT INTO app_usage (id, day, app_name, icon, duration, category)
     VALUES (?, ?, ?, ?, ?, ?)
     ON CONFLICT(day, app_name) DO UPDATE SET
       duration = app_usage.duration + excluded.duration,
       icon = excluded.icon,
       category = excluded.category`,
    [usage.id, usage.day, usage.appName, usage.icon, Math.max(0, usage.duration), usage.category]
  );
}

/**
 * Usage rows for one day, longest first
 */
export function listAppUsageForDay(client: DbClient, day: string): AppUsage[] {
  return client
    .select<AppUsageRow>(
      `SELECT id, day, app_name, icon, duration, category FROM app_usage
       WHERE day = ?
       ORDER BY duration DESC, app_name ASC`,
      [day]
    )
    .map(rowToAppUsage);
}

export function deleteAppUsageBefore(client: DbClient, day: string): number {
  return client.run('DELETE FROM app_usage WHERE day < ?', [day]).changes;
}

export function sumDuration(client: DbClient, fromDay: string, toDay: string): number {
  const row = client.selectOne<{ total: number | null }>(
    'SELECT SUM(duration) as total FROM app_usage WHERE day >= ? AND day <= ?',
    [fromDay, toDay]
  );
  return row?.total ?? 0;
}

export function sumDurationByCategory(client: DbClient, fromDay: string, toDay: string): CategoryTotal[] {
  return client
    .select<{ category: string; duration: number }>(
      `SELECT category, SUM(duration) as duration FROM app_usage
       WHERE day >= ? AND day <= ?
       GROUP BY category
       ORDER BY duration DESC, category ASC`,
      [fromDay, toDay]
    )
    .map((row) => ({ category: toActivityCategory(row.category), duration: row.duration }));
}

/**
 * Per-day totals, oldest first; days without usage are absent
 */
export function sumDurationByDay(client: DbClient, fromDay: string, toDay: string): DayTotal[] {
  return client.select<DayTotal>(
    `SELECT day, SUM(duration) as duration FROM app_usage
     WHERE day >= ? AND day <= ?
     GROUP BY day
     ORDER BY day ASC`,
    [fromDay, toDay]
  );
}

export function topAppsByDuration(client: DbClient, fromDay: string, toDay: string, limit: number): AppTotal[] {
  return client.select<AppTotal>(
    `SELECT app_name as appName, SUM(duration) as duration FROM app_usage
     WHERE day >= ? AND day <= ?
     GROUP BY app_name
     ORDER BY duration DESC, app_name ASC
     LIMIT ?`,
    [fromDay, toDay, limit]
  );
}
