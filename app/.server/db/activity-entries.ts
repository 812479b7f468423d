/**
 * Activity entry operations
 */

import type { DbClient } from './client';
import type { ActivityEntry, ActivityEntryRow } from '~/types/activity-entry';
import { rowToActivityEntry } from '~/types/activity-entry';
import { toMatchExpression } from './fts';

export type { ActivityEntry, ActivityEntryRow };

const COLUMNS = 'e.id, e.timestamp, e.app_name, e.icon, e.title, e.summary, e.category, e.duration';

export function insertActivityEntry(client: DbClient, entry: ActivityEntry): void {
  client.run(
    `INSERT INTO activity_entries (id, timestamp, app_name, icon, title, summary, category, duration)
     VALUES (?, ?, ?, ?, ?, ?, ?, ?)`,
    [
      entry.id,
      entry.timestamp,
      entry.appName,
      entry.icon,
      entry.title,
      entry.summary,
      entry.category,
      entry.duration,
    ]
  );
}

/**
 * Entries with from <= timestamp <= to, newest first
 */
export function listActivityEntries(client: DbClient, from: number, to: number): ActivityEntry[] {
  return client
    .select<ActivityEntryRow>(
      `SELECT ${COLUMNS} FROM activity_entries e
       WHERE e.timestamp >= ? AND e.timestamp <= ?
       ORDER BY e.timestamp DESC, e.seq DESC`,
      [from, to]
    )
    .map(rowToActivityEntry);
}

/**
 * Entries in [dayStart, nextDayStart), oldest first
 */
export function listActivityEntriesBetween(client: DbClient, dayStart: number, nextDayStart: number): ActivityEntry[] {
  return client
    .select<ActivityEntryRow>(
      `SELECT ${COLUMNS} FROM activity_entries e
       WHERE e.timestamp >= ? AND e.timestamp < ?
       ORDER BY e.timestamp ASC, e.seq ASC`,
      [dayStart, nextDayStart]
    )
    .map(rowToActivityEntry);
}

export function deleteActivityEntriesOlderThan(client: DbClient, cutoff: number): number {
  return client.run('DELETE FROM activity_entries WHERE timestamp < ?', [cutoff]).changes;
}

export function searchActivityEntries(client: DbClient, query: string, limit: number): ActivityEntry[] {
  const match = toMatchExpression(query);
  if (!match || limit <= 0) return [];

  return client
    .select<ActivityEntryRow>(
      `SELECT ${COLUMNS} FROM activity_entries_fts
       JOIN activity_entries e ON e.seq = activity_entries_fts.rowid
       WHERE activity_entries_fts MATCH ?
       ORDER BY activity_entries_fts.rank
       LIMIT ?`,
      [match, limit]
    )
    .map(rowToActivityEntry);
}
