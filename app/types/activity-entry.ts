/**
 * Activity Entry - activity_entries table models
 *
 * A narrated record covering one contiguous same-app run of raw samples.
 * Written only by the aggregation pipeline.
 */
import type { ActivityCategory } from './activity-category';
import { toActivityCategory } from './activity-category';

/**
 * Activity entry row (snake_case - matches SQLite schema exactly)
 */
export interface ActivityEntryRow {
  /** UUID */
  id: string;

  /** Epoch ms timestamp of the first sample in the run */
  timestamp: number;

  app_name: string;

  /** Icon hint (see iconForApp) */
  icon: string;

  title: string;

  summary: string;

  category: string;

  /** Duration in seconds, never shorter than the run's span */
  duration: number;
}

/**
 * Activity entry (camelCase - for TypeScript usage)
 */
export interface ActivityEntry {
  id: string;
  timestamp: number;
  appName: string;
  icon: string;
  title: string;
  summary: string;
  category: ActivityCategory;
  duration: number;
}

/**
 * Conversion helper: ActivityEntryRow → ActivityEntry
 */
export function rowToActivityEntry(row: ActivityEntryRow): ActivityEntry {
  return {
    id: row.id,
    timestamp: row.timestamp,
    appName: row.app_name,
    icon: row.icon,
    title: row.title,
    summary: row.summary,
    category: toActivityCategory(row.category),
    duration: row.duration,
  };
}
