/**
 * App Usage - app_usage table models
 *
 * One row per (day, app name). Duration only grows by accumulation.
 */
import type { ActivityCategory } from './activity-category';
import { toActivityCategory } from './activity-category';

export interface AppUsageRow {
  id: string;

  /** Local calendar day, YYYY-MM-DD */
  day: string;

  app_name: string;

  icon: string;

  /** Accumulated seconds */
  duration: number;

  category: string;
}

export interface AppUsage {
  id: string;
  day: string;
  appName: string;
  icon: string;
  duration: number;
  category: ActivityCategory;
}

export function rowToAppUsage(row: AppUsageRow): AppUsage {
  return {
    id: row.id,
    day: row.day,
    appName: row.app_name,
    icon: row.icon,
    duration: row.duration,
    category: toActivityCategory(row.category),
  };
}

/**
 * Summed duration for one app across a date range
 */
export interface AppTotal {
  appName: string;
  duration: number;
}

/**
 * Summed screen time for one day in a series
 */
export interface DayTotal {
  day: string;
  duration: number;
}
