// Weekly insight: the last seven days of usage compared with the seven before

import type { ActivityCategory } from '~/types/activity-category';
import type { AppTotal } from '~/types/app-usage';
import type { SampleStore } from '~/.server/db/sample-store';
import { addDays, dayKey, startOfDay } from '~/lib/utils/day';

const TOP_APP_LIMIT = 5;
const TREND_THRESHOLD = 0.1;

export type TrendDirection = 'up' | 'down' | 'stable';

export interface DailyMetric {
  day: string;
  hours: number;
}

export interface CategoryMetric {
  category: ActivityCategory;
  hours: number;
  /** Share of the week's total, 0-1 */
  percentage: number;
}

export interface WeeklyInsight {
  /** Day key of the first day in the window */
  weekStarting: string;
  dailyScreenTime: DailyMetric[];
  categoryBreakdown: CategoryMetric[];
  topApps: AppTotal[];
  averageProductivityScore: number;
  trend: TrendDirection;
}

export type InsightStore = Pick<
  SampleStore,
  'dailyTotals' | 'categoryBreakdown' | 'topApps' | 'fetchDailySummaries' | 'totalDuration'
>;

export function emptyWeeklyInsight(weekStarting: string): WeeklyInsight {
  return {
    weekStarting,
    dailyScreenTime: [],
    categoryBreakdown: [],
    topApps: [],
    averageProductivityScore: 0,
    trend: 'stable',
  };
}

export function trendDirection(current: number, previous: number): TrendDirection {
  if (current > previous * (1 + TREND_THRESHOLD)) return 'up';
  if (current < previous * (1 - TREND_THRESHOLD)) return 'down';
  return 'stable';
}

/**
 * Build the insight for the seven days ending on `now`'s day
 */
export async function buildWeeklyInsight(store: InsightStore, now: number = Date.now()): Promise<WeeklyInsight> {
  const today = startOfDay(now);
  const weekStart = addDays(today, -6);
  const weekStarting = dayKey(weekStart);

  const dailyTotals = await store.dailyTotals(weekStart, today);
  if (dailyTotals.length === 0) {
    return emptyWeeklyInsight(weekStarting);
  }

  const [categories, topApps, summaries, thisWeek, previousWeek] = await Promise.all([
    store.categoryBreakdown(weekStart, today),
    store.topApps(weekStart, today, TOP_APP_LIMIT),
    store.fetchDailySummaries(weekStart, today),
    store.totalDuration(weekStart, today),
    store.totalDuration(addDays(today, -13), addDays(today, -7)),
  ]);

  const totalHours = categories.reduce((sum, c) => sum + c.duration, 0) / 3600;
  const categoryBreakdown = categories
    .map(({ category, duration }) => {
      const hours = duration / 3600;
      return { category, hours, percentage: totalHours > 0 ? hours / totalHours : 0 };
    })
    .sort((a, b) => b.hours - a.hours);

  const averageProductivityScore =
    summaries.length === 0 ? 0 : summaries.reduce((sum, s) => sum + s.productivityScore, 0) / summaries.length;

  return {
    weekStarting,
    dailyScreenTime: dailyTotals.map(({ day, duration }) => ({ day, hours: duration / 3600 })),
    categoryBreakdown,
    topApps,
    averageProductivityScore,
    trend: trendDirection(thisWeek, previousWeek),
  };
}
