import { randomUUID } from 'crypto';
import { afterEach, beforeEach, describe, expect, it } from 'vitest';
import type { ActivityCategory } from '~/types/activity-category';
import { SqliteSampleStore } from '~/.server/db/sample-store';
import { buildWeeklyInsight, trendDirection } from './weekly';

const now = new Date(2026, 2, 10, 15, 0, 0).getTime();

describe('trendDirection', () => {
  it('needs more than a ten percent change to leave stable', () => {
    expect(trendDirection(110, 100)).toBe('stable');
    expect(trendDirection(111, 100)).toBe('up');
    expect(trendDirection(89, 100)).toBe('down');
    expect(trendDirection(0, 0)).toBe('stable');
    expect(trendDirection(5, 0)).toBe('up');
  });
});

describe('buildWeeklyInsight', () => {
  let store: SqliteSampleStore;

  beforeEach(() => {
    store = SqliteSampleStore.open(':memory:');
  });

  afterEach(async () => {
    await store.close();
  });

  async function usage(day: string, appName: string, duration: number, category: ActivityCategory): Promise<void> {
    await store.upsertAppUsage({ id: randomUUID(), day, appName, icon: 'app', duration, category });
  }

  async function summary(day: string, productivityScore: number): Promise<void> {
    await store.upsertDailySummary({
      id: randomUUID(),
      day,
      totalScreenTime: 0,
      narrative: 'A day.',
      activityCount: 1,
      productivityScore,
    });
  }

  it('is empty when the week has no usage', async () => {
    await usage('2026-03-01', 'Xcode', 3600, 'Development');

    expect(await buildWeeklyInsight(store, now)).toEqual({
      weekStarting: '2026-03-04',
      dailyScreenTime: [],
      categoryBreakdown: [],
      topApps: [],
      averageProductivityScore: 0,
      trend: 'stable',
    });
  });

  it('summarizes the last seven days against the week before', async () => {
    await usage('2026-03-03', 'Xcode', 3600, 'Development');
    await usage('2026-03-04', 'Xcode', 7200, 'Development');
    await usage('2026-03-10', 'Xcode', 3600, 'Development');
    await usage('2026-03-10', 'Safari', 1800, 'Browsing');
    await usage('2026-03-10', 'Spotify', 1800, 'Entertainment');
    await summary('2026-03-04', 0.9);
    await summary('2026-03-10', 0.6);

    const insight = await buildWeeklyInsight(store, now);

    expect(insight.weekStarting).toBe('2026-03-04');
    expect(insight.dailyScreenTime).toEqual([
      { day: '2026-03-04', hours: 2 },
      { day: '2026-03-10', hours: 2 },
    ]);
    expect(insight.categoryBreakdown).toEqual([
      { category: 'Development', hours: 3, percentage: 0.75 },
      { category: 'Browsing', hours: 0.5, percentage: 0.125 },
      { category: 'Entertainment', hours: 0.5, percentage: 0.125 },
    ]);
    expect(insight.topApps).toEqual([
      { appName: 'Xcode', duration: 10800 },
      { appName: 'Safari', duration: 1800 },
      { appName: 'Spotify', duration: 1800 },
    ]);
    expect(insight.averageProductivityScore).toBeCloseTo(0.75);
    expect(insight.trend).toBe('up');
  });
});
