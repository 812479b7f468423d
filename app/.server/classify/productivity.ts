import type { ActivityCategory } from '~/types/activity-category';

/**
 * Productivity weight per category, 0 = unproductive, 1 = highly productive
 */
export const PRODUCTIVITY_WEIGHTS: Readonly<Record<ActivityCategory, number>> = {
  Development: 0.95,
  Writing: 0.9,
  Design: 0.85,
  Productivity: 0.8,
  Communication: 0.55,
  Browsing: 0.4,
  Other: 0.3,
  Entertainment: 0.1,
};

export interface CategoryDuration {
  category: ActivityCategory;
  /** Seconds */
  duration: number;
}

/**
 * Duration-weighted mean of the category weights, clamped to [0, 1].
 * Empty input, or input whose durations sum to zero, scores 0.
 */
export function productivityScore(activities: readonly CategoryDuration[]): number {
  if (activities.length === 0) return 0;

  const total = activities.reduce((sum, activity) => sum + activity.duration, 0);
  if (total <= 0) return 0;

  let weighted = 0;
  for (const activity of activities) {
    weighted += (activity.duration / total) * PRODUCTIVITY_WEIGHTS[activity.category];
  }

  return Math.min(Math.max(weighted, 0), 1);
}
