/**
 * Activity Category - closed set of labels the classifier assigns
 *
 * Stored verbatim in activity_entries.category and app_usage.category
 * (CHECK constraint mirrors this list).
 */
export type ActivityCategory =
  | 'Productivity'
  | 'Communication'
  | 'Browsing'
  | 'Entertainment'
  | 'Development'
  | 'Design'
  | 'Writing'
  | 'Other';

export const ACTIVITY_CATEGORIES: readonly ActivityCategory[] = [
  'Productivity',
  'Communication',
  'Browsing',
  'Entertainment',
  'Development',
  'Design',
  'Writing',
  'Other',
];

export function isActivityCategory(value: unknown): value is ActivityCategory {
  return typeof value === 'string' && ACTIVITY_CATEGORIES.some((category) => category === value);
}

/**
 * Narrow a stored category string, falling back to Other for unknown values
 */
export function toActivityCategory(value: string): ActivityCategory {
  return isActivityCategory(value) ? value : 'Other';
}
