// Unified full-text search across activity entries, daily summaries and raw samples

import type { ActivityCategory } from '~/types/activity-category';
import type { SampleStore } from '~/.server/db/sample-store';
import type { PerformanceMonitor } from '~/.server/instrumentation/performance-monitor';
import { parseDayKey } from '~/lib/utils/day';

export const SEARCH_LIMITS = {
  activityEntries: 50,
  dailySummaries: 20,
  rawSamples: 30,
} as const;

export type SearchSource = 'activity' | 'daily-summary' | 'capture';

export type MatchedField = 'title' | 'summary' | 'app' | 'narrative' | 'extractedText' | 'windowTitle';

export interface SearchResult {
  /** Id of the matched record */
  id: string;
  source: SearchSource;
  /** Epoch ms; local midnight for daily summaries */
  timestamp: number;
  title: string;
  snippet: string;
  matchedField: MatchedField;
  appName: string | null;
  icon: string | null;
  category: ActivityCategory | null;
}

export type SearchStore = Pick<SampleStore, 'searchActivityEntries' | 'searchDailySummaries' | 'searchRawSamples'>;

/**
 * Search every indexed table and merge the hits newest first.
 * A blank query matches nothing.
 */
export async function searchActivity(
  store: SearchStore,
  query: string,
  monitor?: PerformanceMonitor
): Promise<SearchResult[]> {
  if (!query.trim()) return [];
  const run = () => collectResults(store, query);
  return monitor ? monitor.measureAsync('db_search', 'search_activity', run) : run();
}

async function collectResults(store: SearchStore, query: string): Promise<SearchResult[]> {
  const lowerQuery = query.trim().toLowerCase();
  const [entries, summaries, samples] = await Promise.all([
    store.searchActivityEntries(query, SEARCH_LIMITS.activityEntries),
    store.searchDailySummaries(query, SEARCH_LIMITS.dailySummaries),
    store.searchRawSamples(query, SEARCH_LIMITS.rawSamples),
  ]);

  const results: SearchResult[] = [];

  for (const entry of entries) {
    let matchedField: MatchedField = 'app';
    let snippet = entry.summary;
    if (entry.title.toLowerCase().includes(lowerQuery)) {
      matchedField = 'title';
      snippet = entry.title;
    } else if (entry.summary.toLowerCase().includes(lowerQuery)) {
      matchedField = 'summary';
    }

    results.push({
      id: entry.id,
      source: 'activity',
      timestamp: entry.timestamp,
      title: entry.title,
      snippet,
      matchedField,
      appName: entry.appName,
      icon: entry.icon,
      category: entry.category,
    });
  }

  for (const summary of summaries) {
    results.push({
      id: summary.id,
      source: 'daily-summary',
      timestamp: parseDayKey(summary.day) ?? 0,
      title: 'Daily Summary',
      snippet: summary.narrative,
      matchedField: 'narrative',
      appName: null,
      icon: null,
      category: null,
    });
  }

  for (const sample of samples) {
    let matchedField: MatchedField = 'app';
    let snippet = sample.extractedText ?? sample.windowTitle;
    if (sample.extractedText?.toLowerCase().includes(lowerQuery)) {
      matchedField = 'extractedText';
    } else if (sample.windowTitle.toLowerCase().includes(lowerQuery)) {
      matchedField = 'windowTitle';
      snippet = sample.windowTitle;
    }

    results.push({
      id: sample.id,
      source: 'capture',
      timestamp: sample.timestamp,
      title: sample.windowTitle,
      snippet,
      matchedField,
      appName: sample.appName,
      icon: null,
      category: null,
    });
  }

  return results.sort((a, b) => b.timestamp - a.timestamp);
}
