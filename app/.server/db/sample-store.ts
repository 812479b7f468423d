/**
 * Sample Store
 *
 * Durable home of raw samples, activity entries, daily summaries and app
 * usage. Every write runs through the client's single-writer queue inside a
 * transaction; reads run directly against the connection.
 */

import { stat } from 'fs/promises';
import { DbClient } from './client';
import { IN_MEMORY, openDatabase } from './connection';
import { getLogger } from '~/.server/log/logger';
import { StoreError } from '../errors';
import { addDays, dayKey, startOfDay } from '~/lib/utils/day';
import type { RawSample } from '~/types/raw-sample';
import type { ActivityEntry } from '~/types/activity-entry';
import type { DailySummary } from '~/types/daily-summary';
import type { AppTotal, AppUsage, DayTotal } from '~/types/app-usage';
import {
  countRawSamples,
  deleteRawSamplesOlderThan,
  insertRawSample,
  listImagePathsOlderThan,
  listRawSamples,
  searchRawSamples,
} from './raw-samples';
import {
  deleteActivityEntriesOlderThan,
  insertActivityEntry,
  listActivityEntries,
  listActivityEntriesBetween,
  searchActivityEntries,
} from './activity-entries';
import {
  deleteDailySummariesBefore,
  getDailySummary,
  listAllDailySummaries,
  listDailySummaries,
  searchDailySummaries,
  upsertDailySummary,
} from './daily-summaries';
import type { CategoryTotal } from './app-usage';
import {
  accumulateAppUsage,
  deleteAppUsageBefore,
  listAppUsageForDay,
  sumDuration,
  sumDurationByCategory,
  sumDurationByDay,
  topAppsByDuration,
} from './app-usage';
import { deleteSettingValues, getSettingValue, setSettingValue } from './settings';
import { clearSearchIndexes, optimizeSearchIndexes } from './fts';

export type { CategoryTotal };

/**
 * One run's output: the entry plus the usage delta it contributes
 */
export interface RecordedActivity {
  entry: ActivityEntry;
  usage: AppUsage;
}

export interface SampleStore {
  insertRawSample(sample: RawSample): Promise<void>;
  insertActivityEntry(entry: ActivityEntry): Promise<void>;
  upsertDailySummary(summary: DailySummary): Promise<void>;
  upsertAppUsage(usage: AppUsage): Promise<void>;
  /** Entries, their usage accumulations and any settings rows in one transaction */
  recordActivities(items: readonly RecordedActivity[], settings?: Readonly<Record<string, string>>): Promise<void>;

  fetchRawSamples(from: number, to: number): Promise<RawSample[]>;
  fetchActivityEntries(from: number, to: number): Promise<ActivityEntry[]>;
  fetchActivityEntriesForDay(date: number): Promise<ActivityEntry[]>;
  fetchDailySummary(date: number): Promise<DailySummary | null>;
  fetchDailySummaries(from: number, to: number): Promise<DailySummary[]>;
  fetchAllDailySummaries(): Promise<DailySummary[]>;
  fetchAppUsageForDay(date: number): Promise<AppUsage[]>;
  fetchImagePathsOlderThan(cutoff: number): Promise<string[]>;

  deleteRawSamplesOlderThan(cutoff: number): Promise<number>;
  deleteActivityEntriesOlderThan(cutoff: number): Promise<number>;
  deleteDailySummariesOlderThan(cutoff: number): Promise<number>;
  deleteAppUsageOlderThan(cutoff: number): Promise<number>;

  searchRawSamples(query: string, limit: number): Promise<RawSample[]>;
  searchActivityEntries(query: string, limit: number): Promise<ActivityEntry[]>;
  searchDailySummaries(query: string, limit: number): Promise<DailySummary[]>;

  totalDurationForDay(date: number): Promise<number>;
  totalDuration(from: number, to: number): Promise<number>;
  categoryBreakdown(from: number, to: number): Promise<CategoryTotal[]>;
  dailyTotals(from: number, to: number): Promise<DayTotal[]>;
  topApps(from: number, to: number, limit: number): Promise<AppTotal[]>;

  countRawSamples(): Promise<number>;
  totalRowCount(): Promise<number>;

  getSetting(key: string): Promise<string | null>;
  setSetting(key: string, value: string): Promise<void>;
  setSettings(values: Readonly<Record<string, string>>): Promise<void>;
  deleteSettings(keys: readonly string[]): Promise<number>;

  deleteAllData(): Promise<void>;
  /**
   * Merge the search indexes, rewrite the file and truncate the WAL so deleted
   * rows stop counting toward the database size. Blocks other writers and may
   * briefly need twice the space.
   */
  compact(): Promise<void>;
  databaseSizeBytes(): Promise<number>;
  close(): Promise<void>;
}

const log = getLogger({ module: 'SampleStore' });

async function fileSize(path: string): Promise<number> {
  try {
    return (await stat(path)).size;
  } catch (error) {
    if (error instanceof Error && 'code' in error && error.code === 'ENOENT') return 0;
    throw error;
  }
}

export class SqliteSampleStore implements SampleStore {
  constructor(private readonly client: DbClient) {}

  /**
   * Open (and migrate) a database file, or ':memory:'
   */
  static open(dbPath: string): SqliteSampleStore {
    return new SqliteSampleStore(new DbClient(openDatabase(dbPath)));
  }

  insertRawSample(sample: RawSample): Promise<void> {
    return this.client.write('insertRawSample', () => insertRawSample(this.client, sample));
  }

  insertActivityEntry(entry: ActivityEntry): Promise<void> {
    return this.client.write('insertActivityEntry', () => insertActivityEntry(this.client, entry));
  }

  upsertDailySummary(summary: DailySummary): Promise<void> {
    return this.client.write('upsertDailySummary', () => upsertDailySummary(this.client, summary));
  }

  upsertAppUsage(usage: AppUsage): Promise<void> {
    return this.client.write('upsertAppUsage', () => accumulateAppUsage(this.client, usage));
  }

  recordActivities(items: readonly RecordedActivity[], settings: Readonly<Record<string, string>> = {}): Promise<void> {
    return this.client.write('recordActivities', () => {
      for (const { entry, usage } of items) {
        insertActivityEntry(this.client, entry);
        accumulateAppUsage(this.client, usage);
      }
      for (const [key, value] of Object.entries(settings)) {
        setSettingValue(this.client, key, value);
      }
    });
  }

  fetchRawSamples(from: number, to: number): Promise<RawSample[]> {
    return this.read('fetchRawSamples', () => listRawSamples(this.client, from, to));
  }

  fetchActivityEntries(from: number, to: number): Promise<ActivityEntry[]> {
    return this.read('fetchActivityEntries', () => listActivityEntries(this.client, from, to));
  }

  fetchActivityEntriesForDay(date: number): Promise<ActivityEntry[]> {
    const dayStart = startOfDay(date);
    return this.read('fetchActivityEntriesForDay', () =>
      listActivityEntriesBetween(this.client, dayStart, startOfDay(addDays(dayStart, 1)))
    );
  }

  fetchDailySummary(date: number): Promise<DailySummary | null> {
    return this.read('fetchDailySummary', () => getDailySummary(this.client, dayKey(date)));
  }

  fetchDailySummaries(from: number, to: number): Promise<DailySummary[]> {
    return this.read('fetchDailySummaries', () => listDailySummaries(this.client, dayKey(from), dayKey(to)));
  }

  fetchAllDailySummaries(): Promise<DailySummary[]> {
    return this.read('fetchAllDailySummaries', () => listAllDailySummaries(this.client));
  }

  fetchAppUsageForDay(date: number): Promise<AppUsage[]> {
    return this.read('fetchAppUsageForDay', () => listAppUsageForDay(this.client, dayKey(date)));
  }

  fetchImagePathsOlderThan(cutoff: number): Promise<string[]> {
    return this.read('fetchImagePathsOlderThan', () => listImagePathsOlderThan(this.client, cutoff));
  }

  deleteRawSamplesOlderThan(cutoff: number): Promise<number> {
    return this.client.write('deleteRawSamplesOlderThan', () => deleteRawSamplesOlderThan(this.client, cutoff));
  }

  deleteActivityEntriesOlderThan(cutoff: number): Promise<number> {
    return this.client.write('deleteActivityEntriesOlderThan', () =>
      deleteActivityEntriesOlderThan(this.client, cutoff)
    );
  }

  /**
   * Day-keyed rows go when their day is before the cutoff's day
   */
  deleteDailySummariesOlderThan(cutoff: number): Promise<number> {
    return this.client.write('deleteDailySummariesOlderThan', () =>
      deleteDailySummariesBefore(this.client, dayKey(cutoff))
    );
  }

  deleteAppUsageOlderThan(cutoff: number): Promise<number> {
    return this.client.write('deleteAppUsageOlderThan', () => deleteAppUsageBefore(this.client, dayKey(cutoff)));
  }

  searchRawSamples(query: string, limit: number): Promise<RawSample[]> {
    return this.read('searchRawSamples', () => searchRawSamples(this.client, query, limit));
  }

  searchActivityEntries(query: string, limit: number): Promise<ActivityEntry[]> {
    return this.read('searchActivityEntries', () => searchActivityEntries(this.client, query, limit));
  }

  searchDailySummaries(query: string, limit: number): Promise<DailySummary[]> {
    return this.read('searchDailySummaries', () => searchDailySummaries(this.client, query, limit));
  }

  totalDurationForDay(date: number): Promise<number> {
    const day = dayKey(date);
    return this.read('totalDurationForDay', () => sumDuration(this.client, day, day));
  }

  totalDuration(from: number, to: number): Promise<number> {
    return this.read('totalDuration', () => sumDuration(this.client, dayKey(from), dayKey(to)));
  }

  categoryBreakdown(from: number, to: number): Promise<CategoryTotal[]> {
    return this.read('categoryBreakdown', () => sumDurationByCategory(this.client, dayKey(from), dayKey(to)));
  }

  dailyTotals(from: number, to: number): Promise<DayTotal[]> {
    return this.read('dailyTotals', () => sumDurationByDay(this.client, dayKey(from), dayKey(to)));
  }

  topApps(from: number, to: number, limit: number): Promise<AppTotal[]> {
    return this.read('topApps', () => topAppsByDuration(this.client, dayKey(from), dayKey(to), limit));
  }

  countRawSamples(): Promise<number> {
    return this.read('countRawSamples', () => countRawSamples(this.client));
  }

  totalRowCount(): Promise<number> {
    return this.read('totalRowCount', () => {
      const row = this.client.selectOne<{ total: number }>(
        `SELECT
           (SELECT COUNT(*) FROM raw_samples) +
           (SELECT COUNT(*) FROM activity_entries) +
           (SELECT COUNT(*) FROM daily_summaries) +
           (SELECT COUNT(*) FROM app_usage) as total`
      );
      return row?.total ?? 0;
    });
  }

  getSetting(key: string): Promise<string | null> {
    return this.read('getSetting', () => getSettingValue(this.client, key));
  }

  setSetting(key: string, value: string): Promise<void> {
    return this.client.write('setSetting', () => setSettingValue(this.client, key, value));
  }

  setSettings(values: Readonly<Record<string, string>>): Promise<void> {
    return this.client.write('setSettings', () => {
      for (const [key, value] of Object.entries(values)) {
        setSettingValue(this.client, key, value);
      }
    });
  }

  deleteSettings(keys: readonly string[]): Promise<number> {
    return this.client.write('deleteSettings', () => deleteSettingValues(this.client, keys));
  }

  async deleteAllData(): Promise<void> {
    await this.client.write('deleteAllData', () => {
      this.client.run('DELETE FROM raw_samples');
      this.client.run('DELETE FROM activity_entries');
      this.client.run('DELETE FROM daily_summaries');
      this.client.run('DELETE FROM app_usage');
      clearSearchIndexes(this.client);
    });
    log.info({}, 'deleted all captured data');
  }

  async compact(): Promise<void> {
    const before = await this.databaseSizeBytes();
    await this.client.write('optimizeSearchIndexes', () => optimizeSearchIndexes(this.client));
    await this.client.maintenance('compact', 'VACUUM');
    await this.client.maintenance('checkpoint', 'PRAGMA wal_checkpoint(TRUNCATE)');
    const after = await this.databaseSizeBytes();
    log.info({ before, after }, 'database compacted');
  }

  async databaseSizeBytes(): Promise<number> {
    const path = this.client.path;
    if (path === IN_MEMORY || path === '') {
      return this.read('databaseSizeBytes', () => {
        const pageCount = this.client.selectOne<{ page_count: number }>('PRAGMA page_count')?.page_count ?? 0;
        const pageSize = this.client.selectOne<{ page_size: number }>('PRAGMA page_size')?.page_size ?? 0;
        return pageCount * pageSize;
      });
    }

    const sizes = await Promise.all([fileSize(path), fileSize(`${path}-wal`), fileSize(`${path}-shm`)]);
    return sizes.reduce((sum, size) => sum + size, 0);
  }

  close(): Promise<void> {
    return this.client.close();
  }

  private async read<T>(operation: string, fn: () => T): Promise<T> {
    try {
      return fn();
    } catch (error) {
      log.error({ operation, err: error }, 'db read failed');
      throw new StoreError(operation, error);
    }
  }
}
