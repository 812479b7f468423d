// Retention and storage-limit eviction
// Deletes rows past their retention window and, when over the storage budget,
// evicts the oldest data in weekly steps.

import type { SampleStore } from '~/.server/db/sample-store';
import type { CaptureStorage } from '~/.server/capture/capture-storage';
import type { CaptureSettings } from '~/.server/config/settings';
import type { PerformanceMonitor } from '~/.server/instrumentation/performance-monitor';
import { addDays } from '~/lib/utils/day';
import { getLogger } from '~/.server/log/logger';
import { errorMessage } from '../errors';

const log = getLogger({ module: 'RetentionService' });

const EVICTION_STEP_DAYS = 7;
const EVICTION_FLOOR_DAYS = 7;

export interface RetentionPolicy {
  rawSampleDays: number;
  activityEntryDays: number;
  /** Applies to daily summaries and app usage */
  summaryDays: number;
  /** 0 disables the limit */
  storageLimitBytes: number;
}

export type RetentionOperation =
  | 'rawSamples'
  | 'images'
  | 'activityEntries'
  | 'dailySummaries'
  | 'appUsage';

export interface RetentionFailure {
  operation: RetentionOperation;
  message: string;
}

export interface RetentionResult {
  rawSamplesDeleted: number;
  activityEntriesDeleted: number;
  dailySummariesDeleted: number;
  appUsageDeleted: number;
  imagesDeleted: number;
  failures: RetentionFailure[];
  /** False when any sub-operation failed */
  complete: boolean;
}

export type RetentionStore = Pick<
  SampleStore,
  | 'fetchImagePathsOlderThan'
  | 'deleteRawSamplesOlderThan'
  | 'deleteActivityEntriesOlderThan'
  | 'deleteDailySummariesOlderThan'
  | 'deleteAppUsageOlderThan'
  | 'databaseSizeBytes'
  | 'compact'
>;

export interface RetentionServiceOptions {
  store: RetentionStore;
  captureStorage: CaptureStorage;
  policy: RetentionPolicy;
  /** Overrides the store's own size report */
  databaseSize?: () => Promise<number>;
  monitor?: PerformanceMonitor;
}

export function retentionPolicyFromSettings(settings: CaptureSettings): RetentionPolicy {
  return {
    ...settings.retention,
    storageLimitBytes: settings.storageLimitBytes,
  };
}

export class RetentionService {
  private readonly store: RetentionStore;
  private readonly captureStorage: CaptureStorage;
  private readonly databaseSize: () => Promise<number>;
  private readonly monitor: PerformanceMonitor | undefined;
  policy: RetentionPolicy;

  constructor(options: RetentionServiceOptions) {
    this.store = options.store;
    this.captureStorage = options.captureStorage;
    this.policy = options.policy;
    this.databaseSize = options.databaseSize ?? (() => options.store.databaseSizeBytes());
    this.monitor = options.monitor;
  }

  /**
   * Delete everything older than its kind's window. A record exactly at the
   * cutoff is kept. Every sub-operation runs even when another fails.
   */
  applyRetention(now: number = Date.now()): Promise<RetentionResult> {
    return this.measured('apply_retention', () => this.runRetention(now));
  }

  /**
   * Evict the oldest data until total storage fits the limit; resolves to bytes freed
   */
  enforceStorageLimit(now: number = Date.now()): Promise<number> {
    return this.measured('enforce_storage_limit', () => this.runEviction(now));
  }

  async totalStorageBytes(): Promise<number> {
    const [database, captures] = await Promise.all([this.databaseSize(), this.captureStorage.totalStorageBytes()]);
    return database + captures;
  }

  private measured<T>(label: string, fn: () => Promise<T>): Promise<T> {
    return this.monitor ? this.monitor.measureAsync('retention', label, fn) : fn();
  }

  private async runRetention(now: number): Promise<RetentionResult> {
    const rawCutoff = addDays(now, -this.policy.rawSampleDays);
    const activityCutoff = addDays(now, -this.policy.activityEntryDays);
    const summaryCutoff = addDays(now, -this.policy.summaryDays);
    const failures: RetentionFailure[] = [];

    const attempt = async (operation: RetentionOperation, fn: () => Promise<number>): Promise<number> => {
      try {
        return await fn();
      } catch (error) {
        const message = errorMessage(error);
        log.error({ operation, err: message }, 'retention step failed');
        failures.push({ operation, message });
        return 0;
      }
    };

    let imagePaths: string[] = [];
    const rawSamplesDeleted = await attempt('rawSamples', async () => {
      imagePaths = await this.store.fetchImagePathsOlderThan(rawCutoff);
      return this.store.deleteRawSamplesOlderThan(rawCutoff);
    });
    const imagesDeleted = await attempt('images', () => this.deleteImages(imagePaths, rawCutoff));
    const activityEntriesDeleted = await attempt('activityEntries', () =>
      this.store.deleteActivityEntriesOlderThan(activityCutoff)
    );
    const dailySummariesDeleted = await attempt('dailySummaries', () =>
      this.store.deleteDailySummariesOlderThan(summaryCutoff)
    );
    const appUsageDeleted = await attempt('appUsage', () => this.store.deleteAppUsageOlderThan(summaryCutoff));

    const result: RetentionResult = {
      rawSamplesDeleted,
      activityEntriesDeleted,
      dailySummariesDeleted,
      appUsageDeleted,
      imagesDeleted,
      failures,
      complete: failures.length === 0,
    };
    log.info(
      {
        rawSamplesDeleted,
        activityEntriesDeleted,
        dailySummariesDeleted,
        appUsageDeleted,
        imagesDeleted,
        failures: failures.length,
      },
      'retention applied'
    );
    return result;
  }

  /**
   * Remove the images of deleted samples, then sweep whole days before the cutoff.
   * Resolves to the number of sample images removed.
   */
  private async deleteImages(paths: readonly string[], cutoff: number): Promise<number> {
    let deleted = 0;
    for (const path of paths) {
      try {
        if ((await this.captureStorage.deleteImage(path)) > 0) deleted += 1;
      } catch (error) {
        log.warn({ imagePath: path, err: errorMessage(error) }, 'failed to delete capture image');
      }
    }
    await this.captureStorage.deleteCapturesOlderThan(cutoff);
    return deleted;
  }

  private async runEviction(now: number): Promise<number> {
    const limit = this.policy.storageLimitBytes;
    if (limit <= 0) return 0;

    const initial = await this.totalStorageBytes();
    if (initial <= limit) return 0;

    log.warn({ totalBytes: initial, limitBytes: limit }, 'storage over limit, evicting oldest data');

    let daysBack = Math.max(this.policy.rawSampleDays, this.policy.summaryDays);
    while ((await this.totalStorageBytes()) > limit && daysBack > EVICTION_FLOOR_DAYS) {
      daysBack = Math.max(daysBack - EVICTION_STEP_DAYS, EVICTION_FLOOR_DAYS);
      const cutoff = addDays(now, -daysBack);
      const paths = await this.store.fetchImagePathsOlderThan(cutoff);
      await this.store.deleteRawSamplesOlderThan(cutoff);
      await this.deleteImages(paths, cutoff);
      await this.store.compact();
    }

    if ((await this.totalStorageBytes()) > limit) {
      daysBack = Math.max(this.policy.activityEntryDays, this.policy.summaryDays);
      while ((await this.totalStorageBytes()) > limit && daysBack > EVICTION_FLOOR_DAYS) {
        daysBack = Math.max(daysBack - EVICTION_STEP_DAYS, EVICTION_FLOOR_DAYS);
        const cutoff = addDays(now, -daysBack);
        await this.store.deleteActivityEntriesOlderThan(cutoff);
        await this.store.deleteDailySummariesOlderThan(cutoff);
        await this.store.deleteAppUsageOlderThan(cutoff);
        await this.store.compact();
      }
    }

    const final = await this.totalStorageBytes();
    const freed = Math.max(0, initial - final);
    log.info({ freedBytes: freed, totalBytes: final, limitBytes: limit }, 'storage limit enforced');
    return freed;
  }
}
