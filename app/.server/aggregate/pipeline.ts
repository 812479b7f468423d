// Aggregation pipeline
// Turns new raw samples into activity entries and per-app usage, then rebuilds
// the day's summary from everything recorded for the day.

import { randomUUID } from 'crypto';
import { EventEmitter } from 'events';
import type { RawSample } from '~/types/raw-sample';
import type { ActivityEntry } from '~/types/activity-entry';
import type { SampleStore, RecordedActivity } from '~/.server/db/sample-store';
import type { CaptureStorage } from '~/.server/capture/capture-storage';
import type { PerformanceMonitor } from '~/.server/instrumentation/performance-monitor';
import { RuleBasedClassifier, type ActivityClassifier } from '~/.server/classify/classifier';
import { productivityScore } from '~/.server/classify/productivity';
import { HeuristicNarrator, type Narrator } from '~/.server/narrate/narrator';
import { truncateTitle } from '~/.server/narrate/format';
import { dayKey, startOfDay } from '~/lib/utils/day';
import { getLogger } from '~/.server/log/logger';
import { errorMessage } from '../errors';

const log = getLogger({ module: 'AggregationPipeline' });

export const WATERMARK_KEY = 'aggregation_last_processed_at';

const DEFAULT_DEBOUNCE_MS = 5_000;
const DEFAULT_NOMINAL_TICK_SECONDS = 30;
const ENTRY_TITLE_MAX_LENGTH = 80;

export type AggregationStore = Pick<
  SampleStore,
  | 'fetchRawSamples'
  | 'recordActivities'
  | 'fetchActivityEntriesForDay'
  | 'totalDurationForDay'
  | 'fetchAppUsageForDay'
  | 'upsertDailySummary'
  | 'getSetting'
>;

export interface AggregationRunResult {
  status: 'completed' | 'failed';
  entriesCreated: number;
  samplesProcessed: number;
  summaryUpdated: boolean;
  error?: string;
}

export interface AggregationPipelineOptions {
  store: AggregationStore;
  classifier?: ActivityClassifier;
  narrator?: Narrator;
  /** Needed only when images are deleted after summarizing */
  captureStorage?: Pick<CaptureStorage, 'deleteImage'>;
  intervalMinutes?: number;
  minimumSamples?: number;
  deleteImagesAfterSummarize?: boolean;
  debounceMs?: number;
  /** Floor per sample when computing a run's duration */
  nominalTickSeconds?: number;
  monitor?: PerformanceMonitor;
}

export interface AggregationSettingsUpdate {
  intervalMinutes?: number;
  minimumSamples?: number;
  deleteImagesAfterSummarize?: boolean;
}

/**
 * Maximal runs of time-ordered samples sharing one app name
 */
export function groupIntoRuns(samples: readonly RawSample[]): RawSample[][] {
  const sorted = [...samples].sort((a, b) => a.timestamp - b.timestamp);
  const runs: RawSample[][] = [];
  let current: RawSample[] = [];

  for (const sample of sorted) {
    const previous = current[current.length - 1];
    if (previous && previous.appName !== sample.appName) {
      runs.push(current);
      current = [];
    }
    current.push(sample);
  }
  if (current.length > 0) runs.push(current);

  return runs;
}

/**
 * Sample with the longest extracted text; the earliest wins a tie
 */
export function pickRepresentative(run: readonly RawSample[]): RawSample | null {
  let best: RawSample | null = null;
  for (const sample of run) {
    if (!best || (sample.extractedText?.length ?? 0) > (best.extractedText?.length ?? 0)) {
      best = sample;
    }
  }
  return best;
}

export function runDuration(run: readonly RawSample[], nominalTickSeconds: number = DEFAULT_NOMINAL_TICK_SECONDS): number {
  const first = run[0];
  const last = run[run.length - 1];
  if (!first || !last) return 0;
  const span = (last.timestamp - first.timestamp) / 1000;
  return Math.max(span, run.length * nominalTickSeconds);
}

/**
 * Aggregation pipeline
 * Emits 'run' with an AggregationRunResult after every execution.
 */
export class AggregationPipeline extends EventEmitter {
  private readonly store: AggregationStore;
  private readonly classifier: ActivityClassifier;
  private readonly narrator: Narrator;
  private readonly captureStorage: Pick<CaptureStorage, 'deleteImage'> | null;
  private readonly debounceMs: number;
  private readonly nominalTickSeconds: number;
  private readonly monitor: PerformanceMonitor | undefined;

  private intervalMinutes: number;
  private minimumSamples: number;
  private deleteImagesAfterSummarize: boolean;

  private timer: NodeJS.Timeout | null = null;
  private debounceTimer: NodeJS.Timeout | null = null;
  private runChain: Promise<unknown> = Promise.resolve();

  constructor(options: AggregationPipelineOptions) {
    super();
    this.store = options.store;
    this.classifier = options.classifier ?? new RuleBasedClassifier();
    this.narrator = options.narrator ?? new HeuristicNarrator();
    this.captureStorage = options.captureStorage ?? null;
    this.debounceMs = options.debounceMs ?? DEFAULT_DEBOUNCE_MS;
    this.nominalTickSeconds = options.nominalTickSeconds ?? DEFAULT_NOMINAL_TICK_SECONDS;
    this.monitor = options.monitor;
    this.intervalMinutes = options.intervalMinutes ?? 15;
    this.minimumSamples = options.minimumSamples ?? 3;
    this.deleteImagesAfterSummarize = options.deleteImagesAfterSummarize ?? false;
  }

  get isRunning(): boolean {
    return this.timer !== null;
  }

  start(): void {
    this.clearTimer();
    this.timer = setInterval(() => this.trigger('interval'), this.intervalMinutes * 60_000);
    log.info({ intervalMinutes: this.intervalMinutes }, 'aggregation pipeline started');
  }

  stop(): void {
    this.clearTimer();
    if (this.debounceTimer) {
      clearTimeout(this.debounceTimer);
      this.debounceTimer = null;
    }
  }

  updateSettings(update: AggregationSettingsUpdate): void {
    if (update.minimumSamples !== undefined) this.minimumSamples = update.minimumSamples;
    if (update.deleteImagesAfterSummarize !== undefined) {
      this.deleteImagesAfterSummarize = update.deleteImagesAfterSummarize;
    }
    if (update.intervalMinutes !== undefined && update.intervalMinutes !== this.intervalMinutes) {
      this.intervalMinutes = update.intervalMinutes;
      if (this.timer) this.start();
    }
  }

  /**
   * Debounced run request; each call restarts the wait
   */
  requestRun(): void {
    if (this.debounceTimer) clearTimeout(this.debounceTimer);
    this.debounceTimer = setTimeout(() => {
      this.debounceTimer = null;
      this.trigger('request');
    }, this.debounceMs);
  }

  /**
   * Run once, after any run already in progress
   */
  runNow(): Promise<AggregationRunResult> {
    const run = this.runChain.then(() => this.execute());
    this.runChain = run.catch(() => undefined);
    return run;
  }

  /**
   * Resolves once queued runs have finished
   */
  async whenIdle(): Promise<void> {
    await this.runChain;
  }

  private trigger(source: 'interval' | 'request'): void {
    this.runNow().catch((error: unknown) => {
      log.error({ source, err: errorMessage(error) }, 'aggregation run failed');
    });
  }

  private clearTimer(): void {
    if (this.timer) {
      clearInterval(this.timer);
      this.timer = null;
    }
  }

  private async execute(): Promise<AggregationRunResult> {
    const result = this.monitor
      ? await this.monitor.measureAsync('summarization', 'full_pipeline', () => this.process())
      : await this.process();
    this.monitor?.snapshotMemory('aggregation');
    this.emit('run', result);
    return result;
  }

  private async process(): Promise<AggregationRunResult> {
    const now = Date.now();
    const result: AggregationRunResult = {
      status: 'completed',
      entriesCreated: 0,
      samplesProcessed: 0,
      summaryUpdated: false,
    };

    try {
      const watermark = await this.loadWatermark();
      const fetchStart = Math.max(watermark ?? 0, startOfDay(now));
      const fetched = await this.store.fetchRawSamples(fetchStart, now);
      const samples = watermark === null ? fetched : fetched.filter((sample) => sample.timestamp > watermark);

      if (samples.length >= this.minimumSamples) {
        const runs = groupIntoRuns(samples);
        const recorded = runs.map((run) => this.buildActivity(run, now));
        const items = recorded.filter((item): item is RecordedActivity => item !== null);

        await this.store.recordActivities(items, { [WATERMARK_KEY]: String(now) });

        result.entriesCreated = items.length;
        result.samplesProcessed = samples.length;
        log.info({ entries: items.length, samples: samples.length }, 'recorded activity entries');

        if (this.deleteImagesAfterSummarize) {
          await this.deleteImages(samples);
        }
      } else {
        log.debug({ samples: samples.length, minimum: this.minimumSamples }, 'not enough new samples');
      }

      result.summaryUpdated = await this.regenerateSummary(now);
    } catch (error) {
      const message = errorMessage(error);
      log.error({ err: message }, 'aggregation run failed');
      result.status = 'failed';
      result.error = message;
    }

    return result;
  }

  private async loadWatermark(): Promise<number | null> {
    const stored = await this.store.getSetting(WATERMARK_KEY);
    if (stored === null) return null;
    const parsed = Number(stored);
    if (!Number.isFinite(parsed)) {
      log.warn({ stored }, 'ignoring malformed aggregation watermark');
      return null;
    }
    return parsed;
  }

  private buildActivity(run: readonly RawSample[], now: number): RecordedActivity | null {
    const first = run[0];
    const representative = pickRepresentative(run);
    if (!first || !representative) return null;

    const { appName } = first;
    const category = this.classifier.classify(
      appName,
      representative.appIdentifier,
      representative.windowTitle,
      representative.extractedText
    );
    const icon = this.classifier.iconForApp(appName);
    const duration = runDuration(run, this.nominalTickSeconds);
    const windowTitle = representative.windowTitle;

    const entry: ActivityEntry = {
      id: randomUUID(),
      timestamp: first.timestamp,
      appName,
      icon,
      title: windowTitle.trim() ? truncateTitle(windowTitle, ENTRY_TITLE_MAX_LENGTH) : appName,
      summary: this.narrator.summarizeActivity(appName, windowTitle, representative.extractedText, category, duration),
      category,
      duration,
    };

    return {
      entry,
      usage: {
        id: randomUUID(),
        day: dayKey(now),
        appName,
        icon,
        duration,
        category,
      },
    };
  }

  /**
   * Rebuild the day's summary from all of its entries; false when the day has none
   */
  private async regenerateSummary(now: number): Promise<boolean> {
    const entries = await this.store.fetchActivityEntriesForDay(now);
    if (entries.length === 0) return false;

    const totalScreenTime = await this.store.totalDurationForDay(now);
    const topApps = await this.store.fetchAppUsageForDay(now);
    const score = productivityScore(entries);

    await this.store.upsertDailySummary({
      id: randomUUID(),
      day: dayKey(now),
      totalScreenTime,
      narrative: this.narrator.summarizeDay(entries, totalScreenTime, topApps, score),
      activityCount: entries.length,
      productivityScore: score,
    });
    return true;
  }

  private async deleteImages(samples: readonly RawSample[]): Promise<void> {
    if (!this.captureStorage) {
      log.warn({}, 'image deletion enabled without capture storage');
      return;
    }
    for (const sample of samples) {
      try {
        await this.captureStorage.deleteImage(sample.imagePath);
      } catch (error) {
        log.warn({ imagePath: sample.imagePath, err: errorMessage(error) }, 'failed to delete capture image');
      }
    }
  }
}
