/**
 * Runtime wiring
 *
 * Opens the database, loads settings and builds the capture scheduler,
 * aggregation pipeline and retention service around one store. Capture
 * requests a debounced aggregation run after every persisted sample.
 */

import { join } from 'path';
import { getLogger, setLogLevel } from '~/.server/log/logger';
import { SqliteSampleStore } from '~/.server/db/sample-store';
import { getDataDir, getDatabasePath } from '~/.server/db/connection';
import { FileCaptureStorage, type CaptureStorage } from '~/.server/capture/capture-storage';
import { CaptureScheduler } from '~/.server/capture/scheduler';
import type { PermissionGate, ScreenAcquisition, TextRecognizer } from '~/.server/capture/types';
import { AggregationPipeline, WATERMARK_KEY } from '~/.server/aggregate/pipeline';
import { RetentionService, retentionPolicyFromSettings, type RetentionResult } from '~/.server/retention/retention-service';
import type { ActivityClassifier } from '~/.server/classify/classifier';
import type { Narrator } from '~/.server/narrate/narrator';
import type { PerformanceMonitor } from '~/.server/instrumentation/performance-monitor';
import { searchActivity, type SearchResult } from '~/.server/search/search-activity';
import { buildWeeklyInsight, type WeeklyInsight } from '~/.server/insights/weekly';
import { loadSettings, updateSettings } from '~/.server/config/storage';
import type { CaptureSettings, SettingsUpdate } from '~/.server/config/settings';
import { errorMessage } from './errors';

const log = getLogger({ module: 'Runtime' });

const MAINTENANCE_INTERVAL_MS = 24 * 60 * 60 * 1000;

export interface RuntimeOptions {
  acquisition: ScreenAcquisition;
  recognizer: TextRecognizer;
  permissions: PermissionGate;
  /** Defaults to SCREENTRAIL_DATA_DIR, then ./data */
  dataDir?: string;
  /** Defaults to the path under dataDir; ':memory:' is accepted */
  databasePath?: string;
  /** Defaults to files under `<dataDir>/captures` */
  captureStorage?: CaptureStorage;
  classifier?: ActivityClassifier;
  narrator?: Narrator;
  monitor?: PerformanceMonitor;
  aggregationDebounceMs?: number;
}

export interface MaintenanceResult {
  retention: RetentionResult;
  bytesFreed: number;
}

export interface PurgeResult {
  complete: boolean;
  failures: string[];
  /** User-facing notice when any step failed */
  notice: string | null;
}

export class Runtime {
  readonly store: SqliteSampleStore;
  readonly captureStorage: CaptureStorage;
  readonly scheduler: CaptureScheduler;
  readonly pipeline: AggregationPipeline;
  readonly retention: RetentionService;
  readonly monitor: PerformanceMonitor | undefined;

  private currentSettings: CaptureSettings;
  private maintenanceTimer: NodeJS.Timeout | null = null;
  private maintenanceChain: Promise<unknown> = Promise.resolve();
  private closed = false;

  constructor(
    store: SqliteSampleStore,
    captureStorage: CaptureStorage,
    settings: CaptureSettings,
    options: RuntimeOptions
  ) {
    this.store = store;
    this.captureStorage = captureStorage;
    this.currentSettings = settings;
    this.monitor = options.monitor;

    this.scheduler = new CaptureScheduler({
      acquisition: options.acquisition,
      recognizer: options.recognizer,
      permissions: options.permissions,
      storage: captureStorage,
      sink: store,
      intervalSeconds: settings.captureIntervalSeconds,
      excludedApps: settings.excludedApps,
      textExtractionEnabled: settings.textExtractionEnabled,
      monitor: options.monitor,
    });

    this.pipeline = new AggregationPipeline({
      store,
      classifier: options.classifier,
      narrator: options.narrator,
      captureStorage,
      intervalMinutes: settings.aggregation.intervalMinutes,
      minimumSamples: settings.aggregation.minimumSamples,
      deleteImagesAfterSummarize: settings.deleteImagesAfterSummarize,
      debounceMs: options.aggregationDebounceMs,
      monitor: options.monitor,
    });

    this.retention = new RetentionService({
      store,
      captureStorage,
      policy: retentionPolicyFromSettings(settings),
      monitor: options.monitor,
    });

    this.scheduler.on('sample', () => this.pipeline.requestRun());
  }

  get settings(): CaptureSettings {
    return this.currentSettings;
  }

  /**
   * Start capture, periodic aggregation and daily maintenance
   */
  async start(): Promise<void> {
    this.pipeline.start();
    this.scheduleMaintenance();
    await this.scheduler.start();
    log.info({ status: this.scheduler.status.state }, 'runtime started');
  }

  /**
   * Persist a settings change and push it to the running services
   */
  async applySettings(update: SettingsUpdate): Promise<CaptureSettings> {
    const settings = await updateSettings(this.store, update);
    this.currentSettings = settings;

    setLogLevel(settings.logLevel);
    this.scheduler.updateInterval(settings.captureIntervalSeconds);
    this.scheduler.updateExclusions(settings.excludedApps);
    this.scheduler.updateTextExtraction(settings.textExtractionEnabled);
    this.pipeline.updateSettings({
      intervalMinutes: settings.aggregation.intervalMinutes,
      minimumSamples: settings.aggregation.minimumSamples,
      deleteImagesAfterSummarize: settings.deleteImagesAfterSummarize,
    });
    this.retention.policy = retentionPolicyFromSettings(settings);

    log.info({ update }, 'settings applied');
    return settings;
  }

  search(query: string): Promise<SearchResult[]> {
    return searchActivity(this.store, query, this.monitor);
  }

  weeklyInsight(now: number = Date.now()): Promise<WeeklyInsight> {
    return buildWeeklyInsight(this.store, now);
  }

  /**
   * Age-based retention followed by the storage limit, after any pass in progress
   */
  runMaintenance(now: number = Date.now()): Promise<MaintenanceResult> {
    const pass = this.maintenanceChain.then(async () => {
      const retention = await this.retention.applyRetention(now);
      const bytesFreed = await this.retention.enforceStorageLimit(now);
      log.info({ complete: retention.complete, bytesFreed }, 'maintenance finished');
      return { retention, bytesFreed };
    });
    this.maintenanceChain = pass.catch(() => undefined);
    return pass;
  }

  /**
   * Stop capture and delete every row and capture artifact. Each step runs
   * even when an earlier one fails.
   */
  async purgeAllData(): Promise<PurgeResult> {
    this.scheduler.stop();
    this.pipeline.stop();
    await Promise.all([this.scheduler.whenIdle(), this.pipeline.whenIdle()]);

    const failures: string[] = [];
    const attempt = async (step: string, fn: () => Promise<unknown>) => {
      try {
        await fn();
      } catch (error) {
        log.error({ step, err: error }, 'data purge step failed');
        failures.push(`${step}: ${errorMessage(error)}`);
      }
    };

    await attempt('database', async () => {
      await this.store.deleteAllData();
      await this.store.deleteSettings([WATERMARK_KEY]);
    });
    await attempt('captures', () => this.captureStorage.deleteAllCaptures());
    await attempt('compact', () => this.store.compact());

    const complete = failures.length === 0;
    log.info({ complete, failures: failures.length }, 'data purge finished');
    return {
      complete,
      failures,
      notice: complete ? null : `Data purge incomplete: ${failures.join('; ')}`,
    };
  }

  /**
   * Stop every service, wait for in-flight work and close the database
   */
  async shutdown(): Promise<void> {
    if (this.closed) return;
    this.closed = true;
    log.debug({}, 'shutting down runtime');

    this.scheduler.stop();
    this.pipeline.stop();
    this.clearMaintenance();
    await Promise.all([this.scheduler.whenIdle(), this.pipeline.whenIdle(), this.maintenanceChain]);
    await this.store.close();

    log.debug({}, 'runtime shutdown complete');
  }

  private scheduleMaintenance(): void {
    this.clearMaintenance();
    const pass = () => {
      this.runMaintenance().catch((error: unknown) => {
        log.error({ err: error }, 'maintenance failed');
      });
    };
    pass();
    this.maintenanceTimer = setInterval(pass, MAINTENANCE_INTERVAL_MS);
  }

  private clearMaintenance(): void {
    if (this.maintenanceTimer) {
      clearInterval(this.maintenanceTimer);
      this.maintenanceTimer = null;
    }
  }
}

/**
 * Open the store, load settings and build the services. Nothing starts
 * until `start()` is called.
 */
export async function createRuntime(options: RuntimeOptions): Promise<Runtime> {
  const dataDir = options.dataDir ?? getDataDir();
  const databasePath = options.databasePath ?? getDatabasePath(dataDir);

  log.info({ dataDir, databasePath }, 'initializing runtime');

  const store = SqliteSampleStore.open(databasePath);
  try {
    const settings = await loadSettings(store);
    setLogLevel(settings.logLevel);
    const captureStorage = options.captureStorage ?? new FileCaptureStorage(join(dataDir, 'captures'));
    return new Runtime(store, captureStorage, settings, options);
  } catch (error) {
    log.error({ err: error }, 'failed to initialize runtime');
    await store.close();
    throw error;
  }
}

let shutdownHooksRegistered = false;

/**
 * Shut the runtime down on SIGINT / SIGTERM
 */
export function registerShutdownHooks(runtime: Runtime): void {
  if (shutdownHooksRegistered) {
    return;
  }
  shutdownHooksRegistered = true;

  const signals: NodeJS.Signals[] = ['SIGINT', 'SIGTERM'];
  signals.forEach((signal) => {
    process.once(signal, () => {
      log.info({ signal }, 'shutdown initiated');
      runtime
        .shutdown()
        .then(() => process.exit(0))
        .catch((error: unknown) => {
          log.error({ err: error }, 'error during shutdown');
          process.exit(1);
        });
    });
  });

  log.debug({}, 'shutdown hooks registered');
}
