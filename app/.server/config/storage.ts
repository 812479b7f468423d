// Settings persistence as key-value rows in the store's settings table
import type { SampleStore } from '~/.server/db/sample-store';
import type { CaptureSettings, SettingsUpdate } from './settings';
import { DEFAULT_SETTINGS, mergeSettings, parseSettings } from './settings';
import { getLogger } from '~/.server/log/logger';
import { errorMessage } from '../errors';

const log = getLogger({ module: 'SettingsStorage' });

export type SettingsStore = Pick<SampleStore, 'getSetting' | 'setSettings' | 'deleteSettings'>;

const KEYS = {
  captureInterval: 'capture_interval_seconds',
  excludedApps: 'capture_excluded_apps',
  textExtraction: 'capture_text_extraction',
  deleteImages: 'capture_delete_images_after_summarize',
  rawSampleDays: 'retention_raw_sample_days',
  activityEntryDays: 'retention_activity_entry_days',
  summaryDays: 'retention_summary_days',
  storageLimit: 'storage_limit_bytes',
  aggregationInterval: 'aggregation_interval_minutes',
  minimumSamples: 'aggregation_minimum_samples',
  logLevel: 'preferences_log_level',
} as const;

function pickSetting(
  dbValue: string | null,
  envValue?: string,
  fallback?: string
): string | undefined {
  if (dbValue !== null && dbValue.trim() !== '') return dbValue;
  if (envValue !== undefined && envValue !== '') return envValue;
  return fallback;
}

function toNumber(value: string | undefined, fallback: number): number {
  if (value === undefined || value.trim() === '') return fallback;
  const parsed = Number(value);
  return Number.isFinite(parsed) ? parsed : Number.NaN;
}

function toBoolean(value: string | null, fallback: boolean): boolean {
  if (value === null) return fallback;
  return value === 'true';
}

function toList(value: string | null, fallback: string[]): unknown {
  if (value === null) return fallback;
  try {
    return JSON.parse(value);
  } catch (error) {
    log.warn({ err: errorMessage(error) }, 'stored excluded apps are not valid JSON');
    return null;
  }
}

/**
 * Load settings: stored value, then environment, then default.
 * A stored value that fails validation drops the whole set back to defaults.
 */
export async function loadSettings(store: SettingsStore): Promise<CaptureSettings> {
  try {
    const get = (key: string) => store.getSetting(key);

    const candidate = {
      captureIntervalSeconds: toNumber(
        pickSetting(await get(KEYS.captureInterval), process.env.SCREENTRAIL_CAPTURE_INTERVAL),
        DEFAULT_SETTINGS.captureIntervalSeconds
      ),
      excludedApps: toList(await get(KEYS.excludedApps), DEFAULT_SETTINGS.excludedApps),
      textExtractionEnabled: toBoolean(await get(KEYS.textExtraction), DEFAULT_SETTINGS.textExtractionEnabled),
      deleteImagesAfterSummarize: toBoolean(await get(KEYS.deleteImages), DEFAULT_SETTINGS.deleteImagesAfterSummarize),
      retention: {
        rawSampleDays: toNumber(pickSetting(await get(KEYS.rawSampleDays)), DEFAULT_SETTINGS.retention.rawSampleDays),
        activityEntryDays: toNumber(
          pickSetting(await get(KEYS.activityEntryDays)),
          DEFAULT_SETTINGS.retention.activityEntryDays
        ),
        summaryDays: toNumber(pickSetting(await get(KEYS.summaryDays)), DEFAULT_SETTINGS.retention.summaryDays),
      },
      storageLimitBytes: toNumber(
        pickSetting(await get(KEYS.storageLimit), process.env.SCREENTRAIL_STORAGE_LIMIT_BYTES),
        DEFAULT_SETTINGS.storageLimitBytes
      ),
      aggregation: {
        intervalMinutes: toNumber(
          pickSetting(await get(KEYS.aggregationInterval)),
          DEFAULT_SETTINGS.aggregation.intervalMinutes
        ),
        minimumSamples: toNumber(
          pickSetting(await get(KEYS.minimumSamples)),
          DEFAULT_SETTINGS.aggregation.minimumSamples
        ),
      },
      logLevel: pickSetting(await get(KEYS.logLevel), process.env.LOG_LEVEL, DEFAULT_SETTINGS.logLevel),
    };

    return parseSettings(candidate);
  } catch (error) {
    log.error({ err: errorMessage(error) }, 'load settings from db failed');
    return DEFAULT_SETTINGS;
  }
}

/**
 * Validate and save every setting in one write
 */
export async function saveSettings(store: SettingsStore, settings: CaptureSettings): Promise<void> {
  const valid = parseSettings(settings);

  await store.setSettings({
    [KEYS.captureInterval]: String(valid.captureIntervalSeconds),
    [KEYS.excludedApps]: JSON.stringify(valid.excludedApps),
    [KEYS.textExtraction]: String(valid.textExtractionEnabled),
    [KEYS.deleteImages]: String(valid.deleteImagesAfterSummarize),
    [KEYS.rawSampleDays]: String(valid.retention.rawSampleDays),
    [KEYS.activityEntryDays]: String(valid.retention.activityEntryDays),
    [KEYS.summaryDays]: String(valid.retention.summaryDays),
    [KEYS.storageLimit]: String(valid.storageLimitBytes),
    [KEYS.aggregationInterval]: String(valid.aggregation.intervalMinutes),
    [KEYS.minimumSamples]: String(valid.aggregation.minimumSamples),
    [KEYS.logLevel]: valid.logLevel,
  });

  log.info({}, 'settings saved');
}

/**
 * Update partial settings (merge with existing)
 */
export async function updateSettings(store: SettingsStore, updates: SettingsUpdate): Promise<CaptureSettings> {
  const current = await loadSettings(store);
  const updated = parseSettings(mergeSettings(current, updates));
  await saveSettings(store, updated);
  return updated;
}

/**
 * Reset settings to defaults by removing the stored rows
 */
export async function resetSettings(store: SettingsStore): Promise<CaptureSettings> {
  await store.deleteSettings(Object.values(KEYS));
  log.info({}, 'settings reset to defaults');
  return DEFAULT_SETTINGS;
}
