// Capture, aggregation and retention settings
import { z } from 'zod';
import type { LogLevel } from '~/.server/log/logger';
import { SettingsValidationError } from '../errors';

export const MIN_CAPTURE_INTERVAL_SECONDS = 5;
export const MAX_CAPTURE_INTERVAL_SECONDS = 120;

export interface RetentionSettings {
  rawSampleDays: number;
  activityEntryDays: number;
  /** Applies to daily summaries and app usage */
  summaryDays: number;
}

export interface AggregationSettings {
  intervalMinutes: number;
  /** Fewer new samples than this and a run writes no entries */
  minimumSamples: number;
}

export interface CaptureSettings {
  captureIntervalSeconds: number;
  /** App names or identifiers that are never captured */
  excludedApps: string[];
  textExtractionEnabled: boolean;
  deleteImagesAfterSummarize: boolean;
  retention: RetentionSettings;
  /** Total bytes for database plus capture artifacts; 0 disables the limit */
  storageLimitBytes: number;
  aggregation: AggregationSettings;
  logLevel: LogLevel;
}

export type SettingsUpdate = Partial<Omit<CaptureSettings, 'retention' | 'aggregation'>> & {
  retention?: Partial<RetentionSettings>;
  aggregation?: Partial<AggregationSettings>;
};

export const DEFAULT_SETTINGS: CaptureSettings = {
  captureIntervalSeconds: 30,
  excludedApps: ['Keychain Access', '1Password', 'System Preferences'],
  textExtractionEnabled: true,
  deleteImagesAfterSummarize: false,
  retention: {
    rawSampleDays: 30,
    activityEntryDays: 90,
    summaryDays: 365,
  },
  storageLimitBytes: 5 * 1024 * 1024 * 1024,
  aggregation: {
    intervalMinutes: 15,
    minimumSamples: 3,
  },
  logLevel: 'info',
};

const retentionDays = z.number().int().min(1).max(3650);

export const SettingsSchema = z.object({
  captureIntervalSeconds: z.number().int().min(MIN_CAPTURE_INTERVAL_SECONDS).max(MAX_CAPTURE_INTERVAL_SECONDS),
  excludedApps: z.array(z.string().trim().min(1)),
  textExtractionEnabled: z.boolean(),
  deleteImagesAfterSummarize: z.boolean(),
  retention: z.object({
    rawSampleDays: retentionDays,
    activityEntryDays: retentionDays,
    summaryDays: retentionDays,
  }),
  storageLimitBytes: z.number().int().min(0),
  aggregation: z.object({
    intervalMinutes: z.number().int().min(1).max(24 * 60),
    minimumSamples: z.number().int().min(1),
  }),
  logLevel: z.enum(['debug', 'info', 'warn', 'error']),
});

/**
 * Validate a settings object, throwing SettingsValidationError with one line per issue
 */
export function parseSettings(input: unknown): CaptureSettings {
  const result = SettingsSchema.safeParse(input);
  if (!result.success) {
    throw new SettingsValidationError(
      result.error.issues.map((issue) => `${issue.path.join('.') || 'settings'}: ${issue.message}`)
    );
  }
  return result.data;
}

export function mergeSettings(current: CaptureSettings, updates: SettingsUpdate): CaptureSettings {
  return {
    ...current,
    ...updates,
    retention: {
      ...current.retention,
      ...updates.retention,
    },
    aggregation: {
      ...current.aggregation,
      ...updates.aggregation,
    },
  };
}

export function clampCaptureInterval(seconds: number): number {
  return Math.min(MAX_CAPTURE_INTERVAL_SECONDS, Math.max(MIN_CAPTURE_INTERVAL_SECONDS, Math.round(seconds)));
}
