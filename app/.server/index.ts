// Public entry point

export { createRuntime, registerShutdownHooks, Runtime } from './init';
export type { MaintenanceResult, PurgeResult, RuntimeOptions } from './init';

export { SqliteSampleStore } from './db/sample-store';
export type { CategoryTotal, RecordedActivity, SampleStore } from './db/sample-store';

export { CaptureScheduler } from './capture/scheduler';
export type { CaptureSchedulerOptions, CaptureStatus, RawSampleSink, SampleCapturedEvent } from './capture/scheduler';
export { FileCaptureStorage, InMemoryCaptureStorage } from './capture/capture-storage';
export type { CaptureRecord, CaptureStorage, StoredCapture } from './capture/capture-storage';
export { averageConfidence } from './capture/types';
export type {
  BoundingBox,
  PermissionGate,
  ScreenAcquisition,
  TextRecognition,
  TextRecognizer,
  TextRegion,
  WindowMetadata,
} from './capture/types';

export { RuleBasedClassifier, classify, iconForApp } from './classify/classifier';
export type { ActivityClassifier, AppIcon } from './classify/classifier';
export { productivityScore, PRODUCTIVITY_WEIGHTS } from './classify/productivity';

export { HeuristicNarrator, NO_ACTIVITY_NARRATIVE } from './narrate/narrator';
export type { Narrator } from './narrate/narrator';
export { formatDuration, truncateTitle } from './narrate/format';

export { AggregationPipeline, groupIntoRuns, pickRepresentative, runDuration } from './aggregate/pipeline';
export type { AggregationPipelineOptions, AggregationRunResult, AggregationStore } from './aggregate/pipeline';

export { RetentionService, retentionPolicyFromSettings } from './retention/retention-service';
export type { RetentionFailure, RetentionPolicy, RetentionResult } from './retention/retention-service';

export { searchActivity, SEARCH_LIMITS } from './search/search-activity';
export type { SearchResult, SearchSource } from './search/search-activity';

export { buildWeeklyInsight, trendDirection } from './insights/weekly';
export type { WeeklyInsight, TrendDirection } from './insights/weekly';

export { PerformanceMonitor } from './instrumentation/performance-monitor';
export type { CategoryStats, Measurement, OperationCategory } from './instrumentation/performance-monitor';

export { DEFAULT_SETTINGS, SettingsSchema, parseSettings } from './config/settings';
export type { CaptureSettings, SettingsUpdate } from './config/settings';
export { loadSettings, resetSettings, saveSettings, updateSettings } from './config/storage';

export { StorageUnavailableError, StoreError, SettingsValidationError } from './errors';
export { getLogger, setLogLevel } from './log/logger';

export type { ActivityCategory } from '../types/activity-category';
export type { ActivityEntry } from '../types/activity-entry';
export type { AppUsage } from '../types/app-usage';
export type { DailySummary } from '../types/daily-summary';
export type { RawSample } from '../types/raw-sample';
