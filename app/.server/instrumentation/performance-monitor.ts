import { getLogger, type Logger } from '~/.server/log/logger';

export type OperationCategory =
  | 'capture_pipeline'
  | 'screenshot'
  | 'metadata'
  | 'ocr'
  | 'db_read'
  | 'db_write'
  | 'db_search'
  | 'summarization'
  | 'retention';

export const OPERATION_CATEGORIES: readonly OperationCategory[] = [
  'capture_pipeline',
  'screenshot',
  'metadata',
  'ocr',
  'db_read',
  'db_write',
  'db_search',
  'summarization',
  'retention',
];

export interface Measurement {
  category: OperationCategory;
  label: string;
  /** Milliseconds */
  duration: number;
  timestamp: number;
  /** RSS change across the measured call, in bytes */
  memoryDelta: number | null;
}

export interface CategoryStats {
  category: OperationCategory;
  count: number;
  totalDuration: number;
  averageDuration: number;
  minDuration: number;
  maxDuration: number;
  p95Duration: number;
}

export interface MemorySnapshot {
  timestamp: number;
  label: string;
  residentBytes: number;
  heapUsedBytes: number;
}

export interface MeasurementToken {
  category: OperationCategory;
  label: string;
  startedAt: number;
  startMemory: number;
}

export interface PerformanceMonitorOptions {
  maxBufferSize?: number;
  /** Milliseconds at or above which a measurement is logged as slow */
  slowOperationThreshold?: number;
  maxMemorySnapshots?: number;
  /** Log every measurement at debug level, not only the slow ones */
  verbose?: boolean;
  /** Clock in milliseconds; defaults to performance.now() */
  now?: () => number;
  logger?: Logger;
}

const MB = 1024 * 1024;

/**
 * Timing and memory instrumentation for the capture, aggregation and retention paths.
 * Keeps a bounded buffer of measurements and reports per-category statistics.
 */
export class PerformanceMonitor {
  private readonly maxBufferSize: number;
  private readonly slowOperationThreshold: number;
  private readonly maxMemorySnapshots: number;
  private readonly verbose: boolean;
  private readonly now: () => number;
  private readonly log: Logger;

  private measurements: Measurement[] = [];
  private memorySnapshots: MemorySnapshot[] = [];

  constructor(options: PerformanceMonitorOptions = {}) {
    this.maxBufferSize = options.maxBufferSize ?? 1000;
    this.slowOperationThreshold = options.slowOperationThreshold ?? 2000;
    this.maxMemorySnapshots = options.maxMemorySnapshots ?? 100;
    this.verbose = options.verbose ?? false;
    this.now = options.now ?? (() => performance.now());
    this.log = options.logger ?? getLogger({ module: 'PerformanceMonitor' });
  }

  measure<T>(category: OperationCategory, label: string, fn: () => T): T {
    const token = this.start(category, label);
    try {
      return fn();
    } finally {
      this.end(token);
    }
  }

  async measureAsync<T>(category: OperationCategory, label: string, fn: () => Promise<T>): Promise<T> {
    const token = this.start(category, label);
    try {
      return await fn();
    } finally {
      this.end(token);
    }
  }

  start(category: OperationCategory, label: string = category): MeasurementToken {
    return { category, label, startedAt: this.now(), startMemory: process.memoryUsage().rss };
  }

  end(token: MeasurementToken): Measurement {
    const measurement: Measurement = {
      category: token.category,
      label: token.label,
      duration: Math.max(0, this.now() - token.startedAt),
      timestamp: Date.now(),
      memoryDelta: process.memoryUsage().rss - token.startMemory,
    };
    this.record(measurement);
    this.logIfNeeded(measurement);
    return measurement;
  }

  snapshotMemory(label: string): MemorySnapshot {
    const usage = process.memoryUsage();
    const snapshot: MemorySnapshot = {
      timestamp: Date.now(),
      label,
      residentBytes: usage.rss,
      heapUsedBytes: usage.heapUsed,
    };
    this.memorySnapshots.push(snapshot);
    if (this.memorySnapshots.length > this.maxMemorySnapshots) {
      this.memorySnapshots.splice(0, this.memorySnapshots.length - this.maxMemorySnapshots);
    }
    return snapshot;
  }

  stats(category: OperationCategory): CategoryStats | null {
    const durations = this.measurements
      .filter((m) => m.category === category)
      .map((m) => m.duration)
      .sort((a, b) => a - b);
    const count = durations.length;
    if (count === 0) return null;

    const total = durations.reduce((sum, d) => sum + d, 0);
    const p95Index = Math.min(Math.floor(count * 0.95), count - 1);
    return {
      category,
      count,
      totalDuration: total,
      averageDuration: total / count,
      minDuration: durations[0] ?? 0,
      maxDuration: durations[count - 1] ?? 0,
      p95Duration: durations[p95Index] ?? 0,
    };
  }

  allStats(): CategoryStats[] {
    const result: CategoryStats[] = [];
    for (const category of OPERATION_CATEGORIES) {
      const stats = this.stats(category);
      if (stats) result.push(stats);
    }
    return result;
  }

  allMeasurements(): Measurement[] {
    return [...this.measurements];
  }

  allMemorySnapshots(): MemorySnapshot[] {
    return [...this.memorySnapshots];
  }

  lastMeasurement(category: OperationCategory): Measurement | null {
    for (let i = this.measurements.length - 1; i >= 0; i--) {
      const measurement = this.measurements[i];
      if (measurement && measurement.category === category) return measurement;
    }
    return null;
  }

  slowOperations(): Measurement[] {
    return this.measurements.filter((m) => m.duration >= this.slowOperationThreshold);
  }

  /**
   * Plain-text report of memory, per-category timings and the latest slow operations
   */
  generateReport(): string {
    const lines: string[] = ['=== Performance Report ===', `Generated: ${new Date().toISOString()}`, ''];

    const snapshot = this.memorySnapshots[this.memorySnapshots.length - 1];
    if (snapshot) {
      lines.push('-- Memory --');
      lines.push(`  Resident: ${(snapshot.residentBytes / MB).toFixed(1)} MB`);
      lines.push(`  Heap:     ${(snapshot.heapUsedBytes / MB).toFixed(1)} MB`);
      lines.push('');
    }

    const stats = this.allStats().sort((a, b) => b.totalDuration - a.totalDuration);
    if (stats.length > 0) {
      lines.push('-- Timing (by category) --');
      for (const stat of stats) {
        lines.push(`  ${stat.category}:`);
        lines.push(`    Count: ${stat.count}`);
        lines.push(`    Avg:   ${stat.averageDuration.toFixed(1)}ms`);
        lines.push(`    Min:   ${stat.minDuration.toFixed(1)}ms`);
        lines.push(`    Max:   ${stat.maxDuration.toFixed(1)}ms`);
        lines.push(`    P95:   ${stat.p95Duration.toFixed(1)}ms`);
        lines.push(`    Total: ${stat.totalDuration.toFixed(1)}ms`);
      }
      lines.push('');
    }

    const slow = this.slowOperations();
    if (slow.length > 0) {
      lines.push(`-- Slow Operations (>= ${this.slowOperationThreshold}ms) --`);
      for (const op of slow.slice(-20)) {
        lines.push(`  [${new Date(op.timestamp).toISOString()}] ${op.category}/${op.label}: ${op.duration.toFixed(1)}ms`);
      }
    }

    lines.push('=== End Report ===');
    return lines.join('\n');
  }

  reset(): void {
    this.measurements = [];
    this.memorySnapshots = [];
  }

  private record(measurement: Measurement): void {
    this.measurements.push(measurement);
    if (this.measurements.length > this.maxBufferSize) {
      this.measurements.splice(0, this.measurements.length - this.maxBufferSize);
    }
  }

  private logIfNeeded(measurement: Measurement): void {
    const fields = {
      category: measurement.category,
      label: measurement.label,
      durationMs: Math.round(measurement.duration),
      memoryDeltaMb: measurement.memoryDelta === null ? null : Number((measurement.memoryDelta / MB).toFixed(1)),
    };
    if (measurement.duration >= this.slowOperationThreshold) {
      this.log.warn(fields, 'slow operation');
    } else if (this.verbose) {
      this.log.debug(fields, 'operation timed');
    }
  }
}
