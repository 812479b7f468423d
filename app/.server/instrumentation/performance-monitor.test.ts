import { describe, expect, it, vi } from 'vitest';
import type { Logger } from '~/.server/log/logger';
import { PerformanceMonitor } from './performance-monitor';

function fakeLogger() {
  const warn = vi.fn();
  const logger: Logger = { info: vi.fn(), warn, error: vi.fn(), debug: vi.fn(), child: () => logger };
  return { logger, warn };
}

function steppedClock(steps: number[]): () => number {
  let index = 0;
  return () => {
    const value = steps[Math.min(index, steps.length - 1)] ?? 0;
    index += 1;
    return value;
  };
}

describe('PerformanceMonitor', () => {
  it('records a measurement for synchronous work and returns its result', () => {
    const monitor = new PerformanceMonitor({ now: steppedClock([100, 130]), logger: fakeLogger().logger });

    const result = monitor.measure('db_read', 'fetch entries', () => 42);

    expect(result).toBe(42);
    const last = monitor.lastMeasurement('db_read');
    expect(last?.label).toBe('fetch entries');
    expect(last?.duration).toBe(30);
  });

  it('records the measurement even when async work rejects', async () => {
    const monitor = new PerformanceMonitor({ now: steppedClock([0, 5]), logger: fakeLogger().logger });

    await expect(
      monitor.measureAsync('ocr', 'recognize', () => Promise.reject(new Error('boom'))),
    ).rejects.toThrow('boom');

    expect(monitor.allMeasurements()).toHaveLength(1);
    expect(monitor.lastMeasurement('ocr')?.duration).toBe(5);
  });

  it('computes per-category statistics with the 95th percentile', () => {
    // 20 measurements of 1..20ms
    const ticks: number[] = [];
    for (let i = 1; i <= 20; i++) ticks.push(0, i);
    const monitor = new PerformanceMonitor({ now: steppedClock(ticks), logger: fakeLogger().logger });

    for (let i = 0; i < 20; i++) {
      monitor.end(monitor.start('screenshot'));
    }

    const stats = monitor.stats('screenshot');
    expect(stats).toEqual({
      category: 'screenshot',
      count: 20,
      totalDuration: 210,
      averageDuration: 10.5,
      minDuration: 1,
      maxDuration: 20,
      p95Duration: 20,
    });
    expect(monitor.stats('retention')).toBeNull();
    expect(monitor.allStats().map((s) => s.category)).toEqual(['screenshot']);
  });

  it('keeps only the newest measurements once the buffer is full', () => {
    const monitor = new PerformanceMonitor({ maxBufferSize: 3, now: () => 0, logger: fakeLogger().logger });

    for (const label of ['a', 'b', 'c', 'd', 'e']) {
      monitor.measure('metadata', label, () => undefined);
    }

    expect(monitor.allMeasurements().map((m) => m.label)).toEqual(['c', 'd', 'e']);
  });

  it('warns about operations at or above the slow threshold', () => {
    const { logger, warn } = fakeLogger();
    const monitor = new PerformanceMonitor({
      slowOperationThreshold: 2000,
      now: steppedClock([0, 2500, 3000, 3100]),
      logger,
    });

    monitor.measure('capture_pipeline', 'tick', () => undefined);
    monitor.measure('capture_pipeline', 'tick', () => undefined);

    expect(warn).toHaveBeenCalledTimes(1);
    expect(warn.mock.calls[0]?.[1]).toBe('slow operation');
    expect(monitor.slowOperations()).toHaveLength(1);
    expect(monitor.generateReport()).toContain('-- Slow Operations (>= 2000ms) --');
  });

  it('keeps the last memory snapshots and clears everything on reset', () => {
    const monitor = new PerformanceMonitor({ maxMemorySnapshots: 2, now: () => 0, logger: fakeLogger().logger });

    monitor.snapshotMemory('one');
    monitor.snapshotMemory('two');
    monitor.snapshotMemory('three');
    monitor.measure('db_write', 'insert', () => undefined);

    expect(monitor.allMemorySnapshots().map((s) => s.label)).toEqual(['two', 'three']);
    expect(monitor.allMemorySnapshots()[1]?.residentBytes).toBeGreaterThan(0);

    monitor.reset();
    expect(monitor.allMemorySnapshots()).toEqual([]);
    expect(monitor.allMeasurements()).toEqual([]);
  });
});
