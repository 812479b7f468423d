import { randomUUID } from 'crypto';
import { afterEach, beforeEach, describe, expect, it, vi } from 'vitest';
import type { RawSample } from '~/types/raw-sample';
import { SqliteSampleStore } from '~/.server/db/sample-store';
import { InMemoryCaptureStorage } from '~/.server/capture/capture-storage';
import {
  AggregationPipeline,
  WATERMARK_KEY,
  groupIntoRuns,
  pickRepresentative,
  runDuration,
  type AggregationRunResult,
} from './pipeline';

const now = new Date(2026, 2, 10, 15, 0, 0).getTime();
const fiveToThree = new Date(2026, 2, 10, 14, 55, 0).getTime();

function sample(timestamp: number, overrides: Partial<RawSample> = {}): RawSample {
  return {
    id: randomUUID(),
    timestamp,
    appName: 'Xcode',
    appIdentifier: 'com.apple.dt.Xcode',
    windowTitle: 'AppDelegate.swift',
    browserUrl: null,
    imagePath: `2026-03-10/${timestamp}.png`,
    extractedText: 'import Foundation',
    textConfidence: 0.9,
    ...overrides,
  };
}

function xcodeSession(count: number, start = fiveToThree): RawSample[] {
  return Array.from({ length: count }, (_, i) => sample(start + i * 30_000));
}

describe('groupIntoRuns', () => {
  it('splits time-ordered samples where the app changes', () => {
    const samples = [
      sample(now + 90_000),
      sample(now),
      sample(now + 60_000, { appName: 'Safari' }),
      sample(now + 30_000),
    ];

    const runs = groupIntoRuns(samples);

    expect(runs.map((run) => run.map((s) => s.timestamp - now))).toEqual([[0, 30_000], [60_000], [90_000]]);
  });

  it('returns no runs for no samples', () => {
    expect(groupIntoRuns([])).toEqual([]);
  });
});

describe('pickRepresentative', () => {
  it('prefers the longest text and the earliest sample on a tie', () => {
    const a = sample(now, { extractedText: 'abc' });
    const b = sample(now + 1, { extractedText: 'abcdef' });
    const c = sample(now + 2, { extractedText: 'uvwxyz' });
    const d = sample(now + 3, { extractedText: null });

    expect(pickRepresentative([a, b, c, d])).toBe(b);
    expect(pickRepresentative([d])).toBe(d);
    expect(pickRepresentative([])).toBeNull();
  });
});

describe('runDuration', () => {
  it('uses the time span or the per-sample floor, whichever is larger', () => {
    expect(runDuration(xcodeSession(5))).toBe(150);
    expect(runDuration([sample(now)])).toBe(30);
    expect(runDuration([sample(now), sample(now + 600_000)])).toBe(600);
  });
});

describe('AggregationPipeline', () => {
  let store: SqliteSampleStore;

  beforeEach(() => {
    vi.useFakeTimers();
    vi.setSystemTime(now);
    store = SqliteSampleStore.open(':memory:');
  });

  afterEach(async () => {
    vi.useRealTimers();
    await store.close();
  });

  async function insertAll(samples: RawSample[]): Promise<void> {
    for (const s of samples) await store.insertRawSample(s);
  }

  it('turns a run of samples into one entry, usage and summary', async () => {
    await insertAll(xcodeSession(5));
    const pipeline = new AggregationPipeline({ store });

    const result = await pipeline.runNow();

    expect(result).toEqual({ status: 'completed', entriesCreated: 1, samplesProcessed: 5, summaryUpdated: true });

    const entries = await store.fetchActivityEntriesForDay(now);
    expect(entries).toHaveLength(1);
    expect(entries[0]).toMatchObject({
      timestamp: fiveToThree,
      appName: 'Xcode',
      icon: 'code',
      title: 'AppDelegate.swift',
      summary: 'Editing AppDelegate.swift in Xcode for 2m 30s.',
      category: 'Development',
      duration: 150,
    });

    const usage = await store.fetchAppUsageForDay(now);
    expect(usage.map((u) => [u.day, u.appName, u.duration, u.category])).toEqual([
      ['2026-03-10', 'Xcode', 150, 'Development'],
    ]);

    const summary = await store.fetchDailySummary(now);
    expect(summary?.activityCount).toBe(1);
    expect(summary?.totalScreenTime).toBe(150);
    expect(summary?.productivityScore).toBeCloseTo(0.95);
    expect(summary?.narrative).toContain('You spent 2 minutes on screen today across 1 activities.');
    expect(summary?.narrative).toContain('Productivity score: 95%, a highly focused day.');

    expect(await store.getSetting(WATERMARK_KEY)).toBe(String(now));
  });

  it('does not reprocess samples on the next run', async () => {
    await insertAll(xcodeSession(5));
    const pipeline = new AggregationPipeline({ store });

    await pipeline.runNow();
    const firstSummary = await store.fetchDailySummary(now);
    vi.setSystemTime(now + 60_000);
    const second = await pipeline.runNow();
    const secondSummary = await store.fetchDailySummary(now);

    expect(second).toEqual({ status: 'completed', entriesCreated: 0, samplesProcessed: 0, summaryUpdated: true });
    expect(await store.fetchActivityEntriesForDay(now)).toHaveLength(1);
    expect((await store.fetchAppUsageForDay(now))[0]?.duration).toBe(150);
    expect(firstSummary?.activityCount).toBe(1);
    expect(secondSummary?.activityCount).toBe(firstSummary?.activityCount);
    expect(secondSummary?.productivityScore).toBe(firstSummary?.productivityScore);
  });

  it('records nothing when the write fails and counts the samples once on retry', async () => {
    await insertAll(xcodeSession(5));
    const pipeline = new AggregationPipeline({ store });
    vi.spyOn(store, 'recordActivities').mockRejectedValueOnce(new Error('disk full'));

    const first = await pipeline.runNow();
    expect(first.status).toBe('failed');
    expect(await store.getSetting(WATERMARK_KEY)).toBeNull();

    const second = await pipeline.runNow();

    expect(second.status).toBe('completed');
    expect(await store.fetchActivityEntriesForDay(now)).toHaveLength(1);
    expect((await store.fetchAppUsageForDay(now)).map((u) => u.duration)).toEqual([150]);
    expect(await store.getSetting(WATERMARK_KEY)).toBe(String(now));
  });

  it('skips samples at or before the stored watermark', async () => {
    await store.setSetting(WATERMARK_KEY, String(fiveToThree));
    await insertAll(xcodeSession(4));
    const pipeline = new AggregationPipeline({ store });

    const result = await pipeline.runNow();

    expect(result.samplesProcessed).toBe(3);
    expect((await store.fetchActivityEntriesForDay(now))[0]?.timestamp).toBe(fiveToThree + 30_000);
  });

  it('gives a single sample the nominal tick duration', async () => {
    await insertAll([sample(fiveToThree, { appName: 'Safari', appIdentifier: 'com.apple.Safari', windowTitle: '' })]);
    const pipeline = new AggregationPipeline({ store, minimumSamples: 1 });

    await pipeline.runNow();

    const [entry] = await store.fetchActivityEntriesForDay(now);
    expect(entry?.duration).toBe(30);
    expect(entry?.title).toBe('Safari');
  });

  it('writes no entries below the minimum but leaves the samples for later', async () => {
    await insertAll(xcodeSession(2));
    const pipeline = new AggregationPipeline({ store, minimumSamples: 3 });

    const result = await pipeline.runNow();

    expect(result).toEqual({ status: 'completed', entriesCreated: 0, samplesProcessed: 0, summaryUpdated: false });
    expect(await store.getSetting(WATERMARK_KEY)).toBeNull();
    expect(await store.fetchDailySummary(now)).toBeNull();

    await insertAll([sample(fiveToThree + 60_000)]);
    expect((await pipeline.runNow()).samplesProcessed).toBe(3);
  });

  it('accumulates usage across runs for the same app', async () => {
    const pipeline = new AggregationPipeline({ store, minimumSamples: 1 });
    await insertAll(xcodeSession(2));
    await pipeline.runNow();

    vi.setSystemTime(now + 10 * 60_000);
    await insertAll([sample(now + 5 * 60_000)]);
    await pipeline.runNow();

    expect((await store.fetchAppUsageForDay(now))[0]?.duration).toBe(90);
    const summary = await store.fetchDailySummary(now);
    expect(summary?.activityCount).toBe(2);
    expect(summary?.totalScreenTime).toBe(90);
  });

  it('deletes source images after the entries are written when enabled', async () => {
    const captureStorage = new InMemoryCaptureStorage();
    const samples: RawSample[] = [];
    for (const s of xcodeSession(3)) {
      const handle = await captureStorage.save({
        id: s.id,
        timestamp: s.timestamp,
        metadata: { appName: s.appName, appIdentifier: s.appIdentifier, windowTitle: s.windowTitle, browserUrl: null },
        image: Buffer.from('png'),
        text: s.extractedText,
        textConfidence: s.textConfidence,
      });
      samples.push({ ...s, imagePath: handle });
    }
    await insertAll(samples);
    const pipeline = new AggregationPipeline({ store, captureStorage, deleteImagesAfterSummarize: true });

    await pipeline.runNow();

    expect(captureStorage.size).toBe(0);
  });

  it('reports a failed run without throwing', async () => {
    vi.spyOn(store, 'fetchRawSamples').mockRejectedValue(new Error('database is locked'));
    const pipeline = new AggregationPipeline({ store });

    const result = await pipeline.runNow();

    expect(result).toEqual({
      status: 'failed',
      entriesCreated: 0,
      samplesProcessed: 0,
      summaryUpdated: false,
      error: 'database is locked',
    });
  });

  it('coalesces requested runs within the debounce window', async () => {
    await insertAll(xcodeSession(5));
    const pipeline = new AggregationPipeline({ store, debounceMs: 5_000 });
    const results: AggregationRunResult[] = [];
    pipeline.on('run', (result: AggregationRunResult) => results.push(result));

    pipeline.requestRun();
    await vi.advanceTimersByTimeAsync(3_000);
    pipeline.requestRun();
    await vi.advanceTimersByTimeAsync(3_000);
    expect(results).toHaveLength(0);

    await vi.advanceTimersByTimeAsync(2_000);
    await pipeline.whenIdle();
    expect(results).toHaveLength(1);
    expect(results[0]?.entriesCreated).toBe(1);
    pipeline.stop();
  });

  it('runs on its own interval once started', async () => {
    const pipeline = new AggregationPipeline({ store, intervalMinutes: 15 });
    const results: AggregationRunResult[] = [];
    pipeline.on('run', (result: AggregationRunResult) => results.push(result));

    pipeline.start();
    await vi.advanceTimersByTimeAsync(15 * 60_000);
    await pipeline.whenIdle();
    expect(results).toHaveLength(1);

    pipeline.stop();
    await vi.advanceTimersByTimeAsync(15 * 60_000);
    expect(results).toHaveLength(1);
    expect(pipeline.isRunning).toBe(false);
  });
});
