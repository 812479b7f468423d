import { afterEach, beforeEach, describe, expect, it, vi } from 'vitest';
import { InMemoryCaptureStorage } from '~/.server/capture/capture-storage';
import { ManualPermissionGate, ScriptedAcquisition, StaticTextRecognizer, type ScriptedFrame } from '~/.server/capture/in-memory';
import { loadSettings } from '~/.server/config/storage';
import { createRuntime, type Runtime } from './init';

const now = new Date(2026, 2, 10, 15, 0, 0).getTime();

const xcodeWindow = {
  appName: 'Xcode',
  appIdentifier: 'com.apple.dt.Xcode',
  windowTitle: 'AppDelegate.swift',
  browserUrl: null,
};

const xcode: ScriptedFrame = { metadata: xcodeWindow, image: Buffer.from('png-bytes') };

describe('Runtime', () => {
  let runtime: Runtime;
  let captures: InMemoryCaptureStorage;
  let permissions: ManualPermissionGate;

  beforeEach(async () => {
    vi.useFakeTimers();
    vi.setSystemTime(now);
    captures = new InMemoryCaptureStorage();
    permissions = new ManualPermissionGate(true);
    runtime = await createRuntime({
      acquisition: new ScriptedAcquisition([xcode]),
      recognizer: new StaticTextRecognizer({ fullText: '', regions: [], language: null, processingTimeMs: 1 }),
      permissions,
      databasePath: ':memory:',
      captureStorage: captures,
      aggregationDebounceMs: 1000,
    });
  });

  afterEach(async () => {
    await runtime.shutdown();
    vi.useRealTimers();
  });

  async function captureFor(ms: number): Promise<void> {
    await runtime.start();
    await vi.advanceTimersByTimeAsync(ms);
    await runtime.scheduler.whenIdle();
    await runtime.pipeline.whenIdle();
  }

  it('builds its services from the stored settings', () => {
    expect(runtime.settings.captureIntervalSeconds).toBe(30);
    expect(runtime.scheduler.interval).toBe(30);
    expect(runtime.scheduler.status).toEqual({ state: 'idle' });
    expect(runtime.retention.policy.rawSampleDays).toBe(30);
  });

  it('aggregates captured samples after the debounce', async () => {
    await captureFor(62_000);

    expect(runtime.scheduler.captureCount).toBe(3);
    const entries = await runtime.store.fetchActivityEntriesForDay(Date.now());
    expect(entries.map((e) => [e.appName, e.title, e.duration])).toEqual([['Xcode', 'AppDelegate.swift', 90]]);
    expect(await runtime.store.fetchAllDailySummaries()).toHaveLength(1);

    const results = await runtime.search('AppDelegate');
    expect(results.filter((r) => r.source === 'activity').map((r) => r.matchedField)).toEqual(['title']);
  });

  it('persists settings and pushes them to the running services', async () => {
    const settings = await runtime.applySettings({
      captureIntervalSeconds: 10,
      excludedApps: ['xcode'],
      retention: { rawSampleDays: 7 },
    });

    expect(settings.captureIntervalSeconds).toBe(10);
    expect(runtime.scheduler.interval).toBe(10);
    expect(runtime.scheduler.isExcluded(xcodeWindow)).toBe(true);
    expect(runtime.retention.policy.rawSampleDays).toBe(7);
    expect((await loadSettings(runtime.store)).captureIntervalSeconds).toBe(10);
  });

  it('stops capture when permission is revoked', async () => {
    await runtime.start();
    await runtime.scheduler.whenIdle();

    permissions.revoke();

    expect(runtime.scheduler.status).toEqual({ state: 'idle' });
  });

  it('purges rows and captures and stops capture', async () => {
    await captureFor(1_000);
    expect(captures.size).toBeGreaterThan(0);

    const result = await runtime.purgeAllData();

    expect(result).toEqual({ complete: true, failures: [], notice: null });
    expect(await runtime.store.countRawSamples()).toBe(0);
    expect(captures.size).toBe(0);
    expect(runtime.scheduler.status).toEqual({ state: 'idle' });
  });

  it('reports an incomplete purge and still deletes the rows', async () => {
    await captureFor(1_000);
    vi.spyOn(captures, 'deleteAllCaptures').mockRejectedValue(new Error('permission denied'));

    const result = await runtime.purgeAllData();

    expect(result).toEqual({
      complete: false,
      failures: ['captures: permission denied'],
      notice: 'Data purge incomplete: captures: permission denied',
    });
    expect(await runtime.store.countRawSamples()).toBe(0);
  });

  it('runs retention and the storage limit together', async () => {
    const result = await runtime.runMaintenance(now);

    expect(result.retention.complete).toBe(true);
    expect(result.bytesFreed).toBe(0);
  });

  it('stops every service on shutdown', async () => {
    await runtime.start();
    await runtime.shutdown();

    expect(runtime.scheduler.status).toEqual({ state: 'idle' });
    expect(runtime.pipeline.isRunning).toBe(false);
  });
});
