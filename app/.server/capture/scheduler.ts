// Capture scheduler
// Periodic capture of the frontmost window: metadata, exclusion check, screenshot,
// optional text extraction, artifact save and raw sample insert.

import { randomUUID } from 'crypto';
import { EventEmitter } from 'events';
import type { RawSample } from '~/types/raw-sample';
import type { SampleStore } from '~/.server/db/sample-store';
import type { PerformanceMonitor } from '~/.server/instrumentation/performance-monitor';
import { clampCaptureInterval } from '~/.server/config/settings';
import { getLogger } from '~/.server/log/logger';
import { errorMessage } from '../errors';
import type { CaptureStorage } from './capture-storage';
import {
  averageConfidence,
  type PermissionGate,
  type ScreenAcquisition,
  type TextRecognizer,
  type WindowMetadata,
} from './types';

const log = getLogger({ module: 'CaptureScheduler' });

export type CaptureStatus =
  | { state: 'idle' }
  | { state: 'capturing' }
  | { state: 'paused' }
  | { state: 'permission-denied' }
  | { state: 'error'; message: string };

export type RawSampleSink = Pick<SampleStore, 'insertRawSample'>;

export interface SampleCapturedEvent {
  sample: RawSample;
  /** Storage handle of the saved image */
  handle: string;
}

export interface CaptureSchedulerOptions {
  acquisition: ScreenAcquisition;
  recognizer: TextRecognizer;
  permissions: PermissionGate;
  storage: CaptureStorage;
  sink: RawSampleSink;
  intervalSeconds?: number;
  excludedApps?: readonly string[];
  textExtractionEnabled?: boolean;
  monitor?: PerformanceMonitor;
}

function normalizeExclusions(apps: readonly string[]): Set<string> {
  return new Set(apps.map((app) => app.trim().toLowerCase()).filter((app) => app.length > 0));
}

/**
 * Capture scheduler
 * Emits 'status' (CaptureStatus) on every transition and 'sample' (SampleCapturedEvent)
 * after each persisted capture.
 */
export class CaptureScheduler extends EventEmitter {
  private readonly acquisition: ScreenAcquisition;
  private readonly recognizer: TextRecognizer;
  private readonly permissions: PermissionGate;
  private readonly storage: CaptureStorage;
  private readonly sink: RawSampleSink;
  private readonly monitor: PerformanceMonitor | undefined;

  private currentStatus: CaptureStatus = { state: 'idle' };
  private intervalSeconds: number;
  private exclusions: Set<string>;
  private textExtractionEnabled: boolean;

  private timer: NodeJS.Timeout | null = null;
  private tickChain: Promise<void> = Promise.resolve();
  private tickQueued = false;
  private unsubscribeRevocation: (() => void) | null = null;

  private count = 0;
  private last: RawSample | null = null;

  constructor(options: CaptureSchedulerOptions) {
    super();
    this.acquisition = options.acquisition;
    this.recognizer = options.recognizer;
    this.permissions = options.permissions;
    this.storage = options.storage;
    this.sink = options.sink;
    this.monitor = options.monitor;
    this.intervalSeconds = clampCaptureInterval(options.intervalSeconds ?? 30);
    this.exclusions = normalizeExclusions(options.excludedApps ?? []);
    this.textExtractionEnabled = options.textExtractionEnabled ?? true;
  }

  get status(): CaptureStatus {
    return this.currentStatus;
  }

  get captureCount(): number {
    return this.count;
  }

  get lastSample(): RawSample | null {
    return this.last;
  }

  get interval(): number {
    return this.intervalSeconds;
  }

  /**
   * Begin capturing. Without permission the scheduler moves to permission-denied
   * and asks the gate for access.
   */
  async start(): Promise<void> {
    const { state } = this.currentStatus;
    if (state === 'capturing') return;
    if (state === 'paused') {
      this.resume();
      return;
    }

    let granted: boolean;
    try {
      granted = await this.permissions.isGranted();
    } catch (error) {
      log.error({ err: errorMessage(error) }, 'permission check failed');
      granted = false;
    }

    if (!granted) {
      this.setStatus({ state: 'permission-denied' });
      await this.permissions.request();
      return;
    }

    if (!this.unsubscribeRevocation) {
      this.unsubscribeRevocation = this.permissions.onRevoked(() => {
        log.warn({}, 'capture permission revoked');
        this.stop();
      });
    }

    this.setStatus({ state: 'capturing' });
    this.schedule();
  }

  pause(): void {
    if (this.currentStatus.state !== 'capturing') return;
    this.clearTimer();
    this.setStatus({ state: 'paused' });
  }

  resume(): void {
    if (this.currentStatus.state !== 'paused') return;
    this.setStatus({ state: 'capturing' });
    this.schedule();
  }

  stop(): void {
    this.clearTimer();
    if (this.unsubscribeRevocation) {
      this.unsubscribeRevocation();
      this.unsubscribeRevocation = null;
    }
    this.setStatus({ state: 'idle' });
  }

  async toggle(): Promise<void> {
    switch (this.currentStatus.state) {
      case 'capturing':
        this.pause();
        return;
      case 'paused':
        this.resume();
        return;
      default:
        await this.start();
    }
  }

  /**
   * Change the period; while capturing the timer restarts and a tick fires at once.
   * Returns the clamped value in seconds.
   */
  updateInterval(seconds: number): number {
    this.intervalSeconds = clampCaptureInterval(seconds);
    if (this.currentStatus.state === 'capturing') {
      this.schedule();
    }
    return this.intervalSeconds;
  }

  updateExclusions(apps: readonly string[]): void {
    this.exclusions = normalizeExclusions(apps);
  }

  updateTextExtraction(enabled: boolean): void {
    this.textExtractionEnabled = enabled;
  }

  isExcluded(metadata: WindowMetadata): boolean {
    return (
      this.exclusions.has(metadata.appName.trim().toLowerCase()) ||
      this.exclusions.has(metadata.appIdentifier.trim().toLowerCase())
    );
  }

  /**
   * Resolves once every queued tick has finished
   */
  whenIdle(): Promise<void> {
    return this.tickChain;
  }

  private setStatus(status: CaptureStatus): void {
    const previous = this.currentStatus;
    this.currentStatus = status;
    if (previous.state !== status.state || status.state === 'error') {
      log.info({ from: previous.state, to: status.state }, 'capture status changed');
    }
    this.emit('status', status);
  }

  private schedule(): void {
    this.clearTimer();
    this.timer = setInterval(() => this.enqueueTick(), this.intervalSeconds * 1000);
    this.enqueueTick();
  }

  private clearTimer(): void {
    if (this.timer) {
      clearInterval(this.timer);
      this.timer = null;
    }
  }

  private enqueueTick(): void {
    // At most one tick waits behind the running one
    if (this.tickQueued) return;
    this.tickQueued = true;
    this.tickChain = this.tickChain
      .then(async () => {
        this.tickQueued = false;
        if (this.currentStatus.state !== 'capturing') return;
        await this.runTick();
      })
      .catch((error: unknown) => {
        log.error({ err: errorMessage(error) }, 'capture tick failed');
      });
  }

  private async runTick(): Promise<void> {
    if (this.monitor) {
      await this.monitor.measureAsync('capture_pipeline', 'tick', () => this.captureOnce());
    } else {
      await this.captureOnce();
    }
  }

  private async measured<T>(category: 'metadata' | 'screenshot' | 'ocr' | 'db_write', fn: () => Promise<T>): Promise<T> {
    return this.monitor ? this.monitor.measureAsync(category, category, fn) : fn();
  }

  private async acquireFrame(): Promise<{ metadata: WindowMetadata; image: Buffer } | null> {
    try {
      const metadata = await this.measured('metadata', () => this.acquisition.readFrontmostWindowMetadata());
      if (!metadata) {
        log.debug({}, 'no frontmost window, skipping tick');
        return null;
      }
      if (this.isExcluded(metadata)) {
        log.debug({ appName: metadata.appName }, 'excluded app, skipping tick');
        return null;
      }
      const image = await this.measured('screenshot', () => this.acquisition.captureActiveWindow());
      if (!image) {
        log.debug({ appName: metadata.appName }, 'no image captured, skipping tick');
        return null;
      }
      return { metadata, image };
    } catch (error) {
      log.warn({ err: errorMessage(error) }, 'window acquisition failed, skipping tick');
      return null;
    }
  }

  private async extractText(image: Buffer, appName: string): Promise<{ text: string | null; confidence: number | null }> {
    if (!this.textExtractionEnabled) return { text: null, confidence: null };
    try {
      const recognition = await this.measured('ocr', () => this.recognizer.recognizeText(image));
      return {
        text: recognition.fullText.trim().length > 0 ? recognition.fullText : null,
        confidence: averageConfidence(recognition),
      };
    } catch (error) {
      log.warn({ appName, err: errorMessage(error) }, 'text extraction failed');
      return { text: null, confidence: null };
    }
  }

  private async captureOnce(): Promise<void> {
    const frame = await this.acquireFrame();
    if (!frame) return;
    const { metadata, image } = frame;
    const { text, confidence } = await this.extractText(image, metadata.appName);

    const id = randomUUID();
    const timestamp = Date.now();
    let event: SampleCapturedEvent;

    try {
      event = await this.measured('db_write', async () => {
        const handle = await this.storage.save({ id, timestamp, metadata, image, text, textConfidence: confidence });
        const sample: RawSample = {
          id,
          timestamp,
          appName: metadata.appName,
          appIdentifier: metadata.appIdentifier,
          windowTitle: metadata.windowTitle,
          browserUrl: metadata.browserUrl,
          imagePath: handle,
          extractedText: text,
          textConfidence: confidence,
        };
        try {
          await this.sink.insertRawSample(sample);
        } catch (error) {
          await this.discardImage(handle);
          throw error;
        }
        return { sample, handle };
      });
    } catch (error) {
      const message = errorMessage(error);
      log.error({ appName: metadata.appName, err: message }, 'failed to persist capture');
      this.clearTimer();
      this.setStatus({ state: 'error', message });
      return;
    }

    this.count += 1;
    this.last = event.sample;
    this.emit('sample', event);
  }

  private async discardImage(handle: string): Promise<void> {
    try {
      await this.storage.deleteImage(handle);
    } catch (error) {
      log.warn({ handle, err: errorMessage(error) }, 'failed to remove image of unsaved capture');
    }
  }
}
