/**
 * Scripted collaborators for running capture without a window server
 */

import type {
  PermissionGate,
  ScreenAcquisition,
  TextRecognition,
  TextRecognizer,
  WindowMetadata,
} from './types';

export interface ScriptedFrame {
  metadata: WindowMetadata | null;
  image: Buffer | null;
}

/**
 * Replays one frame per tick (advanced on each metadata read), then keeps
 * returning the last one. Counts calls so callers can assert which steps a
 * tick reached.
 */
export class ScriptedAcquisition implements ScreenAcquisition {
  metadataReads = 0;
  screenshots = 0;
  private index = 0;
  private frame: ScriptedFrame | undefined;

  constructor(private readonly frames: ScriptedFrame[]) {}

  async readFrontmostWindowMetadata(): Promise<WindowMetadata | null> {
    this.metadataReads += 1;
    this.frame = this.frames[this.index];
    this.index = Math.min(this.index + 1, Math.max(this.frames.length - 1, 0));
    return this.frame?.metadata ?? null;
  }

  async captureActiveWindow(): Promise<Buffer | null> {
    this.screenshots += 1;
    return this.frame?.image ?? null;
  }
}

/**
 * Returns the same recognition for every image
 */
export class StaticTextRecognizer implements TextRecognizer {
  calls = 0;

  constructor(private readonly recognition: TextRecognition) {}

  async recognizeText(): Promise<TextRecognition> {
    this.calls += 1;
    return this.recognition;
  }
}

export class ManualPermissionGate implements PermissionGate {
  requests = 0;
  private readonly listeners = new Set<() => void>();

  constructor(private granted = true) {}

  async isGranted(): Promise<boolean> {
    return this.granted;
  }

  async request(): Promise<void> {
    this.requests += 1;
  }

  onRevoked(listener: () => void): () => void {
    this.listeners.add(listener);
    return () => this.listeners.delete(listener);
  }

  grant(): void {
    this.granted = true;
  }

  revoke(): void {
    this.granted = false;
    for (const listener of this.listeners) listener();
  }
}
