/**
 * Collaborator contracts for capture: window metadata, screenshots, text
 * recognition and the OS permission gate. Platform adapters implement these.
 */

export interface WindowMetadata {
  appName: string;
  /** Bundle or application identifier */
  appIdentifier: string;
  windowTitle: string;
  browserUrl: string | null;
}

export interface ScreenAcquisition {
  /** Image bytes of the active window, or null when nothing could be captured */
  captureActiveWindow(): Promise<Buffer | null>;
  readFrontmostWindowMetadata(): Promise<WindowMetadata | null>;
}

export interface BoundingBox {
  /** Normalized 0-1 coordinates */
  x: number;
  y: number;
  width: number;
  height: number;
}

export interface TextRegion {
  text: string;
  /** 0-1 */
  confidence: number;
  boundingBox: BoundingBox;
}

export interface TextRecognition {
  fullText: string;
  regions: TextRegion[];
  language: string | null;
  processingTimeMs: number;
}

export interface TextRecognizer {
  recognizeText(image: Buffer): Promise<TextRecognition>;
}

export interface PermissionGate {
  isGranted(): Promise<boolean>;
  /** Ask the OS for access; the answer arrives later through isGranted */
  request(): Promise<void>;
  /** Register a listener for revocation; returns an unsubscribe function */
  onRevoked(listener: () => void): () => void;
}

/**
 * Mean region confidence, or null when there are no regions
 */
export function averageConfidence(recognition: TextRecognition): number | null {
  if (recognition.regions.length === 0) return null;
  const total = recognition.regions.reduce((sum, region) => sum + region.confidence, 0);
  return total / recognition.regions.length;
}
