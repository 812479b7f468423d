/**
 * Raw Sample - raw_samples table models
 *
 * One row per successful, non-excluded capture tick. Rows are never
 * updated; retention deletes them.
 */

/**
 * Raw sample row (snake_case - matches SQLite schema exactly)
 *
 * Primary key: seq (stable rowid for the FTS index)
 * Unique constraint: id
 */
export interface RawSampleRow {
  /** UUID */
  id: string;

  /** Epoch ms timestamp of the tick */
  timestamp: number;

  app_name: string;

  /** Bundle or application identifier reported by the window metadata */
  app_identifier: string;

  window_title: string;

  browser_url: string | null;

  /** Storage handle of the captured image (path for file storage) */
  image_path: string;

  extracted_text: string | null;

  /** Mean per-region recognition confidence, 0-1 */
  text_confidence: number | null;
}

/**
 * Raw sample (camelCase - for TypeScript usage)
 */
export interface RawSample {
  id: string;
  timestamp: number;
  appName: string;
  appIdentifier: string;
  windowTitle: string;
  browserUrl: string | null;
  imagePath: string;
  extractedText: string | null;
  textConfidence: number | null;
}

/**
 * Conversion helper: RawSampleRow → RawSample
 */
export function rowToRawSample(row: RawSampleRow): RawSample {
  return {
    id: row.id,
    timestamp: row.timestamp,
    appName: row.app_name,
    appIdentifier: row.app_identifier,
    windowTitle: row.window_title,
    browserUrl: row.browser_url,
    imagePath: row.image_path,
    extractedText: row.extracted_text,
    textConfidence: row.text_confidence,
  };
}
