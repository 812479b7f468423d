/**
 * Raw sample operations
 *
 * Append-only; rows leave only through retention or a full purge.
 */

import type { DbClient } from './client';
import type { RawSample, RawSampleRow } from '~/types/raw-sample';
import { rowToRawSample } from '~/types/raw-sample';
import { toMatchExpression } from './fts';

export type { RawSample, RawSampleRow };

const COLUMNS = `r.id, r.timestamp, r.app_name, r.app_identifier, r.window_title,
  r.browser_url, r.image_path, r.extracted_text, r.text_confidence`;

export function insertRawSample(client: DbClient, sample: RawSample): void {
  client.run(
    `INSERT INTO raw_samples
      (id, timestamp, app_name, app_identifier, window_title, browser_url, image_path, extracted_text, text_confidence)
     VALUES (?, ?, ?, ?, ?, ?, ?, ?, ?)`,
    [
      sample.id,
      sample.timestamp,
      sample.appName,
      sample.appIdentifier,
      sample.windowTitle,
      sample.browserUrl,
      sample.imagePath,
      sample.extractedText,
      sample.textConfidence,
    ]
  );
}

/**
 * Samples with from <= timestamp <= to, newest first
 */
export function listRawSamples(client: DbClient, from: number, to: number): RawSample[] {
  return client
    .select<RawSampleRow>(
      `SELECT ${COLUMNS} FROM raw_samples r
       WHERE r.timestamp >= ? AND r.timestamp <= ?
       ORDER BY r.timestamp DESC, r.seq DESC`,
      [from, to]
    )
    .map(rowToRawSample);
}

export function listImagePathsOlderThan(client: DbClient, cutoff: number): string[] {
  return client
    .select<{ image_path: string }>(
      'SELECT image_path FROM raw_samples WHERE timestamp < ? ORDER BY timestamp ASC',
      [cutoff]
    )
    .map((row) => row.image_path);
}

export function deleteRawSamplesOlderThan(client: DbClient, cutoff: number): number {
  return client.run('DELETE FROM raw_samples WHERE timestamp < ?', [cutoff]).changes;
}

export function countRawSamples(client: DbClient): number {
  return client.selectOne<{ count: number }>('SELECT COUNT(*) as count FROM raw_samples')?.count ?? 0;
}

export function searchRawSamples(client: DbClient, query: string, limit: number): RawSample[] {
  const match = toMatchExpression(query);
  if (!match || limit <= 0) return [];

  return client
    .select<RawSampleRow>(
      `SELECT ${COLUMNS} FROM raw_samples_fts
       JOIN raw_samples r ON r.seq = raw_samples_fts.rowid
       WHERE raw_samples_fts MATCH ?
       ORDER BY raw_samples_fts.rank
       LIMIT ?`,
      [match, limit]
    )
    .map(rowToRawSample);
}
