/**
 * Full-text query helpers shared by the per-table search functions
 */
import type { DbClient } from './client';
import { FTS_TABLES } from './migrations/002_full_text_search';

const SEARCHABLE = /[\p{L}\p{N}]/u;

/**
 * Build an FTS5 MATCH expression from free user input.
 *
 * Each whitespace-separated token becomes a quoted phrase (embedded quotes
 * doubled) so operators and punctuation in the input are matched literally.
 * Returns null when nothing searchable remains; callers return no rows.
 */
export function toMatchExpression(query: string): string | null {
  const tokens = query
    .trim()
    .split(/\s+/)
    .filter((token) => SEARCHABLE.test(token));

  if (tokens.length === 0) return null;

  return tokens.map((token) => `"${token.replace(/"/g, '""')}"`).join(' ');
}

/**
 * Drop every entry from the FTS indexes. Call from inside a write.
 */
export function clearSearchIndexes(client: DbClient): void {
  for (const fts of FTS_TABLES) {
    client.run(`INSERT INTO ${fts}(${fts}) VALUES ('delete-all')`);
  }
}

/**
 * Merge each index into one segment, dropping entries of deleted rows. Call from inside a write.
 */
export function optimizeSearchIndexes(client: DbClient): void {
  for (const fts of FTS_TABLES) {
    client.run(`INSERT INTO ${fts}(${fts}) VALUES ('optimize')`);
  }
}
