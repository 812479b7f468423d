import type { DbClient } from './client';

/**
 * Read a single setting value by key
 */
export function getSettingValue(client: DbClient, key: string): string | null {
  const row = client.selectOne<{ value: string }>('SELECT value FROM settings WHERE key = ?', [key]);
  return row ? row.value : null;
}

/**
 * Upsert a single setting value by key
 */
export function setSettingValue(client: DbClient, key: string, value: string): void {
  client.run(
    `
      INSERT INTO settings (key, value, updated_at) VALUES (?, ?, ?)
      ON CONFLICT(key) DO UPDATE SET value = excluded.value, updated_at = excluded.updated_at
    `,
    [key, value, Date.now()]
  );
}

export function deleteSettingValues(client: DbClient, keys: readonly string[]): number {
  let deleted = 0;
  for (const key of keys) {
    deleted += client.run('DELETE FROM settings WHERE key = ?', [key]).changes;
  }
  return deleted;
}
