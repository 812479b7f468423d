// Database connection and initialization
import Database from 'better-sqlite3';
import type BetterSqlite3 from 'better-sqlite3';
import { dirname, join } from 'path';
import { mkdirSync, existsSync } from 'fs';
import { runMigrations } from './migrations';
import { StorageUnavailableError } from '../errors';

export const IN_MEMORY = ':memory:';

/**
 * Base data directory from SCREENTRAIL_DATA_DIR (default ./data)
 */
export function getDataDir(): string {
  return process.env.SCREENTRAIL_DATA_DIR || './data';
}

/**
 * Get the database file path under the data directory
 */
export function getDatabasePath(dataDir: string = getDataDir()): string {
  return join(dataDir, 'app', 'screentrail', 'database.sqlite');
}

/**
 * Ensure database directory exists
 */
function ensureDatabaseDirectory(dbPath: string): void {
  const dir = dirname(dbPath);

  try {
    if (!existsSync(dir)) {
      mkdirSync(dir, { recursive: true });
    }
  } catch (error) {
    throw new StorageUnavailableError(dir, error);
  }
}

/**
 * Open a database, apply pragmas and run pending migrations.
 * Pass ':memory:' for an in-process database.
 */
export function openDatabase(dbPath: string = getDatabasePath()): BetterSqlite3.Database {
  if (dbPath !== IN_MEMORY) {
    ensureDatabaseDirectory(dbPath);
  }

  const db = new Database(dbPath);

  db.pragma('foreign_keys = ON');

  // WAL lets readers proceed while the single writer commits
  if (dbPath !== IN_MEMORY) {
    db.pragma('journal_mode = WAL');
  }

  // Optimize page cache (64MB)
  db.pragma('cache_size = -64000');

  runMigrations(db);

  return db;
}
