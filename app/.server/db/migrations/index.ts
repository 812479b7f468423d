// Migration registry
import type BetterSqlite3 from 'better-sqlite3';
import migration001 from './001_capture_tables';
import migration002 from './002_full_text_search';
import { getLogger } from '~/.server/log/logger';

const log = getLogger({ module: 'DBMigrations' });

export interface Migration {
  version: number;
  description: string;
  up: (db: BetterSqlite3.Database) => void;
  down: (db: BetterSqlite3.Database) => void;
}

// Export all migrations in order
export const migrations: Migration[] = [
  migration001,
  migration002,
];

/**
 * Run pending migrations
 */
export function runMigrations(db: BetterSqlite3.Database): void {
  // Ensure schema_version table exists (bootstrap)
  db.exec(`
    CREATE TABLE IF NOT EXISTS schema_version (
      version INTEGER PRIMARY KEY,
      applied_at TEXT DEFAULT CURRENT_TIMESTAMP,
      description TEXT
    );
  `);

  const currentVersion = getCurrentSchemaVersion(db);

  const pendingMigrations = migrations.filter((m) => m.version > currentVersion);

  if (pendingMigrations.length === 0) {
    log.debug({ currentVersion }, 'migrations up to date');
    return;
  }

  const latest = pendingMigrations[pendingMigrations.length - 1];
  log.info({ count: pendingMigrations.length, from: currentVersion, to: latest?.version }, 'running pending migrations');

  // Run each migration in a transaction
  for (const migration of pendingMigrations) {
    const transaction = db.transaction(() => {
      log.info({ version: migration.version, description: migration.description }, 'applying migration');

      migration.up(db);

      db.prepare(
        'INSERT INTO schema_version (version, description) VALUES (?, ?)'
      ).run(migration.version, migration.description);
    });

    transaction();
  }

  log.info({}, 'all migrations completed');
}

/**
 * Get current schema version
 */
export function getCurrentSchemaVersion(db: BetterSqlite3.Database): number {
  const row = db
    .prepare<[], { version: number | null }>('SELECT MAX(version) as version FROM schema_version')
    .get();
  return row?.version ?? 0;
}

/**
 * Rollback last migration (for development only)
 */
export function rollbackLastMigration(db: BetterSqlite3.Database): void {
  const currentVersion = getCurrentSchemaVersion(db);
  const migration = migrations.find((m) => m.version === currentVersion);

  if (!migration) {
    log.warn({ currentVersion }, 'no migration to roll back');
    return;
  }

  const transaction = db.transaction(() => {
    log.info({ version: migration.version }, 'rolling back migration');
    migration.down(db);
    db.prepare('DELETE FROM schema_version WHERE version = ?').run(migration.version);
  });

  transaction();
}
