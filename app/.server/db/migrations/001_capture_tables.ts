import type BetterSqlite3 from 'better-sqlite3';
import { ACTIVITY_CATEGORIES } from '~/types/activity-category';

const CATEGORY_CHECK = ACTIVITY_CATEGORIES.map((category) => `'${category}'`).join(',');

// Tables carry an explicit `seq INTEGER PRIMARY KEY` so the FTS content rowid
// survives VACUUM; `id` stays the public key.
const migration = {
  version: 1,
  description: 'Create raw samples, activity entries, daily summaries, app usage and settings tables',

  up(db: BetterSqlite3.Database) {
    db.exec(`
      CREATE TABLE raw_samples (
        seq INTEGER PRIMARY KEY,
        id TEXT NOT NULL UNIQUE,
        timestamp INTEGER NOT NULL,
        app_name TEXT NOT NULL,
        app_identifier TEXT NOT NULL DEFAULT '',
        window_title TEXT NOT NULL DEFAULT '',
        browser_url TEXT,
        image_path TEXT NOT NULL,
        extracted_text TEXT,
        text_confidence REAL
      );

      CREATE INDEX idx_raw_samples_timestamp ON raw_samples(timestamp);
    `);

    db.exec(`
      CREATE TABLE activity_entries (
        seq INTEGER PRIMARY KEY,
        id TEXT NOT NULL UNIQUE,
        timestamp INTEGER NOT NULL,
        app_name TEXT NOT NULL,
        icon TEXT NOT NULL,
        title TEXT NOT NULL,
        summary TEXT NOT NULL,
        category TEXT NOT NULL CHECK(category IN (${CATEGORY_CHECK})),
        duration REAL NOT NULL CHECK(duration >= 0)
      );

      CREATE INDEX idx_activity_entries_timestamp ON activity_entries(timestamp);
    `);

    db.exec(`
      CREATE TABLE daily_summaries (
        seq INTEGER PRIMARY KEY,
        id TEXT NOT NULL UNIQUE,
        day TEXT NOT NULL UNIQUE,
        total_screen_time REAL NOT NULL DEFAULT 0,
        narrative TEXT NOT NULL,
        activity_count INTEGER NOT NULL DEFAULT 0,
        productivity_score REAL NOT NULL DEFAULT 0 CHECK(productivity_score BETWEEN 0 AND 1)
      );
    `);

    db.exec(`
      CREATE TABLE app_usage (
        id TEXT PRIMARY KEY,
        day TEXT NOT NULL,
        app_name TEXT NOT NULL,
        icon TEXT NOT NULL,
        duration REAL NOT NULL DEFAULT 0,
        category TEXT NOT NULL CHECK(category IN (${CATEGORY_CHECK})),
        UNIQUE(day, app_name)
      );

      CREATE INDEX idx_app_usage_day ON app_usage(day);
    `);

    db.exec(`
      CREATE TABLE IF NOT EXISTS settings (
        key TEXT PRIMARY KEY,
        value TEXT NOT NULL,
        updated_at INTEGER NOT NULL DEFAULT (CAST(strftime('%s','now') AS INTEGER) * 1000)
      );
    `);
  },

  down(db: BetterSqlite3.Database) {
    db.exec(`
      DROP TABLE IF EXISTS settings;
      DROP TABLE IF EXISTS app_usage;
      DROP TABLE IF EXISTS daily_summaries;
      DROP TABLE IF EXISTS activity_entries;
      DROP TABLE IF EXISTS raw_samples;
    `);
  },
};

export default migration;
