import type BetterSqlite3 from 'better-sqlite3';

interface FtsIndex {
  table: string;
  columns: string[];
}

const INDEXES: FtsIndex[] = [
  { table: 'raw_samples', columns: ['extracted_text', 'app_name', 'window_title'] },
  { table: 'activity_entries', columns: ['title', 'summary'] },
  { table: 'daily_summaries', columns: ['narrative'] },
];

function createIndex(db: BetterSqlite3.Database, { table, columns }: FtsIndex): void {
  const fts = `${table}_fts`;
  const columnList = columns.join(', ');
  const newValues = columns.map((c) => `new.${c}`).join(', ');
  const oldValues = columns.map((c) => `old.${c}`).join(', ');

  db.exec(`
    CREATE VIRTUAL TABLE ${fts} USING fts5(
      ${columnList},
      content='${table}',
      content_rowid='seq',
      tokenize='porter unicode61'
    );

    CREATE TRIGGER ${table}_fts_insert AFTER INSERT ON ${table} BEGIN
      INSERT INTO ${fts}(rowid, ${columnList}) VALUES (new.seq, ${newValues});
    END;

    CREATE TRIGGER ${table}_fts_delete AFTER DELETE ON ${table} BEGIN
      INSERT INTO ${fts}(${fts}, rowid, ${columnList}) VALUES ('delete', old.seq, ${oldValues});
    END;

    CREATE TRIGGER ${table}_fts_update AFTER UPDATE ON ${table} BEGIN
      INSERT INTO ${fts}(${fts}, rowid, ${columnList}) VALUES ('delete', old.seq, ${oldValues});
      INSERT INTO ${fts}(rowid, ${columnList}) VALUES (new.seq, ${newValues});
    END;
  `);

  // Index rows that predate the virtual table
  db.exec(`INSERT INTO ${fts}(${fts}) VALUES ('rebuild');`);
}

const migration = {
  version: 2,
  description: 'Add FTS5 indexes for raw samples, activity entries and daily summaries',

  up(db: BetterSqlite3.Database) {
    for (const index of INDEXES) {
      createIndex(db, index);
    }
  },

  down(db: BetterSqlite3.Database) {
    for (const { table } of INDEXES) {
      db.exec(`
        DROP TRIGGER IF EXISTS ${table}_fts_insert;
        DROP TRIGGER IF EXISTS ${table}_fts_delete;
        DROP TRIGGER IF EXISTS ${table}_fts_update;
        DROP TABLE IF EXISTS ${table}_fts;
      `);
    }
  },
};

export default migration;

export const FTS_TABLES = INDEXES.map(({ table }) => `${table}_fts`);
