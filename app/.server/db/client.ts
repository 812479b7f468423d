import type BetterSqlite3 from 'better-sqlite3';
import { getLogger } from '~/.server/log/logger';
import { StoreError } from '../errors';

type QueryParams = unknown[] | readonly unknown[];

const log = getLogger({ module: 'DBClient' });
const shouldLogQueries = process.env.DB_LOG_QUERIES === '1';

function logQuery(kind: 'select' | 'get' | 'run' | 'tx' | 'exec', sql: string, params: QueryParams): void {
  if (!shouldLogQueries) return;
  log.debug({ kind, sql, params }, 'db query');
}

/**
 * Query helpers over one connection.
 *
 * Reads run directly. Writes go through a FIFO queue: one writer at a time,
 * each inside a SQLite transaction. A write issued from inside another write
 * is rejected rather than nested.
 */
export class DbClient {
  private writeChain: Promise<void> = Promise.resolve();
  private inWrite = false;
  private closed = false;

  constructor(private readonly db: BetterSqlite3.Database) {}

  get path(): string {
    return this.db.name;
  }

  get isOpen(): boolean {
    return !this.closed && this.db.open;
  }

  /**
   * Run a SELECT returning multiple rows
   */
  select<T>(sql: string, params: QueryParams = []): T[] {
    logQuery('select', sql, params);
    return this.db.prepare<unknown[], T>(sql).all(...params);
  }

  /**
   * Run a SELECT returning a single row (or null)
   */
  selectOne<T>(sql: string, params: QueryParams = []): T | null {
    logQuery('get', sql, params);
    const row = this.db.prepare<unknown[], T>(sql).get(...params);
    return row ?? null;
  }

  /**
   * Run INSERT/UPDATE/DELETE. Call from inside write() so it joins the queue.
   */
  run(sql: string, params: QueryParams = []): BetterSqlite3.RunResult {
    logQuery('run', sql, params);
    return this.db.prepare(sql).run(...params);
  }

  /**
   * Queue `fn` behind earlier writes and run it inside a transaction
   */
  write<T>(operation: string, fn: () => T): Promise<T> {
    return this.enqueue(operation, () => {
      logQuery('tx', 'BEGIN', []);
      return this.db.transaction(fn)();
    });
  }

  /**
   * Queue a statement that cannot run inside a transaction (VACUUM)
   */
  maintenance(operation: string, sql: string): Promise<void> {
    return this.enqueue(operation, () => {
      logQuery('exec', sql, []);
      this.db.exec(sql);
    });
  }

  /**
   * Wait for queued writes, then close the connection
   */
  async close(): Promise<void> {
    if (this.closed) return;
    this.closed = true;
    await this.writeChain;
    this.db.close();
  }

  private enqueue<T>(operation: string, fn: () => T): Promise<T> {
    if (this.inWrite) {
      return Promise.reject(new StoreError(operation, new Error('write issued from inside another write')));
    }
    if (this.closed) {
      return Promise.reject(new StoreError(operation, new Error('database is closed')));
    }

    const result = this.writeChain.then(() => {
      this.inWrite = true;
      try {
        return fn();
      } catch (error) {
        log.error({ operation, err: error }, 'db write failed');
        throw new StoreError(operation, error);
      } finally {
        this.inWrite = false;
      }
    });

    // Keep the queue moving after a failed write; the caller still sees the rejection
    this.writeChain = result.then(
      () => undefined,
      () => undefined,
    );
    return result;
  }
}
