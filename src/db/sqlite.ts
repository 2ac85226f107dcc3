// src/db/sqlite.ts
// SQLite adapter: better-sqlite3 behind the async DbAdapter interface.
// better-sqlite3 is synchronous, so every method resolves immediately.

import Database from 'better-sqlite3';
import type { DbAdapter, RunResult } from './types';

export class SqliteAdapter implements DbAdapter {
  readonly dbType = 'sqlite' as const;
  private _db: Database.Database;
  private _inTransaction = false;

  constructor(db: Database.Database) {
    this._db = db;
  }

  /** Underlying handle, for pragmas only. */
  get raw(): Database.Database {
    return this._db;
  }

  queryOne<T = Record<string, unknown>>(
    sql: string,
    params: unknown[] = []
  ): Promise<T | undefined> {
    const row = this._db.prepare(sql).get(...params) as T | undefined;
    return Promise.resolve(row);
  }

  queryAll<T = Record<string, unknown>>(
    sql: string,
    params: unknown[] = []
  ): Promise<T[]> {
    const rows = this._db.prepare(sql).all(...params) as T[];
    return Promise.resolve(rows);
  }

  run(sql: string, params: unknown[] = []): Promise<RunResult> {
    const stmt = this._db.prepare(sql);
    // Statements with RETURNING must be stepped through get(), not run()
    if (stmt.reader) {
      const row = stmt.get(...params) as { id?: number | bigint } | undefined;
      return Promise.resolve({
        changes: row ? 1 : 0,
        lastInsertRowid: row?.id ?? 0,
      });
    }
    const result = stmt.run(...params);
    return Promise.resolve({
      changes: result.changes,
      lastInsertRowid: result.lastInsertRowid,
    });
  }

  exec(sql: string): Promise<void> {
    this._db.exec(sql);
    return Promise.resolve();
  }

  async transaction<T>(fn: (tx: DbAdapter) => Promise<T>): Promise<T> {
    // db.transaction() takes no async callbacks, so BEGIN/COMMIT are issued by hand.
    // Awaits inside fn() can interleave other requests' statements; SQLite is
    // meant for single-node deployments.
    if (this._inTransaction) {
      return fn(this);
    }
    this._inTransaction = true;
    this._db.exec('BEGIN');
    try {
      const result = await fn(this);
      this._db.exec('COMMIT');
      return result;
    } catch (e) {
      if (this._db.inTransaction) {
        this._db.exec('ROLLBACK');
      }
      throw e;
    } finally {
      this._inTransaction = false;
    }
  }

  close(): Promise<void> {
    this._db.close();
    return Promise.resolve();
  }
}
