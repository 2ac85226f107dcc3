// src/db/types.ts
// Database adapter interface: one async API over SQLite and PostgreSQL.

/* ---------- Result Types ---------- */

export interface RunResult {
  changes: number;
  lastInsertRowid: number | bigint;
}

/* ---------- DbAdapter Interface ---------- */

/**
 * Unified async database interface.
 * Both SQLite (better-sqlite3) and PostgreSQL (pg) implement this; stores
 * receive an instance from `buildApp` and never touch a driver directly.
 *
 * SQL is written with '?' placeholders. The PostgreSQL adapter rewrites
 * them to '$1, $2, ...' before execution.
 */
export interface DbAdapter {
  /** Identifies the underlying driver for dialect-specific SQL branches. */
  readonly dbType: 'sqlite' | 'postgresql';

  /** First matching row, or undefined. */
  queryOne<T = Record<string, unknown>>(
    sql: string,
    params?: unknown[]
  ): Promise<T | undefined>;

  queryAll<T = Record<string, unknown>>(
    sql: string,
    params?: unknown[]
  ): Promise<T[]>;

  /**
   * INSERT, UPDATE or DELETE.
   * Inserts must end in `RETURNING id` so PostgreSQL can fill lastInsertRowid.
   */
  run(sql: string, params?: unknown[]): Promise<RunResult>;

  /** Raw, parameterless SQL (DDL, multi-statement migration bodies). */
  exec(sql: string): Promise<void>;

  /**
   * Run `fn` atomically. ROLLBACK is issued when it throws.
   * Nested calls on the transaction adapter run inline.
   */
  transaction<T>(fn: (tx: DbAdapter) => Promise<T>): Promise<T>;

  close(): Promise<void>;
}
