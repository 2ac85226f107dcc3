// src/db/index.ts
// Adapter factory: postgres://... → PostgresAdapter, anything else → SqliteAdapter.

import fs from 'node:fs';
import path from 'node:path';
import Database from 'better-sqlite3';
import { getConfig, type DatabaseDriver } from '../config';
import { SqliteAdapter } from './sqlite';
import { PostgresAdapter } from './postgres';
import type { DbAdapter } from './types';

export type { DbAdapter, RunResult } from './types';
export { SqliteAdapter } from './sqlite';
export { PostgresAdapter } from './postgres';

export interface AdapterOptions {
  driver?: DatabaseDriver;
  url?: string;
  /** File path, or ':memory:' for a throwaway database. */
  sqlitePath?: string;
}

export function openSqlite(sqlitePath: string): SqliteAdapter {
  if (sqlitePath !== ':memory:') {
    fs.mkdirSync(path.dirname(path.resolve(sqlitePath)), { recursive: true });
  }
  const rawDb = new Database(sqlitePath);
  if (sqlitePath !== ':memory:') {
    rawDb.pragma('journal_mode = WAL');
  }
  rawDb.pragma('foreign_keys = ON');
  return new SqliteAdapter(rawDb);
}

/** Open a new adapter; options override the environment config. */
export function createAdapter(options: AdapterOptions = {}): DbAdapter {
  const { database } = getConfig();
  const driver = options.driver ?? database.driver;

  if (driver === 'postgresql') {
    return new PostgresAdapter(options.url ?? database.url);
  }
  return openSqlite(options.sqlitePath ?? database.sqlitePath);
}
