// src/db/postgres.ts
// PostgreSQL adapter on a `pg` pool. SQL keeps SQLite-style '?' placeholders;
// they are rewritten to '$1, $2, ...' here.

import { Pool, type PoolClient, type QueryResult } from 'pg';
import type { DbAdapter, RunResult } from './types';

/* ---------- Placeholder Conversion ---------- */

/** "WHERE id = ? AND board_id = ?" → "WHERE id = $1 AND board_id = $2" */
export function toPositional(sql: string): string {
  let i = 0;
  return sql.replace(/\?/g, () => `$${++i}`);
}

interface Queryable {
  query(text: string, values?: unknown[]): Promise<QueryResult>;
}

function toRunResult(result: QueryResult): RunResult {
  // BIGSERIAL ids come back as strings
  const lastRow: { id?: unknown } | undefined = result.rows[0];
  const id = lastRow?.id;
  return {
    changes: result.rowCount ?? 0,
    lastInsertRowid: id === undefined || id === null ? 0 : Number(id),
  };
}

/* ---------- Shared query methods ---------- */

abstract class PgQueries implements DbAdapter {
  readonly dbType = 'postgresql' as const;
  protected abstract readonly target: Queryable;

  async queryOne<T = Record<string, unknown>>(
    sql: string,
    params: unknown[] = []
  ): Promise<T | undefined> {
    const result = await this.target.query(toPositional(sql), params);
    return result.rows[0] as T | undefined;
  }

  async queryAll<T = Record<string, unknown>>(
    sql: string,
    params: unknown[] = []
  ): Promise<T[]> {
    const result = await this.target.query(toPositional(sql), params);
    return result.rows as T[];
  }

  async run(sql: string, params: unknown[] = []): Promise<RunResult> {
    return toRunResult(await this.target.query(toPositional(sql), params));
  }

  async exec(sql: string): Promise<void> {
    await this.target.query(sql);
  }

  abstract transaction<T>(fn: (tx: DbAdapter) => Promise<T>): Promise<T>;
  abstract close(): Promise<void>;
}

/* ---------- PostgresAdapter ---------- */

export class PostgresAdapter extends PgQueries {
  protected readonly target: Pool;

  constructor(connectionString: string) {
    super();
    this.target = new Pool({ connectionString, max: 10 });
  }

  async transaction<T>(fn: (tx: DbAdapter) => Promise<T>): Promise<T> {
    const client = await this.target.connect();
    try {
      await client.query('BEGIN');
      const result = await fn(new PostgresTxAdapter(client));
      await client.query('COMMIT');
      return result;
    } catch (e) {
      await client.query('ROLLBACK');
      throw e;
    } finally {
      client.release();
    }
  }

  async close(): Promise<void> {
    await this.target.end();
  }
}

/* ---------- PostgresTxAdapter ---------- */

/** Pinned to one PoolClient so every statement shares the transaction. */
class PostgresTxAdapter extends PgQueries {
  protected readonly target: PoolClient;

  constructor(client: PoolClient) {
    super();
    this.target = client;
  }

  transaction<T>(fn: (tx: DbAdapter) => Promise<T>): Promise<T> {
    return fn(this);
  }

  close(): Promise<void> {
    // The outer adapter releases the client
    return Promise.resolve();
  }
}
