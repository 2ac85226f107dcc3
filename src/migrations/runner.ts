// src/migrations/runner.ts
// Versioned SQL migrations over a DbAdapter.
//
// Files live in <repo>/migrations as NNN_name.sql with up and down SQL
// separated by a "-- DOWN" marker. SQLite DDL is translated for PostgreSQL
// by applyDialectHints() before execution.

import fs from "fs";
import path from "path";
import { createLogger } from "../observability/logger";
import type { DbAdapter } from "../db/types";

const log = createLogger("migrations");

/* ---------- Types ---------- */
export interface Migration {
  version: string;
  name: string;
  up: string;
  down: string;
}

export interface MigrationStatus {
  version: string;
  name: string;
  applied: boolean;
  appliedAt: number | null;
}

/* ---------- Constants ---------- */
const MIGRATION_TABLE = "schema_migrations";
const DOWN_MARKER = "-- DOWN";

export const DEFAULT_MIGRATIONS_DIR = path.resolve(__dirname, "../../migrations");

/* ---------- Dialect Hints ---------- */

/**
 * Translate SQLite DDL for PostgreSQL:
 * PRAGMA lines are commented out and
 * INTEGER PRIMARY KEY AUTOINCREMENT becomes BIGSERIAL PRIMARY KEY.
 */
export function applyDialectHints(sql: string): string {
  return sql
    .split("\n")
    .map((line) => {
      if (/^\s*PRAGMA\s+/i.test(line)) {
        return `-- [pg-skip] ${line}`;
      }
      return line.replace(
        /\bINTEGER\s+PRIMARY\s+KEY\s+AUTOINCREMENT\b/gi,
        "BIGSERIAL PRIMARY KEY"
      );
    })
    .join("\n");
}

/* ---------- File Parsing ---------- */

export function parseMigrationSource(content: string): { up: string; down: string } {
  const markerIndex = content.indexOf(DOWN_MARKER);
  if (markerIndex === -1) {
    return { up: content.trim(), down: "" };
  }
  return {
    up: content.slice(0, markerIndex).trim(),
    down: content.slice(markerIndex + DOWN_MARKER.length).trim(),
  };
}

function parseFilename(filename: string): { version: string; name: string } | null {
  const match = filename.match(/^(\d+)_(.+)\.sql$/);
  if (!match) return null;
  return { version: match[1], name: match[2] };
}

const fullName = (m: Migration) => `${m.version}_${m.name}`;

/* ---------- Runner ---------- */

export class MigrationRunner {
  private adapter: DbAdapter;
  private migrationsDir: string;

  constructor(adapter: DbAdapter, migrationsDir: string = DEFAULT_MIGRATIONS_DIR) {
    this.adapter = adapter;
    this.migrationsDir = migrationsDir;
  }

  async ensureMigrationTable(): Promise<void> {
    const ddl = `CREATE TABLE IF NOT EXISTS ${MIGRATION_TABLE} (
      id INTEGER PRIMARY KEY AUTOINCREMENT,
      name TEXT NOT NULL UNIQUE,
      applied_at BIGINT NOT NULL
    );`;
    await this.adapter.exec(this.dialect(ddl));
  }

  getAllMigrations(): Migration[] {
    if (!fs.existsSync(this.migrationsDir)) return [];
    return fs
      .readdirSync(this.migrationsDir)
      .filter((f) => f.endsWith(".sql"))
      .sort()
      .flatMap((file) => {
        const parsed = parseFilename(file);
        if (!parsed) return [];
        const source = fs.readFileSync(path.join(this.migrationsDir, file), "utf-8");
        return [{ ...parsed, ...parseMigrationSource(source) }];
      });
  }

  async getApplied(): Promise<Array<{ name: string; appliedAt: number }>> {
    await this.ensureMigrationTable();
    const rows = await this.adapter.queryAll<{ name: string; applied_at: number | string }>(
      `SELECT name, applied_at FROM ${MIGRATION_TABLE} ORDER BY id ASC`
    );
    return rows.map((r) => ({ name: r.name, appliedAt: Number(r.applied_at) }));
  }

  async getStatus(): Promise<MigrationStatus[]> {
    const applied = new Map((await this.getApplied()).map((m) => [m.name, m.appliedAt]));
    return this.getAllMigrations().map((m) => {
      const appliedAt = applied.get(fullName(m));
      return {
        version: m.version,
        name: m.name,
        applied: appliedAt !== undefined,
        appliedAt: appliedAt ?? null,
      };
    });
  }

  /** Apply pending migrations in order, stopping at the first failure. */
  async runAll(): Promise<{ applied: string[]; failed: string | null }> {
    const appliedNames = new Set((await this.getApplied()).map((m) => m.name));
    const pending = this.getAllMigrations().filter((m) => !appliedNames.has(fullName(m)));
    const applied: string[] = [];

    for (const migration of pending) {
      const name = fullName(migration);
      try {
        await this.adapter.transaction(async (tx) => {
          await tx.exec(this.dialect(migration.up));
          await tx.run(
            `INSERT INTO ${MIGRATION_TABLE} (name, applied_at) VALUES (?, ?)`,
            [name, Date.now()]
          );
        });
        applied.push(name);
        log.info({ migration: name }, "Applied migration");
      } catch (err) {
        log.error({ err, migration: name }, "Failed to apply migration");
        return { applied, failed: name };
      }
    }

    return { applied, failed: null };
  }

  /** Roll back the most recently applied migration; null when none is applied. */
  async rollbackLast(): Promise<string | null> {
    const applied = await this.getApplied();
    const last = applied[applied.length - 1];
    if (!last) return null;

    const migration = this.getAllMigrations().find((m) => fullName(m) === last.name);
    if (!migration) {
      throw new Error(`Migration ${last.name} not found in ${this.migrationsDir}`);
    }
    if (!migration.down) {
      throw new Error(`Migration ${last.name} has no down migration defined`);
    }

    await this.adapter.transaction(async (tx) => {
      await tx.exec(this.dialect(migration.down));
      await tx.run(`DELETE FROM ${MIGRATION_TABLE} WHERE name = ?`, [last.name]);
    });
    log.info({ migration: last.name }, "Rolled back migration");
    return last.name;
  }

  private dialect(sql: string): string {
    return this.adapter.dbType === "postgresql" ? applyDialectHints(sql) : sql;
  }
}
