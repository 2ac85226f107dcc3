import { openSqlite, type DbAdapter } from '../../db';
import { MigrationRunner } from '../../migrations/runner';

/** Fresh in-memory SQLite with every migration applied. */
export async function migratedDb(): Promise<DbAdapter> {
  const db = openSqlite(':memory:');
  const { failed } = await new MigrationRunner(db).runAll();
  if (failed) throw new Error(`migration ${failed} failed`);
  return db;
}

/** Insert a user row directly; skips bcrypt for store-level tests. */
export async function insertUser(db: DbAdapter, username: string, isSuperuser = false): Promise<number> {
  const now = Date.now();
  const result = await db.run(
    `INSERT INTO users (email, username, password_hash, is_active, is_superuser, created_at, updated_at)
     VALUES (?, ?, 'not-a-hash', 1, ?, ?, ?) RETURNING id`,
    [`${username}@example.test`, username, isSuperuser ? 1 : 0, now, now]
  );
  return Number(result.lastInsertRowid);
}
