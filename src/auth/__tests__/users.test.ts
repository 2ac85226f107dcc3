import bcrypt from 'bcrypt';
import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import type { DbAdapter } from '../../db';
import { migratedDb } from '../../__tests__/helpers/db';
import { createUserStore, type UserStore } from '../users';

describe('UserStore', () => {
  let db: DbAdapter;
  let users: UserStore;

  beforeEach(async () => {
    db = await migratedDb();
    users = createUserStore(db);
  });

  afterEach(async () => {
    await db.close();
  });

  it('accepts either the email or the username as login', async () => {
    const created = await users.create({ email: 'dana@example.test', username: 'dana', password: 'placeholder1' });

    expect((await users.validateCredentials('dana@example.test', 'placeholder1'))?.id).toBe(created.id);
    expect((await users.validateCredentials('dana', 'placeholder1'))?.id).toBe(created.id);
    expect(await users.validateCredentials('dana', 'placeholder2')).toBeNull();
  });

  it('rehashes a password stored at an older cost on login', async () => {
    const created = await users.create({ email: 'dana@example.test', username: 'dana', password: 'placeholder1' });
    await db.run(`UPDATE users SET password_hash = ? WHERE id = ?`, [await bcrypt.hash('placeholder1', 5), created.id]);

    expect(await users.validateCredentials('dana', 'placeholder1')).not.toBeNull();

    const stored = await users.findById(created.id);
    expect(stored && bcrypt.getRounds(stored.passwordHash)).toBe(4);
  });

  it('refuses inactive users', async () => {
    const created = await users.create({ email: 'dana@example.test', username: 'dana', password: 'placeholder1' });
    await users.setActive(created.id, false);

    expect(await users.validateCredentials('dana', 'placeholder1')).toBeNull();
  });

  it('deletes a user and reports whether a row went', async () => {
    const created = await users.create({ email: 'dana@example.test', username: 'dana', password: 'placeholder1' });

    expect(await users.delete(created.id)).toBe(true);
    expect(await users.delete(created.id)).toBe(false);
    expect(await users.findById(created.id)).toBeUndefined();
  });
});
