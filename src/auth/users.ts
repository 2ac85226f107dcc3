/**
 * User Store
 *
 * Accounts with integer ids, unique email and username.
 */

import type { DbAdapter } from '../db/types';
import { createLogger } from '../observability/logger';
import { hashPassword, comparePassword, needsRehash } from './passwords';

const log = createLogger('auth/users');

export interface User {
  id: number;
  email: string;
  username: string;
  passwordHash: string;
  isActive: boolean;
  isSuperuser: boolean;
  createdAt: number;
  updatedAt: number;
}

export interface PublicUser {
  id: number;
  email: string;
  username: string;
  is_active: boolean;
  is_superuser: boolean;
  created_at: string;
}

export interface CreateUserInput {
  email: string;
  username: string;
  password: string;
  isSuperuser?: boolean;
}

export class DuplicateUserError extends Error {
  constructor(readonly field: 'email' | 'username') {
    super(field === 'email' ? 'Email already registered' : 'Username already taken');
    this.name = 'DuplicateUserError';
  }
}

export interface UserStore {
  create(input: CreateUserInput): Promise<User>;
  findById(id: number): Promise<User | undefined>;
  findByEmail(email: string): Promise<User | undefined>;
  findByUsername(username: string): Promise<User | undefined>;
  list(): Promise<User[]>;
  validateCredentials(login: string, password: string): Promise<User | null>;
  updateUsername(id: number, username: string): Promise<void>;
  updatePassword(id: number, newPassword: string): Promise<void>;
  setActive(id: number, active: boolean): Promise<void>;
  /** Memberships, assignments, comments, sessions and owned boards go with the row. */
  delete(id: number): Promise<boolean>;
  toPublic(user: User): PublicUser;
}

interface UserRow {
  id: number | string;
  email: string;
  username: string;
  password_hash: string;
  is_active: number | boolean;
  is_superuser: number | boolean;
  created_at: number | string;
  updated_at: number | string;
}

function rowToUser(row: UserRow): User {
  return {
    id: Number(row.id),
    email: row.email,
    username: row.username,
    passwordHash: row.password_hash,
    isActive: Boolean(Number(row.is_active)),
    isSuperuser: Boolean(Number(row.is_superuser)),
    createdAt: Number(row.created_at),
    updatedAt: Number(row.updated_at),
  };
}

export function createUserStore(db: DbAdapter): UserStore {
  async function findOne(where: string, value: unknown): Promise<User | undefined> {
    const row = await db.queryOne<UserRow>(`SELECT * FROM users WHERE ${where} = ?`, [value]);
    return row ? rowToUser(row) : undefined;
  }

  return {
    async create(input: CreateUserInput): Promise<User> {
      const now = Date.now();
      const email = input.email.toLowerCase();

      if (await findOne('email', email)) {
        throw new DuplicateUserError('email');
      }
      if (await findOne('username', input.username)) {
        throw new DuplicateUserError('username');
      }

      const passwordHash = await hashPassword(input.password);
      const result = await db.run(
        `INSERT INTO users (email, username, password_hash, is_active, is_superuser, created_at, updated_at)
         VALUES (?, ?, ?, 1, ?, ?, ?) RETURNING id`,
        [email, input.username, passwordHash, input.isSuperuser ? 1 : 0, now, now]
      );

      return {
        id: Number(result.lastInsertRowid),
        email,
        username: input.username,
        passwordHash,
        isActive: true,
        isSuperuser: input.isSuperuser ?? false,
        createdAt: now,
        updatedAt: now,
      };
    },

    findById(id: number): Promise<User | undefined> {
      return findOne('id', id);
    },

    findByEmail(email: string): Promise<User | undefined> {
      return findOne('email', email.toLowerCase());
    },

    findByUsername(username: string): Promise<User | undefined> {
      return findOne('username', username);
    },

    async list(): Promise<User[]> {
      const rows = await db.queryAll<UserRow>(`SELECT * FROM users ORDER BY id ASC`);
      return rows.map(rowToUser);
    },

    /** `login` is an email when it contains '@', a username otherwise. */
    async validateCredentials(login: string, password: string): Promise<User | null> {
      const user = login.includes('@')
        ? await this.findByEmail(login)
        : await this.findByUsername(login);
      if (!user || !user.isActive) return null;

      if (!(await comparePassword(password, user.passwordHash))) return null;

      // Bring old hashes up to the current cost while the plaintext is at hand
      if (needsRehash(user.passwordHash)) {
        await this.updatePassword(user.id, password);
        log.info({ userId: user.id }, 'Password rehashed');
      }
      return user;
    },

    async updateUsername(id: number, username: string): Promise<void> {
      const taken = await findOne('username', username);
      if (taken && taken.id !== id) {
        throw new DuplicateUserError('username');
      }
      await db.run(
        `UPDATE users SET username = ?, updated_at = ? WHERE id = ?`,
        [username, Date.now(), id]
      );
    },

    async updatePassword(id: number, newPassword: string): Promise<void> {
      const passwordHash = await hashPassword(newPassword);
      await db.run(
        `UPDATE users SET password_hash = ?, updated_at = ? WHERE id = ?`,
        [passwordHash, Date.now(), id]
      );
    },

    async setActive(id: number, active: boolean): Promise<void> {
      await db.run(
        `UPDATE users SET is_active = ?, updated_at = ? WHERE id = ?`,
        [active ? 1 : 0, Date.now(), id]
      );
    },

    async delete(id: number): Promise<boolean> {
      const result = await db.run(`DELETE FROM users WHERE id = ?`, [id]);
      return result.changes > 0;
    },

    toPublic(user: User): PublicUser {
      return {
        id: user.id,
        email: user.email,
        username: user.username,
        is_active: user.isActive,
        is_superuser: user.isSuperuser,
        created_at: new Date(user.createdAt).toISOString(),
      };
    },
  };
}
