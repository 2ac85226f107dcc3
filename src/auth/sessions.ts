/**
 * Session Management
 *
 * Refresh sessions persisted by token hash for rotation and revocation.
 */

import crypto from 'crypto';
import type { DbAdapter } from '../db/types';
import { getAuthConfig } from './config';

export interface Session {
  id: string;
  userId: number;
  tokenHash: string;
  expiresAt: number;
  createdAt: number;
  revokedAt: number | null;
}

export interface SessionStore {
  create(userId: number, refreshToken: string): Promise<Session>;
  findById(sessionId: string): Promise<Session | undefined>;
  updateTokenHash(sessionId: string, refreshToken: string): Promise<void>;
  revoke(sessionId: string): Promise<void>;
  revokeAllForUser(userId: number): Promise<void>;
  isValid(sessionId: string): Promise<boolean>;
}

interface SessionRow {
  id: string;
  user_id: number | string;
  token_hash: string;
  expires_at: number | string;
  created_at: number | string;
  revoked_at: number | string | null;
}

/** We never store raw tokens. */
export function hashToken(token: string): string {
  return crypto.createHash('sha256').update(token).digest('hex');
}

export function generateSessionId(): string {
  return `ses_${crypto.randomUUID().replace(/-/g, '')}`;
}

function rowToSession(row: SessionRow): Session {
  return {
    id: row.id,
    userId: Number(row.user_id),
    tokenHash: row.token_hash,
    expiresAt: Number(row.expires_at),
    createdAt: Number(row.created_at),
    revokedAt: row.revoked_at === null ? null : Number(row.revoked_at),
  };
}

export function createSessionStore(db: DbAdapter): SessionStore {
  const config = getAuthConfig();

  return {
    async create(userId: number, refreshToken: string): Promise<Session> {
      const now = Date.now();
      const session: Session = {
        id: generateSessionId(),
        userId,
        tokenHash: hashToken(refreshToken),
        expiresAt: now + config.refreshTokenExpiry * 1000,
        createdAt: now,
        revokedAt: null,
      };

      // Revoke the oldest live sessions beyond the per-user cap
      const existingSessions = await db.queryAll<{ id: string }>(
        `SELECT id FROM sessions
         WHERE user_id = ? AND revoked_at IS NULL
         ORDER BY created_at ASC`,
        [userId]
      );

      if (existingSessions.length >= config.maxSessionsPerUser) {
        const toRevoke = existingSessions.slice(
          0,
          existingSessions.length - config.maxSessionsPerUser + 1
        );
        for (const s of toRevoke) {
          await db.run(`UPDATE sessions SET revoked_at = ? WHERE id = ?`, [now, s.id]);
        }
      }

      await db.run(
        `INSERT INTO sessions (id, user_id, token_hash, expires_at, created_at, revoked_at)
         VALUES (?, ?, ?, ?, ?, ?)`,
        [
          session.id,
          session.userId,
          session.tokenHash,
          session.expiresAt,
          session.createdAt,
          session.revokedAt,
        ]
      );

      return session;
    },

    async findById(sessionId: string): Promise<Session | undefined> {
      const row = await db.queryOne<SessionRow>(
        `SELECT * FROM sessions WHERE id = ?`,
        [sessionId]
      );
      return row ? rowToSession(row) : undefined;
    },

    async updateTokenHash(sessionId: string, refreshToken: string): Promise<void> {
      await db.run(
        `UPDATE sessions SET token_hash = ? WHERE id = ?`,
        [hashToken(refreshToken), sessionId]
      );
    },

    async revoke(sessionId: string): Promise<void> {
      await db.run(
        `UPDATE sessions SET revoked_at = ? WHERE id = ? AND revoked_at IS NULL`,
        [Date.now(), sessionId]
      );
    },

    async revokeAllForUser(userId: number): Promise<void> {
      await db.run(
        `UPDATE sessions SET revoked_at = ? WHERE user_id = ? AND revoked_at IS NULL`,
        [Date.now(), userId]
      );
    },

    async isValid(sessionId: string): Promise<boolean> {
      const session = await this.findById(sessionId);
      if (!session) return false;
      if (session.revokedAt !== null) return false;
      return session.expiresAt >= Date.now();
    },
  };
}
