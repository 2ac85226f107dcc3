/**
 * Board Store
 *
 * Data access layer for boards and memberships.
 */

import type { DbAdapter } from '../db/types';
import {
  isBoardRole,
  type Board,
  type BoardMember,
  type BoardMemberWithUser,
  type BoardRole,
  type BoardWithRole,
  type CreateBoardInput,
  type UpdateBoardInput,
} from './types';

export interface BoardStore {
  // Board CRUD
  create(input: CreateBoardInput, ownerId: number): Promise<Board>;
  getById(id: number): Promise<Board | null>;
  update(id: number, input: UpdateBoardInput): Promise<Board | null>;
  delete(id: number): Promise<boolean>;

  // Membership
  addMember(boardId: number, userId: number, role: BoardRole): Promise<BoardMember>;
  removeMember(boardId: number, userId: number): Promise<boolean>;
  updateMemberRole(boardId: number, userId: number, role: BoardRole): Promise<BoardMember | null>;
  getMember(boardId: number, userId: number): Promise<BoardMember | null>;
  listMembers(boardId: number): Promise<BoardMemberWithUser[]>;
  transferOwnership(boardId: number, fromUserId: number, toUserId: number): Promise<void>;

  // User's boards
  listForUser(userId: number): Promise<BoardWithRole[]>;
  /** Every board, reported with the owner role (superusers). */
  listAll(): Promise<BoardWithRole[]>;
  getUserRole(boardId: number, userId: number): Promise<BoardRole | null>;
}

interface BoardRow {
  id: number | string;
  title: string;
  description: string | null;
  owner_id: number | string;
  created_at: number | string;
  updated_at: number | string;
}

interface MemberRow {
  board_id: number | string;
  user_id: number | string;
  role: string;
  joined_at: number | string;
}

function rowToBoard(row: BoardRow): Board {
  return {
    id: Number(row.id),
    title: row.title,
    description: row.description,
    ownerId: Number(row.owner_id),
    createdAt: Number(row.created_at),
    updatedAt: Number(row.updated_at),
  };
}

function toRole(value: string): BoardRole {
  // Unknown values in storage degrade to the lowest role
  return isBoardRole(value) ? value : 'member';
}

function rowToMember(row: MemberRow): BoardMember {
  return {
    boardId: Number(row.board_id),
    userId: Number(row.user_id),
    role: toRole(row.role),
    joinedAt: Number(row.joined_at),
  };
}

const BOARD_COLUMNS = 'b.id, b.title, b.description, b.owner_id, b.created_at, b.updated_at';

export function createBoardStore(db: DbAdapter): BoardStore {
  return {
    async create(input: CreateBoardInput, ownerId: number): Promise<Board> {
      const now = Date.now();
      const title = input.title.trim();
      const description = input.description?.trim() || null;

      return db.transaction(async (tx) => {
        const result = await tx.run(
          `INSERT INTO boards (title, description, owner_id, created_at, updated_at)
           VALUES (?, ?, ?, ?, ?) RETURNING id`,
          [title, description, ownerId, now, now]
        );
        const id = Number(result.lastInsertRowid);

        // Creator becomes owner
        await tx.run(
          `INSERT INTO board_users (board_id, user_id, role, joined_at)
           VALUES (?, ?, 'owner', ?)`,
          [id, ownerId, now]
        );

        return { id, title, description, ownerId, createdAt: now, updatedAt: now };
      });
    },

    async getById(id: number): Promise<Board | null> {
      const row = await db.queryOne<BoardRow>(
        `SELECT ${BOARD_COLUMNS} FROM boards b WHERE b.id = ?`,
        [id]
      );
      return row ? rowToBoard(row) : null;
    },

    async update(id: number, input: UpdateBoardInput): Promise<Board | null> {
      const existing = await this.getById(id);
      if (!existing) return null;

      const now = Date.now();
      const title = input.title?.trim() || existing.title;
      const description = input.description !== undefined
        ? (input.description?.trim() || null)
        : existing.description;

      await db.run(
        `UPDATE boards SET title = ?, description = ?, updated_at = ? WHERE id = ?`,
        [title, description, now, id]
      );

      return { ...existing, title, description, updatedAt: now };
    },

    async delete(id: number): Promise<boolean> {
      const result = await db.run(`DELETE FROM boards WHERE id = ?`, [id]);
      return result.changes > 0;
    },

    async addMember(boardId: number, userId: number, role: BoardRole): Promise<BoardMember> {
      const now = Date.now();
      await db.run(
        `INSERT INTO board_users (board_id, user_id, role, joined_at) VALUES (?, ?, ?, ?)`,
        [boardId, userId, role, now]
      );
      return { boardId, userId, role, joinedAt: now };
    },

    async removeMember(boardId: number, userId: number): Promise<boolean> {
      const result = await db.run(
        `DELETE FROM board_users WHERE board_id = ? AND user_id = ?`,
        [boardId, userId]
      );
      return result.changes > 0;
    },

    async updateMemberRole(boardId: number, userId: number, role: BoardRole): Promise<BoardMember | null> {
      const result = await db.run(
        `UPDATE board_users SET role = ? WHERE board_id = ? AND user_id = ?`,
        [role, boardId, userId]
      );
      if (result.changes === 0) return null;
      return this.getMember(boardId, userId);
    },

    async getMember(boardId: number, userId: number): Promise<BoardMember | null> {
      const row = await db.queryOne<MemberRow>(
        `SELECT board_id, user_id, role, joined_at FROM board_users
         WHERE board_id = ? AND user_id = ?`,
        [boardId, userId]
      );
      return row ? rowToMember(row) : null;
    },

    async listMembers(boardId: number): Promise<BoardMemberWithUser[]> {
      const rows = await db.queryAll<MemberRow & { username: string; email: string }>(
        `SELECT bu.board_id, bu.user_id, bu.role, bu.joined_at, u.username, u.email
         FROM board_users bu
         JOIN users u ON u.id = bu.user_id
         WHERE bu.board_id = ?
         ORDER BY bu.joined_at ASC, bu.user_id ASC`,
        [boardId]
      );
      return rows.map((row) => ({ ...rowToMember(row), username: row.username, email: row.email }));
    },

    async transferOwnership(boardId: number, fromUserId: number, toUserId: number): Promise<void> {
      await db.transaction(async (tx) => {
        await tx.run(
          `UPDATE boards SET owner_id = ?, updated_at = ? WHERE id = ?`,
          [toUserId, Date.now(), boardId]
        );
        await tx.run(
          `UPDATE board_users SET role = 'owner' WHERE board_id = ? AND user_id = ?`,
          [boardId, toUserId]
        );
        await tx.run(
          `UPDATE board_users SET role = 'admin' WHERE board_id = ? AND user_id = ?`,
          [boardId, fromUserId]
        );
      });
    },

    async listForUser(userId: number): Promise<BoardWithRole[]> {
      const rows = await db.queryAll<BoardRow & { role: string }>(
        `SELECT ${BOARD_COLUMNS}, bu.role
         FROM boards b
         JOIN board_users bu ON bu.board_id = b.id
         WHERE bu.user_id = ?
         ORDER BY b.updated_at DESC, b.id DESC`,
        [userId]
      );
      return rows.map((row) => ({ ...rowToBoard(row), role: toRole(row.role) }));
    },

    async listAll(): Promise<BoardWithRole[]> {
      const rows = await db.queryAll<BoardRow>(
        `SELECT ${BOARD_COLUMNS} FROM boards b ORDER BY b.updated_at DESC, b.id DESC`
      );
      return rows.map((row) => ({ ...rowToBoard(row), role: 'owner' as const }));
    },

    async getUserRole(boardId: number, userId: number): Promise<BoardRole | null> {
      const member = await this.getMember(boardId, userId);
      return member?.role ?? null;
    },
  };
}
