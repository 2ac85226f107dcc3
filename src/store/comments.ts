// src/store/comments.ts
// Card comments, returned with the author's username.

import type { DbAdapter } from '../db/types';

// ============================================
// Types
// ============================================

export const COMMENT_TEXT_MAX = 2000;

export interface Comment {
  id: number;
  cardId: number;
  userId: number;
  username: string;
  text: string;
  createdAt: number;
  updatedAt: number;
}

export type CommentPayload = {
  id: number;
  card_id: number;
  user_id: number;
  username: string;
  text: string;
  created_at: string;
  updated_at: string;
};

interface CommentRow {
  id: number | string;
  card_id: number | string;
  user_id: number | string;
  username: string;
  text: string;
  created_at: number | string;
  updated_at: number | string;
}

export interface CommentStore {
  create(cardId: number, userId: number, text: string): Promise<Comment>;
  getById(id: number): Promise<Comment | null>;
  /** Oldest first. */
  listByCard(cardId: number): Promise<Comment[]>;
  update(id: number, text: string): Promise<Comment | null>;
  delete(id: number): Promise<boolean>;
}

// ============================================
// Mapping
// ============================================

function rowToComment(row: CommentRow): Comment {
  return {
    id: Number(row.id),
    cardId: Number(row.card_id),
    userId: Number(row.user_id),
    username: row.username,
    text: row.text,
    createdAt: Number(row.created_at),
    updatedAt: Number(row.updated_at),
  };
}

export function toCommentPayload(comment: Comment): CommentPayload {
  return {
    id: comment.id,
    card_id: comment.cardId,
    user_id: comment.userId,
    username: comment.username,
    text: comment.text,
    created_at: new Date(comment.createdAt).toISOString(),
    updated_at: new Date(comment.updatedAt).toISOString(),
  };
}

const SELECT_COMMENT = `
  SELECT c.id, c.card_id, c.user_id, u.username, c.text, c.created_at, c.updated_at
  FROM comments c
  JOIN users u ON u.id = c.user_id`;

// ============================================
// Store
// ============================================

export function createCommentStore(db: DbAdapter): CommentStore {
  return {
    async create(cardId, userId, text) {
      const now = Date.now();
      const result = await db.run(
        `INSERT INTO comments (card_id, user_id, text, created_at, updated_at)
         VALUES (?, ?, ?, ?, ?) RETURNING id`,
        [cardId, userId, text, now, now]
      );
      const created = await this.getById(Number(result.lastInsertRowid));
      if (!created) throw new Error('Comment vanished after insert');
      return created;
    },

    async getById(id) {
      const row = await db.queryOne<CommentRow>(`${SELECT_COMMENT} WHERE c.id = ?`, [id]);
      return row ? rowToComment(row) : null;
    },

    async listByCard(cardId) {
      const rows = await db.queryAll<CommentRow>(
        `${SELECT_COMMENT} WHERE c.card_id = ? ORDER BY c.created_at ASC, c.id ASC`,
        [cardId]
      );
      return rows.map(rowToComment);
    },

    async update(id, text) {
      const result = await db.run(
        `UPDATE comments SET text = ?, updated_at = ? WHERE id = ?`,
        [text, Date.now(), id]
      );
      return result.changes > 0 ? this.getById(id) : null;
    },

    async delete(id) {
      const result = await db.run(`DELETE FROM comments WHERE id = ?`, [id]);
      return result.changes > 0;
    },
  };
}
