// src/store/tags.ts
// Board-scoped tags and their card assignments.

import type { DbAdapter } from '../db/types';

// ============================================
// Types
// ============================================

export const TAG_NAME_MAX = 50;
export const TAG_COLOR_MAX = 7;

export interface Tag {
  id: number;
  boardId: number;
  name: string;
  color: string | null;
}

export type TagPayload = {
  id: number;
  board_id: number;
  name: string;
  color: string | null;
};

interface TagRow {
  id: number | string;
  board_id: number | string;
  name: string;
  color: string | null;
}

export interface TagStore {
  create(boardId: number, name: string, color: string | null): Promise<Tag>;
  getById(id: number): Promise<Tag | null>;
  listByBoard(boardId: number): Promise<Tag[]>;
  listByCard(cardId: number): Promise<Tag[]>;
  update(id: number, input: { name?: string; color?: string | null }): Promise<Tag | null>;
  delete(id: number): Promise<boolean>;
  /** False when the tag was already attached. */
  attach(cardId: number, tagId: number): Promise<boolean>;
  /** False when the tag was not attached. */
  detach(cardId: number, tagId: number): Promise<boolean>;
}

// ============================================
// Mapping
// ============================================

export function rowToTag(row: TagRow): Tag {
  return {
    id: Number(row.id),
    boardId: Number(row.board_id),
    name: row.name,
    color: row.color,
  };
}

export function toTagPayload(tag: Tag): TagPayload {
  return { id: tag.id, board_id: tag.boardId, name: tag.name, color: tag.color };
}

/** Returns an error message, or null when valid. */
export function validateTagFields(name: string | undefined, color: string | null | undefined): string | null {
  if (name !== undefined && (name.length === 0 || name.length > TAG_NAME_MAX)) {
    return `Tag name must be 1-${TAG_NAME_MAX} characters`;
  }
  if (color !== undefined && color !== null && color.length > TAG_COLOR_MAX) {
    return `Tag color must be at most ${TAG_COLOR_MAX} characters`;
  }
  return null;
}

// ============================================
// Store
// ============================================

export function createTagStore(db: DbAdapter): TagStore {
  return {
    async create(boardId, name, color) {
      const result = await db.run(
        `INSERT INTO tags (board_id, name, color) VALUES (?, ?, ?) RETURNING id`,
        [boardId, name, color]
      );
      return { id: Number(result.lastInsertRowid), boardId, name, color };
    },

    async getById(id) {
      const row = await db.queryOne<TagRow>(`SELECT * FROM tags WHERE id = ?`, [id]);
      return row ? rowToTag(row) : null;
    },

    async listByBoard(boardId) {
      const rows = await db.queryAll<TagRow>(
        `SELECT * FROM tags WHERE board_id = ? ORDER BY name ASC, id ASC`,
        [boardId]
      );
      return rows.map(rowToTag);
    },

    async listByCard(cardId) {
      const rows = await db.queryAll<TagRow>(
        `SELECT t.* FROM tags t
         JOIN card_tags ct ON ct.tag_id = t.id
         WHERE ct.card_id = ?
         ORDER BY t.name ASC, t.id ASC`,
        [cardId]
      );
      return rows.map(rowToTag);
    },

    async update(id, input) {
      const existing = await this.getById(id);
      if (!existing) return null;

      const name = input.name ?? existing.name;
      const color = input.color !== undefined ? input.color : existing.color;
      await db.run(`UPDATE tags SET name = ?, color = ? WHERE id = ?`, [name, color, id]);
      return { ...existing, name, color };
    },

    async delete(id) {
      const result = await db.run(`DELETE FROM tags WHERE id = ?`, [id]);
      return result.changes > 0;
    },

    async attach(cardId, tagId) {
      const existing = await db.queryOne<{ card_id: number }>(
        `SELECT card_id FROM card_tags WHERE card_id = ? AND tag_id = ?`,
        [cardId, tagId]
      );
      if (existing) return false;
      await db.run(`INSERT INTO card_tags (card_id, tag_id) VALUES (?, ?)`, [cardId, tagId]);
      return true;
    },

    async detach(cardId, tagId) {
      const result = await db.run(
        `DELETE FROM card_tags WHERE card_id = ? AND tag_id = ?`,
        [cardId, tagId]
      );
      return result.changes > 0;
    },
  };
}
