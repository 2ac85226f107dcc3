// src/store/columns.ts
// Board columns, kept in `position` order (exposed as `order`).

import type { DbAdapter } from '../db/types';

// ============================================
// Types
// ============================================

export interface BoardColumn {
  id: number;
  boardId: number;
  title: string;
  order: number;
  createdAt: number;
  updatedAt: number;
}

// API shape, also carried by column events
export type ColumnPayload = {
  id: number;
  board_id: number;
  title: string;
  order: number;
  created_at: string;
  updated_at: string;
};

interface ColumnRow {
  id: number | string;
  board_id: number | string;
  title: string;
  position: number | string;
  created_at: number | string;
  updated_at: number | string;
}

export interface UpdateColumnInput {
  title?: string;
  order?: number;
}

export interface ColumnStore {
  create(boardId: number, title: string, order?: number): Promise<BoardColumn>;
  getById(id: number): Promise<BoardColumn | null>;
  listByBoard(boardId: number): Promise<BoardColumn[]>;
  update(id: number, input: UpdateColumnInput): Promise<BoardColumn | null>;
  delete(id: number): Promise<boolean>;
  /** Position = index in `columnIds`; ids from other boards are ignored. */
  reorder(boardId: number, columnIds: number[]): Promise<BoardColumn[]>;
}

// ============================================
// Mapping
// ============================================

function rowToColumn(row: ColumnRow): BoardColumn {
  return {
    id: Number(row.id),
    boardId: Number(row.board_id),
    title: row.title,
    order: Number(row.position),
    createdAt: Number(row.created_at),
    updatedAt: Number(row.updated_at),
  };
}

export function toColumnPayload(column: BoardColumn): ColumnPayload {
  return {
    id: column.id,
    board_id: column.boardId,
    title: column.title,
    order: column.order,
    created_at: new Date(column.createdAt).toISOString(),
    updated_at: new Date(column.updatedAt).toISOString(),
  };
}

// ============================================
// Store
// ============================================

export function createColumnStore(db: DbAdapter): ColumnStore {
  return {
    async create(boardId, title, order) {
      const now = Date.now();

      let position = order;
      if (position === undefined) {
        // Append after the last column
        const max = await db.queryOne<{ max_pos: number | string | null }>(
          `SELECT MAX(position) AS max_pos FROM board_columns WHERE board_id = ?`,
          [boardId]
        );
        position = Number(max?.max_pos ?? 0) + 1;
      }

      const result = await db.run(
        `INSERT INTO board_columns (board_id, title, position, created_at, updated_at)
         VALUES (?, ?, ?, ?, ?) RETURNING id`,
        [boardId, title, position, now, now]
      );

      return {
        id: Number(result.lastInsertRowid),
        boardId,
        title,
        order: position,
        createdAt: now,
        updatedAt: now,
      };
    },

    async getById(id) {
      const row = await db.queryOne<ColumnRow>(`SELECT * FROM board_columns WHERE id = ?`, [id]);
      return row ? rowToColumn(row) : null;
    },

    async listByBoard(boardId) {
      const rows = await db.queryAll<ColumnRow>(
        `SELECT * FROM board_columns WHERE board_id = ? ORDER BY position ASC, id ASC`,
        [boardId]
      );
      return rows.map(rowToColumn);
    },

    async update(id, input) {
      const existing = await this.getById(id);
      if (!existing) return null;

      const now = Date.now();
      const title = input.title ?? existing.title;
      const order = input.order ?? existing.order;

      await db.run(
        `UPDATE board_columns SET title = ?, position = ?, updated_at = ? WHERE id = ?`,
        [title, order, now, id]
      );
      return { ...existing, title, order, updatedAt: now };
    },

    async delete(id) {
      const result = await db.run(`DELETE FROM board_columns WHERE id = ?`, [id]);
      return result.changes > 0;
    },

    async reorder(boardId, columnIds) {
      const now = Date.now();
      await db.transaction(async (tx) => {
        for (const [index, columnId] of columnIds.entries()) {
          await tx.run(
            `UPDATE board_columns SET position = ?, updated_at = ? WHERE id = ? AND board_id = ?`,
            [index, now, columnId, boardId]
          );
        }
      });
      return this.listByBoard(boardId);
    },
  };
}
