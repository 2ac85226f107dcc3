// src/store/cards.ts
// Cards with ordering, assignees, deadlines and tags.

import type { DbAdapter } from '../db/types';
import { rowToTag, toTagPayload, type Tag, type TagPayload } from './tags';

// ============================================
// Types
// ============================================

export interface Card {
  id: number;
  columnId: number;
  title: string;
  description: string | null;
  color: string | null;
  order: number;
  completed: boolean;
  deadline: number | null;   // unix ms
  assignedUsers: number[];
  tags: Tag[];
  createdAt: number;
  updatedAt: number;
}

export type CardPayload = {
  id: number;
  column_id: number;
  title: string;
  description: string | null;
  color: string | null;
  order: number;
  completed: boolean;
  deadline: string | null;
  assigned_users: number[];
  tags: TagPayload[];
  created_at: string;
  updated_at: string;
};

/** Data of a card_deadline_updated event. */
export type DeadlinePayload = {
  deadline: string | null;
  is_overdue: boolean;
};

export interface CreateCardInput {
  title: string;
  description?: string | null;
  color?: string | null;
  order?: number;
  completed?: boolean;
  deadline?: number | null;
  assignedUsers?: number[];
}

export type UpdateCardInput = Partial<CreateCardInput>;

export interface MoveResult {
  card: Card;
  fromColumnId: number;
}

interface CardRow {
  id: number | string;
  column_id: number | string;
  title: string;
  description: string | null;
  color: string | null;
  position: number | string;
  completed: number | boolean;
  deadline: number | string | null;
  created_at: number | string;
  updated_at: number | string;
}

export interface CardStore {
  create(columnId: number, input: CreateCardInput): Promise<Card>;
  getById(id: number): Promise<Card | null>;
  listByColumn(columnId: number): Promise<Card[]>;
  listByBoard(boardId: number): Promise<Card[]>;
  /** Board that owns the card's column. */
  getBoardId(cardId: number): Promise<number | null>;
  update(id: number, input: UpdateCardInput): Promise<Card | null>;
  setDeadline(id: number, deadline: number | null): Promise<Card | null>;
  toggleCompleted(id: number): Promise<Card | null>;
  delete(id: number): Promise<boolean>;
  move(id: number, toColumnId: number, newOrder: number): Promise<MoveResult | null>;
  /** Position = index in `cardIds`; ids outside the column are ignored. */
  reorder(columnId: number, cardIds: number[]): Promise<Card[]>;
  assign(cardId: number, userId: number): Promise<boolean>;
  unassign(cardId: number, userId: number): Promise<boolean>;
}

// ============================================
// Mapping
// ============================================

function toIso(ms: number): string {
  return new Date(ms).toISOString();
}

export function toCardPayload(card: Card): CardPayload {
  return {
    id: card.id,
    column_id: card.columnId,
    title: card.title,
    description: card.description,
    color: card.color,
    order: card.order,
    completed: card.completed,
    deadline: card.deadline === null ? null : toIso(card.deadline),
    assigned_users: card.assignedUsers,
    tags: card.tags.map(toTagPayload),
    created_at: toIso(card.createdAt),
    updated_at: toIso(card.updatedAt),
  };
}

export function toDeadlinePayload(card: Card, now: number = Date.now()): DeadlinePayload {
  return {
    deadline: card.deadline === null ? null : toIso(card.deadline),
    is_overdue: card.deadline !== null && !card.completed && card.deadline < now,
  };
}

function placeholders(count: number): string {
  return new Array(count).fill('?').join(', ');
}

// ============================================
// Store
// ============================================

export function createCardStore(db: DbAdapter): CardStore {
  /** Attach assignees and tags to a batch of rows in two queries. */
  async function hydrate(rows: CardRow[], q: DbAdapter = db): Promise<Card[]> {
    if (rows.length === 0) return [];
    const ids = rows.map((r) => Number(r.id));
    const inList = placeholders(ids.length);

    const assignees = await q.queryAll<{ card_id: number | string; user_id: number | string }>(
      `SELECT card_id, user_id FROM card_assignees WHERE card_id IN (${inList}) ORDER BY user_id ASC`,
      ids
    );
    const tagRows = await q.queryAll<{
      card_id: number | string;
      id: number | string;
      board_id: number | string;
      name: string;
      color: string | null;
    }>(
      `SELECT ct.card_id, t.id, t.board_id, t.name, t.color
       FROM card_tags ct JOIN tags t ON t.id = ct.tag_id
       WHERE ct.card_id IN (${inList})
       ORDER BY t.name ASC, t.id ASC`,
      ids
    );

    const usersByCard = new Map<number, number[]>();
    for (const a of assignees) {
      const list = usersByCard.get(Number(a.card_id)) ?? [];
      list.push(Number(a.user_id));
      usersByCard.set(Number(a.card_id), list);
    }
    const tagsByCard = new Map<number, Tag[]>();
    for (const t of tagRows) {
      const list = tagsByCard.get(Number(t.card_id)) ?? [];
      list.push(rowToTag(t));
      tagsByCard.set(Number(t.card_id), list);
    }

    return rows.map((row) => {
      const id = Number(row.id);
      return {
        id,
        columnId: Number(row.column_id),
        title: row.title,
        description: row.description,
        color: row.color,
        order: Number(row.position),
        completed: Boolean(Number(row.completed)),
        deadline: row.deadline === null ? null : Number(row.deadline),
        assignedUsers: usersByCard.get(id) ?? [],
        tags: tagsByCard.get(id) ?? [],
        createdAt: Number(row.created_at),
        updatedAt: Number(row.updated_at),
      };
    });
  }

  async function loadOne(id: number, q: DbAdapter = db): Promise<Card | null> {
    const row = await q.queryOne<CardRow>(`SELECT * FROM cards WHERE id = ?`, [id]);
    if (!row) return null;
    const [card] = await hydrate([row], q);
    return card ?? null;
  }

  async function replaceAssignees(q: DbAdapter, cardId: number, userIds: number[]): Promise<void> {
    await q.run(`DELETE FROM card_assignees WHERE card_id = ?`, [cardId]);
    for (const userId of new Set(userIds)) {
      await q.run(`INSERT INTO card_assignees (card_id, user_id) VALUES (?, ?)`, [cardId, userId]);
    }
  }

  return {
    async create(columnId, input) {
      const now = Date.now();

      return db.transaction(async (tx) => {
        let position = input.order;
        if (position === undefined) {
          // Append after the last card
          const max = await tx.queryOne<{ max_pos: number | string | null }>(
            `SELECT MAX(position) AS max_pos FROM cards WHERE column_id = ?`,
            [columnId]
          );
          position = Number(max?.max_pos ?? 0) + 1;
        }

        const result = await tx.run(
          `INSERT INTO cards (column_id, title, description, color, position, completed, deadline, created_at, updated_at)
           VALUES (?, ?, ?, ?, ?, ?, ?, ?, ?) RETURNING id`,
          [
            columnId,
            input.title,
            input.description ?? null,
            input.color ?? null,
            position,
            input.completed ? 1 : 0,
            input.deadline ?? null,
            now,
            now,
          ]
        );
        const id = Number(result.lastInsertRowid);

        if (input.assignedUsers?.length) {
          await replaceAssignees(tx, id, input.assignedUsers);
        }

        const card = await loadOne(id, tx);
        if (!card) throw new Error(`Card ${id} vanished after insert`);
        return card;
      });
    },

    getById(id) {
      return loadOne(id);
    },

    async listByColumn(columnId) {
      const rows = await db.queryAll<CardRow>(
        `SELECT * FROM cards WHERE column_id = ? ORDER BY position ASC, id ASC`,
        [columnId]
      );
      return hydrate(rows);
    },

    async listByBoard(boardId) {
      const rows = await db.queryAll<CardRow>(
        `SELECT c.* FROM cards c
         JOIN board_columns bc ON bc.id = c.column_id
         WHERE bc.board_id = ?
         ORDER BY bc.position ASC, c.position ASC, c.id ASC`,
        [boardId]
      );
      return hydrate(rows);
    },

    async getBoardId(cardId) {
      const row = await db.queryOne<{ board_id: number | string }>(
        `SELECT bc.board_id FROM cards c
         JOIN board_columns bc ON bc.id = c.column_id
         WHERE c.id = ?`,
        [cardId]
      );
      return row ? Number(row.board_id) : null;
    },

    async update(id, input) {
      return db.transaction(async (tx) => {
        const existing = await loadOne(id, tx);
        if (!existing) return null;

        await tx.run(
          `UPDATE cards
           SET title = ?, description = ?, color = ?, position = ?, completed = ?, deadline = ?, updated_at = ?
           WHERE id = ?`,
          [
            input.title ?? existing.title,
            input.description !== undefined ? input.description : existing.description,
            input.color !== undefined ? input.color : existing.color,
            input.order ?? existing.order,
            (input.completed ?? existing.completed) ? 1 : 0,
            input.deadline !== undefined ? input.deadline : existing.deadline,
            Date.now(),
            id,
          ]
        );

        if (input.assignedUsers !== undefined) {
          await replaceAssignees(tx, id, input.assignedUsers);
        }

        return loadOne(id, tx);
      });
    },

    async setDeadline(id, deadline) {
      const result = await db.run(
        `UPDATE cards SET deadline = ?, updated_at = ? WHERE id = ?`,
        [deadline, Date.now(), id]
      );
      return result.changes > 0 ? loadOne(id) : null;
    },

    async toggleCompleted(id) {
      const result = await db.run(
        `UPDATE cards SET completed = CASE WHEN completed = 0 THEN 1 ELSE 0 END, updated_at = ? WHERE id = ?`,
        [Date.now(), id]
      );
      return result.changes > 0 ? loadOne(id) : null;
    },

    async delete(id) {
      const result = await db.run(`DELETE FROM cards WHERE id = ?`, [id]);
      return result.changes > 0;
    },

    async move(id, toColumnId, newOrder) {
      return db.transaction(async (tx) => {
        const card = await loadOne(id, tx);
        if (!card) return null;

        const now = Date.now();
        const fromColumnId = card.columnId;

        // Close the gap left in the source column
        await tx.run(
          `UPDATE cards SET position = position - 1, updated_at = ?
           WHERE column_id = ? AND position > ? AND id <> ?`,
          [now, fromColumnId, card.order, id]
        );
        // Make room in the target column
        await tx.run(
          `UPDATE cards SET position = position + 1, updated_at = ?
           WHERE column_id = ? AND position >= ? AND id <> ?`,
          [now, toColumnId, newOrder, id]
        );
        await tx.run(
          `UPDATE cards SET column_id = ?, position = ?, updated_at = ? WHERE id = ?`,
          [toColumnId, newOrder, now, id]
        );

        const moved = await loadOne(id, tx);
        if (!moved) return null;
        return { card: moved, fromColumnId };
      });
    },

    async reorder(columnId, cardIds) {
      const now = Date.now();
      await db.transaction(async (tx) => {
        for (const [index, cardId] of cardIds.entries()) {
          await tx.run(
            `UPDATE cards SET position = ?, updated_at = ? WHERE id = ? AND column_id = ?`,
            [index, now, cardId, columnId]
          );
        }
      });
      return this.listByColumn(columnId);
    },

    async assign(cardId, userId) {
      const existing = await db.queryOne<{ card_id: number }>(
        `SELECT card_id FROM card_assignees WHERE card_id = ? AND user_id = ?`,
        [cardId, userId]
      );
      if (existing) return false;
      await db.run(`INSERT INTO card_assignees (card_id, user_id) VALUES (?, ?)`, [cardId, userId]);
      return true;
    },

    async unassign(cardId, userId) {
      const result = await db.run(
        `DELETE FROM card_assignees WHERE card_id = ? AND user_id = ?`,
        [cardId, userId]
      );
      return result.changes > 0;
    },
  };
}
