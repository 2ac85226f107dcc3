import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { createBoardStore } from '../../boards/store';
import type { DbAdapter } from '../../db';
import { insertUser, migratedDb } from '../../__tests__/helpers/db';
import { createCardStore, toCardPayload, toDeadlinePayload, type Card, type CardStore } from '../cards';
import { createColumnStore } from '../columns';
import { createTagStore } from '../tags';

describe('CardStore', () => {
  let db: DbAdapter;
  let cards: CardStore;
  let ownerId: number;
  let boardId: number;
  let todo: number;
  let done: number;

  beforeEach(async () => {
    db = await migratedDb();
    cards = createCardStore(db);
    ownerId = await insertUser(db, 'owner');
    boardId = (await createBoardStore(db).create({ title: 'Sprint' }, ownerId)).id;
    const columns = createColumnStore(db);
    todo = (await columns.create(boardId, 'To do')).id;
    done = (await columns.create(boardId, 'Done')).id;
  });

  afterEach(async () => {
    await db.close();
  });

  async function titles(columnId: number): Promise<Array<[string, number]>> {
    return (await cards.listByColumn(columnId)).map((c) => [c.title, c.order]);
  }

  /* ============= create ============= */

  describe('create', () => {
    it('appends after the highest position when no order is given', async () => {
      await cards.create(todo, { title: 'a' });
      await cards.create(todo, { title: 'b', order: 5 });
      const c = await cards.create(todo, { title: 'c' });

      expect(c.order).toBe(6);
      expect(await titles(todo)).toEqual([['a', 1], ['b', 5], ['c', 6]]);
    });

    it('stores assignees once each', async () => {
      const other = await insertUser(db, 'other');
      const card = await cards.create(todo, { title: 'a', assignedUsers: [other, ownerId, other] });
      expect(card.assignedUsers).toEqual([ownerId, other]);
    });

    it('defaults to not completed and no deadline', async () => {
      const card = await cards.create(todo, { title: 'a' });
      expect(card.completed).toBe(false);
      expect(card.deadline).toBeNull();
      expect(card.description).toBeNull();
    });
  });

  /* ============= move ============= */

  describe('move', () => {
    it('moves within a column without duplicate positions', async () => {
      const a = await cards.create(todo, { title: 'a' });
      await cards.create(todo, { title: 'b' });
      await cards.create(todo, { title: 'c' });

      const moved = await cards.move(a.id, todo, 3);

      expect(moved?.fromColumnId).toBe(todo);
      expect(await titles(todo)).toEqual([['b', 1], ['c', 2], ['a', 3]]);
    });

    it('closes the gap in the source and makes room in the target', async () => {
      await cards.create(todo, { title: 'a' });
      const b = await cards.create(todo, { title: 'b' });
      await cards.create(todo, { title: 'c' });
      await cards.create(done, { title: 'x' });

      const moved = await cards.move(b.id, done, 0);

      expect(moved?.fromColumnId).toBe(todo);
      expect(moved?.card.columnId).toBe(done);
      expect(await titles(todo)).toEqual([['a', 1], ['c', 2]]);
      expect(await titles(done)).toEqual([['b', 0], ['x', 2]]);
    });

    it('returns null for an unknown card', async () => {
      expect(await cards.move(999, done, 0)).toBeNull();
    });
  });

  /* ============= reorder ============= */

  describe('reorder', () => {
    it('sets positions from list indexes and ignores foreign ids', async () => {
      const a = await cards.create(todo, { title: 'a' });
      const b = await cards.create(todo, { title: 'b' });
      const x = await cards.create(done, { title: 'x' });

      const result = await cards.reorder(todo, [x.id, b.id, a.id]);

      expect(result.map((c) => [c.title, c.order])).toEqual([['b', 1], ['a', 2]]);
      expect((await cards.getById(x.id))?.order).toBe(1);
    });
  });

  /* ============= updates ============= */

  describe('update', () => {
    it('changes only the fields given', async () => {
      const card = await cards.create(todo, { title: 'a', description: 'keep', color: '#fff' });

      const updated = await cards.update(card.id, { title: 'renamed', color: null });

      expect(updated?.title).toBe('renamed');
      expect(updated?.description).toBe('keep');
      expect(updated?.color).toBeNull();
    });

    it('replaces assignees when a list is given', async () => {
      const other = await insertUser(db, 'other');
      const card = await cards.create(todo, { title: 'a', assignedUsers: [ownerId] });

      expect((await cards.update(card.id, { assignedUsers: [other] }))?.assignedUsers).toEqual([other]);
      expect((await cards.update(card.id, { title: 'b' }))?.assignedUsers).toEqual([other]);
    });

    it('returns null for an unknown card', async () => {
      expect(await cards.update(999, { title: 'x' })).toBeNull();
    });

    it('toggles completion back and forth', async () => {
      const card = await cards.create(todo, { title: 'a' });
      expect((await cards.toggleCompleted(card.id))?.completed).toBe(true);
      expect((await cards.toggleCompleted(card.id))?.completed).toBe(false);
    });

    it('sets and clears the deadline', async () => {
      const card = await cards.create(todo, { title: 'a' });
      const deadline = Date.UTC(2030, 0, 15, 12);

      expect((await cards.setDeadline(card.id, deadline))?.deadline).toBe(deadline);
      expect((await cards.setDeadline(card.id, null))?.deadline).toBeNull();
      expect(await cards.setDeadline(999, deadline)).toBeNull();
    });
  });

  /* ============= assignees and tags ============= */

  describe('assignees and tags', () => {
    it('assign reports whether anything changed', async () => {
      const card = await cards.create(todo, { title: 'a' });

      expect(await cards.assign(card.id, ownerId)).toBe(true);
      expect(await cards.assign(card.id, ownerId)).toBe(false);
      expect(await cards.unassign(card.id, ownerId)).toBe(true);
      expect(await cards.unassign(card.id, ownerId)).toBe(false);
    });

    it('hydrates tags sorted by name', async () => {
      const tags = createTagStore(db);
      const card = await cards.create(todo, { title: 'a' });
      const urgent = await tags.create(boardId, 'urgent', '#f00');
      const backend = await tags.create(boardId, 'backend', null);
      await tags.attach(card.id, urgent.id);
      await tags.attach(card.id, backend.id);

      const loaded = await cards.getById(card.id);
      expect(loaded?.tags.map((t) => t.name)).toEqual(['backend', 'urgent']);
    });
  });

  /* ============= lookups ============= */

  describe('lookups', () => {
    it('resolves the board of a card', async () => {
      const card = await cards.create(done, { title: 'a' });
      expect(await cards.getBoardId(card.id)).toBe(boardId);
      expect(await cards.getBoardId(999)).toBeNull();
    });

    it('lists a board by column position, then card position', async () => {
      await cards.create(done, { title: 'x' });
      await cards.create(todo, { title: 'b', order: 2 });
      await cards.create(todo, { title: 'a', order: 1 });

      expect((await cards.listByBoard(boardId)).map((c) => c.title)).toEqual(['a', 'b', 'x']);
    });

    it('deletes', async () => {
      const card = await cards.create(todo, { title: 'a' });
      expect(await cards.delete(card.id)).toBe(true);
      expect(await cards.getById(card.id)).toBeNull();
      expect(await cards.delete(card.id)).toBe(false);
    });
  });
});

/* ============= payloads ============= */

describe('card payloads', () => {
  const base: Card = {
    id: 1,
    columnId: 2,
    title: 'a',
    description: null,
    color: null,
    order: 0,
    completed: false,
    deadline: Date.UTC(2026, 0, 1),
    assignedUsers: [3],
    tags: [],
    createdAt: Date.UTC(2025, 11, 1),
    updatedAt: Date.UTC(2025, 11, 2),
  };
  const now = Date.UTC(2026, 0, 2);

  it('formats dates as ISO strings', () => {
    expect(toCardPayload(base)).toEqual({
      id: 1,
      column_id: 2,
      title: 'a',
      description: null,
      color: null,
      order: 0,
      completed: false,
      deadline: '2026-01-01T00:00:00.000Z',
      assigned_users: [3],
      tags: [],
      created_at: '2025-12-01T00:00:00.000Z',
      updated_at: '2025-12-02T00:00:00.000Z',
    });
  });

  it('marks a past deadline on an open card as overdue', () => {
    expect(toDeadlinePayload(base, now)).toEqual({ deadline: '2026-01-01T00:00:00.000Z', is_overdue: true });
  });

  it('never marks completed cards or future deadlines as overdue', () => {
    expect(toDeadlinePayload({ ...base, completed: true }, now).is_overdue).toBe(false);
    expect(toDeadlinePayload({ ...base, deadline: now + 1 }, now).is_overdue).toBe(false);
    expect(toDeadlinePayload({ ...base, deadline: null }, now)).toEqual({ deadline: null, is_overdue: false });
  });
});
