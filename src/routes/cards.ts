// src/routes/cards.ts
// Cards under /boards/:boardId/columns/:columnId/cards, plus the
// board-level move used by drag and drop.

import type { FastifyInstance, FastifyReply, FastifyRequest } from 'fastify';
import type { BoardAccess } from '../boards/middleware';
import type { BoardStore } from '../boards/store';
import type { BoardNotifier } from '../realtime/notifier';
import {
  toCardPayload,
  toDeadlinePayload,
  type Card,
  type CardStore,
  type UpdateCardInput,
} from '../store/cards';
import type { BoardColumn, ColumnStore } from '../store/columns';
import {
  badRequest,
  bodyOf,
  notFound,
  parseId,
  readInt,
  readIntList,
  readString,
  readText,
  readTimestamp,
} from './validation';

export const CARD_TITLE_MAX = 200;
export const CARD_COLOR_MAX = 7;

export interface CardRouteDeps {
  cards: CardStore;
  columns: ColumnStore;
  boards: BoardStore;
  access: BoardAccess;
  notifier: BoardNotifier;
}

type ColumnParams = { Params: { boardId: string; columnId: string } };
type CardParams = { Params: { boardId: string; columnId: string; cardId: string } };
type UnassignParams = { Params: { boardId: string; columnId: string; cardId: string; userId: string } };
type BoardCardParams = { Params: { boardId: string; cardId: string } };

type FieldResult = { input: UpdateCardInput } | { error: string };

/** Read card fields; `requireTitle` for creation. */
function readCardFields(body: Record<string, unknown>, requireTitle: boolean): FieldResult {
  const input: UpdateCardInput = {};

  if (body.title !== undefined || requireTitle) {
    const title = readText(body.title);
    if (!title || title.length > CARD_TITLE_MAX) {
      return { error: `title is required (max ${CARD_TITLE_MAX} characters)` };
    }
    input.title = title;
  }

  if (body.description !== undefined) {
    input.description = body.description === null ? null : readString(body.description) ?? null;
  }

  if (body.color !== undefined) {
    const color = body.color === null ? null : readText(body.color) ?? null;
    if (color !== null && color.length > CARD_COLOR_MAX) {
      return { error: `color must be at most ${CARD_COLOR_MAX} characters` };
    }
    input.color = color;
  }

  if (body.order !== undefined) {
    const order = readInt(body.order);
    if (order === null || order < 0) return { error: 'order must be a non-negative integer' };
    input.order = order;
  }

  if (body.completed !== undefined) {
    if (typeof body.completed !== 'boolean') return { error: 'completed must be a boolean' };
    input.completed = body.completed;
  }

  if (body.deadline !== undefined) {
    const deadline = readTimestamp(body.deadline);
    if (!deadline.ok) return { error: 'deadline must be an ISO-8601 date or null' };
    input.deadline = deadline.value;
  }

  if (body.assigned_users !== undefined) {
    const users = readIntList(body.assigned_users);
    if (!users) return { error: 'assigned_users must be a list of user ids' };
    input.assignedUsers = users;
  }

  return { input };
}

export function createCardRoutes(deps: CardRouteDeps) {
  const { cards, columns, boards, access, notifier } = deps;

  return async function cardRoutes(app: FastifyInstance) {
    const base = '/boards/:boardId/columns/:columnId/cards';

    /**
     * Board role check plus the column ownership check. Replies and
     * returns null when the request cannot proceed.
     */
    async function columnScope(
      req: FastifyRequest,
      reply: FastifyReply,
      params: { boardId: string; columnId: string },
      minRole: 'member' | 'admin'
    ): Promise<{ boardId: number; column: BoardColumn } | null> {
      const boardId = parseId(params.boardId);
      if (!boardId) {
        badRequest(reply, 'Invalid board id');
        return null;
      }
      if (!(await access.require(req, reply, boardId, minRole))) return null;

      const columnId = parseId(params.columnId);
      const column = columnId ? await columns.getById(columnId) : null;
      if (!column) {
        notFound(reply, 'Column not found');
        return null;
      }
      if (column.boardId !== boardId) {
        badRequest(reply, 'Column does not belong to the specified board');
        return null;
      }
      return { boardId, column };
    }

    async function loadCard(reply: FastifyReply, column: BoardColumn, rawCardId: string): Promise<Card | null> {
      const cardId = parseId(rawCardId);
      const card = cardId ? await cards.getById(cardId) : null;
      if (!card) {
        notFound(reply, 'Card not found');
        return null;
      }
      if (card.columnId !== column.id) {
        badRequest(reply, 'Card does not belong to the specified column');
        return null;
      }
      return card;
    }

    /** Shared by both move routes once the card is known to be on the board. */
    async function moveCard(reply: FastifyReply, boardId: number, card: Card, body: Record<string, unknown>) {
      const targetColumnId = readInt(body.column_id);
      const order = readInt(body.order);
      if (targetColumnId === null) return badRequest(reply, 'column_id is required');
      if (order === null || order < 0) return badRequest(reply, 'order must be a non-negative integer');

      const target = await columns.getById(targetColumnId);
      if (!target) return notFound(reply, 'Target column not found');
      if (target.boardId !== boardId) {
        return badRequest(reply, 'Target column does not belong to the specified board');
      }

      const moved = await cards.move(card.id, target.id, order);
      if (!moved) return notFound(reply, 'Card not found');

      const payload = toCardPayload(moved.card);
      notifier.cardMoved(boardId, payload, moved.fromColumnId, moved.card.columnId);
      return payload;
    }

    // --- Column-scoped ---

    app.get<ColumnParams>(base, async (req, reply) => {
      const scope = await columnScope(req, reply, req.params, 'member');
      if (!scope) return;

      const list = await cards.listByColumn(scope.column.id);
      return { cards: list.map(toCardPayload), total: list.length };
    });

    app.post<ColumnParams>(base, async (req, reply) => {
      const scope = await columnScope(req, reply, req.params, 'admin');
      if (!scope) return;

      const fields = readCardFields(bodyOf(req.body), true);
      if ('error' in fields) return badRequest(reply, fields.error);
      const { title, ...rest } = fields.input;
      if (!title) return badRequest(reply, 'title is required');

      const card = await cards.create(scope.column.id, { title, ...rest });
      const payload = toCardPayload(card);
      notifier.cardCreated(scope.boardId, payload);
      return reply.code(201).send(payload);
    });

    app.put<ColumnParams>(`${base}/reorder`, async (req, reply) => {
      const scope = await columnScope(req, reply, req.params, 'admin');
      if (!scope) return;

      const order = readIntList(bodyOf(req.body).card_order);
      if (!order) return badRequest(reply, 'card_order must be a list of card ids');
      if (new Set(order).size !== order.length) {
        return badRequest(reply, 'card_order contains duplicate ids');
      }

      const reordered = await cards.reorder(scope.column.id, order);
      const payload = reordered.map(toCardPayload);
      for (const card of payload) {
        notifier.cardUpdated(scope.boardId, card);
      }
      return { message: 'Cards reordered successfully', cards: payload };
    });

    app.get<CardParams>(`${base}/:cardId`, async (req, reply) => {
      const scope = await columnScope(req, reply, req.params, 'member');
      if (!scope) return;

      const card = await loadCard(reply, scope.column, req.params.cardId);
      if (!card) return;
      return toCardPayload(card);
    });

    app.put<CardParams>(`${base}/:cardId`, async (req, reply) => {
      const scope = await columnScope(req, reply, req.params, 'admin');
      if (!scope) return;

      const card = await loadCard(reply, scope.column, req.params.cardId);
      if (!card) return;

      const fields = readCardFields(bodyOf(req.body), false);
      if ('error' in fields) return badRequest(reply, fields.error);

      const updated = await cards.update(card.id, fields.input);
      if (!updated) return notFound(reply, 'Card not found');

      const payload = toCardPayload(updated);
      notifier.cardUpdated(scope.boardId, payload);
      return payload;
    });

    app.put<CardParams>(`${base}/:cardId/deadline`, async (req, reply) => {
      const scope = await columnScope(req, reply, req.params, 'admin');
      if (!scope) return;

      const card = await loadCard(reply, scope.column, req.params.cardId);
      if (!card) return;

      const body = bodyOf(req.body);
      if (!('deadline' in body)) return badRequest(reply, 'deadline is required');
      const deadline = readTimestamp(body.deadline);
      if (!deadline.ok) return badRequest(reply, 'deadline must be an ISO-8601 date or null');

      const updated = await cards.setDeadline(card.id, deadline.value);
      if (!updated) return notFound(reply, 'Card not found');

      notifier.cardDeadlineUpdated(scope.boardId, updated.id, toDeadlinePayload(updated));
      return toCardPayload(updated);
    });

    app.delete<CardParams>(`${base}/:cardId`, async (req, reply) => {
      const scope = await columnScope(req, reply, req.params, 'admin');
      if (!scope) return;

      const card = await loadCard(reply, scope.column, req.params.cardId);
      if (!card) return;

      await cards.delete(card.id);
      notifier.cardDeleted(scope.boardId, card.id);
      return reply.code(204).send();
    });

    app.put<CardParams>(`${base}/:cardId/move`, async (req, reply) => {
      const scope = await columnScope(req, reply, req.params, 'admin');
      if (!scope) return;

      const card = await loadCard(reply, scope.column, req.params.cardId);
      if (!card) return;

      return moveCard(reply, scope.boardId, card, bodyOf(req.body));
    });

    app.post<CardParams>(`${base}/:cardId/assign`, async (req, reply) => {
      const scope = await columnScope(req, reply, req.params, 'admin');
      if (!scope) return;

      const card = await loadCard(reply, scope.column, req.params.cardId);
      if (!card) return;

      const userId = readInt(bodyOf(req.body).user_id);
      if (userId === null) return badRequest(reply, 'user_id is required');
      if (!(await boards.getMember(scope.boardId, userId))) {
        return badRequest(reply, 'User is not a member of this board');
      }

      if (!(await cards.assign(card.id, userId))) {
        return { message: 'User is already assigned to this card' };
      }

      const updated = await cards.getById(card.id);
      if (updated) notifier.cardUpdated(scope.boardId, toCardPayload(updated));
      return { message: 'User assigned to card successfully' };
    });

    app.delete<UnassignParams>(`${base}/:cardId/unassign/:userId`, async (req, reply) => {
      const scope = await columnScope(req, reply, req.params, 'admin');
      if (!scope) return;

      const card = await loadCard(reply, scope.column, req.params.cardId);
      if (!card) return;

      const userId = parseId(req.params.userId);
      if (!userId) return badRequest(reply, 'Invalid user id');

      if (!(await cards.unassign(card.id, userId))) {
        return notFound(reply, 'User is not assigned to this card');
      }

      const updated = await cards.getById(card.id);
      if (updated) notifier.cardUpdated(scope.boardId, toCardPayload(updated));
      return { message: 'User unassigned from card successfully' };
    });

    app.post<CardParams>(`${base}/:cardId/toggle-completed`, async (req, reply) => {
      const scope = await columnScope(req, reply, req.params, 'member');
      if (!scope) return;

      const card = await loadCard(reply, scope.column, req.params.cardId);
      if (!card) return;

      const updated = await cards.toggleCompleted(card.id);
      if (!updated) return notFound(reply, 'Card not found');

      const payload = toCardPayload(updated);
      notifier.cardUpdated(scope.boardId, payload);
      return payload;
    });

    // --- Board-scoped move (source column not required) ---

    app.put<BoardCardParams>('/boards/:boardId/cards/:cardId/move', async (req, reply) => {
      const boardId = parseId(req.params.boardId);
      if (!boardId) return badRequest(reply, 'Invalid board id');
      if (!(await access.require(req, reply, boardId, 'admin'))) return;

      const cardId = parseId(req.params.cardId);
      const card = cardId ? await cards.getById(cardId) : null;
      if (!card) return notFound(reply, 'Card not found');

      if ((await cards.getBoardId(card.id)) !== boardId) {
        return badRequest(reply, 'Card does not belong to the specified board');
      }

      return moveCard(reply, boardId, card, bodyOf(req.body));
    });
  };
}
