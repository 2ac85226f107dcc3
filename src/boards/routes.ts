/**
 * Board Routes
 *
 * Board CRUD plus the full board snapshot clients load before subscribing.
 */

import type { FastifyInstance } from 'fastify';
import { requireUser } from '../auth/middleware';
import type { BoardNotifier } from '../realtime/notifier';
import { toCardPayload, type CardPayload, type CardStore } from '../store/cards';
import { toColumnPayload, type ColumnStore } from '../store/columns';
import { toTagPayload, type TagStore } from '../store/tags';
import { badRequest, bodyOf, notFound, parseId, readString, readText } from '../routes/validation';
import type { BoardAccess } from './middleware';
import type { BoardStore } from './store';
import { toBoardPayload, toMemberPayload } from './types';

export const BOARD_TITLE_MAX = 100;

export interface BoardRouteDeps {
  boards: BoardStore;
  columns: ColumnStore;
  cards: CardStore;
  tags: TagStore;
  access: BoardAccess;
  notifier: BoardNotifier;
}

type BoardParams = { Params: { boardId: string } };

export function createBoardRoutes(deps: BoardRouteDeps) {
  const { boards, columns, cards, tags, access, notifier } = deps;

  return async function boardRoutes(app: FastifyInstance) {
    // --- Board CRUD ---

    app.post('/boards', async (req, reply) => {
      const user = requireUser(req, reply);
      if (!user) return;

      const body = bodyOf(req.body);
      const title = readText(body.title);
      if (!title || title.length > BOARD_TITLE_MAX) {
        return badRequest(reply, `title is required (max ${BOARD_TITLE_MAX} characters)`);
      }

      const board = await boards.create(
        { title, description: readString(body.description) ?? null },
        user.id
      );
      return reply.code(201).send({ ...toBoardPayload(board), role: 'owner' });
    });

    app.get('/boards', async (req, reply) => {
      const user = requireUser(req, reply);
      if (!user) return;

      const list = user.isSuperuser ? await boards.listAll() : await boards.listForUser(user.id);
      return {
        boards: list.map((board) => ({ ...toBoardPayload(board), role: board.role })),
        total: list.length,
      };
    });

    app.get<BoardParams>('/boards/:boardId', async (req, reply) => {
      const boardId = parseId(req.params.boardId);
      if (!boardId) return badRequest(reply, 'Invalid board id');

      const ctx = await access.require(req, reply, boardId, 'member');
      if (!ctx) return;

      return { ...toBoardPayload(ctx.board), role: ctx.role };
    });

    // Everything a client needs to render the board
    app.get<BoardParams>('/boards/:boardId/complete', async (req, reply) => {
      const boardId = parseId(req.params.boardId);
      if (!boardId) return badRequest(reply, 'Invalid board id');

      const ctx = await access.require(req, reply, boardId, 'member');
      if (!ctx) return;

      const [columnList, cardList, tagList, members] = await Promise.all([
        columns.listByBoard(boardId),
        cards.listByBoard(boardId),
        tags.listByBoard(boardId),
        boards.listMembers(boardId),
      ]);

      const cardsByColumn = new Map<number, CardPayload[]>();
      for (const card of cardList) {
        const list = cardsByColumn.get(card.columnId) ?? [];
        list.push(toCardPayload(card));
        cardsByColumn.set(card.columnId, list);
      }

      return {
        ...toBoardPayload(ctx.board),
        role: ctx.role,
        columns: columnList.map((column) => ({
          ...toColumnPayload(column),
          cards: cardsByColumn.get(column.id) ?? [],
        })),
        tags: tagList.map(toTagPayload),
        users: members.map(toMemberPayload),
      };
    });

    app.put<BoardParams>('/boards/:boardId', async (req, reply) => {
      const boardId = parseId(req.params.boardId);
      if (!boardId) return badRequest(reply, 'Invalid board id');

      const ctx = await access.require(req, reply, boardId, 'admin');
      if (!ctx) return;

      const body = bodyOf(req.body);
      const title = body.title === undefined ? undefined : readText(body.title);
      if (body.title !== undefined && (!title || title.length > BOARD_TITLE_MAX)) {
        return badRequest(reply, `title must be 1-${BOARD_TITLE_MAX} characters`);
      }
      const description = body.description === null ? null : readString(body.description);

      const updated = await boards.update(boardId, { title, description });
      if (!updated) return notFound(reply, 'Board not found');

      const payload = toBoardPayload(updated);
      notifier.boardUpdated(boardId, payload);
      return { ...payload, role: ctx.role };
    });

    app.delete<BoardParams>('/boards/:boardId', async (req, reply) => {
      const boardId = parseId(req.params.boardId);
      if (!boardId) return badRequest(reply, 'Invalid board id');

      const ctx = await access.require(req, reply, boardId, 'owner');
      if (!ctx) return;

      const deleted = await boards.delete(boardId);
      if (!deleted) return notFound(reply, 'Board not found');

      notifier.boardDeleted(boardId);
      return reply.code(204).send();
    });
  };
}
