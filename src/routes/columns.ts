// src/routes/columns.ts
// Board columns under /boards/:boardId/columns.

import type { FastifyInstance, FastifyReply } from 'fastify';
import type { BoardAccess } from '../boards/middleware';
import type { BoardNotifier } from '../realtime/notifier';
import { toColumnPayload, type BoardColumn, type ColumnStore } from '../store/columns';
import { badRequest, bodyOf, notFound, parseId, readInt, readIntList, readText } from './validation';

export const COLUMN_TITLE_MAX = 100;

export interface ColumnRouteDeps {
  columns: ColumnStore;
  access: BoardAccess;
  notifier: BoardNotifier;
}

type BoardParams = { Params: { boardId: string } };
type ColumnParams = { Params: { boardId: string; columnId: string } };

export function createColumnRoutes(deps: ColumnRouteDeps) {
  const { columns, access, notifier } = deps;

  return async function columnRoutes(app: FastifyInstance) {
    /** Column that belongs to the board, or null after a 404. */
    async function loadColumn(
      reply: FastifyReply,
      boardId: number,
      rawColumnId: string
    ): Promise<BoardColumn | null> {
      const columnId = parseId(rawColumnId);
      const column = columnId ? await columns.getById(columnId) : null;
      if (!column || column.boardId !== boardId) {
        notFound(reply, 'Column not found');
        return null;
      }
      return column;
    }

    app.get<BoardParams>('/boards/:boardId/columns', async (req, reply) => {
      const boardId = parseId(req.params.boardId);
      if (!boardId) return badRequest(reply, 'Invalid board id');
      if (!(await access.require(req, reply, boardId, 'member'))) return;

      const list = await columns.listByBoard(boardId);
      return { columns: list.map(toColumnPayload), total: list.length };
    });

    app.post<BoardParams>('/boards/:boardId/columns', async (req, reply) => {
      const boardId = parseId(req.params.boardId);
      if (!boardId) return badRequest(reply, 'Invalid board id');
      if (!(await access.require(req, reply, boardId, 'admin'))) return;

      const body = bodyOf(req.body);
      const title = readText(body.title);
      if (!title || title.length > COLUMN_TITLE_MAX) {
        return badRequest(reply, `title is required (max ${COLUMN_TITLE_MAX} characters)`);
      }
      const order = body.order === undefined ? undefined : readInt(body.order);
      if (order === null || (order !== undefined && order < 0)) {
        return badRequest(reply, 'order must be a non-negative integer');
      }

      const column = await columns.create(boardId, title, order);
      const payload = toColumnPayload(column);
      notifier.columnCreated(boardId, payload);
      return reply.code(201).send(payload);
    });

    app.put<BoardParams>('/boards/:boardId/columns/reorder', async (req, reply) => {
      const boardId = parseId(req.params.boardId);
      if (!boardId) return badRequest(reply, 'Invalid board id');
      if (!(await access.require(req, reply, boardId, 'admin'))) return;

      const order = readIntList(bodyOf(req.body).column_order);
      if (!order) return badRequest(reply, 'column_order must be a list of column ids');
      if (new Set(order).size !== order.length) {
        return badRequest(reply, 'column_order contains duplicate ids');
      }

      const reordered = await columns.reorder(boardId, order);
      const payload = reordered.map(toColumnPayload);
      notifier.columnsReordered(boardId, payload);
      return { message: 'Columns reordered successfully', columns: payload };
    });

    app.get<ColumnParams>('/boards/:boardId/columns/:columnId', async (req, reply) => {
      const boardId = parseId(req.params.boardId);
      if (!boardId) return badRequest(reply, 'Invalid board id');
      if (!(await access.require(req, reply, boardId, 'member'))) return;

      const column = await loadColumn(reply, boardId, req.params.columnId);
      if (!column) return;
      return toColumnPayload(column);
    });

    app.put<ColumnParams>('/boards/:boardId/columns/:columnId', async (req, reply) => {
      const boardId = parseId(req.params.boardId);
      if (!boardId) return badRequest(reply, 'Invalid board id');
      if (!(await access.require(req, reply, boardId, 'admin'))) return;

      const column = await loadColumn(reply, boardId, req.params.columnId);
      if (!column) return;

      const body = bodyOf(req.body);
      const title = body.title === undefined ? undefined : readText(body.title);
      if (body.title !== undefined && (!title || title.length > COLUMN_TITLE_MAX)) {
        return badRequest(reply, `title must be 1-${COLUMN_TITLE_MAX} characters`);
      }
      const order = body.order === undefined ? undefined : readInt(body.order);
      if (order === null || (order !== undefined && order < 0)) {
        return badRequest(reply, 'order must be a non-negative integer');
      }

      const updated = await columns.update(column.id, { title, order });
      if (!updated) return notFound(reply, 'Column not found');

      const payload = toColumnPayload(updated);
      notifier.columnUpdated(boardId, payload);
      return payload;
    });

    app.delete<ColumnParams>('/boards/:boardId/columns/:columnId', async (req, reply) => {
      const boardId = parseId(req.params.boardId);
      if (!boardId) return badRequest(reply, 'Invalid board id');
      if (!(await access.require(req, reply, boardId, 'admin'))) return;

      const column = await loadColumn(reply, boardId, req.params.columnId);
      if (!column) return;

      await columns.delete(column.id);
      notifier.columnDeleted(boardId, column.id);
      return reply.code(204).send();
    });
  };
}
