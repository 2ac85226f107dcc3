// src/routes/comments.ts
// Card comments under /boards/:boardId/columns/:columnId/cards/:cardId/comments.

import type { FastifyInstance, FastifyReply, FastifyRequest } from 'fastify';
import type { BoardAccess, BoardContext } from '../boards/middleware';
import { hasPermission } from '../boards/types';
import type { BoardNotifier } from '../realtime/notifier';
import type { CardStore } from '../store/cards';
import type { ColumnStore } from '../store/columns';
import {
  COMMENT_TEXT_MAX,
  toCommentPayload,
  type Comment,
  type CommentStore,
} from '../store/comments';
import { badRequest, bodyOf, forbidden, notFound, parseId, readText } from './validation';

export interface CommentRouteDeps {
  comments: CommentStore;
  cards: CardStore;
  columns: ColumnStore;
  access: BoardAccess;
  notifier: BoardNotifier;
}

type CardParams = { boardId: string; columnId: string; cardId: string };
type CommentParams = CardParams & { commentId: string };

interface CardScope {
  ctx: BoardContext;
  boardId: number;
  cardId: number;
}

export function createCommentRoutes(deps: CommentRouteDeps) {
  const { comments, cards, columns, access, notifier } = deps;

  return async function commentRoutes(app: FastifyInstance) {
    const base = '/boards/:boardId/columns/:columnId/cards/:cardId/comments';

    // Every comment route needs board membership and a card in the named column.
    async function cardScope(
      req: FastifyRequest,
      reply: FastifyReply,
      params: CardParams
    ): Promise<CardScope | null> {
      const boardId = parseId(params.boardId);
      if (!boardId) {
        badRequest(reply, 'Invalid board id');
        return null;
      }
      const ctx = await access.require(req, reply, boardId, 'member');
      if (!ctx) return null;

      const columnId = parseId(params.columnId);
      const column = columnId ? await columns.getById(columnId) : null;
      if (!column || column.boardId !== boardId) {
        notFound(reply, 'Column not found');
        return null;
      }

      const cardId = parseId(params.cardId);
      const card = cardId ? await cards.getById(cardId) : null;
      if (!card || card.columnId !== column.id) {
        notFound(reply, 'Card not found');
        return null;
      }
      return { ctx, boardId, cardId: card.id };
    }

    async function loadComment(reply: FastifyReply, cardId: number, raw: string): Promise<Comment | null> {
      const commentId = parseId(raw);
      const comment = commentId ? await comments.getById(commentId) : null;
      if (!comment || comment.cardId !== cardId) {
        notFound(reply, 'Comment not found');
        return null;
      }
      return comment;
    }

    function readCommentText(body: unknown): string | null {
      const text = readText(bodyOf(body).text);
      if (!text || text.length > COMMENT_TEXT_MAX) return null;
      return text;
    }

    app.get<{ Params: CardParams }>(base, async (req, reply) => {
      const scope = await cardScope(req, reply, req.params);
      if (!scope) return;

      const list = await comments.listByCard(scope.cardId);
      return { comments: list.map(toCommentPayload), total: list.length };
    });

    app.post<{ Params: CardParams }>(base, async (req, reply) => {
      const scope = await cardScope(req, reply, req.params);
      if (!scope) return;

      const text = readCommentText(req.body);
      if (!text) return badRequest(reply, `text is required (max ${COMMENT_TEXT_MAX} characters)`);

      const comment = await comments.create(scope.cardId, scope.ctx.user.id, text);
      const payload = toCommentPayload(comment);
      notifier.commentAdded(scope.boardId, scope.cardId, payload);
      return reply.code(201).send(payload);
    });

    app.put<{ Params: CommentParams }>(`${base}/:commentId`, async (req, reply) => {
      const scope = await cardScope(req, reply, req.params);
      if (!scope) return;

      const comment = await loadComment(reply, scope.cardId, req.params.commentId);
      if (!comment) return;
      if (comment.userId !== scope.ctx.user.id) {
        return forbidden(reply, 'You can only edit your own comments');
      }

      const text = readCommentText(req.body);
      if (!text) return badRequest(reply, `text is required (max ${COMMENT_TEXT_MAX} characters)`);

      const updated = await comments.update(comment.id, text);
      if (!updated) return notFound(reply, 'Comment not found');

      const payload = toCommentPayload(updated);
      notifier.commentUpdated(scope.boardId, scope.cardId, payload);
      return payload;
    });

    app.delete<{ Params: CommentParams }>(`${base}/:commentId`, async (req, reply) => {
      const scope = await cardScope(req, reply, req.params);
      if (!scope) return;

      const comment = await loadComment(reply, scope.cardId, req.params.commentId);
      if (!comment) return;

      const isAuthor = comment.userId === scope.ctx.user.id;
      if (!isAuthor && !hasPermission(scope.ctx.role, 'admin')) {
        return forbidden(reply, 'You can only delete your own comments');
      }

      await comments.delete(comment.id);
      notifier.commentDeleted(scope.boardId, scope.cardId, comment.id);
      return reply.code(204).send();
    });
  };
}
