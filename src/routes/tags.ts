// src/routes/tags.ts
// Board-scoped tags and their card links under /tags.

import type { FastifyInstance, FastifyReply, FastifyRequest } from 'fastify';
import type { BoardAccess } from '../boards/middleware';
import type { BoardRole } from '../boards/types';
import type { BoardNotifier } from '../realtime/notifier';
import { toCardPayload, type CardStore } from '../store/cards';
import { toTagPayload, validateTagFields, type Tag, type TagStore } from '../store/tags';
import { badRequest, bodyOf, notFound, parseId, readInt, readText } from './validation';

export interface TagRouteDeps {
  tags: TagStore;
  cards: CardStore;
  access: BoardAccess;
  notifier: BoardNotifier;
}

type TagParams = { Params: { tagId: string } };
type TagCardParams = { Params: { tagId: string; cardId: string } };

/** `undefined` when absent, null when cleared. */
function readColor(value: unknown): string | null | undefined {
  if (value === undefined) return undefined;
  if (value === null) return null;
  return readText(value) ?? null;
}

export function createTagRoutes(deps: TagRouteDeps) {
  const { tags, cards, access, notifier } = deps;

  return async function tagRoutes(app: FastifyInstance) {
    /** Tag plus a role check on its board. */
    async function loadTag(
      req: FastifyRequest,
      reply: FastifyReply,
      rawTagId: string,
      minRole: BoardRole
    ): Promise<Tag | null> {
      const tagId = parseId(rawTagId);
      const tag = tagId ? await tags.getById(tagId) : null;
      if (!tag) {
        notFound(reply, 'Tag not found');
        return null;
      }
      if (!(await access.require(req, reply, tag.boardId, minRole))) return null;
      return tag;
    }

    /**
     * Card on the same board as the tag; emits card_updated after a link
     * change. Null means a reply was already sent.
     */
    async function linkCard(
      req: FastifyRequest,
      reply: FastifyReply,
      params: { tagId: string; cardId: string },
      change: (cardId: number, tagId: number) => Promise<boolean>
    ): Promise<boolean | null> {
      const tag = await loadTag(req, reply, params.tagId, 'member');
      if (!tag) return null;

      const cardId = parseId(params.cardId);
      const boardId = cardId ? await cards.getBoardId(cardId) : null;
      if (!cardId || boardId === null) {
        notFound(reply, 'Card not found');
        return null;
      }
      if (boardId !== tag.boardId) {
        badRequest(reply, 'Tag and card must belong to the same board');
        return null;
      }

      const changed = await change(cardId, tag.id);
      if (changed) {
        const card = await cards.getById(cardId);
        if (card) notifier.cardUpdated(tag.boardId, toCardPayload(card));
      }
      return changed;
    }

    app.post('/tags', async (req, reply) => {
      const body = bodyOf(req.body);
      const boardId = readInt(body.board_id);
      if (boardId === null) return badRequest(reply, 'board_id is required');

      const name = readText(body.name) ?? '';
      const color = readColor(body.color);
      const invalid = validateTagFields(name, color);
      if (invalid) return badRequest(reply, invalid);

      if (!(await access.require(req, reply, boardId, 'admin'))) return;

      const tag = await tags.create(boardId, name, color ?? null);
      return reply.code(201).send(toTagPayload(tag));
    });

    app.get<{ Params: { boardId: string } }>('/tags/board/:boardId', async (req, reply) => {
      const boardId = parseId(req.params.boardId);
      if (!boardId) return badRequest(reply, 'Invalid board id');
      if (!(await access.require(req, reply, boardId, 'member'))) return;

      const list = await tags.listByBoard(boardId);
      return { tags: list.map(toTagPayload), total: list.length };
    });

    app.get<{ Params: { cardId: string } }>('/tags/card/:cardId', async (req, reply) => {
      const cardId = parseId(req.params.cardId);
      const boardId = cardId ? await cards.getBoardId(cardId) : null;
      if (!cardId || boardId === null) return notFound(reply, 'Card not found');
      if (!(await access.require(req, reply, boardId, 'member'))) return;

      const list = await tags.listByCard(cardId);
      return { tags: list.map(toTagPayload), total: list.length };
    });

    app.get<TagParams>('/tags/:tagId', async (req, reply) => {
      const tag = await loadTag(req, reply, req.params.tagId, 'member');
      if (!tag) return;
      return toTagPayload(tag);
    });

    app.put<TagParams>('/tags/:tagId', async (req, reply) => {
      const tag = await loadTag(req, reply, req.params.tagId, 'admin');
      if (!tag) return;

      const body = bodyOf(req.body);
      const name = body.name === undefined ? undefined : readText(body.name) ?? '';
      const color = readColor(body.color);
      const invalid = validateTagFields(name, color);
      if (invalid) return badRequest(reply, invalid);

      const updated = await tags.update(tag.id, { name, color });
      if (!updated) return notFound(reply, 'Tag not found');
      return toTagPayload(updated);
    });

    app.delete<TagParams>('/tags/:tagId', async (req, reply) => {
      const tag = await loadTag(req, reply, req.params.tagId, 'admin');
      if (!tag) return;

      await tags.delete(tag.id);
      return reply.code(204).send();
    });

    app.post<TagCardParams>('/tags/:tagId/cards/:cardId', async (req, reply) => {
      const changed = await linkCard(req, reply, req.params, (cardId, tagId) => tags.attach(cardId, tagId));
      if (changed === null) return;
      return {
        message: changed ? 'Tag added to card successfully' : 'Tag is already attached to this card',
      };
    });

    app.delete<TagCardParams>('/tags/:tagId/cards/:cardId', async (req, reply) => {
      const changed = await linkCard(req, reply, req.params, (cardId, tagId) => tags.detach(cardId, tagId));
      if (changed === null) return;
      if (!changed) return notFound(reply, 'Tag is not attached to this card');
      return { message: 'Tag removed from card successfully' };
    });
  };
}
