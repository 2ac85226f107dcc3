// src/routes/users.ts
// User directory, self-service profile updates and account removal.

import type { FastifyInstance } from 'fastify';
import { requireUser } from '../auth/middleware';
import { validatePasswordStrength } from '../auth/passwords';
import { USERNAME_RE } from '../auth/routes';
import { DuplicateUserError, type UserStore } from '../auth/users';
import type { BoardStore } from '../boards/store';
import type { BoardNotifier } from '../realtime/notifier';
import { badRequest, bodyOf, conflict, forbidden, notFound, parseId, readString, readText } from './validation';

export interface UserRouteDeps {
  users: UserStore;
  boards: BoardStore;
  notifier: BoardNotifier;
}

export function createUserRoutes({ users, boards, notifier }: UserRouteDeps) {
  return async function userRoutes(app: FastifyInstance) {
    app.get('/users', async (req, reply) => {
      const current = requireUser(req, reply);
      if (!current) return;
      if (!current.isSuperuser) return forbidden(reply, 'Superuser privileges required');

      const list = await users.list();
      return { users: list.map((user) => users.toPublic(user)), total: list.length };
    });

    app.patch('/users/me', async (req, reply) => {
      const current = requireUser(req, reply);
      if (!current) return;

      const body = bodyOf(req.body);
      const username = body.username === undefined ? undefined : readText(body.username);
      const password = body.password === undefined ? undefined : readString(body.password);

      if (body.username !== undefined && (!username || !USERNAME_RE.test(username))) {
        return badRequest(reply, 'Username must be 3-50 letters, digits, dots, dashes or underscores');
      }
      if (body.password !== undefined) {
        const passwordError = validatePasswordStrength(password ?? '');
        if (passwordError) return badRequest(reply, passwordError);
      }

      try {
        if (username) await users.updateUsername(current.id, username);
      } catch (err) {
        if (err instanceof DuplicateUserError) return conflict(reply, err.message);
        throw err;
      }
      if (password) await users.updatePassword(current.id, password);

      const user = await users.findById(current.id);
      if (!user) return notFound(reply, 'User not found');
      return users.toPublic(user);
    });

    app.get<{ Params: { userId: string } }>('/users/:userId', async (req, reply) => {
      if (!requireUser(req, reply)) return;

      const userId = parseId(req.params.userId);
      if (!userId) return badRequest(reply, 'Invalid user id');

      const user = await users.findById(userId);
      if (!user) return notFound(reply, 'User not found');
      return users.toPublic(user);
    });

    // Self or superuser. Owned boards are deleted with the account.
    app.delete<{ Params: { userId: string } }>('/users/:userId', async (req, reply) => {
      const current = requireUser(req, reply);
      if (!current) return;

      const userId = parseId(req.params.userId);
      if (!userId) return badRequest(reply, 'Invalid user id');
      if (!current.isSuperuser && current.id !== userId) {
        return forbidden(reply, 'Not enough permissions');
      }

      const user = await users.findById(userId);
      if (!user) return notFound(reply, 'User not found');

      const memberships = await boards.listForUser(userId);
      await users.delete(userId);

      for (const board of memberships) {
        if (board.ownerId === userId) {
          notifier.boardDeleted(board.id);
        } else {
          notifier.userRemoved(board.id, userId);
          notifier.membershipRevoked(board.id, userId);
        }
      }
      return reply.code(204).send();
    });
  };
}
