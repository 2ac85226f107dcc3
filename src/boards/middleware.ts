/**
 * Board access checks for route handlers.
 *
 * Every successful or failed role lookup is also recorded in the realtime
 * access registry, so the REST layer keeps it warm for socket subscribers.
 */

import type { FastifyReply, FastifyRequest } from 'fastify';
import type { AuthUser } from '../auth/identity';
import { requireUser } from '../auth/middleware';
import type { ConnectionManager } from '../realtime/connectionManager';
import type { PermissionService } from './permissions';
import type { BoardStore } from './store';
import { hasPermission, type Board, type BoardRole } from './types';

export interface BoardContext {
  user: AuthUser;
  board: Board;
  role: BoardRole;
}

export interface BoardAccess {
  /**
   * Resolve the caller's role on the board and require at least `minRole`.
   * Replies 401/404/403 and returns null when the request cannot proceed.
   */
  require(
    req: FastifyRequest,
    reply: FastifyReply,
    boardId: number,
    minRole: BoardRole
  ): Promise<BoardContext | null>;
}

export interface BoardAccessDeps {
  boards: BoardStore;
  permissions: PermissionService;
  manager?: ConnectionManager;
}

export function createBoardAccess(deps: BoardAccessDeps): BoardAccess {
  const { boards, permissions, manager } = deps;

  return {
    async require(req, reply, boardId, minRole) {
      const user = requireUser(req, reply);
      if (!user) return null;

      const board = await boards.getById(boardId);
      if (!board) {
        reply.code(404).send({ error: 'not_found', message: 'Board not found' });
        return null;
      }

      const role = await permissions.getUserRole(boardId, user.id, user);
      manager?.setBoardAccess(user.id, boardId, role !== null);

      if (!role) {
        reply.code(403).send({ error: 'forbidden', message: "You don't have access to this board" });
        return null;
      }

      if (!hasPermission(role, minRole)) {
        reply.code(403).send({
          error: 'forbidden',
          message: `Operation not allowed with your role: ${role}`,
        });
        return null;
      }

      return { user, board, role };
    },
  };
}
