/**
 * Board Permission Routes
 *
 * Membership management under /boards/:boardId/permissions. Every change
 * is followed by the matching member event.
 */

import type { FastifyInstance } from 'fastify';
import type { UserStore } from '../auth/users';
import type { BoardNotifier } from '../realtime/notifier';
import { badRequest, bodyOf, forbidden, notFound, parseId, readInt, readText } from '../routes/validation';
import type { BoardAccess } from './middleware';
import { checkLeave, checkRemoval, checkRoleChange } from './permissions';
import type { BoardStore } from './store';
import { isBoardRole, toMemberPayload, type BoardRole } from './types';

export interface PermissionRouteDeps {
  boards: BoardStore;
  users: UserStore;
  access: BoardAccess;
  notifier: BoardNotifier;
}

type BoardParams = { Params: { boardId: string } };

export function createPermissionRoutes(deps: PermissionRouteDeps) {
  const { boards, users, access, notifier } = deps;

  return async function permissionRoutes(app: FastifyInstance) {
    const base = '/boards/:boardId/permissions';

    app.post<BoardParams>(`${base}/add-user`, async (req, reply) => {
      const boardId = parseId(req.params.boardId);
      if (!boardId) return badRequest(reply, 'Invalid board id');

      const ctx = await access.require(req, reply, boardId, 'owner');
      if (!ctx) return;

      const body = bodyOf(req.body);
      if (body.role !== undefined && !isBoardRole(body.role)) {
        return badRequest(reply, 'role must be one of owner, admin, member');
      }
      const role: BoardRole = isBoardRole(body.role) ? body.role : 'member';
      if (role === 'owner') {
        return badRequest(reply, 'Use transfer-ownership to assign a new owner');
      }

      const userId = readInt(body.user_id);
      const email = readText(body.email);
      if (userId === null && !email) {
        return badRequest(reply, 'user_id or email is required');
      }

      const target = userId !== null ? await users.findById(userId) : email ? await users.findByEmail(email) : null;
      if (!target) {
        return notFound(reply, userId !== null ? 'User not found' : 'User with this email not found');
      }

      if (await boards.getMember(boardId, target.id)) {
        return badRequest(reply, 'User is already a member of this board');
      }

      await boards.addMember(boardId, target.id, role);

      const member = { id: target.id, username: target.username, email: target.email, role };
      notifier.userAdded(boardId, member);
      return { message: 'User added to board successfully', user: member };
    });

    app.post<BoardParams>(`${base}/change-role`, async (req, reply) => {
      const boardId = parseId(req.params.boardId);
      if (!boardId) return badRequest(reply, 'Invalid board id');

      const ctx = await access.require(req, reply, boardId, 'owner');
      if (!ctx) return;

      const body = bodyOf(req.body);
      const targetId = readInt(body.user_id);
      if (targetId === null) return badRequest(reply, 'user_id is required');
      if (!isBoardRole(body.role)) return badRequest(reply, 'role must be one of owner, admin, member');
      const newRole = body.role;

      const target = await boards.getMember(boardId, targetId);
      if (!target) return badRequest(reply, 'User is not a member of this board');

      const refusal = checkRoleChange({
        actorId: ctx.user.id,
        actorRole: ctx.role,
        targetId,
        targetRole: target.role,
        newRole,
      });
      if (refusal) return badRequest(reply, refusal);

      await boards.updateMemberRole(boardId, targetId, newRole);

      notifier.userRoleChanged(boardId, targetId, newRole);
      return { message: `User role changed to ${newRole}` };
    });

    app.post<BoardParams>(`${base}/transfer-ownership`, async (req, reply) => {
      const boardId = parseId(req.params.boardId);
      if (!boardId) return badRequest(reply, 'Invalid board id');

      const ctx = await access.require(req, reply, boardId, 'owner');
      if (!ctx) return;

      const newOwnerId = readInt(bodyOf(req.body).new_owner_id);
      if (newOwnerId === null) return badRequest(reply, 'new_owner_id is required');

      const previousOwnerId = ctx.board.ownerId;
      if (newOwnerId === previousOwnerId) {
        return badRequest(reply, 'User is already the owner of this board');
      }
      if (!(await boards.getMember(boardId, newOwnerId))) {
        return badRequest(reply, 'New owner must be a member of the board');
      }

      await boards.transferOwnership(boardId, previousOwnerId, newOwnerId);

      notifier.userRoleChanged(boardId, newOwnerId, 'owner');
      notifier.userRoleChanged(boardId, previousOwnerId, 'admin');
      return { message: 'Ownership transferred successfully' };
    });

    app.delete<BoardParams>(`${base}/remove-user`, async (req, reply) => {
      const boardId = parseId(req.params.boardId);
      if (!boardId) return badRequest(reply, 'Invalid board id');

      const ctx = await access.require(req, reply, boardId, 'admin');
      if (!ctx) return;

      const targetId = readInt(bodyOf(req.body).user_id);
      if (targetId === null) return badRequest(reply, 'user_id is required');

      if (!(await users.findById(targetId))) return notFound(reply, 'Target user not found');

      const target = await boards.getMember(boardId, targetId);
      if (!target) return badRequest(reply, 'User is not a member of this board');

      const refusal = checkRemoval(ctx.role, target.role);
      if (refusal) return forbidden(reply, refusal);

      await boards.removeMember(boardId, targetId);

      notifier.userRemoved(boardId, targetId);
      notifier.membershipRevoked(boardId, targetId);
      return { message: 'User removed from board successfully' };
    });

    app.post<BoardParams>(`${base}/leave`, async (req, reply) => {
      const boardId = parseId(req.params.boardId);
      if (!boardId) return badRequest(reply, 'Invalid board id');

      const ctx = await access.require(req, reply, boardId, 'member');
      if (!ctx) return;

      // Membership row only; elevation does not make a superuser a member
      const role = await boards.getUserRole(boardId, ctx.user.id);
      if (!role) return badRequest(reply, 'You are not a member of this board');

      const refusal = checkLeave(role);
      if (refusal) return badRequest(reply, refusal);

      await boards.removeMember(boardId, ctx.user.id);

      notifier.userRemoved(boardId, ctx.user.id);
      notifier.membershipRevoked(boardId, ctx.user.id);
      return { message: 'You have successfully left the board' };
    });

    app.get<BoardParams>(`${base}/users`, async (req, reply) => {
      const boardId = parseId(req.params.boardId);
      if (!boardId) return badRequest(reply, 'Invalid board id');

      const ctx = await access.require(req, reply, boardId, 'member');
      if (!ctx) return;

      const members = await boards.listMembers(boardId);
      return {
        users: members.map((member) => ({
          ...toMemberPayload(member),
          is_owner: member.userId === ctx.board.ownerId,
        })),
      };
    });
  };
}
