/**
 * Board permission service.
 *
 * Resolves a user's effective role on a board and decides which membership
 * changes an actor may make. Superusers resolve to `owner` on every board.
 */

import type { BoardStore } from './store';
import { ROLE_HIERARCHY, type BoardRole } from './types';

export interface ElevationIdentity {
  id: number;
  isSuperuser: boolean;
}

export interface PermissionService {
  getUserRole(
    boardId: number,
    userId: number,
    identity?: ElevationIdentity
  ): Promise<BoardRole | null>;
}

export function createPermissionService(boards: BoardStore): PermissionService {
  return {
    async getUserRole(boardId, userId, identity) {
      if (identity?.isSuperuser && identity.id === userId) {
        // Board must still exist for the elevated role to mean anything
        const board = await boards.getById(boardId);
        return board ? 'owner' : null;
      }
      return boards.getUserRole(boardId, userId);
    },
  };
}

/* ---------- Membership rules ---------- */

export interface RoleChange {
  actorId: number;
  actorRole: BoardRole;
  targetId: number;
  targetRole: BoardRole;
  newRole: BoardRole;
}

/** Returns a refusal message, or null when the change is allowed. */
export function checkRoleChange(change: RoleChange): string | null {
  const { actorId, actorRole, targetId, targetRole, newRole } = change;

  if (actorRole === 'member') {
    return 'Members cannot change roles';
  }
  if (newRole === 'owner') {
    return 'Use transfer-ownership to assign a new owner';
  }
  if (actorRole === 'admin' && ROLE_HIERARCHY[targetRole] >= ROLE_HIERARCHY.admin) {
    return 'Admins cannot change the role of admins or the owner';
  }
  if (actorRole === 'owner' && targetId === actorId) {
    return 'Owner cannot change their own role';
  }
  return null;
}

/**
 * Who may remove whom: the owner is never removable; admins may only
 * remove members; owners may remove anyone else.
 */
export function checkRemoval(actorRole: BoardRole, targetRole: BoardRole): string | null {
  if (targetRole === 'owner') {
    return 'The board owner cannot be removed';
  }
  if (actorRole === 'member') {
    return 'Members cannot remove users';
  }
  if (actorRole === 'admin' && targetRole !== 'member') {
    return 'Admins can only remove members';
  }
  return null;
}

export function checkLeave(role: BoardRole): string | null {
  return role === 'owner'
    ? 'Owner cannot leave the board; transfer ownership first'
    : null;
}
