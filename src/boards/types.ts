/**
 * Board Types
 *
 * Boards, memberships and the role hierarchy.
 */

export type BoardRole = 'owner' | 'admin' | 'member';

export const BOARD_ROLES: readonly BoardRole[] = ['owner', 'admin', 'member'];

export interface Board {
  id: number;
  title: string;
  description: string | null;
  ownerId: number;
  createdAt: number;        // unix ms
  updatedAt: number;
}

export interface BoardMember {
  boardId: number;
  userId: number;
  role: BoardRole;
  joinedAt: number;
}

/** Membership joined with the user's public fields. */
export interface BoardMemberWithUser extends BoardMember {
  username: string;
  email: string;
}

export interface BoardWithRole extends Board {
  role: BoardRole;
}

// API shape, also carried by board events
export type BoardPayload = {
  id: number;
  title: string;
  description: string | null;
  owner_id: number;
  created_at: string;
  updated_at: string;
};

export type MemberPayload = {
  id: number;
  username: string;
  email: string;
  role: BoardRole;
};

export function toBoardPayload(board: Board): BoardPayload {
  return {
    id: board.id,
    title: board.title,
    description: board.description,
    owner_id: board.ownerId,
    created_at: new Date(board.createdAt).toISOString(),
    updated_at: new Date(board.updatedAt).toISOString(),
  };
}

export function toMemberPayload(member: BoardMemberWithUser): MemberPayload {
  return { id: member.userId, username: member.username, email: member.email, role: member.role };
}

export interface CreateBoardInput {
  title: string;
  description?: string | null;
}

export interface UpdateBoardInput {
  title?: string;
  description?: string | null;
}

/**
 * Permission checks based on role hierarchy:
 * owner > admin > member
 */
export const ROLE_HIERARCHY: Record<BoardRole, number> = {
  owner: 100,
  admin: 75,
  member: 25,
};

export function hasPermission(
  userRole: BoardRole,
  requiredRole: BoardRole
): boolean {
  return ROLE_HIERARCHY[userRole] >= ROLE_HIERARCHY[requiredRole];
}

export function isBoardRole(value: unknown): value is BoardRole {
  return typeof value === 'string' && BOARD_ROLES.some((role) => role === value);
}

/**
 * What each role can do:
 * - member: read the board, comment, toggle completion, tag cards
 * - admin: structural edits (columns, cards, tags), remove members
 * - owner: everything including delete board, manage roles, transfer ownership
 */
export const ROLE_PERMISSIONS = {
  member: ['read', 'comment'],
  admin: ['read', 'comment', 'write', 'remove_members'],
  owner: ['read', 'comment', 'write', 'remove_members', 'manage_roles', 'delete', 'transfer'],
} as const;
