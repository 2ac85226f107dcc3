/**
 * Boards Module - Barrel Export
 */

// Types
export {
  type Board,
  type BoardMember,
  type BoardMemberWithUser,
  type BoardWithRole,
  type BoardRole,
  type BoardPayload,
  type MemberPayload,
  type CreateBoardInput,
  type UpdateBoardInput,
  BOARD_ROLES,
  ROLE_HIERARCHY,
  ROLE_PERMISSIONS,
  hasPermission,
  isBoardRole,
  toBoardPayload,
  toMemberPayload,
} from './types';

// Store
export { createBoardStore, type BoardStore } from './store';

// Permissions
export {
  createPermissionService,
  checkRoleChange,
  checkRemoval,
  checkLeave,
  type PermissionService,
  type ElevationIdentity,
  type RoleChange,
} from './permissions';

// Middleware
export { createBoardAccess, type BoardAccess, type BoardContext } from './middleware';

// Routes
export { createBoardRoutes, type BoardRouteDeps } from './routes';
export { createPermissionRoutes, type PermissionRouteDeps } from './permissionRoutes';
