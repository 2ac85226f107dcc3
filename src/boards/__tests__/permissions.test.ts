import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import type { DbAdapter } from '../../db';
import { insertUser, migratedDb } from '../../__tests__/helpers/db';
import { checkLeave, checkRemoval, checkRoleChange, createPermissionService } from '../permissions';
import { createBoardStore, type BoardStore } from '../store';
import { hasPermission } from '../types';

/* ============= role rules ============= */

describe('hasPermission', () => {
  it('orders owner above admin above member', () => {
    expect(hasPermission('owner', 'admin')).toBe(true);
    expect(hasPermission('admin', 'admin')).toBe(true);
    expect(hasPermission('member', 'admin')).toBe(false);
    expect(hasPermission('admin', 'owner')).toBe(false);
  });
});

describe('checkRoleChange', () => {
  const change = { actorId: 1, targetId: 2 } as const;

  it('lets the owner promote a member', () => {
    expect(checkRoleChange({ ...change, actorRole: 'owner', targetRole: 'member', newRole: 'admin' })).toBeNull();
  });

  it('never grants owner through a role change', () => {
    expect(checkRoleChange({ ...change, actorRole: 'owner', targetRole: 'admin', newRole: 'owner' })).toBe(
      'Use transfer-ownership to assign a new owner'
    );
  });

  it('refuses members and admins acting on admins', () => {
    expect(checkRoleChange({ ...change, actorRole: 'member', targetRole: 'member', newRole: 'admin' })).toBe(
      'Members cannot change roles'
    );
    expect(checkRoleChange({ ...change, actorRole: 'admin', targetRole: 'admin', newRole: 'member' })).toBe(
      'Admins cannot change the role of admins or the owner'
    );
  });

  it('refuses the owner demoting themselves', () => {
    expect(checkRoleChange({ actorId: 1, targetId: 1, actorRole: 'owner', targetRole: 'owner', newRole: 'admin' })).toBe(
      'Owner cannot change their own role'
    );
  });
});

describe('checkRemoval and checkLeave', () => {
  it('protects the owner', () => {
    expect(checkRemoval('owner', 'owner')).toBe('The board owner cannot be removed');
    expect(checkLeave('owner')).toBe('Owner cannot leave the board; transfer ownership first');
  });

  it('limits admins to removing members', () => {
    expect(checkRemoval('admin', 'member')).toBeNull();
    expect(checkRemoval('admin', 'admin')).toBe('Admins can only remove members');
    expect(checkRemoval('owner', 'admin')).toBeNull();
    expect(checkRemoval('member', 'member')).toBe('Members cannot remove users');
  });

  it('lets anyone but the owner leave', () => {
    expect(checkLeave('admin')).toBeNull();
    expect(checkLeave('member')).toBeNull();
  });
});

/* ============= store-backed ============= */

describe('board membership', () => {
  let db: DbAdapter;
  let boards: BoardStore;
  let ownerId: number;
  let memberId: number;

  beforeEach(async () => {
    db = await migratedDb();
    boards = createBoardStore(db);
    ownerId = await insertUser(db, 'owner');
    memberId = await insertUser(db, 'member');
  });

  afterEach(async () => {
    await db.close();
  });

  it('makes the creator the owner', async () => {
    const board = await boards.create({ title: '  Roadmap  ', description: '' }, ownerId);

    expect(board.title).toBe('Roadmap');
    expect(board.description).toBeNull();
    expect(await boards.getUserRole(board.id, ownerId)).toBe('owner');
    expect(await boards.getUserRole(board.id, memberId)).toBeNull();
  });

  it('lists boards for members only', async () => {
    const board = await boards.create({ title: 'Roadmap' }, ownerId);
    await boards.create({ title: 'Private' }, ownerId);
    await boards.addMember(board.id, memberId, 'member');

    const mine = await boards.listForUser(memberId);
    expect(mine.map((b) => [b.title, b.role])).toEqual([['Roadmap', 'member']]);
  });

  it('transfers ownership and demotes the previous owner to admin', async () => {
    const board = await boards.create({ title: 'Roadmap' }, ownerId);
    await boards.addMember(board.id, memberId, 'member');

    await boards.transferOwnership(board.id, ownerId, memberId);

    expect((await boards.getById(board.id))?.ownerId).toBe(memberId);
    expect(await boards.getUserRole(board.id, memberId)).toBe('owner');
    expect(await boards.getUserRole(board.id, ownerId)).toBe('admin');
  });

  it('removes members and cascades on board delete', async () => {
    const board = await boards.create({ title: 'Roadmap' }, ownerId);
    await boards.addMember(board.id, memberId, 'admin');

    expect(await boards.removeMember(board.id, memberId)).toBe(true);
    expect(await boards.removeMember(board.id, memberId)).toBe(false);

    expect(await boards.delete(board.id)).toBe(true);
    expect(await boards.getMember(board.id, ownerId)).toBeNull();
  });

  describe('PermissionService', () => {
    it('resolves the membership role', async () => {
      const board = await boards.create({ title: 'Roadmap' }, ownerId);
      await boards.addMember(board.id, memberId, 'admin');

      const permissions = createPermissionService(boards);
      expect(await permissions.getUserRole(board.id, memberId)).toBe('admin');
    });

    it('elevates a superuser to owner on any existing board', async () => {
      const board = await boards.create({ title: 'Roadmap' }, ownerId);
      const rootId = await insertUser(db, 'root', true);
      const permissions = createPermissionService(boards);

      expect(await permissions.getUserRole(board.id, rootId, { id: rootId, isSuperuser: true })).toBe('owner');
      expect(await permissions.getUserRole(999, rootId, { id: rootId, isSuperuser: true })).toBeNull();
      expect(await permissions.getUserRole(board.id, rootId)).toBeNull();
    });
  });
});
