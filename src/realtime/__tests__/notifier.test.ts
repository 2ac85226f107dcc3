import { describe, it, expect, beforeEach } from 'vitest';
import type { CardPayload } from '../../store/cards';
import { ConnectionManager } from '../connectionManager';
import { BoardNotifier } from '../notifier';
import { FakeConnection, StalledConnection } from './fakes';

const card: CardPayload = {
  id: 7,
  column_id: 3,
  title: 'Write release notes',
  description: null,
  color: null,
  order: 0,
  completed: false,
  deadline: null,
  assigned_users: [],
  tags: [],
  created_at: '2026-01-01T00:00:00.000Z',
  updated_at: '2026-01-01T00:00:00.000Z',
};

describe('BoardNotifier', () => {
  let manager: ConnectionManager;
  let alice: FakeConnection;

  beforeEach(() => {
    manager = new ConnectionManager();
    alice = new FakeConnection();
    manager.connect(alice, 1);
    manager.setBoardAccess(1, 10, true);
    manager.subscribeToBoard(1, 10);
  });

  it('delivers off the calling path', async () => {
    const notifier = new BoardNotifier(manager);

    notifier.cardDeleted(10, 7);
    expect(alice.sent).toEqual([]);

    await notifier.flush();
    expect(alice.messages()).toEqual([{ event: 'card_deleted', data: { board_id: 10, card_id: 7 } }]);
  });

  it('keeps delivering to other boards behind a stalled socket', async () => {
    const notifier = new BoardNotifier(manager);
    const stalled = new StalledConnection();
    manager.connect(stalled, 2);
    manager.setBoardAccess(2, 20, true);
    manager.subscribeToBoard(2, 20);

    notifier.boardDeleted(20);
    notifier.boardDeleted(10);
    await notifier.flush();

    expect(stalled.writes).toBe(1);
    expect(alice.messages()).toEqual([{ event: 'board_deleted', data: { board_id: 10 } }]);
  });

  it('builds card_moved with both column ids', async () => {
    const notifier = new BoardNotifier(manager);

    notifier.cardMoved(10, { ...card, column_id: 4 }, 3, 4);
    await notifier.flush();

    expect(alice.last()).toEqual({
      event: 'card_moved',
      data: { board_id: 10, card: { ...card, column_id: 4 }, from_column_id: 3, to_column_id: 4 },
    });
  });

  it('keeps call order across event kinds', async () => {
    const notifier = new BoardNotifier(manager);

    notifier.cardCreated(10, card);
    notifier.cardUpdated(10, { ...card, title: 'Renamed' });
    notifier.cardDeleted(10, card.id);
    await notifier.flush();

    expect(alice.messages().map((m) => m.event)).toEqual(['card_created', 'card_updated', 'card_deleted']);
  });

  it('carries the role in user_role_changed', async () => {
    const notifier = new BoardNotifier(manager);

    notifier.userRoleChanged(10, 2, 'admin');
    await notifier.flush();

    expect(alice.last()).toEqual({ event: 'user_role_changed', data: { board_id: 10, user_id: 2, role: 'admin' } });
  });

  it('only publishes to the named board', async () => {
    const notifier = new BoardNotifier(manager);

    notifier.boardDeleted(11);
    await notifier.flush();

    expect(alice.sent).toEqual([]);
  });

  it('leaves cached access alone when eager revocation is off', async () => {
    const notifier = new BoardNotifier(manager);

    notifier.userRemoved(10, 1);
    notifier.membershipRevoked(10, 1);
    await notifier.flush();

    expect(manager.isSubscribed(1, 10)).toBe(true);
    expect(manager.checkBoardAccess(1, 10)).toBe(true);
  });

  it('revokes after the removal event when eager revocation is on', async () => {
    const notifier = new BoardNotifier(manager, { eagerAccessRevocation: true });

    notifier.userRemoved(10, 1);
    notifier.membershipRevoked(10, 1);
    await notifier.flush();

    // The removed user still hears about their own removal
    expect(alice.messages()).toEqual([{ event: 'user_removed', data: { board_id: 10, user_id: 1 } }]);
    expect(manager.isSubscribed(1, 10)).toBe(false);
    expect(manager.checkBoardAccess(1, 10)).toBe(false);
  });
});
