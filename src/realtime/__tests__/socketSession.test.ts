import { describe, it, expect, beforeEach } from 'vitest';
import type { BoardRole } from '../../boards/types';
import { ConnectionManager } from '../connectionManager';
import {
  CLOSE_INTERNAL_ERROR,
  CLOSE_POLICY_VIOLATION,
  SocketSession,
  type SessionDeps,
  type SessionScope,
} from '../socketSession';
import { FakeConnection, fakeIdentity, fakePermissions, user } from './fakes';

const alice = user(1, 'alice');
const bob = user(2, 'bob');

describe('SocketSession', () => {
  let manager: ConnectionManager;
  let roles: Map<string, BoardRole>;
  let deps: SessionDeps;

  beforeEach(() => {
    manager = new ConnectionManager();
    roles = new Map([
      ['10:1', 'member'],
      ['20:1', 'admin'],
    ]);
    deps = {
      manager,
      identity: fakeIdentity({ 'tok-alice': alice, 'tok-bob': bob }),
      permissions: fakePermissions(roles),
    };
  });

  function session(scope: SessionScope = { kind: 'updates' }) {
    const connection = new FakeConnection();
    return { connection, session: new SocketSession(connection, scope, deps) };
  }

  /* ============= handshake ============= */

  describe('handshake', () => {
    it('rejects a missing token with 401 and a policy close', async () => {
      const { connection, session: s } = session();

      expect(await s.open(null)).toBe(false);

      expect(connection.messages()).toEqual([
        { event: 'error', data: { message: 'Authentication failed', code: 401 } },
      ]);
      expect(connection.closed).toEqual({ code: CLOSE_POLICY_VIOLATION, reason: 'Authentication failed' });
      expect(s.state).toBe('closed');
      expect(manager.connectionCount()).toBe(0);
    });

    it('rejects an unknown token the same way', async () => {
      const { connection, session: s } = session();
      await s.open('tok-nobody');
      expect(connection.last()).toEqual({ event: 'error', data: { message: 'Authentication failed', code: 401 } });
    });

    it('registers and greets on the updates stream', async () => {
      const { connection, session: s } = session();

      expect(await s.open('tok-alice')).toBe(true);

      expect(s.state).toBe('active');
      expect(s.userId).toBe(1);
      expect(manager.getConnections(1)).toEqual([connection]);
      expect(connection.messages()).toEqual([
        { event: 'ping', data: { message: 'Connected to the updates stream' } },
      ]);
    });

    it('auto-subscribes on a board stream', async () => {
      const { connection, session: s } = session({ kind: 'board', boardId: 10 });

      expect(await s.open('tok-alice')).toBe(true);

      expect(manager.isSubscribed(1, 10)).toBe(true);
      expect(manager.checkBoardAccess(1, 10)).toBe(true);
      expect(s.subscribedBoards).toEqual([10]);
      expect(connection.last()).toEqual({
        event: 'ping',
        data: { message: 'Connected to board 10 updates stream' },
      });
    });

    it('refuses a board stream without a role', async () => {
      const { connection, session: s } = session({ kind: 'board', boardId: 10 });

      expect(await s.open('tok-bob')).toBe(false);

      expect(connection.messages()).toEqual([
        { event: 'error', data: { message: 'Access denied to this board', code: 403 } },
      ]);
      expect(connection.closed?.code).toBe(CLOSE_POLICY_VIOLATION);
      expect(manager.isConnected(2)).toBe(false);
    });

    it('reports an unexpected failure with 500 and an internal error close', async () => {
      deps.identity = {
        async verify() {
          throw new Error('identity store offline');
        },
      };
      const { connection, session: s } = session();

      expect(await s.open('tok-alice')).toBe(false);

      expect(connection.last()).toEqual({
        event: 'error',
        data: { message: 'Unexpected error: identity store offline', code: 500 },
      });
      expect(connection.closed?.code).toBe(CLOSE_INTERNAL_ERROR);
    });

    it('holds frames received during the handshake until it completes', async () => {
      const { connection, session: s } = session();

      const opening = s.open('tok-alice');
      const processing = s.receive('{"command":"ping"}');
      await Promise.all([opening, processing]);

      expect(connection.messages().map((m) => m.event)).toEqual(['ping', 'pong']);
    });

    it('ignores frames after a failed handshake', async () => {
      const { connection, session: s } = session();
      await s.open(null);
      await s.receive('{"command":"ping"}');
      expect(connection.sent).toHaveLength(1);
    });
  });

  /* ============= updates stream commands ============= */

  describe('updates stream', () => {
    async function opened() {
      const opened = session();
      await opened.session.open('tok-alice');
      return opened;
    }

    it('answers ping with pong', async () => {
      const { connection, session: s } = await opened();
      await s.receive('{"command":"ping"}');
      expect(connection.last()).toEqual({ event: 'pong', data: {} });
    });

    it('subscribes after a fresh role check', async () => {
      const { connection, session: s } = await opened();

      await s.receive(JSON.stringify({ command: 'subscribe', data: { board_id: 10 } }));

      expect(connection.last()).toEqual({ event: 'ping', data: { message: 'Subscribed to board 10' } });
      expect(manager.isSubscribed(1, 10)).toBe(true);
      expect(s.subscribedBoards).toEqual([10]);
    });

    it('accepts a numeric string board id', async () => {
      const { connection, session: s } = await opened();
      await s.receive(JSON.stringify({ command: 'subscribe', data: { board_id: '20' } }));
      expect(connection.last()).toEqual({ event: 'ping', data: { message: 'Subscribed to board 20' } });
    });

    it('denies a board the user cannot read and clears cached access', async () => {
      const { connection, session: s } = await opened();
      manager.setBoardAccess(1, 30, true);

      await s.receive(JSON.stringify({ command: 'subscribe', data: { board_id: 30 } }));

      expect(connection.last()).toEqual({
        event: 'error',
        data: { message: 'Access denied to this board', code: 403 },
      });
      expect(manager.checkBoardAccess(1, 30)).toBe(false);
      expect(manager.isSubscribed(1, 30)).toBe(false);
      expect(s.state).toBe('active');
    });

    it('re-checks the role after membership was revoked', async () => {
      const { connection, session: s } = await opened();
      await s.receive(JSON.stringify({ command: 'subscribe', data: { board_id: 10 } }));

      roles.delete('10:1');
      await s.receive(JSON.stringify({ command: 'subscribe', data: { board_id: 10 } }));

      expect(connection.last()).toEqual({
        event: 'error',
        data: { message: 'Access denied to this board', code: 403 },
      });
    });

    it('unsubscribes', async () => {
      const { connection, session: s } = await opened();
      await s.receive(JSON.stringify({ command: 'subscribe', data: { board_id: 10 } }));

      await s.receive(JSON.stringify({ command: 'unsubscribe', data: { board_id: 10 } }));

      expect(connection.last()).toEqual({ event: 'ping', data: { message: 'Unsubscribed from board 10' } });
      expect(manager.isSubscribed(1, 10)).toBe(false);
      expect(s.subscribedBoards).toEqual([]);
    });

    it.each([
      [{}, 'Missing board_id'],
      [{ board_id: null }, 'Missing board_id'],
      [{ board_id: 0 }, 'Missing board_id'],
      [{ board_id: 'abc' }, 'Invalid board_id'],
      [{ board_id: -4 }, 'Invalid board_id'],
      [{ board_id: 1.5 }, 'Invalid board_id'],
    ])('rejects subscribe data %j with "%s"', async (data, message) => {
      const { connection, session: s } = await opened();
      await s.receive(JSON.stringify({ command: 'subscribe', data }));
      expect(connection.last()).toEqual({ event: 'error', data: { message, code: 400 } });
    });

    it('reports unknown commands', async () => {
      const { connection, session: s } = await opened();
      await s.receive('{"command":"shout"}');
      expect(connection.last()).toEqual({ event: 'error', data: { message: 'Unknown command: shout', code: 400 } });
    });
  });

  /* ============= message format ============= */

  describe('message format', () => {
    it.each(['not json', '[1,2]', '"text"', '{"data":{}}'])('answers %s with 400 and stays open', async (raw) => {
      const { connection, session: s } = session();
      await s.open('tok-alice');

      await s.receive(raw);

      expect(connection.last()).toEqual({ event: 'error', data: { message: 'Invalid message format', code: 400 } });
      expect(connection.closed).toBeNull();
      expect(s.state).toBe('active');
    });

    it('acknowledges known client events', async () => {
      const { connection, session: s } = session();
      await s.open('tok-alice');

      await s.receive('{"event":"card_moved","data":{"card_id":3}}');

      expect(connection.last()).toEqual({ event: 'ping', data: { message: 'Event received' } });
    });

    it('reports unknown client events', async () => {
      const { connection, session: s } = session();
      await s.open('tok-alice');

      await s.receive('{"event":"card_deleted"}');

      expect(connection.last()).toEqual({ event: 'error', data: { message: 'Unknown event: card_deleted', code: 400 } });
    });

    it('tears down with 500 when a reply cannot be written', async () => {
      const { connection, session: s } = session();
      await s.open('tok-alice');

      connection.failSends = true;
      await s.receive('{"command":"ping"}');

      expect(connection.closed).toEqual({ code: CLOSE_INTERNAL_ERROR, reason: 'Internal error' });
      expect(s.state).toBe('closed');
      expect(manager.isConnected(1)).toBe(false);
    });
  });

  /* ============= board stream ============= */

  describe('board stream', () => {
    it('only understands ping', async () => {
      const { connection, session: s } = session({ kind: 'board', boardId: 10 });
      await s.open('tok-alice');

      await s.receive(JSON.stringify({ command: 'subscribe', data: { board_id: 20 } }));

      expect(connection.last()).toEqual({
        event: 'error',
        data: { message: 'Unknown command: subscribe', code: 400 },
      });
      expect(manager.isSubscribed(1, 20)).toBe(false);
    });
  });

  /* ============= close ============= */

  describe('close', () => {
    it('releases subscriptions with the last connection', async () => {
      const { session: s } = session({ kind: 'board', boardId: 10 });
      await s.open('tok-alice');

      s.handleClose();
      s.handleClose();

      expect(s.state).toBe('closed');
      expect(manager.isConnected(1)).toBe(false);
      expect(manager.isSubscribed(1, 10)).toBe(false);
    });

    it('keeps a board another open connection of the user subscribed to', async () => {
      const boardTab = session({ kind: 'board', boardId: 10 });
      const updatesTab = session();
      await boardTab.session.open('tok-alice');
      await updatesTab.session.open('tok-alice');
      await updatesTab.session.receive(JSON.stringify({ command: 'subscribe', data: { board_id: 10 } }));

      boardTab.session.handleClose();

      expect(manager.getConnections(1)).toEqual([updatesTab.connection]);
      expect(manager.isSubscribed(1, 10)).toBe(true);
    });

    it('unsubscribes the board stream even while an updates tab stays open', async () => {
      const boardTab = session({ kind: 'board', boardId: 10 });
      const updatesTab = session();
      await boardTab.session.open('tok-alice');
      await updatesTab.session.open('tok-alice');

      boardTab.session.handleClose();
      expect(manager.isSubscribed(1, 10)).toBe(false);

      updatesTab.session.handleClose();
      const fresh = session();
      await fresh.session.open('tok-alice');

      expect(manager.broadcastToBoard(10, { event: 'board_deleted', data: { board_id: 10 } })).toBe('no_subscribers');
      expect(fresh.connection.messages()).toEqual([
        { event: 'ping', data: { message: 'Connected to the updates stream' } },
      ]);
    });

    it('stops routing board events to a closed session', async () => {
      const { connection, session: s } = session({ kind: 'board', boardId: 10 });
      await s.open('tok-alice');
      s.handleClose();

      const outcome = manager.broadcastToBoard(10, { event: 'board_deleted', data: { board_id: 10 } });

      expect(outcome).toBe('no_subscribers');
      expect(connection.sent).toHaveLength(1);
    });
  });
});
