// src/realtime/connectionManager.ts
import type { Logger } from 'pino';
import { createLogger } from '../observability/logger';
import {
  recordBoardEvent,
  setWebsocketConnections,
  type BroadcastOutcome,
} from '../observability/metrics';
import type { Connection } from './connection';
import { serialize, validateEvent, type WireMessage } from './events';

/**
 * Registry of live connections, board access and board subscriptions.
 *
 * - connections: user id → sockets in registration order
 * - access: board id → user ids known to have read access
 * - subscribers: board id → user ids receiving that board's events
 * - holds: connection → boards that connection asked for, so a closing
 *   socket releases only what no other socket of the user still wants
 *
 * All three tables are mutated only through these methods, and every
 * mutation is synchronous, so no interleaving can split one.
 */
export class ConnectionManager {
  private readonly connections = new Map<number, Connection[]>();
  private readonly owners = new Map<Connection, number>();
  private readonly access = new Map<number, Set<number>>();
  private readonly subscribers = new Map<number, Set<number>>();
  private readonly holds = new Map<Connection, Set<number>>();

  constructor(private readonly log: Logger = createLogger('realtime/connections')) {}

  /* ---------- Connections ---------- */

  connect(connection: Connection, userId: number): void {
    const previousOwner = this.owners.get(connection);
    if (previousOwner !== undefined && previousOwner !== userId) {
      this.disconnect(connection, previousOwner);
    }

    const list = this.connections.get(userId) ?? [];
    if (!list.includes(connection)) list.push(connection);
    this.connections.set(userId, list);
    this.owners.set(connection, userId);

    setWebsocketConnections(this.connectionCount());
    this.log.info(
      { userId, connectionId: connection.id, remoteAddress: connection.remoteAddress },
      'connection registered'
    );
  }

  /** Idempotent. Leaves board subscriptions alone. */
  disconnect(connection: Connection, userId: number): void {
    const list = this.connections.get(userId);
    if (!list) return;

    const index = list.indexOf(connection);
    if (index === -1) return;

    list.splice(index, 1);
    if (list.length === 0) this.connections.delete(userId);
    this.owners.delete(connection);

    setWebsocketConnections(this.connectionCount());
    this.log.info({ userId, connectionId: connection.id }, 'connection removed');
  }

  isConnected(userId: number): boolean {
    return this.connections.has(userId);
  }

  connectionCount(): number {
    return this.owners.size;
  }

  getConnections(userId: number): readonly Connection[] {
    return this.connections.get(userId) ?? [];
  }

  /** Server-initiated close of every registered connection. */
  closeAll(code: number, reason: string): void {
    for (const [connection, userId] of Array.from(this.owners)) {
      connection.close(code, reason);
      this.disconnect(connection, userId);
    }
  }

  /* ---------- Access ---------- */

  /** Revoking access does not unsubscribe; see revokeBoardAccess. */
  setBoardAccess(userId: number, boardId: number, hasAccess: boolean): void {
    if (hasAccess) {
      const users = this.access.get(boardId) ?? new Set<number>();
      users.add(userId);
      this.access.set(boardId, users);
      return;
    }

    const users = this.access.get(boardId);
    if (!users) return;
    users.delete(userId);
    if (users.size === 0) this.access.delete(boardId);
  }

  checkBoardAccess(userId: number, boardId: number): boolean {
    return this.access.get(boardId)?.has(userId) ?? false;
  }

  /** Drop both the cached access and the subscription. */
  revokeBoardAccess(userId: number, boardId: number): void {
    this.setBoardAccess(userId, boardId, false);
    this.unsubscribeFromBoard(userId, boardId);
    this.log.info({ userId, boardId }, 'board access revoked');
  }

  /* ---------- Subscriptions ---------- */

  subscribeToBoard(userId: number, boardId: number): boolean {
    if (!this.checkBoardAccess(userId, boardId)) {
      this.log.warn({ userId, boardId }, 'subscribe refused: no board access');
      return false;
    }

    const users = this.subscribers.get(boardId) ?? new Set<number>();
    users.add(userId);
    this.subscribers.set(boardId, users);
    this.log.info({ userId, boardId }, 'subscribed to board');
    return true;
  }

  /** Unconditional; also clears every hold the user's connections had on the board. */
  unsubscribeFromBoard(userId: number, boardId: number): void {
    for (const connection of this.getConnections(userId)) {
      this.holds.get(connection)?.delete(boardId);
    }
    const users = this.subscribers.get(boardId);
    if (!users?.delete(userId)) return;
    if (users.size === 0) this.subscribers.delete(boardId);
    this.log.info({ userId, boardId }, 'unsubscribed from board');
  }

  isSubscribed(userId: number, boardId: number): boolean {
    return this.subscribers.get(boardId)?.has(userId) ?? false;
  }

  getSubscribers(boardId: number): number[] {
    return Array.from(this.subscribers.get(boardId) ?? []);
  }

  /** Boards the user is subscribed to, in no particular order. */
  getUserBoards(userId: number): number[] {
    const boards: number[] = [];
    for (const [boardId, users] of this.subscribers) {
      if (users.has(userId)) boards.push(boardId);
    }
    return boards;
  }

  /** Record that `connection` wants the board; see releaseConnection. */
  holdBoard(connection: Connection, boardId: number): void {
    const boards = this.holds.get(connection) ?? new Set<number>();
    boards.add(boardId);
    this.holds.set(connection, boards);
  }

  /**
   * Drop what a closing connection held. A board stays subscribed while
   * another live connection of the user holds it. With no live connection
   * left, every subscription of the user goes.
   */
  releaseConnection(connection: Connection, userId: number): void {
    const held = this.holds.get(connection) ?? new Set<number>();
    this.holds.delete(connection);

    const others = this.getConnections(userId).filter((other) => other !== connection);
    const boards = others.length === 0 ? this.getUserBoards(userId) : Array.from(held);

    for (const boardId of boards) {
      if (others.some((other) => this.holds.get(other)?.has(boardId))) continue;
      this.unsubscribeFromBoard(userId, boardId);
    }
  }

  /* ---------- Delivery ---------- */

  /**
   * Validate, serialize once and hand the frame to every connection of
   * every subscriber, in order, without waiting for the writes. A write
   * that fails later prunes its connection. Invalid messages are dropped
   * before any write.
   */
  broadcastToBoard(boardId: number, message: WireMessage): BroadcastOutcome {
    const problem = validateEvent(message);
    if (problem) {
      this.log.error({ boardId, event: message.event }, problem);
      recordBoardEvent(message.event, 'rejected');
      return 'rejected';
    }

    const userIds = this.getSubscribers(boardId);
    if (userIds.length === 0) {
      recordBoardEvent(message.event, 'no_subscribers');
      return 'no_subscribers';
    }

    const data = serialize(message);
    for (const userId of userIds) {
      for (const connection of this.getConnections(userId)) {
        this.write(connection, userId, data).catch((err: unknown) => {
          this.log.error({ err, connectionId: connection.id }, 'write bookkeeping failed');
        });
      }
    }

    this.log.debug({ boardId, event: message.event, users: userIds.length }, 'broadcast delivered');
    recordBoardEvent(message.event, 'delivered');
    return 'delivered';
  }

  /**
   * Best-effort send to each of the user's connections. Connections whose
   * write fails are pruned afterwards. Resolves to the number of writes
   * that succeeded.
   */
  async sendToUser(userId: number, data: string): Promise<number> {
    const targets = [...this.getConnections(userId)];
    if (targets.length === 0) return 0;

    const results = await Promise.all(targets.map((connection) => this.write(connection, userId, data)));
    return results.filter(Boolean).length;
  }

  /** One write; a failure prunes the connection. Never rejects. */
  private async write(connection: Connection, userId: number, data: string): Promise<boolean> {
    try {
      await connection.send(data);
      return true;
    } catch (err) {
      this.log.warn({ userId, connectionId: connection.id, err }, 'send failed, pruning connection');
      this.disconnect(connection, userId);
      return false;
    }
  }
}
