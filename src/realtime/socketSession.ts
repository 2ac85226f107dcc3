// src/realtime/socketSession.ts
import type { Logger } from 'pino';
import type { AuthUser, IdentityVerifier } from '../auth/identity';
import type { PermissionService } from '../boards/permissions';
import { createLogger } from '../observability/logger';
import { isRecord, readInt } from '../routes/validation';
import type { Connection } from './connection';
import type { ConnectionManager } from './connectionManager';
import { errorEvent, pingEvent, pongEvent, serialize, type ErrorCode, type ServerEvent } from './events';

export type SessionState = 'connecting' | 'authenticating' | 'active' | 'closing' | 'closed';

/** `updates`: explicit subscribe/unsubscribe. `board`: one board, ping only. */
export type SessionScope = { kind: 'updates' } | { kind: 'board'; boardId: number };

export interface SessionDeps {
  manager: ConnectionManager;
  identity: IdentityVerifier;
  permissions: PermissionService;
}

// WebSocket close codes
export const CLOSE_POLICY_VIOLATION = 1008;
export const CLOSE_INTERNAL_ERROR = 1011;

// Client events acknowledged with a ping and otherwise only logged
const ACKNOWLEDGED_EVENTS: ReadonlySet<string> = new Set([
  'card_moved',
  'column_updated',
  'columns_reordered',
]);

function describe(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}

/**
 * One client connection from handshake to close.
 *
 * Inbound messages are processed strictly one after another on a promise
 * chain, so a subscribe that awaits the permission lookup never races the
 * next message from the same client. Errors stay inside the session.
 */
export class SocketSession {
  private _state: SessionState = 'connecting';
  private user: AuthUser | null = null;
  private readonly boards = new Set<number>();
  private chain: Promise<void> = Promise.resolve();
  private readonly log: Logger;

  constructor(
    private readonly connection: Connection,
    private readonly scope: SessionScope,
    private readonly deps: SessionDeps,
    log?: Logger
  ) {
    this.log = log ?? createLogger('realtime/session');
  }

  get state(): SessionState {
    return this._state;
  }

  get userId(): number | null {
    return this.user?.id ?? null;
  }

  /** Boards this session subscribed, released on close. */
  get subscribedBoards(): number[] {
    return Array.from(this.boards);
  }

  /**
   * Authenticate and register. Resolves true once the session is active.
   * On failure the client gets a coded error and the channel is closed.
   */
  open(token: string | null): Promise<boolean> {
    const opening = this.authenticate(token);
    this.chain = opening.then(() => undefined);
    return opening;
  }

  /** Queue one raw inbound frame behind everything received before it. */
  receive(raw: string): Promise<void> {
    this.chain = this.chain.then(() => this.process(raw));
    return this.chain;
  }

  /** Transport closed. Safe to call more than once. */
  handleClose(): void {
    if (this._state === 'closed') return;
    this._state = 'closing';

    const user = this.user;
    if (user) {
      const { manager } = this.deps;
      manager.disconnect(this.connection, user.id);
      // Boards another tab of the same user still holds stay subscribed
      manager.releaseConnection(this.connection, user.id);
      this.log.info({ userId: user.id, connectionId: this.connection.id }, 'session closed');
    }

    this.boards.clear();
    this._state = 'closed';
  }

  /* ---------- Handshake ---------- */

  private async authenticate(token: string | null): Promise<boolean> {
    this._state = 'authenticating';
    const where = this.scope.kind === 'board' ? ` for board ${this.scope.boardId}` : '';
    this.log.info({ remoteAddress: this.connection.remoteAddress }, `connection attempt${where}`);

    try {
      const user = await this.deps.identity.verify(token);
      if (!user) {
        this.log.warn({ remoteAddress: this.connection.remoteAddress }, `authentication failed${where}`);
        await this.reject('Authentication failed', 401, CLOSE_POLICY_VIOLATION);
        return false;
      }

      if (this.scope.kind === 'board') {
        const { boardId } = this.scope;
        const role = await this.deps.permissions.getUserRole(boardId, user.id, user);
        if (!role) {
          this.log.warn({ userId: user.id, boardId }, 'board access denied');
          await this.reject('Access denied to this board', 403, CLOSE_POLICY_VIOLATION);
          return false;
        }
      }

      this.activate(user);

      if (this.scope.kind === 'board') {
        const { boardId } = this.scope;
        this.track(user.id, boardId);
        await this.send(pingEvent(`Connected to board ${boardId} updates stream`));
      } else {
        await this.send(pingEvent('Connected to the updates stream'));
      }
      return true;
    } catch (err) {
      this.log.error({ err, remoteAddress: this.connection.remoteAddress }, 'unexpected error during handshake');
      if (this.user) {
        await this.fail(`Error: ${describe(err)}`);
      } else {
        await this.reject(`Unexpected error: ${describe(err)}`, 500, CLOSE_INTERNAL_ERROR);
      }
      return false;
    }
  }

  private activate(user: AuthUser): void {
    this.user = user;
    this.deps.manager.connect(this.connection, user.id);
    this._state = 'active';
    this.log.info({ userId: user.id, username: user.username }, 'authenticated');
  }

  /** Record access and subscribe; the role was checked by the caller. */
  private track(userId: number, boardId: number): boolean {
    const { manager } = this.deps;
    manager.setBoardAccess(userId, boardId, true);
    const subscribed = manager.subscribeToBoard(userId, boardId);
    if (subscribed) {
      manager.holdBoard(this.connection, boardId);
      this.boards.add(boardId);
    }
    return subscribed;
  }

  /** Handshake failure: deliver the error, then close without registering. */
  private async reject(message: string, code: ErrorCode, closeCode: number): Promise<void> {
    try {
      await this.connection.send(serialize(errorEvent(message, code)));
    } catch (err) {
      this.log.debug({ err }, 'could not deliver handshake error');
    }
    this.connection.close(closeCode, message);
    this._state = 'closed';
  }

  /* ---------- Message loop ---------- */

  private async process(raw: string): Promise<void> {
    const user = this.user;
    if (this._state !== 'active' || !user) return;

    try {
      await this.dispatch(raw, user);
    } catch (err) {
      this.log.error({ err, userId: user.id }, 'error while processing message');
      await this.fail(`Error: ${describe(err)}`);
    }
  }

  private async dispatch(raw: string, user: AuthUser): Promise<void> {
    let message: unknown;
    try {
      message = JSON.parse(raw);
    } catch {
      this.log.warn({ userId: user.id }, 'unparseable message');
      await this.sendError('Invalid message format', 400);
      return;
    }

    if (!isRecord(message)) {
      await this.sendError('Invalid message format', 400);
      return;
    }

    if ('command' in message) {
      const data = isRecord(message.data) ? message.data : {};
      await this.handleCommand(String(message.command), data, user);
      return;
    }

    if ('event' in message) {
      await this.handleClientEvent(String(message.event), user);
      return;
    }

    await this.sendError('Invalid message format', 400);
  }

  private async handleCommand(command: string, data: Record<string, unknown>, user: AuthUser): Promise<void> {
    this.log.debug({ userId: user.id, command }, 'command received');

    if (command === 'ping') {
      await this.send(pongEvent());
      return;
    }

    if (this.scope.kind === 'updates') {
      if (command === 'subscribe') {
        await this.subscribe(data, user);
        return;
      }
      if (command === 'unsubscribe') {
        await this.unsubscribe(data, user);
        return;
      }
    }

    this.log.warn({ userId: user.id, command }, 'unknown command');
    await this.sendError(`Unknown command: ${command}`, 400);
  }

  private async handleClientEvent(event: string, user: AuthUser): Promise<void> {
    if (ACKNOWLEDGED_EVENTS.has(event)) {
      this.log.info({ userId: user.id, event }, 'client event received');
      await this.send(pingEvent('Event received'));
      return;
    }
    await this.sendError(`Unknown event: ${event}`, 400);
  }

  /** Null after replying with the error. */
  private async readBoardId(data: Record<string, unknown>): Promise<number | null> {
    const raw = data.board_id;
    if (raw === undefined || raw === null || raw === '' || raw === 0) {
      await this.sendError('Missing board_id', 400);
      return null;
    }
    const boardId = readInt(raw);
    if (boardId === null || boardId <= 0) {
      await this.sendError('Invalid board_id', 400);
      return null;
    }
    return boardId;
  }

  private async subscribe(data: Record<string, unknown>, user: AuthUser): Promise<void> {
    const boardId = await this.readBoardId(data);
    if (boardId === null) return;

    // Fresh check every time; the access cache may be stale
    const role = await this.deps.permissions.getUserRole(boardId, user.id, user);
    if (!role) {
      this.deps.manager.setBoardAccess(user.id, boardId, false);
      this.log.warn({ userId: user.id, boardId }, 'subscribe denied');
      await this.sendError('Access denied to this board', 403);
      return;
    }

    // The session may have closed while the lookup was in flight
    if (this._state !== 'active') return;

    if (!this.track(user.id, boardId)) {
      await this.sendError('Access denied to this board', 403);
      return;
    }
    await this.send(pingEvent(`Subscribed to board ${boardId}`));
  }

  private async unsubscribe(data: Record<string, unknown>, user: AuthUser): Promise<void> {
    const boardId = await this.readBoardId(data);
    if (boardId === null) return;

    this.deps.manager.unsubscribeFromBoard(user.id, boardId);
    this.boards.delete(boardId);
    await this.send(pingEvent(`Unsubscribed from board ${boardId}`));
  }

  /* ---------- Output ---------- */

  private send(message: ServerEvent): Promise<void> {
    return this.connection.send(serialize(message));
  }

  private sendError(message: string, code: ErrorCode): Promise<void> {
    return this.send(errorEvent(message, code));
  }

  /** Unhandled error: best-effort 500, then tear down. */
  private async fail(message: string): Promise<void> {
    try {
      await this.sendError(message, 500);
    } catch (err) {
      this.log.debug({ err }, 'could not deliver error before teardown');
    }
    this.connection.close(CLOSE_INTERNAL_ERROR, 'Internal error');
    this.handleClose();
  }
}
