// src/realtime/notifier.ts
import type { Logger } from 'pino';
import { createLogger } from '../observability/logger';
import type { BoardPayload, BoardRole, MemberPayload } from '../boards/types';
import type { CardPayload, DeadlinePayload } from '../store/cards';
import type { ColumnPayload } from '../store/columns';
import type { CommentPayload } from '../store/comments';
import type { ConnectionManager } from './connectionManager';
import { DispatchQueue } from './dispatchQueue';
import type { BoardEvent } from './events';

export interface NotifierOptions {
  /** Drop cached access and the subscription when a member leaves or is removed. */
  eagerAccessRevocation?: boolean;
  queue?: DispatchQueue;
  log?: Logger;
}

/**
 * Board event dispatcher. REST handlers call one method per committed
 * mutation; delivery runs on the dispatch queue, so handlers never wait
 * on sockets and never see delivery failures.
 */
export class BoardNotifier {
  private readonly queue: DispatchQueue;
  private readonly log: Logger;
  private readonly eagerAccessRevocation: boolean;

  constructor(private readonly manager: ConnectionManager, options: NotifierOptions = {}) {
    this.queue = options.queue ?? new DispatchQueue();
    this.log = options.log ?? createLogger('realtime/notifier');
    this.eagerAccessRevocation = options.eagerAccessRevocation ?? false;
  }

  /** Wait for every queued delivery. */
  flush(): Promise<void> {
    return this.queue.flush();
  }

  private publish(boardId: number, message: BoardEvent, details?: string): void {
    this.queue.enqueue(async () => {
      const outcome = this.manager.broadcastToBoard(boardId, message);
      this.log.info(
        { boardId, event: message.event, outcome },
        details
          ? `Notified ${message.event} for board ${boardId}, ${details}`
          : `Notified ${message.event} for board ${boardId}`
      );
    });
  }

  /* ---------- Boards ---------- */

  boardUpdated(boardId: number, board: BoardPayload): void {
    this.publish(boardId, { event: 'board_updated', data: { board_id: boardId, board } });
  }

  boardDeleted(boardId: number): void {
    this.publish(boardId, { event: 'board_deleted', data: { board_id: boardId } });
  }

  /* ---------- Columns ---------- */

  columnCreated(boardId: number, column: ColumnPayload): void {
    this.publish(boardId, { event: 'column_created', data: { board_id: boardId, column } });
  }

  columnUpdated(boardId: number, column: ColumnPayload): void {
    this.publish(boardId, { event: 'column_updated', data: { board_id: boardId, column } });
  }

  columnDeleted(boardId: number, columnId: number): void {
    this.publish(
      boardId,
      { event: 'column_deleted', data: { board_id: boardId, column_id: columnId } },
      `column ${columnId}`
    );
  }

  columnsReordered(boardId: number, columns: ColumnPayload[]): void {
    this.publish(boardId, { event: 'columns_reordered', data: { board_id: boardId, columns } });
  }

  /* ---------- Cards ---------- */

  cardCreated(boardId: number, card: CardPayload): void {
    this.publish(boardId, { event: 'card_created', data: { board_id: boardId, card } });
  }

  cardUpdated(boardId: number, card: CardPayload): void {
    this.publish(boardId, { event: 'card_updated', data: { board_id: boardId, card } });
  }

  cardDeleted(boardId: number, cardId: number): void {
    this.publish(
      boardId,
      { event: 'card_deleted', data: { board_id: boardId, card_id: cardId } },
      `card ${cardId}`
    );
  }

  cardMoved(boardId: number, card: CardPayload, fromColumnId: number, toColumnId: number): void {
    this.publish(
      boardId,
      {
        event: 'card_moved',
        data: { board_id: boardId, card, from_column_id: fromColumnId, to_column_id: toColumnId },
      },
      `from column ${fromColumnId} to column ${toColumnId}`
    );
  }

  cardDeadlineUpdated(boardId: number, cardId: number, deadline: DeadlinePayload): void {
    this.publish(
      boardId,
      { event: 'card_deadline_updated', data: { board_id: boardId, card_id: cardId, deadline } },
      `card ${cardId}`
    );
  }

  /* ---------- Members ---------- */

  userAdded(boardId: number, user: MemberPayload): void {
    this.publish(boardId, { event: 'user_added', data: { board_id: boardId, user } }, `user ${user.id}`);
  }

  userRemoved(boardId: number, userId: number): void {
    this.publish(
      boardId,
      { event: 'user_removed', data: { board_id: boardId, user_id: userId } },
      `user ${userId}`
    );
  }

  userRoleChanged(boardId: number, userId: number, role: BoardRole): void {
    this.publish(
      boardId,
      { event: 'user_role_changed', data: { board_id: boardId, user_id: userId, role } },
      `user ${userId}, new role ${role}`
    );
  }

  /**
   * Membership ended over REST. Cached access is left to go stale unless
   * eager revocation is on; either way it runs after the events already queued.
   */
  membershipRevoked(boardId: number, userId: number): void {
    if (!this.eagerAccessRevocation) return;
    this.queue.enqueue(async () => {
      this.manager.revokeBoardAccess(userId, boardId);
    });
  }

  /* ---------- Comments ---------- */

  commentAdded(boardId: number, cardId: number, comment: CommentPayload): void {
    this.publish(
      boardId,
      { event: 'comment_added', data: { board_id: boardId, card_id: cardId, comment } },
      `card ${cardId}`
    );
  }

  commentUpdated(boardId: number, cardId: number, comment: CommentPayload): void {
    this.publish(
      boardId,
      { event: 'comment_updated', data: { board_id: boardId, card_id: cardId, comment } },
      `card ${cardId}`
    );
  }

  commentDeleted(boardId: number, cardId: number, commentId: number): void {
    this.publish(
      boardId,
      { event: 'comment_deleted', data: { board_id: boardId, card_id: cardId, comment_id: commentId } },
      `card ${cardId}, comment ${commentId}`
    );
  }
}
