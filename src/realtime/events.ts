// src/realtime/events.ts
import type { BoardPayload, BoardRole, MemberPayload } from '../boards/types';
import type { CardPayload, DeadlinePayload } from '../store/cards';
import type { ColumnPayload } from '../store/columns';
import type { CommentPayload } from '../store/comments';

/**
 * Board events pushed to subscribers. One variant per event, `data` carries
 * exactly what clients need to patch their local board state.
 */
export type BoardEvent =
  | { event: 'board_updated'; data: { board_id: number; board: BoardPayload } }
  | { event: 'board_deleted'; data: { board_id: number } }
  | { event: 'column_created'; data: { board_id: number; column: ColumnPayload } }
  | { event: 'column_updated'; data: { board_id: number; column: ColumnPayload } }
  | { event: 'column_deleted'; data: { board_id: number; column_id: number } }
  | { event: 'columns_reordered'; data: { board_id: number; columns: ColumnPayload[] } }
  | { event: 'card_created'; data: { board_id: number; card: CardPayload } }
  | { event: 'card_updated'; data: { board_id: number; card: CardPayload } }
  | { event: 'card_deleted'; data: { board_id: number; card_id: number } }
  | { event: 'card_moved'; data: { board_id: number; card: CardPayload; from_column_id: number; to_column_id: number } }
  | { event: 'card_deadline_updated'; data: { board_id: number; card_id: number; deadline: DeadlinePayload } }
  | { event: 'user_added'; data: { board_id: number; user: MemberPayload } }
  | { event: 'user_removed'; data: { board_id: number; user_id: number } }
  | { event: 'user_role_changed'; data: { board_id: number; user_id: number; role: BoardRole } }
  | { event: 'comment_added'; data: { board_id: number; card_id: number; comment: CommentPayload } }
  | { event: 'comment_updated'; data: { board_id: number; card_id: number; comment: CommentPayload } }
  | { event: 'comment_deleted'; data: { board_id: number; card_id: number; comment_id: number } };

export type ErrorCode = 400 | 401 | 403 | 500;

/** Session control messages; never validated. */
export type ControlEvent =
  | { event: 'ping'; data: { message?: string } }
  | { event: 'pong'; data: Record<string, never> }
  | { event: 'error'; data: { message: string; code: ErrorCode } };

export type ServerEvent = BoardEvent | ControlEvent;

export type BoardEventType = BoardEvent['event'];

type DataOf<E extends BoardEventType> = Extract<BoardEvent, { event: E }>['data'];

/**
 * Untyped outbound message as it goes on the wire. Every ServerEvent is
 * one; the registry validates these at the broadcast boundary.
 */
export interface WireMessage {
  event: string;
  data: Record<string, unknown>;
}

/* ---------- Required keys ---------- */

export const REQUIRED_FIELDS = {
  board_updated: ['board_id', 'board'],
  board_deleted: ['board_id'],
  column_created: ['board_id', 'column'],
  column_updated: ['board_id', 'column'],
  column_deleted: ['board_id', 'column_id'],
  columns_reordered: ['columns'],
  card_created: ['board_id', 'card'],
  card_updated: ['board_id', 'card'],
  card_deleted: ['board_id', 'card_id'],
  card_moved: ['board_id', 'card', 'from_column_id', 'to_column_id'],
  card_deadline_updated: ['board_id', 'card_id', 'deadline'],
  user_added: ['board_id', 'user'],
  user_removed: ['board_id', 'user_id'],
  user_role_changed: ['board_id', 'user_id', 'role'],
  comment_added: ['board_id', 'card_id', 'comment'],
  comment_updated: ['board_id', 'card_id', 'comment'],
  comment_deleted: ['board_id', 'card_id', 'comment_id'],
} as const satisfies { [E in BoardEventType]: ReadonlyArray<keyof DataOf<E>> };

export function isBoardEventType(value: string): value is BoardEventType {
  return Object.prototype.hasOwnProperty.call(REQUIRED_FIELDS, value);
}

/**
 * Check a message against its event's required keys.
 * Returns an error description, or null when the message may be sent.
 * Event names outside the table (ping, pong, error) pass unchecked.
 */
export function validateEvent(message: WireMessage): string | null {
  if (!isBoardEventType(message.event)) return null;

  const required: ReadonlyArray<string> = REQUIRED_FIELDS[message.event];
  const missing = required.filter((key) => message.data[key] === undefined);
  if (missing.length === 0) return null;

  return `Event ${message.event} is missing required fields: ${missing.join(', ')}`;
}

/* ---------- Control messages ---------- */

export function pingEvent(message?: string): ControlEvent {
  return message === undefined ? { event: 'ping', data: {} } : { event: 'ping', data: { message } };
}

export function pongEvent(): ControlEvent {
  return { event: 'pong', data: {} };
}

export function errorEvent(message: string, code: ErrorCode): ControlEvent {
  return { event: 'error', data: { message, code } };
}

export function serialize(message: WireMessage): string {
  return JSON.stringify(message);
}
