import { describe, it, expect } from 'vitest';
import {
  errorEvent,
  isBoardEventType,
  pingEvent,
  pongEvent,
  REQUIRED_FIELDS,
  serialize,
  validateEvent,
} from '../events';

describe('validateEvent', () => {
  it('accepts a message carrying every required field', () => {
    expect(validateEvent({ event: 'card_deleted', data: { board_id: 1, card_id: 9 } })).toBeNull();
  });

  it('lists the missing fields in table order', () => {
    expect(validateEvent({ event: 'card_moved', data: { board_id: 1, card: {} } })).toBe(
      'Event card_moved is missing required fields: from_column_id, to_column_id'
    );
  });

  it('treats a field set to undefined as missing', () => {
    expect(validateEvent({ event: 'board_deleted', data: { board_id: undefined } })).toBe(
      'Event board_deleted is missing required fields: board_id'
    );
  });

  it('accepts null and zero values', () => {
    expect(validateEvent({ event: 'user_removed', data: { board_id: 0, user_id: null } })).toBeNull();
  });

  it('only requires columns for columns_reordered', () => {
    expect(validateEvent({ event: 'columns_reordered', data: { columns: [] } })).toBeNull();
  });

  it('passes events outside the table unchecked', () => {
    expect(validateEvent({ event: 'ping', data: {} })).toBeNull();
    expect(validateEvent({ event: 'something_else', data: {} })).toBeNull();
  });
});

describe('isBoardEventType', () => {
  it('knows all seventeen board events', () => {
    expect(Object.keys(REQUIRED_FIELDS)).toHaveLength(17);
    expect(isBoardEventType('comment_deleted')).toBe(true);
  });

  it('rejects control events and prototype keys', () => {
    expect(isBoardEventType('pong')).toBe(false);
    expect(isBoardEventType('toString')).toBe(false);
  });
});

describe('control messages', () => {
  it('builds ping with and without a message', () => {
    expect(pingEvent()).toEqual({ event: 'ping', data: {} });
    expect(pingEvent('hello')).toEqual({ event: 'ping', data: { message: 'hello' } });
  });

  it('serializes pong and error frames', () => {
    expect(serialize(pongEvent())).toBe('{"event":"pong","data":{}}');
    expect(serialize(errorEvent('Invalid board_id', 400))).toBe(
      '{"event":"error","data":{"message":"Invalid board_id","code":400}}'
    );
  });
});
