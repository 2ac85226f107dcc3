// src/realtime/connection.ts
import { WebSocket } from 'ws';
import { nanoid } from 'nanoid';

/**
 * One live client channel. The registry only ever talks to this
 * interface; `ws` sockets are wrapped by WsConnection.
 */
export interface Connection {
  readonly id: string;
  readonly remoteAddress: string;
  /** Rejects when the channel is gone or the write fails. */
  send(data: string): Promise<void>;
  close(code: number, reason?: string): void;
}

export class WsConnection implements Connection {
  readonly id = nanoid(12);

  constructor(
    private readonly socket: WebSocket,
    readonly remoteAddress: string
  ) {}

  send(data: string): Promise<void> {
    return new Promise((resolve, reject) => {
      if (this.socket.readyState !== WebSocket.OPEN) {
        reject(new Error(`Socket ${this.id} is not open`));
        return;
      }
      this.socket.send(data, (err) => (err ? reject(err) : resolve()));
    });
  }

  close(code: number, reason?: string): void {
    if (this.socket.readyState === WebSocket.OPEN || this.socket.readyState === WebSocket.CONNECTING) {
      this.socket.close(code, reason);
    }
  }
}
