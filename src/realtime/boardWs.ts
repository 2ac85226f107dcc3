// src/realtime/boardWs.ts
import type { FastifyInstance } from 'fastify';
import type { IncomingMessage } from 'http';
import type { Duplex } from 'stream';
import { WebSocketServer, type WebSocket } from 'ws';
import { createLogger } from '../observability/logger';
import { getOrCreateRequestIdFromMessage } from '../observability/requestId';
import { WsConnection } from './connection';
import { SocketSession, type SessionDeps, type SessionScope } from './socketSession';

export interface BoardWsOptions extends SessionDeps {
  apiPrefix: string;
}

export const CLOSE_GOING_AWAY = 1001;

const log = createLogger('realtime/ws');

function escapeRegExp(value: string): string {
  return value.replace(/[.*+?^${}()|[\]\\]/g, '\\$&');
}

/**
 * WebSocket endpoints, sharing Fastify's HTTP server:
 *
 * - {prefix}/ws/updates?token=…           explicit subscribe/unsubscribe
 * - {prefix}/ws/board/:boardId?token=…    auto-subscribed to one board
 *
 * The handshake is always accepted for a known path so that auth failures
 * can be reported as an error event before the close.
 */
export function installBoardWs(fastify: FastifyInstance, options: BoardWsOptions): WebSocketServer {
  const wss = new WebSocketServer({ noServer: true });
  const { apiPrefix, ...deps } = options;

  const updatesPath = `${apiPrefix}/ws/updates`;
  const boardPath = new RegExp(`^${escapeRegExp(apiPrefix)}/ws/board/(\\d+)$`);

  function resolveScope(pathname: string): SessionScope | null {
    if (pathname === updatesPath) return { kind: 'updates' };
    const match = boardPath.exec(pathname);
    if (!match) return null;
    const boardId = Number(match[1]);
    return Number.isSafeInteger(boardId) && boardId > 0 ? { kind: 'board', boardId } : null;
  }

  function startSession(ws: WebSocket, req: IncomingMessage, scope: SessionScope, token: string | null) {
    const connection = new WsConnection(ws, req.socket.remoteAddress ?? 'unknown');
    const session = new SocketSession(
      connection,
      scope,
      deps,
      log.child({ requestId: getOrCreateRequestIdFromMessage(req), connectionId: connection.id })
    );

    ws.on('message', (data) => {
      session.receive(String(data)).catch((err: unknown) => {
        log.error({ err, connectionId: connection.id }, 'message processing failed');
      });
    });
    ws.on('close', () => session.handleClose());
    ws.on('error', (err) => {
      log.warn({ err, connectionId: connection.id }, 'socket error');
    });

    session.open(token).catch((err: unknown) => {
      log.error({ err, connectionId: connection.id }, 'session open failed');
    });
  }

  fastify.server.on('upgrade', (req: IncomingMessage, socket: Duplex, head: Buffer) => {
    const url = new URL(req.url ?? '/', 'http://localhost');
    const scope = resolveScope(url.pathname);
    if (!scope) {
      socket.write('HTTP/1.1 404 Not Found\r\n\r\n');
      socket.destroy();
      return;
    }

    const token = url.searchParams.get('token');
    wss.handleUpgrade(req, socket, head, (ws) => {
      wss.emit('connection', ws, req);
      startSession(ws, req, scope, token);
    });
  });

  fastify.addHook('onClose', (_instance, done) => {
    for (const client of wss.clients) {
      client.close(CLOSE_GOING_AWAY, 'Server shutting down');
    }
    wss.close(() => done());
  });

  fastify.log.info('[board-ws] installed');
  return wss;
}
