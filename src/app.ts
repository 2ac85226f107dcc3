// src/app.ts
// Fastify assembly: stores, realtime core, plugins and routes. server.ts
// listens; tests drive the same instance through app.inject.

import Fastify, { type FastifyInstance } from 'fastify';
import cors from '@fastify/cors';
import type { WebSocketServer } from 'ws';

import { getConfig } from './config';
import { createAdapter, type DbAdapter } from './db';
import { MigrationRunner } from './migrations/runner';
import { getLogLevel, registerObservability, requestIdGenerator } from './observability';

import {
  createAuthRoutes,
  createIdentityVerifier,
  createSessionStore,
  createUserStore,
  registerAuthMiddleware,
} from './auth';
import {
  createBoardAccess,
  createBoardRoutes,
  createBoardStore,
  createPermissionRoutes,
  createPermissionService,
} from './boards';
import { registerRateLimit } from './middleware/rateLimit';

import { installBoardWs } from './realtime/boardWs';
import { ConnectionManager } from './realtime/connectionManager';
import { BoardNotifier } from './realtime/notifier';

import { createCardStore } from './store/cards';
import { createColumnStore } from './store/columns';
import { createCommentStore } from './store/comments';
import { createTagStore } from './store/tags';

import { createCardRoutes } from './routes/cards';
import { createColumnRoutes } from './routes/columns';
import { createCommentRoutes } from './routes/comments';
import { createHealthRoutes } from './routes/health';
import metricsRoutes from './routes/metrics';
import { createTagRoutes } from './routes/tags';
import { createUserRoutes } from './routes/users';

export interface BuildAppOptions {
  /** Defaults to an adapter from DATABASE_URL. Closed with the app either way. */
  db?: DbAdapter;
  eagerAccessRevocation?: boolean;
}

export interface BuiltApp {
  app: FastifyInstance;
  db: DbAdapter;
  manager: ConnectionManager;
  notifier: BoardNotifier;
  wss: WebSocketServer;
}

export async function buildApp(options: BuildAppOptions = {}): Promise<BuiltApp> {
  const config = getConfig();
  const db = options.db ?? createAdapter();

  const migrations = await new MigrationRunner(db).runAll();
  if (migrations.failed) {
    await db.close();
    throw new Error(`Migration failed: ${migrations.failed}`);
  }

  const app = Fastify({
    logger: { level: getLogLevel() },
    genReqId: requestIdGenerator,
  });

  registerObservability(app);
  await app.register(cors, { origin: config.cors.origins });
  await registerRateLimit(app);

  // --- Stores ---
  const users = createUserStore(db);
  const sessions = createSessionStore(db);
  const boards = createBoardStore(db);
  const columns = createColumnStore(db);
  const cards = createCardStore(db);
  const tags = createTagStore(db);
  const comments = createCommentStore(db);

  // --- Realtime core ---
  const manager = new ConnectionManager();
  const notifier = new BoardNotifier(manager, {
    eagerAccessRevocation: options.eagerAccessRevocation ?? config.realtime.eagerAccessRevocation,
  });

  const identity = createIdentityVerifier(users);
  const permissions = createPermissionService(boards);
  const access = createBoardAccess({ boards, permissions, manager });

  registerAuthMiddleware(app, identity, config.apiPrefix);

  // --- Routes ---
  app.register(createHealthRoutes({ db, connectionCount: () => manager.connectionCount() }));
  app.register(metricsRoutes);

  app.register(
    async (api) => {
      api.register(createAuthRoutes({ users, sessions }), { prefix: '/auth' });
      api.register(createUserRoutes({ users, boards, notifier }));
      api.register(createBoardRoutes({ boards, columns, cards, tags, access, notifier }));
      api.register(createPermissionRoutes({ boards, users, access, notifier }));
      api.register(createColumnRoutes({ columns, access, notifier }));
      api.register(createCardRoutes({ cards, columns, boards, access, notifier }));
      api.register(createCommentRoutes({ comments, cards, columns, access, notifier }));
      api.register(createTagRoutes({ tags, cards, access, notifier }));
    },
    { prefix: config.apiPrefix }
  );

  const wss = installBoardWs(app, {
    apiPrefix: config.apiPrefix,
    manager,
    identity,
    permissions,
  });

  // Pending deliveries finish before the database goes away
  app.addHook('onClose', async () => {
    await notifier.flush();
    await db.close();
  });

  return { app, db, manager, notifier, wss };
}
