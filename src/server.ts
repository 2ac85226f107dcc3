// src/server.ts
import { buildApp } from './app';
import { getConfig } from './config';
import { createLogger } from './observability';

const log = createLogger('startup');

async function main() {
  const config = getConfig();
  const { app, manager } = await buildApp();

  app.log.info(
    {
      node: process.version,
      env: config.nodeEnv,
      dbDriver: config.database.driver,
      apiPrefix: config.apiPrefix,
    },
    'Kanban API boot'
  );

  let shuttingDown = false;
  const shutdown = (signal: NodeJS.Signals) => {
    if (shuttingDown) return;
    shuttingDown = true;
    log.info({ signal, connections: manager.connectionCount() }, 'Shutting down');

    // onClose hooks close sockets with 1001, drain the dispatch queue and close the database
    app.close().then(
      () => {
        log.info('Shutdown complete');
        process.exit(0);
      },
      (err: unknown) => {
        log.error({ err }, 'Shutdown failed');
        process.exit(1);
      }
    );
  };
  process.on('SIGINT', shutdown);
  process.on('SIGTERM', shutdown);

  await app.listen({ port: config.port, host: config.host });
  app.log.info({ port: config.port }, 'API listening');
}

main().catch((err) => {
  log.fatal({ err }, 'Server startup failed');
  process.exit(1);
});
