// Bridge entry point
//
// Loads configuration and tables, supervises every configured interface and
// serves the API until SIGINT/SIGTERM.

import { InMemoryHistoryRepository, postgres } from '@rvlink/repositories';
import type { EntityHistoryRepository } from '@rvlink/repositories';
import { consoleLogger, createGateway, createLevelLogger, describeError, loadTables } from '@rvlink/runtime';
import { createBusFactory } from './buses.js';
import { loadConfig } from './config.js';
import { createApp } from './http.js';

async function main(): Promise<void> {
  const config = loadConfig(process.env);
  const logger = createLevelLogger(config.logLevel);

  const tables = await loadTables({
    specificationPath: config.specificationPath,
    mappingDirectory: config.mappingDirectory,
    model: config.model,
    defaultInterface: config.interfaces[0],
    logger,
  });

  let history: EntityHistoryRepository;
  let closeDatabase = async () => {};
  if (config.databaseUrl) {
    const database = postgres.createDatabase({ connectionString: config.databaseUrl });
    history = new postgres.PgHistoryRepository(database.db);
    closeDatabase = database.close;
    logger.info('Recording history in Postgres');
  } else {
    history = new InMemoryHistoryRepository();
  }

  const gateway = createGateway({
    ...tables,
    history,
    logger,
    hubCapacity: config.subscriberQueueCapacity,
  });

  const open = createBusFactory(config);
  const supervised = config.interfaces.map((name) =>
    gateway.supervise(name, open).catch((error: unknown) => {
      logger.error('Interface supervision failed', { interface: name, ...describeError(error) });
    })
  );

  const server = createApp({ gateway, logger }).listen(config.port, config.host, () => {
    logger.info('Bridge listening', {
      host: config.host,
      port: config.port,
      interfaces: config.interfaces,
      bus: config.bus,
    });
  });

  const shutdown = async (signal: string) => {
    logger.info('Shutting down', { signal });
    server.close();
    server.closeAllConnections();
    await gateway.stop();
    await Promise.all(supervised);
    await closeDatabase();
  };

  for (const signal of ['SIGINT', 'SIGTERM'] as const) {
    process.once(signal, () => {
      shutdown(signal).catch((error: unknown) => {
        logger.error('Shutdown failed', describeError(error));
        process.exitCode = 1;
      });
    });
  }
}

main().catch((error: unknown) => {
  consoleLogger.error('Bridge failed to start', describeError(error));
  process.exitCode = 1;
});
