// Loads .env before any module reads process.env
import 'dotenv/config';
import type { Server } from 'http';
import { censorDatabaseUrl, loadDatabaseConfig } from './config/database.js';
import { loadLoggingConfig } from './config/logging.js';
import { loadServerConfig } from './config/server.js';
import { EntityService } from './entities/EntityService.js';
import { createDatabasePool } from './entities/postgres/pool.js';
import { EntityRepositoryPostgres } from './entities/postgres/EntityRepositoryPostgres.js';
import { ensureEntitySchema } from './entities/postgres/schema.js';
import { createApp } from './server/app.js';
import { logger } from './utils/logger.js';

async function main() {
  const databaseConfig = loadDatabaseConfig();
  const serverConfig = loadServerConfig();
  const loggingConfig = loadLoggingConfig();
  const database = censorDatabaseUrl(databaseConfig.databaseUrl);

  const pool = createDatabasePool(databaseConfig);

  if (databaseConfig.bootstrapSchema) {
    await ensureEntitySchema(pool);
  }

  const repository = new EntityRepositoryPostgres(pool);
  const service = new EntityService(repository);
  const app = createApp({
    service,
    jsonBodyLimit: serverConfig.jsonBodyLimit,
    requestTiming: loggingConfig.enableRequestTiming,
  });

  const server = await new Promise<Server>((resolve, reject) => {
    const listening = app.listen(serverConfig.port, serverConfig.host, () => resolve(listening));
    listening.once('error', reject);
  });

  logger.info('Entity store listening', {
    host: serverConfig.host,
    port: serverConfig.port,
    database,
  });

  let shuttingDown = false;
  const shutdown = async (signal: NodeJS.Signals) => {
    if (shuttingDown) {
      return;
    }
    shuttingDown = true;
    logger.info('Shutting down', { signal });

    await new Promise<void>((resolve, reject) => {
      server.close((error) => (error ? reject(error) : resolve()));
    });
    await repository.close();
    logger.info('Connection pool closed', { database });
  };

  for (const signal of ['SIGINT', 'SIGTERM'] as const) {
    process.once(signal, () => {
      shutdown(signal)
        .then(() => process.exit(0))
        .catch((error) => {
          logger.error('Shutdown failed', { error });
          process.exit(1);
        });
    });
  }
}

main().catch((error) => {
  logger.error('Failed to start entity store', { error });
  process.exit(1);
});
