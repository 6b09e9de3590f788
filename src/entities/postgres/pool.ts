import pg from 'pg';
import type { DatabaseConfig } from '../../config/database.js';
import { censorDatabaseUrl } from '../../config/database.js';
import { logger } from '../../utils/logger.js';

/**
 * Create the process-wide connection pool. The caller owns it: pass it to the
 * repository and call `end()` on shutdown.
 */
export function createDatabasePool(config: DatabaseConfig): pg.Pool {
  const pool = new pg.Pool({
    connectionString: config.databaseUrl,
    max: config.poolMax,
    idleTimeoutMillis: config.idleTimeoutMs,
    connectionTimeoutMillis: config.connectionTimeoutMs,
  });

  // Idle clients can error when the server drops them; without a listener the process exits
  pool.on('error', (error) => {
    logger.error('Idle PostgreSQL client error', {
      database: censorDatabaseUrl(config.databaseUrl),
      error,
    });
  });

  return pool;
}
