import { existsSync, readFileSync } from 'fs';
import { join } from 'path';
import { executeWithRetry } from '../../utils/RetryStrategy.js';
import { logger } from '../../utils/logger.js';

// sql/ sits at the project root: three levels up from src/, four from dist/src/
const SCHEMA_CANDIDATES = [
  join(__dirname, '..', '..', '..', 'sql', 'entities.sql'),
  join(__dirname, '..', '..', '..', '..', 'sql', 'entities.sql'),
];

/** Anything that can run a multi-statement script: a pool or a single client. */
export interface SchemaExecutor {
  query(sql: string): Promise<unknown>;
}

export const SCHEMA_FILE =
  SCHEMA_CANDIDATES.find((candidate) => existsSync(candidate)) ?? SCHEMA_CANDIDATES[0];

/**
 * Create the `entities` table and its index if they do not exist.
 *
 * Retries while the server is still refusing connections, so the service can
 * start alongside its database.
 */
export async function ensureEntitySchema(
  executor: SchemaExecutor,
  schemaFile: string = SCHEMA_FILE
): Promise<void> {
  const sql = readFileSync(schemaFile, 'utf-8');

  await logger.withTimer('schema-bootstrap', { schemaFile }, () =>
    executeWithRetry(() => executor.query(sql), {
      maxRetries: 5,
      initialDelayMs: 250,
      onRetry: (attempt, delayMs, error) => {
        logger.warn('Database not ready, retrying schema bootstrap', {
          attempt,
          delayMs,
          error: error.message,
        });
      },
    })
  );
}
