import type { Pool, PoolClient, QueryResultRow } from 'pg';
import { loadLoggingConfig } from '../../config/logging.js';
import { debugLog, logger } from '../../utils/logger.js';
import { EntityStorageError, type StorageDiagnostics } from '../errors.js';
import { isMatchAll, type FilterPredicate } from '../filter/FilterPredicate.js';
import type { IEntityRepository } from '../IEntityRepository.js';
import type { Entity, EntityInput, JsonObject, PageWindow } from '../types.js';
import { translatePredicate } from './PredicateTranslator.js';

interface EntityRow {
  id: number;
  created_at: Date;
  created_by: string;
  data: JsonObject;
}

const ENTITY_COLUMNS = 'id, created_at, created_by, data';

// `id` is a SERIAL (int4) column; nothing outside this range can exist
const MIN_ENTITY_ID = -2147483648;
const MAX_ENTITY_ID = 2147483647;

type ErrorInfo = Omit<StorageDiagnostics, 'operation' | 'durationMs'> & { message: string };

/**
 * EntityRepositoryPostgres
 * PostgreSQL implementation of IEntityRepository over a single `entities` table.
 *
 * Features:
 * - Pool injected by the caller; each operation checks out one client and
 *   always releases it
 * - Writes run inside BEGIN/COMMIT and roll back on failure
 * - Filters rendered by PredicateTranslator with every key and value bound
 * - Slow query logging against ENTITY_SLOW_QUERY_THRESHOLD_MS
 */
export class EntityRepositoryPostgres implements IEntityRepository {
  private pool: Pool;
  private slowQueryThresholdMs: number | null;

  constructor(pool: Pool) {
    this.pool = pool;

    const loggingConfig = loadLoggingConfig();
    this.slowQueryThresholdMs = loggingConfig.enableQueryPerformance
      ? loggingConfig.slowQueryThresholdMs
      : null;
  }

  async createEntity(input: EntityInput): Promise<Entity> {
    return this.withTransaction('createEntity', async (client) => {
      const rows = await this.runQuery<EntityRow>(
        client,
        `INSERT INTO entities (created_by, data)
         VALUES ($1, $2::jsonb)
         RETURNING ${ENTITY_COLUMNS}`,
        [input.createdBy, JSON.stringify(input.data)]
      );
      return toEntity(rows[0]);
    });
  }

  async getEntity(id: number): Promise<Entity | null> {
    if (!isStorableId(id)) {
      return null;
    }

    return this.withClient('getEntity', async (client) => {
      const rows = await this.runQuery<EntityRow>(
        client,
        `SELECT ${ENTITY_COLUMNS} FROM entities WHERE id = $1`,
        [id]
      );
      return rows.length > 0 ? toEntity(rows[0]) : null;
    });
  }

  async listEntities(predicate: FilterPredicate, window: PageWindow): Promise<Entity[]> {
    let query = `SELECT ${ENTITY_COLUMNS} FROM entities`;
    const params: unknown[] = [];

    if (!isMatchAll(predicate)) {
      const { sql, params: filterParams } = translatePredicate(predicate, 1);
      query += ` WHERE ${sql}`;
      params.push(...filterParams);
    }

    // Natural order is unspecified in Postgres; ordering by id keeps pages stable
    query += ` ORDER BY id OFFSET $${params.length + 1} LIMIT $${params.length + 2}`;
    params.push(window.skip, window.limit);

    return this.withClient('listEntities', async (client) => {
      const rows = await this.runQuery<EntityRow>(client, query, params);
      return rows.map(toEntity);
    });
  }

  async updateEntity(id: number, input: EntityInput): Promise<Entity | null> {
    if (!isStorableId(id)) {
      return null;
    }

    return this.withTransaction('updateEntity', async (client) => {
      const rows = await this.runQuery<EntityRow>(
        client,
        `UPDATE entities
         SET created_by = $1, data = $2::jsonb
         WHERE id = $3
         RETURNING ${ENTITY_COLUMNS}`,
        [input.createdBy, JSON.stringify(input.data), id]
      );
      return rows.length > 0 ? toEntity(rows[0]) : null;
    });
  }

  async deleteEntity(id: number): Promise<boolean> {
    if (!isStorableId(id)) {
      return false;
    }

    return this.withTransaction('deleteEntity', async (client) => {
      const rows = await this.runQuery<{ id: number }>(
        client,
        'DELETE FROM entities WHERE id = $1 RETURNING id',
        [id]
      );
      return rows.length > 0;
    });
  }

  async ping(): Promise<void> {
    await this.withClient('ping', async (client) => {
      await this.runQuery(client, 'SELECT 1 AS ok', []);
    });
  }

  async close(): Promise<void> {
    await this.pool.end();
  }

  private async withClient<T>(
    operation: string,
    fn: (client: PoolClient) => Promise<T>
  ): Promise<T> {
    const startTime = Date.now();
    let client: PoolClient | undefined;

    try {
      client = await this.pool.connect();
      return await fn(client);
    } catch (error) {
      throw this.toStorageError(operation, startTime, error);
    } finally {
      client?.release();
    }
  }

  private async withTransaction<T>(
    operation: string,
    fn: (client: PoolClient) => Promise<T>
  ): Promise<T> {
    return this.withClient(operation, async (client) => {
      await client.query('BEGIN');
      try {
        const result = await fn(client);
        await client.query('COMMIT');
        return result;
      } catch (error) {
        try {
          await client.query('ROLLBACK');
        } catch (rollbackError) {
          logger.error(`Rollback failed during ${operation}`, { error: rollbackError });
        }
        throw error;
      }
    });
  }

  private async runQuery<R extends QueryResultRow>(
    client: PoolClient,
    text: string,
    params: unknown[]
  ): Promise<R[]> {
    const start = Date.now();
    const result = await client.query<R>(text, params);
    const durationMs = Date.now() - start;

    debugLog('repository', 'Executed query', { text, paramCount: params.length, durationMs });

    if (this.slowQueryThresholdMs !== null && durationMs >= this.slowQueryThresholdMs) {
      logger.warn('Slow query', { text, durationMs, thresholdMs: this.slowQueryThresholdMs });
    }

    return result.rows;
  }

  private toStorageError(operation: string, startTime: number, error: unknown): EntityStorageError {
    if (error instanceof EntityStorageError) {
      return error;
    }

    const { message, ...info } = mapPostgresError(error);
    const diagnostics: StorageDiagnostics = {
      operation,
      durationMs: Date.now() - startTime,
      ...info,
    };

    return new EntityStorageError(`${operation} failed: ${message}`, diagnostics, error);
  }
}

function toEntity(row: EntityRow): Entity {
  return {
    id: row.id,
    createdAt: row.created_at,
    createdBy: row.created_by,
    data: row.data,
  };
}

function isStorableId(id: number): boolean {
  return Number.isInteger(id) && id >= MIN_ENTITY_ID && id <= MAX_ENTITY_ID;
}

/**
 * Classify driver and server errors into storage diagnostics.
 */
export function mapPostgresError(error: unknown): ErrorInfo {
  if (error && typeof error === 'object' && 'code' in error) {
    const sysError = error as { code?: string; message?: string };

    if (
      sysError.code === 'ECONNREFUSED' ||
      sysError.code === 'ENOTFOUND' ||
      sysError.code === 'ETIMEDOUT' ||
      sysError.code === 'ECONNRESET'
    ) {
      return {
        message: 'Unable to connect to PostgreSQL database',
        postgresCode: sysError.code,
        hint: 'Database connection failed',
        suggestedFixes: [
          'Check if PostgreSQL server is running and accessible',
          'Verify the DATABASE_URL environment variable is correct',
          'Check firewall rules and network connectivity',
        ],
      };
    }
  }

  if (error && typeof error === 'object' && 'severity' in error) {
    const pgError = error as {
      severity?: string;
      code?: string;
      message?: string;
      detail?: string;
      constraint?: string;
    };

    if (pgError.severity === 'FATAL' || pgError.code?.startsWith('57')) {
      return {
        message: `PostgreSQL connection error: ${pgError.message || 'Unknown error'}`,
        postgresCode: pgError.code,
        hint: 'Database connection terminated',
        suggestedFixes: ['Check database server status', 'Review PostgreSQL server logs'],
        details: { severity: pgError.severity, detail: pgError.detail },
      };
    }

    if (pgError.code === '42P01') {
      return {
        message: pgError.message || 'Relation does not exist',
        postgresCode: pgError.code,
        hint: 'The entities table is missing',
        suggestedFixes: ['Start the service with ENTITY_BOOTSTRAP_SCHEMA=true'],
      };
    }

    return {
      message: pgError.message || 'Unknown PostgreSQL error',
      postgresCode: pgError.code,
      hint: pgError.constraint ? `Constraint violated: ${pgError.constraint}` : undefined,
      details: { severity: pgError.severity, detail: pgError.detail },
    };
  }

  const message = error instanceof Error ? error.message : String(error);
  return {
    message,
    hint: 'An unexpected database error occurred',
    suggestedFixes: ['Check database logs for more details'],
  };
}
