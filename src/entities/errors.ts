/**
 * Error taxonomy surfaced by the entity service.
 *
 * - `NOT_FOUND`: an id lookup found no row (404)
 * - `INVALID_REQUEST`: a filter parameter failed validation (400)
 * - `STORAGE_FAILURE`: the database failed unexpectedly (500, 503 for health)
 */

export type EntityErrorKind = 'NOT_FOUND' | 'INVALID_REQUEST' | 'STORAGE_FAILURE';

export type FilterErrorCode =
  | 'INVALID_PATH'
  | 'VALUE_TOO_LONG'
  | 'INVALID_CONTAINS_JSON'
  | 'INVALID_KEY_PATH'
  | 'NESTED_KEY_TOO_DEEP';

export type FilterParameter = 'json_path' | 'json_value' | 'json_contains' | 'json_key_exists';

export class EntityNotFoundError extends Error {
  public readonly kind = 'NOT_FOUND' as const;
  public readonly entityId: number;

  constructor(entityId: number) {
    super('Entity not found');
    this.name = 'EntityNotFoundError';
    this.entityId = entityId;
  }
}

/**
 * A filter parameter was rejected before any query ran.
 */
export class FilterValidationError extends Error {
  public readonly kind = 'INVALID_REQUEST' as const;
  public readonly code: FilterErrorCode;
  public readonly parameter: FilterParameter;

  constructor(code: FilterErrorCode, parameter: FilterParameter, message: string) {
    super(message);
    this.name = 'FilterValidationError';
    this.code = code;
    this.parameter = parameter;
  }
}

/**
 * Diagnostic context captured when a storage call fails.
 */
export interface StorageDiagnostics {
  operation: string;
  durationMs: number;
  postgresCode?: string;
  hint?: string;
  suggestedFixes?: string[];
  details?: Record<string, unknown>;
}

export class EntityStorageError extends Error {
  public readonly kind = 'STORAGE_FAILURE' as const;
  public readonly diagnostics: StorageDiagnostics;

  constructor(message: string, diagnostics: StorageDiagnostics, cause?: unknown) {
    super(message, cause !== undefined ? { cause } : undefined);
    this.name = 'EntityStorageError';
    this.diagnostics = diagnostics;

    if (Error.captureStackTrace) {
      Error.captureStackTrace(this, EntityStorageError);
    }
  }

  get postgresCode(): string | undefined {
    return this.diagnostics.postgresCode;
  }

  get hint(): string | undefined {
    return this.diagnostics.hint;
  }
}

export type EntityServiceError = EntityNotFoundError | FilterValidationError | EntityStorageError;
