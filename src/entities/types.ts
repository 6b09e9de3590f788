/**
 * Entity domain types.
 */

export type JsonPrimitive = string | number | boolean | null;

export type JsonValue = JsonPrimitive | JsonValue[] | { [key: string]: JsonValue };

export type JsonObject = { [key: string]: JsonValue };

export function isJsonValue(value: unknown): value is JsonValue {
  if (value === null || typeof value === 'string' || typeof value === 'boolean') {
    return true;
  }
  if (typeof value === 'number') {
    return Number.isFinite(value);
  }
  if (Array.isArray(value)) {
    return value.every(isJsonValue);
  }
  return isJsonObject(value);
}

/**
 * Plain JSON object check over own keys, so a `__proto__` key is treated like any other.
 */
export function isJsonObject(value: unknown): value is JsonObject {
  if (typeof value !== 'object' || value === null || Array.isArray(value)) {
    return false;
  }
  return Object.values(value).every(isJsonValue);
}

/**
 * A stored record pairing metadata with an arbitrary JSON document.
 */
export interface Entity {
  id: number;
  createdAt: Date;
  createdBy: string;
  data: JsonObject;
}

/**
 * Fields supplied on create and replaced wholesale on update.
 */
export interface EntityInput {
  createdBy: string;
  data: JsonObject;
}

export interface PageWindow {
  skip: number;
  limit: number;
}

/**
 * Optional filter parameters of the list operation, named as they arrive on
 * the query string. Empty strings are treated as absent.
 */
export interface EntityFilterParams {
  jsonPath?: string;
  jsonValue?: string;
  jsonContains?: string;
  jsonKeyExists?: string;
}

export interface ListEntitiesQuery extends EntityFilterParams, PageWindow {}

export const DEFAULT_PAGE_WINDOW: PageWindow = { skip: 0, limit: 100 };
export const MAX_SKIP = 10_000;
export const MAX_LIMIT = 1000;

/**
 * Success-or-failure value used instead of throwing across the filter and service layers.
 */
export type Result<T, E> = { ok: true; value: T } | { ok: false; error: E };

export function ok<T>(value: T): { ok: true; value: T } {
  return { ok: true, value };
}

export function err<E>(error: E): { ok: false; error: E } {
  return { ok: false, error };
}
