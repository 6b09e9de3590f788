/**
 * Request validation schemas and the wire format of an entity.
 */

import { z } from 'zod';
import {
  DEFAULT_PAGE_WINDOW,
  MAX_LIMIT,
  MAX_SKIP,
  isJsonObject,
  type Entity,
  type JsonObject,
  type ListEntitiesQuery,
} from '../entities/types.js';

/**
 * A JSON object, passed through as the same reference.
 *
 * `z.record` rebuilds objects and skips `__proto__` keys; this checks the
 * body-parser's object in place instead.
 */
export const JsonObjectSchema = z.custom<JsonObject>(isJsonObject, {
  message: 'data must be a JSON object',
});

export const EntityBodySchema = z.object({
  created_by: z.string().min(1, 'created_by cannot be empty'),
  data: JsonObjectSchema,
});

export const EntityIdParamsSchema = z.object({
  id: z
    .string()
    .regex(/^-?\d+$/, 'Entity id must be an integer')
    .transform((value) => Number(value)),
});

// Empty query parameters count as absent
const optionalFilterParam = z
  .string()
  .optional()
  .transform((value) => (value === '' ? undefined : value));

export const ListEntitiesQuerySchema = z.object({
  skip: z.coerce.number().int().min(0).max(MAX_SKIP).default(DEFAULT_PAGE_WINDOW.skip),
  limit: z.coerce.number().int().min(1).max(MAX_LIMIT).default(DEFAULT_PAGE_WINDOW.limit),
  json_path: optionalFilterParam,
  json_value: optionalFilterParam,
  json_contains: optionalFilterParam,
  json_key_exists: optionalFilterParam,
});

export type EntityBody = z.infer<typeof EntityBodySchema>;

export interface EntityResponse {
  id: number;
  created_at: string;
  created_by: string;
  data: Entity['data'];
}

export function toListEntitiesQuery(
  query: z.infer<typeof ListEntitiesQuerySchema>
): ListEntitiesQuery {
  return {
    skip: query.skip,
    limit: query.limit,
    jsonPath: query.json_path,
    jsonValue: query.json_value,
    jsonContains: query.json_contains,
    jsonKeyExists: query.json_key_exists,
  };
}

export function toEntityResponse(entity: Entity): EntityResponse {
  return {
    id: entity.id,
    created_at: entity.createdAt.toISOString(),
    created_by: entity.createdBy,
    data: entity.data,
  };
}
