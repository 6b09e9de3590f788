import { EntityStorageError } from '../../src/entities/errors.js';
import type { FilterPredicate } from '../../src/entities/filter/FilterPredicate.js';
import type { IEntityRepository } from '../../src/entities/IEntityRepository.js';
import {
  isJsonValue,
  type Entity,
  type EntityInput,
  type JsonObject,
  type JsonValue,
  type PageWindow,
} from '../../src/entities/types.js';

/**
 * InMemoryEntityRepository
 * Test double for EntityRepositoryPostgres. Evaluates predicates the way the
 * JSONB operators do (`->`, `->>`, `@>`, `?`) so filter behaviour can be
 * exercised end to end without a database.
 */
export class InMemoryEntityRepository implements IEntityRepository {
  /** Method names in call order. */
  public readonly calls: string[] = [];

  private rows = new Map<number, Entity>();
  private nextId = 1;
  private unavailable = false;

  /**
   * Make every subsequent call fail the way an unreachable database does.
   */
  setUnavailable(unavailable: boolean): void {
    this.unavailable = unavailable;
  }

  async createEntity(input: EntityInput): Promise<Entity> {
    this.record('createEntity');
    const entity: Entity = {
      id: this.nextId++,
      createdAt: new Date(),
      createdBy: input.createdBy,
      data: cloneObject(input.data),
    };
    this.rows.set(entity.id, entity);
    return cloneEntity(entity);
  }

  async getEntity(id: number): Promise<Entity | null> {
    this.record('getEntity');
    const entity = this.rows.get(id);
    return entity ? cloneEntity(entity) : null;
  }

  async listEntities(predicate: FilterPredicate, window: PageWindow): Promise<Entity[]> {
    this.record('listEntities');
    return [...this.rows.values()]
      .sort((a, b) => a.id - b.id)
      .filter((entity) => matches(entity.data, predicate))
      .slice(window.skip, window.skip + window.limit)
      .map(cloneEntity);
  }

  async updateEntity(id: number, input: EntityInput): Promise<Entity | null> {
    this.record('updateEntity');
    const existing = this.rows.get(id);
    if (!existing) {
      return null;
    }
    const updated: Entity = {
      ...existing,
      createdBy: input.createdBy,
      data: cloneObject(input.data),
    };
    this.rows.set(id, updated);
    return cloneEntity(updated);
  }

  async deleteEntity(id: number): Promise<boolean> {
    this.record('deleteEntity');
    return this.rows.delete(id);
  }

  async ping(): Promise<void> {
    this.record('ping');
  }

  async close(): Promise<void> {
    this.rows.clear();
  }

  private record(method: string): void {
    this.calls.push(method);
    if (this.unavailable) {
      throw new EntityStorageError(
        `${method} failed: Unable to connect to PostgreSQL database`,
        { operation: method, durationMs: 0, postgresCode: 'ECONNREFUSED' }
      );
    }
  }
}

function cloneEntity(entity: Entity): Entity {
  return {
    ...entity,
    createdAt: new Date(entity.createdAt.getTime()),
    data: cloneObject(entity.data),
  };
}

// defineProperty keeps a `__proto__` key as data, as jsonb does
function cloneObject(value: JsonObject): JsonObject {
  const copy: JsonObject = {};
  for (const [key, val] of Object.entries(value)) {
    Object.defineProperty(copy, key, {
      value: cloneValue(val),
      enumerable: true,
      writable: true,
      configurable: true,
    });
  }
  return copy;
}

function cloneValue(value: JsonValue): JsonValue {
  if (Array.isArray(value)) {
    return value.map(cloneValue);
  }
  return isObject(value) ? cloneObject(value) : value;
}

function isObject(value: JsonValue): value is { [key: string]: JsonValue } {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function matches(data: JsonValue, predicate: FilterPredicate): boolean {
  switch (predicate.type) {
    case 'and':
      return predicate.predicates.every((child) => matches(data, child));
    case 'pathEquals':
      return pathText(data, predicate.path) === predicate.value;
    case 'contains': {
      const candidate: unknown = JSON.parse(predicate.document);
      return isJsonValue(candidate) && containsTopLevel(data, candidate);
    }
    case 'keyExists': {
      if (predicate.parent === undefined) {
        return hasKey(data, predicate.key);
      }
      const parent = field(data, predicate.parent);
      return parent !== undefined && hasKey(parent, predicate.key);
    }
  }
}

// `->` with a text key: only objects have fields
function field(value: JsonValue, key: string): JsonValue | undefined {
  return isObject(value) && Object.prototype.hasOwnProperty.call(value, key)
    ? value[key]
    : undefined;
}

// `-> ... ->>`: SQL NULL (undefined here) never equals anything
function pathText(data: JsonValue, path: string[]): string | undefined {
  let current: JsonValue | undefined = data;
  for (const segment of path) {
    if (current === undefined) {
      return undefined;
    }
    current = field(current, segment);
  }

  if (current === undefined || current === null) {
    return undefined;
  }
  return typeof current === 'string' ? current : jsonbText(current);
}

// jsonb output format: a space after each colon and comma
function jsonbText(value: JsonValue): string {
  if (Array.isArray(value)) {
    return `[${value.map(jsonbText).join(', ')}]`;
  }
  if (isObject(value)) {
    const entries = Object.entries(value).map(
      ([key, val]) => `${JSON.stringify(key)}: ${jsonbText(val)}`
    );
    return `{${entries.join(', ')}}`;
  }
  return JSON.stringify(value);
}

function hasKey(value: JsonValue, key: string): boolean {
  if (isObject(value)) {
    return Object.prototype.hasOwnProperty.call(value, key);
  }
  if (Array.isArray(value)) {
    return value.some((element) => element === key);
  }
  return value === key;
}

// A top-level array may contain a bare primitive
function containsTopLevel(document: JsonValue, candidate: JsonValue): boolean {
  if (Array.isArray(document) && !Array.isArray(candidate) && !isObject(candidate)) {
    return document.some((element) => element === candidate);
  }
  return contains(document, candidate);
}

function contains(document: JsonValue, candidate: JsonValue): boolean {
  if (isObject(candidate)) {
    if (!isObject(document)) {
      return false;
    }
    return Object.entries(candidate).every(([key, value]) => {
      const actual = field(document, key);
      return actual !== undefined && contains(actual, value);
    });
  }

  if (Array.isArray(candidate)) {
    if (!Array.isArray(document)) {
      return false;
    }
    return candidate.every((wanted) => document.some((element) => contains(element, wanted)));
  }

  return document === candidate;
}
