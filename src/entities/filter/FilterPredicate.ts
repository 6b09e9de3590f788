/**
 * Predicate tree over the `data` document of an entity.
 *
 * Built by the filter builder from validated parameters and rendered by a
 * storage adapter (see `postgres/PredicateTranslator.ts`), so validation and
 * SQL generation stay independent of each other.
 */
export type FilterPredicate =
  | PathEqualsPredicate
  | ContainsPredicate
  | KeyExistsPredicate
  | AndPredicate;

/**
 * Descend through `path[0..n-2]` as nested objects and compare the value at
 * `path[n-1]`, read as text, with `value`.
 */
export interface PathEqualsPredicate {
  type: 'pathEquals';
  path: string[];
  value: string;
}

/**
 * The document is a structural superset of `document` (JSONB `@>`).
 *
 * `document` is JSON text that has already passed `validateJsonString`.
 */
export interface ContainsPredicate {
  type: 'contains';
  document: string;
}

/**
 * `key` exists at the top level, or inside the object at `parent` when given.
 */
export interface KeyExistsPredicate {
  type: 'keyExists';
  parent?: string;
  key: string;
}

/**
 * Conjunction. An empty list matches every entity.
 */
export interface AndPredicate {
  type: 'and';
  predicates: FilterPredicate[];
}

export function and(predicates: FilterPredicate[]): AndPredicate {
  return { type: 'and', predicates };
}

export function isMatchAll(predicate: FilterPredicate): boolean {
  return predicate.type === 'and' && predicate.predicates.every(isMatchAll);
}
