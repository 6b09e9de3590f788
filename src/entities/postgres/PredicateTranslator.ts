/**
 * Predicate → PostgreSQL translation
 *
 * Renders a {@link FilterPredicate} tree into a WHERE fragment over the
 * `data JSONB` column of the `entities` table.
 *
 * @remarks
 * **Operators:**
 * - `pathEquals` descends with `->` and reads the last key with `->>` (text)
 * - `contains` uses JSONB containment `@>`
 * - `keyExists` uses the JSONB key-existence operator `?`
 *
 * **Security:**
 * Keys and values are always bound as `$n` parameters, never spliced into the
 * SQL text. The only identifiers in the output are the fixed column name and
 * operators. node-postgres leaves `?` alone, so it needs no escaping.
 *
 * **Examples:**
 * ```
 * pathEquals ['b', 'c'] = '2'     →  data -> $1::text ->> $2::text = $3::text
 * contains {"a": 1}                →  data @> $1::jsonb
 * keyExists b.c                    →  (data -> $1::text) ? $2::text
 * and []                           →  TRUE
 * ```
 */

import type {
  AndPredicate,
  ContainsPredicate,
  FilterPredicate,
  KeyExistsPredicate,
  PathEqualsPredicate,
} from '../filter/FilterPredicate.js';

export interface SQLTranslation {
  sql: string;
  params: unknown[];
}

const DATA_COLUMN = 'data';

class PredicateTranslator {
  private params: unknown[] = [];
  private paramIndex: number;

  constructor(startIndex: number) {
    this.paramIndex = startIndex;
  }

  translate(predicate: FilterPredicate): SQLTranslation {
    const sql = this.translateNode(predicate);
    return { sql, params: this.params };
  }

  private addParam(value: unknown, cast: 'text' | 'jsonb'): string {
    this.params.push(value);
    return `$${this.paramIndex++}::${cast}`;
  }

  private translateNode(node: FilterPredicate): string {
    switch (node.type) {
      case 'and':
        return this.translateAnd(node);
      case 'pathEquals':
        return this.translatePathEquals(node);
      case 'contains':
        return this.translateContains(node);
      case 'keyExists':
        return this.translateKeyExists(node);
    }
  }

  private translateAnd(node: AndPredicate): string {
    if (node.predicates.length === 0) {
      return 'TRUE';
    }

    const parts = node.predicates.map((child) => this.translateNode(child));
    if (parts.length === 1) {
      return parts[0];
    }
    return `(${parts.join(' AND ')})`;
  }

  private translatePathEquals(node: PathEqualsPredicate): string {
    if (node.path.length === 0) {
      throw new Error('pathEquals predicate requires at least one path segment');
    }

    const parents = node.path.slice(0, -1);
    const leaf = node.path[node.path.length - 1];

    let expression = DATA_COLUMN;
    for (const segment of parents) {
      expression += ` -> ${this.addParam(segment, 'text')}`;
    }
    expression += ` ->> ${this.addParam(leaf, 'text')}`;

    return `${expression} = ${this.addParam(node.value, 'text')}`;
  }

  private translateContains(node: ContainsPredicate): string {
    return `${DATA_COLUMN} @> ${this.addParam(node.document, 'jsonb')}`;
  }

  private translateKeyExists(node: KeyExistsPredicate): string {
    if (node.parent === undefined) {
      return `${DATA_COLUMN} ? ${this.addParam(node.key, 'text')}`;
    }

    const parent = this.addParam(node.parent, 'text');
    return `(${DATA_COLUMN} -> ${parent}) ? ${this.addParam(node.key, 'text')}`;
  }
}

/**
 * Translate a predicate tree into a parameterised WHERE fragment.
 *
 * @param startIndex - number of the first placeholder, for appending to a
 *   statement that already binds parameters
 */
export function translatePredicate(predicate: FilterPredicate, startIndex = 1): SQLTranslation {
  return new PredicateTranslator(startIndex).translate(predicate);
}
