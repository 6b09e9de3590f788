import {
  characterLength,
  MAX_JSON_VALUE_LENGTH,
  validateJsonPath,
  validateJsonString,
} from '../../validators/JsonInputValidator.js';
import { FilterValidationError } from '../errors.js';
import type { EntityFilterParams, Result } from '../types.js';
import { err, ok } from '../types.js';
import { and, type FilterPredicate } from './FilterPredicate.js';
import { debugLog } from '../../utils/logger.js';

/**
 * Build the predicate for a list request.
 *
 * Each parameter is validated before it contributes a sub-predicate, and the
 * first invalid one aborts the whole build. Sub-predicates are combined with
 * AND; with no parameters the result is an empty AND, which matches all.
 *
 * `jsonPath` and `jsonValue` only apply together. Supplying just one of them is
 * not an error: the pair is skipped.
 *
 * @example
 * ```typescript
 * const result = buildEntityFilter({ jsonPath: 'b.c', jsonValue: '2' });
 * // { ok: true, value: { type: 'and', predicates: [
 * //   { type: 'pathEquals', path: ['b', 'c'], value: '2' } ] } }
 * ```
 */
export function buildEntityFilter(
  params: EntityFilterParams
): Result<FilterPredicate, FilterValidationError> {
  const predicates: FilterPredicate[] = [];
  const { jsonPath, jsonValue, jsonContains, jsonKeyExists } = params;

  if (jsonPath && jsonValue) {
    if (!validateJsonPath(jsonPath)) {
      return reject(
        new FilterValidationError('INVALID_PATH', 'json_path', 'Invalid JSON path format')
      );
    }

    if (characterLength(jsonValue) > MAX_JSON_VALUE_LENGTH) {
      return reject(
        new FilterValidationError('VALUE_TOO_LONG', 'json_value', 'JSON value too long')
      );
    }

    predicates.push({ type: 'pathEquals', path: jsonPath.split('.'), value: jsonValue });
  } else if (jsonPath || jsonValue) {
    debugLog('filter', 'json_path/json_value supplied without its pair, skipping', {
      hasPath: Boolean(jsonPath),
      hasValue: Boolean(jsonValue),
    });
  }

  if (jsonContains) {
    if (!validateJsonString(jsonContains)) {
      return reject(
        new FilterValidationError(
          'INVALID_CONTAINS_JSON',
          'json_contains',
          'Invalid JSON format or too long'
        )
      );
    }

    // Bound verbatim as jsonb
    predicates.push({ type: 'contains', document: jsonContains });
  }

  if (jsonKeyExists) {
    if (!validateJsonPath(jsonKeyExists)) {
      return reject(
        new FilterValidationError(
          'INVALID_KEY_PATH',
          'json_key_exists',
          'Invalid JSON key path format'
        )
      );
    }

    const segments = jsonKeyExists.split('.');
    if (segments.length === 1) {
      predicates.push({ type: 'keyExists', key: segments[0] });
    } else if (segments.length === 2) {
      predicates.push({ type: 'keyExists', parent: segments[0], key: segments[1] });
    } else {
      return reject(
        new FilterValidationError(
          'NESTED_KEY_TOO_DEEP',
          'json_key_exists',
          'Nested key check supports only one level'
        )
      );
    }
  }

  const predicate = and(predicates);
  debugLog('filter', 'Built entity filter', { predicate });
  return ok(predicate);
}

function reject(error: FilterValidationError): { ok: false; error: FilterValidationError } {
  debugLog('filter', 'Rejected filter parameter', {
    code: error.code,
    parameter: error.parameter,
  });
  return err(error);
}
