/**
 * Validation for user-supplied JSON paths and JSON text.
 *
 * Paths select which keys of the `data` column a query descends into, so the
 * structure of the query is caller-influenced even though every key ends up as
 * a bound parameter. Anything that fails these checks never reaches the
 * filter builder's output.
 */

/** One or more `[A-Za-z0-9_]` segments joined by single dots. */
export const JSON_PATH_PATTERN = /^[a-zA-Z0-9_]+(\.[a-zA-Z0-9_]+)*$/;

export const MAX_JSON_PATH_LENGTH = 100;

/** Maximum number of dots, i.e. six segments. */
export const MAX_JSON_PATH_DEPTH = 5;

export const MAX_JSON_VALUE_LENGTH = 1000;

export const MAX_JSON_CONTAINS_LENGTH = 5000;

/**
 * Check a dotted JSON path such as `user.age`.
 *
 * Rejects the empty string, paths longer than {@link MAX_JSON_PATH_LENGTH},
 * anything outside {@link JSON_PATH_PATTERN}, and paths with more than
 * {@link MAX_JSON_PATH_DEPTH} dots.
 */
export function validateJsonPath(path: string): boolean {
  if (!path || path.length > MAX_JSON_PATH_LENGTH) {
    return false;
  }

  if (!JSON_PATH_PATTERN.test(path)) {
    return false;
  }

  return countDots(path) <= MAX_JSON_PATH_DEPTH;
}

/**
 * Check that `text` is non-empty, at most `maxLength` characters, and parses as JSON.
 */
export function validateJsonString(
  text: string,
  maxLength: number = MAX_JSON_CONTAINS_LENGTH
): boolean {
  if (!text || characterLength(text) > maxLength) {
    return false;
  }

  try {
    JSON.parse(text);
    return true;
  } catch {
    return false;
  }
}

/**
 * Length in Unicode code points, so a character outside the BMP counts once.
 */
export function characterLength(text: string): number {
  return Array.from(text).length;
}

function countDots(path: string): number {
  let count = 0;
  for (const ch of path) {
    if (ch === '.') {
      count++;
    }
  }
  return count;
}
