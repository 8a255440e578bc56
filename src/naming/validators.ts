/**
 * Validation for token and rule names.
 *
 * Names become file names in a session repository (`<name>.token`,
 * `<name>.rule`), so they must stay inside that directory.
 */

import { UsageError } from './errors.js';
import type { ValidationResult } from './types.js';

export type EntityKind = 'Token' | 'Rule';

/**
 * Validate a token or rule name
 *
 * Rules:
 * - Must not be empty
 * - Must not contain path separators or NUL
 * - Must not be '.' or '..'
 * - Must not start or end with whitespace
 *
 * @example
 * validateEntityName('side', 'Token')      // { valid: true, errors: [] }
 * validateEntityName('../etc', 'Rule')     // { valid: false, errors: [...] }
 */
export function validateEntityName(name: string, kind: EntityKind): ValidationResult {
  const errors: string[] = [];

  if (!name || name.length === 0) {
    errors.push(`${kind} name cannot be empty`);
  }

  if (/[/\\\0]/.test(name)) {
    errors.push(`${kind} name must not contain path separators`);
  }

  if (name === '.' || name === '..') {
    errors.push(`${kind} name must not be '.' or '..'`);
  }

  if (name.trim() !== name) {
    errors.push(`${kind} name must not start or end with whitespace`);
  }

  return Object.freeze({
    valid: errors.length === 0,
    errors: Object.freeze(errors),
  });
}

/**
 * Parse `full=abbreviation` pairs as given on the command line
 *
 * @example
 * parsePairs(['left=L', 'right=R'])  // { left: 'L', right: 'R' }
 * parsePairs(['eq=a=b'])             // { eq: 'a=b' }
 */
export function parsePairs(pairs: readonly string[]): Record<string, string> {
  const result: Record<string, string> = {};
  for (const pair of pairs) {
    const [key, ...valueParts] = pair.split('=');
    if (!key || valueParts.length === 0) {
      throw new UsageError(`Expected KEY=VALUE, got '${pair}'`);
    }
    result[key] = valueParts.join('=');
  }
  return result;
}
