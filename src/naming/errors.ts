/**
 * Error taxonomy for the naming engine.
 *
 * - UsageError: the caller broke a contract (missing required value, bad argument)
 * - LookupError: a name that must exist does not (unknown option, token or active rule)
 * - ParseError: a name or name part cannot be inverted into field values
 *
 * Registry queries (has/get/remove) never throw; they return sentinels.
 */

export type NamingErrorCode = 'USAGE' | 'LOOKUP' | 'PARSE';

export class NamingError extends Error {
  readonly code: NamingErrorCode;

  constructor(code: NamingErrorCode, message: string) {
    super(message);
    this.name = 'NamingError';
    this.code = code;
  }
}

export class UsageError extends NamingError {
  constructor(message: string) {
    super('USAGE', message);
    this.name = 'UsageError';
  }
}

export class LookupError extends NamingError {
  constructor(message: string) {
    super('LOOKUP', message);
    this.name = 'LookupError';
  }
}

export class ParseError extends NamingError {
  constructor(message: string) {
    super('PARSE', message);
    this.name = 'ParseError';
  }
}

/**
 * Extract a printable message from anything thrown
 */
export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
