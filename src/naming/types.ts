/**
 * Type definitions for the naming engine.
 *
 * Persisted record shapes live here next to the option bags accepted by the
 * session, so the serializer and the registry agree on one vocabulary.
 */

import type { Token } from './token.js';
import type { TokenNumber } from './token-number.js';

/** Schema version written into every persisted record */
export const SERIAL_VERSION = '1.0';

/**
 * Either kind of token a rule field can point at.
 * `kind` is the discriminant.
 */
export type AnyToken = Token | TokenNumber;

/** Value accepted for one field when solving a name */
export type SolveValue = string | number;

/** Value recovered for one field when parsing a name */
export type ParsedValue = string | number;

/** Field name -> parsed value, in rule field order */
export type ParsedName = Record<string, ParsedValue>;

/** Looks a token up by name; `undefined` when it does not exist */
export type TokenResolver = (name: string) => AnyToken | undefined;

/**
 * Options for registering an abbreviation token
 */
export interface TokenSpec {
  /** Full name -> abbreviation, in insertion order */
  readonly options?: Readonly<Record<string, string>>;

  /** Full-name key used when no value is given. Must be one of `options` */
  readonly default?: string;
}

/**
 * Options for registering a numeric token
 */
export interface TokenNumberSpec {
  /** Prepended to the padded digits: "v" in "v025" */
  readonly prefix?: string;

  /** Appended to the padded digits */
  readonly suffix?: string;

  /** Minimum digit width (values <= 0 become 1) */
  readonly padding?: number;
}

/**
 * Persisted form of a Token (.token file)
 */
export interface TokenData {
  readonly _classname: 'Token';
  readonly _version: string;
  readonly name: string;
  /** Effective default full-name key, or null for required tokens */
  readonly default: string | null;
  readonly options: Readonly<Record<string, string>>;
}

/**
 * Persisted form of a TokenNumber (.token file)
 */
export interface TokenNumberData {
  readonly _classname: 'TokenNumber';
  readonly _version: string;
  readonly name: string;
  readonly prefix: string;
  readonly suffix: string;
  readonly padding: number;
}

/**
 * Persisted form of a Rule (.rule file)
 */
export interface RuleData {
  readonly _classname: 'Rule';
  readonly _version: string;
  readonly name: string;
  readonly fields: readonly string[];
}

export type AnyTokenData = TokenData | TokenNumberData;

/**
 * Contents of naming.conf
 */
export interface SessionSettings {
  readonly set_active_rule?: string | null;
}

/**
 * What loadSession picked up from a repository
 */
export interface SessionLoadReport {
  readonly repo: string;
  readonly tokens: readonly string[];
  readonly rules: readonly string[];
  /** Files that could not be read or did not hold a valid record */
  readonly failed: readonly string[];
  /** naming.conf keys that are not recognized settings */
  readonly rejectedSettings: readonly string[];
}

/**
 * Validation result
 */
export interface ValidationResult {
  readonly valid: boolean;
  readonly errors: readonly string[];
}
