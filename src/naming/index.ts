/**
 * Naming-convention engine for nameforge
 *
 * Tokens describe the fields of a name, rules put fields in order, and a
 * session holds both plus the active rule. Sessions persist to a directory
 * of JSON files.
 *
 * @example
 * import { NamingSession, saveSession } from './naming/index.js';
 *
 * const session = new NamingSession();
 * session.addToken('category');
 * session.addToken('name');
 * session.addTokenNumber('version', { prefix: 'v', padding: 3 });
 * session.addRule('asset', 'category', 'name', 'version');
 *
 * session.solve([], { category: 'char', name: 'hero', version: 1 }); // 'char_hero_v001'
 * session.parse('char_hero_v001'); // { category: 'char', name: 'hero', version: 1 }
 * saveSession(session, './naming-repo');
 */

// Errors
export {
  errorMessage,
  LookupError,
  NamingError,
  type NamingErrorCode,
  ParseError,
  UsageError,
} from './errors.js';
// Entities
export { Rule, SEPARATOR } from './rule.js';
// Serialization
export {
  type FromDataResult,
  ruleFromData,
  ruleToData,
  tokenFromData,
  tokenToData,
} from './serialize.js';
// Registry
export { NamingSession } from './session.js';
// Persistence
export {
  loadRule,
  loadSession,
  loadToken,
  NAMING_REPO_ENV,
  RULE_EXTENSION,
  resolveRepo,
  type SaveSessionOptions,
  SESSION_CONFIG_FILE,
  saveRule,
  saveSession,
  saveToken,
  TOKEN_EXTENSION,
} from './store.js';
export { Token } from './token.js';
export { TokenNumber } from './token-number.js';
// Type definitions
export type {
  AnyToken,
  AnyTokenData,
  ParsedName,
  ParsedValue,
  RuleData,
  SessionLoadReport,
  SessionSettings,
  SolveValue,
  TokenData,
  TokenNumberData,
  TokenNumberSpec,
  TokenResolver,
  TokenSpec,
  ValidationResult,
} from './types.js';
export { SERIAL_VERSION } from './types.js';
// Validation functions
export { type EntityKind, parsePairs, validateEntityName } from './validators.js';
