/**
 * Naming session: the registry of tokens and rules plus the active rule.
 *
 * Every operation works against an explicit session object; there is no
 * process-wide state. A session is not safe for concurrent use without
 * external synchronization.
 *
 * @example
 * const session = new NamingSession();
 * session.addToken('category');
 * session.addToken('side', { options: { left: 'L', right: 'R' } });
 * session.addTokenNumber('version', { prefix: 'v' });
 * session.addRule('asset', 'category', 'side', 'version');
 *
 * session.solve(['char', 1], { side: 'right' }); // 'char_R_v001'
 * session.parse('char_R_v001'); // { category: 'char', side: 'right', version: 1 }
 */

import { LookupError, UsageError } from './errors.js';
import { Rule } from './rule.js';
import { Token } from './token.js';
import { TokenNumber } from './token-number.js';
import type {
  AnyToken,
  ParsedName,
  SolveValue,
  TokenNumberSpec,
  TokenSpec,
} from './types.js';

export class NamingSession {
  private readonly tokens = new Map<string, AnyToken>();
  private readonly rules = new Map<string, Rule>();
  private activeName: string | null = null;

  // ---------------------------------------------------------------------------
  // Tokens
  // ---------------------------------------------------------------------------

  /**
   * Register an abbreviation token, replacing any token with the same name
   *
   * @param name - Token name, referenced by rule fields
   * @param init - Options (full name -> abbreviation) and an optional default key
   * @throws UsageError if `init.default` is not one of the options
   */
  addToken(name: string, init: TokenSpec = {}): Token {
    const token = new Token(name);
    for (const [fullName, abbreviation] of Object.entries(init.options ?? {})) {
      token.addOption(fullName, abbreviation);
    }
    if (init.default !== undefined) {
      token.default = init.default;
    }
    this.tokens.set(name, token);
    return token;
  }

  /**
   * Register a numeric token, replacing any token with the same name
   *
   * @param init - prefix and suffix default to '', padding to 3
   */
  addTokenNumber(name: string, init: TokenNumberSpec = {}): TokenNumber {
    const token = new TokenNumber(name);
    token.prefix = init.prefix ?? '';
    token.suffix = init.suffix ?? '';
    token.padding = init.padding ?? 3;
    this.tokens.set(name, token);
    return token;
  }

  /**
   * Put an already built token into the registry
   */
  registerToken(token: AnyToken): void {
    this.tokens.set(token.name, token);
  }

  removeToken(name: string): boolean {
    return this.tokens.delete(name);
  }

  hasToken(name: string): boolean {
    return this.tokens.has(name);
  }

  getToken(name: string): AnyToken | undefined {
    return this.tokens.get(name);
  }

  getTokens(): ReadonlyMap<string, AnyToken> {
    return new Map(this.tokens);
  }

  resetTokens(): void {
    this.tokens.clear();
  }

  // ---------------------------------------------------------------------------
  // Rules
  // ---------------------------------------------------------------------------

  /**
   * Register a rule. It becomes active when no usable active rule exists.
   *
   * @throws UsageError if no fields are given
   */
  addRule(name: string, ...fields: string[]): Rule {
    const rule = new Rule(name, fields);
    this.registerRule(rule);
    if (this.getActiveRule() === undefined) {
      this.activeName = name;
    }
    return rule;
  }

  /**
   * Put an already built rule into the registry without touching the active rule
   */
  registerRule(rule: Rule): void {
    this.rules.set(rule.name, rule);
  }

  /**
   * Remove a rule. Removing the active rule leaves the pointer dangling, so
   * getActiveRule() returns undefined until another rule is activated.
   */
  removeRule(name: string): boolean {
    return this.rules.delete(name);
  }

  hasRule(name: string): boolean {
    return this.rules.has(name);
  }

  getRule(name: string): Rule | undefined {
    return this.rules.get(name);
  }

  getRules(): ReadonlyMap<string, Rule> {
    return new Map(this.rules);
  }

  /**
   * Clear all rules and the active rule
   */
  resetRules(): void {
    this.rules.clear();
    this.activeName = null;
  }

  /**
   * @returns false when no rule has that name
   */
  setActiveRule(name: string): boolean {
    if (!this.rules.has(name)) {
      return false;
    }
    this.activeName = name;
    return true;
  }

  /**
   * The active rule, or undefined when none is set or it was removed
   */
  getActiveRule(): Rule | undefined {
    return this.activeName === null ? undefined : this.rules.get(this.activeName);
  }

  /** Raw active-rule pointer; may name a removed rule */
  get activeRuleName(): string | null {
    return this.activeName;
  }

  // ---------------------------------------------------------------------------
  // Solve / parse
  // ---------------------------------------------------------------------------

  /**
   * Build a name with the active rule.
   *
   * Numeric and required fields take `named[field]` when present, otherwise
   * the next positional value. Optional fields only read `named`; when absent
   * the token's default is used.
   *
   * @param positional - Values for numeric and required fields, in rule order
   * @param named - Values by field name
   * @throws LookupError if no rule is active or a field has no token
   * @throws UsageError if positional values run out
   */
  solve(
    positional: readonly SolveValue[] = [],
    named: Readonly<Record<string, SolveValue>> = {},
  ): string {
    const rule = this.requireActiveRule();
    const values: Record<string, string> = {};
    let next = 0;

    const take = (field: string): SolveValue => {
      const value = namedValue(named, field);
      if (value !== undefined) {
        return value;
      }
      const fromPosition = positional[next];
      if (fromPosition === undefined) {
        throw new UsageError(
          `No value for field '${field}' of rule '${rule.name}': ${positional.length} positional value(s) given`,
        );
      }
      next++;
      return fromPosition;
    };

    for (const field of rule.fields) {
      const token = this.requireToken(field, rule);

      if (token.kind === 'number') {
        values[field] = token.solve(toInteger(take(field), field));
      } else if (token.required) {
        values[field] = String(take(field));
      } else {
        const value = namedValue(named, field);
        values[field] = token.solve(value === undefined ? undefined : String(value));
      }
    }

    return rule.solve(values);
  }

  /**
   * Split a name into field values with the active rule
   *
   * @throws LookupError if no rule is active
   */
  parse(name: string): ParsedName {
    const rule = this.requireActiveRule();
    return rule.parse(name, (tokenName) => this.getToken(tokenName));
  }

  private requireActiveRule(): Rule {
    const rule = this.getActiveRule();
    if (!rule) {
      throw new LookupError(
        this.activeName === null
          ? 'No active rule set'
          : `Active rule '${this.activeName}' no longer exists`,
      );
    }
    return rule;
  }

  private requireToken(name: string, rule: Rule): AnyToken {
    const token = this.tokens.get(name);
    if (!token) {
      throw new LookupError(`Token '${name}' used by rule '${rule.name}' does not exist`);
    }
    return token;
  }
}

function namedValue(
  named: Readonly<Record<string, SolveValue>>,
  field: string,
): SolveValue | undefined {
  return Object.hasOwn(named, field) ? named[field] : undefined;
}

function toInteger(value: SolveValue, field: string): number {
  if (typeof value === 'number') {
    return value;
  }
  if (!/^\d+$/.test(value)) {
    throw new UsageError(`Field '${field}' expects a number, got '${value}'`);
  }
  return Number.parseInt(value, 10);
}
