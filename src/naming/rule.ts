/**
 * Naming rule: an ordered list of token names joined by underscores.
 *
 * @example
 * const rule = new Rule('asset', ['category', 'name', 'version']);
 * rule.pattern; // '{category}_{name}_{version}'
 * rule.solve({ category: 'char', name: 'hero', version: 'v001' }); // 'char_hero_v001'
 */

import { LookupError, ParseError, UsageError } from './errors.js';
import type { ParsedName, TokenResolver } from './types.js';

export const SEPARATOR = '_';

const PLACEHOLDER = /\{([^{}]+)\}/g;

export class Rule {
  private readonly fieldList: string[] = [];

  /**
   * @throws UsageError if `fields` is empty
   */
  constructor(
    public name: string,
    fields: readonly string[],
  ) {
    if (fields.length === 0) {
      throw new UsageError(`Rule '${name}' needs at least one field`);
    }
    this.addFields(...fields);
  }

  /**
   * Append token names to the field list
   */
  addFields(...tokenNames: string[]): void {
    this.fieldList.push(...tokenNames);
  }

  get fields(): readonly string[] {
    return [...this.fieldList];
  }

  /** Placeholder pattern, e.g. '{side}_{name}_{version}' */
  get pattern(): string {
    return this.fieldList.map((field) => `{${field}}`).join(SEPARATOR);
  }

  /**
   * Substitute already-solved pieces into the pattern
   *
   * @param values - Field name -> text for that position
   * @throws LookupError if a field has no value
   */
  solve(values: Readonly<Record<string, string>>): string {
    return this.pattern.replace(PLACEHOLDER, (_match, field: string) => {
      const value = Object.hasOwn(values, field) ? values[field] : undefined;
      if (value === undefined) {
        throw new LookupError(`Missing value for field '${field}' in rule '${this.name}'`);
      }
      return value;
    });
  }

  /**
   * Split a name into its fields and parse each part with its token.
   *
   * Parts are matched by position, so a value that itself contains an
   * underscore cannot be parsed back.
   *
   * @param name - Name built with this rule
   * @param resolveToken - Token lookup, usually the session's `getToken`
   * @throws ParseError if the part count does not match the field count
   * @throws LookupError if a field names an unknown token
   */
  parse(name: string, resolveToken: TokenResolver): ParsedName {
    const parts = name.split(SEPARATOR);
    if (parts.length !== this.fieldList.length) {
      throw new ParseError(
        `Name '${name}' has ${parts.length} parts but rule '${this.name}' expects ${this.fieldList.length} (${this.pattern})`,
      );
    }

    const result: ParsedName = {};
    this.fieldList.forEach((field, index) => {
      const token = resolveToken(field);
      if (!token) {
        throw new LookupError(`Token '${field}' used by rule '${this.name}' does not exist`);
      }

      const part = parts[index] ?? '';
      if (token.kind === 'number') {
        result[field] = token.parse(part);
      } else if (token.required) {
        result[field] = part;
      } else {
        result[field] = token.parse(part);
      }
    });
    return result;
  }
}
