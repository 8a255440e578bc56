/**
 * Abbreviation token: one field of a naming rule.
 *
 * A token either has options (full name -> abbreviation) and therefore a
 * default, or it has none and is "required": the caller types the value.
 *
 * @example
 * const side = new Token('side');
 * side.addOption('left', 'L');
 * side.addOption('right', 'R');
 * side.solve();        // 'L' (first option is the default)
 * side.solve('right'); // 'R'
 * side.parse('R');     // 'right'
 */

import { LookupError, UsageError } from './errors.js';

export class Token {
  readonly kind = 'token' as const;
  private readonly optionMap = new Map<string, string>();
  private explicitDefault: string | undefined;

  constructor(public name: string) {}

  /**
   * Add or overwrite an option
   *
   * @param fullName - Full length name, used by callers and recovered by parse
   * @param abbreviation - Text written into the name
   */
  addOption(fullName: string, abbreviation: string): void {
    this.optionMap.set(fullName, abbreviation);
  }

  /**
   * Solve for the abbreviation of a full name
   *
   * @param fullName - Option key, or the raw value for required tokens.
   *   Omit it to get the default abbreviation.
   * @throws UsageError if the token is required and no value is given
   * @throws LookupError if `fullName` is not one of the options
   *
   * @example
   * side.solve('left') // 'L'
   * new Token('description').solve('hero') // 'hero'
   */
  solve(fullName?: string): string {
    const fallback = this.default;

    if (fallback === undefined) {
      if (!fullName) {
        throw new UsageError(`Token '${this.name}' is required. A value must be passed.`);
      }
      return fullName;
    }

    if (!fullName) {
      return fallback;
    }

    const abbreviation = this.optionMap.get(fullName);
    if (abbreviation === undefined) {
      throw new LookupError(
        `name '${fullName}' not found in Token '${this.name}'. Options: ${[...this.optionMap.keys()].join(', ')}`,
      );
    }
    return abbreviation;
  }

  /**
   * Recover the full name for an abbreviation. The first matching option
   * wins; values with no match come back unchanged.
   */
  parse(value: string): string {
    for (const [fullName, abbreviation] of this.optionMap) {
      if (abbreviation === value) {
        return fullName;
      }
    }
    return value;
  }

  /**
   * Full-name key the default resolves to: the explicit default, otherwise
   * the first inserted option.
   */
  get defaultName(): string | undefined {
    if (this.explicitDefault !== undefined) {
      return this.explicitDefault;
    }
    const first = this.optionMap.keys().next();
    return first.done ? undefined : first.value;
  }

  /**
   * Abbreviation used when solving without a value. Computed on every read.
   */
  get default(): string | undefined {
    const key = this.defaultName;
    return key === undefined ? undefined : this.optionMap.get(key);
  }

  /**
   * @throws UsageError if `fullName` is not an option key
   */
  set default(fullName: string | undefined) {
    if (fullName !== undefined && !this.optionMap.has(fullName)) {
      throw new UsageError(
        `Default '${fullName}' is not an option of Token '${this.name}'. Options: ${[...this.optionMap.keys()].join(', ')}`,
      );
    }
    this.explicitDefault = fullName;
  }

  get required(): boolean {
    return this.default === undefined;
  }

  /** Copy of the options, in insertion order */
  get options(): Record<string, string> {
    return Object.fromEntries(this.optionMap);
  }
}
