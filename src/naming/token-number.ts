/**
 * Numeric token for counters and versions: 25 with prefix "v" and padding 3
 * solves to "v025", and "v025" parses back to 25.
 *
 * Numeric tokens are always required; there is no option table.
 */

import { ParseError, UsageError } from './errors.js';

const DIGITS = /^\d+$/;

export class TokenNumber {
  readonly kind = 'number' as const;
  readonly required = true;
  /** Documented fallback only; solving always takes an explicit number */
  readonly default = 1;

  prefix = '';
  suffix = '';
  private width = 3;

  constructor(public name: string) {}

  get padding(): number {
    return this.width;
  }

  /**
   * Minimum digit width. Values below 1 become 1.
   */
  set padding(value: number) {
    const whole = Number.isFinite(value) ? Math.trunc(value) : 1;
    this.width = whole <= 0 ? 1 : whole;
  }

  /**
   * Format a number with padding, prefix and suffix
   *
   * @param value - Non-negative integer
   * @throws UsageError for negative, fractional or unsafe numbers
   *
   * @example
   * // prefix 'v', padding 4
   * token.solve(1)     // 'v0001'
   * token.solve(12345) // 'v12345' (padding is a minimum)
   */
  solve(value: number): string {
    if (!Number.isSafeInteger(value) || value < 0) {
      throw new UsageError(
        `TokenNumber '${this.name}' expects a non-negative integer, got ${String(value)}`,
      );
    }
    const digits = String(value).padStart(this.width, '0');
    return `${this.prefix}${digits}${this.suffix}`;
  }

  /**
   * Recover the number embedded in a name part
   *
   * @throws ParseError if the value holds no digits, digits are split
   *   by other characters, or the number is not a safe integer
   *
   * @example
   * token.parse('v0025') // 25
   * token.parse('0025')  // 25
   * token.parse('12b')   // 12
   */
  parse(value: string): number {
    if (DIGITS.test(value)) {
      return this.readDigits(value, value);
    }

    // Exact prefix/suffix match first, so affixes containing digits still invert
    if (
      value.length > this.prefix.length + this.suffix.length &&
      value.startsWith(this.prefix) &&
      value.endsWith(this.suffix)
    ) {
      const middle = value.slice(this.prefix.length, value.length - this.suffix.length);
      if (DIGITS.test(middle)) {
        return this.readDigits(middle, value);
      }
    }

    const prefixLength = leadingNonDigits(value);
    if (prefixLength === value.length) {
      throw new ParseError(`No digits found in '${value}' for TokenNumber '${this.name}'`);
    }
    const suffixLength = trailingNonDigits(value);

    let middle: string;
    if (prefixLength > 0 && suffixLength === 0) {
      middle = value.slice(prefixLength);
    } else if (prefixLength === 0 && suffixLength > 0) {
      middle = value.slice(0, -suffixLength);
    } else {
      middle = value.slice(prefixLength, value.length - suffixLength);
    }

    if (!DIGITS.test(middle)) {
      throw new ParseError(
        `Cannot read a number from '${value}' for TokenNumber '${this.name}': '${middle}' is not all digits`,
      );
    }
    return this.readDigits(middle, value);
  }

  private readDigits(digits: string, value: string): number {
    const number = Number.parseInt(digits, 10);
    if (!Number.isSafeInteger(number)) {
      throw new ParseError(
        `Number in '${value}' for TokenNumber '${this.name}' is too large to read exactly`,
      );
    }
    return number;
  }

  get options(): { prefix: string; suffix: string; padding: number } {
    return { prefix: this.prefix, suffix: this.suffix, padding: this.width };
  }
}

function isDigit(char: string): boolean {
  return char >= '0' && char <= '9';
}

function leadingNonDigits(value: string): number {
  let count = 0;
  while (count < value.length && !isDigit(value.charAt(count))) count++;
  return count;
}

function trailingNonDigits(value: string): number {
  let count = 0;
  while (count < value.length && !isDigit(value.charAt(value.length - 1 - count))) count++;
  return count;
}
