import { describe, expect, test } from 'vitest';
import { LookupError, ParseError, UsageError } from '../errors.js';
import { Rule } from '../rule.js';
import { Token } from '../token.js';
import { TokenNumber } from '../token-number.js';
import type { AnyToken } from '../types.js';

function resolverFor(...tokens: AnyToken[]) {
  const byName = new Map(tokens.map((token): [string, AnyToken] => [token.name, token]));
  return (name: string) => byName.get(name);
}

describe('Rule', () => {
  test('derives the pattern from the fields', () => {
    const rule = new Rule('asset', ['a', 'b', 'c']);

    expect(rule.pattern).toBe('{a}_{b}_{c}');
  });

  test('rejects an empty field list', () => {
    expect(() => new Rule('empty', [])).toThrow(UsageError);
  });

  test('addFields appends to the pattern', () => {
    const rule = new Rule('asset', ['category']);
    rule.addFields('name', 'version');

    expect(rule.fields).toEqual(['category', 'name', 'version']);
    expect(rule.pattern).toBe('{category}_{name}_{version}');
  });

  test('fields returns a copy', () => {
    const rule = new Rule('asset', ['category']);
    const fields = [...rule.fields, 'extra'];

    expect(fields).toHaveLength(2);
    expect(rule.fields).toEqual(['category']);
  });

  describe('solve', () => {
    test('joins solved pieces in field order', () => {
      const rule = new Rule('asset', ['category', 'name', 'version']);

      expect(rule.solve({ version: 'v001', name: 'hero', category: 'char' })).toBe(
        'char_hero_v001',
      );
    });

    test('throws when a field has no value', () => {
      const rule = new Rule('asset', ['category', 'name']);

      expect(() => rule.solve({ category: 'char' })).toThrow(LookupError);
      expect(() => rule.solve({ category: 'char' })).toThrow(
        "Missing value for field 'name' in rule 'asset'",
      );
    });

    test('does not read inherited properties as field values', () => {
      const rule = new Rule('r', ['toString', 'constructor']);

      expect(() => rule.solve({})).toThrow("Missing value for field 'toString' in rule 'r'");
      expect(rule.solve({ toString: 'a', constructor: 'b' })).toBe('a_b');
    });
  });

  describe('parse', () => {
    const category = new Token('category');
    const side = new Token('side');
    side.addOption('left', 'L');
    side.addOption('right', 'R');
    const version = new TokenNumber('version');
    version.prefix = 'v';

    test('delegates each part to its token', () => {
      const rule = new Rule('asset', ['category', 'side', 'version']);

      const parsed = rule.parse('char_R_v012', resolverFor(category, side, version));

      expect(parsed).toEqual({ category: 'char', side: 'right', version: 12 });
      expect(Object.keys(parsed)).toEqual(['category', 'side', 'version']);
    });

    test('keeps required parts verbatim and passes unknown abbreviations through', () => {
      const rule = new Rule('asset', ['category', 'side']);

      expect(rule.parse('prop_C', resolverFor(category, side))).toEqual({
        category: 'prop',
        side: 'C',
      });
    });

    test('throws when the part count does not match', () => {
      const rule = new Rule('asset', ['category', 'side']);

      expect(() => rule.parse('char_hero_L', resolverFor(category, side))).toThrow(ParseError);
      expect(() => rule.parse('char', resolverFor(category, side))).toThrow(
        "Name 'char' has 1 parts but rule 'asset' expects 2 ({category}_{side})",
      );
    });

    test('throws when a field has no token', () => {
      const rule = new Rule('asset', ['category', 'missing']);

      expect(() => rule.parse('char_x', resolverFor(category))).toThrow(
        "Token 'missing' used by rule 'asset' does not exist",
      );
    });
  });
});
