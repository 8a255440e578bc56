import { describe, expect, test } from 'vitest';
import { Rule } from '../../src/naming/rule.js';
import {
  ruleFromData,
  ruleToData,
  tokenFromData,
  tokenToData,
} from '../../src/naming/serialize.js';
import { Token } from '../../src/naming/token.js';
import { TokenNumber } from '../../src/naming/token-number.js';

describe('serialize', () => {
  describe('tokenToData', () => {
    test('writes a Token record with its effective default', () => {
      const side = new Token('side');
      side.addOption('left', 'L');
      side.addOption('right', 'R');

      expect(tokenToData(side)).toEqual({
        _classname: 'Token',
        _version: '1.0',
        name: 'side',
        default: 'left',
        options: { left: 'L', right: 'R' },
      });
    });

    test('writes null as the default of a required token', () => {
      expect(tokenToData(new Token('category'))).toEqual({
        _classname: 'Token',
        _version: '1.0',
        name: 'category',
        default: null,
        options: {},
      });
    });

    test('writes a TokenNumber record', () => {
      const version = new TokenNumber('version');
      version.prefix = 'v';
      version.padding = 4;

      expect(tokenToData(version)).toEqual({
        _classname: 'TokenNumber',
        _version: '1.0',
        name: 'version',
        prefix: 'v',
        suffix: '',
        padding: 4,
      });
    });
  });

  describe('tokenFromData', () => {
    test('builds a Token from its record', () => {
      const result = tokenFromData({
        _classname: 'Token',
        _version: '1.0',
        name: 'side',
        default: 'right',
        options: { left: 'L', right: 'R' },
      });

      expect(result.ok).toBe(true);
      if (!result.ok || result.value.kind !== 'token') {
        throw new Error('expected a Token');
      }
      expect(result.value.solve()).toBe('R');
      expect(result.value.parse('L')).toBe('left');
    });

    test('dispatches TokenNumber records', () => {
      const result = tokenFromData({
        _classname: 'TokenNumber',
        _version: '1.0',
        name: 'version',
        prefix: 'v',
        suffix: '',
        padding: 3,
      });

      expect(result.ok).toBe(true);
      if (!result.ok) return;
      expect(result.value.kind).toBe('number');
      expect(result.value.parse('v010')).toBe(10);
    });

    test('rejects unknown classes', () => {
      const result = tokenFromData({ _classname: 'Rule', _version: '1.0', name: 'x', fields: ['a'] });

      expect(result).toEqual({ ok: false, errors: ["Unknown token class: 'Rule'"] });
    });

    test('rejects records without a class', () => {
      expect(tokenFromData(['not', 'a', 'record'])).toEqual({
        ok: false,
        errors: ["Unknown token class: '(missing)'"],
      });
    });

    test('rejects extra attributes', () => {
      const result = tokenFromData({
        _classname: 'Token',
        _version: '1.0',
        name: 'side',
        default: null,
        options: {},
        _options: { left: 'L' },
      });

      expect(result.ok).toBe(false);
      if (result.ok) return;
      expect(result.errors).toContain("Unknown property: '_options'");
    });

    test('rejects an unsupported version', () => {
      const result = tokenFromData({
        _classname: 'TokenNumber',
        _version: '2.0',
        name: 'version',
        prefix: '',
        suffix: '',
        padding: 3,
      });

      expect(result.ok).toBe(false);
      if (result.ok) return;
      expect(result.errors).toContain('Property \'/_version\' must be "1.0"');
    });

    test('rejects a default that is not an option', () => {
      const result = tokenFromData({
        _classname: 'Token',
        _version: '1.0',
        name: 'side',
        default: 'toString',
        options: { left: 'L' },
      });

      expect(result).toEqual({
        ok: false,
        errors: ["Default 'toString' is not an option of Token 'side'"],
      });
    });

    test('reports missing attributes', () => {
      const result = tokenFromData({ _classname: 'TokenNumber', _version: '1.0', name: 'n' });

      expect(result.ok).toBe(false);
      if (result.ok) return;
      expect(result.errors).toContain("Missing required property: 'prefix'");
    });
  });

  describe('rules', () => {
    test('writes a Rule record', () => {
      expect(ruleToData(new Rule('asset', ['category', 'name']))).toEqual({
        _classname: 'Rule',
        _version: '1.0',
        name: 'asset',
        fields: ['category', 'name'],
      });
    });

    test('builds a Rule from its record', () => {
      const result = ruleFromData({
        _classname: 'Rule',
        _version: '1.0',
        name: 'asset',
        fields: ['category', 'name'],
      });

      expect(result.ok).toBe(true);
      if (!result.ok) return;
      expect(result.value.pattern).toBe('{category}_{name}');
    });

    test('rejects an empty field list', () => {
      const result = ruleFromData({ _classname: 'Rule', _version: '1.0', name: 'asset', fields: [] });

      expect(result.ok).toBe(false);
      if (result.ok) return;
      expect(result.errors).toContain("Property '/fields' must have at least 1 items");
    });
  });
});
