import { existsSync, mkdirSync, mkdtempSync, readFileSync, rmSync, writeFileSync } from 'node:fs';
import { homedir, tmpdir } from 'node:os';
import { join } from 'node:path';
import { afterEach, beforeEach, describe, expect, test } from 'vitest';
import { UsageError } from '../../src/naming/errors.js';
import { NamingSession } from '../../src/naming/session.js';
import {
  loadRule,
  loadSession,
  loadToken,
  NAMING_REPO_ENV,
  resolveRepo,
  saveRule,
  saveSession,
  saveToken,
} from '../../src/naming/store.js';

function buildSession(): NamingSession {
  const session = new NamingSession();
  session.addToken('category');
  session.addToken('side', { options: { left: 'L', right: 'R' }, default: 'right' });
  session.addTokenNumber('version', { prefix: 'v', padding: 3 });
  session.addRule('asset', 'category', 'side', 'version');
  session.addRule('shot', 'category', 'version');
  session.setActiveRule('shot');
  return session;
}

function readJsonFile(path: string): unknown {
  return JSON.parse(readFileSync(path, 'utf-8'));
}

describe('session store', () => {
  let repo: string;

  beforeEach(() => {
    repo = mkdtempSync(join(tmpdir(), 'nameforge-store-'));
  });

  afterEach(() => {
    rmSync(repo, { recursive: true, force: true });
  });

  describe('single entities', () => {
    test('saveToken writes the record and loadToken reads it back', () => {
      const session = buildSession();
      const filePath = join(repo, 'side.token');

      expect(saveToken(session, 'side', filePath)).toBe(true);
      expect(readJsonFile(filePath)).toEqual({
        _classname: 'Token',
        _version: '1.0',
        name: 'side',
        default: 'right',
        options: { left: 'L', right: 'R' },
      });

      const restored = new NamingSession();
      expect(loadToken(restored, filePath)).toBe(true);
      expect(restored.getToken('side')?.parse('R')).toBe('right');
    });

    test('loadToken restores a TokenNumber', () => {
      const session = buildSession();
      const filePath = join(repo, 'version.token');
      saveToken(session, 'version', filePath);

      const restored = new NamingSession();
      loadToken(restored, filePath);

      expect(restored.getToken('version')?.kind).toBe('number');
      expect(restored.getToken('version')?.parse('v042')).toBe(42);
    });

    test('saveToken and saveRule return false for unknown names', () => {
      const session = new NamingSession();

      expect(saveToken(session, 'missing', join(repo, 'missing.token'))).toBe(false);
      expect(saveRule(session, 'missing', join(repo, 'missing.rule'))).toBe(false);
      expect(existsSync(join(repo, 'missing.token'))).toBe(false);
    });

    test('loadToken returns false for missing or malformed files', () => {
      const session = new NamingSession();
      writeFileSync(join(repo, 'broken.token'), '{not json');

      expect(loadToken(session, join(repo, 'absent.token'))).toBe(false);
      expect(loadToken(session, join(repo, 'broken.token'))).toBe(false);
      expect(session.getTokens().size).toBe(0);
    });

    test('loadRule does not change the active rule', () => {
      const source = buildSession();
      const filePath = join(repo, 'asset.rule');
      saveRule(source, 'asset', filePath);

      const restored = new NamingSession();
      restored.addRule('other', 'category');

      expect(loadRule(restored, filePath)).toBe(true);
      expect(restored.getRule('asset')?.fields).toEqual(['category', 'side', 'version']);
      expect(restored.activeRuleName).toBe('other');
    });
  });

  describe('saveSession / loadSession', () => {
    test('writes one file per entity plus naming.conf', () => {
      const dir = saveSession(buildSession(), repo);

      expect(dir).toBe(repo);
      for (const file of ['category.token', 'side.token', 'version.token', 'asset.rule', 'shot.rule']) {
        expect(existsSync(join(repo, file))).toBe(true);
      }
      expect(readJsonFile(join(repo, 'naming.conf'))).toEqual({ set_active_rule: 'shot' });
    });

    test('round-trips tokens, rules and the active rule', () => {
      const session = buildSession();
      saveSession(session, repo);

      session.resetTokens();
      session.resetRules();
      const report = loadSession(session, repo);

      expect(report).toEqual({
        repo,
        tokens: ['category', 'side', 'version'],
        rules: ['asset', 'shot'],
        failed: [],
        rejectedSettings: [],
      });
      expect(session.getActiveRule()?.name).toBe('shot');
      expect(session.getRule('asset')?.pattern).toBe('{category}_{side}_{version}');
      expect(session.getToken('side')?.options).toEqual({ left: 'L', right: 'R' });

      session.setActiveRule('asset');
      expect(session.solve(['char', 2])).toBe('char_R_v002');
    });

    test('creates the repository directory', () => {
      const nested = join(repo, 'a', 'b');

      saveSession(buildSession(), nested);

      expect(existsSync(join(nested, 'naming.conf'))).toBe(true);
    });

    test('writes null when no rule is active', () => {
      const session = new NamingSession();
      session.addToken('category');

      saveSession(session, repo);

      expect(readJsonFile(join(repo, 'naming.conf'))).toEqual({ set_active_rule: null });
    });

    test('keeps loading after a bad file', () => {
      saveSession(buildSession(), repo);
      writeFileSync(join(repo, 'aaa.token'), '{not json');

      const session = new NamingSession();
      const report = loadSession(session, repo);

      expect(report.failed).toEqual([join(repo, 'aaa.token')]);
      expect(report.tokens).toEqual(['category', 'side', 'version']);
    });

    test('loads files from subdirectories', () => {
      mkdirSync(join(repo, 'extra'));
      writeFileSync(
        join(repo, 'extra', 'frame.token'),
        JSON.stringify({
          _classname: 'TokenNumber',
          _version: '1.0',
          name: 'frame',
          prefix: '',
          suffix: '',
          padding: 4,
        }),
      );

      const session = new NamingSession();
      const report = loadSession(session, repo);

      expect(report.tokens).toEqual(['frame']);
      expect(session.getToken('frame')?.kind).toBe('number');
    });

    test('rejects unknown settings and applies the known ones', () => {
      saveSession(buildSession(), repo);
      writeFileSync(
        join(repo, 'naming.conf'),
        JSON.stringify({ set_active_rule: 'asset', delete_everything: true }),
      );

      const session = new NamingSession();
      const report = loadSession(session, repo);

      expect(report.rejectedSettings).toEqual(['delete_everything']);
      expect(session.activeRuleName).toBe('asset');
    });

    test('reports a naming.conf that is not an object', () => {
      writeFileSync(join(repo, 'naming.conf'), '[]');

      const report = loadSession(new NamingSession(), repo);

      expect(report.failed).toEqual([join(repo, 'naming.conf')]);
    });

    test('returns an empty report for a missing repository', () => {
      const missing = join(repo, 'nope');

      expect(loadSession(new NamingSession(), missing)).toEqual({
        repo: missing,
        tokens: [],
        rules: [],
        failed: [],
        rejectedSettings: [],
      });
    });

    test('prune deletes files of removed entities', () => {
      const session = buildSession();
      saveSession(session, repo);

      session.removeToken('side');
      session.removeRule('asset');
      saveSession(session, repo);
      expect(existsSync(join(repo, 'side.token'))).toBe(true);

      saveSession(session, repo, { prune: true });
      expect(existsSync(join(repo, 'side.token'))).toBe(false);
      expect(existsSync(join(repo, 'asset.rule'))).toBe(false);
      expect(existsSync(join(repo, 'category.token'))).toBe(true);
    });

    test('refuses names that are not usable as file names', () => {
      const session = new NamingSession();
      session.addToken('../escape');

      expect(() => saveSession(session, repo)).toThrow(UsageError);
      expect(existsSync(join(repo, '..', 'escape.token'))).toBe(false);
    });
  });

  describe('resolveRepo', () => {
    const original = process.env[NAMING_REPO_ENV];

    afterEach(() => {
      if (original === undefined) {
        delete process.env[NAMING_REPO_ENV];
      } else {
        process.env[NAMING_REPO_ENV] = original;
      }
    });

    test('prefers the override', () => {
      process.env[NAMING_REPO_ENV] = '/from/env';

      expect(resolveRepo('/from/option')).toBe('/from/option');
    });

    test('falls back to the environment', () => {
      process.env[NAMING_REPO_ENV] = '/from/env';

      expect(resolveRepo()).toBe('/from/env');
    });

    test('defaults to a directory under the home directory', () => {
      delete process.env[NAMING_REPO_ENV];

      expect(resolveRepo()).toBe(join(homedir(), '.NXATools', 'naming'));
    });
  });
});
