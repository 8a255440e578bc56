/**
 * Session repository: a directory holding one file per token and rule plus
 * naming.conf.
 *
 *   <repo>/
 *     side.token       {"_classname":"Token", ...}
 *     version.token    {"_classname":"TokenNumber", ...}
 *     asset.rule       {"_classname":"Rule", ...}
 *     naming.conf      {"set_active_rule": "asset"}
 *
 * Loading a single file never throws: a missing file, malformed JSON or an
 * invalid record gives `false` and a debug log entry.
 */

import {
  existsSync,
  mkdirSync,
  readdirSync,
  readFileSync,
  unlinkSync,
  writeFileSync,
} from 'node:fs';
import { homedir } from 'node:os';
import { basename, extname, join } from 'node:path';
import { debugError, debugFormat, debugLog, debugVerbose } from '../utils/debug.js';
import { UsageError } from './errors.js';
import type { Rule } from './rule.js';
import { ruleFromData, ruleToData, tokenFromData, tokenToData } from './serialize.js';
import type { NamingSession } from './session.js';
import type { AnyToken, SessionLoadReport, SessionSettings } from './types.js';
import { type EntityKind, validateEntityName } from './validators.js';

export const NAMING_REPO_ENV = 'NAMING_REPO';
export const SESSION_CONFIG_FILE = 'naming.conf';
export const TOKEN_EXTENSION = '.token';
export const RULE_EXTENSION = '.rule';

export interface SaveSessionOptions {
  /** Delete .token/.rule files in the repository that no longer have an entity */
  prune?: boolean;
}

type SettingHandler = (session: NamingSession, value: unknown) => boolean;

/**
 * Recognized naming.conf settings. Each key maps to the handler that applies it.
 */
const SETTING_HANDLERS = {
  set_active_rule: (session, value) => {
    if (value === null) {
      return true;
    }
    return typeof value === 'string' && session.setActiveRule(value);
  },
} satisfies Record<keyof SessionSettings, SettingHandler>;

type SettingKey = keyof typeof SETTING_HANDLERS;

function isSettingKey(key: string): key is SettingKey {
  return Object.prototype.hasOwnProperty.call(SETTING_HANDLERS, key);
}

/**
 * Repository directory: explicit override, then $NAMING_REPO, then
 * ~/.NXATools/naming
 */
export function resolveRepo(override?: string): string {
  return override || process.env[NAMING_REPO_ENV] || join(homedir(), '.NXATools', 'naming');
}

// ---------------------------------------------------------------------------
// Single entities
// ---------------------------------------------------------------------------

/**
 * Write one token to a file
 *
 * @returns false when the session has no token with that name
 */
export function saveToken(session: NamingSession, name: string, filePath: string): boolean {
  const token = session.getToken(name);
  if (!token) {
    return false;
  }
  writeJson(filePath, tokenToData(token));
  return true;
}

/**
 * Read a token file and register the Token or TokenNumber it holds
 *
 * @returns false when the file is missing, unreadable or not a valid token record
 */
export function loadToken(session: NamingSession, filePath: string): boolean {
  const token = readToken(filePath);
  if (!token) {
    return false;
  }
  session.registerToken(token);
  return true;
}

/**
 * @returns false when the session has no rule with that name
 */
export function saveRule(session: NamingSession, name: string, filePath: string): boolean {
  const rule = session.getRule(name);
  if (!rule) {
    return false;
  }
  writeJson(filePath, ruleToData(rule));
  return true;
}

/**
 * Read a rule file and register it. The active rule is left as it is.
 *
 * @returns false when the file is missing, unreadable or not a valid rule record
 */
export function loadRule(session: NamingSession, filePath: string): boolean {
  const rule = readRule(filePath);
  if (!rule) {
    return false;
  }
  session.registerRule(rule);
  return true;
}

// ---------------------------------------------------------------------------
// Whole session
// ---------------------------------------------------------------------------

/**
 * Write every token and rule plus naming.conf to the repository
 *
 * @returns The repository directory that was written
 * @throws UsageError if a token or rule name cannot be used as a file name
 */
export function saveSession(
  session: NamingSession,
  repo?: string,
  options: SaveSessionOptions = {},
): string {
  const dir = resolveRepo(repo);
  mkdirSync(dir, { recursive: true });

  const tokens = session.getTokens();
  const rules = session.getRules();

  for (const name of tokens.keys()) {
    saveToken(session, name, entityPath(dir, name, 'Token'));
  }
  for (const name of rules.keys()) {
    saveRule(session, name, entityPath(dir, name, 'Rule'));
  }

  const active = session.getActiveRule();
  const settings: SessionSettings = { set_active_rule: active ? active.name : null };
  writeJson(join(dir, SESSION_CONFIG_FILE), settings);

  if (options.prune) {
    pruneStaleFiles(dir, new Set(tokens.keys()), new Set(rules.keys()));
  }

  debugLog(`Saved session to ${dir}: ${tokens.size} token(s), ${rules.size} rule(s)`);
  return dir;
}

/**
 * Load every .token and .rule file under the repository (recursively), then
 * apply naming.conf. One bad file does not stop the others from loading.
 */
export function loadSession(session: NamingSession, repo?: string): SessionLoadReport {
  const dir = resolveRepo(repo);
  const tokens: string[] = [];
  const rules: string[] = [];
  const failed: string[] = [];
  const rejectedSettings: string[] = [];

  if (!existsSync(dir)) {
    debugLog(`Session repository ${dir} does not exist`);
    return { repo: dir, tokens, rules, failed, rejectedSettings };
  }

  for (const filePath of listFiles(dir)) {
    const extension = extname(filePath);
    if (extension === TOKEN_EXTENSION) {
      const token = readToken(filePath);
      if (token) {
        session.registerToken(token);
        tokens.push(token.name);
      } else {
        failed.push(filePath);
      }
    } else if (extension === RULE_EXTENSION) {
      const rule = readRule(filePath);
      if (rule) {
        session.registerRule(rule);
        rules.push(rule.name);
      } else {
        failed.push(filePath);
      }
    }
  }

  const configPath = join(dir, SESSION_CONFIG_FILE);
  if (existsSync(configPath)) {
    const settings = readJson(configPath);
    if (typeof settings !== 'object' || settings === null || Array.isArray(settings)) {
      failed.push(configPath);
    } else {
      for (const [key, value] of Object.entries(settings)) {
        if (!isSettingKey(key)) {
          debugLog(`Rejected unknown setting '${key}' in ${configPath}`);
          rejectedSettings.push(key);
          continue;
        }
        if (!SETTING_HANDLERS[key](session, value)) {
          debugLog(`Setting '${key}' could not be applied with value ${debugFormat(value)}`);
        }
      }
    }
  }

  return { repo: dir, tokens, rules, failed, rejectedSettings };
}

// ---------------------------------------------------------------------------
// Helpers
// ---------------------------------------------------------------------------

function readToken(filePath: string): AnyToken | undefined {
  const data = readJson(filePath);
  if (data === undefined) {
    return undefined;
  }
  const result = tokenFromData(data);
  if (!result.ok) {
    debugLog(`Invalid token record in ${filePath}: ${result.errors.join('; ')}`);
    return undefined;
  }
  debugVerbose(`Loaded ${result.value.kind} token '${result.value.name}' from ${filePath}`);
  return result.value;
}

function readRule(filePath: string): Rule | undefined {
  const data = readJson(filePath);
  if (data === undefined) {
    return undefined;
  }
  const result = ruleFromData(data);
  if (!result.ok) {
    debugLog(`Invalid rule record in ${filePath}: ${result.errors.join('; ')}`);
    return undefined;
  }
  debugVerbose(`Loaded rule '${result.value.name}' from ${filePath}`);
  return result.value;
}

function readJson(filePath: string): unknown {
  if (!existsSync(filePath)) {
    debugLog(`File not found: ${filePath}`);
    return undefined;
  }
  try {
    const parsed: unknown = JSON.parse(readFileSync(filePath, 'utf-8'));
    return parsed;
  } catch (error) {
    debugError(`Failed to read ${filePath}`, error);
    return undefined;
  }
}

function writeJson(filePath: string, data: unknown): void {
  writeFileSync(filePath, `${JSON.stringify(data, null, 2)}\n`, 'utf-8');
}

function entityPath(dir: string, name: string, kind: EntityKind): string {
  const validation = validateEntityName(name, kind);
  if (!validation.valid) {
    throw new UsageError(`Cannot save ${kind} '${name}': ${validation.errors.join(', ')}`);
  }
  return join(dir, `${name}${kind === 'Token' ? TOKEN_EXTENSION : RULE_EXTENSION}`);
}

function listFiles(dir: string): string[] {
  const files: string[] = [];
  const entries = readdirSync(dir, { withFileTypes: true }).sort((a, b) =>
    a.name < b.name ? -1 : a.name > b.name ? 1 : 0,
  );
  for (const entry of entries) {
    const fullPath = join(dir, entry.name);
    if (entry.isDirectory()) {
      files.push(...listFiles(fullPath));
    } else if (entry.isFile()) {
      files.push(fullPath);
    }
  }
  return files;
}

function pruneStaleFiles(dir: string, tokenNames: Set<string>, ruleNames: Set<string>): void {
  for (const entry of readdirSync(dir, { withFileTypes: true })) {
    if (!entry.isFile()) continue;
    const extension = extname(entry.name);
    const name = basename(entry.name, extension);
    const stale =
      (extension === TOKEN_EXTENSION && !tokenNames.has(name)) ||
      (extension === RULE_EXTENSION && !ruleNames.has(name));
    if (stale) {
      unlinkSync(join(dir, entry.name));
      debugLog(`Pruned ${entry.name} from ${dir}`);
    }
  }
}
