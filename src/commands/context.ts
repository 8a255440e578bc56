import { type Command, InvalidArgumentError } from 'commander';
import { errorMessage, UsageError } from '../naming/errors.js';
import { NamingSession } from '../naming/session.js';
import { loadSession, saveSession } from '../naming/store.js';
import type { SessionLoadReport } from '../naming/types.js';
import { type EntityKind, validateEntityName } from '../naming/validators.js';
import { output } from '../utils/output.js';

/**
 * Options defined on the root program
 */
export interface GlobalOptions {
  repo?: string;
  quiet?: boolean;
  verbose?: boolean;
}

export type SessionMode = 'read' | 'write';

/**
 * Load the session from the repository, run a command body against it and,
 * for 'write' commands, save it back (pruning files of removed entities).
 *
 * Failures are printed as `Error: <message>` and set exit code 1.
 */
export function runWithSession(
  program: Command,
  mode: SessionMode,
  body: (session: NamingSession, report: SessionLoadReport) => void,
): void {
  try {
    const { repo } = program.opts<GlobalOptions>();
    const session = new NamingSession();
    const report = loadSession(session, repo);
    reportLoad(report);

    body(session, report);

    if (mode === 'write') {
      saveSession(session, report.repo, { prune: true });
    }
  } catch (error) {
    fail(errorMessage(error));
  }
}

/**
 * Print an error and mark the process as failed
 */
export function fail(message: string): void {
  output.error(`Error: ${message}`);
  process.exitCode = 1;
}

/**
 * Summarize what was loaded; warn about files that were skipped
 */
export function reportLoad(report: SessionLoadReport): void {
  output.verbose(
    `Loaded ${report.tokens.length} token(s) and ${report.rules.length} rule(s) from ${report.repo}`,
  );
  for (const file of report.failed) {
    output.warn(`Warning: skipped unreadable file ${file}`);
  }
  for (const key of report.rejectedSettings) {
    output.warn(`Warning: ignored unknown setting '${key}'`);
  }
}

/**
 * @throws UsageError listing every problem with the name
 */
export function assertEntityName(name: string, kind: EntityKind): void {
  const validation = validateEntityName(name, kind);
  if (!validation.valid) {
    throw new UsageError(`Invalid ${kind.toLowerCase()} name '${name}': ${validation.errors.join(', ')}`);
  }
}

/**
 * Commander argument parser for integer options
 */
export function parseInteger(value: string): number {
  if (!/^-?\d+$/.test(value)) {
    throw new InvalidArgumentError('Not an integer.');
  }
  return Number.parseInt(value, 10);
}
