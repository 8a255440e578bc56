import { resolve } from 'node:path';
import type { Command } from 'commander';
import { loadSession, saveSession } from '../naming/store.js';
import { output } from '../utils/output.js';
import { reportLoad, runWithSession } from './context.js';

export function sessionCommand(program: Command): void {
  const session = program.command('session');
  session.description('Copy sessions between repositories');

  // session export <dir>
  session
    .command('export <dir>')
    .description('Write the current session to another directory')
    .action((dir: string) => {
      runWithSession(program, 'read', (current) => {
        const target = saveSession(current, dir);
        output.success(
          `✓ Exported ${current.getTokens().size} token(s) and ${current.getRules().size} rule(s) to ${resolve(target)}`,
        );
      });
    });

  // session import <dir>
  session
    .command('import <dir>')
    .description('Merge a session directory into the current repository')
    .addHelpText(
      'after',
      `
Tokens and rules with the same name are replaced. The active rule of the
imported session wins when it names a rule.
`,
    )
    .action((dir: string) => {
      runWithSession(program, 'write', (current) => {
        const report = loadSession(current, dir);
        reportLoad(report);
        output.success(
          `✓ Imported ${report.tokens.length} token(s) and ${report.rules.length} rule(s) from ${resolve(report.repo)}`,
        );
      });
    });
}
