import type { Command } from 'commander';
import { parsePairs } from '../naming/validators.js';
import { output } from '../utils/output.js';
import { runWithSession } from './context.js';

export function solveCommand(program: Command): void {
  // solve [values...] [--set <pairs...>]
  program
    .command('solve [values...]')
    .description('Build a name with the active rule')
    .option('-s, --set <pairs...>', 'Field values as FIELD=VALUE pairs')
    .addHelpText(
      'after',
      `
Positional values fill required and numeric fields in rule order.
Fields with options (abbreviations) are only set with --set and
fall back to their default.

Examples:
  $ nameforge solve char hero 1                   # char_hero_v001
  $ nameforge solve char hero 3 --set side=right  # char_hero_R_v003
`,
    )
    .action((values: string[], options: { set?: string[] }) => {
      runWithSession(program, 'read', (session) => {
        const named = parsePairs(options.set ?? []);
        output.result(session.solve(values, named));
      });
    });

  // parse <name> [--json]
  program
    .command('parse <name>')
    .description('Split a name into field values with the active rule')
    .option('--json', 'Output in JSON format')
    .action((name: string, options: { json?: boolean }) => {
      runWithSession(program, 'read', (session) => {
        const parsed = session.parse(name);

        if (options.json) {
          output.result(JSON.stringify(parsed, null, 2));
          return;
        }

        for (const [field, value] of Object.entries(parsed)) {
          output.result(`${field}: ${value}`);
        }
      });
    });
}
