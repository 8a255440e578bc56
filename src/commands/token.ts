import type { Command } from 'commander';
import { LookupError } from '../naming/errors.js';
import { tokenToData } from '../naming/serialize.js';
import type { AnyToken } from '../naming/types.js';
import { parsePairs } from '../naming/validators.js';
import { output } from '../utils/output.js';
import { assertEntityName, parseInteger, runWithSession } from './context.js';

export function tokenCommand(program: Command): void {
  const token = program.command('token');
  token.description('Manage naming tokens');

  // token add <name> [pairs...]
  token
    .command('add <name> [pairs...]')
    .description('Add a token; without options it is required (typed by the user)')
    .option('-d, --default <full>', 'Full name used when no value is given')
    .addHelpText(
      'after',
      `
Examples:
  $ nameforge token add category                 # required, value typed as-is
  $ nameforge token add side left=L right=R      # abbreviations, default 'left'
  $ nameforge token add side left=L right=R -d right
`,
    )
    .action((name: string, pairs: string[], options: { default?: string }) => {
      runWithSession(program, 'write', (session) => {
        assertEntityName(name, 'Token');
        const created = session.addToken(name, {
          options: parsePairs(pairs),
          default: options.default,
        });
        output.success(`✓ Token '${name}' added (${describeToken(created)})`);
      });
    });

  // token add-number <name>
  token
    .command('add-number <name>')
    .description('Add a numeric token (counters, versions)')
    .option('--prefix <text>', 'Text before the digits', '')
    .option('--suffix <text>', 'Text after the digits', '')
    .option('--padding <n>', 'Minimum number of digits', parseInteger, 3)
    .addHelpText(
      'after',
      `
Examples:
  $ nameforge token add-number version --prefix v --padding 3   # 1 -> v001
`,
    )
    .action((name: string, options: { prefix: string; suffix: string; padding: number }) => {
      runWithSession(program, 'write', (session) => {
        assertEntityName(name, 'Token');
        const created = session.addTokenNumber(name, options);
        output.success(`✓ Token '${name}' added (${describeToken(created)})`);
      });
    });

  // token remove <name>
  token
    .command('remove <name>')
    .description('Remove a token')
    .action((name: string) => {
      runWithSession(program, 'write', (session) => {
        if (!session.removeToken(name)) {
          throw new LookupError(`Token '${name}' not found`);
        }
        output.success(`✓ Token '${name}' removed`);
      });
    });

  // token list [--json]
  token
    .command('list')
    .description('List all tokens')
    .option('--json', 'Output in JSON format')
    .action((options: { json?: boolean }) => {
      runWithSession(program, 'read', (session) => {
        const tokens = [...session.getTokens().values()];

        if (options.json) {
          output.result(JSON.stringify(tokens.map(tokenToData), null, 2));
          return;
        }

        if (tokens.length === 0) {
          output.result('No tokens defined');
          output.info('Hint: Use "nameforge token add" to add a token');
          return;
        }

        output.result(`Tokens (${tokens.length}):`);
        for (const item of tokens) {
          output.result(`  • ${item.name} (${describeToken(item)})`);
        }
      });
    });

  // token show <name>
  token
    .command('show <name>')
    .description('Show the stored record of a token')
    .action((name: string) => {
      runWithSession(program, 'read', (session) => {
        const found = session.getToken(name);
        if (!found) {
          throw new LookupError(`Token '${name}' not found`);
        }
        output.result(JSON.stringify(tokenToData(found), null, 2));
      });
    });
}

/**
 * One-line summary of a token
 *
 * @example
 * describeToken(side)    // 'left=L, right=R; default: left'
 * describeToken(version) // "number; prefix 'v', suffix '', padding 3"
 */
export function describeToken(token: AnyToken): string {
  if (token.kind === 'number') {
    return `number; prefix '${token.prefix}', suffix '${token.suffix}', padding ${token.padding}`;
  }
  if (token.required) {
    return 'required';
  }
  const pairs = Object.entries(token.options)
    .map(([fullName, abbreviation]) => `${fullName}=${abbreviation}`)
    .join(', ');
  return `${pairs}; default: ${token.defaultName ?? ''}`;
}
