import { Command } from 'commander';
import { infoCommand } from './commands/info.js';
import type { GlobalOptions } from './commands/context.js';
import { ruleCommand } from './commands/rule.js';
import { sessionCommand } from './commands/session.js';
import { solveCommand } from './commands/solve.js';
import { tokenCommand } from './commands/token.js';
import { output } from './utils/output.js';
import { VERSION } from './version.js';

/**
 * Build the nameforge command tree
 */
export function createProgram(): Command {
  const program = new Command();

  program
    .name('nameforge')
    .description('Naming conventions - build names from tokens and rules, and parse them back')
    .version(VERSION)
    .option('-r, --repo <dir>', 'Session repository (default: $NAMING_REPO or ~/.NXATools/naming)')
    .option('-q, --quiet', 'Suppress non-critical output')
    .option('-v, --verbose', 'Show detailed output')
    .addHelpText(
      'after',
      `
Quick Start:
  $ nameforge token add category
  $ nameforge token add side left=L right=R
  $ nameforge token add-number version --prefix v --padding 3
  $ nameforge rule add asset category side version
  $ nameforge solve char 1                 # char_L_v001
  $ nameforge parse char_R_v012            # category: char, side: right, version: 12
`,
    )
    .hook('preAction', () => {
      // CLI flags override environment variables
      const options = program.opts<GlobalOptions>();
      if (options.quiet) {
        output.setLevel('quiet');
      } else if (options.verbose) {
        output.setLevel('verbose');
      } else {
        output.resetLevel();
      }
    });

  tokenCommand(program);
  ruleCommand(program);
  solveCommand(program);
  sessionCommand(program);
  infoCommand(program);

  return program;
}
