import type { Command } from 'commander';
import { NAMING_REPO_ENV } from '../naming/store.js';
import { output } from '../utils/output.js';
import { VERSION } from '../version.js';
import { type GlobalOptions, runWithSession } from './context.js';

export function infoCommand(program: Command): void {
  program
    .command('info')
    .description('Show the session repository and its contents')
    .option('--json', 'Output in JSON format')
    .action((options: { json?: boolean }) => {
      runWithSession(program, 'read', (session, report) => {
        const active = session.getActiveRule();
        const info = {
          version: VERSION,
          repo: report.repo,
          repoSource: program.opts<GlobalOptions>().repo
            ? 'option'
            : process.env[NAMING_REPO_ENV]
              ? 'environment'
              : 'default',
          tokens: session.getTokens().size,
          rules: session.getRules().size,
          activeRule: active ? active.name : null,
          pattern: active ? active.pattern : null,
          skippedFiles: report.failed.length,
        };

        if (options.json) {
          output.result(JSON.stringify(info, null, 2));
          return;
        }

        output.result(`📛 nameforge Status

Version: ${info.version}
Repository: ${info.repo} (${info.repoSource})
Tokens: ${info.tokens}
Rules: ${info.rules}
Active rule: ${info.activeRule ?? '(none)'}`);

        if (info.pattern) {
          output.result(`Pattern: ${info.pattern}`);
        }

        if (!active) {
          output.info('\n💡 Next steps:');
          if (info.tokens === 0) {
            output.info('  1. Add tokens: nameforge token add <name> [full=abbr...]');
            output.info('  2. Add a rule: nameforge rule add <name> <fields...>');
          } else {
            output.info('  Add a rule: nameforge rule add <name> <fields...>');
          }
        }
      });
    });
}
