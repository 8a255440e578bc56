import type { Command } from 'commander';
import { LookupError } from '../naming/errors.js';
import type { Rule } from '../naming/rule.js';
import type { NamingSession } from '../naming/session.js';
import { output } from '../utils/output.js';
import { assertEntityName, runWithSession } from './context.js';

export function ruleCommand(program: Command): void {
  const rule = program.command('rule');
  rule.description('Manage naming rules');

  // rule add <name> <fields...>
  rule
    .command('add <name> <fields...>')
    .description('Add a rule from token names (becomes active if none is)')
    .addHelpText(
      'after',
      `
Examples:
  $ nameforge rule add asset category name version   # {category}_{name}_{version}
`,
    )
    .action((name: string, fields: string[]) => {
      runWithSession(program, 'write', (session) => {
        assertEntityName(name, 'Rule');
        const created = session.addRule(name, ...fields);
        const active = session.getActiveRule() === created ? ' (active)' : '';
        output.success(`✓ Rule '${name}' added: ${created.pattern}${active}`);

        const missing = fields.filter((field) => !session.hasToken(field));
        if (missing.length > 0) {
          output.warn(`Warning: no token named ${missing.map((m) => `'${m}'`).join(', ')} yet`);
        }
      });
    });

  // rule remove <name>
  rule
    .command('remove <name>')
    .description('Remove a rule')
    .action((name: string) => {
      runWithSession(program, 'write', (session) => {
        if (!session.removeRule(name)) {
          throw new LookupError(`Rule '${name}' not found`);
        }
        output.success(`✓ Rule '${name}' removed`);
        if (session.activeRuleName === name) {
          output.info('Hint: Use "nameforge rule use <name>" to pick a new active rule');
        }
      });
    });

  // rule list
  rule
    .command('list')
    .description('List all rules')
    .action(() => {
      runWithSession(program, 'read', (session) => {
        const rules = [...session.getRules().values()];

        if (rules.length === 0) {
          output.result('No rules defined');
          output.info('Hint: Use "nameforge rule add" to add a rule');
          return;
        }

        output.result(`Rules (${rules.length}):`);
        for (const item of rules) {
          output.result(`  ${markActive(session, item)} ${item.name}: ${item.pattern}`);
        }
      });
    });

  // rule use <name>
  rule
    .command('use <name>')
    .description('Set the active rule')
    .action((name: string) => {
      runWithSession(program, 'write', (session) => {
        if (!session.setActiveRule(name)) {
          throw new LookupError(`Rule '${name}' not found`);
        }
        output.success(`✓ Active rule: ${name}`);
      });
    });

  // rule show [name]
  rule
    .command('show [name]')
    .description('Show a rule (the active rule by default)')
    .action((name: string | undefined) => {
      runWithSession(program, 'read', (session) => {
        const found = name === undefined ? session.getActiveRule() : session.getRule(name);
        if (!found) {
          throw new LookupError(name === undefined ? 'No active rule set' : `Rule '${name}' not found`);
        }
        output.result(`Rule: ${found.name}`);
        output.result(`Pattern: ${found.pattern}`);
        output.result(`Fields: ${found.fields.join(', ')}`);
        output.result(`Active: ${session.getActiveRule() === found ? 'yes' : 'no'}`);
      });
    });
}

function markActive(session: NamingSession, rule: Rule): string {
  return session.getActiveRule() === rule ? '*' : '•';
}
