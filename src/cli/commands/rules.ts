import { Command } from 'commander';
import chalk from 'chalk';
import { RULES } from '../../core/diagnostics/rules.js';
import { RULE_IDS } from '../../core/diagnostics/types.js';

/**
 * Render the rule catalogue, one rule per line.
 */
export function formatRules(colors: boolean): string {
  return RULE_IDS.map((id) => {
    const rule = RULES[id];
    const severity = rule.severity.padEnd(7);
    const line = `${rule.code}  ${severity}  ${rule.id}\n        ${rule.title}`;
    return colors ? line.replace(rule.code, chalk.cyan(rule.code)) : line;
  }).join('\n');
}

/**
 * Create the rules command.
 */
export function createRulesCommand(): Command {
  return new Command('rules')
    .description('List the rules argcheck reports')
    .option('--no-color', 'Disable colored output')
    .action((options: { color: boolean }) => {
      console.log(formatRules(options.color));
    });
}
