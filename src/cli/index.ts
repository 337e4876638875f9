import { Command } from 'commander';
import { readFileSync } from 'fs';
import { dirname, resolve } from 'path';
import { fileURLToPath } from 'url';
import { createCheckCommand } from './commands/check.js';
import { createRulesCommand } from './commands/rules.js';

const __dirname = dirname(fileURLToPath(import.meta.url));
const VERSION: string = JSON.parse(readFileSync(resolve(__dirname, '../../package.json'), 'utf-8')).version;

/** Create the CLI program. */
export function createCli(): Command {
  const program = new Command()
    .name('argcheck')
    .description('Static checks for decorator-declared command-line argument schemas')
    .version(VERSION);
  [createCheckCommand, createRulesCommand].forEach((cmd) => program.addCommand(cmd()));
  return program;
}
