// CLI setup with Commander

import { Command, InvalidArgumentError } from 'commander';
import { demoCommand } from './commands/demo.js';
import { logsCommand } from './commands/logs.js';
import { configCommand } from './commands/config.js';

export function parseNonNegativeInt(value: string): number {
  const parsed = Number(value);
  if (!Number.isInteger(parsed) || parsed < 0) {
    throw new InvalidArgumentError('Expected a non-negative integer.');
  }
  return parsed;
}

export function parsePositiveInt(value: string): number {
  const parsed = parseNonNegativeInt(value);
  if (parsed < 1) {
    throw new InvalidArgumentError('Expected a positive integer.');
  }
  return parsed;
}

export function createCLI(): Command {
  const program = new Command();

  program
    .name('pinned-region')
    .description('Keep a live status bar pinned to the bottom of the terminal')
    .version('0.1.0');

  // Default command: factorial demo
  program
    .command('demo', { isDefault: true })
    .description('Print factorials above a live progress bar')
    .option('--height <n>', 'Number of bar rows', parsePositiveInt)
    .option('--count <n>', 'How many factorials to compute', parseNonNegativeInt)
    .option('--delay <ms>', 'Pause between results', parseNonNegativeInt)
    .action(demoCommand);

  program
    .command('logs')
    .description('Route leveled log output above a three-row bar')
    .option('--rounds <n>', 'Rounds of log messages', parseNonNegativeInt)
    .option('--delay <ms>', 'Pause between rounds', parseNonNegativeInt)
    .action(logsCommand);

  // Configuration management
  program
    .command('config')
    .description('Manage CLI configuration')
    .option('--set <key=value>', 'Set configuration value')
    .option('--get <key>', 'Get configuration value')
    .option('--list', 'List all configuration')
    .action(configCommand);

  return program;
}
