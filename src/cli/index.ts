#!/usr/bin/env node

/**
 * subsweep CLI Entry Point
 */

import { Command, CommanderError } from 'commander';
import chalk from 'chalk';
import { VERSION } from '../index.js';
import { scanCommand } from './commands/scan.js';
import { modesCommand } from './commands/modes.js';
import { botCommand } from './commands/bot.js';

const program = new Command();

program
  .name('subsweep')
  .description('Heuristic subdomain discovery with DNS and HTTPS verification')
  .version(VERSION);

const banner = `
${chalk.cyan('╔═══════════════════════════════════════════════╗')}
${chalk.cyan('║')}  ${chalk.bold.white('subsweep')} ${chalk.gray(`v${VERSION}`)}                               ${chalk.cyan('║')}
${chalk.cyan('║')}  ${chalk.gray('Candidate generation + live verification')}     ${chalk.cyan('║')}
${chalk.cyan('╚═══════════════════════════════════════════════╝')}
`;

program.addHelpText('beforeAll', banner);

// Register commands
program.addCommand(scanCommand);
program.addCommand(modesCommand);
program.addCommand(botCommand);

// Error handling
program.exitOverride();

try {
  await program.parseAsync(process.argv);
} catch (error) {
  if (error instanceof CommanderError && error.exitCode === 0) {
    process.exit(0);
  }
  if (error instanceof Error) {
    console.error(chalk.red(`\n❌ Error: ${error.message}\n`));
    process.exit(1);
  }
  throw error;
}
