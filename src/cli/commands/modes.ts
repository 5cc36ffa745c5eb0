/**
 * Modes command: print each scan profile
 */

import { Command } from 'commander';
import chalk from 'chalk';
import { CandidateGenerator } from '../../core/generator.js';
import { MODES, estimateCount, scanConfigForMode } from '../../core/modes.js';

export const modesCommand = new Command('modes')
  .description('List scan modes and their profiles')
  .action(() => {
    console.log(chalk.cyan.bold('\n   Scan Modes\n'));

    for (const mode of MODES) {
      const { concurrency, timeout } = scanConfigForMode(mode);
      console.log(chalk.bold(`   ${mode}`));
      console.log(chalk.gray('   ├─ Concurrency : ') + chalk.white(String(concurrency)));
      console.log(chalk.gray('   ├─ Timeout     : ') + chalk.white(`${timeout}ms`));
      console.log(chalk.gray('   ├─ Candidates  : ') + chalk.white(`~${estimateCount(mode)}`));
      console.log(
        chalk.gray('   └─ Rules       : ') +
          chalk.magenta(CandidateGenerator.categoriesForMode(mode).join(', '))
      );
      console.log();
    }
  });
