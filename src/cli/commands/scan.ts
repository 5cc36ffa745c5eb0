/**
 * Scan command implementation
 */

import { Command } from 'commander';
import chalk from 'chalk';
import { join } from 'path';
import { App } from '../../core/app.js';
import { parseDomain } from '../../core/domain.js';
import { quickScanConfig, scanConfigForMode } from '../../core/modes.js';
import { reportFileName } from '../../core/report.js';
import { logger } from '../../utils/logger.js';
import { parseFormat, parseMode, parsePositiveInt } from '../options.js';
import type { AppConfig, Mode } from '../../core/types.js';

const DEFAULT_RESULTS_DIR = 'scan_results';

export const scanCommand = new Command('scan')
  .description('Generate subdomain candidates for a domain and verify them')
  .requiredOption('-d, --domain <domain>', 'Target root domain')
  .option('-m, --mode <mode>', 'Scan mode: normal|medium|ultimate', parseMode, 'normal')
  .option('-c, --concurrency <number>', 'Concurrent checks (default: from mode)', parsePositiveInt)
  .option('-t, --timeout <ms>', 'Per-check timeout in milliseconds (default: from mode)', parsePositiveInt)
  .option('-f, --format <type>', 'Output format: text|json', parseFormat, 'text')
  .option('-e, --export [file]', `Export results to file (default: ./${DEFAULT_RESULTS_DIR}/)`)
  .option('--resolvers <ips...>', 'DNS servers to query instead of the system resolver')
  .option('--quick', 'Quick scan: fixed concurrency of 20', false)
  .option('-q, --quiet', 'Suppress output', false)
  .option('-v, --verbose', 'Log every check', false)
  .action(
    async (options: {
      domain: string;
      mode: Mode;
      concurrency?: number;
      timeout?: number;
      format: 'text' | 'json';
      export?: string | boolean;
      resolvers?: string[];
      quick: boolean;
      quiet: boolean;
      verbose: boolean;
    }) => {
      try {
        const domain = parseDomain(options.domain);
        const profile = options.quick
          ? quickScanConfig(options.mode)
          : scanConfigForMode(options.mode);

        const config: AppConfig = {
          domain,
          mode: options.mode,
          concurrency: options.concurrency ?? profile.concurrency,
          timeout: options.timeout ?? profile.timeout,
          format: options.format,
          export: resolveExportPath(options.export, domain),
          quiet: options.quiet,
          resolvers: options.resolvers,
        };

        logger.setQuiet(config.quiet);
        if (options.verbose) {
          logger.setLevel('debug');
        }

        if (!config.quiet) {
          console.log(
            chalk.bold('\n   Target') +
              chalk.gray(' ──▶ ') +
              chalk.cyan.bold(config.domain) +
              chalk.gray(` (${config.mode})\n`)
          );
          console.log(chalk.dim('   Configuration'));
          console.log(
            chalk.gray('   ├─ Concurrency      : ') + chalk.white.bold(String(config.concurrency))
          );
          console.log(chalk.gray('   ├─ Timeout          : ') + chalk.white(`${config.timeout}ms`));
          console.log(
            chalk.gray('   ├─ Resolvers        : ') +
              chalk.white(config.resolvers?.join(', ') ?? 'system')
          );
          console.log(
            chalk.gray('   └─ Export File      : ') +
              (config.export ? chalk.blue(config.export) : chalk.dim('Disabled'))
          );
          console.log(chalk.dim('\n   Press Ctrl-C to stop early and keep partial results.\n'));
        }

        const controller = new AbortController();
        const onInterrupt = () => {
          if (controller.signal.aborted) {
            process.exit(130);
          }
          logger.warn('Interrupted, finishing in-flight checks...');
          controller.abort();
        };
        process.on('SIGINT', onInterrupt);

        const app = new App(config);
        const report = await app.run({ signal: controller.signal });
        process.off('SIGINT', onInterrupt);

        if (!config.quiet) {
          console.log(
            chalk.green.bold(
              report.metadata.aborted ? '\n   ✔ Scan stopped\n' : '\n   ✔ Scan completed successfully!\n'
            )
          );
        }

        process.exit(0);
      } catch (error) {
        if (error instanceof Error) {
          console.log(chalk.red.bold('\n   ✘ Scan failed\n'));
          console.log(chalk.red(`   Error: `) + chalk.white(error.message));
          console.log(chalk.dim('\n   Check your input arguments or network connectivity.\n'));
        }
        process.exit(1);
      }
    }
  );

/**
 * `-e` alone means a timestamped file under scan_results/
 */
function resolveExportPath(value: string | boolean | undefined, domain: AppConfig['domain']) {
  if (typeof value === 'string') {
    return value;
  }
  if (value === true) {
    return join(DEFAULT_RESULTS_DIR, reportFileName(domain, new Date()));
  }
  return undefined;
}
