/**
 * Main application orchestrator
 */
import chalk from 'chalk';
import { CandidateGenerator } from './generator.js';
import { Verifier } from './verifier.js';
import { scanConfigForMode } from './modes.js';
import { dnsOnly, exportReport, formatJSON, formatText } from './report.js';
import { logger } from '../utils/logger.js';
import type { AppConfig, ScanConfig, ScanOptions, ScanReport } from './types.js';

export interface AppDependencies {
  generator?: CandidateGenerator;
  verifier?: Verifier;
}

/**
 * Runs one scan: generate candidates, verify them, report
 */
export class App {
  private config: AppConfig;
  private scanConfig: ScanConfig;
  private generator: CandidateGenerator;
  private verifier: Verifier;

  constructor(config: AppConfig, deps: AppDependencies = {}) {
    this.config = config;

    const profile = scanConfigForMode(config.mode);
    this.scanConfig = {
      concurrency: config.concurrency ?? profile.concurrency,
      timeout: config.timeout ?? profile.timeout,
    };

    this.generator = deps.generator ?? new CandidateGenerator();
    this.verifier = deps.verifier ?? new Verifier({ resolvers: config.resolvers });
  }

  /**
   * Generate and verify without producing output
   */
  async scan(options: ScanOptions = {}): Promise<ScanReport> {
    const { signal, onProgress } = options;
    const startTime = new Date();
    const { domain, mode } = this.config;

    logger.info(chalk.cyan.bold('\nStep 1/2') + chalk.cyan('  Generating candidates...'));
    const candidates = this.generator.generate(domain, mode);
    logger.info(`Generated ${candidates.size} candidates for ${domain} (${mode})`);

    logger.info(chalk.cyan.bold('\nStep 2/2') + chalk.cyan('  Verifying candidates...'));
    const step = Math.max(1, Math.ceil(candidates.size / 10));
    const result = await this.verifier.scan(candidates, this.scanConfig, {
      signal,
      onProgress: (done, total) => {
        if (done % step === 0 || done === total) {
          logger.progress('Checked', done, total);
        }
        onProgress?.(done, total);
      },
    });

    const endTime = new Date();

    return {
      domain,
      mode,
      candidates: candidates.size,
      dnsResolved: Array.from(result.dnsResolved).sort(),
      httpsAlive: Array.from(result.httpsAlive).sort(),
      metadata: {
        startTime,
        endTime,
        duration: endTime.getTime() - startTime.getTime(),
        concurrency: this.scanConfig.concurrency,
        timeout: this.scanConfig.timeout,
        aborted: signal?.aborted ?? false,
      },
    };
  }

  /**
   * Run the complete scan workflow
   */
  async run(options: ScanOptions = {}): Promise<ScanReport> {
    try {
      const report = await this.scan(options);
      await this.outputResults(report);
      return report;
    } catch (error) {
      logger.error('Scan failed:', error);
      throw error;
    }
  }

  /**
   * Print the report and export it when requested
   */
  private async outputResults(report: ScanReport): Promise<void> {
    if (!this.config.quiet) {
      console.log(
        this.config.format === 'json' ? formatJSON(report) : this.formatConsole(report)
      );
    }

    if (this.config.export) {
      const contents = this.config.format === 'json' ? formatJSON(report) : formatText(report);
      await exportReport(this.config.export, contents);
      logger.info(`Results exported to: ${this.config.export}`);
    }
  }

  /**
   * Coloured terminal rendering
   */
  private formatConsole(report: ScanReport): string {
    const lines: string[] = [];
    const duration = (report.metadata.duration / 1000).toFixed(2);

    lines.push(chalk.bold('\n   Summary'));
    lines.push(chalk.gray('   ┌────────────────────────────────────────────────────────┐'));
    lines.push(`   │ Target Domain        : ${chalk.cyan.bold(report.domain)}`);
    lines.push(`   │ Mode                 : ${chalk.magenta.bold(report.mode)}`);
    lines.push(`   │ Scan Duration        : ${chalk.white.bold(duration + 's')}`);
    lines.push(`   │ Candidates           : ${chalk.white(report.candidates.toString())}`);
    lines.push(`   │ DNS Resolved         : ${chalk.blue.bold(report.dnsResolved.length.toString())}`);
    lines.push(`   │ HTTPS Alive          : ${chalk.green.bold(report.httpsAlive.length.toString())}`);
    lines.push(chalk.gray('   └────────────────────────────────────────────────────────┘\n'));

    if (report.metadata.aborted) {
      lines.push(chalk.yellow.bold('   Scan cancelled, results are partial.\n'));
    }

    if (report.httpsAlive.length > 0) {
      lines.push(chalk.green.bold('   HTTPS Alive'));
      report.httpsAlive.forEach((host, idx) => {
        const prefix = idx === report.httpsAlive.length - 1 ? '   └─ ' : '   ├─ ';
        lines.push(chalk.gray(prefix) + chalk.green(`https://${host}`));
      });
      lines.push('');
    }

    const resolvedOnly = dnsOnly(report);
    if (resolvedOnly.length > 0) {
      lines.push(chalk.blue.bold('   DNS Only'));
      resolvedOnly.forEach((host, idx) => {
        const prefix = idx === resolvedOnly.length - 1 ? '   └─ ' : '   ├─ ';
        lines.push(chalk.gray(prefix) + chalk.white(host));
      });
      lines.push('');
    }

    if (report.dnsResolved.length === 0) {
      lines.push(chalk.dim('   No candidates resolved.\n'));
    }

    lines.push(
      chalk.dim('   Scan completed at ') + chalk.white(report.metadata.endTime.toLocaleString())
    );

    return lines.join('\n');
  }
}
