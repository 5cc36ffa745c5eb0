/**
 * Logging utility with levels and colors
 */

import chalk from 'chalk';
import type { LogLevel } from '../core/types.js';

const LEVELS: Record<LogLevel, number> = {
  debug: 0,
  info: 1,
  warn: 2,
  error: 3,
};

export function isLogLevel(value: unknown): value is LogLevel {
  return typeof value === 'string' && Object.keys(LEVELS).includes(value);
}

/**
 * Logger class with configurable levels
 */
class Logger {
  private level: LogLevel = 'info';
  private quiet = false;

  setLevel(level: LogLevel) {
    this.level = level;
  }

  /**
   * Quiet mode silences everything, errors included
   */
  setQuiet(quiet: boolean) {
    this.quiet = quiet;
  }

  private shouldLog(level: LogLevel): boolean {
    return !this.quiet && LEVELS[level] >= LEVELS[this.level];
  }

  debug(message: string, ...args: unknown[]) {
    if (this.shouldLog('debug')) {
      console.log(chalk.gray(`[DEBUG] ${message}`), ...args);
    }
  }

  info(message: string, ...args: unknown[]) {
    if (this.shouldLog('info')) {
      console.log(chalk.blue(`[INFO] ${message}`), ...args);
    }
  }

  warn(message: string, ...args: unknown[]) {
    if (this.shouldLog('warn')) {
      console.warn(chalk.yellow(`[WARN] ${message}`), ...args);
    }
  }

  error(message: string, ...args: unknown[]) {
    if (this.shouldLog('error')) {
      console.error(chalk.red(`[ERROR] ${message}`), ...args);
    }
  }

  /**
   * Success log (info level)
   */
  success(message: string, ...args: unknown[]) {
    if (this.shouldLog('info')) {
      console.log(chalk.green(`[✓] ${message}`), ...args);
    }
  }

  /**
   * Progress log (info level)
   */
  progress(message: string, current: number, total: number) {
    if (this.shouldLog('info')) {
      const percentage = total === 0 ? 100 : Math.round((current / total) * 100);
      console.log(chalk.cyan(`[${percentage}%] ${message} (${current}/${total})`));
    }
  }
}

/**
 * Global logger instance
 */
export const logger = new Logger();
