/**
 * CLI logging utilities
 */

import chalk from 'chalk';
import { formatFields, type Logger } from '../../core/utils/logger.js';

/**
 * Log info message
 */
export function info(message: string): void {
  console.log(chalk.blue('ℹ'), message);
}

/**
 * Log success message
 */
export function success(message: string): void {
  console.log(chalk.green('✓'), message);
}

/**
 * Log warning message
 */
export function warn(message: string): void {
  console.log(chalk.yellow('⚠'), message);
}

/**
 * Log error message
 */
export function error(message: string): void {
  console.error(chalk.red('✗'), message);
}

/**
 * Log verbose message (only in verbose mode)
 */
export function verbose(message: string, isVerbose: boolean = false): void {
  if (isVerbose) {
    console.log(chalk.gray('[verbose]'), message);
  }
}

/**
 * Log key-value pair
 */
export function keyValue(key: string, value: string): void {
  console.log(chalk.gray(`${key}:`), chalk.white(value));
}

/**
 * Log empty line
 */
export function newline(): void {
  console.log();
}

/**
 * Create a Logger for the core modules that writes through the helpers above.
 * Debug lines are only shown in verbose mode.
 */
export function createConsoleLogger(options: { verbose?: boolean } = {}): Logger {
  const isVerbose = options.verbose ?? false;

  return {
    debug: (message, fields) => verbose(message + chalk.gray(formatFields(fields)), isVerbose),
    info: (message, fields) => {
      if (isVerbose) {
        info(message + chalk.gray(formatFields(fields)));
      }
    },
    warn: (message, fields) => warn(message + chalk.gray(formatFields(fields))),
    error: (message, fields) => error(message + chalk.gray(formatFields(fields))),
  };
}
