/**
 * CLI logger - colored status lines on stderr
 */

import chalk from 'chalk';

import type { ChalkInstance } from 'chalk';
import type { Logger } from 'logmsglint-core';

export interface CliLoggerOptions {
  /** Show debug lines */
  verbose?: boolean | undefined;
  /** Show errors only */
  quiet?: boolean | undefined;
  /** Line sink; stderr by default */
  write?: ((line: string) => void) | undefined;
  colors?: ChalkInstance | undefined;
}

/**
 * Create a logger with the same status symbols as the check summary
 */
export function createCliLogger(options: CliLoggerOptions = {}): Logger {
  const write = options.write ?? ((line: string) => process.stderr.write(line + '\n'));
  const colors = options.colors ?? chalk;
  const quiet = options.quiet ?? false;
  const verbose = (options.verbose ?? false) && !quiet;

  return {
    error(message: string): void {
      write(`${colors.red('✖')} ${message}`);
    },
    warn(message: string): void {
      if (!quiet) {write(`${colors.yellow('⚠')} ${message}`);}
    },
    info(message: string): void {
      if (!quiet) {write(`${colors.blue('ℹ')} ${message}`);}
    },
    debug(message: string): void {
      if (verbose) {write(colors.gray(`  ${message}`));}
    },
  };
}
