/**
 * logmsglint-cli - command line host for the log message linter
 */

import { Command } from 'commander';

import { registerCheckCommand } from './commands/check.js';
import { VERSION } from './version.js';

export { VERSION };

/**
 * Build the root command with every subcommand registered
 */
export function createProgram(): Command {
  const program = new Command();

  program
    .name('logmsglint')
    .description('Lint the messages passed to pino and winston loggers')
    .version(VERSION);

  registerCheckCommand(program);

  return program;
}

export { runCheck, createFileFilter, EXIT_CLEAN, EXIT_ERROR, EXIT_PROBLEMS } from './commands/check.js';
export type { CheckIO, CheckOptions } from './commands/check.js';
export { loadProject, ProjectLoadError } from './program-loader.js';
export type { LoadedProject, ProjectOptions } from './program-loader.js';
export { fixFiles } from './fixer.js';
export type { FixSummary } from './fixer.js';
export { formatOutput } from './output/index.js';
export type { CheckReport, OutputFormat } from './output/index.js';
