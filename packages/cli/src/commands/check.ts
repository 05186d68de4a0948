/**
 * logmsglint check - lint log messages and report problems.
 *
 * Exit codes: 0 = clean, 1 = problems found, 2 = error.
 */

import * as path from 'node:path';

import { createLinter, loadConfig } from 'logmsglint-core';
import { minimatch } from 'minimatch';

import { fixFiles } from '../fixer.js';
import { formatOutput, isOutputFormat, OUTPUT_FORMATS, relativePath } from '../output/index.js';
import { isInsideTargets, loadProject } from '../program-loader.js';
import { createCliLogger } from '../ui/logger.js';
import { withSpinner } from '../ui/spinner.js';

import type { FixSummary } from '../fixer.js';
import type { ChalkInstance } from 'chalk';
import type { Command } from 'commander';
import type ts from 'typescript';

// ============================================================================
// Types
// ============================================================================

export interface CheckOptions {
  /** tsconfig.json, or a directory containing one */
  project?: string;
  /** Config file replacing .logmsglintrc.json */
  config?: string;
  /** Output format */
  format?: string;
  /** Write suggested rewrites to disk */
  fix?: boolean;
  /** Extra globs of files to skip */
  ignore?: string[];
  verbose?: boolean;
  /** Suppress all output except errors */
  quiet?: boolean;
}

/**
 * Where a check reads its environment from and writes its output to
 */
export interface CheckIO {
  cwd: string;
  env: NodeJS.ProcessEnv;
  stdout(text: string): void;
  stderr(text: string): void;
  /** Whether progress spinners may be drawn */
  interactive: boolean;
  /** Colors for text output; chalk's detected level by default */
  colors?: ChalkInstance | undefined;
}

export const EXIT_CLEAN = 0;
export const EXIT_PROBLEMS = 1;
export const EXIT_ERROR = 2;

function processIO(): CheckIO {
  return {
    cwd: process.cwd(),
    env: process.env,
    stdout: (text) => process.stdout.write(text),
    stderr: (text) => process.stderr.write(text),
    interactive: Boolean(process.stderr.isTTY) && !process.env['CI'],
  };
}

// ============================================================================
// Helpers
// ============================================================================

/**
 * Build the predicate deciding which program files are checked
 */
export function createFileFilter(
  rootDir: string,
  targets: readonly string[],
  ignore: readonly string[]
): (sourceFile: ts.SourceFile) => boolean {
  return (sourceFile) => {
    if (!isInsideTargets(sourceFile.fileName, targets)) {return false;}
    const relative = relativePath(rootDir, path.resolve(sourceFile.fileName));
    return !ignore.some((pattern) => minimatch(relative, pattern, { dot: true }));
  };
}

// ============================================================================
// Check
// ============================================================================

/**
 * Run a check and return its exit code
 */
export async function runCheck(
  paths: readonly string[],
  options: CheckOptions,
  io: CheckIO = processIO()
): Promise<number> {
  const logger = createCliLogger({
    verbose: options.verbose,
    quiet: options.quiet,
    write: (line) => io.stderr(line + '\n'),
    colors: io.colors,
  });
  const format = options.format ?? 'text';

  if (!isOutputFormat(format)) {
    logger.error(`Unknown format "${format}"; expected one of ${OUTPUT_FORMATS.join(', ')}`);
    return EXIT_ERROR;
  }

  try {
    const config = await loadConfig({
      rootDir: io.cwd,
      configPath: options.config,
      env: io.env,
      logger,
    });
    const linter = createLinter(config, { logger });

    const project = await withSpinner(
      'Loading project...',
      () => loadProject({ cwd: io.cwd, project: options.project, paths }),
      {
        enabled: io.interactive && format === 'text' && !options.quiet,
        successText: (loaded) => `Loaded ${loaded.configFile ?? 'project'}`,
      }
    );
    logger.debug(`Root directory ${project.rootDir}`);

    let filesChecked = 0;
    const include = createFileFilter(project.rootDir, project.targets, [
      ...config.ignore,
      ...(options.ignore ?? []),
    ]);
    const diagnostics = linter.lintProgram(project.program, (sourceFile) => {
      const included = include(sourceFile);
      if (included) {filesChecked++;}
      return included;
    });

    let fixes: FixSummary | undefined;
    if (options.fix) {
      fixes = await fixFiles(project.program, diagnostics, logger);
    }

    if (!options.quiet) {
      io.stdout(
        formatOutput({ rootDir: project.rootDir, filesChecked, diagnostics, fixes }, format, io.colors)
      );
    }

    const remaining = diagnostics.length - (fixes?.applied ?? 0);
    return remaining > 0 ? EXIT_PROBLEMS : EXIT_CLEAN;
  } catch (error) {
    logger.error(error instanceof Error ? error.message : String(error));
    return EXIT_ERROR;
  }
}

// ============================================================================
// Registration
// ============================================================================

export function registerCheckCommand(program: Command): void {
  program
    .command('check [paths...]')
    .description('Check log messages passed to pino and winston')
    .option('-p, --project <path>', 'tsconfig.json to load, or a directory containing one')
    .option('-c, --config <path>', 'Config file to use instead of .logmsglintrc.json')
    .option('-f, --format <format>', `Output format: ${OUTPUT_FORMATS.join(', ')}`, 'text')
    .option('--fix', 'Write suggested rewrites to disk')
    .option('--ignore <glob...>', 'Glob patterns of files to skip')
    .option('-v, --verbose', 'Enable verbose output')
    .option('-q, --quiet', 'Suppress all output except errors')
    .action(async (paths: string[], opts: CheckOptions) => {
      process.exitCode = await runCheck(paths, opts);
    });
}
