/**
 * Program Loader - builds the TypeScript program a check runs against
 *
 * A tsconfig.json is used when one is given or can be found from the working
 * directory. Without one, the paths on the command line become the root files
 * of a program with default options.
 */

import * as path from 'node:path';

import { LogMsgLintError } from 'logmsglint-core';
import ts from 'typescript';

// ============================================================================
// Types
// ============================================================================

export interface ProjectOptions {
  /** Directory relative paths are resolved against */
  cwd: string;
  /** tsconfig.json, or a directory containing one */
  project?: string | undefined;
  /** Files or directories to check; empty means the whole project */
  paths: readonly string[];
}

export interface LoadedProject {
  program: ts.Program;
  /** Directory ignore globs and reported paths are relative to */
  rootDir: string;
  /** The tsconfig.json used, if any */
  configFile: string | undefined;
  /** Absolute paths a file must be inside of to be checked; empty means all */
  targets: string[];
}

/**
 * Error thrown when no program can be built
 */
export class ProjectLoadError extends LogMsgLintError {
  constructor(message: string) {
    super(message);
    this.name = 'ProjectLoadError';
  }
}

// ============================================================================
// Constants
// ============================================================================

const SOURCE_EXTENSIONS = ['.ts', '.tsx', '.mts', '.cts'];

const DEFAULT_COMPILER_OPTIONS: ts.CompilerOptions = {
  target: ts.ScriptTarget.ES2022,
  module: ts.ModuleKind.NodeNext,
  moduleResolution: ts.ModuleResolutionKind.NodeNext,
  strict: true,
  noEmit: true,
  skipLibCheck: true,
};

// ============================================================================
// Helpers
// ============================================================================

function formatDiagnostic(diagnostic: ts.Diagnostic): string {
  return ts.flattenDiagnosticMessageText(diagnostic.messageText, '\n');
}

function resolveConfigFile(options: ProjectOptions, hasTargets: boolean): string | undefined {
  if (options.project !== undefined) {
    let configFile = path.resolve(options.cwd, options.project);
    if (ts.sys.directoryExists(configFile)) {
      configFile = path.join(configFile, 'tsconfig.json');
    }
    if (!ts.sys.fileExists(configFile)) {
      throw new ProjectLoadError(`Cannot find a tsconfig.json at ${configFile}`);
    }
    return configFile;
  }

  const found = ts.findConfigFile(options.cwd, ts.sys.fileExists);
  if (found === undefined && !hasTargets) {
    throw new ProjectLoadError(
      `No tsconfig.json found from ${options.cwd}; pass --project or the files to check`
    );
  }
  return found === undefined ? undefined : path.resolve(found);
}

function programFromConfig(configFile: string): ts.Program {
  const { config, error } = ts.readConfigFile(configFile, ts.sys.readFile);
  if (error) {
    throw new ProjectLoadError(`Cannot read ${configFile}: ${formatDiagnostic(error)}`);
  }

  const parsed = ts.parseJsonConfigFileContent(config, ts.sys, path.dirname(configFile));
  const [firstError] = parsed.errors.filter((d) => d.category === ts.DiagnosticCategory.Error);
  if (firstError) {
    throw new ProjectLoadError(`Invalid ${configFile}: ${formatDiagnostic(firstError)}`);
  }

  return ts.createProgram({
    rootNames: parsed.fileNames,
    options: parsed.options,
    ...(parsed.projectReferences ? { projectReferences: parsed.projectReferences } : {}),
  });
}

function expandTargets(targets: readonly string[]): string[] {
  const files: string[] = [];
  for (const target of targets) {
    if (ts.sys.directoryExists(target)) {
      files.push(...ts.sys.readDirectory(target, SOURCE_EXTENSIONS, ['**/node_modules']));
    } else if (ts.sys.fileExists(target)) {
      files.push(target);
    } else {
      throw new ProjectLoadError(`No such file or directory: ${target}`);
    }
  }
  return files;
}

// ============================================================================
// Loader
// ============================================================================

/**
 * Build the program for a check.
 *
 * @throws ProjectLoadError when no tsconfig.json or paths are available, the
 *   tsconfig.json is invalid, or a path does not exist
 */
export function loadProject(options: ProjectOptions): LoadedProject {
  const targets = options.paths.map((p) => path.resolve(options.cwd, p));
  const configFile = resolveConfigFile(options, targets.length > 0);

  if (configFile !== undefined) {
    return {
      program: programFromConfig(configFile),
      rootDir: path.dirname(configFile),
      configFile,
      targets,
    };
  }

  const rootNames = expandTargets(targets);
  if (rootNames.length === 0) {
    throw new ProjectLoadError(`No TypeScript files found in ${targets.join(', ')}`);
  }

  return {
    program: ts.createProgram(rootNames, DEFAULT_COMPILER_OPTIONS),
    rootDir: options.cwd,
    configFile: undefined,
    targets,
  };
}

/**
 * Whether a file lies inside one of the targets
 */
export function isInsideTargets(fileName: string, targets: readonly string[]): boolean {
  if (targets.length === 0) {return true;}
  const resolved = path.resolve(fileName);
  return targets.some((target) => resolved === target || resolved.startsWith(target + path.sep));
}
