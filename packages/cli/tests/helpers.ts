/**
 * Shared fixtures for CLI tests: a throwaway project on disk and captured IO.
 */

import * as fs from 'node:fs/promises';
import * as os from 'node:os';
import * as path from 'node:path';

import { Chalk } from 'chalk';

import type { CheckIO } from '../src/commands/check.js';

export const PINO_TYPES = `declare module 'pino' {
  export interface LogFn {
    (obj: object, msg?: string, ...args: unknown[]): void;
    (msg: string, ...args: unknown[]): void;
  }
  export interface Logger {
    info: LogFn;
    warn: LogFn;
    error: LogFn;
  }
  export default function pino(): Logger;
}
`;

export const TSCONFIG = JSON.stringify({
  compilerOptions: {
    target: 'ES2022',
    module: 'ESNext',
    moduleResolution: 'Bundler',
    strict: true,
    noEmit: true,
    types: [],
  },
  include: ['src'],
});

/** Line 4 holds the only logging call */
export const APP_SOURCE = `import pino from 'pino';

const logger = pino();
logger.info('Server started!');
`;

export const CLEAN_SOURCE = `import pino from 'pino';

const logger = pino();
logger.info('all good');
`;

export async function createTempDir(prefix = 'logmsglint-cli-'): Promise<string> {
  return fs.mkdtemp(path.join(os.tmpdir(), prefix));
}

/**
 * Write files below a directory, creating parent directories as needed
 */
export async function writeFiles(rootDir: string, files: Record<string, string>): Promise<void> {
  for (const [name, content] of Object.entries(files)) {
    const filePath = path.join(rootDir, name);
    await fs.mkdir(path.dirname(filePath), { recursive: true });
    await fs.writeFile(filePath, content, 'utf-8');
  }
}

/**
 * Create a project with a tsconfig.json, the pino declarations, one file with
 * problems and one clean file
 */
export async function createFixtureProject(): Promise<string> {
  const rootDir = await createTempDir();
  await writeFiles(rootDir, {
    'tsconfig.json': TSCONFIG,
    'src/loggers.d.ts': PINO_TYPES,
    'src/app.ts': APP_SOURCE,
    'src/clean.ts': CLEAN_SOURCE,
  });
  return rootDir;
}

export interface CapturedIO extends CheckIO {
  out: string[];
  err: string[];
}

export function captureIO(cwd: string, env: NodeJS.ProcessEnv = {}): CapturedIO {
  const out: string[] = [];
  const err: string[] = [];
  return {
    cwd,
    env,
    out,
    err,
    stdout: (text) => {
      out.push(text);
    },
    stderr: (text) => {
      err.push(text);
    },
    interactive: false,
    colors: new Chalk({ level: 0 }),
  };
}
