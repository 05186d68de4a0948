/**
 * Config Loader - configuration file loading
 *
 * Loads configuration from .logmsglintrc.json (or an explicit path), runs it
 * through the parser, and applies environment variable overrides.
 */

import * as fs from 'node:fs/promises';
import * as path from 'node:path';

import { ConfigLoadError, ConfigParseError, InvalidConfigurationError } from '../errors.js';
import { silentLogger } from '../logging/logger.js';

import { emptyConfig, parseConfig, toStringList } from './config-parser.js';

import type { Logger } from '../logging/logger.js';
import type { LintConfig } from '../types.js';

// ============================================================================
// Constants
// ============================================================================

/** Default config file name, looked up in the root directory */
export const CONFIG_FILE = '.logmsglintrc.json';

/**
 * Patterns appended after the file's patterns: a comma-separated list, or a
 * JSON array of strings when the value starts with `[`
 */
export const ENV_SENSITIVE_PATTERNS = 'LOGMSGLINT_SENSITIVE_PATTERNS';

// ============================================================================
// Helper Functions
// ============================================================================

async function fileExists(filePath: string): Promise<boolean> {
  try {
    await fs.access(filePath);
    return true;
  } catch {
    return false;
  }
}

function splitEnvList(value: string | undefined, name: string): string[] {
  if (value === undefined) {return [];}

  if (value.trimStart().startsWith('[')) {
    let parsed: unknown;
    try {
      parsed = JSON.parse(value) as unknown;
    } catch (error) {
      const reason = error instanceof Error ? error.message : String(error);
      throw new InvalidConfigurationError(`invalid JSON array: ${reason}`, 'string', name);
    }
    return toStringList(parsed, name);
  }

  return value
    .split(',')
    .map((item) => item.trim())
    .filter((item) => item !== '');
}

// ============================================================================
// Loader
// ============================================================================

export interface ConfigLoaderOptions {
  /** Directory the default config file is looked up in */
  rootDir?: string | undefined;
  /** Explicit config file; must exist when given */
  configPath?: string | undefined;
  /** Whether to apply environment variable overrides */
  applyEnvOverrides?: boolean | undefined;
  /** Environment to read overrides from */
  env?: NodeJS.ProcessEnv | undefined;
  logger?: Logger | undefined;
}

/**
 * Load, parse and override the configuration.
 *
 * @throws ConfigLoadError if an explicit config file cannot be read
 * @throws ConfigParseError if the file is not valid JSON
 * @throws InvalidConfigurationError if the JSON or the environment override
 *   has the wrong shape
 */
export async function loadConfig(options: ConfigLoaderOptions = {}): Promise<LintConfig> {
  const logger = options.logger ?? silentLogger;
  const rootDir = options.rootDir ?? process.cwd();
  const explicit = options.configPath !== undefined;
  const filePath = path.resolve(rootDir, options.configPath ?? CONFIG_FILE);

  let config: LintConfig;
  if (!explicit && !(await fileExists(filePath))) {
    logger.info(`No config file found at ${filePath}, using defaults`);
    config = emptyConfig();
  } else {
    config = parseConfig(await readJson(filePath));
    logger.debug(`Loaded config from ${filePath}`);
  }

  if (options.applyEnvOverrides ?? true) {
    const env = options.env ?? process.env;
    const extra = splitEnvList(env[ENV_SENSITIVE_PATTERNS], ENV_SENSITIVE_PATTERNS);
    if (extra.length > 0) {
      logger.debug(`Appending ${extra.length} pattern(s) from ${ENV_SENSITIVE_PATTERNS}`);
      config.sensitivePatterns = [...config.sensitivePatterns, ...extra];
    }
  }

  return config;
}

async function readJson(filePath: string): Promise<unknown> {
  let content: string;
  try {
    content = await fs.readFile(filePath, 'utf-8');
  } catch (error) {
    throw new ConfigLoadError(
      `Failed to read config file: ${filePath}`,
      filePath,
      error instanceof Error ? error : undefined
    );
  }

  try {
    return JSON.parse(content) as unknown;
  } catch (error) {
    throw new ConfigParseError(
      `Invalid JSON in config file: ${filePath}`,
      filePath,
      error instanceof Error ? error : undefined
    );
  }
}
