/**
 * Config Loader Tests
 *
 * Covers:
 * - default file lookup and the missing-file fallback
 * - explicit config paths
 * - read and parse failures
 * - environment overrides
 */

import * as fs from 'node:fs/promises';
import * as os from 'node:os';
import * as path from 'node:path';

import { describe, it, expect, beforeEach, afterEach, vi } from 'vitest';

import { ConfigLoadError, ConfigParseError, InvalidConfigurationError } from '../../errors.js';
import { CONFIG_FILE, ENV_SENSITIVE_PATTERNS, loadConfig } from '../config-loader.js';

import type { Logger } from '../../logging/logger.js';

// =============================================================================
// Test Helpers
// =============================================================================

function createTestLogger(): Logger {
  return {
    error: vi.fn(),
    warn: vi.fn(),
    info: vi.fn(),
    debug: vi.fn(),
  };
}

describe('loadConfig', () => {
  let tempDir: string;

  beforeEach(async () => {
    tempDir = await fs.mkdtemp(path.join(os.tmpdir(), 'logmsglint-config-'));
  });

  afterEach(async () => {
    await fs.rm(tempDir, { recursive: true, force: true });
  });

  async function writeConfig(name: string, content: string): Promise<string> {
    const filePath = path.join(tempDir, name);
    await fs.writeFile(filePath, content, 'utf-8');
    return filePath;
  }

  // ===========================================================================
  // Default Lookup
  // ===========================================================================

  it('should fall back to defaults when no config file exists', async () => {
    const logger = createTestLogger();

    const config = await loadConfig({ rootDir: tempDir, env: {}, logger });

    expect(config).toEqual({ sensitivePatterns: [], ignore: [] });
    expect(logger.info).toHaveBeenCalledWith(
      `No config file found at ${path.join(tempDir, CONFIG_FILE)}, using defaults`
    );
  });

  it('should read the default config file from the root directory', async () => {
    await writeConfig(CONFIG_FILE, JSON.stringify({
      'sensitive-patterns': ['\\bsession[_-]?id\\b'],
      ignore: ['dist/**'],
    }));

    const config = await loadConfig({ rootDir: tempDir, env: {} });

    expect(config).toEqual({ sensitivePatterns: ['\\bsession[_-]?id\\b'], ignore: ['dist/**'] });
  });

  // ===========================================================================
  // Explicit Paths
  // ===========================================================================

  it('should read an explicit config path relative to the root directory', async () => {
    await writeConfig('lint.json', JSON.stringify({ sensitivePatterns: 'pin' }));

    const config = await loadConfig({ rootDir: tempDir, configPath: 'lint.json', env: {} });

    expect(config.sensitivePatterns).toEqual(['pin']);
  });

  it('should fail when an explicit config file is missing', async () => {
    await expect(
      loadConfig({ rootDir: tempDir, configPath: 'missing.json', env: {} })
    ).rejects.toBeInstanceOf(ConfigLoadError);
  });

  // ===========================================================================
  // Failures
  // ===========================================================================

  it('should fail on invalid JSON', async () => {
    const filePath = await writeConfig(CONFIG_FILE, '{ "ignore": [');

    await expect(loadConfig({ rootDir: tempDir, env: {} })).rejects.toThrow(
      new ConfigParseError(`Invalid JSON in config file: ${filePath}`, filePath)
    );
  });

  it('should fail on a config of the wrong shape', async () => {
    await writeConfig(CONFIG_FILE, JSON.stringify({ ignore: 3 }));

    await expect(loadConfig({ rootDir: tempDir, env: {} })).rejects.toBeInstanceOf(InvalidConfigurationError);
  });

  // ===========================================================================
  // Environment Overrides
  // ===========================================================================

  it('should append patterns from the environment after the file patterns', async () => {
    await writeConfig(CONFIG_FILE, JSON.stringify({ 'sensitive-patterns': ['from-file'] }));

    const config = await loadConfig({
      rootDir: tempDir,
      env: { [ENV_SENSITIVE_PATTERNS]: ' first , ,second ' },
    });

    expect(config.sensitivePatterns).toEqual(['from-file', 'first', 'second']);
  });

  it('should read a JSON array from the environment so patterns may contain commas', async () => {
    const config = await loadConfig({
      rootDir: tempDir,
      env: { [ENV_SENSITIVE_PATTERNS]: ' ["\\\\b\\\\d{3,4}\\\\b", " pin "]' },
    });

    expect(config.sensitivePatterns).toEqual(['\\b\\d{3,4}\\b', 'pin']);
  });

  it('should fail on a malformed JSON array in the environment', async () => {
    await expect(
      loadConfig({ rootDir: tempDir, env: { [ENV_SENSITIVE_PATTERNS]: '["unclosed"' } })
    ).rejects.toThrow(`key "${ENV_SENSITIVE_PATTERNS}": invalid JSON array`);
  });

  it('should fail on a JSON array holding something other than strings', async () => {
    await expect(
      loadConfig({ rootDir: tempDir, env: { [ENV_SENSITIVE_PATTERNS]: '["ok", 3]' } })
    ).rejects.toThrow(`key "${ENV_SENSITIVE_PATTERNS}": list item is not a string: number`);
  });

  it('should skip environment overrides when disabled', async () => {
    const config = await loadConfig({
      rootDir: tempDir,
      applyEnvOverrides: false,
      env: { [ENV_SENSITIVE_PATTERNS]: 'ignored' },
    });

    expect(config.sensitivePatterns).toEqual([]);
  });
});
