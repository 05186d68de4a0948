/**
 * Config Parser - raw configuration value to LintConfig
 *
 * Accepts the shapes a host may hand over (parsed JSON or YAML, or a value
 * built in code) and rejects everything else. Nothing falls back to defaults
 * on a malformed value.
 */

import { describeType, InvalidConfigurationError } from '../errors.js';

import type { LintConfig } from '../types.js';

// ============================================================================
// Constants
// ============================================================================

/** Accepted spellings of the sensitive pattern key, in lookup order */
export const SENSITIVE_PATTERN_KEYS = ['sensitive-patterns', 'sensitive_patterns', 'sensitivePatterns'] as const;

export const IGNORE_KEY = 'ignore';

// ============================================================================
// Helpers
// ============================================================================

function isPlainObject(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

/**
 * Normalize a string or list of strings, trimming and dropping empty entries
 */
export function toStringList(value: unknown, key?: string): string[] {
  if (typeof value === 'string') {
    const trimmed = value.trim();
    return trimmed === '' ? [] : [trimmed];
  }

  if (!Array.isArray(value)) {
    throw new InvalidConfigurationError(
      `expected a string or a list of strings, got ${describeType(value)}`,
      describeType(value),
      key
    );
  }

  const result: string[] = [];
  for (const item of value) {
    if (typeof item !== 'string') {
      throw new InvalidConfigurationError(
        `list item is not a string: ${describeType(item)}`,
        describeType(item),
        key
      );
    }
    const trimmed = item.trim();
    if (trimmed !== '') {
      result.push(trimmed);
    }
  }
  return result;
}

export function emptyConfig(): LintConfig {
  return { sensitivePatterns: [], ignore: [] };
}

// ============================================================================
// Parser
// ============================================================================

/**
 * Parse a raw configuration value.
 *
 * @throws InvalidConfigurationError when the value is not an object or a
 *   known key holds something other than text
 */
export function parseConfig(raw: unknown): LintConfig {
  if (raw === null || raw === undefined) {
    return emptyConfig();
  }

  if (!isPlainObject(raw)) {
    throw new InvalidConfigurationError(
      `expected a configuration object, got ${describeType(raw)}`,
      describeType(raw)
    );
  }

  const config = emptyConfig();

  const patternKey = SENSITIVE_PATTERN_KEYS.find((key) => key in raw);
  if (patternKey !== undefined) {
    config.sensitivePatterns = toStringList(raw[patternKey], patternKey);
  }

  if (IGNORE_KEY in raw) {
    config.ignore = toStringList(raw[IGNORE_KEY], IGNORE_KEY);
  }

  return config;
}
