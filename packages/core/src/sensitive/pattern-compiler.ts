/**
 * Pattern Compiler - sensitive-data pattern compilation
 *
 * Merges the built-in keyword patterns with user-supplied ones and compiles
 * them into case-insensitive matchers. The whole set is rejected if any
 * single pattern fails to compile.
 */

import { InvalidPatternError } from '../errors.js';

import type { SensitivePattern } from '../types.js';

// ============================================================================
// Constants
// ============================================================================

/** Text every sensitive match is replaced with */
export const REDACTION_TOKEN = '[redacted]';

/** Keyword families that are always checked */
export const DEFAULT_SENSITIVE_PATTERNS: readonly string[] = Object.freeze([
  '\\bpassword\\b',
  '\\bpasswd\\b',
  '\\btoken\\b',
  '\\bapi[_-]?key\\b',
  '\\bsecret\\b',
  '\\bauthorization\\b',
  '\\baccess[_-]?key\\b',
]);

// ============================================================================
// Compilation
// ============================================================================

/**
 * Compile built-in and custom pattern sources into sensitive patterns.
 *
 * Sources are trimmed; empty entries and exact duplicates (by trimmed text)
 * are dropped, keeping first-seen order.
 *
 * @throws InvalidPatternError on the first source that is not a valid regex
 */
export function compileSensitivePatterns(
  builtins: readonly string[],
  custom: readonly string[] = []
): SensitivePattern[] {
  const seen = new Set<string>();
  const compiled: SensitivePattern[] = [];

  for (const raw of [...builtins, ...custom]) {
    const source = raw.trim();
    if (source === '' || seen.has(source)) {
      continue;
    }
    seen.add(source);

    let matcher: RegExp;
    try {
      matcher = new RegExp(source, 'i');
    } catch (error) {
      throw new InvalidPatternError(source, error instanceof Error ? error : undefined);
    }

    compiled.push(
      Object.freeze({
        source,
        matcher,
        replacer: new RegExp(source, 'gi'),
        replacement: REDACTION_TOKEN,
      })
    );
  }

  return compiled;
}
