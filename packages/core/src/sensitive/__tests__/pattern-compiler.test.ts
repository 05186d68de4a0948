/**
 * Pattern Compiler Tests
 */

import { describe, it, expect } from 'vitest';

import { InvalidPatternError } from '../../errors.js';
import {
  compileSensitivePatterns,
  DEFAULT_SENSITIVE_PATTERNS,
  REDACTION_TOKEN,
} from '../pattern-compiler.js';

describe('compileSensitivePatterns', () => {
  it('should compile every built-in pattern when no custom ones are given', () => {
    const patterns = compileSensitivePatterns(DEFAULT_SENSITIVE_PATTERNS);

    expect(patterns.map((p) => p.source)).toEqual([...DEFAULT_SENSITIVE_PATTERNS]);
    expect(patterns).toHaveLength(7);
  });

  it('should append custom patterns after the built-ins', () => {
    const patterns = compileSensitivePatterns(['\\bone\\b'], ['\\btwo\\b', '\\bthree\\b']);

    expect(patterns.map((p) => p.source)).toEqual(['\\bone\\b', '\\btwo\\b', '\\bthree\\b']);
  });

  it('should trim sources and drop empty entries and duplicates', () => {
    const patterns = compileSensitivePatterns(DEFAULT_SENSITIVE_PATTERNS, [
      '  \\btoken\\b  ',
      'client_secret',
      '',
      '   ',
      'client_secret',
    ]);

    expect(patterns).toHaveLength(8);
    expect(patterns[7]?.source).toBe('client_secret');
  });

  it('should deduplicate by text, not by compiled meaning', () => {
    const patterns = compileSensitivePatterns(['token'], ['(?:token)']);

    expect(patterns.map((p) => p.source)).toEqual(['token', '(?:token)']);
  });

  it('should compile case-insensitive matchers with the redaction token', () => {
    const [pattern] = compileSensitivePatterns(['\\bpassword\\b']);

    expect(pattern?.matcher.flags).toBe('i');
    expect(pattern?.replacer.flags).toBe('gi');
    expect(pattern?.matcher.test('PassWord reset')).toBe(true);
    expect(pattern?.replacement).toBe(REDACTION_TOKEN);
    expect(REDACTION_TOKEN).toBe('[redacted]');
  });

  it('should reject the whole set when one pattern is invalid', () => {
    expect(() => compileSensitivePatterns(DEFAULT_SENSITIVE_PATTERNS, ['ok', '('])).toThrow(
      InvalidPatternError
    );
  });

  it('should carry the offending pattern and the underlying error', () => {
    let caught: unknown;
    try {
      compileSensitivePatterns([], ['  (  ']);
    } catch (error) {
      caught = error;
    }

    if (!(caught instanceof InvalidPatternError)) {
      throw new Error('expected an InvalidPatternError');
    }
    expect(caught.pattern).toBe('(');
    expect(caught.errorCause).toBeInstanceOf(SyntaxError);
    expect(caught.message).toContain('"("');
  });
});
