/**
 * Config Parser Tests
 */

import { describe, it, expect } from 'vitest';

import { InvalidConfigurationError } from '../../errors.js';
import { emptyConfig, parseConfig, toStringList } from '../config-parser.js';

describe('parseConfig', () => {
  it.each([
    ['null', null],
    ['undefined', undefined],
    ['an empty object', {}],
  ])('should give the empty configuration for %s', (_name, raw) => {
    expect(parseConfig(raw)).toEqual(emptyConfig());
  });

  it.each(['sensitive-patterns', 'sensitive_patterns', 'sensitivePatterns'])(
    'should read patterns under %s',
    (key) => {
      expect(parseConfig({ [key]: ['\\bsession_id\\b'] }).sensitivePatterns).toEqual(['\\bsession_id\\b']);
    }
  );

  it('should take the first spelling present in lookup order', () => {
    const config = parseConfig({
      sensitivePatterns: ['camel'],
      'sensitive_patterns': ['snake'],
      'sensitive-patterns': ['kebab'],
    });

    expect(config.sensitivePatterns).toEqual(['kebab']);
  });

  it('should accept a single string', () => {
    expect(parseConfig({ 'sensitive-patterns': '  \\bpin\\b  ' }).sensitivePatterns).toEqual(['\\bpin\\b']);
  });

  it('should trim list items and drop empty ones', () => {
    const config = parseConfig({ 'sensitive-patterns': ['  a ', '', '   ', 'b'] });

    expect(config.sensitivePatterns).toEqual(['a', 'b']);
  });

  it('should read ignore globs', () => {
    expect(parseConfig({ ignore: ['**/*.spec.ts', 'dist/**'] }).ignore).toEqual(['**/*.spec.ts', 'dist/**']);
  });

  it('should ignore unknown keys', () => {
    expect(parseConfig({ severity: 'error' })).toEqual({ sensitivePatterns: [], ignore: [] });
  });

  it.each([
    ['a string', 'patterns', 'expected a configuration object, got string'],
    ['a number', 42, 'expected a configuration object, got number'],
    ['an array', ['a'], 'expected a configuration object, got array'],
  ])('should reject %s', (_name, raw, message) => {
    expect(() => parseConfig(raw)).toThrow(message);
  });

  it('should name the key holding a value of the wrong type', () => {
    let caught: unknown;
    try {
      parseConfig({ 'sensitive-patterns': 42 });
    } catch (error) {
      caught = error;
    }

    expect(caught).toBeInstanceOf(InvalidConfigurationError);
    if (!(caught instanceof InvalidConfigurationError)) {
      throw new Error('expected InvalidConfigurationError');
    }
    expect(caught.key).toBe('sensitive-patterns');
    expect(caught.actual).toBe('number');
    expect(caught.message).toBe('key "sensitive-patterns": expected a string or a list of strings, got number');
  });

  it('should reject a list with a non-string item', () => {
    expect(() => parseConfig({ ignore: ['dist/**', null] })).toThrow(
      'key "ignore": list item is not a string: null'
    );
  });
});

describe('toStringList', () => {
  it('should turn a blank string into an empty list', () => {
    expect(toStringList('   ')).toEqual([]);
  });

  it('should not prefix the message without a key', () => {
    expect(() => toStringList({})).toThrow(/^expected a string or a list of strings, got object$/);
  });
});
