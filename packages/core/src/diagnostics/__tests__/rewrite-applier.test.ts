/**
 * Rewrite Applier Tests
 */

import { describe, it, expect } from 'vitest';

import { applyRewrites } from '../rewrite-applier.js';

import type { SuggestedRewrite } from '../../types.js';

function rewrite(start: number, end: number, newText: string): SuggestedRewrite {
  return {
    title: 'fix log message',
    span: { start, end },
    range: { start: { line: 0, character: start }, end: { line: 0, character: end } },
    newText,
  };
}

describe('applyRewrites', () => {
  const source = "log('A!'); log('B?');";

  it('should return the text unchanged without rewrites', () => {
    expect(applyRewrites(source, [])).toEqual({ text: source, applied: 0, skipped: 0 });
  });

  it('should apply a single rewrite', () => {
    expect(applyRewrites(source, [rewrite(4, 8, "'a'")])).toEqual({
      text: "log('a'); log('B?');",
      applied: 1,
      skipped: 0,
    });
  });

  it('should apply rewrites given in any order', () => {
    const result = applyRewrites(source, [rewrite(15, 19, "'b'"), rewrite(4, 8, "'a'")]);

    expect(result.text).toBe("log('a'); log('b');");
    expect(result.applied).toBe(2);
  });

  it('should keep the first of two overlapping rewrites', () => {
    const result = applyRewrites(source, [rewrite(4, 8, "'first'"), rewrite(4, 8, "'second'")]);

    expect(result).toEqual({ text: "log('first'); log('B?');", applied: 1, skipped: 1 });
  });

  it('should treat touching spans as separate', () => {
    const result = applyRewrites('abcdef', [rewrite(0, 3, 'X'), rewrite(3, 6, 'Y')]);

    expect(result).toEqual({ text: 'XY', applied: 2, skipped: 0 });
  });

  it('should handle replacements of a different length', () => {
    const result = applyRewrites('0123456789', [rewrite(1, 2, 'one'), rewrite(5, 9, '')]);

    expect(result.text).toBe('0one2349');
  });
});
