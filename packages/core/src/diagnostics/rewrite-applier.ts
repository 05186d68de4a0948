/**
 * Rewrite Applier - applies suggested rewrites to file text
 */

import type { SuggestedRewrite } from '../types.js';

export interface RewriteResult {
  /** Text with the accepted rewrites applied */
  text: string;
  /** Rewrites that were applied */
  applied: number;
  /** Rewrites dropped because they overlap an accepted one */
  skipped: number;
}

function overlaps(a: SuggestedRewrite, b: SuggestedRewrite): boolean {
  return a.span.start < b.span.end && b.span.start < a.span.end;
}

/**
 * Apply rewrites to the text they were computed against.
 *
 * Rewrites are accepted in the order given; one that overlaps an accepted
 * rewrite is skipped. Accepted edits are applied back to front so that
 * earlier offsets stay valid.
 */
export function applyRewrites(text: string, rewrites: readonly SuggestedRewrite[]): RewriteResult {
  const accepted: SuggestedRewrite[] = [];
  let skipped = 0;

  for (const rewrite of rewrites) {
    if (accepted.some((other) => overlaps(rewrite, other))) {
      skipped++;
      continue;
    }
    accepted.push(rewrite);
  }

  let result = text;
  for (const rewrite of [...accepted].sort((a, b) => b.span.start - a.span.start)) {
    result = result.slice(0, rewrite.span.start) + rewrite.newText + result.slice(rewrite.span.end);
  }

  return { text: result, applied: accepted.length, skipped };
}
