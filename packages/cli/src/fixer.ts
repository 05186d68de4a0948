/**
 * Fixer - writes suggested rewrites back to disk
 */

import * as fs from 'node:fs/promises';

import { applyRewrites } from 'logmsglint-core';

import type { Logger, LogMessageDiagnostic, SuggestedRewrite } from 'logmsglint-core';
import type ts from 'typescript';

export interface FixSummary {
  /** Rewrites written */
  applied: number;
  /** Rewrites dropped because an earlier one covered the same text */
  skipped: number;
  /** Files changed */
  files: number;
}

const BOM = '\uFEFF';

/**
 * Group the rewrites of a diagnostic list by file, keeping report order
 */
export function rewritesByFile(
  diagnostics: readonly LogMessageDiagnostic[]
): Map<string, SuggestedRewrite[]> {
  const grouped = new Map<string, SuggestedRewrite[]>();
  for (const diagnostic of diagnostics) {
    if (!diagnostic.rewrite) {continue;}
    const rewrites = grouped.get(diagnostic.file) ?? [];
    rewrites.push(diagnostic.rewrite);
    grouped.set(diagnostic.file, rewrites);
  }
  return grouped;
}

/**
 * Apply every rewrite to the file it belongs to.
 *
 * Rewrites are applied to the text the program was built from, so offsets
 * match even when the file on disk starts with a byte order mark.
 */
export async function fixFiles(
  program: ts.Program,
  diagnostics: readonly LogMessageDiagnostic[],
  logger: Logger
): Promise<FixSummary> {
  const summary: FixSummary = { applied: 0, skipped: 0, files: 0 };

  for (const [fileName, rewrites] of rewritesByFile(diagnostics)) {
    const sourceFile = program.getSourceFile(fileName);
    if (!sourceFile) {
      logger.warn(`Skipping fixes for ${fileName}: not part of the program`);
      summary.skipped += rewrites.length;
      continue;
    }

    const result = applyRewrites(sourceFile.text, rewrites);
    summary.applied += result.applied;
    summary.skipped += result.skipped;
    if (result.applied === 0) {continue;}

    const onDisk = await fs.readFile(fileName, 'utf-8');
    const prefix = onDisk.startsWith(BOM) ? BOM : '';
    await fs.writeFile(fileName, prefix + result.text, 'utf-8');
    summary.files++;
    logger.debug(`Applied ${result.applied} fix(es) to ${fileName}`);
  }

  return summary;
}
