/**
 * Report model shared by the output formats
 */

import * as path from 'node:path';

import type { FixSummary } from '../fixer.js';
import type { LogMessageDiagnostic, RuleId } from 'logmsglint-core';

/**
 * Everything a formatter needs to describe one check
 */
export interface CheckReport {
  /** Directory reported paths are relative to */
  rootDir: string;
  filesChecked: number;
  diagnostics: LogMessageDiagnostic[];
  /** Present when fixes were written */
  fixes?: FixSummary | undefined;
}

/**
 * One diagnostic with 1-based positions and a path relative to the root
 */
export interface ReportEntry {
  file: string;
  line: number;
  column: number;
  endLine: number;
  endColumn: number;
  ruleId: RuleId;
  message: string;
  text: string;
  fixedText?: string | undefined;
  /** Replacement source text for the whole message argument */
  replacement?: string | undefined;
}

export function relativePath(rootDir: string, fileName: string): string {
  return path.relative(rootDir, fileName).split(path.sep).join('/');
}

export function toReportEntry(rootDir: string, diagnostic: LogMessageDiagnostic): ReportEntry {
  return {
    file: relativePath(rootDir, diagnostic.file),
    line: diagnostic.range.start.line + 1,
    column: diagnostic.range.start.character + 1,
    endLine: diagnostic.range.end.line + 1,
    endColumn: diagnostic.range.end.character + 1,
    ruleId: diagnostic.ruleId,
    message: diagnostic.message,
    text: diagnostic.text,
    fixedText: diagnostic.fixedText,
    replacement: diagnostic.rewrite?.newText,
  };
}
