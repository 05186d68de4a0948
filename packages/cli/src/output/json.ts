/**
 * JSON output format - machine-readable structured output.
 */

import { toReportEntry } from './report.js';

import type { CheckReport } from './report.js';

/**
 * Format a report as pretty-printed JSON.
 */
export function formatJson(report: CheckReport): string {
  const output = {
    filesChecked: report.filesChecked,
    problems: report.diagnostics.map((d) => toReportEntry(report.rootDir, d)),
    ...(report.fixes ? { fixes: report.fixes } : {}),
  };
  return JSON.stringify(output, null, 2) + '\n';
}
