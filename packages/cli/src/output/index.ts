/**
 * Output format registration - text, JSON, SARIF.
 */

import chalk from 'chalk';

import { formatJson } from './json.js';
import { formatSarif } from './sarif.js';
import { formatText } from './text.js';

import type { CheckReport } from './report.js';
import type { ChalkInstance } from 'chalk';

export type OutputFormat = 'text' | 'json' | 'sarif';

export const OUTPUT_FORMATS: readonly OutputFormat[] = ['text', 'json', 'sarif'];

export function isOutputFormat(value: string): value is OutputFormat {
  return OUTPUT_FORMATS.some((format) => format === value);
}

/**
 * Format a report in the specified format.
 */
export function formatOutput(
  report: CheckReport,
  format: OutputFormat,
  colors: ChalkInstance = chalk,
): string {
  switch (format) {
    case 'json':
      return formatJson(report);
    case 'sarif':
      return formatSarif(report);
    case 'text':
    default:
      return formatText(report, colors);
  }
}

export { relativePath, toReportEntry } from './report.js';
export type { CheckReport, ReportEntry } from './report.js';
export { formatText } from './text.js';
export { formatJson } from './json.js';
export { formatSarif } from './sarif.js';
