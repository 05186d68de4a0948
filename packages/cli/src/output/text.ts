/**
 * Text output format - human-readable terminal output.
 */

import chalk from 'chalk';

import { toReportEntry } from './report.js';

import type { CheckReport, ReportEntry } from './report.js';
import type { ChalkInstance } from 'chalk';

function plural(count: number, word: string, suffix = 's'): string {
  return `${count} ${word}${count === 1 ? '' : suffix}`;
}

function groupByFile(entries: ReportEntry[]): Map<string, ReportEntry[]> {
  const grouped = new Map<string, ReportEntry[]>();
  for (const entry of entries) {
    const group = grouped.get(entry.file) ?? [];
    group.push(entry);
    grouped.set(entry.file, group);
  }
  return grouped;
}

/**
 * Format a report as problem lines grouped by file, followed by a summary.
 */
export function formatText(report: CheckReport, colors: ChalkInstance = chalk): string {
  const entries = report.diagnostics.map((d) => toReportEntry(report.rootDir, d));
  const grouped = groupByFile(entries);
  const ruleWidth = Math.max(0, ...entries.map((e) => e.ruleId.length));
  const lines: string[] = [];

  for (const [file, fileEntries] of grouped) {
    const locationWidth = Math.max(...fileEntries.map((e) => `${e.line}:${e.column}`.length));
    lines.push(colors.underline(file));
    for (const entry of fileEntries) {
      const location = `${entry.line}:${entry.column}`.padEnd(locationWidth);
      let line = `  ${location}  ${colors.yellow(entry.ruleId.padEnd(ruleWidth))}  ${entry.message}`;
      if (entry.replacement !== undefined) {
        line += colors.gray(`  -> ${entry.replacement}`);
      }
      lines.push(line);
    }
    lines.push('');
  }

  if (entries.length === 0) {
    lines.push(`${colors.green('✔')} No problems found in ${plural(report.filesChecked, 'file')}`);
  } else {
    const fixable = entries.filter((e) => e.replacement !== undefined).length;
    lines.push(
      `${colors.red('✖')} ${plural(entries.length, 'problem')} (${fixable} fixable) in ${plural(grouped.size, 'file')}`
    );
  }

  if (report.fixes) {
    const { applied, skipped, files } = report.fixes;
    let line = `${colors.green('✔')} Applied ${plural(applied, 'fix', 'es')} to ${plural(files, 'file')}`;
    if (skipped > 0) {
      line += `, ${skipped} left for the next run`;
    }
    lines.push(line);
  }

  return lines.join('\n') + '\n';
}
