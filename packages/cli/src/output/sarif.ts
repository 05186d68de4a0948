/**
 * SARIF output format - wraps diagnostics in a SARIF 2.1.0 envelope.
 */

import { REWRITE_TITLE, RULE_MESSAGES } from 'logmsglint-core';

import { VERSION } from '../version.js';

import { toReportEntry } from './report.js';

import type { CheckReport, ReportEntry } from './report.js';

export const SARIF_SCHEMA =
  'https://raw.githubusercontent.com/oasis-tcs/sarif-spec/main/sarif-2.1/schema/sarif-schema-2.1.0.json';

export const TOOL_NAME = 'logmsglint';

interface SarifRegion {
  startLine: number;
  startColumn: number;
  endLine: number;
  endColumn: number;
}

/**
 * Format a report as SARIF 2.1.0 JSON.
 */
export function formatSarif(report: CheckReport): string {
  const entries = report.diagnostics.map((d) => toReportEntry(report.rootDir, d));

  const sarif = {
    $schema: SARIF_SCHEMA,
    version: '2.1.0',
    runs: [
      {
        tool: {
          driver: {
            name: TOOL_NAME,
            version: VERSION,
            rules: buildRules(entries),
          },
        },
        results: entries.map((entry) => ({
          ruleId: entry.ruleId,
          level: 'warning',
          message: { text: entry.message },
          locations: [
            {
              physicalLocation: {
                artifactLocation: {
                  uri: entry.file,
                  uriBaseId: '%SRCROOT%',
                },
                region: regionOf(entry),
              },
            },
          ],
          ...(entry.replacement !== undefined ? { fixes: [buildFix(entry, entry.replacement)] } : {}),
        })),
      },
    ],
  };

  return JSON.stringify(sarif, null, 2) + '\n';
}

function regionOf(entry: ReportEntry): SarifRegion {
  return {
    startLine: entry.line,
    startColumn: entry.column,
    endLine: entry.endLine,
    endColumn: entry.endColumn,
  };
}

function buildFix(entry: ReportEntry, replacement: string): object {
  return {
    description: { text: REWRITE_TITLE },
    artifactChanges: [
      {
        artifactLocation: { uri: entry.file, uriBaseId: '%SRCROOT%' },
        replacements: [
          {
            deletedRegion: regionOf(entry),
            insertedContent: { text: replacement },
          },
        ],
      },
    ],
  };
}

function buildRules(entries: ReportEntry[]): Array<{ id: string; shortDescription: { text: string } }> {
  const seen = new Set<string>();
  const rules: Array<{ id: string; shortDescription: { text: string } }> = [];
  for (const entry of entries) {
    if (!seen.has(entry.ruleId)) {
      seen.add(entry.ruleId);
      rules.push({
        id: entry.ruleId,
        shortDescription: { text: RULE_MESSAGES[entry.ruleId] },
      });
    }
  }
  return rules;
}
