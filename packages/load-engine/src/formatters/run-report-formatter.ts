/**
 * Run Report Formatter
 *
 * Plain-text summary of a load run for the CLI and logs.
 */

import type { MergeResult, RunReport, TableLoadResult } from '../types/index.js';

function approx(value: number | null): string {
  return value === null ? 'unknown' : `~${value}`;
}

function tableRow(result: TableLoadResult): string {
  const { counters } = result;
  return `| ${result.table} | ${result.phase} | ${result.status} | ${counters.inserted} | ${counters.updated} | ${counters.skipped} | ${counters.invalid} |`;
}

function mergeLines(merge: MergeResult): string[] {
  const lines = [
    `### Merge: ${merge.table} (${merge.status})`,
    `- Received: ${merge.received}`,
    `- Duplicates dropped: ${merge.duplicatesDropped}`,
    `- Staged: ${merge.staged}`,
    `- Invalid: ${merge.invalidCount}`,
    `- Inserted: ${approx(merge.insertedApprox)}`,
    `- Updated: ${approx(merge.updatedApprox)}`,
  ];
  if (merge.cleanupError) {
    lines.push(`- Cleanup: ${merge.cleanupError}`);
  }
  return lines;
}

/**
 * Format a run report as plain text
 */
export function formatRunReport(report: RunReport): string {
  const lines: string[] = [];
  const seconds = (report.finishedAt.getTime() - report.startedAt.getTime()) / 1000;

  lines.push(`## Load Run Report`);
  lines.push(`Run: ${report.runId}`);
  lines.push(`Started: ${report.startedAt.toISOString()}`);
  lines.push(`Duration: ${seconds.toFixed(1)}s`);
  lines.push('');

  if (report.tables.length > 0) {
    lines.push(`### Tables`);
    lines.push('| Table | Phase | Status | Inserted | Updated | Skipped | Invalid |');
    lines.push('|---|---|---|---|---|---|---|');
    for (const result of report.tables) {
      lines.push(tableRow(result));
    }
    lines.push('');
  }

  if (report.merge) {
    lines.push(...mergeLines(report.merge));
    lines.push('');
  }

  if (report.quarantine.size > 0) {
    lines.push(`### Quarantine`);
    for (const [table, entries] of report.quarantine) {
      lines.push(`- ${table}: ${entries.length} row${entries.length === 1 ? '' : 's'}`);
    }
    lines.push('');
  }

  const failures = [...report.tables, ...(report.merge ? [report.merge] : [])].filter(
    (result) => result.error !== undefined
  );
  if (failures.length > 0) {
    lines.push(`### Failures`);
    for (const result of failures) {
      lines.push(`- ${result.table}: ${result.error}`);
    }
    lines.push('');
  }

  return lines.join('\n').trimEnd();
}
