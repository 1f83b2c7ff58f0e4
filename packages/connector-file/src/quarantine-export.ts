/**
 * Quarantine export
 *
 * Writes rejected rows to CSV: the union of their field names, then
 * `_failure_kind` and `_failure_reason`.
 */

import { mkdir, writeFile } from 'node:fs/promises';
import { join } from 'node:path';
import { stringify } from 'csv-stringify/sync';
import type { ScalarValue } from '@rowgate/core';
import { StoreError, errorMessage, extractFieldNames } from '@rowgate/core';
import type { QuarantineEntry } from '@rowgate/load-engine';

export interface QuarantineExportOptions {
  /**
   * Mitigate CSV/Excel formula injection by prefixing strings that start
   * with =, +, -, or @ (after optional whitespace). Default: true.
   */
  sanitizeFormulas?: boolean;
  /** Prefix used when sanitizeFormulas is enabled (default: "'"). */
  formulaEscapePrefix?: string;
}

export const FAILURE_KIND_COLUMN = '_failure_kind';
export const FAILURE_REASON_COLUMN = '_failure_reason';

export function sanitizeFormulaValue(value: string, prefix: string = "'"): string {
  if (value.startsWith(prefix)) return value;
  return /^[\t\r\n ]*[=+\-@]/.test(value) ? `${prefix}${value}` : value;
}

function cellValue(value: ScalarValue | undefined): string {
  if (value === null || value === undefined) return '';
  if (value instanceof Date) return value.toISOString();
  return String(value);
}

/**
 * Write `entries` to `filePath`. Nothing is written for an empty list.
 *
 * @returns number of rows written
 */
export async function exportQuarantine(
  entries: readonly QuarantineEntry[],
  filePath: string,
  options: QuarantineExportOptions = {}
): Promise<number> {
  if (entries.length === 0) return 0;

  const sanitize = options.sanitizeFormulas !== false;
  const prefix = options.formulaEscapePrefix ?? "'";
  const fields = extractFieldNames(entries.map((entry) => entry.record));
  const text = (value: ScalarValue | undefined) => {
    const cell = cellValue(value);
    return sanitize ? sanitizeFormulaValue(cell, prefix) : cell;
  };

  const rows = entries.map((entry) => [
    ...fields.map((field) => text(entry.record[field])),
    entry.failure.kind,
    text(entry.failure.reason),
  ]);

  try {
    await writeFile(
      filePath,
      stringify(rows, { header: true, columns: [...fields, FAILURE_KIND_COLUMN, FAILURE_REASON_COLUMN] }),
      'utf-8'
    );
  } catch (error) {
    throw new StoreError({
      code: 'WRITE_FAILED',
      message: `Failed to write quarantine file ${filePath}: ${errorMessage(error)}`,
      cause: error instanceof Error ? error : undefined,
    });
  }

  return entries.length;
}

/**
 * Write one `<table>_invalid.csv` per table into `dir`
 *
 * @returns paths of the written files
 */
export async function exportQuarantineByTable(
  quarantine: ReadonlyMap<string, readonly QuarantineEntry[]>,
  dir: string,
  options: QuarantineExportOptions = {}
): Promise<string[]> {
  const written: string[] = [];
  if (quarantine.size === 0) return written;

  await mkdir(dir, { recursive: true });
  for (const [table, entries] of quarantine) {
    const filePath = join(dir, `${table}_invalid.csv`);
    if ((await exportQuarantine(entries, filePath, options)) > 0) {
      written.push(filePath);
    }
  }
  return written;
}
