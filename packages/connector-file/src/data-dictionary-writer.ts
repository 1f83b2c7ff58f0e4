/**
 * Data dictionary workbook
 *
 * One summary sheet, one sheet listing every column, one sheet per table,
 * then foreign keys and indexes when there are any. Column widths are
 * fitted to content and the header row is frozen on every sheet.
 */

import { mkdir, writeFile } from 'node:fs/promises';
import { dirname, join } from 'node:path';
import ExcelJS from 'exceljs';
import { stringify } from 'csv-stringify/sync';
import type { ColumnEntry, DataDictionary } from '@rowgate/core';
import { StoreError, errorMessage } from '@rowgate/core';

export interface DataDictionaryOptions {
  /** Workbook to write (.xlsx) */
  filePath: string;
  /** Also write one `<table>.csv` of column metadata per table here */
  tablesDir?: string;
}

export interface DataDictionaryResult {
  filePath: string;
  sheets: string[];
  csvFiles: string[];
}

type Cell = string | number | null;

interface SheetData {
  headers: string[];
  rows: Cell[][];
}

export const MAX_SHEET_NAME_LENGTH = 31;
export const MIN_COLUMN_WIDTH = 8;
export const MAX_COLUMN_WIDTH = 60;

const INVALID_SHEET_CHARS = /[:\\/?*[\]]/g;

const COLUMN_HEADERS = [
  'position',
  'column',
  'column_type',
  'data_type',
  'max_length',
  'numeric_precision',
  'nullable',
  'default',
  'key',
  'extra',
  'comment',
];

/**
 * Replace characters Excel rejects in sheet names and truncate
 */
export function sanitizeSheetName(name: string): string {
  return name.replace(INVALID_SHEET_CHARS, '_').slice(0, MAX_SHEET_NAME_LENGTH) || 'table';
}

/**
 * Sheet name not yet in `used` (compared case-insensitively), suffixed
 * `_1`, `_2`... when needed. Adds the result to `used`.
 */
export function uniqueSheetName(name: string, used: Set<string>): string {
  const base = sanitizeSheetName(name);
  let candidate = base;
  for (let i = 1; used.has(candidate.toLowerCase()); i++) {
    const suffix = `_${i}`;
    candidate = `${base.slice(0, MAX_SHEET_NAME_LENGTH - suffix.length)}${suffix}`;
  }
  used.add(candidate.toLowerCase());
  return candidate;
}

/**
 * Width of a column: longest rendered value plus padding, within 8..60
 */
export function fittedWidth(values: readonly Cell[]): number {
  const longest = values.reduce<number>((max, value) => Math.max(max, value === null ? 0 : String(value).length), 0);
  return Math.min(Math.max(longest + 2, MIN_COLUMN_WIDTH), MAX_COLUMN_WIDTH);
}

function columnRow(column: ColumnEntry): Cell[] {
  return [
    column.position,
    column.column,
    column.columnType,
    column.dataType,
    column.maxLength,
    column.numericPrecision,
    column.isNullable ? 'YES' : 'NO',
    column.defaultValue,
    column.key,
    column.extra,
    column.comment,
  ];
}

function addSheet(workbook: ExcelJS.Workbook, name: string, data: SheetData): void {
  const sheet = workbook.addWorksheet(name, { views: [{ state: 'frozen', ySplit: 1 }] });
  sheet.addRow(data.headers).font = { bold: true };
  for (const row of data.rows) {
    sheet.addRow(row);
  }
  data.headers.forEach((header, i) => {
    sheet.getColumn(i + 1).width = fittedWidth([header, ...data.rows.map((row) => row[i] ?? null)]);
  });
}

/**
 * Column metadata grouped by table, each group in ordinal order
 */
function columnsByTable(columns: readonly ColumnEntry[]): Map<string, ColumnEntry[]> {
  const grouped = new Map<string, ColumnEntry[]>();
  for (const column of columns) {
    const list = grouped.get(column.table) ?? [];
    list.push(column);
    grouped.set(column.table, list);
  }
  for (const list of grouped.values()) {
    list.sort((a, b) => a.position - b.position);
  }
  return grouped;
}

export async function writeDataDictionary(
  dictionary: DataDictionary,
  options: DataDictionaryOptions
): Promise<DataDictionaryResult> {
  const workbook = new ExcelJS.Workbook();
  workbook.created = dictionary.generatedAt;

  const used = new Set<string>();
  const sheets: string[] = [];
  const csvFiles: string[] = [];
  const add = (name: string, data: SheetData) => {
    const sheetName = uniqueSheetName(name, used);
    addSheet(workbook, sheetName, data);
    sheets.push(sheetName);
  };

  add('tables_summary', {
    headers: ['table', 'approx_rows', 'data_bytes', 'index_bytes', 'total_bytes'],
    rows: dictionary.tables.map((t) => [t.table, t.approxRows, t.dataBytes, t.indexBytes, t.totalBytes]),
  });

  add('columns', {
    headers: ['table', ...COLUMN_HEADERS],
    rows: dictionary.columns.map((column) => [column.table, ...columnRow(column)]),
  });

  // Reserve the trailing sheet names so no table sheet takes them
  const trailing = ['foreign_keys', 'indexes'].map((name) => uniqueSheetName(name, used));

  try {
    if (options.tablesDir) {
      await mkdir(options.tablesDir, { recursive: true });
    }

    for (const [table, columns] of columnsByTable(dictionary.columns)) {
      add(table, { headers: COLUMN_HEADERS, rows: columns.map(columnRow) });

      if (options.tablesDir) {
        const csvPath = join(options.tablesDir, `${table}.csv`);
        await writeFile(
          csvPath,
          stringify(
            columns.map((column) => [column.table, ...columnRow(column)]),
            { header: true, columns: ['table', ...COLUMN_HEADERS] }
          ),
          'utf-8'
        );
        csvFiles.push(csvPath);
      }
    }

    const [foreignKeysSheet = 'foreign_keys', indexesSheet = 'indexes'] = trailing;
    if (dictionary.foreignKeys.length > 0) {
      addSheet(workbook, foreignKeysSheet, {
        headers: ['table', 'column', 'constraint', 'referenced_table', 'referenced_column'],
        rows: dictionary.foreignKeys.map((fk) => [
          fk.table,
          fk.column,
          fk.constraint,
          fk.referencedTable,
          fk.referencedColumn,
        ]),
      });
      sheets.push(foreignKeysSheet);
    }
    if (dictionary.indexes.length > 0) {
      addSheet(workbook, indexesSheet, {
        headers: ['table', 'index', 'non_unique', 'sequence', 'column', 'collation', 'sub_part'],
        rows: dictionary.indexes.map((index) => [
          index.table,
          index.indexName,
          index.nonUnique ? 1 : 0,
          index.sequence,
          index.column,
          index.collation,
          index.subPart,
        ]),
      });
      sheets.push(indexesSheet);
    }

    await mkdir(dirname(options.filePath), { recursive: true });
    await workbook.xlsx.writeFile(options.filePath);
  } catch (error) {
    throw new StoreError({
      code: 'WRITE_FAILED',
      message: `Failed to write data dictionary ${options.filePath}: ${errorMessage(error)}`,
      cause: error instanceof Error ? error : undefined,
    });
  }

  return { filePath: options.filePath, sheets, csvFiles };
}
