/**
 * Excel record source
 * Reads one worksheet of an .xlsx workbook; every value is read as text
 */

import ExcelJS from 'exceljs';
import type { RawRecord } from '@rowgate/core';
import { StoreError } from '@rowgate/core';
import { BaseFileSource, headerNames, toRawRecord, type FileSourceConfig } from './base-file-source.js';

export interface ExcelSourceConfig extends FileSourceConfig {
  /** Sheet name (default: the source name) */
  sheet?: string;
}

const pad = (n: number): string => String(n).padStart(2, '0');

/**
 * Date cell as MySQL accepts it in DATE and DATETIME columns:
 * `YYYY-MM-DD` at midnight, else `YYYY-MM-DD HH:MM:SS`.
 * Workbook dates carry no zone and are read in UTC.
 */
export function formatCellDate(date: Date): string {
  const day = `${date.getUTCFullYear()}-${pad(date.getUTCMonth() + 1)}-${pad(date.getUTCDate())}`;
  const [h, m, s] = [date.getUTCHours(), date.getUTCMinutes(), date.getUTCSeconds()];
  if (h === 0 && m === 0 && s === 0) return day;
  return `${day} ${pad(h)}:${pad(m)}:${pad(s)}`;
}

/**
 * Text of a cell value: formula results, rich text and hyperlinks are
 * flattened, dates use `formatCellDate`, error values become null
 */
export function cellText(value: ExcelJS.CellValue): string | null {
  if (value === null || value === undefined) return null;
  if (value instanceof Date) return formatCellDate(value);
  if (typeof value !== 'object') return String(value);

  if ('richText' in value) {
    return value.richText.map((rt) => rt.text).join('');
  }
  if ('hyperlink' in value) {
    return value.text;
  }
  if ('formula' in value || 'sharedFormula' in value) {
    const { result } = value;
    if (result === undefined || result === null) return null;
    if (result instanceof Date) return formatCellDate(result);
    return typeof result === 'object' ? null : String(result);
  }
  return null;
}

export class ExcelRecordSource extends BaseFileSource<ExcelSourceConfig> {
  get sheetName(): string {
    return this.config.sheet ?? this.config.name;
  }

  /** Whether the workbook exists and contains the sheet */
  async hasSheet(): Promise<boolean> {
    if (!(await this.exists())) return false;
    const workbook = new ExcelJS.Workbook();
    await workbook.xlsx.readFile(this.config.filePath);
    return workbook.getWorksheet(this.sheetName) !== undefined;
  }

  protected async parseFile(filePath: string): Promise<RawRecord[]> {
    const workbook = new ExcelJS.Workbook();
    await workbook.xlsx.readFile(filePath);

    const sheet = workbook.getWorksheet(this.sheetName);
    if (!sheet) {
      throw new StoreError({
        code: 'NOT_FOUND',
        message: `Sheet not found: ${this.sheetName}`,
        sourceId: this.config.id,
        suggestion: 'Check that the sheet is named after the destination table.',
        context: { filePath, sheet: this.sheetName },
      });
    }

    const width = sheet.getRow(1).cellCount;
    if (width === 0) return [];

    const readRow = (row: ExcelJS.Row): Array<string | null> =>
      Array.from({ length: width }, (_, i) => cellText(row.getCell(i + 1).value));

    const headers = headerNames(readRow(sheet.getRow(1)), this.config.id);
    const records: RawRecord[] = [];

    sheet.eachRow({ includeEmpty: false }, (row, rowNumber) => {
      if (rowNumber === 1) return;
      const cells = readRow(row);
      // Only add row if it has some data
      if (cells.some((cell) => cell !== null && cell.trim() !== '')) {
        records.push(toRawRecord(headers, cells));
      }
    });

    return records;
  }
}
