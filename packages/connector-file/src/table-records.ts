/**
 * Source rows of one destination table: a CSV file when one is configured
 * and present, else the workbook sheet named after the table, else nothing.
 */

import type { Logger, RawRecord } from '@rowgate/core';
import { createSilentLogger, errorMessage } from '@rowgate/core';
import { CsvRecordSource } from './csv-source.js';
import { ExcelRecordSource } from './excel-source.js';

export interface TableRecordsOptions {
  /** CSV file for this table */
  csvFile?: string;
  /** Workbook holding one sheet per table */
  workbook?: string;
  /** Sheet name, when it differs from the table name */
  sheet?: string;
  logger?: Logger;
}

/**
 * Read the rows of `table`. A source that fails to read is logged and the
 * next one is tried; when none yields rows the result is empty.
 */
export async function readTableRecords(table: string, options: TableRecordsOptions): Promise<RawRecord[]> {
  const logger = (options.logger ?? createSilentLogger()).child({ table });

  if (options.csvFile) {
    const csv = new CsvRecordSource({ id: `${table}-csv`, name: table, filePath: options.csvFile });
    if (await csv.exists()) {
      try {
        const records = await csv.readRecords();
        logger.info('Read CSV', { file: options.csvFile, rows: records.length });
        return records;
      } catch (error) {
        logger.warn('Could not read CSV', { file: options.csvFile, error: errorMessage(error) });
      }
    }
  }

  if (options.workbook) {
    const excel = new ExcelRecordSource({
      id: `${table}-sheet`,
      name: table,
      filePath: options.workbook,
      sheet: options.sheet,
    });
    try {
      if (await excel.hasSheet()) {
        const records = await excel.readRecords();
        logger.info('Read sheet', { file: options.workbook, sheet: excel.sheetName, rows: records.length });
        return records;
      }
      logger.debug('No sheet for table', { file: options.workbook, sheet: excel.sheetName });
    } catch (error) {
      logger.warn('Could not read sheet', {
        file: options.workbook,
        sheet: excel.sheetName,
        error: errorMessage(error),
      });
    }
  }

  logger.warn('No source rows found');
  return [];
}
