/**
 * @rowgate/connector-file
 *
 * File collaborators: CSV and Excel record sources, quarantine CSV export
 * and the data dictionary workbook
 */

export { BaseFileSource, normalizeCellText, headerNames, toRawRecord } from './base-file-source.js';
export type { FileSourceConfig } from './base-file-source.js';

export { CsvRecordSource } from './csv-source.js';
export type { CsvSourceConfig } from './csv-source.js';

export { ExcelRecordSource, cellText, formatCellDate } from './excel-source.js';
export type { ExcelSourceConfig } from './excel-source.js';

export { readTableRecords } from './table-records.js';
export type { TableRecordsOptions } from './table-records.js';

export {
  exportQuarantine,
  exportQuarantineByTable,
  sanitizeFormulaValue,
  FAILURE_KIND_COLUMN,
  FAILURE_REASON_COLUMN,
} from './quarantine-export.js';
export type { QuarantineExportOptions } from './quarantine-export.js';

export {
  writeDataDictionary,
  sanitizeSheetName,
  uniqueSheetName,
  fittedWidth,
} from './data-dictionary-writer.js';
export type { DataDictionaryOptions, DataDictionaryResult } from './data-dictionary-writer.js';
