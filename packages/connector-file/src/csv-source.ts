/**
 * CSV record source
 * Every value is read as text; no type inference
 */

import { readFile } from 'node:fs/promises';
import { parse } from 'csv-parse/sync';
import type { RawRecord } from '@rowgate/core';
import { StoreError } from '@rowgate/core';
import { BaseFileSource, headerNames, toRawRecord, type FileSourceConfig } from './base-file-source.js';

export interface CsvSourceConfig extends FileSourceConfig {
  /** CSV delimiter (default: ',') */
  delimiter?: string;
  /** Quote character (default: '"') */
  quote?: string;
  /** Character encoding (default: utf-8) */
  encoding?: BufferEncoding;
}

function toTextRows(parsed: unknown, sourceId: string): string[][] {
  if (!Array.isArray(parsed)) {
    throw new StoreError({ code: 'READ_FAILED', message: 'CSV parser returned no rows', sourceId });
  }
  return parsed.map((row: unknown) =>
    Array.isArray(row) ? row.map((cell: unknown) => (typeof cell === 'string' ? cell : String(cell ?? ''))) : []
  );
}

export class CsvRecordSource extends BaseFileSource<CsvSourceConfig> {
  protected async parseFile(filePath: string): Promise<RawRecord[]> {
    const content = await readFile(filePath, this.config.encoding ?? 'utf-8');

    const rows = toTextRows(
      parse(content, {
        // Parse rows first so we can safely map headers ourselves
        columns: false,
        bom: true,
        delimiter: this.config.delimiter ?? ',',
        quote: this.config.quote ?? '"',
        skip_empty_lines: true,
        relax_column_count: true,
        cast: false,
      }),
      this.config.id
    );

    const [headerRow, ...dataRows] = rows;
    if (!headerRow) return [];

    const headers = headerNames(headerRow, this.config.id);
    return dataRows.map((row) => toRawRecord(headers, row));
  }
}
