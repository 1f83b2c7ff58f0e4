/**
 * Base class for file-based record sources
 * Handles common functionality: access checks, error mapping, value normalisation
 */

import { access } from 'node:fs/promises';
import { constants } from 'node:fs';
import type { RawRecord, RecordSource, RecordSourceConfig, ScalarValue } from '@rowgate/core';
import { StoreError, errorMessage, isStoreError } from '@rowgate/core';

export interface FileSourceConfig extends RecordSourceConfig {
  /** Path to the file */
  filePath: string;
}

const FORBIDDEN_RECORD_KEYS = new Set(['__proto__', 'prototype', 'constructor']);

function errnoCode(error: unknown): string | undefined {
  if (typeof error === 'object' && error !== null && 'code' in error) {
    return typeof error.code === 'string' ? error.code : undefined;
  }
  return undefined;
}

/**
 * Source value as delivered to the engine: text, with blanks as null
 */
export function normalizeCellText(value: string | null | undefined): ScalarValue {
  if (value === null || value === undefined) return null;
  return value.trim() === '' ? null : value;
}

/**
 * Header names for a header row. Blank headers become `ColumnN`.
 */
export function headerNames(row: ReadonlyArray<string | null>, sourceId: string): string[] {
  return row.map((value, i) => {
    const header = value?.trim() || `Column${i + 1}`;
    if (FORBIDDEN_RECORD_KEYS.has(header)) {
      throw new StoreError({
        code: 'SCHEMA_MISMATCH',
        message: `Unsafe header name: ${header}`,
        sourceId,
        suggestion: 'Rename the column to a safe field name and try again.',
      });
    }
    return header;
  });
}

/**
 * Zip a header row with one data row; cells past the last header are ignored
 */
export function toRawRecord(headers: readonly string[], cells: ReadonlyArray<string | null>): RawRecord {
  return Object.fromEntries(headers.map((header, i) => [header, normalizeCellText(cells[i])]));
}

/**
 * Abstract base class for file sources
 */
export abstract class BaseFileSource<TConfig extends FileSourceConfig> implements RecordSource<TConfig> {
  readonly config: TConfig;

  constructor(config: TConfig) {
    this.config = config;
  }

  async readRecords(): Promise<RawRecord[]> {
    try {
      await access(this.config.filePath, constants.R_OK);
      return await this.parseFile(this.config.filePath);
    } catch (error) {
      if (isStoreError(error)) throw error;

      const code = errnoCode(error);
      if (code === 'ENOENT') {
        throw new StoreError({
          code: 'NOT_FOUND',
          message: `File not found: ${this.config.filePath}`,
          sourceId: this.config.id,
          suggestion: 'Check that the file path is correct and the file exists.',
        });
      }

      if (code === 'EACCES') {
        throw new StoreError({
          code: 'PERMISSION_DENIED',
          message: `Cannot read file: ${this.config.filePath}`,
          sourceId: this.config.id,
          suggestion: 'Check file permissions.',
        });
      }

      throw new StoreError({
        code: 'READ_FAILED',
        message: `Failed to read ${this.config.filePath}: ${errorMessage(error)}`,
        sourceId: this.config.id,
        cause: error instanceof Error ? error : undefined,
      });
    }
  }

  async exists(): Promise<boolean> {
    try {
      await access(this.config.filePath, constants.R_OK);
      return true;
    } catch {
      return false;
    }
  }

  /**
   * Parse the file into records (implemented by subclasses)
   */
  protected abstract parseFile(filePath: string): Promise<RawRecord[]>;
}
