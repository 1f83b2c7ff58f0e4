/**
 * Record projection onto destination columns
 */

import type { RowRecord, TableSchema } from '@rowgate/core';

/**
 * Copy of `record` holding only columns of `schema`, in record order
 */
export function projectRecord(record: RowRecord, schema: TableSchema): RowRecord {
  return record.filter((field) => schema.columns.has(field));
}

/**
 * Fields of `record` that `projectRecord` would drop
 */
export function unknownFields(record: RowRecord, schema: TableSchema): string[] {
  return record.fields().filter((field) => !schema.columns.has(field));
}

/**
 * Rename source fields to destination columns in place.
 * A rename is skipped when the destination name is already present.
 */
export function applyAliases(record: RowRecord, aliases: Readonly<Record<string, string>>): RowRecord {
  for (const [from, to] of Object.entries(aliases)) {
    record.rename(from, to);
  }
  return record;
}
