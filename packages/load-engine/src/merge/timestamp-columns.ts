/**
 * Created/updated timestamp column detection
 */

import type { TableSchema } from '@rowgate/core';

export interface TimestampCandidates {
  created: readonly string[];
  updated: readonly string[];
}

export interface TimestampColumns {
  created: string | null;
  updated: string | null;
}

/**
 * First candidate of each kind present in `schema`, skipping columns the
 * merge already writes
 */
export function detectTimestampColumns(
  schema: TableSchema,
  candidates: TimestampCandidates,
  written: readonly string[] = []
): TimestampColumns {
  const taken = new Set(written);
  const pick = (names: readonly string[]) =>
    names.find((name) => schema.columns.has(name) && !taken.has(name)) ?? null;

  const created = pick(candidates.created);
  const updated = pick(candidates.updated);

  return { created, updated: updated === created ? null : updated };
}
