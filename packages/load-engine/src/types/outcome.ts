/**
 * Per-row outcomes, per-table counters and run results
 */

import type { PlainRecord } from '@rowgate/core';

/** Why a row was rejected: bad input, or the store refused the write */
export type FailureKind = 'validation' | 'write';

/**
 * Skips are not errors. The reasons stay distinct: an update with nothing
 * to set, an insert-only row whose id is already present, and a row with
 * no values at all.
 */
export type SkipReason = 'no-changes' | 'already-exists' | 'empty-record';

export interface RowFailure {
  kind: FailureKind;
  reason: string;
  /** Column the failure is attributed to, when there is one */
  column?: string;
}

export type RowOutcome =
  | { status: 'inserted'; id: number | null }
  | { status: 'updated'; id: number }
  | { status: 'skipped'; reason: SkipReason }
  | { status: 'quarantined'; failure: RowFailure };

export interface OutcomeCounters {
  inserted: number;
  updated: number;
  skipped: number;
  /** Quarantined rows */
  invalid: number;
  skippedByReason: Record<SkipReason, number>;
}

export interface QuarantineEntry {
  table: string;
  /** The row as it stood when rejected (post-coercion, pre-write) */
  record: PlainRecord;
  failure: RowFailure;
}

export type PhaseName = 'master' | 'merge' | 'dependent';

/**
 * `failed`: the table never ran or stopped early.
 * `rolled-back`: the table ran but its phase transaction was rolled back.
 */
export type TableStatus = 'completed' | 'failed' | 'rolled-back';

export interface TableLoadResult {
  table: string;
  phase: PhaseName;
  status: TableStatus;
  counters: OutcomeCounters;
  quarantine: QuarantineEntry[];
  error?: string;
}

export interface MergeResult {
  table: string;
  status: TableStatus;
  /** Rows handed to the merge */
  received: number;
  /** Earlier occurrences of a repeated natural key */
  duplicatesDropped: number;
  /** Rows loaded into the staging table */
  staged: number;
  invalidCount: number;
  /** Advisory; null when the store reports no affected-row count */
  insertedApprox: number | null;
  /** Advisory; null when the store reports no affected-row count */
  updatedApprox: number | null;
  quarantine: QuarantineEntry[];
  stagingTable: string | null;
  /** Set when dropping the staging table failed; the merge itself stands */
  cleanupError?: string;
  error?: string;
}

export interface RunReport {
  runId: string;
  startedAt: Date;
  finishedAt: Date;
  tables: TableLoadResult[];
  merge?: MergeResult;
  /** Rejected rows per table, in processing order */
  quarantine: Map<string, QuarantineEntry[]>;
}

export function createCounters(): OutcomeCounters {
  return {
    inserted: 0,
    updated: 0,
    skipped: 0,
    invalid: 0,
    skippedByReason: { 'no-changes': 0, 'already-exists': 0, 'empty-record': 0 },
  };
}

export function countOutcome(counters: OutcomeCounters, outcome: RowOutcome): void {
  switch (outcome.status) {
    case 'inserted':
      counters.inserted++;
      break;
    case 'updated':
      counters.updated++;
      break;
    case 'skipped':
      counters.skipped++;
      counters.skippedByReason[outcome.reason]++;
      break;
    case 'quarantined':
      counters.invalid++;
      break;
  }
}
