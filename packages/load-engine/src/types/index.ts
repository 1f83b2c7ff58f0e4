export type {
  FailureKind,
  SkipReason,
  RowFailure,
  RowOutcome,
  OutcomeCounters,
  QuarantineEntry,
  PhaseName,
  TableStatus,
  TableLoadResult,
  MergeResult,
  RunReport,
} from './outcome.js';
export { createCounters, countOutcome } from './outcome.js';
