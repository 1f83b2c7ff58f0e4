/**
 * @rowgate/load-engine
 *
 * Reconciles batches of source rows with a relational store: coercion,
 * projection, foreign-key resolution, per-row upsert, staged natural-key
 * merge and run orchestration.
 */

// Types
export * from './types/index.js';

// Schema projection
export { SchemaRegistry, projectRecord, unknownFields, applyAliases } from './schema/index.js';

// Foreign-key resolution
export { ForeignKeyResolver, describeForeignKeyFailure } from './resolution/index.js';
export type { ForeignKeyCheck, ResolutionFailureReason } from './resolution/index.js';

// Row classification and upsert
export { classifyRow, idColumnOf, prepareRow, loadTable } from './upsert/index.js';
export type {
  ClassifierContext,
  ClassifiedRow,
  PreparedRow,
  TableLoaderOptions,
} from './upsert/index.js';

// Staged bulk merge
export {
  StagedBulkMerge,
  MAX_BOUND_PARAMETERS,
  stagingTableName,
  isStagingTableOf,
  sweepOrphanStagingTables,
  detectTimestampColumns,
} from './merge/index.js';
export type {
  StagedBulkMergeOptions,
  PreparedBatch,
  MergeCounts,
  TimestampCandidates,
  TimestampColumns,
} from './merge/index.js';

// Orchestration
export {
  RunOrchestrator,
  parseLoadPlan,
  runSucceeded,
  orderByDependencies,
} from './orchestrator/index.js';
export type { RecordProvider, RunOrchestratorOptions, DependencyNode } from './orchestrator/index.js';

// Formatters
export { formatRunReport } from './formatters/index.js';

// Errors
export { LoadError, isLoadError } from './errors/index.js';
export type { LoadErrorCode, LoadErrorDetails } from './errors/index.js';
