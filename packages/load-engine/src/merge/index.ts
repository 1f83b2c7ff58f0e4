export { StagedBulkMerge, MAX_BOUND_PARAMETERS } from './staged-bulk-merge.js';
export type { StagedBulkMergeOptions, PreparedBatch, MergeCounts } from './staged-bulk-merge.js';
export { stagingTableName, isStagingTableOf, sweepOrphanStagingTables } from './staging-sweeper.js';
export { detectTimestampColumns } from './timestamp-columns.js';
export type { TimestampCandidates, TimestampColumns } from './timestamp-columns.js';
