/**
 * StagedBulkMerge
 *
 * Natural-key merge for large batches:
 *   prepare  dedupe on the natural key, drop rows whose references do not resolve
 *   stage    create a staging table and bulk-load it (autocommit, outside the phase transaction)
 *   apply    one set-based insert of unmatched rows, one set-based update of matched rows
 *   cleanup  drop the staging table once the phase transaction has settled
 *
 * The caller owns the transaction passed to `apply` and must call `cleanup`
 * on every path after `stage`.
 */

import type {
  Logger,
  NaturalKeyMergeSpec,
  RawRecord,
  ScalarValue,
  SqlExecutor,
} from '@rowgate/core';
import { RowRecord, createSilentLogger, errorMessage, toBooleanSafe } from '@rowgate/core';
import { LoadError } from '../errors/index.js';
import type { ForeignKeyResolver } from '../resolution/index.js';
import { describeForeignKeyFailure } from '../resolution/index.js';
import type { SchemaRegistry } from '../schema/index.js';
import { applyAliases } from '../schema/index.js';
import type { QuarantineEntry, RowFailure } from '../types/index.js';
import { claimStagingTableName, releaseStagingTableName } from './staging-sweeper.js';
import { detectTimestampColumns } from './timestamp-columns.js';

export interface StagedBulkMergeOptions {
  registry: SchemaRegistry;
  resolver: ForeignKeyResolver;
  /** Autocommit executor for reference preloads, staging and cleanup */
  executor: SqlExecutor;
  logger?: Logger;
  clock?: () => Date;
  /** Process id used in the staging table name */
  pid?: number;
  /** Bound-parameter limit of one statement; caps rows per bulk insert */
  maxBoundParameters?: number;
}

/** MySQL's limit on placeholders in one prepared statement */
export const MAX_BOUND_PARAMETERS = 65_535;

/**
 * Comparison key of a natural-key value. Strings are compared without
 * trailing spaces and case-insensitively, as the default MySQL collations
 * compare them; other values compare as they are.
 */
function naturalKeyPart(value: ScalarValue): ScalarValue {
  return typeof value === 'string' ? value.replace(/ +$/, '').toLowerCase() : value;
}

export interface PreparedBatch {
  /** Deduplicated rows whose references resolve, in source order */
  rows: RowRecord[];
  /** Merge columns present in the source, in mergeColumns order */
  columns: string[];
  received: number;
  duplicatesDropped: number;
  quarantine: QuarantineEntry[];
}

export interface MergeCounts {
  insertedApprox: number | null;
  updatedApprox: number | null;
}

export class StagedBulkMerge {
  private readonly logger: Logger;
  private readonly clock: () => Date;
  private staging: string | null = null;
  private pendingDrop: string | null = null;
  private stagedRows = 0;

  constructor(
    private readonly spec: NaturalKeyMergeSpec,
    private readonly options: StagedBulkMergeOptions
  ) {
    this.logger = (options.logger ?? createSilentLogger()).child({ table: spec.table, phase: 'merge' });
    this.clock = options.clock ?? (() => new Date());
  }

  /** Name of the staging table this merge created, if any */
  get stagingTable(): string | null {
    return this.staging;
  }

  get stagedCount(): number {
    return this.stagedRows;
  }

  /**
   * Dedupe and validate a raw batch. Runs no write.
   *
   * @throws LoadError MISSING_REQUIRED_COLUMN, INVALID_OPTIONS, SCHEMA_FETCH_FAILED
   */
  async prepare(records: readonly RawRecord[]): Promise<PreparedBatch> {
    const { spec } = this;
    const sources = records.map((raw) => applyAliases(RowRecord.from(raw), spec.aliases));
    const present = new Set(sources.flatMap((record) => record.fields()));

    if (sources.length > 0) {
      this.checkRequiredColumns(present);
    }

    const schema = await this.options.registry.get(spec.table);
    const unknown = spec.mergeColumns.filter((column) => !schema.columns.has(column));
    if (unknown.length > 0) {
      throw new LoadError({
        code: 'INVALID_OPTIONS',
        message: `Merge columns missing from ${spec.table}: ${unknown.join(', ')}`,
        table: spec.table,
        context: { unknown },
      });
    }

    const columns = spec.mergeColumns.filter((column) => present.has(column));
    const foreignKeyColumns = spec.foreignKeys.map((fk) => fk.column);
    const booleanColumns = columns.filter((column) => schema.booleanColumns.has(column));
    const quarantine: QuarantineEntry[] = [];
    const byKey = new Map<string, RowRecord>();
    let duplicatesDropped = 0;

    for (const source of sources) {
      const row = RowRecord.fromEntries(columns.map((column) => [column, source.get(column)] as const));

      for (const column of foreignKeyColumns) {
        if (row.has(column)) row.set(column, row.getInteger(column));
      }
      for (const column of booleanColumns) {
        const coerced = toBooleanSafe(row.get(column));
        if (coerced !== null) row.set(column, coerced);
      }

      const emptyKeyColumn = spec.naturalKey.find((column) => row.get(column) === null);
      if (emptyKeyColumn !== undefined) {
        quarantine.push(
          this.quarantineEntry(row, {
            kind: 'validation',
            reason: `natural key column ${emptyKeyColumn} is empty`,
            column: emptyKeyColumn,
          })
        );
        continue;
      }

      // Last occurrence wins and takes the later position
      const key = JSON.stringify(spec.naturalKey.map((column) => naturalKeyPart(row.get(column))));
      if (byKey.delete(key)) duplicatesDropped++;
      byKey.set(key, row);
    }

    await this.options.resolver.preload(spec.foreignKeys, this.options.executor);

    const rows: RowRecord[] = [];
    for (const row of byKey.values()) {
      const check = await this.options.resolver.validate(row, spec.foreignKeys, this.options.executor);
      if (check.valid) {
        rows.push(row);
      } else {
        quarantine.push(
          this.quarantineEntry(row, {
            kind: 'validation',
            reason: describeForeignKeyFailure(check),
            column: check.column,
          })
        );
      }
    }

    this.logger.info('Merge batch prepared', {
      received: records.length,
      duplicatesDropped,
      valid: rows.length,
      invalid: quarantine.length,
    });

    return { rows, columns, received: records.length, duplicatesDropped, quarantine };
  }

  /**
   * Create the staging table and bulk-load the batch in chunks.
   * An empty batch creates nothing.
   *
   * @throws LoadError BULK_LOAD_FAILED
   */
  async stage(batch: PreparedBatch): Promise<void> {
    if (batch.rows.length === 0) {
      this.logger.info('Nothing to stage');
      return;
    }

    const { spec } = this;
    const schema = await this.options.registry.get(spec.table);
    const name = claimStagingTableName(spec.table, this.options.pid ?? process.pid, this.clock());
    this.staging = name;
    this.pendingDrop = name;
    const maxParameters = this.options.maxBoundParameters ?? MAX_BOUND_PARAMETERS;
    const rowsPerStatement = Math.max(
      1,
      Math.min(spec.chunkSize, Math.floor(maxParameters / batch.columns.length))
    );

    try {
      await this.options.executor.run({
        kind: 'create-staging',
        table: name,
        columns: batch.columns.map((column) => ({
          name: column,
          sqlType: schema.columnTypes.get(column) ?? 'text',
        })),
      });

      for (let start = 0; start < batch.rows.length; start += rowsPerStatement) {
        const chunk = batch.rows.slice(start, start + rowsPerStatement);
        await this.options.executor.run({
          kind: 'bulk-insert',
          table: name,
          columns: batch.columns,
          rows: chunk.map((row) => batch.columns.map((column) => row.get(column))),
        });
        this.stagedRows += chunk.length;
      }
    } catch (error) {
      throw new LoadError({
        code: 'BULK_LOAD_FAILED',
        message: `Could not load staging table ${name}: ${errorMessage(error)}`,
        table: spec.table,
        cause: error instanceof Error ? error : undefined,
        context: { stagingTable: name, stagedRows: this.stagedRows },
      });
    }

    this.logger.info('Staged rows', { stagingTable: name, rows: this.stagedRows });
  }

  /**
   * Set-based insert and update against the destination, on the caller's
   * transaction. Counts are advisory.
   *
   * @throws LoadError MERGE_FAILED
   */
  async apply(tx: SqlExecutor, batch: PreparedBatch): Promise<MergeCounts> {
    const staging = this.staging;
    if (!staging) {
      return { insertedApprox: 0, updatedApprox: 0 };
    }

    const { spec } = this;
    const schema = await this.options.registry.get(spec.table);
    const timestamps = detectTimestampColumns(schema, spec.timestampCandidates, batch.columns);
    const mutable = spec.mutableColumns.filter((column) => batch.columns.includes(column));
    const now = this.clock();

    try {
      const inserted = await tx.run({
        kind: 'merge-insert',
        target: spec.table,
        staging,
        keyColumns: spec.naturalKey,
        columns: batch.columns,
        matchColumn: schema.columns.has(spec.surrogateKey)
          ? spec.surrogateKey
          : (spec.naturalKey[0] ?? spec.surrogateKey),
        timestampColumns: [timestamps.created, timestamps.updated].filter(
          (column): column is string => column !== null
        ),
        now,
      });

      let updatedApprox: number | null = 0;
      if (mutable.length > 0 || timestamps.updated !== null) {
        const updated = await tx.run({
          kind: 'merge-update',
          target: spec.table,
          staging,
          keyColumns: spec.naturalKey,
          columns: mutable,
          updatedColumn: timestamps.updated,
          now,
        });
        updatedApprox = updated.affectedRows;
      }

      const counts = { insertedApprox: inserted.affectedRows, updatedApprox };
      this.logger.info('Merge applied', { stagingTable: staging, ...counts });
      return counts;
    } catch (error) {
      throw new LoadError({
        code: 'MERGE_FAILED',
        message: `Merge into ${spec.table} failed: ${errorMessage(error)}`,
        table: spec.table,
        cause: error instanceof Error ? error : undefined,
        context: { stagingTable: staging },
      });
    }
  }

  /**
   * Drop the staging table. Never throws; a failure is logged and returned.
   */
  async cleanup(): Promise<LoadError | null> {
    const name = this.pendingDrop;
    if (!name) return null;
    this.pendingDrop = null;

    try {
      await this.options.executor.run({ kind: 'drop-table', table: name });
      releaseStagingTableName(name);
      this.logger.info('Dropped staging table', { stagingTable: name });
      return null;
    } catch (error) {
      const failure = new LoadError({
        code: 'CLEANUP_FAILED',
        message: `Could not drop staging table ${name}: ${errorMessage(error)}`,
        table: this.spec.table,
        suggestion: 'Drop the table manually or let the next run sweep it.',
        cause: error instanceof Error ? error : undefined,
        context: { stagingTable: name },
      });
      this.logger.warn(failure.message, { code: failure.code, stagingTable: name });
      return failure;
    }
  }

  private checkRequiredColumns(present: ReadonlySet<string>): void {
    const { spec } = this;
    const required =
      spec.requiredColumns ??
      Array.from(new Set([...spec.naturalKey, ...spec.foreignKeys.map((fk) => fk.column)]));
    const missing = required.filter((column) => !present.has(column));

    if (missing.length > 0) {
      throw new LoadError({
        code: 'MISSING_REQUIRED_COLUMN',
        message: `Source rows for ${spec.table} lack required columns: ${missing.join(', ')}`,
        table: spec.table,
        suggestion: 'Add the columns to the source or map them with aliases.',
        context: { missing },
      });
    }
  }

  private quarantineEntry(row: RowRecord, failure: RowFailure): QuarantineEntry {
    this.logger.warn('Row quarantined', {
      kind: failure.kind,
      reason: failure.reason,
      record: row.toObject(),
    });
    return { table: this.spec.table, record: row.toObject(), failure };
  }
}
