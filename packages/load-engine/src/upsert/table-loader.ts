/**
 * Table loader
 *
 * Runs the row classifier over one table's batch inside the caller's
 * transaction and aggregates outcomes into counters and a quarantine set.
 */

import type { Logger, RawRecord, SqlExecutor, TableLoadSpec } from '@rowgate/core';
import type { ForeignKeyResolver } from '../resolution/index.js';
import type { SchemaRegistry } from '../schema/index.js';
import type { PhaseName, QuarantineEntry, TableLoadResult } from '../types/index.js';
import { countOutcome, createCounters } from '../types/index.js';
import { classifyRow, idColumnOf } from './row-classifier.js';

export interface TableLoaderOptions {
  registry: SchemaRegistry;
  resolver: ForeignKeyResolver;
  /** Executor bound to the phase transaction */
  executor: SqlExecutor;
  logger: Logger;
  phase: PhaseName;
}

/**
 * Load one table's rows.
 *
 * Row failures are quarantined and the batch continues. Schema and
 * referenced-id fetches happen before the first row is written.
 *
 * @throws LoadError SCHEMA_FETCH_FAILED
 */
export async function loadTable(
  spec: TableLoadSpec,
  records: readonly RawRecord[],
  options: TableLoaderOptions
): Promise<TableLoadResult> {
  const logger = options.logger.child({ table: spec.table, phase: options.phase });
  const schema = await options.registry.get(spec.table);
  await options.resolver.preload(spec.foreignKeys, options.executor);

  const context = {
    spec,
    schema,
    resolver: options.resolver,
    executor: options.executor,
  };
  const counters = createCounters();
  const quarantine: QuarantineEntry[] = [];
  const ignored = new Set<string>();

  for (const [index, raw] of records.entries()) {
    const row = await classifyRow(raw, context);
    row.dropped.forEach((field) => ignored.add(field));
    countOutcome(counters, row.outcome);
    if (row.outcome.status === 'inserted' && row.outcome.id !== null) {
      options.resolver.noteInserted(spec.table, row.outcome.id, idColumnOf(spec, schema));
    }

    for (const column of row.nullified) {
      logger.warn('Cleared unresolved optional reference', { row: index + 1, column });
    }

    if (row.outcome.status === 'quarantined') {
      const { failure } = row.outcome;
      quarantine.push({ table: spec.table, record: row.record.toObject(), failure });
      logger.warn('Row quarantined', {
        row: index + 1,
        kind: failure.kind,
        reason: failure.reason,
        record: row.record.toObject(),
      });
    }
  }

  if (ignored.size > 0) {
    logger.debug('Ignored source columns', { columns: Array.from(ignored) });
  }

  logger.info('Table loaded', {
    inserted: counters.inserted,
    updated: counters.updated,
    skipped: counters.skipped,
    invalid: counters.invalid,
  });

  return {
    table: spec.table,
    phase: options.phase,
    status: 'completed',
    counters,
    quarantine,
  };
}
