/**
 * Row Classifier & Upsert Executor
 *
 * Takes one raw source row to exactly one RowOutcome:
 * Projected -> FKChecked -> Insert | Update | Skip | Quarantined.
 * Statement failures become quarantine outcomes; nothing here throws
 * for a single bad row.
 */

import type {
  RawRecord,
  SqlExecutor,
  TableLoadSpec,
  TableSchema,
} from '@rowgate/core';
import { RowRecord, errorMessage, toBooleanSafe } from '@rowgate/core';
import type { ForeignKeyResolver } from '../resolution/index.js';
import { describeForeignKeyFailure } from '../resolution/index.js';
import { applyAliases, projectRecord, unknownFields } from '../schema/index.js';
import type { RowOutcome } from '../types/index.js';

export interface ClassifierContext {
  spec: TableLoadSpec;
  schema: TableSchema;
  resolver: ForeignKeyResolver;
  /** Executor bound to the phase transaction */
  executor: SqlExecutor;
}

export interface PreparedRow {
  record: RowRecord;
  /** Source fields with no destination column */
  dropped: string[];
}

export interface ClassifiedRow extends PreparedRow {
  outcome: RowOutcome;
  /** Optional references that did not resolve and were cleared */
  nullified: string[];
}

/**
 * Surrogate id column of a table: the declared one, else the schema's
 * single-column primary key, else `id`
 */
export function idColumnOf(spec: TableLoadSpec, schema: TableSchema): string {
  return spec.idColumn ?? schema.primaryKey ?? 'id';
}

function booleanColumnsOf(spec: TableLoadSpec, schema: TableSchema): Set<string> {
  return new Set([...spec.booleanColumns, ...schema.booleanColumns]);
}

/**
 * Alias, coerce and project one raw row.
 *
 * FK and id columns become integers (or null). Boolean columns are only
 * overwritten when the value is recognisably boolean.
 */
export function prepareRow(raw: RawRecord, spec: TableLoadSpec, schema: TableSchema): PreparedRow {
  const record = applyAliases(RowRecord.from(raw), spec.aliases);

  for (const fk of spec.foreignKeys) {
    if (record.has(fk.column)) {
      record.set(fk.column, record.getInteger(fk.column));
    }
  }

  for (const column of booleanColumnsOf(spec, schema)) {
    if (!record.has(column)) continue;
    const coerced = toBooleanSafe(record.get(column));
    if (coerced !== null) {
      record.set(column, coerced);
    }
  }

  const idColumn = idColumnOf(spec, schema);
  if (record.has(idColumn)) {
    record.set(idColumn, record.getInteger(idColumn));
  }

  return {
    record: projectRecord(record, schema),
    dropped: unknownFields(record, schema),
  };
}

async function writeRow(record: RowRecord, { spec, schema, executor }: ClassifierContext): Promise<RowOutcome> {
  const idColumn = idColumnOf(spec, schema);
  const id = record.getInteger(idColumn);

  if (id !== null) {
    const { rows } = await executor.run({
      kind: 'exists',
      table: spec.table,
      column: idColumn,
      value: id,
    });

    if (rows.length > 0) {
      if (spec.mode === 'insert-only') {
        return { status: 'skipped', reason: 'already-exists' };
      }

      const set = record.nonNullEntries(new Set([idColumn]));
      if (set.length === 0) {
        return { status: 'skipped', reason: 'no-changes' };
      }

      await executor.run({
        kind: 'update',
        table: spec.table,
        set,
        where: { column: idColumn, value: id },
      });
      return { status: 'updated', id };
    }
  }

  // Explicit ids are kept so re-imported exports keep their identifiers
  const values = record.nonNullEntries();
  if (values.length === 0) {
    return { status: 'skipped', reason: 'empty-record' };
  }

  const result = await executor.run({ kind: 'insert', table: spec.table, values });
  return { status: 'inserted', id: id ?? result.insertId ?? null };
}

/**
 * Classify one row and run its insert or update.
 *
 * @throws LoadError only when a referenced id set cannot be loaded
 */
export async function classifyRow(raw: RawRecord, context: ClassifierContext): Promise<ClassifiedRow> {
  const { record, dropped } = prepareRow(raw, context.spec, context.schema);

  const check = await context.resolver.validate(record, context.spec.foreignKeys, context.executor);
  if (!check.valid) {
    return {
      record,
      dropped,
      nullified: [],
      outcome: {
        status: 'quarantined',
        failure: { kind: 'validation', reason: describeForeignKeyFailure(check), column: check.column },
      },
    };
  }

  try {
    const outcome = await writeRow(record, context);
    return { record, dropped, nullified: check.nullified, outcome };
  } catch (error) {
    return {
      record,
      dropped,
      nullified: check.nullified,
      outcome: { status: 'quarantined', failure: { kind: 'write', reason: errorMessage(error) } },
    };
  }
}
