/**
 * ForeignKeyResolver
 *
 * Run-scoped cache of the id sets of referenced tables. The first lookup
 * against a table loads its whole id column with one query; every later
 * lookup is an in-memory membership test. The cache only grows: ids
 * inserted during the run are added to cached sets and a rollback does
 * not remove them.
 */

import type { ForeignKeyConstraint, RowRecord, ScalarValue, SqlExecutor } from '@rowgate/core';
import { errorMessage, toIntegerSafe } from '@rowgate/core';
import { LoadError } from '../errors/index.js';

export type ResolutionFailureReason = 'missing' | 'null' | 'unresolved';

export type ForeignKeyCheck =
  | { valid: true; nullified: string[] }
  | {
      valid: false;
      column: string;
      referencedTable: string;
      reason: ResolutionFailureReason;
      value: ScalarValue;
    };

function cacheKey(table: string, column: string): string {
  return column === 'id' ? table : `${table}.${column}`;
}

export class ForeignKeyResolver {
  private readonly cache = new Map<string, Set<number>>();

  /**
   * Whether `id` exists in `referencedTable`.
   * Null and non-integer ids never resolve.
   */
  async resolves(
    referencedTable: string,
    id: ScalarValue,
    executor: SqlExecutor,
    referencedColumn: string = 'id'
  ): Promise<boolean> {
    const value = toIntegerSafe(id);
    if (value === null) return false;

    const ids = await this.load(referencedTable, referencedColumn, executor);
    return ids.has(value);
  }

  /**
   * Load the id sets of every table `constraints` reference
   */
  async preload(constraints: readonly ForeignKeyConstraint[], executor: SqlExecutor): Promise<void> {
    for (const fk of constraints) {
      await this.load(fk.referencedTable, fk.referencedColumn, executor);
    }
  }

  /**
   * Check every constraint against `record`, stopping at the first failure.
   *
   * Constraint columns are expected to hold integers already. An optional
   * constraint lets null through; with `onUnresolved: 'nullify'` an
   * unresolved value is set to null on the record instead of failing.
   */
  async validate(
    record: RowRecord,
    constraints: readonly ForeignKeyConstraint[],
    executor: SqlExecutor
  ): Promise<ForeignKeyCheck> {
    const nullified: string[] = [];

    for (const fk of constraints) {
      const failure = (reason: ResolutionFailureReason): ForeignKeyCheck => ({
        valid: false,
        column: fk.column,
        referencedTable: fk.referencedTable,
        reason,
        value: record.get(fk.column),
      });

      if (!record.has(fk.column)) {
        if (fk.optional) continue;
        return failure('missing');
      }

      const value = record.get(fk.column);
      if (value === null) {
        if (fk.optional) continue;
        return failure('null');
      }

      if (await this.resolves(fk.referencedTable, value, executor, fk.referencedColumn)) {
        continue;
      }

      if (fk.onUnresolved === 'nullify') {
        record.set(fk.column, null);
        nullified.push(fk.column);
        continue;
      }

      return failure('unresolved');
    }

    return { valid: true, nullified };
  }

  /**
   * Add known ids for `table` to the cache
   */
  seed(table: string, ids: Iterable<number>, column: string = 'id'): void {
    const key = cacheKey(table, column);
    const existing = this.cache.get(key) ?? new Set<number>();
    for (const id of ids) {
      existing.add(id);
    }
    this.cache.set(key, existing);
  }

  /**
   * Record an id written during the run, for tables already cached
   */
  noteInserted(table: string, id: number, column: string = 'id'): void {
    this.cache.get(cacheKey(table, column))?.add(id);
  }

  cachedTables(): string[] {
    return Array.from(this.cache.keys());
  }

  private async load(table: string, column: string, executor: SqlExecutor): Promise<Set<number>> {
    const key = cacheKey(table, column);
    const cached = this.cache.get(key);
    if (cached) return cached;

    let rows: Array<Record<string, ScalarValue>>;
    try {
      ({ rows } = await executor.run({ kind: 'select-ids', table, column }));
    } catch (error) {
      throw new LoadError({
        code: 'SCHEMA_FETCH_FAILED',
        message: `Could not load ${column} values of referenced table ${table}: ${errorMessage(error)}`,
        table,
        cause: error instanceof Error ? error : undefined,
      });
    }

    const ids = new Set<number>();
    for (const row of rows) {
      const id = toIntegerSafe(row[column]);
      if (id !== null) ids.add(id);
    }

    this.cache.set(key, ids);
    return ids;
  }
}

/**
 * One-line description of a failed check, for quarantine reasons and logs
 */
export function describeForeignKeyFailure(check: Extract<ForeignKeyCheck, { valid: false }>): string {
  switch (check.reason) {
    case 'missing':
      return `foreign key column ${check.column} is missing`;
    case 'null':
      return `foreign key column ${check.column} is empty or not an integer`;
    case 'unresolved':
      return `${check.column}=${String(check.value)} not found in ${check.referencedTable}`;
  }
}
