/**
 * Staging table naming and orphan sweep
 *
 * Staging tables are named `<table>_staging_<pid>_<epochSeconds>`, with a
 * `_<n>` suffix when that name is already held in this process. A crash
 * between staging and cleanup leaves one behind; the sweep drops every such
 * table for the given destination tables.
 */

import type { Logger, SchemaSource, SqlExecutor } from '@rowgate/core';
import { MAX_IDENTIFIER_LENGTH, createSilentLogger, errorMessage } from '@rowgate/core';

const STAGING_TABLE_PATTERN = /^([A-Za-z_][A-Za-z0-9_]*)_staging_(\d+)_(\d+)(?:_(\d+))?$/;

// Staging names created by this process and not yet dropped
const heldNames = new Set<string>();

/**
 * Staging table name for one merge; the table part is truncated to fit
 * the identifier limit
 */
export function stagingTableName(table: string, pid: number, now: Date, sequence: number = 0): string {
  const suffix = `_staging_${pid}_${Math.floor(now.getTime() / 1000)}${sequence > 0 ? `_${sequence}` : ''}`;
  return `${table.slice(0, MAX_IDENTIFIER_LENGTH - suffix.length)}${suffix}`;
}

/**
 * Staging table name not held by another merge of this process.
 * Pair with `releaseStagingTableName` once the table is dropped.
 */
export function claimStagingTableName(table: string, pid: number, now: Date): string {
  let sequence = 0;
  let name = stagingTableName(table, pid, now);
  while (heldNames.has(name)) {
    sequence++;
    name = stagingTableName(table, pid, now, sequence);
  }
  heldNames.add(name);
  return name;
}

export function releaseStagingTableName(name: string): void {
  heldNames.delete(name);
}

/**
 * Whether `name` is a staging table created for `table`
 */
export function isStagingTableOf(name: string, table: string): boolean {
  const match = STAGING_TABLE_PATTERN.exec(name);
  const prefix = match?.[1];
  if (!prefix) return false;
  if (prefix === table) return true;
  return name.length === MAX_IDENTIFIER_LENGTH && table.startsWith(prefix);
}

/**
 * Drop leftover staging tables of `tables`. Idempotent; a table that
 * cannot be dropped is logged and left for the next sweep.
 *
 * @returns names of the dropped tables
 */
export async function sweepOrphanStagingTables(
  schemaSource: SchemaSource,
  executor: SqlExecutor,
  tables: readonly string[],
  logger: Logger = createSilentLogger()
): Promise<string[]> {
  const existing = await schemaSource.listTables();
  const orphans = existing.filter((name) => tables.some((table) => isStagingTableOf(name, table)));
  const dropped: string[] = [];

  for (const name of orphans) {
    try {
      await executor.run({ kind: 'drop-table', table: name });
      dropped.push(name);
      logger.info('Dropped orphan staging table', { stagingTable: name });
    } catch (error) {
      logger.warn('Could not drop orphan staging table', {
        stagingTable: name,
        error: errorMessage(error),
      });
    }
  }

  return dropped;
}
