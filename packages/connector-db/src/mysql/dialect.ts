/**
 * MySQL rendering of load-engine statements.
 *
 * Identifiers are validated and backtick-quoted; every row value is bound
 * as a `?` parameter.
 */

import type { SqlValue, Statement } from '@rowgate/core';
import { StoreError, assertIdentifier } from '@rowgate/core';

export interface RenderedStatement {
  sql: string;
  params: SqlValue[];
}

/** Types copied verbatim into staging tables; anything else becomes TEXT */
const SAFE_COLUMN_TYPE = /^[a-z]+( ?\(\d+( ?, ?\d+)?\))?( unsigned)?( zerofill)?$/i;

export const FALLBACK_STAGING_TYPE = 'TEXT';

const TARGET_ALIAS = '`d`';
const STAGING_ALIAS = '`s`';

/**
 * Validate and quote a table or column name
 */
export function quoteIdentifier(name: string, kind: string = 'column'): string {
  assertIdentifier(name, kind);
  return `\`${name}\``;
}

/**
 * Column type usable in a staging table definition
 */
export function stagingColumnType(sqlType: string): string {
  const trimmed = sqlType.trim();
  return SAFE_COLUMN_TYPE.test(trimmed) ? trimmed : FALLBACK_STAGING_TYPE;
}

function columnList(columns: readonly string[]): string {
  return columns.map((c) => quoteIdentifier(c)).join(', ');
}

function joinCondition(keyColumns: readonly string[]): string {
  if (keyColumns.length === 0) {
    throw new StoreError({
      code: 'CONFIGURATION_ERROR',
      message: 'A merge statement needs at least one key column',
    });
  }

  return keyColumns
    .map((c) => `${TARGET_ALIAS}.${quoteIdentifier(c)} = ${STAGING_ALIAS}.${quoteIdentifier(c)}`)
    .join(' AND ');
}

export function renderStatement(statement: Statement): RenderedStatement {
  switch (statement.kind) {
    case 'select-ids':
      return {
        sql: `SELECT ${quoteIdentifier(statement.column)} FROM ${quoteIdentifier(statement.table, 'table')}`,
        params: [],
      };

    case 'exists':
      return {
        sql: `SELECT 1 AS \`found\` FROM ${quoteIdentifier(statement.table, 'table')} WHERE ${quoteIdentifier(statement.column)} = ? LIMIT 1`,
        params: [statement.value],
      };

    case 'insert': {
      const table = quoteIdentifier(statement.table, 'table');
      if (statement.values.length === 0) {
        return { sql: `INSERT INTO ${table} () VALUES ()`, params: [] };
      }
      const columns = statement.values.map(([column]) => column);
      const placeholders = columns.map(() => '?').join(', ');
      return {
        sql: `INSERT INTO ${table} (${columnList(columns)}) VALUES (${placeholders})`,
        params: statement.values.map(([, value]) => value),
      };
    }

    case 'update': {
      if (statement.set.length === 0) {
        throw new StoreError({
          code: 'WRITE_FAILED',
          message: `UPDATE on ${statement.table} has no columns to set`,
        });
      }
      const setClause = statement.set.map(([column]) => `${quoteIdentifier(column)} = ?`).join(', ');
      return {
        sql: `UPDATE ${quoteIdentifier(statement.table, 'table')} SET ${setClause} WHERE ${quoteIdentifier(statement.where.column)} = ?`,
        params: [...statement.set.map(([, value]) => value), statement.where.value],
      };
    }

    case 'create-staging': {
      if (statement.columns.length === 0) {
        throw new StoreError({
          code: 'CONFIGURATION_ERROR',
          message: `Staging table ${statement.table} needs at least one column`,
        });
      }
      const definitions = statement.columns
        .map((c) => `${quoteIdentifier(c.name)} ${stagingColumnType(c.sqlType)} NULL`)
        .join(', ');
      return {
        sql: `CREATE TABLE ${quoteIdentifier(statement.table, 'table')} (${definitions})`,
        params: [],
      };
    }

    case 'bulk-insert': {
      const width = statement.columns.length;
      const params: SqlValue[] = [];
      const tuples: string[] = [];

      for (const row of statement.rows) {
        if (row.length !== width) {
          throw new StoreError({
            code: 'WRITE_FAILED',
            message: `Bulk insert row has ${row.length} values for ${width} columns`,
            context: { table: statement.table },
          });
        }
        params.push(...row);
        tuples.push(`(${row.map(() => '?').join(', ')})`);
      }

      return {
        sql: `INSERT INTO ${quoteIdentifier(statement.table, 'table')} (${columnList(statement.columns)}) VALUES ${tuples.join(', ')}`,
        params,
      };
    }

    case 'merge-insert': {
      const target = quoteIdentifier(statement.target, 'table');
      const insertColumns = [...statement.columns, ...statement.timestampColumns];
      const selectList = [
        ...statement.columns.map((c) => `${STAGING_ALIAS}.${quoteIdentifier(c)}`),
        ...statement.timestampColumns.map(() => '?'),
      ].join(', ');

      return {
        sql:
          `INSERT INTO ${target} (${columnList(insertColumns)}) ` +
          `SELECT ${selectList} FROM ${quoteIdentifier(statement.staging, 'table')} AS ${STAGING_ALIAS} ` +
          `LEFT JOIN ${target} AS ${TARGET_ALIAS} ON ${joinCondition(statement.keyColumns)} ` +
          `WHERE ${TARGET_ALIAS}.${quoteIdentifier(statement.matchColumn)} IS NULL`,
        params: statement.timestampColumns.map(() => statement.now),
      };
    }

    case 'merge-update': {
      const assignments = statement.columns.map(
        (c) => `${TARGET_ALIAS}.${quoteIdentifier(c)} = ${STAGING_ALIAS}.${quoteIdentifier(c)}`
      );
      const params: SqlValue[] = [];
      if (statement.updatedColumn) {
        assignments.push(`${TARGET_ALIAS}.${quoteIdentifier(statement.updatedColumn)} = ?`);
        params.push(statement.now);
      }
      if (assignments.length === 0) {
        throw new StoreError({
          code: 'WRITE_FAILED',
          message: `Merge update on ${statement.target} has no columns to set`,
        });
      }

      return {
        sql:
          `UPDATE ${quoteIdentifier(statement.target, 'table')} AS ${TARGET_ALIAS} ` +
          `JOIN ${quoteIdentifier(statement.staging, 'table')} AS ${STAGING_ALIAS} ON ${joinCondition(statement.keyColumns)} ` +
          `SET ${assignments.join(', ')}`,
        params,
      };
    }

    case 'drop-table':
      return {
        sql: `DROP TABLE IF EXISTS ${quoteIdentifier(statement.table, 'table')}`,
        params: [],
      };

    default: {
      const exhaustive: never = statement;
      throw new StoreError({
        code: 'UNKNOWN',
        message: `Unsupported statement: ${JSON.stringify(exhaustive)}`,
      });
    }
  }
}
