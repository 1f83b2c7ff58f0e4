/**
 * SqlExecutor over a mysql2 pool or a single pooled connection
 */

import type { ResultSetHeader, RowDataPacket } from 'mysql2/promise';
import type { SqlExecutor, SqlValue, Statement, StatementResult } from '@rowgate/core';
import { StoreError, errorMessage } from '@rowgate/core';
import { renderStatement } from './dialect.js';

/** The part of Pool / PoolConnection the executor needs */
export interface Queryable {
  execute<T extends RowDataPacket[] | ResultSetHeader>(sql: string, values?: SqlValue[]): Promise<[T, unknown]>;
  query<T extends RowDataPacket[] | ResultSetHeader>(sql: string, values?: SqlValue[]): Promise<[T, unknown]>;
}

/** Statements that cannot go through the prepared-statement protocol */
const TEXT_PROTOCOL_KINDS = new Set<Statement['kind']>(['create-staging', 'drop-table']);

const READ_KINDS = new Set<Statement['kind']>(['select-ids', 'exists']);

/**
 * Normalise a driver value to a bindable scalar
 */
export function toSqlValue(value: unknown): SqlValue {
  if (value === null || value === undefined) return null;
  if (
    typeof value === 'string' ||
    typeof value === 'number' ||
    typeof value === 'boolean' ||
    value instanceof Date
  ) {
    return value;
  }
  if (typeof value === 'bigint') {
    return Number.isSafeInteger(Number(value)) ? Number(value) : value.toString();
  }
  if (Buffer.isBuffer(value)) {
    return value.toString('utf-8');
  }
  return JSON.stringify(value);
}

function driverCode(error: unknown): string | undefined {
  if (typeof error === 'object' && error !== null && 'code' in error) {
    const code = error.code;
    return typeof code === 'string' ? code : undefined;
  }
  return undefined;
}

export class MySQLExecutor implements SqlExecutor {
  constructor(
    private readonly target: Queryable,
    private readonly sourceId?: string
  ) {}

  async run(statement: Statement): Promise<StatementResult> {
    const { sql, params } = renderStatement(statement);

    try {
      const [result] = TEXT_PROTOCOL_KINDS.has(statement.kind)
        ? await this.target.query<RowDataPacket[] | ResultSetHeader>(sql, params)
        : await this.target.execute<RowDataPacket[] | ResultSetHeader>(sql, params);

      if (Array.isArray(result)) {
        return {
          rows: result.map((row) => {
            const out: Record<string, SqlValue> = {};
            for (const [key, value] of Object.entries(row)) {
              out[key] = toSqlValue(value);
            }
            return out;
          }),
          affectedRows: null,
        };
      }

      return {
        rows: [],
        affectedRows: typeof result.affectedRows === 'number' ? result.affectedRows : null,
        insertId: result.insertId || undefined,
      };
    } catch (error) {
      throw new StoreError({
        code: READ_KINDS.has(statement.kind) ? 'READ_FAILED' : 'WRITE_FAILED',
        message: `${statement.kind} failed: ${errorMessage(error)}`,
        sourceId: this.sourceId,
        cause: error instanceof Error ? error : undefined,
        context: { statement: statement.kind, driverCode: driverCode(error) },
      });
    }
  }
}
