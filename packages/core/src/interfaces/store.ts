/**
 * Store capabilities consumed by the load engine.
 *
 * A MySQL pool implements all of them; tests use an in-process store.
 */

import type { Statement, StatementResult, TableSchema } from '../types/index.js';

/**
 * Runs statements on one connection context: either autocommit or a single
 * open transaction. The engine never begins or ends transactions itself.
 */
export interface SqlExecutor {
  run(statement: Statement): Promise<StatementResult>;
}

/**
 * Metadata introspection for destination and referenced tables
 */
export interface SchemaSource {
  /**
   * Columns of a table
   * @throws StoreError when the table cannot be introspected
   */
  getTableSchema(table: string): Promise<TableSchema>;

  /** Base tables of the current database */
  listTables(): Promise<string[]>;
}

/**
 * A store that can hand out an autocommit executor and run work inside a
 * transaction. Owned by whoever sequences the run.
 */
export interface TransactionalStore {
  executor(): SqlExecutor;

  /**
   * Run `work` inside BEGIN ... COMMIT; roll back and rethrow on failure
   */
  withTransaction<T>(work: (tx: SqlExecutor) => Promise<T>): Promise<T>;
}
