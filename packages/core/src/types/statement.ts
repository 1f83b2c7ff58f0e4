/**
 * Statements the load engine asks a store to run.
 *
 * The engine never assembles SQL text. It describes each statement with
 * validated identifiers and bound values; a store renders it for its dialect.
 */

/** Value bound as a statement parameter */
export type SqlValue = string | number | boolean | Date | null;

/** Column/value pair in a write statement */
export type ColumnValue = readonly [column: string, value: SqlValue];

/** `SELECT <column> FROM <table>` */
export interface SelectIdsStatement {
  kind: 'select-ids';
  table: string;
  column: string;
}

/** `SELECT 1 FROM <table> WHERE <column> = ? LIMIT 1` */
export interface ExistsStatement {
  kind: 'exists';
  table: string;
  column: string;
  value: SqlValue;
}

export interface InsertStatement {
  kind: 'insert';
  table: string;
  values: readonly ColumnValue[];
}

export interface UpdateStatement {
  kind: 'update';
  table: string;
  set: readonly ColumnValue[];
  where: { column: string; value: SqlValue };
}

export interface StagingColumn {
  name: string;
  /** Column type copied from the destination; stores fall back to text */
  sqlType: string;
}

export interface CreateStagingStatement {
  kind: 'create-staging';
  table: string;
  columns: readonly StagingColumn[];
}

/** Multi-row insert used to populate a staging table */
export interface BulkInsertStatement {
  kind: 'bulk-insert';
  table: string;
  columns: readonly string[];
  rows: ReadonlyArray<readonly SqlValue[]>;
}

/**
 * Insert staging rows without a destination match on the key columns.
 * `timestampColumns` are filled with `now`.
 */
export interface MergeInsertStatement {
  kind: 'merge-insert';
  target: string;
  staging: string;
  keyColumns: readonly string[];
  columns: readonly string[];
  /** Destination column that is NULL when the left join found no match */
  matchColumn: string;
  timestampColumns: readonly string[];
  now: Date;
}

/**
 * Overwrite `columns` of every destination row joined to a staging row.
 */
export interface MergeUpdateStatement {
  kind: 'merge-update';
  target: string;
  staging: string;
  keyColumns: readonly string[];
  columns: readonly string[];
  updatedColumn: string | null;
  now: Date;
}

export interface DropTableStatement {
  kind: 'drop-table';
  table: string;
}

export type Statement =
  | SelectIdsStatement
  | ExistsStatement
  | InsertStatement
  | UpdateStatement
  | CreateStagingStatement
  | BulkInsertStatement
  | MergeInsertStatement
  | MergeUpdateStatement
  | DropTableStatement;

export type StatementKind = Statement['kind'];

export interface StatementResult {
  rows: Array<Record<string, SqlValue>>;
  /** Affected row count; null when the driver cannot report one */
  affectedRows: number | null;
  insertId?: number;
}
