/**
 * Destination table metadata as seen by the load engine
 */

export interface TableSchema {
  /** Table name */
  name: string;
  /** Columns that may be inserted or updated, in ordinal order */
  columns: ReadonlySet<string>;
  /** Declared SQL type per column (e.g. `varchar(20)`, `tinyint(1)`) */
  columnTypes: ReadonlyMap<string, string>;
  /** Columns whose declared type is boolean-like */
  booleanColumns: ReadonlySet<string>;
  /** Single-column primary key, when there is one */
  primaryKey: string | null;
}

export interface ColumnDescriptor {
  name: string;
  /** Full column type, e.g. `int unsigned`, `varchar(12)` */
  columnType: string;
  isNullable: boolean;
  isPrimaryKey: boolean;
}

const BOOLEAN_COLUMN_TYPE = /^(tinyint\(1\)|bit\(1\)|bool|boolean)$/i;

/**
 * Whether a declared column type holds booleans
 */
export function isBooleanColumnType(columnType: string): boolean {
  return BOOLEAN_COLUMN_TYPE.test(columnType.trim());
}

/**
 * Build a TableSchema from ordered column descriptors
 */
export function createTableSchema(name: string, columns: ColumnDescriptor[]): TableSchema {
  const primaryKeys = columns.filter((c) => c.isPrimaryKey);

  return {
    name,
    columns: new Set(columns.map((c) => c.name)),
    columnTypes: new Map(columns.map((c) => [c.name, c.columnType])),
    booleanColumns: new Set(
      columns.filter((c) => isBooleanColumnType(c.columnType)).map((c) => c.name)
    ),
    primaryKey: primaryKeys.length === 1 ? (primaryKeys[0]?.name ?? null) : null,
  };
}
