/**
 * Data dictionary: table, column, constraint and index metadata of a
 * database, as rendered by the dictionary exporter.
 */

export interface TableSummary {
  table: string;
  approxRows: number | null;
  dataBytes: number | null;
  indexBytes: number | null;
  totalBytes: number | null;
}

export interface ColumnEntry {
  table: string;
  position: number;
  column: string;
  columnType: string;
  dataType: string;
  maxLength: number | null;
  numericPrecision: number | null;
  isNullable: boolean;
  defaultValue: string | null;
  key: string;
  extra: string;
  comment: string;
}

export interface ForeignKeyEntry {
  table: string;
  column: string;
  constraint: string;
  referencedTable: string;
  referencedColumn: string;
}

export interface IndexEntry {
  table: string;
  indexName: string;
  nonUnique: boolean;
  sequence: number;
  column: string;
  collation: string | null;
  subPart: number | null;
}

export interface DataDictionary {
  schema: string;
  generatedAt: Date;
  tables: TableSummary[];
  columns: ColumnEntry[];
  foreignKeys: ForeignKeyEntry[];
  indexes: IndexEntry[];
}
