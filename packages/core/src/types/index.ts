export type { ScalarValue, RawRecord, PlainRecord } from './record.js';
export type { TableSchema, ColumnDescriptor } from './schema.js';
export { createTableSchema, isBooleanColumnType } from './schema.js';
export type {
  SqlValue,
  ColumnValue,
  SelectIdsStatement,
  ExistsStatement,
  InsertStatement,
  UpdateStatement,
  StagingColumn,
  CreateStagingStatement,
  BulkInsertStatement,
  MergeInsertStatement,
  MergeUpdateStatement,
  DropTableStatement,
  Statement,
  StatementKind,
  StatementResult,
} from './statement.js';
export type {
  TableSummary,
  ColumnEntry,
  ForeignKeyEntry,
  IndexEntry,
  DataDictionary,
} from './dictionary.js';
