export type { SqlExecutor, SchemaSource, TransactionalStore } from './store.js';
export type { RecordSource, RecordSourceConfig } from './source.js';
