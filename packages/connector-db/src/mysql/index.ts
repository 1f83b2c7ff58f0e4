/**
 * MySQL Store
 *
 * Exports for MySQL database integration.
 */

export { MySQLClient } from './client.js';
export type { MySQLClientConfig, MySQLColumn } from './client.js';

export { MySQLExecutor, toSqlValue } from './executor.js';
export type { Queryable } from './executor.js';

export {
  renderStatement,
  quoteIdentifier,
  stagingColumnType,
  FALLBACK_STAGING_TYPE,
} from './dialect.js';
export type { RenderedStatement } from './dialect.js';
