/**
 * @rowgate/connector-db
 *
 * MySQL store for the rowgate load engine
 */

export * from './mysql/index.js';
