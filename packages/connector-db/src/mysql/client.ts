/**
 * MySQL Client
 *
 * Wrapper around mysql2/promise. Hands out autocommit executors and
 * transaction-bound executors, and answers metadata questions about the
 * current database.
 */

import mysql from 'mysql2/promise';
import type { Pool, PoolConnection } from 'mysql2/promise';
import type {
  ColumnDescriptor,
  ColumnEntry,
  DataDictionary,
  ForeignKeyEntry,
  IndexEntry,
  SchemaSource,
  SqlExecutor,
  TableSchema,
  TableSummary,
  TransactionalStore,
} from '@rowgate/core';
import {
  Logger,
  StoreError,
  assertIdentifier,
  createSilentLogger,
  createTableSchema,
  errorMessage,
} from '@rowgate/core';
import { MySQLExecutor, type Queryable } from './executor.js';

export interface MySQLClientConfig {
  /** Connection string (alternative to individual params) */
  uri?: string;
  /** Database host */
  host?: string;
  /** Database port */
  port?: number;
  /** Database name */
  database?: string;
  /** Username */
  user?: string;
  /** Password */
  password?: string;
  /** SSL configuration */
  ssl?: boolean | { rejectUnauthorized?: boolean };
  /** Connection pool size */
  connectionLimit?: number;
  /** Identifier used in errors and logs */
  id?: string;
}

export interface MySQLColumn extends ColumnDescriptor {
  dataType: string;
  columnDefault: string | null;
}

function text(value: unknown): string {
  if (value === null || value === undefined) return '';
  if (Buffer.isBuffer(value)) return value.toString('utf-8');
  return String(value);
}

function nullableText(value: unknown): string | null {
  return value === null || value === undefined ? null : text(value);
}

function nullableNumber(value: unknown): number | null {
  if (value === null || value === undefined || value === '') return null;
  const n = typeof value === 'number' ? value : Number(text(value));
  return Number.isFinite(n) ? n : null;
}

function flag(value: unknown): boolean {
  return value === 1 || value === '1' || value === true;
}

export class MySQLClient implements TransactionalStore, SchemaSource {
  private pool: Pool;
  private readonly config: MySQLClientConfig;
  private readonly logger: Logger;

  constructor(config: MySQLClientConfig, logger: Logger = createSilentLogger()) {
    this.config = config;
    this.logger = logger.child({ store: this.sourceId });
    this.pool = mysql.createPool({
      uri: config.uri,
      host: config.host,
      port: config.port ?? 3306,
      database: config.database,
      user: config.user,
      password: config.password,
      ssl: config.ssl
        ? { rejectUnauthorized: typeof config.ssl === 'object' ? config.ssl.rejectUnauthorized : undefined }
        : undefined,
      connectionLimit: config.connectionLimit ?? 10,
      waitForConnections: true,
      dateStrings: false,
    });
  }

  private get sourceId(): string {
    return this.config.id ?? 'mysql';
  }

  /**
   * Test connection
   */
  async connect(): Promise<void> {
    try {
      const connection = await this.pool.getConnection();
      connection.release();
    } catch (error) {
      throw new StoreError({
        code: 'CONNECTION_FAILED',
        message: `MySQL connection failed: ${errorMessage(error)}`,
        sourceId: this.sourceId,
        suggestion: 'Check host, port, database, user, and password.',
        cause: error instanceof Error ? error : undefined,
      });
    }
  }

  /**
   * Close all connections
   */
  async disconnect(): Promise<void> {
    await this.pool.end();
  }

  /**
   * Executor that runs each statement in its own implicit transaction
   */
  executor(): SqlExecutor {
    return new MySQLExecutor(this.pool, this.sourceId);
  }

  /**
   * Run `work` on one pooled connection inside BEGIN ... COMMIT.
   * Any rejection rolls back and is rethrown.
   */
  async withTransaction<T>(work: (tx: SqlExecutor) => Promise<T>): Promise<T> {
    let connection: PoolConnection;
    try {
      connection = await this.pool.getConnection();
    } catch (error) {
      throw new StoreError({
        code: 'CONNECTION_FAILED',
        message: `Could not acquire a connection: ${errorMessage(error)}`,
        sourceId: this.sourceId,
        cause: error instanceof Error ? error : undefined,
      });
    }

    try {
      await connection.beginTransaction();
      const result = await work(new MySQLExecutor(connection, this.sourceId));
      await connection.commit();
      return result;
    } catch (error) {
      try {
        await connection.rollback();
      } catch (rollbackError) {
        this.logger.error('Rollback failed', { error: rollbackError });
      }
      throw error;
    } finally {
      connection.release();
    }
  }

  private async select(sql: string, params: string[] = []): Promise<Array<Record<string, unknown>>> {
    const target: Queryable = this.pool;
    try {
      const [rows] = await target.execute(sql, params);
      return Array.isArray(rows) ? rows.map((row) => ({ ...row })) : [];
    } catch (error) {
      throw new StoreError({
        code: 'READ_FAILED',
        message: `Metadata query failed: ${errorMessage(error)}`,
        sourceId: this.sourceId,
        cause: error instanceof Error ? error : undefined,
      });
    }
  }

  /**
   * Get columns for a table
   */
  async getColumns(table: string): Promise<MySQLColumn[]> {
    // Validate table name to prevent SQL injection
    assertIdentifier(table, 'table');

    const sql = `
      SELECT
        COLUMN_NAME as name,
        DATA_TYPE as data_type,
        COLUMN_TYPE as column_type,
        IS_NULLABLE = 'YES' as is_nullable,
        COLUMN_DEFAULT as column_default,
        COLUMN_KEY = 'PRI' as is_primary_key
      FROM INFORMATION_SCHEMA.COLUMNS
      WHERE TABLE_SCHEMA = DATABASE() AND TABLE_NAME = ?
      ORDER BY ORDINAL_POSITION
    `;

    const rows = await this.select(sql, [table]);

    return rows.map((row) => ({
      name: text(row.name),
      dataType: text(row.data_type),
      columnType: text(row.column_type),
      isNullable: flag(row.is_nullable),
      columnDefault: nullableText(row.column_default),
      isPrimaryKey: flag(row.is_primary_key),
    }));
  }

  async getTableSchema(table: string): Promise<TableSchema> {
    const columns = await this.getColumns(table);

    if (columns.length === 0) {
      throw new StoreError({
        code: 'NOT_FOUND',
        message: `Table not found or has no columns: ${table}`,
        sourceId: this.sourceId,
        suggestion: 'Check the table name and that the configured database is the right one.',
        context: { table },
      });
    }

    return createTableSchema(table, columns);
  }

  /**
   * Get list of base tables
   */
  async listTables(): Promise<string[]> {
    const sql = `
      SELECT TABLE_NAME as table_name
      FROM INFORMATION_SCHEMA.TABLES
      WHERE TABLE_SCHEMA = DATABASE() AND TABLE_TYPE = 'BASE TABLE'
      ORDER BY TABLE_NAME
    `;

    const rows = await this.select(sql);
    return rows.map((row) => text(row.table_name));
  }

  /**
   * Table, column, foreign key and index metadata of the current database.
   * Index metadata is optional: a failing index query yields no indexes.
   */
  async getDataDictionary(): Promise<DataDictionary> {
    const [schemaRow] = await this.select('SELECT DATABASE() as schema_name');

    const tables: TableSummary[] = (
      await this.select(`
        SELECT
          TABLE_NAME as table_name,
          TABLE_ROWS as table_rows,
          DATA_LENGTH as data_length,
          INDEX_LENGTH as index_length,
          (DATA_LENGTH + INDEX_LENGTH) as total_bytes
        FROM INFORMATION_SCHEMA.TABLES
        WHERE TABLE_SCHEMA = DATABASE()
        ORDER BY TABLE_NAME
      `)
    ).map((row) => ({
      table: text(row.table_name),
      approxRows: nullableNumber(row.table_rows),
      dataBytes: nullableNumber(row.data_length),
      indexBytes: nullableNumber(row.index_length),
      totalBytes: nullableNumber(row.total_bytes),
    }));

    const columns: ColumnEntry[] = (
      await this.select(`
        SELECT
          TABLE_NAME as table_name,
          ORDINAL_POSITION as position,
          COLUMN_NAME as column_name,
          COLUMN_TYPE as column_type,
          DATA_TYPE as data_type,
          CHARACTER_MAXIMUM_LENGTH as max_length,
          NUMERIC_PRECISION as numeric_precision,
          IS_NULLABLE as is_nullable,
          COLUMN_DEFAULT as column_default,
          COLUMN_KEY as column_key,
          EXTRA as extra,
          COLUMN_COMMENT as column_comment
        FROM INFORMATION_SCHEMA.COLUMNS
        WHERE TABLE_SCHEMA = DATABASE()
        ORDER BY TABLE_NAME, ORDINAL_POSITION
      `)
    ).map((row) => ({
      table: text(row.table_name),
      position: nullableNumber(row.position) ?? 0,
      column: text(row.column_name),
      columnType: text(row.column_type),
      dataType: text(row.data_type),
      maxLength: nullableNumber(row.max_length),
      numericPrecision: nullableNumber(row.numeric_precision),
      isNullable: text(row.is_nullable) === 'YES',
      defaultValue: nullableText(row.column_default),
      key: text(row.column_key),
      extra: text(row.extra),
      comment: text(row.column_comment),
    }));

    const foreignKeys: ForeignKeyEntry[] = (
      await this.select(`
        SELECT
          kcu.TABLE_NAME as table_name,
          kcu.COLUMN_NAME as column_name,
          kcu.CONSTRAINT_NAME as constraint_name,
          kcu.REFERENCED_TABLE_NAME as referenced_table,
          kcu.REFERENCED_COLUMN_NAME as referenced_column
        FROM INFORMATION_SCHEMA.KEY_COLUMN_USAGE kcu
        WHERE kcu.TABLE_SCHEMA = DATABASE()
          AND kcu.REFERENCED_TABLE_NAME IS NOT NULL
        ORDER BY kcu.TABLE_NAME
      `)
    ).map((row) => ({
      table: text(row.table_name),
      column: text(row.column_name),
      constraint: text(row.constraint_name),
      referencedTable: text(row.referenced_table),
      referencedColumn: text(row.referenced_column),
    }));

    let indexes: IndexEntry[] = [];
    try {
      indexes = (
        await this.select(`
          SELECT
            s.TABLE_NAME as table_name,
            s.INDEX_NAME as index_name,
            s.NON_UNIQUE as non_unique,
            s.SEQ_IN_INDEX as seq_in_index,
            s.COLUMN_NAME as column_name,
            s.COLLATION as collation_name,
            s.SUB_PART as sub_part
          FROM INFORMATION_SCHEMA.STATISTICS s
          WHERE s.TABLE_SCHEMA = DATABASE()
          ORDER BY s.TABLE_NAME, s.INDEX_NAME, s.SEQ_IN_INDEX
        `)
      ).map((row) => ({
        table: text(row.table_name),
        indexName: text(row.index_name),
        nonUnique: flag(row.non_unique),
        sequence: nullableNumber(row.seq_in_index) ?? 0,
        column: text(row.column_name),
        collation: nullableText(row.collation_name),
        subPart: nullableNumber(row.sub_part),
      }));
    } catch (error) {
      this.logger.warn('Index metadata unavailable', { error: errorMessage(error) });
    }

    return {
      schema: text(schemaRow?.schema_name),
      generatedAt: new Date(),
      tables,
      columns,
      foreignKeys,
      indexes,
    };
  }
}
