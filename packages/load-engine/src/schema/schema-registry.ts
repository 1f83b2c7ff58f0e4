/**
 * SchemaRegistry
 *
 * Run-scoped cache of destination table schemas. Each table is introspected
 * at most once; failures are never cached.
 */

import type { SchemaSource, TableSchema } from '@rowgate/core';
import { errorMessage } from '@rowgate/core';
import { LoadError } from '../errors/index.js';

export class SchemaRegistry {
  private readonly cache = new Map<string, TableSchema>();

  constructor(private readonly source: SchemaSource) {}

  /**
   * Schema of `table`, fetched on first use
   * @throws LoadError SCHEMA_FETCH_FAILED
   */
  async get(table: string): Promise<TableSchema> {
    const cached = this.cache.get(table);
    if (cached) return cached;

    let schema: TableSchema;
    try {
      schema = await this.source.getTableSchema(table);
    } catch (error) {
      throw new LoadError({
        code: 'SCHEMA_FETCH_FAILED',
        message: `Could not read the schema of ${table}: ${errorMessage(error)}`,
        table,
        suggestion: 'Check that the table exists and that the user may read its metadata.',
        cause: error instanceof Error ? error : undefined,
      });
    }

    this.cache.set(table, schema);
    return schema;
  }

  has(table: string): boolean {
    return this.cache.has(table);
  }

  clear(): void {
    this.cache.clear();
  }
}
