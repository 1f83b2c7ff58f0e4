/**
 * Zod schemas for load specifications.
 *
 * Load specs come from config files and from callers; both are parsed here
 * so every component downstream sees defaults filled in.
 */

import { z } from 'zod';
import { IDENTIFIER_PATTERN, MAX_IDENTIFIER_LENGTH } from '../utils/identifiers.js';

export const identifierSchema = z
  .string()
  .min(1)
  .max(MAX_IDENTIFIER_LENGTH)
  .regex(IDENTIFIER_PATTERN, 'Must be a plain SQL identifier (letters, digits, underscore)');

/** Recognised created/updated timestamp column names, in priority order */
export const DEFAULT_CREATED_COLUMNS = ['creado_en', 'created_at', 'created_on', 'fecha_creacion'];
export const DEFAULT_UPDATED_COLUMNS = [
  'actualizado_en',
  'updated_at',
  'updated_on',
  'fecha_modificacion',
];

/** A local column referencing the id column of another table */
export const foreignKeyConstraintSchema = z
  .object({
    column: identifierSchema,
    referencedTable: identifierSchema,
    referencedColumn: identifierSchema.default('id'),
    /** Null values pass; only non-null values must resolve */
    optional: z.boolean().default(false),
    /** What to do with a non-null value that does not resolve */
    onUnresolved: z.enum(['quarantine', 'nullify']).default('quarantine'),
  })
  .strict()
  .refine((fk) => fk.optional || fk.onUnresolved === 'quarantine', {
    message: 'onUnresolved "nullify" requires optional: true',
    path: ['onUnresolved'],
  });

/** Source header name to destination column name */
const aliasesSchema = z.record(z.string().min(1), identifierSchema).default({});

export const tableLoadSpecSchema = z
  .object({
    table: identifierSchema,
    /** `upsert` updates rows whose id exists; `insert-only` skips them */
    mode: z.enum(['upsert', 'insert-only']).default('upsert'),
    /** Surrogate id column; defaults to the table's single-column primary key, else `id` */
    idColumn: identifierSchema.optional(),
    foreignKeys: z.array(foreignKeyConstraintSchema).default([]),
    booleanColumns: z.array(identifierSchema).default([]),
    aliases: aliasesSchema,
    /** Extra ordering edges besides foreign keys */
    dependsOn: z.array(identifierSchema).default([]),
  })
  .strict()
  .superRefine((value, ctx) => {
    const seen = new Set<string>();
    value.foreignKeys.forEach((fk, i) => {
      if (seen.has(fk.column)) {
        ctx.addIssue({
          code: z.ZodIssueCode.custom,
          message: `Duplicate foreign key column: ${fk.column}`,
          path: ['foreignKeys', i, 'column'],
        });
      }
      seen.add(fk.column);
    });
  });

export const timestampCandidatesSchema = z
  .object({
    created: z.array(identifierSchema).default(DEFAULT_CREATED_COLUMNS),
    updated: z.array(identifierSchema).default(DEFAULT_UPDATED_COLUMNS),
  })
  .strict();

export const naturalKeyMergeSpecSchema = z
  .object({
    table: identifierSchema,
    naturalKey: z.array(identifierSchema).min(1),
    foreignKeys: z.array(foreignKeyConstraintSchema).default([]),
    /** Columns staged and inserted */
    mergeColumns: z.array(identifierSchema).min(1),
    /** Columns overwritten on a natural-key match */
    mutableColumns: z.array(identifierSchema).default([]),
    surrogateKey: identifierSchema.default('id'),
    /** Source columns without which the batch is rejected; defaults to key + FK columns */
    requiredColumns: z.array(identifierSchema).optional(),
    aliases: aliasesSchema,
    timestampCandidates: timestampCandidatesSchema.default({}),
    /** Rows per bulk-insert statement into the staging table, lowered to fit the bound-parameter limit */
    chunkSize: z.number().int().min(1).max(10_000).default(500),
  })
  .strict()
  .superRefine((value, ctx) => {
    const mergeColumns = new Set(value.mergeColumns);
    const requireStaged = (columns: string[], label: string) => {
      columns.forEach((column, i) => {
        if (!mergeColumns.has(column)) {
          ctx.addIssue({
            code: z.ZodIssueCode.custom,
            message: `${label} column "${column}" must be listed in mergeColumns`,
            path: [label, i],
          });
        }
      });
    };

    requireStaged(value.naturalKey, 'naturalKey');
    requireStaged(value.mutableColumns, 'mutableColumns');
    requireStaged(
      value.foreignKeys.map((fk) => fk.column),
      'foreignKeys'
    );

    const keyColumns = new Set(value.naturalKey);
    value.mutableColumns.forEach((column, i) => {
      if (keyColumns.has(column)) {
        ctx.addIssue({
          code: z.ZodIssueCode.custom,
          message: `Natural key column "${column}" cannot be mutable`,
          path: ['mutableColumns', i],
        });
      }
    });
  });

export const loadPlanSchema = z
  .object({
    masterTables: z.array(tableLoadSpecSchema).default([]),
    merge: naturalKeyMergeSpecSchema.optional(),
    dependentTables: z.array(tableLoadSpecSchema).default([]),
  })
  .strict()
  .superRefine((value, ctx) => {
    const tables = new Set<string>();
    const check = (table: string, path: Array<string | number>) => {
      if (tables.has(table)) {
        ctx.addIssue({
          code: z.ZodIssueCode.custom,
          message: `Table "${table}" appears more than once in the plan`,
          path,
        });
      }
      tables.add(table);
    };

    value.masterTables.forEach((spec, i) => check(spec.table, ['masterTables', i, 'table']));
    if (value.merge) check(value.merge.table, ['merge', 'table']);
    value.dependentTables.forEach((spec, i) => check(spec.table, ['dependentTables', i, 'table']));
  });

export type ForeignKeyConstraint = z.infer<typeof foreignKeyConstraintSchema>;
export type ForeignKeyConstraintInput = z.input<typeof foreignKeyConstraintSchema>;
export type TableLoadSpec = z.infer<typeof tableLoadSpecSchema>;
export type TableLoadSpecInput = z.input<typeof tableLoadSpecSchema>;
export type NaturalKeyMergeSpec = z.infer<typeof naturalKeyMergeSpecSchema>;
export type NaturalKeyMergeSpecInput = z.input<typeof naturalKeyMergeSpecSchema>;
export type LoadPlan = z.infer<typeof loadPlanSchema>;
export type LoadPlanInput = z.input<typeof loadPlanSchema>;

/**
 * Render zod issues as a bullet list
 */
export function formatZodIssues(label: string, err: z.ZodError): string {
  const issues = err.issues
    .map((issue) => {
      const path = issue.path.length ? issue.path.join('.') : '(root)';
      return `- ${path}: ${issue.message}`;
    })
    .join('\n');
  return `${label}:\n${issues}`;
}
