import { readFile } from 'node:fs/promises';
import { join, resolve } from 'node:path';
import { z } from 'zod';
import { errorMessage, identifierSchema, loadPlanSchema } from '@rowgate/core';

function isPlainObject(value: unknown): value is Record<string, unknown> {
  return (
    typeof value === 'object' &&
    value !== null &&
    !Array.isArray(value) &&
    Object.getPrototypeOf(value) === Object.prototype
  );
}

export class ConfigError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'ConfigError';
  }
}

export type EnvExpansionOptions = {
  /**
   * If true, missing env vars leave placeholders unchanged instead of erroring.
   * Default: false (fail-fast).
   */
  allowMissing?: boolean;
};

function expandEnvInString(input: string, options?: EnvExpansionOptions): string {
  return input.replace(/\$\{([^}]+)\}/g, (match, inner: string) => {
    const [rawName, rawDefault] = inner.split(':-', 2);
    const name = (rawName ?? '').trim();
    if (!name) return match;

    const envValue = process.env[name];
    if (envValue !== undefined && envValue !== '') return envValue;

    if (rawDefault !== undefined) return rawDefault;

    if (options?.allowMissing) return match;

    throw new ConfigError(`Missing required environment variable: ${name}`);
  });
}

/**
 * Replace `${VAR}` and `${VAR:-default}` in every string of a parsed JSON value
 */
export function expandEnvVars(value: unknown, options?: EnvExpansionOptions): unknown {
  if (typeof value === 'string') {
    return expandEnvInString(value, options);
  }
  if (Array.isArray(value)) {
    return value.map((v) => expandEnvVars(v, options));
  }
  if (isPlainObject(value)) {
    const out: Record<string, unknown> = {};
    for (const [k, v] of Object.entries(value)) {
      out[k] = expandEnvVars(v, options);
    }
    return out;
  }
  return value;
}

const sslSchema = z.union([
  z.boolean(),
  z.object({ rejectUnauthorized: z.boolean().optional() }).strict(),
]);

export const databaseSchema = z
  .object({
    uri: z.string().min(1).optional(),
    host: z.string().min(1).optional(),
    port: z.number().int().min(1).max(65535).optional(),
    database: z.string().min(1).optional(),
    user: z.string().min(1).optional(),
    password: z.string().optional(),
    ssl: sslSchema.optional(),
    connectionLimit: z.number().int().min(1).max(100).optional(),
  })
  .strict()
  .refine((db) => db.uri !== undefined || db.database !== undefined, {
    message: 'Set either uri or database',
    path: ['database'],
  });

export const sourcesSchema = z
  .object({
    /** Directory holding `<table>.csv` files */
    dataDir: z.string().min(1).default('.'),
    /** Workbook with one sheet per table */
    workbook: z.string().min(1).optional(),
    /** Per-table CSV file overrides */
    csv: z.record(identifierSchema, z.string().min(1)).default({}),
    /** Per-table sheet name overrides */
    sheets: z.record(identifierSchema, z.string().min(1)).default({}),
  })
  .strict();

export const outputSchema = z
  .object({
    /** Directory for `<table>_invalid.csv` files */
    quarantineDir: z.string().min(1).default('./out'),
    dictionaryPath: z.string().min(1).default('./out/data_dictionary.xlsx'),
    /** Also write one CSV of column metadata per table here */
    tablesDir: z.string().min(1).optional(),
  })
  .strict();

export const loggingSchema = z
  .object({
    format: z.enum(['text', 'json']).optional(),
    level: z.enum(['debug', 'info', 'warn', 'error']).optional(),
  })
  .strict();

export const configFileSchema = z
  .object({
    $schema: z.string().min(1).optional(),
    database: databaseSchema,
    sources: sourcesSchema.default({}),
    plan: loadPlanSchema,
    output: outputSchema.default({}),
    logging: loggingSchema.optional(),
  })
  .strict();

export type ConfigFile = z.infer<typeof configFileSchema>;
export type SourcesConfig = z.infer<typeof sourcesSchema>;

export function formatZodError(err: z.ZodError): string {
  const issues = err.issues
    .map((issue) => {
      const path = issue.path.length ? issue.path.join('.') : '(root)';
      return `- ${path}: ${issue.message}`;
    })
    .join('\n');
  return `Invalid config file:\n${issues}`;
}

/**
 * Read, expand and validate a config file
 * @throws ConfigError
 */
export async function loadConfig(configPath: string): Promise<ConfigFile> {
  const absolutePath = resolve(process.cwd(), configPath);

  let parsed: unknown;
  try {
    const content = await readFile(absolutePath, 'utf-8');
    // Handle UTF-8 BOM (common on Windows) to avoid JSON.parse failures.
    parsed = JSON.parse(content.replace(/^\uFEFF/, ''));
  } catch (error) {
    throw new ConfigError(`Cannot read config ${absolutePath}: ${errorMessage(error)}`);
  }

  const result = configFileSchema.safeParse(expandEnvVars(parsed));
  if (!result.success) {
    throw new ConfigError(formatZodError(result.error));
  }
  return result.data;
}

/**
 * Where to look for the rows of `table`
 */
export function tableSourcePaths(
  sources: SourcesConfig,
  table: string
): { csvFile: string; workbook?: string; sheet?: string } {
  return {
    csvFile: resolve(process.cwd(), sources.csv[table] ?? join(sources.dataDir, `${table}.csv`)),
    workbook: sources.workbook ? resolve(process.cwd(), sources.workbook) : undefined,
    sheet: sources.sheets[table],
  };
}
