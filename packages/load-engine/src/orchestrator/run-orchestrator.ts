/**
 * RunOrchestrator
 *
 * Sequences one load run: master tables, then the natural-key merge, then
 * dependent tables. Each phase runs inside one transaction owned here;
 * the merge stages its rows before that transaction and drops the staging
 * table after it settles.
 */

import type {
  LoadPlan,
  LoadPlanInput,
  Logger,
  NaturalKeyMergeSpec,
  RawRecord,
  SchemaSource,
  TableLoadSpec,
  TransactionalStore,
} from '@rowgate/core';
import {
  createRunId,
  createSilentLogger,
  errorMessage,
  formatZodIssues,
  loadPlanSchema,
} from '@rowgate/core';
import { LoadError, isLoadError } from '../errors/index.js';
import { StagedBulkMerge, type MergeCounts, type PreparedBatch } from '../merge/index.js';
import { ForeignKeyResolver } from '../resolution/index.js';
import { SchemaRegistry } from '../schema/index.js';
import type {
  MergeResult,
  PhaseName,
  QuarantineEntry,
  RunReport,
  TableLoadResult,
  TableStatus,
} from '../types/index.js';
import { createCounters } from '../types/index.js';
import { loadTable } from '../upsert/index.js';
import { orderByDependencies } from './dependency-order.js';

/** Source rows of one destination table */
export type RecordProvider = (table: string) => Promise<readonly RawRecord[]>;

export interface RunOrchestratorOptions {
  store: TransactionalStore;
  schemaSource: SchemaSource;
  logger?: Logger;
  runId?: string;
  clock?: () => Date;
  /** Pre-seeded caches; fresh ones per run otherwise */
  resolver?: ForeignKeyResolver;
  registry?: SchemaRegistry;
  /** Process id used in staging table names */
  pid?: number;
}

interface RunContext {
  registry: SchemaRegistry;
  resolver: ForeignKeyResolver;
  logger: Logger;
  provide: RecordProvider;
}

type StageOutcome =
  | { ok: true; batch: PreparedBatch }
  | { ok: false; result: MergeResult };

function failedResult(table: string, phase: PhaseName, error: string): TableLoadResult {
  return { table, phase, status: 'failed', counters: createCounters(), quarantine: [], error };
}

function mergeResult(
  merge: StagedBulkMerge,
  table: string,
  status: TableStatus,
  batch: PreparedBatch | undefined,
  details: { counts?: MergeCounts; error?: string; cleanupError?: LoadError | null }
): MergeResult {
  return {
    table,
    status,
    received: batch?.received ?? 0,
    duplicatesDropped: batch?.duplicatesDropped ?? 0,
    staged: merge.stagedCount,
    invalidCount: batch?.quarantine.length ?? 0,
    insertedApprox: details.counts ? details.counts.insertedApprox : 0,
    updatedApprox: details.counts ? details.counts.updatedApprox : 0,
    quarantine: batch?.quarantine ?? [],
    stagingTable: merge.stagingTable,
    cleanupError: details.cleanupError?.message,
    error: details.error,
  };
}

/**
 * Parse a plan, reporting zod issues as INVALID_OPTIONS
 */
export function parseLoadPlan(input: LoadPlanInput): LoadPlan {
  const parsed = loadPlanSchema.safeParse(input);
  if (!parsed.success) {
    throw new LoadError({
      code: 'INVALID_OPTIONS',
      message: formatZodIssues('Invalid load plan', parsed.error),
    });
  }
  return parsed.data;
}

/**
 * True when every table and the merge completed
 */
export function runSucceeded(report: RunReport): boolean {
  return (
    report.tables.every((table) => table.status === 'completed') &&
    (report.merge === undefined || report.merge.status === 'completed')
  );
}

export class RunOrchestrator {
  private readonly logger: Logger;
  private readonly clock: () => Date;

  constructor(private readonly options: RunOrchestratorOptions) {
    this.logger = options.logger ?? createSilentLogger();
    this.clock = options.clock ?? (() => new Date());
  }

  /**
   * Run a load plan.
   *
   * Table-level failures are reported in the result; only an invalid plan
   * or a dependency cycle throws.
   *
   * @throws LoadError INVALID_OPTIONS, DEPENDENCY_CYCLE
   */
  async run(planInput: LoadPlanInput, provide: RecordProvider): Promise<RunReport> {
    const plan = parseLoadPlan(planInput);
    const masterTables = orderByDependencies(plan.masterTables);
    const dependentTables = orderByDependencies(plan.dependentTables);

    const runId = this.options.runId ?? createRunId();
    const context: RunContext = {
      registry: this.options.registry ?? new SchemaRegistry(this.options.schemaSource),
      resolver: this.options.resolver ?? new ForeignKeyResolver(),
      logger: this.logger.child({ runId }),
      provide,
    };

    const startedAt = this.clock();
    context.logger.info('Run started', {
      masterTables: masterTables.map((spec) => spec.table),
      merge: plan.merge?.table,
      dependentTables: dependentTables.map((spec) => spec.table),
    });

    const tables = await this.runTablePhase('master', masterTables, context);
    const merge = plan.merge ? await this.runMergePhase(plan.merge, context) : undefined;
    tables.push(...(await this.runTablePhase('dependent', dependentTables, context)));

    const quarantine = new Map<string, QuarantineEntry[]>();
    for (const result of [...tables, ...(merge ? [merge] : [])]) {
      if (result.quarantine.length > 0) {
        quarantine.set(result.table, result.quarantine);
      }
    }

    const report: RunReport = {
      runId,
      startedAt,
      finishedAt: this.clock(),
      tables,
      merge,
      quarantine,
    };

    context.logger.info('Run finished', {
      succeeded: runSucceeded(report),
      quarantined: Array.from(quarantine.values()).reduce((sum, entries) => sum + entries.length, 0),
    });
    return report;
  }

  private async runTablePhase(
    phase: PhaseName,
    specs: readonly TableLoadSpec[],
    context: RunContext
  ): Promise<TableLoadResult[]> {
    if (specs.length === 0) return [];

    const { logger } = context;
    const results = new Map<string, TableLoadResult>();
    const inputs = new Map<string, readonly RawRecord[]>();

    // Sources are read before the transaction opens
    for (const spec of specs) {
      try {
        inputs.set(spec.table, await context.provide(spec.table));
      } catch (error) {
        const message = `Could not read source rows: ${errorMessage(error)}`;
        results.set(spec.table, failedResult(spec.table, phase, message));
        logger.error('Table aborted', { table: spec.table, phase, error: message });
      }
    }

    try {
      await this.options.store.withTransaction(async (tx) => {
        for (const spec of specs) {
          const records = inputs.get(spec.table);
          if (!records) continue;

          try {
            const result = await loadTable(spec, records, {
              registry: context.registry,
              resolver: context.resolver,
              executor: tx,
              logger,
              phase,
            });
            results.set(spec.table, result);
          } catch (error) {
            if (!isLoadError(error, 'SCHEMA_FETCH_FAILED')) throw error;
            results.set(spec.table, failedResult(spec.table, phase, error.message));
            logger.error('Table aborted', { table: spec.table, phase, code: error.code, error: error.message });
          }
        }
      });
    } catch (error) {
      const failure = new LoadError({
        code: 'PHASE_FAILED',
        message: `${phase} phase rolled back: ${errorMessage(error)}`,
        cause: error instanceof Error ? error : undefined,
      });
      logger.error('Phase rolled back', { phase, code: failure.code, error: errorMessage(error) });

      for (const spec of specs) {
        const existing = results.get(spec.table);
        if (existing?.status === 'failed') continue;
        results.set(spec.table, {
          table: spec.table,
          phase,
          status: 'rolled-back',
          counters: existing?.counters ?? createCounters(),
          quarantine: existing?.quarantine ?? [],
          error: failure.message,
        });
      }
    }

    return specs.flatMap((spec) => results.get(spec.table) ?? []);
  }

  private async runMergePhase(spec: NaturalKeyMergeSpec, context: RunContext): Promise<MergeResult> {
    const merge = new StagedBulkMerge(spec, {
      registry: context.registry,
      resolver: context.resolver,
      executor: this.options.store.executor(),
      logger: context.logger,
      clock: this.clock,
      pid: this.options.pid,
    });

    const staged = await this.stageMerge(merge, spec, context);
    if (!staged.ok) return staged.result;

    const { batch } = staged;
    let counts: MergeCounts;
    try {
      counts = await this.options.store.withTransaction((tx) => merge.apply(tx, batch));
    } catch (error) {
      const cleanupError = await merge.cleanup();
      context.logger.error('Merge rolled back', { table: spec.table, error: errorMessage(error) });
      return mergeResult(merge, spec.table, 'rolled-back', batch, {
        error: errorMessage(error),
        cleanupError,
      });
    }

    const cleanupError = await merge.cleanup();
    return mergeResult(merge, spec.table, 'completed', batch, { counts, cleanupError });
  }

  private async stageMerge(
    merge: StagedBulkMerge,
    spec: NaturalKeyMergeSpec,
    context: RunContext
  ): Promise<StageOutcome> {
    let batch: PreparedBatch | undefined;
    try {
      const records = await context.provide(spec.table);
      batch = await merge.prepare(records);
      await merge.stage(batch);
      return { ok: true, batch };
    } catch (error) {
      const cleanupError = await merge.cleanup();
      const code = isLoadError(error) ? error.code : undefined;
      context.logger.error('Merge aborted', { table: spec.table, code, error: errorMessage(error) });
      return {
        ok: false,
        result: mergeResult(merge, spec.table, 'failed', batch, {
          error: errorMessage(error),
          cleanupError,
        }),
      };
    }
  }
}
