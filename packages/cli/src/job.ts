/**
 * One end-to-end load job: sweep, load, export, document.
 */

import { resolve } from 'node:path';
import type { DataDictionary, Logger, SchemaSource, TransactionalStore } from '@rowgate/core';
import { errorMessage } from '@rowgate/core';
import {
  RunOrchestrator,
  formatRunReport,
  runSucceeded,
  sweepOrphanStagingTables,
} from '@rowgate/load-engine';
import { exportQuarantineByTable, readTableRecords, writeDataDictionary } from '@rowgate/connector-file';
import { tableSourcePaths, type ConfigFile } from './config.js';

export interface JobStore extends TransactionalStore, SchemaSource {
  getDataDictionary(): Promise<DataDictionary>;
}

export interface JobOptions {
  skipDictionary?: boolean;
  dictionaryOnly?: boolean;
}

export interface JobDeps {
  store: JobStore;
  logger: Logger;
  /** Receives the run summary */
  print: (text: string) => void;
  clock?: () => Date;
  runId?: string;
}

function planTables(plan: ConfigFile['plan']): string[] {
  return [
    ...plan.masterTables.map((spec) => spec.table),
    ...(plan.merge ? [plan.merge.table] : []),
    ...plan.dependentTables.map((spec) => spec.table),
  ];
}

/**
 * Run the job described by `config` against `store`
 *
 * @returns process exit code: 1 when any table failed or the dictionary could not be written
 */
export async function runJob(config: ConfigFile, options: JobOptions, deps: JobDeps): Promise<number> {
  const { store, logger } = deps;
  let exitCode = 0;

  if (!options.dictionaryOnly) {
    await sweepOrphanStagingTables(store, store.executor(), planTables(config.plan), logger);

    const orchestrator = new RunOrchestrator({
      store,
      schemaSource: store,
      logger,
      clock: deps.clock,
      runId: deps.runId,
    });
    const report = await orchestrator.run(config.plan, (table) =>
      readTableRecords(table, { ...tableSourcePaths(config.sources, table), logger })
    );

    const written = await exportQuarantineByTable(
      report.quarantine,
      resolve(process.cwd(), config.output.quarantineDir)
    );
    for (const file of written) {
      logger.info('Wrote quarantine file', { file });
    }

    deps.print(formatRunReport(report));
    if (!runSucceeded(report)) exitCode = 1;
  }

  if (!options.skipDictionary) {
    try {
      const result = await writeDataDictionary(await store.getDataDictionary(), {
        filePath: resolve(process.cwd(), config.output.dictionaryPath),
        tablesDir: config.output.tablesDir ? resolve(process.cwd(), config.output.tablesDir) : undefined,
      });
      logger.info('Wrote data dictionary', { file: result.filePath, sheets: result.sheets.length });
    } catch (error) {
      logger.error('Data dictionary failed', { error: errorMessage(error) });
      exitCode = 1;
    }
  }

  return exitCode;
}
