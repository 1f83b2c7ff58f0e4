#!/usr/bin/env -S node --import tsx
/**
 * CLI entry point for the loader
 *
 * Usage:
 *   rowgate --config ./rowgate.json [--skip-dictionary] [--dictionary-only]
 */

import { realpathSync } from 'node:fs';
import { pathToFileURL } from 'node:url';
import { Logger, StoreError } from '@rowgate/core';
import { MySQLClient } from '@rowgate/connector-db';
import { LoadError } from '@rowgate/load-engine';
import { ConfigError, loadConfig } from './config.js';
import { runJob } from './job.js';

export interface CliArgs {
  configPath: string;
  skipDictionary: boolean;
  dictionaryOnly: boolean;
}

const USAGE = 'Usage: rowgate --config <config.json> [--skip-dictionary] [--dictionary-only]';

/**
 * Parse argv (without node and script); null when --config is missing
 */
export function parseCliArgs(args: readonly string[]): CliArgs | null {
  const configIndex = args.indexOf('--config');
  const configPath = configIndex !== -1 ? args[configIndex + 1] : undefined;
  if (!configPath || configPath.startsWith('--')) return null;

  return {
    configPath,
    skipDictionary: args.includes('--skip-dictionary'),
    dictionaryOnly: args.includes('--dictionary-only'),
  };
}

function describeError(error: unknown): string {
  if (error instanceof StoreError || error instanceof LoadError) return error.toActionableMessage();
  if (error instanceof Error) return error.message;
  return String(error);
}

export async function main(argv: readonly string[] = process.argv.slice(2)): Promise<number> {
  let logger = new Logger();
  const args = parseCliArgs(argv);

  if (!args) {
    console.error(USAGE);
    return 1;
  }
  if (args.skipDictionary && args.dictionaryOnly) {
    console.error('--skip-dictionary and --dictionary-only cannot be combined');
    return 1;
  }

  let client: MySQLClient | undefined;
  try {
    const config = await loadConfig(args.configPath);
    logger = new Logger({ level: config.logging?.level, format: config.logging?.format });

    client = new MySQLClient({ ...config.database, id: 'destination' }, logger);
    await client.connect();

    return await runJob(config, args, {
      store: client,
      logger,
      print: (text) => console.log(text),
    });
  } catch (error) {
    if (error instanceof ConfigError) {
      console.error(error.message);
    } else {
      logger.error('Load job failed', { error: describeError(error) });
    }
    return 1;
  } finally {
    if (client) {
      await client.disconnect().catch((error: unknown) => {
        logger.warn('Disconnect failed', { error: describeError(error) });
      });
    }
  }
}

// Run when executed directly, also through the npm bin symlink
const entry = process.argv[1];
if (entry && import.meta.url === pathToFileURL(realpathSync(entry)).href) {
  main().then(
    (code) => {
      process.exitCode = code;
    },
    (error: unknown) => {
      console.error(describeError(error));
      process.exitCode = 1;
    }
  );
}
