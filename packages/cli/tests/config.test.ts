import { afterEach, beforeEach, describe, expect, it, vi } from 'vitest';
import { mkdtempSync, rmSync, writeFileSync } from 'node:fs';
import { join, resolve } from 'node:path';
import { tmpdir } from 'node:os';
import { ConfigError, expandEnvVars, loadConfig, tableSourcePaths } from '../src/config.js';
import { parseCliArgs } from '../src/cli.js';

let tmpDir = '';

beforeEach(() => {
  tmpDir = mkdtempSync(join(tmpdir(), 'rowgate-config-'));
});

afterEach(() => {
  rmSync(tmpDir, { recursive: true, force: true });
  vi.unstubAllEnvs();
});

function writeConfig(content: unknown, prefix = ''): string {
  const filePath = join(tmpDir, 'rowgate.json');
  writeFileSync(filePath, prefix + JSON.stringify(content), 'utf-8');
  return filePath;
}

describe('loadConfig', () => {
  it('expands environment variables, tolerates a BOM and fills defaults', async () => {
    vi.stubEnv('ROWGATE_TEST_DB', 'airline');
    const filePath = writeConfig(
      {
        database: { database: '${ROWGATE_TEST_DB}', password: '${ROWGATE_TEST_PASSWORD:-test-secret}' },
        plan: { masterTables: [{ table: 'gate' }] },
      },
      '\uFEFF'
    );

    const config = await loadConfig(filePath);

    expect(config.database).toEqual({ database: 'airline', password: 'test-secret' });
    expect(config.sources).toEqual({ dataDir: '.', csv: {}, sheets: {} });
    expect(config.output).toEqual({
      quarantineDir: './out',
      dictionaryPath: './out/data_dictionary.xlsx',
    });
    expect(config.plan.masterTables[0]?.mode).toBe('upsert');
  });

  it('fails on a missing environment variable', async () => {
    const filePath = writeConfig({
      database: { database: '${ROWGATE_TEST_UNSET_VAR}' },
      plan: {},
    });

    await expect(loadConfig(filePath)).rejects.toThrow(
      new ConfigError('Missing required environment variable: ROWGATE_TEST_UNSET_VAR')
    );
  });

  it('reports every invalid field with its path', async () => {
    const filePath = writeConfig({
      database: { host: 'db' },
      plan: {
        merge: {
          table: 'reservation',
          naturalKey: ['pnr'],
          mergeColumns: ['pnr', 'seat'],
          mutableColumns: ['status'],
        },
      },
    });

    await expect(loadConfig(filePath)).rejects.toThrow(
      [
        'Invalid config file:',
        '- database.database: Set either uri or database',
        '- plan.merge.mutableColumns.0: mutableColumns column "status" must be listed in mergeColumns',
      ].join('\n')
    );
  });

  it('rejects a file that is not JSON', async () => {
    const filePath = join(tmpDir, 'broken.json');
    writeFileSync(filePath, '{ database: ');

    await expect(loadConfig(filePath)).rejects.toBeInstanceOf(ConfigError);
  });
});

describe('expandEnvVars', () => {
  it('walks arrays and objects and can leave unknown variables in place', () => {
    vi.stubEnv('ROWGATE_TEST_DIR', '/data');

    expect(
      expandEnvVars({ dirs: ['${ROWGATE_TEST_DIR}/in', '${ROWGATE_TEST_NOPE}'], port: 3306 }, { allowMissing: true })
    ).toEqual({ dirs: ['/data/in', '${ROWGATE_TEST_NOPE}'], port: 3306 });
  });
});

describe('tableSourcePaths', () => {
  it('uses per-table overrides, else <dataDir>/<table>.csv', () => {
    const sources = {
      dataDir: 'data',
      workbook: 'data/airline.xlsx',
      csv: { flight: 'exports/flights.csv' },
      sheets: { gate: 'Gates' },
    };

    expect(tableSourcePaths(sources, 'gate')).toEqual({
      csvFile: resolve('data/gate.csv'),
      workbook: resolve('data/airline.xlsx'),
      sheet: 'Gates',
    });
    expect(tableSourcePaths(sources, 'flight').csvFile).toBe(resolve('exports/flights.csv'));
  });
});

describe('parseCliArgs', () => {
  it('reads the config path and flags', () => {
    expect(parseCliArgs(['--dictionary-only', '--config', 'rowgate.json'])).toEqual({
      configPath: 'rowgate.json',
      skipDictionary: false,
      dictionaryOnly: true,
    });
  });

  it('returns null without a config path', () => {
    expect(parseCliArgs([])).toBeNull();
    expect(parseCliArgs(['--config', '--skip-dictionary'])).toBeNull();
  });
});
