import { describe, expect, it } from 'vitest';
import { Logger } from '@rowgate/core';
import { isStagingTableOf, stagingTableName, sweepOrphanStagingTables } from '../src/merge/index.js';
import { InMemoryStore } from './support/in-memory-store.js';

const NOW = new Date('2024-05-01T10:00:00.000Z');

describe('stagingTableName', () => {
  it('appends pid and epoch seconds', () => {
    expect(stagingTableName('reservation', 42, NOW)).toBe('reservation_staging_42_1714557600');
  });

  it('adds a sequence suffix after the first name', () => {
    expect(stagingTableName('reservation', 42, NOW, 2)).toBe('reservation_staging_42_1714557600_2');
    expect(stagingTableName('a'.repeat(60), 42, NOW, 2)).toHaveLength(64);
  });

  it('truncates long table names to the identifier limit', () => {
    const table = 'a'.repeat(60);
    const name = stagingTableName(table, 42, NOW);

    expect(name).toBe(`${'a'.repeat(42)}_staging_42_1714557600`);
    expect(name).toHaveLength(64);
    expect(isStagingTableOf(name, table)).toBe(true);
  });
});

describe('isStagingTableOf', () => {
  it('matches only staging tables of the given table', () => {
    expect(isStagingTableOf('reservation_staging_42_1714557600', 'reservation')).toBe(true);
    expect(isStagingTableOf('reservation_staging_42_1714557600', 'reservation_x')).toBe(false);
    expect(isStagingTableOf('reservation_archive', 'reservation')).toBe(false);
    expect(isStagingTableOf('flight_staging_42_1714557600', 'reservation')).toBe(false);
    expect(isStagingTableOf('reservation_staging_42_1714557600_3', 'reservation')).toBe(true);
  });
});

describe('sweepOrphanStagingTables', () => {
  const store = () =>
    new InMemoryStore()
      .createTable('reservation', ['id', 'pnr'])
      .createTable('reservation_archive', ['id', 'pnr'])
      .createTable('reservation_staging_7_1700000000', ['pnr'])
      .createTable('flight_staging_7_1700000000', ['code']);

  it('drops leftover staging tables of the listed tables', async () => {
    const db = store();

    const dropped = await sweepOrphanStagingTables(db, db.executor(), ['reservation']);

    expect(dropped).toEqual(['reservation_staging_7_1700000000']);
    expect(await db.listTables()).toEqual([
      'flight_staging_7_1700000000',
      'reservation',
      'reservation_archive',
    ]);
    expect(await sweepOrphanStagingTables(db, db.executor(), ['reservation'])).toEqual([]);
  });

  it('logs a table it cannot drop and keeps going', async () => {
    const db = store().failWhen((s) => s.kind === 'drop-table', 'boom');
    const lines: string[] = [];

    const dropped = await sweepOrphanStagingTables(
      db,
      db.executor(),
      ['reservation', 'flight'],
      new Logger({ level: 'warn', sink: (line) => lines.push(line) })
    );

    expect(dropped).toEqual(['reservation_staging_7_1700000000']);
    expect(lines).toEqual([
      expect.stringMatching(
        /WARN Could not drop orphan staging table stagingTable=flight_staging_7_1700000000 error=boom$/
      ),
    ]);
  });
});
