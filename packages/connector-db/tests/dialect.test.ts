import { describe, expect, it } from 'vitest';
import { StoreError } from '@rowgate/core';
import { renderStatement, stagingColumnType } from '../src/mysql/dialect.js';

const NOW = new Date('2024-05-01T10:00:00.000Z');

describe('renderStatement', () => {
  it('renders id preloads and point lookups', () => {
    expect(renderStatement({ kind: 'select-ids', table: 'flight', column: 'id' })).toEqual({
      sql: 'SELECT `id` FROM `flight`',
      params: [],
    });
    expect(renderStatement({ kind: 'exists', table: 'flight', column: 'id', value: 10 })).toEqual({
      sql: 'SELECT 1 AS `found` FROM `flight` WHERE `id` = ? LIMIT 1',
      params: [10],
    });
  });

  it('binds insert values as parameters', () => {
    const rendered = renderStatement({
      kind: 'insert',
      table: 'terminal',
      values: [
        ['code', "T1'); DROP TABLE terminal; --"],
        ['name', 'North'],
      ],
    });

    expect(rendered.sql).toBe('INSERT INTO `terminal` (`code`, `name`) VALUES (?, ?)');
    expect(rendered.params).toEqual(["T1'); DROP TABLE terminal; --", 'North']);
  });

  it('renders an insert without columns', () => {
    expect(renderStatement({ kind: 'insert', table: 'terminal', values: [] })).toEqual({
      sql: 'INSERT INTO `terminal` () VALUES ()',
      params: [],
    });
  });

  it('renders a partial update keyed on id', () => {
    expect(
      renderStatement({
        kind: 'update',
        table: 'gate',
        set: [['status', 'open']],
        where: { column: 'id', value: 3 },
      })
    ).toEqual({
      sql: 'UPDATE `gate` SET `status` = ? WHERE `id` = ?',
      params: ['open', 3],
    });
  });

  it('refuses an update with nothing to set', () => {
    expect(() =>
      renderStatement({ kind: 'update', table: 'gate', set: [], where: { column: 'id', value: 3 } })
    ).toThrow(StoreError);
  });

  it('rejects malicious identifiers', () => {
    try {
      renderStatement({
        kind: 'exists',
        table: 'flight',
        column: 'id;DROP TABLE users;',
        value: 1,
      });
      expect.unreachable();
    } catch (error) {
      expect(error).toBeInstanceOf(StoreError);
      expect(error).toMatchObject({ code: 'INVALID_IDENTIFIER' });
    }
  });

  it('creates staging tables with nullable copied types', () => {
    expect(
      renderStatement({
        kind: 'create-staging',
        table: 'reservation_staging_1_2',
        columns: [
          { name: 'pnr', sqlType: 'varchar(12)' },
          { name: 'status', sqlType: "enum('confirmed','cancelled')" },
        ],
      }).sql
    ).toBe('CREATE TABLE `reservation_staging_1_2` (`pnr` varchar(12) NULL, `status` TEXT NULL)');
  });

  it('renders multi-row bulk inserts', () => {
    expect(
      renderStatement({
        kind: 'bulk-insert',
        table: 'reservation_staging_1_2',
        columns: ['pnr', 'flight_id'],
        rows: [
          ['AB123', 5],
          ['CD456', 6],
        ],
      })
    ).toEqual({
      sql: 'INSERT INTO `reservation_staging_1_2` (`pnr`, `flight_id`) VALUES (?, ?), (?, ?)',
      params: ['AB123', 5, 'CD456', 6],
    });
  });

  it('rejects bulk rows of the wrong width', () => {
    expect(() =>
      renderStatement({
        kind: 'bulk-insert',
        table: 'reservation_staging_1_2',
        columns: ['pnr', 'flight_id'],
        rows: [['AB123']],
      })
    ).toThrow('Bulk insert row has 1 values for 2 columns');
  });

  it('renders the set-based insert of unmatched staging rows', () => {
    const rendered = renderStatement({
      kind: 'merge-insert',
      target: 'reservation',
      staging: 'reservation_staging_1_2',
      keyColumns: ['pnr', 'flight_id'],
      columns: ['pnr', 'flight_id', 'seat'],
      matchColumn: 'id',
      timestampColumns: ['created_at', 'updated_at'],
      now: NOW,
    });

    expect(rendered.sql).toBe(
      'INSERT INTO `reservation` (`pnr`, `flight_id`, `seat`, `created_at`, `updated_at`) ' +
        'SELECT `s`.`pnr`, `s`.`flight_id`, `s`.`seat`, ?, ? FROM `reservation_staging_1_2` AS `s` ' +
        'LEFT JOIN `reservation` AS `d` ON `d`.`pnr` = `s`.`pnr` AND `d`.`flight_id` = `s`.`flight_id` ' +
        'WHERE `d`.`id` IS NULL'
    );
    expect(rendered.params).toEqual([NOW, NOW]);
  });

  it('renders the set-based update of matched rows', () => {
    const rendered = renderStatement({
      kind: 'merge-update',
      target: 'reservation',
      staging: 'reservation_staging_1_2',
      keyColumns: ['pnr', 'flight_id'],
      columns: ['seat', 'status'],
      updatedColumn: 'updated_at',
      now: NOW,
    });

    expect(rendered.sql).toBe(
      'UPDATE `reservation` AS `d` JOIN `reservation_staging_1_2` AS `s` ' +
        'ON `d`.`pnr` = `s`.`pnr` AND `d`.`flight_id` = `s`.`flight_id` ' +
        'SET `d`.`seat` = `s`.`seat`, `d`.`status` = `s`.`status`, `d`.`updated_at` = ?'
    );
    expect(rendered.params).toEqual([NOW]);
  });

  it('drops tables idempotently', () => {
    expect(renderStatement({ kind: 'drop-table', table: 'reservation_staging_1_2' }).sql).toBe(
      'DROP TABLE IF EXISTS `reservation_staging_1_2`'
    );
  });
});

describe('stagingColumnType', () => {
  it('keeps plain column types', () => {
    expect(stagingColumnType('int unsigned')).toBe('int unsigned');
    expect(stagingColumnType('decimal(10, 2)')).toBe('decimal(10, 2)');
    expect(stagingColumnType(' datetime ')).toBe('datetime');
  });

  it('falls back to TEXT for anything else', () => {
    expect(stagingColumnType("enum('a','b')")).toBe('TEXT');
    expect(stagingColumnType('int; DROP TABLE x')).toBe('TEXT');
  });
});
