import { describe, expect, it } from 'vitest';
import { Logger, tableLoadSpecSchema, type TableLoadSpecInput } from '@rowgate/core';
import { ForeignKeyResolver } from '../src/resolution/index.js';
import { SchemaRegistry } from '../src/schema/index.js';
import { loadTable, prepareRow } from '../src/upsert/index.js';
import { InMemoryStore } from './support/in-memory-store.js';

function airportStore(): InMemoryStore {
  return new InMemoryStore()
    .createTable('gate', ['id', 'code', { name: 'is_open', type: 'tinyint(1)' }])
    .createTable('flight', ['id', 'code', 'gate_id', { name: 'is_delayed', type: 'tinyint(1)' }])
    .insertRows('gate', [{ id: 1, code: 'A1', is_open: true }]);
}

const flightSpec = tableLoadSpecSchema.parse({
  table: 'flight',
  foreignKeys: [{ column: 'gate_id', referencedTable: 'gate' }],
});

function load(
  store: InMemoryStore,
  specInput: TableLoadSpecInput,
  records: Array<Record<string, string>>,
  logger?: Logger
) {
  const spec = tableLoadSpecSchema.parse(specInput);
  return store.withTransaction((tx) =>
    loadTable(spec, records, {
      registry: new SchemaRegistry(store),
      resolver: new ForeignKeyResolver(),
      executor: tx,
      logger: logger ?? new Logger({ sink: () => {} }),
      phase: 'master',
    })
  );
}

describe('prepareRow', () => {
  it('coerces identifiers, flags and blanks before projecting', async () => {
    const store = airportStore();
    const schema = await store.getTableSchema('flight');

    const { record, dropped } = prepareRow(
      { id: '3.0', code: 'RG1', gate_id: ' 7 ', is_delayed: 'yes', extra: 'x', notes: '' },
      flightSpec,
      schema
    );

    expect(record.toObject()).toEqual({ id: 3, code: 'RG1', gate_id: 7, is_delayed: true });
    expect(dropped).toEqual(['extra', 'notes']);
  });

  it('leaves values that are not recognisably boolean untouched', async () => {
    const store = airportStore();
    const schema = await store.getTableSchema('flight');

    const { record } = prepareRow({ code: 'RG1', is_delayed: 'maybe' }, flightSpec, schema);

    expect(record.get('is_delayed')).toBe('maybe');
  });

  it('applies aliases before projecting', async () => {
    const store = airportStore();
    const schema = await store.getTableSchema('flight');
    const spec = tableLoadSpecSchema.parse({ table: 'flight', aliases: { flight_code: 'code' } });

    const { record } = prepareRow({ flight_code: 'RG9' }, spec, schema);

    expect(record.toObject()).toEqual({ code: 'RG9' });
  });
});

describe('loadTable', () => {
  it('updates existing ids and inserts the rest', async () => {
    const store = airportStore().insertRows('flight', [
      { id: 5, code: 'RG5', gate_id: 1, is_delayed: false },
    ]);

    const result = await load(
      store,
      { table: 'flight', foreignKeys: [{ column: 'gate_id', referencedTable: 'gate', optional: true }] },
      [
        { id: '5', code: 'RG5X', gate_id: '', is_delayed: '' },
        { code: 'RG6', gate_id: '1' },
        { id: '20', code: 'RG20', gate_id: '1' },
      ]
    );

    expect(result.counters).toMatchObject({ inserted: 2, updated: 1, skipped: 0, invalid: 0 });
    expect(store.statementsOfKind('update')).toEqual([
      { kind: 'update', table: 'flight', set: [['code', 'RG5X']], where: { column: 'id', value: 5 } },
    ]);
    expect(store.statementsOfKind('insert').map((s) => s.values)).toEqual([
      [
        ['code', 'RG6'],
        ['gate_id', 1],
      ],
      [
        ['id', 20],
        ['code', 'RG20'],
        ['gate_id', 1],
      ],
    ]);
    expect(store.rows('flight')).toEqual([
      { id: 5, code: 'RG5X', gate_id: 1, is_delayed: false },
      { id: 6, code: 'RG6', gate_id: 1, is_delayed: null },
      { id: 20, code: 'RG20', gate_id: 1, is_delayed: null },
    ]);
  });

  it('quarantines rows whose references do not resolve and never writes them', async () => {
    const store = airportStore();

    const result = await load(
      store,
      { table: 'flight', foreignKeys: [{ column: 'gate_id', referencedTable: 'gate' }] },
      [{ code: 'OK', gate_id: '1' }, { code: 'R99', gate_id: '99' }, { code: 'RX', gate_id: 'abc' }, { code: 'RN' }]
    );

    expect(result.counters).toMatchObject({ inserted: 1, invalid: 3 });
    expect(result.quarantine).toEqual([
      {
        table: 'flight',
        record: { code: 'R99', gate_id: 99 },
        failure: { kind: 'validation', reason: 'gate_id=99 not found in gate', column: 'gate_id' },
      },
      {
        table: 'flight',
        record: { code: 'RX', gate_id: null },
        failure: {
          kind: 'validation',
          reason: 'foreign key column gate_id is empty or not an integer',
          column: 'gate_id',
        },
      },
      {
        table: 'flight',
        record: { code: 'RN' },
        failure: { kind: 'validation', reason: 'foreign key column gate_id is missing', column: 'gate_id' },
      },
    ]);
    expect(store.statementsOfKind('insert')).toHaveLength(1);
    expect(store.rows('flight').map((row) => row.code)).toEqual(['OK']);
  });

  it('keeps skip reasons apart', async () => {
    const store = airportStore();

    const upsert = await load(store, { table: 'gate' }, [{ id: '1' }, { code: '' }]);
    expect(upsert.counters).toEqual({
      inserted: 0,
      updated: 0,
      skipped: 2,
      invalid: 0,
      skippedByReason: { 'no-changes': 1, 'already-exists': 0, 'empty-record': 1 },
    });

    const insertOnly = await load(store, { table: 'gate', mode: 'insert-only' }, [{ id: '1', code: 'Z9' }]);
    expect(insertOnly.counters.skippedByReason['already-exists']).toBe(1);
    expect(store.rows('gate')).toEqual([{ id: 1, code: 'A1', is_open: true }]);
  });

  it('quarantines a failed write and continues with the batch', async () => {
    const store = airportStore().failWhen(
      (s) => s.kind === 'insert' && s.values.some(([column, value]) => column === 'code' && value === 'BAD'),
      'Data too long for column code'
    );
    const lines: string[] = [];
    const logger = new Logger({ level: 'warn', sink: (line) => lines.push(line) });

    const result = await load(store, { table: 'gate' }, [{ code: 'BAD' }, { code: 'B2' }], logger);

    expect(result.counters).toMatchObject({ inserted: 1, invalid: 1 });
    expect(result.quarantine[0]?.failure).toEqual({ kind: 'write', reason: 'Data too long for column code' });
    expect(store.rows('gate').map((row) => row.code)).toEqual(['A1', 'B2']);
    expect(lines).toHaveLength(1);
    expect(lines[0]).toMatch(
      /WARN Row quarantined table=gate phase=master row=1 kind=write reason=Data too long for column code record=\{"code":"BAD"\}$/
    );
  });

  it('reaches the same state when the batch is loaded twice', async () => {
    const store = airportStore();
    const batch = [
      { id: '2', code: 'B2', is_open: 'no' },
      { id: '3', code: 'C3', is_open: 'yes' },
    ];

    const first = await load(store, { table: 'gate' }, batch);
    const afterFirst = structuredClone(store.rows('gate'));
    const second = await load(store, { table: 'gate' }, batch);

    expect(first.counters).toMatchObject({ inserted: 2, updated: 0 });
    expect(second.counters).toMatchObject({ inserted: 0, updated: 2 });
    expect(store.rows('gate')).toEqual(afterFirst);
    expect(afterFirst).toEqual([
      { id: 1, code: 'A1', is_open: true },
      { id: 2, code: 'B2', is_open: false },
      { id: 3, code: 'C3', is_open: true },
    ]);
  });

  it('keys updates on the primary key when no id column is declared', async () => {
    const store = new InMemoryStore()
      .createTable('crew', [{ name: 'crew_id', primaryKey: true }, 'name'])
      .insertRows('crew', [{ crew_id: 4, name: 'Ana' }]);

    const result = await load(store, { table: 'crew' }, [
      { crew_id: '4', name: 'Ana B' },
      { crew_id: '9', name: 'Ben' },
    ]);

    expect(result.counters).toMatchObject({ inserted: 1, updated: 1 });
    expect(store.statementsOfKind('update')[0]?.where).toEqual({ column: 'crew_id', value: 4 });
    expect(store.rows('crew')).toEqual([
      { crew_id: 4, name: 'Ana B' },
      { crew_id: 9, name: 'Ben' },
    ]);
  });

  it('fails the table when its schema cannot be read', async () => {
    const store = airportStore().failSchemaFor('gate');

    await expect(load(store, { table: 'gate' }, [{ code: 'X' }])).rejects.toMatchObject({
      code: 'SCHEMA_FETCH_FAILED',
      table: 'gate',
    });
  });
});
