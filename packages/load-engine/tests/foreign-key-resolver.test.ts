import { describe, expect, it } from 'vitest';
import { RowRecord, foreignKeyConstraintSchema } from '@rowgate/core';
import { ForeignKeyResolver } from '../src/resolution/index.js';
import { InMemoryStore } from './support/in-memory-store.js';

function flightStore(): InMemoryStore {
  return new InMemoryStore()
    .createTable('flight', ['id', 'code'])
    .insertRows('flight', [
      { id: 10, code: 'RG10' },
      { id: 11, code: 'RG11' },
    ]);
}

const flightKey = foreignKeyConstraintSchema.parse({ column: 'flight_id', referencedTable: 'flight' });

describe('ForeignKeyResolver', () => {
  it('loads each referenced table with one query', async () => {
    const store = flightStore();
    const resolver = new ForeignKeyResolver();
    const executor = store.executor();

    expect(await resolver.resolves('flight', 11, executor)).toBe(true);
    expect(await resolver.resolves('flight', '10', executor)).toBe(true);
    expect(await resolver.resolves('flight', 99, executor)).toBe(false);

    expect(store.statementsOfKind('select-ids')).toEqual([
      { kind: 'select-ids', table: 'flight', column: 'id' },
    ]);
    expect(resolver.cachedTables()).toEqual(['flight']);
  });

  it('never resolves null or non-integer ids', async () => {
    const store = flightStore();
    const resolver = new ForeignKeyResolver();

    expect(await resolver.resolves('flight', null, store.executor())).toBe(false);
    expect(await resolver.resolves('flight', 'abc', store.executor())).toBe(false);
    expect(store.executed).toHaveLength(0);
  });

  it('gates rows against a seeded id set', async () => {
    const store = new InMemoryStore();
    const resolver = new ForeignKeyResolver();
    resolver.seed('flight', [10, 11]);

    const valid = RowRecord.fromEntries([['flight_id', 11]]);
    const unknown = RowRecord.fromEntries([['flight_id', 99]]);
    const empty = RowRecord.fromEntries([['flight_id', null]]);

    expect(await resolver.validate(valid, [flightKey], store.executor())).toEqual({
      valid: true,
      nullified: [],
    });
    expect(await resolver.validate(unknown, [flightKey], store.executor())).toEqual({
      valid: false,
      column: 'flight_id',
      referencedTable: 'flight',
      reason: 'unresolved',
      value: 99,
    });
    expect(await resolver.validate(empty, [flightKey], store.executor())).toMatchObject({
      valid: false,
      reason: 'null',
    });
    expect(store.executed).toHaveLength(0);
  });

  it('reports a missing constraint column', async () => {
    const resolver = new ForeignKeyResolver();
    resolver.seed('flight', [10]);

    const check = await resolver.validate(
      RowRecord.fromEntries([['code', 'RG10']]),
      [flightKey],
      new InMemoryStore().executor()
    );

    expect(check).toMatchObject({ valid: false, column: 'flight_id', reason: 'missing' });
  });

  it('lets optional references through and nullifies unresolved ones on request', async () => {
    const resolver = new ForeignKeyResolver();
    resolver.seed('gate', [1]);
    const gateKey = foreignKeyConstraintSchema.parse({
      column: 'gate_id',
      referencedTable: 'gate',
      optional: true,
      onUnresolved: 'nullify',
    });
    const executor = new InMemoryStore().executor();

    const absent = RowRecord.fromEntries([['code', 'RG10']]);
    expect(await resolver.validate(absent, [gateKey], executor)).toEqual({ valid: true, nullified: [] });

    const unresolved = RowRecord.fromEntries([['gate_id', 7]]);
    expect(await resolver.validate(unresolved, [gateKey], executor)).toEqual({
      valid: true,
      nullified: ['gate_id'],
    });
    expect(unresolved.get('gate_id')).toBeNull();
  });

  it('stops at the first failing constraint', async () => {
    const store = flightStore().createTable('gate', ['id']).insertRows('gate', [{ id: 1 }]);
    const resolver = new ForeignKeyResolver();
    const gateKey = foreignKeyConstraintSchema.parse({ column: 'gate_id', referencedTable: 'gate' });

    const check = await resolver.validate(
      RowRecord.fromEntries([
        ['flight_id', 99],
        ['gate_id', 1],
      ]),
      [flightKey, gateKey],
      store.executor()
    );

    expect(check).toMatchObject({ valid: false, column: 'flight_id' });
    expect(store.statementsOfKind('select-ids').map((s) => s.table)).toEqual(['flight']);
  });

  it('raises a table-level error when ids cannot be loaded', async () => {
    const resolver = new ForeignKeyResolver();

    await expect(resolver.resolves('flight', 1, new InMemoryStore().executor())).rejects.toMatchObject({
      code: 'SCHEMA_FETCH_FAILED',
      table: 'flight',
    });
    expect(resolver.cachedTables()).toEqual([]);
  });

  it('adds ids inserted during the run only to cached tables', async () => {
    const store = flightStore();
    const resolver = new ForeignKeyResolver();
    await resolver.resolves('flight', 1, store.executor());

    resolver.noteInserted('flight', 77);
    resolver.noteInserted('gate', 3);

    expect(await resolver.resolves('flight', 77, store.executor())).toBe(true);
    expect(resolver.cachedTables()).toEqual(['flight']);
  });
});
