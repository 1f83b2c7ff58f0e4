import { describe, expect, it } from 'vitest';
import { StoreError, errorMessage, isStoreError } from '../src/errors/store-error.js';

describe('StoreError', () => {
  it('renders source, table and suggestion on separate lines', () => {
    const error = new StoreError({
      code: 'SCHEMA_MISMATCH',
      message: 'Table has no columns',
      sourceId: 'destination',
      suggestion: 'Check the table name.',
      context: { table: 'flight' },
    });

    expect(error.toActionableMessage()).toBe(
      [
        'Error [SCHEMA_MISMATCH]: Table has no columns',
        'Source: destination',
        'Table: flight',
        'Suggested action: Check the table name.',
      ].join('\n')
    );
  });

  it('narrows by code', () => {
    const error = new StoreError({ code: 'NOT_FOUND', message: 'File not found: gate.csv' });

    expect(isStoreError(error)).toBe(true);
    expect(isStoreError(error, 'NOT_FOUND')).toBe(true);
    expect(isStoreError(error, 'READ_FAILED')).toBe(false);
    expect(isStoreError(new Error('plain'))).toBe(false);
  });

  it('reads messages from unknown thrown values', () => {
    expect(errorMessage(new Error('boom'))).toBe('boom');
    expect(errorMessage('text')).toBe('text');
  });
});
