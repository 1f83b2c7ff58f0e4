import { describe, expect, it } from 'vitest';
import { formatRunReport } from '../src/formatters/index.js';
import { createCounters, type QuarantineEntry, type RunReport } from '../src/types/index.js';

const rejected: QuarantineEntry = {
  table: 'reservation',
  record: { pnr: 'AB123', flight_id: 99 },
  failure: { kind: 'validation', reason: 'flight_id=99 not found in flight', column: 'flight_id' },
};

function report(overrides: Partial<RunReport> = {}): RunReport {
  return {
    runId: 'run-1',
    startedAt: new Date('2024-05-01T10:00:00.000Z'),
    finishedAt: new Date('2024-05-01T10:00:02.345Z'),
    tables: [],
    quarantine: new Map(),
    ...overrides,
  };
}

describe('formatRunReport', () => {
  it('renders tables, merge, quarantine and failures', () => {
    const text = formatRunReport(
      report({
        tables: [
          {
            table: 'flight',
            phase: 'master',
            status: 'completed',
            counters: { ...createCounters(), inserted: 3, updated: 1, skipped: 2 },
            quarantine: [],
          },
          {
            table: 'baggage',
            phase: 'dependent',
            status: 'rolled-back',
            counters: createCounters(),
            quarantine: [],
            error: 'dependent phase rolled back: Deadlock found',
          },
        ],
        merge: {
          table: 'reservation',
          status: 'completed',
          received: 4,
          duplicatesDropped: 1,
          staged: 2,
          invalidCount: 1,
          insertedApprox: 2,
          updatedApprox: null,
          quarantine: [rejected],
          stagingTable: 'reservation_staging_42_1714557600',
          cleanupError: 'Could not drop staging table reservation_staging_42_1714557600: Lock wait timeout exceeded',
        },
        quarantine: new Map([['reservation', [rejected]]]),
      })
    );

    expect(text).toBe(
      [
        '## Load Run Report',
        'Run: run-1',
        'Started: 2024-05-01T10:00:00.000Z',
        'Duration: 2.3s',
        '',
        '### Tables',
        '| Table | Phase | Status | Inserted | Updated | Skipped | Invalid |',
        '|---|---|---|---|---|---|---|',
        '| flight | master | completed | 3 | 1 | 2 | 0 |',
        '| baggage | dependent | rolled-back | 0 | 0 | 0 | 0 |',
        '',
        '### Merge: reservation (completed)',
        '- Received: 4',
        '- Duplicates dropped: 1',
        '- Staged: 2',
        '- Invalid: 1',
        '- Inserted: ~2',
        '- Updated: unknown',
        '- Cleanup: Could not drop staging table reservation_staging_42_1714557600: Lock wait timeout exceeded',
        '',
        '### Quarantine',
        '- reservation: 1 row',
        '',
        '### Failures',
        '- baggage: dependent phase rolled back: Deadlock found',
      ].join('\n')
    );
  });

  it('renders only the header for an empty run', () => {
    expect(formatRunReport(report())).toBe(
      ['## Load Run Report', 'Run: run-1', 'Started: 2024-05-01T10:00:00.000Z', 'Duration: 2.3s'].join('\n')
    );
  });
});
