/**
 * Record sources deliver raw rows for one destination table
 */

import type { RawRecord } from '../types/index.js';

export interface RecordSourceConfig {
  /** Unique identifier for this source */
  id: string;
  /** Human-readable name, usually the destination table */
  name: string;
}

export interface RecordSource<TConfig extends RecordSourceConfig = RecordSourceConfig> {
  readonly config: TConfig;

  /**
   * Read every row of the source in order
   * @throws StoreError if the source cannot be read
   */
  readRecords(): Promise<RawRecord[]>;

  /** Whether the underlying file or sheet is available */
  exists(): Promise<boolean>;
}
