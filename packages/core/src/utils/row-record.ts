/**
 * RowRecord
 *
 * Ordered, mutable field map for one row during one processing pass.
 * Absent fields and null fields are distinct: `has()` reports presence,
 * `get()` returns null for both.
 */

import type { PlainRecord, RawRecord, ScalarValue } from '../types/index.js';
import { normalizeBlank, toIntegerSafe } from './coercion.js';

export class RowRecord {
  private values: Map<string, ScalarValue>;

  private constructor(entries: Iterable<readonly [string, ScalarValue]>) {
    this.values = new Map(entries);
  }

  /**
   * Build from a source row; blank cells become null
   */
  static from(raw: RawRecord): RowRecord {
    return new RowRecord(
      Object.entries(raw).map(([field, value]) => [field, normalizeBlank(value)] as const)
    );
  }

  static fromEntries(entries: Iterable<readonly [string, ScalarValue]>): RowRecord {
    return new RowRecord(entries);
  }

  get size(): number {
    return this.values.size;
  }

  has(field: string): boolean {
    return this.values.has(field);
  }

  get(field: string): ScalarValue {
    return this.values.get(field) ?? null;
  }

  getInteger(field: string): number | null {
    return toIntegerSafe(this.values.get(field));
  }

  set(field: string, value: ScalarValue): this {
    this.values.set(field, value);
    return this;
  }

  delete(field: string): boolean {
    return this.values.delete(field);
  }

  /**
   * Rename a field in place, keeping its position.
   * No-op when `from` is absent or `to` is already present.
   */
  rename(from: string, to: string): boolean {
    if (from === to || !this.values.has(from) || this.values.has(to)) {
      return false;
    }

    this.values = new Map(
      Array.from(this.values, ([field, value]) => [field === from ? to : field, value] as const)
    );
    return true;
  }

  fields(): string[] {
    return Array.from(this.values.keys());
  }

  entries(): Array<[string, ScalarValue]> {
    return Array.from(this.values.entries());
  }

  /**
   * Fields holding a value, in record order
   */
  nonNullEntries(exclude: ReadonlySet<string> = new Set()): Array<[string, Exclude<ScalarValue, null>]> {
    const out: Array<[string, Exclude<ScalarValue, null>]> = [];
    for (const [field, value] of this.values) {
      if (value !== null && !exclude.has(field)) {
        out.push([field, value]);
      }
    }
    return out;
  }

  /**
   * New record with only the fields accepted by `predicate`, order kept
   */
  filter(predicate: (field: string, value: ScalarValue) => boolean): RowRecord {
    return new RowRecord(this.entries().filter(([field, value]) => predicate(field, value)));
  }

  clone(): RowRecord {
    return new RowRecord(this.values);
  }

  toObject(): PlainRecord {
    return Object.fromEntries(this.values);
  }
}
