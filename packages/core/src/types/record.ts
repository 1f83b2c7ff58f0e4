/**
 * Record types exchanged between sources, the load engine and stores
 */

/** A single typed field value */
export type ScalarValue = string | number | boolean | Date | null;

/**
 * A row as produced by a record source: field name to raw value.
 * Sources usually deliver strings; blanks may arrive as '' or be absent.
 */
export type RawRecord = Readonly<Record<string, ScalarValue | undefined>>;

/** Plain-object snapshot of a processed row */
export type PlainRecord = Record<string, ScalarValue>;
