/**
 * Utility functions for working with plain records
 */

/**
 * Extract all unique field names from an array of records, in first-seen order
 */
export function extractFieldNames(records: ReadonlyArray<object>): string[] {
  const fields = new Set<string>();
  for (const record of records) {
    for (const key of Object.keys(record)) {
      fields.add(key);
    }
  }
  return Array.from(fields);
}
