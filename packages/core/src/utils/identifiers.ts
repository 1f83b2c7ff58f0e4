/**
 * SQL identifier validation
 */

import { StoreError } from '../errors/index.js';

/** Alphanumeric + underscore, must start with a letter or underscore */
export const IDENTIFIER_PATTERN = /^[A-Za-z_][A-Za-z0-9_]*$/;

/** MySQL limit for table and column names */
export const MAX_IDENTIFIER_LENGTH = 64;

export function isValidIdentifier(name: string): boolean {
  return name.length <= MAX_IDENTIFIER_LENGTH && IDENTIFIER_PATTERN.test(name);
}

/**
 * Throw unless `name` is a safe SQL identifier
 */
export function assertIdentifier(name: string, kind: string): void {
  if (!isValidIdentifier(name)) {
    throw new StoreError({
      code: 'INVALID_IDENTIFIER',
      message: `Invalid ${kind} name: "${name}". Must be alphanumeric with underscores, starting with a letter or underscore.`,
      suggestion: `Use only valid SQL identifiers (at most ${MAX_IDENTIFIER_LENGTH} characters) for ${kind} names.`,
      context: { kind, name },
    });
  }
}
