/**
 * Value coercion for raw source values.
 *
 * Every function here is pure and total: unrecognised input degrades to
 * null instead of throwing.
 */

import type { ScalarValue } from '../types/index.js';

/** Decimal or exponent notation, e.g. `3`, `-2.90`, `.5`, `1e3` */
const NUMERIC_PATTERN = /^[+-]?(\d+(\.\d*)?|\.\d+)([eE][+-]?\d+)?$/;

export const TRUTHY_VALUES: ReadonlySet<string> = new Set([
  '1',
  'true',
  't',
  'yes',
  'y',
  // locale affirmatives
  'si',
  'sí',
]);

export const FALSY_VALUES: ReadonlySet<string> = new Set(['0', 'false', 'f', 'no', 'n']);

function truncateToSafeInteger(value: number): number | null {
  if (!Number.isFinite(value)) return null;
  const truncated = Math.trunc(value);
  if (!Number.isSafeInteger(truncated)) return null;
  // Math.trunc(-0.4) is -0
  return truncated === 0 ? 0 : truncated;
}

/**
 * Coerce an identifier-like value to an integer.
 *
 * Strings are trimmed; numeric strings (including `"3.0"`) are truncated.
 */
export function toIntegerSafe(value: ScalarValue | undefined): number | null {
  if (value === null || value === undefined) return null;

  if (typeof value === 'number') {
    return truncateToSafeInteger(value);
  }

  if (typeof value !== 'string') return null;

  const trimmed = value.trim();
  if (trimmed === '' || !NUMERIC_PATTERN.test(trimmed)) return null;

  return truncateToSafeInteger(Number(trimmed));
}

/**
 * Coerce a flag-like value to a boolean, case-insensitively.
 *
 * Returns null for anything outside the truthy/falsy sets; callers keep the
 * original value in that case.
 */
export function toBooleanSafe(value: ScalarValue | undefined): boolean | null {
  if (value === null || value === undefined) return null;
  if (typeof value === 'boolean') return value;

  if (typeof value === 'number') {
    if (value === 1) return true;
    if (value === 0) return false;
    return null;
  }

  if (typeof value !== 'string') return null;

  const normalized = value.trim().toLowerCase();
  if (TRUTHY_VALUES.has(normalized)) return true;
  if (FALSY_VALUES.has(normalized)) return false;
  return null;
}

/**
 * Blank source cells become null
 */
export function normalizeBlank(value: ScalarValue | undefined): ScalarValue {
  if (value === undefined || value === '') return null;
  return value;
}
