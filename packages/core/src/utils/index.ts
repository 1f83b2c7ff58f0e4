export {
  toIntegerSafe,
  toBooleanSafe,
  normalizeBlank,
  TRUTHY_VALUES,
  FALSY_VALUES,
} from './coercion.js';
export { RowRecord } from './row-record.js';
export {
  IDENTIFIER_PATTERN,
  MAX_IDENTIFIER_LENGTH,
  isValidIdentifier,
  assertIdentifier,
} from './identifiers.js';
export { extractFieldNames } from './records.js';
