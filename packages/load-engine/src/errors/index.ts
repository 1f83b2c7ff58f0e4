/**
 * Error exports for load-engine
 */

export { LoadError, isLoadError } from './load-error.js';
export type { LoadErrorCode, LoadErrorDetails } from './load-error.js';
