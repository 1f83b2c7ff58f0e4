export { StoreError, isStoreError, errorMessage } from './store-error.js';
export type { ErrorCode, StoreErrorDetails } from './store-error.js';
