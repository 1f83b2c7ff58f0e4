/**
 * @rowgate/core
 *
 * Shared types, store interfaces, errors, logging and value coercion
 * for the rowgate loader
 */

// Types
export * from './types/index.js';

// Interfaces
export * from './interfaces/index.js';

// Errors
export * from './errors/index.js';

// Logging
export * from './logging/index.js';

// Validation schemas
export * from './validation/index.js';

// Utilities
export * from './utils/index.js';
