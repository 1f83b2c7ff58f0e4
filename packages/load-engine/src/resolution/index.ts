export { ForeignKeyResolver, describeForeignKeyFailure } from './foreign-key-resolver.js';
export type { ForeignKeyCheck, ResolutionFailureReason } from './foreign-key-resolver.js';
