export {
  identifierSchema,
  foreignKeyConstraintSchema,
  tableLoadSpecSchema,
  timestampCandidatesSchema,
  naturalKeyMergeSpecSchema,
  loadPlanSchema,
  formatZodIssues,
  DEFAULT_CREATED_COLUMNS,
  DEFAULT_UPDATED_COLUMNS,
} from './schemas.js';
export type {
  ForeignKeyConstraint,
  ForeignKeyConstraintInput,
  TableLoadSpec,
  TableLoadSpecInput,
  NaturalKeyMergeSpec,
  NaturalKeyMergeSpecInput,
  LoadPlan,
  LoadPlanInput,
} from './schemas.js';
