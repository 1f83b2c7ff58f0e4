/**
 * Load engine error types
 *
 * Row-level failures are reported as RowOutcome values; LoadError is for
 * faults that stop a table, a merge batch or a whole run.
 */

export type LoadErrorCode =
  | 'SCHEMA_FETCH_FAILED'
  | 'BULK_LOAD_FAILED'
  | 'MERGE_FAILED'
  | 'CLEANUP_FAILED'
  | 'INVALID_OPTIONS'
  | 'MISSING_REQUIRED_COLUMN'
  | 'DEPENDENCY_CYCLE'
  | 'PHASE_FAILED';

export interface LoadErrorDetails {
  code: LoadErrorCode;
  message: string;
  /** Destination table the fault belongs to */
  table?: string;
  suggestion?: string;
  cause?: Error;
  context?: Record<string, unknown>;
}

export class LoadError extends Error {
  readonly code: LoadErrorCode;
  readonly table?: string;
  readonly suggestion?: string;
  readonly context?: Record<string, unknown>;

  constructor(details: LoadErrorDetails) {
    super(details.message);
    this.name = 'LoadError';
    this.code = details.code;
    this.table = details.table;
    this.suggestion = details.suggestion;
    this.context = details.context;

    if (details.cause) {
      this.cause = details.cause;
    }
  }

  /**
   * Format error for log and CLI output
   */
  toActionableMessage(): string {
    const parts = [`Error [${this.code}]: ${this.message}`];
    if (this.table) {
      parts.push(`Table: ${this.table}`);
    }
    if (this.suggestion) {
      parts.push(`Suggested action: ${this.suggestion}`);
    }
    return parts.join('\n');
  }

  toJSON(): Record<string, unknown> {
    return {
      name: this.name,
      code: this.code,
      message: this.message,
      table: this.table,
      suggestion: this.suggestion,
      context: this.context,
    };
  }
}

export function isLoadError(error: unknown, code?: LoadErrorCode): error is LoadError {
  return error instanceof LoadError && (code === undefined || error.code === code);
}
