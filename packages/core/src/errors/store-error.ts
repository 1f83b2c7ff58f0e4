/**
 * Error types raised by stores and record sources.
 * Messages are meant to be read by whoever runs the load, so every error
 * carries a code and, where one exists, a suggested fix.
 */

export type ErrorCode =
  | 'CONNECTION_FAILED'
  | 'AUTHENTICATION_FAILED'
  | 'NOT_FOUND'
  | 'PERMISSION_DENIED'
  | 'INVALID_IDENTIFIER'
  | 'SCHEMA_MISMATCH'
  | 'WRITE_FAILED'
  | 'READ_FAILED'
  | 'CONFIGURATION_ERROR'
  | 'UNKNOWN';

export interface StoreErrorDetails {
  /** Error code for programmatic handling */
  code: ErrorCode;
  /** Human-readable message */
  message: string;
  /** Store or source that raised the error */
  sourceId?: string;
  /** Suggested action to resolve */
  suggestion?: string;
  /** Original error (if wrapping) */
  cause?: Error;
  /** Additional context */
  context?: Record<string, unknown>;
}

export class StoreError extends Error {
  readonly code: ErrorCode;
  readonly sourceId?: string;
  readonly suggestion?: string;
  readonly context?: Record<string, unknown>;

  constructor(details: StoreErrorDetails) {
    super(details.message);
    this.name = 'StoreError';
    this.code = details.code;
    this.sourceId = details.sourceId;
    this.suggestion = details.suggestion;
    this.context = details.context;

    if (details.cause) {
      this.cause = details.cause;
    }

    // Maintains proper stack trace in V8 environments
    Error.captureStackTrace(this, StoreError);
  }

  /**
   * Structured, actionable message for logs and CLI output
   */
  toActionableMessage(): string {
    const lines = [`Error [${this.code}]: ${this.message}`];
    if (this.sourceId) lines.push(`Source: ${this.sourceId}`);
    const table = this.context?.table;
    if (typeof table === 'string') lines.push(`Table: ${table}`);
    if (this.suggestion) lines.push(`Suggested action: ${this.suggestion}`);
    return lines.join('\n');
  }

  toJSON(): Record<string, unknown> {
    return {
      name: this.name,
      code: this.code,
      message: this.message,
      sourceId: this.sourceId,
      suggestion: this.suggestion,
      context: this.context,
    };
  }
}

export function isStoreError(error: unknown, code?: ErrorCode): error is StoreError {
  return error instanceof StoreError && (code === undefined || error.code === code);
}

/**
 * Message of an unknown thrown value
 */
export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
