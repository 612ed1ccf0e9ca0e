// Error types shared by every package

/**
 * Base class for all permsync errors.
 * Provides a stable code for logging and exit-status decisions.
 */
export class PermsyncError extends Error {
  readonly code: string;

  constructor(code: string, message: string) {
    super(message);
    this.name = 'PermsyncError';
    this.code = code;
  }
}

/**
 * Validation error for malformed or invalid input.
 */
export class ValidationError extends PermsyncError {
  readonly field?: string;
  readonly details?: Record<string, unknown>;

  constructor(
    message: string,
    options?: { field?: string; details?: Record<string, unknown> }
  ) {
    super('VALIDATION_ERROR', message);
    this.name = 'ValidationError';
    this.field = options?.field;
    this.details = options?.details;
  }
}

/**
 * Type guard for errors carrying a permsync code.
 */
export function isPermsyncError(error: unknown): error is PermsyncError {
  return error instanceof PermsyncError;
}

/**
 * Message of any thrown value, for logs.
 */
export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
