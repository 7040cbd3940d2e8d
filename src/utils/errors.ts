/**
 * Error types and codes for optbind.
 * Everything optbind throws extends OptbindError. Resolution problems found in
 * user input are not thrown; they are returned as structured data in a
 * ResolutionOutcome (see core/resolution/types.ts).
 */

/**
 * Base error class for all optbind errors.
 */
export class OptbindError extends Error {
  constructor(
    public readonly code: string,
    message: string,
    public readonly details?: Record<string, unknown>
  ) {
    super(message);
    this.name = 'OptbindError';
    Error.captureStackTrace(this, this.constructor);
  }

  toJSON(): Record<string, unknown> {
    return {
      name: this.name,
      code: this.code,
      message: this.message,
      details: this.details,
    };
  }
}

/**
 * Option declarations that cannot be registered (duplicate keys, bad names,
 * a strategy that does not fit the arity).
 */
export class DeclarationError extends OptbindError {
  constructor(code: string, message: string, details?: Record<string, unknown>) {
    super(code, message, details);
    this.name = 'DeclarationError';
  }
}

/**
 * Configuration-related errors (loading, parsing, validation).
 */
export class ConfigError extends OptbindError {
  constructor(code: string, message: string, details?: Record<string, unknown>) {
    super(code, message, details);
    this.name = 'ConfigError';
  }
}

/**
 * Raised by the throwing entry points when resolution produced errors.
 * The structured errors are kept in `details.errors`.
 */
export class ResolutionFailure extends OptbindError {
  constructor(code: string, message: string, details?: Record<string, unknown>) {
    super(code, message, details);
    this.name = 'ResolutionFailure';
  }
}

/**
 * System errors (file not found, parse errors, etc.).
 */
export class SystemError extends OptbindError {
  constructor(code: string, message: string, details?: Record<string, unknown>) {
    super(code, message, details);
    this.name = 'SystemError';
  }
}

export const ErrorCodes = {
  // Resolution errors (R001-R006)
  MISSING_VALUE: 'R001',
  UNRECOGNIZED_OPTION: 'R002',
  INVALID_VALUE: 'R003',
  AMBIGUOUS_CONSUMPTION: 'R004',
  UNEXPECTED_VALUE: 'R005',
  MISSING_REQUIRED: 'R006',
  RESOLUTION_FAILED: 'R100',

  // Declaration errors (D001-D006)
  DUPLICATE_KEY: 'D001',
  EMPTY_NAMES: 'D002',
  INVALID_NAME: 'D003',
  STRATEGY_MISMATCH: 'D004',
  MULTIPLE_CATCH_ALL: 'D005',
  INVALID_DECLARATION: 'D006',

  // Configuration errors
  CONFIG_LOAD_ERROR: 'C001',

  // System errors (S001-S002)
  PARSE_ERROR: 'S001',
  INVALID_DOCUMENT: 'S002',
} as const;

export type ErrorCode = (typeof ErrorCodes)[keyof typeof ErrorCodes];
