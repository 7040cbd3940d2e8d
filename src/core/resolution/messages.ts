/**
 * One-line English renderings of resolution errors, for CLI output.
 */
import { ErrorCodes, type ErrorCode } from '../../utils/errors.js';
import type { ResolutionError, ResolutionErrorKind } from './types.js';

const CODES: Record<ResolutionErrorKind, ErrorCode> = {
  MissingValue: ErrorCodes.MISSING_VALUE,
  UnrecognizedOption: ErrorCodes.UNRECOGNIZED_OPTION,
  InvalidValue: ErrorCodes.INVALID_VALUE,
  AmbiguousConsumption: ErrorCodes.AMBIGUOUS_CONSUMPTION,
  UnexpectedValue: ErrorCodes.UNEXPECTED_VALUE,
  MissingRequired: ErrorCodes.MISSING_REQUIRED,
};

export function errorCode(error: ResolutionError): ErrorCode {
  return CODES[error.kind];
}

export function formatResolutionError(error: ResolutionError): string {
  switch (error.kind) {
    case 'MissingValue':
      return `Missing value for '${error.token}' (expected at position ${error.expectedAt})`;
    case 'UnrecognizedOption':
      return `Unknown option '${error.token}' at position ${error.position}`;
    case 'InvalidValue':
      return `Invalid value '${error.token}' for '${error.names[0] ?? error.key}': ${error.reason}`;
    case 'AmbiguousConsumption':
      return `'${error.token}' at position ${error.position} is declared by several options: ${error.keys.join(', ')}`;
    case 'UnexpectedValue':
      return `'${error.names[0] ?? error.key}' does not take a value ('${error.token}' at position ${error.position})`;
    case 'MissingRequired':
      return `Missing required option '${error.names[0] ?? error.key}'`;
  }
}
