import { DedupError, ErrorCodes } from '../core/errors.js';
import { createComponentLogger } from './logger.js';

const logger = createComponentLogger('error-mapper');

export interface MappedError {
  message: string;
  code: string;
  exitCode: number; // Process exit code hint
  details?: Record<string, unknown>;
}

/**
 * Map any error to a standardized internal format
 */
export function mapError(error: unknown): MappedError {
  // 1. Handle known DedupError
  if (error instanceof DedupError) {
    return {
      message: error.message,
      code: error.code,
      exitCode: getExitCodeForErrorCode(error.code),
      details: error.context,
    };
  }

  // 2. Handle standard errors
  if (error instanceof Error) {
    const message = error.message;

    // Node filesystem errors surface as plain Errors with a code property
    if ('code' in error && error.code === 'ENOENT') {
      return {
        message,
        code: ErrorCodes.NOT_FOUND,
        exitCode: getExitCodeForErrorCode(ErrorCodes.NOT_FOUND),
      };
    }
    if (error instanceof SyntaxError) {
      return {
        message,
        code: ErrorCodes.INVALID_PARAMETER,
        exitCode: getExitCodeForErrorCode(ErrorCodes.INVALID_PARAMETER),
      };
    }

    logger.warn({ error: message }, 'Unmapped internal error');
    return {
      message,
      code: ErrorCodes.INTERNAL_ERROR,
      exitCode: 1,
    };
  }

  // 3. Fallback
  logger.warn({ error: String(error) }, 'Unmapped unknown error');
  return {
    message: String(error),
    code: ErrorCodes.UNKNOWN_ERROR,
    exitCode: 1,
  };
}

/**
 * Exit codes: 2 for bad input or configuration, 3 for an unreachable or
 * unreadable source, 4 for checkpoint problems, 1 otherwise.
 */
export function getExitCodeForErrorCode(code: string): number {
  switch (code) {
    case ErrorCodes.CONFIGURATION_INVALID:
    case ErrorCodes.INVALID_PARAMETER:
    case ErrorCodes.NOT_FOUND:
      return 2;

    case ErrorCodes.SOURCE_UNAVAILABLE:
    case ErrorCodes.TIMEOUT:
      return 3;

    case ErrorCodes.CHECKPOINT_MISMATCH:
    case ErrorCodes.CHECKPOINT_CORRUPT:
      return 4;

    default:
      return 1;
  }
}
