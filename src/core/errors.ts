/**
 * Core error definitions - transport-agnostic
 *
 * This module contains all error classes, codes, and factory functions
 * used by the scanner, the store adapters and the CLI.
 */

export class DedupError extends Error {
  constructor(
    message: string,
    public code: string,
    public context?: Record<string, unknown>
  ) {
    super(message);
    this.name = 'DedupError';
  }

  toJSON() {
    return {
      error: this.message,
      code: this.code,
      context: this.context,
    };
  }
}

/**
 * Error codes for programmatic handling
 */
export const ErrorCodes = {
  // Configuration errors (1000-1999)
  CONFIGURATION_INVALID: 'E1000',
  INVALID_PARAMETER: 'E1001',

  // Source errors (2000-2999)
  SOURCE_UNAVAILABLE: 'E2000',
  NOT_FOUND: 'E2001',

  // Elimination errors (3000-3999)
  DELETE_FAILED: 'E3000',
  HASH_COLLISION_SUSPECTED: 'E3001',

  // Checkpoint errors (4000-4999)
  CHECKPOINT_MISMATCH: 'E4000',
  CHECKPOINT_CORRUPT: 'E4001',

  // System errors (5000-5999)
  UNKNOWN_ERROR: 'E5000',
  INTERNAL_ERROR: 'E5001',
  TIMEOUT: 'E5002',
} as const;

export type ErrorCode = (typeof ErrorCodes)[keyof typeof ErrorCodes];

// =============================================================================
// SPECIALIZED ERROR CLASSES
// =============================================================================

/**
 * Invalid or inconsistent scan configuration. Fatal at startup.
 */
export class ConfigurationInvalidError extends DedupError {
  constructor(
    public readonly issues: string[],
    context?: Record<string, unknown>
  ) {
    super(
      `Configuration invalid:\n${issues.map((issue) => `  - ${issue}`).join('\n')}`,
      ErrorCodes.CONFIGURATION_INVALID,
      { ...context, issues }
    );
    this.name = 'ConfigurationInvalidError';
  }
}

/**
 * The backing store could not be read. The context carries the last
 * consumed sort-key position so the scan can resume from it.
 */
export class SourceUnavailableError extends DedupError {
  constructor(
    message: string,
    public readonly position: { timestamp: number; id: string } | null,
    context?: Record<string, unknown>
  ) {
    super(message, ErrorCodes.SOURCE_UNAVAILABLE, { ...context, position });
    this.name = 'SourceUnavailableError';
  }
}

/**
 * A single delete was rejected or timed out.
 */
export class DeleteFailedError extends DedupError {
  constructor(
    public readonly documentId: string,
    reason: string,
    context?: Record<string, unknown>
  ) {
    super(`Delete failed for ${documentId}: ${reason}`, ErrorCodes.DELETE_FAILED, {
      ...context,
      documentId,
    });
    this.name = 'DeleteFailedError';
  }
}

/**
 * Members of one fingerprint group turned out to have different content.
 */
export class HashCollisionSuspectedError extends DedupError {
  constructor(
    public readonly fingerprint: string,
    public readonly partitions: string[][],
    context?: Record<string, unknown>
  ) {
    super(
      `Hash collision suspected for ${fingerprint}: group split into ${partitions.length} partitions`,
      ErrorCodes.HASH_COLLISION_SUSPECTED,
      { ...context, fingerprint, partitions }
    );
    this.name = 'HashCollisionSuspectedError';
  }
}

/**
 * Timeout error
 */
export class TimeoutError extends DedupError {
  constructor(
    public readonly operation: string,
    public readonly timeoutMs: number,
    context?: Record<string, unknown>
  ) {
    super(`Operation '${operation}' timed out after ${timeoutMs}ms`, ErrorCodes.TIMEOUT, {
      ...context,
      operation,
      timeoutMs,
    });
    this.name = 'TimeoutError';
  }
}

/**
 * A checkpoint was written by a scan with a different configuration.
 */
export class CheckpointMismatchError extends DedupError {
  constructor(expected: string, actual: string) {
    super(
      'Checkpoint was written with a different scan configuration',
      ErrorCodes.CHECKPOINT_MISMATCH,
      {
        expected,
        actual,
        suggestion: 'Start a fresh scan or restore the original configuration before resuming',
      }
    );
    this.name = 'CheckpointMismatchError';
  }
}

// =============================================================================
// FACTORIES
// =============================================================================

/**
 * Create a configuration error for a single field with an optional suggestion
 */
export function createConfigurationError(
  field: string,
  message: string,
  suggestion?: string
): ConfigurationInvalidError {
  return new ConfigurationInvalidError(
    [`${field}: ${message}${suggestion ? `. Suggestion: ${suggestion}` : ''}`],
    { field, suggestion }
  );
}

/**
 * Create an invalid parameter error (CLI input, malformed documents)
 */
export function createInvalidParameterError(parameter: string, reason: string): DedupError {
  return new DedupError(`Invalid ${parameter}: ${reason}`, ErrorCodes.INVALID_PARAMETER, {
    parameter,
  });
}

/**
 * Create a corrupt checkpoint error
 */
export function createCheckpointCorruptError(path: string, reason: string): DedupError {
  return new DedupError(
    `Checkpoint at ${path} is unreadable: ${reason}`,
    ErrorCodes.CHECKPOINT_CORRUPT,
    {
      path,
      suggestion: 'Delete the checkpoint file to start a fresh scan',
    }
  );
}
