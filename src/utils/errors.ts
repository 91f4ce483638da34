/**
 * Standardized error types for flight-mill diagnostics.
 *
 * All errors extend from DiagnosticsError, providing:
 * - Error code for programmatic handling
 * - Cause chaining for debugging
 * - Consistent error messages
 *
 * Isolation policy, as applied by the pipeline:
 * - `InvalidSignalError` excludes a single trial
 * - `UnknownGroupingError` and `MissingBaselineError` abort a single set
 * - `MalformedAggregateError` aborts report rendering
 *
 * ## Usage
 *
 * ```typescript
 * import { InvalidSignalError } from './errors.js';
 *
 * throw new InvalidSignalError('Timestamps must be strictly increasing', 'NON_MONOTONIC');
 * ```
 *
 * @module utils/errors
 */

/**
 * Base error class for all diagnostics errors.
 *
 * Provides:
 * - `code`: Programmatic error identifier (e.g., 'NON_MONOTONIC')
 * - `cause`: Original error that caused this one (for chaining)
 * - `name`: Error class name (e.g., 'InvalidSignalError')
 */
export class DiagnosticsError extends Error {
  /** Error code for programmatic handling */
  readonly code: string;

  /** Original error that caused this one */
  readonly cause?: Error;

  constructor(message: string, code: string, cause?: unknown) {
    super(message);
    this.name = this.constructor.name;
    this.code = code;

    // Normalize cause to Error
    if (cause instanceof Error) {
      this.cause = cause;
    } else if (cause !== undefined) {
      this.cause = new Error(String(cause));
    }

    // Capture stack trace (V8 only)
    if (Error.captureStackTrace) {
      Error.captureStackTrace(this, this.constructor);
    }
  }

  /**
   * Get a formatted string including cause chain.
   */
  toDetailedString(): string {
    let result = `${this.name} [${this.code}]: ${this.message}`;

    if (this.cause) {
      result += `\n  Caused by: ${this.cause.message}`;
      if (this.cause instanceof DiagnosticsError) {
        result += ` [${this.cause.code}]`;
      }
    }

    return result;
  }
}

// ─────────────────────────────────────────────────────────────────────────────
// Trial-level Errors
// ─────────────────────────────────────────────────────────────────────────────

/**
 * Malformed trial input.
 *
 * Common codes:
 * - `EMPTY_SIGNAL`: No revolution events
 * - `NON_MONOTONIC`: Timestamps not strictly increasing
 * - `INVALID_TIMESTAMP`: Timestamp is not a finite number
 * - `INVALID_DURATION`: Duration shorter than the last event
 * - `INVALID_ARM_LENGTH`: Arm length not a positive number
 * - `INVALID_INPUT`: Trial batch is not a JSON array
 */
export class InvalidSignalError extends DiagnosticsError {
  constructor(message: string, code: string, cause?: unknown) {
    super(message, code, cause);
  }
}

// ─────────────────────────────────────────────────────────────────────────────
// Set-level Errors
// ─────────────────────────────────────────────────────────────────────────────

/**
 * Not enough trials to compute a set-median baseline.
 *
 * Common codes:
 * - `INSUFFICIENT_TRIALS`: Fewer records than the configured minimum
 */
export class MissingBaselineError extends DiagnosticsError {
  constructor(message: string, code: string, cause?: unknown) {
    super(message, code, cause);
  }
}

/**
 * Trial is missing the identity needed to group it.
 *
 * Common codes:
 * - `MISSING_SET_ID`: Set id absent or not a positive integer
 * - `MISSING_COMBO_ID`: Combo id absent or blank
 * - `MISSING_CHAMBER_ID`: Chamber id absent or blank
 * - `INVALID_CHAMBER_ID`: Chamber id contains a comma or equals the export sentinel
 */
export class UnknownGroupingError extends DiagnosticsError {
  constructor(message: string, code: string, cause?: unknown) {
    super(message, code, cause);
  }
}

// ─────────────────────────────────────────────────────────────────────────────
// Report Errors
// ─────────────────────────────────────────────────────────────────────────────

/**
 * Aggregate is missing expected fields at render time.
 *
 * Common codes:
 * - `MISSING_FIELD`: Required field absent or of the wrong type
 * - `MISSING_SERIES`: Combo record lacks one of the three metric series
 * - `MALFORMED_CSV`: Persisted table cannot be parsed back
 */
export class MalformedAggregateError extends DiagnosticsError {
  constructor(message: string, code: string, cause?: unknown) {
    super(message, code, cause);
  }
}

// ─────────────────────────────────────────────────────────────────────────────
// Configuration Errors
// ─────────────────────────────────────────────────────────────────────────────

/**
 * Errors in configuration loading or validation.
 *
 * Common codes:
 * - `CONFIG_INVALID`: Configuration validation failed
 * - `INVALID_VALUE`: Field value is invalid
 */
export class ConfigError extends DiagnosticsError {
  constructor(message: string, code: string, cause?: unknown) {
    super(message, code, cause);
  }
}

// ─────────────────────────────────────────────────────────────────────────────
// Storage Errors
// ─────────────────────────────────────────────────────────────────────────────

/**
 * Errors from the optional SQLite run store.
 *
 * Common codes:
 * - `RUN_NOT_FOUND`: Requested run doesn't exist
 * - `DB_QUERY_FAILED`: Query execution failed
 */
export class StorageError extends DiagnosticsError {
  constructor(message: string, code: string, cause?: unknown) {
    super(message, code, cause);
  }
}

// ─────────────────────────────────────────────────────────────────────────────
// Helper Functions
// ─────────────────────────────────────────────────────────────────────────────

/**
 * Check if an error is a diagnostics error with a specific code.
 */
export function isErrorWithCode(error: unknown, code: string): boolean {
  return error instanceof DiagnosticsError && error.code === code;
}

export function isInvalidSignalError(error: unknown): error is InvalidSignalError {
  return error instanceof InvalidSignalError;
}

export function isMissingBaselineError(error: unknown): error is MissingBaselineError {
  return error instanceof MissingBaselineError;
}

export function isUnknownGroupingError(error: unknown): error is UnknownGroupingError {
  return error instanceof UnknownGroupingError;
}

export function isMalformedAggregateError(error: unknown): error is MalformedAggregateError {
  return error instanceof MalformedAggregateError;
}

export function isConfigError(error: unknown): error is ConfigError {
  return error instanceof ConfigError;
}

/**
 * Wrap an unknown error in a DiagnosticsError.
 *
 * If the error is already a DiagnosticsError, returns it unchanged.
 * Otherwise wraps it in a new DiagnosticsError with UNKNOWN code.
 */
export function wrapError(error: unknown, message?: string): DiagnosticsError {
  if (error instanceof DiagnosticsError) {
    return error;
  }

  const errorMessage = message ?? (error instanceof Error ? error.message : String(error));
  return new DiagnosticsError(errorMessage, 'UNKNOWN', error);
}
