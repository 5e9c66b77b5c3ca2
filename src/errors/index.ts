/**
 * Centralized Error Types
 *
 * Typed, categorized errors for the analyzer. The category decides how far a
 * failure propagates: argument and authentication errors end the run, network
 * failures end it only during conversation collection, decode failures only
 * ever skip the current item.
 *
 * Error Categories:
 * - TRANSIENT: Network, timeout, 5xx - retried by the fetcher
 * - PERMANENT: Authentication - not retryable
 * - VALIDATION: Bad command-line or configuration input
 * - DECODE: Malformed JSON or an unexpected record shape
 * - CANCELLED: User interrupt
 *
 * @example
 * ```typescript
 * return { ok: false, error: new DecodeFailure('Response is not valid JSON', { url }) };
 * ```
 */

// =============================================================================
// ERROR CATEGORIES
// =============================================================================

export enum ErrorCategory {
  /** Transient errors - may resolve on retry (network, timeout) */
  TRANSIENT = 'TRANSIENT',

  /** Permanent errors - will not resolve on retry (auth) */
  PERMANENT = 'PERMANENT',

  /** Validation errors - invalid arguments or configuration */
  VALIDATION = 'VALIDATION',

  /** Decode errors - response or record could not be interpreted */
  DECODE = 'DECODE',

  /** Cancelled - operation was cancelled */
  CANCELLED = 'CANCELLED',
}

// =============================================================================
// BASE ERROR CLASS
// =============================================================================

/**
 * Base class for all analyzer errors.
 */
export class AnalyzerError extends Error {
  /** Error category for propagation decisions */
  readonly category: ErrorCategory;

  /** Whether the error may resolve on retry */
  readonly recoverable: boolean;

  /** Timestamp when error occurred */
  readonly timestamp: Date;

  /** Additional context for debugging (ids, urls, status codes) */
  readonly context: Record<string, unknown>;

  /** Original error that caused this one (if wrapping) */
  readonly cause?: Error;

  constructor(
    message: string,
    category: ErrorCategory,
    recoverable: boolean,
    context?: Record<string, unknown>,
    cause?: Error
  ) {
    super(message);
    this.name = 'AnalyzerError';
    this.category = category;
    this.recoverable = recoverable;
    this.timestamp = new Date();
    this.context = context ?? {};
    this.cause = cause;

    if (Error.captureStackTrace) {
      Error.captureStackTrace(this, this.constructor);
    }
  }

  toJSON(): Record<string, unknown> {
    return {
      name: this.name,
      message: this.message,
      category: this.category,
      recoverable: this.recoverable,
      timestamp: this.timestamp.toISOString(),
      context: this.context,
      cause: this.cause?.message,
    };
  }

  toLogString(): string {
    const parts = [`[${this.name}]`, `(${this.category})`, this.message];

    if (Object.keys(this.context).length > 0) {
      parts.push(`context=${JSON.stringify(this.context)}`);
    }

    return parts.join(' ');
  }
}

// =============================================================================
// SPECIALIZED ERROR CLASSES
// =============================================================================

/**
 * Bad or missing command-line input. Raised before any network call.
 */
export class ArgumentError extends AnalyzerError {
  /** Field(s) that failed validation */
  readonly fields: string[];

  constructor(message: string, fields: string[] = [], context?: Record<string, unknown>) {
    super(message, ErrorCategory.VALIDATION, false, { ...context, fields });
    this.name = 'ArgumentError';
    this.fields = fields;
  }

  /**
   * Create error from a Zod validation result.
   */
  static fromZodError(error: { issues: Array<{ path: (string | number)[]; message: string }> }): ArgumentError {
    const fields = error.issues.map((i) => i.path.join('.'));
    const messages = error.issues.map((i) => (i.path.length > 0 ? `${i.path.join('.')}: ${i.message}` : i.message));
    return new ArgumentError(`Invalid arguments: ${messages.join('; ')}`, fields);
  }
}

/**
 * 401/403 from any endpoint. The token is shared by every endpoint, so the
 * run cannot usefully continue.
 */
export class AuthError extends AnalyzerError {
  readonly statusCode: number;

  constructor(statusCode: number, context?: Record<string, unknown>) {
    super(
      `Authentication failed (HTTP ${statusCode}): check that the bearer token is valid and has access to the project`,
      ErrorCategory.PERMANENT,
      false,
      { ...context, statusCode }
    );
    this.name = 'AuthError';
    this.statusCode = statusCode;
  }
}

/**
 * Connection error, timeout or non-2xx response that persisted through every
 * retry attempt.
 */
export class NetworkFailure extends AnalyzerError {
  readonly attempts: number;
  readonly statusCode?: number;
  readonly isTimeout: boolean;

  constructor(
    message: string,
    attempts: number,
    options: { statusCode?: number; isTimeout?: boolean; context?: Record<string, unknown>; cause?: Error } = {}
  ) {
    super(
      message,
      ErrorCategory.TRANSIENT,
      true,
      { ...options.context, attempts, statusCode: options.statusCode },
      options.cause
    );
    this.name = 'NetworkFailure';
    this.attempts = attempts;
    this.statusCode = options.statusCode;
    this.isTimeout = options.isTimeout ?? false;
  }
}

/**
 * Malformed JSON or a record of unexpected shape. Never retried.
 */
export class DecodeFailure extends AnalyzerError {
  /** Paths of the offending fields, when known */
  readonly paths: string[];

  constructor(message: string, context?: Record<string, unknown>, paths: string[] = [], cause?: Error) {
    super(message, ErrorCategory.DECODE, false, context, cause);
    this.name = 'DecodeFailure';
    this.paths = paths;
  }

  /**
   * Create error from a Zod validation result.
   */
  static fromZodError(
    what: string,
    error: { issues: Array<{ path: (string | number)[]; message: string }> },
    context?: Record<string, unknown>
  ): DecodeFailure {
    const paths = error.issues.map((i) => (i.path.length > 0 ? i.path.join('.') : '(root)'));
    const details = error.issues.map((i, idx) => `${paths[idx]}: ${i.message}`);
    return new DecodeFailure(`Malformed ${what}: ${details.join('; ')}`, context, paths);
  }
}

/**
 * Error when the run is cancelled by the user.
 */
export class CancellationError extends AnalyzerError {
  readonly reason: string;

  constructor(reason: string = 'Operation cancelled') {
    super(reason, ErrorCategory.CANCELLED, false, { reason });
    this.name = 'CancellationError';
    this.reason = reason;
  }
}

// =============================================================================
// WARNINGS
// =============================================================================

/**
 * An expected field was absent and an empty or placeholder value was used
 * instead. Recorded and counted, never thrown.
 */
export interface PartialDataWarning {
  kind: 'partial-data';
  /** Dotted path of the missing field */
  field: string;
  /** Value used in its place */
  substitute: string;
}

export function partialData(field: string, substitute: string): PartialDataWarning {
  return { kind: 'partial-data', field, substitute };
}

// =============================================================================
// ERROR UTILITIES
// =============================================================================

/** Failures the fetcher reports as values instead of throwing. */
export type FetchFailure = NetworkFailure | DecodeFailure | AuthError;

export function isCancellationError(error: unknown): error is CancellationError {
  return error instanceof CancellationError;
}

/**
 * Format error for display to user.
 */
export function formatError(error: unknown): string {
  if (error instanceof AnalyzerError) {
    return `${error.name}: ${error.message}`;
  }
  if (error instanceof Error) {
    return error.message;
  }
  return String(error);
}

/**
 * Format error for logging with full details.
 */
export function formatErrorForLog(error: unknown): string {
  if (error instanceof AnalyzerError) {
    return error.toLogString();
  }
  if (error instanceof Error) {
    return `[Error] ${error.message}`;
  }
  return `[Unknown] ${String(error)}`;
}
