/**
 * Error Taxonomy
 *
 * Standard error types for the daily stats job. Every failure is local to
 * the smallest unit of work (one product file or one series), so callers
 * catch these per unit, log them, and move on.
 *
 * @module @trailstats/core/errors
 */

// =============================================================================
// Error Codes
// =============================================================================

/**
 * One code per concrete error class
 */
export const STATS_ERROR_CODES = [
  'STORAGE_IO_ERROR',
  'QUERY_COMPILATION_ERROR',
  'CONFIGURATION_ERROR',
] as const;

export type StatsErrorCode = (typeof STATS_ERROR_CODES)[number];

// =============================================================================
// Base Error Class
// =============================================================================

export interface StatsErrorOptions {
  code: StatsErrorCode;
  /** Additional context for debugging */
  context?: Record<string, unknown>;
  /** Underlying cause */
  cause?: unknown;
}

/**
 * Base class for every error raised by the stats pipeline
 */
export class StatsError extends Error {
  readonly code: StatsErrorCode;
  readonly context?: Record<string, unknown>;
  readonly cause?: unknown;
  readonly timestamp: Date;

  constructor(message: string, options: StatsErrorOptions) {
    super(message);
    this.name = 'StatsError';
    this.code = options.code;
    this.context = options.context;
    this.cause = options.cause;
    this.timestamp = new Date();

    if (Error.captureStackTrace) {
      Error.captureStackTrace(this, this.constructor);
    }
  }

  /**
   * Convert to JSON for logging
   */
  toJSON(): Record<string, unknown> {
    return {
      name: this.name,
      code: this.code,
      message: this.message,
      context: this.context,
      timestamp: this.timestamp.toISOString(),
      cause: this.cause instanceof Error ? this.cause.message : this.cause,
    };
  }
}

// =============================================================================
// Specific Error Types
// =============================================================================

/**
 * A time-series file could not be read, written or replaced.
 * Fatal for the affected product only.
 */
export class StorageIOError extends StatsError {
  readonly filePath: string;

  constructor(message: string, filePath: string, cause?: unknown, context?: Record<string, unknown>) {
    super(message, {
      code: 'STORAGE_IO_ERROR',
      context: { filePath, ...context },
      cause,
    });
    this.name = 'StorageIOError';
    this.filePath = filePath;
  }
}

/**
 * A saved query could not be compiled, usually because it names a product,
 * component or user that no longer exists. The series is skipped for the day.
 */
export class QueryCompilationError extends StatsError {
  readonly parameter?: string;

  constructor(message: string, options?: { parameter?: string; context?: Record<string, unknown> }) {
    super(message, {
      code: 'QUERY_COMPILATION_ERROR',
      context: { parameter: options?.parameter, ...options?.context },
    });
    this.name = 'QueryCompilationError';
    this.parameter = options?.parameter;
  }
}

/**
 * Invalid or missing configuration
 */
export class ConfigurationError extends StatsError {
  readonly issues: string[];

  constructor(message: string, issues: string[] = []) {
    super(message, {
      code: 'CONFIGURATION_ERROR',
      context: { issues },
    });
    this.name = 'ConfigurationError';
    this.issues = issues;
  }
}

// =============================================================================
// Non-fatal States
// =============================================================================

/**
 * An on-disk row did not match the declared schema. Parsing continues with
 * blanks for the fields that could not be read.
 */
export interface DataIntegrityWarning {
  /** 1-based line number in the file */
  line: number;
  kind: 'missing_fields' | 'extra_fields' | 'invalid_count' | 'invalid_date';
  message: string;
}

// =============================================================================
// Helpers
// =============================================================================

export function isStatsError(error: unknown): error is StatsError {
  return error instanceof StatsError;
}

/**
 * Message of any thrown value
 */
export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
