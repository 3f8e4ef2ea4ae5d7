/**
 * Epitrend Error Hierarchy
 *
 * Every failure the engine or its collaborators can raise extends
 * EpitrendError, which carries a stable error code, a recoverable flag
 * and an optional suggestion for the user.
 *
 * @module packages/core/domain/errors
 */

// ============================================================================
// Error Codes
// ============================================================================

/**
 * Error code categories:
 * - RECORD_*: Record normalization and reconciliation (1xxx)
 * - CONFIG_*: Configuration errors (2xxx)
 * - FETCH_*: Upstream retrieval errors (3xxx)
 * - CACHE_*: Cache store errors (4xxx)
 */
export const ErrorCodes = {
  // Record errors (1xxx)
  RECORD_MISSING_DATE: 'E1001',
  RECORD_MALFORMED_FIELD: 'E1002',
  RECORD_INVALID_POPULATION: 'E1003',

  // Configuration errors (2xxx)
  CONFIG_VALIDATION_ERROR: 'E2001',

  // Fetch errors (3xxx)
  FETCH_FAILED: 'E3001',
  FETCH_INVALID_PAYLOAD: 'E3002',

  // Cache errors (4xxx)
  CACHE_UNAVAILABLE: 'E4001',
  CACHE_LOCKED: 'E4002',
} as const;

export type ErrorCode = (typeof ErrorCodes)[keyof typeof ErrorCodes];

// ============================================================================
// Base Error Class
// ============================================================================

export interface EpitrendErrorOptions {
  code: ErrorCode;
  recoverable?: boolean;
  suggestion?: string;
  details?: string[];
  cause?: unknown;
}

/**
 * Base error class for all epitrend errors
 */
export class EpitrendError extends Error {
  /** Error code for programmatic handling */
  readonly code: ErrorCode;

  /** Whether processing may continue past this error */
  readonly recoverable: boolean;

  /** Suggested action for the user */
  readonly suggestion?: string;

  /** Additional details about the error */
  readonly details?: string[];

  constructor(message: string, options: EpitrendErrorOptions) {
    super(message, { cause: options.cause });
    this.name = 'EpitrendError';
    this.code = options.code;
    this.recoverable = options.recoverable ?? false;
    this.suggestion = options.suggestion;
    this.details = options.details;
  }

  /**
   * Format error for display
   */
  toDisplayString(): string {
    let output = `${this.message} [${this.code}]`;
    if (this.details && this.details.length > 0) {
      output += '\n' + this.details.map((d) => `  - ${d}`).join('\n');
    }
    if (this.suggestion) {
      output += `\n\nSuggestion: ${this.suggestion}`;
    }
    return output;
  }

  /**
   * Format error for JSON output
   */
  toJSON(): Record<string, unknown> {
    return {
      name: this.name,
      code: this.code,
      message: this.message,
      recoverable: this.recoverable,
      suggestion: this.suggestion,
      details: this.details,
      cause: this.cause instanceof Error ? this.cause.message : undefined,
    };
  }
}

// ============================================================================
// Record Errors
// ============================================================================

/**
 * A raw record carries no date at all.
 *
 * Batch normalization drops such records instead of failing.
 */
export class MissingDateError extends EpitrendError {
  readonly objectId: number;

  constructor(objectId: number) {
    super(`Record ${objectId} has no date`, {
      code: ErrorCodes.RECORD_MISSING_DATE,
      recoverable: true,
    });
    this.name = 'MissingDateError';
    this.objectId = objectId;
  }
}

/**
 * A numeric or date field could not be parsed.
 *
 * Fatal to the whole pass: skipping the record would corrupt every
 * subsequent running total.
 */
export class MalformedFieldError extends EpitrendError {
  readonly field: string;
  readonly value: unknown;

  constructor(field: string, value: unknown, options: { objectId?: number; cause?: unknown } = {}) {
    const where = options.objectId !== undefined ? ` in record ${options.objectId}` : '';
    super(`Malformed value for field "${field}"${where}: ${JSON.stringify(value)}`, {
      code: ErrorCodes.RECORD_MALFORMED_FIELD,
      suggestion: 'The upstream data format may have changed. Re-run with -vv for details.',
      cause: options.cause,
    });
    this.name = 'MalformedFieldError';
    this.field = field;
    this.value = value;
  }
}

/**
 * The population denominator is zero, negative or not a number.
 */
export class InvalidPopulationError extends EpitrendError {
  readonly population: number;

  constructor(population: number) {
    super(`Population must be a positive number, got ${population}`, {
      code: ErrorCodes.RECORD_INVALID_POPULATION,
      suggestion: 'Check the population feed URL (EPITREND_POPULATION_URL).',
    });
    this.name = 'InvalidPopulationError';
    this.population = population;
  }
}

// ============================================================================
// Collaborator Errors
// ============================================================================

/**
 * Configuration validation failed
 */
export class ConfigValidationError extends EpitrendError {
  readonly issues: string[];

  constructor(issues: string[]) {
    super('Configuration validation failed', {
      code: ErrorCodes.CONFIG_VALIDATION_ERROR,
      details: issues,
      suggestion: 'Fix the EPITREND_* environment variables listed above.',
    });
    this.name = 'ConfigValidationError';
    this.issues = issues;
  }
}

/**
 * An upstream source could not be retrieved or returned an unexpected payload
 */
export class FetchError extends EpitrendError {
  readonly url: string;
  readonly status?: number;

  constructor(
    message: string,
    options: { url: string; status?: number; invalidPayload?: boolean; cause?: unknown }
  ) {
    super(message, {
      code: options.invalidPayload ? ErrorCodes.FETCH_INVALID_PAYLOAD : ErrorCodes.FETCH_FAILED,
      recoverable: !options.invalidPayload,
      suggestion: options.invalidPayload
        ? undefined
        : 'Check your network connection or use cached data with --cache.',
      cause: options.cause,
    });
    this.name = 'FetchError';
    this.url = options.url;
    this.status = options.status;
  }
}

/**
 * Offline mode was requested but there is no cached data
 */
export class CacheUnavailableError extends EpitrendError {
  constructor() {
    super('--cache is defined, but there is no cached data available', {
      code: ErrorCodes.CACHE_UNAVAILABLE,
      suggestion:
        'Run the `cache refresh` subcommand to set a new cache. Treat any warnings as errors.',
    });
    this.name = 'CacheUnavailableError';
  }
}

/**
 * The cache file is locked by another process
 */
export class CacheLockError extends EpitrendError {
  readonly path: string;

  constructor(path: string, mode: 'read' | 'write') {
    super(`Cache at ${path} is locked by another process (${mode})`, {
      code: ErrorCodes.CACHE_LOCKED,
      recoverable: true,
    });
    this.name = 'CacheLockError';
    this.path = path;
  }
}

/**
 * Type guard for epitrend errors
 */
export function isEpitrendError(error: unknown): error is EpitrendError {
  return error instanceof EpitrendError;
}
