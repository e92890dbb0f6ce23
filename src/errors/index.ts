/**
 * Centralized Error Types
 *
 * Typed, categorized errors for the review loop.
 *
 * Error Categories:
 * - VALIDATION: malformed conversation or configuration - never retried
 * - TRANSIENT: network, timeout - the caller may retry the whole run
 * - RATE_LIMITED: provider rate limits
 * - PERMANENT: auth failures and other errors that will not resolve
 * - DEPENDENCY: a collaborator or external service failed
 *
 * @example
 * ```typescript
 * throw new ConfigurationError('maxAttempts must be >= 1, got 0', ['maxAttempts']);
 * ```
 */

// =============================================================================
// ERROR CATEGORIES
// =============================================================================

export enum ErrorCategory {
  /** Transient errors - may resolve on retry (network, timeout) */
  TRANSIENT = 'TRANSIENT',

  /** Permanent errors - will not resolve on retry (auth, bad request) */
  PERMANENT = 'PERMANENT',

  /** Validation errors - invalid input or configuration */
  VALIDATION = 'VALIDATION',

  /** Rate limited - retry after delay */
  RATE_LIMITED = 'RATE_LIMITED',

  /** Dependency errors - generator, evaluator or provider failures */
  DEPENDENCY = 'DEPENDENCY',

  /** Internal errors - unexpected failures */
  INTERNAL = 'INTERNAL',

  /** Cancelled - operation was aborted by the caller */
  CANCELLED = 'CANCELLED',
}

/** Loop stage an upstream failure originated from */
export type UpstreamStage = 'generator' | 'evaluator';

// =============================================================================
// BASE ERROR CLASS
// =============================================================================

/**
 * Base class for all review loop errors.
 */
export class ReviewLoopError extends Error {
  readonly category: ErrorCategory;

  /** Whether retrying the whole run may succeed */
  readonly recoverable: boolean;

  readonly timestamp: Date;

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
    this.name = 'ReviewLoopError';
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
      stack: this.stack,
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
 * Malformed conversation handed to the controller.
 * Raised before any generator or evaluator call.
 */
export class InvalidInputError extends ReviewLoopError {
  readonly reason: string;

  constructor(reason: string, context?: Record<string, unknown>) {
    super(`Invalid conversation: ${reason}`, ErrorCategory.VALIDATION, false, context);
    this.name = 'InvalidInputError';
    this.reason = reason;
  }

  static empty(): InvalidInputError {
    return new InvalidInputError('conversation is empty', { turns: 0 });
  }

  static missingUserTurn(firstRole?: string): InvalidInputError {
    return new InvalidInputError(
      firstRole
        ? `conversation must open with a user turn, found "${firstRole}"`
        : 'conversation contains no user turn',
      firstRole ? { firstRole } : {}
    );
  }
}

/**
 * Invalid loop or file configuration.
 */
export class ConfigurationError extends ReviewLoopError {
  readonly fields: string[];

  constructor(message: string, fields: string[] = [], context?: Record<string, unknown>) {
    super(message, ErrorCategory.VALIDATION, false, { ...context, fields });
    this.name = 'ConfigurationError';
    this.fields = fields;
  }

  static invalidMaxAttempts(value: unknown): ConfigurationError {
    return new ConfigurationError(
      `maxAttempts must be an integer >= 1, got ${String(value)}`,
      ['maxAttempts'],
      { value }
    );
  }

  /**
   * Create error from a Zod validation result.
   */
  static fromZodError(error: {
    issues: Array<{ path: (string | number)[]; message: string }>;
  }): ConfigurationError {
    const fields = error.issues.map((i) => i.path.join('.'));
    const messages = error.issues.map((i) => `${i.path.join('.') || '(root)'}: ${i.message}`);
    return new ConfigurationError(`Configuration invalid: ${messages.join(', ')}`, fields);
  }
}

/**
 * A generator or evaluator threw. Carried inside an `UpstreamFailure`
 * outcome rather than thrown from `run`.
 */
export class UpstreamError extends ReviewLoopError {
  readonly stage: UpstreamStage;

  /** 1-based attempt during which the collaborator failed */
  readonly attempt: number;

  constructor(
    message: string,
    stage: UpstreamStage,
    attempt: number,
    category: ErrorCategory,
    recoverable: boolean,
    cause?: Error
  ) {
    super(message, category, recoverable, { stage, attempt }, cause);
    this.name = 'UpstreamError';
    this.stage = stage;
    this.attempt = attempt;
  }

  static fromError(error: unknown, stage: UpstreamStage, attempt: number): UpstreamError {
    const err = toError(error);
    const { category, recoverable } =
      err instanceof ReviewLoopError
        ? { category: err.category, recoverable: err.recoverable }
        : categorizeError(err);
    return new UpstreamError(
      `${stage} failed on attempt ${attempt}: ${err.message}`,
      stage,
      attempt,
      category,
      recoverable,
      err
    );
  }
}

/**
 * Error from LLM provider calls.
 */
export class ProviderError extends ReviewLoopError {
  readonly providerName: string;

  /** HTTP status code if applicable */
  readonly statusCode?: number;

  constructor(
    message: string,
    category: ErrorCategory,
    recoverable: boolean,
    providerName: string,
    statusCode?: number,
    cause?: Error
  ) {
    super(message, category, recoverable, { provider: providerName, statusCode }, cause);
    this.name = 'ProviderError';
    this.providerName = providerName;
    this.statusCode = statusCode;
  }

  static notConfigured(providerName: string): ProviderError {
    return new ProviderError(
      `Provider "${providerName}" is not configured`,
      ErrorCategory.PERMANENT,
      false,
      providerName
    );
  }

  /**
   * Map an HTTP failure status to a categorized provider error.
   */
  static fromStatus(providerName: string, statusCode: number, body: string): ProviderError {
    const detail = body.length > 200 ? `${body.slice(0, 200)}...` : body;
    if (statusCode === 429) {
      return new ProviderError(
        `Rate limited by ${providerName}: ${detail}`,
        ErrorCategory.RATE_LIMITED,
        true,
        providerName,
        statusCode
      );
    }
    if (statusCode === 401 || statusCode === 403) {
      return new ProviderError(
        `Authentication failed for ${providerName}`,
        ErrorCategory.PERMANENT,
        false,
        providerName,
        statusCode
      );
    }
    if (statusCode >= 500) {
      return new ProviderError(
        `Server error from ${providerName}: ${statusCode}`,
        ErrorCategory.TRANSIENT,
        true,
        providerName,
        statusCode
      );
    }
    return new ProviderError(
      `Request to ${providerName} failed (${statusCode}): ${detail}`,
      ErrorCategory.PERMANENT,
      false,
      providerName,
      statusCode
    );
  }
}

// =============================================================================
// ERROR UTILITIES
// =============================================================================

function errorCode(error: Error): string | undefined {
  if ('code' in error && typeof error.code === 'string') {
    return error.code;
  }
  return undefined;
}

/**
 * Coerce a thrown value into an Error.
 */
export function toError(error: unknown): Error {
  return error instanceof Error ? error : new Error(String(error));
}

/**
 * Determine error category from a generic error.
 */
export function categorizeError(error: Error): {
  category: ErrorCategory;
  recoverable: boolean;
} {
  const message = error.message.toLowerCase();
  const code = errorCode(error);

  if (
    code === 'ETIMEDOUT' ||
    code === 'ECONNRESET' ||
    code === 'ECONNREFUSED' ||
    code === 'ENOTFOUND' ||
    message.includes('timeout') ||
    message.includes('timed out') ||
    message.includes('socket hang up') ||
    message.includes('network error') ||
    message.includes('temporarily unavailable')
  ) {
    return { category: ErrorCategory.TRANSIENT, recoverable: true };
  }

  if (
    message.includes('rate limit') ||
    message.includes('too many requests') ||
    message.includes('429')
  ) {
    return { category: ErrorCategory.RATE_LIMITED, recoverable: true };
  }

  if (
    message.includes('unauthorized') ||
    message.includes('authentication') ||
    message.includes('forbidden')
  ) {
    return { category: ErrorCategory.PERMANENT, recoverable: false };
  }

  if (error.name === 'AbortError' || message.includes('cancelled') || message.includes('aborted')) {
    return { category: ErrorCategory.CANCELLED, recoverable: false };
  }

  return { category: ErrorCategory.DEPENDENCY, recoverable: false };
}

export function isReviewLoopError(error: unknown): error is ReviewLoopError {
  return error instanceof ReviewLoopError;
}

/**
 * Format error for display to user.
 */
export function formatError(error: unknown): string {
  if (error instanceof ReviewLoopError) {
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
  if (error instanceof ReviewLoopError) {
    return error.toLogString();
  }
  if (error instanceof Error) {
    return `[Error] ${error.message}`;
  }
  return `[Unknown] ${String(error)}`;
}
