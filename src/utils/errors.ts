/**
 * Typed error classes for the navigation engine.
 *
 * Each error carries enough structured context to be logged through pino
 * (`toJSON`) and classified for retry (`isRetryable`).
 *
 * @module utils/errors
 */

/**
 * External services the engine talks to.
 */
export type ExternalService = 'completion' | 'extraction';

export interface ExternalServiceErrorOptions {
  cause?: Error;
  service?: ExternalService;
  /** Attempt number at which the failure was observed (1-based) */
  attempt?: number;
  /** Whether another attempt may succeed */
  recoverable?: boolean;
}

/**
 * Failure talking to the completion or extraction service.
 */
export class ExternalServiceError extends Error {
  readonly options: ExternalServiceErrorOptions;

  constructor(message: string, options: ExternalServiceErrorOptions) {
    super(options.cause ? `${message} (caused by: ${options.cause.message})` : message);
    this.name = 'ExternalServiceError';
    this.options = options;
  }

  toJSON(): Record<string, unknown> {
    return {
      name: this.name,
      message: this.message,
      service: this.options.service,
      attempt: this.options.attempt,
      recoverable: this.options.recoverable,
      cause: this.options.cause?.message,
      stack: this.stack,
    };
  }
}

/**
 * An operation exceeded its time budget.
 */
export class TimeoutError extends Error {
  constructor(
    message: string,
    readonly timeoutMs: number,
    readonly operation?: string
  ) {
    super(message);
    this.name = 'TimeoutError';
  }

  getTimeoutDuration(): string {
    if (this.timeoutMs < 1000) {
      return `${this.timeoutMs}ms`;
    }
    if (this.timeoutMs < 60000) {
      return `${(this.timeoutMs / 1000).toFixed(1)}s`;
    }
    return `${(this.timeoutMs / 60000).toFixed(1)}m`;
  }

  toJSON(): Record<string, unknown> {
    return {
      name: this.name,
      message: this.message,
      timeoutMs: this.timeoutMs,
      timeoutDuration: this.getTimeoutDuration(),
      operation: this.operation,
      stack: this.stack,
    };
  }
}

/**
 * A tool failed while executing a validated call.
 */
export class ToolExecutionError extends Error {
  constructor(
    message: string,
    readonly tool: string,
    readonly recoverable = false,
    readonly cause?: Error
  ) {
    super(message);
    this.name = 'ToolExecutionError';
  }

  toJSON(): Record<string, unknown> {
    return {
      name: this.name,
      message: this.message,
      tool: this.tool,
      recoverable: this.recoverable,
      cause: this.cause?.message,
      stack: this.stack,
    };
  }
}

/**
 * A tool-call block that could not be turned into an executable call.
 */
export class MalformedToolCallError extends Error {
  constructor(
    message: string,
    readonly kind: string,
    readonly fragment: string
  ) {
    super(message);
    this.name = 'MalformedToolCallError';
  }

  toJSON(): Record<string, unknown> {
    return {
      name: this.name,
      message: this.message,
      kind: this.kind,
      fragment: this.fragment,
    };
  }
}

/**
 * Structured data failed validation.
 */
export class ValidationError extends Error {
  constructor(
    message: string,
    readonly field?: string,
    readonly value?: unknown
  ) {
    super(message);
    this.name = 'ValidationError';
  }

  toJSON(): Record<string, unknown> {
    return {
      name: this.name,
      message: this.message,
      field: this.field,
      value: this.value,
      stack: this.stack,
    };
  }
}

/**
 * The document could not be read at all. This is the only fatal condition.
 */
export class DocumentReadError extends Error {
  constructor(
    message: string,
    readonly filePath: string,
    readonly cause?: Error
  ) {
    super(message);
    this.name = 'DocumentReadError';
  }

  toJSON(): Record<string, unknown> {
    return {
      name: this.name,
      message: this.message,
      filePath: this.filePath,
      cause: this.cause?.message,
      stack: this.stack,
    };
  }
}

const RETRYABLE_PATTERNS = [
  'timeout',
  'timed out',
  'network',
  'connection refused',
  'econnreset',
  'etimedout',
  'econnrefused',
  'rate limit',
  'overloaded',
  'temporary',
  'unavailable',
];

/**
 * Whether a message describes a transient failure.
 */
export function isTransientMessage(message: string): boolean {
  const lower = message.toLowerCase();
  return RETRYABLE_PATTERNS.some(pattern => lower.includes(pattern));
}

/**
 * Decide whether an error is worth another attempt.
 */
export function isRetryable(error: unknown): boolean {
  if (error instanceof TimeoutError) {
    return true;
  }
  if (error instanceof ExternalServiceError) {
    return error.options.recoverable ?? isTransientMessage(error.message);
  }
  if (error instanceof ToolExecutionError) {
    return error.recoverable;
  }
  if (
    error instanceof ValidationError ||
    error instanceof MalformedToolCallError ||
    error instanceof DocumentReadError
  ) {
    return false;
  }
  if (error instanceof Error) {
    return isTransientMessage(error.message);
  }
  return false;
}

/**
 * Convert any thrown value into a plain object for structured logging.
 */
export function formatError(error: unknown): Record<string, unknown> {
  if (
    error instanceof ExternalServiceError ||
    error instanceof TimeoutError ||
    error instanceof ToolExecutionError ||
    error instanceof MalformedToolCallError ||
    error instanceof ValidationError ||
    error instanceof DocumentReadError
  ) {
    return { ...error.toJSON(), isRetryable: isRetryable(error) };
  }
  if (error instanceof Error) {
    return {
      name: error.name,
      message: error.message,
      stack: error.stack,
    };
  }
  return { name: 'UnknownError', message: String(error) };
}
