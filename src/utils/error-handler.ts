/**
 * Error classification and reporting for top-level callers.
 *
 * The engine itself recovers from everything except an unreadable
 * document; this module turns whatever does reach the CLI (or a library
 * caller) into a categorized, logged AppError with a user-facing message.
 *
 * @module utils/error-handler
 */

import type { Logger } from 'pino';
import { createLogger } from './logger.js';
import {
  DocumentReadError,
  ExternalServiceError,
  MalformedToolCallError,
  TimeoutError,
  ToolExecutionError,
  ValidationError,
  isRetryable,
} from './errors.js';

/**
 * Error categories for classification and handling
 */
export enum ErrorCategory {
  /** Missing or invalid configuration */
  CONFIGURATION = 'CONFIGURATION',
  /** The input document could not be read */
  DOCUMENT = 'DOCUMENT',
  /** Completion or extraction service failures */
  EXTERNAL_SERVICE = 'EXTERNAL_SERVICE',
  /** Timeouts */
  TIMEOUT = 'TIMEOUT',
  /** Invalid input or model output */
  VALIDATION = 'VALIDATION',
  /** Tool dispatch failures */
  TOOL = 'TOOL',
  /** Unknown/unclassified errors */
  UNKNOWN = 'UNKNOWN',
}

/**
 * Error severity levels
 */
export enum ErrorSeverity {
  /** Fatal - process should exit */
  FATAL = 'fatal',
  /** Error - operation failed but system can continue */
  ERROR = 'error',
  /** Warning - operation succeeded with issues */
  WARN = 'warn',
}

export interface ErrorContext {
  category?: ErrorCategory;
  userMessage?: string;
  [key: string]: unknown;
}

/**
 * Error enriched with classification metadata.
 */
export class AppError extends Error {
  readonly category: ErrorCategory;
  readonly severity: ErrorSeverity;
  readonly retryable: boolean;
  readonly userMessage: string;
  readonly context?: Record<string, unknown>;
  readonly originalError?: Error;

  constructor(
    message: string,
    category: ErrorCategory = ErrorCategory.UNKNOWN,
    severity: ErrorSeverity = ErrorSeverity.ERROR,
    options: {
      retryable?: boolean;
      userMessage?: string;
      context?: Record<string, unknown>;
      cause?: Error;
    } = {}
  ) {
    super(message, { cause: options.cause });
    this.name = 'AppError';
    this.category = category;
    this.severity = severity;
    this.retryable = options.retryable ?? false;
    this.userMessage = options.userMessage ?? message;
    this.context = options.context;
    this.originalError = options.cause;
  }

  toJSON(): Record<string, unknown> {
    return {
      name: this.name,
      message: this.message,
      category: this.category,
      severity: this.severity,
      retryable: this.retryable,
      userMessage: this.userMessage,
      context: this.context,
      originalError: this.originalError
        ? { name: this.originalError.name, message: this.originalError.message }
        : undefined,
    };
  }
}

let errorLogger: Logger | undefined;

function getErrorHandlerLogger(): Logger {
  if (!errorLogger) {
    errorLogger = createLogger('ErrorHandler');
  }
  return errorLogger;
}

/**
 * Classify an error based on its type, then on its message.
 */
export function classifyError(error: unknown): ErrorCategory {
  if (error instanceof AppError) {
    return error.category;
  }
  if (error instanceof DocumentReadError) {
    return ErrorCategory.DOCUMENT;
  }
  if (error instanceof TimeoutError) {
    return ErrorCategory.TIMEOUT;
  }
  if (error instanceof ExternalServiceError) {
    return ErrorCategory.EXTERNAL_SERVICE;
  }
  if (error instanceof ValidationError || error instanceof MalformedToolCallError) {
    return ErrorCategory.VALIDATION;
  }
  if (error instanceof ToolExecutionError) {
    return ErrorCategory.TOOL;
  }
  if (!(error instanceof Error)) {
    return ErrorCategory.UNKNOWN;
  }

  const message = error.message.toLowerCase();
  if (message.includes('configuration') || message.includes('api key')) {
    return ErrorCategory.CONFIGURATION;
  }
  if (message.includes('enoent') || message.includes('no such file') || message.includes('eacces')) {
    return ErrorCategory.DOCUMENT;
  }
  if (message.includes('timeout') || message.includes('timed out')) {
    return ErrorCategory.TIMEOUT;
  }

  return ErrorCategory.UNKNOWN;
}

/**
 * Determine the severity level for an error category
 */
export function getSeverity(category: ErrorCategory): ErrorSeverity {
  switch (category) {
    case ErrorCategory.CONFIGURATION:
    case ErrorCategory.DOCUMENT:
      return ErrorSeverity.FATAL;
    case ErrorCategory.VALIDATION:
    case ErrorCategory.TOOL:
      return ErrorSeverity.WARN;
    default:
      return ErrorSeverity.ERROR;
  }
}

/**
 * Create a user-friendly error message
 */
export function createUserMessage(error: unknown): string {
  if (error instanceof AppError) {
    return error.userMessage;
  }
  if (error instanceof DocumentReadError) {
    return `Cannot read document: ${error.filePath}`;
  }
  if (!(error instanceof Error)) {
    return 'An unknown error occurred';
  }

  switch (classifyError(error)) {
    case ErrorCategory.CONFIGURATION:
      return `Configuration error: ${error.message}`;
    case ErrorCategory.DOCUMENT:
      return `Cannot read document: ${error.message}`;
    case ErrorCategory.EXTERNAL_SERVICE:
      return 'The language model service is unavailable. Please try again later.';
    case ErrorCategory.TIMEOUT:
      return 'Operation timed out. Please try again.';
    case ErrorCategory.VALIDATION:
      return `Invalid input: ${error.message}`;
    default:
      return `Unexpected error: ${error.message}`;
  }
}

/**
 * Wrap any thrown value in an AppError.
 */
export function enrichError(error: unknown, context: ErrorContext = {}): AppError {
  if (error instanceof AppError) {
    return error;
  }

  const errorObj = error instanceof Error ? error : new Error(String(error));
  const { category: forced, userMessage, ...rest } = context;
  const category = forced ?? classifyError(errorObj);

  return new AppError(errorObj.message, category, getSeverity(category), {
    retryable: isRetryable(errorObj),
    userMessage: userMessage ?? createUserMessage(errorObj),
    context: rest,
    cause: errorObj,
  });
}

/**
 * Log an error with full context at the level its severity calls for.
 */
export function logError(error: unknown, context: ErrorContext = {}, customLogger?: Logger): AppError {
  const logger = customLogger ?? getErrorHandlerLogger();
  const enriched = enrichError(error, context);

  const logData: Record<string, unknown> = {
    err: error instanceof Error ? error : undefined,
    category: enriched.category,
    retryable: enriched.retryable,
    ...enriched.context,
  };

  switch (enriched.severity) {
    case ErrorSeverity.FATAL:
      logger.fatal(logData, enriched.message);
      break;
    case ErrorSeverity.ERROR:
      logger.error(logData, enriched.message);
      break;
    case ErrorSeverity.WARN:
      logger.warn(logData, enriched.message);
      break;
  }

  return enriched;
}

/**
 * Handle an error with logging and optional user notification
 */
export function handleError(
  error: unknown,
  context: ErrorContext = {},
  options: {
    log?: boolean;
    userNotifier?: (message: string) => void;
    customLogger?: Logger;
  } = {}
): AppError {
  const { log = true, userNotifier, customLogger } = options;

  const enriched = log ? logError(error, context, customLogger) : enrichError(error, context);

  if (userNotifier) {
    userNotifier(enriched.userMessage);
  }

  return enriched;
}
