/**
 * Logger Factory Module
 *
 * Provides a centralized logging infrastructure using Pino with support for:
 * - Development (pretty print) vs Production (JSON) environments
 * - Optional file output via pino.destination
 * - Child loggers with context binding
 * - Sensitive data redaction
 *
 * Logs go to stderr so that answers printed on stdout stay machine-readable.
 *
 * @module utils/logger
 */

import pino, { type Logger, type LevelWithSilent, type LoggerOptions, type DestinationStream } from 'pino';
import path from 'path';
import fs from 'fs';

/**
 * Log levels supported by Pino, plus 'silent'.
 */
export type LogLevel = LevelWithSilent;

/**
 * Logger configuration interface
 */
export interface LoggerConfig {
  /** Log level (default: 'debug' in development, 'info' in production, 'silent' in test) */
  level?: LogLevel;
  /** Enable pretty print (default: auto-detected from NODE_ENV) */
  prettyPrint?: boolean;
  /** Write JSON logs to this file instead of stderr */
  file?: string;
  /** Fields to redact from logs */
  redact?: string[];
  /** Additional metadata to include in all logs */
  metadata?: Record<string, unknown>;
}

/**
 * Sensitive field patterns that should be redacted
 */
const SENSITIVE_FIELDS = [
  'apiKey',
  'token',
  'password',
  'secret',
  'authorization',
  'ANTHROPIC_API_KEY',
];

const VALID_LEVELS: readonly LogLevel[] = ['trace', 'debug', 'info', 'warn', 'error', 'fatal', 'silent'];

let rootLogger: Logger | null = null;

function isTest(): boolean {
  return process.env.NODE_ENV === 'test';
}

function isDevelopment(): boolean {
  return process.env.NODE_ENV !== 'production' && !isTest();
}

export function isLogLevel(value: string): value is LogLevel {
  return VALID_LEVELS.some(level => level === value);
}

/**
 * Get log level from environment or default
 */
function getDefaultLogLevel(): LogLevel {
  const envLevel = process.env.LOG_LEVEL?.toLowerCase();

  if (envLevel && isLogLevel(envLevel)) {
    return envLevel;
  }
  if (isTest()) {
    return 'silent';
  }

  return isDevelopment() ? 'debug' : 'info';
}

function baseOptions(level: LogLevel, redact: string[]): LoggerOptions {
  return {
    level,
    formatters: {
      level: (label) => ({ level: label }),
    },
    timestamp: pino.stdTimeFunctions.isoTime,
    serializers: {
      err: pino.stdSerializers.err,
      error: pino.stdSerializers.err,
    },
    redact: {
      paths: redact.flatMap(field => [field, `*.${field}`]),
      censor: '[REDACTED]',
    },
  };
}

function prettyTransport(): LoggerOptions['transport'] {
  return {
    target: 'pino-pretty',
    options: {
      colorize: true,
      destination: 2,
      translateTime: 'SYS:standard',
      ignore: 'pid,hostname',
      messageFormat: '[{context}] {msg}',
    },
  };
}

function fileDestination(file: string): DestinationStream {
  const filePath = path.resolve(process.cwd(), file);
  fs.mkdirSync(path.dirname(filePath), { recursive: true });
  return pino.destination({ dest: filePath, sync: false });
}

function buildLogger(config: LoggerConfig): Logger {
  const level = config.level ?? getDefaultLogLevel();
  const options = baseOptions(level, config.redact ?? SENSITIVE_FIELDS);

  if (config.metadata) {
    options.base = { ...config.metadata };
  }

  if (config.file) {
    return pino(options, fileDestination(config.file));
  }

  const pretty = config.prettyPrint ?? isDevelopment();
  if (pretty && !isTest()) {
    return pino({ ...options, transport: prettyTransport() });
  }

  return pino(options, pino.destination(2));
}

/**
 * Initialize the root logger
 *
 * Replaces any previously created root logger, so it should be called once
 * at startup, before modules create their child loggers.
 *
 * @example
 * ```typescript
 * const logger = initLogger({ level: 'info', file: 'logs/tocnav.log' });
 * logger.info('Application started');
 * ```
 */
export function initLogger(config: LoggerConfig = {}): Logger {
  rootLogger = buildLogger(config);
  return rootLogger;
}

/**
 * Drop the root logger so the next call rebuilds it. Used by tests.
 */
export function resetLogger(): void {
  rootLogger = null;
}

/**
 * Create a child logger with context
 *
 * @param context - Module/component name (e.g., 'Navigator', 'SegmentationCache')
 * @param metadata - Additional metadata to include in all logs
 *
 * @example
 * ```typescript
 * const logger = createLogger('Segmenter', { cachePath });
 * logger.info({ hash }, 'Cache miss');
 * ```
 */
export function createLogger(
  context: string,
  metadata?: Record<string, unknown>
): Logger {
  return getRootLogger().child({
    context,
    ...metadata,
  });
}

/**
 * Get the root logger instance, creating a default one if needed.
 */
export function getRootLogger(): Logger {
  if (!rootLogger) {
    rootLogger = buildLogger({});
  }
  return rootLogger;
}

/**
 * Update the log level at runtime
 */
export function setLogLevel(level: LogLevel): void {
  getRootLogger().level = level;
}

/**
 * Check if a log level is enabled
 */
export function isLevelEnabled(level: LogLevel): boolean {
  return getRootLogger().isLevelEnabled(level);
}

/**
 * Flush any pending log entries
 *
 * Useful for ensuring logs are written before process exit.
 */
export function flushLogger(): Promise<void> {
  if (!rootLogger) {
    return Promise.resolve();
  }
  const logger = rootLogger;
  return new Promise((resolve) => {
    logger.flush(() => resolve());
  });
}
