/**
 * Retry and timeout helpers for external service calls.
 *
 * Provides exponential backoff retry logic for operations that may fail
 * due to transient issues (network, timeouts, rate limits).
 */

import { isRetryable, TimeoutError } from './errors.js';

/**
 * Retry configuration options.
 */
export interface RetryOptions {
  /** Maximum number of retry attempts (default: 3) */
  maxRetries?: number;
  /** Initial delay in milliseconds (default: 1000ms) */
  initialDelayMs?: number;
  /** Maximum delay in milliseconds (default: 30000ms) */
  maxDelayMs?: number;
  /** Backoff multiplier (default: 2) */
  backoffMultiplier?: number;
  /** Whether to jitter the delay (default: true) */
  jitter?: boolean;
  /** Decides whether an error is worth another attempt (default: isRetryable) */
  shouldRetry?: (error: Error) => boolean;
  /** Callback called before each retry */
  onRetry?: (attempt: number, error: Error) => void;
}

const DEFAULT_RETRY_OPTIONS: Required<RetryOptions> = {
  maxRetries: 3,
  initialDelayMs: 1000,
  maxDelayMs: 30000,
  backoffMultiplier: 2,
  jitter: true,
  shouldRetry: isRetryable,
  onRetry: () => {},
};

/**
 * Retry an operation with exponential backoff.
 *
 * @param operation - Operation to retry; receives the 1-based attempt number
 * @param options - Retry configuration options
 * @returns Result of the operation
 * @throws Last error if all retries fail
 */
export async function retry<T>(
  operation: (attempt: number) => Promise<T>,
  options: RetryOptions = {}
): Promise<T> {
  const opts = { ...DEFAULT_RETRY_OPTIONS, ...options };

  let lastError: Error = new Error('Operation was not attempted');

  for (let attempt = 0; attempt <= opts.maxRetries; attempt++) {
    try {
      return await operation(attempt + 1);
    } catch (error) {
      lastError = error instanceof Error ? error : new Error(String(error));

      if (attempt === opts.maxRetries || !opts.shouldRetry(lastError)) {
        break;
      }

      const baseDelay = opts.initialDelayMs * Math.pow(opts.backoffMultiplier, attempt);
      const delay = Math.min(baseDelay, opts.maxDelayMs);

      // Jitter avoids lockstep retries from concurrent questions
      const jitteredDelay = opts.jitter
        ? delay * (0.5 + Math.random() * 0.5)
        : delay;

      opts.onRetry(attempt + 1, lastError);

      await delayMs(jitteredDelay);
    }
  }

  throw lastError;
}

/**
 * Race an operation against a timer.
 *
 * The operation receives an AbortSignal that fires when the timer wins,
 * so callers holding cancellable resources can release them.
 *
 * @param operation - Operation to bound
 * @param timeoutMs - Time budget in milliseconds
 * @param name - Operation name used in the TimeoutError
 */
export async function withTimeout<T>(
  operation: (signal: AbortSignal) => Promise<T>,
  timeoutMs: number,
  name?: string
): Promise<T> {
  const controller = new AbortController();
  let timer: NodeJS.Timeout | undefined;

  const timeout = new Promise<never>((_, reject) => {
    timer = setTimeout(() => {
      controller.abort();
      reject(new TimeoutError(`${name ?? 'Operation'} timed out after ${timeoutMs}ms`, timeoutMs, name));
    }, timeoutMs);
  });

  try {
    return await Promise.race([operation(controller.signal), timeout]);
  } finally {
    clearTimeout(timer);
  }
}

function delayMs(ms: number): Promise<void> {
  return new Promise(resolve => setTimeout(resolve, ms));
}
