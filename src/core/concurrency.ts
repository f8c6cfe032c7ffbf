/**
 * Concurrency Utilities
 *
 * Sequential chunking, retry with exponential backoff and timeouts for
 * calls into the org and the web. Nothing here runs work in parallel.
 */

import { DEFAULTS } from '../config/defaults.js';
import { PermanentAPIError, TransientAPIError } from './errors.js';

/**
 * Backoff settings shared by record-level retries and whole-call retries
 */
export interface BackoffOptions {
  /** Maximum number of attempts, first one included (default: 3) */
  attempts?: number;
  /** Initial delay in milliseconds (default: 1000) */
  delayMs?: number;
  /** Multiplier for exponential backoff (default: 2) */
  backoffMultiplier?: number;
  /** Maximum delay in milliseconds (default: 30000) */
  maxDelayMs?: number;
}

/**
 * Options for retry with backoff
 */
export interface RetryOptions extends BackoffOptions {
  /** Function to determine if error is retryable (default: always retry) */
  shouldRetry?: (error: Error) => boolean;
  /** Callback when a retry occurs */
  onRetry?: (error: Error, attempt: number, delayMs: number) => void;
}

/**
 * Delay to wait after the given (1-based) failed attempt.
 *
 * @example
 * backoffDelay(1, { delayMs: 1000 }); // 1000
 * backoffDelay(3, { delayMs: 1000 }); // 4000
 */
export function backoffDelay(attempt: number, options: BackoffOptions = {}): number {
  const {
    delayMs = DEFAULTS.RETRY_DELAY_MS,
    backoffMultiplier = DEFAULTS.RETRY_BACKOFF_MULTIPLIER,
    maxDelayMs = DEFAULTS.RETRY_MAX_DELAY_MS,
  } = options;

  return Math.min(delayMs * Math.pow(backoffMultiplier, attempt - 1), maxDelayMs);
}

/**
 * Wraps an async function with exponential backoff retry logic.
 *
 * @param fn - The async function to execute
 * @param options - Retry configuration
 * @returns The result of the function, or throws after all retries exhausted
 *
 * @example
 * const html = await retryWithBackoff(() => fetchHtml(url), {
 *   attempts: 3,
 *   shouldRetry: isRetryableError,
 * });
 */
export async function retryWithBackoff<T>(
  fn: () => Promise<T>,
  options: RetryOptions = {}
): Promise<T> {
  const { attempts = DEFAULTS.RETRY_ATTEMPTS, shouldRetry = () => true, onRetry } = options;

  let lastError: Error = new Error('retryWithBackoff called with no attempts');

  for (let attempt = 1; attempt <= attempts; attempt++) {
    try {
      return await fn();
    } catch (error) {
      lastError = error instanceof Error ? error : new Error(String(error));

      if (attempt === attempts || !shouldRetry(lastError)) {
        throw lastError;
      }

      const delay = backoffDelay(attempt, options);
      onRetry?.(lastError, attempt, delay);
      await sleep(delay);
    }
  }

  throw lastError;
}

/**
 * Sleep for a specified number of milliseconds
 */
export function sleep(ms: number): Promise<void> {
  if (ms <= 0) {
    return Promise.resolve();
  }
  return new Promise((resolve) => setTimeout(resolve, ms));
}

/**
 * Reject with a TransientAPIError when `promise` takes longer than `ms`.
 * A non-positive `ms` disables the timeout.
 */
export async function withTimeout<T>(promise: Promise<T>, ms: number, label: string): Promise<T> {
  if (ms <= 0) {
    return promise;
  }

  let timer: NodeJS.Timeout | undefined;
  const timeout = new Promise<never>((_, reject) => {
    timer = setTimeout(
      () => reject(new TransientAPIError(`${label} timed out after ${ms}ms`, 'TIMEOUT')),
      ms
    );
  });

  try {
    return await Promise.race([promise, timeout]);
  } finally {
    clearTimeout(timer);
  }
}

/**
 * Salesforce status codes that describe a temporary condition
 */
export const TRANSIENT_STATUS_CODES: ReadonlySet<string> = new Set([
  'REQUEST_LIMIT_EXCEEDED',
  'UNABLE_TO_LOCK_ROW',
  'SERVER_UNAVAILABLE',
  'REQUEST_RUNNING_TOO_LONG',
  'QUERY_TIMEOUT',
  'TIMEOUT',
]);

/**
 * Check if a per-record status code should be retried
 */
export function isTransientStatusCode(statusCode: string): boolean {
  return TRANSIENT_STATUS_CODES.has(statusCode);
}

/**
 * Check if an error is a Salesforce rate limit error
 */
export function isSalesforceRateLimitError(error: Error): boolean {
  const message = error.message || '';
  const errorCode = 'errorCode' in error ? error.errorCode : undefined;

  return (
    errorCode === 'REQUEST_LIMIT_EXCEEDED' ||
    message.includes('REQUEST_LIMIT_EXCEEDED') ||
    message.includes('TotalRequests Limit exceeded') ||
    message.includes('ConcurrentPerOrgLongTxn Limit exceeded')
  );
}

/**
 * Check if an error is retryable (network issues, rate limits, etc.)
 */
export function isRetryableError(error: Error): boolean {
  const message = error.message || '';

  if (error instanceof TransientAPIError) {
    return true;
  }
  if (error instanceof PermanentAPIError) {
    return false;
  }

  if (isSalesforceRateLimitError(error)) {
    return true;
  }

  // Network errors
  if (
    message.includes('ETIMEDOUT') ||
    message.includes('ECONNRESET') ||
    message.includes('ECONNREFUSED') ||
    message.includes('socket hang up')
  ) {
    return true;
  }

  // Salesforce temporary errors
  if (message.includes('UNABLE_TO_LOCK_ROW') || message.includes('SERVER_UNAVAILABLE')) {
    return true;
  }

  return false;
}

/**
 * Split items into consecutive chunks of at most `size` elements.
 * Order is preserved and only the last chunk may be smaller.
 *
 * @example
 * chunk([1, 2, 3, 4, 5], 2); // [[1, 2], [3, 4], [5]]
 */
export function chunk<T>(items: readonly T[], size: number): T[][] {
  if (!Number.isInteger(size) || size < 1) {
    throw new RangeError(`Chunk size must be a positive integer, got ${size}`);
  }

  const chunks: T[][] = [];
  for (let start = 0; start < items.length; start += size) {
    chunks.push(items.slice(start, start + size));
  }
  return chunks;
}
