/**
 * Retry utility with exponential backoff
 *
 * Configuration via environment variables:
 * - DEDUP_RETRY_MAX_ATTEMPTS: Maximum attempts (default: 3)
 * - DEDUP_RETRY_INITIAL_DELAY_MS: Initial delay in ms (default: 100)
 * - DEDUP_RETRY_MAX_DELAY_MS: Maximum delay in ms (default: 5000)
 * - DEDUP_RETRY_BACKOFF_MULTIPLIER: Backoff multiplier (default: 2)
 */

import { createComponentLogger } from './logger.js';
import { config } from '../config/index.js';
import { DedupError, ErrorCodes } from '../core/errors.js';

const logger = createComponentLogger('retry');

export interface RetryOptions {
  maxAttempts?: number;
  initialDelayMs?: number;
  maxDelayMs?: number;
  backoffMultiplier?: number;
  retryableErrors?: (error: Error) => boolean;
  onRetry?: (error: Error, attempt: number) => void;
  /** Stops waiting between attempts; the last error is rethrown */
  signal?: AbortSignal;
}

/**
 * Defaults are read on every call so reloaded config takes effect.
 */
function defaultOptions(): Required<Omit<RetryOptions, 'signal'>> {
  return {
    maxAttempts: config.retry.maxAttempts,
    initialDelayMs: config.retry.initialDelayMs,
    maxDelayMs: config.retry.maxDelayMs,
    backoffMultiplier: config.retry.backoffMultiplier,
    retryableErrors: () => true,
    onRetry: () => {},
  };
}

export async function withRetry<T>(fn: () => Promise<T>, options: RetryOptions = {}): Promise<T> {
  const opts = { ...defaultOptions(), ...options };
  let lastError: Error = new Error('Retry failed');
  let delay = opts.initialDelayMs;

  for (let attempt = 1; attempt <= opts.maxAttempts; attempt++) {
    try {
      return await fn();
    } catch (error) {
      lastError = error instanceof Error ? error : new Error(String(error));

      if (
        attempt === opts.maxAttempts ||
        !opts.retryableErrors(lastError) ||
        opts.signal?.aborted === true
      ) {
        throw lastError;
      }

      opts.onRetry(lastError, attempt);
      logger.warn({ error: lastError.message, attempt }, 'Retrying operation');

      await sleep(delay, opts.signal);
      delay = Math.min(delay * opts.backoffMultiplier, opts.maxDelayMs);
    }
  }

  throw lastError;
}

function sleep(ms: number, signal?: AbortSignal): Promise<void> {
  return new Promise((resolve) => {
    if (signal?.aborted === true) {
      resolve();
      return;
    }
    const timer = setTimeout(done, ms);
    function done(): void {
      clearTimeout(timer);
      signal?.removeEventListener('abort', done);
      resolve();
    }
    signal?.addEventListener('abort', done, { once: true });
  });
}

/**
 * Errors worth another attempt against a store: timeouts, lock contention and
 * dropped connections. Configuration and not-found errors are not.
 */
export function isRetryableStoreError(error: Error): boolean {
  if (error instanceof DedupError) {
    return error.code === ErrorCodes.TIMEOUT || error.code === ErrorCodes.SOURCE_UNAVAILABLE;
  }
  return isRetryableDbError(error) || isRetryableNetworkError(error);
}

export function isRetryableDbError(error: Error): boolean {
  const message = error.message.toLowerCase();
  return (
    message.includes('database is locked') ||
    message.includes('busy') ||
    message.includes('disk i/o error')
  );
}

export function isRetryableNetworkError(error: Error): boolean {
  const message = error.message.toLowerCase();
  return (
    message.includes('timeout') ||
    message.includes('econnreset') ||
    message.includes('econnrefused') ||
    message.includes('socket hang up') ||
    message.includes('network') ||
    message.includes('503') ||
    message.includes('502') ||
    message.includes('504')
  );
}
