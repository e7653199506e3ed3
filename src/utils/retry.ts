/**
 * Retry utility for callers that want to ride out transient failures.
 * Nothing below the controller retries on its own.
 */

import logger from './logger.js';
import { TransportError } from '../errors/wam-errors.js';

export interface RetryOptions {
  /** Maximum number of retry attempts (not including the initial attempt) */
  maxAttempts?: number;
  /** Initial delay between retries in milliseconds */
  initialDelay?: number;
  /** Maximum delay between retries in milliseconds */
  maxDelay?: number;
  /** Exponential backoff factor (e.g., 2 = double the delay each time) */
  backoffFactor?: number;
  /** Function to determine if an error is retryable */
  isRetryable?: (error: unknown) => boolean;
  /** Called before each retry attempt */
  onRetry?: (error: unknown, attempt: number) => void;
}

const DEFAULT_OPTIONS: Required<Omit<RetryOptions, 'onRetry'>> = {
  maxAttempts: 2,
  initialDelay: 200,
  maxDelay: 2000,
  backoffFactor: 2,
  isRetryable: isDefaultRetryable
};

/**
 * Only network-level failures are worth repeating; a device that answered
 * with an error will answer the same way again.
 */
export function isDefaultRetryable(error: unknown): boolean {
  return error instanceof TransportError;
}

/**
 * Sleep for the specified number of milliseconds
 */
function sleep(ms: number): Promise<void> {
  return new Promise(resolve => setTimeout(resolve, ms));
}

/**
 * Execute an async function with retry logic
 */
export async function retry<T>(
  fn: () => Promise<T>,
  options?: RetryOptions,
  operation = 'operation'
): Promise<T> {
  const opts = { ...DEFAULT_OPTIONS, ...options };
  let delay = opts.initialDelay;

  for (let attempt = 0; ; attempt++) {
    try {
      return await fn();
    } catch (error) {
      if (attempt >= opts.maxAttempts || !opts.isRetryable(error)) {
        throw error;
      }

      logger.debug(
        `Retry attempt ${attempt + 1}/${opts.maxAttempts} for ${operation} after error:`,
        error instanceof Error ? error.message : error
      );

      if (opts.onRetry) {
        opts.onRetry(error, attempt + 1);
      }

      await sleep(delay);

      // Calculate next delay with exponential backoff
      delay = Math.min(delay * opts.backoffFactor, opts.maxDelay);
    }
  }
}
