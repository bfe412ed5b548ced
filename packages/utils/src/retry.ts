/**
 * Retry Logic
 *
 * Configurable retry wrapper with exponential backoff.
 */

import { sleep as defaultSleep } from './time.js';

export interface RetryOptions {
  maxAttempts: number;
  initialDelay: number;
  maxDelay: number;
  backoffMultiplier: number;
  retryIf?: (error: unknown) => boolean;
  onRetry?: (error: unknown, attempt: number, delayMs: number) => void;
  /**
   * Delay used between attempts. A server-provided hint (Retry-After)
   * can be honoured through `delayFor`.
   */
  sleep?: (ms: number) => Promise<void>;
  delayFor?: (error: unknown, computedDelay: number) => number;
}

const defaultOptions: RetryOptions = {
  maxAttempts: 3,
  initialDelay: 1000,
  maxDelay: 30000,
  backoffMultiplier: 2,
};

/**
 * Execute a function with automatic retry on failure
 */
export async function retry<T>(
  fn: (attempt: number) => Promise<T>,
  options: Partial<RetryOptions> = {}
): Promise<T> {
  const opts = { ...defaultOptions, ...options };
  const wait = opts.sleep ?? defaultSleep;

  let lastError: unknown;
  let delay = opts.initialDelay;

  for (let attempt = 1; attempt <= opts.maxAttempts; attempt++) {
    try {
      return await fn(attempt);
    } catch (error) {
      lastError = error;

      if (opts.retryIf && !opts.retryIf(error)) {
        throw error;
      }

      if (attempt === opts.maxAttempts) {
        throw error;
      }

      const actualDelay = Math.min(opts.delayFor?.(error, delay) ?? delay, opts.maxDelay);
      opts.onRetry?.(error, attempt, actualDelay);

      await wait(actualDelay);

      delay = Math.min(delay * opts.backoffMultiplier, opts.maxDelay);
    }
  }

  throw lastError;
}
