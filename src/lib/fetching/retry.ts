/**
 * Retry utility with exponential backoff
 */

import { env } from '../../config/env';
import { classifyError, ScrapingErrorInfo } from './errors';

const MAX_RETRY_DELAY = 60000; // 1 minute

export type Sleep = (ms: number) => Promise<void>;

export const sleep: Sleep = (ms) => new Promise((resolve) => setTimeout(resolve, ms));

export interface RetryOptions {
  maxRetries?: number; // total attempts, including the first
  baseDelay?: number;
  onRetry?: (error: ScrapingErrorInfo, attempt: number, delay: number) => void;
  sleep?: Sleep;
  random?: () => number;
}

/**
 * Determine if we should retry based on error
 */
export function shouldRetry(error: ScrapingErrorInfo, attemptCount: number, maxRetries: number): boolean {
  if (attemptCount >= maxRetries) return false;
  return error.retryable;
}

/**
 * Calculate retry delay with exponential backoff
 */
export function calculateRetryDelay(
  error: ScrapingErrorInfo,
  attemptCount: number,
  baseDelay: number = env.RETRY_BACKOFF_BASE,
  random: () => number = Math.random
): number {
  // Use error's suggested delay if available
  if (error.retryAfter !== undefined) {
    return Math.min(error.retryAfter, MAX_RETRY_DELAY);
  }

  const exponentialDelay = baseDelay * Math.pow(2, attemptCount);
  const jitter = random() * baseDelay;

  return Math.min(exponentialDelay + jitter, MAX_RETRY_DELAY);
}

/**
 * Retry wrapper for async functions. Non-retryable errors are rethrown as-is;
 * after the last attempt the last error is rethrown.
 */
export async function withRetry<T>(fn: () => Promise<T>, options: RetryOptions = {}): Promise<T> {
  const {
    maxRetries = env.MAX_RETRIES,
    baseDelay = env.RETRY_BACKOFF_BASE,
    onRetry,
    sleep: wait = sleep,
    random = Math.random,
  } = options;
  const attempts = Math.max(1, maxRetries);

  for (let attempt = 1; ; attempt++) {
    try {
      return await fn();
    } catch (error: unknown) {
      const info = classifyError(error);

      if (!shouldRetry(info, attempt, attempts)) {
        throw error;
      }

      const delay = calculateRetryDelay(info, attempt - 1, baseDelay, random);
      onRetry?.(info, attempt, delay);
      await wait(delay);
    }
  }
}
