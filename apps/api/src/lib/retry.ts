// =====================================================
// Retryable Call Wrapper
// =====================================================
// Retries an external mutating call while it is rate limited,
// with exponential backoff: baseDelay * 2^(attempt-1).
// Any other failure propagates immediately.

import { config } from '../config';
import { logger } from '../utils/logger';
import { isRateLimitedError } from '../services/external/errors';

export type Sleep = (ms: number) => Promise<void>;

export interface RetryOptions {
  maxAttempts?: number;
  baseDelayMs?: number;
  // Shown in log lines, e.g. "grant E2 to 1234"
  label?: string;
  sleep?: Sleep;
}

/**
 * Sleep for a specified number of milliseconds
 */
export function sleep(ms: number): Promise<void> {
  return new Promise((resolve) => setTimeout(resolve, ms));
}

export function backoffDelay(attempt: number, baseDelayMs: number): number {
  return baseDelayMs * Math.pow(2, attempt - 1);
}

export async function callWithRetry<T>(
  operation: () => Promise<T>,
  options: RetryOptions = {}
): Promise<T> {
  const maxAttempts = Math.max(1, options.maxAttempts ?? config.retry.maxAttempts);
  const baseDelayMs = options.baseDelayMs ?? config.retry.baseDelayMs;
  const wait = options.sleep ?? sleep;
  const label = options.label ?? 'external call';

  for (let attempt = 1; ; attempt++) {
    try {
      return await operation();
    } catch (error) {
      if (!isRateLimitedError(error)) {
        throw error;
      }

      if (attempt >= maxAttempts) {
        logger.error(`${label}: still rate limited after ${maxAttempts} attempts`);
        throw error;
      }

      const delay = backoffDelay(attempt, baseDelayMs);
      logger.warn(
        `${label}: rate limited (attempt ${attempt}/${maxAttempts}), retrying in ${delay}ms`
      );
      await wait(delay);
    }
  }
}
