// =====================================================
// External Platform Errors
// =====================================================
// Failures raised by the group platform and grant clients.
// The retry wrapper only recognises RateLimitedError.

import { AppError } from '../../utils/errors';
import { ErrorCode, ERROR_CODES } from '@rank-ledger/shared-types';

/**
 * Non-retryable failure of an external call (bad argument, auth failure,
 * unresolvable account, upstream 5xx).
 */
export class ExternalServiceError extends AppError {
  public readonly provider: string;
  public readonly status: number | null;

  constructor(
    message: string,
    provider: string,
    status: number | null = null,
    code: ErrorCode = ERROR_CODES.EXTERNAL_SERVICE_ERROR
  ) {
    super(message, 502, code, true);
    this.provider = provider;
    this.status = status;
  }
}

/**
 * Thrown when an external API answers 429
 */
export class RateLimitedError extends AppError {
  public readonly provider: string;
  public readonly retryAfterSeconds: number | null;

  constructor(provider: string, retryAfterSeconds: number | null = null) {
    super(
      `Rate limited by ${provider}${retryAfterSeconds !== null ? `. Retry after ${retryAfterSeconds}s` : ''}`,
      429,
      ERROR_CODES.EXTERNAL_RATE_LIMITED,
      true
    );
    this.provider = provider;
    this.retryAfterSeconds = retryAfterSeconds;
  }
}

export function isRateLimitedError(error: unknown): error is RateLimitedError {
  return error instanceof RateLimitedError;
}
