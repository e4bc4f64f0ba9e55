// =====================================================
// HTTP Error Mapping
// =====================================================
// Converts axios failures into the external error types.

import axios from 'axios';
import { AppError, errorMessage } from '../../utils/errors';
import { ExternalServiceError, RateLimitedError } from './errors';

function parseRetryAfter(value: unknown): number | null {
  if (typeof value === 'number') return value;
  if (typeof value !== 'string') return null;
  const seconds = parseFloat(value);
  return isNaN(seconds) ? null : seconds;
}

export function toExternalError(error: unknown, provider: string, action: string): AppError {
  if (error instanceof AppError) {
    return error;
  }

  if (axios.isAxiosError(error)) {
    const status = error.response?.status;

    if (status === 429) {
      return new RateLimitedError(provider, parseRetryAfter(error.response?.headers['retry-after']));
    }

    return new ExternalServiceError(
      `${provider}: ${action} failed${status ? ` with status ${status}` : ''}: ${error.message}`,
      provider,
      status ?? null
    );
  }

  return new ExternalServiceError(`${provider}: ${action} failed: ${errorMessage(error)}`, provider);
}

export function isNotFoundResponse(error: unknown): boolean {
  return axios.isAxiosError(error) && error.response?.status === 404;
}
