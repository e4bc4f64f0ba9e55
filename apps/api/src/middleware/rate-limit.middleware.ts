// =====================================================
// Rate Limiting Middleware
// =====================================================
// Protects write endpoints from flooding. The service runs as a
// single process, so the built-in memory store is used.

import rateLimit, { RateLimitRequestHandler } from 'express-rate-limit';
import { ApiResponse, ERROR_CODES } from '@rank-ledger/shared-types';

// ===========================================
// Types
// ===========================================

export interface RateLimitConfig {
  windowMs: number;
  max: number;
  message?: string;
}

// ===========================================
// Factory
// ===========================================

export function createRateLimiter(limit: RateLimitConfig): RateLimitRequestHandler {
  return rateLimit({
    windowMs: limit.windowMs,
    max: limit.max,
    standardHeaders: true,
    legacyHeaders: false,
    handler: (req, res) => {
      const response: ApiResponse = {
        success: false,
        error: {
          code: ERROR_CODES.RATE_LIMITED,
          message: limit.message ?? 'Too many requests. Please try again later.',
        },
        meta: {
          timestamp: new Date().toISOString(),
          requestId: req.id,
        },
      };
      res.status(429).json(response);
    },
  });
}

/**
 * Submission creation: 1 minute window, 10 requests max.
 */
export function createSubmissionRateLimiter(): RateLimitRequestHandler {
  return createRateLimiter({
    windowMs: 60 * 1000,
    max: 10,
    message: 'Too many submissions. Please slow down.',
  });
}
