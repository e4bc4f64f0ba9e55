// =====================================================
// Zod Validation Middleware
// =====================================================
// Validates request body, query params, or URL params against Zod schemas.
// Returns standardized 400 error response with specific field issues.

import { Request, Response, NextFunction } from 'express';
import { ZodSchema, z } from 'zod';
import { ValidationError } from '../utils/errors';
import { ERROR_CODES } from '@rank-ledger/shared-types';

// ===========================================
// Types
// ===========================================

export type ValidatedRequestProperty = 'body' | 'query' | 'params';

export interface ValidationErrorDetail {
  field: string;
  message: string;
}

// ===========================================
// Parsing
// ===========================================

/**
 * Parses a request value, throwing ValidationError with every field issue.
 *
 * @example
 * ```typescript
 * const { points } = parseRequest(approveSubmissionSchema, req.body);
 * ```
 */
export function parseRequest<T extends ZodSchema>(schema: T, value: unknown): z.infer<T> {
  const result = schema.safeParse(value);

  if (!result.success) {
    const errors = formatZodErrors(result.error);
    throw new ValidationError(
      `Validation failed: ${errors.map((e) => `${e.field}: ${e.message}`).join('; ')}`,
      ERROR_CODES.VALIDATION_ERROR
    );
  }

  return result.data;
}

// ===========================================
// Middleware Factory
// ===========================================

/**
 * Rejects the request before the handler runs when the given
 * property does not match the schema.
 */
export function validateRequest<T extends ZodSchema>(
  schema: T,
  property: ValidatedRequestProperty = 'body'
) {
  return (req: Request, _res: Response, next: NextFunction): void => {
    try {
      parseRequest(schema, req[property]);
      next();
    } catch (error) {
      next(error);
    }
  };
}

// ===========================================
// Helper Functions
// ===========================================

/**
 * Formats Zod validation errors into a clean array of field errors.
 */
export function formatZodErrors(error: z.ZodError): ValidationErrorDetail[] {
  return error.errors.map((err) => ({
    field: err.path.join('.') || 'unknown',
    message: err.message,
  }));
}
