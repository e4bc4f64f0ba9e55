// =====================================================
// Custom Error Classes
// =====================================================

import { ErrorCode, ERROR_CODES } from '@rank-ledger/shared-types';

export class AppError extends Error {
  public readonly statusCode: number;
  public readonly code: ErrorCode;
  public readonly isOperational: boolean;

  constructor(
    message: string,
    statusCode: number = 500,
    code: ErrorCode = ERROR_CODES.INTERNAL_ERROR,
    isOperational: boolean = true
  ) {
    super(message);
    this.name = this.constructor.name;
    this.statusCode = statusCode;
    this.code = code;
    this.isOperational = isOperational;

    Error.captureStackTrace(this, this.constructor);
  }
}

/**
 * Malformed input. Always raised before any write.
 */
export class ValidationError extends AppError {
  constructor(message: string, code: ErrorCode = ERROR_CODES.VALIDATION_ERROR) {
    super(message, 400, code);
  }
}

export class UnauthorizedError extends AppError {
  constructor(message: string = 'Unauthorized', code: ErrorCode = ERROR_CODES.TOKEN_INVALID) {
    super(message, 401, code);
  }
}

export class ForbiddenError extends AppError {
  constructor(message: string = 'Forbidden', code: ErrorCode = ERROR_CODES.FORBIDDEN) {
    super(message, 403, code);
  }
}

export class NotFoundError extends AppError {
  constructor(message: string, code: ErrorCode = ERROR_CODES.NOT_FOUND) {
    super(message, 404, code);
  }
}

export class ConflictError extends AppError {
  constructor(message: string, code: ErrorCode = ERROR_CODES.ACCOUNT_ALREADY_LINKED) {
    super(message, 409, code);
  }
}

export class InsufficientPointsError extends ValidationError {
  public readonly required: number;
  public readonly points: number;
  public readonly deficit: number;

  constructor(rankName: string, required: number, points: number) {
    super(
      `Needs ${required - points} more points to reach ${rankName} (${points}/${required})`,
      ERROR_CODES.INSUFFICIENT_POINTS
    );
    this.required = required;
    this.points = points;
    this.deficit = required - points;
  }
}

export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
