// =====================================================
// API Types - Request/Response Contracts
// =====================================================

// Standard API response envelope
export interface ApiResponse<T = unknown> {
  success: boolean;
  data?: T;
  error?: ApiError;
  meta?: ResponseMeta;
}

export interface ApiError {
  code: string;
  message: string;
  details?: unknown;
}

export interface ResponseMeta {
  timestamp: string;
  requestId: string;
}

// Error codes
export const ERROR_CODES = {
  // Auth errors
  TOKEN_INVALID: 'AUTH_001',
  TOKEN_EXPIRED: 'AUTH_002',

  // Member errors
  MEMBER_NOT_FOUND: 'MEMBER_001',
  ACCOUNT_ALREADY_LINKED: 'MEMBER_002',
  ACCOUNT_NOT_LINKED: 'MEMBER_003',
  POINTS_WOULD_BE_NEGATIVE: 'MEMBER_004',
  CANNOT_TARGET_SELF: 'MEMBER_005',

  // Rank errors
  RANK_NOT_FOUND: 'RANK_001',
  INSUFFICIENT_POINTS: 'RANK_002',
  ALREADY_AT_RANK: 'RANK_003',
  MAX_RANK_REACHED: 'RANK_004',
  INVALID_RANK_CONFIG: 'RANK_005',

  // Submission errors
  SUBMISSION_NOT_FOUND: 'SUBMISSION_001',
  INVALID_POINTS: 'SUBMISSION_002',
  INVALID_TIME_RANGE: 'SUBMISSION_003',
  NO_PARTICIPANTS: 'SUBMISSION_004',

  // External platform errors
  EXTERNAL_RATE_LIMITED: 'EXTERNAL_001',
  EXTERNAL_SERVICE_ERROR: 'EXTERNAL_002',
  EXTERNAL_ACCOUNT_NOT_FOUND: 'EXTERNAL_003',
  EXTERNAL_ACCOUNT_NOT_IN_GROUP: 'EXTERNAL_004',
  EXTERNAL_ROLE_NOT_FOUND: 'EXTERNAL_005',

  // Generic errors
  VALIDATION_ERROR: 'VALIDATION_001',
  INTERNAL_ERROR: 'INTERNAL_001',
  NOT_FOUND: 'NOT_FOUND_001',
  FORBIDDEN: 'FORBIDDEN_001',
  RATE_LIMITED: 'RATE_001',
} as const;

export type ErrorCode = (typeof ERROR_CODES)[keyof typeof ERROR_CODES];
