/**
 * Error Codes for the Credit Ledger API
 *
 * Categorized by error type:
 * - 1xxx: Authentication errors
 * - 2xxx: Validation errors
 * - 3xxx: Business logic errors
 * - 4xxx: Rate limiting errors
 * - 5xxx: System errors
 */

export enum ErrorCode {
  // Authentication errors (1xxx)
  UNAUTHORIZED = 1001,
  INVALID_TOKEN = 1002,
  TOKEN_EXPIRED = 1003,
  FORBIDDEN = 1005,

  // Validation errors (2xxx)
  VALIDATION_ERROR = 2001,
  INVALID_AMOUNT = 2002,
  INVALID_INPUT = 2003,

  // Business errors (3xxx)
  INSUFFICIENT_FUNDS = 3001,
  RESOURCE_NOT_FOUND = 3010,
  ACCOUNT_NOT_FOUND = 3011,
  ENTRY_NOT_FOUND = 3012,
  POLICY_VIOLATION = 3013,
  IDEMPOTENCY_CONFLICT = 3014,
  ACCOUNT_ALREADY_EXISTS = 3015,
  BALANCE_LIMIT_EXCEEDED = 3016,

  // Rate limiting errors (4xxx)
  RATE_LIMIT_EXCEEDED = 4001,
  TOO_MANY_TRANSFERS = 4003,

  // System errors (5xxx)
  INTERNAL_ERROR = 5001,
  DATABASE_ERROR = 5002,
  TRANSIENT_STORE_FAILURE = 5006,
}

/**
 * Error code to HTTP status code mapping
 */
export const errorCodeToStatus: Record<ErrorCode, number> = {
  // Auth errors -> 401/403
  [ErrorCode.UNAUTHORIZED]: 401,
  [ErrorCode.INVALID_TOKEN]: 401,
  [ErrorCode.TOKEN_EXPIRED]: 401,
  [ErrorCode.FORBIDDEN]: 403,

  // Validation errors -> 400
  [ErrorCode.VALIDATION_ERROR]: 400,
  [ErrorCode.INVALID_AMOUNT]: 400,
  [ErrorCode.INVALID_INPUT]: 400,

  // Business errors -> 400/403/404/409/422
  [ErrorCode.INSUFFICIENT_FUNDS]: 400,
  [ErrorCode.RESOURCE_NOT_FOUND]: 404,
  [ErrorCode.ACCOUNT_NOT_FOUND]: 404,
  [ErrorCode.ENTRY_NOT_FOUND]: 404,
  [ErrorCode.POLICY_VIOLATION]: 403,
  [ErrorCode.IDEMPOTENCY_CONFLICT]: 409,
  [ErrorCode.ACCOUNT_ALREADY_EXISTS]: 409,
  [ErrorCode.BALANCE_LIMIT_EXCEEDED]: 422,

  // Rate limiting errors -> 429
  [ErrorCode.RATE_LIMIT_EXCEEDED]: 429,
  [ErrorCode.TOO_MANY_TRANSFERS]: 429,

  // System errors -> 500/503
  [ErrorCode.INTERNAL_ERROR]: 500,
  [ErrorCode.DATABASE_ERROR]: 503,
  [ErrorCode.TRANSIENT_STORE_FAILURE]: 503,
};

/**
 * Codes the caller may retry with the identical request
 */
export const retryableErrorCodes: ReadonlySet<ErrorCode> = new Set([
  ErrorCode.RATE_LIMIT_EXCEEDED,
  ErrorCode.TOO_MANY_TRANSFERS,
  ErrorCode.TRANSIENT_STORE_FAILURE,
]);

/**
 * Standard error response format
 */
export interface ErrorResponse {
  success: false;
  error: {
    code: ErrorCode;
    message: string;
    details?: Record<string, string[]>;
    retryable: boolean;
    timestamp: string;
    correlationId?: string;
  };
}

/**
 * Standard success response format
 */
export interface SuccessResponse<T = unknown> {
  success: true;
  data: T;
}

/**
 * API Response type
 */
export type ApiResponse<T = unknown> = SuccessResponse<T> | ErrorResponse;
