/**
 * Error Handling Middleware
 *
 * Provides centralized error handling with consistent error response format,
 * error logging, and error sanitization for production.
 */

import { Request, Response, NextFunction } from 'express';
import { config } from '../config';
import { logger, getCorrelationId } from '../observability';
import {
  ErrorCode,
  ErrorResponse,
  errorCodeToStatus,
  retryableErrorCodes,
} from '../types/errors';

/**
 * Extended Error interface with additional properties
 */
export interface AppError extends Error {
  statusCode?: number;
  errorCode?: ErrorCode;
  isOperational?: boolean;
  validationErrors?: Record<string, string[]>;
}

/**
 * Main error handler middleware
 *
 * Catches all errors and returns a consistent JSON response format.
 * Logs errors with correlation ID for traceability.
 */
export const errorHandler = (
  err: AppError,
  req: Request,
  res: Response,
  _next: NextFunction
): void => {
  const correlationId = getCorrelationId() || 'unknown';

  const errorCode = err.errorCode || ErrorCode.INTERNAL_ERROR;
  const statusCode = err.statusCode || errorCodeToStatus[errorCode] || 500;

  const logPayload = {
    correlationId,
    errorCode,
    statusCode,
    error: err.message,
    stack: config.isDevelopment ? err.stack : undefined,
    path: req.path,
    method: req.method,
    isOperational: err.isOperational,
  };

  if (statusCode >= 500) {
    logger.error(logPayload, `Error: ${err.message}`);
  } else {
    logger.warn(logPayload, `Request rejected: ${err.message}`);
  }

  // Sanitize error message for production 5xx errors
  const message =
    config.isProduction && statusCode >= 500
      ? 'Internal server error'
      : err.message || 'An error occurred';

  const response: ErrorResponse = {
    success: false,
    error: {
      code: errorCode,
      message,
      retryable: retryableErrorCodes.has(errorCode),
      timestamp: new Date().toISOString(),
      correlationId,
    },
  };

  if (err.validationErrors) {
    response.error.details = err.validationErrors;
  }

  res.status(statusCode).json(response);
};

/**
 * Not found handler for unmatched routes
 */
export const notFoundHandler = (
  req: Request,
  res: Response,
  _next: NextFunction
): void => {
  const correlationId = getCorrelationId() || 'unknown';

  const response: ErrorResponse = {
    success: false,
    error: {
      code: ErrorCode.RESOURCE_NOT_FOUND,
      message: `Route ${req.method} ${req.path} not found`,
      retryable: false,
      timestamp: new Date().toISOString(),
      correlationId,
    },
  };

  res.status(404).json(response);
};

/**
 * API Error class for throwing operational errors
 */
export class ApiError extends Error implements AppError {
  statusCode: number;
  errorCode: ErrorCode;
  isOperational: boolean;
  validationErrors?: Record<string, string[]>;

  constructor(
    errorCode: ErrorCode,
    message: string,
    options?: {
      statusCode?: number;
      isOperational?: boolean;
      validationErrors?: Record<string, string[]>;
    }
  ) {
    super(message);
    this.name = 'ApiError';
    this.errorCode = errorCode;
    this.statusCode = options?.statusCode || errorCodeToStatus[errorCode] || 500;
    this.isOperational = options?.isOperational ?? true;
    this.validationErrors = options?.validationErrors;
    Error.captureStackTrace(this, this.constructor);
  }

  get retryable(): boolean {
    return retryableErrorCodes.has(this.errorCode);
  }

  /**
   * Factory methods for common errors
   */
  static unauthorized(message = 'Unauthorized'): ApiError {
    return new ApiError(ErrorCode.UNAUTHORIZED, message);
  }

  static invalidToken(message = 'Invalid token'): ApiError {
    return new ApiError(ErrorCode.INVALID_TOKEN, message);
  }

  static tokenExpired(message = 'Token expired'): ApiError {
    return new ApiError(ErrorCode.TOKEN_EXPIRED, message);
  }

  static forbidden(message = 'Forbidden'): ApiError {
    return new ApiError(ErrorCode.FORBIDDEN, message);
  }

  static validationError(
    message: string,
    validationErrors?: Record<string, string[]>
  ): ApiError {
    return new ApiError(ErrorCode.VALIDATION_ERROR, message, {
      validationErrors,
    });
  }

  static invalidAmount(message = 'Amount must be a positive whole number of credits'): ApiError {
    return new ApiError(ErrorCode.INVALID_AMOUNT, message);
  }

  static insufficientFunds(message = 'Insufficient credits'): ApiError {
    return new ApiError(ErrorCode.INSUFFICIENT_FUNDS, message);
  }

  static balanceLimitExceeded(
    message = 'Balance would exceed the largest representable credit amount'
  ): ApiError {
    return new ApiError(ErrorCode.BALANCE_LIMIT_EXCEEDED, message);
  }

  static policyViolation(reason: string): ApiError {
    return new ApiError(ErrorCode.POLICY_VIOLATION, reason);
  }

  static idempotencyConflict(
    message = 'Idempotency key was already used for a different request'
  ): ApiError {
    return new ApiError(ErrorCode.IDEMPOTENCY_CONFLICT, message);
  }

  static notFound(resource: string): ApiError {
    const codeMap: Record<string, ErrorCode> = {
      account: ErrorCode.ACCOUNT_NOT_FOUND,
      entry: ErrorCode.ENTRY_NOT_FOUND,
    };
    const code = codeMap[resource.toLowerCase()] || ErrorCode.RESOURCE_NOT_FOUND;
    return new ApiError(code, `${resource} not found`);
  }

  static alreadyExists(resource: string): ApiError {
    const codeMap: Record<string, ErrorCode> = {
      account: ErrorCode.ACCOUNT_ALREADY_EXISTS,
    };
    const code = codeMap[resource.toLowerCase()] || ErrorCode.VALIDATION_ERROR;
    return new ApiError(code, `${resource} already exists`);
  }

  static transientStoreFailure(message = 'Ledger store is temporarily unavailable'): ApiError {
    return new ApiError(ErrorCode.TRANSIENT_STORE_FAILURE, message);
  }

  static internal(message = 'Internal server error'): ApiError {
    return new ApiError(ErrorCode.INTERNAL_ERROR, message, {
      isOperational: false,
    });
  }

  static database(message = 'Database error'): ApiError {
    return new ApiError(ErrorCode.DATABASE_ERROR, message);
  }

  static rateLimitExceeded(message = 'Rate limit exceeded'): ApiError {
    return new ApiError(ErrorCode.RATE_LIMIT_EXCEEDED, message);
  }
}
