/**
 * Rate Limiting Middleware
 *
 * Counters live in the express-rate-limit memory store, so limits apply per
 * instance.
 *
 * Environment-based configuration:
 * - Production: Strict limits to prevent abuse
 * - Development: Relaxed limits for easier testing
 * - Test: Very lenient limits for automated tests
 *
 * Set RATE_LIMIT_DISABLED=true to disable all rate limiting.
 */

import { NextFunction, Request, RequestHandler, Response } from 'express';
import rateLimit from 'express-rate-limit';

import { AuthRequest } from '../auth/auth.types';
import { RATE_LIMIT_CONFIG } from '../config/environments';
import { logger } from '../observability';
import { ErrorCode } from '../types/errors';

import { ApiError } from './errorHandler';

/**
 * No-op middleware that passes through (used when rate limiting is disabled)
 */
const noopLimiter: RequestHandler = (_req: Request, _res: Response, next: NextFunction) => next();

const createLimiter = (limiter: RequestHandler): RequestHandler => {
  if (RATE_LIMIT_CONFIG.disabled) {
    logger.warn('Rate limiting is DISABLED via RATE_LIMIT_DISABLED=true');
    return noopLimiter;
  }
  return limiter;
};

/**
 * Global rate limiter
 * Applied to all routes except health checks and metrics
 * Configurable via RATE_LIMIT_WINDOW_MS and RATE_LIMIT_MAX_REQUESTS
 */
export const globalLimiter: RequestHandler = createLimiter(
  rateLimit({
    windowMs: RATE_LIMIT_CONFIG.global.windowMs,
    max: RATE_LIMIT_CONFIG.global.maxRequests,
    standardHeaders: true,
    legacyHeaders: false,
    handler: (_req, _res, next) => {
      next(new ApiError(ErrorCode.RATE_LIMIT_EXCEEDED, 'Too many requests, please try again later'));
    },
    skip: (req) => req.path.startsWith('/health') || req.path === '/metrics',
  })
);

/**
 * Transfer and issuance limiter, keyed by the authenticated actor
 * Configurable via TRANSFER_RATE_LIMIT_WINDOW_MS and TRANSFER_RATE_LIMIT_MAX
 */
export const transferLimiter: RequestHandler = createLimiter(
  rateLimit({
    windowMs: RATE_LIMIT_CONFIG.transfer.windowMs,
    max: RATE_LIMIT_CONFIG.transfer.maxRequests,
    standardHeaders: true,
    legacyHeaders: false,
    handler: (_req, _res, next) => {
      next(new ApiError(ErrorCode.TOO_MANY_TRANSFERS, 'Too many transfers, please try again later'));
    },
    keyGenerator: (req: AuthRequest) => req.actor?.id || req.ip || 'unknown',
    validate: false,
  })
);
