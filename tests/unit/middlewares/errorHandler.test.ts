/**
 * Unit tests for the error handler and ApiError
 */

import { Request, Response } from 'express';

import { ApiError, errorHandler, notFoundHandler } from '../../../src/middlewares/errorHandler';
import { ErrorCode } from '../../../src/types/errors';

const createResponse = () => {
  const state: { status?: number; body?: unknown } = {};
  const res = {
    status(code: number) {
      state.status = code;
      return res;
    },
    json(body: unknown) {
      state.body = body;
      return res;
    },
  };
  return { res, state };
};

const request = { path: '/transfers', method: 'POST' };

describe('ApiError', () => {
  it.each([
    [ApiError.invalidAmount(), ErrorCode.INVALID_AMOUNT, 400],
    [ApiError.insufficientFunds(), ErrorCode.INSUFFICIENT_FUNDS, 400],
    [ApiError.notFound('Account'), ErrorCode.ACCOUNT_NOT_FOUND, 404],
    [ApiError.notFound('Entry'), ErrorCode.ENTRY_NOT_FOUND, 404],
    [ApiError.policyViolation('nope'), ErrorCode.POLICY_VIOLATION, 403],
    [ApiError.idempotencyConflict(), ErrorCode.IDEMPOTENCY_CONFLICT, 409],
    [ApiError.alreadyExists('Account'), ErrorCode.ACCOUNT_ALREADY_EXISTS, 409],
    [ApiError.balanceLimitExceeded(), ErrorCode.BALANCE_LIMIT_EXCEEDED, 422],
    [ApiError.transientStoreFailure(), ErrorCode.TRANSIENT_STORE_FAILURE, 503],
    [ApiError.unauthorized(), ErrorCode.UNAUTHORIZED, 401],
    [ApiError.forbidden(), ErrorCode.FORBIDDEN, 403],
  ])('%s should map to code %i and status %i', (error, code, status) => {
    expect(error.errorCode).toBe(code);
    expect(error.statusCode).toBe(status);
  });

  it('should mark only transient and rate limit errors retryable', () => {
    expect(ApiError.transientStoreFailure().retryable).toBe(true);
    expect(ApiError.rateLimitExceeded().retryable).toBe(true);
    expect(ApiError.insufficientFunds().retryable).toBe(false);
  });

  it('should build not found messages from the resource', () => {
    expect(ApiError.notFound('Account').message).toBe('Account not found');
  });
});

describe('errorHandler', () => {
  it('should render an ApiError in the error envelope', () => {
    const { res, state } = createResponse();

    errorHandler(
      ApiError.policyViolation('Business owner does not belong to this reseller'),
      request as Request,
      res as unknown as Response,
      jest.fn()
    );

    expect(state.status).toBe(403);
    expect(state.body).toEqual({
      success: false,
      error: {
        code: ErrorCode.POLICY_VIOLATION,
        message: 'Business owner does not belong to this reseller',
        retryable: false,
        timestamp: expect.any(String),
        correlationId: 'unknown',
      },
    });
  });

  it('should include validation details', () => {
    const { res, state } = createResponse();

    errorHandler(
      ApiError.validationError('Validation failed', { amount: ['Amount is required'] }),
      request as Request,
      res as unknown as Response,
      jest.fn()
    );

    expect(state.status).toBe(400);
    expect(state.body).toMatchObject({
      error: { code: ErrorCode.VALIDATION_ERROR, details: { amount: ['Amount is required'] } },
    });
  });

  it('should treat plain errors as internal', () => {
    const { res, state } = createResponse();

    errorHandler(new Error('boom'), request as Request, res as unknown as Response, jest.fn());

    expect(state.status).toBe(500);
    expect(state.body).toMatchObject({
      error: { code: ErrorCode.INTERNAL_ERROR, message: 'boom', retryable: false },
    });
  });

  it('should flag transient store failures as retryable', () => {
    const { res, state } = createResponse();

    errorHandler(
      ApiError.transientStoreFailure(),
      request as Request,
      res as unknown as Response,
      jest.fn()
    );

    expect(state.status).toBe(503);
    expect(state.body).toMatchObject({
      error: { code: ErrorCode.TRANSIENT_STORE_FAILURE, retryable: true },
    });
  });
});

describe('notFoundHandler', () => {
  it('should describe the unmatched route', () => {
    const { res, state } = createResponse();

    notFoundHandler(
      { path: '/nowhere', method: 'GET' } as Request,
      res as unknown as Response,
      jest.fn()
    );

    expect(state.status).toBe(404);
    expect(state.body).toMatchObject({
      error: { code: ErrorCode.RESOURCE_NOT_FOUND, message: 'Route GET /nowhere not found' },
    });
  });
});
