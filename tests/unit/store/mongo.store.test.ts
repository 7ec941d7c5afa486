/**
 * Unit tests for the pure parts of the MongoDB store: query building and
 * driver error translation. No database connection is made.
 */

import mongoose from 'mongoose';

import { ApiError } from '../../../src/middlewares/errorHandler';
import { buildEntryFilter, translateStoreError } from '../../../src/store/mongo.store';
import { ErrorCode } from '../../../src/types/errors';
import { EntryKind, Role } from '../../../src/types/ledger';

describe('buildEntryFilter', () => {
  it('should match everything without conditions', () => {
    expect(buildEntryFilter({ limit: 10, order: 'asc' })).toEqual({});
  });

  it('should match both directions for an account', () => {
    expect(buildEntryFilter({ accountId: 'r1', limit: 10, order: 'asc' })).toEqual({
      $and: [{ $or: [{ fromAccountId: 'r1' }, { toAccountId: 'r1' }] }],
    });
  });

  it('should match the counterpart role on the opposite side', () => {
    expect(
      buildEntryFilter({
        accountId: 'r1',
        counterpartRole: Role.BUSINESS_OWNER,
        limit: 10,
        order: 'asc',
      })
    ).toEqual({
      $and: [
        {
          $or: [
            { fromAccountId: 'r1', toRole: Role.BUSINESS_OWNER },
            { toAccountId: 'r1', fromRole: Role.BUSINESS_OWNER },
          ],
        },
      ],
    });
  });

  it('should match the role on either side when listing every entry', () => {
    expect(
      buildEntryFilter({ counterpartRole: Role.BUSINESS_OWNER, limit: 10, order: 'asc' })
    ).toEqual({
      $and: [{ $or: [{ fromRole: Role.BUSINESS_OWNER }, { toRole: Role.BUSINESS_OWNER }] }],
    });
  });

  it('should bound the cursor in the direction of the order', () => {
    const from = new Date('2026-01-01T00:00:00.000Z');
    const to = new Date('2026-02-01T00:00:00.000Z');

    expect(
      buildEntryFilter({ kind: EntryKind.TRANSFER, from, to, cursor: 9, limit: 5, order: 'desc' })
    ).toEqual({
      $and: [
        { kind: EntryKind.TRANSFER },
        { createdAt: { $gte: from } },
        { createdAt: { $lt: to } },
        { entryId: { $lt: 9 } },
      ],
    });
  });

  it('should keep a zero cursor', () => {
    expect(buildEntryFilter({ cursor: 0, limit: 5, order: 'asc' })).toEqual({
      $and: [{ entryId: { $gt: 0 } }],
    });
  });
});

describe('translateStoreError', () => {
  const codeOf = (error: Error): ErrorCode | undefined =>
    error instanceof ApiError ? error.errorCode : undefined;

  it('should pass ApiErrors through unchanged', () => {
    const original = ApiError.insufficientFunds();
    expect(translateStoreError(original)).toBe(original);
  });

  it('should turn a duplicate idempotency key into a conflict', () => {
    const error = new mongoose.mongo.MongoServerError({
      message: 'E11000 duplicate key error',
      code: 11000,
      keyPattern: { idempotencyKey: 1 },
    });
    expect(codeOf(translateStoreError(error))).toBe(ErrorCode.IDEMPOTENCY_CONFLICT);
  });

  it('should turn a duplicate account id into AccountAlreadyExists', () => {
    const error = new mongoose.mongo.MongoServerError({
      message: 'E11000 duplicate key error',
      code: 11000,
      keyPattern: { accountId: 1 },
    });
    expect(codeOf(translateStoreError(error))).toBe(ErrorCode.ACCOUNT_ALREADY_EXISTS);
  });

  it('should treat transient transaction errors as retryable store failures', () => {
    const error = new mongoose.mongo.MongoServerError({
      message: 'WriteConflict',
      code: 112,
      errorLabels: ['TransientTransactionError'],
    });
    expect(codeOf(translateStoreError(error))).toBe(ErrorCode.TRANSIENT_STORE_FAILURE);
  });

  it('should treat network errors as retryable store failures', () => {
    const error = new mongoose.mongo.MongoNetworkError('connection reset');
    expect(codeOf(translateStoreError(error))).toBe(ErrorCode.TRANSIENT_STORE_FAILURE);
  });

  it('should pass other errors through', () => {
    const error = new Error('unexpected');
    expect(translateStoreError(error)).toBe(error);
  });

  it('should wrap non-error values', () => {
    expect(translateStoreError('bad').message).toBe('bad');
  });
});
