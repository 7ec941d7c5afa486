/**
 * Unit tests for actor token verification
 */

import jwt from 'jsonwebtoken';

import { authService, requireActor } from '../../../src/auth/auth.service';
import { AuthRequest } from '../../../src/auth/auth.types';
import { ApiError } from '../../../src/middlewares/errorHandler';
import { ErrorCode } from '../../../src/types/errors';
import { Role } from '../../../src/types/ledger';

const SECRET = 'test-secret';

const codeOf = (fn: () => unknown): ErrorCode | undefined => {
  try {
    fn();
  } catch (error) {
    if (error instanceof ApiError) {
      return error.errorCode;
    }
  }
  return undefined;
};

describe('AuthService.verifyToken', () => {
  it('should return the actor from a valid token', () => {
    const token = jwt.sign({ userId: 'r1', role: 'reseller' }, SECRET);
    expect(authService.verifyToken(token)).toEqual({ id: 'r1', role: Role.RESELLER });
  });

  it('should reject a token signed with another secret', () => {
    const token = jwt.sign({ userId: 'r1', role: 'reseller' }, 'other-secret');
    expect(codeOf(() => authService.verifyToken(token))).toBe(ErrorCode.INVALID_TOKEN);
  });

  it('should reject an expired token', () => {
    const token = jwt.sign(
      { userId: 'r1', role: 'reseller', exp: Math.floor(Date.now() / 1000) - 60 },
      SECRET
    );
    expect(codeOf(() => authService.verifyToken(token))).toBe(ErrorCode.TOKEN_EXPIRED);
  });

  it('should reject an unknown role', () => {
    const token = jwt.sign({ userId: 'r1', role: 'superuser' }, SECRET);
    expect(codeOf(() => authService.verifyToken(token))).toBe(ErrorCode.INVALID_TOKEN);
  });

  it('should reject a token without userId', () => {
    const token = jwt.sign({ role: 'admin' }, SECRET);
    expect(codeOf(() => authService.verifyToken(token))).toBe(ErrorCode.INVALID_TOKEN);
  });

  it('should reject garbage', () => {
    expect(codeOf(() => authService.verifyToken('not-a-jwt'))).toBe(ErrorCode.INVALID_TOKEN);
  });
});

describe('requireActor', () => {
  it('should throw Unauthorized when no actor was set', () => {
    expect(codeOf(() => requireActor({} as AuthRequest))).toBe(ErrorCode.UNAUTHORIZED);
  });
});
