import jwt, { VerifyOptions } from 'jsonwebtoken';

import { config } from '../config';
import { ApiError } from '../middlewares/errorHandler';
import { Actor, isRole } from '../types/ledger';

import { AuthRequest } from './auth.types';

/**
 * Verifies actor tokens. Tokens are issued elsewhere; this service only
 * checks the signature and reads `{ userId, role }`.
 */
export class AuthService {
  verifyToken(token: string): Actor {
    const options: VerifyOptions = config.jwt.issuer ? { issuer: config.jwt.issuer } : {};

    let payload: string | jwt.JwtPayload;
    try {
      payload = jwt.verify(token, config.jwt.secret, options);
    } catch (error) {
      if (error instanceof jwt.TokenExpiredError) {
        throw ApiError.tokenExpired();
      }
      if (error instanceof jwt.JsonWebTokenError) {
        throw ApiError.invalidToken();
      }
      throw ApiError.invalidToken('Token verification failed');
    }

    if (typeof payload === 'string') {
      throw ApiError.invalidToken('Token payload must be an object');
    }

    const { userId, role } = payload;
    if (typeof userId !== 'string' || userId.length === 0) {
      throw ApiError.invalidToken('Token is missing userId');
    }
    if (!isRole(role)) {
      throw ApiError.invalidToken('Token carries an unknown role');
    }

    return { id: userId, role };
  }
}

export const authService = new AuthService();

/**
 * Actor set by authMiddleware; throws when a route forgot the middleware
 */
export const requireActor = (req: AuthRequest): Actor => {
  if (!req.actor) {
    throw ApiError.unauthorized();
  }
  return req.actor;
};
