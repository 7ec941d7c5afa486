import { Response, NextFunction } from 'express';

import { ApiError } from '../middlewares/errorHandler';
import { addLogContext } from '../observability/log-context';

import { authService } from './auth.service';
import { AuthRequest } from './auth.types';

export const authMiddleware = (req: AuthRequest, _res: Response, next: NextFunction): void => {
  try {
    const authHeader = req.headers.authorization;

    if (!authHeader) {
      throw ApiError.unauthorized('No authorization header provided');
    }

    if (!authHeader.startsWith('Bearer ')) {
      throw ApiError.unauthorized('Invalid authorization format. Use: Bearer <token>');
    }

    const token = authHeader.substring(7);

    if (!token) {
      throw ApiError.unauthorized('No token provided');
    }

    req.actor = authService.verifyToken(token);
    addLogContext({ actorId: req.actor.id });
    next();
  } catch (error) {
    next(error);
  }
};
