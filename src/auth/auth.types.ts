import { Request } from 'express';

import { Actor, Role } from '../types/ledger';

/**
 * Claims the identity service puts in actor tokens
 */
export interface ActorTokenPayload {
  userId: string;
  role: Role;
  iat?: number;
  exp?: number;
}

export interface AuthRequest extends Request {
  actor?: Actor;
}
