import request from 'supertest';
import jwt, { SignOptions } from 'jsonwebtoken';
import { Application } from 'express';

import { Actor, Role } from '../../src/types/ledger';

export const TEST_JWT_SECRET = 'test-secret';

export const adminActor: Actor = { id: 'admin-1', role: Role.ADMIN };

export const resellerActor = (id: string): Actor => ({ id, role: Role.RESELLER });

export const businessOwnerActor = (id: string): Actor => ({ id, role: Role.BUSINESS_OWNER });

/**
 * Sign a token the way the identity service does
 */
export const signActorToken = (
  actor: Actor,
  options: SignOptions = { expiresIn: '15m' },
  secret: string = TEST_JWT_SECRET
): string => jwt.sign({ userId: actor.id, role: actor.role }, secret, options);

export const authenticatedRequest = (app: Application, token: string) => {
  return {
    get: (url: string) => request(app).get(url).set('Authorization', `Bearer ${token}`),
    post: (url: string) => request(app).post(url).set('Authorization', `Bearer ${token}`),
  };
};

export const asActor = (app: Application, actor: Actor) =>
  authenticatedRequest(app, signActorToken(actor));
