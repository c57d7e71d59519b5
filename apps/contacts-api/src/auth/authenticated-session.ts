import { Request } from 'express';
import { TokenClaims } from '@contactbook/common/jwt';
import { Identity } from '@contactbook/common/types';

/**
 * Result of resolving a bearer token
 */
export interface AuthenticatedSession {
  token: string;
  claims: TokenClaims;
  identity: Identity;
}

export interface AuthenticatedRequest extends Request {
  auth?: AuthenticatedSession;
}
