/**
 * ContactBook JWT Types
 */

export enum TokenPurpose {
  SESSION = 'session',
  EMAIL_CONFIRMATION = 'email_confirmation',
}

export const SUPPORTED_ALGORITHMS = ['HS256', 'HS384', 'HS512'] as const;

export type JwtAlgorithm = (typeof SUPPORTED_ALGORITHMS)[number];

export interface TokenClaims {
  sub: string; // username
  purpose: TokenPurpose;
  iat: number; // issued at timestamp
  exp: number; // expiration timestamp
}

export interface IssuedToken {
  token: string;
  claims: TokenClaims;
}

export function isJwtAlgorithm(value: unknown): value is JwtAlgorithm {
  return SUPPORTED_ALGORITHMS.some((algorithm) => algorithm === value);
}

export function isTokenPurpose(value: unknown): value is TokenPurpose {
  return value === TokenPurpose.SESSION || value === TokenPurpose.EMAIL_CONFIRMATION;
}

export function isTokenClaims(payload: Record<string, unknown>): payload is Record<string, unknown> & TokenClaims {
  return (
    typeof payload.sub === 'string' &&
    payload.sub.length > 0 &&
    isTokenPurpose(payload.purpose) &&
    typeof payload.iat === 'number' &&
    typeof payload.exp === 'number'
  );
}
