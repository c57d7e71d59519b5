/**
 * ContactBook JWT Service
 * Issues and verifies session and email-confirmation tokens.
 * Both kinds share one secret and algorithm; the `purpose` claim keeps
 * them from being accepted in place of each other.
 */

import { Injectable, Logger } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import { JwtService as NestJwtService } from '@nestjs/jwt';
import { ERRORS } from '@contactbook/common/errors';
import {
  IssuedToken,
  JwtAlgorithm,
  SUPPORTED_ALGORITHMS,
  TokenClaims,
  TokenPurpose,
  isJwtAlgorithm,
  isTokenClaims,
} from './jwt.types';

const DEFAULT_SESSION_TTL = 15 * 60; // 15 minutes
const DEFAULT_CONFIRMATION_TTL = 7 * 24 * 60 * 60; // 7 days

@Injectable()
export class JwtService {
  private readonly logger = new Logger(JwtService.name);
  private readonly algorithm: JwtAlgorithm;

  readonly sessionTtlSeconds: number;
  readonly confirmationTtlSeconds: number;

  constructor(
    private nestJwtService: NestJwtService,
    private configService: ConfigService,
  ) {
    const algorithm = this.configService.get<string>('algorithm');
    if (!isJwtAlgorithm(algorithm)) {
      throw new Error(
        `algorithm must be one of ${SUPPORTED_ALGORITHMS.join(', ')} (got ${algorithm ?? 'nothing'})`,
      );
    }
    this.algorithm = algorithm;

    this.sessionTtlSeconds =
      this.configService.get<number>('accessTokenTtlSeconds') ?? DEFAULT_SESSION_TTL;
    this.confirmationTtlSeconds =
      this.configService.get<number>('confirmationTokenTtlSeconds') ?? DEFAULT_CONFIRMATION_TTL;
  }

  /**
   * Sign a token for `subject`. iat/exp are always set here, never by
   * module-level signOptions.
   */
  issue(subject: string, purpose: TokenPurpose, ttlSeconds: number): IssuedToken {
    if (!Number.isInteger(ttlSeconds) || ttlSeconds <= 0) {
      throw new Error(`Token lifetime must be a positive whole number of seconds (got ${ttlSeconds})`);
    }

    const now = Math.floor(Date.now() / 1000);
    const claims: TokenClaims = {
      sub: subject,
      purpose,
      iat: now,
      exp: now + ttlSeconds,
    };

    try {
      const token = this.nestJwtService.sign({ ...claims }, { algorithm: this.algorithm });
      return { token, claims };
    } catch (error) {
      this.logger.error(`JWT encoding failed: ${describe(error)}`);
      throw new Error('JWT encoding failed');
    }
  }

  /**
   * Verify signature, then expiry, then claim shape.
   * Throws TokenInvalid or TokenExpired; callers decide what the bearer sees.
   */
  verify(token: string): TokenClaims {
    let payload: Record<string, unknown>;
    try {
      payload = this.nestJwtService.verify<Record<string, unknown>>(token, {
        algorithms: [this.algorithm],
      });
    } catch (error) {
      const cause = error instanceof Error ? error : undefined;
      if (cause?.name === 'TokenExpiredError') {
        this.logger.warn('JWT verification failed: token expired');
        throw ERRORS.TokenExpired(cause);
      }
      this.logger.warn(`JWT verification failed: ${describe(error)}`);
      throw ERRORS.TokenInvalid('signature', cause);
    }

    if (!isTokenClaims(payload)) {
      this.logger.warn('JWT verification failed: unexpected claim set');
      throw ERRORS.TokenInvalid('claims');
    }

    return {
      sub: payload.sub,
      purpose: payload.purpose,
      iat: payload.iat,
      exp: payload.exp,
    };
  }

  /**
   * Verify and require a specific purpose
   */
  verifyToken(token: string, purpose: TokenPurpose): TokenClaims {
    const claims = this.verify(token);

    if (claims.purpose !== purpose) {
      this.logger.warn(
        `JWT purpose mismatch: expected ${purpose}, got ${claims.purpose}`,
      );
      throw ERRORS.TokenInvalid('purpose');
    }

    return claims;
  }

  /**
   * Create session (bearer) token, 15 minutes unless overridden
   */
  createSessionToken(username: string, ttlSeconds: number = this.sessionTtlSeconds): IssuedToken {
    return this.issue(username, TokenPurpose.SESSION, ttlSeconds);
  }

  /**
   * Create email confirmation token (7 days)
   */
  createConfirmationToken(username: string): IssuedToken {
    return this.issue(username, TokenPurpose.EMAIL_CONFIRMATION, this.confirmationTtlSeconds);
  }

  /**
   * Whole seconds left before `claims` expire, rounded down from the
   * current millisecond (0 once expired). A TTL from here ends no later than exp.
   */
  secondsUntilExpiry(claims: TokenClaims): number {
    return Math.max(0, Math.floor(claims.exp - Date.now() / 1000));
  }
}

function describe(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
