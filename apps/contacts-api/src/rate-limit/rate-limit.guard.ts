/**
 * Rate Limit Guard
 * Fixed window per client IP and route handler.
 * Order it before JwtAuthGuard so rejected clients never reach token checks:
 *   @UseGuards(RateLimitGuard(5, 60_000), JwtAuthGuard)
 */

import { CanActivate, ExecutionContext, Injectable, Logger, Type, mixin } from '@nestjs/common';
import { Request, Response } from 'express';
import { ERRORS } from '@contactbook/common/errors';
import { FixedWindowRateLimiter } from './fixed-window-rate-limiter';

export function RateLimitGuard(limit: number, windowMs: number): Type<CanActivate> {
  @Injectable()
  class RateLimitGuardMixin implements CanActivate {
    private readonly logger = new Logger('RateLimitGuard');

    constructor(private limiter: FixedWindowRateLimiter) {}

    canActivate(context: ExecutionContext): boolean {
      const http = context.switchToHttp();
      const request = http.getRequest<Request>();
      const clientIp = request.ip ?? request.socket?.remoteAddress ?? 'unknown';
      const key = `${clientIp}:${context.getClass().name}.${context.getHandler().name}`;

      const decision = this.limiter.hit(key, limit, windowMs);
      if (decision.allowed) {
        return true;
      }

      const retryAfterSeconds = Math.max(1, Math.ceil((decision.resetAt - Date.now()) / 1000));
      http.getResponse<Response>().setHeader('Retry-After', String(retryAfterSeconds));
      this.logger.warn(`Rate limit exceeded for ${key}`);

      throw ERRORS.RateLimitExceeded(limit, windowMs);
    }
  }

  return mixin(RateLimitGuardMixin);
}
