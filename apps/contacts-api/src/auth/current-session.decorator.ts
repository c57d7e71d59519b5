import { createParamDecorator, ExecutionContext } from '@nestjs/common';
import { ERRORS } from '@contactbook/common/errors';
import { AuthenticatedRequest, AuthenticatedSession } from './authenticated-session';

/**
 * Injects the session attached by JwtAuthGuard
 */
export const CurrentSession = createParamDecorator(
  (_data: unknown, ctx: ExecutionContext): AuthenticatedSession => {
    const request = ctx.switchToHttp().getRequest<AuthenticatedRequest>();
    if (!request.auth) {
      throw ERRORS.Unauthenticated();
    }
    return request.auth;
  },
);
