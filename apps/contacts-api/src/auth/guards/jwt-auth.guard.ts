/**
 * JWT Auth Guard
 * - Fail-closed: every failure becomes Unauthenticated
 * - Attaches the resolved session to request.auth
 */

import { Injectable, CanActivate, ExecutionContext } from '@nestjs/common';
import { ERRORS } from '@contactbook/common/errors';
import { AuthService } from '../auth.service';
import { AuthenticatedRequest } from '../authenticated-session';

@Injectable()
export class JwtAuthGuard implements CanActivate {
  constructor(private authService: AuthService) {}

  async canActivate(context: ExecutionContext): Promise<boolean> {
    const request = context.switchToHttp().getRequest<AuthenticatedRequest>();

    const token = extractBearerToken(request.headers.authorization);
    if (!token) {
      throw ERRORS.Unauthenticated();
    }

    request.auth = await this.authService.resolveBearer(token);
    return true;
  }
}

/**
 * Extract Bearer token from an Authorization header value
 */
export function extractBearerToken(header: string | undefined): string | null {
  if (!header) {
    return null;
  }

  const [type, token, ...rest] = header.trim().split(/\s+/);
  if (type.toLowerCase() !== 'bearer' || !token || rest.length > 0) {
    return null;
  }

  return token;
}
