/**
 * Role Guard
 * Compose after JwtAuthGuard: @UseGuards(JwtAuthGuard, RoleGuard(Role.ADMIN))
 */

import { CanActivate, ExecutionContext, Injectable, Type, mixin } from '@nestjs/common';
import { ERRORS } from '@contactbook/common/errors';
import { Role } from '@contactbook/common/types';
import { AuthorizationService } from '../authorization.service';
import { AuthenticatedRequest } from '../authenticated-session';

export function RoleGuard(role: Role): Type<CanActivate> {
  @Injectable()
  class RoleGuardMixin implements CanActivate {
    constructor(private authorizationService: AuthorizationService) {}

    canActivate(context: ExecutionContext): boolean {
      const request = context.switchToHttp().getRequest<AuthenticatedRequest>();
      if (!request.auth) {
        throw ERRORS.Unauthenticated();
      }

      this.authorizationService.requireRole(request.auth.identity, role);
      return true;
    }
  }

  return mixin(RoleGuardMixin);
}
