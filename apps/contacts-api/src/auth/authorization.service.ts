/**
 * Authorization Service
 * Role gate for privileged operations
 */

import { Injectable, Logger } from '@nestjs/common';
import { ERRORS } from '@contactbook/common/errors';
import { Identity, Role } from '@contactbook/common/types';

@Injectable()
export class AuthorizationService {
  private readonly logger = new Logger(AuthorizationService.name);

  requireRole(identity: Identity, role: Role): Identity {
    if (identity.role !== role) {
      this.logger.warn(`Account ${identity.id} denied: ${role} role required`);
      throw ERRORS.Forbidden(role);
    }
    return identity;
  }
}
