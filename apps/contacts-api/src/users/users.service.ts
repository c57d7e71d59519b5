/**
 * Users Service
 * Profile operations for the authenticated account and the admin listing
 */

import { Inject, Injectable, Logger } from '@nestjs/common';
import { JwtService } from '@contactbook/common/jwt';
import { SessionCacheService } from '@contactbook/common/cache';
import { UNIT_OF_WORK, UnitOfWork } from '@contactbook/common/database';
import { ERRORS } from '@contactbook/common/errors';
import { Identity, toIdentity } from '@contactbook/common/types';
import { ACCOUNT_REPOSITORY, AccountRepository } from '../accounts/account-repository';
import { AuthenticatedSession } from '../auth/authenticated-session';
import { AvatarStorageService, AvatarUpload } from './avatar-storage.service';

@Injectable()
export class UsersService {
  private readonly logger = new Logger(UsersService.name);

  constructor(
    private avatarStorage: AvatarStorageService,
    private sessionCache: SessionCacheService,
    private jwtService: JwtService,
    @Inject(ACCOUNT_REPOSITORY) private accounts: AccountRepository,
    @Inject(UNIT_OF_WORK) private unitOfWork: UnitOfWork,
  ) {}

  /**
   * Store a new avatar and refresh the caller's cached identity
   * so the next request sees the new URL.
   */
  async updateAvatar(session: AuthenticatedSession, upload: AvatarUpload): Promise<Identity> {
    const previousUrl = session.identity.avatar_url;
    const stored = await this.avatarStorage.save(session.identity.id, upload);

    const account = await this.unitOfWork.run((db) =>
      this.accounts.updateAvatar(db, session.identity.id, stored.url),
    );
    if (!account) {
      await this.avatarStorage.removeByUrl(stored.url);
      throw ERRORS.Unauthenticated();
    }

    const identity = toIdentity(account);
    await this.sessionCache.put(
      session.token,
      identity,
      this.jwtService.secondsUntilExpiry(session.claims),
    );

    if (previousUrl && previousUrl !== stored.url) {
      await this.avatarStorage.removeByUrl(previousUrl).catch((error: unknown) => {
        this.logger.warn(
          `Could not delete previous avatar of account ${account.id}: ${error instanceof Error ? error.message : String(error)}`,
        );
      });
    }

    this.logger.log(`Avatar updated for account ${account.id}`);
    return identity;
  }

  async listAccounts(): Promise<Identity[]> {
    const accounts = await this.unitOfWork.run((db) => this.accounts.list(db));
    return accounts.map(toIdentity);
  }
}
