/**
 * Accounts Module
 * Durable account storage shared by auth and users
 */

import { Module } from '@nestjs/common';
import { DatabaseModule } from '@contactbook/common/database';
import { ACCOUNT_REPOSITORY } from './account-repository';
import { AccountsRepository } from './accounts.repository';

@Module({
  imports: [DatabaseModule],
  providers: [{ provide: ACCOUNT_REPOSITORY, useClass: AccountsRepository }],
  exports: [ACCOUNT_REPOSITORY, DatabaseModule],
})
export class AccountsModule {}
