/**
 * ContactBook API - App Module
 */

import { Module } from '@nestjs/common';
import { ContactBookConfigModule } from '@contactbook/common/config';
import { AuthModule } from './auth/auth.module';
import { UsersModule } from './users/users.module';
import { ContactsModule } from './contacts/contacts.module';
import { HealthController } from './health.controller';

@Module({
  imports: [ContactBookConfigModule, AuthModule, UsersModule, ContactsModule],
  controllers: [HealthController],
})
export class AppModule {}
