/**
 * Auth Module
 * Authentication, session cache and role authorization
 */

import { Module } from '@nestjs/common';
import { CryptoModule } from '@contactbook/common/crypto';
import { JwtModule } from '@contactbook/common/jwt';
import { CacheModule } from '@contactbook/common/cache';
import { AccountsModule } from '../accounts/accounts.module';
import { EmailModule } from '../email/email.module';
import { AuthController } from './auth.controller';
import { AuthService } from './auth.service';
import { AuthorizationService } from './authorization.service';
import { JwtAuthGuard } from './guards/jwt-auth.guard';

@Module({
  imports: [CryptoModule, JwtModule, CacheModule, AccountsModule, EmailModule],
  controllers: [AuthController],
  providers: [AuthService, AuthorizationService, JwtAuthGuard],
  exports: [AuthService, AuthorizationService, JwtAuthGuard, JwtModule, CacheModule, AccountsModule],
})
export class AuthModule {}
