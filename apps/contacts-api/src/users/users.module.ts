/**
 * Users Module
 * Profile, avatar and admin routes
 */

import { Module } from '@nestjs/common';
import { MulterModule } from '@nestjs/platform-express';
import { AuthModule } from '../auth/auth.module';
import { RateLimitModule } from '../rate-limit/rate-limit.module';
import { AvatarStorageService, MAX_AVATAR_BYTES } from './avatar-storage.service';
import { UsersService } from './users.service';
import { UsersController } from './users.controller';
import { AdminController } from './admin.controller';

@Module({
  imports: [
    AuthModule,
    RateLimitModule,
    MulterModule.register({
      limits: {
        fileSize: MAX_AVATAR_BYTES,
        files: 1,
      },
    }),
  ],
  controllers: [UsersController, AdminController],
  providers: [UsersService, AvatarStorageService],
})
export class UsersModule {}
