/**
 * Users Controller
 * Routes: /users/*
 */

import {
  Controller,
  Get,
  Patch,
  Param,
  Res,
  StreamableFile,
  UploadedFile,
  UseGuards,
  UseInterceptors,
} from '@nestjs/common';
import { FileInterceptor } from '@nestjs/platform-express';
import { Response } from 'express';
import { ERRORS } from '@contactbook/common/errors';
import { Identity } from '@contactbook/common/types';
import { CurrentSession } from '../auth/current-session.decorator';
import { AuthenticatedSession } from '../auth/authenticated-session';
import { JwtAuthGuard } from '../auth/guards/jwt-auth.guard';
import { RateLimitGuard } from '../rate-limit/rate-limit.guard';
import { AvatarStorageService } from './avatar-storage.service';
import { UsersService } from './users.service';

@Controller('users')
export class UsersController {
  constructor(
    private usersService: UsersService,
    private avatarStorage: AvatarStorageService,
  ) {}

  /**
   * GET /users/me
   * At most 5 requests per minute per client
   */
  @Get('me')
  @UseGuards(RateLimitGuard(5, 60 * 1000), JwtAuthGuard)
  me(@CurrentSession() session: AuthenticatedSession): Identity {
    return session.identity;
  }

  /**
   * PATCH /users/avatar
   * Multipart upload, field name `file`
   */
  @Patch('avatar')
  @UseGuards(JwtAuthGuard)
  @UseInterceptors(FileInterceptor('file'))
  async updateAvatar(
    @CurrentSession() session: AuthenticatedSession,
    @UploadedFile() file: Express.Multer.File | undefined,
  ): Promise<Identity> {
    if (!file) {
      throw ERRORS.InvalidFile('No file uploaded');
    }

    return this.usersService.updateAvatar(session, file);
  }

  /**
   * GET /users/avatars/:file
   */
  @Get('avatars/:file')
  async avatar(
    @Param('file') fileName: string,
    @Res({ passthrough: true }) res: Response,
  ): Promise<StreamableFile> {
    const avatar = await this.avatarStorage.open(fileName);

    res.set({
      'Content-Type': avatar.contentType,
      'Content-Length': String(avatar.size),
      'Cache-Control': 'public, max-age=86400',
    });

    return new StreamableFile(avatar.stream);
  }
}
