/**
 * Admin Controller
 * Routes: /admin/*
 */

import { Controller, Get, UseGuards } from '@nestjs/common';
import { Identity, Role } from '@contactbook/common/types';
import { JwtAuthGuard } from '../auth/guards/jwt-auth.guard';
import { RoleGuard } from '../auth/guards/role.guard';
import { UsersService } from './users.service';

@Controller('admin')
@UseGuards(JwtAuthGuard, RoleGuard(Role.ADMIN))
export class AdminController {
  constructor(private usersService: UsersService) {}

  /**
   * GET /admin/accounts
   */
  @Get('accounts')
  async accounts(): Promise<Identity[]> {
    return this.usersService.listAccounts();
  }
}
