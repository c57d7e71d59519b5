/**
 * Auth Controller
 * Routes: /auth/*
 */

import { Controller, Post, Get, Body, Param, HttpCode, HttpStatus } from '@nestjs/common';
import { AuthService } from './auth.service';
import { SignupDto, SignupResponseDto } from './dto/signup.dto';
import { LoginDto, LoginResponseDto } from './dto/login.dto';
import { MessageResponseDto, RequestEmailDto } from './dto/request-email.dto';

@Controller('auth')
export class AuthController {
  constructor(private authService: AuthService) {}

  /**
   * POST /auth/signup
   * Register new account (unconfirmed until the emailed link is followed)
   */
  @Post('signup')
  @HttpCode(HttpStatus.CREATED)
  async signup(@Body() dto: SignupDto): Promise<SignupResponseDto> {
    return this.authService.signup(dto);
  }

  /**
   * POST /auth/login
   */
  @Post('login')
  @HttpCode(HttpStatus.OK)
  async login(@Body() dto: LoginDto): Promise<LoginResponseDto> {
    return this.authService.login(dto);
  }

  /**
   * GET /auth/confirmed_email/:token
   */
  @Get('confirmed_email/:token')
  async confirmedEmail(@Param('token') token: string): Promise<MessageResponseDto> {
    return this.authService.confirmEmail(token);
  }

  /**
   * POST /auth/request_email
   */
  @Post('request_email')
  @HttpCode(HttpStatus.OK)
  async requestEmail(@Body() dto: RequestEmailDto): Promise<MessageResponseDto> {
    return this.authService.requestConfirmationEmail(dto);
  }
}
