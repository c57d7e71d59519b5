/**
 * Login DTO
 * Accepts JSON or an OAuth2 password form (application/x-www-form-urlencoded)
 */

import { IsString, IsNotEmpty, IsOptional } from 'class-validator';

export class LoginDto {
  @IsString()
  @IsNotEmpty()
  username!: string;

  @IsString()
  @IsNotEmpty()
  password!: string;

  // OAuth2 password-form fields, accepted and ignored
  @IsOptional()
  @IsString()
  grant_type?: string;

  @IsOptional()
  @IsString()
  scope?: string;

  @IsOptional()
  @IsString()
  client_id?: string;

  @IsOptional()
  @IsString()
  client_secret?: string;
}

export class LoginResponseDto {
  access_token!: string;
  token_type!: 'bearer';
}
