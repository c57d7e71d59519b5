/**
 * Signup DTO
 */

import { IsNotEmpty, IsString, MinLength, MaxLength } from 'class-validator';

/**
 * `username` is any unique identity string; the confirmation email goes to it
 */
export class SignupDto {
  @IsString()
  @IsNotEmpty()
  @MaxLength(255)
  username!: string;

  @IsString()
  @MinLength(6)
  @MaxLength(128)
  password!: string;
}

export class SignupResponseDto {
  new_user!: string;
}
