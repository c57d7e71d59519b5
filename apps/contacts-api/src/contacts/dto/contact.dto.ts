/**
 * Contact DTOs
 */

import {
  IsEmail,
  IsISO8601,
  IsNotEmpty,
  IsOptional,
  IsString,
  Matches,
  MaxLength,
} from 'class-validator';

const CALENDAR_DATE = /^\d{4}-\d{2}-\d{2}$/;
const PHONE = /^[+0-9 ()-]{3,32}$/;

export class CreateContactDto {
  @IsString()
  @IsNotEmpty()
  @MaxLength(100)
  first_name!: string;

  @IsString()
  @IsNotEmpty()
  @MaxLength(100)
  last_name!: string;

  @IsEmail()
  @MaxLength(255)
  email!: string;

  @Matches(PHONE, { message: 'phone must contain only digits, spaces, +, -, ( and )' })
  phone!: string;

  @IsOptional()
  @Matches(CALENDAR_DATE, { message: 'birthday must be a date in YYYY-MM-DD format' })
  @IsISO8601({ strict: true })
  birthday?: string | null;

  @IsOptional()
  @IsString()
  @MaxLength(2000)
  additional_info?: string | null;
}

/**
 * Partial update: only the fields present are changed
 */
export class UpdateContactDto {
  @IsOptional()
  @IsString()
  @IsNotEmpty()
  @MaxLength(100)
  first_name?: string;

  @IsOptional()
  @IsString()
  @IsNotEmpty()
  @MaxLength(100)
  last_name?: string;

  @IsOptional()
  @IsEmail()
  @MaxLength(255)
  email?: string;

  @IsOptional()
  @Matches(PHONE, { message: 'phone must contain only digits, spaces, +, -, ( and )' })
  phone?: string;

  @IsOptional()
  @Matches(CALENDAR_DATE, { message: 'birthday must be a date in YYYY-MM-DD format' })
  @IsISO8601({ strict: true })
  birthday?: string | null;

  @IsOptional()
  @IsString()
  @MaxLength(2000)
  additional_info?: string | null;
}

export class ContactQueryDto {
  @IsOptional()
  @IsString()
  @MaxLength(100)
  name?: string;

  @IsOptional()
  @IsString()
  @MaxLength(255)
  email?: string;
}

export class DeleteContactResponseDto {
  detail!: string;
}
