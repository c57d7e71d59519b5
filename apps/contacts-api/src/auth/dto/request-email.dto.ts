import { IsEmail } from 'class-validator';

export class RequestEmailDto {
  @IsEmail()
  email!: string;
}

export class MessageResponseDto {
  message!: string;
}
