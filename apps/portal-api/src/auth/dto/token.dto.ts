import { IsNotEmpty, IsOptional, IsString } from 'class-validator';

export class RefreshDto {
  @IsString()
  @IsNotEmpty()
  refresh_token!: string;
}

export class LogoutDto {
  @IsString()
  @IsNotEmpty()
  access_token!: string;

  @IsOptional()
  @IsString()
  @IsNotEmpty()
  refresh_token?: string;
}

export class TokenResponseDto {
  access_token!: string;
  refresh_token!: string;
  token_type!: 'Bearer';
  expires_in!: number; // seconds
}

export class MessageResponseDto {
  message!: string;
}
