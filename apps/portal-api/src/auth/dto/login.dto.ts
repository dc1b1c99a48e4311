import { IsEmail, IsNotEmpty, IsString, MaxLength } from 'class-validator';

/** End-user login by email or phone number */
export class LoginDto {
  @IsString()
  @IsNotEmpty()
  @MaxLength(64)
  identifier!: string;

  @IsString()
  @IsNotEmpty()
  @MaxLength(128)
  password!: string;
}

export class AdminLoginDto {
  @IsEmail()
  email!: string;

  @IsString()
  @IsNotEmpty()
  @MaxLength(128)
  password!: string;
}
