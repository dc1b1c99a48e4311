import { IsNotEmpty, IsString, MaxLength } from 'class-validator';

export class ChangePasswordDto {
  @IsString()
  @IsNotEmpty()
  current_password!: string;

  // Strength is checked by PasswordService.validateStrength
  @IsString()
  @IsNotEmpty()
  @MaxLength(256)
  new_password!: string;
}
