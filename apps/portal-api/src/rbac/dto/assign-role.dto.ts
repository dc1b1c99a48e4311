import { IsNotEmpty, IsString, MaxLength } from 'class-validator';

export class AssignRoleDto {
  @IsString()
  @IsNotEmpty()
  @MaxLength(32)
  role_code!: string;
}
