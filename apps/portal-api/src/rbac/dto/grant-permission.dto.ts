import { IsDateString, IsNotEmpty, IsOptional, IsString, MaxLength } from 'class-validator';

export class GrantPermissionDto {
  @IsString()
  @IsNotEmpty()
  @MaxLength(128)
  permission_code!: string;

  /** ISO 8601; omitted means the grant never expires */
  @IsOptional()
  @IsDateString()
  expire_date?: string;
}
