export class UserAccessResponseDto {
  user_id!: string;
  is_superuser!: boolean;
  roles!: string[];
  permissions!: string[];
}

export class RbacMutationResponseDto {
  message!: string;
  affected_users!: number;
}
