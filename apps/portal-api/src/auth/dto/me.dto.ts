import { AudienceClass } from '@portal/common/types';

export class MeResponseDto {
  id!: string;
  email!: string | null;
  display_name!: string;
  audience!: AudienceClass;
  is_admin!: boolean;
  is_superuser!: boolean;
  roles!: string[];
  permissions!: string[];
}
