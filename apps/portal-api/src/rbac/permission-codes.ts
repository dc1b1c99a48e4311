/**
 * Permission codes checked by portal routes, as `resource:verb`
 */
export const PermissionCode = {
  SYSTEM_USER_READ: 'system:user:read',
  SYSTEM_USER_MODIFY: 'system:user:modify',
  SYSTEM_ROLE_READ: 'system:role:read',
  SYSTEM_ROLE_MODIFY: 'system:role:modify',
  SYSTEM_PERMISSION_READ: 'system:permission:read',
} as const;

export type PermissionCodeValue = (typeof PermissionCode)[keyof typeof PermissionCode];
