export enum ErrorCode {
  // Auth errors
  Unauthenticated = 'Unauthenticated',
  InvalidCredentials = 'InvalidCredentials',
  TokenInvalid = 'TokenInvalid',
  RefreshTokenInvalid = 'RefreshTokenInvalid',
  Forbidden = 'Forbidden',
  Conflict = 'Conflict',
  WeakPassword = 'WeakPassword',

  // RBAC errors
  RoleNotFound = 'RoleNotFound',
  PermissionNotFound = 'PermissionNotFound',
  UserNotFound = 'UserNotFound',

  // General errors
  InternalError = 'InternalError',
}
