import { ErrorCode } from './error-codes';
import { PortalError } from './portal-error';

export const ERRORS = {
  // Auth errors
  Unauthenticated: (reason?: string) =>
    new PortalError({
      code: ErrorCode.Unauthenticated,
      message: 'Authentication required',
      httpStatusCode: 401,
      metadata: reason ? { reason } : undefined,
    }),

  InvalidCredentials: () =>
    new PortalError({
      code: ErrorCode.InvalidCredentials,
      message: 'Invalid credentials',
      httpStatusCode: 401,
    }),

  TokenInvalid: (reason?: string) =>
    new PortalError({
      code: ErrorCode.TokenInvalid,
      message: 'Invalid or expired token',
      httpStatusCode: 401,
      metadata: reason ? { reason } : undefined,
    }),

  RefreshTokenInvalid: (reason?: string) =>
    new PortalError({
      code: ErrorCode.RefreshTokenInvalid,
      message: 'Invalid refresh token',
      httpStatusCode: 401,
      metadata: reason ? { reason } : undefined,
    }),

  RefreshFamilyRevoked: () =>
    new PortalError({
      code: ErrorCode.Forbidden,
      message: 'Invalid refresh token',
      httpStatusCode: 403,
      metadata: { reason: 'revoked' },
    }),

  RefreshConflict: () =>
    new PortalError({
      code: ErrorCode.Conflict,
      message: 'Invalid refresh token',
      httpStatusCode: 409,
      metadata: { reason: 'concurrent_rotation' },
    }),

  Forbidden: (required?: string[], mode?: 'any' | 'all') =>
    new PortalError({
      code: ErrorCode.Forbidden,
      message: 'Insufficient permissions',
      httpStatusCode: 403,
      metadata: required ? { required, mode } : undefined,
    }),

  WeakPassword: (message: string) =>
    new PortalError({
      code: ErrorCode.WeakPassword,
      message,
      httpStatusCode: 400,
    }),

  // RBAC errors
  RoleNotFound: (roleCode: string) =>
    new PortalError({
      code: ErrorCode.RoleNotFound,
      message: `Role '${roleCode}' not found`,
      httpStatusCode: 404,
      resource: roleCode,
    }),

  PermissionNotFound: (permissionCode: string) =>
    new PortalError({
      code: ErrorCode.PermissionNotFound,
      message: `Permission '${permissionCode}' not found`,
      httpStatusCode: 404,
      resource: permissionCode,
    }),

  UserNotFound: (userId: string) =>
    new PortalError({
      code: ErrorCode.UserNotFound,
      message: 'User not found',
      httpStatusCode: 404,
      resource: userId,
    }),

  // General
  InternalError: (message: string, e?: Error) =>
    new PortalError({
      code: ErrorCode.InternalError,
      message: message || 'Internal server error',
      httpStatusCode: 500,
      originalError: e,
    }),
};
