import { SetMetadata } from '@nestjs/common';
import { AudienceClass } from '@portal/common/types';

export const ROUTE_AUTH_KEY = 'portal:route-auth';

export type PermissionMode = 'any' | 'all';

export interface RouteAuthOptions {
  audience: AudienceClass;
  /** Defaults to true */
  required?: boolean;
  permissions?: string[];
  /** Defaults to 'all' */
  mode?: PermissionMode;
  /** Superusers skip permission checks unless this is false */
  allowSuperuser?: boolean;
}

/**
 * Declare authentication and permission requirements for a controller or a
 * handler. Handler options replace controller options.
 */
export const RouteAuth = (options: RouteAuthOptions) =>
  SetMetadata(ROUTE_AUTH_KEY, options);
