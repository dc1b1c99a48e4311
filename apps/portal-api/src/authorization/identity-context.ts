/**
 * Per-request identity, built once by the authorization middleware
 */

import { Request } from 'express';
import { AudienceClass, PortalUser } from '@portal/common/types';

export interface IdentityContext {
  readonly userId: string;
  readonly email: string | null;
  readonly displayName: string;
  readonly isActive: boolean;
  readonly verified: boolean;
  readonly isAdmin: boolean;
  readonly isSuperuser: boolean;
  readonly audience: AudienceClass;
  readonly familyId: string;
  readonly credential: string;
}

const identities = new WeakMap<Request, IdentityContext>();

export function buildIdentityContext(
  user: PortalUser,
  audience: AudienceClass,
  familyId: string,
  credential: string,
): IdentityContext {
  return Object.freeze({
    userId: user.id,
    email: user.email,
    displayName: user.display_name ?? user.email ?? user.phone_number ?? user.id,
    isActive: user.is_active,
    verified: user.verified,
    isAdmin: user.is_admin,
    isSuperuser: user.is_superuser,
    audience,
    familyId,
    credential,
  });
}

export function attachIdentity(request: Request, identity: IdentityContext): void {
  identities.set(request, identity);
}

export function getIdentity(request: Request): IdentityContext | null {
  return identities.get(request) ?? null;
}
