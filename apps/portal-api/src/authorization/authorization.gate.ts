/**
 * Authorization Gate
 * Authenticates the bearer credential for a route and evaluates its
 * permission predicates. Failures are returned, never thrown, except for
 * store outages.
 */

import { Injectable, Logger } from '@nestjs/common';
import { CredentialSigner, InvalidCredentialReason } from '@portal/common/jwt';
import { Result, err, ok } from '@portal/common/types';
import { CredentialBlacklistService } from '../sessions/credential-blacklist.service';
import { UserDirectoryService } from '../users/user-directory.service';
import { PermissionCacheService } from '../rbac/permission-cache.service';
import { missingPermissions } from '../rbac/permission-matcher';
import { PermissionMode } from './route-auth.decorator';
import { RouteRequirement } from './route-table';
import { IdentityContext, buildIdentityContext } from './identity-context';

export type GateFailure =
  | {
      kind: 'Unauthenticated';
      reason: 'missing_credential' | 'blacklisted' | 'unknown_user' | 'inactive' | 'not_admin';
    }
  | { kind: 'InvalidCredential'; reason: InvalidCredentialReason }
  | { kind: 'Forbidden'; missing: string[]; mode: PermissionMode };

export function extractBearer(header: string | undefined): string | null {
  if (!header) {
    return null;
  }
  const [scheme, token, ...rest] = header.trim().split(/\s+/);
  if (scheme.toLowerCase() !== 'bearer' || !token || rest.length > 0) {
    return null;
  }
  return token;
}

@Injectable()
export class AuthorizationGate {
  private readonly logger = new Logger(AuthorizationGate.name);

  constructor(
    private credentialSigner: CredentialSigner,
    private blacklist: CredentialBlacklistService,
    private userDirectory: UserDirectoryService,
    private permissionCache: PermissionCacheService,
  ) {}

  /**
   * Resolves to null for routes that do not require authentication
   */
  async authorize(
    route: RouteRequirement,
    authorizationHeader: string | undefined,
  ): Promise<Result<IdentityContext | null, GateFailure>> {
    if (!route.required) {
      return ok(null);
    }

    const credential = extractBearer(authorizationHeader);
    if (!credential) {
      return err({ kind: 'Unauthenticated', reason: 'missing_credential' });
    }

    const verified = this.credentialSigner.verify(credential, route.audience);
    if (!verified.ok) {
      return err({ kind: 'InvalidCredential', reason: verified.error.reason });
    }
    const claims = verified.value;

    if (await this.blacklist.isBlacklisted(this.blacklist.hashCredential(credential))) {
      this.logger.warn(`Blacklisted credential presented for user ${claims.uid}`);
      return err({ kind: 'Unauthenticated', reason: 'blacklisted' });
    }

    const user = await this.userDirectory.getUserById(claims.uid);
    if (!user) {
      return err({ kind: 'Unauthenticated', reason: 'unknown_user' });
    }
    if (!user.is_active || !user.verified) {
      return err({ kind: 'Unauthenticated', reason: 'inactive' });
    }
    if (route.audience === 'admin' && !user.is_admin && !user.is_superuser) {
      return err({ kind: 'Unauthenticated', reason: 'not_admin' });
    }

    const identity = buildIdentityContext(user, route.audience, claims.fid, credential);

    if (route.permissions.length === 0) {
      return ok(identity);
    }
    if (user.is_superuser && route.allowSuperuser) {
      return ok(identity);
    }

    // Without the bypass a superuser is judged on explicit grants only
    const held = user.is_superuser
      ? await this.permissionCache.resolvePermissions({ id: user.id, is_superuser: false })
      : await this.permissionCache.getPermissions(user);

    const missing = missingPermissions(held, route.permissions);
    const allowed =
      route.mode === 'any'
        ? missing.length < route.permissions.length
        : missing.length === 0;

    if (!allowed) {
      this.logger.warn(
        `User ${user.id} denied: requires ${route.mode} of [${route.permissions.join(', ')}]`,
      );
      return err({ kind: 'Forbidden', missing, mode: route.mode });
    }

    return ok(identity);
  }
}
