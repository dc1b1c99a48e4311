/**
 * Auth Service
 * Login, refresh, logout and password change for the admin and app audiences
 */

import { Injectable, Logger } from '@nestjs/common';
import { v4 as uuidv4 } from 'uuid';
import { PasswordService } from '@portal/common/crypto';
import { CredentialSigner } from '@portal/common/jwt';
import { ERRORS, PortalError } from '@portal/common/errors';
import {
  AudienceClass,
  ClientContext,
  PortalUser,
  TokenPair,
} from '@portal/common/types';
import { UserDirectoryService } from '../users/user-directory.service';
import { PermissionCacheService } from '../rbac/permission-cache.service';
import { CredentialBlacklistService } from '../sessions/credential-blacklist.service';
import { RefreshCredentialStore } from '../sessions/refresh-credential.store';
import { InvalidRefreshCredential } from '../sessions/refresh-credential.types';
import { IdentityContext } from '../authorization/identity-context';
import { MeResponseDto } from './dto/me.dto';

export function refreshFailureToError(failure: InvalidRefreshCredential): PortalError {
  switch (failure.reason) {
    case 'revoked':
      return ERRORS.RefreshFamilyRevoked();
    case 'concurrent_rotation':
      return ERRORS.RefreshConflict();
    case 'not_found':
    case 'expired':
    case 'reused':
    case 'audience_mismatch':
      return ERRORS.RefreshTokenInvalid(failure.reason);
  }
}

function canUseAudience(user: PortalUser, audience: AudienceClass): boolean {
  return audience === 'app' || user.is_admin || user.is_superuser;
}

@Injectable()
export class AuthService {
  private readonly logger = new Logger(AuthService.name);

  constructor(
    private userDirectory: UserDirectoryService,
    private passwordService: PasswordService,
    private credentialSigner: CredentialSigner,
    private permissionCache: PermissionCacheService,
    private refreshStore: RefreshCredentialStore,
    private blacklist: CredentialBlacklistService,
  ) {}

  /**
   * Authenticate and open a new refresh family
   */
  async login(
    audience: AudienceClass,
    identifier: string,
    password: string,
    deviceId: string | null,
    context: ClientContext,
  ): Promise<TokenPair> {
    const user = await this.userDirectory.getUserByIdentifier(identifier);

    // Same failure for unknown user, wrong password and ineligible account
    if (
      !user ||
      !user.password_hash ||
      !(await this.passwordService.verify(user.password_hash, password)) ||
      !user.is_active ||
      !user.verified ||
      !canUseAudience(user, audience)
    ) {
      this.logger.warn(`Failed ${audience} login attempt`);
      throw ERRORS.InvalidCredentials();
    }

    const familyId = uuidv4();
    const refresh = await this.refreshStore.issue(
      user.id,
      audience,
      deviceId,
      familyId,
      context,
    );
    const pair = await this.issuePair(user, audience, familyId, refresh.token);

    await this.userDirectory.updateLastLogin(user.id);
    this.logger.log(`User ${user.id} logged in (${audience})`);

    return pair;
  }

  /**
   * Rotate the refresh credential and issue a fresh access credential
   */
  async refresh(
    audience: AudienceClass,
    refreshToken: string,
    context: ClientContext,
  ): Promise<TokenPair> {
    const rotated = await this.refreshStore.rotate(refreshToken, audience, context);
    if (!rotated.ok) {
      throw refreshFailureToError(rotated.error);
    }

    const { token, record } = rotated.value;
    const user = await this.userDirectory.getUserById(record.user_id);
    if (!user || !user.is_active || !user.verified || !canUseAudience(user, audience)) {
      await this.refreshStore.revokeFamily(record.family_id, 'user_inactive');
      throw ERRORS.RefreshTokenInvalid('inactive');
    }

    return this.issuePair(user, audience, record.family_id, token);
  }

  /**
   * Blacklist the access credential and end its refresh family
   */
  async logout(
    audience: AudienceClass,
    accessToken: string,
    refreshToken?: string,
  ): Promise<void> {
    const expiresAt = this.credentialSigner.getExpiry(accessToken);
    if (expiresAt) {
      await this.blacklist.add(this.blacklist.hashCredential(accessToken), expiresAt);
    }

    if (refreshToken) {
      await this.refreshStore.revokeByToken(refreshToken, true, 'logout');
    } else {
      const verified = this.credentialSigner.verify(accessToken, audience);
      if (verified.ok) {
        await this.refreshStore.revokeFamily(verified.value.fid, 'logout');
      }
    }

    this.logger.log(`Logout (${audience})`);
  }

  async me(identity: IdentityContext): Promise<MeResponseDto> {
    const subject = { id: identity.userId, is_superuser: identity.isSuperuser };
    const [roles, permissions] = await Promise.all([
      this.permissionCache.getRoles(subject),
      this.permissionCache.getPermissions(subject),
    ]);

    return {
      id: identity.userId,
      email: identity.email,
      display_name: identity.displayName,
      audience: identity.audience,
      is_admin: identity.isAdmin,
      is_superuser: identity.isSuperuser,
      roles,
      permissions,
    };
  }

  /**
   * Rehash the password, then end every session of the user
   */
  async changePassword(
    identity: IdentityContext,
    currentPassword: string,
    newPassword: string,
  ): Promise<void> {
    const user = await this.userDirectory.getUserById(identity.userId);
    if (
      !user ||
      !user.password_hash ||
      !(await this.passwordService.verify(user.password_hash, currentPassword))
    ) {
      throw ERRORS.InvalidCredentials();
    }

    const strength = this.passwordService.validateStrength(newPassword);
    if (!strength.valid) {
      throw ERRORS.WeakPassword(strength.errors.join('; '));
    }

    await this.userDirectory.updatePasswordHash(
      user.id,
      await this.passwordService.hash(newPassword),
    );
    await this.refreshStore.revokeAllForUser(user.id, 'password_change');
    await this.permissionCache.clearCache(user.id);

    const expiresAt = this.credentialSigner.getExpiry(identity.credential);
    if (expiresAt) {
      await this.blacklist.add(this.blacklist.hashCredential(identity.credential), expiresAt);
    }

    this.logger.log(`Password changed for user ${user.id}`);
  }

  private async issuePair(
    user: PortalUser,
    audience: AudienceClass,
    familyId: string,
    refreshToken: string,
  ): Promise<TokenPair> {
    const ttlSeconds = this.credentialSigner.accessTokenTtlSeconds;
    const { roles, permissions } = await this.permissionCache.initCache(user, ttlSeconds);

    const accessToken = this.credentialSigner.issue(
      user.id,
      audience,
      {
        id: user.id,
        email: user.email ?? '',
        displayName: user.display_name ?? user.email ?? user.phone_number ?? user.id,
        roles,
        permissions,
        familyId,
      },
      ttlSeconds,
    );

    return {
      access_token: accessToken,
      refresh_token: refreshToken,
      token_type: 'Bearer',
      expires_in: ttlSeconds,
    };
  }
}
