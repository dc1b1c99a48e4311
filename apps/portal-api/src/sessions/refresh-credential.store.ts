/**
 * Refresh Credential Store
 * Opaque refresh credentials with single-use rotation and family-wide
 * revocation when a superseded credential is replayed.
 */

import { Injectable, Logger } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import { v4 as uuidv4 } from 'uuid';
import { DatabaseService, Queryable } from '@portal/common/database';
import { TokenHashService } from '@portal/common/crypto';
import {
  AudienceClass,
  ClientContext,
  RefreshCredentialRecord,
  Result,
  err,
  ok,
} from '@portal/common/types';
import { RefreshCredentialRepository } from './refresh-credential.repository';
import {
  InvalidRefreshCredential,
  InvalidRefreshReason,
  IssuedRefreshCredential,
  RevocationReason,
} from './refresh-credential.types';

const UNIQUE_VIOLATION = '23505';

/** Thrown inside the rotation transaction to force a rollback */
class RotationLostError extends Error {
  constructor(readonly familyId: string) {
    super(`Concurrent rotation in family ${familyId}`);
  }
}

function isUniqueViolation(error: unknown): boolean {
  return error instanceof Error && 'code' in error && error.code === UNIQUE_VIOLATION;
}

function invalid(reason: InvalidRefreshReason): InvalidRefreshCredential {
  return { kind: 'InvalidRefreshCredential', reason };
}

@Injectable()
export class RefreshCredentialStore {
  private readonly logger = new Logger(RefreshCredentialStore.name);
  private readonly ttlMs: number;

  constructor(
    configService: ConfigService,
    private databaseService: DatabaseService,
    private tokenHashService: TokenHashService,
    private repository: RefreshCredentialRepository,
  ) {
    this.ttlMs =
      configService.get<number>('refreshTokenTtlDays', 7) * 24 * 60 * 60 * 1000;
  }

  /**
   * Start a new family (or continue a login's family) with a parentless record
   */
  async issue(
    userId: string,
    audience: AudienceClass,
    deviceId: string | null,
    familyId: string,
    context: ClientContext,
  ): Promise<IssuedRefreshCredential> {
    const token = this.tokenHashService.generateRefreshToken();
    const expiresAt = new Date(Date.now() + this.ttlMs);

    const record = await this.databaseService.transaction(async (client) => {
      if (deviceId) {
        await this.repository.upsertDevice(client, deviceId, userId, context);
      }
      return this.repository.insert(client, {
        id: uuidv4(),
        user_id: userId,
        device_id: deviceId,
        family_id: familyId,
        audience,
        parent_id: null,
        token_hash: this.tokenHashService.hashRefreshToken(token),
        expires_at: expiresAt,
        ip: context.ip,
        user_agent: context.userAgent,
      });
    });

    return { token, record };
  }

  /**
   * Exchange a refresh credential for its successor. A credential presented
   * for another audience class is refused and left untouched.
   */
  async rotate(
    presentedToken: string,
    audience: AudienceClass,
    context: ClientContext,
  ): Promise<Result<IssuedRefreshCredential, InvalidRefreshCredential>> {
    const tokenHash = this.tokenHashService.hashRefreshToken(presentedToken);
    const locked: { familyId: string | null } = { familyId: null };

    try {
      return await this.databaseService.transaction(async (client) => {
        const current = await this.repository.findByHashForUpdate(client, tokenHash);
        if (!current) {
          return err(invalid('not_found'));
        }
        if (current.audience !== audience) {
          this.logger.warn(
            `Refresh credential of family ${current.family_id} (${current.audience}) presented for ${audience}`,
          );
          return err(invalid('audience_mismatch'));
        }
        if (current.revoked_at) {
          return err(invalid('revoked'));
        }
        if (current.replaced_by_id) {
          const revoked = await this.repository.revokeFamily(
            client,
            current.family_id,
            'reuse_detected',
          );
          this.logger.warn(
            `Refresh token reuse detected for user ${current.user_id}, family ${current.family_id} revoked (${revoked} records)`,
          );
          return err(invalid('reused'));
        }
        if (current.expires_at.getTime() <= Date.now()) {
          return err(invalid('expired'));
        }

        locked.familyId = current.family_id;
        return ok(await this.createSuccessor(client, current, context));
      });
    } catch (error) {
      const familyId = locked.familyId;
      if (
        familyId &&
        (error instanceof RotationLostError || isUniqueViolation(error))
      ) {
        await this.revokeFamily(familyId, 'concurrent_rotation');
        this.logger.warn(`Concurrent rotation detected, family ${familyId} revoked`);
        return err(invalid('concurrent_rotation'));
      }
      throw error;
    }
  }

  /**
   * Revoke the record matching a token, and optionally its whole family.
   * Returns whether a record matched.
   */
  async revokeByToken(
    token: string,
    revokeFamily: boolean,
    reason: RevocationReason = 'logout',
  ): Promise<boolean> {
    const tokenHash = this.tokenHashService.hashRefreshToken(token);

    return this.databaseService.transaction(async (client) => {
      const record = await this.repository.findByHash(client, tokenHash);
      if (!record) {
        return false;
      }
      if (revokeFamily) {
        await this.repository.revokeFamily(client, record.family_id, reason);
      } else {
        await this.repository.revokeById(client, record.id, reason);
      }
      return true;
    });
  }

  async revokeFamily(familyId: string, reason: RevocationReason): Promise<number> {
    return this.databaseService.transaction((client) =>
      this.repository.revokeFamily(client, familyId, reason),
    );
  }

  async revokeAllForUser(userId: string, reason: RevocationReason): Promise<number> {
    const count = await this.databaseService.transaction((client) =>
      this.repository.revokeAllForUser(client, userId, reason),
    );
    this.logger.log(`Revoked ${count} refresh credentials for user ${userId} (${reason})`);
    return count;
  }

  private async createSuccessor(
    client: Queryable,
    current: RefreshCredentialRecord,
    context: ClientContext,
  ): Promise<IssuedRefreshCredential> {
    const token = this.tokenHashService.generateRefreshToken();

    // Successor keeps the family's absolute expiry
    const successor = await this.repository.insert(client, {
      id: uuidv4(),
      user_id: current.user_id,
      device_id: current.device_id,
      family_id: current.family_id,
      audience: current.audience,
      parent_id: current.id,
      token_hash: this.tokenHashService.hashRefreshToken(token),
      expires_at: current.expires_at,
      ip: context.ip,
      user_agent: context.userAgent,
    });

    if (current.device_id) {
      await this.repository.upsertDevice(
        client,
        current.device_id,
        current.user_id,
        context,
      );
    }

    const superseded = await this.repository.supersede(client, current.id, successor.id);
    if (!superseded) {
      throw new RotationLostError(current.family_id);
    }

    return { token, record: successor };
  }
}
