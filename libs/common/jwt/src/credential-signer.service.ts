/**
 * Portal Credential Signer
 * Issues and verifies HS256 access credentials for both audience classes.
 * Stateless: blacklist lookups happen in the authorization gate.
 */

import { Injectable, Logger } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import { JwtService as NestJwtService } from '@nestjs/jwt';
import {
  AudienceClass,
  IdentitySnapshot,
  Result,
  err,
  ok,
} from '@portal/common/types';
import {
  AccessClaims,
  InvalidCredential,
  InvalidCredentialReason,
} from './jwt.types';

function isStringArray(value: unknown): value is string[] {
  return Array.isArray(value) && value.every((v) => typeof v === 'string');
}

@Injectable()
export class CredentialSigner {
  private readonly logger = new Logger(CredentialSigner.name);
  private readonly secret: string;
  private readonly issuer: string;
  private readonly appName: string;
  private readonly clockSkewSeconds: number;
  readonly accessTokenTtlSeconds: number;

  constructor(
    private nestJwtService: NestJwtService,
    configService: ConfigService,
  ) {
    const secret = configService.get<string>('jwtSecret');
    if (!secret) {
      throw new Error('jwtSecret configuration is required');
    }
    this.secret = secret;
    this.issuer = configService.get<string>('baseUrl', 'http://localhost:8000');
    this.appName = configService.get<string>('appName', 'portal');
    this.clockSkewSeconds = configService.get<number>('clockSkewSeconds', 0);
    this.accessTokenTtlSeconds =
      configService.get<number>('accessTokenTtlMinutes', 60) * 60;
  }

  audienceFor(audience: AudienceClass): string {
    return `${this.appName}-${audience}`;
  }

  /**
   * Issue a signed access credential embedding the identity snapshot
   */
  issue(
    subject: string,
    audience: AudienceClass,
    identity: IdentitySnapshot,
    ttlSeconds: number = this.accessTokenTtlSeconds,
  ): string {
    const now = Math.floor(Date.now() / 1000);
    const claims: AccessClaims = {
      iss: this.issuer,
      sub: `${subject}:${audience}`,
      aud: this.audienceFor(audience),
      iat: now,
      exp: now + ttlSeconds,
      uid: identity.id,
      email: identity.email,
      name: identity.displayName,
      roles: identity.roles,
      permissions: identity.permissions,
      fid: identity.familyId,
    };

    return this.nestJwtService.sign(claims, {
      secret: this.secret,
      algorithm: 'HS256',
    });
  }

  /**
   * Verify signature, expiry, issuer, audience and subject suffix
   */
  verify(
    credential: string,
    audience: AudienceClass,
  ): Result<AccessClaims, InvalidCredential> {
    const now = Math.floor(Date.now() / 1000);

    let payload: Record<string, unknown>;
    try {
      payload = this.nestJwtService.verify<Record<string, unknown>>(credential, {
        secret: this.secret,
        algorithms: ['HS256'],
        audience: this.audienceFor(audience),
        issuer: this.issuer,
        clockTolerance: this.clockSkewSeconds,
        clockTimestamp: now,
      });
    } catch (error) {
      const reason = this.classify(error);
      this.logger.debug(`Credential rejected for ${audience}: ${reason}`);
      return err({ kind: 'InvalidCredential', reason });
    }

    const claims = this.parseClaims(payload);
    if (!claims) {
      return err({ kind: 'InvalidCredential', reason: 'claims' });
    }

    // Subject must carry the audience suffix it was issued for
    if (claims.sub !== `${claims.uid}:${audience}`) {
      return err({ kind: 'InvalidCredential', reason: 'claims' });
    }

    // Symmetric skew: reject credentials issued in the future as well
    if (claims.iat > now + this.clockSkewSeconds) {
      return err({ kind: 'InvalidCredential', reason: 'claims' });
    }

    return ok(claims);
  }

  /**
   * Read the expiry of a credential whose signature is valid, even if it has
   * already expired. Only used to size blacklist TTLs at logout.
   */
  getExpiry(credential: string): Date | null {
    try {
      const payload = this.nestJwtService.verify<Record<string, unknown>>(
        credential,
        {
          secret: this.secret,
          algorithms: ['HS256'],
          ignoreExpiration: true,
        },
      );
      return typeof payload.exp === 'number'
        ? new Date(payload.exp * 1000)
        : null;
    } catch {
      return null;
    }
  }

  private parseClaims(payload: Record<string, unknown>): AccessClaims | null {
    const { iss, sub, aud, iat, exp, uid, email, name, roles, permissions, fid } =
      payload;

    if (
      typeof iss !== 'string' ||
      typeof sub !== 'string' ||
      typeof aud !== 'string' ||
      typeof iat !== 'number' ||
      typeof exp !== 'number' ||
      typeof uid !== 'string' ||
      typeof email !== 'string' ||
      typeof name !== 'string' ||
      typeof fid !== 'string' ||
      !isStringArray(roles) ||
      !isStringArray(permissions)
    ) {
      return null;
    }

    return { iss, sub, aud, iat, exp, uid, email, name, roles, permissions, fid };
  }

  private classify(error: unknown): InvalidCredentialReason {
    if (!(error instanceof Error)) {
      return 'malformed';
    }
    if (error.name === 'TokenExpiredError') {
      return 'expired';
    }
    if (error.message.includes('signature')) {
      return 'signature';
    }
    if (error.message.includes('malformed') || error.message.includes('jwt must')) {
      return 'malformed';
    }
    return 'claims';
  }
}
