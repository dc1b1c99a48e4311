/**
 * Credential Blacklist
 * TTL-bounded revocation ledger for access credentials, keyed by SHA-256 digest
 */

import { Injectable, Logger } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import { CacheStore } from '@portal/common/cache';
import { TokenHashService } from '@portal/common/crypto';
import { ERRORS } from '@portal/common/errors';

@Injectable()
export class CredentialBlacklistService {
  private readonly logger = new Logger(CredentialBlacklistService.name);
  private readonly appName: string;

  constructor(
    configService: ConfigService,
    private cacheStore: CacheStore,
    private tokenHashService: TokenHashService,
  ) {
    this.appName = configService.get<string>('appName', 'portal');
  }

  hashCredential(credential: string): string {
    return this.tokenHashService.hash(credential);
  }

  keyFor(credentialHash: string): string {
    return `${this.appName}:token_blacklist:${credentialHash}`;
  }

  /**
   * Blacklist until the credential would have expired anyway.
   * Already-expired credentials store nothing.
   */
  async add(credentialHash: string, expiresAt: Date): Promise<void> {
    const ttlSeconds = Math.max(
      Math.ceil((expiresAt.getTime() - Date.now()) / 1000),
      0,
    );
    if (ttlSeconds === 0) {
      return;
    }

    await this.cacheStore.set(this.keyFor(credentialHash), '1', ttlSeconds);
    this.logger.debug(`Blacklisted credential ${credentialHash.substring(0, 8)} for ${ttlSeconds}s`);
  }

  /**
   * Fails closed: a cache read error is an internal failure, never "not blacklisted"
   */
  async isBlacklisted(credentialHash: string): Promise<boolean> {
    try {
      return await this.cacheStore.exists(this.keyFor(credentialHash));
    } catch (error) {
      throw ERRORS.InternalError(
        'Credential blacklist unavailable',
        error instanceof Error ? error : undefined,
      );
    }
  }
}
