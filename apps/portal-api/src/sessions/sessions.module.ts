/**
 * Sessions Module
 * Access credential blacklist and refresh credential rotation
 */

import { Module } from '@nestjs/common';
import { CryptoModule } from '@portal/common/crypto';
import { DatabaseModule } from '@portal/common/database';
import { PortalCacheModule } from '@portal/common/cache';
import { CredentialBlacklistService } from './credential-blacklist.service';
import { RefreshCredentialRepository } from './refresh-credential.repository';
import { RefreshCredentialStore } from './refresh-credential.store';

@Module({
  imports: [CryptoModule, DatabaseModule, PortalCacheModule],
  providers: [
    CredentialBlacklistService,
    RefreshCredentialRepository,
    RefreshCredentialStore,
  ],
  exports: [CredentialBlacklistService, RefreshCredentialStore],
})
export class SessionsModule {}
