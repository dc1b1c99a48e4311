/**
 * Portal Crypto Module
 * Provides password hashing and token hashing services
 */

import { Module } from '@nestjs/common';
import { ConfigModule } from '@nestjs/config';
import { PasswordService } from './password.service';
import { TokenHashService } from './token-hash.service';

@Module({
  imports: [ConfigModule],
  providers: [PasswordService, TokenHashService],
  exports: [PasswordService, TokenHashService],
})
export class CryptoModule {}
