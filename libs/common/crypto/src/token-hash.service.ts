/**
 * Portal Token Hash Service
 * Hashing and generation of opaque tokens
 */

import { Injectable } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import * as crypto from 'crypto';

@Injectable()
export class TokenHashService {
  private readonly salt: string;
  private readonly pepper: string;

  // 96 random bytes → 128 base64url characters
  private readonly REFRESH_TOKEN_BYTES = 96;

  constructor(configService: ConfigService) {
    this.salt = configService.get<string>('refreshTokenHashSalt', '');
    this.pepper = configService.get<string>('refreshTokenHashPepper', '');
  }

  /**
   * Hash token using SHA-256
   * Used for access credential blacklist keys
   */
  hash(token: string): string {
    return crypto.createHash('sha256').update(token).digest('hex');
  }

  /**
   * Salted and peppered SHA-512 digest stored for refresh credentials
   */
  hashRefreshToken(token: string): string {
    return crypto
      .createHash('sha512')
      .update(`${this.salt}${token}${this.pepper}`)
      .digest('hex');
  }

  /**
   * Generate opaque refresh token (base64url)
   */
  generateRefreshToken(): string {
    return crypto.randomBytes(this.REFRESH_TOKEN_BYTES).toString('base64url');
  }
}
