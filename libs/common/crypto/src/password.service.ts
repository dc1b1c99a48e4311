/**
 * Portal Password Service
 * Argon2id password hashing and strength validation
 */

import { Injectable, Logger } from '@nestjs/common';
import * as argon2 from 'argon2';

export interface PasswordStrength {
  valid: boolean;
  errors: string[];
}

@Injectable()
export class PasswordService {
  private readonly logger = new Logger(PasswordService.name);

  private readonly MIN_LENGTH = 8;
  private readonly MAX_LENGTH = 128;

  /**
   * Hash password using Argon2id
   * - time_cost: 2
   * - memory_cost: 65536 (64 MB)
   * - parallelism: 1
   */
  async hash(password: string): Promise<string> {
    try {
      return await argon2.hash(password, {
        type: argon2.argon2id,
        timeCost: 2,
        memoryCost: 65536, // 64 MB
        parallelism: 1,
        hashLength: 32,
        saltLength: 16,
      });
    } catch (error) {
      this.logger.error(
        `Password hashing failed: ${error instanceof Error ? error.message : String(error)}`,
      );
      throw new Error('Password hashing failed');
    }
  }

  /**
   * Verify password against Argon2id hash
   * A malformed hash verifies as false.
   */
  async verify(hash: string, password: string): Promise<boolean> {
    try {
      return await argon2.verify(hash, password);
    } catch (error) {
      this.logger.warn(
        `Password verification failed: ${error instanceof Error ? error.message : String(error)}`,
      );
      return false;
    }
  }

  validateStrength(password: string): PasswordStrength {
    const errors: string[] = [];

    if (password.length < this.MIN_LENGTH) {
      errors.push(`Password must be at least ${this.MIN_LENGTH} characters`);
    }
    if (password.length > this.MAX_LENGTH) {
      errors.push(`Password must be at most ${this.MAX_LENGTH} characters`);
    }
    if (!/[a-z]/.test(password)) {
      errors.push('Password must contain at least one lowercase letter');
    }
    if (!/[A-Z]/.test(password)) {
      errors.push('Password must contain at least one uppercase letter');
    }
    if (!/\d/.test(password)) {
      errors.push('Password must contain at least one number');
    }

    return { valid: errors.length === 0, errors };
  }
}
