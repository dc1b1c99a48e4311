/**
 * User Directory
 * Reads portal identities and records login/password changes
 */

import { Injectable } from '@nestjs/common';
import { DatabaseService } from '@portal/common/database';
import { PortalUser } from '@portal/common/types';

const USER_COLUMNS = `
  u.id, u.email, u.phone_number, p.display_name, u.password_hash,
  u.is_active, u.verified, u.is_admin, u.is_superuser, u.last_login_at
`;

@Injectable()
export class UserDirectoryService {
  constructor(private databaseService: DatabaseService) {}

  async getUserById(id: string): Promise<PortalUser | null> {
    return this.databaseService.queryOne<PortalUser>(
      `SELECT ${USER_COLUMNS}
       FROM portal_user u
       LEFT JOIN portal_user_profile p ON p.user_id = u.id
       WHERE u.id = $1 AND u.is_deleted = false`,
      [id],
    );
  }

  /**
   * Look up by email or phone number
   */
  async getUserByIdentifier(identifier: string): Promise<PortalUser | null> {
    return this.databaseService.queryOne<PortalUser>(
      `SELECT ${USER_COLUMNS}
       FROM portal_user u
       LEFT JOIN portal_user_profile p ON p.user_id = u.id
       WHERE (lower(u.email) = lower($1) OR u.phone_number = $1)
         AND u.is_deleted = false
       LIMIT 1`,
      [identifier],
    );
  }

  async updateLastLogin(id: string): Promise<void> {
    await this.databaseService.query(
      `UPDATE portal_user SET last_login_at = now(), updated_at = now() WHERE id = $1`,
      [id],
    );
  }

  async updatePasswordHash(id: string, passwordHash: string): Promise<void> {
    await this.databaseService.query(
      `UPDATE portal_user
       SET password_hash = $2, password_changed_at = now(), updated_at = now()
       WHERE id = $1`,
      [id, passwordHash],
    );
  }
}
