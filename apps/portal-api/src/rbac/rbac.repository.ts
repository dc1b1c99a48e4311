/**
 * RBAC graph queries
 */

import { Injectable } from '@nestjs/common';
import { DatabaseService } from '@portal/common/database';
import { GrantRow } from './grant-evaluator';

export interface RoleRow {
  id: string;
  code: string;
}

export interface PermissionRow {
  id: string;
  code: string;
}

@Injectable()
export class RbacRepository {
  constructor(private databaseService: DatabaseService) {}

  /**
   * Every role of the user with its grants, flags included. Roles without
   * grants appear once with null permission columns.
   */
  async findGrantRows(userId: string): Promise<GrantRow[]> {
    return this.databaseService.queryMany<GrantRow>(
      `SELECT
         r.code AS role_code,
         r.is_active AS role_active,
         r.is_deleted AS role_deleted,
         p.code AS permission_code,
         p.is_active AS permission_active,
         p.is_deleted AS permission_deleted,
         res.is_active AS resource_active,
         res.is_visible AS resource_visible,
         res.is_deleted AS resource_deleted,
         v.is_active AS verb_active,
         v.is_deleted AS verb_deleted,
         rp.expire_date
       FROM portal_user_role ur
       JOIN portal_role r ON r.id = ur.role_id
       LEFT JOIN portal_role_permission rp ON rp.role_id = r.id
       LEFT JOIN portal_permission p ON p.id = rp.permission_id
       LEFT JOIN portal_resource res ON res.id = p.resource_id
       LEFT JOIN portal_verb v ON v.id = p.verb_id
       WHERE ur.user_id = $1`,
      [userId],
    );
  }

  async findActivePermissionCodes(): Promise<string[]> {
    const rows = await this.databaseService.queryMany<{ code: string }>(
      `SELECT p.code
       FROM portal_permission p
       JOIN portal_resource res ON res.id = p.resource_id
       JOIN portal_verb v ON v.id = p.verb_id
       WHERE p.is_active AND NOT p.is_deleted
         AND res.is_active AND res.is_visible AND NOT res.is_deleted
         AND v.is_active AND NOT v.is_deleted
       ORDER BY p.code`,
    );
    return rows.map((row) => row.code);
  }

  async findRoleByCode(code: string): Promise<RoleRow | null> {
    return this.databaseService.queryOne<RoleRow>(
      `SELECT id, code FROM portal_role WHERE code = $1 AND NOT is_deleted`,
      [code],
    );
  }

  async findPermissionByCode(code: string): Promise<PermissionRow | null> {
    return this.databaseService.queryOne<PermissionRow>(
      `SELECT id, code FROM portal_permission WHERE code = $1 AND NOT is_deleted`,
      [code],
    );
  }

  async findUserIdsWithRole(roleId: string): Promise<string[]> {
    const rows = await this.databaseService.queryMany<{ user_id: string }>(
      `SELECT user_id FROM portal_user_role WHERE role_id = $1`,
      [roleId],
    );
    return rows.map((row) => row.user_id);
  }

  async assignRole(userId: string, roleId: string): Promise<void> {
    await this.databaseService.query(
      `INSERT INTO portal_user_role (user_id, role_id)
       VALUES ($1, $2)
       ON CONFLICT (user_id, role_id) DO NOTHING`,
      [userId, roleId],
    );
  }

  async removeRole(userId: string, roleId: string): Promise<boolean> {
    const result = await this.databaseService.query(
      `DELETE FROM portal_user_role WHERE user_id = $1 AND role_id = $2`,
      [userId, roleId],
    );
    return result.rowCount === 1;
  }

  async grantPermission(
    roleId: string,
    permissionId: string,
    expireDate: Date | null,
  ): Promise<void> {
    await this.databaseService.query(
      `INSERT INTO portal_role_permission (role_id, permission_id, expire_date)
       VALUES ($1, $2, $3)
       ON CONFLICT (role_id, permission_id) DO UPDATE SET expire_date = EXCLUDED.expire_date`,
      [roleId, permissionId, expireDate],
    );
  }

  async revokePermission(roleId: string, permissionId: string): Promise<boolean> {
    const result = await this.databaseService.query(
      `DELETE FROM portal_role_permission WHERE role_id = $1 AND permission_id = $2`,
      [roleId, permissionId],
    );
    return result.rowCount === 1;
  }
}
