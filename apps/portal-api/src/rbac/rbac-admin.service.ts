/**
 * RBAC administration
 * Role assignment and role grants; every mutation clears the cached
 * projection of each affected user.
 */

import { Injectable, Logger } from '@nestjs/common';
import { ERRORS } from '@portal/common/errors';
import { PortalUser } from '@portal/common/types';
import { UserDirectoryService } from '../users/user-directory.service';
import { PermissionCacheService } from './permission-cache.service';
import { PermissionRow, RbacRepository, RoleRow } from './rbac.repository';
import { RbacMutationResponseDto, UserAccessResponseDto } from './dto/user-access.dto';

@Injectable()
export class RbacAdminService {
  private readonly logger = new Logger(RbacAdminService.name);

  constructor(
    private rbacRepository: RbacRepository,
    private permissionCache: PermissionCacheService,
    private userDirectory: UserDirectoryService,
  ) {}

  async getUserAccess(userId: string): Promise<UserAccessResponseDto> {
    const user = await this.requireUser(userId);
    const [roles, permissions] = await Promise.all([
      this.permissionCache.resolveRoles(user),
      this.permissionCache.resolvePermissions(user),
    ]);

    return {
      user_id: user.id,
      is_superuser: user.is_superuser,
      roles,
      permissions,
    };
  }

  async assignRole(userId: string, roleCode: string): Promise<RbacMutationResponseDto> {
    const user = await this.requireUser(userId);
    const role = await this.requireRole(roleCode);

    await this.rbacRepository.assignRole(user.id, role.id);
    await this.permissionCache.clearCache(user.id);

    this.logger.log(`Role ${role.code} assigned to user ${user.id}`);
    return { message: 'Role assigned', affected_users: 1 };
  }

  async removeRole(userId: string, roleCode: string): Promise<RbacMutationResponseDto> {
    const user = await this.requireUser(userId);
    const role = await this.requireRole(roleCode);

    const removed = await this.rbacRepository.removeRole(user.id, role.id);
    await this.permissionCache.clearCache(user.id);

    this.logger.log(`Role ${role.code} removed from user ${user.id}`);
    return {
      message: removed ? 'Role removed' : 'Role was not assigned',
      affected_users: removed ? 1 : 0,
    };
  }

  async grantPermission(
    roleCode: string,
    permissionCode: string,
    expireDate: Date | null,
  ): Promise<RbacMutationResponseDto> {
    const role = await this.requireRole(roleCode);
    const permission = await this.requirePermission(permissionCode);

    await this.rbacRepository.grantPermission(role.id, permission.id, expireDate);
    const affected = await this.clearRoleHolders(role);

    this.logger.log(`Permission ${permission.code} granted to role ${role.code}`);
    return { message: 'Permission granted', affected_users: affected };
  }

  async revokePermission(
    roleCode: string,
    permissionCode: string,
  ): Promise<RbacMutationResponseDto> {
    const role = await this.requireRole(roleCode);
    const permission = await this.requirePermission(permissionCode);

    const revoked = await this.rbacRepository.revokePermission(role.id, permission.id);
    const affected = await this.clearRoleHolders(role);

    this.logger.log(`Permission ${permission.code} revoked from role ${role.code}`);
    return {
      message: revoked ? 'Permission revoked' : 'Permission was not granted',
      affected_users: affected,
    };
  }

  private async clearRoleHolders(role: RoleRow): Promise<number> {
    const userIds = await this.rbacRepository.findUserIdsWithRole(role.id);
    await Promise.all(userIds.map((userId) => this.permissionCache.clearCache(userId)));
    return userIds.length;
  }

  private async requireUser(userId: string): Promise<PortalUser> {
    const user = await this.userDirectory.getUserById(userId);
    if (!user) {
      throw ERRORS.UserNotFound(userId);
    }
    return user;
  }

  private async requireRole(roleCode: string): Promise<RoleRow> {
    const role = await this.rbacRepository.findRoleByCode(roleCode);
    if (!role) {
      throw ERRORS.RoleNotFound(roleCode);
    }
    return role;
  }

  private async requirePermission(permissionCode: string): Promise<PermissionRow> {
    const permission = await this.rbacRepository.findPermissionByCode(permissionCode);
    if (!permission) {
      throw ERRORS.PermissionNotFound(permissionCode);
    }
    return permission;
  }
}
