/**
 * RBAC administration routes
 * Routes: /admin/users/:userId/*, /admin/roles/:roleCode/*
 */

import {
  Body,
  Controller,
  Delete,
  Get,
  HttpCode,
  HttpStatus,
  Param,
  Post,
} from '@nestjs/common';
import { RouteAuth } from '../authorization/route-auth.decorator';
import { PermissionCode } from './permission-codes';
import { RbacAdminService } from './rbac-admin.service';
import { AssignRoleDto } from './dto/assign-role.dto';
import { GrantPermissionDto } from './dto/grant-permission.dto';
import { RbacMutationResponseDto, UserAccessResponseDto } from './dto/user-access.dto';

@Controller('admin')
export class RbacAdminController {
  constructor(private rbacAdminService: RbacAdminService) {}

  /**
   * GET /admin/users/:userId/access
   */
  @Get('users/:userId/access')
  @RouteAuth({ audience: 'admin', permissions: [PermissionCode.SYSTEM_USER_READ] })
  async getUserAccess(@Param('userId') userId: string): Promise<UserAccessResponseDto> {
    return this.rbacAdminService.getUserAccess(userId);
  }

  /**
   * POST /admin/users/:userId/roles
   */
  @Post('users/:userId/roles')
  @HttpCode(HttpStatus.OK)
  @RouteAuth({ audience: 'admin', permissions: [PermissionCode.SYSTEM_USER_MODIFY] })
  async assignRole(
    @Param('userId') userId: string,
    @Body() dto: AssignRoleDto,
  ): Promise<RbacMutationResponseDto> {
    return this.rbacAdminService.assignRole(userId, dto.role_code);
  }

  @Delete('users/:userId/roles/:roleCode')
  @RouteAuth({ audience: 'admin', permissions: [PermissionCode.SYSTEM_USER_MODIFY] })
  async removeRole(
    @Param('userId') userId: string,
    @Param('roleCode') roleCode: string,
  ): Promise<RbacMutationResponseDto> {
    return this.rbacAdminService.removeRole(userId, roleCode);
  }

  /**
   * POST /admin/roles/:roleCode/permissions
   * Clears the cache of every user holding the role
   */
  @Post('roles/:roleCode/permissions')
  @HttpCode(HttpStatus.OK)
  @RouteAuth({
    audience: 'admin',
    permissions: [PermissionCode.SYSTEM_ROLE_MODIFY, PermissionCode.SYSTEM_PERMISSION_READ],
    mode: 'all',
  })
  async grantPermission(
    @Param('roleCode') roleCode: string,
    @Body() dto: GrantPermissionDto,
  ): Promise<RbacMutationResponseDto> {
    return this.rbacAdminService.grantPermission(
      roleCode,
      dto.permission_code,
      dto.expire_date ? new Date(dto.expire_date) : null,
    );
  }

  @Delete('roles/:roleCode/permissions/:permissionCode')
  @RouteAuth({
    audience: 'admin',
    permissions: [PermissionCode.SYSTEM_ROLE_MODIFY, PermissionCode.SYSTEM_PERMISSION_READ],
    mode: 'all',
  })
  async revokePermission(
    @Param('roleCode') roleCode: string,
    @Param('permissionCode') permissionCode: string,
  ): Promise<RbacMutationResponseDto> {
    return this.rbacAdminService.revokePermission(roleCode, permissionCode);
  }
}
