/**
 * RBAC Module
 * Graph resolution, cached projections and administration routes
 */

import { Module } from '@nestjs/common';
import { DatabaseModule } from '@portal/common/database';
import { PortalCacheModule } from '@portal/common/cache';
import { UsersModule } from '../users/users.module';
import { RbacRepository } from './rbac.repository';
import { PermissionCacheService } from './permission-cache.service';
import { RbacAdminService } from './rbac-admin.service';
import { RbacAdminController } from './rbac-admin.controller';

@Module({
  imports: [DatabaseModule, PortalCacheModule, UsersModule],
  controllers: [RbacAdminController],
  providers: [RbacRepository, PermissionCacheService, RbacAdminService],
  exports: [PermissionCacheService],
})
export class RbacModule {}
