/**
 * Portal API - App Module
 */

import { Module } from '@nestjs/common';
import { PortalConfigModule } from '@portal/common/config';
import { DatabaseModule } from '@portal/common/database';
import { PortalCacheModule } from '@portal/common/cache';
import { UsersModule } from './users/users.module';
import { SessionsModule } from './sessions/sessions.module';
import { RbacModule } from './rbac/rbac.module';
import { AuthorizationModule } from './authorization/authorization.module';
import { AuthModule } from './auth/auth.module';
import { MigrationsModule } from './migrations/migrations.module';
import { HealthController } from './health.controller';

@Module({
  imports: [
    PortalConfigModule,
    DatabaseModule,
    PortalCacheModule,
    MigrationsModule,
    UsersModule,
    SessionsModule,
    RbacModule,
    AuthorizationModule,
    AuthModule,
  ],
  controllers: [HealthController],
})
export class AppModule {}
