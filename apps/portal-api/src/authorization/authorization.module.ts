/**
 * Authorization Module
 * Route table discovery plus the gate middleware applied to every route
 */

import { MiddlewareConsumer, Module, NestModule, RequestMethod } from '@nestjs/common';
import { DiscoveryModule } from '@nestjs/core';
import { JwtModule } from '@portal/common/jwt';
import { SessionsModule } from '../sessions/sessions.module';
import { UsersModule } from '../users/users.module';
import { RbacModule } from '../rbac/rbac.module';
import { AuthorizationGate } from './authorization.gate';
import { AuthorizationMiddleware } from './authorization.middleware';
import { RouteTableExplorer } from './route-table.explorer';

@Module({
  imports: [DiscoveryModule, JwtModule, SessionsModule, UsersModule, RbacModule],
  providers: [RouteTableExplorer, AuthorizationGate],
  exports: [RouteTableExplorer, AuthorizationGate],
})
export class AuthorizationModule implements NestModule {
  configure(consumer: MiddlewareConsumer) {
    consumer
      .apply(AuthorizationMiddleware)
      .forRoutes({ path: '*', method: RequestMethod.ALL });
  }
}
