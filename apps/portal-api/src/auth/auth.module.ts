/**
 * Auth Module
 * Session orchestration for the admin and app audiences
 */

import { Module } from '@nestjs/common';
import { CryptoModule } from '@portal/common/crypto';
import { JwtModule } from '@portal/common/jwt';
import { UsersModule } from '../users/users.module';
import { RbacModule } from '../rbac/rbac.module';
import { SessionsModule } from '../sessions/sessions.module';
import { AuthController } from './auth.controller';
import { AdminAuthController } from './admin-auth.controller';
import { AuthService } from './auth.service';
import { DeviceCookieService } from './device-cookie.service';

@Module({
  imports: [CryptoModule, JwtModule, UsersModule, RbacModule, SessionsModule],
  controllers: [AuthController, AdminAuthController],
  providers: [AuthService, DeviceCookieService],
})
export class AuthModule {}
