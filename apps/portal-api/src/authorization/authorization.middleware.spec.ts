import {
  INestApplication,
  MiddlewareConsumer,
  Module,
  NestModule,
  RequestMethod,
} from '@nestjs/common';
import { DiscoveryModule } from '@nestjs/core';
import { ConfigService } from '@nestjs/config';
import { JwtService as NestJwtService } from '@nestjs/jwt';
import { Test } from '@nestjs/testing';
import request from 'supertest';
import { TokenHashService } from '@portal/common/crypto';
import { PortalErrorFilter } from '@portal/common/errors';
import { CredentialSigner } from '@portal/common/jwt';
import { InMemoryCacheStore } from '@portal/common/cache/testing';
import { PortalUser } from '@portal/common/types';
import { CredentialBlacklistService } from '../sessions/credential-blacklist.service';
import { UserDirectoryService } from '../users/user-directory.service';
import { PermissionCacheService } from '../rbac/permission-cache.service';
import { RbacAdminController } from '../rbac/rbac-admin.controller';
import { RbacAdminService } from '../rbac/rbac-admin.service';
import { AuthorizationGate } from './authorization.gate';
import { AuthorizationMiddleware } from './authorization.middleware';
import { RouteTableExplorer } from './route-table.explorer';

const admin: PortalUser = {
  id: 'user-1',
  email: 'ada@example.com',
  phone_number: null,
  display_name: 'Ada',
  password_hash: null,
  is_active: true,
  verified: true,
  is_admin: true,
  is_superuser: false,
  last_login_at: null,
};

describe('AuthorizationMiddleware', () => {
  let app: INestApplication;
  let signer: CredentialSigner;
  let rbacAdminService: { assignRole: jest.Mock; getUserAccess: jest.Mock };
  let permissionCache: { getPermissions: jest.Mock; resolvePermissions: jest.Mock };

  beforeEach(async () => {
    const config = new ConfigService({
      jwtSecret: 'test-secret',
      baseUrl: 'http://portal.test',
      appName: 'portal',
      accessTokenTtlMinutes: 60,
    });
    signer = new CredentialSigner(new NestJwtService({}), config);
    rbacAdminService = {
      assignRole: jest.fn().mockResolvedValue({ message: 'Role assigned', affected_users: 1 }),
      getUserAccess: jest.fn().mockResolvedValue({
        user_id: 'u1',
        is_superuser: false,
        roles: [],
        permissions: [],
      }),
    };
    permissionCache = {
      getPermissions: jest.fn().mockResolvedValue(['system:user:modify']),
      resolvePermissions: jest.fn().mockResolvedValue([]),
    };

    @Module({
      imports: [DiscoveryModule],
      controllers: [RbacAdminController],
      providers: [
        RouteTableExplorer,
        AuthorizationGate,
        { provide: CredentialSigner, useValue: signer },
        {
          provide: CredentialBlacklistService,
          useValue: new CredentialBlacklistService(
            config,
            new InMemoryCacheStore(),
            new TokenHashService(config),
          ),
        },
        {
          provide: UserDirectoryService,
          useValue: { getUserById: jest.fn().mockResolvedValue(admin) },
        },
        { provide: PermissionCacheService, useValue: permissionCache },
        { provide: RbacAdminService, useValue: rbacAdminService },
      ],
    })
    class GatedAdminModule implements NestModule {
      configure(consumer: MiddlewareConsumer) {
        consumer
          .apply(AuthorizationMiddleware)
          .forRoutes({ path: '*', method: RequestMethod.ALL });
      }
    }

    const moduleRef = await Test.createTestingModule({
      imports: [GatedAdminModule],
    }).compile();

    app = moduleRef.createNestApplication();
    app.useGlobalFilters(new PortalErrorFilter());
    await app.init();
  });

  afterEach(async () => {
    await app.close();
  });

  function bearer(): string {
    return `Bearer ${signer.issue('user-1', 'admin', {
      id: 'user-1',
      email: 'ada@example.com',
      displayName: 'Ada',
      roles: ['staff'],
      permissions: ['system:user:modify'],
      familyId: 'family-1',
    })}`;
  }

  it('should reject an unauthenticated request to a protected route', async () => {
    const response = await request(app.getHttpServer())
      .post('/admin/users/u1/roles')
      .send({ role_code: 'speaker' });

    expect(response.status).toBe(401);
    expect(response.body).toEqual({
      error: 'Unauthenticated',
      message: 'Authentication required',
      statusCode: 401,
    });
    expect(rbacAdminService.assignRole).not.toHaveBeenCalled();
  });

  it('should gate a protected route whatever the letter case of the path', async () => {
    const response = await request(app.getHttpServer())
      .post('/ADMIN/Users/u1/roles')
      .send({ role_code: 'speaker' });

    expect(response.status).toBe(401);
    expect(rbacAdminService.assignRole).not.toHaveBeenCalled();
  });

  it('should gate HEAD requests answered by a GET handler', async () => {
    const response = await request(app.getHttpServer()).head('/admin/users/u1/access');

    expect(response.status).toBe(401);
    expect(rbacAdminService.getUserAccess).not.toHaveBeenCalled();
  });

  it('should pass an authorized request through to the handler', async () => {
    const response = await request(app.getHttpServer())
      .post('/Admin/users/u1/roles')
      .set('Authorization', bearer())
      .send({ role_code: 'speaker' });

    expect(response.status).toBe(200);
    expect(response.body).toEqual({ message: 'Role assigned', affected_users: 1 });
    expect(rbacAdminService.assignRole).toHaveBeenCalledWith('u1', 'speaker');
  });

  it('should refuse an authenticated caller missing the route permission', async () => {
    permissionCache.getPermissions.mockResolvedValue([]);

    const response = await request(app.getHttpServer())
      .post('/admin/users/u1/roles')
      .set('Authorization', bearer())
      .send({ role_code: 'speaker' });

    expect(response.status).toBe(403);
    expect(rbacAdminService.assignRole).not.toHaveBeenCalled();
  });
});
