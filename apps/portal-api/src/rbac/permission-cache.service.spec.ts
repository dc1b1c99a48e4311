import { Test, TestingModule } from '@nestjs/testing';
import { ConfigService } from '@nestjs/config';
import { CacheStore } from '@portal/common/cache';
import { InMemoryCacheStore } from '@portal/common/cache/testing';
import { GrantRow } from './grant-evaluator';
import { PermissionCacheService } from './permission-cache.service';
import { RbacRepository } from './rbac.repository';

function grant(roleCode: string, permissionCode: string, expireDate: Date | null = null): GrantRow {
  return {
    role_code: roleCode,
    role_active: true,
    role_deleted: false,
    permission_code: permissionCode,
    permission_active: true,
    permission_deleted: false,
    resource_active: true,
    resource_visible: true,
    resource_deleted: false,
    verb_active: true,
    verb_deleted: false,
    expire_date: expireDate,
  };
}

describe('PermissionCacheService', () => {
  let service: PermissionCacheService;
  let cache: InMemoryCacheStore;
  let rbacRepository: { findGrantRows: jest.Mock; findActivePermissionCodes: jest.Mock };

  const member = { id: 'user-1', is_superuser: false };
  const superuser = { id: 'root-1', is_superuser: true };

  beforeEach(async () => {
    cache = new InMemoryCacheStore();
    rbacRepository = {
      findGrantRows: jest.fn().mockResolvedValue([
        grant('staff', 'support:faq:read'),
        grant('speaker', 'conference:conferences:read'),
        grant('speaker', 'support:faq:read'),
        grant('speaker', 'workshop:workshops:modify', new Date('2000-01-01')),
      ]),
      findActivePermissionCodes: jest
        .fn()
        .mockResolvedValue(['support:faq:read', 'system:user:read']),
    };

    const module: TestingModule = await Test.createTestingModule({
      providers: [
        PermissionCacheService,
        {
          provide: ConfigService,
          useValue: new ConfigService({ appName: 'portal', accessTokenTtlMinutes: 60 }),
        },
        { provide: CacheStore, useValue: cache },
        { provide: RbacRepository, useValue: rbacRepository },
      ],
    }).compile();

    service = module.get(PermissionCacheService);
  });

  describe('resolution', () => {
    it('should resolve deduplicated, sorted codes without expired grants', async () => {
      expect(await service.resolveRoles(member)).toEqual(['speaker', 'staff']);
      expect(await service.resolvePermissions(member)).toEqual([
        'conference:conferences:read',
        'support:faq:read',
      ]);
    });

    it('should give a superuser with no grants the wildcard plus every active code', async () => {
      rbacRepository.findGrantRows.mockResolvedValue([]);

      expect(await service.resolveRoles(superuser)).toEqual(['superuser']);
      expect(await service.resolvePermissions(superuser)).toEqual([
        '*',
        'support:faq:read',
        'system:user:read',
      ]);
      expect(rbacRepository.findGrantRows).not.toHaveBeenCalled();
    });
  });

  describe('initCache', () => {
    it('should cache exactly what live resolution returns', async () => {
      const projection = await service.initCache(member, 3600);
      rbacRepository.findGrantRows.mockClear();

      expect(await service.getPermissions(member)).toEqual(
        await service.resolvePermissions(member),
      );
      expect(await service.getRoles(member)).toEqual(projection.roles);
      expect(JSON.parse((await cache.get('portal:perm:user-1')) ?? 'null')).toEqual(
        projection.permissions,
      );
    });

    it('should replace a stale projection instead of merging into it', async () => {
      await cache.set('portal:perm:user-1', JSON.stringify(['system:user:modify']), 3600);

      const projection = await service.initCache(member, 3600);

      expect(projection.permissions).not.toContain('system:user:modify');
      expect(await cache.get('portal:perm:user-1')).toBe(
        JSON.stringify(['conference:conferences:read', 'support:faq:read']),
      );
    });

    it('should still return codes when the cache is down', async () => {
      cache.unavailable = true;

      const projection = await service.initCache(member, 3600);

      expect(projection.permissions).toEqual(['conference:conferences:read', 'support:faq:read']);
    });
  });

  describe('getPermissions', () => {
    it('should serve a cached empty list without touching the graph', async () => {
      await cache.set('portal:perm:user-1', '[]', 3600);

      expect(await service.getPermissions(member)).toEqual([]);
      expect(rbacRepository.findGrantRows).not.toHaveBeenCalled();
    });

    it('should fall back to live resolution on a miss and repopulate', async () => {
      expect(await service.getPermissions(member)).toEqual([
        'conference:conferences:read',
        'support:faq:read',
      ]);
      expect(await cache.exists('portal:perm:user-1')).toBe(true);
    });

    it('should fall back to live resolution when the cache is unreachable', async () => {
      cache.unavailable = true;

      expect(await service.getPermissions(member)).toEqual([
        'conference:conferences:read',
        'support:faq:read',
      ]);
    });

    it('should ignore an unreadable cache entry', async () => {
      await cache.set('portal:perm:user-1', '{"not":"a list"}', 3600);

      expect(await service.getPermissions(member)).toEqual([
        'conference:conferences:read',
        'support:faq:read',
      ]);
    });
  });

  describe('clearCache', () => {
    it('should remove both projections', async () => {
      await service.initCache(member, 3600);

      await service.clearCache('user-1');

      expect(cache.size()).toBe(0);
    });
  });
});
