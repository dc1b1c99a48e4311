import { ConfigService } from '@nestjs/config';
import { JwtService as NestJwtService } from '@nestjs/jwt';
import { TokenHashService } from '@portal/common/crypto';
import { CredentialSigner } from '@portal/common/jwt';
import { InMemoryCacheStore } from '@portal/common/cache/testing';
import { IdentitySnapshot, PortalUser } from '@portal/common/types';
import { CredentialBlacklistService } from '../sessions/credential-blacklist.service';
import { UserDirectoryService } from '../users/user-directory.service';
import { PermissionCacheService } from '../rbac/permission-cache.service';
import { AuthorizationGate, extractBearer } from './authorization.gate';
import { RouteRequirement, toRequirement } from './route-table';

function makeUser(overrides: Partial<PortalUser> = {}): PortalUser {
  return {
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
    ...overrides,
  };
}

const snapshot: IdentitySnapshot = {
  id: 'user-1',
  email: 'ada@example.com',
  displayName: 'Ada',
  roles: ['staff'],
  permissions: ['A'],
  familyId: 'family-1',
};

describe('AuthorizationGate', () => {
  let gate: AuthorizationGate;
  let signer: CredentialSigner;
  let blacklist: CredentialBlacklistService;
  let users: { getUserById: jest.Mock };
  let permissions: { getPermissions: jest.Mock; resolvePermissions: jest.Mock };

  const allOf = toRequirement({ audience: 'admin', permissions: ['A', 'B'], mode: 'all' });
  const anyOf = toRequirement({ audience: 'admin', permissions: ['A', 'B'], mode: 'any' });
  const noBypass = toRequirement({
    audience: 'admin',
    permissions: ['A'],
    allowSuperuser: false,
  });
  const authOnly = toRequirement({ audience: 'app' });

  function bearer(audience: 'admin' | 'app' = 'admin'): string {
    return `Bearer ${signer.issue('user-1', audience, snapshot)}`;
  }

  async function authorize(route: RouteRequirement, header: string | undefined) {
    return gate.authorize(route, header);
  }

  beforeEach(() => {
    const config = new ConfigService({
      jwtSecret: 'test-secret',
      baseUrl: 'http://portal.test',
      appName: 'portal',
      accessTokenTtlMinutes: 60,
    });
    signer = new CredentialSigner(new NestJwtService({}), config);
    blacklist = new CredentialBlacklistService(
      config,
      new InMemoryCacheStore(),
      new TokenHashService(config),
    );
    users = { getUserById: jest.fn().mockResolvedValue(makeUser()) };
    permissions = {
      getPermissions: jest.fn().mockResolvedValue(['A']),
      resolvePermissions: jest.fn().mockResolvedValue([]),
    };

    gate = new AuthorizationGate(
      signer,
      blacklist,
      users as unknown as UserDirectoryService,
      permissions as unknown as PermissionCacheService,
    );
  });

  it('should pass routes that do not require authentication', async () => {
    const open = toRequirement({ audience: 'app', required: false });

    expect(await authorize(open, undefined)).toEqual({ ok: true, value: null });
  });

  it('should reject a missing bearer credential', async () => {
    expect(await authorize(authOnly, undefined)).toEqual({
      ok: false,
      error: { kind: 'Unauthenticated', reason: 'missing_credential' },
    });
  });

  it('should reject a credential issued for the other audience', async () => {
    expect(await authorize(authOnly, bearer('admin'))).toEqual({
      ok: false,
      error: { kind: 'InvalidCredential', reason: 'claims' },
    });
  });

  it('should build a frozen identity for an authenticated request', async () => {
    const result = await authorize(authOnly, bearer('app'));

    expect(result.ok).toBe(true);
    if (!result.ok || !result.value) return;
    expect(result.value).toMatchObject({
      userId: 'user-1',
      displayName: 'Ada',
      audience: 'app',
      familyId: 'family-1',
    });
    expect(Object.isFrozen(result.value)).toBe(true);
  });

  it('should reject a blacklisted credential', async () => {
    const header = bearer('app');
    const credential = header.slice('Bearer '.length);
    await blacklist.add(blacklist.hashCredential(credential), new Date(Date.now() + 60_000));

    expect(await authorize(authOnly, header)).toEqual({
      ok: false,
      error: { kind: 'Unauthenticated', reason: 'blacklisted' },
    });
  });

  it('should reject inactive and unverified identities', async () => {
    users.getUserById.mockResolvedValueOnce(makeUser({ is_active: false }));
    expect((await authorize(authOnly, bearer('app'))).ok).toBe(false);

    users.getUserById.mockResolvedValueOnce(makeUser({ verified: false }));
    expect(await authorize(authOnly, bearer('app'))).toEqual({
      ok: false,
      error: { kind: 'Unauthenticated', reason: 'inactive' },
    });
  });

  it('should require the admin flag on the admin audience', async () => {
    users.getUserById.mockResolvedValue(makeUser({ is_admin: false }));

    expect(await authorize(anyOf, bearer('admin'))).toEqual({
      ok: false,
      error: { kind: 'Unauthenticated', reason: 'not_admin' },
    });
  });

  it('should forbid an ALL route when only one of the codes is held', async () => {
    expect(await authorize(allOf, bearer('admin'))).toEqual({
      ok: false,
      error: { kind: 'Forbidden', missing: ['B'], mode: 'all' },
    });
  });

  it('should allow the same user through an ANY route', async () => {
    expect((await authorize(anyOf, bearer('admin'))).ok).toBe(true);
  });

  it('should authorize from the cached set rather than the embedded claims', async () => {
    permissions.getPermissions.mockResolvedValue([]);

    expect((await authorize(anyOf, bearer('admin'))).ok).toBe(false);
  });

  it('should let a superuser bypass permission checks when allowed', async () => {
    users.getUserById.mockResolvedValue(makeUser({ is_admin: false, is_superuser: true }));
    permissions.getPermissions.mockResolvedValue([]);

    expect((await authorize(allOf, bearer('admin'))).ok).toBe(true);
    expect(permissions.getPermissions).not.toHaveBeenCalled();
  });

  it('should judge a superuser on explicit grants when the bypass is off', async () => {
    users.getUserById.mockResolvedValue(makeUser({ is_superuser: true }));

    expect(await authorize(noBypass, bearer('admin'))).toEqual({
      ok: false,
      error: { kind: 'Forbidden', missing: ['A'], mode: 'all' },
    });
    expect(permissions.resolvePermissions).toHaveBeenCalledWith({
      id: 'user-1',
      is_superuser: false,
    });
  });
});

describe('extractBearer', () => {
  it('should accept the scheme case-insensitively', () => {
    expect(extractBearer('bearer abc')).toBe('abc');
    expect(extractBearer('Bearer abc')).toBe('abc');
  });

  it('should reject other schemes and malformed headers', () => {
    expect(extractBearer('Basic abc')).toBeNull();
    expect(extractBearer('Bearer')).toBeNull();
    expect(extractBearer('Bearer a b')).toBeNull();
    expect(extractBearer(undefined)).toBeNull();
  });
});
