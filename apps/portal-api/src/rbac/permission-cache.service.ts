/**
 * Permission Cache
 * Resolves a user's roles and permissions from the RBAC graph and keeps a
 * TTL-bound projection of both in the key-value cache.
 */

import { Injectable, Logger } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import { CacheStore } from '@portal/common/cache';
import {
  PortalUser,
  SUPERUSER_ROLE,
  WILDCARD_PERMISSION,
} from '@portal/common/types';
import { RbacRepository } from './rbac.repository';
import { evaluatePermissions, evaluateRoles } from './grant-evaluator';

export type RbacSubject = Pick<PortalUser, 'id' | 'is_superuser'>;

export interface AccessProjection {
  roles: string[];
  permissions: string[];
}

function messageOf(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}

function parseCodes(raw: string | null): string[] | null {
  if (raw === null) {
    return null;
  }
  try {
    const parsed: unknown = JSON.parse(raw);
    return Array.isArray(parsed) && parsed.every((code): code is string => typeof code === 'string')
      ? parsed
      : null;
  } catch {
    return null;
  }
}

@Injectable()
export class PermissionCacheService {
  private readonly logger = new Logger(PermissionCacheService.name);
  private readonly appName: string;
  private readonly defaultTtlSeconds: number;

  constructor(
    configService: ConfigService,
    private cacheStore: CacheStore,
    private rbacRepository: RbacRepository,
  ) {
    this.appName = configService.get<string>('appName', 'portal');
    this.defaultTtlSeconds = configService.get<number>('accessTokenTtlMinutes', 60) * 60;
  }

  permissionKey(userId: string): string {
    return `${this.appName}:perm:${userId}`;
  }

  roleKey(userId: string): string {
    return `${this.appName}:role:${userId}`;
  }

  async resolveRoles(user: RbacSubject): Promise<string[]> {
    if (user.is_superuser) {
      return [SUPERUSER_ROLE];
    }
    return evaluateRoles(await this.rbacRepository.findGrantRows(user.id));
  }

  async resolvePermissions(user: RbacSubject): Promise<string[]> {
    if (user.is_superuser) {
      const all = await this.rbacRepository.findActivePermissionCodes();
      return [WILDCARD_PERMISSION, ...all.filter((code) => code !== WILDCARD_PERMISSION)];
    }
    return evaluatePermissions(
      await this.rbacRepository.findGrantRows(user.id),
      new Date(),
    );
  }

  /**
   * Clear, resolve and cache both projections. Returns the codes to embed in
   * a freshly issued access credential.
   */
  async initCache(
    user: RbacSubject,
    ttlSeconds: number = this.defaultTtlSeconds,
  ): Promise<AccessProjection> {
    await this.clearCache(user.id);

    const [roles, permissions] = await Promise.all([
      this.resolveRoles(user),
      this.resolvePermissions(user),
    ]);

    await this.writeCodes(this.roleKey(user.id), roles, ttlSeconds);
    await this.writeCodes(this.permissionKey(user.id), permissions, ttlSeconds);

    return { roles, permissions };
  }

  async clearCache(userId: string): Promise<void> {
    try {
      await this.cacheStore.delete(this.permissionKey(userId), this.roleKey(userId));
    } catch (error) {
      this.logger.error(`Failed to clear RBAC cache for ${userId}: ${messageOf(error)}`);
    }
  }

  async getPermissions(user: RbacSubject): Promise<string[]> {
    return this.readThrough(this.permissionKey(user.id), () =>
      this.resolvePermissions(user),
    );
  }

  async getRoles(user: RbacSubject): Promise<string[]> {
    return this.readThrough(this.roleKey(user.id), () => this.resolveRoles(user));
  }

  /**
   * A miss or an unreadable cache falls through to the graph; an empty
   * cached list is a real answer.
   */
  private async readThrough(
    key: string,
    resolve: () => Promise<string[]>,
  ): Promise<string[]> {
    let cached: string[] | null = null;
    try {
      cached = parseCodes(await this.cacheStore.get(key));
    } catch (error) {
      this.logger.warn(`RBAC cache read failed for ${key}: ${messageOf(error)}`);
    }

    if (cached !== null) {
      this.logger.debug(`RBAC cache hit ${key}`);
      return cached;
    }

    this.logger.debug(`RBAC cache miss ${key}`);
    const codes = await resolve();
    await this.writeCodes(key, codes, this.defaultTtlSeconds);
    return codes;
  }

  private async writeCodes(key: string, codes: string[], ttlSeconds: number): Promise<void> {
    if (ttlSeconds <= 0) {
      return;
    }
    try {
      await this.cacheStore.set(key, JSON.stringify(codes), ttlSeconds);
    } catch (error) {
      this.logger.warn(`RBAC cache write failed for ${key}: ${messageOf(error)}`);
    }
  }
}
