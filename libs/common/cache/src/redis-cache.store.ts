/**
 * Redis-backed cache store
 */

import {
  Injectable,
  Logger,
  OnModuleDestroy,
  OnModuleInit,
} from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import Redis from 'ioredis';
import { CacheStore } from './cache.store';

@Injectable()
export class RedisCacheStore
  extends CacheStore
  implements OnModuleInit, OnModuleDestroy
{
  private readonly logger = new Logger(RedisCacheStore.name);
  private readonly client: Redis;

  constructor(configService: ConfigService) {
    super();
    this.client = new Redis(
      configService.get<string>('redisUrl', 'redis://localhost:6379/0'),
      {
        lazyConnect: true,
        maxRetriesPerRequest: 2,
      },
    );

    this.client.on('error', (error: Error) => {
      this.logger.error(`Redis error: ${error.message}`);
    });
  }

  async onModuleInit() {
    try {
      await this.client.connect();
      this.logger.log('Redis connection established');
    } catch (error) {
      // Cache is an accelerator; RBAC falls back to live resolution
      this.logger.warn(
        `Redis unavailable at startup: ${
          error instanceof Error ? error.message : String(error)
        }`,
      );
    }
  }

  async onModuleDestroy() {
    await this.client.quit();
  }

  async get(key: string): Promise<string | null> {
    return this.client.get(key);
  }

  async set(key: string, value: string, ttlSeconds: number): Promise<void> {
    await this.client.set(key, value, 'EX', ttlSeconds);
  }

  async delete(...keys: string[]): Promise<number> {
    if (keys.length === 0) {
      return 0;
    }
    return this.client.del(...keys);
  }

  async exists(key: string): Promise<boolean> {
    return (await this.client.exists(key)) === 1;
  }

  async ping(): Promise<boolean> {
    try {
      return (await this.client.ping()) === 'PONG';
    } catch {
      return false;
    }
  }
}
