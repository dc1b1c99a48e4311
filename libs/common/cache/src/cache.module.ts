/**
 * Portal Cache Module
 * Binds the CacheStore token to Redis
 */

import { Module } from '@nestjs/common';
import { ConfigModule } from '@nestjs/config';
import { CacheStore } from './cache.store';
import { RedisCacheStore } from './redis-cache.store';

@Module({
  imports: [ConfigModule],
  providers: [{ provide: CacheStore, useClass: RedisCacheStore }],
  exports: [CacheStore],
})
export class PortalCacheModule {}
