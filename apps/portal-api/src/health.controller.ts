/**
 * Health Controller
 * Liveness plus database and cache reachability
 */

import { Controller, Get } from '@nestjs/common';
import { DatabaseService } from '@portal/common/database';
import { CacheStore } from '@portal/common/cache';

@Controller('health')
export class HealthController {
  constructor(
    private databaseService: DatabaseService,
    private cacheStore: CacheStore,
  ) {}

  @Get()
  async health() {
    const [database, cache] = await Promise.all([
      this.databaseService.ping(),
      this.cacheStore.ping(),
    ]);

    return {
      status: database && cache ? 'healthy' : 'degraded',
      service: 'portal-api',
      database,
      cache,
      timestamp: new Date().toISOString(),
    };
  }
}
