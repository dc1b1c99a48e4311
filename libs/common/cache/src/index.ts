export * from './cache.store';
export * from './redis-cache.store';
export * from './cache.module';
