export { ExpiringEntry } from './expiringEntry';
export { MemoryCacheBackend } from './memoryCache';
export type { MemoryCacheOptions } from './memoryCache';
export { CacheBackendError, RedisCacheBackend, createRedisCacheBackend } from './redisCache';
export type { RedisCacheClient, RedisCacheOptions, RedisConnectionOptions } from './redisCache';
export type { CacheBackend, CacheStats } from './types';
