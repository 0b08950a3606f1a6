export { TokenBucket, DEFAULT_POLL_INTERVAL_MS } from './tokenBucket';
export { RateLimitRegistry, withRateLimit } from './rateLimitRegistry';
export type { RateLimitRegistryOptions } from './rateLimitRegistry';
export type {
  AcquireOptions,
  RateLimitConfig,
  TokenBucketOptions,
  TokenBucketStats,
} from './types';
