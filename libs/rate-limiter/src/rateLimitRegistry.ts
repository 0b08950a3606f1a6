import {
  RateLimitError,
  noopLogger,
  type Clock,
  type Logger,
  type Sleeper,
} from '@libs/resilience';
import { TokenBucket } from './tokenBucket';
import type { AcquireOptions, RateLimitConfig, TokenBucketStats } from './types';

export interface RateLimitRegistryOptions {
  logger?: Logger;
  clock?: Clock;
  sleep?: Sleeper;
  pollIntervalMs?: number;
}

/**
 * One token bucket per provider.
 *
 * Providers without a registered bucket are not limited.
 */
export class RateLimitRegistry {
  private readonly buckets = new Map<string, TokenBucket>();
  private readonly logger: Logger;

  constructor(private readonly options: RateLimitRegistryOptions = {}) {
    this.logger = options.logger ?? noopLogger;
  }

  /**
   * Creates the provider's bucket. The first registration wins: later calls
   * return the existing bucket and ignore the new limits.
   */
  register(provider: string, config: RateLimitConfig): TokenBucket {
    const existing = this.buckets.get(provider);
    if (existing) {
      this.logger.debug(`[rate-limit] ${provider} already registered; keeping existing limits`, {
        ratePerSecond: existing.ratePerSecond,
        capacity: existing.capacity,
        ignoredRatePerSecond: config.ratePerSecond,
        ignoredCapacity: config.capacity,
      });
      return existing;
    }

    const bucket = new TokenBucket({
      ...config,
      name: provider,
      clock: this.options.clock,
      sleep: this.options.sleep,
      pollIntervalMs: this.options.pollIntervalMs,
      logger: this.logger,
    });
    this.buckets.set(provider, bucket);
    this.logger.info(
      `[rate-limit] registered ${provider}: ${config.ratePerSecond} req/s, capacity ${config.capacity}`,
    );
    return bucket;
  }

  registerAll(limits: Record<string, RateLimitConfig>): void {
    for (const [provider, config] of Object.entries(limits)) {
      this.register(provider, config);
    }
  }

  get(provider: string): TokenBucket | undefined {
    return this.buckets.get(provider);
  }

  has(provider: string): boolean {
    return this.buckets.has(provider);
  }

  async acquire(provider: string, options: AcquireOptions = {}): Promise<boolean> {
    const bucket = this.buckets.get(provider);
    if (!bucket) {
      return true;
    }
    return bucket.acquire(options);
  }

  tryAcquire(provider: string, tokens = 1): boolean {
    const bucket = this.buckets.get(provider);
    return bucket ? bucket.tryAcquire(tokens) : true;
  }

  /** Resets one provider's bucket, or every bucket when no provider is given. */
  reset(provider?: string): void {
    if (provider !== undefined) {
      this.buckets.get(provider)?.reset();
      return;
    }
    for (const bucket of this.buckets.values()) {
      bucket.reset();
    }
  }

  getAllStats(): Record<string, TokenBucketStats> {
    const stats: Record<string, TokenBucketStats> = {};
    for (const [provider, bucket] of this.buckets) {
      stats[provider] = bucket.getStats();
    }
    return stats;
  }
}

/**
 * Runs `operation` after acquiring from the provider's bucket.
 * Throws {@link RateLimitError} without calling `operation` when acquisition fails.
 */
export async function withRateLimit<T>(
  registry: RateLimitRegistry,
  provider: string,
  operation: () => Promise<T>,
  options: AcquireOptions = {},
): Promise<T> {
  const acquired = await registry.acquire(provider, options);
  if (!acquired) {
    throw new RateLimitError(`Rate limit exceeded for ${provider}`, { provider });
  }
  return operation();
}
