import { noopLogger, systemClock, type Clock, type Logger } from '@libs/resilience';
import { ExpiringEntry } from './expiringEntry';
import { HitCounter } from './stats';
import type { CacheBackend, CacheStats } from './types';

export interface MemoryCacheOptions {
  clock?: Clock;
  logger?: Logger;
}

/**
 * Process-local cache. Expired entries are evicted when read.
 *
 * Every method mutates the map and counters before its first await, so
 * concurrent callers never see a half-applied update.
 */
export class MemoryCacheBackend implements CacheBackend {
  readonly name = 'memory';

  private readonly entries = new Map<string, ExpiringEntry<unknown>>();
  private readonly counter = new HitCounter();
  private readonly clock: Clock;
  private readonly logger: Logger;

  constructor(options: MemoryCacheOptions = {}) {
    this.clock = options.clock ?? systemClock;
    this.logger = options.logger ?? noopLogger;
  }

  async get(key: string): Promise<unknown> {
    const entry = this.entries.get(key);
    if (entry && !entry.isExpired(this.clock())) {
      this.counter.hit();
      this.logger.debug(`[cache] hit ${key}`);
      return entry.value;
    }

    if (entry) {
      this.entries.delete(key);
      this.logger.debug(`[cache] expired ${key}`);
    }
    this.counter.miss();
    this.logger.debug(`[cache] miss ${key}`);
    return undefined;
  }

  async set(key: string, value: unknown, ttlSeconds: number): Promise<void> {
    this.entries.set(key, new ExpiringEntry(value, this.clock(), ttlSeconds));
    this.logger.debug(`[cache] set ${key} (ttl ${ttlSeconds}s)`);
  }

  async delete(key: string): Promise<void> {
    if (this.entries.delete(key)) {
      this.logger.debug(`[cache] delete ${key}`);
    }
  }

  async clear(): Promise<void> {
    this.entries.clear();
    this.logger.info('[cache] cleared');
  }

  async getStats(): Promise<CacheStats> {
    return this.counter.snapshot(this.name, this.entries.size);
  }

  /** Seconds left on `key`, or undefined when absent or expired. Does not count as a read. */
  remainingTtl(key: string): number | undefined {
    const entry = this.entries.get(key);
    const now = this.clock();
    if (!entry || entry.isExpired(now)) {
      return undefined;
    }
    return entry.remainingTtl(now);
  }
}
