import Redis from 'ioredis';
import { errorMessage, noopLogger, type Logger } from '@libs/resilience';
import { HitCounter } from './stats';
import type { CacheBackend, CacheStats } from './types';

const SCAN_BATCH_SIZE = 100;

/** The subset of Redis commands the cache backend issues. */
export interface RedisCacheClient {
  get(key: string): Promise<string | null>;
  setex(key: string, ttlSeconds: number, value: string): Promise<unknown>;
  del(...keys: string[]): Promise<number>;
  scan(cursor: string, pattern: string, count: number): Promise<[string, string[]]>;
  quit(): Promise<unknown>;
}

export class CacheBackendError extends Error {
  readonly operation: string;
  readonly key?: string;

  constructor(operation: string, key: string | undefined, cause: unknown) {
    super(`Cache ${operation} failed${key ? ` for ${key}` : ''}: ${errorMessage(cause)}`, { cause });
    this.name = 'CacheBackendError';
    this.operation = operation;
    this.key = key;
  }
}

export interface RedisCacheOptions {
  client: RedisCacheClient;
  /** Prefix for every key written. Defaults to `market-data`. */
  namespace?: string;
  logger?: Logger;
}

/**
 * Redis-backed cache. Values are stored as JSON with `SETEX`; hit and miss
 * counters are local to this process.
 */
export class RedisCacheBackend implements CacheBackend {
  readonly name = 'redis';

  private readonly client: RedisCacheClient;
  private readonly namespace: string;
  private readonly logger: Logger;
  private readonly counter = new HitCounter();

  constructor(options: RedisCacheOptions) {
    this.client = options.client;
    this.namespace = options.namespace ?? 'market-data';
    this.logger = options.logger ?? noopLogger;
  }

  private getKey(key: string): string {
    return `${this.namespace}:${key}`;
  }

  async get(key: string): Promise<unknown> {
    let raw: string | null;
    try {
      raw = await this.client.get(this.getKey(key));
    } catch (err) {
      throw new CacheBackendError('get', key, err);
    }

    if (raw === null) {
      this.counter.miss();
      this.logger.debug(`[cache] miss ${key}`);
      return undefined;
    }

    try {
      const value: unknown = JSON.parse(raw);
      this.counter.hit();
      this.logger.debug(`[cache] hit ${key}`);
      return value;
    } catch (err) {
      this.counter.miss();
      this.logger.warn(`[cache] discarding unreadable entry ${key}`, { error: errorMessage(err) });
      return undefined;
    }
  }

  async set(key: string, value: unknown, ttlSeconds: number): Promise<void> {
    const payload = JSON.stringify(value);
    // SETEX takes whole seconds and rejects 0.
    const ttl = Math.max(1, Math.ceil(ttlSeconds));
    try {
      await this.client.setex(this.getKey(key), ttl, payload);
    } catch (err) {
      throw new CacheBackendError('set', key, err);
    }
    this.logger.debug(`[cache] set ${key} (ttl ${ttl}s)`);
  }

  async delete(key: string): Promise<void> {
    try {
      await this.client.del(this.getKey(key));
    } catch (err) {
      throw new CacheBackendError('delete', key, err);
    }
  }

  /** Deletes this namespace's keys only. */
  async clear(): Promise<void> {
    const keys = await this.scanNamespace('clear');
    if (keys.length === 0) {
      return;
    }
    try {
      await this.client.del(...keys);
    } catch (err) {
      throw new CacheBackendError('clear', undefined, err);
    }
    this.logger.info(`[cache] cleared ${keys.length} key(s) in ${this.namespace}`);
  }

  /** Reports `size` as 0 when the namespace cannot be scanned. */
  async getStats(): Promise<CacheStats> {
    try {
      const keys = await this.scanNamespace('stats');
      return this.counter.snapshot(this.name, keys.length);
    } catch (err) {
      this.logger.warn(`[cache] size unavailable for ${this.namespace}`, { error: errorMessage(err) });
      return this.counter.snapshot(this.name, 0);
    }
  }

  async close(): Promise<void> {
    await this.client.quit();
  }

  private async scanNamespace(operation: string): Promise<string[]> {
    const pattern = `${this.namespace}:*`;
    const keys = new Set<string>();
    let cursor = '0';
    try {
      do {
        const [next, batch] = await this.client.scan(cursor, pattern, SCAN_BATCH_SIZE);
        for (const key of batch) {
          keys.add(key);
        }
        cursor = next;
      } while (cursor !== '0');
    } catch (err) {
      throw new CacheBackendError(operation, undefined, err);
    }
    return [...keys];
  }
}

export interface RedisConnectionOptions {
  url: string;
  namespace?: string;
  logger?: Logger;
}

/** Connects lazily on the first command. */
export function createRedisCacheBackend(options: RedisConnectionOptions): RedisCacheBackend {
  const logger = options.logger ?? noopLogger;
  const redis = new Redis(options.url, {
    lazyConnect: true,
    maxRetriesPerRequest: 2,
    connectTimeout: 5000,
    commandTimeout: 2000,
    retryStrategy: (times: number) => {
      if (times > 3) {
        logger.warn('[cache] Redis reconnect attempts exhausted');
        return null;
      }
      return Math.min(times * 50, 2000);
    },
  });

  redis.on('error', (err: Error) => {
    logger.warn(`[cache] Redis error: ${err.message}`);
  });

  const client: RedisCacheClient = {
    get: (key) => redis.get(key),
    setex: (key, ttlSeconds, value) => redis.setex(key, ttlSeconds, value),
    del: (...keys) => redis.del(...keys),
    scan: (cursor, pattern, count) => redis.scan(cursor, 'MATCH', pattern, 'COUNT', count),
    quit: () => redis.quit(),
  };

  return new RedisCacheBackend({ client, namespace: options.namespace, logger });
}
