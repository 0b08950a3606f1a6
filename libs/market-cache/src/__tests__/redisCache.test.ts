import { describe, expect, it, vi } from 'vitest';
import { CacheBackendError, RedisCacheBackend, type RedisCacheClient } from '../redisCache';

class FakeRedis implements RedisCacheClient {
  readonly store = new Map<string, { value: string; ttl: number }>();

  get = vi.fn(async (key: string) => this.store.get(key)?.value ?? null);

  setex = vi.fn(async (key: string, ttl: number, value: string) => {
    this.store.set(key, { value, ttl });
    return 'OK';
  });

  del = vi.fn(async (...keys: string[]) => {
    let removed = 0;
    for (const key of keys) {
      if (this.store.delete(key)) {
        removed += 1;
      }
    }
    return removed;
  });

  scan = vi.fn(async (_cursor: string, pattern: string): Promise<[string, string[]]> => {
    const prefix = pattern.replace(/\*$/, '');
    return ['0', [...this.store.keys()].filter((key) => key.startsWith(prefix))];
  });

  quit = vi.fn(async () => 'OK');
}

describe('RedisCacheBackend', () => {
  it('stores JSON under the namespace with SETEX', async () => {
    const client = new FakeRedis();
    const cache = new RedisCacheBackend({ client, namespace: 'md' });

    await cache.set('price:binance:BTC/USDT', { price: 50000 }, 5);

    expect(client.setex).toHaveBeenCalledWith('md:price:binance:BTC/USDT', 5, '{"price":50000}');
    await expect(cache.get('price:binance:BTC/USDT')).resolves.toEqual({ price: 50000 });
  });

  it('rounds ttl up to whole seconds', async () => {
    const client = new FakeRedis();
    const cache = new RedisCacheBackend({ client });

    await cache.set('a', 1, 0);
    await cache.set('b', 1, 2.5);

    expect(client.store.get('market-data:a')?.ttl).toBe(1);
    expect(client.store.get('market-data:b')?.ttl).toBe(3);
  });

  it('counts hits and misses in process', async () => {
    const client = new FakeRedis();
    const cache = new RedisCacheBackend({ client, namespace: 'md' });
    await cache.set('k', 'v', 10);

    await cache.get('k');
    await cache.get('absent');

    await expect(cache.getStats()).resolves.toEqual({
      backend: 'redis',
      size: 1,
      hits: 1,
      misses: 1,
      hitRate: 50,
      totalRequests: 2,
    });
  });

  it('treats unreadable payloads as misses', async () => {
    const client = new FakeRedis();
    client.store.set('md:k', { value: '{not json', ttl: 10 });
    const cache = new RedisCacheBackend({ client, namespace: 'md' });

    await expect(cache.get('k')).resolves.toBeUndefined();
    await expect(cache.getStats()).resolves.toMatchObject({ misses: 1 });
  });

  it('clears only its own namespace', async () => {
    const client = new FakeRedis();
    client.store.set('other:k', { value: '1', ttl: 10 });
    const cache = new RedisCacheBackend({ client, namespace: 'md' });
    await cache.set('a', 1, 10);
    await cache.set('b', 2, 10);

    await cache.clear();

    expect([...client.store.keys()]).toEqual(['other:k']);
  });

  it('keeps local counters when the namespace scan fails', async () => {
    const client = new FakeRedis();
    const logger = { debug: vi.fn(), info: vi.fn(), warn: vi.fn(), error: vi.fn() };
    const cache = new RedisCacheBackend({ client, namespace: 'md', logger });
    await cache.get('absent');
    client.scan.mockRejectedValueOnce(new Error('ECONNREFUSED'));

    await expect(cache.getStats()).resolves.toEqual({
      backend: 'redis',
      size: 0,
      hits: 0,
      misses: 1,
      hitRate: 0,
      totalRequests: 1,
    });
    expect(logger.warn).toHaveBeenCalledWith('[cache] size unavailable for md', {
      error: 'Cache stats failed: ECONNREFUSED',
    });
  });

  it('wraps client failures in CacheBackendError', async () => {
    const client = new FakeRedis();
    client.get.mockRejectedValueOnce(new Error('Connection is closed.'));
    const cache = new RedisCacheBackend({ client, namespace: 'md' });

    const result = cache.get('k');

    await expect(result).rejects.toBeInstanceOf(CacheBackendError);
    await expect(result).rejects.toThrow('Cache get failed for k: Connection is closed.');
  });
});

describe('RedisCacheBackend.close', () => {
  it('quits the client', async () => {
    const client = new FakeRedis();
    await new RedisCacheBackend({ client }).close();
    expect(client.quit).toHaveBeenCalledTimes(1);
  });
});
