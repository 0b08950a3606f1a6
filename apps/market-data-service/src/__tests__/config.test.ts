import { describe, expect, it } from 'vitest';
import { ValidationError } from '@libs/resilience';
import { DEFAULT_PROVIDER_RATES, loadServiceConfig } from '../config';

describe('loadServiceConfig', () => {
  it('applies defaults when nothing is set', () => {
    const config = loadServiceConfig({});

    expect(config.providers).toEqual(Object.keys(DEFAULT_PROVIDER_RATES));
    expect(config.defaultProvider).toBe('binance');
    expect(config.rateLimits.coinbase).toEqual({ ratePerSecond: 5, capacity: 5 });
    expect(config.rateLimits.kraken).toEqual({ ratePerSecond: 15, capacity: 15 });
    expect(config.rateLimitTimeoutMs).toBe(30_000);
    expect(config.providerTimeoutMs).toBe(10_000);
    expect(config.retry).toEqual({ maxRetries: 3, baseDelayMs: 1000, maxDelayMs: 60_000, backoffFactor: 2 });
    expect(config.cache).toEqual({ backend: 'memory', namespace: 'market-data' });
    expect(config.logLevel).toBe('info');
  });

  it('reads providers and limit overrides', () => {
    const config = loadServiceConfig({
      MARKET_DATA_PROVIDERS: ' Kraken, coinbase ,',
      RATE_LIMIT_PER_SECOND: '2',
      RATE_LIMIT_BURST: '4',
      RETRY_MAX_ATTEMPTS: '5',
      LOG_LEVEL: 'debug',
    });

    expect(config.providers).toEqual(['kraken', 'coinbase']);
    expect(config.defaultProvider).toBe('kraken');
    expect(config.rateLimits).toEqual({
      kraken: { ratePerSecond: 2, capacity: 4 },
      coinbase: { ratePerSecond: 2, capacity: 4 },
    });
    expect(config.retry.maxRetries).toBe(5);
    expect(config.logLevel).toBe('debug');
  });

  it('treats empty values as unset', () => {
    expect(loadServiceConfig({ PROVIDER_TIMEOUT_MS: '', LOG_LEVEL: '  ' }).providerTimeoutMs).toBe(10_000);
  });

  it('configures the redis backend', () => {
    const config = loadServiceConfig({
      CACHE_BACKEND: 'redis',
      REDIS_URL: 'redis://localhost:6379',
      CACHE_NAMESPACE: 'md',
    });

    expect(config.cache).toEqual({ backend: 'redis', namespace: 'md', redisUrl: 'redis://localhost:6379' });
  });

  it('names the offending variable', () => {
    expect(() => loadServiceConfig({ RATE_LIMIT_PER_SECOND: 'fast' })).toThrow(ValidationError);
    expect(() => loadServiceConfig({ CACHE_BACKEND: 'redis' })).toThrow(
      "Validation error in 'REDIS_URL': undefined - is required when CACHE_BACKEND is redis",
    );

    try {
      loadServiceConfig({ LOG_LEVEL: 'verbose' });
      expect.unreachable();
    } catch (err) {
      expect(err).toBeInstanceOf(ValidationError);
      expect(err).toMatchObject({ field: 'LOG_LEVEL', value: 'verbose' });
    }
  });

  it('rejects a default provider that is not configured', () => {
    expect(() =>
      loadServiceConfig({ MARKET_DATA_PROVIDERS: 'kraken', MARKET_DATA_DEFAULT_PROVIDER: 'binance' }),
    ).toThrow("Validation error in 'MARKET_DATA_DEFAULT_PROVIDER': binance - must be one of the configured providers");
  });
});
