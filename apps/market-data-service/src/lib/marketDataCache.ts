import type { z } from 'zod';
import type { CacheBackend, CacheStats } from '@libs/market-cache';
import { errorMessage, noopLogger, type Logger } from '@libs/resilience';
import {
  candleSchema,
  priceQuoteSchema,
  symbolListSchema,
  type Candle,
  type PriceQuote,
} from '../types';
import { cacheKeys } from './cacheKeys';

export const DEFAULT_TTL_SECONDS = {
  price: 5,
  ohlcv: 60,
  marketData: 300,
} as const;

const candleListSchema = candleSchema.array();

/**
 * Typed access to the cache for each kind of market data.
 *
 * A failing backend never fails a request: reads degrade to a miss and
 * writes are skipped, both logged at warn. Entries that no longer match
 * their schema are treated as misses.
 */
export class MarketDataCache {
  constructor(
    private readonly backend: CacheBackend,
    private readonly logger: Logger = noopLogger,
  ) {}

  getPrice(symbol: string, provider: string): Promise<PriceQuote | undefined> {
    return this.read(cacheKeys.price(symbol, provider), priceQuoteSchema);
  }

  setPrice(
    symbol: string,
    provider: string,
    quote: PriceQuote,
    ttlSeconds: number = DEFAULT_TTL_SECONDS.price,
  ): Promise<void> {
    return this.write(cacheKeys.price(symbol, provider), quote, ttlSeconds);
  }

  getOhlcv(symbol: string, provider: string, timeframe: string): Promise<Candle[] | undefined> {
    return this.read(cacheKeys.ohlcv(symbol, provider, timeframe), candleListSchema);
  }

  setOhlcv(
    symbol: string,
    provider: string,
    timeframe: string,
    candles: Candle[],
    ttlSeconds: number = DEFAULT_TTL_SECONDS.ohlcv,
  ): Promise<void> {
    return this.write(cacheKeys.ohlcv(symbol, provider, timeframe), candles, ttlSeconds);
  }

  /** Provider-wide listing data, such as the tradable symbols. */
  getMarketData(provider: string): Promise<string[] | undefined> {
    return this.read(cacheKeys.marketData(provider), symbolListSchema);
  }

  setMarketData(
    provider: string,
    symbols: string[],
    ttlSeconds: number = DEFAULT_TTL_SECONDS.marketData,
  ): Promise<void> {
    return this.write(cacheKeys.marketData(provider), symbols, ttlSeconds);
  }

  async getStats(): Promise<CacheStats> {
    try {
      return await this.backend.getStats();
    } catch (err) {
      this.logger.warn('Cache stats unavailable; reporting empty counters', { error: errorMessage(err) });
      return { backend: this.backend.name, size: 0, hits: 0, misses: 0, hitRate: 0, totalRequests: 0 };
    }
  }

  clear(): Promise<void> {
    return this.backend.clear();
  }

  private async read<T>(key: string, schema: z.ZodType<T>): Promise<T | undefined> {
    let raw: unknown;
    try {
      raw = await this.backend.get(key);
    } catch (err) {
      this.logger.warn(`Cache read failed for ${key}; treating as miss`, { error: errorMessage(err) });
      return undefined;
    }
    if (raw === undefined) {
      return undefined;
    }

    const parsed = schema.safeParse(raw);
    if (!parsed.success) {
      this.logger.warn(`Discarding malformed cache entry ${key}`);
      return undefined;
    }
    return parsed.data;
  }

  private async write(key: string, value: unknown, ttlSeconds: number): Promise<void> {
    try {
      await this.backend.set(key, value, ttlSeconds);
    } catch (err) {
      this.logger.warn(`Cache write failed for ${key}; skipping`, { error: errorMessage(err) });
    }
  }
}
