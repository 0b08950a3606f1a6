import {
  MemoryCacheBackend,
  createRedisCacheBackend,
  type CacheBackend,
  type CacheStats,
} from '@libs/market-cache';
import { RateLimitRegistry, type TokenBucketStats } from '@libs/rate-limiter';
import {
  errorMessage,
  isMarketDataError,
  type Clock,
  type Logger,
  type MarketDataErrorKind,
  type Sleeper,
} from '@libs/resilience';
import type { ServiceConfig } from './config';
import { MarketDataCache } from './lib/marketDataCache';
import { RequestOrchestrator } from './lib/requestOrchestrator';
import { ConsoleLogger } from './logger';
import {
  HistoricalTools,
  type HistoricalOhlcv,
  type MovingAverage,
  type PriceChange,
  type VolumeHistory,
} from './tools/historical';
import {
  RealtimeTools,
  type MarketSummary,
  type OrderBookSnapshot,
  type PriceComparison,
  type ProviderListing,
  type TopVolumes,
} from './tools/realtime';
import type { MarketDataProvider, PriceQuote } from './types';

export type ToolResult<T> =
  | { ok: true; data: T }
  | { ok: false; error: string; kind?: MarketDataErrorKind };

export interface ServiceDependencies {
  /** Replaces the backend selected by `config.cache`. */
  cacheBackend?: CacheBackend;
  logger?: Logger;
  clock?: Clock;
  sleep?: Sleeper;
}

/**
 * Tool surface of the gateway. Every call resolves to a {@link ToolResult};
 * nothing is thrown to the caller.
 */
export class MarketDataService {
  constructor(
    private readonly realtime: RealtimeTools,
    private readonly historical: HistoricalTools,
    private readonly cache: MarketDataCache,
    private readonly rateLimiter: RateLimitRegistry,
    private readonly backend: CacheBackend,
    private readonly logger: Logger,
  ) {}

  getPrice(symbol: string, provider?: string): Promise<ToolResult<PriceQuote>> {
    return this.run('get_price', () => this.realtime.getPrice(symbol, provider));
  }

  getMarketSummary(symbol: string, provider?: string): Promise<ToolResult<MarketSummary>> {
    return this.run('get_market_summary', () => this.realtime.getMarketSummary(symbol, provider));
  }

  getTopVolumes(limit?: number, provider?: string): Promise<ToolResult<TopVolumes>> {
    return this.run('get_top_volumes', () => this.realtime.getTopVolumes(limit, provider));
  }

  getOrderBook(symbol: string, provider?: string, limit?: number): Promise<ToolResult<OrderBookSnapshot>> {
    return this.run('get_order_book', () => this.realtime.getOrderBook(symbol, provider, limit));
  }

  comparePrices(symbol: string, providers?: string[]): Promise<ToolResult<PriceComparison>> {
    return this.run('compare_prices', () => this.realtime.comparePrices(symbol, providers));
  }

  listProviders(): Promise<ToolResult<ProviderListing>> {
    return this.run('list_providers', async () => this.realtime.listProviders());
  }

  getHistoricalOhlcv(
    symbol: string,
    provider?: string,
    options?: { timeframe?: string; limit?: number },
  ): Promise<ToolResult<HistoricalOhlcv>> {
    return this.run('get_historical_ohlcv', () =>
      this.historical.getHistoricalOhlcv(symbol, provider, options),
    );
  }

  getPriceChange(
    symbol: string,
    provider?: string,
    options?: { period?: string },
  ): Promise<ToolResult<PriceChange>> {
    return this.run('get_price_change', () => this.historical.getPriceChange(symbol, provider, options));
  }

  getVolumeHistory(
    symbol: string,
    provider?: string,
    options?: { timeframe?: string; limit?: number },
  ): Promise<ToolResult<VolumeHistory>> {
    return this.run('get_volume_history', () =>
      this.historical.getVolumeHistory(symbol, provider, options),
    );
  }

  getMovingAverage(
    symbol: string,
    provider?: string,
    options?: { period?: number; timeframe?: string },
  ): Promise<ToolResult<MovingAverage>> {
    return this.run('get_moving_average', () =>
      this.historical.getMovingAverage(symbol, provider, options),
    );
  }

  getCacheStats(): Promise<CacheStats> {
    return this.cache.getStats();
  }

  getRateLimitStats(): Record<string, TokenBucketStats> {
    return this.rateLimiter.getAllStats();
  }

  async close(): Promise<void> {
    await this.backend.close?.();
  }

  private async run<T>(tool: string, action: () => Promise<T>): Promise<ToolResult<T>> {
    try {
      return { ok: true, data: await action() };
    } catch (err) {
      if (isMarketDataError(err)) {
        this.logger.error(`Error in ${tool}: ${err.message}`, { kind: err.kind, severity: err.severity });
        return { ok: false, error: err.message, kind: err.kind };
      }
      const message = errorMessage(err);
      this.logger.error(`Unexpected error in ${tool}: ${message}`);
      return { ok: false, error: `Unexpected error: ${message}` };
    }
  }
}

/**
 * Wires cache, rate limiter, orchestrator and tools for `provider`.
 * Every configured provider gets its rate limit registered here.
 */
export function createMarketDataService(
  config: ServiceConfig,
  provider: MarketDataProvider,
  deps: ServiceDependencies = {},
): MarketDataService {
  const root = deps.logger ?? new ConsoleLogger('market-data', config.logLevel);
  const scoped = (component: string): Logger =>
    root instanceof ConsoleLogger ? root.child(component) : root;

  const backend =
    deps.cacheBackend ??
    (config.cache.backend === 'redis'
      ? createRedisCacheBackend({
          url: config.cache.redisUrl,
          namespace: config.cache.namespace,
          logger: scoped('cache'),
        })
      : new MemoryCacheBackend({ clock: deps.clock, logger: scoped('cache') }));

  const rateLimiter = new RateLimitRegistry({
    clock: deps.clock,
    sleep: deps.sleep,
    logger: scoped('rate-limit'),
  });
  rateLimiter.registerAll(config.rateLimits);

  const cache = new MarketDataCache(backend, scoped('cache'));
  const orchestrator = new RequestOrchestrator({
    cache,
    rateLimiter,
    provider,
    rateLimitTimeoutMs: config.rateLimitTimeoutMs,
    providerTimeoutMs: config.providerTimeoutMs,
    retry: config.retry,
    sleep: deps.sleep,
    logger: scoped('orchestrator'),
  });

  const settings = { providers: config.providers, defaultProvider: config.defaultProvider };
  const tools = scoped('tools');
  return new MarketDataService(
    new RealtimeTools(orchestrator, settings, tools),
    new HistoricalTools(orchestrator, settings, tools),
    cache,
    rateLimiter,
    backend,
    scoped('service'),
  );
}
