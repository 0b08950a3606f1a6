import type { RateLimitRegistry } from '@libs/rate-limiter';
import {
  DEFAULT_PROVIDER_TIMEOUT_MS,
  RateLimitError,
  noopLogger,
  retryOnKinds,
  withErrorClassification,
  withRetry,
  withTimeout,
  type Logger,
  type MarketDataErrorKind,
  type RetryOptions,
  type Sleeper,
} from '@libs/resilience';
import type { Candle, MarketDataProvider, OrderBook, PriceQuote, Ticker, Trade } from '../types';
import type { MarketDataCache } from './marketDataCache';

export const DEFAULT_RETRYABLE_KINDS: readonly MarketDataErrorKind[] = [
  'connection',
  'timeout',
  'rate_limit',
];

export interface RequestOrchestratorOptions {
  cache: MarketDataCache;
  rateLimiter: RateLimitRegistry;
  provider: MarketDataProvider;
  /** Longest wait for a rate limit token. Waits indefinitely when omitted. */
  rateLimitTimeoutMs?: number;
  providerTimeoutMs?: number;
  retry?: Pick<RetryOptions, 'maxRetries' | 'baseDelayMs' | 'maxDelayMs' | 'backoffFactor'>;
  retryableKinds?: readonly MarketDataErrorKind[];
  sleep?: Sleeper;
  logger?: Logger;
}

export interface ExecuteRequest<T> {
  provider: string;
  symbol?: string;
  /** Label for logs and timeout messages, e.g. `fetchTicker`. */
  operation: string;
  call: () => Promise<T>;
  readCache?: () => Promise<T | undefined>;
  writeCache?: (value: T) => Promise<void>;
  signal?: AbortSignal;
}

export interface OhlcvRequest {
  timeframe: string;
  limit: number;
  since?: number;
  signal?: AbortSignal;
}

/**
 * Cache, then rate limit, then the provider call.
 *
 * The call is wrapped as retry(classify(timeout(call))), so retries see
 * classified error kinds and each attempt has its own deadline. A cache hit
 * spends no token; a miss spends exactly one, however many attempts follow.
 */
export class RequestOrchestrator {
  private readonly cache: MarketDataCache;
  private readonly rateLimiter: RateLimitRegistry;
  private readonly provider: MarketDataProvider;
  private readonly providerTimeoutMs: number;
  private readonly logger: Logger;

  constructor(private readonly options: RequestOrchestratorOptions) {
    this.cache = options.cache;
    this.rateLimiter = options.rateLimiter;
    this.provider = options.provider;
    this.providerTimeoutMs = options.providerTimeoutMs ?? DEFAULT_PROVIDER_TIMEOUT_MS;
    this.logger = options.logger ?? noopLogger;
  }

  async execute<T>(request: ExecuteRequest<T>): Promise<T> {
    const { provider, symbol, operation, signal } = request;

    if (request.readCache) {
      const cached = await request.readCache();
      if (cached !== undefined) {
        this.logger.debug(`Cache hit for ${operation}`, { provider, symbol });
        return cached;
      }
    }

    const acquired = await this.rateLimiter.acquire(provider, {
      timeoutMs: this.options.rateLimitTimeoutMs,
      signal,
    });
    if (!acquired) {
      throw new RateLimitError(`Rate limit exceeded for ${provider}`, { provider });
    }

    const guarded = withRetry(
      withErrorClassification(
        withTimeout(request.call, this.providerTimeoutMs, `${operation} on ${provider}`),
        { provider, symbol, timeoutMs: this.providerTimeoutMs },
      ),
      {
        ...this.options.retry,
        retryOn: retryOnKinds(...(this.options.retryableKinds ?? DEFAULT_RETRYABLE_KINDS)),
        signal,
        sleep: this.options.sleep,
        logger: this.logger,
        operation: `${operation} ${provider}${symbol ? ` ${symbol}` : ''}`,
      },
    );

    const value = await guarded();
    if (request.writeCache) {
      await request.writeCache(value);
    }
    return value;
  }

  /** Latest price with spread, cached briefly. */
  getPrice(symbol: string, provider: string, signal?: AbortSignal): Promise<PriceQuote> {
    return this.execute({
      provider,
      symbol,
      operation: 'fetchTicker',
      call: async () => toPriceQuote(await this.provider.fetchTicker(symbol, provider)),
      readCache: () => this.cache.getPrice(symbol, provider),
      writeCache: (quote) => this.cache.setPrice(symbol, provider, quote),
      signal,
    });
  }

  getTicker(symbol: string, provider: string, signal?: AbortSignal): Promise<Ticker> {
    return this.execute({
      provider,
      symbol,
      operation: 'fetchTicker',
      call: () => this.provider.fetchTicker(symbol, provider),
      signal,
    });
  }

  getOrderBook(
    symbol: string,
    provider: string,
    limit: number,
    signal?: AbortSignal,
  ): Promise<OrderBook> {
    return this.execute({
      provider,
      symbol,
      operation: 'fetchOrderBook',
      call: () => this.provider.fetchOrderBook(symbol, provider, limit),
      signal,
    });
  }

  getTrades(symbol: string, provider: string, limit: number, signal?: AbortSignal): Promise<Trade[]> {
    return this.execute({
      provider,
      symbol,
      operation: 'fetchTrades',
      call: () => this.provider.fetchTrades(symbol, provider, limit),
      signal,
    });
  }

  /**
   * Latest `limit` candles. A cached series shorter than `limit` is refetched;
   * a longer one is trimmed to its most recent `limit` candles.
   */
  async getOhlcv(symbol: string, provider: string, request: OhlcvRequest): Promise<Candle[]> {
    const { timeframe, limit, since, signal } = request;
    const candles = await this.execute({
      provider,
      symbol,
      operation: 'fetchOhlcv',
      call: () => this.provider.fetchOhlcv(symbol, provider, { timeframe, since, limit }),
      readCache:
        since === undefined
          ? async () => {
              const cached = await this.cache.getOhlcv(symbol, provider, timeframe);
              return cached && cached.length >= limit ? cached : undefined;
            }
          : undefined,
      writeCache:
        since === undefined
          ? (fetched) => this.cache.setOhlcv(symbol, provider, timeframe, fetched)
          : undefined,
      signal,
    });
    return candles.length > limit ? candles.slice(-limit) : candles;
  }

  /** Tradable symbols on `provider`, cached as provider-wide market data. */
  getMarkets(provider: string, signal?: AbortSignal): Promise<string[]> {
    return this.execute({
      provider,
      operation: 'listSymbols',
      call: () => this.provider.listSymbols(provider),
      readCache: () => this.cache.getMarketData(provider),
      writeCache: (symbols) => this.cache.setMarketData(provider, symbols),
      signal,
    });
  }
}

export function toPriceQuote(ticker: Ticker): PriceQuote {
  return {
    symbol: ticker.symbol,
    provider: ticker.provider,
    price: ticker.price,
    bid: ticker.bid,
    ask: ticker.ask,
    spread: ticker.ask !== null && ticker.bid !== null ? ticker.ask - ticker.bid : null,
    high: ticker.high,
    low: ticker.low,
    volume: ticker.volume,
    timestamp: ticker.timestamp,
  };
}
