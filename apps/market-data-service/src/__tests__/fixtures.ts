import { vi } from 'vitest';
import { ManualClock, type Logger } from '@libs/resilience';
import { loadServiceConfig } from '../config';
import { createMarketDataService, type ServiceDependencies } from '../service';
import type { Candle, MarketDataProvider, OhlcvQuery, OrderBook, Ticker, Trade } from '../types';

export const createTicker = (overrides: Partial<Ticker> = {}): Ticker => ({
  symbol: 'BTC/USDT',
  provider: 'binance',
  price: 50000,
  open: 49500,
  high: 50500,
  low: 49500,
  bid: 49999,
  ask: 50001,
  volume: 1_000_000,
  baseVolume: 20,
  change: 500,
  changePercent: 1,
  timestamp: 1_700_000_000_000,
  ...overrides,
});

export const createOrderBook = (overrides: Partial<OrderBook> = {}): OrderBook => ({
  symbol: 'BTC/USDT',
  provider: 'binance',
  bids: [
    [49999, 1.5],
    [49998, 2],
  ],
  asks: [
    [50001, 0.75],
    [50002, 3],
  ],
  timestamp: 1_700_000_000_000,
  ...overrides,
});

export function createProvider() {
  return {
    fetchTicker: vi.fn(async (symbol: string, provider: string) => createTicker({ symbol, provider })),
    fetchOrderBook: vi.fn(async (symbol: string, provider: string, _limit: number) =>
      createOrderBook({ symbol, provider }),
    ),
    fetchOhlcv: vi.fn(
      async (_symbol: string, _provider: string, _query: OhlcvQuery): Promise<Candle[]> => [],
    ),
    fetchTrades: vi.fn(async (_symbol: string, _provider: string, _limit: number): Promise<Trade[]> => []),
    listSymbols: vi.fn(async (_provider: string): Promise<string[]> => []),
  } satisfies MarketDataProvider;
}

export type FakeProvider = ReturnType<typeof createProvider>;

export const createLogger = () => ({
  debug: vi.fn(),
  info: vi.fn(),
  warn: vi.fn(),
  error: vi.fn(),
}) satisfies Logger;

/** A service on a manual clock with the memory cache and default limits. */
export function createTestService(
  env: Record<string, string> = {},
  deps: Pick<ServiceDependencies, 'cacheBackend'> = {},
) {
  const clock = new ManualClock(1_700_000_000_000);
  const provider = createProvider();
  const logger = createLogger();
  const config = loadServiceConfig(env);
  const service = createMarketDataService(config, provider, {
    clock: clock.now,
    sleep: clock.sleep,
    logger,
    ...deps,
  });
  return { clock, provider, logger, config, service };
}
