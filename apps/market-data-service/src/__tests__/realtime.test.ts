import { describe, expect, it } from 'vitest';
import { MemoryCacheBackend } from '@libs/market-cache';
import { RateLimitRegistry } from '@libs/rate-limiter';
import { ManualClock, ValidationError } from '@libs/resilience';
import { MarketDataCache } from '../lib/marketDataCache';
import { RequestOrchestrator } from '../lib/requestOrchestrator';
import { RealtimeTools } from '../tools/realtime';
import { createOrderBook, createProvider, createTicker } from './fixtures';

const setup = (providers: string[] = ['binance', 'coinbase', 'kraken']) => {
  const clock = new ManualClock(1_700_000_000_000);
  const provider = createProvider();
  const orchestrator = new RequestOrchestrator({
    cache: new MarketDataCache(new MemoryCacheBackend({ clock: clock.now })),
    rateLimiter: new RateLimitRegistry({ clock: clock.now, sleep: clock.sleep }),
    provider,
    sleep: clock.sleep,
    retry: { maxRetries: 1 },
  });
  const tools = new RealtimeTools(orchestrator, {
    providers,
    defaultProvider: 'binance',
  });
  return { provider, tools };
};

describe('RealtimeTools', () => {
  it('returns the price with its spread on the default provider', async () => {
    const { provider, tools } = setup();

    await expect(tools.getPrice('BTC/USDT')).resolves.toEqual({
      symbol: 'BTC/USDT',
      provider: 'binance',
      price: 50000,
      bid: 49999,
      ask: 50001,
      spread: 2,
      high: 50500,
      low: 49500,
      volume: 1_000_000,
      timestamp: 1_700_000_000_000,
    });
    expect(provider.fetchTicker).toHaveBeenCalledWith('BTC/USDT', 'binance');
  });

  it('leaves the spread empty when one side is missing', async () => {
    const { provider, tools } = setup();
    provider.fetchTicker.mockResolvedValue(createTicker({ bid: null }));

    await expect(tools.getPrice('BTC/USDT')).resolves.toMatchObject({ spread: null });
  });

  it('validates inputs before calling the provider', async () => {
    const { provider, tools } = setup();

    await expect(tools.getPrice('BTCUSDT')).rejects.toThrow(
      "Validation error in 'symbol': BTCUSDT - must be a trading pair such as BTC/USDT",
    );
    await expect(tools.getPrice('BTC/USDT', 'mtgox')).rejects.toBeInstanceOf(ValidationError);
    await expect(tools.getOrderBook('BTC/USDT', 'binance', 0)).rejects.toThrow(
      "Validation error in 'limit': 0 - must be at least 1",
    );
    expect(provider.fetchTicker).not.toHaveBeenCalled();
    expect(provider.fetchOrderBook).not.toHaveBeenCalled();
  });

  it('summarises the ticker with top-of-book volumes', async () => {
    const { provider, tools } = setup();

    const summary = await tools.getMarketSummary('BTC/USDT', 'kraken');

    expect(provider.fetchOrderBook).toHaveBeenCalledWith('BTC/USDT', 'kraken', 5);
    expect(summary).toMatchObject({
      provider: 'kraken',
      price: 50000,
      close: 50000,
      open: 49500,
      change24h: 500,
      changePercent24h: 1,
      bidVolume: 1.5,
      askVolume: 0.75,
    });
  });

  it('ranks symbols by volume and skips the ones that fail', async () => {
    const { provider, tools } = setup();
    provider.listSymbols.mockResolvedValue(['AAA/USDT', 'BBB/USDT', 'CCC/USDT', 'DDD/USDT']);
    provider.fetchTicker.mockImplementation(async (symbol, name) => {
      if (symbol === 'CCC/USDT') {
        throw new Error('exchange down');
      }
      const volumes: Record<string, number | null> = { 'AAA/USDT': 10, 'BBB/USDT': 300, 'DDD/USDT': null };
      return createTicker({ symbol, provider: name, volume: volumes[symbol] ?? null });
    });

    const result = await tools.getTopVolumes(2);

    expect(result.totalSymbols).toBe(4);
    expect(result.topPairs.map((pair) => pair.symbol)).toEqual(['BBB/USDT', 'AAA/USDT']);
    expect(result.topPairs[0]).toEqual({ symbol: 'BBB/USDT', price: 50000, volume: 300, change24h: 1 });
  });

  it('reports best bid, best ask and spread for the order book', async () => {
    const { provider, tools } = setup();
    provider.fetchOrderBook.mockResolvedValue(
      createOrderBook({
        bids: [
          [100, 1],
          [99, 2],
          [98, 3],
        ],
        asks: [
          [101.5, 1],
          [102, 1],
          [103, 1],
        ],
      }),
    );

    const book = await tools.getOrderBook('BTC/USDT', 'binance', 2);

    expect(book.bids).toEqual([
      [100, 1],
      [99, 2],
    ]);
    expect(book).toMatchObject({ bestBid: 100, bestAsk: 101.5, spread: 1.5 });
  });

  it('handles an empty order book', async () => {
    const { provider, tools } = setup();
    provider.fetchOrderBook.mockResolvedValue(createOrderBook({ bids: [], asks: [] }));

    await expect(tools.getOrderBook('BTC/USDT')).resolves.toMatchObject({
      bestBid: null,
      bestAsk: null,
      spread: null,
    });
  });

  it('compares prices and keeps per-provider errors', async () => {
    const { provider, tools } = setup();
    provider.fetchTicker.mockImplementation(async (symbol, name) => {
      if (name === 'kraken') {
        throw new Error('exchange down');
      }
      return createTicker({ symbol, provider: name, price: name === 'binance' ? 100 : 110 });
    });

    const comparison = await tools.comparePrices('BTC/USDT');

    expect(comparison.averagePrice).toBe(105);
    expect(comparison.count).toBe(2);
    expect(comparison.providers.kraken).toEqual({
      error: 'Provider connection error [kraken]: Error from kraken: exchange down',
    });
    expect(comparison.providers.coinbase).toMatchObject({ price: 110 });
  });

  it('reports an unconfigured provider as an error entry', async () => {
    const { provider, tools } = setup(['binance', 'coinbase']);
    provider.fetchTicker.mockImplementation(async (symbol, name) =>
      createTicker({ symbol, provider: name, price: 100 }),
    );

    const comparison = await tools.comparePrices('BTC/USDT', ['binance', 'Bitstamp']);

    expect(comparison.providers.bitstamp).toEqual({
      error:
        "Validation error in 'provider': Bitstamp - unsupported provider; expected one of binance, coinbase",
    });
    expect(comparison.providers.binance).toMatchObject({ price: 100 });
    expect(comparison.averagePrice).toBe(100);
    expect(comparison.count).toBe(1);
    expect(provider.fetchTicker).toHaveBeenCalledTimes(1);
  });

  it('compares the default providers when kraken is not configured', async () => {
    const { provider, tools } = setup(['binance', 'coinbase']);
    provider.fetchTicker.mockImplementation(async (symbol, name) =>
      createTicker({ symbol, provider: name, price: name === 'binance' ? 100 : 110 }),
    );

    const comparison = await tools.comparePrices('BTC/USDT');

    expect(Object.keys(comparison.providers)).toEqual(['binance', 'coinbase', 'kraken']);
    expect(comparison.providers.kraken).toEqual({
      error:
        "Validation error in 'provider': kraken - unsupported provider; expected one of binance, coinbase",
    });
    expect(comparison.averagePrice).toBe(105);
    expect(comparison.count).toBe(2);
  });

  it('lists the configured providers', () => {
    const { tools } = setup();

    expect(tools.listProviders()).toEqual({
      providers: ['binance', 'coinbase', 'kraken'],
      count: 3,
      default: 'binance',
    });
  });
});
