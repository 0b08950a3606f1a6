/** Cache key layout. Symbols are upper-cased so `btc/usdt` and `BTC/USDT` share an entry. */
export const cacheKeys = {
  price: (symbol: string, provider: string) => `price:${provider}:${symbol.toUpperCase()}`,
  ticker: (symbol: string, provider: string) => `ticker:${provider}:${symbol.toUpperCase()}`,
  ohlcv: (symbol: string, provider: string, timeframe: string) =>
    `ohlcv:${provider}:${symbol.toUpperCase()}:${timeframe}`,
  marketData: (provider: string) => `market_data:${provider}`,
  exchangeInfo: (provider: string) => `exchange_info:${provider}`,
  globalMetrics: () => 'global_metrics',
};
