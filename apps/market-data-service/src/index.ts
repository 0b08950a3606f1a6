export { loadServiceConfig, DEFAULT_PROVIDER_RATES } from './config';
export type { CacheConfig, RetryConfig, ServiceConfig } from './config';
export { ConsoleLogger, LOG_LEVELS } from './logger';
export type { LogLevel } from './logger';
export { cacheKeys } from './lib/cacheKeys';
export { MarketDataCache, DEFAULT_TTL_SECONDS } from './lib/marketDataCache';
export { RequestOrchestrator, DEFAULT_RETRYABLE_KINDS, toPriceQuote } from './lib/requestOrchestrator';
export type { ExecuteRequest, OhlcvRequest, RequestOrchestratorOptions } from './lib/requestOrchestrator';
export { RealtimeTools } from './tools/realtime';
export type {
  MarketSummary,
  OrderBookSnapshot,
  PriceComparison,
  ProviderListing,
  ProviderQuote,
  TopVolumes,
} from './tools/realtime';
export { HistoricalTools, PRICE_CHANGE_WINDOWS } from './tools/historical';
export type {
  CandleRecord,
  HistoricalOhlcv,
  MovingAverage,
  PriceChange,
  PriceChangePeriod,
  VolumeHistory,
} from './tools/historical';
export { MarketDataService, createMarketDataService } from './service';
export type { ServiceDependencies, ToolResult } from './service';
export * from './types';
