import { z } from 'zod';

const nullableNumber = z.number().nullable();

export const tickerSchema = z.object({
  symbol: z.string(),
  provider: z.string(),
  price: nullableNumber,
  open: nullableNumber,
  high: nullableNumber,
  low: nullableNumber,
  bid: nullableNumber,
  ask: nullableNumber,
  /** 24h volume in the quote currency. */
  volume: nullableNumber,
  baseVolume: nullableNumber,
  change: nullableNumber,
  changePercent: nullableNumber,
  timestamp: nullableNumber,
});
export type Ticker = z.infer<typeof tickerSchema>;

/** `[price, amount]` */
export const orderBookLevelSchema = z.tuple([z.number(), z.number()]);
export type OrderBookLevel = z.infer<typeof orderBookLevelSchema>;

export const orderBookSchema = z.object({
  symbol: z.string(),
  provider: z.string(),
  bids: z.array(orderBookLevelSchema),
  asks: z.array(orderBookLevelSchema),
  timestamp: nullableNumber,
});
export type OrderBook = z.infer<typeof orderBookSchema>;

/** `[timestamp, open, high, low, close, volume]` */
export const candleSchema = z.tuple([
  z.number(),
  z.number(),
  z.number(),
  z.number(),
  z.number(),
  z.number(),
]);
export type Candle = z.infer<typeof candleSchema>;

export const tradeSchema = z.object({
  id: z.string().nullable(),
  symbol: z.string(),
  price: z.number(),
  amount: z.number(),
  cost: nullableNumber,
  side: z.enum(['buy', 'sell']).nullable(),
  timestamp: nullableNumber,
});
export type Trade = z.infer<typeof tradeSchema>;

export const priceQuoteSchema = z.object({
  symbol: z.string(),
  provider: z.string(),
  price: nullableNumber,
  bid: nullableNumber,
  ask: nullableNumber,
  spread: nullableNumber,
  high: nullableNumber,
  low: nullableNumber,
  volume: nullableNumber,
  timestamp: nullableNumber,
});
export type PriceQuote = z.infer<typeof priceQuoteSchema>;

export const symbolListSchema = z.array(z.string());

export interface OhlcvQuery {
  timeframe: string;
  /** Earliest candle, epoch ms. */
  since?: number;
  limit: number;
}

/**
 * Exchange adapter. Implementations throw whatever their transport throws;
 * the orchestrator classifies failures.
 */
export interface MarketDataProvider {
  fetchTicker(symbol: string, provider: string): Promise<Ticker>;
  fetchOrderBook(symbol: string, provider: string, limit: number): Promise<OrderBook>;
  fetchOhlcv(symbol: string, provider: string, query: OhlcvQuery): Promise<Candle[]>;
  fetchTrades(symbol: string, provider: string, limit: number): Promise<Trade[]>;
  listSymbols(provider: string): Promise<string[]>;
}
