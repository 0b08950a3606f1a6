import { errorMessage, noopLogger, type Logger } from '@libs/resilience';
import type { RequestOrchestrator } from '../lib/requestOrchestrator';
import type { OrderBookLevel, PriceQuote } from '../types';
import {
  limitSchema,
  resolveProvider,
  symbolSchema,
  validate,
  type ProviderSettings,
} from './validation';

/** Symbols scanned when ranking by volume. */
export const TOP_VOLUME_SCAN_SIZE = 100;
const SUMMARY_DEPTH = 5;
const DEFAULT_COMPARE_PROVIDERS = ['binance', 'coinbase', 'kraken'];

export interface MarketSummary {
  symbol: string;
  provider: string;
  price: number | null;
  open: number | null;
  high: number | null;
  low: number | null;
  close: number | null;
  volume: number | null;
  baseVolume: number | null;
  change24h: number | null;
  changePercent24h: number | null;
  bid: number | null;
  ask: number | null;
  bidVolume: number | null;
  askVolume: number | null;
  timestamp: number | null;
}

export interface TopVolumePair {
  symbol: string;
  price: number | null;
  volume: number | null;
  change24h: number | null;
}

export interface TopVolumes {
  provider: string;
  limit: number;
  topPairs: TopVolumePair[];
  totalSymbols: number;
}

export interface OrderBookSnapshot {
  symbol: string;
  provider: string;
  bids: OrderBookLevel[];
  asks: OrderBookLevel[];
  bestBid: number | null;
  bestAsk: number | null;
  spread: number | null;
  timestamp: number | null;
}

export type ProviderQuote = PriceQuote | { error: string };

export interface PriceComparison {
  symbol: string;
  providers: Record<string, ProviderQuote>;
  averagePrice: number | null;
  count: number;
}

export interface ProviderListing {
  providers: string[];
  count: number;
  default: string;
}

export class RealtimeTools {
  constructor(
    private readonly orchestrator: RequestOrchestrator,
    private readonly settings: ProviderSettings,
    private readonly logger: Logger = noopLogger,
  ) {}

  async getPrice(symbol: string, provider?: string): Promise<PriceQuote> {
    const pair = validate('symbol', symbolSchema, symbol);
    const target = resolveProvider(this.settings, provider);
    this.logger.info(`Fetching price for ${pair} on ${target}`);
    return this.orchestrator.getPrice(pair, target);
  }

  async getMarketSummary(symbol: string, provider?: string): Promise<MarketSummary> {
    const pair = validate('symbol', symbolSchema, symbol);
    const target = resolveProvider(this.settings, provider);
    this.logger.info(`Fetching market summary for ${pair} on ${target}`);

    const ticker = await this.orchestrator.getTicker(pair, target);
    const book = await this.orchestrator.getOrderBook(pair, target, SUMMARY_DEPTH);

    return {
      symbol: pair,
      provider: target,
      price: ticker.price,
      open: ticker.open,
      high: ticker.high,
      low: ticker.low,
      close: ticker.price,
      volume: ticker.volume,
      baseVolume: ticker.baseVolume,
      change24h: ticker.change,
      changePercent24h: ticker.changePercent,
      bid: ticker.bid,
      ask: ticker.ask,
      bidVolume: book.bids[0]?.[1] ?? null,
      askVolume: book.asks[0]?.[1] ?? null,
      timestamp: ticker.timestamp,
    };
  }

  /**
   * Ranks the first {@link TOP_VOLUME_SCAN_SIZE} listed symbols by quote volume.
   * Symbols whose ticker cannot be fetched are left out.
   */
  async getTopVolumes(limit = 10, provider?: string): Promise<TopVolumes> {
    const count = validate('limit', limitSchema(TOP_VOLUME_SCAN_SIZE), limit);
    const target = resolveProvider(this.settings, provider);
    this.logger.info(`Fetching top ${count} volumes on ${target}`);

    const symbols = await this.orchestrator.getMarkets(target);
    const pairs: TopVolumePair[] = [];
    for (const symbol of symbols.slice(0, TOP_VOLUME_SCAN_SIZE)) {
      try {
        const ticker = await this.orchestrator.getTicker(symbol, target);
        pairs.push({
          symbol: ticker.symbol,
          price: ticker.price,
          volume: ticker.volume,
          change24h: ticker.changePercent,
        });
      } catch (err) {
        this.logger.debug(`Skipping ${symbol} on ${target}: ${errorMessage(err)}`);
      }
    }

    pairs.sort((a, b) => (b.volume ?? 0) - (a.volume ?? 0));
    return {
      provider: target,
      limit: count,
      topPairs: pairs.slice(0, count),
      totalSymbols: symbols.length,
    };
  }

  async getOrderBook(symbol: string, provider?: string, limit = 20): Promise<OrderBookSnapshot> {
    const pair = validate('symbol', symbolSchema, symbol);
    const target = resolveProvider(this.settings, provider);
    const depth = validate('limit', limitSchema(500), limit);
    this.logger.info(`Fetching order book for ${pair} on ${target}`);

    const book = await this.orchestrator.getOrderBook(pair, target, depth);
    const bestBid = book.bids[0]?.[0] ?? null;
    const bestAsk = book.asks[0]?.[0] ?? null;

    return {
      symbol: pair,
      provider: target,
      bids: book.bids.slice(0, depth),
      asks: book.asks.slice(0, depth),
      bestBid,
      bestAsk,
      spread: bestBid !== null && bestAsk !== null ? bestAsk - bestBid : null,
      timestamp: book.timestamp,
    };
  }

  /** Fetches the price on each provider in turn; one provider failing does not fail the rest. */
  async comparePrices(symbol: string, providers?: string[]): Promise<PriceComparison> {
    const pair = validate('symbol', symbolSchema, symbol);
    const requested = providers && providers.length > 0 ? providers : DEFAULT_COMPARE_PROVIDERS;
    this.logger.info(`Comparing ${pair} across ${requested.join(', ')}`);

    const quotes: Record<string, ProviderQuote> = {};
    const prices: number[] = [];
    for (const requestedProvider of requested) {
      const key = requestedProvider.trim().toLowerCase();
      try {
        const target = resolveProvider(this.settings, requestedProvider);
        const quote = await this.orchestrator.getPrice(pair, target);
        quotes[key] = quote;
        if (quote.price !== null) {
          prices.push(quote.price);
        }
      } catch (err) {
        quotes[key] = { error: errorMessage(err) };
      }
    }

    return {
      symbol: pair,
      providers: quotes,
      averagePrice: prices.length > 0 ? prices.reduce((sum, p) => sum + p, 0) / prices.length : null,
      count: prices.length,
    };
  }

  listProviders(): ProviderListing {
    return {
      providers: [...this.settings.providers],
      count: this.settings.providers.length,
      default: this.settings.defaultProvider,
    };
  }
}
