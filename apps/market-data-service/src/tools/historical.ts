import { z } from 'zod';
import { DataError, noopLogger, type Logger } from '@libs/resilience';
import type { RequestOrchestrator } from '../lib/requestOrchestrator';
import type { Candle } from '../types';
import {
  limitSchema,
  resolveProvider,
  symbolSchema,
  timeframeSchema,
  validate,
  type ProviderSettings,
  type Timeframe,
} from './validation';

const MAX_CANDLES = 1000;

/** Candle resolution and count used to cover each price-change period. */
export const PRICE_CHANGE_WINDOWS = {
  '1h': { timeframe: '1m', limit: 60 },
  '4h': { timeframe: '5m', limit: 48 },
  '24h': { timeframe: '1h', limit: 24 },
  '7d': { timeframe: '4h', limit: 42 },
  '30d': { timeframe: '1d', limit: 30 },
} as const satisfies Record<string, { timeframe: Timeframe; limit: number }>;

export type PriceChangePeriod = keyof typeof PRICE_CHANGE_WINDOWS;

const periodSchema = z.enum(['1h', '4h', '24h', '7d', '30d']);

export interface CandleRecord {
  timestamp: number;
  open: number;
  high: number;
  low: number;
  close: number;
  volume: number;
}

export interface HistoricalOhlcv {
  symbol: string;
  provider: string;
  timeframe: Timeframe;
  count: number;
  data: CandleRecord[];
}

export interface PriceChange {
  symbol: string;
  provider: string;
  period: PriceChangePeriod;
  startPrice: number;
  endPrice: number;
  change: number;
  changePercent: number | null;
  high: number;
  low: number;
  startTime: number;
  endTime: number;
}

export interface VolumeHistory {
  symbol: string;
  provider: string;
  timeframe: Timeframe;
  volumes: Array<{ timestamp: number; volume: number }>;
  totalVolume: number;
  averageVolume: number;
}

export interface MovingAverage {
  symbol: string;
  provider: string;
  timeframe: Timeframe;
  period: number;
  movingAverage: number;
  currentPrice: number;
  distancePercent: number;
  position: 'above' | 'below';
}

export class HistoricalTools {
  constructor(
    private readonly orchestrator: RequestOrchestrator,
    private readonly settings: ProviderSettings,
    private readonly logger: Logger = noopLogger,
  ) {}

  async getHistoricalOhlcv(
    symbol: string,
    provider?: string,
    options: { timeframe?: string; limit?: number } = {},
  ): Promise<HistoricalOhlcv> {
    const pair = validate('symbol', symbolSchema, symbol);
    const target = resolveProvider(this.settings, provider);
    const timeframe = validate('timeframe', timeframeSchema, options.timeframe ?? '1h');
    const limit = validate('limit', limitSchema(MAX_CANDLES), options.limit ?? 100);
    this.logger.info(`Fetching ${limit} ${timeframe} candles for ${pair} on ${target}`);

    const candles = await this.orchestrator.getOhlcv(pair, target, { timeframe, limit });
    return {
      symbol: pair,
      provider: target,
      timeframe,
      count: candles.length,
      data: candles.map(toCandleRecord),
    };
  }

  /** Change from the first candle's open to the last candle's close over `period`. */
  async getPriceChange(
    symbol: string,
    provider?: string,
    options: { period?: string } = {},
  ): Promise<PriceChange> {
    const pair = validate('symbol', symbolSchema, symbol);
    const target = resolveProvider(this.settings, provider);
    const period = validate('period', periodSchema, options.period ?? '24h');
    const window = PRICE_CHANGE_WINDOWS[period];
    this.logger.info(`Computing ${period} price change for ${pair} on ${target}`);

    const candles = await this.orchestrator.getOhlcv(pair, target, window);
    const [first] = candles;
    const last = candles.at(-1);
    if (!first || !last) {
      throw new DataError(`No candles returned for ${pair} on ${target}`, { data: { period } });
    }

    const startPrice = first[1];
    const endPrice = last[4];
    const change = endPrice - startPrice;
    return {
      symbol: pair,
      provider: target,
      period,
      startPrice,
      endPrice,
      change,
      changePercent: startPrice !== 0 ? round(change / startPrice * 100, 4) : null,
      high: Math.max(...candles.map((candle) => candle[2])),
      low: Math.min(...candles.map((candle) => candle[3])),
      startTime: first[0],
      endTime: last[0],
    };
  }

  async getVolumeHistory(
    symbol: string,
    provider?: string,
    options: { timeframe?: string; limit?: number } = {},
  ): Promise<VolumeHistory> {
    const pair = validate('symbol', symbolSchema, symbol);
    const target = resolveProvider(this.settings, provider);
    const timeframe = validate('timeframe', timeframeSchema, options.timeframe ?? '1h');
    const limit = validate('limit', limitSchema(MAX_CANDLES), options.limit ?? 24);

    const candles = await this.orchestrator.getOhlcv(pair, target, { timeframe, limit });
    const volumes = candles.map(([timestamp, , , , , volume]) => ({ timestamp, volume }));
    const totalVolume = volumes.reduce((sum, entry) => sum + entry.volume, 0);

    return {
      symbol: pair,
      provider: target,
      timeframe,
      volumes,
      totalVolume,
      averageVolume: volumes.length > 0 ? totalVolume / volumes.length : 0,
    };
  }

  /** Simple moving average of the last `period` closes against the latest close. */
  async getMovingAverage(
    symbol: string,
    provider?: string,
    options: { period?: number; timeframe?: string } = {},
  ): Promise<MovingAverage> {
    const pair = validate('symbol', symbolSchema, symbol);
    const target = resolveProvider(this.settings, provider);
    const period = validate('period', limitSchema(500), options.period ?? 20);
    const timeframe = validate('timeframe', timeframeSchema, options.timeframe ?? '1h');

    const candles = await this.orchestrator.getOhlcv(pair, target, { timeframe, limit: period });
    const closes = candles.slice(-period).map((candle) => candle[4]);
    const currentPrice = closes.at(-1);
    if (currentPrice === undefined || closes.length < period) {
      throw new DataError(`Need ${period} candles for ${pair} on ${target}, got ${closes.length}`);
    }

    const movingAverage = closes.reduce((sum, close) => sum + close, 0) / period;
    if (movingAverage === 0) {
      throw new DataError(`Moving average of ${pair} on ${target} is zero`, { data: { period, timeframe } });
    }
    return {
      symbol: pair,
      provider: target,
      timeframe,
      period,
      movingAverage,
      currentPrice,
      distancePercent: round((currentPrice - movingAverage) / movingAverage * 100, 2),
      position: currentPrice >= movingAverage ? 'above' : 'below',
    };
  }
}

function toCandleRecord([timestamp, open, high, low, close, volume]: Candle): CandleRecord {
  return { timestamp, open, high, low, close, volume };
}

function round(value: number, digits: number): number {
  const factor = 10 ** digits;
  return Math.round(value * factor) / factor;
}
