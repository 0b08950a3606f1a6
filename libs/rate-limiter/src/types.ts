import type { Clock, Logger, Sleeper } from '@libs/resilience';

export interface RateLimitConfig {
  /** Tokens added per second. */
  ratePerSecond: number;
  /** Maximum tokens held, i.e. the burst size. */
  capacity: number;
}

export interface TokenBucketOptions extends RateLimitConfig {
  name?: string;
  /** Delay between attempts while waiting for tokens. Defaults to 10ms. */
  pollIntervalMs?: number;
  clock?: Clock;
  sleep?: Sleeper;
  logger?: Logger;
}

export interface AcquireOptions {
  tokens?: number;
  /** Give up after waiting this long. Waits indefinitely when omitted. */
  timeoutMs?: number;
  signal?: AbortSignal;
}

export interface TokenBucketStats {
  name: string;
  rate: number;
  capacity: number;
  currentTokens: number;
  /** Successful acquisitions. */
  requests: number;
  rejections: number;
  /** Percentage of acquisitions that succeeded; 0 before any attempt. */
  successRate: number;
}
