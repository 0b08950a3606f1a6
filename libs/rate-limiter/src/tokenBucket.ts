import {
  ValidationError,
  noopLogger,
  sleep as defaultSleep,
  systemClock,
  type Clock,
  type Logger,
  type Sleeper,
} from '@libs/resilience';
import type { AcquireOptions, TokenBucketOptions, TokenBucketStats } from './types';

export const DEFAULT_POLL_INTERVAL_MS = 10;

/**
 * Token bucket limiter.
 *
 * Tokens refill continuously at `ratePerSecond` up to `capacity`. Refill and
 * take run in one synchronous step, so concurrent callers cannot overdraw the
 * bucket. Waiters poll; there is no ordering among them.
 */
export class TokenBucket {
  readonly name: string;
  readonly ratePerSecond: number;
  readonly capacity: number;

  private tokens: number;
  private lastUpdate: number;
  private requests = 0;
  private rejections = 0;

  private readonly pollIntervalMs: number;
  private readonly clock: Clock;
  private readonly sleep: Sleeper;
  private readonly logger: Logger;

  constructor(options: TokenBucketOptions) {
    if (!(options.ratePerSecond > 0)) {
      throw new ValidationError('ratePerSecond', options.ratePerSecond, 'must be greater than 0');
    }
    if (!(options.capacity > 0)) {
      throw new ValidationError('capacity', options.capacity, 'must be greater than 0');
    }

    this.name = options.name ?? 'bucket';
    this.ratePerSecond = options.ratePerSecond;
    this.capacity = options.capacity;
    this.pollIntervalMs = options.pollIntervalMs ?? DEFAULT_POLL_INTERVAL_MS;
    this.clock = options.clock ?? systemClock;
    this.sleep = options.sleep ?? defaultSleep;
    this.logger = options.logger ?? noopLogger;

    this.tokens = this.capacity;
    this.lastUpdate = this.clock();
  }

  /**
   * Waits until `tokens` are available and takes them.
   * Resolves `false` once `timeoutMs` has elapsed without success.
   */
  async acquire(options: AcquireOptions = {}): Promise<boolean> {
    const tokens = this.validateTokens(options.tokens ?? 1);
    const { timeoutMs, signal } = options;
    const startedAt = this.clock();

    for (;;) {
      signal?.throwIfAborted();
      if (this.take(tokens)) {
        return true;
      }

      const waitedMs = this.clock() - startedAt;
      if (timeoutMs !== undefined && waitedMs >= timeoutMs) {
        this.rejections += 1;
        this.logger.warn(`[rate-limit] ${this.name}: timed out after ${waitedMs}ms`, {
          tokens,
          timeoutMs,
        });
        return false;
      }

      await this.sleep(this.pollIntervalMs, signal);
    }
  }

  /** Takes `tokens` if they are available right now. */
  tryAcquire(tokens = 1): boolean {
    const requested = this.validateTokens(tokens);
    if (this.take(requested)) {
      return true;
    }
    this.rejections += 1;
    return false;
  }

  reset(): void {
    this.tokens = this.capacity;
    this.lastUpdate = this.clock();
    this.requests = 0;
    this.rejections = 0;
  }

  /** Tokens available now, after refill. */
  available(): number {
    this.refill();
    return this.tokens;
  }

  getStats(): TokenBucketStats {
    this.refill();
    const attempts = this.requests + this.rejections;
    return {
      name: this.name,
      rate: this.ratePerSecond,
      capacity: this.capacity,
      currentTokens: round2(this.tokens),
      requests: this.requests,
      rejections: this.rejections,
      successRate: attempts > 0 ? round2((this.requests / attempts) * 100) : 0,
    };
  }

  private take(tokens: number): boolean {
    this.refill();
    if (this.tokens < tokens) {
      return false;
    }
    this.tokens -= tokens;
    this.requests += 1;
    this.logger.debug(
      `[rate-limit] ${this.name}: acquired ${tokens} token(s), ${this.tokens.toFixed(2)} remaining`,
    );
    return true;
  }

  private refill(): void {
    const now = this.clock();
    const elapsedSeconds = Math.max(0, now - this.lastUpdate) / 1000;
    this.tokens = Math.min(this.capacity, this.tokens + elapsedSeconds * this.ratePerSecond);
    this.lastUpdate = now;
  }

  private validateTokens(tokens: number): number {
    if (!Number.isInteger(tokens) || tokens < 1) {
      throw new ValidationError('tokens', tokens, 'must be a positive integer');
    }
    if (tokens > this.capacity) {
      throw new ValidationError('tokens', tokens, `cannot exceed bucket capacity ${this.capacity}`);
    }
    return tokens;
  }
}

function round2(value: number): number {
  return Math.round(value * 100) / 100;
}
