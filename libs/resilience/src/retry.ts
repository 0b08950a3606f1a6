import { sleep as defaultSleep } from './clock';
import { RateLimitError, errorMessage, isMarketDataError, type MarketDataErrorKind } from './errors';
import { noopLogger, type Logger, type Sleeper } from './types';

export const DEFAULT_MAX_RETRIES = 3;
export const DEFAULT_BASE_DELAY_MS = 1_000;
export const DEFAULT_MAX_DELAY_MS = 60_000;
export const DEFAULT_BACKOFF_FACTOR = 2;

export type RetryPredicate = (error: unknown) => boolean;

export interface BackoffPolicy {
  /** Total attempts, including the first one. */
  maxRetries?: number;
  baseDelayMs?: number;
  maxDelayMs?: number;
  backoffFactor?: number;
}

export interface RetryOptions extends BackoffPolicy {
  /** Failures for which this returns false propagate without another attempt. Defaults to every failure. */
  retryOn?: RetryPredicate;
  signal?: AbortSignal;
  sleep?: Sleeper;
  logger?: Logger;
  /** Label used in log lines. */
  operation?: string;
}

const retryAll: RetryPredicate = () => true;

/** Delay before the attempt following the 0-based `attempt`. */
export function computeBackoffDelay(attempt: number, policy: BackoffPolicy = {}): number {
  const baseDelayMs = policy.baseDelayMs ?? DEFAULT_BASE_DELAY_MS;
  const maxDelayMs = policy.maxDelayMs ?? DEFAULT_MAX_DELAY_MS;
  const backoffFactor = policy.backoffFactor ?? DEFAULT_BACKOFF_FACTOR;
  return Math.min(baseDelayMs * backoffFactor ** attempt, maxDelayMs);
}

/** A provider's retry-after hint lengthens the backoff, still capped at `maxDelayMs`. */
function retryDelay(error: unknown, attempt: number, policy: BackoffPolicy): number {
  const delayMs = computeBackoffDelay(attempt, policy);
  if (!(error instanceof RateLimitError) || error.retryAfterMs === undefined) {
    return delayMs;
  }
  return Math.min(Math.max(delayMs, error.retryAfterMs), policy.maxDelayMs ?? DEFAULT_MAX_DELAY_MS);
}

/** Retry only market data errors of the given kinds. */
export function retryOnKinds(...kinds: MarketDataErrorKind[]): RetryPredicate {
  const eligible = new Set<MarketDataErrorKind>(kinds);
  return (error) => isMarketDataError(error) && eligible.has(error.kind);
}

/**
 * Runs `operation` until it succeeds or the attempt budget is spent.
 *
 * Delays grow as `baseDelayMs * backoffFactor^attempt`, capped at `maxDelayMs`,
 * with no jitter. The error of the final attempt is rethrown as-is.
 */
export async function retryWithBackoff<T>(
  operation: () => Promise<T>,
  options: RetryOptions = {},
): Promise<T> {
  const maxRetries = Math.max(1, Math.floor(options.maxRetries ?? DEFAULT_MAX_RETRIES));
  const retryOn = options.retryOn ?? retryAll;
  const sleep = options.sleep ?? defaultSleep;
  const logger = options.logger ?? noopLogger;
  const label = options.operation ?? 'operation';
  const { signal } = options;

  for (let attempt = 0; ; attempt += 1) {
    signal?.throwIfAborted();
    try {
      logger.debug(`[retry] ${label} attempt ${attempt + 1}/${maxRetries}`);
      return await operation();
    } catch (error) {
      if (signal?.aborted || !retryOn(error)) {
        throw error;
      }

      if (attempt >= maxRetries - 1) {
        logger.error(`[retry] ${label} failed after ${maxRetries} attempts: ${errorMessage(error)}`);
        throw error;
      }

      const delayMs = retryDelay(error, attempt, options);
      logger.warn(
        `[retry] ${label} attempt ${attempt + 1} failed: ${errorMessage(error)}. Retrying in ${delayMs}ms`,
        { attempt: attempt + 1, delayMs },
      );
      await sleep(delayMs, signal);
    }
  }
}

/** Operation-in, operation-out form of {@link retryWithBackoff}. */
export function withRetry<T>(
  operation: () => Promise<T>,
  options: RetryOptions = {},
): () => Promise<T> {
  return () => retryWithBackoff(operation, options);
}
