/**
 * @libs/resilience
 *
 * Failure handling shared by the market data libraries:
 *
 * - **Errors**: the market data error taxonomy (`connection`, `rate_limit`,
 *   `invalid_input`, `timeout`, `validation`, `data`)
 * - **Classification**: maps raw provider failures onto that taxonomy
 * - **Retry**: bounded exponential backoff without jitter
 * - **Timeout**: per-attempt deadline
 *
 * Wrappers compose in a fixed order, innermost first:
 *
 * ```typescript
 * const call = withRetry(
 *   withErrorClassification(withTimeout(fetchTicker, 10_000), { provider: 'binance', symbol }),
 *   { retryOn: retryOnKinds('connection', 'timeout') },
 * );
 * ```
 */

export * from './types';
export { systemClock, sleep, ManualClock } from './clock';
export {
  MarketDataError,
  ProviderConnectionError,
  RateLimitError,
  InvalidInputError,
  TimeoutError,
  ValidationError,
  DataError,
  isMarketDataError,
  errorMessage,
} from './errors';
export type { ClassifiedMarketDataError, ErrorSeverity, MarketDataErrorKind } from './errors';
export {
  DEFAULT_PROVIDER_TIMEOUT_MS,
  classifyProviderError,
  withErrorClassification,
} from './errorClassifier';
export type { ClassificationContext } from './errorClassifier';
export {
  DEFAULT_BACKOFF_FACTOR,
  DEFAULT_BASE_DELAY_MS,
  DEFAULT_MAX_DELAY_MS,
  DEFAULT_MAX_RETRIES,
  computeBackoffDelay,
  retryOnKinds,
  retryWithBackoff,
  withRetry,
} from './retry';
export type { BackoffPolicy, RetryOptions, RetryPredicate } from './retry';
export { withTimeout } from './timeout';
