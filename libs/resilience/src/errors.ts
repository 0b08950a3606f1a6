/**
 * Market data error taxonomy.
 *
 * Provider failures are re-raised as exactly one of these kinds so callers can
 * branch on `kind` without knowing what the underlying exchange client throws.
 * Severity only weights logging and alerting; it never drives control flow.
 */

export type ErrorSeverity = 'low' | 'medium' | 'high' | 'critical';

export type MarketDataErrorKind =
  | 'connection'
  | 'rate_limit'
  | 'invalid_input'
  | 'timeout'
  | 'validation'
  | 'data';

interface MarketDataErrorOptions {
  severity?: ErrorSeverity;
  cause?: unknown;
}

export abstract class MarketDataError extends Error {
  abstract readonly kind: MarketDataErrorKind;
  readonly severity: ErrorSeverity;

  protected constructor(message: string, options: MarketDataErrorOptions = {}) {
    super(message, options.cause === undefined ? undefined : { cause: options.cause });
    this.severity = options.severity ?? 'medium';
  }
}

export class ProviderConnectionError extends MarketDataError {
  readonly kind = 'connection' as const;
  readonly provider?: string;

  constructor(message: string, options: { provider?: string; cause?: unknown } = {}) {
    super(`Provider connection error [${options.provider ?? 'unknown'}]: ${message}`, {
      cause: options.cause,
    });
    this.name = 'ProviderConnectionError';
    this.provider = options.provider;
  }
}

export class RateLimitError extends MarketDataError {
  readonly kind = 'rate_limit' as const;
  readonly provider?: string;
  readonly retryAfterMs?: number;

  constructor(
    message: string,
    options: { provider?: string; retryAfterMs?: number; cause?: unknown } = {},
  ) {
    super(`Rate limit exceeded: ${message}`, { severity: 'high', cause: options.cause });
    this.name = 'RateLimitError';
    this.provider = options.provider;
    this.retryAfterMs = options.retryAfterMs;
  }
}

export class InvalidInputError extends MarketDataError {
  readonly kind = 'invalid_input' as const;
  readonly pair: string;
  readonly provider?: string;

  constructor(pair: string, options: { provider?: string; cause?: unknown } = {}) {
    super(`Invalid trading pair '${pair}' on ${options.provider ?? 'provider'}`, {
      cause: options.cause,
    });
    this.name = 'InvalidInputError';
    this.pair = pair;
    this.provider = options.provider;
  }
}

export class TimeoutError extends MarketDataError {
  readonly kind = 'timeout' as const;
  readonly timeoutMs: number;

  constructor(message: string, timeoutMs: number, options: { cause?: unknown } = {}) {
    super(`Request timeout after ${timeoutMs}ms: ${message}`, {
      severity: 'high',
      cause: options.cause,
    });
    this.name = 'TimeoutError';
    this.timeoutMs = timeoutMs;
  }
}

export class ValidationError extends MarketDataError {
  readonly kind = 'validation' as const;
  readonly field: string;
  readonly value: unknown;

  constructor(field: string, value: unknown, reason: string) {
    super(`Validation error in '${field}': ${formatValue(value)} - ${reason}`, { severity: 'low' });
    this.name = 'ValidationError';
    this.field = field;
    this.value = value;
  }
}

export class DataError extends MarketDataError {
  readonly kind = 'data' as const;
  readonly data?: unknown;

  constructor(message: string, options: { data?: unknown; cause?: unknown } = {}) {
    super(`Data processing error: ${message}`, { cause: options.cause });
    this.name = 'DataError';
    this.data = options.data;
  }
}

export type ClassifiedMarketDataError =
  | ProviderConnectionError
  | RateLimitError
  | InvalidInputError
  | TimeoutError
  | ValidationError
  | DataError;

export function isMarketDataError(error: unknown): error is ClassifiedMarketDataError {
  return error instanceof MarketDataError;
}

export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}

function formatValue(value: unknown): string {
  if (typeof value === 'string') {
    return value;
  }
  try {
    return JSON.stringify(value) ?? String(value);
  } catch {
    return String(value);
  }
}
