import {
  InvalidInputError,
  ProviderConnectionError,
  RateLimitError,
  TimeoutError,
  errorMessage,
  isMarketDataError,
  type ClassifiedMarketDataError,
} from './errors';

export const DEFAULT_PROVIDER_TIMEOUT_MS = 10_000;

export interface ClassificationContext {
  provider: string;
  /** Trading pair of the failing call; reported on invalid-pair errors. */
  symbol?: string;
  /** Configured operation timeout, reported on timeout errors. */
  timeoutMs?: number;
}

const TIMEOUT_NAMES = new Set(['TimeoutError', 'RequestTimeout']);
const TIMEOUT_CODES = new Set(['ETIMEDOUT', 'ESOCKETTIMEDOUT', 'UND_ERR_CONNECT_TIMEOUT']);

const CONNECTION_NAMES = new Set(['NetworkError', 'ExchangeNotAvailable', 'FetchError', 'ConnectionError']);
const CONNECTION_CODES = new Set([
  'ECONNREFUSED',
  'ECONNRESET',
  'ENOTFOUND',
  'EAI_AGAIN',
  'EHOSTUNREACH',
  'ENETUNREACH',
  'EPIPE',
  'UND_ERR_SOCKET',
]);

/**
 * Maps an arbitrary provider failure onto the market data error taxonomy.
 *
 * Structural checks (error name, system error code, HTTP status) run before the
 * message heuristics. The substring checks for "rate", "429", "invalid" and
 * "not found" are a best-effort fallback for clients that only report failures
 * as text; they are not authoritative and can misfire on unrelated wording.
 */
export function classifyProviderError(
  error: unknown,
  context: ClassificationContext,
): ClassifiedMarketDataError {
  if (isMarketDataError(error)) {
    return error;
  }

  const { provider } = context;
  const message = errorMessage(error);

  if (isTimeoutFailure(error)) {
    return new TimeoutError(
      `Request to ${provider} timed out`,
      context.timeoutMs ?? DEFAULT_PROVIDER_TIMEOUT_MS,
      { cause: error },
    );
  }

  if (isConnectionFailure(error)) {
    return new ProviderConnectionError(`Failed to connect to ${provider}: ${message}`, {
      provider,
      cause: error,
    });
  }

  if (extractStatus(error) === 429) {
    return new RateLimitError(`Rate limited on ${provider}: ${message}`, {
      provider,
      retryAfterMs: extractRetryAfterMs(error),
      cause: error,
    });
  }

  const lowered = message.toLowerCase();
  if (lowered.includes('rate') || message.includes('429')) {
    return new RateLimitError(`Rate limited on ${provider}: ${message}`, {
      provider,
      retryAfterMs: extractRetryAfterMs(error),
      cause: error,
    });
  }

  if (lowered.includes('invalid') || lowered.includes('not found')) {
    return new InvalidInputError(context.symbol ?? 'unknown', { provider, cause: error });
  }

  return new ProviderConnectionError(`Error from ${provider}: ${message}`, {
    provider,
    cause: error,
  });
}

/** Wraps an operation so that any failure it raises is classified. */
export function withErrorClassification<T>(
  operation: () => Promise<T>,
  context: ClassificationContext,
): () => Promise<T> {
  return async () => {
    try {
      return await operation();
    } catch (error) {
      throw classifyProviderError(error, context);
    }
  };
}

function isTimeoutFailure(error: unknown): boolean {
  if (!(error instanceof Error)) {
    return false;
  }
  return TIMEOUT_NAMES.has(error.name) || TIMEOUT_CODES.has(extractCode(error) ?? '');
}

function isConnectionFailure(error: unknown): boolean {
  if (!(error instanceof Error)) {
    return false;
  }
  if (CONNECTION_NAMES.has(error.name) || CONNECTION_CODES.has(extractCode(error) ?? '')) {
    return true;
  }
  // undici reports socket-level failures as `TypeError: fetch failed` with the
  // system error attached as the cause.
  if (error instanceof TypeError && error.message === 'fetch failed') {
    return true;
  }
  return false;
}

function extractCode(error: unknown): string | undefined {
  if (typeof error === 'object' && error !== null && 'code' in error && typeof error.code === 'string') {
    return error.code;
  }
  if (error instanceof Error && error.cause !== undefined && error.cause !== error) {
    return extractCode(error.cause);
  }
  return undefined;
}

function extractStatus(error: unknown): number | undefined {
  if (typeof error !== 'object' || error === null) {
    return undefined;
  }
  if ('status' in error && typeof error.status === 'number') {
    return error.status;
  }
  if ('statusCode' in error && typeof error.statusCode === 'number') {
    return error.statusCode;
  }
  return undefined;
}

function extractRetryAfterMs(error: unknown): number | undefined {
  if (
    typeof error === 'object' &&
    error !== null &&
    'retryAfterMs' in error &&
    typeof error.retryAfterMs === 'number'
  ) {
    return error.retryAfterMs;
  }
  return undefined;
}
