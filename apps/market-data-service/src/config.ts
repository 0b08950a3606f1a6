import { z } from 'zod';
import { ValidationError } from '@libs/resilience';
import type { RateLimitConfig } from '@libs/rate-limiter';
import { LOG_LEVELS, type LogLevel } from './logger';

/** Requests per second each exchange tolerates. */
export const DEFAULT_PROVIDER_RATES: Record<string, number> = {
  binance: 10,
  coinbase: 5,
  kraken: 15,
  kucoin: 10,
  huobi: 10,
  bitfinex: 10,
  okx: 10,
  bybit: 10,
};

const FALLBACK_RATE_PER_SECOND = 10;

const providerList = z
  .string()
  .transform((value) =>
    value
      .split(',')
      .map((provider) => provider.trim().toLowerCase())
      .filter((provider) => provider.length > 0),
  )
  .pipe(z.array(z.string()).min(1, 'must name at least one provider'));

const envSchema = z.object({
  MARKET_DATA_PROVIDERS: providerList.optional(),
  MARKET_DATA_DEFAULT_PROVIDER: z.string().toLowerCase().optional(),
  RATE_LIMIT_PER_SECOND: z.coerce.number().positive().optional(),
  RATE_LIMIT_BURST: z.coerce.number().int().positive().optional(),
  RATE_LIMIT_TIMEOUT_MS: z.coerce.number().int().nonnegative().default(30_000),
  PROVIDER_TIMEOUT_MS: z.coerce.number().int().positive().default(10_000),
  RETRY_MAX_ATTEMPTS: z.coerce.number().int().min(1).default(3),
  RETRY_BASE_DELAY_MS: z.coerce.number().nonnegative().default(1_000),
  RETRY_MAX_DELAY_MS: z.coerce.number().nonnegative().default(60_000),
  RETRY_BACKOFF_FACTOR: z.coerce.number().min(1).default(2),
  CACHE_BACKEND: z.enum(['memory', 'redis']).default('memory'),
  REDIS_URL: z.string().url().optional(),
  CACHE_NAMESPACE: z.string().min(1).default('market-data'),
  LOG_LEVEL: z.enum(LOG_LEVELS).default('info'),
});

type EnvKey = keyof typeof envSchema.shape;

export interface RetryConfig {
  maxRetries: number;
  baseDelayMs: number;
  maxDelayMs: number;
  backoffFactor: number;
}

export type CacheConfig =
  | { backend: 'memory'; namespace: string }
  | { backend: 'redis'; namespace: string; redisUrl: string };

export interface ServiceConfig {
  providers: string[];
  defaultProvider: string;
  rateLimits: Record<string, RateLimitConfig>;
  /** How long a request may wait for a rate limit token. */
  rateLimitTimeoutMs: number;
  /** Per-attempt bound on a provider call. */
  providerTimeoutMs: number;
  retry: RetryConfig;
  cache: CacheConfig;
  logLevel: LogLevel;
}

/**
 * Reads the service configuration from environment variables.
 * Empty values count as unset.
 */
export function loadServiceConfig(
  env: Record<string, string | undefined> = process.env,
): ServiceConfig {
  const raw: Partial<Record<EnvKey, string>> = {};
  for (const key of Object.keys(envSchema.shape)) {
    if (!isEnvKey(key)) {
      continue;
    }
    const value = env[key]?.trim();
    if (value) {
      raw[key] = value;
    }
  }

  const parsed = envSchema.safeParse(raw);
  if (!parsed.success) {
    const issue = parsed.error.issues[0];
    const field = String(issue?.path[0] ?? 'environment');
    throw new ValidationError(field, env[field], issue?.message ?? 'is invalid');
  }
  const values = parsed.data;

  const providers = values.MARKET_DATA_PROVIDERS ?? Object.keys(DEFAULT_PROVIDER_RATES);
  const defaultProvider =
    values.MARKET_DATA_DEFAULT_PROVIDER ?? (providers.includes('binance') ? 'binance' : providers[0]);
  if (defaultProvider === undefined || !providers.includes(defaultProvider)) {
    throw new ValidationError(
      'MARKET_DATA_DEFAULT_PROVIDER',
      defaultProvider,
      'must be one of the configured providers',
    );
  }

  const rateLimits: Record<string, RateLimitConfig> = {};
  for (const provider of providers) {
    const ratePerSecond =
      values.RATE_LIMIT_PER_SECOND ?? DEFAULT_PROVIDER_RATES[provider] ?? FALLBACK_RATE_PER_SECOND;
    rateLimits[provider] = {
      ratePerSecond,
      capacity: values.RATE_LIMIT_BURST ?? Math.max(1, Math.ceil(ratePerSecond)),
    };
  }

  let cache: CacheConfig;
  if (values.CACHE_BACKEND === 'redis') {
    if (!values.REDIS_URL) {
      throw new ValidationError('REDIS_URL', values.REDIS_URL, 'is required when CACHE_BACKEND is redis');
    }
    cache = { backend: 'redis', namespace: values.CACHE_NAMESPACE, redisUrl: values.REDIS_URL };
  } else {
    cache = { backend: 'memory', namespace: values.CACHE_NAMESPACE };
  }

  return {
    providers,
    defaultProvider,
    rateLimits,
    rateLimitTimeoutMs: values.RATE_LIMIT_TIMEOUT_MS,
    providerTimeoutMs: values.PROVIDER_TIMEOUT_MS,
    retry: {
      maxRetries: values.RETRY_MAX_ATTEMPTS,
      baseDelayMs: values.RETRY_BASE_DELAY_MS,
      maxDelayMs: values.RETRY_MAX_DELAY_MS,
      backoffFactor: values.RETRY_BACKOFF_FACTOR,
    },
    cache,
    logLevel: values.LOG_LEVEL,
  };
}

function isEnvKey(key: string): key is EnvKey {
  return key in envSchema.shape;
}
