import { z } from 'zod';
import { ValidationError } from '@libs/resilience';

export const TIMEFRAMES = ['1m', '5m', '15m', '30m', '1h', '4h', '1d', '1w'] as const;
export type Timeframe = (typeof TIMEFRAMES)[number];

export const symbolSchema = z
  .string()
  .trim()
  .regex(/^[A-Za-z0-9]+\/[A-Za-z0-9]+$/, 'must be a trading pair such as BTC/USDT');

export const timeframeSchema = z.enum(TIMEFRAMES);

export const limitSchema = (max: number) =>
  z.number().int('must be an integer').min(1, 'must be at least 1').max(max, `must be at most ${max}`);

/** Parses `value` or throws a {@link ValidationError} naming `field`. */
export function validate<T>(field: string, schema: z.ZodType<T>, value: unknown): T {
  const parsed = schema.safeParse(value);
  if (!parsed.success) {
    throw new ValidationError(field, value, parsed.error.issues[0]?.message ?? 'is invalid');
  }
  return parsed.data;
}

export interface ProviderSettings {
  providers: readonly string[];
  defaultProvider: string;
}

export function resolveProvider(settings: ProviderSettings, provider: string | undefined): string {
  const resolved = (provider ?? settings.defaultProvider).trim().toLowerCase();
  if (!settings.providers.includes(resolved)) {
    throw new ValidationError(
      'provider',
      provider,
      `unsupported provider; expected one of ${settings.providers.join(', ')}`,
    );
  }
  return resolved;
}
