import { describe, expect, it } from 'vitest';
import {
  DataError,
  InvalidInputError,
  ProviderConnectionError,
  RateLimitError,
  TimeoutError,
  ValidationError,
  errorMessage,
  isMarketDataError,
} from '../errors';

describe('market data errors', () => {
  it('formats each kind with its prefix and severity', () => {
    const cases = [
      [new ProviderConnectionError('reset'), 'connection', 'medium', 'Provider connection error [unknown]: reset'],
      [new RateLimitError('slow down'), 'rate_limit', 'high', 'Rate limit exceeded: slow down'],
      [new InvalidInputError('XYZ/ABC'), 'invalid_input', 'medium', "Invalid trading pair 'XYZ/ABC' on provider"],
      [new TimeoutError('fetch', 500), 'timeout', 'high', 'Request timeout after 500ms: fetch'],
      [new ValidationError('symbol', '', 'required'), 'validation', 'low', "Validation error in 'symbol':  - required"],
      [new DataError('empty candles'), 'data', 'medium', 'Data processing error: empty candles'],
    ] as const;

    for (const [error, kind, severity, message] of cases) {
      expect(error.kind).toBe(kind);
      expect(error.severity).toBe(severity);
      expect(error.message).toBe(message);
      expect(isMarketDataError(error)).toBe(true);
    }
  });

  it('serialises non-string validation values as JSON', () => {
    expect(new ValidationError('limit', 0, 'must be positive').message).toBe(
      "Validation error in 'limit': 0 - must be positive",
    );
    expect(new ValidationError('providers', ['a'], 'unknown').message).toBe(
      `Validation error in 'providers': ["a"] - unknown`,
    );
  });

  it('sets the class name for stack traces', () => {
    expect(new RateLimitError('x').name).toBe('RateLimitError');
    expect(new TimeoutError('x', 1)).toBeInstanceOf(Error);
  });

  it('does not recognise plain errors', () => {
    expect(isMarketDataError(new Error('boom'))).toBe(false);
    expect(errorMessage(new Error('boom'))).toBe('boom');
    expect(errorMessage(404)).toBe('404');
  });
});
