import type { Clock, Sleeper } from './types';

export const systemClock: Clock = () => Date.now();

export const sleep: Sleeper = (ms, signal) =>
  new Promise<void>((resolve, reject) => {
    if (signal?.aborted) {
      reject(signal.reason);
      return;
    }

    const onAbort = () => {
      clearTimeout(timer);
      reject(signal?.reason);
    };

    const timer = setTimeout(() => {
      signal?.removeEventListener('abort', onAbort);
      resolve();
    }, ms);

    signal?.addEventListener('abort', onAbort, { once: true });
  });

/**
 * Deterministic clock for tests and simulations.
 *
 * `sleep` advances the clock by the requested delay instead of waiting, so
 * polling loops and backoff sequences run instantly while still observing the
 * passage of time they asked for. Every call is recorded in `sleeps`.
 */
export class ManualClock {
  private current: number;
  readonly sleeps: number[] = [];

  constructor(start = 0) {
    this.current = start;
  }

  readonly now: Clock = () => this.current;

  readonly sleep: Sleeper = async (ms, signal) => {
    signal?.throwIfAborted();
    this.sleeps.push(ms);
    this.current += ms;
    await Promise.resolve();
    signal?.throwIfAborted();
  };

  advance(ms: number): void {
    this.current += ms;
  }

  get totalSlept(): number {
    return this.sleeps.reduce((sum, ms) => sum + ms, 0);
  }
}
