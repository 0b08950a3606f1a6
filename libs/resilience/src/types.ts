export type LoggerMeta = Record<string, unknown>;

export interface Logger {
  debug(message: string, meta?: LoggerMeta): void;
  info(message: string, meta?: LoggerMeta): void;
  warn(message: string, meta?: LoggerMeta): void;
  error(message: string, meta?: LoggerMeta): void;
}

export const noopLogger: Logger = {
  debug: () => {
    /* no-op */
  },
  info: () => {
    /* no-op */
  },
  warn: () => {
    /* no-op */
  },
  error: () => {
    /* no-op */
  },
};

/** Wall-clock source in epoch milliseconds. */
export type Clock = () => number;

/**
 * Suspends for `ms` milliseconds. Rejects with the signal's reason when the
 * signal aborts before the delay elapses.
 */
export type Sleeper = (ms: number, signal?: AbortSignal) => Promise<void>;
