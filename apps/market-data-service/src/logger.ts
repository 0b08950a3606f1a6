import type { Logger, LoggerMeta } from '@libs/resilience';

export const LOG_LEVELS = ['debug', 'info', 'warn', 'error', 'silent'] as const;
export type LogLevel = (typeof LOG_LEVELS)[number];

const LEVEL_WEIGHT: Record<LogLevel, number> = {
  debug: 10,
  info: 20,
  warn: 30,
  error: 40,
  silent: 100,
};

/**
 * Logs to the console at or above `level`, prefixing each line with `[component]`.
 */
export class ConsoleLogger implements Logger {
  constructor(
    private readonly component: string,
    private readonly level: LogLevel = 'info',
  ) {}

  child(component: string): ConsoleLogger {
    return new ConsoleLogger(component, this.level);
  }

  debug(message: string, meta?: LoggerMeta): void {
    if (this.enabled('debug')) {
      console.debug(this.format(message), ...this.extra(meta));
    }
  }

  info(message: string, meta?: LoggerMeta): void {
    if (this.enabled('info')) {
      console.info(this.format(message), ...this.extra(meta));
    }
  }

  warn(message: string, meta?: LoggerMeta): void {
    if (this.enabled('warn')) {
      console.warn(this.format(message), ...this.extra(meta));
    }
  }

  error(message: string, meta?: LoggerMeta): void {
    if (this.enabled('error')) {
      console.error(this.format(message), ...this.extra(meta));
    }
  }

  private enabled(level: LogLevel): boolean {
    return LEVEL_WEIGHT[level] >= LEVEL_WEIGHT[this.level];
  }

  private format(message: string): string {
    return `[${this.component}] ${message}`;
  }

  private extra(meta: LoggerMeta | undefined): LoggerMeta[] {
    return meta === undefined ? [] : [meta];
  }
}
