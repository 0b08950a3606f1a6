/** A cached value with its creation time (epoch ms) and TTL (seconds). */
export class ExpiringEntry<T> {
  constructor(
    readonly value: T,
    readonly createdAt: number,
    readonly ttlSeconds: number,
  ) {}

  isExpired(now: number): boolean {
    return (now - this.createdAt) / 1000 > this.ttlSeconds;
  }

  /** Whole seconds left before expiry, never negative. */
  remainingTtl(now: number): number {
    return Math.max(0, Math.floor(this.ttlSeconds - (now - this.createdAt) / 1000));
  }
}
