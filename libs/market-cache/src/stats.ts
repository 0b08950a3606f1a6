import type { CacheStats } from './types';

export class HitCounter {
  hits = 0;
  misses = 0;

  hit(): void {
    this.hits += 1;
  }

  miss(): void {
    this.misses += 1;
  }

  snapshot(backend: string, size: number): CacheStats {
    const totalRequests = this.hits + this.misses;
    return {
      backend,
      size,
      hits: this.hits,
      misses: this.misses,
      hitRate: totalRequests > 0 ? Math.round((this.hits / totalRequests) * 10_000) / 100 : 0,
      totalRequests,
    };
  }
}
