export interface CacheStats {
  backend: string;
  size: number;
  hits: number;
  misses: number;
  /** Percentage of reads that hit; 0 before any read. */
  hitRate: number;
  totalRequests: number;
}

/**
 * Key-value store with per-entry TTL in seconds.
 *
 * Values come back as `unknown`; callers validate the shape they stored.
 */
export interface CacheBackend {
  readonly name: string;
  get(key: string): Promise<unknown>;
  set(key: string, value: unknown, ttlSeconds: number): Promise<void>;
  delete(key: string): Promise<void>;
  clear(): Promise<void>;
  getStats(): Promise<CacheStats>;
  /** Releases connections held by the backend. */
  close?(): Promise<void>;
}
