export interface CacheEntry<T> {
  value: T;
  expiresAt: number;
}

export class DashboardCache<T> {
  private readonly store = new Map<string, CacheEntry<T>>();
  private readonly now: () => number;
  // Bumped on every invalidation so a compute that started earlier does not store its result.
  private generation = 0;

  constructor(opts?: { now?: () => number }) {
    this.now = opts?.now ?? Date.now;
  }

  getCachedMetrics(cacheKey: string): T | null {
    const entry = this.store.get(cacheKey);
    if (!entry) return null;

    if (this.now() > entry.expiresAt) {
      this.store.delete(cacheKey);
      return null;
    }

    return entry.value;
  }

  setCachedMetrics(cacheKey: string, metrics: T, ttlMs: number): void {
    this.store.set(cacheKey, { value: metrics, expiresAt: this.now() + Math.max(0, ttlMs) });
  }

  /** Cached value for `cacheKey`, else the result of `compute`, stored for `ttlMs`. */
  async getOrCompute(cacheKey: string, ttlMs: number, compute: () => Promise<T>): Promise<{ value: T; cached: boolean }> {
    const cached = this.getCachedMetrics(cacheKey);
    if (cached !== null) return { value: cached, cached: true };

    const startedAt = this.generation;
    const value = await compute();
    if (this.generation === startedAt) {
      this.setCachedMetrics(cacheKey, value, ttlMs);
    }
    return { value, cached: false };
  }

  invalidateCache(pattern: string): void {
    this.generation += 1;
    for (const key of this.store.keys()) {
      if (key.includes(pattern)) {
        this.store.delete(key);
      }
    }
  }

  clearAllCache(): void {
    this.generation += 1;
    this.store.clear();
  }
}
