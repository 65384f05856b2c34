interface CacheEntry<T> {
  value: T;
  expiresAt: number;
  hits: number;
}

interface CacheStats {
  size: number;
  validEntries: number;
  totalHits: number;
  avgHits: number;
}

/**
 * Map with per-entry expiry. Expired entries read as absent; they are dropped
 * on access and swept on every write.
 */
export class CacheManager<T> {
  private cache: Map<string, CacheEntry<T>> = new Map();

  constructor(
    private readonly defaultTTL: number = 300000, // 5 minutes
    private readonly clock: () => number = Date.now
  ) {}

  set(key: string, value: T, ttl?: number): void {
    this.cleanup();
    this.cache.set(key, {
      value,
      expiresAt: this.clock() + (ttl ?? this.defaultTTL),
      hits: 0,
    });
  }

  get(key: string): T | null {
    const entry = this.cache.get(key);
    if (!entry) return null;

    if (this.clock() > entry.expiresAt) {
      this.cache.delete(key);
      return null;
    }

    entry.hits++;
    return entry.value;
  }

  getStats(): CacheStats {
    let totalHits = 0;
    let validEntries = 0;
    const now = this.clock();

    this.cache.forEach(entry => {
      if (now <= entry.expiresAt) {
        validEntries++;
        totalHits += entry.hits;
      }
    });

    return {
      size: this.cache.size,
      validEntries,
      totalHits,
      avgHits: validEntries > 0 ? totalHits / validEntries : 0,
    };
  }

  cleanup(): number {
    const now = this.clock();
    let removed = 0;
    for (const [key, entry] of this.cache) {
      if (now > entry.expiresAt) {
        this.cache.delete(key);
        removed++;
      }
    }
    return removed;
  }
}
