/**
 * MARKET CACHE
 *
 * TTL cache for externally fetched market data.
 * Failed fetches are never stored.
 */

interface CacheEntry<T> {
  data: T;
  timestamp: number;
  ttl: number;
}

export class TtlCache<T> {
  private cache = new Map<string, CacheEntry<T>>();

  constructor(private readonly clock: () => number = Date.now) {}

  get(key: string): T | null {
    const entry = this.cache.get(key);
    if (!entry) return null;

    if (this.clock() - entry.timestamp > entry.ttl) {
      this.cache.delete(key);
      return null;
    }

    return entry.data;
  }

  set(key: string, data: T, ttlMs: number): void {
    this.cache.set(key, {
      data,
      timestamp: this.clock(),
      ttl: ttlMs,
    });
  }

  invalidate(pattern?: string): number {
    if (!pattern) {
      const count = this.cache.size;
      this.cache.clear();
      return count;
    }

    let count = 0;
    for (const key of this.cache.keys()) {
      if (key.includes(pattern)) {
        this.cache.delete(key);
        count++;
      }
    }
    return count;
  }

  stats(): CacheStats {
    return {
      entries: this.cache.size,
      keys: Array.from(this.cache.keys()),
    };
  }
}

export interface CacheStats {
  entries: number;
  keys: string[];
}

export function mergeCacheStats(parts: ReadonlyArray<CacheStats>): CacheStats {
  return {
    entries: parts.reduce((acc, part) => acc + part.entries, 0),
    keys: parts.flatMap(part => part.keys),
  };
}

export function buildCacheKey(kind: string, ...parts: string[]): string {
  return [kind, ...parts].join(':');
}
