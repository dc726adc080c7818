/**
 * cache.ts
 *
 * In-memory TTL cache for identity lookups and lyrics pages.
 */

interface CacheEntry<T> {
  value: T;
  storedAt: number;
}

const DEFAULT_TTL_MS = 60 * 60 * 1000;

export class TtlCache<T> {
  private readonly entries = new Map<string, CacheEntry<T>>();

  constructor(
    private readonly ttlMs: number = DEFAULT_TTL_MS,
    private readonly now: () => number = Date.now,
  ) {}

  get(key: string): T | undefined {
    const entry = this.entries.get(key);
    if (!entry) return undefined;

    if (this.now() - entry.storedAt <= this.ttlMs) {
      return entry.value;
    }

    // Expired
    this.entries.delete(key);
    return undefined;
  }

  set(key: string, value: T): void {
    this.entries.set(key, { value, storedAt: this.now() });
  }

  /**
   * Tests call this between cases; the caches below are module-scoped.
   */
  clear(): void {
    this.entries.clear();
  }

  get size(): number {
    return this.entries.size;
  }
}

export function cacheKey(...parts: string[]): string {
  return parts.map((p) => p.trim().toLowerCase()).join("::");
}
