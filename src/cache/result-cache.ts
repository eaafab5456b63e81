/**
 * Bounded result cache.
 *
 * Entries carry a logical last-touch tick instead of a timestamp, so
 * ordering is exact even when many lookups land in the same millisecond.
 * When the cache is full the oldest fifth of the entries is evicted in one
 * pass, keeping the cost of an insert amortized constant.
 *
 * An entry may record the names it was derived from; invalidateDependents()
 * drops every entry that depends on a changed name.
 */

export interface CacheStats {
  name: string;
  size: number;
  capacity: number;
  hits: number;
  misses: number;
  evictions: number;
  hitRate: number;
}

interface CacheEntry<T> {
  value: T;
  touched: number;
  dependencies?: ReadonlySet<string>;
}

/** Share of entries dropped when the cache overflows */
const EVICTION_RATIO = 0.2;

export class ResultCache<T> {
  private entries: Map<string, CacheEntry<T>> = new Map();
  private tick = 0;
  private hits = 0;
  private misses = 0;
  private evictions = 0;
  private readonly capacity: number;
  readonly name: string;

  constructor(capacity: number, name = 'cache') {
    this.capacity = Math.max(1, capacity);
    this.name = name;
  }

  get(key: string): T | undefined {
    const entry = this.entries.get(key);
    if (!entry) {
      this.misses++;
      return undefined;
    }
    this.hits++;
    entry.touched = ++this.tick;
    return entry.value;
  }

  has(key: string): boolean {
    return this.entries.has(key);
  }

  set(key: string, value: T, dependencies?: Iterable<string>): void {
    if (!this.entries.has(key) && this.entries.size >= this.capacity) {
      this.evictOldest();
    }
    this.entries.set(key, {
      value,
      touched: ++this.tick,
      dependencies: dependencies ? new Set(dependencies) : undefined,
    });
  }

  delete(key: string): boolean {
    return this.entries.delete(key);
  }

  /** Drop the entry stored under `name` and every entry depending on it */
  invalidateDependents(name: string): number {
    let removed = 0;
    for (const [key, entry] of this.entries) {
      if (key === name || entry.dependencies?.has(name)) {
        this.entries.delete(key);
        removed++;
      }
    }
    return removed;
  }

  clear(): void {
    this.entries.clear();
  }

  get size(): number {
    return this.entries.size;
  }

  stats(): CacheStats {
    const lookups = this.hits + this.misses;
    return {
      name: this.name,
      size: this.entries.size,
      capacity: this.capacity,
      hits: this.hits,
      misses: this.misses,
      evictions: this.evictions,
      hitRate: lookups === 0 ? 0 : this.hits / lookups,
    };
  }

  private evictOldest(): void {
    const count = Math.max(1, Math.floor(this.capacity * EVICTION_RATIO));
    const oldest = Array.from(this.entries.entries())
      .sort((a, b) => a[1].touched - b[1].touched)
      .slice(0, count);
    for (const [key] of oldest) {
      this.entries.delete(key);
    }
    this.evictions += oldest.length;
  }
}
