export interface TtlCacheOptions<K, V> {
  maxSize: number;
  ttlMs: number;
  /**
   * Move an entry to the most-recent end on read (LRU). When false, eviction
   * order is insertion age.
   */
  touchOnGet?: boolean;
  now?: () => number;
  onEvict?: (key: K, value: V) => void;
}

export interface CacheStats {
  size: number;
  maxSize: number;
  hits: number;
  misses: number;
  evictions: number;
  expirations: number;
  hitRate: number;
}

interface CacheEntry<V> {
  value: V;
  insertedAt: number;
}

/**
 * Bounded map with per-entry TTL. Iteration order of the backing `Map` is the
 * eviction order: the first key is always the next one evicted.
 */
export class TtlCache<K, V> {
  readonly maxSize: number;
  readonly ttlMs: number;
  #entries = new Map<K, CacheEntry<V>>();
  #touchOnGet: boolean;
  #now: () => number;
  #onEvict?: (key: K, value: V) => void;
  #hits = 0;
  #misses = 0;
  #evictions = 0;
  #expirations = 0;

  constructor(options: TtlCacheOptions<K, V>) {
    this.maxSize = Math.max(1, options.maxSize);
    this.ttlMs = options.ttlMs;
    this.#touchOnGet = options.touchOnGet ?? true;
    this.#now = options.now ?? Date.now;
    this.#onEvict = options.onEvict;
  }

  get size(): number {
    return this.#entries.size;
  }

  get(key: K): V | undefined {
    const entry = this.#entries.get(key);
    if (!entry) {
      this.#misses += 1;
      return undefined;
    }

    if (this.#isExpired(entry)) {
      this.#entries.delete(key);
      this.#expirations += 1;
      this.#misses += 1;
      this.#onEvict?.(key, entry.value);
      return undefined;
    }

    if (this.#touchOnGet) {
      this.#entries.delete(key);
      this.#entries.set(key, entry);
    }
    this.#hits += 1;
    return entry.value;
  }

  /**
   * Reads without touching recency or statistics.
   */
  peek(key: K): V | undefined {
    const entry = this.#entries.get(key);
    if (!entry || this.#isExpired(entry)) {
      return undefined;
    }
    return entry.value;
  }

  set(key: K, value: V): void {
    if (this.#entries.has(key)) {
      this.#entries.delete(key);
    }

    while (this.#entries.size >= this.maxSize) {
      const oldest = this.#entries.keys().next();
      if (oldest.done) {
        break;
      }
      const evicted = this.#entries.get(oldest.value);
      this.#entries.delete(oldest.value);
      this.#evictions += 1;
      if (evicted) {
        this.#onEvict?.(oldest.value, evicted.value);
      }
    }

    this.#entries.set(key, { value, insertedAt: this.#now() });
  }

  delete(key: K): boolean {
    return this.#entries.delete(key);
  }

  clear(): void {
    this.#entries.clear();
  }

  /**
   * Drops every expired entry and returns how many were removed.
   */
  prune(): number {
    let removed = 0;
    for (const [key, entry] of this.#entries) {
      if (this.#isExpired(entry)) {
        this.#entries.delete(key);
        this.#expirations += 1;
        this.#onEvict?.(key, entry.value);
        removed += 1;
      }
    }
    return removed;
  }

  values(): V[] {
    const fresh: V[] = [];
    for (const entry of this.#entries.values()) {
      if (!this.#isExpired(entry)) {
        fresh.push(entry.value);
      }
    }
    return fresh;
  }

  stats(): CacheStats {
    const lookups = this.#hits + this.#misses;
    return {
      size: this.#entries.size,
      maxSize: this.maxSize,
      hits: this.#hits,
      misses: this.#misses,
      evictions: this.#evictions,
      expirations: this.#expirations,
      hitRate: lookups === 0 ? 0 : this.#hits / lookups,
    };
  }

  #isExpired(entry: CacheEntry<V>): boolean {
    return this.#now() - entry.insertedAt >= this.ttlMs;
  }
}
