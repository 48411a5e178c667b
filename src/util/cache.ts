export interface CacheEntry<V> {
  value: V;
  expiresAt: number;
}

export interface CacheOptions {
  ttlMs?: number;
  maxEntries?: number;
  now?: () => number;
}

/**
 * In-memory TTL cache with oldest-first eviction.
 * Used for short-lived price request caching.
 */
export class TTLCache<K, V> {
  private readonly ttlMs: number;
  private readonly maxEntries: number;
  private readonly now: () => number;
  private readonly map = new Map<K, CacheEntry<V>>();

  constructor(options: CacheOptions = {}) {
    this.ttlMs = options.ttlMs ?? 30_000;
    this.maxEntries = options.maxEntries ?? 50;
    this.now = options.now ?? Date.now;
  }

  get(key: K): V | undefined {
    const entry = this.map.get(key);
    if (!entry) {
      return undefined;
    }

    if (entry.expiresAt < this.now()) {
      this.map.delete(key);
      return undefined;
    }

    return entry.value;
  }

  set(key: K, value: V, ttlOverride?: number): void {
    const ttl = ttlOverride ?? this.ttlMs;
    if (ttl > 0) {
      this.map.set(key, { value, expiresAt: this.now() + ttl });
      this.enforceSizeLimit();
    }
  }

  delete(key: K): void {
    this.map.delete(key);
  }

  clear(): void {
    this.map.clear();
  }

  get size(): number {
    return this.map.size;
  }

  private enforceSizeLimit(): void {
    if (this.map.size <= this.maxEntries) {
      return;
    }

    const now = this.now();
    for (const [key, entry] of this.map.entries()) {
      if (entry.expiresAt < now) {
        this.map.delete(key);
      }
    }

    const keys = this.map.keys();
    while (this.map.size > this.maxEntries) {
      const oldestKey = keys.next();
      if (oldestKey.done) {
        break;
      }
      this.map.delete(oldestKey.value);
    }
  }
}
