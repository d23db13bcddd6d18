/**
 * TTLCache — in-memory cache with time-to-live expiry
 *
 * getOrLoad() shares one in-flight load between concurrent callers, so a cold
 * cache never fans out into duplicate remote calls.
 */

interface CacheEntry<V> {
  value: V;
  expiresAt: number;
}

export class TTLCache<K, V> {
  private readonly store = new Map<K, CacheEntry<V>>();
  private readonly pending = new Map<K, Promise<V>>();
  private readonly defaultTtlMs: number;
  private readonly now: () => number;

  constructor(defaultTtlMs: number, now: () => number = Date.now) {
    this.defaultTtlMs = defaultTtlMs;
    this.now = now;
  }

  /**
   * Return the cached value, or run `loader` once and cache what it resolves.
   * A rejected load is not cached.
   */
  async getOrLoad(key: K, loader: () => Promise<V>, ttlMs = this.defaultTtlMs): Promise<V> {
    const cached = this.get(key);
    if (cached !== undefined) return cached;

    const inFlight = this.pending.get(key);
    if (inFlight) return inFlight;

    const load = loader()
      .then((value) => {
        this.set(key, value, ttlMs);
        return value;
      })
      .finally(() => {
        this.pending.delete(key);
      });

    this.pending.set(key, load);
    return load;
  }

  private get(key: K): V | undefined {
    const entry = this.store.get(key);
    if (!entry) return undefined;
    if (this.now() > entry.expiresAt) {
      this.store.delete(key);
      return undefined;
    }
    return entry.value;
  }

  private set(key: K, value: V, ttlMs: number): void {
    this.store.set(key, { value, expiresAt: this.now() + ttlMs });
  }
}
