type CacheEntry<T> = {
  value: T;
  expiresAt: number;
};

export class TtlCache<T> {
  private cache = new Map<string, CacheEntry<T>>();
  private readonly ttlMs: number;
  private readonly now: () => number;

  constructor(ttlMs: number, now: () => number = Date.now) {
    this.ttlMs = ttlMs;
    this.now = now;
  }

  get = (key: string): T | null => {
    const entry = this.cache.get(key);
    if (!entry) return null;
    if (this.now() > entry.expiresAt) {
      this.cache.delete(key);
      return null;
    }
    return entry.value;
  };

  set = (key: string, value: T): void => {
    this.cache.set(key, {
      value,
      expiresAt: this.now() + this.ttlMs,
    });
  };

  /** Returns the cached value or loads, stores and returns a fresh one. Failed loads are not cached. */
  getOrLoad = async (key: string, load: () => Promise<T>): Promise<T> => {
    const cached = this.get(key);
    if (cached !== null) return cached;
    const value = await load();
    this.set(key, value);
    return value;
  };

  delete = (key: string): void => {
    this.cache.delete(key);
  };

  clear = (): void => {
    this.cache.clear();
  };
}
