/**
 * LRU (Least Recently Used) cache implementation
 *
 * Holds at most `maxEntries` values, evicting the least recently used
 * entry when the limit is exceeded. Relies on Map iteration order:
 * the first key is always the oldest one.
 */
export class LRUCache<K, V> {
  private cache = new Map<K, { value: V }>();

  /**
   * @param maxEntries Maximum number of entries (default: 500)
   */
  constructor(private readonly maxEntries = 500) {
    if (!Number.isInteger(maxEntries) || maxEntries < 0) {
      throw new RangeError(`maxEntries must be a non-negative integer, got ${maxEntries}`);
    }
  }

  has(key: K): boolean {
    return this.cache.has(key);
  }

  /**
   * Get a cached value and mark it as most recently used.
   */
  get(key: K): V | undefined {
    const entry = this.cache.get(key);
    if (!entry) {
      return undefined;
    }
    this.cache.delete(key);
    this.cache.set(key, entry);
    return entry.value;
  }

  set(key: K, value: V): void {
    if (this.maxEntries === 0) return;
    this.cache.delete(key);
    this.cache.set(key, { value });

    while (this.cache.size > this.maxEntries) {
      const oldest = this.cache.keys().next();
      if (oldest.done) break;
      this.cache.delete(oldest.value);
    }
  }

  delete(key: K): boolean {
    return this.cache.delete(key);
  }

  clear(): void {
    this.cache.clear();
  }

  /**
   * Current number of cached entries
   */
  get size(): number {
    return this.cache.size;
  }
}
