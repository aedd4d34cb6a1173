/**
 * LruCache - Fixed-capacity map that evicts the least recently used entry.
 *
 * Backed by Map insertion order: reads move an entry to the end, inserts past
 * capacity drop the first entry. Values may be `null`; use `has()` to tell a
 * cached `null` from a miss.
 */
export class LruCache<K, V> {
  private readonly entries = new Map<K, { value: V }>();

  constructor(readonly capacity: number) {
    if (!Number.isInteger(capacity) || capacity < 1) {
      throw new RangeError(
        `LruCache capacity must be a positive integer, got ${capacity}`,
      );
    }
  }

  get size(): number {
    return this.entries.size;
  }

  has(key: K): boolean {
    return this.entries.has(key);
  }

  /**
   * Read a value and mark it as most recently used
   */
  get(key: K): V | undefined {
    const entry = this.entries.get(key);
    if (!entry) {
      return undefined;
    }
    this.entries.delete(key);
    this.entries.set(key, entry);
    return entry.value;
  }

  set(key: K, value: V): void {
    if (this.entries.has(key)) {
      this.entries.delete(key);
    } else if (this.entries.size >= this.capacity) {
      const oldest = this.entries.keys().next();
      if (!oldest.done) {
        this.entries.delete(oldest.value);
      }
    }
    this.entries.set(key, { value });
  }

  delete(key: K): boolean {
    return this.entries.delete(key);
  }

  clear(): void {
    this.entries.clear();
  }
}
