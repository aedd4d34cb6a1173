import { LruCache } from './lru-cache';

/**
 * KeyedMemo - Memoizes async work per key with one in-flight computation per slot.
 *
 * Concurrent callers asking for the same key share a single promise, so the
 * factory for a slot never runs twice at once. A rejected computation is
 * evicted so the next caller retries it.
 */
export class KeyedMemo<K, V> {
  private readonly slots: LruCache<K, Promise<V>>;

  constructor(capacity: number) {
    this.slots = new LruCache(capacity);
  }

  get size(): number {
    return this.slots.size;
  }

  get(key: K, factory: () => Promise<V>): Promise<V> {
    const existing = this.slots.get(key);
    if (existing) {
      return existing;
    }

    const pending = factory();
    this.slots.set(key, pending);
    pending.catch(() => {
      if (this.slots.has(key) && this.slots.get(key) === pending) {
        this.slots.delete(key);
      }
    });
    return pending;
  }

  clear(): void {
    this.slots.clear();
  }
}
