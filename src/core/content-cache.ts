import { contentKey } from "../util/hash";

interface CacheEntry<T> {
  value: T;
  insertedAt: number;
}

export interface ContentCacheOptions {
  ttlMs: number;
  capacity: number;
  now?: () => number;
}

/**
 * In-memory TTL cache keyed by a digest of the trimmed, lower-cased text.
 * Entries are never refreshed on read; re-inserting overwrites and re-timestamps.
 */
export class ContentCache<T> {
  private readonly store = new Map<string, CacheEntry<T>>();
  private readonly ttlMs: number;
  private readonly capacity: number;
  private readonly now: () => number;

  constructor(opts: ContentCacheOptions) {
    this.ttlMs = opts.ttlMs;
    this.capacity = Math.max(1, opts.capacity);
    this.now = opts.now ?? Date.now;
  }

  get(text: string): T | null {
    const key = contentKey(text);
    const hit = this.store.get(key);
    if (!hit) return null;
    if (this.now() - hit.insertedAt >= this.ttlMs) {
      this.store.delete(key);
      return null;
    }
    return hit.value;
  }

  put(text: string, value: T): void {
    const key = contentKey(text);
    // delete first so Map order stays insertion order
    this.store.delete(key);
    this.store.set(key, { value, insertedAt: this.now() });
    if (this.store.size > this.capacity) this.evict();
  }

  /** Drop expired entries, then the oldest insertions until capacity holds. Returns how many were removed. */
  evict(): number {
    const now = this.now();
    let removed = 0;

    for (const [key, entry] of this.store) {
      if (now - entry.insertedAt >= this.ttlMs) {
        this.store.delete(key);
        removed++;
      }
    }

    for (const key of this.store.keys()) {
      if (this.store.size <= this.capacity) break;
      this.store.delete(key);
      removed++;
    }

    return removed;
  }

  clear(): void {
    this.store.clear();
  }

  get size(): number {
    return this.store.size;
  }
}
