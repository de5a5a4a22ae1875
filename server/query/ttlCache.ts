import { CACHE_CONSTANTS } from "../config/constants";
import type { Clock } from "../utils/clock";

export interface CacheEntry {
  value: unknown;
  insertedAt: number;
  ttlSeconds: number;
}

/**
 * True when `key` falls under `prefix`. A bare table or tag name matches whole
 * key segments only: "calls" covers "calls:rows:x" but not "calls_archive:rows:x".
 */
export function keyMatchesPrefix(key: string, prefix: string): boolean {
  if (prefix.includes(":")) return key.startsWith(prefix);
  return key === prefix || key.startsWith(`${prefix}:`);
}

/**
 * Key/value store with per-entry TTL and prefix invalidation.
 *
 * Expired entries are dropped lazily on lookup and by `sweep()`; once
 * `maxEntries` is reached the oldest insertion is evicted.
 */
export class TtlCache {
  private entries = new Map<string, CacheEntry>();

  constructor(
    private clock: Clock,
    private maxEntries: number = CACHE_CONSTANTS.MAX_ENTRIES,
  ) {}

  get size(): number {
    return this.entries.size;
  }

  get(key: string): CacheEntry | undefined {
    const entry = this.entries.get(key);
    if (!entry) return undefined;
    if (this.isExpired(entry)) {
      this.entries.delete(key);
      return undefined;
    }
    return entry;
  }

  set(key: string, value: unknown, ttlSeconds: number): CacheEntry {
    // Re-inserting moves the key to the back of the eviction order
    this.entries.delete(key);
    if (this.entries.size >= this.maxEntries) {
      this.sweep();
    }
    while (this.entries.size >= this.maxEntries) {
      const oldest = this.entries.keys().next();
      if (oldest.done) break;
      this.entries.delete(oldest.value);
    }
    const entry: CacheEntry = { value, insertedAt: this.clock.now(), ttlSeconds };
    this.entries.set(key, entry);
    return entry;
  }

  delete(key: string): boolean {
    return this.entries.delete(key);
  }

  /** Removes every entry under `prefix` (see keyMatchesPrefix). */
  invalidate(prefix: string): number {
    let removed = 0;
    for (const key of [...this.entries.keys()]) {
      if (keyMatchesPrefix(key, prefix)) {
        this.entries.delete(key);
        removed++;
      }
    }
    return removed;
  }

  sweep(): number {
    let removed = 0;
    for (const [key, entry] of [...this.entries.entries()]) {
      if (this.isExpired(entry)) {
        this.entries.delete(key);
        removed++;
      }
    }
    return removed;
  }

  clear(): void {
    this.entries.clear();
  }

  private isExpired(entry: CacheEntry): boolean {
    return this.clock.now() - entry.insertedAt >= entry.ttlSeconds * 1000;
  }
}
