import { CacheBackend, Clock, StoredEntry, StoredValue, inGroup } from './cacheBackend';

export interface MemoryBackendOptions {
  /** Maximum entries kept; the oldest insert is evicted first. */
  maxEntries?: number;
  now?: Clock;
}

const DEFAULT_MAX_ENTRIES = 1000;

/**
 * Per-process cache with TTL and a size bound.
 */
export class MemoryBackend implements CacheBackend {
  private entries = new Map<string, StoredEntry>();
  private maxEntries: number;
  private now: Clock;

  constructor(options: MemoryBackendOptions = {}) {
    this.maxEntries =
      options.maxEntries !== undefined && options.maxEntries > 0 ? Math.floor(options.maxEntries) : DEFAULT_MAX_ENTRIES;
    this.now = options.now ?? Date.now;
  }

  get size(): number {
    return this.entries.size;
  }

  async get(key: string): Promise<StoredValue | undefined> {
    const entry = this.entries.get(key);
    if (!entry) {
      return undefined;
    }
    if (entry.expiresAt <= this.now()) {
      this.entries.delete(key);
      return undefined;
    }
    return entry.value;
  }

  async set(key: string, value: StoredValue, ttlSeconds: number, group: string): Promise<void> {
    // Re-inserting moves the key to the back of the eviction order
    this.entries.delete(key);
    if (this.entries.size >= this.maxEntries) {
      this.evictExpired();
    }
    while (this.entries.size >= this.maxEntries) {
      const oldest = this.entries.keys().next();
      if (oldest.done) break;
      this.entries.delete(oldest.value);
    }
    this.entries.set(key, {
      value,
      expiresAt: this.now() + ttlSeconds * 1000,
      group,
    });
  }

  async delete(key: string): Promise<void> {
    this.entries.delete(key);
  }

  async deleteGroup(group: string): Promise<number> {
    const t = this.now();
    let removed = 0;
    for (const [key, entry] of this.entries) {
      if (inGroup(entry.group, group)) {
        this.entries.delete(key);
        if (entry.expiresAt > t) removed++;
      }
    }
    return removed;
  }

  private evictExpired(): void {
    const t = this.now();
    for (const [key, entry] of this.entries) {
      if (entry.expiresAt <= t) {
        this.entries.delete(key);
      }
    }
  }
}
