/** A transformed URL, or `false` for "known non-transformable". */
export type StoredValue = string | false;

/**
 * Key/value store with per-entry TTL and group-wide deletion. Every method
 * may reject; callers treat that as the cache being unavailable.
 *
 * Groups nest by `:`. Deleting `edge-images` also deletes entries in
 * `edge-images:<anything>`.
 */
export interface CacheBackend {
  get(key: string): Promise<StoredValue | undefined>;
  set(key: string, value: StoredValue, ttlSeconds: number, group: string): Promise<void>;
  delete(key: string): Promise<void>;
  /** Resolves to the number of entries removed. */
  deleteGroup(group: string): Promise<number>;
}

export interface StoredEntry {
  value: StoredValue;
  /** Epoch milliseconds */
  expiresAt: number;
  group: string;
}

export type Clock = () => number;

export function inGroup(entryGroup: string, group: string): boolean {
  return entryGroup === group || entryGroup.startsWith(`${group}:`);
}
