import { createHash } from 'crypto';
import { stripQuery } from '../images/imageRef';
import { TransformArgs, serializeTransformArgs } from '../transform/transformArgs';
import { CacheUnavailableError, handleError } from '../utils/errorHandler';
import { EngineLogger, logger as defaultLogger } from '../utils/logger';
import { CacheBackend, StoredValue } from './cacheBackend';

export type CachedUrl = string | false;

export interface CacheKeyParts {
  sourceUrl: string;
  args: TransformArgs;
  /** e.g. `content@cloudflare`; the provider is part of the label. */
  context: string;
}

export type AssetEventKind = 'replaced' | 'deleted' | 'metadata-updated';

export interface AssetEvent {
  kind: AssetEventKind;
  url: string;
  /** The URL the asset had before a replace. */
  previousUrl?: string;
}

export interface TransformCacheOptions {
  ttlSeconds?: number;
  group?: string;
  /** When false every lookup computes directly. */
  enabled?: boolean;
  logger?: EngineLogger;
}

const KEY_PREFIX = 'edge-images';

function digest(value: string): string {
  return createHash('sha256').update(value).digest('hex');
}

export function cacheKeyFor(parts: CacheKeyParts): string {
  return `${KEY_PREFIX}:${digest(JSON.stringify([parts.sourceUrl.trim(), serializeTransformArgs(parts.args), parts.context]))}`;
}

/**
 * Entries for one source live in a sub-group of the cache group, so an
 * asset is purged with a single group delete.
 */
export function sourceGroupFor(group: string, sourceUrl: string): string {
  return `${group}:${digest(stripQuery(sourceUrl.trim()))}`;
}

/**
 * Memoizes provider URLs. Backend failures never fail a rewrite: they are
 * reported and the value is computed directly.
 */
export class TransformCache {
  readonly ttlSeconds: number;
  readonly group: string;
  readonly enabled: boolean;
  private log: EngineLogger;

  constructor(private readonly backend: CacheBackend, options: TransformCacheOptions = {}) {
    this.ttlSeconds = options.ttlSeconds ?? 3600;
    this.group = options.group ?? KEY_PREFIX;
    this.enabled = options.enabled ?? true;
    this.log = options.logger ?? defaultLogger;
  }

  async getOrCompute(parts: CacheKeyParts, compute: () => CachedUrl | Promise<CachedUrl>): Promise<CachedUrl> {
    if (!this.enabled) {
      return compute();
    }

    const key = cacheKeyFor(parts);
    let hit: StoredValue | undefined;
    try {
      hit = await this.backend.get(key);
    } catch (error) {
      handleError(new CacheUnavailableError('read', error), 'TransformCache', this.log);
      return compute();
    }
    if (hit !== undefined) {
      return hit;
    }

    const value = await compute();
    try {
      await this.backend.set(key, value, this.ttlSeconds, sourceGroupFor(this.group, parts.sourceUrl));
    } catch (error) {
      handleError(new CacheUnavailableError('write', error), 'TransformCache', this.log);
    }
    return value;
  }

  /**
   * Drops every entry stored for the asset's current and previous URL.
   * A replace without a known previous URL flushes the whole group.
   * Returns the number of entries removed, or -1 for a group flush.
   */
  async invalidateAsset(event: AssetEvent): Promise<number> {
    try {
      if (event.kind === 'replaced' && !event.previousUrl) {
        await this.backend.deleteGroup(this.group);
        this.log.debug(`[TransformCache] Flushed group ${this.group} after replace of ${event.url}`);
        return -1;
      }

      let removed = 0;
      const urls = [event.url, event.previousUrl].filter((url): url is string => !!url && url.trim() !== '');
      for (const group of new Set(urls.map(url => sourceGroupFor(this.group, url)))) {
        removed += await this.backend.deleteGroup(group);
      }
      this.log.debug(`[TransformCache] Invalidated ${removed} entries for ${event.url} (${event.kind})`);
      return removed;
    } catch (error) {
      handleError(new CacheUnavailableError('invalidate', error), 'TransformCache', this.log);
      return 0;
    }
  }

  async flush(): Promise<void> {
    try {
      await this.backend.deleteGroup(this.group);
    } catch (error) {
      handleError(new CacheUnavailableError('flush', error), 'TransformCache', this.log);
    }
  }
}
