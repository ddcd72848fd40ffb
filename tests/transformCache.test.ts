import { describe, it, expect, vi, beforeEach, afterEach } from 'vitest';
import * as fs from 'fs-extra';
import * as os from 'os';
import * as path from 'path';
import { TransformArgs } from '../src/transform/transformArgs';
import { CacheKeyParts, TransformCache, cacheKeyFor } from '../src/cache/transformCache';
import { CacheBackend } from '../src/cache/cacheBackend';
import { MemoryBackend } from '../src/cache/memoryBackend';
import { JsonFileBackend } from '../src/cache/jsonFileBackend';
import { createTestLogger } from './helpers';

const args: TransformArgs = {
  width: 300,
  fit: 'cover',
  format: 'auto',
  quality: 85,
  gravity: 'auto',
  sharpen: 0,
  dpr: 1,
};

function parts(sourceUrl: string, width = 300): CacheKeyParts {
  return { sourceUrl, args: { ...args, width }, context: 'content@cloudflare' };
}

describe('TransformCache', () => {
  let logger: ReturnType<typeof createTestLogger>;
  let cache: TransformCache;

  beforeEach(() => {
    logger = createTestLogger();
    cache = new TransformCache(new MemoryBackend(), { logger });
  });

  it('computes once per key', async () => {
    const compute = vi.fn(() => 'url-a');

    expect(await cache.getOrCompute(parts('/a.jpg'), compute)).toBe('url-a');
    expect(await cache.getOrCompute(parts('/a.jpg'), compute)).toBe('url-a');
    expect(compute).toHaveBeenCalledTimes(1);
  });

  it('remembers non-transformable results', async () => {
    const compute = vi.fn((): string | false => false);

    await cache.getOrCompute(parts('/a.svg'), compute);
    expect(await cache.getOrCompute(parts('/a.svg'), compute)).toBe(false);
    expect(compute).toHaveBeenCalledTimes(1);
  });

  it('keys on the context label', () => {
    expect(cacheKeyFor(parts('/a.jpg'))).not.toBe(cacheKeyFor({ ...parts('/a.jpg'), context: 'content@imgix' }));
  });

  it('recomputes after the asset is invalidated', async () => {
    const compute = vi.fn(() => 'url');
    await cache.getOrCompute(parts('https://site.test/a.jpg', 300), compute);
    await cache.getOrCompute(parts('https://site.test/a.jpg', 600), compute);

    expect(await cache.invalidateAsset({ kind: 'metadata-updated', url: 'https://site.test/a.jpg' })).toBe(2);

    await cache.getOrCompute(parts('https://site.test/a.jpg', 300), compute);
    expect(compute).toHaveBeenCalledTimes(3);
  });

  it('purges every entry written by concurrent lookups', async () => {
    const compute = vi.fn(() => 'url');
    await Promise.all([
      cache.getOrCompute(parts('https://site.test/a.jpg', 300), compute),
      cache.getOrCompute(parts('https://site.test/a.jpg', 600), compute),
    ]);

    expect(await cache.invalidateAsset({ kind: 'deleted', url: 'https://site.test/a.jpg' })).toBe(2);

    await cache.getOrCompute(parts('https://site.test/a.jpg', 300), compute);
    await cache.getOrCompute(parts('https://site.test/a.jpg', 600), compute);
    expect(compute).toHaveBeenCalledTimes(4);
  });

  it('leaves other sources alone when one asset is invalidated', async () => {
    const compute = vi.fn(() => 'url');
    await cache.getOrCompute(parts('https://site.test/a.jpg'), compute);
    await cache.getOrCompute(parts('https://site.test/b.jpg'), compute);

    expect(await cache.invalidateAsset({ kind: 'deleted', url: 'https://site.test/a.jpg?ver=2' })).toBe(1);

    await cache.getOrCompute(parts('https://site.test/b.jpg'), compute);
    expect(compute).toHaveBeenCalledTimes(2);
  });

  it('purges the previous URL of a replaced asset', async () => {
    const compute = vi.fn(() => 'url');
    await cache.getOrCompute(parts('https://site.test/old.jpg'), compute);

    expect(
      await cache.invalidateAsset({ kind: 'replaced', url: 'https://site.test/new.jpg', previousUrl: 'https://site.test/old.jpg' })
    ).toBe(1);
  });

  it('flushes the group when a replace has no previous URL', async () => {
    const compute = vi.fn(() => 'url');
    await cache.getOrCompute(parts('https://site.test/a.jpg'), compute);
    await cache.getOrCompute(parts('https://site.test/b.jpg'), compute);

    expect(await cache.invalidateAsset({ kind: 'replaced', url: 'https://site.test/a.jpg' })).toBe(-1);

    await cache.getOrCompute(parts('https://site.test/b.jpg'), compute);
    expect(compute).toHaveBeenCalledTimes(3);
  });

  it('forgets everything on flush', async () => {
    const compute = vi.fn(() => 'url');
    await cache.getOrCompute(parts('/a.jpg'), compute);
    await cache.flush();
    await cache.getOrCompute(parts('/a.jpg'), compute);

    expect(compute).toHaveBeenCalledTimes(2);
  });

  it('computes every time when disabled', async () => {
    const disabled = new TransformCache(new MemoryBackend(), { enabled: false, logger });
    const compute = vi.fn(() => 'url');

    await disabled.getOrCompute(parts('/a.jpg'), compute);
    await disabled.getOrCompute(parts('/a.jpg'), compute);
    expect(compute).toHaveBeenCalledTimes(2);
  });

  it('bypasses a failing backend', async () => {
    const backend: CacheBackend = {
      get: vi.fn().mockRejectedValue(new Error('down')),
      set: vi.fn().mockResolvedValue(undefined),
      delete: vi.fn().mockResolvedValue(undefined),
      deleteGroup: vi.fn().mockResolvedValue(0),
    };
    const failing = new TransformCache(backend, { logger });

    expect(await failing.getOrCompute(parts('/a.jpg'), () => 'direct')).toBe('direct');
    expect(logger.warn).toHaveBeenCalledWith('[TransformCache] CACHE_UNAVAILABLE: Cache read failed: down');
  });
});

describe('MemoryBackend', () => {
  it('expires entries after their TTL', async () => {
    let t = 0;
    const backend = new MemoryBackend({ now: () => t });
    await backend.set('k', 'v', 10, 'g');

    t = 9999;
    expect(await backend.get('k')).toBe('v');
    t = 10000;
    expect(await backend.get('k')).toBeUndefined();
  });

  it('evicts the oldest entry when full', async () => {
    const backend = new MemoryBackend({ maxEntries: 2 });
    await backend.set('a', '1', 60, 'g');
    await backend.set('b', '2', 60, 'g');
    await backend.set('c', '3', 60, 'g');

    expect(await backend.get('a')).toBeUndefined();
    expect(await backend.get('c')).toBe('3');
    expect(backend.size).toBe(2);
  });

  it('deletes by group, including nested groups', async () => {
    const backend = new MemoryBackend();
    await backend.set('a', '1', 60, 'one');
    await backend.set('a2', '1', 60, 'one:x');
    await backend.set('b', '2', 60, 'two');
    await backend.set('c', '3', 60, 'one-more');

    expect(await backend.deleteGroup('one')).toBe(2);
    expect(await backend.get('a2')).toBeUndefined();
    expect(await backend.get('b')).toBe('2');
    expect(await backend.get('c')).toBe('3');
  });
});

describe('JsonFileBackend', () => {
  let tempDir: string;
  let filePath: string;

  beforeEach(async () => {
    tempDir = await fs.mkdtemp(path.join(os.tmpdir(), 'edge-images-cache-'));
    filePath = path.join(tempDir, 'cache.json');
  });

  afterEach(async () => {
    await fs.remove(tempDir);
  });

  it('shares entries between instances through the file', async () => {
    const logger = createTestLogger();
    await new JsonFileBackend({ filePath, logger }).set('k', 'https://edge.test/a.jpg', 60, 'g');

    const other = new JsonFileBackend({ filePath, logger });
    expect(await other.get('k')).toBe('https://edge.test/a.jpg');
    expect(await fs.pathExists(`${filePath}.lock`)).toBe(false);
  });

  it('stores false values', async () => {
    const backend = new JsonFileBackend({ filePath, logger: createTestLogger() });
    await backend.set('svg', false, 60, 'g');

    expect(await backend.get('svg')).toBe(false);
  });

  it('deletes by group', async () => {
    const backend = new JsonFileBackend({ filePath, logger: createTestLogger() });
    await backend.set('a', '1', 60, 'one');
    await backend.set('a2', '1', 60, 'one:x');
    await backend.set('b', '2', 60, 'two');

    expect(await backend.deleteGroup('one')).toBe(2);
    expect(await backend.get('a2')).toBeUndefined();
    expect(await backend.get('b')).toBe('2');
  });

  it('keeps every entry from concurrent cache writers', async () => {
    const logger = createTestLogger();
    const shared = new TransformCache(new JsonFileBackend({ filePath, logger }), { logger });
    const compute = vi.fn(() => 'url');
    await Promise.all([
      shared.getOrCompute(parts('https://site.test/a.jpg', 300), compute),
      shared.getOrCompute(parts('https://site.test/a.jpg', 600), compute),
    ]);

    expect(await shared.invalidateAsset({ kind: 'deleted', url: 'https://site.test/a.jpg' })).toBe(2);
  });

  it('backs up a corrupt file and starts empty', async () => {
    const logger = createTestLogger();
    await fs.writeFile(filePath, 'not json');
    const backend = new JsonFileBackend({ filePath, logger });

    expect(await backend.get('k')).toBeUndefined();
    const files = await fs.readdir(tempDir);
    expect(files.some(name => name.startsWith('cache.json.corrupt.'))).toBe(true);
    expect(logger.warn).toHaveBeenCalledTimes(1);
  });
});
