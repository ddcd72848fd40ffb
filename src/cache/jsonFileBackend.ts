import { z } from 'zod';
import { readJsonSafeAsync, writeJsonAtomic } from '../storage/jsonStore';
import { LockOptions, withFileLock } from '../storage/locks';
import { EngineLogger, logger as defaultLogger } from '../utils/logger';
import { CacheBackend, Clock, StoredEntry, StoredValue, inGroup } from './cacheBackend';

const entrySchema = z.object({
  value: z.union([z.string(), z.literal(false)]),
  expiresAt: z.number(),
  group: z.string(),
});

const fileSchema = z.object({
  version: z.literal(1),
  entries: z.record(entrySchema),
});

type CacheFile = z.infer<typeof fileSchema>;

function isCacheFile(data: unknown): data is CacheFile {
  return fileSchema.safeParse(data).success;
}

function emptyFile(): CacheFile {
  return { version: 1, entries: {} };
}

export interface JsonFileBackendOptions {
  filePath: string;
  maxEntries?: number;
  now?: Clock;
  lock?: LockOptions;
  logger?: EngineLogger;
}

/**
 * Cache persisted in one JSON file, shared by processes on the same host.
 * Writes run under a lock file and replace the file atomically.
 */
export class JsonFileBackend implements CacheBackend {
  private filePath: string;
  private lockPath: string;
  private maxEntries: number;
  private now: Clock;
  private lockOptions: LockOptions;
  private log: EngineLogger;

  constructor(options: JsonFileBackendOptions) {
    this.filePath = options.filePath;
    this.lockPath = `${options.filePath}.lock`;
    this.maxEntries = options.maxEntries ?? 1000;
    this.now = options.now ?? Date.now;
    this.log = options.logger ?? defaultLogger;
    this.lockOptions = { ...options.lock, logger: this.log };
  }

  async get(key: string): Promise<StoredValue | undefined> {
    const file = await this.read();
    const entry = file.entries[key];
    if (!entry || entry.expiresAt <= this.now()) {
      return undefined;
    }
    return entry.value;
  }

  async set(key: string, value: StoredValue, ttlSeconds: number, group: string): Promise<void> {
    await this.update(entries => {
      delete entries[key];
      const live = Object.keys(entries);
      // Object key order is insertion order for these string keys
      for (let i = 0; i <= live.length - this.maxEntries; i++) {
        const oldest = live[i];
        if (oldest !== undefined) delete entries[oldest];
      }
      entries[key] = { value, expiresAt: this.now() + ttlSeconds * 1000, group };
    });
  }

  async delete(key: string): Promise<void> {
    await this.update(entries => {
      delete entries[key];
    });
  }

  async deleteGroup(group: string): Promise<number> {
    let removed = 0;
    await this.update(entries => {
      for (const [key, entry] of Object.entries(entries)) {
        if (inGroup(entry.group, group)) {
          delete entries[key];
          removed++;
        }
      }
    });
    return removed;
  }

  private read(): Promise<CacheFile> {
    return readJsonSafeAsync(this.filePath, emptyFile(), isCacheFile, this.log);
  }

  private async update(mutate: (entries: Record<string, StoredEntry>) => void): Promise<void> {
    await withFileLock(
      this.lockPath,
      async () => {
        const file = await this.read();
        const t = this.now();
        const entries: Record<string, StoredEntry> = {};
        for (const [key, entry] of Object.entries(file.entries)) {
          if (entry.expiresAt > t) entries[key] = entry;
        }
        mutate(entries);
        await writeJsonAtomic(this.filePath, { version: 1, entries }, this.log);
      },
      this.lockOptions
    );
  }
}
