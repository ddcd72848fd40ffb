import * as fs from 'fs-extra';
import * as path from 'path';
import { EngineLogger, logger as defaultLogger } from '../utils/logger';
import { toErrorMessage } from '../utils/errorHandler';

export interface LockOptions {
  staleMs?: number;
  retryIntervalMs?: number;
  maxRetries?: number;
  logger?: EngineLogger;
}

function errorCode(error: unknown): string | undefined {
  if (error && typeof error === 'object' && 'code' in error && typeof error.code === 'string') {
    return error.code;
  }
  return undefined;
}

/**
 * Runs `fn` while holding an exclusive lock file, so processes sharing one
 * cache file do not interleave read-modify-write cycles.
 */
export async function withFileLock<T>(lockPath: string, fn: () => Promise<T>, options: LockOptions = {}): Promise<T> {
  const { staleMs = 10000, retryIntervalMs = 50, maxRetries = 100, logger: log = defaultLogger } = options;

  await fs.ensureDir(path.dirname(lockPath));

  let retries = 0;
  while (retries < maxRetries) {
    if (await acquireLock(lockPath, staleMs, log)) {
      try {
        return await fn();
      } finally {
        await releaseLock(lockPath, log);
      }
    }

    retries++;
    if (retries < maxRetries) {
      await new Promise(resolve => setTimeout(resolve, retryIntervalMs));
    }
  }

  throw new Error(`Failed to acquire lock for ${lockPath} after ${maxRetries} retries`);
}

async function acquireLock(lockPath: string, staleMs: number, log: EngineLogger): Promise<boolean> {
  try {
    // 'wx' fails when the path exists
    await fs.writeFile(lockPath, JSON.stringify({ pid: process.pid, createdAt: Date.now() }), { flag: 'wx' });
    return true;
  } catch (error) {
    if (errorCode(error) !== 'EEXIST') {
      throw error;
    }
  }

  try {
    const stats = await fs.stat(lockPath);
    const age = Date.now() - stats.mtimeMs;
    if (age > staleMs) {
      log.warn(`Lock file ${lockPath} is stale (age: ${age}ms). Breaking lock.`);
      await fs.remove(lockPath);
    }
  } catch (statError) {
    // Released between the failed create and the stat
    if (errorCode(statError) !== 'ENOENT') {
      throw statError;
    }
  }
  return false;
}

async function releaseLock(lockPath: string, log: EngineLogger): Promise<void> {
  try {
    await fs.remove(lockPath);
  } catch (error) {
    log.error(`Failed to release lock at ${lockPath}: ${toErrorMessage(error)}`);
  }
}
