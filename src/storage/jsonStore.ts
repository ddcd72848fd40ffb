import * as fs from 'fs-extra';
import * as path from 'path';
import { EngineLogger, logger as defaultLogger } from '../utils/logger';
import { toErrorMessage } from '../utils/errorHandler';

/**
 * Reads a JSON file. A missing, empty or invalid file yields `defaultValue`;
 * an invalid one is first copied aside as `<file>.corrupt.<ts>`.
 */
export async function readJsonSafeAsync<T>(
  filePath: string,
  defaultValue: T,
  validateFn: (data: unknown) => data is T,
  log: EngineLogger = defaultLogger
): Promise<T> {
  try {
    if (!(await fs.pathExists(filePath))) {
      return defaultValue;
    }

    const content = await fs.readFile(filePath, 'utf-8');
    if (!content.trim()) {
      return defaultValue;
    }

    const data: unknown = JSON.parse(content);
    if (!validateFn(data)) {
      throw new Error('Schema validation failed');
    }
    return data;
  } catch (error) {
    log.warn(`Failed to read JSON at ${filePath}: ${toErrorMessage(error)}. Backing up and returning default.`);
    await backupCorruptFile(filePath, log);
    return defaultValue;
  }
}

/**
 * Writes JSON atomically: temp file, fsync, rename.
 */
export async function writeJsonAtomic<T>(filePath: string, data: T, log: EngineLogger = defaultLogger): Promise<void> {
  await fs.ensureDir(path.dirname(filePath));

  const tempPath = `${filePath}.tmp.${process.pid}.${Date.now()}`;

  try {
    await fs.writeFile(tempPath, JSON.stringify(data, null, 2), 'utf-8');

    const fd = await fs.open(tempPath, 'r+');
    try {
      await fs.fsync(fd);
    } finally {
      await fs.close(fd);
    }

    await fs.rename(tempPath, filePath);
  } catch (error) {
    log.error(`Failed to write JSON atomically to ${filePath}: ${toErrorMessage(error)}`);
    if (await fs.pathExists(tempPath)) {
      await fs.remove(tempPath);
    }
    throw error;
  }
}

async function backupCorruptFile(filePath: string, log: EngineLogger): Promise<void> {
  try {
    if (await fs.pathExists(filePath)) {
      const backupPath = `${filePath}.corrupt.${Date.now()}`;
      await fs.copy(filePath, backupPath);
      log.info(`Corrupt file backed up to ${backupPath}`);
    }
  } catch (backupError) {
    log.error(`Failed to backup corrupt file ${filePath}: ${toErrorMessage(backupError)}`);
  }
}
