import { describe, it, expect, vi, beforeEach, afterEach } from 'vitest';
import * as fs from 'fs-extra';
import * as os from 'os';
import * as path from 'path';
import { LogLevel, Logger, parseLogLevel } from '../src/utils/logger';

describe('Logger', () => {
  let tempDir: string;

  beforeEach(async () => {
    tempDir = await fs.mkdtemp(path.join(os.tmpdir(), 'edge-images-logs-'));
    vi.spyOn(console, 'log').mockImplementation(() => undefined);
    vi.spyOn(console, 'error').mockImplementation(() => undefined);
  });

  afterEach(async () => {
    await fs.remove(tempDir);
  });

  it('drops messages below its level', () => {
    const log = new Logger({ level: LogLevel.WARN });

    log.info('quiet');
    log.warn('hello');

    expect(console.log).toHaveBeenCalledTimes(1);
    expect(vi.mocked(console.log).mock.calls[0]?.[0]).toContain('[WARN] hello');
  });

  it('sends errors to stderr', () => {
    new Logger({ level: LogLevel.DEBUG }).error('broken', { code: 1 });
    expect(vi.mocked(console.error).mock.calls[0]?.[0]).toContain('[ERROR] broken');
  });

  it('appends to a daily file when a directory is set', async () => {
    const log = new Logger({ level: LogLevel.DEBUG, logDir: tempDir });

    log.info('written');

    const file = path.join(tempDir, `${new Date().toISOString().split('T')[0]}.log`);
    expect(await fs.readFile(file, 'utf-8')).toContain('[INFO] written');
  });
});

describe('parseLogLevel', () => {
  it('matches case-insensitively and falls back', () => {
    expect(parseLogLevel('warn')).toBe(LogLevel.WARN);
    expect(parseLogLevel('nope')).toBe(LogLevel.INFO);
    expect(parseLogLevel(undefined, LogLevel.ERROR)).toBe(LogLevel.ERROR);
  });
});
