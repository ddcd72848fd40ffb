import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import * as fs from 'fs-extra';
import * as os from 'os';
import * as path from 'path';
import { DEFAULT_BREAKPOINTS, loadConfig, parseConfig } from '../src/config/config';
import { StaticConfigurationSource, takeSnapshot } from '../src/config/configurationSource';
import { ConfigError } from '../src/utils/errorHandler';
import { createTestLogger } from './helpers';

describe('parseConfig', () => {
  it('fills in defaults', () => {
    const config = parseConfig({}, {});

    expect(config.enabled).toBe(true);
    expect(config.provider).toEqual({ id: 'none', domain: '', subdomain: '', endpoint: '' });
    expect(config.maxWidth).toBe(800);
    expect(config.breakpoints).toEqual(DEFAULT_BREAKPOINTS);
    expect(config.defaults).toEqual({ quality: 85, fit: 'cover', format: 'auto', gravity: 'auto' });
    expect(config.features).toEqual({ avatars: true, picture_wrap: false, htaccess_caching: false, cache: true });
    expect(config.cache.ttlSeconds).toBe(3600);
    expect(config.logging.level).toBe('info');
  });

  it('resolves env references and coerces their strings', () => {
    const config = parseConfig(
      {
        enabled: 'env:EDGE_IMAGES_ENABLED',
        provider: { id: 'env:EDGE_IMAGES_PROVIDER', domain: 'env:EDGE_IMAGES_DOMAIN' },
        maxWidth: 'env:EDGE_IMAGES_MAX_WIDTH',
        logging: { level: 'env:LOG_LEVEL' },
      },
      {
        EDGE_IMAGES_ENABLED: 'false',
        EDGE_IMAGES_PROVIDER: 'cloudflare',
        EDGE_IMAGES_DOMAIN: 'https://site.test',
        EDGE_IMAGES_MAX_WIDTH: '1200',
        LOG_LEVEL: 'DEBUG',
      }
    );

    expect(config.enabled).toBe(false);
    expect(config.provider.id).toBe('cloudflare');
    expect(config.provider.domain).toBe('https://site.test');
    expect(config.maxWidth).toBe(1200);
    expect(config.logging.level).toBe('debug');
  });

  it('falls back to defaults for empty optional variables', () => {
    expect(parseConfig({ maxWidth: 'env:EDGE_IMAGES_MAX_WIDTH' }, { EDGE_IMAGES_MAX_WIDTH: ' ' }).maxWidth).toBe(800);
  });

  it('rejects a missing required variable', () => {
    expect(() => parseConfig({ provider: { domain: 'env:SITE_DOMAIN' } }, {})).toThrow(ConfigError);
  });

  it('names the failing paths', () => {
    try {
      parseConfig({ maxWidth: -1, provider: { id: 'fastly' } }, {});
      expect.unreachable();
    } catch (error) {
      expect(error).toBeInstanceOf(ConfigError);
      const issues = error instanceof ConfigError ? error.issues : [];
      expect(issues.map(issue => issue.split(':')[0])).toEqual(['provider.id', 'maxWidth']);
    }
  });

  it('sorts and dedupes breakpoints', () => {
    expect(parseConfig({ breakpoints: [600, 300, 600] }, {}).breakpoints).toEqual([300, 600]);
  });
});

describe('takeSnapshot', () => {
  it('freezes a copy of the configuration', () => {
    const config = parseConfig({ provider: { id: 'imgix', subdomain: 'demo' } }, {});
    const snapshot = takeSnapshot(new StaticConfigurationSource(config));

    config.maxWidth = 10;
    expect(snapshot.maxWidth).toBe(800);
    expect(snapshot.providerConfig).toEqual({ provider: 'imgix', domain: '', subdomain: 'demo', endpoint: '' });
    expect(Object.isFrozen(snapshot.features)).toBe(true);
  });
});

describe('loadConfig', () => {
  let tempDir: string;

  beforeEach(async () => {
    tempDir = await fs.mkdtemp(path.join(os.tmpdir(), 'edge-images-config-'));
  });

  afterEach(async () => {
    await fs.remove(tempDir);
  });

  it('reads config/config.json', async () => {
    await fs.outputJson(path.join(tempDir, 'config', 'config.json'), { maxWidth: 1024 });
    expect(loadConfig({ cwd: tempDir, env: {} }).maxWidth).toBe(1024);
  });

  it('falls back to the example file with a warning', async () => {
    const logger = createTestLogger();
    await fs.outputJson(path.join(tempDir, 'config', 'config.example.json'), { maxWidth: 640 });

    expect(loadConfig({ cwd: tempDir, env: {}, logger }).maxWidth).toBe(640);
    expect(logger.warn).toHaveBeenCalledWith(
      'Using example config file. Please create config/config.json for production.'
    );
  });

  it('throws without any config file', () => {
    expect(() => loadConfig({ cwd: tempDir, env: {} })).toThrow(ConfigError);
  });
});
