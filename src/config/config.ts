import * as fs from 'fs-extra';
import * as path from 'path';
import * as dotenv from 'dotenv';
import { z } from 'zod';
import { PROVIDER_IDS } from '../providers/baseProvider';
import { FIT_MODES, GRAVITIES, IMAGE_FORMATS } from '../transform/transformArgs';
import { ConfigError } from '../utils/errorHandler';
import { EngineLogger, logger as defaultLogger } from '../utils/logger';

dotenv.config();

export const FEATURE_NAMES = ['avatars', 'picture_wrap', 'htaccess_caching', 'cache'] as const;
export type FeatureName = (typeof FEATURE_NAMES)[number];

export const DEFAULT_BREAKPOINTS = [300, 600, 768, 1024, 1536, 2048];

// Environment values arrive as strings; accept "true"/"false" and "800".
const booleanish = z.preprocess(
  value => (value === 'true' ? true : value === 'false' ? false : value),
  z.boolean()
);
const positiveInt = z.coerce.number().int().positive();

const providerSchema = z.object({
  id: z.enum(PROVIDER_IDS).default('none'),
  domain: z.string().default(''),
  subdomain: z.string().default(''),
  endpoint: z.string().default(''),
});

const defaultsSchema = z.object({
  quality: z.coerce.number().int().min(1).max(100).default(85),
  fit: z.enum(FIT_MODES).default('cover'),
  format: z.enum(IMAGE_FORMATS).default('auto'),
  gravity: z.enum(GRAVITIES).default('auto'),
});

const featuresSchema = z.object({
  avatars: booleanish.default(true),
  picture_wrap: booleanish.default(false),
  htaccess_caching: booleanish.default(false),
  cache: booleanish.default(true),
});

const cacheSchema = z.object({
  backend: z.enum(['memory', 'file']).default('memory'),
  ttlSeconds: positiveInt.default(3600),
  group: z.string().min(1).default('edge-images'),
  maxEntries: positiveInt.default(1000),
  filePath: z.string().min(1).default(path.join('state', 'edge-images-cache.json')),
});

const loggingSchema = z.object({
  level: z
    .preprocess(
      value => (typeof value === 'string' ? value.trim().toLowerCase() : value),
      z.enum(['debug', 'info', 'warn', 'error'])
    )
    .default('info'),
  dir: z.string().optional(),
});

export const configSchema = z.object({
  enabled: booleanish.default(true),
  provider: providerSchema.default({}),
  maxWidth: positiveInt.default(800),
  breakpoints: z.array(positiveInt).default(DEFAULT_BREAKPOINTS),
  defaults: defaultsSchema.default({}),
  features: featuresSchema.default({}),
  cache: cacheSchema.default({}),
  logging: loggingSchema.default({}),
});

export type EngineConfig = z.infer<typeof configSchema>;
export type TransformDefaults = EngineConfig['defaults'];
export type CacheSettings = EngineConfig['cache'];

// Environment variables that may be left empty; the schema default applies.
const OPTIONAL_ENV_VARS = new Set([
  'EDGE_IMAGES_ENABLED',
  'EDGE_IMAGES_PROVIDER',
  'EDGE_IMAGES_DOMAIN',
  'EDGE_IMAGES_SUBDOMAIN',
  'EDGE_IMAGES_ENDPOINT',
  'EDGE_IMAGES_MAX_WIDTH',
  'EDGE_IMAGES_CACHE_FILE',
  'EDGE_IMAGES_LOG_DIR',
  'LOG_LEVEL',
]);

function resolveEnvValue(value: string, env: NodeJS.ProcessEnv): string | undefined {
  if (!value.startsWith('env:')) {
    return value;
  }
  const envKey = value.substring(4);
  const envValue = env[envKey];

  if (envValue === undefined || envValue.trim() === '') {
    if (!OPTIONAL_ENV_VARS.has(envKey)) {
      throw new ConfigError(`Environment variable ${envKey} is not set`);
    }
    return undefined;
  }
  return envValue.trim();
}

function resolveEnvObject(obj: unknown, env: NodeJS.ProcessEnv): unknown {
  if (typeof obj === 'string') {
    return resolveEnvValue(obj, env);
  }
  if (Array.isArray(obj)) {
    return obj.map(item => resolveEnvObject(item, env)).filter(item => item !== undefined);
  }
  if (obj && typeof obj === 'object') {
    const resolved: Record<string, unknown> = {};
    for (const [key, value] of Object.entries(obj)) {
      const next = resolveEnvObject(value, env);
      // Unset optional values fall through to schema defaults
      if (next !== undefined) {
        resolved[key] = next;
      }
    }
    return resolved;
  }
  return obj;
}

/**
 * Validates raw (already JSON-parsed) configuration, resolving `env:NAME`
 * references first.
 */
export function parseConfig(raw: unknown, env: NodeJS.ProcessEnv = process.env): EngineConfig {
  const resolved = resolveEnvObject(raw ?? {}, env);
  const result = configSchema.safeParse(resolved);

  if (!result.success) {
    const issues = result.error.issues.map(issue => `${issue.path.join('.') || '(root)'}: ${issue.message}`);
    throw new ConfigError(`Invalid configuration: ${issues.join('; ')}`, issues);
  }

  const config = result.data;
  // Breakpoints are walked in ascending order; keep them unique and sorted here
  config.breakpoints = Array.from(new Set(config.breakpoints)).sort((a, b) => a - b);
  return config;
}

export interface LoadConfigOptions {
  configPath?: string;
  cwd?: string;
  env?: NodeJS.ProcessEnv;
  logger?: EngineLogger;
}

export function loadConfig(options: LoadConfigOptions = {}): EngineConfig {
  const cwd = options.cwd ?? process.cwd();
  const log = options.logger ?? defaultLogger;
  const configPath = options.configPath ?? path.join(cwd, 'config', 'config.json');
  const examplePath = path.join(cwd, 'config', 'config.example.json');

  let configData: unknown;

  if (fs.existsSync(configPath)) {
    configData = fs.readJsonSync(configPath);
  } else if (!options.configPath && fs.existsSync(examplePath)) {
    configData = fs.readJsonSync(examplePath);
    log.warn('Using example config file. Please create config/config.json for production.');
  } else {
    throw new ConfigError(`No configuration file found at ${configPath}`);
  }

  return parseConfig(configData, options.env ?? process.env);
}
