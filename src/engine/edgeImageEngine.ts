import * as path from 'path';
import { EngineConfig, LoadConfigOptions, loadConfig } from '../config/config';
import { ConfigSnapshot, StaticConfigurationSource, takeSnapshot } from '../config/configurationSource';
import { FeatureGate } from '../gate/featureGate';
import { Dimensions, ImageRef, createImageRef, hostOf, intrinsicDimensions } from '../images/imageRef';
import { MetadataSource, StaticMetadataSource } from '../metadata/metadataSource';
import { EdgeProvider, ProviderRegistry, createDefaultRegistry } from '../providers';
import { ArgumentResolver, DEFAULT_AVATAR_SIZE, ImageContext } from '../transform/argumentResolver';
import { TransformArgs, TransformInput } from '../transform/transformArgs';
import { AssetEvent, CachedUrl, TransformCache } from '../cache/transformCache';
import { CacheBackend } from '../cache/cacheBackend';
import { MemoryBackend } from '../cache/memoryBackend';
import { JsonFileBackend } from '../cache/jsonFileBackend';
import {
  ContentRewriteOptions,
  ContentRewriteResult,
  MarkupRewriter,
  RewriteOptions,
  RewriteResult,
  VetoPredicate,
} from '../markup/markupRewriter';
import { handleError } from '../utils/errorHandler';
import { EngineLogger, Logger, logger as defaultLogger, parseLogLevel } from '../utils/logger';

export interface EngineOptions {
  snapshot: ConfigSnapshot;
  registry?: ProviderRegistry;
  cache?: TransformCache;
  metadata?: MetadataSource;
  logger?: EngineLogger;
  veto?: VetoPredicate;
}

export interface TransformUrlOptions {
  context?: ImageContext;
  args?: TransformInput;
  /** Skips the metadata lookup when the caller already knows the size. */
  dimensions?: Dimensions;
}

export interface AvatarOptions {
  args?: TransformInput;
  containerClass?: string;
}

export const AVATAR_CONTAINER_CLASS = 'avatar-picture';

/**
 * One configuration snapshot, one provider, one cache and one logger.
 * Every public operation returns its input unchanged on failure.
 */
export class EdgeImageEngine {
  readonly snapshot: ConfigSnapshot;
  readonly gate: FeatureGate;
  private provider: EdgeProvider;
  private cache: TransformCache;
  private metadata: MetadataSource;
  private resolver: ArgumentResolver;
  private rewriter: MarkupRewriter;
  private log: EngineLogger;

  constructor(options: EngineOptions) {
    const registry = options.registry ?? createDefaultRegistry();
    this.snapshot = options.snapshot;
    this.log = options.logger ?? defaultLogger;
    this.provider = registry.get(this.snapshot.providerId);
    this.metadata = options.metadata ?? new StaticMetadataSource();
    this.cache = options.cache ?? new TransformCache(new MemoryBackend(), { logger: this.log });
    this.gate = new FeatureGate(this.snapshot, registry, this.metadata);
    this.resolver = new ArgumentResolver({ defaults: this.snapshot.defaults, maxWidth: this.snapshot.maxWidth });

    this.rewriter = new MarkupRewriter({
      gate: this.gate,
      metadata: this.metadata,
      provider: this.provider,
      providerConfig: this.snapshot.providerConfig,
      resolver: this.resolver,
      breakpoints: this.snapshot.breakpoints,
      maxWidth: this.snapshot.maxWidth,
      renderUrl: (image, args, context) => this.renderUrl(image, args, context),
      veto: options.veto,
      logger: this.log,
    });

    if (this.snapshot.enabled && this.snapshot.providerId !== 'none' && !this.gate.providerConfigured()) {
      this.log.warn(`Provider ${this.snapshot.providerId} is not fully configured; images will not be transformed`);
    }
  }

  rewrite(fragment: string, options: RewriteOptions = {}): Promise<RewriteResult> {
    return this.rewriter.rewrite(fragment, options);
  }

  rewriteContent(html: string, options: ContentRewriteOptions = {}): Promise<ContentRewriteResult> {
    return this.rewriter.rewriteContent(html, options);
  }

  async rewriteAvatar(html: string, size: number = DEFAULT_AVATAR_SIZE, options: AvatarOptions = {}): Promise<RewriteResult> {
    if (!this.gate.featureEnabled('avatars')) {
      return { html, tag: '', transformed: false };
    }
    const side = size > 0 ? Math.round(size) : DEFAULT_AVATAR_SIZE;
    return this.rewriter.rewrite(html, {
      context: 'avatar',
      args: { width: side, height: side, ...options.args },
      fallbackDimensions: { width: side, height: side },
      containerClass: options.containerClass ?? AVATAR_CONTAINER_CLASS,
    });
  }

  /**
   * A plain transformed URL for metadata call sites (share images, schema,
   * sitemaps). Returns `url` unchanged when it cannot be transformed.
   */
  async transformUrl(url: string, options: TransformUrlOptions = {}): Promise<string> {
    try {
      if (!this.gate.transformationGloballyEnabled()) {
        return url;
      }
      const src = this.provider.originalUrlOf(url, this.snapshot.providerConfig) ?? url;
      if (!this.gate.shouldTransformUrl(src)) {
        return url;
      }

      const image = createImageRef(src, options.dimensions ?? (await this.lookupDimensions(src)));
      const context = options.context ?? 'content';
      const args = this.resolver.resolve(context, options.args, intrinsicDimensions(image));
      const result = await this.renderUrl(image, args, context);
      return result === false ? url : result;
    } catch (error) {
      handleError(error, 'EdgeImageEngine.transformUrl', this.log);
      return url;
    }
  }

  invalidateAsset(event: AssetEvent): Promise<number> {
    return this.cache.invalidateAsset(event);
  }

  flushCache(): Promise<void> {
    return this.cache.flush();
  }

  private async lookupDimensions(src: string): Promise<Dimensions | undefined> {
    const identity = await this.metadata.resolveIdentityFromUrl(src);
    if (identity === null) {
      return undefined;
    }
    return (await this.metadata.getIntrinsicDimensions(identity)) ?? undefined;
  }

  private renderUrl(image: ImageRef, args: TransformArgs, context: ImageContext): Promise<CachedUrl> {
    const compute = (): CachedUrl =>
      !image.isSvg && this.gate.shouldTransformUrl(image.sourceUrl)
        ? this.provider.buildUrl(image, args, this.snapshot.providerConfig)
        : false;

    if (!this.gate.featureEnabled('cache')) {
      return Promise.resolve(compute());
    }
    return this.cache.getOrCompute(
      { sourceUrl: image.sourceUrl, args, context: `${context}@${this.snapshot.providerId}` },
      compute
    );
  }
}

export interface CreateEngineOptions extends LoadConfigOptions {
  /** Already-loaded configuration; skips reading the config file. */
  config?: EngineConfig;
  metadata?: MetadataSource;
  backend?: CacheBackend;
  veto?: VetoPredicate;
}

/**
 * Wires an engine from configuration: logger, cache backend and provider
 * all follow the config file.
 */
export function createEngine(options: CreateEngineOptions = {}): EdgeImageEngine {
  const config = options.config ?? loadConfig(options);
  const log =
    options.logger ?? new Logger({ level: parseLogLevel(config.logging.level), logDir: config.logging.dir });
  const snapshot = takeSnapshot(new StaticConfigurationSource(config));
  const cwd = options.cwd ?? process.cwd();

  const backend =
    options.backend ??
    (config.cache.backend === 'file'
      ? new JsonFileBackend({
          filePath: path.resolve(cwd, config.cache.filePath),
          maxEntries: config.cache.maxEntries,
          logger: log,
        })
      : new MemoryBackend({ maxEntries: config.cache.maxEntries }));

  const cache = new TransformCache(backend, {
    ttlSeconds: config.cache.ttlSeconds,
    group: config.cache.group,
    enabled: config.features.cache,
    logger: log,
  });

  const siteHost = hostOf(config.provider.domain);
  const metadata = options.metadata ?? new StaticMetadataSource({ localHosts: siteHost ? [siteHost] : [] });

  log.debug(`Edge image engine using provider ${snapshot.providerId}`);
  return new EdgeImageEngine({ snapshot, cache, metadata, logger: log, veto: options.veto });
}
