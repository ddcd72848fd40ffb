export { EdgeImageEngine, createEngine, AVATAR_CONTAINER_CLASS } from './engine/edgeImageEngine';
export type { EngineOptions, CreateEngineOptions, TransformUrlOptions, AvatarOptions } from './engine/edgeImageEngine';

export { loadConfig, parseConfig, configSchema, FEATURE_NAMES, DEFAULT_BREAKPOINTS } from './config/config';
export type { EngineConfig, FeatureName, TransformDefaults, CacheSettings, LoadConfigOptions } from './config/config';
export { StaticConfigurationSource, takeSnapshot } from './config/configurationSource';
export type { ConfigurationSource, ConfigSnapshot } from './config/configurationSource';

export * from './providers';
export { FeatureGate } from './gate/featureGate';
export { StaticMetadataSource } from './metadata/metadataSource';
export type { MetadataSource, KnownImage, StaticMetadataOptions } from './metadata/metadataSource';
export { createImageRef, isSvgUrl } from './images/imageRef';
export type { ImageRef, Dimensions } from './images/imageRef';

export { ArgumentResolver, IMAGE_CONTEXTS, isFixedContext, isImageContext } from './transform/argumentResolver';
export type { ImageContext } from './transform/argumentResolver';
export { normalizeTransformInput, mergeTransformArgs, serializeTransformArgs } from './transform/transformArgs';
export type { TransformArgs, TransformInput, TransformOverrides, FitMode, ImageFormat, Gravity } from './transform/transformArgs';
export { SrcsetGenerator, selectWidths } from './srcset/srcsetGenerator';
export type { Candidate, SrcsetResult } from './srcset/srcsetGenerator';

export { TransformCache, cacheKeyFor, sourceGroupFor } from './cache/transformCache';
export type { AssetEvent, AssetEventKind, CacheKeyParts, CachedUrl } from './cache/transformCache';
export type { CacheBackend, StoredValue } from './cache/cacheBackend';
export { MemoryBackend } from './cache/memoryBackend';
export { JsonFileBackend } from './cache/jsonFileBackend';

export { MarkupRewriter, IMG_CLASS, PROCESSED_CLASS } from './markup/markupRewriter';
export type { RewriteOptions, RewriteResult, ContentRewriteOptions, ContentRewriteResult, VetoPredicate } from './markup/markupRewriter';
export { HtmlTag, scanTags } from './markup/htmlTag';
export { CONTAINER_CLASS } from './markup/pictureContainer';

export * from './utils/errorHandler';
export { Logger, LogLevel, logger } from './utils/logger';
export type { EngineLogger } from './utils/logger';
