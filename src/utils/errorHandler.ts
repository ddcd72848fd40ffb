import { EngineLogger, logger as defaultLogger } from './logger';

export type EdgeImageErrorCode =
  | 'PROVIDER_MISCONFIGURED'
  | 'INVALID_DIMENSIONS'
  | 'UNSUPPORTED_SOURCE'
  | 'CACHE_UNAVAILABLE'
  | 'CONFIG_INVALID';

export class EdgeImageError extends Error {
  constructor(
    message: string,
    public code: EdgeImageErrorCode,
    public recoverable: boolean = true
  ) {
    super(message);
    this.name = 'EdgeImageError';
  }
}

/**
 * A provider is missing a field it cannot build URLs without (subdomain, endpoint).
 */
export class ProviderMisconfiguredError extends EdgeImageError {
  constructor(public providerId: string, public missingField: string) {
    super(`Provider "${providerId}" is missing required field "${missingField}"`, 'PROVIDER_MISCONFIGURED');
    this.name = 'ProviderMisconfiguredError';
  }
}

export class InvalidDimensionsError extends EdgeImageError {
  constructor(message: string, public width?: number, public height?: number) {
    super(message, 'INVALID_DIMENSIONS');
    this.name = 'InvalidDimensionsError';
  }
}

/**
 * SVGs, data URIs and remote sources. Always a silent skip.
 */
export class UnsupportedSourceError extends EdgeImageError {
  constructor(public sourceUrl: string, public reason: string) {
    super(`Unsupported source ${sourceUrl}: ${reason}`, 'UNSUPPORTED_SOURCE');
    this.name = 'UnsupportedSourceError';
  }
}

export class CacheUnavailableError extends EdgeImageError {
  constructor(operation: string, public cause?: unknown) {
    super(`Cache ${operation} failed: ${toErrorMessage(cause)}`, 'CACHE_UNAVAILABLE');
    this.name = 'CacheUnavailableError';
  }
}

export class ConfigError extends EdgeImageError {
  constructor(message: string, public issues: string[] = []) {
    super(message, 'CONFIG_INVALID', false);
    this.name = 'ConfigError';
  }
}

export function toErrorMessage(error: unknown): string {
  if (error instanceof Error) {
    return error.message;
  }
  if (typeof error === 'string') {
    return error;
  }
  return error === undefined ? 'Unknown error' : String(error);
}

/**
 * Handles errors with appropriate logging. Unsupported sources are expected
 * and only show up at debug level.
 */
export function handleError(error: unknown, context: string, log: EngineLogger = defaultLogger): void {
  if (error instanceof UnsupportedSourceError) {
    log.debug(`[${context}] ${error.code}: ${error.message}`);
    return;
  }
  if (error instanceof EdgeImageError) {
    const line = `[${context}] ${error.code}: ${error.message}`;
    if (error.recoverable) {
      log.warn(line);
      log.debug(`[${context}] Falling back to untransformed output`);
    } else {
      log.error(line);
    }
    return;
  }
  log.error(`[${context}] Unexpected error: ${toErrorMessage(error)}`);
  if (error instanceof Error && error.stack) {
    log.debug(`[${context}] Stack trace: ${error.stack}`);
  }
}

/**
 * Runs `fn` and returns `fallback` on any failure, after reporting it.
 */
export async function withFallback<T>(
  fn: () => Promise<T>,
  fallback: T,
  context: string,
  log: EngineLogger = defaultLogger
): Promise<T> {
  try {
    return await fn();
  } catch (error) {
    handleError(error, context, log);
    return fallback;
  }
}
