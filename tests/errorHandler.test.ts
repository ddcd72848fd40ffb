import { describe, it, expect } from 'vitest';
import {
  ConfigError,
  InvalidDimensionsError,
  ProviderMisconfiguredError,
  UnsupportedSourceError,
  handleError,
  toErrorMessage,
  withFallback,
} from '../src/utils/errorHandler';
import { createTestLogger } from './helpers';

describe('handleError', () => {
  it('logs unsupported sources at debug only', () => {
    const logger = createTestLogger();
    handleError(new UnsupportedSourceError('a.svg', 'SVG source'), 'ctx', logger);

    expect(logger.debug).toHaveBeenCalledWith('[ctx] UNSUPPORTED_SOURCE: Unsupported source a.svg: SVG source');
    expect(logger.warn).not.toHaveBeenCalled();
  });

  it('warns for recoverable errors', () => {
    const logger = createTestLogger();
    handleError(new ProviderMisconfiguredError('imgix', 'subdomain'), 'ctx', logger);

    expect(logger.warn).toHaveBeenCalledWith(
      '[ctx] PROVIDER_MISCONFIGURED: Provider "imgix" is missing required field "subdomain"'
    );
    expect(logger.debug).toHaveBeenCalledWith('[ctx] Falling back to untransformed output');
  });

  it('reports unrecoverable and unexpected errors as errors', () => {
    const logger = createTestLogger();
    handleError(new ConfigError('bad'), 'ctx', logger);
    handleError(new Error('boom'), 'ctx', logger);

    expect(logger.error).toHaveBeenNthCalledWith(1, '[ctx] CONFIG_INVALID: bad');
    expect(logger.error).toHaveBeenNthCalledWith(2, '[ctx] Unexpected error: boom');
  });
});

describe('withFallback', () => {
  it('returns the fallback after a failure', async () => {
    const logger = createTestLogger();
    const value = await withFallback(
      async () => {
        throw new InvalidDimensionsError('zero width', 0);
      },
      'original',
      'ctx',
      logger
    );

    expect(value).toBe('original');
    expect(logger.warn).toHaveBeenCalledWith('[ctx] INVALID_DIMENSIONS: zero width');
  });
});

describe('toErrorMessage', () => {
  it('normalizes thrown values', () => {
    expect(toErrorMessage(new Error('x'))).toBe('x');
    expect(toErrorMessage('s')).toBe('s');
    expect(toErrorMessage(42)).toBe('42');
    expect(toErrorMessage(undefined)).toBe('Unknown error');
  });
});
