import { ImageRef, isAbsoluteUrl, stripQuery } from '../images/imageRef';
import { ProviderMisconfiguredError } from '../utils/errorHandler';
import { FitMode, Gravity, TransformArgs, sortedParams } from '../transform/transformArgs';
import { EdgeProvider, escapeRegExp, hasValue, ProviderConfig, rewriteDomain } from './baseProvider';

const RESIZING_TYPE: Record<FitMode, string> = {
  cover: 'fill',
  contain: 'fit',
  'scale-down': 'fit',
  pad: 'fit',
};

const GRAVITY_MAP: Partial<Record<Gravity, string>> = {
  center: 'ce',
  north: 'no',
  south: 'so',
  east: 'ea',
  west: 'we',
};

/**
 * Self-hosted imgproxy. Processing options are slash-separated path
 * segments, followed by the plain source URL.
 */
export class ImgproxyProvider implements EdgeProvider {
  readonly id = 'imgproxy' as const;

  usesHostedSubdomain(): boolean {
    return true;
  }

  isConfigured(config: ProviderConfig): boolean {
    return hasValue(config.endpoint);
  }

  buildUrl(image: ImageRef, args: TransformArgs, config: ProviderConfig): string {
    if (!hasValue(config.endpoint)) {
      throw new ProviderMisconfiguredError(this.id, 'endpoint');
    }

    const options = sortedParams({
      bl: args.blur,
      dpr: args.dpr !== 1 ? args.dpr : undefined,
      el: args.fit === 'scale-down' ? 0 : undefined,
      ex: args.fit === 'pad' ? 1 : undefined,
      f: args.format !== 'auto' ? args.format : undefined,
      g: GRAVITY_MAP[args.gravity],
      h: args.height,
      q: args.quality,
      rt: RESIZING_TYPE[args.fit],
      sh: args.sharpen > 0 ? args.sharpen / 10 : undefined,
      w: args.width,
    })
      .map(([key, value]) => `${key}:${value}`)
      .join('/');

    const source = isAbsoluteUrl(image.sourceUrl)
      ? stripQuery(image.sourceUrl)
      : `${rewriteDomain(config, image)}${stripQuery(image.sourceUrl)}`;

    return `${this.base(config.endpoint)}/insecure/${options}/plain/${source}`;
  }

  originalUrlOf(url: string, config: ProviderConfig): string | null {
    if (!hasValue(config.endpoint)) {
      return null;
    }
    const pattern = new RegExp(`^${escapeRegExp(this.base(config.endpoint))}/insecure/.*?/plain/(.+)$`);
    const match = pattern.exec(url.trim());
    return match?.[1] ?? null;
  }

  private base(endpoint: string): string {
    return endpoint.trim().replace(/\/+$/, '');
  }
}
