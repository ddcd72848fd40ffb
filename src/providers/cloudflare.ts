import { ImageRef, sourcePath } from '../images/imageRef';
import { Gravity, TransformArgs, sortedParams } from '../transform/transformArgs';
import { EdgeProvider, ProviderConfig, rewriteDomain } from './baseProvider';

const GRAVITY_MAP: Record<Gravity, string> = {
  auto: 'auto',
  center: '0.5x0.5',
  north: 'top',
  south: 'bottom',
  east: 'right',
  west: 'left',
};

/**
 * Cloudflare Image Resizing: options sit in the path, comma separated,
 * ahead of the image path on the site's own domain.
 */
export class CloudflareProvider implements EdgeProvider {
  static readonly EDGE_ROOT = '/cdn-cgi/image/';
  static readonly SEPARATOR = ',';

  readonly id = 'cloudflare' as const;

  usesHostedSubdomain(): boolean {
    return false;
  }

  isConfigured(_config: ProviderConfig): boolean {
    return true;
  }

  buildUrl(image: ImageRef, args: TransformArgs, config: ProviderConfig): string {
    const options = sortedParams({
      blur: args.blur,
      dpr: args.dpr !== 1 ? args.dpr : undefined,
      fit: args.fit,
      format: args.format,
      gravity: GRAVITY_MAP[args.gravity],
      height: args.height,
      metadata: 'none',
      onerror: 'redirect',
      quality: args.quality,
      sharpen: args.sharpen > 0 ? args.sharpen : undefined,
      width: args.width,
    })
      .map(([key, value]) => `${key}=${value}`)
      .join(CloudflareProvider.SEPARATOR);

    return `${rewriteDomain(config, image)}${CloudflareProvider.EDGE_ROOT}${options}${sourcePath(image.sourceUrl)}`;
  }

  originalUrlOf(url: string, _config: ProviderConfig): string | null {
    const match = /^(.*?)\/cdn-cgi\/image\/[^/]+(\/[^?#]*)/.exec(url.trim());
    if (!match) {
      return null;
    }
    return `${match[1] ?? ''}${match[2] ?? ''}`;
  }
}
