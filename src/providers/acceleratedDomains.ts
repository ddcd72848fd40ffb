import { ImageRef, sourcePath } from '../images/imageRef';
import { TransformArgs, sortedParams } from '../transform/transformArgs';
import { EdgeProvider, ProviderConfig, rewriteDomain } from './baseProvider';

/**
 * Accelerated Domains: a path prefix on the site's domain with a regular
 * query string after the image path.
 */
export class AcceleratedDomainsProvider implements EdgeProvider {
  static readonly EDGE_ROOT = '/acd-cgi/img/v1';

  readonly id = 'accelerated-domains' as const;

  usesHostedSubdomain(): boolean {
    return false;
  }

  isConfigured(_config: ProviderConfig): boolean {
    return true;
  }

  buildUrl(image: ImageRef, args: TransformArgs, config: ProviderConfig): string {
    const query = new URLSearchParams(
      sortedParams({
        blur: args.blur,
        dpr: args.dpr !== 1 ? args.dpr : undefined,
        fit: args.fit,
        format: args.format,
        gravity: args.gravity,
        height: args.height,
        quality: args.quality,
        sharpen: args.sharpen > 0 ? args.sharpen : undefined,
        width: args.width,
      })
    );

    return `${rewriteDomain(config, image)}${AcceleratedDomainsProvider.EDGE_ROOT}${sourcePath(image.sourceUrl)}?${query.toString()}`;
  }

  originalUrlOf(url: string, _config: ProviderConfig): string | null {
    const match = /^(.*?)\/acd-cgi\/img\/v1(\/[^?#]*)/.exec(url.trim());
    if (!match) {
      return null;
    }
    return `${match[1] ?? ''}${match[2] ?? ''}`;
  }
}
