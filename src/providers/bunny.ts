import { hostOf, ImageRef, sourcePath } from '../images/imageRef';
import { ProviderMisconfiguredError } from '../utils/errorHandler';
import { Gravity, TransformArgs, sortedParams } from '../transform/transformArgs';
import { EdgeProvider, hasValue, ProviderConfig } from './baseProvider';

const GRAVITY_MAP: Partial<Record<Gravity, string>> = {
  center: 'center',
  north: 'north',
  south: 'south',
  east: 'east',
  west: 'west',
};

/**
 * Bunny Optimizer on a pull zone (`<subdomain>.b-cdn.net`). There is no dpr
 * parameter, so density is folded into the requested size.
 */
export class BunnyProvider implements EdgeProvider {
  static readonly EDGE_ROOT = '.b-cdn.net';

  readonly id = 'bunny' as const;

  usesHostedSubdomain(): boolean {
    return true;
  }

  isConfigured(config: ProviderConfig): boolean {
    return hasValue(config.subdomain);
  }

  buildUrl(image: ImageRef, args: TransformArgs, config: ProviderConfig): string {
    if (!hasValue(config.subdomain)) {
      throw new ProviderMisconfiguredError(this.id, 'subdomain');
    }

    const width = args.width !== undefined ? Math.round(args.width * args.dpr) : undefined;
    const height = args.height !== undefined ? Math.round(args.height * args.dpr) : undefined;
    const cropping = args.fit === 'cover' && width !== undefined && height !== undefined;

    const query = new URLSearchParams(
      sortedParams({
        aspect_ratio: cropping ? `${width}:${height}` : undefined,
        blur: args.blur,
        crop_gravity: cropping ? GRAVITY_MAP[args.gravity] : undefined,
        format: args.format !== 'auto' ? args.format : undefined,
        height,
        quality: args.quality,
        sharpen: args.sharpen > 0 ? 'true' : undefined,
        width,
      })
    );

    return `https://${config.subdomain.trim()}${BunnyProvider.EDGE_ROOT}${sourcePath(image.sourceUrl)}?${query.toString()}`;
  }

  originalUrlOf(url: string, config: ProviderConfig): string | null {
    if (!hasValue(config.subdomain)) {
      return null;
    }
    if (hostOf(url) !== `${config.subdomain.trim().toLowerCase()}${BunnyProvider.EDGE_ROOT}`) {
      return null;
    }
    const domain = (config.domain ?? '').trim().replace(/\/+$/, '');
    return `${domain}${sourcePath(url)}`;
  }
}
