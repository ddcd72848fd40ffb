import { hostOf, ImageRef, sourcePath } from '../images/imageRef';
import { ProviderMisconfiguredError } from '../utils/errorHandler';
import { FitMode, Gravity, TransformArgs, sortedParams } from '../transform/transformArgs';
import { EdgeProvider, hasValue, ProviderConfig } from './baseProvider';

const FIT_MAP: Record<FitMode, string> = {
  cover: 'crop',
  contain: 'fit',
  'scale-down': 'max',
  pad: 'fill',
};

const CROP_MAP: Partial<Record<Gravity, string>> = {
  center: 'center',
  north: 'top',
  south: 'bottom',
  east: 'right',
  west: 'left',
};

/**
 * imgix: images are served from `<subdomain>.imgix.net` with the original
 * path and a standard query string.
 * https://docs.imgix.com/apis/rendering
 */
export class ImgixProvider implements EdgeProvider {
  static readonly EDGE_ROOT = '.imgix.net';

  readonly id = 'imgix' as const;

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

    const query = new URLSearchParams(
      sortedParams({
        auto: args.format === 'auto' ? 'format,compress' : undefined,
        blur: args.blur,
        crop: CROP_MAP[args.gravity],
        cs: 'srgb',
        dpr: args.dpr,
        fit: FIT_MAP[args.fit],
        fm: args.format !== 'auto' ? args.format : undefined,
        h: args.height,
        q: args.quality,
        // imgix sharpening runs 0-100
        sharp: args.sharpen > 0 ? args.sharpen * 10 : undefined,
        w: args.width,
      })
    );

    return `https://${config.subdomain.trim()}${ImgixProvider.EDGE_ROOT}${sourcePath(image.sourceUrl)}?${query.toString()}`;
  }

  originalUrlOf(url: string, config: ProviderConfig): string | null {
    if (!hasValue(config.subdomain)) {
      return null;
    }
    if (hostOf(url) !== `${config.subdomain.trim().toLowerCase()}${ImgixProvider.EDGE_ROOT}`) {
      return null;
    }
    const domain = (config.domain ?? '').trim().replace(/\/+$/, '');
    return `${domain}${sourcePath(url)}`;
  }
}
