import { ImageRef } from '../images/imageRef';
import { TransformArgs } from '../transform/transformArgs';
import { EdgeProvider, ProviderConfig } from './baseProvider';

/**
 * Pass-through. Selected when no edge is configured; the gate treats it as
 * transformation being switched off.
 */
export class NoneProvider implements EdgeProvider {
  readonly id = 'none' as const;

  usesHostedSubdomain(): boolean {
    return false;
  }

  isConfigured(_config: ProviderConfig): boolean {
    return true;
  }

  buildUrl(image: ImageRef, _args: TransformArgs, _config: ProviderConfig): string {
    return image.sourceUrl;
  }

  originalUrlOf(_url: string, _config: ProviderConfig): string | null {
    return null;
  }
}
