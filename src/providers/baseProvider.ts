import { ImageRef, sourceOrigin } from '../images/imageRef';
import { TransformArgs } from '../transform/transformArgs';

export const PROVIDER_IDS = ['none', 'cloudflare', 'accelerated-domains', 'imgix', 'bunny', 'imgproxy'] as const;

export type ProviderId = (typeof PROVIDER_IDS)[number];

export function isProviderId(value: unknown): value is ProviderId {
  return typeof value === 'string' && PROVIDER_IDS.some(id => id === value);
}

export interface ProviderConfig {
  provider: ProviderId;
  /** Rewrite domain for path-prefix providers, e.g. https://www.example.test */
  domain?: string;
  /** Account subdomain for hosted providers (imgix, bunny). */
  subdomain?: string;
  /** Base URL of a self-hosted transformer (imgproxy). */
  endpoint?: string;
}

export interface EdgeProvider {
  readonly id: ProviderId;

  /**
   * Whether URLs move to a dedicated host instead of a path prefix on the
   * existing domain.
   */
  usesHostedSubdomain(): boolean;

  /** True when every field `buildUrl` needs is present. */
  isConfigured(config: ProviderConfig): boolean;

  /**
   * Builds the edge URL. Pure string work; throws
   * ProviderMisconfiguredError when a required field is missing.
   */
  buildUrl(image: ImageRef, args: TransformArgs, config: ProviderConfig): string;

  /**
   * The source URL a previously transformed URL was built from, or null
   * when `url` is not one of this provider's URLs.
   */
  originalUrlOf(url: string, config: ProviderConfig): string | null;
}

/**
 * Domain for path-prefix providers: the configured one, else the source's
 * own origin ('' keeps root-relative sources relative).
 */
export function rewriteDomain(config: ProviderConfig, image: ImageRef): string {
  const configured = (config.domain ?? '').trim().replace(/\/+$/, '');
  return configured || sourceOrigin(image.sourceUrl);
}

export function hasValue(value: string | undefined): value is string {
  return typeof value === 'string' && value.trim() !== '';
}

export function escapeRegExp(value: string): string {
  return value.replace(/[.*+?^${}()|[\]\\]/g, '\\$&');
}
