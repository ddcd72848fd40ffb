import { EdgeProvider, ProviderId } from './baseProvider';
import { AcceleratedDomainsProvider } from './acceleratedDomains';
import { BunnyProvider } from './bunny';
import { CloudflareProvider } from './cloudflare';
import { ImgixProvider } from './imgix';
import { ImgproxyProvider } from './imgproxy';
import { NoneProvider } from './none';

export * from './baseProvider';
export * from './acceleratedDomains';
export * from './bunny';
export * from './cloudflare';
export * from './imgix';
export * from './imgproxy';
export * from './none';

/**
 * Maps provider ids to their URL builders. Unknown ids resolve to the
 * pass-through provider.
 */
export class ProviderRegistry {
  private providers = new Map<ProviderId, EdgeProvider>();

  constructor(providers: EdgeProvider[] = []) {
    for (const provider of providers) {
      this.register(provider);
    }
  }

  register(provider: EdgeProvider): this {
    this.providers.set(provider.id, provider);
    return this;
  }

  has(id: ProviderId): boolean {
    return this.providers.has(id);
  }

  get(id: ProviderId): EdgeProvider {
    return this.providers.get(id) ?? new NoneProvider();
  }

  ids(): ProviderId[] {
    return Array.from(this.providers.keys());
  }
}

export function createDefaultRegistry(): ProviderRegistry {
  return new ProviderRegistry([
    new NoneProvider(),
    new CloudflareProvider(),
    new AcceleratedDomainsProvider(),
    new ImgixProvider(),
    new BunnyProvider(),
    new ImgproxyProvider(),
  ]);
}
