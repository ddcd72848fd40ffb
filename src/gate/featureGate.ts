import { ConfigSnapshot } from '../config/configurationSource';
import { FeatureName } from '../config/config';
import { isDataUri, isSvgUrl } from '../images/imageRef';
import { MetadataSource } from '../metadata/metadataSource';
import { ProviderRegistry } from '../providers';

/**
 * Read-only predicates over one configuration snapshot.
 */
export class FeatureGate {
  constructor(
    private readonly snapshot: ConfigSnapshot,
    private readonly registry: ProviderRegistry,
    private readonly metadata: Pick<MetadataSource, 'isLocalUrl'>
  ) {}

  providerConfigured(): boolean {
    const { providerId, providerConfig } = this.snapshot;
    return this.registry.get(providerId).isConfigured(providerConfig);
  }

  transformationGloballyEnabled(): boolean {
    return this.snapshot.enabled && this.snapshot.providerId !== 'none' && this.providerConfigured();
  }

  pictureWrapEnabled(): boolean {
    return this.featureEnabled('picture_wrap');
  }

  featureEnabled(name: FeatureName): boolean {
    return this.snapshot.features[name];
  }

  shouldTransformUrl(url: string | null | undefined): boolean {
    if (!url || url.trim() === '') {
      return false;
    }
    if (isSvgUrl(url) || isDataUri(url)) {
      return false;
    }
    return this.metadata.isLocalUrl(url);
  }
}
