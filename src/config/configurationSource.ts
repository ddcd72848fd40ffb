import { ProviderConfig, ProviderId } from '../providers/baseProvider';
import { EngineConfig, FeatureName, TransformDefaults } from './config';

/**
 * Where provider choice, max width and feature toggles come from. The
 * settings screen that writes them lives outside this package.
 */
export interface ConfigurationSource {
  getProvider(): ProviderId;
  getProviderConfig(id: ProviderId): ProviderConfig;
  getMaxWidth(): number;
  isFeatureEnabled(name: FeatureName): boolean;
  isTransformationEnabled(): boolean;
  getBreakpoints(): number[];
  getTransformDefaults(): TransformDefaults;
}

export class StaticConfigurationSource implements ConfigurationSource {
  constructor(private readonly config: EngineConfig) {}

  getProvider(): ProviderId {
    return this.config.provider.id;
  }

  getProviderConfig(id: ProviderId): ProviderConfig {
    const { domain, subdomain, endpoint } = this.config.provider;
    return { provider: id, domain, subdomain, endpoint };
  }

  getMaxWidth(): number {
    return this.config.maxWidth;
  }

  isFeatureEnabled(name: FeatureName): boolean {
    return this.config.features[name];
  }

  isTransformationEnabled(): boolean {
    return this.config.enabled;
  }

  getBreakpoints(): number[] {
    return [...this.config.breakpoints];
  }

  getTransformDefaults(): TransformDefaults {
    return { ...this.config.defaults };
  }
}

/**
 * Read-only view of the configuration taken once per engine, so every URL
 * built in one rewrite sees the same settings.
 */
export interface ConfigSnapshot {
  readonly enabled: boolean;
  readonly providerId: ProviderId;
  readonly providerConfig: Readonly<ProviderConfig>;
  readonly maxWidth: number;
  readonly breakpoints: readonly number[];
  readonly defaults: Readonly<TransformDefaults>;
  readonly features: Readonly<Record<FeatureName, boolean>>;
}

export function takeSnapshot(source: ConfigurationSource): ConfigSnapshot {
  const providerId = source.getProvider();
  const features: Record<FeatureName, boolean> = {
    avatars: source.isFeatureEnabled('avatars'),
    picture_wrap: source.isFeatureEnabled('picture_wrap'),
    htaccess_caching: source.isFeatureEnabled('htaccess_caching'),
    cache: source.isFeatureEnabled('cache'),
  };

  return Object.freeze({
    enabled: source.isTransformationEnabled(),
    providerId,
    providerConfig: Object.freeze({ ...source.getProviderConfig(providerId) }),
    maxWidth: source.getMaxWidth(),
    breakpoints: Object.freeze([...source.getBreakpoints()]),
    defaults: Object.freeze({ ...source.getTransformDefaults() }),
    features: Object.freeze(features),
  });
}
