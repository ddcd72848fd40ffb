import { describe, it, expect } from 'vitest';
import { FeatureGate } from '../src/gate/featureGate';
import { StaticMetadataSource } from '../src/metadata/metadataSource';
import { createDefaultRegistry } from '../src/providers';
import { testSnapshot } from './helpers';

const metadata = new StaticMetadataSource({ localHosts: ['site.test'] });

function gate(raw: Record<string, unknown> = {}): FeatureGate {
  return new FeatureGate(testSnapshot(raw), createDefaultRegistry(), metadata);
}

describe('FeatureGate', () => {
  it('is off for the pass-through provider', () => {
    expect(gate().transformationGloballyEnabled()).toBe(false);
  });

  it('needs an enabled and configured provider', () => {
    expect(gate({ provider: { id: 'cloudflare' } }).transformationGloballyEnabled()).toBe(true);
    expect(gate({ provider: { id: 'cloudflare' }, enabled: false }).transformationGloballyEnabled()).toBe(false);

    const imgix = gate({ provider: { id: 'imgix' } });
    expect(imgix.providerConfigured()).toBe(false);
    expect(imgix.transformationGloballyEnabled()).toBe(false);
  });

  it('exposes feature flags with their defaults', () => {
    const defaults = gate();
    expect(defaults.featureEnabled('avatars')).toBe(true);
    expect(defaults.featureEnabled('htaccess_caching')).toBe(false);
    expect(defaults.featureEnabled('cache')).toBe(true);
    expect(defaults.pictureWrapEnabled()).toBe(false);
    expect(gate({ features: { picture_wrap: true } }).pictureWrapEnabled()).toBe(true);
  });

  it('only transforms local raster URLs', () => {
    const check = gate();
    expect(check.shouldTransformUrl('')).toBe(false);
    expect(check.shouldTransformUrl(undefined)).toBe(false);
    expect(check.shouldTransformUrl('https://site.test/logo.svg?v=2')).toBe(false);
    expect(check.shouldTransformUrl('data:image/png;base64,AAAA')).toBe(false);
    expect(check.shouldTransformUrl('https://site.test/a.jpg')).toBe(true);
    expect(check.shouldTransformUrl('/uploads/a.jpg')).toBe(true);
    expect(check.shouldTransformUrl('https://other.test/a.jpg')).toBe(false);
    expect(check.shouldTransformUrl('//site.test/a.jpg')).toBe(false);
  });
});

describe('StaticMetadataSource', () => {
  it('looks up dimensions by URL, ignoring the query', () => {
    const source = new StaticMetadataSource({
      images: [{ url: 'https://site.test/a.jpg', width: 1200, height: 800, id: '42' }],
    });

    expect(source.resolveIdentityFromUrl('https://site.test/a.jpg?ver=3')).toBe('42');
    expect(source.getIntrinsicDimensions('42')).toEqual({ width: 1200, height: 800 });
    expect(source.resolveIdentityFromUrl('https://site.test/b.jpg')).toBeNull();
  });

  it('ignores images without a positive size and forgets removed ones', () => {
    const source = new StaticMetadataSource();
    source.addImage({ url: '/zero.jpg', width: 0, height: 10 }).addImage({ url: '/a.jpg', width: 10, height: 10 });

    expect(source.resolveIdentityFromUrl('/zero.jpg')).toBeNull();
    expect(source.removeImage('/a.jpg')).toBe(true);
    expect(source.getIntrinsicDimensions('/a.jpg')).toBeNull();
  });
});
