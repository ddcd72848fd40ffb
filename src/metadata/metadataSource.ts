import { Dimensions, hostOf, isAbsoluteUrl, isDataUri, isPositiveDimension, stripQuery } from '../images/imageRef';

type Awaitable<T> = T | Promise<T>;

/**
 * The attachment store that knows original image sizes. Lookups may hit a
 * database, so they are allowed to be async.
 */
export interface MetadataSource {
  getIntrinsicDimensions(identity: string): Awaitable<Dimensions | null>;
  resolveIdentityFromUrl(url: string): Awaitable<string | null>;
  isLocalUrl(url: string): boolean;
}

export interface KnownImage {
  url: string;
  width: number;
  height: number;
  /** Attachment id; defaults to the URL without its query string. */
  id?: string;
}

export interface StaticMetadataOptions {
  /** Hostnames served by the origin. Root-relative URLs are always local. */
  localHosts?: string[];
  images?: KnownImage[];
}

/**
 * In-memory metadata, indexed by id and by URL.
 */
export class StaticMetadataSource implements MetadataSource {
  private localHosts: Set<string>;
  private dimensionsById = new Map<string, Dimensions>();
  private idByUrl = new Map<string, string>();

  constructor(options: StaticMetadataOptions = {}) {
    this.localHosts = new Set((options.localHosts ?? []).map(host => host.trim().toLowerCase()));
    for (const image of options.images ?? []) {
      this.addImage(image);
    }
  }

  addImage(image: KnownImage): this {
    if (!isPositiveDimension(image.width) || !isPositiveDimension(image.height)) {
      return this;
    }
    const url = stripQuery(image.url);
    const id = image.id ?? url;
    this.dimensionsById.set(id, { width: Math.round(image.width), height: Math.round(image.height) });
    this.idByUrl.set(url, id);
    return this;
  }

  removeImage(url: string): boolean {
    const key = stripQuery(url);
    const id = this.idByUrl.get(key);
    if (id === undefined) {
      return false;
    }
    this.idByUrl.delete(key);
    this.dimensionsById.delete(id);
    return true;
  }

  getIntrinsicDimensions(identity: string): Dimensions | null {
    const found = this.dimensionsById.get(identity);
    return found ? { ...found } : null;
  }

  resolveIdentityFromUrl(url: string): string | null {
    return this.idByUrl.get(stripQuery(url)) ?? null;
  }

  isLocalUrl(url: string): boolean {
    const trimmed = url.trim();
    if (!trimmed || isDataUri(trimmed) || trimmed.startsWith('//')) {
      return false;
    }
    if (!isAbsoluteUrl(trimmed)) {
      return trimmed.startsWith('/');
    }
    const host = hostOf(trimmed);
    return host !== undefined && this.localHosts.has(host);
  }
}
