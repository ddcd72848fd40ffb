export interface Dimensions {
  width: number;
  height: number;
}

export interface ImageRef {
  readonly sourceUrl: string;
  readonly intrinsicWidth?: number;
  readonly intrinsicHeight?: number;
  readonly isSvg: boolean;
}

// Placeholder base so root-relative sources parse.
const RELATIVE_BASE = 'http://relative.invalid';

export function isSvgUrl(url: string): boolean {
  const trimmed = url.trim();
  if (/^data:image\/svg\+xml/i.test(trimmed)) {
    return true;
  }
  const withoutSuffix = trimmed.split(/[?#]/)[0] ?? '';
  return /\.svg$/i.test(withoutSuffix);
}

export function isDataUri(url: string): boolean {
  return /^data:/i.test(url.trim());
}

export function isAbsoluteUrl(url: string): boolean {
  return /^https?:\/\//i.test(url.trim());
}

export function isPositiveDimension(value: number | undefined): value is number {
  return typeof value === 'number' && Number.isFinite(value) && value > 0;
}

/**
 * Parses a width/height attribute. Only plain positive integers count;
 * percentages and "auto" do not.
 */
export function parseDimension(value: string | null | undefined): number | undefined {
  if (!value) return undefined;
  const trimmed = value.trim().replace(/px$/i, '');
  if (!/^\d+$/.test(trimmed)) return undefined;
  const n = parseInt(trimmed, 10);
  return n > 0 ? n : undefined;
}

export function createImageRef(sourceUrl: string, dimensions?: Partial<Dimensions>): ImageRef {
  const width = dimensions?.width;
  const height = dimensions?.height;
  const known = isPositiveDimension(width) && isPositiveDimension(height);

  return Object.freeze({
    sourceUrl,
    intrinsicWidth: known ? Math.round(width) : undefined,
    intrinsicHeight: known ? Math.round(height) : undefined,
    isSvg: isSvgUrl(sourceUrl),
  });
}

export function intrinsicDimensions(image: ImageRef): Dimensions | undefined {
  if (isPositiveDimension(image.intrinsicWidth) && isPositiveDimension(image.intrinsicHeight)) {
    return { width: image.intrinsicWidth, height: image.intrinsicHeight };
  }
  return undefined;
}

/**
 * The path component of a source URL, without query or fragment.
 */
export function sourcePath(url: string): string {
  try {
    return new URL(url.trim(), RELATIVE_BASE).pathname;
  } catch {
    return '';
  }
}

/**
 * The origin of an absolute source URL, or '' for relative ones.
 */
export function sourceOrigin(url: string): string {
  if (!isAbsoluteUrl(url)) {
    return '';
  }
  try {
    return new URL(url.trim()).origin;
  } catch {
    return '';
  }
}

export function hostOf(url: string): string | undefined {
  if (!isAbsoluteUrl(url)) {
    return undefined;
  }
  try {
    return new URL(url.trim()).hostname.toLowerCase();
  } catch {
    return undefined;
  }
}

/**
 * Drops query and fragment; the original asset never carries transform
 * parameters of its own.
 */
export function stripQuery(url: string): string {
  return url.trim().split(/[?#]/)[0] ?? '';
}
