export const FIT_MODES = ['cover', 'contain', 'pad', 'scale-down'] as const;
export const IMAGE_FORMATS = ['auto', 'webp', 'avif', 'jpeg', 'png'] as const;
export const GRAVITIES = ['auto', 'center', 'north', 'south', 'east', 'west'] as const;

export type FitMode = (typeof FIT_MODES)[number];
export type ImageFormat = (typeof IMAGE_FORMATS)[number];
export type Gravity = (typeof GRAVITIES)[number];

export const MAX_SHARPEN = 10;
export const MAX_BLUR = 250;

/**
 * Transform intent handed to a provider. Width and height are optional: a
 * missing one means the provider scales proportionally.
 */
export interface TransformArgs {
  width?: number;
  height?: number;
  fit: FitMode;
  format: ImageFormat;
  quality: number;
  gravity: Gravity;
  sharpen: number;
  dpr: number;
  blur?: number;
}

export type TransformOverrides = Partial<TransformArgs>;

/**
 * Loose caller input: full names or the short aliases (w, h, q, f, g),
 * numbers or numeric strings.
 */
export type TransformInput = Record<string, unknown>;

const ALIASES: Record<string, keyof TransformArgs> = {
  w: 'width',
  h: 'height',
  q: 'quality',
  f: 'format',
  g: 'gravity',
};

function isOneOf<T extends string>(values: readonly T[], value: unknown): value is T {
  return typeof value === 'string' && values.some(candidate => candidate === value);
}

function toNumber(value: unknown): number | undefined {
  if (typeof value === 'number') {
    return Number.isFinite(value) ? value : undefined;
  }
  if (typeof value === 'string' && value.trim() !== '') {
    const parsed = Number(value.trim());
    return Number.isFinite(parsed) ? parsed : undefined;
  }
  return undefined;
}

function positiveInt(value: unknown): number | undefined {
  const n = toNumber(value);
  if (n === undefined) return undefined;
  const rounded = Math.round(n);
  return rounded > 0 ? rounded : undefined;
}

function intInRange(value: unknown, min: number, max: number): number | undefined {
  const n = toNumber(value);
  if (n === undefined) return undefined;
  const rounded = Math.round(n);
  return rounded >= min && rounded <= max ? rounded : undefined;
}

/**
 * Normalizes loose input into overrides. Unknown keys and out-of-range
 * values are dropped rather than rejected.
 */
export function normalizeTransformInput(input: TransformInput | undefined): TransformOverrides {
  const out: TransformOverrides = {};
  if (!input) {
    return out;
  }

  for (const [rawKey, value] of Object.entries(input)) {
    if (value === undefined || value === null) continue;
    const key = ALIASES[rawKey] ?? rawKey;

    switch (key) {
      case 'width': {
        const n = positiveInt(value);
        if (n !== undefined) out.width = n;
        break;
      }
      case 'height': {
        const n = positiveInt(value);
        if (n !== undefined) out.height = n;
        break;
      }
      case 'quality': {
        const n = intInRange(value, 1, 100);
        if (n !== undefined) out.quality = n;
        break;
      }
      case 'sharpen': {
        const n = intInRange(value, 0, MAX_SHARPEN);
        if (n !== undefined) out.sharpen = n;
        break;
      }
      case 'blur': {
        const n = intInRange(value, 1, MAX_BLUR);
        if (n !== undefined) out.blur = n;
        break;
      }
      case 'dpr': {
        const n = toNumber(value);
        if (n !== undefined && n > 0) out.dpr = n;
        break;
      }
      case 'fit':
        if (isOneOf(FIT_MODES, value)) out.fit = value;
        break;
      case 'format':
        if (isOneOf(IMAGE_FORMATS, value)) out.format = value;
        break;
      case 'gravity':
        if (isOneOf(GRAVITIES, value)) out.gravity = value;
        break;
      default:
        break;
    }
  }

  return out;
}

/**
 * Copy-on-merge: later layers win, undefined never overwrites.
 */
export function mergeTransformArgs(base: TransformArgs, ...layers: TransformOverrides[]): TransformArgs {
  const merged: TransformArgs = { ...base };
  for (const layer of layers) {
    for (const [key, value] of Object.entries(layer)) {
      if (value !== undefined) {
        Object.assign(merged, { [key]: value });
      }
    }
  }
  return merged;
}

/**
 * Stable `key=value` form with sorted keys, used for cache keys.
 */
export function serializeTransformArgs(args: TransformArgs): string {
  return Object.entries(args)
    .filter(([, value]) => value !== undefined)
    .sort(([a], [b]) => (a < b ? -1 : a > b ? 1 : 0))
    .map(([key, value]) => `${key}=${String(value)}`)
    .join(',');
}

/**
 * Entries sorted by key, skipping undefined values. Providers build their
 * query strings from this so identical args give identical URLs.
 */
export function sortedParams(params: Record<string, string | number | undefined>): Array<[string, string]> {
  return Object.entries(params)
    .filter((entry): entry is [string, string | number] => entry[1] !== undefined)
    .sort(([a], [b]) => (a < b ? -1 : a > b ? 1 : 0))
    .map(([key, value]) => [key, String(value)]);
}
