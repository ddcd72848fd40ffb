import { Dimensions, isPositiveDimension } from '../images/imageRef';
import { TransformDefaults } from '../config/config';
import { InvalidDimensionsError } from '../utils/errorHandler';
import {
  MAX_SHARPEN,
  TransformArgs,
  TransformInput,
  TransformOverrides,
  mergeTransformArgs,
  normalizeTransformInput,
} from './transformArgs';

export const IMAGE_CONTEXTS = ['content', 'avatar', 'schema', 'social', 'sitemap'] as const;
export type ImageContext = (typeof IMAGE_CONTEXTS)[number];

export const DEFAULT_AVATAR_SIZE = 96;
export const SHARE_IMAGE_SIZE: Dimensions = { width: 1200, height: 675 };

const CONTEXT_DEFAULTS: Record<ImageContext, TransformOverrides> = {
  content: {},
  avatar: { width: DEFAULT_AVATAR_SIZE, height: DEFAULT_AVATAR_SIZE, fit: 'cover', sharpen: 1 },
  schema: { ...SHARE_IMAGE_SIZE, fit: 'cover' },
  social: { ...SHARE_IMAGE_SIZE, fit: 'cover' },
  sitemap: { ...SHARE_IMAGE_SIZE, fit: 'cover' },
};

/**
 * Fixed-box contexts render one known size; only `content` is responsive.
 */
export function isFixedContext(context: ImageContext): boolean {
  return context !== 'content';
}

export function isImageContext(value: unknown): value is ImageContext {
  return typeof value === 'string' && IMAGE_CONTEXTS.some(context => context === value);
}

export interface ResolverOptions {
  defaults: TransformDefaults;
  maxWidth: number;
}

function scaleTo(args: TransformArgs, width: number): void {
  if (args.width !== undefined && args.height !== undefined) {
    args.height = Math.max(1, Math.round((args.height * width) / args.width));
  }
  args.width = width;
}

function scaleToHeight(args: TransformArgs, height: number): void {
  if (args.width !== undefined && args.height !== undefined) {
    args.width = Math.max(1, Math.round((args.width * height) / args.height));
  }
  args.height = height;
}

/**
 * The single place transform arguments get their defaults. Callers beat
 * context defaults, which beat the global defaults; the intrinsic floor
 * and max-width ceiling still bound responsive widths afterwards.
 */
export class ArgumentResolver {
  constructor(private readonly options: ResolverOptions) {}

  resolve(
    context: ImageContext,
    callerArgs: TransformInput | undefined,
    intrinsic?: Dimensions
  ): TransformArgs {
    const { defaults } = this.options;
    const caller = normalizeTransformInput(callerArgs);
    const base: TransformArgs = {
      fit: defaults.fit,
      format: defaults.format,
      quality: defaults.quality,
      gravity: defaults.gravity,
      sharpen: 0,
      dpr: 1,
    };

    const args = mergeTransformArgs(base, CONTEXT_DEFAULTS[context], caller);

    if (isFixedContext(context)) {
      this.applyFixedBox(context, args, caller, intrinsic);
    } else {
      this.applyResponsive(args, caller, intrinsic);
    }

    if (!isPositiveDimension(args.width)) {
      throw new InvalidDimensionsError(`Resolved width for ${context} is not positive`, args.width, args.height);
    }
    if (args.height !== undefined && !isPositiveDimension(args.height)) {
      throw new InvalidDimensionsError(`Resolved height for ${context} is not positive`, args.width, args.height);
    }
    return args;
  }

  private applyResponsive(args: TransformArgs, caller: TransformOverrides, intrinsic?: Dimensions): void {
    const known =
      intrinsic && isPositiveDimension(intrinsic.width) && isPositiveDimension(intrinsic.height)
        ? intrinsic
        : undefined;

    if (args.width === undefined) {
      if (known) {
        args.width = known.width;
        args.height = args.height ?? known.height;
      } else {
        args.width = this.options.maxWidth;
      }
    } else if (args.height === undefined && known) {
      args.height = Math.round((args.width * known.height) / known.width);
    }

    const mayUpscale = caller.fit === 'pad' || caller.fit === 'contain';
    if (known && !mayUpscale) {
      if (args.width > known.width) {
        scaleTo(args, known.width);
      }
      if (args.height !== undefined && args.height > known.height) {
        scaleToHeight(args, known.height);
      }
    }
    if (args.width > this.options.maxWidth) {
      scaleTo(args, this.options.maxWidth);
    }
  }

  private applyFixedBox(
    context: ImageContext,
    args: TransformArgs,
    caller: TransformOverrides,
    intrinsic?: Dimensions
  ): void {
    // Avatars stay square when the caller gives only one side.
    if (context === 'avatar') {
      if (caller.width !== undefined && caller.height === undefined) {
        args.height = caller.width;
      } else if (caller.height !== undefined && caller.width === undefined) {
        args.width = caller.height;
      }
    }

    if (!intrinsic || args.width === undefined) {
      return;
    }
    const smaller =
      intrinsic.width < args.width || (args.height !== undefined && intrinsic.height < args.height);
    if (smaller) {
      if (caller.fit !== 'contain') {
        args.fit = 'pad';
      }
      args.sharpen = Math.min(args.sharpen + 1, MAX_SHARPEN);
    }
  }
}
