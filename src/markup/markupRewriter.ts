import { FeatureGate } from '../gate/featureGate';
import {
  Dimensions,
  ImageRef,
  createImageRef,
  intrinsicDimensions,
  isDataUri,
  isSvgUrl,
  parseDimension,
} from '../images/imageRef';
import { MetadataSource } from '../metadata/metadataSource';
import { EdgeProvider, ProviderConfig } from '../providers/baseProvider';
import { ArgumentResolver, ImageContext, isFixedContext } from '../transform/argumentResolver';
import { TransformArgs, TransformInput } from '../transform/transformArgs';
import { SrcsetGenerator } from '../srcset/srcsetGenerator';
import { CachedUrl } from '../cache/transformCache';
import { UnsupportedSourceError, handleError } from '../utils/errorHandler';
import { EngineLogger } from '../utils/logger';
import { HtmlTag, TagToken, scanTags } from './htmlTag';
import { wrapInContainer } from './pictureContainer';

export const IMG_CLASS = 'edge-images-img';
export const PROCESSED_CLASS = 'edge-images-processed';

/** Lets an integration keep its own images untouched. */
export type VetoPredicate = (tag: HtmlTag, context: ImageContext) => boolean;

export type UrlRenderer = (image: ImageRef, args: TransformArgs, context: ImageContext) => Promise<CachedUrl>;

export interface RewriterDependencies {
  gate: FeatureGate;
  metadata: MetadataSource;
  provider: EdgeProvider;
  providerConfig: ProviderConfig;
  resolver: ArgumentResolver;
  breakpoints: readonly number[];
  maxWidth: number;
  renderUrl: UrlRenderer;
  veto?: VetoPredicate;
  logger: EngineLogger;
}

export interface RewriteOptions {
  context?: ImageContext;
  args?: TransformInput;
  sizes?: string;
  /** Used when neither attributes nor metadata give a size. */
  fallbackDimensions?: Dimensions;
  containerClass?: string;
  /** Further container classes, e.g. those of an enclosing `<figure>`. */
  extraClasses?: string[];
  /** Overrides the picture_wrap feature for this call. */
  wrap?: boolean;
}

export interface RewriteResult {
  html: string;
  /** The final `<img>` markup */
  tag: string;
  container?: string;
  transformed: boolean;
}

export interface ContentRewriteOptions extends RewriteOptions {
  signal?: AbortSignal;
}

export interface ContentRewriteResult {
  html: string;
  transformedCount: number;
  aborted: boolean;
}

interface LocatedImage {
  img: TagToken;
  tag: HtmlTag;
  link?: { open: TagToken; close: TagToken };
  insidePicture: boolean;
}

function unsupportedReason(url: string): string {
  if (isSvgUrl(url)) return 'SVG source';
  if (isDataUri(url)) return 'data URI';
  return 'not served from this site';
}

/**
 * Rewrites `<img>` markup to edge URLs: locate the tag, skip or extract
 * its link, compute attributes, then wrap or replace in place.
 */
export class MarkupRewriter {
  constructor(private readonly deps: RewriterDependencies) {}

  async rewrite(fragment: string, options: RewriteOptions = {}): Promise<RewriteResult> {
    let unchanged: RewriteResult = { html: fragment, tag: '', transformed: false };
    try {
      const located = this.locate(fragment);
      if (!located) {
        return unchanged;
      }
      unchanged = { ...unchanged, tag: located.img.raw };
      return (await this.transform(fragment, located, options)) ?? unchanged;
    } catch (error) {
      handleError(error, 'MarkupRewriter', this.deps.logger);
      return unchanged;
    }
  }

  /**
   * Rewrites every `<img>` in a larger fragment, one at a time. An aborted
   * signal stops the walk between images and keeps the work done so far.
   */
  async rewriteContent(html: string, options: ContentRewriteOptions = {}): Promise<ContentRewriteResult> {
    const { signal, ...rewriteOptions } = options;
    const tokens = Array.from(scanTags(html));
    let out = '';
    let cursor = 0;
    let transformedCount = 0;
    let aborted = false;
    let anchor: TagToken | undefined;
    let pictureDepth = 0;
    const figures: string[][] = [];

    for (let i = 0; i < tokens.length; i++) {
      const token = tokens[i];
      if (!token) continue;

      if (token.name === 'figure') {
        if (token.closing) {
          figures.pop();
        } else {
          figures.push(HtmlTag.parse(token.raw)?.classList() ?? []);
        }
        continue;
      }
      if (token.name === 'picture') {
        pictureDepth = Math.max(0, pictureDepth + (token.closing ? -1 : 1));
        continue;
      }
      if (token.name === 'a') {
        anchor = token.closing ? undefined : token;
        continue;
      }
      if (token.name !== 'img' || token.closing || token.start < cursor) {
        continue;
      }
      if (signal?.aborted) {
        aborted = true;
        break;
      }

      let start = token.start;
      let end = token.end;
      if (anchor && anchor.start >= cursor) {
        const nextIndex = tokens.findIndex((next, j) => j > i && (next.name === 'a' || next.name === 'img'));
        const next = tokens[nextIndex];
        if (next && next.name === 'a' && next.closing) {
          start = anchor.start;
          end = next.end;
          anchor = undefined;
          i = nextIndex;
        }
      }

      const figureClasses = figures[figures.length - 1] ?? [];
      const result = await this.rewrite(html.slice(start, end), {
        ...rewriteOptions,
        extraClasses: [...(rewriteOptions.extraClasses ?? []), ...figureClasses],
        wrap: pictureDepth > 0 ? false : rewriteOptions.wrap,
      });
      out += html.slice(cursor, start) + result.html;
      cursor = end;
      if (result.transformed) transformedCount++;
    }

    if (aborted) {
      this.deps.logger.debug(`[MarkupRewriter] Aborted after ${transformedCount} image(s)`);
    }
    return { html: out + html.slice(cursor), transformedCount, aborted };
  }

  private locate(fragment: string): LocatedImage | null {
    const tokens = Array.from(scanTags(fragment));
    const imgIndex = tokens.findIndex(token => token.name === 'img' && !token.closing);
    const img = tokens[imgIndex];
    const tag = img ? HtmlTag.parse(img.raw) : null;
    if (!img || !tag) {
      return null;
    }

    let anchor: TagToken | undefined;
    let pictureDepth = 0;
    for (const token of tokens.slice(0, imgIndex)) {
      if (token.name === 'a') anchor = token.closing ? undefined : token;
      if (token.name === 'picture') pictureDepth = Math.max(0, pictureDepth + (token.closing ? -1 : 1));
    }

    let link: LocatedImage['link'];
    if (anchor) {
      const close = tokens.slice(imgIndex + 1).find(token => token.name === 'a');
      if (close && close.closing) {
        link = { open: anchor, close };
      }
    }
    return { img, tag, link, insidePicture: pictureDepth > 0 };
  }

  private async transform(fragment: string, located: LocatedImage, options: RewriteOptions): Promise<RewriteResult | null> {
    const { gate, provider, providerConfig, resolver, renderUrl, logger } = this.deps;
    const { tag, img, link } = located;
    const context = options.context ?? 'content';

    if (tag.hasClass(PROCESSED_CLASS)) {
      return null;
    }
    const rawSrc = (tag.getAttribute('src') ?? '').trim();
    if (!rawSrc || !gate.transformationGloballyEnabled()) {
      return null;
    }

    // Drop a previous transformation so it is not stacked
    const src = provider.originalUrlOf(rawSrc, providerConfig) ?? rawSrc;
    if (!gate.shouldTransformUrl(src)) {
      throw new UnsupportedSourceError(src, unsupportedReason(src));
    }
    if (this.deps.veto?.(tag, context)) {
      logger.debug(`[MarkupRewriter] Skipped ${src}: vetoed`);
      return null;
    }

    const image = createImageRef(src, await this.intrinsicFor(tag, src, context, options.fallbackDimensions));
    const intrinsic = intrinsicDimensions(image);
    const args = resolver.resolve(context, options.args, intrinsic);

    const primary = await renderUrl(image, args, context);
    if (primary === false) {
      return null;
    }

    const generator = new SrcsetGenerator({
      breakpoints: this.deps.breakpoints,
      maxWidth: this.deps.maxWidth,
      render: variant => renderUrl(image, variant, context),
    });
    const { srcset, sizes } = await generator.generate(image, args, {
      fixed: isFixedContext(context),
      sizes: options.sizes,
    });

    tag.setAttribute('src', primary);
    if (srcset) {
      tag.setAttribute('srcset', srcset);
      if (sizes) tag.setAttribute('sizes', sizes);
    } else {
      tag.removeAttribute('srcset').removeAttribute('sizes');
    }

    const display = this.displayDimensions(context, args, intrinsic);
    if (display) {
      tag.setAttribute('width', String(display.width)).setAttribute('height', String(display.height));
    }
    tag.addClass(IMG_CLASS, PROCESSED_CLASS);
    const newTag = tag.toString();

    const wrap = (options.wrap ?? gate.pictureWrapEnabled()) && display !== undefined && !located.insidePicture;
    if (!wrap || !display) {
      return {
        html: fragment.slice(0, img.start) + newTag + fragment.slice(img.end),
        tag: newTag,
        transformed: true,
      };
    }

    const start = link ? link.open.start : img.start;
    const end = link ? link.close.end : img.end;
    const inner = link
      ? fragment.slice(link.open.start, img.start) + newTag + fragment.slice(img.end, link.close.end)
      : newTag;
    const container = wrapInContainer(inner, {
      dimensions: display,
      maxWidth: this.deps.maxWidth,
      extraClasses: Array.from(new Set([options.containerClass ?? '', ...(options.extraClasses ?? [])])),
    });

    return {
      html: fragment.slice(0, start) + container + fragment.slice(end),
      tag: newTag,
      container,
      transformed: true,
    };
  }

  /**
   * Source size from the tag's attributes, then metadata, then the caller's
   * fallback. In fixed boxes the attributes give the box, not the source,
   * so they are not read.
   */
  private async intrinsicFor(
    tag: HtmlTag,
    src: string,
    context: ImageContext,
    fallback?: Dimensions
  ): Promise<Dimensions | undefined> {
    if (!isFixedContext(context)) {
      const width = parseDimension(tag.getAttribute('width'));
      const height = parseDimension(tag.getAttribute('height'));
      if (width !== undefined && height !== undefined) {
        return { width, height };
      }
    }

    const identity = await this.deps.metadata.resolveIdentityFromUrl(src);
    if (identity !== null) {
      const found = await this.deps.metadata.getIntrinsicDimensions(identity);
      if (found) return found;
    }
    return fallback;
  }

  /**
   * Content images keep their intrinsic size in the attributes; fixed boxes
   * advertise the box.
   */
  private displayDimensions(
    context: ImageContext,
    args: TransformArgs,
    intrinsic: Dimensions | undefined
  ): Dimensions | undefined {
    if (!isFixedContext(context)) {
      return intrinsic;
    }
    if (args.width === undefined) {
      return intrinsic;
    }
    return { width: args.width, height: args.height ?? args.width };
  }
}
