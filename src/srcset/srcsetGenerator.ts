import { ImageRef, intrinsicDimensions } from '../images/imageRef';
import { TransformArgs } from '../transform/transformArgs';
import { InvalidDimensionsError } from '../utils/errorHandler';

export interface Candidate {
  url: string;
  /** `"<width>w"` or `"<n>x"` */
  descriptor: string;
  value: number;
}

export interface SrcsetResult {
  srcset: string;
  sizes: string;
  candidates: Candidate[];
}

/**
 * Produces the URL for one variant, or false when the variant cannot be
 * transformed. The engine routes this through the provider and the cache.
 */
export type CandidateRenderer = (args: TransformArgs) => Promise<string | false>;

export interface GenerateOptions {
  /** Fixed-box contexts get a single 2x candidate. */
  fixed?: boolean;
  sizes?: string;
}

export interface SrcsetGeneratorOptions {
  breakpoints: readonly number[];
  maxWidth: number;
  render: CandidateRenderer;
}

function empty(): SrcsetResult {
  return { srcset: '', sizes: '', candidates: [] };
}

export function formatSrcset(candidates: Candidate[]): string {
  return candidates.map(candidate => `${candidate.url} ${candidate.descriptor}`).join(', ');
}

export function defaultSizes(ceiling: number): string {
  return `(max-width: ${ceiling}px) 100vw, ${ceiling}px`;
}

/**
 * Ascending widths in (0, ceiling]. A width is dropped when it, or its
 * double, was already claimed by a smaller kept width.
 */
export function selectWidths(breakpoints: readonly number[], ceiling: number): number[] {
  const ordered = Array.from(new Set([...breakpoints, ceiling]))
    .map(width => Math.round(width))
    .filter(width => width > 0 && width <= ceiling)
    .sort((a, b) => a - b);

  const seen = new Set<number>();
  const kept: number[] = [];
  for (const width of ordered) {
    if (seen.has(width) || seen.has(width * 2)) {
      continue;
    }
    kept.push(width);
    seen.add(width);
    seen.add(width * 2);
  }
  return kept;
}

export class SrcsetGenerator {
  constructor(private readonly options: SrcsetGeneratorOptions) {}

  async generate(image: ImageRef, baseArgs: TransformArgs, options: GenerateOptions = {}): Promise<SrcsetResult> {
    const intrinsic = intrinsicDimensions(image);
    if (!intrinsic) {
      return empty();
    }

    if (options.fixed) {
      const url = await this.options.render({ ...baseArgs, dpr: 2 });
      if (url === false) {
        return empty();
      }
      const candidates = [{ url, descriptor: '2x', value: 2 }];
      return { srcset: formatSrcset(candidates), sizes: options.sizes ?? '', candidates };
    }

    const ceiling = Math.min(intrinsic.width, this.options.maxWidth, baseArgs.width ?? intrinsic.width);
    if (!(ceiling > 0)) {
      throw new InvalidDimensionsError(`Srcset ceiling ${ceiling} is not positive`, baseArgs.width, baseArgs.height);
    }

    const ratio =
      baseArgs.width !== undefined && baseArgs.height !== undefined
        ? baseArgs.height / baseArgs.width
        : intrinsic.height / intrinsic.width;

    const found: Candidate[] = [];
    for (const width of selectWidths(this.options.breakpoints, ceiling)) {
      const args: TransformArgs = { ...baseArgs, width, height: Math.max(1, Math.round(width * ratio)) };

      const url = await this.options.render({ ...args, dpr: 1 });
      if (url !== false) {
        found.push({ url, descriptor: `${width}w`, value: width });
      }

      if (width * 2 <= ceiling) {
        const doubled = await this.options.render({ ...args, dpr: 2 });
        if (doubled !== false) {
          found.push({ url: doubled, descriptor: `${width * 2}w`, value: width * 2 });
        }
      }
    }

    const candidates = dedupe(found);
    return {
      srcset: formatSrcset(candidates),
      sizes: options.sizes ?? defaultSizes(ceiling),
      candidates,
    };
  }
}

function dedupe(candidates: Candidate[]): Candidate[] {
  const byValue = new Map<number, Candidate>();
  for (const candidate of [...candidates].sort((a, b) => a.value - b.value)) {
    if (!byValue.has(candidate.value)) {
      byValue.set(candidate.value, candidate);
    }
  }
  return Array.from(byValue.values());
}
