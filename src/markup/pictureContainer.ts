import { Dimensions } from '../images/imageRef';
import { HtmlTag } from './htmlTag';

export const CONTAINER_CLASS = 'edge-images-container';

export interface ContainerOptions {
  dimensions: Dimensions;
  maxWidth: number;
  extraClasses?: string[];
}

export function containerStyle({ width, height }: Dimensions, maxWidth: number): string {
  return `--aspect-ratio: ${width}/${height}; --max-width: ${Math.min(width, maxWidth)}px`;
}

/**
 * Wraps already-serialized markup in the sizing container.
 */
export function wrapInContainer(inner: string, options: ContainerOptions): string {
  const picture = HtmlTag.create('picture', {
    class: [CONTAINER_CLASS, ...(options.extraClasses ?? [])].filter(Boolean).join(' '),
    style: containerStyle(options.dimensions, options.maxWidth),
  });
  return `${picture.toString()}${inner}</picture>`;
}
