import { ErrorType, PinComposerError } from '../types';
import { fetchImageBytes, FetchImageOptions, ImageFetcher } from './image-fetcher';
import { GenerateImageOptions } from './runware-client';

export * from './image-fetcher';
export * from './runware-client';

/**
 * Where the source photo comes from: a URL to download or a prompt to generate from
 */
export type ImageSourceSpec = { imageUrl: string } | { imagePrompt: string };

export interface ImageGenerator {
  generateImage(prompt: string, options?: GenerateImageOptions): Promise<Buffer>;
}

export interface ImageSourceDeps {
  fetchImage?: ImageFetcher;
  fetchOptions?: FetchImageOptions;
  /** Required for prompt sources */
  generator?: ImageGenerator;
  generateOptions?: GenerateImageOptions;
}

/**
 * Resolve a source spec to encoded image bytes
 */
export async function resolveImageSource(source: ImageSourceSpec, deps: ImageSourceDeps = {}): Promise<Buffer> {
  if ('imageUrl' in source) {
    const fetchImage = deps.fetchImage ?? fetchImageBytes;
    return fetchImage(source.imageUrl, deps.fetchOptions);
  }

  if (!deps.generator) {
    throw new PinComposerError(
      ErrorType.GENERATION_ERROR,
      'An image generator is required to build a pin from a prompt'
    );
  }
  return deps.generator.generateImage(source.imagePrompt, deps.generateOptions);
}
