/**
 * Composition engine
 * normalize -> enhance -> fit title -> render style -> round corners -> encode
 */

import { ErrorType, FontResolver, isPinStyle, PinComposerError, PinRequest, RenderResult } from '../types';
import { styles } from '../styles/registry';
import { logger, logRenderError } from '../utils/logger';
import { enhanceBackground, normalizeCanvas } from './canvas-normalizer';
import { encodePng } from './layers';
import { resolveFont } from './font-resolver';

export interface RenderOptions {
  /** Font resolver used for every text role; defaults to the file-backed resolver */
  resolve?: FontResolver;
}

/**
 * Render a validated request into a 1000x1500 PNG
 */
export async function renderPin(request: PinRequest, options: RenderOptions = {}): Promise<RenderResult> {
  const style = request.style;
  if (!isPinStyle(style)) {
    throw new PinComposerError(
      ErrorType.STYLE_NOT_RECOGNIZED,
      `Style "${String(request.style)}" is not recognized. Available styles: 1, 2, 3, 4, 5`
    );
  }

  const definition = styles[style];
  const resolve = options.resolve ?? resolveFont;
  logger.debug('Rendering pin', { operation: 'render', style, metadata: { name: definition.config.name } });

  try {
    const background = await enhanceBackground(await normalizeCanvas(request.imageSource));
    const titleLayout = definition.fitTitle(request.title, resolve);
    if (titleLayout.truncated) {
      logger.info('Title truncated to fit', {
        operation: 'render',
        style,
        metadata: { fontSize: titleLayout.fontSize, lines: titleLayout.lines.length },
      });
    }

    const finished = await definition.render(background, titleLayout, request.brandingText, resolve);
    const buffer = await encodePng(finished);

    return {
      buffer,
      format: 'png',
      width: finished.width,
      height: finished.height,
      style,
    };
  } catch (error) {
    const failure =
      error instanceof PinComposerError
        ? error
        : new PinComposerError(
            ErrorType.RENDER_ERROR,
            `Failed to render style ${style}: ${error instanceof Error ? error.message : String(error)}`,
            error
          );
    logRenderError(style, failure);
    throw failure;
  }
}
