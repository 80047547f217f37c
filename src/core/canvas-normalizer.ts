/**
 * Canvas Normalizer
 * Decodes source bytes into the fixed-size, fully opaque working canvas
 */

import sharp from 'sharp';
import { Canvas, ErrorType, PinComposerError } from '../types';
import { createSecureSharp, validateImageBuffer } from '../utils/image-security';

/** Output size of every pin */
export const PIN_DIMENSIONS = Object.freeze({ width: 1000, height: 1500 });

export interface CoverGeometry {
  scale: number;
  resizeWidth: number;
  resizeHeight: number;
  left: number;
  top: number;
}

/**
 * Scale so the source covers the target on both axes, then center the crop window
 */
export function computeCoverGeometry(
  sourceWidth: number,
  sourceHeight: number,
  targetWidth: number = PIN_DIMENSIONS.width,
  targetHeight: number = PIN_DIMENSIONS.height
): CoverGeometry {
  if (sourceWidth <= 0 || sourceHeight <= 0) {
    throw new PinComposerError(
      ErrorType.DECODE_ERROR,
      `Invalid source dimensions: ${sourceWidth}x${sourceHeight}`
    );
  }

  const scale = Math.max(targetWidth / sourceWidth, targetHeight / sourceHeight);
  // rounding must never leave the scaled image short of the target
  const resizeWidth = Math.max(targetWidth, Math.round(sourceWidth * scale));
  const resizeHeight = Math.max(targetHeight, Math.round(sourceHeight * scale));

  return {
    scale,
    resizeWidth,
    resizeHeight,
    left: Math.floor((resizeWidth - targetWidth) / 2),
    top: Math.floor((resizeHeight - targetHeight) / 2),
  };
}

/**
 * Decode, orient, cover-scale (Lanczos-3) and center-crop `bytes` to a 1000x1500 opaque RGBA canvas
 */
export async function normalizeCanvas(bytes: Buffer): Promise<Canvas> {
  const metadata = await validateImageBuffer(bytes);

  try {
    const width = metadata.width ?? 0;
    const height = metadata.height ?? 0;
    // EXIF orientations 5-8 swap the axes once rotate() has run
    const swapped = (metadata.orientation ?? 1) >= 5;
    const geometry = computeCoverGeometry(swapped ? height : width, swapped ? width : height);

    const { data, info } = await createSecureSharp(bytes)
      .rotate()
      .resize(geometry.resizeWidth, geometry.resizeHeight, {
        kernel: sharp.kernel.lanczos3,
        fit: 'fill',
      })
      .extract({
        left: geometry.left,
        top: geometry.top,
        width: PIN_DIMENSIONS.width,
        height: PIN_DIMENSIONS.height,
      })
      .flatten({ background: '#000000' })
      .ensureAlpha(1)
      .raw()
      .toBuffer({ resolveWithObject: true });

    return checkedCanvas(data, info.width, info.height, info.channels);
  } catch (error) {
    if (error instanceof PinComposerError) {
      throw error;
    }
    throw new PinComposerError(
      ErrorType.DECODE_ERROR,
      `Failed to decode source image: ${error instanceof Error ? error.message : String(error)}`,
      error
    );
  }
}

/**
 * Tonal treatment applied to every background before styling:
 * a vivid pass, then a softer low-contrast pass with a cool tint and a
 * top-to-bottom darkening gradient
 */
export async function enhanceBackground(canvas: Canvas): Promise<Canvas> {
  // contrast 1.1 around mid-grey, saturation 1.15, brightness 1.05
  const vivid = await sharpFromCanvas(canvas)
    .linear(1.1, -(128 * 1.1) + 128)
    .modulate({ brightness: 1.05, saturation: 1.15 })
    .raw()
    .toBuffer({ resolveWithObject: true });

  const softened = await sharp(vivid.data, {
    raw: { width: vivid.info.width, height: vivid.info.height, channels: 4 },
  })
    .linear(0.85, -(128 * 0.85) + 128)
    .composite([{ input: createBackdropOverlay(canvas.width, canvas.height), left: 0, top: 0, blend: 'over' }])
    // background stays fully opaque
    .removeAlpha()
    .ensureAlpha(1)
    .raw()
    .toBuffer({ resolveWithObject: true });

  return checkedCanvas(softened.data, softened.info.width, softened.info.height, softened.info.channels);
}

/**
 * Cool tint plus vertical gradient, as one SVG overlay
 */
function createBackdropOverlay(width: number, height: number): Buffer {
  const svg = `<svg width="${width}" height="${height}" xmlns="http://www.w3.org/2000/svg">
  <defs>
    <linearGradient id="fade" x1="0" y1="0" x2="0" y2="1">
      <stop offset="0" stop-color="#000000" stop-opacity="0"/>
      <stop offset="0.5" stop-color="#000000" stop-opacity="0.029"/>
      <stop offset="1" stop-color="#000000" stop-opacity="0.088"/>
    </linearGradient>
  </defs>
  <rect width="${width}" height="${height}" fill="rgb(66,66,77)" fill-opacity="0.098"/>
  <rect width="${width}" height="${height}" fill="url(#fade)"/>
</svg>`;
  return Buffer.from(svg);
}

/**
 * Wrap a raw canvas in a Sharp pipeline
 */
export function sharpFromCanvas(canvas: Canvas): sharp.Sharp {
  return sharp(canvas.data, {
    raw: { width: canvas.width, height: canvas.height, channels: canvas.channels },
  });
}

/**
 * Read a Sharp pipeline back into a raw RGBA canvas
 */
export async function canvasFromSharp(pipeline: sharp.Sharp): Promise<Canvas> {
  const { data, info } = await pipeline.ensureAlpha().raw().toBuffer({ resolveWithObject: true });
  return checkedCanvas(data, info.width, info.height, info.channels);
}

function checkedCanvas(data: Buffer, width: number, height: number, channels: number): Canvas {
  if (width !== PIN_DIMENSIONS.width || height !== PIN_DIMENSIONS.height || channels !== 4) {
    throw new PinComposerError(
      ErrorType.RENDER_ERROR,
      `Unexpected canvas geometry ${width}x${height}x${channels}`
    );
  }
  return { data, width, height, channels: 4 };
}
