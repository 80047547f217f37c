/**
 * Image security utilities and Sharp configuration
 * Prevents pixel bomb attacks and validates source images before decoding
 */

import sharp from 'sharp';
import * as os from 'os';
import { fromBuffer } from 'file-type';
import { ErrorType, PinComposerError } from '../types';
import { logger } from './logger';
import {
  ALLOWED_IMAGE_FORMATS,
  ALLOWED_MIME_TYPES,
  MAX_FILE_SIZE,
  MAX_IMAGE_HEIGHT,
  MAX_IMAGE_WIDTH,
  MAX_INPUT_PIXELS,
  SHARP_CACHE_CONFIG,
  SHARP_SECURITY_CONFIG,
} from '../constants/security';

let sharpInitialized = false;

/**
 * Apply process-wide Sharp settings once.
 * Called lazily by every decode path; safe to call again.
 */
export function initializeSharpSecurity(): void {
  if (sharpInitialized) {
    return;
  }
  sharpInitialized = true;

  // Bounded concurrency keeps concurrent renders from starving the host
  sharp.concurrency(Math.max(1, Math.min(4, Math.floor(os.cpus().length / 2))));

  // Memory cache only; no file cache
  sharp.cache({
    memory: SHARP_CACHE_CONFIG.memory,
    files: SHARP_CACHE_CONFIG.files,
    items: SHARP_CACHE_CONFIG.items,
  });
}

/**
 * Create a Sharp instance for untrusted bytes with the pixel limit applied
 */
export function createSecureSharp(input: Buffer): sharp.Sharp {
  initializeSharpSecurity();
  return sharp(input, SHARP_SECURITY_CONFIG);
}

/**
 * Validate a source image buffer before processing.
 * Returns the decoded metadata; throws DECODE_ERROR for anything unusable.
 */
export async function validateImageBuffer(imageBuffer: Buffer): Promise<sharp.Metadata> {
  if (imageBuffer.length === 0) {
    throw new PinComposerError(ErrorType.DECODE_ERROR, 'Image buffer is empty');
  }

  if (imageBuffer.length > MAX_FILE_SIZE) {
    throw new PinComposerError(
      ErrorType.DECODE_ERROR,
      `Image file too large: ${imageBuffer.length} bytes. Maximum allowed: ${MAX_FILE_SIZE} bytes.`
    );
  }

  // Hybrid validation: file-type first, magic bytes as fallback
  await validateImageFormat(imageBuffer);

  try {
    const metadata = await createSecureSharp(imageBuffer).metadata();

    if (!metadata.width || !metadata.height) {
      throw new PinComposerError(ErrorType.DECODE_ERROR, 'Could not determine image dimensions');
    }

    if (metadata.width > MAX_IMAGE_WIDTH || metadata.height > MAX_IMAGE_HEIGHT) {
      throw new PinComposerError(
        ErrorType.DECODE_ERROR,
        `Image dimensions too large: ${metadata.width}x${metadata.height}. Maximum allowed: ${MAX_IMAGE_WIDTH}x${MAX_IMAGE_HEIGHT}`
      );
    }

    const totalPixels = metadata.width * metadata.height;
    if (totalPixels > MAX_INPUT_PIXELS) {
      throw new PinComposerError(
        ErrorType.DECODE_ERROR,
        `Image has too many pixels: ${totalPixels}. Maximum allowed: ${MAX_INPUT_PIXELS}`
      );
    }

    if (metadata.format && !ALLOWED_IMAGE_FORMATS.has(metadata.format)) {
      throw new PinComposerError(
        ErrorType.DECODE_ERROR,
        `Unsupported image format detected by Sharp: ${metadata.format}. Allowed formats: ${Array.from(ALLOWED_IMAGE_FORMATS).join(', ')}`
      );
    }

    return metadata;
  } catch (error) {
    if (error instanceof PinComposerError) {
      throw error;
    }

    throw new PinComposerError(
      ErrorType.DECODE_ERROR,
      `Invalid or corrupted image file: ${error instanceof Error ? error.message : String(error)}`,
      error
    );
  }
}

/**
 * Validate image format using file-type, with a magic bytes fallback
 */
export async function validateImageFormat(imageBuffer: Buffer): Promise<void> {
  try {
    const detected = await fromBuffer(imageBuffer);

    if (!detected || !ALLOWED_MIME_TYPES.has(detected.mime)) {
      throw new PinComposerError(
        ErrorType.DECODE_ERROR,
        `Unsupported image format detected by file-type: ${detected?.mime || 'unknown'}. Only JPEG, PNG, WebP, GIF, BMP, and TIFF are supported.`
      );
    }
    return;
  } catch (error) {
    if (error instanceof PinComposerError) {
      throw error;
    }

    logger.warn('file-type validation failed, falling back to magic bytes', {
      operation: 'image-validate',
      error: error instanceof Error ? error : new Error(String(error)),
    });
  }

  if (!hasKnownImageSignature(imageBuffer)) {
    throw new PinComposerError(
      ErrorType.DECODE_ERROR,
      'Unsupported image format detected by magic bytes fallback. Only JPEG, PNG, WebP, GIF, BMP, and TIFF are supported.'
    );
  }
}

/**
 * Check the leading bytes against the signatures of the accepted formats
 */
export function hasKnownImageSignature(imageBuffer: Buffer): boolean {
  const header = imageBuffer.subarray(0, 16);

  const isJPEG = header[0] === 0xff && header[1] === 0xd8;
  const isPNG = header[0] === 0x89 && header[1] === 0x50 && header[2] === 0x4e && header[3] === 0x47;
  const isWebP = header.indexOf(Buffer.from('WEBP')) !== -1;
  const isGIF = header[0] === 0x47 && header[1] === 0x49 && header[2] === 0x46;
  const isBMP = header[0] === 0x42 && header[1] === 0x4d;
  const isTIFF =
    (header[0] === 0x49 && header[1] === 0x49 && header[2] === 0x2a && header[3] === 0x00) ||
    (header[0] === 0x4d && header[1] === 0x4d && header[2] === 0x00 && header[3] === 0x2a);

  return isJPEG || isPNG || isWebP || isGIF || isBMP || isTIFF;
}
