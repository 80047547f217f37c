/**
 * Font Resolver
 * Loads bundled font files into the canvas font registry and hands out
 * sized font handles, falling back to the generic sans-serif family
 */

import fs from 'fs';
import path from 'path';
import { createCanvas, GlobalFonts, SKRSContext2D } from '@napi-rs/canvas';
import { ErrorType, FontHandle, FontWeight, PinComposerError } from '../types';
import { BUILTIN_ASCENT, BUILTIN_DESCENT, BUILTIN_FONT_FAMILY } from '../constants/fonts';
import { getConfig } from '../config';
import { logFontFallback, logger } from '../utils/logger';

/** font file path -> registered family, or null when registration failed */
const registeredFamilies = new Map<string, string | null>();

/** resolved handles by font dir, chain, size and weight */
const handleCache = new Map<string, FontHandle>();

let measureContext: SKRSContext2D | null = null;

function getMeasureContext(): SKRSContext2D {
  if (!measureContext) {
    measureContext = createCanvas(1, 1).getContext('2d');
  }
  return measureContext;
}

/**
 * Resolve the first loadable font of `candidates` at `size` pixels.
 * Falls back to the built-in font; throws only when no handle can be built at all.
 */
export function resolveFont(
  candidates: readonly string[],
  size: number,
  weight: FontWeight = 'bold'
): FontHandle {
  if (!Number.isFinite(size) || size <= 0) {
    throw new PinComposerError(
      ErrorType.FONT_LOAD_ERROR,
      `Cannot load a font at size ${size}; the built-in default needs a positive pixel size`
    );
  }

  const fontDir = getConfig().fontDir;
  const cacheKey = `${fontDir}|${candidates.join(',')}|${size}|${weight}`;
  const cached = handleCache.get(cacheKey);
  if (cached) {
    return cached;
  }

  let handle: FontHandle | null = null;
  for (const candidate of candidates) {
    const family = registerFontFile(path.join(fontDir, candidate));
    if (family) {
      handle = createCanvasFontHandle(family, size, weight);
      break;
    }
  }

  if (!handle) {
    logFontFallback(candidates, size);
    handle = createBuiltinFontHandle(size, weight);
  }

  handleCache.set(cacheKey, handle);
  return handle;
}

/**
 * Register a font file once; returns its family alias or null when unusable
 */
export function registerFontFile(fontPath: string): string | null {
  const known = registeredFamilies.get(fontPath);
  if (known !== undefined) {
    return known;
  }

  let family: string | null = null;
  if (fs.existsSync(fontPath)) {
    const alias = familyAliasFor(fontPath);
    try {
      family = GlobalFonts.registerFromPath(fontPath, alias) ? alias : null;
      if (!family) {
        logger.warn(`Font file could not be registered`, {
          operation: 'font-register',
          metadata: { path: fontPath },
        });
      }
    } catch (error) {
      logger.warn(`Font file failed to load`, {
        operation: 'font-register',
        error: error instanceof Error ? error : new Error(String(error)),
        metadata: { path: fontPath },
      });
    }
  } else {
    logger.debug(`Bundled font not found`, { operation: 'font-register', metadata: { path: fontPath } });
  }

  registeredFamilies.set(fontPath, family);
  return family;
}

/**
 * Family alias used for a font file, e.g. "pc-LeagueSpartan-Bold"
 */
export function familyAliasFor(fontPath: string): string {
  return `pc-${path.basename(fontPath, path.extname(fontPath))}`;
}

function createCanvasFontHandle(family: string, size: number, weight: FontWeight): FontHandle {
  // the registered face carries its own weight; asking for another would synthesize one
  return createMeasuredHandle(family, size, weight, `${size}px "${family}"`, false);
}

/**
 * Built-in font: the generic sans-serif family, measured by the same canvas that draws it
 */
export function createBuiltinFontHandle(size: number, weight: FontWeight = 'bold'): FontHandle {
  if (!Number.isFinite(size) || size <= 0) {
    throw new PinComposerError(ErrorType.FONT_LOAD_ERROR, `Invalid built-in font size: ${size}`);
  }

  return createMeasuredHandle(BUILTIN_FONT_FAMILY, size, weight, `${weight} ${size}px ${BUILTIN_FONT_FAMILY}`, true);
}

function createMeasuredHandle(
  family: string,
  size: number,
  weight: FontWeight,
  css: string,
  builtin: boolean
): FontHandle {
  const ctx = getMeasureContext();
  ctx.font = css;
  const glyphs = ctx.measureText('Hg');
  const ascent = glyphs.actualBoundingBoxAscent > 0 ? glyphs.actualBoundingBoxAscent : size * BUILTIN_ASCENT;
  const descent = glyphs.actualBoundingBoxDescent > 0 ? glyphs.actualBoundingBoxDescent : size * BUILTIN_DESCENT;

  return Object.freeze({
    family,
    size,
    weight,
    css,
    builtin,
    ascent,
    descent,
    measure(text: string): number {
      const context = getMeasureContext();
      context.font = css;
      return context.measureText(text).width;
    },
  });
}

/**
 * Drop resolved handles (registrations with the canvas registry are permanent)
 */
export function clearFontCache(): void {
  handleCache.clear();
  registeredFamilies.clear();
}

export function getFontCacheStats(): { handles: number; registrations: number } {
  return { handles: handleCache.size, registrations: registeredFamilies.size };
}
