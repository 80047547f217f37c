/**
 * Layer primitives
 *
 * Shapes are SVG overlays rasterized by Sharp at full canvas size, so every
 * layer stays inside the canvas whatever its geometry. Text is drawn with
 * @napi-rs/canvas, which can use the registered font files.
 */

import sharp from 'sharp';
import { createCanvas, SKRSContext2D } from '@napi-rs/canvas';
import {
  Box,
  ButtonConfig,
  Canvas,
  ErrorType,
  FontHandle,
  FontResolver,
  Layer,
  PinComposerError,
  PlacedLine,
  Rgba,
  TextLayout,
  TextShadow,
  TextStroke,
} from '../types';
import { clamp, toCssColor } from '../utils';
import { canvasFromSharp, PIN_DIMENSIONS, sharpFromCanvas } from './canvas-normalizer';
import { fitLine } from './text-fitter';
import { resolveFont } from './font-resolver';

export interface Size {
  width: number;
  height: number;
}

export interface TextStyle {
  color: Rgba;
  shadows: readonly TextShadow[];
  stroke?: TextStroke;
}

/** Horizontal room kept free on each side of a button label */
const BUTTON_LABEL_PADDING = 20;

/**
 * Largest usable corner radius for a rectangle
 */
export function clampRadius(radius: number, width: number, height: number): number {
  return clamp(radius, 0, Math.min(width, height) / 2);
}

/**
 * SVG element for a filled rounded rectangle; `radiusY` gives elliptical corners
 */
export function roundedRectElement(rect: Box, radius: number, fill: Rgba, radiusY: number = radius): string {
  // circular corners share one radius bounded by the shorter side
  const circular = radius === radiusY;
  const rx = circular ? clampRadius(radius, rect.width, rect.height) : clamp(radius, 0, rect.width / 2);
  const ry = circular ? rx : clamp(radiusY, 0, rect.height / 2);
  return `<rect x="${rect.x}" y="${rect.y}" width="${rect.width}" height="${rect.height}" rx="${rx}" ry="${ry}" fill="rgb(${fill.r},${fill.g},${fill.b})" fill-opacity="${alphaOf(fill)}"/>`;
}

/**
 * Wrap SVG elements in a document of the given size
 */
export function svgDocument(size: Size, body: string, defs = ''): Buffer {
  const defsBlock = defs ? `<defs>${defs}</defs>` : '';
  return Buffer.from(
    `<svg width="${size.width}" height="${size.height}" viewBox="0 0 ${size.width} ${size.height}" xmlns="http://www.w3.org/2000/svg">${defsBlock}${body}</svg>`
  );
}

/**
 * Rounded rectangle on a transparent layer of `size`
 */
export function roundedRectLayer(rect: Box, radius: number, fill: Rgba, size: Size = PIN_DIMENSIONS): Layer {
  return {
    input: svgDocument(size, roundedRectElement(rect, radius, fill)),
    left: 0,
    top: 0,
    blend: 'alpha-composite',
  };
}

/**
 * Rectangle with elliptical corners; parts outside the layer are clipped
 */
export function ellipticalRectLayer(
  rect: Box,
  radiusX: number,
  radiusY: number,
  fill: Rgba,
  size: Size = PIN_DIMENSIONS
): Layer {
  return {
    input: svgDocument(size, roundedRectElement(rect, radiusX, fill, radiusY)),
    left: 0,
    top: 0,
    blend: 'alpha-composite',
  };
}

/**
 * Rounded rectangle with a flat drop shadow offset down and to the right
 */
export function shadowedRectLayer(
  rect: Box,
  radius: number,
  fill: Rgba,
  shadow: { offset: number; color: Rgba },
  size: Size = PIN_DIMENSIONS
): Layer {
  const shadowRect = { ...rect, x: rect.x + shadow.offset, y: rect.y + shadow.offset };
  return {
    input: svgDocument(
      size,
      roundedRectElement(shadowRect, radius, shadow.color) + roundedRectElement(rect, radius, fill)
    ),
    left: 0,
    top: 0,
    blend: 'alpha-composite',
  };
}

/**
 * Crop a region of the canvas, blur it and optionally darken it.
 * The region is clipped to the canvas; the panel gets rounded corners when `radius` > 0.
 */
export async function blurredPanel(
  canvas: Canvas,
  region: Box,
  sigma: number,
  options: { darken?: Rgba; radius?: number } = {}
): Promise<Layer> {
  const left = Math.max(0, Math.round(region.x));
  const top = Math.max(0, Math.round(region.y));
  const width = Math.min(canvas.width, Math.round(region.x + region.width)) - left;
  const height = Math.min(canvas.height, Math.round(region.y + region.height)) - top;

  if (width <= 0 || height <= 0) {
    throw new PinComposerError(ErrorType.RENDER_ERROR, 'Blurred panel lies outside the canvas', region);
  }

  const size = { width, height };
  const overlays: sharp.OverlayOptions[] = [];
  if (options.darken) {
    overlays.push({ input: roundedRectLayer({ x: 0, y: 0, width, height }, 0, options.darken, size).input, blend: 'over' });
  }
  if (options.radius && options.radius > 0) {
    overlays.push({ input: cornerMaskSvg(size, options.radius), blend: 'dest-in' });
  }

  // the crop is materialized first so the blur cannot sample outside it
  const cropped = await sharpFromCanvas(canvas).extract({ left, top, width, height }).raw().toBuffer();
  let panel = sharp(cropped, { raw: { width, height, channels: 4 } });
  if (sigma >= 0.3) {
    panel = sharp(await panel.blur(sigma).raw().toBuffer(), { raw: { width, height, channels: 4 } });
  }

  const input = await panel.composite(overlays).png().toBuffer();
  return { input, left, top, blend: 'alpha-composite' };
}

/**
 * Center every line of `layout` horizontally in `box` and the block vertically
 */
export function layoutCenteredBlock(layout: TextLayout, box: Box): PlacedLine[] {
  const blockTop = box.y + (box.height - layout.height) / 2;
  return layout.lines.map((text, index) => ({
    text,
    x: box.x + (box.width - layout.font.measure(text)) / 2,
    baseline: blockTop + index * layout.lineHeight + baselineOffset(layout.font, layout.lineHeight),
  }));
}

/**
 * Distance from the top of a line box to the baseline that centers the glyph extent in it
 */
export function baselineOffset(font: FontHandle, lineHeight: number): number {
  return (lineHeight - (font.ascent + font.descent)) / 2 + font.ascent;
}

/**
 * Text layers: one blurred layer per soft shadow, then a layer with the
 * sharp shadows, the optional outline and the foreground fill
 */
export async function shadowedTextLayers(
  lines: readonly PlacedLine[],
  font: FontHandle,
  style: TextStyle,
  size: Size = PIN_DIMENSIONS
): Promise<Layer[]> {
  if (lines.length === 0) {
    return [];
  }

  const layers: Layer[] = [];

  for (const shadow of style.shadows.filter((s) => s.blur > 0)) {
    const png = await drawText(size, font, (ctx) => fillLines(ctx, lines, shadow.color, shadow.offsetX, shadow.offsetY));
    const blurred = await sharp(png).blur(Math.max(0.3, shadow.blur)).png().toBuffer();
    layers.push({ input: blurred, left: 0, top: 0, blend: 'alpha-composite' });
  }

  const foreground = await drawText(size, font, (ctx) => {
    for (const shadow of style.shadows.filter((s) => s.blur <= 0)) {
      fillLines(ctx, lines, shadow.color, shadow.offsetX, shadow.offsetY);
    }
    if (style.stroke && style.stroke.width > 0) {
      ctx.strokeStyle = toCssColor(style.stroke.color);
      ctx.lineWidth = style.stroke.width * 2;
      ctx.lineJoin = 'round';
      for (const line of lines) {
        ctx.strokeText(line.text, line.x, line.baseline);
      }
    }
    fillLines(ctx, lines, style.color, 0, 0);
  });
  layers.push({ input: foreground, left: 0, top: 0, blend: 'alpha-composite' });

  return layers;
}

async function drawText(size: Size, font: FontHandle, paint: (ctx: SKRSContext2D) => void): Promise<Buffer> {
  const surface = createCanvas(size.width, size.height);
  const ctx = surface.getContext('2d');
  ctx.font = font.css;
  ctx.textBaseline = 'alphabetic';
  ctx.textAlign = 'left';
  paint(ctx);
  return surface.encode('png');
}

function fillLines(ctx: SKRSContext2D, lines: readonly PlacedLine[], color: Rgba, dx: number, dy: number): void {
  ctx.fillStyle = toCssColor(color);
  for (const line of lines) {
    ctx.fillText(line.text, line.x + dx, line.baseline + dy);
  }
}

/**
 * Pill button with drop shadow and a centered label
 */
export async function buttonLayers(
  button: ButtonConfig,
  rect: Box,
  resolve: FontResolver = resolveFont
): Promise<Layer[]> {
  const shape = shadowedRectLayer(rect, button.radius, button.fill, button.shadow);
  const label = fitLine(button.label, rect.width - BUTTON_LABEL_PADDING * 2, button.font, resolve);
  const text = await shadowedTextLayers(layoutCenteredBlock(label, rect), label.font, {
    color: button.textColor,
    shadows: [],
  });
  return [shape, ...text];
}

/**
 * Radial darkening: `innerAlpha` at the center rising linearly to
 * `outerAlpha` at `reach` times the longer side
 */
export function vignetteLayer(innerAlpha: number, outerAlpha: number, reach = 0.7, size: Size = PIN_DIMENSIONS): Layer {
  const radius = Math.max(size.width, size.height) * reach;
  const defs = `<radialGradient id="vignette" gradientUnits="userSpaceOnUse" cx="${size.width / 2}" cy="${size.height / 2}" r="${radius}">
    <stop offset="0" stop-color="#000000" stop-opacity="${round3(innerAlpha / 255)}"/>
    <stop offset="1" stop-color="#000000" stop-opacity="${round3(outerAlpha / 255)}"/>
  </radialGradient>`;
  return {
    input: svgDocument(size, `<rect width="${size.width}" height="${size.height}" fill="url(#vignette)"/>`, defs),
    left: 0,
    top: 0,
    blend: 'alpha-composite',
  };
}

/**
 * Dark blurred frame along the canvas edge, drawn inward so the pin stays opaque
 */
export async function edgeShadowLayer(
  thickness: number,
  color: Rgba,
  sigma: number,
  size: Size = PIN_DIMENSIONS
): Promise<Layer> {
  const frame = `<rect x="0" y="0" width="${size.width}" height="${size.height}" fill="none" stroke="rgb(${color.r},${color.g},${color.b})" stroke-opacity="${alphaOf(color)}" stroke-width="${thickness * 2}"/>`;
  const input = await sharp(svgDocument(size, frame)).blur(Math.max(0.3, sigma)).png().toBuffer();
  return { input, left: 0, top: 0, blend: 'alpha-composite' };
}

function cornerMaskSvg(size: Size, radius: number): Buffer {
  return svgDocument(size, roundedRectElement({ x: 0, y: 0, ...size }, radius, { r: 255, g: 255, b: 255, a: 255 }));
}

/**
 * Rounded-corner mask: multiplies the canvas alpha by a rounded rectangle
 */
export function roundedCornerMaskLayer(radius: number, size: Size = PIN_DIMENSIONS): Layer {
  return { input: cornerMaskSvg(size, radius), left: 0, top: 0, blend: 'mask' };
}

/**
 * Composite layers onto the canvas in order
 */
export async function composeLayers(canvas: Canvas, layers: readonly Layer[]): Promise<Canvas> {
  if (layers.length === 0) {
    return canvas;
  }

  try {
    return await canvasFromSharp(
      sharpFromCanvas(canvas).composite(
        layers.map((layer) => ({
          input: layer.input,
          left: Math.round(layer.left),
          top: Math.round(layer.top),
          blend: layer.blend === 'mask' ? 'dest-in' : 'over',
        }))
      )
    );
  } catch (error) {
    if (error instanceof PinComposerError) {
      throw error;
    }
    throw new PinComposerError(
      ErrorType.RENDER_ERROR,
      `Failed to composite layers: ${error instanceof Error ? error.message : String(error)}`,
      error
    );
  }
}

/**
 * Apply the rounded-corner mask to the finished canvas
 */
export async function applyRoundedCorners(canvas: Canvas, radius: number): Promise<Canvas> {
  if (radius <= 0) {
    return canvas;
  }
  return composeLayers(canvas, [roundedCornerMaskLayer(radius, canvas)]);
}

/**
 * Encode the canvas as PNG
 */
export async function encodePng(canvas: Canvas): Promise<Buffer> {
  try {
    return await sharpFromCanvas(canvas).png({ compressionLevel: 9, adaptiveFiltering: false }).toBuffer();
  } catch (error) {
    throw new PinComposerError(
      ErrorType.ENCODE_ERROR,
      `Failed to encode PNG: ${error instanceof Error ? error.message : String(error)}`,
      error
    );
  }
}

function alphaOf(color: Rgba): number {
  return round3(clamp(color.a, 0, 255) / 255);
}

function round3(value: number): number {
  return Math.round(value * 1000) / 1000;
}
