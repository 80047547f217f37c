/**
 * Building blocks shared by the style renderers
 */

import {
  Box,
  ButtonConfig,
  Canvas,
  FontResolver,
  FontSpec,
  Layer,
  Rgba,
  StyleConfig,
  StyleDefinition,
  TextLayout,
  TextShadow,
} from '../types';
import { rgba } from '../utils';
import { fitLine, fitText } from '../core/text-fitter';
import { resolveFont } from '../core/font-resolver';
import { PIN_DIMENSIONS } from '../core/canvas-normalizer';
import {
  applyRoundedCorners,
  composeLayers,
  layoutCenteredBlock,
  roundedRectLayer,
  shadowedTextLayers,
} from '../core/layers';

export const GOLD = rgba(215, 189, 69);
export const WHITE = rgba(255, 255, 255);
export const BLACK = rgba(0, 0, 0);

export const TITLE_LINE_HEIGHT = 1.25;

/** Horizontal margin kept between branding text and the canvas edge */
export const BRANDING_MARGIN = 40;

/**
 * Flat (unblurred) text shadow offset equally on both axes
 */
export function dropShadow(offset: number, alpha: number, blur = 0): TextShadow {
  return { offsetX: offset, offsetY: offset, color: rgba(0, 0, 0, alpha), blur };
}

export interface FooterBar {
  height: number;
  fill: Rgba;
}

export interface BrandingBox {
  fill: Rgba;
  radius: number;
  /** Total horizontal padding around the text */
  paddingX: number;
  /** Total vertical padding around the text */
  paddingY: number;
  /** Gap between the box and the bottom edge */
  bottomMargin: number;
  /** Box width drawn when there is no branding text */
  emptyWidth: number;
  /** Added to the metric-centered baseline, in pixels */
  opticalOffset: number;
}

type RenderFn<TConfig extends StyleConfig> = (
  canvas: Canvas,
  titleLayout: TextLayout,
  brandingText: string,
  config: TConfig,
  resolve: FontResolver
) => Promise<Canvas>;

/**
 * Bind a frozen config to its renderer; the title is fitted to the config's box unless `fitTitle` is given
 */
export function defineStyle<TConfig extends StyleConfig>(
  config: TConfig,
  render: RenderFn<TConfig>,
  fitTitle?: (title: string, config: TConfig, resolve: FontResolver) => TextLayout
): StyleDefinition<TConfig> {
  return Object.freeze({
    config,
    fitTitle(title: string, resolve: FontResolver = resolveFont): TextLayout {
      return fitTitle ? fitTitle(title, config, resolve) : fitTitleToBox(title, config, resolve);
    },
    render(canvas: Canvas, titleLayout: TextLayout, brandingText: string, resolve: FontResolver = resolveFont) {
      return render(canvas, titleLayout, brandingText, config, resolve);
    },
  });
}

export function fitTitleToBox(title: string, config: StyleConfig, resolve: FontResolver): TextLayout {
  return fitText(title, config.title.box, config.title.font, resolve);
}

/**
 * Title lines centered in `box`, drawn with the style's color, shadows and outline
 */
export function titleLayers(layout: TextLayout, box: Box, config: StyleConfig): Promise<Layer[]> {
  return shadowedTextLayers(layoutCenteredBlock(layout, box), layout.font, {
    color: config.title.color,
    shadows: config.title.shadows,
    stroke: config.title.stroke,
  });
}

/**
 * Button rectangle centered horizontally with its top edge at `top`
 */
export function centeredButtonRect(button: ButtonConfig, top: number): Box {
  return {
    x: Math.round((PIN_DIMENSIONS.width - button.width) / 2),
    y: Math.round(top),
    width: button.width,
    height: button.height,
  };
}

/**
 * Fit branding text on one line within the canvas margins; null when there is none
 */
export function fitBranding(
  brandingText: string,
  spec: FontSpec,
  maxWidth: number,
  resolve: FontResolver
): TextLayout | null {
  return brandingText.trim() ? fitLine(brandingText, maxWidth, spec, resolve) : null;
}

/**
 * Full-width bar at the bottom with the branding text centered in it
 */
export async function footerLayers(
  bar: FooterBar,
  brandingText: string,
  config: StyleConfig,
  resolve: FontResolver
): Promise<Layer[]> {
  const rect = { x: 0, y: PIN_DIMENSIONS.height - bar.height, width: PIN_DIMENSIONS.width, height: bar.height };
  const layers: Layer[] = [roundedRectLayer(rect, 0, bar.fill)];

  const branding = fitBranding(brandingText, config.branding.font, PIN_DIMENSIONS.width - BRANDING_MARGIN * 2, resolve);
  if (branding) {
    layers.push(
      ...(await shadowedTextLayers(layoutCenteredBlock(branding, rect), branding.font, {
        color: config.branding.color,
        shadows: config.branding.shadows,
      }))
    );
  }
  return layers;
}

/**
 * Geometry of a branding box sized to its text and centered horizontally near the bottom edge
 */
export function brandingBoxRect(box: BrandingBox, branding: TextLayout | null, emptyTextHeight: number): Box {
  const textWidth = branding ? branding.width : box.emptyWidth - box.paddingX;
  const textHeight = branding ? branding.font.ascent + branding.font.descent : emptyTextHeight;
  const width = Math.round(textWidth + box.paddingX);
  const height = Math.round(textHeight + box.paddingY);
  return {
    x: Math.round((PIN_DIMENSIONS.width - width) / 2),
    y: PIN_DIMENSIONS.height - box.bottomMargin - height,
    width,
    height,
  };
}

/**
 * Filled box with the branding text centered on its glyph extent, shifted by the optical offset
 */
export async function brandingBoxLayers(
  box: BrandingBox,
  brandingText: string,
  config: StyleConfig,
  resolve: FontResolver
): Promise<Layer[]> {
  const spec = config.branding.font;
  const maxTextWidth = PIN_DIMENSIONS.width - BRANDING_MARGIN * 2 - box.paddingX;
  const branding = fitBranding(brandingText, spec, maxTextWidth, resolve);
  const reference = resolve(spec.candidates, spec.maxSize, spec.weight);
  const rect = brandingBoxRect(box, branding, reference.ascent + reference.descent);

  const layers: Layer[] = [roundedRectLayer(rect, box.radius, box.fill)];
  if (!branding) {
    return layers;
  }

  const glyphHeight = branding.font.ascent + branding.font.descent;
  const line = {
    text: branding.lines[0],
    x: rect.x + (rect.width - branding.width) / 2,
    baseline: rect.y + (rect.height - glyphHeight) / 2 + branding.font.ascent + box.opticalOffset,
  };
  layers.push(
    ...(await shadowedTextLayers([line], branding.font, {
      color: config.branding.color,
      shadows: config.branding.shadows,
    }))
  );
  return layers;
}

/**
 * Composite the stack and cut the rounded corners
 */
export async function finishPin(canvas: Canvas, layers: readonly Layer[], cornerRadius: number): Promise<Canvas> {
  return applyRoundedCorners(await composeLayers(canvas, layers), cornerRadius);
}
