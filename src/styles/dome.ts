/**
 * Style 5: Dome
 * A dark dome rises from the bottom edge, holding a bold white title and
 * a white branding box whose text is optically centered
 */

import { Box, Canvas, FontResolver, Rgba, StyleConfig, TextLayout } from '../types';
import { deepFreeze, rgba } from '../utils';
import { GEOMETRIC_BOLD_FONTS } from '../constants/fonts';
import { ellipticalRectLayer } from '../core/layers';
import {
  BLACK,
  BrandingBox,
  brandingBoxLayers,
  defineStyle,
  dropShadow,
  finishPin,
  TITLE_LINE_HEIGHT,
  titleLayers,
  WHITE,
} from './shared';

export interface DomeStyleConfig extends StyleConfig {
  /** Rounded rectangle wider than the canvas and running past its bottom edge */
  readonly dome: {
    readonly rect: Box;
    readonly radiusX: number;
    readonly radiusY: number;
    readonly fill: Rgba;
  };
  readonly brandingBox: BrandingBox;
}

export const domeStyleConfig: DomeStyleConfig = deepFreeze<DomeStyleConfig>({
  id: 5,
  name: 'dome',
  cornerRadius: 40,
  title: {
    font: { candidates: GEOMETRIC_BOLD_FONTS, minSize: 32, maxSize: 96, weight: 'bold', lineHeight: TITLE_LINE_HEIGHT },
    box: { x: 80, y: 1000, width: 840, height: 320 },
    color: WHITE,
    shadows: [dropShadow(3, 130)],
  },
  branding: {
    font: { candidates: GEOMETRIC_BOLD_FONTS, minSize: 22, maxSize: 40, weight: 'bold' },
    color: BLACK,
    shadows: [],
  },
  dome: {
    rect: { x: -200, y: 900, width: 1400, height: 900 },
    radiusX: 700,
    radiusY: 300,
    fill: rgba(30, 30, 35, 245),
  },
  brandingBox: {
    fill: rgba(255, 255, 255, 245),
    radius: 8,
    paddingX: 60,
    paddingY: 20,
    bottomMargin: 40,
    emptyWidth: 240,
    // glyph boxes sit visually high; nudge the text down
    opticalOffset: 3,
  },
});

export async function renderDome(
  canvas: Canvas,
  titleLayout: TextLayout,
  brandingText: string,
  config: DomeStyleConfig,
  resolve: FontResolver
): Promise<Canvas> {
  const { dome } = config;

  const layers = [
    ellipticalRectLayer(dome.rect, dome.radiusX, dome.radiusY, dome.fill),
    ...(await titleLayers(titleLayout, config.title.box, config)),
    ...(await brandingBoxLayers(config.brandingBox, brandingText, config, resolve)),
  ];

  return finishPin(canvas, layers, config.cornerRadius);
}

export const domeStyle = defineStyle(domeStyleConfig, renderDome);
