/**
 * Style 4: Panel
 * Photo on top, a dark panel across the bottom holding a gold serif title
 * and a gold branding box with black text
 */

import { Canvas, FontResolver, FontSpec, Rgba, StyleConfig, TextLayout } from '../types';
import { deepFreeze, rgba } from '../utils';
import { DIDONE_SERIF_FONTS, GEOMETRIC_BOLD_FONTS } from '../constants/fonts';
import { PIN_DIMENSIONS } from '../core/canvas-normalizer';
import { fitText } from '../core/text-fitter';
import { roundedRectLayer } from '../core/layers';
import {
  BLACK,
  BrandingBox,
  brandingBoxLayers,
  defineStyle,
  dropShadow,
  finishPin,
  GOLD,
  TITLE_LINE_HEIGHT,
  titleLayers,
} from './shared';

export interface PanelStyleConfig extends StyleConfig {
  readonly panel: {
    readonly height: number;
    readonly fill: Rgba;
    /** Space between the panel top and the title box */
    readonly titleOffset: number;
  };
  /** Titles longer than `threshold` characters are fitted with the compact font range */
  readonly compactTitle: {
    readonly threshold: number;
    readonly font: FontSpec;
  };
  readonly brandingBox: BrandingBox;
}

const PANEL_HEIGHT = 450;
const TITLE_OFFSET = 60;

export const panelStyleConfig: PanelStyleConfig = deepFreeze<PanelStyleConfig>({
  id: 4,
  name: 'panel',
  cornerRadius: 30,
  title: {
    font: { candidates: DIDONE_SERIF_FONTS, minSize: 32, maxSize: 88, weight: 'bold', lineHeight: TITLE_LINE_HEIGHT },
    box: { x: 40, y: PIN_DIMENSIONS.height - PANEL_HEIGHT + TITLE_OFFSET, width: 920, height: 270 },
    color: GOLD,
    shadows: [dropShadow(2, 150)],
  },
  branding: {
    font: { candidates: GEOMETRIC_BOLD_FONTS, minSize: 22, maxSize: 40, weight: 'bold' },
    color: BLACK,
    shadows: [],
  },
  panel: { height: PANEL_HEIGHT, fill: rgba(30, 30, 30, 245), titleOffset: TITLE_OFFSET },
  compactTitle: {
    threshold: 60,
    font: { candidates: DIDONE_SERIF_FONTS, minSize: 24, maxSize: 56, weight: 'bold', lineHeight: TITLE_LINE_HEIGHT },
  },
  brandingBox: {
    fill: rgba(230, 190, 60),
    radius: 5,
    paddingX: 60,
    paddingY: 20,
    bottomMargin: 30,
    emptyWidth: 240,
    opticalOffset: 0,
  },
});

/**
 * Long titles switch to the smaller compact range before fitting
 */
export function fitPanelTitle(title: string, config: PanelStyleConfig, resolve: FontResolver): TextLayout {
  const font = title.trim().length > config.compactTitle.threshold ? config.compactTitle.font : config.title.font;
  return fitText(title, config.title.box, font, resolve);
}

export async function renderPanel(
  canvas: Canvas,
  titleLayout: TextLayout,
  brandingText: string,
  config: PanelStyleConfig,
  resolve: FontResolver
): Promise<Canvas> {
  const panelRect = {
    x: 0,
    y: PIN_DIMENSIONS.height - config.panel.height,
    width: PIN_DIMENSIONS.width,
    height: config.panel.height,
  };

  const layers = [
    roundedRectLayer(panelRect, 0, config.panel.fill),
    ...(await titleLayers(titleLayout, config.title.box, config)),
    ...(await brandingBoxLayers(config.brandingBox, brandingText, config, resolve)),
  ];

  return finishPin(canvas, layers, config.cornerRadius);
}

export const panelStyle = defineStyle(panelStyleConfig, renderPanel, fitPanelTitle);
