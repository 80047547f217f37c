/**
 * Style 3: Bars
 * Dark bars across the top and bottom; the top bar grows with the title,
 * the bottom one carries the branding, and a button sits just above it
 */

import { Canvas, FontResolver, Rgba, StyleConfig, TextLayout } from '../types';
import { clamp, deepFreeze, rgba } from '../utils';
import { DISPLAY_SANS_FONTS, ROUNDED_HEAVY_FONTS } from '../constants/fonts';
import { PIN_DIMENSIONS } from '../core/canvas-normalizer';
import { buttonLayers, roundedRectLayer } from '../core/layers';
import { centeredButtonRect, defineStyle, dropShadow, finishPin, footerLayers, TITLE_LINE_HEIGHT, titleLayers, WHITE } from './shared';

export interface BarsStyleConfig extends StyleConfig {
  readonly bars: {
    readonly fill: Rgba;
    /** Space above and below the title inside the top bar */
    readonly titlePadding: number;
    readonly topMinHeight: number;
    readonly topMaxHeight: number;
    readonly bottomHeight: number;
  };
  /** Gap between the button and the bottom bar */
  readonly buttonGap: number;
}

export const barsStyleConfig: BarsStyleConfig = deepFreeze<BarsStyleConfig>({
  id: 3,
  name: 'bars',
  cornerRadius: 60,
  title: {
    font: { candidates: ROUNDED_HEAVY_FONTS, minSize: 28, maxSize: 80, weight: '800', lineHeight: TITLE_LINE_HEIGHT },
    // at most the top bar's maximum height minus its padding
    box: { x: 50, y: 50, width: 900, height: 220 },
    color: WHITE,
    shadows: [dropShadow(2, 100)],
  },
  branding: {
    font: { candidates: DISPLAY_SANS_FONTS, minSize: 30, maxSize: 56, weight: 'bold' },
    color: WHITE,
    shadows: [dropShadow(3, 150)],
  },
  button: {
    label: 'Read More',
    font: { candidates: DISPLAY_SANS_FONTS, minSize: 20, maxSize: 33, weight: 'bold' },
    width: 450,
    height: 70,
    radius: 25,
    fill: rgba(220, 220, 220, 240),
    textColor: rgba(50, 50, 50),
    shadow: { offset: 4, color: rgba(0, 0, 0, 90) },
  },
  bars: {
    fill: rgba(33, 33, 35, 240),
    titlePadding: 50,
    topMinHeight: 170,
    topMaxHeight: 320,
    bottomHeight: 180,
  },
  buttonGap: 30,
});

/**
 * Top bar height: the title block plus padding, kept within the configured bounds
 */
export function topBarHeight(titleLayout: TextLayout, config: BarsStyleConfig): number {
  const { bars } = config;
  return Math.round(clamp(titleLayout.height + bars.titlePadding * 2, bars.topMinHeight, bars.topMaxHeight));
}

export async function renderBars(
  canvas: Canvas,
  titleLayout: TextLayout,
  brandingText: string,
  config: BarsStyleConfig,
  resolve: FontResolver
): Promise<Canvas> {
  const { bars } = config;
  const topHeight = topBarHeight(titleLayout, config);
  const topBar = { x: 0, y: 0, width: PIN_DIMENSIONS.width, height: topHeight };

  const layers = [
    roundedRectLayer(topBar, 0, bars.fill),
    ...(await titleLayers(titleLayout, { ...topBar, x: config.title.box.x, width: config.title.box.width }, config)),
  ];

  if (config.button) {
    const buttonTop = PIN_DIMENSIONS.height - bars.bottomHeight - config.button.height - config.buttonGap;
    layers.push(...(await buttonLayers(config.button, centeredButtonRect(config.button, buttonTop), resolve)));
  }

  layers.push(...(await footerLayers({ height: bars.bottomHeight, fill: bars.fill }, brandingText, config, resolve)));

  return finishPin(canvas, layers, config.cornerRadius);
}

export const barsStyle = defineStyle(barsStyleConfig, renderBars);
