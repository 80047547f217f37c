/**
 * Style 1: Boxed
 * Gold title in a translucent black rounded box near the top, a light
 * "Read More" button and a black footer bar with gold branding
 */

import { Box, Canvas, FontResolver, Rgba, StyleConfig, TextLayout } from '../types';
import { deepFreeze, rgba } from '../utils';
import { DISPLAY_SANS_FONTS } from '../constants/fonts';
import { PIN_DIMENSIONS } from '../core/canvas-normalizer';
import { blurredPanel, buttonLayers, shadowedRectLayer } from '../core/layers';
import { centeredButtonRect, defineStyle, dropShadow, finishPin, FooterBar, footerLayers, GOLD, TITLE_LINE_HEIGHT, titleLayers } from './shared';

export interface BoxedStyleConfig extends StyleConfig {
  readonly panel: {
    /** Space between the text block and the box edge, left/right */
    readonly paddingX: number;
    /** Space above the text block; the space below is 80% of it */
    readonly paddingY: number;
    readonly radius: number;
    readonly fill: Rgba;
    readonly shadow: { readonly offset: number; readonly color: Rgba };
    /** Blur applied to the photo behind the box */
    readonly backdropBlur: number;
  };
  readonly footer: FooterBar;
  /** Button top as a fraction of the canvas height */
  readonly buttonTop: number;
}

export const boxedStyleConfig: BoxedStyleConfig = deepFreeze<BoxedStyleConfig>({
  id: 1,
  name: 'boxed',
  cornerRadius: 60,
  title: {
    font: { candidates: DISPLAY_SANS_FONTS, minSize: 30, maxSize: 84, weight: 'bold', lineHeight: TITLE_LINE_HEIGHT },
    box: { x: 60, y: 80, width: 880, height: 640 },
    color: GOLD,
    shadows: [dropShadow(3, 150)],
  },
  branding: {
    font: { candidates: DISPLAY_SANS_FONTS, minSize: 20, maxSize: 36, weight: 'bold' },
    color: GOLD,
    shadows: [],
  },
  button: {
    label: 'Read More',
    font: { candidates: DISPLAY_SANS_FONTS, minSize: 20, maxSize: 33, weight: 'bold' },
    width: 450,
    height: 70,
    radius: 25,
    fill: rgba(200, 200, 200, 240),
    textColor: rgba(80, 80, 80),
    shadow: { offset: 4, color: rgba(0, 0, 0, 90) },
  },
  panel: {
    paddingX: 50,
    paddingY: 35,
    radius: 25,
    fill: rgba(0, 0, 0, 180),
    shadow: { offset: 5, color: rgba(0, 0, 0, 70) },
    backdropBlur: 6,
  },
  footer: { height: 60, fill: rgba(0, 0, 0, 200) },
  buttonTop: 0.88,
});

/**
 * Box around the title block: text width plus side padding, clipped to the canvas
 */
export function titlePanelRect(layout: TextLayout, config: BoxedStyleConfig): Box {
  const { title, panel } = config;
  const left = Math.max(0, Math.floor(title.box.x + (title.box.width - layout.width) / 2 - panel.paddingX));
  const right = Math.min(PIN_DIMENSIONS.width, Math.ceil(title.box.x + (title.box.width + layout.width) / 2 + panel.paddingX));
  const top = Math.max(0, title.box.y - panel.paddingY);
  const bottom = Math.min(PIN_DIMENSIONS.height, Math.ceil(title.box.y + layout.height + panel.paddingY * 0.8));
  return { x: left, y: top, width: right - left, height: bottom - top };
}

export async function renderBoxed(
  canvas: Canvas,
  titleLayout: TextLayout,
  brandingText: string,
  config: BoxedStyleConfig,
  resolve: FontResolver
): Promise<Canvas> {
  const panelRect = titlePanelRect(titleLayout, config);
  // the title hangs from the top of its box rather than centering in it
  const textBox = { ...config.title.box, height: titleLayout.height };

  const layers = [
    await blurredPanel(canvas, panelRect, config.panel.backdropBlur, { radius: config.panel.radius }),
    shadowedRectLayer(panelRect, config.panel.radius, config.panel.fill, config.panel.shadow),
    ...(await titleLayers(titleLayout, textBox, config)),
  ];

  if (config.button) {
    const buttonRect = centeredButtonRect(config.button, PIN_DIMENSIONS.height * config.buttonTop);
    layers.push(...(await buttonLayers(config.button, buttonRect, resolve)));
  }

  layers.push(...(await footerLayers(config.footer, brandingText, config, resolve)));

  return finishPin(canvas, layers, config.cornerRadius);
}

export const boxedStyle = defineStyle(boxedStyleConfig, renderBoxed);
