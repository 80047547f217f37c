/**
 * Style 2: Vignette
 * Outlined golden serif title straight on a vignetted photo, cream button,
 * dark footer with light-gold branding and a soft shadow along the edge
 */

import { Canvas, FontResolver, Rgba, StyleConfig, TextLayout } from '../types';
import { deepFreeze, rgba } from '../utils';
import { DISPLAY_SANS_FONTS, GARAMOND_FONTS } from '../constants/fonts';
import { PIN_DIMENSIONS } from '../core/canvas-normalizer';
import { buttonLayers, edgeShadowLayer, vignetteLayer } from '../core/layers';
import { centeredButtonRect, defineStyle, dropShadow, finishPin, FooterBar, footerLayers, GOLD, TITLE_LINE_HEIGHT, titleLayers } from './shared';

export interface VignetteStyleConfig extends StyleConfig {
  readonly vignette: {
    readonly innerAlpha: number;
    readonly outerAlpha: number;
    /** Radius of the outer stop as a fraction of the longer canvas side */
    readonly reach: number;
  };
  readonly edgeShadow: {
    readonly thickness: number;
    readonly color: Rgba;
    readonly blur: number;
  };
  readonly footer: FooterBar;
  readonly buttonTop: number;
}

export const vignetteStyleConfig: VignetteStyleConfig = deepFreeze<VignetteStyleConfig>({
  id: 2,
  name: 'vignette',
  cornerRadius: 40,
  title: {
    font: { candidates: GARAMOND_FONTS, minSize: 30, maxSize: 84, weight: 'bold', lineHeight: TITLE_LINE_HEIGHT },
    box: { x: 80, y: 80, width: 840, height: 640 },
    color: GOLD,
    shadows: [dropShadow(5, 120, 2), dropShadow(4, 130), dropShadow(3, 150)],
    stroke: { color: rgba(0, 0, 0), width: 1 },
  },
  branding: {
    font: { candidates: DISPLAY_SANS_FONTS, minSize: 20, maxSize: 38, weight: 'bold' },
    color: rgba(255, 240, 180),
    shadows: [],
  },
  button: {
    label: 'Read More',
    font: { candidates: DISPLAY_SANS_FONTS, minSize: 20, maxSize: 33, weight: 'bold' },
    width: 450,
    height: 70,
    radius: 25,
    fill: rgba(230, 220, 180, 240),
    textColor: rgba(90, 80, 50),
    shadow: { offset: 4, color: rgba(0, 0, 0, 90) },
  },
  vignette: { innerAlpha: 40, outerAlpha: 100, reach: 0.7 },
  edgeShadow: { thickness: 18, color: rgba(0, 0, 0, 140), blur: 15 },
  footer: { height: 60, fill: rgba(0, 0, 0, 200) },
  buttonTop: 0.85,
});

export async function renderVignette(
  canvas: Canvas,
  titleLayout: TextLayout,
  brandingText: string,
  config: VignetteStyleConfig,
  resolve: FontResolver
): Promise<Canvas> {
  const { vignette, edgeShadow } = config;
  const textBox = { ...config.title.box, height: titleLayout.height };

  const layers = [
    vignetteLayer(vignette.innerAlpha, vignette.outerAlpha, vignette.reach),
    ...(await titleLayers(titleLayout, textBox, config)),
  ];

  if (config.button) {
    const buttonRect = centeredButtonRect(config.button, PIN_DIMENSIONS.height * config.buttonTop);
    layers.push(...(await buttonLayers(config.button, buttonRect, resolve)));
  }

  layers.push(...(await footerLayers(config.footer, brandingText, config, resolve)));
  layers.push(await edgeShadowLayer(edgeShadow.thickness, edgeShadow.color, edgeShadow.blur));

  return finishPin(canvas, layers, config.cornerRadius);
}

export const vignetteStyle = defineStyle(vignetteStyleConfig, renderVignette);
