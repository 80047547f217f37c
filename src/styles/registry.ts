import { PinStyle, StyleDefinition } from '../types';
import { boxedStyle } from './boxed';
import { vignetteStyle } from './vignette';
import { barsStyle } from './bars';
import { panelStyle } from './panel';
import { domeStyle } from './dome';

export const styles: Readonly<Record<PinStyle, StyleDefinition>> = Object.freeze({
  1: boxedStyle,
  2: vignetteStyle,
  3: barsStyle,
  4: panelStyle,
  5: domeStyle,
});
