/**
 * Type definitions for Pin Composer
 */

/**
 * Identifier of one of the five layout styles
 */
export type PinStyle = 1 | 2 | 3 | 4 | 5;

export const PIN_STYLES: readonly PinStyle[] = Object.freeze([1, 2, 3, 4, 5]);

export function isPinStyle(value: unknown): value is PinStyle {
  return typeof value === 'number' && PIN_STYLES.some((style) => style === value);
}

/**
 * Validated, immutable render request
 */
export interface PinRequest {
  /** Title text (sanitized, never empty) */
  readonly title: string;
  /** Encoded source photo (JPEG, PNG, WebP, GIF, BMP or TIFF) */
  readonly imageSource: Buffer;
  /** Footer/box text, usually a site URL; empty string when absent */
  readonly brandingText: string;
  /** Layout style */
  readonly style: PinStyle;
}

/**
 * Loosely typed request input as it arrives from a host (HTTP body, CLI, queue message)
 */
export interface PinRequestInput {
  title?: unknown;
  imageSource?: unknown;
  brandingText?: unknown;
  style?: unknown;
}

/**
 * 8-bit RGBA color; alpha is 0-255 like the other channels
 */
export interface Rgba {
  r: number;
  g: number;
  b: number;
  a: number;
}

export type FontWeight = 'normal' | 'bold' | '600' | '700' | '800' | '900';

/**
 * Font chain and size range for one text role
 */
export interface FontSpec {
  /** Font file names, tried in order */
  readonly candidates: readonly string[];
  readonly minSize: number;
  readonly maxSize: number;
  readonly weight?: FontWeight;
  /** Line box height as a multiple of the font size */
  readonly lineHeight?: number;
}

/**
 * Loaded font at a fixed pixel size
 */
export interface FontHandle {
  /** Family name registered with the canvas font registry */
  readonly family: string;
  readonly size: number;
  readonly weight: FontWeight;
  /** Canvas `ctx.font` shorthand */
  readonly css: string;
  /** True when no candidate loaded and the generic sans-serif family is in use */
  readonly builtin: boolean;
  /** Distance from the alphabetic baseline to the top of capitals/ascenders */
  readonly ascent: number;
  /** Distance from the alphabetic baseline to the bottom of descenders */
  readonly descent: number;
  /** Advance width of `text` in pixels */
  measure(text: string): number;
}

/**
 * Resolves a font chain at a size; injectable so layout can be tested with exact metrics
 */
export type FontResolver = (
  candidates: readonly string[],
  size: number,
  weight?: FontWeight
) => FontHandle;

/**
 * Result of fitting a string into a box
 */
export interface TextLayout {
  readonly fontSize: number;
  readonly lines: readonly string[];
  /** Line box height in pixels */
  readonly lineHeight: number;
  /** Widest measured line */
  readonly width: number;
  /** lines.length * lineHeight */
  readonly height: number;
  /** True when lines were dropped and the last one ends with an ellipsis */
  readonly truncated: boolean;
  readonly font: FontHandle;
}

export interface Box {
  x: number;
  y: number;
  width: number;
  height: number;
}

/**
 * One line of text positioned on the canvas (left edge and alphabetic baseline)
 */
export interface PlacedLine {
  readonly text: string;
  readonly x: number;
  readonly baseline: number;
}

/**
 * Working bitmap: raw, non-premultiplied RGBA
 */
export interface Canvas {
  readonly data: Buffer;
  readonly width: number;
  readonly height: number;
  readonly channels: 4;
}

/**
 * How a layer combines with what is under it
 * - alpha-composite: source-over
 * - mask: multiplies the canvas alpha by the layer alpha (dest-in)
 */
export type LayerBlend = 'alpha-composite' | 'mask';

/**
 * Intermediate bitmap placed on the canvas
 */
export interface Layer {
  /** PNG or SVG bytes */
  readonly input: Buffer;
  readonly left: number;
  readonly top: number;
  readonly blend: LayerBlend;
}

export interface TextShadow {
  offsetX: number;
  offsetY: number;
  color: Rgba;
  /** Gaussian sigma; 0 keeps the shadow sharp */
  blur: number;
}

export interface TextStroke {
  color: Rgba;
  width: number;
}

export interface ButtonConfig {
  label: string;
  font: FontSpec;
  width: number;
  height: number;
  radius: number;
  fill: Rgba;
  textColor: Rgba;
  shadow: { offset: number; color: Rgba };
}

/**
 * Per-style constants. One record type, five frozen instances.
 */
export interface StyleConfig {
  readonly id: PinStyle;
  readonly name: string;
  /** Radius of the rounded-corner mask applied to the finished pin */
  readonly cornerRadius: number;
  readonly title: {
    readonly font: FontSpec;
    /** Area the title must fit in */
    readonly box: Box;
    readonly color: Rgba;
    readonly shadows: readonly TextShadow[];
    readonly stroke?: TextStroke;
  };
  readonly branding: {
    readonly font: FontSpec;
    readonly color: Rgba;
    readonly shadows: readonly TextShadow[];
  };
  readonly button?: ButtonConfig;
}

/**
 * A style: its frozen config plus the functions that fit its title and draw it
 */
export interface StyleDefinition<TConfig extends StyleConfig = StyleConfig> {
  readonly config: TConfig;
  /** Title layout for this style's box and font range */
  fitTitle(title: string, resolve?: FontResolver): TextLayout;
  render(canvas: Canvas, titleLayout: TextLayout, brandingText: string, resolve?: FontResolver): Promise<Canvas>;
}

/**
 * Output of a render call
 */
export interface RenderResult {
  /** PNG bytes */
  buffer: Buffer;
  format: 'png';
  width: number;
  height: number;
  style: PinStyle;
}

/**
 * Error types
 */
export enum ErrorType {
  /** Input bytes are not a decodable, supported image */
  DECODE_ERROR = 'DECODE_ERROR',
  /** Not even the built-in default font could be created */
  FONT_LOAD_ERROR = 'FONT_LOAD_ERROR',
  /** Style identifier outside 1-5 */
  STYLE_NOT_RECOGNIZED = 'STYLE_NOT_RECOGNIZED',
  /** Final bitmap could not be serialized */
  ENCODE_ERROR = 'ENCODE_ERROR',
  /** Compositing failed */
  RENDER_ERROR = 'RENDER_ERROR',
  /** Invalid request fields */
  VALIDATION_ERROR = 'VALIDATION_ERROR',
  /** Image download failed */
  FETCH_ERROR = 'FETCH_ERROR',
  /** AI image generation failed */
  GENERATION_ERROR = 'GENERATION_ERROR',
}

/**
 * Custom error class for pin composition
 */
export class PinComposerError extends Error {
  type: ErrorType;
  details?: unknown;

  constructor(type: ErrorType, message: string, details?: unknown) {
    super(message);
    this.name = 'PinComposerError';
    this.type = type;
    this.details = details;
  }
}
