/**
 * Font fallback chains, one per text role.
 * Entries are file names looked up in the configured font directory. Every
 * chain ends with DEFAULT_FONT_FILE, which ships in the package's fonts/
 * directory; the resolver falls back to BUILTIN_FONT_FAMILY when none of them loads.
 */

export const BUILTIN_FONT_FAMILY = 'sans-serif';

export const DEFAULT_FONT_FILE = 'DejaVuSans-Bold.ttf';

export const DISPLAY_SANS_FONTS = [
  'LeagueSpartan-Bold.ttf',
  'Montserrat-Bold.ttf',
  'PoetsenOne-Regular.ttf',
  'Lato-Bold.ttf',
  'OpenSans-Bold.ttf',
  'Poppins-Bold.ttf',
  'arialbd.ttf',
  'Arial-Bold.ttf',
  DEFAULT_FONT_FILE,
] as const;

export const GARAMOND_FONTS = [
  'EBGaramond-Bold.ttf',
  'LeagueSpartan-Bold.ttf',
  'Montserrat-Bold.ttf',
  DEFAULT_FONT_FILE,
] as const;

export const ROUNDED_HEAVY_FONTS = [
  'Nunito-ExtraBold.ttf',
  'Montserrat-ExtraBold.ttf',
  'OpenSans-ExtraBold.ttf',
  'Lato-Bold.ttf',
  'Poppins-Bold.ttf',
  DEFAULT_FONT_FILE,
] as const;

export const DIDONE_SERIF_FONTS = [
  'Vidaloka-Regular.ttf',
  'PlayfairDisplay-Bold.ttf',
  'Merriweather-Bold.ttf',
  'Times New Roman Bold.ttf',
  'Georgia Bold.ttf',
  DEFAULT_FONT_FILE,
] as const;

export const GEOMETRIC_BOLD_FONTS = [
  'LeagueSpartan-Bold.ttf',
  'Montserrat-Bold.ttf',
  'OpenSans-Bold.ttf',
  'Lato-Bold.ttf',
  'Arial-Bold.ttf',
  'arialbd.ttf',
  DEFAULT_FONT_FILE,
] as const;

/** Vertical metrics used when a face reports no glyph bounds, as a fraction of the font size */
export const BUILTIN_ASCENT = 0.76;
export const BUILTIN_DESCENT = 0.22;
