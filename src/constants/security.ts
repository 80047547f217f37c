/**
 * Centralized limits for decoding untrusted images and fetching them
 * All security-related limits and configurations in one place
 */

// =============================================================================
// IMAGE DECODING CONSTANTS
// =============================================================================

/** Maximum allowed pixels for a source image (64 megapixels) */
export const MAX_INPUT_PIXELS = 64 * 1024 * 1024;

/** Maximum source dimensions */
export const MAX_IMAGE_WIDTH = 8192;
export const MAX_IMAGE_HEIGHT = 8192;

/** Maximum source file size (15MB) */
export const MAX_FILE_SIZE = 15 * 1024 * 1024;

/** Decodable source formats as reported by sharp (whitelist approach) */
export const ALLOWED_IMAGE_FORMATS: ReadonlySet<string> = new Set([
  'jpeg', 'jpg', 'png', 'webp', 'gif', 'bmp', 'tiff',
]);

/** MIME types accepted from format sniffing and from HTTP content-type headers */
export const ALLOWED_MIME_TYPES: ReadonlySet<string> = new Set([
  'image/jpeg',
  'image/jpg',
  'image/png',
  'image/gif',
  'image/webp',
  'image/bmp',
  'image/tiff',
]);

// =============================================================================
// SHARP CONSTANTS
// =============================================================================

/** Sharp memory cache settings */
export const SHARP_CACHE_CONFIG = {
  memory: 150, // MB
  files: 0,
  items: 300,
} as const;

/** Constructor options for sharp instances that decode untrusted bytes */
export const SHARP_SECURITY_CONFIG = {
  limitInputPixels: MAX_INPUT_PIXELS,
  sequentialRead: true,
  failOn: 'error',
} as const;

// =============================================================================
// TEXT VALIDATION CONSTANTS
// =============================================================================

/** Maximum title length accepted by request validation */
export const MAX_TITLE_LENGTH = 500;

/** Maximum branding text length accepted by request validation */
export const MAX_BRANDING_LENGTH = 120;

/** ASCII control characters to remove (except \t, \n, \r) */
// eslint-disable-next-line no-control-regex
export const ASCII_CONTROL_CHARS = /[\x00-\x08\x0b\x0c\x0e-\x1f\x7f]/g;

/** Extended ASCII control characters */
export const EXTENDED_ASCII_CONTROL_CHARS = /[\x80-\x9f]/g;

/** Unicode Bidirectional Text Control Characters (Bidi attack prevention) */
export const BIDI_CONTROL_CHARS = {
  RIGHT_TO_LEFT_OVERRIDE: /\u202E/g,
  LEFT_TO_RIGHT_OVERRIDE: /\u202D/g,
  LEFT_TO_RIGHT_MARK: /\u200E/g,
  RIGHT_TO_LEFT_MARK: /\u200F/g,
  ARABIC_LETTER_MARK: /\u061C/g,
  LEFT_TO_RIGHT_ISOLATE: /\u2066/g,
  RIGHT_TO_LEFT_ISOLATE: /\u2067/g,
  FIRST_STRONG_ISOLATE: /\u2068/g,
  POP_DIRECTIONAL_ISOLATE: /\u2069/g,
} as const;

/** Zero-width and formatting characters */
export const ZERO_WIDTH_CHARS = {
  ZERO_WIDTH_SPACE: /\u200B/g,
  ZERO_WIDTH_NON_JOINER: /\u200C/g,
  ZERO_WIDTH_JOINER: /\u200D/g,
  ZERO_WIDTH_NO_BREAK_SPACE: /\uFEFF/g,
  SOFT_HYPHEN: /\u00AD/g,
  COMBINING_GRAPHEME_JOINER: /\u034F/g,
} as const;

// =============================================================================
// NETWORK CONSTANTS
// =============================================================================

/** Allowed protocols for image URLs */
export const ALLOWED_PROTOCOLS = ['http:', 'https:'] as const;

/** Maximum URL length */
export const MAX_URL_LENGTH = 2048;

/** Image download timeout */
export const IMAGE_FETCH_TIMEOUT = 30_000;

/** Maximum redirects followed when downloading an image */
export const IMAGE_FETCH_MAX_REDIRECTS = 3;

/** Runware task creation timeout */
export const GENERATION_REQUEST_TIMEOUT = 30_000;

/** Runware status poll timeout */
export const GENERATION_POLL_TIMEOUT = 15_000;

/** Runware status polling: attempts and delay between them */
export const GENERATION_MAX_POLLS = 30;
export const GENERATION_POLL_INTERVAL = 2_000;
