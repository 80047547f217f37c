/**
 * Validation utilities for pin requests
 */

import { ErrorType, isPinStyle, PinComposerError, PinRequest, PinRequestInput, PinStyle } from '../types';
import {
  ALLOWED_PROTOCOLS,
  ASCII_CONTROL_CHARS,
  BIDI_CONTROL_CHARS,
  EXTENDED_ASCII_CONTROL_CHARS,
  MAX_BRANDING_LENGTH,
  MAX_TITLE_LENGTH,
  MAX_URL_LENGTH,
  ZERO_WIDTH_CHARS,
} from '../constants/security';

export const DEFAULT_STYLE: PinStyle = 1;

export type PinTextInput = Omit<PinRequestInput, 'imageSource'>;

export type PinTextFields = Pick<PinRequest, 'title' | 'brandingText' | 'style'>;

/**
 * Validate the text fields of a request: title required, branding defaults to "" and style to 1
 */
export function validatePinText(input: PinTextInput): PinTextFields {
  const title = validateTextInput(input.title, 'title', MAX_TITLE_LENGTH);
  if (!title) {
    throw new PinComposerError(ErrorType.VALIDATION_ERROR, 'title must not be empty');
  }

  const brandingText =
    input.brandingText === undefined || input.brandingText === null
      ? ''
      : validateTextInput(input.brandingText, 'brandingText', MAX_BRANDING_LENGTH);

  return { title, brandingText, style: parseStyle(input.style) };
}

/**
 * Build a frozen PinRequest from loosely typed input
 */
export function createPinRequest(input: PinRequestInput): PinRequest {
  const { title, brandingText, style } = validatePinText(input);

  if (!Buffer.isBuffer(input.imageSource) || input.imageSource.length === 0) {
    throw new PinComposerError(ErrorType.VALIDATION_ERROR, 'imageSource must be a non-empty Buffer');
  }

  return Object.freeze({
    title,
    imageSource: input.imageSource,
    brandingText,
    style,
  });
}

/**
 * Accepts 1-5, "1"-"5" and "style1"-"style5" (any case); absent means the default style
 */
export function parseStyle(value: unknown): PinStyle {
  if (value === undefined || value === null || value === '') {
    return DEFAULT_STYLE;
  }

  let candidate: unknown = value;
  if (typeof value === 'string') {
    const match = /^(?:style)?\s*(\d+)$/i.exec(value.trim());
    candidate = match ? Number(match[1]) : value;
  }

  if (!isPinStyle(candidate)) {
    throw new PinComposerError(
      ErrorType.STYLE_NOT_RECOGNIZED,
      `Style "${String(value)}" is not recognized. Use 1-5 or style1-style5.`
    );
  }
  return candidate;
}

/**
 * Check a text field's type and length, returning it sanitized
 */
export function validateTextInput(value: unknown, fieldName: string, maxLength: number): string {
  if (typeof value !== 'string') {
    throw new PinComposerError(ErrorType.VALIDATION_ERROR, `${fieldName} must be a string`);
  }

  const sanitized = sanitizeControlChars(value).replace(/\s+/g, ' ');
  if (sanitized.length > maxLength) {
    throw new PinComposerError(
      ErrorType.VALIDATION_ERROR,
      `${fieldName} exceeds maximum length of ${maxLength} characters`
    );
  }
  return sanitized;
}

/**
 * Remove control, bidi and zero-width characters, then trim
 */
export function sanitizeControlChars(text: string): string {
  let sanitized = text
    // ASCII control characters (except tab \t, newline \n, carriage return \r)
    .replace(ASCII_CONTROL_CHARS, '')
    .replace(EXTENDED_ASCII_CONTROL_CHARS, '');

  for (const pattern of Object.values(BIDI_CONTROL_CHARS)) {
    sanitized = sanitized.replace(pattern, '');
  }
  for (const pattern of Object.values(ZERO_WIDTH_CHARS)) {
    sanitized = sanitized.replace(pattern, '');
  }

  return sanitized.trim();
}

/**
 * Validate an image URL before it is downloaded.
 * Rejects other protocols, credentials, loopback and private-network hosts unless allowed.
 */
export function validateImageUrl(imageUrl: unknown, options: { allowPrivateHosts?: boolean } = {}): string {
  if (typeof imageUrl !== 'string' || !imageUrl.trim()) {
    throw new PinComposerError(ErrorType.VALIDATION_ERROR, 'Image URL must be a non-empty string');
  }

  const sanitizedUrl = sanitizeControlChars(imageUrl);
  if (sanitizedUrl.length > MAX_URL_LENGTH) {
    throw new PinComposerError(
      ErrorType.VALIDATION_ERROR,
      `URL exceeds maximum length of ${MAX_URL_LENGTH} characters`
    );
  }

  const url = parseUrl(sanitizedUrl);

  if (!ALLOWED_PROTOCOLS.some((protocol) => protocol === url.protocol)) {
    throw new PinComposerError(
      ErrorType.VALIDATION_ERROR,
      `Invalid protocol: ${url.protocol}. Only ${ALLOWED_PROTOCOLS.join(' and ')} are supported.`
    );
  }

  if (url.username || url.password) {
    throw new PinComposerError(ErrorType.VALIDATION_ERROR, 'Image URL must not contain credentials');
  }

  if (!url.hostname) {
    throw new PinComposerError(ErrorType.VALIDATION_ERROR, 'URL must have a valid hostname');
  }

  if (!options.allowPrivateHosts && isPrivateHost(url.hostname)) {
    throw new PinComposerError(
      ErrorType.VALIDATION_ERROR,
      `Access to private or loopback host is not allowed: ${url.hostname}`
    );
  }

  return url.toString();
}

function parseUrl(value: string): URL {
  try {
    return new URL(value);
  } catch (error) {
    throw new PinComposerError(ErrorType.VALIDATION_ERROR, `Invalid URL format: ${value}`, error);
  }
}

/**
 * True for localhost names and literal IPs in loopback, private, link-local or unspecified ranges
 */
export function isPrivateHost(hostname: string): boolean {
  const host = hostname.toLowerCase().replace(/^\[|\]$/g, '');

  if (host === 'localhost' || host.endsWith('.localhost')) {
    return true;
  }

  if (host.includes(':')) {
    const mapped = /^::ffff:(\d+\.\d+\.\d+\.\d+)$/.exec(host);
    if (mapped) {
      return isPrivateIPv4(mapped[1]);
    }
    // WHATWG URL serializes mapped addresses in hex, e.g. ::ffff:7f00:1
    const mappedHex = /^::ffff:([0-9a-f]{1,4}):([0-9a-f]{1,4})$/.exec(host);
    if (mappedHex) {
      const high = parseInt(mappedHex[1], 16);
      const low = parseInt(mappedHex[2], 16);
      return isPrivateIPv4(`${high >> 8}.${high & 0xff}.${low >> 8}.${low & 0xff}`);
    }
    return host === '::' || host === '::1' || /^f[cd]/.test(host) || /^fe[89ab]/.test(host);
  }

  return /^\d+\.\d+\.\d+\.\d+$/.test(host) && isPrivateIPv4(host);
}

function isPrivateIPv4(ip: string): boolean {
  const [a, b] = ip.split('.').map(Number);
  return (
    a === 0 ||
    a === 10 ||
    a === 127 ||
    (a === 169 && b === 254) ||
    (a === 172 && b >= 16 && b <= 31) ||
    (a === 192 && b === 168) ||
    (a === 100 && b >= 64 && b <= 127)
  );
}
