/**
 * Text Fitter
 * Picks the largest font size at which a greedily wrapped title fits its box
 */

import { ErrorType, FontHandle, FontResolver, FontSpec, PinComposerError, TextLayout } from '../types';
import { resolveFont } from './font-resolver';

export const DEFAULT_LINE_HEIGHT = 1.2;
export const ELLIPSIS = '…';

/**
 * Fit `text` into `box`, searching sizes from `spec.maxSize` down to `spec.minSize`.
 *
 * When no size fits, `spec.minSize` is used and the wrapped lines are cut to
 * what the box height holds, the last one ending in an ellipsis. A single
 * word wider than the box is kept whole and overflows horizontally.
 */
export function fitText(
  text: string,
  box: { width: number; height: number },
  spec: FontSpec,
  resolve: FontResolver = resolveFont
): TextLayout {
  const trimmed = text.trim();
  if (!trimmed) {
    throw new PinComposerError(ErrorType.VALIDATION_ERROR, 'Cannot fit empty text');
  }
  if (!(spec.minSize > 0) || spec.maxSize < spec.minSize) {
    throw new PinComposerError(
      ErrorType.VALIDATION_ERROR,
      `Invalid font size range [${spec.minSize}, ${spec.maxSize}]`
    );
  }

  const words = trimmed.split(/\s+/);
  const lineHeightFactor = spec.lineHeight ?? DEFAULT_LINE_HEIGHT;
  const weight = spec.weight ?? 'bold';

  for (let size = Math.floor(spec.maxSize); size >= spec.minSize; size--) {
    const font = resolve(spec.candidates, size, weight);
    const lines = wrapWords(words, box.width, font);
    const lineHeight = size * lineHeightFactor;
    const widest = widestLine(lines, font);

    if (widest <= box.width && lines.length * lineHeight <= box.height) {
      return buildLayout(font, lines, lineHeight, widest, false);
    }
  }

  const font = resolve(spec.candidates, spec.minSize, weight);
  const lineHeight = spec.minSize * lineHeightFactor;
  const wrapped = wrapWords(words, box.width, font);
  const maxLines = Math.max(1, Math.floor(box.height / lineHeight));

  if (wrapped.length <= maxLines) {
    return buildLayout(font, wrapped, lineHeight, widestLine(wrapped, font), false);
  }

  const kept = wrapped.slice(0, maxLines);
  kept[kept.length - 1] = truncateWithEllipsis(kept[kept.length - 1], box.width, font);
  return buildLayout(font, kept, lineHeight, widestLine(kept, font), true);
}

/**
 * Fit `text` on a single line: the largest size in range whose width fits,
 * otherwise `spec.minSize` with the tail replaced by an ellipsis
 */
export function fitLine(
  text: string,
  maxWidth: number,
  spec: FontSpec,
  resolve: FontResolver = resolveFont
): TextLayout {
  const line = text.trim().replace(/\s+/g, ' ');
  if (!line) {
    throw new PinComposerError(ErrorType.VALIDATION_ERROR, 'Cannot fit empty text');
  }

  const lineHeightFactor = spec.lineHeight ?? DEFAULT_LINE_HEIGHT;
  const weight = spec.weight ?? 'bold';

  for (let size = Math.floor(spec.maxSize); size >= spec.minSize; size--) {
    const font = resolve(spec.candidates, size, weight);
    const width = font.measure(line);
    if (width <= maxWidth) {
      return buildLayout(font, [line], size * lineHeightFactor, width, false);
    }
  }

  const font = resolve(spec.candidates, spec.minSize, weight);
  const shortened = truncateWithEllipsis(line, maxWidth, font);
  return buildLayout(font, [shortened], spec.minSize * lineHeightFactor, font.measure(shortened), true);
}

/**
 * Greedy word wrap: a word joins the current line unless that would exceed `maxWidth`
 */
export function wrapWords(words: readonly string[], maxWidth: number, font: FontHandle): string[] {
  const lines: string[] = [];
  let current = '';

  for (const word of words) {
    if (!word) continue;
    const candidate = current ? `${current} ${word}` : word;
    if (current && font.measure(candidate) > maxWidth) {
      lines.push(current);
      current = word;
    } else {
      current = candidate;
    }
  }

  if (current) {
    lines.push(current);
  }
  return lines;
}

/**
 * Shorten `line` until it plus an ellipsis fits `maxWidth`:
 * trailing words go first, then trailing characters
 */
export function truncateWithEllipsis(line: string, maxWidth: number, font: FontHandle): string {
  const words = line.split(' ');
  while (words.length > 1 && font.measure(`${words.join(' ')}${ELLIPSIS}`) > maxWidth) {
    words.pop();
  }

  const chars = Array.from(words.join(' '));
  while (chars.length > 0 && font.measure(`${chars.join('')}${ELLIPSIS}`) > maxWidth) {
    chars.pop();
  }

  return `${chars.join('').trimEnd()}${ELLIPSIS}`;
}

function widestLine(lines: readonly string[], font: FontHandle): number {
  return lines.reduce((widest, line) => Math.max(widest, font.measure(line)), 0);
}

function buildLayout(
  font: FontHandle,
  lines: readonly string[],
  lineHeight: number,
  width: number,
  truncated: boolean
): TextLayout {
  return Object.freeze({
    fontSize: font.size,
    lines: Object.freeze([...lines]),
    lineHeight,
    width,
    height: lines.length * lineHeight,
    truncated,
    font,
  });
}
