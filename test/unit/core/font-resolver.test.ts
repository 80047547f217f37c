import path from 'path';
import { createCanvas } from '@napi-rs/canvas';
import {
  clearFontCache,
  createBuiltinFontHandle,
  familyAliasFor,
  getFontCacheStats,
  registerFontFile,
  resolveFont,
} from '../../../src/core/font-resolver';
import { DISPLAY_SANS_FONTS } from '../../../src/constants/fonts';
import { ComposerConfig, getConfig, setConfig } from '../../../src/config';
import { ErrorType } from '../../../src/types';
import { captureError } from '../../fixtures/errors';

const FONT_FIXTURES = path.join(__dirname, '..', '..', 'fixtures', 'font-files');

function canvasWidth(css: string, text: string): number {
  const ctx = createCanvas(1, 1).getContext('2d');
  ctx.font = css;
  return ctx.measureText(text).width;
}

describe('Font Resolver', () => {
  beforeEach(() => {
    clearFontCache();
  });

  describe('resolveFont', () => {
    it('should fall back to the built-in font when no candidate file exists', () => {
      const font = resolveFont(['Missing-Bold.ttf', 'AlsoMissing.ttf'], 40);

      expect(font.builtin).toBe(true);
      expect(font.family).toBe('sans-serif');
      expect(font.size).toBe(40);
      expect(font.weight).toBe('bold');
      expect(font.css).toBe('bold 40px sans-serif');
      expect(font.ascent).toBeGreaterThan(0);
      expect(font.descent).toBeGreaterThan(0);
    });

    it('should return the cached handle for the same chain, size and weight', () => {
      const first = resolveFont(DISPLAY_SANS_FONTS, 32);
      const second = resolveFont(DISPLAY_SANS_FONTS, 32);
      const otherWeight = resolveFont(DISPLAY_SANS_FONTS, 32, '800');

      expect(second).toBe(first);
      expect(otherWeight).not.toBe(first);
      expect(otherWeight.css).toBe('800 32px sans-serif');
    });

    it('should remember failed registrations once per file', () => {
      resolveFont(['Missing-Bold.ttf', 'AlsoMissing.ttf'], 20);
      resolveFont(['Missing-Bold.ttf', 'AlsoMissing.ttf'], 24);

      expect(getFontCacheStats()).toEqual({ handles: 2, registrations: 2 });

      clearFontCache();
      expect(getFontCacheStats()).toEqual({ handles: 0, registrations: 0 });
    });

    it.each([0, -4, Number.NaN])('should reject size %p with FONT_LOAD_ERROR', (size) => {
      const error = captureError(() => resolveFont(DISPLAY_SANS_FONTS, size));

      expect(error).toMatchObject({ type: ErrorType.FONT_LOAD_ERROR });
    });
  });

  describe('with font files present', () => {
    let previous: Readonly<ComposerConfig>;

    beforeAll(() => {
      previous = getConfig();
      setConfig({ ...previous, fontDir: FONT_FIXTURES });
    });

    afterAll(() => {
      setConfig(previous);
    });

    it('should load the first candidate that exists', () => {
      const font = resolveFont(['Missing-Bold.ttf', 'DejaVuSans-Bold.ttf'], 48);

      expect(font.builtin).toBe(false);
      expect(font.family).toBe('pc-DejaVuSans-Bold');
      expect(font.css).toBe('48px "pc-DejaVuSans-Bold"');
      expect(font.size).toBe(48);
    });

    it('should stop at the first loadable candidate', () => {
      resolveFont(['DejaVuSans-Bold.ttf', 'Broken-Bold.ttf'], 48);

      expect(getFontCacheStats()).toEqual({ handles: 1, registrations: 1 });
    });

    it('should skip a corrupt file and use the next candidate', () => {
      const font = resolveFont(['Broken-Bold.ttf', 'DejaVuSans-Bold.ttf'], 30);

      expect(registerFontFile(path.join(FONT_FIXTURES, 'Broken-Bold.ttf'))).toBeNull();
      expect(font.family).toBe('pc-DejaVuSans-Bold');
    });

    it('should measure and size glyphs with the loaded face', () => {
      const font = resolveFont(['DejaVuSans-Bold.ttf'], 48);

      expect(font.measure('Pinterest')).toBeCloseTo(canvasWidth(font.css, 'Pinterest'));
      expect(font.measure('WWW')).toBeGreaterThan(font.measure('iii'));
      expect(font.ascent).toBeGreaterThan(48 * 0.6);
      expect(font.ascent).toBeLessThan(48 * 0.9);
      expect(font.descent).toBeGreaterThan(48 * 0.1);
      expect(font.descent).toBeLessThan(48 * 0.35);
    });
  });

  describe('registerFontFile', () => {
    it('should return null for a file that does not exist', () => {
      expect(registerFontFile(path.join(__dirname, 'no-such-font.ttf'))).toBeNull();
    });
  });

  describe('familyAliasFor', () => {
    it('should derive the alias from the file name', () => {
      expect(familyAliasFor('/fonts/LeagueSpartan-Bold.ttf')).toBe('pc-LeagueSpartan-Bold');
      expect(familyAliasFor('Times New Roman Bold.ttf')).toBe('pc-Times New Roman Bold');
    });
  });

  describe('built-in font', () => {
    it('should measure exactly what the canvas draws under its font shorthand', () => {
      const font = createBuiltinFontHandle(84);
      const line = "Capturing Earth's";

      expect(font.measure(line)).toBeCloseTo(canvasWidth('bold 84px sans-serif', line));
    });

    it('should measure nothing for an empty string', () => {
      expect(createBuiltinFontHandle(20).measure('')).toBe(0);
    });
  });
});
