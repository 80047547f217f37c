import sharp from 'sharp';
import {
  createSecureSharp,
  hasKnownImageSignature,
  validateImageBuffer,
  validateImageFormat,
} from '../../../src/utils/image-security';
import { MAX_FILE_SIZE } from '../../../src/constants/security';
import { ErrorType } from '../../../src/types';
import { solidJpeg, transparentPng } from '../../fixtures/images';

describe('Image security', () => {
  describe('hasKnownImageSignature', () => {
    it.each([
      ['JPEG', [0xff, 0xd8, 0xff, 0xe0]],
      ['PNG', [0x89, 0x50, 0x4e, 0x47]],
      ['GIF', [0x47, 0x49, 0x46, 0x38]],
      ['BMP', [0x42, 0x4d, 0x00, 0x00]],
      ['little-endian TIFF', [0x49, 0x49, 0x2a, 0x00]],
      ['big-endian TIFF', [0x4d, 0x4d, 0x00, 0x2a]],
    ])('should recognise %s headers', (_name, bytes) => {
      expect(hasKnownImageSignature(Buffer.from(bytes))).toBe(true);
    });

    it('should recognise WebP containers', () => {
      expect(hasKnownImageSignature(Buffer.from('RIFF\0\0\0\0WEBPVP8 '))).toBe(true);
    });

    it('should reject other content', () => {
      expect(hasKnownImageSignature(Buffer.from('<svg xmlns="http://www.w3.org/2000/svg"/>'))).toBe(false);
    });
  });

  describe('validateImageFormat', () => {
    it('should accept a PNG', async () => {
      await expect(validateImageFormat(await transparentPng(8, 8))).resolves.toBeUndefined();
    });

    it('should reject plain text', async () => {
      await expect(validateImageFormat(Buffer.from('just some words'))).rejects.toMatchObject({
        type: ErrorType.DECODE_ERROR,
      });
    });
  });

  describe('validateImageBuffer', () => {
    it('should return the decoded metadata', async () => {
      const metadata = await validateImageBuffer(await solidJpeg(64, 48));

      expect(metadata).toMatchObject({ width: 64, height: 48, format: 'jpeg' });
    });

    it('should reject an empty buffer', async () => {
      await expect(validateImageBuffer(Buffer.alloc(0))).rejects.toMatchObject({
        type: ErrorType.DECODE_ERROR,
        message: 'Image buffer is empty',
      });
    });

    it('should reject oversized files before decoding', async () => {
      await expect(validateImageBuffer(Buffer.alloc(MAX_FILE_SIZE + 1))).rejects.toMatchObject({
        type: ErrorType.DECODE_ERROR,
        message: `Image file too large: ${MAX_FILE_SIZE + 1} bytes. Maximum allowed: ${MAX_FILE_SIZE} bytes.`,
      });
    });

    it('should reject images wider than the limit', async () => {
      const wide = await sharp({ create: { width: 9000, height: 10, channels: 3, background: '#336699' } })
        .png()
        .toBuffer();

      await expect(validateImageBuffer(wide)).rejects.toMatchObject({
        type: ErrorType.DECODE_ERROR,
        message: 'Image dimensions too large: 9000x10. Maximum allowed: 8192x8192',
      });
    });
  });

  describe('createSecureSharp', () => {
    it('should decode trusted-size input', async () => {
      const { info } = await createSecureSharp(await solidJpeg(20, 10)).raw().toBuffer({ resolveWithObject: true });

      expect(info).toMatchObject({ width: 20, height: 10, channels: 3 });
    });
  });
});
