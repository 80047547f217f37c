/**
 * Downloads a source photo over HTTP(S)
 */

import axios from 'axios';
import { ErrorType, PinComposerError } from '../types';
import { validateImageUrl } from '../utils/validators';
import { validateImageBuffer } from '../utils/image-security';
import { logSourceError } from '../utils/logger';
import { getPublicHttpAgent, getPublicHttpsAgent } from '../utils/secure-agent';
import {
  ALLOWED_MIME_TYPES,
  IMAGE_FETCH_MAX_REDIRECTS,
  IMAGE_FETCH_TIMEOUT,
  MAX_FILE_SIZE,
} from '../constants/security';

export interface FetchImageOptions {
  timeout?: number;
  maxRedirects?: number;
  /** Allow loopback and private-network hosts (local development only) */
  allowPrivateHosts?: boolean;
}

export type ImageFetcher = (url: string, options?: FetchImageOptions) => Promise<Buffer>;

/**
 * Fetch an image and check that it decodes to a supported format within the size limits
 */
export async function fetchImageBytes(imageUrl: string, options: FetchImageOptions = {}): Promise<Buffer> {
  try {
    const validatedUrl = validateImageUrl(imageUrl, { allowPrivateHosts: options.allowPrivateHosts });

    const response = await axios.get<ArrayBuffer | Buffer>(validatedUrl, {
      responseType: 'arraybuffer',
      headers: {
        'User-Agent': 'Mozilla/5.0 (compatible; PinComposer/1.0)',
        Accept: 'image/*',
      },
      timeout: options.timeout ?? IMAGE_FETCH_TIMEOUT,
      maxRedirects: options.maxRedirects ?? IMAGE_FETCH_MAX_REDIRECTS,
      maxContentLength: MAX_FILE_SIZE,
      maxBodyLength: MAX_FILE_SIZE,
      // resolved addresses are checked too, for hostnames that point inside the network
      ...(options.allowPrivateHosts ? {} : { httpAgent: getPublicHttpAgent(), httpsAgent: getPublicHttpsAgent() }),
      beforeRedirect: (redirect) => {
        const target =
          typeof redirect.href === 'string'
            ? redirect.href
            : `${String(redirect.protocol)}//${String(redirect.hostname)}${String(redirect.path ?? '')}`;
        try {
          validateImageUrl(target, { allowPrivateHosts: options.allowPrivateHosts });
        } catch (error) {
          throw new PinComposerError(
            ErrorType.VALIDATION_ERROR,
            `Image redirect to unsafe URL blocked: ${target}`,
            error
          );
        }
      },
    });

    const rawType: unknown = response.headers['content-type'];
    const contentType = typeof rawType === 'string' ? rawType.split(';')[0].trim().toLowerCase() : '';
    if (contentType && !ALLOWED_MIME_TYPES.has(contentType)) {
      throw new PinComposerError(
        ErrorType.FETCH_ERROR,
        `Unsupported image type: ${contentType}. Only JPEG, PNG, GIF, WebP, BMP, and TIFF are allowed.`
      );
    }

    const imageBuffer = Buffer.isBuffer(response.data) ? response.data : Buffer.from(response.data);
    if (imageBuffer.length > MAX_FILE_SIZE) {
      throw new PinComposerError(
        ErrorType.FETCH_ERROR,
        `Image too large: ${imageBuffer.length} bytes. Maximum allowed: ${MAX_FILE_SIZE} bytes.`
      );
    }

    await validateImageBuffer(imageBuffer);
    return imageBuffer;
  } catch (error) {
    const cause = error instanceof Error ? error : new Error(String(error));
    logSourceError('image-fetch', cause, imageUrl);
    if (error instanceof PinComposerError && error.type === ErrorType.FETCH_ERROR) {
      throw error;
    }
    throw new PinComposerError(
      ErrorType.FETCH_ERROR,
      `Failed to fetch image from ${imageUrl}: ${cause.message}`,
      error
    );
  }
}
