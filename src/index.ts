/**
 * Pin Composer
 * Compose 1000x1500 promotional pins from a photo, a title and a branding line
 */

import { PinRequestInput, RenderResult } from './types';
import { createPinRequest, validatePinText } from './utils/validators';
import { initializeSharpSecurity } from './utils/image-security';
import { renderPin, RenderOptions } from './core/pin-composer';
import { ImageSourceDeps, ImageSourceSpec, resolveImageSource } from './sources';

// Initialize Sharp security settings
initializeSharpSecurity();

export * from './exports';

/**
 * Generate a pin and return the PNG bytes
 * @param input - title, image bytes, optional branding text and style
 */
export async function generatePin(input: PinRequestInput, options: RenderOptions = {}): Promise<Buffer> {
  const result = await generatePinWithDetails(input, options);
  return result.buffer;
}

/**
 * Generate a pin with its dimensions and style
 */
export async function generatePinWithDetails(
  input: PinRequestInput,
  options: RenderOptions = {}
): Promise<RenderResult> {
  const request = createPinRequest(input);
  return renderPin(request, options);
}

export type PinSourceInput = Omit<PinRequestInput, 'imageSource'> & { source: ImageSourceSpec };

/**
 * Resolve the photo from a URL or a prompt, then render
 */
export async function generatePinFromSource(
  input: PinSourceInput,
  deps: ImageSourceDeps = {},
  options: RenderOptions = {}
): Promise<RenderResult> {
  const { source, ...fields } = input;
  validatePinText(fields);
  const imageSource = await resolveImageSource(source, deps);
  return generatePinWithDetails({ ...fields, imageSource }, options);
}
