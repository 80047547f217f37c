export {
  PinStyle,
  PIN_STYLES,
  isPinStyle,
  PinRequest,
  PinRequestInput,
  RenderResult,
  FontResolver,
  FontHandle,
  FontSpec,
  TextLayout,
  StyleConfig,
  StyleDefinition,
  ErrorType,
  PinComposerError,
} from './types';

export { renderPin, RenderOptions } from './core/pin-composer';
export { PIN_DIMENSIONS } from './core/canvas-normalizer';
export { fitText } from './core/text-fitter';
export { resolveFont, clearFontCache, getFontCacheStats } from './core/font-resolver';
export { styles } from './styles/registry';
export { createPinRequest, parseStyle, validateImageUrl, validatePinText } from './utils/validators';
export type { PinTextFields, PinTextInput } from './utils/validators';
export { initializeSharpSecurity } from './utils/image-security';
export { logger, Logger, LogLevel } from './utils/logger';
export { ComposerConfig, loadConfig, getConfig, setConfig } from './config';

export {
  fetchImageBytes,
  FetchImageOptions,
  RunwareClient,
  RunwareClientOptions,
  GenerateImageOptions,
  createRunwareClient,
  resolveImageSource,
  ImageSourceSpec,
  ImageSourceDeps,
  ImageGenerator,
} from './sources';
