/**
 * Process configuration read from the environment
 */

import path from 'path';
import { LogLevel, logger, parseLogLevel } from './utils/logger';

export interface ComposerConfig {
  /** Directory holding the font files named in the font chains */
  fontDir: string;
  logLevel: LogLevel;
  /** Runware API key; image generation is unavailable without it */
  runwareApiKey?: string;
  runwareBaseUrl: string;
}

export const DEFAULT_RUNWARE_BASE_URL = 'https://api.runware.ai/v1';

/** fonts/ at the package root, beside src/ and dist/ */
export const BUNDLED_FONT_DIR = path.resolve(__dirname, '..', 'fonts');

export function loadConfig(env: NodeJS.ProcessEnv = process.env): Readonly<ComposerConfig> {
  const runwareApiKey = env.RUNWARE_API_KEY?.trim();

  return Object.freeze({
    fontDir: path.resolve(env.PIN_COMPOSER_FONT_DIR?.trim() || BUNDLED_FONT_DIR),
    logLevel: parseLogLevel(env.PIN_COMPOSER_LOG_LEVEL) ?? LogLevel.WARN,
    runwareApiKey: runwareApiKey ? runwareApiKey : undefined,
    runwareBaseUrl: (env.RUNWARE_BASE_URL?.trim() || DEFAULT_RUNWARE_BASE_URL).replace(/\/+$/, ''),
  });
}

let activeConfig: Readonly<ComposerConfig> | null = null;

/**
 * Process-wide configuration, loaded on first use
 */
export function getConfig(): Readonly<ComposerConfig> {
  if (!activeConfig) {
    activeConfig = loadConfig();
    logger.setLevel(activeConfig.logLevel);
  }
  return activeConfig;
}

/**
 * Replace the process-wide configuration (hosts and tests)
 */
export function setConfig(config: Readonly<ComposerConfig>): void {
  activeConfig = Object.freeze({ ...config });
  logger.setLevel(config.logLevel);
}
