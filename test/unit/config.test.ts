import fs from 'fs';
import path from 'path';
import { BUNDLED_FONT_DIR, DEFAULT_RUNWARE_BASE_URL, getConfig, loadConfig, setConfig } from '../../src/config';
import { logger, LogLevel } from '../../src/utils/logger';
import { DEFAULT_FONT_FILE } from '../../src/constants/fonts';

describe('Configuration', () => {
  describe('loadConfig', () => {
    it('should apply defaults for an empty environment', () => {
      const config = loadConfig({});

      expect(config).toEqual({
        fontDir: BUNDLED_FONT_DIR,
        logLevel: LogLevel.WARN,
        runwareApiKey: undefined,
        runwareBaseUrl: DEFAULT_RUNWARE_BASE_URL,
      });
      expect(Object.isFrozen(config)).toBe(true);
    });

    it('should default to the fonts directory shipped with the package', () => {
      expect(BUNDLED_FONT_DIR).toBe(path.resolve(__dirname, '..', '..', 'fonts'));
      expect(fs.existsSync(path.join(BUNDLED_FONT_DIR, DEFAULT_FONT_FILE))).toBe(true);
    });

    it('should read every setting from the environment', () => {
      const config = loadConfig({
        PIN_COMPOSER_FONT_DIR: '/opt/fonts',
        PIN_COMPOSER_LOG_LEVEL: 'debug',
        RUNWARE_API_KEY: ' test-key ',
        RUNWARE_BASE_URL: 'https://runware.test/v1//',
      });

      expect(config).toEqual({
        fontDir: path.resolve('/opt/fonts'),
        logLevel: LogLevel.DEBUG,
        runwareApiKey: 'test-key',
        runwareBaseUrl: 'https://runware.test/v1',
      });
    });

    it('should ignore an unknown log level and a blank API key', () => {
      const config = loadConfig({ PIN_COMPOSER_LOG_LEVEL: 'loud', RUNWARE_API_KEY: '   ' });

      expect(config.logLevel).toBe(LogLevel.WARN);
      expect(config.runwareApiKey).toBeUndefined();
    });
  });

  describe('setConfig', () => {
    it('should replace the active configuration and apply its log level', () => {
      const previous = getConfig();
      try {
        setConfig({ ...previous, logLevel: LogLevel.INFO, fontDir: '/srv/fonts' });

        expect(getConfig().fontDir).toBe('/srv/fonts');
        expect(logger.getLevel()).toBe(LogLevel.INFO);
      } finally {
        setConfig(previous);
      }
    });
  });
});
