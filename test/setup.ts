import 'jest';
import path from 'path';
import { loadConfig, setConfig } from '../src/config';

// Global test setup
beforeAll(() => {
  // No font files under this directory: every text role falls back to sans-serif
  setConfig(
    loadConfig({
      PIN_COMPOSER_FONT_DIR: path.join(__dirname, 'fixtures', 'no-fonts'),
      PIN_COMPOSER_LOG_LEVEL: 'error',
    })
  );
});

afterEach(() => {
  // Clear all mocks after each test
  jest.clearAllMocks();
});

// Rendering tests composite several full-size layers
jest.setTimeout(30000);
