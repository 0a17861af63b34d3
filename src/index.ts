/**
 * weblook - screenshots and animated GIF recordings of web pages
 *
 * Drives chromedriver over WebDriver to capture a page once (PNG) or on a
 * fixed interval (GIF), writing the result to a file or standard output.
 */

// Capture pipeline, scheduler and data model
export * from './lib/capture/index.js';

// chromedriver process supervision
export * from './lib/backend/index.js';

// WebDriver client and browser sessions
export * from './lib/webdriver/index.js';

// PNG and GIF encoding
export * from './lib/image/index.js';

// Output delivery
export * from './lib/output/index.js';

// User agent selection
export * from './lib/useragent/index.js';

// Configuration and request validation
export * from './lib/config/index.js';

// Errors, logging and timing
export * from './lib/errors/index.js';
export * from './lib/logging/index.js';
export * from './lib/timing/index.js';

// Remote control (experimental)
export * from './lib/remote/index.js';

// Version
export const VERSION = '0.1.0';
