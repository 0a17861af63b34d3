/**
 * Config Module
 *
 * Provides:
 * - YAML and JSON config parsing
 * - Zod-validated schemas
 * - Default configuration merging
 * - Capture request validation and output target resolution
 */

export {
  ConfigParser,
  createConfigParser,
  loadConfig,
  buildCaptureRequest,
  parseViewportSize,
  resolveOutputTarget,
  DEFAULT_CONFIG,
  DEFAULT_STILL_OUTPUT,
  DEFAULT_RECORDING_OUTPUT,
  CONFIG_FILENAMES,
  WeblookConfigSchema,
  type WeblookConfig,
  type ResolvedConfig,
  type BackendSettings,
  type CaptureDefaults,
  type CaptureRequestInput,
} from './parser.js';
