/**
 * Configuration module exports
 */

export {
  loadConfig,
  validateConfigObject,
  getConfigValidationErrors,
  describeConfig,
  formatDepth,
  resolveLogSettings,
  ConfigValidationError,
  DEFAULT_CONFIG,
  type ConfigInput,
  type LogSettings,
} from './config.js';
