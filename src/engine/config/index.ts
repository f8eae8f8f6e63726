/**
 * Engine configuration module.
 *
 * Exports default configuration values and utilities for
 * validating and loading engine configuration.
 *
 * @module engine/config
 */

export {
  DEFAULT_CONFIG,
  DEFAULT_CHANNEL,
  DEFAULT_MAX_RETRIES,
  DEFAULT_PIECE_SIZE,
  MAX_FILE_SIZE,
  MAX_PIECE_SIZE,
  MIN_PIECE_SIZE,
  mergeWithDefaults,
} from './defaults.js';
export { validateConfig, parseConfigObject, loadConfigFile } from './validate.js';
