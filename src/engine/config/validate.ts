/**
 * Configuration validation and loading.
 *
 * @module engine/config/validate
 */

import * as fs from 'fs/promises';
import { ConfigError, type EngineConfig, type PartialEngineConfig } from '../types.js';
import { DEFAULT_CONFIG } from './defaults.js';
import { expandPath } from '../../utils/platform.js';

// =============================================================================
// Validation
// =============================================================================

type NumericKey = {
  [K in keyof EngineConfig]: EngineConfig[K] extends number ? K : never;
}[keyof EngineConfig];

const POSITIVE_INTEGERS: NumericKey[] = [
  'pieceSize',
  'minPieceSize',
  'maxPieceSize',
  'maxFileSize',
  'retryThreshold',
  'maxSendFailures',
  'maxRetries',
  'tickIntervalMs',
];

const NON_NEGATIVE_NUMBERS: NumericKey[] = [
  'initialDelayMs',
  'minDelayMs',
  'maxDelayMs',
  'requestIntervalMs',
  'inactivityTimeoutMs',
  'channel',
];

/**
 * Checks a complete configuration for values the engine cannot run with.
 *
 * @throws {ConfigError} On the first invalid value
 */
export function validateConfig(config: EngineConfig): EngineConfig {
  for (const key of POSITIVE_INTEGERS) {
    const value = config[key];
    if (!Number.isInteger(value) || value <= 0) {
      throw new ConfigError(`${key} must be a positive integer, got ${value}`, key);
    }
  }

  for (const key of NON_NEGATIVE_NUMBERS) {
    const value = config[key];
    if (!Number.isFinite(value) || value < 0) {
      throw new ConfigError(`${key} must be a non-negative number, got ${value}`, key);
    }
  }

  if (config.minPieceSize > config.maxPieceSize) {
    throw new ConfigError('minPieceSize must not exceed maxPieceSize', 'minPieceSize');
  }
  if (config.minDelayMs > config.maxDelayMs) {
    throw new ConfigError('minDelayMs must not exceed maxDelayMs', 'minDelayMs');
  }
  if (config.initialDelayMs < config.minDelayMs || config.initialDelayMs > config.maxDelayMs) {
    throw new ConfigError(
      `initialDelayMs must lie within [${config.minDelayMs}, ${config.maxDelayMs}]`,
      'initialDelayMs'
    );
  }
  if (!Number.isFinite(config.delayMultiplier) || config.delayMultiplier < 1) {
    throw new ConfigError('delayMultiplier must be at least 1', 'delayMultiplier');
  }
  if (!Number.isInteger(config.channel) || config.channel > 255) {
    throw new ConfigError('channel must be an integer between 0 and 255', 'channel');
  }

  return config;
}

// =============================================================================
// Config File
// =============================================================================

/**
 * Narrows parsed JSON to a partial engine configuration.
 *
 * @throws {ConfigError} For unknown keys or values of the wrong type
 */
export function parseConfigObject(raw: unknown): PartialEngineConfig {
  if (typeof raw !== 'object' || raw === null || Array.isArray(raw)) {
    throw new ConfigError('Configuration must be a JSON object', '(root)');
  }

  const result: PartialEngineConfig = {};
  for (const [key, value] of Object.entries(raw)) {
    if (!(key in DEFAULT_CONFIG)) {
      throw new ConfigError(`Unknown configuration key: ${key}`, key);
    }
    const typedKey = key as keyof EngineConfig;
    const expected = typeof DEFAULT_CONFIG[typedKey];
    if (typeof value !== expected) {
      throw new ConfigError(`${key} must be a ${expected}`, key);
    }
    Object.assign(result, { [typedKey]: value });
  }
  return result;
}

/**
 * Loads a JSON configuration file.
 *
 * @param filePath - Path to the file (may start with ~)
 * @returns The parsed partial configuration, or null if the file does not exist
 */
export async function loadConfigFile(filePath: string): Promise<PartialEngineConfig | null> {
  const resolved = expandPath(filePath);

  let data: string;
  try {
    data = await fs.readFile(resolved, 'utf-8');
  } catch (err) {
    const error = err as NodeJS.ErrnoException;
    if (error.code === 'ENOENT') {
      return null;
    }
    throw err;
  }

  let parsed: unknown;
  try {
    parsed = JSON.parse(data);
  } catch (err) {
    throw new ConfigError(`Invalid JSON in ${resolved}: ${(err as Error).message}`, '(root)');
  }
  return parseConfigObject(parsed);
}
