/**
 * Turns command-line flags into an engine configuration.
 *
 * Precedence, lowest first: built-in defaults, the JSON config file, flags.
 *
 * @module cli/utils/options
 */

import { loadConfigFile, mergeWithDefaults, validateConfig } from '../../engine/config/index.js';
import type { EngineConfig, PartialEngineConfig } from '../../engine/types.js';
import { getDefaultConfigFile } from '../../utils/platform.js';

// =============================================================================
// Types
// =============================================================================

/**
 * Engine-related flags shared by the send and receive commands
 */
export interface EngineFlags {
  channel?: number;
  pieceSize?: number;
  merkle?: boolean;
  /** Initial pacing delay, milliseconds */
  delay?: number;
  retries?: number;
  /** Resume request interval, seconds */
  interval?: number;
  /** Inactivity timeout, seconds */
  inactivity?: number;
  /** Config file path; the default location is used when absent */
  config?: string;
}

// =============================================================================
// Functions
// =============================================================================

/**
 * Maps flags to configuration overrides. Absent flags produce no key.
 */
export function flagsToOverrides(flags: EngineFlags): PartialEngineConfig {
  const overrides: PartialEngineConfig = {};

  if (flags.channel !== undefined) overrides.channel = flags.channel;
  if (flags.pieceSize !== undefined) overrides.pieceSize = flags.pieceSize;
  if (flags.merkle !== undefined) overrides.useMerkleRoot = flags.merkle;
  if (flags.retries !== undefined) overrides.maxRetries = flags.retries;
  if (flags.interval !== undefined) overrides.requestIntervalMs = flags.interval * 1000;
  if (flags.inactivity !== undefined) overrides.inactivityTimeoutMs = flags.inactivity * 1000;

  if (flags.delay !== undefined) overrides.initialDelayMs = flags.delay;

  return overrides;
}

/**
 * Builds the validated engine configuration for a command.
 *
 * An explicitly named config file must exist; the default one is optional.
 *
 * @throws {ConfigError} If the file or the resulting configuration is invalid
 * @throws {Error} If an explicitly named config file does not exist
 */
export async function resolveEngineConfig(flags: EngineFlags): Promise<EngineConfig> {
  const path = flags.config ?? getDefaultConfigFile();
  const fromFile = await loadConfigFile(path);

  if (fromFile === null && flags.config !== undefined) {
    throw new Error(`Config file not found: ${flags.config}`);
  }

  const merged = mergeWithDefaults({
    ...(fromFile ?? {}),
    ...flagsToOverrides(flags),
  });

  // Widen the pacing bounds to admit an explicit starting delay
  if (flags.delay !== undefined) {
    merged.minDelayMs = Math.min(merged.minDelayMs, flags.delay);
    merged.maxDelayMs = Math.max(merged.maxDelayMs, flags.delay);
  }

  return validateConfig(merged);
}
