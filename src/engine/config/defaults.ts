/**
 * Default configuration values for the radiodrop engine.
 *
 * The defaults suit a slow, lossy radio link: small pieces, a fifth of a
 * second between pieces, and a few minutes of patience before a silent
 * transfer is dropped.
 *
 * @module engine/config/defaults
 */

import type { EngineConfig } from '../types.js';

/** Smallest accepted piece size in bytes */
export const MIN_PIECE_SIZE = 64;

/** Largest accepted piece size in bytes (1 MiB) */
export const MAX_PIECE_SIZE = 1024 * 1024;

/** Piece size used when none is configured */
export const DEFAULT_PIECE_SIZE = 1024;

/** Largest accepted file (10 GiB) */
export const MAX_FILE_SIZE = 10 * 1024 * 1024 * 1024;

/** Times a piece may be requested before the transfer fails */
export const DEFAULT_MAX_RETRIES = 3;

/** Transport port number carrying protocol messages */
export const DEFAULT_CHANNEL = 123;

/**
 * Default engine configuration.
 */
export const DEFAULT_CONFIG: EngineConfig = {
  pieceSize: DEFAULT_PIECE_SIZE,
  minPieceSize: MIN_PIECE_SIZE,
  maxPieceSize: MAX_PIECE_SIZE,
  maxFileSize: MAX_FILE_SIZE,

  /** Advertise a Merkle root; the full hash list costs 64 bytes per piece */
  useMerkleRoot: true,

  initialDelayMs: 200,
  minDelayMs: 50,
  maxDelayMs: 1000,
  retryThreshold: 3,
  delayMultiplier: 1.5,
  maxSendFailures: 5,

  maxRetries: DEFAULT_MAX_RETRIES,
  requestIntervalMs: 10_000,
  inactivityTimeoutMs: 300_000,
  tickIntervalMs: 5_000,

  channel: DEFAULT_CHANNEL,
};

/**
 * Merges a partial configuration with the default configuration.
 *
 * Keys whose value is `undefined` keep their default.
 *
 * @param partialConfig - Partial configuration to merge
 * @returns Complete configuration with defaults applied
 */
export function mergeWithDefaults(partialConfig?: Partial<EngineConfig>): EngineConfig {
  const merged: EngineConfig = { ...DEFAULT_CONFIG };
  if (!partialConfig) {
    return merged;
  }

  for (const key of Object.keys(partialConfig) as Array<keyof EngineConfig>) {
    const value = partialConfig[key];
    if (value !== undefined) {
      Object.assign(merged, { [key]: value });
    }
  }
  return merged;
}
