/**
 * CLI output utilities for radiodrop commands.
 *
 * Plain-text helpers for the lines commands print after Ink has exited.
 *
 * @module cli/utils/output
 */

import { formatBytes, formatDuration, truncateText } from '../../ui/utils/format.js';

export { formatBytes, formatDuration };

// =============================================================================
// Colors
// =============================================================================

/**
 * ANSI color codes for terminal output
 */
export const ansiColors = {
  reset: '\x1b[0m',
  dim: '\x1b[2m',
  red: '\x1b[31m',
  green: '\x1b[32m',
  yellow: '\x1b[33m',
  cyan: '\x1b[36m',
} as const;

/**
 * Apply ANSI color to text
 */
export function colorize(text: string, color: string): string {
  return `${color}${text}${ansiColors.reset}`;
}

// =============================================================================
// Message Formatting
// =============================================================================

/**
 * Format a success message
 */
export function successMessage(message: string): string {
  return colorize(`[OK] ${message}`, ansiColors.green);
}

/**
 * Format an error message
 */
export function errorMessage(message: string): string {
  return colorize(`[ERROR] ${message}`, ansiColors.red);
}

/**
 * Format a warning message
 */
export function warnMessage(message: string): string {
  return colorize(`[WARN] ${message}`, ansiColors.yellow);
}

// =============================================================================
// Key-Value Display
// =============================================================================

/**
 * Pad (or truncate) text to a fixed width, left aligned
 */
export function padText(text: string, width: number): string {
  const fitted = text.length > width ? truncateText(text, width) : text;
  return fitted.padEnd(width);
}

/**
 * Format a key-value pair for display
 */
export function formatKeyValue(key: string, value: string, keyWidth: number = 12): string {
  return `${colorize(padText(key + ':', keyWidth), ansiColors.dim)} ${value}`;
}

/**
 * Format multiple key-value pairs as a block
 */
export function formatInfoBlock(pairs: Array<[string, string]>, keyWidth: number = 12): string {
  return pairs.map(([key, value]) => formatKeyValue(key, value, keyWidth)).join('\n');
}
