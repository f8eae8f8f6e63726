/**
 * Logging capability for the radiodrop engine.
 *
 * Every component receives a Logger at construction; there is no shared
 * module-level logger. The console logger prefixes each line with an ISO
 * timestamp and level, and can mirror lines into a log file.
 *
 * @module engine/logger
 */

import { appendFile, mkdir } from 'fs/promises';
import { dirname } from 'path';
import { expandPath } from '../utils/platform.js';

// =============================================================================
// Types
// =============================================================================

/** Log severity, lowest first */
export type LogLevel = 'debug' | 'info' | 'warn' | 'error';

/**
 * Minimal logging capability.
 */
export interface Logger {
  debug(message: string): void;
  info(message: string): void;
  warn(message: string): void;
  error(message: string): void;
}

/**
 * Options for the console logger
 */
export interface ConsoleLoggerOptions {
  /** Lowest level written (default: 'info') */
  level?: LogLevel;

  /** Tag placed after the level, e.g. "receiver" */
  scope?: string;

  /** Optional file the formatted lines are appended to */
  logFile?: string;

  /** Sink for formatted lines (default: console.log / console.error) */
  write?: (line: string, level: LogLevel) => void;
}

// =============================================================================
// Constants
// =============================================================================

const LEVEL_ORDER: Record<LogLevel, number> = {
  debug: 10,
  info: 20,
  warn: 30,
  error: 40,
};

// =============================================================================
// Helpers
// =============================================================================

/**
 * Format a log line
 *
 * @example
 * formatLogLine(new Date(0), 'warn', 'piece 3 out of range', 'receiver')
 * // "[1970-01-01T00:00:00.000Z] WARN  [receiver] piece 3 out of range"
 */
export function formatLogLine(
  timestamp: Date,
  level: LogLevel,
  message: string,
  scope?: string
): string {
  const tag = scope ? `[${scope}] ` : '';
  return `[${timestamp.toISOString()}] ${level.toUpperCase().padEnd(5)} ${tag}${message}`;
}

/**
 * Returns true when a message at `level` passes the `threshold`.
 */
export function isLevelEnabled(level: LogLevel, threshold: LogLevel): boolean {
  return LEVEL_ORDER[level] >= LEVEL_ORDER[threshold];
}

function defaultWrite(line: string, level: LogLevel): void {
  if (level === 'error' || level === 'warn') {
    console.error(line);
  } else {
    console.log(line);
  }
}

// =============================================================================
// Factories
// =============================================================================

/**
 * Creates a logger writing timestamped lines to the console and,
 * optionally, appending them to a log file.
 */
export function createConsoleLogger(options: ConsoleLoggerOptions = {}): Logger {
  const threshold = options.level ?? 'info';
  const write = options.write ?? defaultWrite;
  const logFile = options.logFile ? expandPath(options.logFile) : null;
  // Appends are chained so lines land in the order they were logged
  let fileQueue: Promise<void> | null = null;

  const appendToFile = (line: string): void => {
    if (!logFile) return;
    const previous = fileQueue ?? mkdir(dirname(logFile), { recursive: true }).then(() => undefined);
    fileQueue = previous
      .then(() => appendFile(logFile, line + '\n'))
      .catch((err: unknown) => {
        const reason = err instanceof Error ? err.message : String(err);
        write(formatLogLine(new Date(), 'error', `log file write failed: ${reason}`), 'error');
      });
  };

  const log = (level: LogLevel, message: string): void => {
    if (!isLevelEnabled(level, threshold)) return;
    const line = formatLogLine(new Date(), level, message, options.scope);
    write(line, level);
    appendToFile(line);
  };

  return {
    debug: (message) => log('debug', message),
    info: (message) => log('info', message),
    warn: (message) => log('warn', message),
    error: (message) => log('error', message),
  };
}

/**
 * Creates a logger that discards everything.
 */
export function createSilentLogger(): Logger {
  const noop = (): void => {};
  return { debug: noop, info: noop, warn: noop, error: noop };
}

/**
 * Wraps a logger so every message carries a scope tag.
 */
export function scopeLogger(logger: Logger, scope: string): Logger {
  return {
    debug: (message) => logger.debug(`[${scope}] ${message}`),
    info: (message) => logger.info(`[${scope}] ${message}`),
    warn: (message) => logger.warn(`[${scope}] ${message}`),
    error: (message) => logger.error(`[${scope}] ${message}`),
  };
}
