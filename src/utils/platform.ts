/**
 * Platform-specific path helpers.
 *
 * @module utils/platform
 */

import { platform, homedir } from 'os';
import { join, resolve } from 'path';

/** Current platform is Windows */
export const isWindows = platform() === 'win32';

/**
 * Expands a path that may contain ~ to the user's home directory.
 *
 * @param path - Path that may start with ~/ or ~
 * @returns Expanded absolute path
 */
export function expandPath(path: string): string {
  if (path.startsWith('~/')) {
    return resolve(homedir(), path.slice(2));
  }
  if (path.startsWith('~')) {
    return resolve(homedir(), path.slice(1));
  }
  return path;
}

/**
 * Gets the platform-appropriate default data directory.
 *
 * - Windows: %LOCALAPPDATA%/radiodrop
 * - Unix/macOS: ~/.radiodrop
 */
export function getDefaultDataDir(): string {
  if (isWindows) {
    return join(process.env.LOCALAPPDATA || homedir(), 'radiodrop');
  }
  return join(homedir(), '.radiodrop');
}

/**
 * Gets the default directory received files are written to.
 */
export function getDefaultReceivePath(): string {
  return resolve('received_files');
}

/**
 * Gets the default configuration file path.
 */
export function getDefaultConfigFile(): string {
  return join(getDefaultDataDir(), 'config.json');
}
