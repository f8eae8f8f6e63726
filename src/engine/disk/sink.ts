/**
 * Directory file sink
 *
 * Writes completed transfers into a directory. Names are sanitized, and a
 * name that already exists gets a numeric suffix (`photo_1.jpg`,
 * `photo_2.jpg`, ...) instead of being overwritten.
 *
 * @module engine/disk/sink
 */

import * as fs from 'fs/promises';
import * as path from 'path';
import { expandPath } from '../../utils/platform.js';
import { createSilentLogger, type Logger } from '../logger.js';
import type { FileSink } from '../types.js';
import { MAX_FILENAME_BYTES, sanitizeFilename, truncateToBytes } from './sanitize.js';

// =============================================================================
// Constants
// =============================================================================

/** Suffixes tried before giving up on a name */
const MAX_NAME_ATTEMPTS = 10_000;

// =============================================================================
// Types
// =============================================================================

/**
 * Options for DirectoryFileSink
 */
export interface DirectoryFileSinkOptions {
  logger?: Logger;
}

// =============================================================================
// Helpers
// =============================================================================

/**
 * Returns the candidate name for an attempt: the name itself first, then
 * `base_N.ext`.
 */
export function candidateName(filename: string, attempt: number): string {
  if (attempt === 0) {
    return filename;
  }
  const extension = path.extname(filename);
  const base = extension.length > 0 ? filename.slice(0, -extension.length) : filename;
  const suffix = `_${attempt}${extension}`;
  return truncateToBytes(base, MAX_FILENAME_BYTES - Buffer.byteLength(suffix)) + suffix;
}

// =============================================================================
// DirectoryFileSink Class
// =============================================================================

/**
 * Saves received files into a directory.
 *
 * @example
 * ```typescript
 * const sink = new DirectoryFileSink('~/received_files');
 * const location = await sink.save('notes.txt', Buffer.from('hello'));
 * ```
 */
export class DirectoryFileSink implements FileSink {
  /** Absolute directory files are written to */
  readonly directory: string;

  private readonly logger: Logger;

  constructor(directory: string, options: DirectoryFileSinkOptions = {}) {
    this.directory = path.resolve(expandPath(directory));
    this.logger = options.logger ?? createSilentLogger();
  }

  /**
   * Writes a file and returns the path it was written to.
   *
   * @throws If the directory cannot be created or no free name is found
   */
  async save(filename: string, data: Buffer): Promise<string> {
    await fs.mkdir(this.directory, { recursive: true });

    const safeName = sanitizeFilename(filename);
    if (safeName !== filename) {
      this.logger.warn(`Sanitized filename '${filename}' to '${safeName}'`);
    }

    for (let attempt = 0; attempt < MAX_NAME_ATTEMPTS; attempt++) {
      const filePath = path.join(this.directory, candidateName(safeName, attempt));
      try {
        // 'wx' fails instead of overwriting an existing file
        await fs.writeFile(filePath, data, { flag: 'wx' });
        this.logger.debug(`Wrote ${data.length} bytes to ${filePath}`);
        return filePath;
      } catch (err) {
        const error = err as NodeJS.ErrnoException;
        if (error.code !== 'EEXIST') {
          throw err;
        }
      }
    }

    throw new Error(`No free file name for '${safeName}' in ${this.directory}`);
  }
}
