/**
 * Received-file storage.
 *
 * @module engine/disk
 */

export {
  sanitizeFilename,
  fitFilename,
  truncateToBytes,
  DEFAULT_FILENAME,
  MAX_FILENAME_BYTES,
} from './sanitize.js';
export { DirectoryFileSink, candidateName, type DirectoryFileSinkOptions } from './sink.js';
