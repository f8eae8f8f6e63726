/**
 * Filename sanitization for received files.
 *
 * Names come from the remote FileStart and are untrusted. The result is a
 * single path component that cannot climb out of the receive directory.
 *
 * @module engine/disk/sanitize
 */

import { extname } from 'path';

// =============================================================================
// Constants
// =============================================================================

/** Name used when nothing usable remains */
export const DEFAULT_FILENAME = 'unnamed_file';

/** Longest name most filesystems accept, in bytes of UTF-8 */
export const MAX_FILENAME_BYTES = 255;

/** Characters rejected by common filesystems, plus ASCII control codes */
const UNSAFE_CHARS = /[<>:"|?*\u0000-\u001f]/g;

// =============================================================================
// Functions
// =============================================================================

/**
 * Reduces an untrusted filename to a safe single path component.
 *
 * Path separators and traversal sequences are removed, unsafe characters
 * dropped, and the name shortened to 255 UTF-8 bytes keeping its extension.
 *
 * @example
 * ```typescript
 * sanitizeFilename('../../etc/passwd'); // 'etcpasswd'
 * sanitizeFilename('report<1>.pdf');    // 'report1.pdf'
 * sanitizeFilename('..');               // 'unnamed_file'
 * ```
 */
export function sanitizeFilename(filename: string): string {
  const name = filename
    .replace(/\.\.[/\\]/g, '')
    .replace(/[/\\]/g, '')
    .replace(UNSAFE_CHARS, '')
    .trim();

  if (name === '' || /^\.+$/.test(name)) {
    return DEFAULT_FILENAME;
  }

  return fitFilename(name);
}

/**
 * Longest prefix of `text` that fits in `maxBytes` of UTF-8, never
 * splitting a code point.
 */
export function truncateToBytes(text: string, maxBytes: number): string {
  let result = '';
  let used = 0;
  for (const char of text) {
    const size = Buffer.byteLength(char);
    if (used + size > maxBytes) {
      break;
    }
    result += char;
    used += size;
  }
  return result;
}

/**
 * Shortens a name to `maxBytes` of UTF-8, keeping its extension when the
 * extension itself fits.
 */
export function fitFilename(name: string, maxBytes: number = MAX_FILENAME_BYTES): string {
  if (Buffer.byteLength(name) <= maxBytes) {
    return name;
  }
  const extension = extname(name);
  const extensionBytes = Buffer.byteLength(extension);
  if (extension.length > 0 && extensionBytes < maxBytes) {
    return truncateToBytes(name.slice(0, -extension.length), maxBytes - extensionBytes) + extension;
  }
  return truncateToBytes(name, maxBytes);
}
