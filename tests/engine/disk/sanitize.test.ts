import { describe, it, expect } from 'vitest';
import {
  DEFAULT_FILENAME,
  MAX_FILENAME_BYTES,
  sanitizeFilename,
} from '../../../src/engine/disk/sanitize.js';

describe('sanitizeFilename', () => {
  it('should keep ordinary names', () => {
    expect(sanitizeFilename('photo.jpg')).toBe('photo.jpg');
    expect(sanitizeFilename('.hidden')).toBe('.hidden');
  });

  it('should strip traversal sequences and separators', () => {
    expect(sanitizeFilename('../../etc/passwd')).toBe('etcpasswd');
    expect(sanitizeFilename('..\\..\\x.txt')).toBe('x.txt');
    expect(sanitizeFilename('/abs/path.txt')).toBe('abspath.txt');
  });

  it('should drop characters filesystems reject', () => {
    expect(sanitizeFilename('report<1>.pdf')).toBe('report1.pdf');
    expect(sanitizeFilename('C:\\Windows\\file.txt')).toBe('CWindowsfile.txt');
    expect(sanitizeFilename('a\u0000b\u001f.txt')).toBe('ab.txt');
    expect(sanitizeFilename('what?*|".txt')).toBe('what.txt');
  });

  it('should trim surrounding whitespace', () => {
    expect(sanitizeFilename('  notes.txt  ')).toBe('notes.txt');
  });

  it('should fall back to the default name', () => {
    expect(sanitizeFilename('')).toBe(DEFAULT_FILENAME);
    expect(sanitizeFilename('   ')).toBe(DEFAULT_FILENAME);
    expect(sanitizeFilename('..')).toBe(DEFAULT_FILENAME);
    expect(sanitizeFilename('../')).toBe(DEFAULT_FILENAME);
    expect(sanitizeFilename('<>')).toBe(DEFAULT_FILENAME);
  });

  it('should shorten long names and keep the extension', () => {
    const result = sanitizeFilename(`${'a'.repeat(300)}.txt`);
    expect(result).toHaveLength(MAX_FILENAME_BYTES);
    expect(result).toBe(`${'a'.repeat(251)}.txt`);
  });

  it('should shorten long names without an extension', () => {
    expect(sanitizeFilename('b'.repeat(300))).toBe('b'.repeat(255));
  });

  it('should measure the limit in UTF-8 bytes', () => {
    const result = sanitizeFilename(`${'文'.repeat(200)}.txt`);

    expect(result).toBe(`${'文'.repeat(83)}.txt`);
    expect(Buffer.byteLength(result)).toBe(253);
  });

  it('should never split a surrogate pair', () => {
    const result = sanitizeFilename(`x${'😀'.repeat(100)}`);

    expect(result).toBe(`x${'😀'.repeat(63)}`);
  });
});
