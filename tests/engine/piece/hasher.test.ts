import { describe, it, expect } from 'vitest';
import { createHash } from 'crypto';
import {
  HASH_HEX_LENGTH,
  computeDigest,
  decodeHash,
  hashBytes,
  hashesEqual,
  isValidHash,
  merkleRoot,
} from '../../../src/engine/piece/hasher.js';
import { MalformedHashError } from '../../../src/engine/types.js';

// =============================================================================
// Test Data Helpers
// =============================================================================

function sha256(data: Buffer): Buffer {
  return createHash('sha256').update(data).digest();
}

/** Parent node: hash of the two raw child digests */
function parent(leftHex: string, rightHex: string): string {
  return sha256(Buffer.concat([Buffer.from(leftHex, 'hex'), Buffer.from(rightHex, 'hex')])).toString('hex');
}

const EMPTY_HASH = 'e3b0c44298fc1c149afbf4c8996fb92427ae41e4649b934ca495991b7852b855';

const h = (text: string): string => hashBytes(Buffer.from(text));

// =============================================================================
// Digest Tests
// =============================================================================

describe('hashBytes', () => {
  it('should hash empty data to the SHA-256 empty digest', () => {
    expect(hashBytes(Buffer.alloc(0))).toBe(EMPTY_HASH);
  });

  it('should compute correct hash for "abc"', () => {
    expect(h('abc')).toBe('ba7816bf8f01cfea414140de5dae2223b00361a396177a9cb410ff61f20015ad');
  });

  it('should return lowercase hex of the expected length', () => {
    const hash = h('hello');
    expect(hash).toHaveLength(HASH_HEX_LENGTH);
    expect(hash).toBe(hash.toLowerCase());
  });

  it('should match computeDigest', () => {
    const data = Buffer.from('radio');
    expect(hashBytes(data)).toBe(computeDigest(data).toString('hex'));
  });
});

describe('decodeHash / isValidHash', () => {
  it('should decode a valid digest to 32 bytes', () => {
    expect(decodeHash(EMPTY_HASH)).toHaveLength(32);
    expect(isValidHash(EMPTY_HASH)).toBe(true);
  });

  it('should accept uppercase hex', () => {
    expect(isValidHash(EMPTY_HASH.toUpperCase())).toBe(true);
  });

  it('should reject wrong lengths and non-hex characters', () => {
    expect(isValidHash('abcd')).toBe(false);
    expect(isValidHash('z'.repeat(64))).toBe(false);
    expect(() => decodeHash('abcd')).toThrow(MalformedHashError);
    expect(() => decodeHash('g'.repeat(64))).toThrow(MalformedHashError);
  });
});

describe('hashesEqual', () => {
  it('should ignore letter case', () => {
    expect(hashesEqual(EMPTY_HASH, EMPTY_HASH.toUpperCase())).toBe(true);
    expect(hashesEqual(EMPTY_HASH, h('x'))).toBe(false);
  });
});

// =============================================================================
// Merkle Root Tests
// =============================================================================

describe('merkleRoot', () => {
  it('should return the empty digest for no pieces', () => {
    expect(merkleRoot([])).toBe(EMPTY_HASH);
  });

  it('should return the only hash for a single piece', () => {
    expect(merkleRoot([h('only')])).toBe(h('only'));
  });

  it('should normalise a single uppercase hash to lowercase', () => {
    expect(merkleRoot([h('only').toUpperCase()])).toBe(h('only'));
  });

  it('should hash the concatenated raw digests of two pieces', () => {
    const a = h('a');
    const b = h('b');
    expect(merkleRoot([a, b])).toBe(parent(a, b));
  });

  it('should pair the last node with itself on odd levels', () => {
    const [a, b, c] = [h('a'), h('b'), h('c')];
    const expected = parent(parent(a, b), parent(c, c));
    expect(merkleRoot([a, b, c])).toBe(expected);
  });

  it('should build a balanced tree for four pieces', () => {
    const [a, b, c, d] = [h('a'), h('b'), h('c'), h('d')];
    expect(merkleRoot([a, b, c, d])).toBe(parent(parent(a, b), parent(c, d)));
  });

  it('should handle five pieces with duplication on two levels', () => {
    const [a, b, c, d, e] = [h('a'), h('b'), h('c'), h('d'), h('e')];
    const ab = parent(a, b);
    const cd = parent(c, d);
    const ee = parent(e, e);
    const abcd = parent(ab, cd);
    const eeee = parent(ee, ee);
    expect(merkleRoot([a, b, c, d, e])).toBe(parent(abcd, eeee));
  });

  it('should depend on piece order', () => {
    const a = h('a');
    const b = h('b');
    expect(merkleRoot([a, b])).not.toBe(merkleRoot([b, a]));
  });

  it('should change when any single piece changes', () => {
    const hashes = ['p0', 'p1', 'p2', 'p3', 'p4'].map(h);
    const root = merkleRoot(hashes);
    for (let i = 0; i < hashes.length; i++) {
      const changed = [...hashes];
      changed[i] = h(`changed-${i}`);
      expect(merkleRoot(changed)).not.toBe(root);
    }
  });

  it('should be deterministic', () => {
    const hashes = ['x', 'y', 'z'].map(h);
    expect(merkleRoot(hashes)).toBe(merkleRoot([...hashes]));
  });

  it('should return null when any hash is malformed', () => {
    expect(merkleRoot([h('a'), 'not-a-hash'])).toBeNull();
    expect(merkleRoot([''])).toBeNull();
  });
});
