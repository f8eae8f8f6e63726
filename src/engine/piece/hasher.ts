/**
 * Piece Hashing and Merkle Root Module
 *
 * Provides SHA-256 content hashes for pieces and the Merkle root that
 * summarises an ordered list of piece hashes. The tree shape is fixed by
 * the protocol: consecutive nodes are paired, the parent is the hash of
 * the two raw digests concatenated, and an odd level duplicates its last
 * node. Both ends must build the tree exactly this way.
 *
 * @module engine/piece/hasher
 */

import { createHash } from 'crypto';
import { MalformedHashError } from '../types.js';

// =============================================================================
// Constants
// =============================================================================

/** Hash algorithm used throughout the protocol */
export const HASH_ALGORITHM = 'sha256';

/** Size of a SHA-256 digest in bytes */
export const HASH_SIZE = 32;

/** Length of a hex-encoded digest */
export const HASH_HEX_LENGTH = HASH_SIZE * 2;

const HEX_PATTERN = /^[0-9a-fA-F]+$/;

// =============================================================================
// Digest Functions
// =============================================================================

/**
 * Computes the raw SHA-256 digest of the provided data.
 */
export function computeDigest(data: Uint8Array): Buffer {
  return createHash(HASH_ALGORITHM).update(data).digest();
}

/**
 * Computes the hex-encoded SHA-256 hash of the provided data.
 *
 * @example
 * ```typescript
 * hashBytes(Buffer.alloc(0));
 * // 'e3b0c44298fc1c149afbf4c8996fb92427ae41e4649b934ca495991b7852b855'
 * ```
 */
export function hashBytes(data: Uint8Array): string {
  return computeDigest(data).toString('hex');
}

/**
 * Decodes a hex-encoded digest into its raw bytes.
 *
 * @throws {MalformedHashError} Unless the input is exactly 64 hex characters
 */
export function decodeHash(hash: string): Buffer {
  if (hash.length !== HASH_HEX_LENGTH || !HEX_PATTERN.test(hash)) {
    throw new MalformedHashError(hash);
  }
  return Buffer.from(hash, 'hex');
}

/**
 * Returns true if the value is a well-formed hex digest.
 */
export function isValidHash(hash: string): boolean {
  return hash.length === HASH_HEX_LENGTH && HEX_PATTERN.test(hash);
}

// =============================================================================
// Merkle Root
// =============================================================================

/**
 * Computes one level up the tree from raw digests.
 */
function nextLevel(level: Buffer[]): Buffer[] {
  const parents: Buffer[] = [];
  for (let i = 0; i < level.length; i += 2) {
    const left = level[i];
    // Odd count: the last node is paired with itself
    const right = i + 1 < level.length ? level[i + 1] : left;
    parents.push(computeDigest(Buffer.concat([left, right])));
  }
  return parents;
}

/**
 * Computes the Merkle root of an ordered list of hex-encoded hashes.
 *
 * An empty list yields the hash of empty data. A list containing any
 * malformed hash yields null, meaning integrity cannot be established.
 *
 * @param hashes - Hex-encoded piece hashes in piece order
 * @returns Hex-encoded root, or null if a hash could not be decoded
 */
export function merkleRoot(hashes: readonly string[]): string | null {
  if (hashes.length === 0) {
    return hashBytes(Buffer.alloc(0));
  }

  let level: Buffer[];
  try {
    level = hashes.map(decodeHash);
  } catch (err) {
    if (err instanceof MalformedHashError) {
      return null;
    }
    throw err;
  }

  while (level.length > 1) {
    level = nextLevel(level);
  }

  return level[0].toString('hex');
}

/**
 * Compares two hex digests without regard to letter case.
 */
export function hashesEqual(a: string, b: string): boolean {
  return a.toLowerCase() === b.toLowerCase();
}
