/**
 * Piece hashing and codec module.
 *
 * @module engine/piece
 */

export {
  HASH_ALGORITHM,
  HASH_SIZE,
  HASH_HEX_LENGTH,
  computeDigest,
  hashBytes,
  decodeHash,
  isValidHash,
  merkleRoot,
  hashesEqual,
} from './hasher.js';

export {
  type PieceSizeLimits,
  calculatePieceCount,
  getPieceLength,
  clampPieceSize,
  splitPieces,
  streamPieces,
  assemblePieces,
} from './codec.js';
