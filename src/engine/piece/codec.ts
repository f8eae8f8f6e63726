/**
 * Piece Codec
 *
 * Splits file contents into fixed-size pieces and reassembles an
 * index-addressed piece map back into the original bytes. Files on disk
 * are streamed so only one piece-sized buffer is resident at a time
 * while splitting.
 *
 * @module engine/piece/codec
 */

import { createReadStream } from 'fs';
import { MissingPieceError, SizeMismatchError, type Piece } from '../types.js';

// =============================================================================
// Types
// =============================================================================

/**
 * Bounds a piece size is clamped to.
 */
export interface PieceSizeLimits {
  minPieceSize: number;
  maxPieceSize: number;
}

// =============================================================================
// Size Helpers
// =============================================================================

/**
 * Number of pieces for a file: ceil(totalSize / pieceSize), and 0 for an
 * empty file.
 *
 * @throws {RangeError} If pieceSize is not positive while totalSize is
 */
export function calculatePieceCount(totalSize: number, pieceSize: number): number {
  if (totalSize === 0) {
    return 0;
  }
  if (pieceSize <= 0) {
    throw new RangeError(`Piece size must be positive for a non-empty file, got ${pieceSize}`);
  }
  return Math.ceil(totalSize / pieceSize);
}

/**
 * Length of the piece at `index`; the last piece holds the remainder.
 */
export function getPieceLength(index: number, totalSize: number, pieceSize: number): number {
  const start = index * pieceSize;
  return Math.max(0, Math.min(pieceSize, totalSize - start));
}

/**
 * Clamps a requested piece size to the configured bounds and then to the
 * file size, so a small file travels as a single short piece.
 *
 * @example
 * ```typescript
 * clampPieceSize(16, 10_000, { minPieceSize: 64, maxPieceSize: 1024 }); // 64
 * clampPieceSize(1024, 300, { minPieceSize: 64, maxPieceSize: 1024 }); // 300
 * ```
 */
export function clampPieceSize(
  requested: number,
  totalSize: number,
  limits: PieceSizeLimits
): number {
  const bounded = Math.min(Math.max(requested, limits.minPieceSize), limits.maxPieceSize);
  if (totalSize > 0 && bounded > totalSize) {
    return totalSize;
  }
  return bounded;
}

// =============================================================================
// Splitting
// =============================================================================

/**
 * Splits an in-memory buffer into sequential, non-overlapping pieces.
 * Pieces are views into `data`; they are not copied.
 */
export function splitPieces(data: Buffer, pieceSize: number): Piece[] {
  const count = calculatePieceCount(data.length, pieceSize);
  const pieces: Piece[] = [];

  for (let index = 0; index < count; index++) {
    const start = index * pieceSize;
    pieces.push({ index, data: data.subarray(start, Math.min(start + pieceSize, data.length)) });
  }

  return pieces;
}

/**
 * Streams the pieces of a file from disk.
 *
 * The read stream's chunks are re-cut so that every piece except the
 * last is exactly `pieceSize` bytes regardless of how the OS fills
 * reads.
 */
export async function* streamPieces(
  filePath: string,
  pieceSize: number
): AsyncGenerator<Piece, void, undefined> {
  if (pieceSize <= 0) {
    throw new RangeError(`Piece size must be positive, got ${pieceSize}`);
  }

  const stream = createReadStream(filePath, { highWaterMark: pieceSize });
  let pending: Buffer[] = [];
  let pendingLength = 0;
  let index = 0;

  for await (const chunk of stream) {
    const buf = Buffer.isBuffer(chunk) ? chunk : Buffer.from(String(chunk));
    pending.push(buf);
    pendingLength += buf.length;

    while (pendingLength >= pieceSize) {
      const joined = pending.length === 1 ? pending[0] : Buffer.concat(pending, pendingLength);
      yield { index: index++, data: Buffer.from(joined.subarray(0, pieceSize)) };
      const rest = joined.subarray(pieceSize);
      pending = rest.length > 0 ? [rest] : [];
      pendingLength = rest.length;
    }
  }

  if (pendingLength > 0) {
    yield { index, data: Buffer.concat(pending, pendingLength) };
  }
}

// =============================================================================
// Assembly
// =============================================================================

/**
 * Concatenates pieces `0..numPieces-1` in index order.
 *
 * @throws {MissingPieceError} If any index in range is absent
 * @throws {SizeMismatchError} If the result is not exactly expectedTotalSize bytes
 */
export function assemblePieces(
  pieces: ReadonlyMap<number, Buffer>,
  numPieces: number,
  expectedTotalSize: number
): Buffer {
  const ordered: Buffer[] = [];
  let size = 0;

  for (let index = 0; index < numPieces; index++) {
    const data = pieces.get(index);
    if (data === undefined) {
      throw new MissingPieceError(index);
    }
    ordered.push(data);
    size += data.length;
  }

  if (size !== expectedTotalSize) {
    throw new SizeMismatchError(expectedTotalSize, size);
  }

  return Buffer.concat(ordered, size);
}
