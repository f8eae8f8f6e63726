/**
 * Transfer Protocol Wire Messages
 *
 * Binary encoding of the four protocol messages. Each datagram carries
 * exactly one message: a one-byte type identifier followed by the
 * message body. Multi-byte integers are big-endian.
 *
 * Layouts:
 * - FileStart:       u16 name length, name (UTF-8), u64 total size,
 *                    u32 piece size, u8 flags, [32-byte root],
 *                    u32 hash count, hash count x 32-byte digests
 * - PieceData:       u32 index, piece bytes (rest of datagram)
 * - ResumeRequest:   u32 n, n x u32 missing, u32 m, m x u32 acknowledged
 * - Acknowledgement: u32 index
 *
 * Hashes travel as raw digests and are exposed as lowercase hex.
 *
 * @module engine/protocol/messages
 */

import { MessageDecodeError } from '../types.js';
import { HASH_SIZE, decodeHash } from '../piece/hasher.js';

// =============================================================================
// Constants
// =============================================================================

/** Length of the type identifier */
export const TYPE_LENGTH = 1;

/** FileStart flag: a Merkle root follows */
const FLAG_MERKLE_ROOT = 0x01;

/** Largest encodable filename in bytes */
export const MAX_FILENAME_BYTES = 0xffff;

/** Largest index or count representable on the wire */
const MAX_UINT32 = 0xffffffff;

// =============================================================================
// Message Types
// =============================================================================

/**
 * Protocol message type identifiers
 */
export enum MessageType {
  /** Announces a file and its integrity metadata */
  FileStart = 1,

  /** Carries one piece */
  PieceData = 2,

  /** Reports missing and held pieces back to the sender */
  ResumeRequest = 3,

  /** Single-piece acknowledgement (reserved) */
  Acknowledgement = 4,
}

/**
 * FileStart message
 */
export interface FileStartMessage {
  type: MessageType.FileStart;
  filename: string;
  totalSize: number;
  pieceSize: number;
  /** Hex-encoded Merkle root, when advertised */
  merkleRoot?: string;
  /** Hex-encoded per-piece hashes (empty when not advertised) */
  pieceHashes: string[];
}

/**
 * PieceData message
 */
export interface PieceDataMessage {
  type: MessageType.PieceData;
  pieceIndex: number;
  data: Buffer;
}

/**
 * ResumeRequest message
 */
export interface ResumeRequestMessage {
  type: MessageType.ResumeRequest;
  missingIndices: number[];
  acknowledgedIndices: number[];
}

/**
 * Acknowledgement message
 */
export interface AcknowledgementMessage {
  type: MessageType.Acknowledgement;
  pieceIndex: number;
}

/**
 * Union of all protocol messages
 */
export type ProtocolMessage =
  | FileStartMessage
  | PieceDataMessage
  | ResumeRequestMessage
  | AcknowledgementMessage;

// =============================================================================
// Encoding
// =============================================================================

function assertUInt32(value: number, field: string): void {
  if (!Number.isInteger(value) || value < 0 || value > MAX_UINT32) {
    throw new RangeError(`${field} must be an unsigned 32-bit integer, got ${value}`);
  }
}

function encodeIndexList(indices: readonly number[], field: string): Buffer {
  const buf = Buffer.alloc(4 + indices.length * 4);
  buf.writeUInt32BE(indices.length, 0);
  indices.forEach((index, i) => {
    assertUInt32(index, field);
    buf.writeUInt32BE(index, 4 + i * 4);
  });
  return buf;
}

/**
 * Encode a FileStart message
 *
 * @throws {MalformedHashError} If the root or a piece hash is not a valid digest
 * @throws {RangeError} If a size field cannot be represented
 */
export function encodeFileStart(message: Omit<FileStartMessage, 'type'>): Buffer {
  const name = Buffer.from(message.filename, 'utf-8');
  if (name.length > MAX_FILENAME_BYTES) {
    throw new RangeError(`Filename too long: ${name.length} bytes`);
  }
  if (!Number.isSafeInteger(message.totalSize) || message.totalSize < 0) {
    throw new RangeError(`Invalid total size: ${message.totalSize}`);
  }
  assertUInt32(message.pieceSize, 'pieceSize');

  const root = message.merkleRoot !== undefined ? decodeHash(message.merkleRoot) : null;
  const hashes = message.pieceHashes.map(decodeHash);

  const header = Buffer.alloc(TYPE_LENGTH + 2);
  header.writeUInt8(MessageType.FileStart, 0);
  header.writeUInt16BE(name.length, 1);

  const sizes = Buffer.alloc(8 + 4 + 1);
  sizes.writeBigUInt64BE(BigInt(message.totalSize), 0);
  sizes.writeUInt32BE(message.pieceSize, 8);
  sizes.writeUInt8(root ? FLAG_MERKLE_ROOT : 0, 12);

  const count = Buffer.alloc(4);
  count.writeUInt32BE(hashes.length, 0);

  return Buffer.concat([header, name, sizes, ...(root ? [root] : []), count, ...hashes]);
}

/**
 * Encode a PieceData message
 */
export function encodePieceData(pieceIndex: number, data: Buffer): Buffer {
  assertUInt32(pieceIndex, 'pieceIndex');
  const header = Buffer.alloc(TYPE_LENGTH + 4);
  header.writeUInt8(MessageType.PieceData, 0);
  header.writeUInt32BE(pieceIndex, 1);
  return Buffer.concat([header, data]);
}

/**
 * Encode a ResumeRequest message
 */
export function encodeResumeRequest(
  missingIndices: readonly number[],
  acknowledgedIndices: readonly number[]
): Buffer {
  return Buffer.concat([
    Buffer.from([MessageType.ResumeRequest]),
    encodeIndexList(missingIndices, 'missingIndices'),
    encodeIndexList(acknowledgedIndices, 'acknowledgedIndices'),
  ]);
}

/**
 * Encode an Acknowledgement message
 */
export function encodeAcknowledgement(pieceIndex: number): Buffer {
  assertUInt32(pieceIndex, 'pieceIndex');
  const buf = Buffer.alloc(TYPE_LENGTH + 4);
  buf.writeUInt8(MessageType.Acknowledgement, 0);
  buf.writeUInt32BE(pieceIndex, 1);
  return buf;
}

/**
 * Encode any protocol message
 */
export function encodeMessage(message: ProtocolMessage): Buffer {
  switch (message.type) {
    case MessageType.FileStart:
      return encodeFileStart(message);
    case MessageType.PieceData:
      return encodePieceData(message.pieceIndex, message.data);
    case MessageType.ResumeRequest:
      return encodeResumeRequest(message.missingIndices, message.acknowledgedIndices);
    case MessageType.Acknowledgement:
      return encodeAcknowledgement(message.pieceIndex);
  }
}

// =============================================================================
// Decoding
// =============================================================================

/**
 * Sequential reader that raises MessageDecodeError on truncation.
 */
class Reader {
  private offset: number;

  constructor(
    private readonly buf: Buffer,
    private readonly messageName: string,
    offset: number
  ) {
    this.offset = offset;
  }

  private need(length: number, field: string): void {
    if (this.offset + length > this.buf.length) {
      throw new MessageDecodeError(
        `${this.messageName} truncated reading ${field}: need ${length} bytes at offset ${this.offset}, have ${this.buf.length - this.offset}`
      );
    }
  }

  uint8(field: string): number {
    this.need(1, field);
    return this.buf.readUInt8(this.offset++);
  }

  uint16(field: string): number {
    this.need(2, field);
    const value = this.buf.readUInt16BE(this.offset);
    this.offset += 2;
    return value;
  }

  uint32(field: string): number {
    this.need(4, field);
    const value = this.buf.readUInt32BE(this.offset);
    this.offset += 4;
    return value;
  }

  uint64(field: string): number {
    this.need(8, field);
    const value = this.buf.readBigUInt64BE(this.offset);
    this.offset += 8;
    if (value > BigInt(Number.MAX_SAFE_INTEGER)) {
      throw new MessageDecodeError(`${this.messageName} ${field} too large: ${value}`);
    }
    return Number(value);
  }

  bytes(length: number, field: string): Buffer {
    this.need(length, field);
    const value = Buffer.from(this.buf.subarray(this.offset, this.offset + length));
    this.offset += length;
    return value;
  }

  rest(): Buffer {
    const value = Buffer.from(this.buf.subarray(this.offset));
    this.offset = this.buf.length;
    return value;
  }

  indexList(field: string): number[] {
    const count = this.uint32(`${field} count`);
    this.need(count * 4, field);
    const indices: number[] = [];
    for (let i = 0; i < count; i++) {
      indices.push(this.uint32(field));
    }
    return indices;
  }

  end(): void {
    if (this.offset !== this.buf.length) {
      throw new MessageDecodeError(
        `${this.messageName} has ${this.buf.length - this.offset} trailing bytes`
      );
    }
  }
}

function decodeFileStart(reader: Reader): FileStartMessage {
  const nameLength = reader.uint16('filename length');
  const filename = reader.bytes(nameLength, 'filename').toString('utf-8');
  const totalSize = reader.uint64('total size');
  const pieceSize = reader.uint32('piece size');
  const flags = reader.uint8('flags');
  const merkleRoot =
    flags & FLAG_MERKLE_ROOT ? reader.bytes(HASH_SIZE, 'merkle root').toString('hex') : undefined;

  const hashCount = reader.uint32('hash count');
  const pieceHashes: string[] = [];
  for (let i = 0; i < hashCount; i++) {
    pieceHashes.push(reader.bytes(HASH_SIZE, 'piece hash').toString('hex'));
  }
  reader.end();

  const message: FileStartMessage = {
    type: MessageType.FileStart,
    filename,
    totalSize,
    pieceSize,
    pieceHashes,
  };
  if (merkleRoot !== undefined) {
    message.merkleRoot = merkleRoot;
  }
  return message;
}

/**
 * Decode a datagram into a protocol message.
 *
 * @throws {MessageDecodeError} If the datagram is empty, truncated,
 *   carries trailing bytes or has an unknown type
 */
export function decodeMessage(data: Buffer): ProtocolMessage {
  if (data.length < TYPE_LENGTH) {
    throw new MessageDecodeError('Empty message');
  }

  const type = data.readUInt8(0);
  switch (type) {
    case MessageType.FileStart:
      return decodeFileStart(new Reader(data, 'FileStart', TYPE_LENGTH));

    case MessageType.PieceData: {
      const reader = new Reader(data, 'PieceData', TYPE_LENGTH);
      const pieceIndex = reader.uint32('piece index');
      return { type: MessageType.PieceData, pieceIndex, data: reader.rest() };
    }

    case MessageType.ResumeRequest: {
      const reader = new Reader(data, 'ResumeRequest', TYPE_LENGTH);
      const missingIndices = reader.indexList('missing indices');
      const acknowledgedIndices = reader.indexList('acknowledged indices');
      reader.end();
      return { type: MessageType.ResumeRequest, missingIndices, acknowledgedIndices };
    }

    case MessageType.Acknowledgement: {
      const reader = new Reader(data, 'Acknowledgement', TYPE_LENGTH);
      const pieceIndex = reader.uint32('piece index');
      reader.end();
      return { type: MessageType.Acknowledgement, pieceIndex };
    }

    default:
      throw new MessageDecodeError(`Unknown message type: ${type}`);
  }
}

/**
 * Get human-readable name for a message type
 */
export function getMessageName(type: number): string {
  switch (type) {
    case MessageType.FileStart:
      return 'FILE_START';
    case MessageType.PieceData:
      return 'PIECE_DATA';
    case MessageType.ResumeRequest:
      return 'RESUME_REQUEST';
    case MessageType.Acknowledgement:
      return 'ACKNOWLEDGEMENT';
    default:
      return `UNKNOWN(${type})`;
  }
}
