/**
 * Conversion between FileStart wire messages and file-start descriptors.
 *
 * @module engine/protocol/descriptor
 */

import type { FileStartDescriptor, IntegrityInfo } from '../types.js';
import { MessageType, type FileStartMessage } from './messages.js';

/**
 * Picks the single verification source a FileStart advertises.
 *
 * A Merkle root takes precedence; when both are present the hash list is
 * ignored and `ignoredHashList` is set so the caller can warn.
 */
export function describeIntegrity(message: Pick<FileStartMessage, 'merkleRoot' | 'pieceHashes'>): {
  integrity: IntegrityInfo;
  ignoredHashList: boolean;
} {
  if (message.merkleRoot !== undefined && message.merkleRoot !== '') {
    return {
      integrity: { kind: 'merkle', root: message.merkleRoot.toLowerCase() },
      ignoredHashList: message.pieceHashes.length > 0,
    };
  }
  if (message.pieceHashes.length > 0) {
    return {
      integrity: { kind: 'pieceHashes', hashes: message.pieceHashes.map((h) => h.toLowerCase()) },
      ignoredHashList: false,
    };
  }
  return { integrity: { kind: 'none' }, ignoredHashList: false };
}

/**
 * Builds a descriptor from a decoded FileStart message.
 */
export function toFileStartDescriptor(message: Omit<FileStartMessage, 'type'>): FileStartDescriptor {
  return {
    filename: message.filename,
    totalSize: message.totalSize,
    pieceSize: message.pieceSize,
    integrity: describeIntegrity(message).integrity,
  };
}

/**
 * Builds the FileStart message announcing a descriptor.
 */
export function toFileStartMessage(descriptor: FileStartDescriptor): FileStartMessage {
  const message: FileStartMessage = {
    type: MessageType.FileStart,
    filename: descriptor.filename,
    totalSize: descriptor.totalSize,
    pieceSize: descriptor.pieceSize,
    pieceHashes: [],
  };

  switch (descriptor.integrity.kind) {
    case 'merkle':
      message.merkleRoot = descriptor.integrity.root;
      break;
    case 'pieceHashes':
      message.pieceHashes = [...descriptor.integrity.hashes];
      break;
    case 'none':
      break;
  }

  return message;
}
