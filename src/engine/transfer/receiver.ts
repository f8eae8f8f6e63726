/**
 * Transfer Receiver
 *
 * Receiving side of the protocol. A FileStart opens a transfer, pieces are
 * collected as they arrive, and once every piece is held the file is
 * verified against the advertised integrity source (Merkle root, per-piece
 * hashes, or none), assembled and handed to the file sink.
 *
 * Recovery is receiver-driven: `periodicTick` asks the sender for missing
 * pieces once the link has been quiet for the request interval, fails a
 * transfer when a piece has been requested too often, and drops transfers
 * that have been idle past the inactivity timeout.
 *
 * Broadcast transfers are collected and verified like unicast ones but
 * never send resume requests.
 *
 * @module engine/transfer/receiver
 */

import { TypedEventEmitter, type ReceiverEvents } from '../events.js';
import { mergeWithDefaults, validateConfig } from '../config/index.js';
import { createSilentLogger, type Logger } from '../logger.js';
import {
  CapabilityError,
  ReceiverTransferState,
  type EngineConfig,
  type FileSink,
  type FileStartDescriptor,
  type PartialEngineConfig,
  type ReceiverTransferSnapshot,
  type Transport,
} from '../types.js';
import { hashBytes, hashesEqual, merkleRoot } from '../piece/hasher.js';
import { assemblePieces, calculatePieceCount } from '../piece/codec.js';
import { encodeResumeRequest } from '../protocol/messages.js';
import { TransferRegistry } from './registry.js';
import { RetryPolicy } from './backoff.js';

// =============================================================================
// Types
// =============================================================================

/**
 * Options for the TransferReceiver
 */
export interface TransferReceiverOptions {
  /** Link resume requests are sent over */
  transport: Transport;

  /** Destination for completed files */
  sink: FileSink;

  /** Engine configuration overrides */
  config?: PartialEngineConfig;

  logger?: Logger;

  /** Clock in milliseconds (default: Date.now) */
  now?: () => number;
}

/**
 * Piece contents as seen by the receiver
 */
export interface PieceDataInput {
  pieceIndex: number;
  data: Buffer;
}

/**
 * State of one incoming transfer.
 *
 * `received` and `missing` partition `0..pieceCount-1` while collecting.
 */
interface ReceiverRecord {
  transferId: string;
  origin: string;
  isBroadcast: boolean;
  descriptor: FileStartDescriptor;
  pieceCount: number;
  received: Map<number, Buffer>;
  receivedHashes: Map<number, string>;
  missing: Set<number>;
  requested: Set<number>;
  retryCount: Map<number, number>;
  state: ReceiverTransferState;
  startedAt: number;
  lastActivityAt: number;
  lastRequestAt: number;
}

/**
 * Outcome of verifying a fully collected transfer
 */
type Verification =
  | { kind: 'pass'; detail: string }
  | { kind: 'merkle-mismatch'; expected: string; actual: string | null }
  | { kind: 'hash-mismatch'; bad: number[] };

/**
 * Decision taken under the lock when a transfer may be complete
 */
type CompletionDecision =
  | { kind: 'waiting' }
  | { kind: 'assemble'; detail: string }
  | { kind: 'rerequest'; indices: number[]; reason: 'merkle' | 'hash'; detail: string };

/**
 * Result of assembling under the lock
 */
type AssemblyResult =
  | { kind: 'ok'; filename: string; data: Buffer; origin: string; isBroadcast: boolean; pieceCount: number }
  | { kind: 'failed'; filename: string; reason: string };

// =============================================================================
// Helpers
// =============================================================================

/**
 * Transfer id for a sender. Broadcast transfers from a sender are keyed
 * separately from its unicast transfer.
 */
export function getTransferId(origin: string, isBroadcast: boolean): string {
  return isBroadcast ? `broadcast_${origin}` : origin;
}

function toError(err: unknown): Error {
  return err instanceof Error ? err : new Error(String(err));
}

function sortedIndices(indices: Iterable<number>): number[] {
  return [...new Set(indices)].sort((a, b) => a - b);
}

function allIndices(count: number): number[] {
  return Array.from({ length: count }, (_, index) => index);
}

function toSnapshot(record: Readonly<ReceiverRecord>): ReceiverTransferSnapshot {
  const receivedCount = record.received.size;
  return {
    transferId: record.transferId,
    origin: record.origin,
    isBroadcast: record.isBroadcast,
    filename: record.descriptor.filename,
    totalSize: record.descriptor.totalSize,
    pieceSize: record.descriptor.pieceSize,
    pieceCount: record.pieceCount,
    state: record.state,
    receivedCount,
    progress: record.pieceCount === 0 ? 1 : receivedCount / record.pieceCount,
    missing: sortedIndices(record.missing),
    requested: sortedIndices(record.requested),
    startedAt: new Date(record.startedAt),
    lastActivityAt: new Date(record.lastActivityAt),
  };
}

/**
 * Checks a fully collected transfer against its integrity source.
 */
function verifyIntegrity(record: Readonly<ReceiverRecord>): Verification {
  const integrity = record.descriptor.integrity;

  switch (integrity.kind) {
    case 'merkle': {
      const ordered = allIndices(record.pieceCount).map(
        (index) => record.receivedHashes.get(index) ?? ''
      );
      const actual = merkleRoot(ordered);
      if (actual !== null && hashesEqual(actual, integrity.root)) {
        return { kind: 'pass', detail: 'Merkle root verified' };
      }
      return { kind: 'merkle-mismatch', expected: integrity.root, actual };
    }

    case 'pieceHashes': {
      const bad: number[] = [];
      for (let index = 0; index < record.pieceCount; index++) {
        const expected = integrity.hashes[index];
        const actual = record.receivedHashes.get(index);
        // Pieces beyond the advertised list are accepted
        if (expected === undefined) {
          continue;
        }
        if (actual === undefined || !hashesEqual(actual, expected)) {
          bad.push(index);
        }
      }
      if (bad.length > 0) {
        return { kind: 'hash-mismatch', bad };
      }
      const advertised = Math.min(integrity.hashes.length, record.pieceCount);
      return {
        kind: 'pass',
        detail:
          advertised < record.pieceCount
            ? `${advertised} of ${record.pieceCount} piece hashes verified`
            : 'Piece hashes verified',
      };
    }

    case 'none':
      return { kind: 'pass', detail: 'No integrity data; accepted unverified' };
  }
}

// =============================================================================
// TransferReceiver Class
// =============================================================================

/**
 * Collects incoming files and drives their recovery.
 *
 * @example
 * ```typescript
 * const receiver = new TransferReceiver({
 *   transport,
 *   sink: new DirectoryFileSink('./received_files'),
 * });
 *
 * receiver.on('transfer:completed', ({ filename, location }) => {
 *   console.log(`${filename} saved to ${location}`);
 * });
 *
 * await receiver.handleFileStart('!a1b2c3d4', descriptor);
 * await receiver.handlePieceData('!a1b2c3d4', { pieceIndex: 0, data });
 * ```
 */
export class TransferReceiver extends TypedEventEmitter<ReceiverEvents> {
  // ===========================================================================
  // Private Properties
  // ===========================================================================

  private readonly transport: Transport;

  private readonly sink: FileSink;

  private readonly config: EngineConfig;

  private readonly logger: Logger;

  private readonly now: () => number;

  private readonly retries: RetryPolicy;

  private readonly transfers = new TransferRegistry<ReceiverRecord>('receiver');

  // ===========================================================================
  // Constructor
  // ===========================================================================

  /**
   * @throws {CapabilityError} If the transport or sink is unusable
   * @throws {ConfigError} If the merged configuration is invalid
   */
  constructor(options: TransferReceiverOptions) {
    super();

    if (!options.transport || typeof options.transport.send !== 'function') {
      throw new CapabilityError('transport');
    }
    if (!options.sink || typeof options.sink.save !== 'function') {
      throw new CapabilityError('file sink');
    }

    this.transport = options.transport;
    this.sink = options.sink;
    this.config = validateConfig(mergeWithDefaults(options.config));
    this.logger = options.logger ?? createSilentLogger();
    this.now = options.now ?? Date.now;
    this.retries = new RetryPolicy(this.config.maxRetries);
  }

  // ===========================================================================
  // Public Methods
  // ===========================================================================

  /**
   * Opens a transfer announced by a FileStart.
   *
   * A transfer already open for the same id is discarded and restarted.
   * Descriptors with unusable sizes are rejected and logged.
   */
  async handleFileStart(
    origin: string,
    descriptor: FileStartDescriptor,
    isBroadcast = false
  ): Promise<void> {
    const transferId = getTransferId(origin, isBroadcast);

    if (this.transfers.remove(transferId)) {
      this.logger.warn(`Duplicate FILE_START for ${transferId}; restarting the transfer`);
      this.emit('transfer:removed', { transferId });
    }

    const pieceSize = this.validateDescriptor(transferId, descriptor);
    if (pieceSize === null) {
      return;
    }

    const pieceCount = calculatePieceCount(descriptor.totalSize, pieceSize);
    const now = this.now();
    const record: ReceiverRecord = {
      transferId,
      origin,
      isBroadcast,
      descriptor: { ...descriptor, pieceSize },
      pieceCount,
      received: new Map(),
      receivedHashes: new Map(),
      missing: new Set(allIndices(pieceCount)),
      requested: new Set(),
      retryCount: new Map(),
      state: ReceiverTransferState.COLLECTING,
      startedAt: now,
      lastActivityAt: now,
      lastRequestAt: now,
    };
    const generation = this.transfers.create(transferId, record);

    this.logger.info(
      `Receiving '${descriptor.filename}' from ${origin}${isBroadcast ? ' (broadcast)' : ''}: ` +
        `${descriptor.totalSize} bytes in ${pieceCount} pieces, ${this.describeIntegrity(descriptor)}`
    );
    this.emit('transfer:started', { transfer: toSnapshot(record) });

    if (pieceCount === 0) {
      await this.checkCompletion(transferId, generation);
    }
  }

  /**
   * Stores a piece and completes the transfer once every piece is held.
   * Pieces for unknown transfers, out-of-range indices and duplicates are
   * ignored.
   */
  async handlePieceData(
    origin: string,
    piece: PieceDataInput,
    isBroadcast = false
  ): Promise<void> {
    const transferId = getTransferId(origin, isBroadcast);
    const now = this.now();
    const index = piece.pieceIndex;

    const outcome = this.transfers.update(transferId, (record, generation) => {
      if (record.state !== ReceiverTransferState.COLLECTING) {
        return { kind: 'inactive' as const, state: record.state };
      }
      if (!Number.isInteger(index) || index < 0 || index >= record.pieceCount) {
        return { kind: 'out-of-range' as const, pieceCount: record.pieceCount };
      }
      if (record.received.has(index)) {
        return { kind: 'duplicate' as const };
      }

      record.received.set(index, piece.data);
      record.receivedHashes.set(index, hashBytes(piece.data));
      record.missing.delete(index);
      record.requested.delete(index);
      record.retryCount.delete(index);
      record.lastActivityAt = now;
      return {
        kind: 'stored' as const,
        generation,
        received: record.received.size,
        pieceCount: record.pieceCount,
      };
    });

    if (outcome === undefined) {
      this.logger.debug(`PIECE_DATA ${index} from ${origin} for unknown transfer ${transferId}`);
      return;
    }

    switch (outcome.kind) {
      case 'inactive':
        this.logger.debug(`PIECE_DATA ${index} for ${transferId} ignored while ${outcome.state}`);
        return;
      case 'out-of-range':
        this.logger.warn(
          `PIECE_DATA index ${index} out of range for ${transferId} (${outcome.pieceCount} pieces)`
        );
        return;
      case 'duplicate':
        this.logger.debug(`Duplicate PIECE_DATA ${index} for ${transferId}`);
        return;
      case 'stored':
        this.emit('piece:received', {
          transferId,
          pieceIndex: index,
          received: outcome.received,
          pieceCount: outcome.pieceCount,
        });
        await this.checkCompletion(transferId, outcome.generation);
        return;
    }
  }

  /**
   * Returns the indices still missing from a transfer.
   *
   * If any of them has already been requested `maxRetries` times the
   * transfer is failed and removed, and an empty list is returned.
   */
  checkForMissingOrCorrupt(transferId: string): number[] {
    const result = this.transfers.update(transferId, (record, generation) => {
      if (record.state !== ReceiverTransferState.COLLECTING) {
        return { needed: [], exhausted: [], generation, filename: record.descriptor.filename };
      }

      const needed = sortedIndices(record.missing);
      const exhausted = needed.filter((index) =>
        this.retries.isExhausted(record.retryCount.get(index) ?? 0)
      );
      if (exhausted.length > 0) {
        record.state = ReceiverTransferState.FAILED;
        return { needed: [], exhausted, generation, filename: record.descriptor.filename };
      }
      return { needed, exhausted: [], generation, filename: record.descriptor.filename };
    });

    if (result === undefined) {
      return [];
    }

    if (result.exhausted.length > 0) {
      this.transfers.remove(transferId, result.generation);
      const reason = `Pieces ${result.exhausted.join(', ')} not received after ${this.config.maxRetries} requests`;
      this.logger.error(`Transfer '${result.filename}' from ${transferId} failed: ${reason}`);
      this.emit('transfer:failed', { transferId, filename: result.filename, reason });
      return [];
    }

    return result.needed;
  }

  /**
   * Asks the sender for the given pieces, acknowledging every piece held.
   *
   * Does nothing for an empty list, a broadcast transfer, or a transfer
   * that is not collecting.
   *
   * @returns true if a request was sent
   */
  async sendResumeRequest(transferId: string, missing: Iterable<number>): Promise<boolean> {
    const indices = sortedIndices(missing);
    if (indices.length === 0) {
      return false;
    }

    const plan = this.transfers.read(transferId, (record, generation) => {
      if (record.isBroadcast || record.state !== ReceiverTransferState.COLLECTING) {
        return null;
      }
      return {
        generation,
        origin: record.origin,
        filename: record.descriptor.filename,
        acknowledged: sortedIndices(record.received.keys()),
      };
    });
    if (!plan) {
      return false;
    }

    const payload = encodeResumeRequest(indices, plan.acknowledged);
    try {
      await this.transport.send(plan.origin, payload, this.config.channel);
    } catch (err) {
      this.logger.error(`Error sending RESUME_REQUEST to ${plan.origin}: ${toError(err).message}`);
      return false;
    }

    const requestedAt = this.now();
    const applied = this.transfers.updateIfCurrent(transferId, plan.generation, (record) => {
      for (const index of indices) {
        if (record.received.has(index)) {
          continue;
        }
        record.requested.add(index);
        record.retryCount.set(index, (record.retryCount.get(index) ?? 0) + 1);
      }
      record.lastRequestAt = requestedAt;
      return true;
    });
    if (!applied) {
      return false;
    }

    this.logger.info(
      `Requested ${indices.length} piece(s) of '${plan.filename}' from ${plan.origin} ` +
        `(${plan.acknowledged.length} acknowledged)`
    );
    this.emit('resume:sent', {
      transferId,
      missing: indices,
      acknowledged: plan.acknowledged.length,
    });
    return true;
  }

  /**
   * Periodic maintenance over every open transfer.
   *
   * Transfers idle past the inactivity timeout are failed. For unicast
   * transfers whose link has been quiet for the request interval (no
   * piece and no request within it), missing pieces are requested.
   */
  async periodicTick(now: number = this.now()): Promise<void> {
    for (const transferId of this.transfers.ids()) {
      const status = this.transfers.read(transferId, (record, generation) => ({
        generation,
        state: record.state,
        isBroadcast: record.isBroadcast,
        filename: record.descriptor.filename,
        idleMs: now - record.lastActivityAt,
        quietMs: now - Math.max(record.lastActivityAt, record.lastRequestAt),
      }));
      if (!status || status.state !== ReceiverTransferState.COLLECTING) {
        continue;
      }

      if (status.idleMs > this.config.inactivityTimeoutMs) {
        const failed = this.transfers.updateIfCurrent(transferId, status.generation, (record) => {
          record.state = ReceiverTransferState.FAILED;
          return true;
        });
        if (failed) {
          this.transfers.remove(transferId, status.generation);
          const reason = `No activity for ${Math.floor(status.idleMs / 1000)}s`;
          this.logger.warn(`Transfer '${status.filename}' from ${transferId} timed out: ${reason}`);
          this.emit('transfer:failed', { transferId, filename: status.filename, reason });
        }
        continue;
      }

      if (status.isBroadcast || status.quietMs < this.config.requestIntervalMs) {
        continue;
      }

      const needed = this.checkForMissingOrCorrupt(transferId);
      if (needed.length > 0) {
        await this.sendResumeRequest(transferId, needed);
      }
    }
  }

  /**
   * Discards a transfer.
   *
   * @returns true if a transfer was removed
   */
  cleanupTransfer(transferId: string): boolean {
    const removed = this.transfers.remove(transferId);
    if (removed) {
      this.logger.debug(`Cleaned up transfer state for ${transferId}`);
      this.emit('transfer:removed', { transferId });
    }
    return removed;
  }

  /**
   * Returns a snapshot of a transfer.
   */
  getTransfer(transferId: string): ReceiverTransferSnapshot | undefined {
    return this.transfers.read(transferId, (record) => toSnapshot(record));
  }

  /**
   * Returns snapshots of all open transfers.
   */
  listTransfers(): ReceiverTransferSnapshot[] {
    return this.transfers.map((_, record) => toSnapshot(record));
  }

  // ===========================================================================
  // Private Methods
  // ===========================================================================

  /**
   * Validates the announced sizes.
   *
   * @returns The piece size to use, or null if the transfer is rejected
   */
  private validateDescriptor(transferId: string, descriptor: FileStartDescriptor): number | null {
    const { totalSize, filename } = descriptor;
    let pieceSize = descriptor.pieceSize;

    if (!Number.isSafeInteger(totalSize) || totalSize < 0) {
      this.logger.error(`Rejecting '${filename}' from ${transferId}: invalid total size ${totalSize}`);
      return null;
    }
    if (totalSize > this.config.maxFileSize) {
      this.logger.error(
        `Rejecting '${filename}' from ${transferId}: ${totalSize} bytes exceeds the maximum of ${this.config.maxFileSize}`
      );
      return null;
    }
    if (totalSize === 0) {
      return Number.isInteger(pieceSize) && pieceSize > 0 ? pieceSize : this.config.pieceSize;
    }
    if (!Number.isInteger(pieceSize) || pieceSize <= 0) {
      this.logger.error(`Rejecting '${filename}' from ${transferId}: invalid piece size ${pieceSize}`);
      return null;
    }
    if (pieceSize > totalSize) {
      this.logger.warn(
        `Piece size ${pieceSize} exceeds file size ${totalSize} for '${filename}'; using ${totalSize}`
      );
      pieceSize = totalSize;
    }
    if (pieceSize > this.config.maxPieceSize) {
      this.logger.error(
        `Rejecting '${filename}' from ${transferId}: piece size ${pieceSize} exceeds ${this.config.maxPieceSize}`
      );
      return null;
    }
    if (pieceSize < this.config.minPieceSize && pieceSize !== totalSize) {
      this.logger.error(
        `Rejecting '${filename}' from ${transferId}: piece size ${pieceSize} is below ${this.config.minPieceSize}`
      );
      return null;
    }

    return pieceSize;
  }

  private describeIntegrity(descriptor: FileStartDescriptor): string {
    switch (descriptor.integrity.kind) {
      case 'merkle':
        return `Merkle root ${descriptor.integrity.root.slice(0, 10)}...`;
      case 'pieceHashes':
        return `${descriptor.integrity.hashes.length} piece hashes`;
      case 'none':
        return 'no integrity data';
    }
  }

  /**
   * Verifies a transfer once every piece is held, then either re-requests
   * rejected pieces or assembles and saves the file.
   */
  private async checkCompletion(transferId: string, generation: number): Promise<void> {
    const decision = this.transfers.updateIfCurrent(
      transferId,
      generation,
      (record): CompletionDecision => {
        if (
          record.state !== ReceiverTransferState.COLLECTING ||
          record.received.size !== record.pieceCount
        ) {
          return { kind: 'waiting' };
        }

        const verification: Verification =
          record.pieceCount === 0
            ? { kind: 'pass', detail: 'Empty file' }
            : verifyIntegrity(record);

        switch (verification.kind) {
          case 'pass':
            record.state = ReceiverTransferState.ASSEMBLING;
            return { kind: 'assemble', detail: verification.detail };

          case 'merkle-mismatch': {
            // The root cannot say which piece is bad, so everything is dropped
            record.received.clear();
            record.receivedHashes.clear();
            record.requested.clear();
            record.retryCount.clear();
            record.missing = new Set(allIndices(record.pieceCount));
            return {
              kind: 'rerequest',
              indices: allIndices(record.pieceCount),
              reason: 'merkle',
              detail: `expected ${verification.expected.slice(0, 10)}..., got ${
                verification.actual === null ? 'none' : `${verification.actual.slice(0, 10)}...`
              }`,
            };
          }

          case 'hash-mismatch':
            for (const index of verification.bad) {
              record.received.delete(index);
              record.receivedHashes.delete(index);
              record.missing.add(index);
            }
            return {
              kind: 'rerequest',
              indices: verification.bad,
              reason: 'hash',
              detail: `pieces ${verification.bad.join(', ')} failed hash check`,
            };
        }
      }
    );

    if (decision === undefined || decision.kind === 'waiting') {
      return;
    }

    if (decision.kind === 'rerequest') {
      this.logger.warn(`Integrity check failed for ${transferId}: ${decision.detail}`);
      this.emit('piece:rejected', {
        transferId,
        pieceIndices: decision.indices,
        reason: decision.reason,
      });
      await this.sendResumeRequest(transferId, decision.indices);
      return;
    }

    this.logger.info(`${decision.detail} for ${transferId}`);
    await this.assembleAndSave(transferId, generation);
  }

  /**
   * Assembles a verified transfer and hands it to the sink.
   */
  private async assembleAndSave(transferId: string, generation: number): Promise<void> {
    const assembled = this.transfers.updateIfCurrent(
      transferId,
      generation,
      (record): AssemblyResult | undefined => {
        if (record.state !== ReceiverTransferState.ASSEMBLING) {
          return undefined;
        }
        const filename = record.descriptor.filename;
        try {
          const data = assemblePieces(record.received, record.pieceCount, record.descriptor.totalSize);
          return {
            kind: 'ok',
            filename,
            data,
            origin: record.origin,
            isBroadcast: record.isBroadcast,
            pieceCount: record.pieceCount,
          };
        } catch (err) {
          record.state = ReceiverTransferState.FAILED;
          return { kind: 'failed', filename, reason: toError(err).message };
        }
      }
    );

    if (assembled === undefined) {
      return;
    }

    if (assembled.kind === 'failed') {
      this.transfers.remove(transferId, generation);
      this.logger.error(`Assembly of '${assembled.filename}' from ${transferId} failed: ${assembled.reason}`);
      this.emit('transfer:failed', {
        transferId,
        filename: assembled.filename,
        reason: assembled.reason,
      });
      return;
    }

    let location: string | undefined;
    try {
      const saved = await this.sink.save(assembled.filename, assembled.data);
      location = typeof saved === 'string' ? saved : undefined;
    } catch (err) {
      const reason = `Save failed: ${toError(err).message}`;
      this.transfers.updateIfCurrent(transferId, generation, (record) => {
        record.state = ReceiverTransferState.FAILED;
      });
      this.transfers.remove(transferId, generation);
      this.logger.error(`Could not save '${assembled.filename}' from ${transferId}: ${reason}`);
      this.emit('transfer:failed', { transferId, filename: assembled.filename, reason });
      return;
    }

    const current = this.transfers.updateIfCurrent(transferId, generation, (record) => {
      record.state = ReceiverTransferState.COMPLETE;
      return true;
    });

    this.logger.info(
      `Received '${assembled.filename}' (${assembled.data.length} bytes) from ${transferId}` +
        (location ? ` -> ${location}` : '')
    );
    if (current) {
      this.transfers.remove(transferId, generation);
      if (!assembled.isBroadcast && assembled.pieceCount > 0) {
        await this.sendCompletionNotice(assembled.origin, assembled.pieceCount);
      }
    } else {
      // A notice now would acknowledge the sender's newer transfer
      this.logger.warn(
        `Transfer from ${transferId} was replaced or removed while '${assembled.filename}' was saving; no completion notice sent`
      );
    }

    this.emit('transfer:completed', {
      transferId,
      filename: assembled.filename,
      size: assembled.data.length,
      location,
    });
  }

  /**
   * Tells the sender every piece arrived: a resume request acknowledging
   * all pieces with nothing missing. Best effort; if it is lost the
   * sender's caller times out.
   */
  private async sendCompletionNotice(origin: string, pieceCount: number): Promise<void> {
    const payload = encodeResumeRequest([], allIndices(pieceCount));
    try {
      await this.transport.send(origin, payload, this.config.channel);
      this.logger.debug(`Sent completion notice to ${origin}`);
    } catch (err) {
      this.logger.warn(`Could not send completion notice to ${origin}: ${toError(err).message}`);
    }
  }
}
