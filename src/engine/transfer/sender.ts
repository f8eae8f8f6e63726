/**
 * Transfer Sender
 *
 * Sending side of the protocol. One transfer per recipient: the file is
 * announced with a FileStart, every piece is sent once, and afterwards
 * pieces are resent only when the receiver reports them missing in a
 * resume request. Pieces are paced by a per-recipient delay that grows
 * when the receiver keeps reporting loss.
 *
 * Sends to one recipient are serialized, so overlapping resume requests
 * never multiply the send rate.
 *
 * Files are read in piece-sized chunks, but every piece stays in memory
 * until the transfer is cleaned up so it can be resent. A transfer
 * therefore holds its whole file; lower `maxFileSize` where memory is
 * tight.
 *
 * @module engine/transfer/sender
 */

import { stat } from 'fs/promises';
import { basename } from 'path';
import { TypedEventEmitter, type SenderEvents } from '../events.js';
import { mergeWithDefaults, validateConfig } from '../config/index.js';
import { createSilentLogger, type Logger } from '../logger.js';
import {
  CapabilityError,
  SenderTransferState,
  type EngineConfig,
  type FileStartDescriptor,
  type PartialEngineConfig,
  type SenderTransferSnapshot,
  type TransferSource,
  type Transport,
} from '../types.js';
import { hashBytes, merkleRoot } from '../piece/hasher.js';
import { clampPieceSize, splitPieces, streamPieces } from '../piece/codec.js';
import { encodeFileStart, encodePieceData } from '../protocol/messages.js';
import { toFileStartMessage } from '../protocol/descriptor.js';
import { TransferRegistry } from './registry.js';
import { PacingPolicy } from './backoff.js';

// =============================================================================
// Types
// =============================================================================

/**
 * Options for the TransferSender
 */
export interface TransferSenderOptions {
  /** Link the pieces are sent over */
  transport: Transport;

  /** Engine configuration overrides */
  config?: PartialEngineConfig;

  logger?: Logger;

  /** Pacing sleep (default: setTimeout based) */
  sleep?: (ms: number) => Promise<void>;

  /** Clock in milliseconds (default: Date.now) */
  now?: () => number;
}

/**
 * Options for a single transfer
 */
export interface StartTransferOptions {
  /** Name announced to the receiver (default: base name of the path, or "data.bin") */
  filename?: string;
}

/**
 * Resume request contents as seen by the sender
 */
export interface ResumeRequestInput {
  missingIndices: readonly number[];
  acknowledgedIndices: readonly number[];
}

/**
 * State of one outgoing transfer. Every field exists from creation.
 */
interface SenderRecord {
  recipient: string;
  filename: string;
  totalSize: number;
  pieceSize: number;
  pieces: Buffer[];
  pieceHashes: string[];
  merkleRoot: string | null;
  acknowledged: boolean[];
  sendFailures: number[];
  delayMs: number;
  retryCount: number;
  state: SenderTransferState;
  startedAt: number;
}

/**
 * Result of reading the source
 */
interface LoadedSource {
  filename: string;
  totalSize: number;
  pieceSize: number;
  pieces: Buffer[];
}

/**
 * Decision taken under the lock for a resume request
 */
type ResumeDecision =
  | { kind: 'terminal'; state: SenderTransferState }
  | { kind: 'complete' }
  | {
      kind: 'resend';
      valid: number[];
      invalid: number[];
      escalated: boolean;
      delayMs: number;
      acknowledged: number;
      pieceCount: number;
    };

// =============================================================================
// Helpers
// =============================================================================

function defaultSleep(ms: number): Promise<void> {
  return new Promise<void>((resolve) => setTimeout(resolve, ms));
}

function toError(err: unknown): Error {
  return err instanceof Error ? err : new Error(String(err));
}

function toSnapshot(record: Readonly<SenderRecord>): SenderTransferSnapshot {
  const pieceCount = record.pieces.length;
  const acknowledgedCount = record.acknowledged.filter(Boolean).length;
  return {
    recipient: record.recipient,
    filename: record.filename,
    totalSize: record.totalSize,
    pieceSize: record.pieceSize,
    pieceCount,
    state: record.state,
    acknowledgedCount,
    progress: pieceCount === 0 ? 1 : acknowledgedCount / pieceCount,
    delayMs: record.delayMs,
    retryCount: record.retryCount,
    merkleRoot: record.merkleRoot,
    startedAt: new Date(record.startedAt),
  };
}

// =============================================================================
// TransferSender Class
// =============================================================================

/**
 * Sends files to recipients and answers their resume requests.
 *
 * @example
 * ```typescript
 * const sender = new TransferSender({ transport, logger });
 *
 * sender.on('transfer:completed', ({ transfer }) => {
 *   console.log(`${transfer.filename} delivered to ${transfer.recipient}`);
 * });
 *
 * await sender.startTransfer('!a1b2c3d4', './photo.jpg');
 *
 * // Wire inbound resume requests from that recipient:
 * await sender.handleResumeRequest('!a1b2c3d4', request);
 * ```
 */
export class TransferSender extends TypedEventEmitter<SenderEvents> {
  // ===========================================================================
  // Private Properties
  // ===========================================================================

  private readonly transport: Transport;

  private readonly config: EngineConfig;

  private readonly logger: Logger;

  private readonly sleep: (ms: number) => Promise<void>;

  private readonly now: () => number;

  private readonly pacing: PacingPolicy;

  private readonly transfers = new TransferRegistry<SenderRecord>('sender');

  /** Tail of the send queue for each recipient */
  private readonly sendQueues = new Map<string, Promise<void>>();

  // ===========================================================================
  // Constructor
  // ===========================================================================

  /**
   * @throws {CapabilityError} If the transport has no send method
   * @throws {ConfigError} If the merged configuration is invalid
   */
  constructor(options: TransferSenderOptions) {
    super();

    if (!options.transport || typeof options.transport.send !== 'function') {
      throw new CapabilityError('transport');
    }

    this.transport = options.transport;
    this.config = validateConfig(mergeWithDefaults(options.config));
    this.logger = options.logger ?? createSilentLogger();
    this.sleep = options.sleep ?? defaultSleep;
    this.now = options.now ?? Date.now;
    this.pacing = new PacingPolicy(this.config);

    this.logger.debug(
      `Sender ready (piece size ${this.config.pieceSize}, merkle root ${this.config.useMerkleRoot ? 'on' : 'off'})`
    );
  }

  // ===========================================================================
  // Public Methods
  // ===========================================================================

  /**
   * Starts sending a file to a recipient.
   *
   * Announces the file with a FileStart and then sends every piece once.
   * An existing transfer to the same recipient is replaced.
   *
   * @param recipient - Peer id of the receiver
   * @param source - File path, or the file contents
   * @returns false if the source could not be read or the FileStart could
   *   not be sent; true once the initial burst has been sent
   */
  async startTransfer(
    recipient: string,
    source: TransferSource,
    options: StartTransferOptions = {}
  ): Promise<boolean> {
    const loaded = await this.loadSource(source, options);
    if (!loaded) {
      return false;
    }

    const pieceCount = loaded.pieces.length;
    const pieceHashes = loaded.pieces.map((piece) => hashBytes(piece));
    const descriptor = this.describe(loaded, pieceHashes);

    this.logger.info(
      `Preparing '${loaded.filename}' (${loaded.totalSize} bytes, ${pieceCount} pieces) for ${recipient}`
    );

    let payload: Buffer;
    try {
      payload = encodeFileStart(toFileStartMessage(descriptor));
    } catch (err) {
      this.logger.error(`Cannot encode FILE_START for '${loaded.filename}': ${toError(err).message}`);
      return false;
    }

    try {
      await this.transport.send(recipient, payload, this.config.channel);
    } catch (err) {
      this.logger.error(`Error sending FILE_START to ${recipient}: ${toError(err).message}`);
      return false;
    }

    if (this.transfers.has(recipient)) {
      this.logger.warn(`Replacing the active transfer to ${recipient}`);
    }

    const record: SenderRecord = {
      recipient,
      filename: loaded.filename,
      totalSize: loaded.totalSize,
      pieceSize: loaded.pieceSize,
      pieces: loaded.pieces,
      pieceHashes,
      merkleRoot: descriptor.integrity.kind === 'merkle' ? descriptor.integrity.root : null,
      acknowledged: new Array<boolean>(pieceCount).fill(false),
      sendFailures: new Array<number>(pieceCount).fill(0),
      delayMs: this.config.initialDelayMs,
      retryCount: 0,
      state: pieceCount === 0 ? SenderTransferState.COMPLETE : SenderTransferState.SENDING,
      startedAt: this.now(),
    };
    this.transfers.create(recipient, record);

    const snapshot = this.getTransfer(recipient);
    if (snapshot) {
      this.emit('transfer:started', { transfer: snapshot });
      if (pieceCount === 0) {
        this.logger.info(`'${loaded.filename}' is empty; nothing to send after FILE_START`);
        this.emit('transfer:completed', { transfer: snapshot });
        return true;
      }
    }

    await this.sendPieces(
      recipient,
      loaded.pieces.map((_, index) => index)
    );
    return true;
  }

  /**
   * Sends the given pieces to a recipient, pausing for the current pacing
   * delay after each one.
   *
   * Runs after any sends already queued for the recipient. Stops early if
   * the transfer is removed, replaced, completed or abandoned meanwhile.
   */
  sendPieces(recipient: string, indices: readonly number[]): Promise<void> {
    const generation = this.transfers.read(recipient, (record, gen) =>
      record.state === SenderTransferState.SENDING ? gen : undefined
    );
    if (generation === undefined) {
      return Promise.resolve();
    }

    const previous = this.sendQueues.get(recipient) ?? Promise.resolve();
    const run = previous.then(() => this.sendPiecesNow(recipient, generation, indices));
    const tail = run.then(
      () => undefined,
      (err: unknown) => {
        this.logger.error(`Send loop for ${recipient} failed: ${toError(err).message}`);
      }
    );
    const settled = tail.then(() => {
      if (this.sendQueues.get(recipient) === settled) {
        this.sendQueues.delete(recipient);
      }
    });
    this.sendQueues.set(recipient, settled);
    return run;
  }

  /**
   * Applies a resume request from a recipient.
   *
   * Acknowledgements are cumulative. Once every piece is acknowledged and
   * nothing is reported missing the transfer is complete; otherwise pacing
   * is adjusted and the missing pieces are resent.
   */
  async handleResumeRequest(origin: string, request: ResumeRequestInput): Promise<void> {
    const missing = [...new Set(request.missingIndices)].sort((a, b) => a - b);

    const decision = this.transfers.update(origin, (record): ResumeDecision => {
      if (record.state !== SenderTransferState.SENDING) {
        return { kind: 'terminal', state: record.state };
      }

      const pieceCount = record.pieces.length;
      for (const index of request.acknowledgedIndices) {
        if (Number.isInteger(index) && index >= 0 && index < pieceCount) {
          record.acknowledged[index] = true;
        }
      }
      const acknowledged = record.acknowledged.filter(Boolean).length;

      if (acknowledged === pieceCount && missing.length === 0) {
        record.state = SenderTransferState.COMPLETE;
        return { kind: 'complete' };
      }

      const pacing = this.pacing.onResumeRequest(
        { delayMs: record.delayMs, retryCount: record.retryCount },
        missing.length
      );
      record.delayMs = pacing.delayMs;
      record.retryCount = pacing.retryCount;

      return {
        kind: 'resend',
        valid: missing.filter((index) => index >= 0 && index < pieceCount),
        invalid: missing.filter((index) => index < 0 || index >= pieceCount),
        escalated: pacing.escalated,
        delayMs: pacing.delayMs,
        acknowledged,
        pieceCount,
      };
    });

    if (decision === undefined) {
      this.logger.warn(`RESUME_REQUEST from ${origin} but no active transfer to it`);
      return;
    }

    switch (decision.kind) {
      case 'terminal':
        this.logger.info(`RESUME_REQUEST from ${origin} for a transfer already ${decision.state}`);
        return;

      case 'complete': {
        const snapshot = this.getTransfer(origin);
        this.logger.info(`Transfer to ${origin} acknowledged as complete`);
        if (snapshot) {
          this.emit('transfer:completed', { transfer: snapshot });
        }
        return;
      }

      case 'resend':
        this.emit('transfer:progress', {
          recipient: origin,
          acknowledged: decision.acknowledged,
          pieceCount: decision.pieceCount,
        });
        if (decision.escalated) {
          this.logger.warn(`Repeated loss reported by ${origin}; delay raised to ${decision.delayMs} ms`);
          this.emit('pacing:escalated', { recipient: origin, delayMs: decision.delayMs });
        }
        if (decision.invalid.length > 0) {
          this.logger.warn(
            `RESUME_REQUEST from ${origin} named invalid indices: ${decision.invalid.join(', ')}`
          );
        }
        if (decision.valid.length === 0) {
          this.logger.debug(`No pieces to resend to ${origin}`);
          return;
        }
        this.logger.info(`Resending ${decision.valid.length} piece(s) to ${origin}`);
        await this.sendPieces(origin, decision.valid);
        return;
    }
  }

  /**
   * Removes the transfer to a recipient. In-flight sends stop at the next
   * piece.
   *
   * @returns true if a transfer was removed
   */
  cleanupTransfer(recipient: string): boolean {
    const removed = this.transfers.remove(recipient);
    if (removed) {
      this.logger.debug(`Cleaned up transfer state for ${recipient}`);
      this.emit('transfer:removed', { recipient });
    }
    return removed;
  }

  /**
   * Returns a snapshot of the transfer to a recipient.
   */
  getTransfer(recipient: string): SenderTransferSnapshot | undefined {
    return this.transfers.read(recipient, (record) => toSnapshot(record));
  }

  /**
   * Returns snapshots of all transfers.
   */
  listTransfers(): SenderTransferSnapshot[] {
    return this.transfers.map((_, record) => toSnapshot(record));
  }

  // ===========================================================================
  // Private Methods
  // ===========================================================================

  /**
   * Reads the source into pieces, or logs why it cannot.
   */
  private async loadSource(
    source: TransferSource,
    options: StartTransferOptions
  ): Promise<LoadedSource | null> {
    const limits = this.config;

    if (Buffer.isBuffer(source)) {
      if (source.length > limits.maxFileSize) {
        this.logger.error(`Data exceeds the maximum file size (${source.length} > ${limits.maxFileSize})`);
        return null;
      }
      const pieceSize = clampPieceSize(limits.pieceSize, source.length, limits);
      return {
        filename: options.filename ?? 'data.bin',
        totalSize: source.length,
        pieceSize,
        pieces: splitPieces(source, pieceSize).map((piece) => piece.data),
      };
    }

    if (source.trim() === '') {
      this.logger.error('No file path given');
      return null;
    }

    try {
      const info = await stat(source);
      if (!info.isFile()) {
        this.logger.error(`Path is not a file: ${source}`);
        return null;
      }
      if (info.size > limits.maxFileSize) {
        this.logger.error(`File exceeds the maximum file size (${info.size} > ${limits.maxFileSize}): ${source}`);
        return null;
      }

      const pieceSize = clampPieceSize(limits.pieceSize, info.size, limits);
      const pieces: Buffer[] = [];
      let totalSize = 0;
      for await (const piece of streamPieces(source, pieceSize)) {
        pieces.push(piece.data);
        totalSize += piece.data.length;
      }

      return {
        filename: options.filename ?? basename(source),
        totalSize,
        pieceSize,
        pieces,
      };
    } catch (err) {
      this.logger.error(`Error reading file ${source}: ${toError(err).message}`);
      return null;
    }
  }

  /**
   * Chooses the integrity metadata to advertise.
   */
  private describe(loaded: LoadedSource, pieceHashes: string[]): FileStartDescriptor {
    const base = {
      filename: loaded.filename,
      totalSize: loaded.totalSize,
      pieceSize: loaded.pieceSize,
    };

    if (pieceHashes.length === 0) {
      return { ...base, integrity: { kind: 'none' } };
    }

    if (this.config.useMerkleRoot) {
      const root = merkleRoot(pieceHashes);
      if (root !== null) {
        this.logger.debug(`Merkle root for '${loaded.filename}': ${root.slice(0, 10)}...`);
        return { ...base, integrity: { kind: 'merkle', root } };
      }
      this.logger.warn('Could not calculate Merkle root, sending individual hashes');
    }

    return { ...base, integrity: { kind: 'pieceHashes', hashes: pieceHashes } };
  }

  /**
   * The paced send loop. Re-validates the transfer before every piece.
   */
  private async sendPiecesNow(
    recipient: string,
    generation: number,
    indices: readonly number[]
  ): Promise<void> {
    for (const index of indices) {
      const step = this.transfers.read(recipient, (record, gen) =>
        gen === generation && record.state === SenderTransferState.SENDING
          ? { piece: record.pieces[index], delayMs: record.delayMs, pieceCount: record.pieces.length }
          : undefined
      );
      if (!step) {
        this.logger.debug(`Transfer to ${recipient} is no longer sending; stopping send loop`);
        return;
      }
      if (!Number.isInteger(index) || index < 0 || index >= step.pieceCount || !step.piece) {
        this.logger.warn(`Invalid piece index ${index} requested for ${recipient}`);
        continue;
      }

      const payload = encodePieceData(index, step.piece);
      let failure: Error | null = null;
      try {
        this.logger.debug(`Sending PIECE_DATA ${index}/${step.pieceCount - 1} (${payload.length} bytes) to ${recipient}`);
        await this.transport.send(recipient, payload, this.config.channel);
      } catch (err) {
        failure = toError(err);
      }

      const outcome = this.transfers.updateIfCurrent(recipient, generation, (record) => {
        if (!failure) {
          record.sendFailures[index] = 0;
          return { failures: 0, abandoned: false };
        }
        const failures = record.sendFailures[index] + 1;
        record.sendFailures[index] = failures;
        if (failures >= this.config.maxSendFailures && record.state === SenderTransferState.SENDING) {
          record.state = SenderTransferState.ABANDONED;
          return { failures, abandoned: true };
        }
        return { failures, abandoned: false };
      });
      if (outcome === undefined) {
        return;
      }

      if (failure) {
        this.logger.warn(`Error sending PIECE_DATA ${index} to ${recipient}: ${failure.message}`);
        this.emit('piece:send-failed', {
          recipient,
          pieceIndex: index,
          failures: outcome.failures,
          error: failure,
        });
      } else {
        this.emit('piece:sent', { recipient, pieceIndex: index });
      }

      if (outcome.abandoned) {
        this.logger.error(
          `Giving up on ${recipient}: piece ${index} failed ${outcome.failures} consecutive sends`
        );
        const snapshot = this.getTransfer(recipient);
        if (snapshot) {
          this.emit('transfer:abandoned', { transfer: snapshot, pieceIndex: index });
        }
        return;
      }

      await this.sleep(step.delayMs);
    }
  }
}
