/**
 * Core type definitions for the radiodrop engine.
 *
 * These types define the fundamental data structures used throughout the
 * transfer engine: pieces, file-start descriptors, transfer states, the
 * capabilities the engine consumes (transport and file sink) and the
 * engine configuration.
 *
 * @module engine/types
 */

// =============================================================================
// Enums
// =============================================================================

/**
 * Lifecycle of an outgoing transfer.
 *
 * State transitions:
 *   (new) -> SENDING -> COMPLETE
 *               |
 *               +----> ABANDONED
 */
export enum SenderTransferState {
  /** FileStart sent, pieces are being sent or resent on request */
  SENDING = 'sending',

  /** Receiver acknowledged every piece */
  COMPLETE = 'complete',

  /** Gave up after repeated transport failures on a single piece */
  ABANDONED = 'abandoned',
}

/**
 * Lifecycle of an incoming transfer.
 *
 * State transitions:
 *   (new) -> COLLECTING -> ASSEMBLING -> COMPLETE
 *               ^   |           |
 *               +---+         FAILED
 *   (re-request)    |
 *                 FAILED
 */
export enum ReceiverTransferState {
  /** Waiting for pieces */
  COLLECTING = 'collecting',

  /** Every piece verified, assembling and saving */
  ASSEMBLING = 'assembling',

  /** File delivered to the sink */
  COMPLETE = 'complete',

  /** Retries exhausted, timed out, or the assembled file was invalid */
  FAILED = 'failed',
}

// =============================================================================
// Core Interfaces
// =============================================================================

/**
 * A contiguous, index-addressed slice of a file.
 */
export interface Piece {
  /** Zero-based piece index */
  readonly index: number;

  /** Piece bytes (every piece but the last is exactly pieceSize long) */
  readonly data: Buffer;
}

/**
 * Integrity metadata advertised in a FileStart.
 *
 * A transfer is verified by exactly one source: a Merkle root over the
 * ordered piece hashes, an explicit per-piece hash list, or nothing.
 */
export type IntegrityInfo =
  | { readonly kind: 'merkle'; readonly root: string }
  | { readonly kind: 'pieceHashes'; readonly hashes: readonly string[] }
  | { readonly kind: 'none' };

/**
 * Describes the file announced by a FileStart message.
 */
export interface FileStartDescriptor {
  /** Base name of the file */
  filename: string;

  /** Total size in bytes */
  totalSize: number;

  /** Size of every piece except possibly the last */
  pieceSize: number;

  /** Verification source */
  integrity: IntegrityInfo;
}

/**
 * Read-only view of an outgoing transfer.
 */
export interface SenderTransferSnapshot {
  recipient: string;
  filename: string;
  totalSize: number;
  pieceSize: number;
  pieceCount: number;
  state: SenderTransferState;
  acknowledgedCount: number;
  /** Acknowledged pieces as a ratio (0-1) */
  progress: number;
  delayMs: number;
  retryCount: number;
  merkleRoot: string | null;
  startedAt: Date;
}

/**
 * Read-only view of an incoming transfer.
 */
export interface ReceiverTransferSnapshot {
  transferId: string;
  origin: string;
  isBroadcast: boolean;
  filename: string;
  totalSize: number;
  pieceSize: number;
  pieceCount: number;
  state: ReceiverTransferState;
  receivedCount: number;
  /** Received pieces as a ratio (0-1) */
  progress: number;
  missing: number[];
  requested: number[];
  startedAt: Date;
  lastActivityAt: Date;
}

// =============================================================================
// Capabilities
// =============================================================================

/**
 * Listener for inbound datagrams.
 */
export type InboundListener = (
  origin: string,
  payload: Buffer,
  isBroadcast: boolean
) => void;

/**
 * Best-effort datagram link the engine sends through.
 *
 * `send` resolves once the payload has been handed to the link and rejects
 * when the link refuses it. Delivery is never guaranteed.
 */
export interface Transport {
  send(peerId: string, payload: Buffer, channel: number): Promise<void>;
}

/**
 * A transport that also delivers inbound datagrams.
 */
export interface DuplexTransport extends Transport {
  /** Registers a listener and returns a function that removes it */
  onMessage(listener: InboundListener): () => void;
}

/**
 * Destination for assembled files.
 *
 * Implementations sanitize the filename before touching storage and may
 * resolve with the location they wrote to.
 */
export interface FileSink {
  save(filename: string, data: Buffer): Promise<string | void>;
}

// =============================================================================
// Configuration
// =============================================================================

/**
 * Engine configuration. Every value is tunable; none is a protocol constant.
 */
export interface EngineConfig {
  /** Piece size used by the sender before clamping */
  pieceSize: number;

  /** Smallest piece size accepted */
  minPieceSize: number;

  /** Largest piece size accepted */
  maxPieceSize: number;

  /** Largest file accepted, in bytes */
  maxFileSize: number;

  /** Advertise a Merkle root instead of the full hash list */
  useMerkleRoot: boolean;

  /** Pacing delay between pieces when a transfer starts (ms) */
  initialDelayMs: number;

  /** Lower bound for the pacing delay (ms) */
  minDelayMs: number;

  /** Upper bound for the pacing delay (ms) */
  maxDelayMs: number;

  /** Resume requests reporting loss before the delay is raised */
  retryThreshold: number;

  /** Factor applied to the delay on escalation */
  delayMultiplier: number;

  /** Consecutive send failures on one piece before the sender gives up */
  maxSendFailures: number;

  /** Times a piece may be requested before the receiver fails the transfer */
  maxRetries: number;

  /** Minimum time between resume requests for one transfer (ms) */
  requestIntervalMs: number;

  /** Time without a received piece before a transfer is failed (ms) */
  inactivityTimeoutMs: number;

  /** Cadence of the periodic receiver tick (ms) */
  tickIntervalMs: number;

  /** Transport channel (port number) carrying protocol messages */
  channel: number;
}

/**
 * Partial configuration for engine initialization.
 * All fields are optional with defaults applied.
 */
export type PartialEngineConfig = Partial<EngineConfig>;

/**
 * Source for an outgoing transfer - a file path or the raw file contents.
 */
export type TransferSource = string | Buffer;

// =============================================================================
// Error Types
// =============================================================================

/**
 * Base error class for all radiodrop-specific errors.
 */
export class RadioDropError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'RadioDropError';
  }
}

/**
 * Error thrown when a hash string is not a 64-character hex digest.
 */
export class MalformedHashError extends RadioDropError {
  /** The offending value */
  readonly value: string;

  constructor(value: string) {
    super(`Malformed hash: "${value.length > 16 ? `${value.slice(0, 16)}...` : value}"`);
    this.name = 'MalformedHashError';
    this.value = value;
  }
}

/**
 * Error thrown when assembled data does not have the announced size.
 */
export class SizeMismatchError extends RadioDropError {
  readonly expectedSize: number;
  readonly actualSize: number;

  constructor(expectedSize: number, actualSize: number) {
    super(`Assembled size ${actualSize} does not match expected size ${expectedSize}`);
    this.name = 'SizeMismatchError';
    this.expectedSize = expectedSize;
    this.actualSize = actualSize;
  }
}

/**
 * Error thrown when assembly is attempted with a piece absent.
 */
export class MissingPieceError extends RadioDropError {
  readonly pieceIndex: number;

  constructor(pieceIndex: number) {
    super(`Missing piece ${pieceIndex}`);
    this.name = 'MissingPieceError';
    this.pieceIndex = pieceIndex;
  }
}

/**
 * Error thrown when a datagram cannot be decoded into a protocol message.
 */
export class MessageDecodeError extends RadioDropError {
  constructor(message: string) {
    super(message);
    this.name = 'MessageDecodeError';
  }
}

/**
 * Error thrown at construction when a required capability is missing.
 */
export class CapabilityError extends RadioDropError {
  /** Name of the missing capability */
  readonly capability: string;

  constructor(capability: string) {
    super(`A valid ${capability} capability is required`);
    this.name = 'CapabilityError';
    this.capability = capability;
  }
}

/**
 * Error thrown when configuration values are invalid.
 */
export class ConfigError extends RadioDropError {
  /** The configuration key at fault */
  readonly key: string;

  constructor(message: string, key: string) {
    super(message);
    this.name = 'ConfigError';
    this.key = key;
  }
}

/**
 * Error thrown when a registry closure re-enters the registry it runs under.
 */
export class RegistryLockError extends RadioDropError {
  constructor(registry: string) {
    super(`Re-entrant access to the ${registry} registry`);
    this.name = 'RegistryLockError';
  }
}

/**
 * Error thrown when the datagram link fails.
 */
export class TransportError extends RadioDropError {
  /** The peer the operation targeted, if any */
  readonly peerId?: string;

  constructor(message: string, peerId?: string) {
    super(message);
    this.name = 'TransportError';
    this.peerId = peerId;
  }
}
