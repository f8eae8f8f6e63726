/**
 * Transfer Node
 *
 * Ties a sender and a receiver to one duplex transport. Inbound datagrams
 * are decoded and routed by message type; a timer drives the receiver's
 * periodic tick. This is the object the CLI and applications use.
 *
 * @module engine/node
 */

import { TypedEventEmitter, type NodeEvents } from './events.js';
import { mergeWithDefaults, validateConfig } from './config/index.js';
import { createSilentLogger, scopeLogger, type Logger } from './logger.js';
import {
  CapabilityError,
  type DuplexTransport,
  type EngineConfig,
  type FileSink,
  type PartialEngineConfig,
  type TransferSource,
} from './types.js';
import {
  decodeMessage,
  getMessageName,
  MessageType,
  type ProtocolMessage,
} from './protocol/messages.js';
import { describeIntegrity, toFileStartDescriptor } from './protocol/descriptor.js';
import { TransferSender, type StartTransferOptions } from './transfer/sender.js';
import { TransferReceiver } from './transfer/receiver.js';

// =============================================================================
// Types
// =============================================================================

/**
 * Options for TransferNode
 */
export interface TransferNodeOptions {
  transport: DuplexTransport;

  /** Destination for received files; without one, inbound transfers are ignored */
  sink?: FileSink;

  config?: PartialEngineConfig;

  logger?: Logger;

  /** Pacing sleep passed to the sender */
  sleep?: (ms: number) => Promise<void>;

  /** Clock in milliseconds */
  now?: () => number;
}

function toError(err: unknown): Error {
  return err instanceof Error ? err : new Error(String(err));
}

// =============================================================================
// TransferNode Class
// =============================================================================

/**
 * A sending and receiving endpoint on one transport.
 *
 * @example
 * ```typescript
 * const transport = new UdpTransport({ port: 4000 });
 * await transport.bind();
 *
 * const node = new TransferNode({
 *   transport,
 *   sink: new DirectoryFileSink('./received_files'),
 *   logger: createConsoleLogger(),
 * });
 * node.start();
 *
 * await node.sendFile('192.168.1.20:4000', './photo.jpg');
 * ```
 */
export class TransferNode extends TypedEventEmitter<NodeEvents> {
  // ===========================================================================
  // Public Properties
  // ===========================================================================

  readonly sender: TransferSender;

  /** Null when the node was created without a sink */
  readonly receiver: TransferReceiver | null;

  // ===========================================================================
  // Private Properties
  // ===========================================================================

  private readonly transport: DuplexTransport;

  private readonly config: EngineConfig;

  private readonly logger: Logger;

  private unsubscribe: (() => void) | null = null;

  private tickTimer: ReturnType<typeof setInterval> | null = null;

  private tickInProgress = false;

  // ===========================================================================
  // Constructor
  // ===========================================================================

  /**
   * @throws {CapabilityError} If the transport cannot send and receive
   * @throws {ConfigError} If the merged configuration is invalid
   */
  constructor(options: TransferNodeOptions) {
    super();

    if (!options.transport || typeof options.transport.onMessage !== 'function') {
      throw new CapabilityError('duplex transport');
    }

    this.transport = options.transport;
    this.config = validateConfig(mergeWithDefaults(options.config));
    this.logger = options.logger ?? createSilentLogger();

    this.sender = new TransferSender({
      transport: options.transport,
      config: this.config,
      logger: scopeLogger(this.logger, 'send'),
      sleep: options.sleep,
      now: options.now,
    });

    this.receiver = options.sink
      ? new TransferReceiver({
          transport: options.transport,
          sink: options.sink,
          config: this.config,
          logger: scopeLogger(this.logger, 'recv'),
          now: options.now,
        })
      : null;
  }

  // ===========================================================================
  // Public Properties
  // ===========================================================================

  /** True between start() and stop() */
  get isRunning(): boolean {
    return this.unsubscribe !== null;
  }

  // ===========================================================================
  // Lifecycle
  // ===========================================================================

  /**
   * Subscribes to the transport and starts the periodic tick.
   */
  start(): void {
    if (this.unsubscribe) {
      return;
    }

    this.unsubscribe = this.transport.onMessage((origin, payload, isBroadcast) => {
      this.handleDatagram(origin, payload, isBroadcast).catch((err: unknown) => {
        this.logger.error(`Unhandled error processing message from ${origin}: ${toError(err).message}`);
      });
    });

    if (this.receiver) {
      this.tickTimer = setInterval(() => {
        this.tick().catch((err: unknown) => {
          this.logger.error(`Periodic check failed: ${toError(err).message}`);
        });
      }, this.config.tickIntervalMs);
      this.tickTimer.unref();
    }

    this.logger.debug('Node started');
    this.emit('node:started');
  }

  /**
   * Unsubscribes from the transport and stops the tick. Transfer state is
   * kept.
   */
  stop(): void {
    if (!this.unsubscribe) {
      return;
    }

    this.unsubscribe();
    this.unsubscribe = null;

    if (this.tickTimer) {
      clearInterval(this.tickTimer);
      this.tickTimer = null;
    }

    this.logger.debug('Node stopped');
    this.emit('node:stopped');
  }

  // ===========================================================================
  // Public Methods
  // ===========================================================================

  /**
   * Sends a file or buffer to a peer.
   *
   * @returns false if the transfer could not be started
   */
  sendFile(recipient: string, source: TransferSource, options?: StartTransferOptions): Promise<boolean> {
    return this.sender.startTransfer(recipient, source, options);
  }

  /**
   * Runs one receiver maintenance pass. Skipped while a previous pass is
   * still running.
   */
  async tick(now?: number): Promise<void> {
    if (!this.receiver || this.tickInProgress) {
      return;
    }

    this.tickInProgress = true;
    try {
      await this.receiver.periodicTick(now);
    } finally {
      this.tickInProgress = false;
    }
  }

  /**
   * Decodes one inbound payload and routes it.
   */
  async handleDatagram(origin: string, payload: Buffer, isBroadcast = false): Promise<void> {
    let message: ProtocolMessage;
    try {
      message = decodeMessage(payload);
    } catch (err) {
      const error = toError(err);
      this.logger.warn(`Invalid message from ${origin}: ${error.message}`);
      this.emit('message:invalid', { origin, error });
      return;
    }

    this.logger.debug(`Received ${getMessageName(message.type)} from ${origin}`);

    switch (message.type) {
      case MessageType.FileStart: {
        if (!this.receiver) {
          this.logger.info(`Ignoring FILE_START from ${origin}: not receiving files`);
          return;
        }
        if (describeIntegrity(message).ignoredHashList) {
          this.logger.warn(`FILE_START from ${origin} carries both a Merkle root and piece hashes; using the root`);
        }
        await this.receiver.handleFileStart(origin, toFileStartDescriptor(message), isBroadcast);
        return;
      }

      case MessageType.PieceData:
        if (!this.receiver) {
          return;
        }
        await this.receiver.handlePieceData(
          origin,
          { pieceIndex: message.pieceIndex, data: message.data },
          isBroadcast
        );
        return;

      case MessageType.ResumeRequest:
        await this.sender.handleResumeRequest(origin, {
          missingIndices: message.missingIndices,
          acknowledgedIndices: message.acknowledgedIndices,
        });
        return;

      case MessageType.Acknowledgement:
        // Acknowledgements travel inside resume requests; standalone ones are informational
        this.logger.debug(`ACKNOWLEDGEMENT for piece ${message.pieceIndex} from ${origin}`);
        this.emit('message:acknowledgement', { origin, pieceIndex: message.pieceIndex });
        return;
    }
  }
}
