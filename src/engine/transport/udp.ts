/**
 * UDP Datagram Transport
 *
 * Carries protocol messages as single UDP datagrams. Peers are addressed
 * as `host:port` (IPv6 hosts in brackets, e.g. `[::1]:4000`).
 *
 * Datagram format:
 * - Offset 0: channel (1 byte)
 * - Offset 1: protocol message
 *
 * Datagrams for any other channel are dropped, so several independent
 * applications can share a port range.
 *
 * @module engine/transport/udp
 */

import dgram from 'dgram';
import { createSilentLogger, type Logger } from '../logger.js';
import { DEFAULT_CHANNEL } from '../config/defaults.js';
import { TransportError, type DuplexTransport, type InboundListener } from '../types.js';

// =============================================================================
// Types
// =============================================================================

/**
 * Options for UdpTransport
 */
export interface UdpTransportOptions {
  /** Local port to bind (0 picks a free port) */
  port?: number;

  /** Local address to bind (default: all interfaces) */
  host?: string;

  /** Socket family (default: udp4) */
  type?: 'udp4' | 'udp6';

  /** Channel this transport accepts inbound datagrams on */
  channel?: number;

  logger?: Logger;
}

/**
 * A parsed peer address
 */
export interface PeerAddress {
  host: string;
  port: number;
}

// =============================================================================
// Peer Addressing
// =============================================================================

/**
 * Parses a `host:port` peer id.
 *
 * @throws {TransportError} If the id is not a valid address
 */
export function parsePeerId(peerId: string): PeerAddress {
  const match = peerId.match(/^(?:\[([^\]]+)\]|([^:]+)):(\d+)$/);
  if (!match) {
    throw new TransportError(`Invalid peer address: ${peerId}`, peerId);
  }

  const host = match[1] ?? match[2];
  const port = parseInt(match[3], 10);
  if (!host || port < 1 || port > 65535) {
    throw new TransportError(`Invalid peer address: ${peerId}`, peerId);
  }

  return { host, port };
}

/**
 * Formats an address as a peer id.
 */
export function formatPeerId(host: string, port: number): string {
  return host.includes(':') ? `[${host}]:${port}` : `${host}:${port}`;
}

// =============================================================================
// UdpTransport Class
// =============================================================================

/**
 * Duplex transport over a UDP socket.
 *
 * @example
 * ```typescript
 * const transport = new UdpTransport({ port: 4000 });
 * await transport.bind();
 *
 * transport.onMessage((origin, payload) => {
 *   console.log(`${payload.length} bytes from ${origin}`);
 * });
 *
 * await transport.send('192.168.1.20:4000', payload, 123);
 * await transport.close();
 * ```
 */
export class UdpTransport implements DuplexTransport {
  // ===========================================================================
  // Private Properties
  // ===========================================================================

  private readonly options: Required<Omit<UdpTransportOptions, 'logger' | 'host'>> & {
    host: string | undefined;
  };

  private readonly logger: Logger;

  private socket: dgram.Socket | null = null;

  private readonly listeners = new Set<InboundListener>();

  // ===========================================================================
  // Constructor
  // ===========================================================================

  constructor(options: UdpTransportOptions = {}) {
    this.options = {
      port: options.port ?? 0,
      host: options.host,
      type: options.type ?? 'udp4',
      channel: options.channel ?? DEFAULT_CHANNEL,
    };
    this.logger = options.logger ?? createSilentLogger();
  }

  // ===========================================================================
  // Public Properties
  // ===========================================================================

  /** True while the socket is bound */
  get isBound(): boolean {
    return this.socket !== null;
  }

  // ===========================================================================
  // Public Methods
  // ===========================================================================

  /**
   * Binds the socket and starts delivering inbound datagrams.
   *
   * @returns The bound local address
   * @throws {TransportError} If the socket cannot be bound
   */
  async bind(): Promise<PeerAddress> {
    if (this.socket) {
      const address = this.socket.address();
      return { host: address.address, port: address.port };
    }

    const socket = dgram.createSocket(this.options.type);

    await new Promise<void>((resolve, reject) => {
      const onError = (err: Error): void => {
        reject(new TransportError(`Cannot bind UDP port ${this.options.port}: ${err.message}`));
      };
      socket.once('error', onError);
      socket.bind(this.options.port, this.options.host, () => {
        socket.removeListener('error', onError);
        resolve();
      });
    });

    socket.on('message', (msg, rinfo) => this.handleDatagram(msg, formatPeerId(rinfo.address, rinfo.port)));
    socket.on('error', (err) => this.logger.error(`UDP socket error: ${err.message}`));
    this.socket = socket;

    const address = socket.address();
    this.logger.info(`Listening on ${formatPeerId(address.address, address.port)} (channel ${this.options.channel})`);
    return { host: address.address, port: address.port };
  }

  /**
   * Sends one message to a peer.
   *
   * @throws {TransportError} If the transport is not bound, the address is
   *   invalid, or the socket reports an error
   */
  send(peerId: string, payload: Buffer, channel: number): Promise<void> {
    const socket = this.socket;
    if (!socket) {
      return Promise.reject(new TransportError('Transport is not bound', peerId));
    }

    let address: PeerAddress;
    try {
      address = parsePeerId(peerId);
    } catch (err) {
      return Promise.reject(err);
    }

    const datagram = Buffer.allocUnsafe(1 + payload.length);
    datagram.writeUInt8(channel & 0xff, 0);
    payload.copy(datagram, 1);

    return new Promise<void>((resolve, reject) => {
      socket.send(datagram, 0, datagram.length, address.port, address.host, (err) => {
        if (err) {
          reject(new TransportError(`Send failed: ${err.message}`, peerId));
          return;
        }
        resolve();
      });
    });
  }

  /**
   * Subscribes to inbound messages on this transport's channel.
   *
   * @returns A function that removes the listener
   */
  onMessage(listener: InboundListener): () => void {
    this.listeners.add(listener);
    return () => {
      this.listeners.delete(listener);
    };
  }

  /**
   * Closes the socket. Listeners stay registered for a later bind.
   */
  close(): Promise<void> {
    const socket = this.socket;
    if (!socket) {
      return Promise.resolve();
    }
    this.socket = null;

    return new Promise<void>((resolve) => {
      socket.close(() => resolve());
    });
  }

  // ===========================================================================
  // Private Methods
  // ===========================================================================

  private handleDatagram(msg: Buffer, origin: string): void {
    if (msg.length < 2) {
      this.logger.debug(`Dropping ${msg.length}-byte datagram from ${origin}`);
      return;
    }

    const channel = msg.readUInt8(0);
    if (channel !== this.options.channel) {
      return;
    }

    const payload = msg.subarray(1);
    for (const listener of this.listeners) {
      try {
        listener(origin, payload, false);
      } catch (err) {
        this.logger.error(
          `Message listener failed for ${origin}: ${err instanceof Error ? err.message : String(err)}`
        );
      }
    }
  }
}
