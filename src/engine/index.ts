/**
 * radiodrop transfer engine
 *
 * Reliable, Merkle-verified file transfer over lossy datagram links.
 * Exports the transfer node, the sender and receiver state machines, and
 * the codec, transport and storage pieces they are built from.
 *
 * @module engine
 */

export { TransferNode, type TransferNodeOptions } from './node.js';

// Type definitions and error classes
export * from './types.js';

export { TypedEventEmitter, type EventListener, type SenderEvents, type ReceiverEvents, type NodeEvents } from './events.js';

export * from './logger.js';
export * from './config/index.js';
export * from './piece/index.js';
export * from './protocol/index.js';
export * from './transfer/index.js';
export * from './disk/index.js';
export { UdpTransport, parsePeerId, formatPeerId, type UdpTransportOptions, type PeerAddress } from './transport/udp.js';
