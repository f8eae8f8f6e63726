/**
 * Typed Event Emitter System for the radiodrop engine
 *
 * Provides type-safe event emission and subscription for sender, receiver
 * and node events. Wraps Node's EventEmitter with full TypeScript type safety.
 */

import { EventEmitter } from 'events';
import type {
  ReceiverTransferSnapshot,
  SenderTransferSnapshot,
} from './types.js';

// ============================================================================
// Event Payload Types
// ============================================================================

/**
 * Events emitted by the sending side.
 */
export interface SenderEvents {
  'transfer:started': { transfer: SenderTransferSnapshot };
  'transfer:completed': { transfer: SenderTransferSnapshot };
  'transfer:abandoned': { transfer: SenderTransferSnapshot; pieceIndex: number };
  'transfer:removed': { recipient: string };

  // Emitted after every PieceData handed to the transport
  'piece:sent': { recipient: string; pieceIndex: number };
  'piece:send-failed': { recipient: string; pieceIndex: number; failures: number; error: Error };

  // Acknowledgement progress reported by a resume request
  'transfer:progress': { recipient: string; acknowledged: number; pieceCount: number };

  'pacing:escalated': { recipient: string; delayMs: number };
}

/**
 * Events emitted by the receiving side.
 */
export interface ReceiverEvents {
  'transfer:started': { transfer: ReceiverTransferSnapshot };
  'transfer:completed': { transferId: string; filename: string; size: number; location?: string };
  'transfer:failed': { transferId: string; filename: string; reason: string };
  'transfer:removed': { transferId: string };

  'piece:received': { transferId: string; pieceIndex: number; received: number; pieceCount: number };
  'piece:rejected': { transferId: string; pieceIndices: number[]; reason: 'merkle' | 'hash' };

  'resume:sent': { transferId: string; missing: number[]; acknowledged: number };
}

/**
 * Events emitted by a node for traffic it cannot route.
 */
export interface NodeEvents {
  'node:started': void;
  'node:stopped': void;
  'message:invalid': { origin: string; error: Error };
  'message:acknowledgement': { origin: string; pieceIndex: number };
}

// ============================================================================
// TypedEventEmitter Implementation
// ============================================================================

/**
 * Listener signature for an event payload (`void` events take no argument).
 */
export type EventListener<P> = P extends void ? () => void : (payload: P) => void;

/**
 * Type-safe event emitter that wraps Node's EventEmitter
 *
 * @template T - Event map type defining event names and their payload types
 *
 * @example
 * ```typescript
 * const emitter = new TypedEventEmitter<ReceiverEvents>();
 *
 * emitter.on('transfer:completed', ({ filename, size }) => {
 *   console.log(`Saved ${filename} (${size} bytes)`);
 * });
 *
 * // Compile error: wrong payload type
 * emitter.emit('transfer:completed', { transferId: 'abc' });
 * ```
 */
export class TypedEventEmitter<T extends { [K in keyof T]: unknown }> {
  private emitter: EventEmitter;

  constructor() {
    this.emitter = new EventEmitter();
  }

  /**
   * Subscribe to an event
   *
   * @returns this for chaining
   */
  on<K extends keyof T>(event: K, listener: EventListener<T[K]>): this {
    this.emitter.on(event as string, listener as (...args: unknown[]) => void);
    return this;
  }

  /**
   * Subscribe to an event once (auto-unsubscribes after first emission)
   */
  once<K extends keyof T>(event: K, listener: EventListener<T[K]>): this {
    this.emitter.once(event as string, listener as (...args: unknown[]) => void);
    return this;
  }

  /**
   * Unsubscribe from an event
   */
  off<K extends keyof T>(event: K, listener: EventListener<T[K]>): this {
    this.emitter.off(event as string, listener as (...args: unknown[]) => void);
    return this;
  }

  /**
   * Emit an event with payload
   *
   * @returns true if event had listeners, false otherwise
   */
  emit<K extends keyof T>(
    event: K,
    ...args: T[K] extends void ? [] : [payload: T[K]]
  ): boolean {
    return this.emitter.emit(event as string, ...args);
  }

  /**
   * Returns a promise that resolves when the specified event is emitted
   */
  waitFor<K extends keyof T>(event: K): Promise<T[K]> {
    return new Promise((resolve) => {
      this.once(event, ((payload: T[K]) => {
        resolve(payload);
      }) as EventListener<T[K]>);
    });
  }
}
