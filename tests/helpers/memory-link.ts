/**
 * An in-process datagram network for end-to-end tests.
 *
 * Each endpoint is a DuplexTransport. Deliveries are scheduled with
 * setImmediate so senders never re-enter receivers synchronously. An
 * optional `intercept` hook may drop (return null) or rewrite datagrams.
 */

import type { DuplexTransport, InboundListener } from '../../src/engine/types.js';

export interface InFlight {
  from: string;
  to: string;
  payload: Buffer;
}

export class MemoryNetwork {
  intercept: ((datagram: InFlight) => Buffer | null) | null = null;

  /** Datagrams that reached an endpoint */
  delivered = 0;

  /** Datagrams removed by `intercept` */
  dropped = 0;

  private pending = 0;

  private readonly endpoints = new Map<string, Set<InboundListener>>();

  endpoint(id: string): DuplexTransport {
    const listeners = new Set<InboundListener>();
    this.endpoints.set(id, listeners);

    return {
      send: async (peerId: string, payload: Buffer): Promise<void> => {
        this.route({ from: id, to: peerId, payload: Buffer.from(payload) });
      },
      onMessage: (listener: InboundListener) => {
        listeners.add(listener);
        return () => {
          listeners.delete(listener);
        };
      },
    };
  }

  /**
   * Resolves once no datagram has moved for a few event-loop turns.
   */
  async settle(): Promise<void> {
    let idleRounds = 0;
    while (idleRounds < 3) {
      const before = this.delivered + this.dropped;
      await new Promise<void>((resolve) => setImmediate(resolve));
      const moved = this.delivered + this.dropped !== before;
      idleRounds = moved || this.pending > 0 ? 0 : idleRounds + 1;
    }
  }

  private route(datagram: InFlight): void {
    const payload = this.intercept ? this.intercept(datagram) : datagram.payload;
    if (payload === null) {
      this.dropped++;
      return;
    }

    this.pending++;
    setImmediate(() => {
      this.pending--;
      this.delivered++;
      for (const listener of this.endpoints.get(datagram.to) ?? []) {
        listener(datagram.from, payload, false);
      }
    });
  }
}
