import { describe, it, expect } from 'vitest';
import React from 'react';
import { render } from 'ink-testing-library';
import {
  TransferRow,
  fromReceiverSnapshot,
  fromSenderSnapshot,
} from '../../../src/ui/components/TransferRow.js';
import {
  ReceiverTransferState,
  SenderTransferState,
  type ReceiverTransferSnapshot,
  type SenderTransferSnapshot,
} from '../../../src/engine/types.js';

// =============================================================================
// Test Data Helpers
// =============================================================================

function createReceiverSnapshot(overrides: Partial<ReceiverTransferSnapshot> = {}): ReceiverTransferSnapshot {
  return {
    transferId: 'peerA',
    origin: 'peerA',
    isBroadcast: false,
    filename: 'photo.jpg',
    totalSize: 2500,
    pieceSize: 1024,
    pieceCount: 3,
    state: ReceiverTransferState.COLLECTING,
    receivedCount: 2,
    progress: 2 / 3,
    missing: [1],
    requested: [],
    startedAt: new Date(0),
    lastActivityAt: new Date(0),
    ...overrides,
  };
}

function createSenderSnapshot(overrides: Partial<SenderTransferSnapshot> = {}): SenderTransferSnapshot {
  return {
    recipient: 'peerB',
    filename: 'notes.txt',
    totalSize: 5,
    pieceSize: 5,
    pieceCount: 1,
    state: SenderTransferState.SENDING,
    acknowledgedCount: 0,
    progress: 0,
    delayMs: 200,
    retryCount: 0,
    merkleRoot: null,
    startedAt: new Date(0),
    ...overrides,
  };
}

// =============================================================================
// Snapshot conversion
// =============================================================================

describe('row data conversion', () => {
  it('should describe an incoming transfer and its missing pieces', () => {
    expect(fromReceiverSnapshot(createReceiverSnapshot({ missing: [1, 2, 3, 7] }))).toEqual({
      direction: 'receive',
      peer: 'peerA',
      filename: 'photo.jpg',
      totalSize: 2500,
      pieceCount: 3,
      done: 2,
      progress: 2 / 3,
      state: 'collecting',
      detail: 'missing 1-3, 7',
    });
  });

  it('should leave out the detail when nothing is missing', () => {
    expect(fromReceiverSnapshot(createReceiverSnapshot({ missing: [] })).detail).toBeUndefined();
  });

  it('should describe an outgoing transfer with its pacing delay', () => {
    const row = fromSenderSnapshot(createSenderSnapshot({ delayMs: 450, acknowledgedCount: 1, progress: 1 }));
    expect(row.direction).toBe('send');
    expect(row.peer).toBe('peerB');
    expect(row.done).toBe(1);
    expect(row.detail).toBe('delay 450 ms');
  });
});

// =============================================================================
// Rendering
// =============================================================================

describe('TransferRow', () => {
  it('should render an incoming transfer', () => {
    const { lastFrame } = render(<TransferRow transfer={fromReceiverSnapshot(createReceiverSnapshot())} />);
    const frame = lastFrame();

    expect(frame).toContain('↓ photo.jpg');
    expect(frame).toContain(' 66%');
    expect(frame).toContain('2/3 pieces  2.4 KB  collecting');
    expect(frame).toContain('from peerA · missing 1');
  });

  it('should render an outgoing transfer', () => {
    const { lastFrame } = render(<TransferRow transfer={fromSenderSnapshot(createSenderSnapshot())} />);
    const frame = lastFrame();

    expect(frame).toContain('↑ notes.txt');
    expect(frame).toContain('0/1 pieces  5 B  sending');
    expect(frame).toContain('to peerB · delay 200 ms');
  });

  it('should truncate long names', () => {
    const { lastFrame } = render(
      <TransferRow transfer={fromSenderSnapshot(createSenderSnapshot({ filename: 'a-very-long-file-name.tar.gz' }))} nameWidth={10} />
    );
    expect(lastFrame()).toContain('a-very-lo…');
  });
});
