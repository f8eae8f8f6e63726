import { describe, it, expect } from 'vitest';
import React from 'react';
import { render } from 'ink-testing-library';
import { TransferList } from '../../../src/ui/components/TransferList.js';
import type { TransferRowData } from '../../../src/ui/components/TransferRow.js';

function createRow(overrides: Partial<TransferRowData> = {}): TransferRowData {
  return {
    direction: 'receive',
    peer: 'peerA',
    filename: 'photo.jpg',
    totalSize: 2500,
    pieceCount: 3,
    done: 2,
    progress: 2 / 3,
    state: 'collecting',
    ...overrides,
  };
}

describe('TransferList', () => {
  it('should show the empty message', () => {
    const { lastFrame } = render(<TransferList transfers={[]} />);
    const frame = lastFrame();

    expect(frame).toContain('Transfers (0)');
    expect(frame).toContain('No active transfers');
  });

  it('should render a row per transfer under the title', () => {
    const rows = [createRow(), createRow({ peer: 'peerC', filename: 'map.png' })];
    const { lastFrame } = render(<TransferList transfers={rows} title="Incoming" emptyMessage="Waiting" />);
    const frame = lastFrame();

    expect(frame).toContain('Incoming (2)');
    expect(frame).toContain('photo.jpg');
    expect(frame).toContain('map.png');
    expect(frame).not.toContain('Waiting');
  });
});
