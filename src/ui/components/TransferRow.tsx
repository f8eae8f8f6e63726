import React from 'react';
import { Box, Text } from 'ink';
import type { ReceiverTransferSnapshot, SenderTransferSnapshot } from '../../engine/types.js';
import { ProgressBar } from './ProgressBar.js';
import { colors, getStateColor, symbols } from '../theme/index.js';
import { formatBytes, formatPieceRanges, truncateText } from '../utils/format.js';

/**
 * Direction-neutral view of a transfer for display
 */
export interface TransferRowData {
  direction: 'send' | 'receive';
  peer: string;
  filename: string;
  totalSize: number;
  pieceCount: number;
  /** Pieces acknowledged (send) or held (receive) */
  done: number;
  progress: number;
  state: string;
  /** Extra status line, e.g. missing pieces or pacing delay */
  detail?: string;
}

export interface TransferRowProps {
  transfer: TransferRowData;
  /** Width of the filename column (default: 24) */
  nameWidth?: number;
  /** Width of the progress bar (default: 20) */
  barWidth?: number;
}

/**
 * Builds row data from an outgoing transfer.
 */
export function fromSenderSnapshot(snapshot: SenderTransferSnapshot): TransferRowData {
  return {
    direction: 'send',
    peer: snapshot.recipient,
    filename: snapshot.filename,
    totalSize: snapshot.totalSize,
    pieceCount: snapshot.pieceCount,
    done: snapshot.acknowledgedCount,
    progress: snapshot.progress,
    state: snapshot.state,
    detail: `delay ${snapshot.delayMs} ms`,
  };
}

/**
 * Builds row data from an incoming transfer.
 */
export function fromReceiverSnapshot(snapshot: ReceiverTransferSnapshot): TransferRowData {
  return {
    direction: 'receive',
    peer: snapshot.origin,
    filename: snapshot.filename,
    totalSize: snapshot.totalSize,
    pieceCount: snapshot.pieceCount,
    done: snapshot.receivedCount,
    progress: snapshot.progress,
    state: snapshot.state,
    detail: snapshot.missing.length > 0 ? `missing ${formatPieceRanges(snapshot.missing)}` : undefined,
  };
}

/**
 * Single transfer line
 *
 * Layout: ↑ name  ████░░░░  40%  2/5 pieces  1.0 KB  sending
 */
export const TransferRow: React.FC<TransferRowProps> = ({
  transfer,
  nameWidth = 24,
  barWidth = 20,
}) => {
  const arrow = transfer.direction === 'send' ? symbols.transfer.send : symbols.transfer.receive;
  const name = truncateText(transfer.filename, nameWidth).padEnd(nameWidth);

  return (
    <Box flexDirection="column">
      <Box>
        <Text color={colors.secondary}>{arrow} </Text>
        <Text color={colors.text}>{name} </Text>
        <ProgressBar progress={transfer.progress} width={barWidth} />
        <Text color={colors.muted}>
          {`  ${transfer.done}/${transfer.pieceCount} pieces  ${formatBytes(transfer.totalSize)}  `}
        </Text>
        <Text color={getStateColor(transfer.state)}>{transfer.state}</Text>
      </Box>
      <Box paddingLeft={2}>
        <Text color={colors.muted}>
          {`${transfer.direction === 'send' ? 'to' : 'from'} ${transfer.peer}`}
          {transfer.detail ? ` · ${transfer.detail}` : ''}
        </Text>
      </Box>
    </Box>
  );
};

export default TransferRow;
