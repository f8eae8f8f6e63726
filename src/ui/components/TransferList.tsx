import React from 'react';
import { Box, Text } from 'ink';
import { TransferRow, type TransferRowData } from './TransferRow.js';
import { colors } from '../theme/index.js';

export interface TransferListProps {
  transfers: TransferRowData[];
  /** Heading shown above the rows */
  title?: string;
  /** Text shown when there are no transfers */
  emptyMessage?: string;
}

/**
 * List of active transfers with a heading.
 */
export const TransferList: React.FC<TransferListProps> = ({
  transfers,
  title = 'Transfers',
  emptyMessage = 'No active transfers',
}) => (
  <Box flexDirection="column">
    <Text color={colors.primary} bold>
      {title} ({transfers.length})
    </Text>
    {transfers.length === 0 ? (
      <Text color={colors.muted}>{emptyMessage}</Text>
    ) : (
      transfers.map((transfer) => (
        <TransferRow key={`${transfer.direction}:${transfer.peer}:${transfer.filename}`} transfer={transfer} />
      ))
    )}
  </Box>
);

export default TransferList;
