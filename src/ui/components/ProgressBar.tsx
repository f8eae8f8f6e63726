import React from 'react';
import { Box, Text } from 'ink';
import { colors, progressChars } from '../theme/index.js';

export interface ProgressBarProps {
  /** Progress value between 0 and 1 */
  progress: number;
  /** Width of the bar in characters (default: 20) */
  width?: number;
  /** Whether to show percentage text after the bar (default: true) */
  showPercentage?: boolean;
  /** Color of the filled portion (default: primary) */
  color?: string;
}

/**
 * Piece-progress indicator
 *
 * Draws filled (█) and empty (░) blocks followed by a percentage. The
 * percentage only reads 100% once the transfer is actually complete.
 *
 * @example
 * <ProgressBar progress={0.4} width={10} />
 * // Output: "████░░░░░░  40%"
 */
export const ProgressBar: React.FC<ProgressBarProps> = ({
  progress,
  width = 20,
  showPercentage = true,
  color = colors.primary,
}) => {
  const clamped = Number.isFinite(progress) ? Math.max(0, Math.min(1, progress)) : 0;

  const filledCount = Math.round(clamped * width);
  const filledBar = progressChars.filled.repeat(filledCount);
  const emptyBar = progressChars.empty.repeat(width - filledCount);

  const percentage = clamped >= 1 ? 100 : Math.floor(clamped * 100);

  return (
    <Box>
      <Text color={color}>{filledBar}</Text>
      <Text color={colors.muted}>{emptyBar}</Text>
      {showPercentage && (
        <Text color={colors.muted}> {percentage.toString().padStart(3)}%</Text>
      )}
    </Box>
  );
};

export default ProgressBar;
