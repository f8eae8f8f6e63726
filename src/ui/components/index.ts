/**
 * UI components for the radiodrop CLI.
 *
 * @module ui/components
 */

export { ProgressBar, type ProgressBarProps } from './ProgressBar.js';
export {
  TransferRow,
  fromSenderSnapshot,
  fromReceiverSnapshot,
  type TransferRowData,
  type TransferRowProps,
} from './TransferRow.js';
export { TransferList, type TransferListProps } from './TransferList.js';
