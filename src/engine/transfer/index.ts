/**
 * Transfer state machines.
 *
 * @module engine/transfer
 */

export {
  TransferSender,
  type TransferSenderOptions,
  type StartTransferOptions,
  type ResumeRequestInput,
} from './sender.js';
export {
  TransferReceiver,
  getTransferId,
  type TransferReceiverOptions,
  type PieceDataInput,
} from './receiver.js';
export { TransferRegistry, type RecordFn } from './registry.js';
export {
  PacingPolicy,
  RetryPolicy,
  type PacingOptions,
  type PacingState,
  type PacingDecision,
} from './backoff.js';
