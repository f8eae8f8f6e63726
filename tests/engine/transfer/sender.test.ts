import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import * as fs from 'fs/promises';
import * as path from 'path';
import { tmpdir } from 'os';
import { TransferSender } from '../../../src/engine/transfer/sender.js';
import { MessageType } from '../../../src/engine/protocol/messages.js';
import { hashBytes, merkleRoot } from '../../../src/engine/piece/hasher.js';
import { SenderTransferState, type PartialEngineConfig } from '../../../src/engine/types.js';
import { FakeTransport, RecordingLogger, noSleep } from '../../helpers/fakes.js';

// =============================================================================
// Test Data Helpers
// =============================================================================

const PEER = 'peerB';

function patterned(length: number): Buffer {
  const buf = Buffer.alloc(length);
  for (let i = 0; i < length; i++) {
    buf[i] = (i * 7) % 256;
  }
  return buf;
}

const DATA = patterned(2500);
const PIECES = [DATA.subarray(0, 1024), DATA.subarray(1024, 2048), DATA.subarray(2048)];
const HASHES = PIECES.map((piece) => hashBytes(piece));

/** Piece indices of the PieceData datagrams sent so far */
function sentPieceIndices(transport: FakeTransport): number[] {
  return transport
    .messages()
    .flatMap((message) => (message.type === MessageType.PieceData ? [message.pieceIndex] : []));
}

function createSender(
  config: PartialEngineConfig = {},
  sleep: (ms: number) => Promise<void> = noSleep
): { sender: TransferSender; transport: FakeTransport; logger: RecordingLogger } {
  const transport = new FakeTransport();
  const logger = new RecordingLogger();
  const sender = new TransferSender({ transport, config, logger, sleep, now: () => 1_000 });
  return { sender, transport, logger };
}

// =============================================================================
// Starting a transfer
// =============================================================================

describe('TransferSender', () => {
  describe('startTransfer', () => {
    it('should announce the file and send every piece once', async () => {
      const { sender, transport } = createSender();

      expect(await sender.startTransfer(PEER, DATA)).toBe(true);

      const messages = transport.messages();
      expect(messages).toHaveLength(4);
      expect(messages[0]).toEqual({
        type: MessageType.FileStart,
        filename: 'data.bin',
        totalSize: 2500,
        pieceSize: 1024,
        merkleRoot: merkleRoot(HASHES),
        pieceHashes: [],
      });
      expect(sentPieceIndices(transport)).toEqual([0, 1, 2]);
      expect(transport.sent.every((datagram) => datagram.peerId === PEER && datagram.channel === 123)).toBe(true);

      const last = messages[3];
      if (last.type !== MessageType.PieceData) throw new Error('expected PieceData');
      expect(last.data.equals(PIECES[2])).toBe(true);
    });

    it('should advertise the hash list when the Merkle root is off', async () => {
      const { sender, transport } = createSender({ useMerkleRoot: false });

      await sender.startTransfer(PEER, DATA, { filename: 'notes.txt' });

      const start = transport.messages()[0];
      if (start.type !== MessageType.FileStart) throw new Error('expected FileStart');
      expect(start.filename).toBe('notes.txt');
      expect(start.merkleRoot).toBeUndefined();
      expect(start.pieceHashes).toEqual(HASHES);
      expect(sender.getTransfer(PEER)?.merkleRoot).toBeNull();
    });

    it('should pause for the pacing delay after each piece', async () => {
      const sleeps: number[] = [];
      const { sender } = createSender({}, async (ms) => {
        sleeps.push(ms);
      });

      await sender.startTransfer(PEER, DATA);

      expect(sleeps).toEqual([200, 200, 200]);
    });

    it('should shrink the piece size for small files', async () => {
      const { sender, transport } = createSender();

      await sender.startTransfer(PEER, Buffer.from('tiny payload'));

      const start = transport.messages()[0];
      if (start.type !== MessageType.FileStart) throw new Error('expected FileStart');
      expect(start.pieceSize).toBe(12);
      expect(sentPieceIndices(transport)).toEqual([0]);
    });

    it('should complete an empty file after the FileStart alone', async () => {
      const { sender, transport } = createSender();
      const completed: string[] = [];
      sender.on('transfer:completed', ({ transfer }) => completed.push(transfer.filename));

      expect(await sender.startTransfer(PEER, Buffer.alloc(0), { filename: 'empty.txt' })).toBe(true);

      const messages = transport.messages();
      expect(messages).toHaveLength(1);
      expect(messages[0]).toEqual({
        type: MessageType.FileStart,
        filename: 'empty.txt',
        totalSize: 0,
        pieceSize: 1024,
        pieceHashes: [],
      });
      expect(completed).toEqual(['empty.txt']);
      expect(sender.getTransfer(PEER)?.state).toBe(SenderTransferState.COMPLETE);
      expect(sender.getTransfer(PEER)?.progress).toBe(1);
    });

    it('should return false when the FileStart cannot be sent', async () => {
      const { sender, transport, logger } = createSender();
      transport.fail = () => true;

      expect(await sender.startTransfer(PEER, DATA)).toBe(false);
      expect(sender.getTransfer(PEER)).toBeUndefined();
      expect(logger.messages('error')).toEqual([`Error sending FILE_START to ${PEER}: link down`]);
    });

    it('should refuse data larger than the maximum file size', async () => {
      const { sender, transport } = createSender({ maxFileSize: 100 });

      expect(await sender.startTransfer(PEER, patterned(101))).toBe(false);
      expect(transport.sent).toHaveLength(0);
    });

    it('should replace an existing transfer to the same recipient', async () => {
      const { sender, logger } = createSender();
      await sender.startTransfer(PEER, DATA);
      await sender.startTransfer(PEER, Buffer.from('second file'), { filename: 'two.txt' });

      expect(logger.messages('warn')).toContain(`Replacing the active transfer to ${PEER}`);
      expect(sender.getTransfer(PEER)?.filename).toBe('two.txt');
      expect(sender.listTransfers()).toHaveLength(1);
    });
  });

  // ===========================================================================
  // File sources
  // ===========================================================================

  describe('file sources', () => {
    let dir: string;

    beforeEach(async () => {
      dir = path.join(tmpdir(), `radiodrop-sender-test-${Date.now()}-${Math.random().toString(36).slice(2)}`);
      await fs.mkdir(dir, { recursive: true });
    });

    afterEach(async () => {
      await fs.rm(dir, { recursive: true, force: true });
    });

    it('should stream a file from disk and announce its base name', async () => {
      const file = path.join(dir, 'photo.jpg');
      await fs.writeFile(file, DATA);
      const { sender, transport } = createSender();

      expect(await sender.startTransfer(PEER, file)).toBe(true);

      const start = transport.messages()[0];
      if (start.type !== MessageType.FileStart) throw new Error('expected FileStart');
      expect(start.filename).toBe('photo.jpg');
      expect(start.totalSize).toBe(2500);
      expect(start.merkleRoot).toBe(merkleRoot(HASHES));
    });

    it('should return false for a missing file', async () => {
      const { sender, transport } = createSender();
      expect(await sender.startTransfer(PEER, path.join(dir, 'absent.bin'))).toBe(false);
      expect(transport.sent).toHaveLength(0);
    });

    it('should return false for a directory', async () => {
      const { sender, logger } = createSender();
      expect(await sender.startTransfer(PEER, dir)).toBe(false);
      expect(logger.messages('error')).toEqual([`Path is not a file: ${dir}`]);
    });

    it('should return false for an empty path', async () => {
      const { sender } = createSender();
      expect(await sender.startTransfer(PEER, '  ')).toBe(false);
    });
  });

  // ===========================================================================
  // Resume requests
  // ===========================================================================

  describe('handleResumeRequest', () => {
    let sender: TransferSender;
    let transport: FakeTransport;
    let logger: RecordingLogger;

    beforeEach(async () => {
      ({ sender, transport, logger } = createSender());
      await sender.startTransfer(PEER, DATA);
      transport.clear();
    });

    it('should resend only the missing pieces', async () => {
      const progress: number[] = [];
      sender.on('transfer:progress', ({ acknowledged }) => progress.push(acknowledged));

      await sender.handleResumeRequest(PEER, { missingIndices: [1], acknowledgedIndices: [0, 2] });

      expect(sentPieceIndices(transport)).toEqual([1]);
      expect(progress).toEqual([2]);
      expect(sender.getTransfer(PEER)?.acknowledgedCount).toBe(2);
    });

    it('should resend each missing piece once, in index order', async () => {
      await sender.handleResumeRequest(PEER, { missingIndices: [2, 0, 2], acknowledgedIndices: [] });
      expect(sentPieceIndices(transport)).toEqual([0, 2]);
    });

    it('should complete once every piece is acknowledged and nothing is missing', async () => {
      const completed: SenderTransferState[] = [];
      sender.on('transfer:completed', ({ transfer }) => completed.push(transfer.state));

      await sender.handleResumeRequest(PEER, { missingIndices: [], acknowledgedIndices: [0, 1, 2] });

      expect(completed).toEqual([SenderTransferState.COMPLETE]);
      expect(sender.getTransfer(PEER)?.progress).toBe(1);
      expect(transport.sent).toHaveLength(0);
    });

    it('should accumulate acknowledgements across requests', async () => {
      await sender.handleResumeRequest(PEER, { missingIndices: [1, 2], acknowledgedIndices: [0] });
      await sender.handleResumeRequest(PEER, { missingIndices: [], acknowledgedIndices: [1, 2] });

      expect(sender.getTransfer(PEER)?.state).toBe(SenderTransferState.COMPLETE);
    });

    it('should ignore requests for a finished transfer', async () => {
      await sender.handleResumeRequest(PEER, { missingIndices: [], acknowledgedIndices: [0, 1, 2] });
      transport.clear();

      await sender.handleResumeRequest(PEER, { missingIndices: [0], acknowledgedIndices: [] });

      expect(transport.sent).toHaveLength(0);
      expect(logger.messages('info')).toContain(`RESUME_REQUEST from ${PEER} for a transfer already complete`);
    });

    it('should raise the delay after repeated loss reports', async () => {
      const escalations: number[] = [];
      sender.on('pacing:escalated', ({ delayMs }) => escalations.push(delayMs));

      for (let i = 0; i < 3; i++) {
        await sender.handleResumeRequest(PEER, { missingIndices: [1], acknowledgedIndices: [0, 2] });
      }

      expect(escalations).toEqual([300]);
      expect(sender.getTransfer(PEER)?.delayMs).toBe(300);
      expect(sender.getTransfer(PEER)?.retryCount).toBe(0);
    });

    it('should reset the loss counter on a request without loss', async () => {
      await sender.handleResumeRequest(PEER, { missingIndices: [1], acknowledgedIndices: [] });
      await sender.handleResumeRequest(PEER, { missingIndices: [1], acknowledgedIndices: [] });
      expect(sender.getTransfer(PEER)?.retryCount).toBe(2);

      await sender.handleResumeRequest(PEER, { missingIndices: [], acknowledgedIndices: [0] });
      expect(sender.getTransfer(PEER)?.retryCount).toBe(0);
      expect(sender.getTransfer(PEER)?.state).toBe(SenderTransferState.SENDING);
    });

    it('should warn about indices outside the file', async () => {
      await sender.handleResumeRequest(PEER, { missingIndices: [7], acknowledgedIndices: [] });

      expect(transport.sent).toHaveLength(0);
      expect(logger.messages('warn')).toContain(`RESUME_REQUEST from ${PEER} named invalid indices: 7`);
    });

    it('should warn when there is no transfer to the origin', async () => {
      await sender.handleResumeRequest('stranger', { missingIndices: [0], acknowledgedIndices: [] });

      expect(transport.sent).toHaveLength(0);
      expect(logger.messages('warn')).toContain('RESUME_REQUEST from stranger but no active transfer to it');
    });

    it('should serialize overlapping resends to one recipient', async () => {
      const first = sender.handleResumeRequest(PEER, { missingIndices: [1, 2], acknowledgedIndices: [] });
      const second = sender.handleResumeRequest(PEER, { missingIndices: [0], acknowledgedIndices: [] });
      await Promise.all([first, second]);

      expect(sentPieceIndices(transport)).toEqual([1, 2, 0]);
    });
  });

  // ===========================================================================
  // Send failures
  // ===========================================================================

  describe('send failures', () => {
    it('should keep going after a failed piece send', async () => {
      const { sender, transport } = createSender();
      transport.fail = (datagram) => datagram.payload[0] === MessageType.PieceData && datagram.payload.readUInt32BE(1) === 1;
      const failures: number[] = [];
      sender.on('piece:send-failed', ({ pieceIndex }) => failures.push(pieceIndex));

      expect(await sender.startTransfer(PEER, DATA)).toBe(true);

      expect(failures).toEqual([1]);
      expect(sentPieceIndices(transport)).toEqual([0, 2]);
      expect(sender.getTransfer(PEER)?.state).toBe(SenderTransferState.SENDING);
    });

    it('should abandon the transfer after repeated failures of one piece', async () => {
      const { sender, transport } = createSender({ maxSendFailures: 2 });
      transport.fail = (datagram) => datagram.payload[0] === MessageType.PieceData;
      const abandoned: number[] = [];
      sender.on('transfer:abandoned', ({ pieceIndex }) => abandoned.push(pieceIndex));

      await sender.startTransfer(PEER, Buffer.from('one piece only'));
      expect(abandoned).toEqual([]);

      await sender.handleResumeRequest(PEER, { missingIndices: [0], acknowledgedIndices: [] });

      expect(abandoned).toEqual([0]);
      expect(sender.getTransfer(PEER)?.state).toBe(SenderTransferState.ABANDONED);
    });
  });

  // ===========================================================================
  // Cleanup
  // ===========================================================================

  describe('cleanupTransfer', () => {
    it('should remove the transfer and stop later resends', async () => {
      const { sender, transport } = createSender();
      await sender.startTransfer(PEER, DATA);
      transport.clear();
      const removed: string[] = [];
      sender.on('transfer:removed', ({ recipient }) => removed.push(recipient));

      expect(sender.cleanupTransfer(PEER)).toBe(true);
      expect(sender.cleanupTransfer(PEER)).toBe(false);
      await sender.sendPieces(PEER, [0]);

      expect(removed).toEqual([PEER]);
      expect(transport.sent).toHaveLength(0);
    });
  });
});
