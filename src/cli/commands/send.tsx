/**
 * Send command for the radiodrop CLI.
 *
 * Sends one file to a peer over UDP and stays up to answer its resume
 * requests until the peer confirms every piece, the sender gives up, or
 * the timeout expires.
 *
 * @module cli/commands/send
 */

import React, { useEffect, useState } from 'react';
import { render, Text, Box, useApp } from 'ink';
import { basename } from 'path';
import { TransferNode } from '../../engine/node.js';
import { UdpTransport } from '../../engine/transport/udp.js';
import { createConsoleLogger } from '../../engine/logger.js';
import { TransferRow, fromSenderSnapshot, type TransferRowData } from '../../ui/components/TransferRow.js';
import { colors, symbols } from '../../ui/theme/index.js';
import { formatDuration } from '../../ui/utils/format.js';
import { resolveEngineConfig, type EngineFlags } from '../utils/options.js';
import { errorMessage, successMessage, warnMessage } from '../utils/output.js';

// =============================================================================
// Types
// =============================================================================

export interface SendCommandOptions {
  /** Receiver address, host:port */
  peer: string;
  /** File to send */
  file: string;
  /** Local UDP port (0 picks a free port) */
  port: number;
  /** Seconds to wait for the receiver's confirmation */
  timeout: number;
  verbose: boolean;
  logFile?: string;
  engine: EngineFlags;
}

/**
 * Where the send command is in its lifecycle
 */
export type SendPhase = 'starting' | 'sending' | 'complete' | 'abandoned' | 'timeout' | 'error';

export interface SendViewProps {
  phase: SendPhase;
  peer: string;
  filename: string;
  transfer: TransferRowData | null;
  error: string | null;
  elapsedSeconds: number;
}

// =============================================================================
// Components
// =============================================================================

/**
 * Presentational view of a send in progress
 */
export const SendView: React.FC<SendViewProps> = ({
  phase,
  peer,
  filename,
  transfer,
  error,
  elapsedSeconds,
}) => {
  if (phase === 'error') {
    return <Text color={colors.error}>[ERROR] {error ?? 'Unknown error'}</Text>;
  }

  if (phase === 'starting') {
    return (
      <Text color={colors.secondary}>
        Preparing {filename} for {peer}...
      </Text>
    );
  }

  return (
    <Box flexDirection="column">
      {transfer && <TransferRow transfer={transfer} />}
      <Box marginTop={1}>
        {phase === 'sending' && (
          <Text color={colors.muted}>Waiting for {peer} to confirm ({formatDuration(elapsedSeconds)})</Text>
        )}
        {phase === 'complete' && (
          <Text color={colors.success}>
            {symbols.check} {peer} confirmed every piece
          </Text>
        )}
        {phase === 'abandoned' && (
          <Text color={colors.error}>
            {symbols.cross} Gave up: the link to {peer} keeps failing
          </Text>
        )}
        {phase === 'timeout' && (
          <Text color={colors.warning}>
            {symbols.cross} No confirmation from {peer} after {formatDuration(elapsedSeconds)}
          </Text>
        )}
      </Box>
    </Box>
  );
};

/**
 * Interactive send command using Ink for rendering
 */
export function SendCommand({
  options,
  onFinish,
}: {
  options: SendCommandOptions;
  onFinish: (phase: SendPhase) => void;
}): React.ReactElement {
  const { exit } = useApp();
  const [phase, setPhase] = useState<SendPhase>('starting');
  const [transfer, setTransfer] = useState<TransferRowData | null>(null);
  const [error, setError] = useState<string | null>(null);
  const [elapsedSeconds, setElapsedSeconds] = useState(0);

  useEffect(() => {
    const startedAt = Date.now();
    let transport: UdpTransport | null = null;
    let node: TransferNode | null = null;
    let timeoutTimer: ReturnType<typeof setTimeout> | null = null;
    const clock = setInterval(() => {
      setElapsedSeconds(Math.floor((Date.now() - startedAt) / 1000));
    }, 1000);

    const finish = (result: SendPhase): void => {
      clearInterval(clock);
      if (timeoutTimer) clearTimeout(timeoutTimer);
      node?.stop();
      setElapsedSeconds(Math.floor((Date.now() - startedAt) / 1000));
      setPhase(result);
      onFinish(result);
      (transport ? transport.close() : Promise.resolve()).then(
        () => exit(),
        (err: unknown) => exit(err instanceof Error ? err : new Error(String(err)))
      );
    };

    const run = async (): Promise<SendPhase> => {
      const config = await resolveEngineConfig(options.engine);
      const logger = createConsoleLogger({
        level: options.verbose ? 'debug' : 'warn',
        logFile: options.logFile,
      });

      const udp = new UdpTransport({ port: options.port, channel: config.channel, logger });
      transport = udp;
      await udp.bind();
      const active = new TransferNode({ transport: udp, config, logger });
      node = active;

      const refresh = (): void => {
        const snapshot = active.sender.getTransfer(options.peer);
        if (snapshot) setTransfer(fromSenderSnapshot(snapshot));
      };
      active.sender.on('transfer:started', refresh);
      active.sender.on('piece:sent', refresh);
      active.sender.on('transfer:progress', refresh);
      active.sender.on('pacing:escalated', refresh);

      const outcome = new Promise<SendPhase>((resolve) => {
        active.sender.once('transfer:completed', () => resolve('complete'));
        active.sender.once('transfer:abandoned', () => resolve('abandoned'));
        timeoutTimer = setTimeout(() => resolve('timeout'), options.timeout * 1000);
      });

      active.start();
      setPhase('sending');

      const started = await active.sendFile(options.peer, options.file);
      if (!started) {
        throw new Error(`Could not start sending ${options.file} (see log output)`);
      }

      const result = await outcome;
      refresh();
      return result;
    };

    run()
      .then(finish)
      .catch((err: unknown) => {
        setError(err instanceof Error ? err.message : String(err));
        finish('error');
      });

    return () => {
      clearInterval(clock);
      if (timeoutTimer) clearTimeout(timeoutTimer);
    };
  }, []);

  return (
    <SendView
      phase={phase}
      peer={options.peer}
      filename={basename(options.file)}
      transfer={transfer}
      error={error}
      elapsedSeconds={elapsedSeconds}
    />
  );
}

/**
 * Run the send command with Ink rendering. Exits 0 only when the receiver
 * confirmed the file.
 */
export function runSend(options: SendCommandOptions): void {
  let result: SendPhase = 'error';
  const { waitUntilExit } = render(
    <SendCommand options={options} onFinish={(phase) => (result = phase)} />
  );

  waitUntilExit().then(() => {
    switch (result) {
      case 'complete':
        console.log(successMessage(`Sent ${basename(options.file)} to ${options.peer}`));
        process.exit(0);
        break;
      case 'timeout':
        console.error(warnMessage(`Transfer to ${options.peer} did not complete within ${options.timeout}s`));
        process.exit(1);
        break;
      default:
        console.error(errorMessage(`Transfer to ${options.peer} failed`));
        process.exit(1);
    }
  });
}

export default runSend;
