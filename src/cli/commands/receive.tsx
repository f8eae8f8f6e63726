/**
 * Receive command for the radiodrop CLI.
 *
 * Listens on a UDP port, collects incoming transfers into a directory and
 * shows their progress until interrupted (or, with --once, until the
 * first file has been saved).
 *
 * @module cli/commands/receive
 */

import React, { useEffect, useState } from 'react';
import { render, Text, Box, useApp } from 'ink';
import { TransferNode } from '../../engine/node.js';
import { UdpTransport, formatPeerId } from '../../engine/transport/udp.js';
import { DirectoryFileSink } from '../../engine/disk/sink.js';
import { createConsoleLogger } from '../../engine/logger.js';
import { TransferList } from '../../ui/components/TransferList.js';
import { fromReceiverSnapshot, type TransferRowData } from '../../ui/components/TransferRow.js';
import { colors, symbols } from '../../ui/theme/index.js';
import { formatBytes } from '../../ui/utils/format.js';
import { resolveEngineConfig, type EngineFlags } from '../utils/options.js';
import { errorMessage, formatInfoBlock } from '../utils/output.js';

// =============================================================================
// Constants
// =============================================================================

/** How often the transfer list is refreshed (ms) */
const REFRESH_INTERVAL = 500;

// =============================================================================
// Types
// =============================================================================

export interface ReceiveCommandOptions {
  /** Local UDP port */
  port: number;
  /** Local address to bind */
  host?: string;
  /** Directory received files are written to */
  outputDir: string;
  /** Exit after the first saved file */
  once: boolean;
  verbose: boolean;
  logFile?: string;
  engine: EngineFlags;
}

/**
 * Outcome of a finished transfer, for display
 */
export interface FinishedTransfer {
  filename: string;
  ok: boolean;
  /** Saved path, or the failure reason */
  detail: string;
  size?: number;
}

export interface ReceiveViewProps {
  listening: string | null;
  outputDir: string;
  transfers: TransferRowData[];
  finished: FinishedTransfer[];
  error: string | null;
}

// =============================================================================
// Components
// =============================================================================

/**
 * Presentational view of the receiver
 */
export const ReceiveView: React.FC<ReceiveViewProps> = ({
  listening,
  outputDir,
  transfers,
  finished,
  error,
}) => {
  if (error) {
    return <Text color={colors.error}>[ERROR] {error}</Text>;
  }

  if (!listening) {
    return <Text color={colors.secondary}>Starting receiver...</Text>;
  }

  return (
    <Box flexDirection="column">
      <Text color={colors.muted}>
        Listening on {listening}, saving to {outputDir}
      </Text>
      <Box marginTop={1}>
        <TransferList transfers={transfers} title="Incoming" emptyMessage="Waiting for a sender..." />
      </Box>
      {finished.length > 0 && (
        <Box marginTop={1} flexDirection="column">
          {finished.map((entry, index) => (
            <Text key={`${entry.filename}:${index}`} color={entry.ok ? colors.success : colors.error}>
              {entry.ok ? symbols.check : symbols.cross} {entry.filename}
              {entry.size !== undefined ? ` (${formatBytes(entry.size)})` : ''}: {entry.detail}
            </Text>
          ))}
        </Box>
      )}
    </Box>
  );
};

/**
 * Interactive receive command using Ink for rendering
 */
export function ReceiveCommand({
  options,
  onFinish,
}: {
  options: ReceiveCommandOptions;
  onFinish: (ok: boolean) => void;
}): React.ReactElement {
  const { exit } = useApp();
  const [listening, setListening] = useState<string | null>(null);
  const [transfers, setTransfers] = useState<TransferRowData[]>([]);
  const [finished, setFinished] = useState<FinishedTransfer[]>([]);
  const [error, setError] = useState<string | null>(null);

  useEffect(() => {
    let transport: UdpTransport | null = null;
    let node: TransferNode | null = null;
    let refreshTimer: ReturnType<typeof setInterval> | null = null;

    const shutdown = (ok: boolean): void => {
      if (refreshTimer) clearInterval(refreshTimer);
      node?.stop();
      onFinish(ok);
      (transport ? transport.close() : Promise.resolve()).then(
        () => exit(),
        (err: unknown) => exit(err instanceof Error ? err : new Error(String(err)))
      );
    };

    const run = async (): Promise<void> => {
      const config = await resolveEngineConfig(options.engine);
      const logger = createConsoleLogger({
        level: options.verbose ? 'debug' : 'warn',
        logFile: options.logFile,
      });

      const udp = new UdpTransport({
        port: options.port,
        host: options.host,
        channel: config.channel,
        logger,
      });
      transport = udp;
      const address = await udp.bind();
      const active = new TransferNode({
        transport: udp,
        config,
        sink: new DirectoryFileSink(options.outputDir, { logger }),
        logger,
      });
      node = active;

      const receiver = active.receiver;
      if (!receiver) {
        throw new Error('Receiver is not available');
      }

      receiver.on('transfer:completed', ({ filename, size, location }) => {
        setFinished((prev) => [...prev, { filename, ok: true, size, detail: location ?? 'saved' }]);
        if (options.once) {
          shutdown(true);
        }
      });
      receiver.on('transfer:failed', ({ filename, reason }) => {
        setFinished((prev) => [...prev, { filename, ok: false, detail: reason }]);
      });

      refreshTimer = setInterval(() => {
        setTransfers(receiver.listTransfers().map(fromReceiverSnapshot));
      }, REFRESH_INTERVAL);

      active.start();
      setListening(formatPeerId(address.host, address.port));
    };

    run().catch((err: unknown) => {
      setError(err instanceof Error ? err.message : String(err));
      shutdown(false);
    });

    return () => {
      if (refreshTimer) clearInterval(refreshTimer);
      node?.stop();
    };
  }, []);

  return (
    <ReceiveView
      listening={listening}
      outputDir={options.outputDir}
      transfers={transfers}
      finished={finished}
      error={error}
    />
  );
}

/**
 * Run the receive command with Ink rendering
 */
export function runReceive(options: ReceiveCommandOptions): void {
  let ok = true;
  const { waitUntilExit } = render(
    <ReceiveCommand options={options} onFinish={(result) => (ok = result)} />
  );

  waitUntilExit().then(() => {
    if (!ok) {
      console.error(errorMessage('Receiver stopped with an error'));
      process.exit(1);
    }
    console.log(formatInfoBlock([['Output', options.outputDir]]));
    process.exit(0);
  });
}

export default runReceive;
