#!/usr/bin/env node
/**
 * radiodrop CLI Entry Point
 *
 * This module handles command-line argument parsing and routes
 * to the send and receive commands.
 *
 * @module cli
 */

import React from 'react';
import { render, Text, Box } from 'ink';
import meow from 'meow';
import { APP_NAME, VERSION } from '../shared/constants.js';
import { getDefaultReceivePath } from '../utils/platform.js';
import { runSend } from './commands/send.js';
import { runReceive } from './commands/receive.js';
import type { EngineFlags } from './utils/options.js';

// =============================================================================
// Constants
// =============================================================================

/** Port the receive command listens on by default */
const DEFAULT_RECEIVE_PORT = 4000;

/** Seconds the send command waits for confirmation by default */
const DEFAULT_SEND_TIMEOUT = 300;

// =============================================================================
// CLI Configuration
// =============================================================================

const cli = meow(
  `
  Usage
    $ ${APP_NAME} <command> [options]

  Commands
    send <host:port> <file>   Send a file to a receiver
    receive                   Receive files until interrupted

  Options
    --port, -p          Local UDP port (receive default: ${DEFAULT_RECEIVE_PORT}, send default: any)
    --host              Local address to bind (receive)
    --out, -o           Directory for received files (default: ./received_files)
    --once              Exit after the first received file
    --timeout, -t       Seconds to wait for confirmation (send, default: ${DEFAULT_SEND_TIMEOUT})
    --channel           Protocol channel, 0-255 (default: 123)
    --piece-size        Piece size in bytes (default: 1024)
    --no-merkle         Advertise per-piece hashes instead of a Merkle root
    --delay             Initial delay between pieces in ms (default: 200)
    --retries           Requests per piece before a transfer fails (default: 3)
    --interval          Seconds between resume requests (default: 10)
    --inactivity        Seconds without data before a transfer fails (default: 300)
    --config, -c        JSON config file (default: ~/.${APP_NAME}/config.json)
    --log-file          Append log lines to a file
    --verbose           Log protocol traffic
    --version, -v       Show version
    --help, -h          Show help

  Examples
    $ ${APP_NAME} receive --port 4000 --out ~/inbox
    $ ${APP_NAME} send 192.168.1.20:4000 photo.jpg
    $ ${APP_NAME} send 192.168.1.20:4000 notes.txt --piece-size 200 --no-merkle
`,
  {
    importMeta: import.meta,
    version: VERSION,
    flags: {
      version: {
        type: 'boolean',
        shortFlag: 'v',
      },
      port: {
        type: 'number',
        shortFlag: 'p',
      },
      host: {
        type: 'string',
      },
      out: {
        type: 'string',
        shortFlag: 'o',
      },
      once: {
        type: 'boolean',
        default: false,
      },
      timeout: {
        type: 'number',
        shortFlag: 't',
        default: DEFAULT_SEND_TIMEOUT,
      },
      channel: {
        type: 'number',
      },
      pieceSize: {
        type: 'number',
      },
      merkle: {
        type: 'boolean',
        default: true,
      },
      delay: {
        type: 'number',
      },
      retries: {
        type: 'number',
      },
      interval: {
        type: 'number',
      },
      inactivity: {
        type: 'number',
      },
      config: {
        type: 'string',
        shortFlag: 'c',
      },
      logFile: {
        type: 'string',
      },
      verbose: {
        type: 'boolean',
        default: false,
      },
    },
  }
);

// =============================================================================
// Error Display Component
// =============================================================================

interface ErrorProps {
  message: string;
}

/**
 * Error display component
 */
function ErrorDisplay({ message }: ErrorProps) {
  return (
    <Box flexDirection="column" padding={1}>
      <Text color="red" bold>
        Error: {message}
      </Text>
      <Box marginTop={1}>
        <Text>Run </Text>
        <Text color="yellow">{APP_NAME} --help</Text>
        <Text> for usage information</Text>
      </Box>
    </Box>
  );
}

/**
 * Renders an error and exits with status 1
 */
function fail(message: string): void {
  const { unmount } = render(<ErrorDisplay message={message} />);
  unmount();
  process.exit(1);
}

// =============================================================================
// Command Routing
// =============================================================================

/**
 * Route the command to the appropriate handler
 */
function routeCommand(): void {
  const [command, ...args] = cli.input;
  const flags = cli.flags;

  if (flags.version) {
    console.log(VERSION);
    process.exit(0);
  }

  if (!command) {
    cli.showHelp(0);
    return;
  }

  const engine: EngineFlags = {
    channel: flags.channel,
    pieceSize: flags.pieceSize,
    merkle: flags.merkle,
    delay: flags.delay,
    retries: flags.retries,
    interval: flags.interval,
    inactivity: flags.inactivity,
    config: flags.config,
  };

  switch (command.toLowerCase()) {
    case 'send': {
      const [peer, file] = args;
      if (!peer || !file) {
        fail(`Usage: ${APP_NAME} send <host:port> <file>`);
        return;
      }
      runSend({
        peer,
        file,
        port: flags.port ?? 0,
        timeout: flags.timeout,
        verbose: flags.verbose,
        logFile: flags.logFile,
        engine,
      });
      break;
    }

    case 'receive':
    case 'recv': {
      runReceive({
        port: flags.port ?? DEFAULT_RECEIVE_PORT,
        host: flags.host,
        outputDir: flags.out ?? getDefaultReceivePath(),
        once: flags.once,
        verbose: flags.verbose,
        logFile: flags.logFile,
        engine,
      });
      break;
    }

    default:
      fail(`Unknown command: ${command}`);
  }
}

routeCommand();
