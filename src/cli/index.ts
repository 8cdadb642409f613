#!/usr/bin/env node
/**
 * Floodnet daemon
 *
 * Starts a relay node from FLOODNET_* environment variables, prints
 * deliveries to stdout and reads console commands from stdin.
 */

import { createInterface } from 'node:readline';
import { loadConfigFromEnv } from '../config.js';
import { RelayNode } from '../relay-node.js';
import { formatDelivery, parseCommand, runCommand } from './commands.js';

const VERSION = '0.1.0';

function showHelp(): void {
  console.log(`
Floodnet v${VERSION}
Peer-to-peer chat relay node

USAGE:
  floodnet [options]

OPTIONS:
  -h, --help     Show this help message
  -v, --version  Show version information

ENVIRONMENT:
  FLOODNET_PORT, FLOODNET_HOST, FLOODNET_PEERS, FLOODNET_NICK,
  FLOODNET_SECRET_KEY, FLOODNET_CHANNELS, FLOODNET_SEEN_CAPACITY,
  FLOODNET_LOG_CAPACITY, FLOODNET_MAX_PAYLOAD, FLOODNET_RECONNECT_MS

CONSOLE:
  /join <channel> [passphrase]   /part <channel>
  /say <channel> <text>          /msg <public-key> <text>
  /stats
`);
}

async function main(): Promise<void> {
  const args = process.argv.slice(2);

  if (args[0] === '--help' || args[0] === '-h') {
    showHelp();
    return;
  }

  if (args[0] === '--version' || args[0] === '-v') {
    console.log(`Floodnet v${VERSION}`);
    return;
  }

  if (args.length > 0) {
    console.error(`Unknown option: ${args[0]}`);
    console.error('Run "floodnet --help" for usage information');
    process.exit(1);
  }

  const config = loadConfigFromEnv();
  const node = new RelayNode({
    config,
    deliverLocal: delivery => {
      process.stdout.write(formatDelivery(delivery) + '\n');
    }
  });

  await node.start();

  const rl = createInterface({ input: process.stdin });
  rl.on('line', line => {
    if (!line.trim()) {
      return;
    }
    const parsed = parseCommand(line);
    if (!parsed.ok) {
      console.error(parsed.error);
      return;
    }
    runCommand(node.engine, parsed.command)
      .then(result => console.log(result))
      .catch((error: unknown) => console.error(`Error: ${error instanceof Error ? error.message : String(error)}`));
  });

  const shutdown = (signal: string): void => {
    console.log(`[Floodnet] ${signal} received, shutting down`);
    rl.close();
    node.stop()
      .then(() => process.exit(0))
      .catch((error: unknown) => {
        console.error('Shutdown failed:', error);
        process.exit(1);
      });
  };
  process.once('SIGINT', () => shutdown('SIGINT'));
  process.once('SIGTERM', () => shutdown('SIGTERM'));
}

main().catch((error: unknown) => {
  console.error('Fatal error:', error instanceof Error ? error.message : error);
  if (process.env.DEBUG && error instanceof Error) {
    console.error(error.stack);
  }
  process.exit(1);
});
