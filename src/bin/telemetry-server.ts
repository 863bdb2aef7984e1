#!/usr/bin/env node
/**
 * telemetry-server - Streams telemetry to one TCP client at a time.
 *
 * @example
 * ```bash
 * # Listen on all interfaces, port 8080
 * telemetry-server
 *
 * # Custom port, start sessions at 500ms
 * telemetry-server --port 9000 --interval 500
 *
 * # Configure through the environment
 * TELEMETRY_PORT=9000 TELEMETRY_SAMPLING_MS=250 telemetry-server
 * ```
 */

import { parseArgs } from 'node:util';
import { ConfigError, loadServerConfig, SERVER_ENV_VARS } from '../server/config.js';
import {
  DEFAULT_SERVER_CONFIG,
  TelemetryServer,
  type TelemetryServerConfig,
} from '../server/telemetry-server.js';
import { SAMPLING_INTERVAL } from '../session/sampling-interval.js';
import { createConsoleLogger } from '../utils/logger.js';

// =============================================================================
// Constants
// =============================================================================

const VERSION = '0.1.0';

// =============================================================================
// CLI Argument Definition
// =============================================================================

const options = {
  host: {
    type: 'string',
    short: 'H',
  },
  port: {
    type: 'string',
    short: 'p',
  },
  backlog: {
    type: 'string',
  },
  interval: {
    type: 'string',
  },
  quiet: {
    type: 'boolean',
    short: 'q',
    default: false,
  },
  verbose: {
    type: 'boolean',
    default: false,
  },
  help: {
    type: 'boolean',
    short: 'h',
    default: false,
  },
  version: {
    type: 'boolean',
    short: 'v',
    default: false,
  },
} as const;

function parseCommandLine() {
  return parseArgs({ options, strict: true, allowPositionals: false });
}

// =============================================================================
// Help & Version Output
// =============================================================================

function printHelp(): void {
  const help = `
telemetry-server - Streams telemetry to one TCP client at a time

USAGE:
  telemetry-server [OPTIONS]

OPTIONS:
  -H, --host <address>    Address to bind (default: ${DEFAULT_SERVER_CONFIG.host})
  -p, --port <number>     Port to listen on, 0 for any (default: ${DEFAULT_SERVER_CONFIG.port})
      --backlog <n>       Clients allowed to wait (default: ${DEFAULT_SERVER_CONFIG.backlog})
      --interval <ms>     Initial sampling interval, ${SAMPLING_INTERVAL.MIN_MS}-${SAMPLING_INTERVAL.MAX_MS} (default: ${DEFAULT_SERVER_CONFIG.defaultSamplingIntervalMs})
  -q, --quiet             Only log warnings and errors
      --verbose           Also log debug messages
  -h, --help              Show this help message
  -v, --version           Show version number

ENVIRONMENT:
  ${SERVER_ENV_VARS.host}          Same as --host
  ${SERVER_ENV_VARS.port}          Same as --port
  ${SERVER_ENV_VARS.backlog}       Same as --backlog
  ${SERVER_ENV_VARS.interval}   Same as --interval

Flags take precedence over environment variables.
`.trim();

  console.log(help);
}

function printVersion(): void {
  console.log(`telemetry-server v${VERSION}`);
}

// =============================================================================
// Main Entry Point
// =============================================================================

async function main(): Promise<void> {
  let args: ReturnType<typeof parseCommandLine>;

  try {
    args = parseCommandLine();
  } catch (error) {
    const message = error instanceof Error ? error.message : String(error);
    console.error(`Error: ${message}`);
    console.error('Run "telemetry-server --help" for usage information.');
    process.exit(1);
  }

  if (args.values.help) {
    printHelp();
    process.exit(0);
  }

  if (args.values.version) {
    printVersion();
    process.exit(0);
  }

  let config: TelemetryServerConfig;
  try {
    config = loadServerConfig({ args: args.values, env: process.env });
  } catch (error) {
    if (error instanceof ConfigError) {
      console.error('Error: Invalid arguments\n');
      for (const problem of error.problems) {
        console.error(`  - ${problem}`);
      }
      console.error('\nRun "telemetry-server --help" for usage information.');
      process.exit(1);
    }
    throw error;
  }

  const logger = createConsoleLogger({
    prefix: 'Server',
    level: args.values.quiet ? 'warn' : args.values.verbose ? 'debug' : 'info',
  });

  const server = new TelemetryServer(config, { logger });

  let shuttingDown = false;
  const shutdown = (signal: string): void => {
    if (shuttingDown) return;
    shuttingDown = true;

    logger.info(`Received ${signal}, shutting down`);
    server.stop().then(
      () => process.exit(0),
      (error: unknown) => {
        logger.error('Shutdown failed:', error);
        process.exit(1);
      },
    );
  };

  process.on('SIGINT', () => shutdown('SIGINT'));
  process.on('SIGTERM', () => shutdown('SIGTERM'));

  try {
    await server.start();
  } catch (error) {
    const message = error instanceof Error ? error.message : String(error);
    logger.error(`Failed to start: ${message}`);
    process.exit(1);
  }
}

// =============================================================================
// Execute
// =============================================================================

main().catch((error: unknown) => {
  console.error('Unexpected error:', error instanceof Error ? error.message : error);
  process.exit(1);
});
