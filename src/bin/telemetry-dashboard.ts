#!/usr/bin/env node
/**
 * telemetry-dashboard - Terminal UI for a telemetry server.
 *
 * @example
 * ```bash
 * # Connect to localhost on default port
 * telemetry-dashboard
 *
 * # Connect to a sensor node with the light theme
 * telemetry-dashboard --host 192.168.1.20 --port 8080 -t light
 * ```
 */

import { parseArgs } from 'node:util';
import { DEFAULT_DASHBOARD_CONFIG, type ThemeName } from '../dashboard/types.js';

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
    default: DEFAULT_DASHBOARD_CONFIG.host,
  },
  port: {
    type: 'string',
    short: 'p',
    default: String(DEFAULT_DASHBOARD_CONFIG.port),
  },
  theme: {
    type: 'string',
    short: 't',
    default: DEFAULT_DASHBOARD_CONFIG.theme,
  },
  'no-reconnect': {
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

type CliValues = ReturnType<typeof parseCommandLine>['values'];

// =============================================================================
// Help & Version Output
// =============================================================================

function printHelp(): void {
  const help = `
telemetry-dashboard - Terminal UI for a telemetry server

USAGE:
  telemetry-dashboard [OPTIONS]

OPTIONS:
  -H, --host <address>    Server host address (default: ${DEFAULT_DASHBOARD_CONFIG.host})
  -p, --port <number>     Server port (default: ${DEFAULT_DASHBOARD_CONFIG.port})
  -t, --theme <name>      Color theme: dark, light (default: ${DEFAULT_DASHBOARD_CONFIG.theme})
      --no-reconnect      Disable automatic reconnection
  -h, --help              Show this help message
  -v, --version           Show version number

KEYBOARD SHORTCUTS (in dashboard):
  q, Escape, Ctrl+C       Quit
  r                       Request a reading now
  +                       Halve the sampling interval
  -                       Double the sampling interval
  ?, h                    Show help
`.trim();

  console.log(help);
}

function printVersion(): void {
  console.log(`telemetry-dashboard v${VERSION}`);
}

// =============================================================================
// Argument Validation
// =============================================================================

interface ValidatedArgs {
  readonly host: string;
  readonly port: number;
  readonly theme: ThemeName;
  readonly autoReconnect: boolean;
}

function isThemeName(value: string): value is ThemeName {
  return value === 'dark' || value === 'light';
}

function validateArgs(values: CliValues): ValidatedArgs {
  const errors: string[] = [];

  const host = (values.host ?? '').trim();
  if (host === '') {
    errors.push('Host address cannot be empty');
  }

  const portText = values.port ?? '';
  const port = /^\d+$/.test(portText) ? parseInt(portText, 10) : NaN;
  if (isNaN(port) || port < 1 || port > 65535) {
    errors.push(`Invalid port number: ${portText}. Must be between 1 and 65535.`);
  }

  const theme = values.theme ?? '';
  if (!isThemeName(theme)) {
    errors.push(`Invalid theme: ${theme}. Must be 'dark' or 'light'.`);
  }

  if (errors.length > 0 || !isThemeName(theme)) {
    console.error('Error: Invalid arguments\n');
    for (const error of errors) {
      console.error(`  - ${error}`);
    }
    console.error('\nRun "telemetry-dashboard --help" for usage information.');
    process.exit(1);
  }

  return {
    host,
    port,
    theme,
    autoReconnect: !values['no-reconnect'],
  };
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
    console.error('Run "telemetry-dashboard --help" for usage information.');
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

  const validated = validateArgs(args.values);

  // Loaded after argument handling so --help works without a terminal.
  const { TelemetryDashboard } = await import('../dashboard/telemetry-dashboard.js');

  const dashboard = new TelemetryDashboard({
    host: validated.host,
    port: validated.port,
    theme: validated.theme,
    autoReconnect: validated.autoReconnect,
  });

  const shutdown = (): void => {
    dashboard.stop();
    process.exit(0);
  };

  process.on('SIGINT', shutdown);
  process.on('SIGTERM', shutdown);

  await dashboard.start();
}

// =============================================================================
// Execute
// =============================================================================

main().catch((error: unknown) => {
  console.error('Unexpected error:', error instanceof Error ? error.message : error);
  process.exit(1);
});
