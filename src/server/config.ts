/**
 * Server configuration loading.
 *
 * Values are merged in increasing precedence: {@link DEFAULT_SERVER_CONFIG},
 * environment variables, then command-line flags.
 *
 * @module server/config
 */

import { SAMPLING_INTERVAL } from '../session/sampling-interval.js';
import { DEFAULT_SERVER_CONFIG, type TelemetryServerConfig } from './telemetry-server.js';

// =============================================================================
// Types
// =============================================================================

/**
 * Raw flag values as produced by `parseArgs`.
 */
export interface ServerCliArgs {
  readonly host?: string | undefined;
  readonly port?: string | undefined;
  readonly backlog?: string | undefined;
  readonly interval?: string | undefined;
}

/**
 * Inputs to {@link loadServerConfig}.
 */
export interface ServerConfigSources {
  readonly args?: ServerCliArgs;
  readonly env?: Readonly<Record<string, string | undefined>>;
}

/**
 * Environment variable names read by {@link loadServerConfig}.
 */
export const SERVER_ENV_VARS = {
  host: 'TELEMETRY_HOST',
  port: 'TELEMETRY_PORT',
  backlog: 'TELEMETRY_BACKLOG',
  interval: 'TELEMETRY_SAMPLING_MS',
} as const;

type ConfigKey = keyof typeof SERVER_ENV_VARS;

const FLAG_NAMES: Record<ConfigKey, string> = {
  host: '--host',
  port: '--port',
  backlog: '--backlog',
  interval: '--interval',
};

/**
 * Thrown when one or more configuration values are invalid.
 */
export class ConfigError extends Error {
  override readonly name = 'ConfigError' as const;

  constructor(readonly problems: readonly string[]) {
    super(`Invalid configuration:\n${problems.map((p) => `  - ${p}`).join('\n')}`);
  }
}

// =============================================================================
// Loading
// =============================================================================

interface RawValue {
  readonly value: string;
  readonly origin: string;
}

function pick(key: ConfigKey, sources: ServerConfigSources): RawValue | null {
  const fromArgs = sources.args?.[key];
  if (fromArgs !== undefined) {
    return { value: fromArgs, origin: FLAG_NAMES[key] };
  }

  const envName = SERVER_ENV_VARS[key];
  const fromEnv = sources.env?.[envName];
  if (fromEnv !== undefined && fromEnv.trim() !== '') {
    return { value: fromEnv, origin: envName };
  }

  return null;
}

function parseInteger(raw: RawValue): number | null {
  const trimmed = raw.value.trim();
  return /^-?\d+$/.test(trimmed) ? parseInt(trimmed, 10) : null;
}

/**
 * Builds a validated server configuration.
 *
 * @throws {ConfigError} Listing every invalid value
 *
 * @example
 * ```typescript
 * const config = loadServerConfig({
 *   args: { port: '9000' },
 *   env: process.env,
 * });
 * ```
 */
export function loadServerConfig(sources: ServerConfigSources = {}): TelemetryServerConfig {
  const problems: string[] = [];

  let host = DEFAULT_SERVER_CONFIG.host;
  const rawHost = pick('host', sources);
  if (rawHost) {
    if (rawHost.value.trim() === '') {
      problems.push(`Host address from ${rawHost.origin} cannot be empty`);
    } else {
      host = rawHost.value.trim();
    }
  }

  let port = DEFAULT_SERVER_CONFIG.port;
  const rawPort = pick('port', sources);
  if (rawPort) {
    const parsed = parseInteger(rawPort);
    if (parsed === null || parsed < 0 || parsed > 65535) {
      problems.push(
        `Invalid port from ${rawPort.origin}: ${rawPort.value}. Must be between 1 and 65535, or 0 for any free port.`,
      );
    } else {
      port = parsed;
    }
  }

  let backlog = DEFAULT_SERVER_CONFIG.backlog;
  const rawBacklog = pick('backlog', sources);
  if (rawBacklog) {
    const parsed = parseInteger(rawBacklog);
    if (parsed === null || parsed < 1) {
      problems.push(
        `Invalid backlog from ${rawBacklog.origin}: ${rawBacklog.value}. Must be a positive integer.`,
      );
    } else {
      backlog = parsed;
    }
  }

  let defaultSamplingIntervalMs = DEFAULT_SERVER_CONFIG.defaultSamplingIntervalMs;
  const rawInterval = pick('interval', sources);
  if (rawInterval) {
    const parsed = parseInteger(rawInterval);
    if (
      parsed === null ||
      parsed < SAMPLING_INTERVAL.MIN_MS ||
      parsed > SAMPLING_INTERVAL.MAX_MS
    ) {
      problems.push(
        `Invalid sampling interval from ${rawInterval.origin}: ${rawInterval.value}. ` +
          `Must be between ${SAMPLING_INTERVAL.MIN_MS} and ${SAMPLING_INTERVAL.MAX_MS}.`,
      );
    } else {
      defaultSamplingIntervalMs = parsed;
    }
  }

  if (problems.length > 0) {
    throw new ConfigError(problems);
  }

  return {
    ...DEFAULT_SERVER_CONFIG,
    host,
    port,
    backlog,
    defaultSamplingIntervalMs,
  };
}
