/**
 * Tests for server configuration loading.
 */

import { describe, it, expect } from 'vitest';
import { ConfigError, loadServerConfig } from '../../src/server/config.js';
import { DEFAULT_SERVER_CONFIG } from '../../src/server/telemetry-server.js';

function problemsOf(fn: () => unknown): readonly string[] {
  try {
    fn();
  } catch (error) {
    if (error instanceof ConfigError) return error.problems;
    throw error;
  }
  throw new Error('Expected a ConfigError');
}

describe('loadServerConfig()', () => {
  it('returns the defaults when nothing is set', () => {
    expect(loadServerConfig()).toEqual(DEFAULT_SERVER_CONFIG);
    expect(DEFAULT_SERVER_CONFIG).toMatchObject({
      host: '0.0.0.0',
      port: 8080,
      backlog: 1,
      defaultSamplingIntervalMs: 1000,
    });
  });

  it('reads values from the environment', () => {
    const config = loadServerConfig({
      env: {
        TELEMETRY_HOST: '127.0.0.1',
        TELEMETRY_PORT: '9000',
        TELEMETRY_BACKLOG: '4',
        TELEMETRY_SAMPLING_MS: '250',
      },
    });

    expect(config).toMatchObject({
      host: '127.0.0.1',
      port: 9000,
      backlog: 4,
      defaultSamplingIntervalMs: 250,
    });
  });

  it('prefers flags over the environment', () => {
    const config = loadServerConfig({
      args: { port: '7000', interval: '500' },
      env: { TELEMETRY_PORT: '9000', TELEMETRY_SAMPLING_MS: '250' },
    });

    expect(config.port).toBe(7000);
    expect(config.defaultSamplingIntervalMs).toBe(500);
  });

  it('ignores blank environment values', () => {
    const config = loadServerConfig({ env: { TELEMETRY_PORT: '  ', TELEMETRY_HOST: '' } });
    expect(config.port).toBe(8080);
    expect(config.host).toBe('0.0.0.0');
  });

  it('accepts port 0 for an ephemeral port', () => {
    expect(loadServerConfig({ args: { port: '0' } }).port).toBe(0);
  });

  it('trims surrounding whitespace', () => {
    const config = loadServerConfig({ args: { host: ' localhost ', port: ' 8081 ' } });
    expect(config.host).toBe('localhost');
    expect(config.port).toBe(8081);
  });

  it('rejects an empty host flag', () => {
    expect(problemsOf(() => loadServerConfig({ args: { host: ' ' } }))).toEqual([
      'Host address from --host cannot be empty',
    ]);
  });

  it('rejects out-of-range and non-numeric ports', () => {
    expect(problemsOf(() => loadServerConfig({ args: { port: '70000' } }))).toEqual([
      'Invalid port from --port: 70000. Must be between 1 and 65535, or 0 for any free port.',
    ]);
    expect(problemsOf(() => loadServerConfig({ env: { TELEMETRY_PORT: '80a' } }))).toEqual([
      'Invalid port from TELEMETRY_PORT: 80a. Must be between 1 and 65535, or 0 for any free port.',
    ]);
  });

  it('rejects a backlog below 1', () => {
    expect(problemsOf(() => loadServerConfig({ args: { backlog: '0' } }))).toEqual([
      'Invalid backlog from --backlog: 0. Must be a positive integer.',
    ]);
  });

  it('rejects a sampling interval outside the accepted range', () => {
    expect(problemsOf(() => loadServerConfig({ args: { interval: '50' } }))).toEqual([
      'Invalid sampling interval from --interval: 50. Must be between 100 and 10000.',
    ]);
  });

  it('reports every problem at once', () => {
    const problems = problemsOf(() =>
      loadServerConfig({ args: { port: '-1', backlog: 'many' } }),
    );
    expect(problems).toHaveLength(2);
  });

  it('formats all problems into the error message', () => {
    const error = new ConfigError(['first', 'second']);
    expect(error.message).toBe('Invalid configuration:\n  - first\n  - second');
    expect(error.name).toBe('ConfigError');
  });
});
