/**
 * Unit tests for the console logger.
 */

import { describe, it, expect, vi, afterEach } from 'vitest';
import { createConsoleLogger, isLogLevel, silentLogger } from '../../src/utils/logger.js';

describe('createConsoleLogger', () => {
  afterEach(() => {
    vi.restoreAllMocks();
  });

  it('prefixes messages with the tag', () => {
    const log = vi.spyOn(console, 'log').mockImplementation(() => undefined);
    const logger = createConsoleLogger({ prefix: 'Server' });

    logger.info('Listening on 0.0.0.0:8080');

    expect(log).toHaveBeenCalledWith('[Server] Listening on 0.0.0.0:8080');
  });

  it('passes details through', () => {
    const error = vi.spyOn(console, 'error').mockImplementation(() => undefined);
    const logger = createConsoleLogger();
    const cause = new Error('boom');

    logger.error('Session failed:', cause);

    expect(error).toHaveBeenCalledWith('Session failed:', cause);
  });

  it('drops messages below the configured level', () => {
    const debug = vi.spyOn(console, 'debug').mockImplementation(() => undefined);
    const log = vi.spyOn(console, 'log').mockImplementation(() => undefined);
    const warn = vi.spyOn(console, 'warn').mockImplementation(() => undefined);
    const logger = createConsoleLogger({ level: 'warn' });

    logger.debug('d');
    logger.info('i');
    logger.warn('w');

    expect(debug).not.toHaveBeenCalled();
    expect(log).not.toHaveBeenCalled();
    expect(warn).toHaveBeenCalledWith('w');
  });

  it('logs at info and above by default', () => {
    const debug = vi.spyOn(console, 'debug').mockImplementation(() => undefined);
    const log = vi.spyOn(console, 'log').mockImplementation(() => undefined);
    const logger = createConsoleLogger();

    logger.debug('d');
    logger.info('i');

    expect(debug).not.toHaveBeenCalled();
    expect(log).toHaveBeenCalledWith('i');
  });

  it('includes debug at the debug level', () => {
    const debug = vi.spyOn(console, 'debug').mockImplementation(() => undefined);
    const logger = createConsoleLogger({ level: 'debug', prefix: 'Test' });

    logger.debug('details');

    expect(debug).toHaveBeenCalledWith('[Test] details');
  });
});

describe('silentLogger', () => {
  it('writes nothing', () => {
    const log = vi.spyOn(console, 'log').mockImplementation(() => undefined);
    silentLogger.info('ignored');
    expect(log).not.toHaveBeenCalled();
    vi.restoreAllMocks();
  });
});

describe('isLogLevel', () => {
  it('accepts the four level names', () => {
    for (const level of ['debug', 'info', 'warn', 'error']) {
      expect(isLogLevel(level)).toBe(true);
    }
  });

  it('rejects anything else', () => {
    expect(isLogLevel('trace')).toBe(false);
    expect(isLogLevel('toString')).toBe(false);
  });
});
