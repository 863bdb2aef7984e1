/**
 * Tests for the reconnecting telemetry client.
 */

import net from 'node:net';
import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import {
  DEFAULT_CONNECTION_CONFIG,
  TelemetryConnection,
  reconnectDelay,
  type ConnectionEvent,
} from '../../src/client/telemetry-connection.js';
import { TelemetryServer } from '../../src/server/telemetry-server.js';
import { MalformedFrameError } from '../../src/protocol/errors.js';
import type { OutboundEnvelope } from '../../src/protocol/envelope.js';
import {
  FixedSource,
  SAMPLE_RECORD,
  jsonFrame,
  rawFrame,
  waitFor,
} from '../helpers/test-helpers.js';

/**
 * Listener that writes `bytes` to every client and keeps the socket open.
 */
async function startRawServer(bytes: Buffer): Promise<{ port: number; close(): Promise<void> }> {
  const sockets = new Set<net.Socket>();
  const server = net.createServer((socket) => {
    sockets.add(socket);
    socket.on('error', () => undefined);
    socket.on('close', () => sockets.delete(socket));
    socket.write(bytes);
  });

  await new Promise<void>((resolve) => {
    server.listen(0, '127.0.0.1', () => resolve());
  });
  const address = server.address();
  if (address === null || typeof address === 'string') {
    throw new Error('Listener is not bound to a TCP address');
  }

  return {
    port: address.port,
    close: () =>
      new Promise<void>((resolve) => {
        for (const socket of sockets) socket.destroy();
        server.close(() => resolve());
      }),
  };
}

/**
 * Returns a loopback port with nothing listening on it.
 */
async function unusedPort(): Promise<number> {
  const raw = await startRawServer(Buffer.alloc(0));
  await raw.close();
  return raw.port;
}

function messagesOf(events: ConnectionEvent[]): OutboundEnvelope[] {
  const messages: OutboundEnvelope[] = [];
  for (const event of events) {
    if (event.type === 'message') messages.push(event.message);
  }
  return messages;
}

describe('reconnectDelay()', () => {
  it('grows by the multiplier per attempt', () => {
    expect(reconnectDelay(DEFAULT_CONNECTION_CONFIG, 1)).toBe(1000);
    expect(reconnectDelay(DEFAULT_CONNECTION_CONFIG, 2)).toBe(1500);
    expect(reconnectDelay(DEFAULT_CONNECTION_CONFIG, 3)).toBe(2250);
  });

  it('is capped at the maximum delay', () => {
    expect(reconnectDelay(DEFAULT_CONNECTION_CONFIG, 50)).toBe(30000);
  });
});

describe('TelemetryConnection', () => {
  let connection: TelemetryConnection | null = null;
  let events: ConnectionEvent[];

  function createConnection(
    config: ConstructorParameters<typeof TelemetryConnection>[0],
  ): TelemetryConnection {
    const created = new TelemetryConnection(config);
    created.onEvent((event) => {
      events.push(event);
    });
    connection = created;
    return created;
  }

  beforeEach(() => {
    events = [];
  });

  afterEach(() => {
    connection?.disconnect();
    connection = null;
  });

  describe('while disconnected', () => {
    it('uses the default configuration', () => {
      const client = createConnection({});
      expect(client.getConfig()).toEqual(DEFAULT_CONNECTION_CONFIG);
      expect(client.getState()).toBe('disconnected');
      expect(client.isConnected()).toBe(false);
    });

    it('refuses to send', () => {
      const client = createConnection({});
      expect(client.requestSensorData()).toBe(false);
      expect(client.setSamplingRate(500)).toBe(false);
    });

    it('stops delivering events after unsubscribe', () => {
      const client = new TelemetryConnection({});
      const seen: ConnectionEvent[] = [];
      const unsubscribe = client.onEvent((event) => {
        seen.push(event);
      });

      unsubscribe();
      client.disconnect();

      expect(seen).toHaveLength(0);
    });
  });

  describe('against a telemetry server', () => {
    let server: TelemetryServer;
    let port: number;

    beforeEach(async () => {
      server = new TelemetryServer(
        { host: '127.0.0.1', port: 0, defaultSamplingIntervalMs: 100 },
        { source: new FixedSource() },
      );
      port = (await server.start()).port;
    });

    afterEach(async () => {
      connection?.disconnect();
      await server.stop();
    });

    it('connects and receives sensor data', async () => {
      const client = createConnection({ host: '127.0.0.1', port, autoReconnect: false });

      await client.connect();

      expect(client.isConnected()).toBe(true);
      expect(events[0]).toEqual({ type: 'connected' });
      await waitFor(() => messagesOf(events).some((m) => m.type === 'sensor_data'));
      const sample = messagesOf(events).find((m) => m.type === 'sensor_data');
      expect(sample).toMatchObject({ data: SAMPLE_RECORD });
    });

    it('sets the sampling rate and receives the clamped confirmation', async () => {
      const client = createConnection({ host: '127.0.0.1', port, autoReconnect: false });
      await client.connect();

      expect(client.setSamplingRate(20)).toBe(true);

      await waitFor(() => messagesOf(events).some((m) => m.type === 'response'));
      expect(messagesOf(events).find((m) => m.type === 'response')).toMatchObject({
        cmd: 'set_sampling_rate',
        success: true,
        message: 'Sampling rate set to 100ms',
      });
    });

    it('requests an immediate reading', async () => {
      const client = createConnection({ host: '127.0.0.1', port, autoReconnect: false });
      await client.connect();

      expect(client.requestSensorData()).toBe(true);
      await waitFor(() => server.getActiveSession()?.getStats().framesReceived === 1);
    });

    it('disconnects on request without reconnecting', async () => {
      const client = createConnection({ host: '127.0.0.1', port });
      await client.connect();

      client.disconnect();

      expect(client.getState()).toBe('disconnected');
      expect(events.at(-1)).toEqual({ type: 'disconnected', reason: 'manual' });
      expect(events.some((e) => e.type === 'reconnecting')).toBe(false);
    });

    it('reconnects after the server restarts', async () => {
      const client = createConnection({
        host: '127.0.0.1',
        port,
        reconnectDelayMs: 50,
        maxReconnectDelayMs: 200,
      });
      await client.connect();

      await server.stop();
      await waitFor(() => events.some((e) => e.type === 'reconnecting'));
      expect(events).toContainEqual({ type: 'disconnected', reason: 'connection closed' });
      expect(events).toContainEqual({ type: 'reconnecting', attempt: 1, delayMs: 50 });

      server = new TelemetryServer(
        { host: '127.0.0.1', port, defaultSamplingIntervalMs: 100 },
        { source: new FixedSource() },
      );
      await server.start();

      await waitFor(() => client.isConnected(), { timeoutMs: 5000 });
      expect(events.filter((e) => e.type === 'connected')).toHaveLength(2);
    });
  });

  describe('connection failures', () => {
    it('rejects when the server is unreachable and reconnect is off', async () => {
      const port = await unusedPort();
      const client = createConnection({ host: '127.0.0.1', port, autoReconnect: false });

      await expect(client.connect()).rejects.toThrow(/ECONNREFUSED/);
      expect(client.getState()).toBe('disconnected');
      expect(events.some((e) => e.type === 'error')).toBe(true);
    });
  });

  describe('frame handling', () => {
    it('skips a malformed frame and keeps the following one', async () => {
      const response = {
        type: 'response',
        timestamp: 1,
        cmd: 'get_sensor_data',
        success: true,
        message: 'ok',
      };
      const raw = await startRawServer(
        Buffer.concat([rawFrame('{broken'), jsonFrame(response)]),
      );

      try {
        const client = createConnection({ host: '127.0.0.1', port: raw.port, autoReconnect: false });
        await client.connect();

        await waitFor(() => messagesOf(events).length === 1);
        expect(messagesOf(events)).toEqual([response]);
        const errors = events.filter((e) => e.type === 'error');
        expect(errors).toHaveLength(1);
        expect(errors[0]?.type === 'error' && errors[0].error).toBeInstanceOf(MalformedFrameError);
        expect(client.isConnected()).toBe(true);
      } finally {
        connection?.disconnect();
        await raw.close();
      }
    });

    it('ignores frames that are not server envelopes', async () => {
      const raw = await startRawServer(
        Buffer.concat([
          jsonFrame({ type: 'command', cmd: 'get_sensor_data' }),
          jsonFrame({ hello: 'world' }),
          jsonFrame({ type: 'sensor_data', timestamp: 2, data: SAMPLE_RECORD }),
        ]),
      );

      try {
        const client = createConnection({ host: '127.0.0.1', port: raw.port, autoReconnect: false });
        await client.connect();

        await waitFor(() => messagesOf(events).length === 1);
        expect(messagesOf(events)[0]).toEqual({
          type: 'sensor_data',
          timestamp: 2,
          data: SAMPLE_RECORD,
        });
      } finally {
        connection?.disconnect();
        await raw.close();
      }
    });

    it('drops the connection on an oversized frame', async () => {
      const prefix = Buffer.alloc(4);
      prefix.writeUInt32BE(0xffffffff, 0);
      const raw = await startRawServer(prefix);

      try {
        const client = createConnection({ host: '127.0.0.1', port: raw.port, autoReconnect: false });
        await client.connect();

        await waitFor(() => client.getState() === 'disconnected');
        const error = events.find((e) => e.type === 'error');
        expect(error?.type === 'error' && error.error.message).toBe(
          'Frame size 4294967295 exceeds maximum 1048576',
        );
      } finally {
        connection?.disconnect();
        await raw.close();
      }
    });
  });
});
