/**
 * TelemetryServer - sequential TCP listener for telemetry sessions.
 *
 * Exactly one client is served at a time. Up to `backlog` connections that
 * arrive while a session is active wait, in arrival order, until the current
 * session ends; further connections are refused.
 *
 * @module server/telemetry-server
 */

import net, { type AddressInfo } from 'node:net';
import { EventEmitter } from 'node:events';

import { MAX_FRAME_SIZE } from '../protocol/frame-codec.js';
import {
  ConnectionSession,
  type SessionCloseReason,
} from '../session/connection-session.js';
import { SAMPLING_INTERVAL } from '../session/sampling-interval.js';
import {
  SyntheticTelemetrySource,
  type TelemetrySource,
} from '../telemetry/telemetry-source.js';
import { silentLogger, type Logger } from '../utils/logger.js';
import { WaitingConnection, type WaitingDropReason } from './waiting-connection.js';

// =============================================================================
// Configuration
// =============================================================================

/**
 * Configuration options for TelemetryServer.
 */
export interface TelemetryServerConfig {
  /** Host address to bind to. @default '0.0.0.0' */
  readonly host: string;
  /** TCP port to listen on; 0 picks an ephemeral port. @default 8080 */
  readonly port: number;
  /** Connections allowed to wait for the active session; also the OS listen backlog. @default 1 */
  readonly backlog: number;
  /** Sampling interval every new session starts with. @default 1000 */
  readonly defaultSamplingIntervalMs: number;
  /** Largest accepted inbound payload in bytes. @default 1MB */
  readonly maxFrameSize: number;
}

/**
 * Default configuration values.
 */
export const DEFAULT_SERVER_CONFIG: TelemetryServerConfig = {
  host: '0.0.0.0',
  port: 8080,
  backlog: 1,
  defaultSamplingIntervalMs: SAMPLING_INTERVAL.DEFAULT_MS,
  maxFrameSize: MAX_FRAME_SIZE,
};

/**
 * Collaborators injected into the server.
 */
export interface TelemetryServerDeps {
  /** Telemetry source shared by every session. @default SyntheticTelemetrySource */
  readonly source?: TelemetrySource;
  readonly logger?: Logger;
}

// =============================================================================
// Types
// =============================================================================

/**
 * Listener lifecycle state.
 */
export type ServerState = 'stopped' | 'starting' | 'listening' | 'stopping';

/**
 * Events emitted by TelemetryServer.
 */
export interface TelemetryServerEvents {
  listening: [address: AddressInfo];
  sessionStarted: [session: ConnectionSession];
  sessionEnded: [session: ConnectionSession, reason: SessionCloseReason];
  stopped: [];
}

function describePeer(socket: net.Socket): string {
  const address = socket.remoteAddress ?? 'unknown';
  return socket.remotePort === undefined ? address : `${address}:${socket.remotePort}`;
}

// =============================================================================
// TelemetryServer Class
// =============================================================================

/**
 * Accepts telemetry clients one at a time and runs a
 * {@link ConnectionSession} for each.
 *
 * @example
 * ```typescript
 * const server = new TelemetryServer({ port: 8080 }, { logger });
 * const address = await server.start();
 * console.log(`Listening on ${address.address}:${address.port}`);
 *
 * process.on('SIGINT', () => {
 *   void server.stop();
 * });
 * ```
 */
export class TelemetryServer extends EventEmitter<TelemetryServerEvents> {
  private readonly config: TelemetryServerConfig;
  private readonly source: TelemetrySource;
  private readonly logger: Logger;

  private state: ServerState = 'stopped';
  private server: net.Server | null = null;
  private address: AddressInfo | null = null;

  private readonly pending: WaitingConnection[] = [];
  private wakeAcceptor: (() => void) | null = null;
  private acceptLoop: Promise<void> | null = null;
  private activeSession: ConnectionSession | null = null;
  private sessionsServed = 0;

  constructor(config: Partial<TelemetryServerConfig> = {}, deps: TelemetryServerDeps = {}) {
    super();
    this.config = { ...DEFAULT_SERVER_CONFIG, ...config };
    this.logger = deps.logger ?? silentLogger;
    this.source = deps.source ?? new SyntheticTelemetrySource({ logger: this.logger });
  }

  /**
   * Returns the current lifecycle state.
   */
  getState(): ServerState {
    return this.state;
  }

  /**
   * Returns the bound address, or null when not listening.
   */
  getAddress(): AddressInfo | null {
    return this.address;
  }

  /**
   * Returns the session currently being served, if any.
   */
  getActiveSession(): ConnectionSession | null {
    return this.activeSession;
  }

  /**
   * Returns the number of connections waiting for the active session to end.
   */
  getPendingCount(): number {
    return this.pending.length;
  }

  /**
   * Returns the number of sessions started since the server was created.
   */
  getSessionsServed(): number {
    return this.sessionsServed;
  }

  /**
   * Binds the listening socket and starts the accept loop.
   *
   * @returns The address actually bound (useful with port 0)
   * @throws {Error} If the server is already running or the bind fails
   */
  async start(): Promise<AddressInfo> {
    if (this.state !== 'stopped') {
      throw new Error(`TelemetryServer cannot start while ${this.state}`);
    }
    this.state = 'starting';

    const server = net.createServer({ pauseOnConnect: true }, this.handleConnection);

    try {
      await new Promise<void>((resolve, reject) => {
        server.once('error', reject);
        server.listen(
          { host: this.config.host, port: this.config.port, backlog: this.config.backlog },
          () => {
            server.off('error', reject);
            resolve();
          },
        );
      });
    } catch (error) {
      this.state = 'stopped';
      throw error;
    }

    const address = server.address();
    if (address === null || typeof address === 'string') {
      server.close();
      this.state = 'stopped';
      throw new Error('TelemetryServer is not bound to a TCP address');
    }

    server.on('error', (error) => {
      this.logger.error('Listener error:', error);
    });

    this.server = server;
    this.address = address;
    this.state = 'listening';
    this.acceptLoop = this.runAcceptLoop();

    this.logger.info(`Listening on ${address.address}:${address.port}`);
    this.emit('listening', address);
    return address;
  }

  /**
   * Stops accepting, ends the active session, drops waiting connections and
   * resolves once the accept loop has exited.
   */
  async stop(): Promise<void> {
    if (this.state !== 'listening') return;
    this.state = 'stopping';

    const server = this.server;
    const closed = new Promise<void>((resolve) => {
      if (!server) {
        resolve();
        return;
      }
      server.close(() => resolve());
    });

    for (const waiting of this.pending.splice(0)) {
      waiting.socket.destroy();
    }
    this.activeSession?.close();
    this.wakeAcceptor?.();

    await this.acceptLoop;
    await closed;

    this.server = null;
    this.address = null;
    this.acceptLoop = null;
    this.state = 'stopped';

    this.logger.info('Server stopped');
    this.emit('stopped');
  }

  // ===========================================================================
  // Private Methods
  // ===========================================================================

  private readonly handleConnection = (socket: net.Socket): void => {
    const peer = describePeer(socket);

    // Stays attached for the socket's whole life, including while it waits.
    socket.on('error', (error) => {
      this.logger.debug(`Socket error from ${peer}: ${error.message}`);
    });

    if (this.state !== 'listening') {
      socket.destroy();
      return;
    }

    if (this.pending.length >= this.config.backlog) {
      this.logger.warn(
        `Refusing connection from ${peer}: ${this.pending.length} already waiting`,
      );
      socket.destroy();
      return;
    }

    const waiting = new WaitingConnection(socket, peer, this.config.maxFrameSize, this.dropWaiting);
    this.pending.push(waiting);
    if (this.activeSession) {
      waiting.watch();
      this.logger.info(`Connection from ${peer} waiting (${this.pending.length} queued)`);
    }
    this.wakeAcceptor?.();
  };

  private readonly dropWaiting = (waiting: WaitingConnection, reason: WaitingDropReason): void => {
    const index = this.pending.indexOf(waiting);
    if (index === -1) return;
    this.pending.splice(index, 1);
    waiting.socket.destroy();

    if (reason === 'overflow') {
      this.logger.warn(
        `Dropped waiting connection from ${waiting.peer}: sent ${waiting.getEarlyBytes()} bytes before being served`,
      );
    } else {
      this.logger.info(`Connection from ${waiting.peer} left while waiting`);
    }
  };

  private nextWaiting(): Promise<WaitingConnection | null> {
    const queued = this.pending.shift();
    if (queued) return Promise.resolve(queued);

    return new Promise((resolve) => {
      this.wakeAcceptor = () => {
        this.wakeAcceptor = null;
        resolve(this.pending.shift() ?? null);
      };
    });
  }

  private async runAcceptLoop(): Promise<void> {
    while (this.state === 'listening') {
      const waiting = await this.nextWaiting();
      if (!waiting) break;
      if (waiting.socket.destroyed) continue;

      await this.serve(waiting.release());
    }
  }

  private async serve(socket: net.Socket): Promise<void> {
    const session = new ConnectionSession({
      socket,
      source: this.source,
      initialIntervalMs: this.config.defaultSamplingIntervalMs,
      maxFrameSize: this.config.maxFrameSize,
      peer: describePeer(socket),
      logger: this.logger,
    });

    this.activeSession = session;
    this.sessionsServed++;
    this.emit('sessionStarted', session);

    let reason: SessionCloseReason;
    try {
      reason = await session.run();
    } catch (error) {
      this.logger.error('Session failed:', error);
      session.close();
      reason = 'error';
    }

    this.activeSession = null;
    this.emit('sessionEnded', session, reason);
  }
}
