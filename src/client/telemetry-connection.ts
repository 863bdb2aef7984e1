/**
 * TCP client for the telemetry server.
 *
 * Handles the connection to a TelemetryServer with:
 * - Length-prefix framed envelope parsing
 * - Automatic reconnection with exponential backoff
 * - Typed command helpers
 *
 * @module client/telemetry-connection
 */

import net from 'node:net';
import {
  classifyEnvelope,
  createCommandEnvelope,
  type CommandEnvelope,
  type OutboundEnvelope,
} from '../protocol/envelope.js';
import {
  encodeFrame,
  LENGTH_PREFIX_SIZE,
  parseFrame,
  type ParseFrameResult,
} from '../protocol/frame-codec.js';
import { MalformedFrameError } from '../protocol/errors.js';
import { silentLogger, type Logger } from '../utils/logger.js';

// =============================================================================
// Configuration
// =============================================================================

/**
 * Connection configuration options.
 */
export interface TelemetryConnectionConfig {
  /** Server host address. @default '127.0.0.1' */
  readonly host: string;
  /** Server TCP port. @default 8080 */
  readonly port: number;
  /** Enable automatic reconnection. @default true */
  readonly autoReconnect: boolean;
  /** Initial reconnect delay in milliseconds. @default 1000 */
  readonly reconnectDelayMs: number;
  /** Maximum reconnect delay in milliseconds. @default 30000 */
  readonly maxReconnectDelayMs: number;
  /** Reconnect delay multiplier for exponential backoff. @default 1.5 */
  readonly reconnectBackoffMultiplier: number;
  /** Connection timeout in milliseconds. @default 5000 */
  readonly connectionTimeoutMs: number;
}

/**
 * Default connection configuration.
 */
export const DEFAULT_CONNECTION_CONFIG: TelemetryConnectionConfig = {
  host: '127.0.0.1',
  port: 8080,
  autoReconnect: true,
  reconnectDelayMs: 1000,
  maxReconnectDelayMs: 30000,
  reconnectBackoffMultiplier: 1.5,
  connectionTimeoutMs: 5000,
};

// =============================================================================
// Connection State
// =============================================================================

/**
 * Connection state enumeration.
 */
export type ConnectionState =
  | 'disconnected'
  | 'connecting'
  | 'connected'
  | 'reconnecting';

/**
 * Connection event types.
 */
export type ConnectionEvent =
  | { readonly type: 'connected' }
  | { readonly type: 'disconnected'; readonly reason: string }
  | { readonly type: 'reconnecting'; readonly attempt: number; readonly delayMs: number }
  | { readonly type: 'message'; readonly message: OutboundEnvelope }
  | { readonly type: 'error'; readonly error: Error };

/**
 * Event handler for connection events.
 */
export type ConnectionEventHandler = (event: ConnectionEvent) => void;

/**
 * Computes the delay before reconnect attempt number `attempt` (1-based).
 */
export function reconnectDelay(config: TelemetryConnectionConfig, attempt: number): number {
  return Math.min(
    config.reconnectDelayMs * Math.pow(config.reconnectBackoffMultiplier, attempt - 1),
    config.maxReconnectDelayMs,
  );
}

// =============================================================================
// Connection Class
// =============================================================================

/**
 * Manages the TCP connection to a TelemetryServer.
 *
 * @example
 * ```typescript
 * const connection = new TelemetryConnection({ host: '192.168.1.20' });
 *
 * connection.onEvent((event) => {
 *   if (event.type === 'message' && event.message.type === 'sensor_data') {
 *     console.log(event.message.data.temperature);
 *   }
 * });
 *
 * await connection.connect();
 * connection.setSamplingRate(500);
 * ```
 */
export class TelemetryConnection {
  private readonly config: TelemetryConnectionConfig;
  private readonly logger: Logger;
  private readonly handlers: Set<ConnectionEventHandler> = new Set();

  private socket: net.Socket | null = null;
  private buffer: Buffer = Buffer.alloc(0);
  private state: ConnectionState = 'disconnected';

  private reconnectAttempt = 0;
  private reconnectTimer: ReturnType<typeof setTimeout> | null = null;
  private connectionTimer: ReturnType<typeof setTimeout> | null = null;
  private intentionalDisconnect = false;

  constructor(config: Partial<TelemetryConnectionConfig> = {}, logger: Logger = silentLogger) {
    this.config = { ...DEFAULT_CONNECTION_CONFIG, ...config };
    this.logger = logger;
  }

  /**
   * Returns the current connection state.
   */
  getState(): ConnectionState {
    return this.state;
  }

  /**
   * Returns whether the connection is currently active.
   */
  isConnected(): boolean {
    return this.state === 'connected';
  }

  /**
   * Returns the effective configuration.
   */
  getConfig(): TelemetryConnectionConfig {
    return this.config;
  }

  /**
   * Registers an event handler for connection events.
   *
   * @returns Unsubscribe function
   */
  onEvent(handler: ConnectionEventHandler): () => void {
    this.handlers.add(handler);
    return () => {
      this.handlers.delete(handler);
    };
  }

  /**
   * Connects to the server.
   *
   * @returns Promise that resolves when connected
   * @throws Error if connection fails and autoReconnect is disabled
   */
  async connect(): Promise<void> {
    if (this.state === 'connected' || this.state === 'connecting') {
      return;
    }

    this.intentionalDisconnect = false;
    this.reconnectAttempt = 0;

    return this.attemptConnection();
  }

  /**
   * Disconnects without triggering reconnection.
   */
  disconnect(): void {
    this.intentionalDisconnect = true;
    this.cleanup();
    this.setState('disconnected');
    this.emit({ type: 'disconnected', reason: 'manual' });
  }

  /**
   * Sends a command envelope.
   *
   * @returns Whether the frame was handed to the socket
   */
  send(command: CommandEnvelope): boolean {
    if (!this.socket || this.state !== 'connected') {
      return false;
    }

    this.socket.write(encodeFrame(command));
    return true;
  }

  /**
   * Asks the server for an immediate reading.
   */
  requestSensorData(): boolean {
    return this.send(createCommandEnvelope('get_sensor_data'));
  }

  /**
   * Asks the server to change its sampling interval. The server clamps the
   * value and reports the result in a `response` envelope.
   */
  setSamplingRate(rateMs: number): boolean {
    return this.send(createCommandEnvelope('set_sampling_rate', { rate_ms: rateMs }));
  }

  // ===========================================================================
  // Private Methods
  // ===========================================================================

  private attemptConnection(): Promise<void> {
    return new Promise((resolve, reject) => {
      this.setState('connecting');
      this.buffer = Buffer.alloc(0);

      const socket = new net.Socket();
      this.socket = socket;

      this.connectionTimer = setTimeout(() => {
        socket.destroy();
        const error = new Error(
          `Connection timeout after ${this.config.connectionTimeoutMs}ms`,
        );
        this.handleConnectionError(error, reject);
      }, this.config.connectionTimeoutMs);

      socket.on('connect', () => {
        this.clearConnectionTimeout();
        this.reconnectAttempt = 0;
        this.setState('connected');
        this.emit({ type: 'connected' });
        resolve();
      });

      socket.on('data', (chunk: Buffer) => {
        this.handleData(chunk);
      });

      socket.on('close', () => {
        this.handleDisconnect('connection closed');
      });

      socket.on('error', (error) => {
        this.clearConnectionTimeout();
        this.handleConnectionError(error, reject);
      });

      socket.connect(this.config.port, this.config.host);
    });
  }

  private handleData(chunk: Buffer): void {
    this.buffer = Buffer.concat([this.buffer, chunk]);

    while (this.socket) {
      let result: ParseFrameResult;
      try {
        result = parseFrame(this.buffer);
      } catch (error) {
        if (error instanceof MalformedFrameError) {
          this.buffer = this.buffer.subarray(LENGTH_PREFIX_SIZE + error.payloadLength);
          this.emit({ type: 'error', error });
          continue;
        }

        // An oversized prefix leaves the stream unrecoverable.
        this.emit({
          type: 'error',
          error: error instanceof Error ? error : new Error(String(error)),
        });
        this.socket.destroy();
        return;
      }

      if (!result.complete) break;

      this.buffer = this.buffer.subarray(result.bytesConsumed);

      const envelope = classifyEnvelope(result.value);
      if (envelope && envelope.type !== 'command') {
        this.emit({ type: 'message', message: envelope });
      } else {
        this.logger.debug('Ignoring unexpected frame from server');
      }
    }
  }

  private handleDisconnect(reason: string): void {
    this.cleanup();

    if (this.intentionalDisconnect) {
      return;
    }

    this.emit({ type: 'disconnected', reason });

    if (this.config.autoReconnect) {
      this.scheduleReconnect();
    } else {
      this.setState('disconnected');
    }
  }

  private handleConnectionError(error: Error, reject?: (error: Error) => void): void {
    this.cleanup();

    if (this.intentionalDisconnect) {
      return;
    }

    this.emit({ type: 'error', error });

    if (this.config.autoReconnect && this.state !== 'disconnected') {
      this.scheduleReconnect();
    } else {
      this.setState('disconnected');
      if (reject) {
        reject(error);
      }
    }
  }

  private scheduleReconnect(): void {
    this.reconnectAttempt++;

    const delay = reconnectDelay(this.config, this.reconnectAttempt);

    this.setState('reconnecting');
    this.emit({
      type: 'reconnecting',
      attempt: this.reconnectAttempt,
      delayMs: delay,
    });

    this.reconnectTimer = setTimeout(() => {
      this.reconnectTimer = null;
      this.attemptConnection().catch((error: unknown) => {
        this.logger.debug('Reconnect attempt failed:', error);
      });
    }, delay);
  }

  private cleanup(): void {
    this.clearConnectionTimeout();
    this.clearReconnectTimer();

    if (this.socket) {
      this.socket.removeAllListeners();
      // Late errors from the destroyed socket must not go unhandled.
      this.socket.on('error', () => undefined);
      this.socket.destroy();
      this.socket = null;
    }

    this.buffer = Buffer.alloc(0);
  }

  private clearConnectionTimeout(): void {
    if (this.connectionTimer) {
      clearTimeout(this.connectionTimer);
      this.connectionTimer = null;
    }
  }

  private clearReconnectTimer(): void {
    if (this.reconnectTimer) {
      clearTimeout(this.reconnectTimer);
      this.reconnectTimer = null;
    }
  }

  private setState(state: ConnectionState): void {
    this.state = state;
  }

  private emit(event: ConnectionEvent): void {
    for (const handler of this.handlers) {
      try {
        handler(event);
      } catch (error) {
        this.logger.warn('Connection event handler threw:', error);
      }
    }
  }
}
