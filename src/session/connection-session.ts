/**
 * One client connection on the telemetry server.
 *
 * A session owns its socket and runs two loops concurrently:
 * - Sender loop: samples the telemetry source and pushes `sensor_data`
 *   envelopes, sleeping for the current sampling interval in between
 * - Receiver loop: decodes inbound frames and hands commands to the
 *   {@link CommandDispatcher}
 *
 * Both loops write through a single {@link FrameWriter}. Either loop can end
 * the session; {@link ConnectionSession.run} resolves once both have exited.
 *
 * @module session/connection-session
 */

import { EventEmitter } from 'node:events';
import type { Duplex } from 'node:stream';

import {
  classifyEnvelope,
  createSensorDataEnvelope,
  type CommandEnvelope,
  type OutboundEnvelope,
} from '../protocol/envelope.js';
import { decodeOne, MAX_FRAME_SIZE } from '../protocol/frame-codec.js';
import { StreamReader } from '../protocol/frame-reader.js';
import {
  ConnectionClosedError,
  FrameTooLargeError,
  MalformedFrameError,
  WriteFailureError,
} from '../protocol/errors.js';
import type { TelemetrySource } from '../telemetry/telemetry-source.js';
import { CommandDispatcher, type DispatchOutcome } from './command-dispatcher.js';
import { FrameWriter } from './frame-writer.js';
import { SAMPLING_INTERVAL, SamplingInterval } from './sampling-interval.js';
import { silentLogger, type Logger } from '../utils/logger.js';

// =============================================================================
// Types
// =============================================================================

/**
 * Session lifecycle state.
 */
export type SessionState = 'idle' | 'active' | 'closing' | 'closed';

/**
 * Why a session ended.
 *
 * - `peer_closed`: the client closed or reset the connection
 * - `write_failed`: a frame could not be written
 * - `protocol_error`: the peer sent an unusable length prefix
 * - `stopped`: {@link ConnectionSession.close} was called
 * - `error`: an unexpected error escaped a loop
 */
export type SessionCloseReason =
  | 'peer_closed'
  | 'write_failed'
  | 'protocol_error'
  | 'stopped'
  | 'error';

/**
 * Configuration for a session.
 */
export interface ConnectionSessionOptions {
  /** Connected socket; the session takes exclusive ownership. */
  readonly socket: Duplex;
  /** Source sampled by the sender loop and by `get_sensor_data`. */
  readonly source: TelemetrySource;
  /** Initial sampling interval. @default 1000 */
  readonly initialIntervalMs?: number;
  /** Largest accepted inbound payload. @default MAX_FRAME_SIZE */
  readonly maxFrameSize?: number;
  /** Peer label used in log lines, e.g. `127.0.0.1:53122`. */
  readonly peer?: string;
  readonly logger?: Logger;
}

/**
 * Events emitted by a session.
 */
export interface ConnectionSessionEvents {
  /** A frame was flushed to the socket */
  frameSent: [envelope: OutboundEnvelope];
  /** A well-formed frame was decoded */
  frameReceived: [value: unknown];
  /** A command was handled */
  command: [command: CommandEnvelope, outcome: DispatchOutcome];
  /** A frame was dropped because its payload could not be parsed */
  malformedFrame: [error: MalformedFrameError];
  /** A decoded value was not a command the server acts on */
  ignoredMessage: [value: unknown];
  /** The sampling interval changed */
  samplingIntervalChanged: [current: number, previous: number];
  /** Both loops have exited */
  closed: [reason: SessionCloseReason];
}

/**
 * Statistics for a session.
 */
export interface ConnectionSessionStats {
  readonly state: SessionState;
  readonly peer: string;
  readonly samplingIntervalMs: number;
  readonly framesSent: number;
  readonly framesReceived: number;
  readonly malformedFrames: number;
  readonly bytesSent: number;
  readonly bytesReceived: number;
  readonly connectedAt: number | null;
  readonly closeReason: SessionCloseReason | null;
}

// =============================================================================
// ConnectionSession Class
// =============================================================================

/**
 * Drives the telemetry protocol over one socket.
 *
 * @example
 * ```typescript
 * const session = new ConnectionSession({ socket, source });
 * session.on('malformedFrame', (err) => console.warn(err.message));
 * const reason = await session.run();
 * console.log(`Session ended: ${reason}`);
 * ```
 */
export class ConnectionSession extends EventEmitter<ConnectionSessionEvents> {
  private readonly socket: Duplex;
  private readonly source: TelemetrySource;
  private readonly logger: Logger;
  private readonly peer: string;
  private readonly maxFrameSize: number;

  private readonly samplingInterval: SamplingInterval;
  private readonly writer: FrameWriter;
  private readonly dispatcher: CommandDispatcher;
  private reader: StreamReader | null = null;

  private state: SessionState = 'idle';
  private alive = false;
  private socketClosed = false;
  private closeReason: SessionCloseReason | null = null;
  private wakeSender: (() => void) | null = null;

  private framesReceived = 0;
  private malformedFrames = 0;
  private connectedAt: number | null = null;

  constructor(options: ConnectionSessionOptions) {
    super();

    this.socket = options.socket;
    this.source = options.source;
    this.logger = options.logger ?? silentLogger;
    this.peer = options.peer ?? 'client';
    this.maxFrameSize = options.maxFrameSize ?? MAX_FRAME_SIZE;

    this.samplingInterval = new SamplingInterval(
      options.initialIntervalMs ?? SAMPLING_INTERVAL.DEFAULT_MS,
    );
    this.samplingInterval.onChange((current, previous) => {
      this.emit('samplingIntervalChanged', current, previous);
    });

    this.writer = new FrameWriter(this.socket);
    this.dispatcher = new CommandDispatcher({
      source: this.source,
      samplingInterval: this.samplingInterval,
      logger: this.logger,
      send: (envelope) => this.send(envelope),
    });
  }

  /**
   * Returns the current lifecycle state.
   */
  getState(): SessionState {
    return this.state;
  }

  /**
   * Returns the current sampling interval in milliseconds.
   */
  getSamplingInterval(): number {
    return this.samplingInterval.get();
  }

  /**
   * Returns whether both loops are still meant to run.
   */
  isAlive(): boolean {
    return this.alive;
  }

  /**
   * Returns session statistics.
   */
  getStats(): ConnectionSessionStats {
    const writerStats = this.writer.getStats();
    return {
      state: this.state,
      peer: this.peer,
      samplingIntervalMs: this.samplingInterval.get(),
      framesSent: writerStats.framesWritten,
      framesReceived: this.framesReceived,
      malformedFrames: this.malformedFrames,
      bytesSent: writerStats.bytesWritten,
      bytesReceived: this.reader?.getBytesRead() ?? 0,
      connectedAt: this.connectedAt,
      closeReason: this.closeReason,
    };
  }

  /**
   * Runs both loops until the session ends.
   *
   * @returns The reason the session ended
   * @throws {Error} If the session has already been started
   */
  async run(): Promise<SessionCloseReason> {
    if (this.state === 'closed' && this.closeReason) {
      return this.closeReason;
    }
    if (this.state !== 'idle') {
      throw new Error(`Session with ${this.peer} already started`);
    }

    this.state = 'active';
    this.alive = true;
    this.connectedAt = Date.now();
    this.reader = new StreamReader(this.socket);

    this.logger.info(`Client connected from ${this.peer}`);

    await Promise.all([this.senderLoop(), this.receiverLoop()]);

    this.reader.dispose();
    this.state = 'closed';
    const reason = this.closeReason ?? 'stopped';
    this.logger.info(`Client ${this.peer} disconnected (${reason})`);
    this.emit('closed', reason);
    return reason;
  }

  /**
   * Requests shutdown. Safe to call any number of times, from any state.
   */
  close(): void {
    if (this.state === 'idle') {
      this.closeReason = 'stopped';
      this.state = 'closed';
      this.closeSocket();
      return;
    }
    this.beginClosing('stopped');
  }

  // ===========================================================================
  // Loops
  // ===========================================================================

  private async senderLoop(): Promise<void> {
    while (this.alive) {
      try {
        await this.send(createSensorDataEnvelope(this.source.sample()));
      } catch (error) {
        this.handleLoopError('sender', error);
        return;
      }

      if (!this.alive) return;
      await this.sleep(this.samplingInterval.get());
    }
  }

  private async receiverLoop(): Promise<void> {
    const reader = this.reader;
    if (!reader) return;

    while (this.alive) {
      let value: unknown;
      try {
        value = await decodeOne(reader, this.maxFrameSize);
      } catch (error) {
        if (error instanceof MalformedFrameError) {
          this.malformedFrames++;
          this.logger.warn(`Dropped malformed frame from ${this.peer}: ${error.message}`);
          this.emit('malformedFrame', error);
          continue;
        }
        this.handleLoopError('receiver', error);
        return;
      }

      this.framesReceived++;
      this.emit('frameReceived', value);

      const envelope = classifyEnvelope(value);
      if (envelope?.type !== 'command') {
        this.emit('ignoredMessage', value);
        continue;
      }

      try {
        const outcome = await this.dispatcher.dispatch(envelope);
        this.emit('command', envelope, outcome);
      } catch (error) {
        this.handleLoopError('receiver', error);
        return;
      }
    }
  }

  // ===========================================================================
  // Private Methods
  // ===========================================================================

  private async send(envelope: OutboundEnvelope): Promise<void> {
    await this.writer.write(envelope);
    this.emit('frameSent', envelope);
  }

  /**
   * Sleeps for `ms`, returning early when the session starts closing.
   */
  private sleep(ms: number): Promise<void> {
    return new Promise((resolve) => {
      const timer = setTimeout(() => {
        this.wakeSender = null;
        resolve();
      }, ms);

      this.wakeSender = () => {
        clearTimeout(timer);
        this.wakeSender = null;
        resolve();
      };
    });
  }

  private handleLoopError(loop: 'sender' | 'receiver', error: unknown): void {
    if (!this.alive) {
      // Already closing: the error is the socket teardown itself.
      return;
    }

    // A failed write destroys the socket, which can reach the receiver loop
    // before the writer's rejection reaches the sender loop.
    const writeFailure =
      error instanceof WriteFailureError ? error : this.writer.getFailure();

    if (writeFailure) {
      this.logger.warn(`Write to ${this.peer} failed: ${writeFailure.message}`);
      this.beginClosing('write_failed');
    } else if (error instanceof ConnectionClosedError) {
      this.beginClosing('peer_closed');
    } else if (error instanceof FrameTooLargeError) {
      this.logger.warn(`Closing ${this.peer}: ${error.message}`);
      this.beginClosing('protocol_error');
    } else {
      this.logger.error(`Unexpected error in ${loop} loop for ${this.peer}:`, error);
      this.beginClosing('error');
    }
  }

  private beginClosing(reason: SessionCloseReason): void {
    if (this.state !== 'active') return;

    this.state = 'closing';
    this.alive = false;
    this.closeReason = reason;

    this.wakeSender?.();
    this.closeSocket();
  }

  private closeSocket(): void {
    if (this.socketClosed) return;
    this.socketClosed = true;
    this.socket.destroy();
  }
}
