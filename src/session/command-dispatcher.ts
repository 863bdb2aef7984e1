/**
 * Command handling for a connection session.
 *
 * @module session/command-dispatcher
 */

import {
  createResponseEnvelope,
  createSensorDataEnvelope,
  type CommandEnvelope,
  type KnownCommand,
  type OutboundEnvelope,
} from '../protocol/envelope.js';
import type { TelemetrySource } from '../telemetry/telemetry-source.js';
import { SAMPLING_INTERVAL, type SamplingInterval } from './sampling-interval.js';
import type { Logger } from '../utils/logger.js';

/**
 * What the dispatcher needs from its session.
 */
export interface DispatchContext {
  readonly source: TelemetrySource;
  readonly samplingInterval: SamplingInterval;
  readonly logger: Logger;
  /** Writes one envelope through the session's frame writer. */
  send(envelope: OutboundEnvelope): Promise<void>;
}

/**
 * Result of dispatching one command.
 */
export type DispatchOutcome =
  | { readonly kind: 'sample_sent' }
  | { readonly kind: 'interval_set'; readonly intervalMs: number }
  | { readonly kind: 'rejected'; readonly reason: string }
  | { readonly kind: 'ignored'; readonly cmd: string };

type CommandHandler = (command: CommandEnvelope) => Promise<DispatchOutcome>;

/**
 * Returns whether `cmd` names a command the server handles.
 */
export function isKnownCommand(cmd: string): cmd is KnownCommand {
  return cmd === 'get_sensor_data' || cmd === 'set_sampling_rate';
}

/**
 * Interprets decoded `command` envelopes.
 *
 * Unrecognised commands are ignored without a response so that newer clients
 * can talk to older servers.
 */
export class CommandDispatcher {
  private readonly handlers: Record<KnownCommand, CommandHandler>;

  constructor(private readonly context: DispatchContext) {
    this.handlers = {
      get_sensor_data: () => this.sendSample(),
      set_sampling_rate: (command) => this.setSamplingRate(command),
    };
  }

  /**
   * Handles one command.
   *
   * @throws {WriteFailureError} If the reply cannot be written
   */
  dispatch(command: CommandEnvelope): Promise<DispatchOutcome> {
    const { cmd } = command;
    if (!isKnownCommand(cmd)) {
      this.context.logger.debug(`Ignoring unknown command: ${cmd}`);
      return Promise.resolve({ kind: 'ignored', cmd });
    }

    this.context.logger.info(`Received command: ${cmd}`);
    return this.handlers[cmd](command);
  }

  private async sendSample(): Promise<DispatchOutcome> {
    const record = this.context.source.sample();
    await this.context.send(createSensorDataEnvelope(record));
    return { kind: 'sample_sent' };
  }

  private async setSamplingRate(command: CommandEnvelope): Promise<DispatchOutcome> {
    const requested = command.params?.rate_ms ?? SAMPLING_INTERVAL.DEFAULT_MS;

    if (typeof requested !== 'number' || !Number.isFinite(requested)) {
      const reason = 'rate_ms must be a number';
      await this.context.send(createResponseEnvelope(command.cmd, false, reason));
      return { kind: 'rejected', reason };
    }

    const intervalMs = this.context.samplingInterval.set(requested);
    this.context.logger.info(`Sampling rate changed to ${intervalMs}ms`);

    await this.context.send(
      createResponseEnvelope(command.cmd, true, `Sampling rate set to ${intervalMs}ms`),
    );
    return { kind: 'interval_set', intervalMs };
  }
}
