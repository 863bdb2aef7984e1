/**
 * Envelope definitions for the telemetry protocol.
 *
 * Every frame carries exactly one JSON envelope, discriminated by `type`:
 *
 * - `sensor_data` (server -> client): a telemetry sample
 * - `command` (client -> server): a control request
 * - `response` (server -> client): the outcome of a command
 *
 * @module protocol/envelope
 */

// =============================================================================
// Telemetry Record
// =============================================================================

/**
 * One telemetry sample. Field names match the wire format.
 */
export interface TelemetryRecord {
  /** Degrees Celsius */
  readonly temperature: number;
  /** Relative humidity, percent */
  readonly humidity: number;
  /** Barometric pressure, hPa */
  readonly pressure: number;
  /** Light level, 0-100 */
  readonly light: number;
  readonly motion_detected: boolean;
  /** System CPU usage, percent (0 when unavailable) */
  readonly cpu_usage: number;
  /** System memory usage, percent (0 when unavailable) */
  readonly memory_usage: number;
}

/**
 * Numeric fields of {@link TelemetryRecord}.
 */
export const NUMERIC_TELEMETRY_FIELDS = [
  'temperature',
  'humidity',
  'pressure',
  'light',
  'cpu_usage',
  'memory_usage',
] as const satisfies readonly (keyof TelemetryRecord)[];

// =============================================================================
// Envelopes
// =============================================================================

/**
 * Periodic or on-demand telemetry push.
 */
export interface SensorDataEnvelope {
  readonly type: 'sensor_data';
  readonly timestamp: number;
  readonly data: TelemetryRecord;
}

/**
 * Parameters accepted by commands. Unknown keys are preserved.
 */
export interface CommandParams {
  readonly rate_ms?: unknown;
  readonly [key: string]: unknown;
}

/**
 * Control request sent by the client.
 */
export interface CommandEnvelope {
  readonly type: 'command';
  readonly cmd: string;
  readonly params?: CommandParams;
  readonly timestamp?: number;
}

/**
 * Outcome of a command.
 */
export interface ResponseEnvelope {
  readonly type: 'response';
  readonly timestamp: number;
  readonly cmd: string;
  readonly success: boolean;
  readonly message: string;
}

/**
 * Envelopes the server emits.
 */
export type OutboundEnvelope = SensorDataEnvelope | ResponseEnvelope;

/**
 * All envelope shapes that may appear on the wire.
 */
export type Envelope = SensorDataEnvelope | CommandEnvelope | ResponseEnvelope;

/**
 * Envelope type tags.
 */
export type EnvelopeType = Envelope['type'];

/**
 * Commands the server understands.
 */
export type KnownCommand = 'get_sensor_data' | 'set_sampling_rate';

// =============================================================================
// Constructors
// =============================================================================

/**
 * Current wall-clock time as integer milliseconds since the epoch.
 */
export function nowMillis(): number {
  return Date.now();
}

/**
 * Builds a `sensor_data` envelope stamped with the current time.
 */
export function createSensorDataEnvelope(
  data: TelemetryRecord,
  timestamp: number = nowMillis(),
): SensorDataEnvelope {
  return { type: 'sensor_data', timestamp, data };
}

/**
 * Builds a `response` envelope stamped with the current time.
 */
export function createResponseEnvelope(
  cmd: string,
  success: boolean,
  message: string,
  timestamp: number = nowMillis(),
): ResponseEnvelope {
  return { type: 'response', timestamp, cmd, success, message };
}

/**
 * Builds a `command` envelope. `params` is omitted when not given.
 */
export function createCommandEnvelope(cmd: string, params?: CommandParams): CommandEnvelope {
  return params === undefined ? { type: 'command', cmd } : { type: 'command', cmd, params };
}

// =============================================================================
// Classification
// =============================================================================

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function isTelemetryRecord(value: unknown): value is TelemetryRecord {
  if (!isRecord(value)) return false;
  if (typeof value['motion_detected'] !== 'boolean') return false;
  return NUMERIC_TELEMETRY_FIELDS.every((field) => typeof value[field] === 'number');
}

/**
 * Narrows a decoded JSON value to an {@link Envelope}.
 *
 * Returns `null` for anything that is not an envelope of a known type with the
 * fields that type requires; callers ignore such values. A `params` member that
 * is not an object is dropped rather than rejecting the command.
 */
export function classifyEnvelope(value: unknown): Envelope | null {
  if (!isRecord(value)) return null;

  const timestamp = value['timestamp'];

  switch (value['type']) {
    case 'sensor_data': {
      const data = value['data'];
      if (typeof timestamp !== 'number' || !isTelemetryRecord(data)) return null;
      return { type: 'sensor_data', timestamp, data };
    }

    case 'command': {
      const cmd = value['cmd'];
      if (typeof cmd !== 'string') return null;
      const params = value['params'];
      return {
        type: 'command',
        cmd,
        ...(isRecord(params) ? { params } : {}),
        ...(typeof timestamp === 'number' ? { timestamp } : {}),
      };
    }

    case 'response': {
      const { cmd, success, message } = value;
      if (
        typeof cmd !== 'string' ||
        typeof success !== 'boolean' ||
        typeof message !== 'string'
      ) {
        return null;
      }
      return {
        type: 'response',
        timestamp: typeof timestamp === 'number' ? timestamp : 0,
        cmd,
        success,
        message,
      };
    }

    default:
      return null;
  }
}
