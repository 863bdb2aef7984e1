/**
 * telemetry-link - length-prefixed JSON telemetry streaming over TCP.
 *
 * This module provides the public API: the wire protocol, the server with its
 * per-connection session, and the reconnecting client. The terminal dashboard
 * lives under `telemetry-link/dashboard`.
 */

export const VERSION = '0.1.0' as const;

// Protocol
export type {
  TelemetryRecord,
  SensorDataEnvelope,
  CommandEnvelope,
  CommandParams,
  ResponseEnvelope,
  OutboundEnvelope,
  Envelope,
  EnvelopeType,
  KnownCommand,
} from './protocol/envelope.js';
export {
  NUMERIC_TELEMETRY_FIELDS,
  classifyEnvelope,
  createCommandEnvelope,
  createResponseEnvelope,
  createSensorDataEnvelope,
} from './protocol/envelope.js';
export {
  LENGTH_PREFIX_SIZE,
  MAX_FRAME_SIZE,
  encodeFrame,
  decodePayload,
  decodeOne,
  parseFrame,
  type ByteSource,
  type ParseFrameResult,
} from './protocol/frame-codec.js';
export { StreamReader } from './protocol/frame-reader.js';
export {
  ProtocolError,
  MalformedFrameError,
  FrameTooLargeError,
  ConnectionClosedError,
  WriteFailureError,
  type ProtocolErrorCode,
} from './protocol/errors.js';

// Session
export {
  SAMPLING_INTERVAL,
  SamplingInterval,
  clampSamplingInterval,
  type IntervalChangeHandler,
} from './session/sampling-interval.js';
export { FrameWriter, type FrameWriterStats } from './session/frame-writer.js';
export {
  CommandDispatcher,
  isKnownCommand,
  type DispatchContext,
  type DispatchOutcome,
} from './session/command-dispatcher.js';
export {
  ConnectionSession,
  type ConnectionSessionOptions,
  type ConnectionSessionEvents,
  type ConnectionSessionStats,
  type SessionState,
  type SessionCloseReason,
} from './session/connection-session.js';

// Telemetry
export {
  SyntheticTelemetrySource,
  SYNTHETIC_RANGES,
  type TelemetrySource,
  type ReadingRange,
  type SyntheticSourceOptions,
} from './telemetry/telemetry-source.js';
export {
  CpuUsageProbe,
  MemoryUsageProbe,
  parseCpuCounters,
  readMeminfoValue,
  type UsageProbe,
  type FileReader,
  type ProcProbeOptions,
} from './telemetry/system-probes.js';

// Server
export {
  TelemetryServer,
  DEFAULT_SERVER_CONFIG,
  type TelemetryServerConfig,
  type TelemetryServerDeps,
  type TelemetryServerEvents,
  type ServerState,
} from './server/telemetry-server.js';
export {
  loadServerConfig,
  ConfigError,
  SERVER_ENV_VARS,
  type ServerCliArgs,
  type ServerConfigSources,
} from './server/config.js';

// Client
export {
  TelemetryConnection,
  DEFAULT_CONNECTION_CONFIG,
  reconnectDelay,
  type TelemetryConnectionConfig,
  type ConnectionState,
  type ConnectionEvent,
  type ConnectionEventHandler,
} from './client/telemetry-connection.js';

// Logging
export {
  createConsoleLogger,
  silentLogger,
  isLogLevel,
  type Logger,
  type LogLevel,
  type ConsoleLoggerOptions,
} from './utils/logger.js';
