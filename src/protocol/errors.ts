/**
 * Error taxonomy for the telemetry wire protocol.
 *
 * Only {@link MalformedFrameError} is recoverable: the offending frame has been
 * fully consumed and the stream is still aligned on a frame boundary. Every
 * other protocol error ends the session that raised it.
 *
 * @module protocol/errors
 */

/**
 * Error codes for protocol errors.
 */
export type ProtocolErrorCode =
  | 'MALFORMED_FRAME'
  | 'FRAME_TOO_LARGE'
  | 'CONNECTION_CLOSED'
  | 'WRITE_FAILURE';

/**
 * Base class for all protocol-level errors.
 */
export abstract class ProtocolError extends Error {
  abstract readonly code: ProtocolErrorCode;
}

/**
 * A frame whose payload is not valid UTF-8 or not valid JSON.
 */
export class MalformedFrameError extends ProtocolError {
  override readonly name = 'MalformedFrameError' as const;
  readonly code = 'MALFORMED_FRAME' as const;

  constructor(
    message: string,
    readonly payloadLength: number,
    override readonly cause?: unknown,
  ) {
    super(message);
  }
}

/**
 * A length prefix larger than the accepted maximum.
 */
export class FrameTooLargeError extends ProtocolError {
  override readonly name = 'FrameTooLargeError' as const;
  readonly code = 'FRAME_TOO_LARGE' as const;

  constructor(
    readonly frameLength: number,
    readonly maxFrameSize: number,
  ) {
    super(`Frame size ${frameLength} exceeds maximum ${maxFrameSize}`);
  }
}

/**
 * The stream ended before the requested number of bytes arrived.
 */
export class ConnectionClosedError extends ProtocolError {
  override readonly name = 'ConnectionClosedError' as const;
  readonly code = 'CONNECTION_CLOSED' as const;

  constructor(
    readonly bytesExpected: number,
    readonly bytesReceived: number,
    override readonly cause?: unknown,
  ) {
    super(
      bytesReceived === 0
        ? 'Connection closed'
        : `Connection closed after ${bytesReceived} of ${bytesExpected} bytes`,
    );
  }
}

/**
 * Writing a frame to the socket failed.
 */
export class WriteFailureError extends ProtocolError {
  override readonly name = 'WriteFailureError' as const;
  readonly code = 'WRITE_FAILURE' as const;

  constructor(override readonly cause?: unknown) {
    super(
      cause instanceof Error
        ? `Failed to write frame: ${cause.message}`
        : 'Failed to write frame',
    );
  }
}
