/**
 * Frame codec for the telemetry protocol.
 *
 * Wire format:
 * [4 bytes: payload length (big-endian uint32)][UTF-8 JSON payload]
 *
 * The length counts payload bytes only, not the prefix.
 *
 * @module protocol/frame-codec
 */

import type { Envelope } from './envelope.js';
import { FrameTooLargeError, MalformedFrameError } from './errors.js';

// =============================================================================
// Constants
// =============================================================================

/**
 * Length of the payload length prefix in bytes.
 */
export const LENGTH_PREFIX_SIZE = 4;

/**
 * Maximum accepted payload size in bytes (1MB).
 */
export const MAX_FRAME_SIZE = 1024 * 1024;

// =============================================================================
// Byte Source
// =============================================================================

/**
 * Anything that can deliver an exact number of bytes.
 *
 * `readExact` resolves only once `length` bytes are available and rejects with
 * {@link ConnectionClosedError} when the stream ends first.
 */
export interface ByteSource {
  readExact(length: number): Promise<Buffer>;
}

// =============================================================================
// Encoding
// =============================================================================

/**
 * Encodes an envelope as a single framed buffer.
 */
export function encodeFrame(envelope: Envelope): Buffer {
  const payload = Buffer.from(JSON.stringify(envelope), 'utf-8');
  const frame = Buffer.alloc(LENGTH_PREFIX_SIZE + payload.length);
  frame.writeUInt32BE(payload.length, 0);
  payload.copy(frame, LENGTH_PREFIX_SIZE);
  return frame;
}

// =============================================================================
// Decoding
// =============================================================================

const strictUtf8 = new TextDecoder('utf-8', { fatal: true });

/**
 * Parses a frame payload.
 *
 * Invalid UTF-8 is rejected rather than replaced, so a corrupted payload never
 * turns into a plausible-looking string.
 *
 * @throws {MalformedFrameError} If the payload is not valid UTF-8 or not valid JSON
 */
export function decodePayload(payload: Uint8Array): unknown {
  let text: string;
  try {
    text = strictUtf8.decode(payload);
  } catch (error) {
    throw new MalformedFrameError('Invalid UTF-8 in frame payload', payload.length, error);
  }

  try {
    return JSON.parse(text) as unknown;
  } catch (error) {
    throw new MalformedFrameError('Invalid JSON in frame payload', payload.length, error);
  }
}

/**
 * Result of {@link parseFrame}.
 */
export type ParseFrameResult =
  | { readonly complete: false }
  | { readonly complete: true; readonly value: unknown; readonly bytesConsumed: number };

/**
 * Parses one frame from the start of an accumulation buffer.
 *
 * Used by push-style consumers that collect `data` chunks themselves. When the
 * payload is malformed, the caller skips `LENGTH_PREFIX_SIZE + error.payloadLength`
 * bytes to reach the next frame.
 *
 * @throws {MalformedFrameError} If a complete payload cannot be parsed
 * @throws {FrameTooLargeError} If the length prefix exceeds `maxFrameSize`
 */
export function parseFrame(
  buffer: Buffer,
  maxFrameSize: number = MAX_FRAME_SIZE,
): ParseFrameResult {
  if (buffer.length < LENGTH_PREFIX_SIZE) {
    return { complete: false };
  }

  const length = buffer.readUInt32BE(0);
  if (length > maxFrameSize) {
    throw new FrameTooLargeError(length, maxFrameSize);
  }

  const total = LENGTH_PREFIX_SIZE + length;
  if (buffer.length < total) {
    return { complete: false };
  }

  const value = decodePayload(buffer.subarray(LENGTH_PREFIX_SIZE, total));
  return { complete: true, value, bytesConsumed: total };
}

/**
 * Reads one frame from `source` and returns its parsed payload.
 *
 * The payload is consumed in full before parsing, so after a
 * {@link MalformedFrameError} the source is positioned at the next frame.
 *
 * @throws {MalformedFrameError} If the payload cannot be parsed (recoverable)
 * @throws {FrameTooLargeError} If the length prefix exceeds `maxFrameSize`
 * @throws {ConnectionClosedError} If the stream ends mid-frame or between frames
 */
export async function decodeOne(
  source: ByteSource,
  maxFrameSize: number = MAX_FRAME_SIZE,
): Promise<unknown> {
  const prefix = await source.readExact(LENGTH_PREFIX_SIZE);
  const length = prefix.readUInt32BE(0);

  if (length > maxFrameSize) {
    throw new FrameTooLargeError(length, maxFrameSize);
  }

  const payload = await source.readExact(length);
  return decodePayload(payload);
}
