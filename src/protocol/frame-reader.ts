/**
 * Exact-length reads over a Node.js readable stream.
 *
 * Incoming chunks are buffered as they arrive; {@link StreamReader.readExact}
 * resolves once enough bytes have accumulated, regardless of how the transport
 * split them. Only one read may be outstanding at a time.
 *
 * @module protocol/frame-reader
 */

import type { Readable } from 'node:stream';
import type { ByteSource } from './frame-codec.js';
import { ConnectionClosedError } from './errors.js';

/**
 * Buffered bytes above which the stream is paused until the reader catches up.
 */
const HIGH_WATER_MARK = 256 * 1024;

interface PendingRead {
  readonly length: number;
  readonly resolve: (bytes: Buffer) => void;
  readonly reject: (error: Error) => void;
}

/**
 * {@link ByteSource} backed by a readable stream such as a `net.Socket`.
 *
 * @example
 * ```typescript
 * const reader = new StreamReader(socket);
 * const envelope = await decodeOne(reader);
 * ```
 */
export class StreamReader implements ByteSource {
  private chunks: Buffer[] = [];
  private buffered = 0;
  private pending: PendingRead | null = null;
  private ended = false;
  private endCause: unknown = undefined;
  private bytesRead = 0;

  private readonly onData = (chunk: Buffer | string): void => {
    const bytes = typeof chunk === 'string' ? Buffer.from(chunk, 'utf-8') : chunk;
    this.chunks.push(bytes);
    this.buffered += bytes.length;
    this.bytesRead += bytes.length;

    this.settle();

    if (!this.pending && this.buffered >= HIGH_WATER_MARK) {
      this.stream.pause();
    }
  };

  private readonly onEnd = (): void => {
    this.finish(undefined);
  };

  private readonly onError = (error: Error): void => {
    this.finish(error);
  };

  constructor(private readonly stream: Readable) {
    stream.on('data', this.onData);
    stream.on('end', this.onEnd);
    stream.on('close', this.onEnd);
    stream.on('error', this.onError);
    stream.resume();
  }

  /**
   * Total bytes received from the stream so far.
   */
  getBytesRead(): number {
    return this.bytesRead;
  }

  /**
   * Returns whether the underlying stream has ended.
   */
  isEnded(): boolean {
    return this.ended;
  }

  /**
   * Resolves with exactly `length` bytes.
   *
   * @throws {ConnectionClosedError} If the stream ends before `length` bytes arrive
   * @throws {Error} If another read is still pending
   */
  readExact(length: number): Promise<Buffer> {
    if (this.pending) {
      return Promise.reject(new Error('StreamReader does not support concurrent reads'));
    }

    if (length === 0) {
      return Promise.resolve(Buffer.alloc(0));
    }

    return new Promise<Buffer>((resolve, reject) => {
      this.pending = { length, resolve, reject };
      this.settle();
      if (this.pending && this.stream.isPaused()) {
        this.stream.resume();
      }
    });
  }

  /**
   * Detaches from the stream. Pending and future reads fail as closed.
   */
  dispose(): void {
    this.stream.off('data', this.onData);
    this.stream.off('end', this.onEnd);
    this.stream.off('close', this.onEnd);
    this.stream.off('error', this.onError);
    this.finish(undefined);
  }

  // ===========================================================================
  // Private Methods
  // ===========================================================================

  private settle(): void {
    const pending = this.pending;
    if (!pending) return;

    if (this.buffered >= pending.length) {
      this.pending = null;
      pending.resolve(this.take(pending.length));
      return;
    }

    if (this.ended) {
      this.pending = null;
      pending.reject(new ConnectionClosedError(pending.length, this.buffered, this.endCause));
    }
  }

  private finish(cause: unknown): void {
    if (this.ended) return;
    this.ended = true;
    this.endCause = cause;
    this.settle();
  }

  private take(length: number): Buffer {
    const joined = this.chunks.length === 1 ? this.chunks[0] ?? Buffer.alloc(0) : Buffer.concat(this.chunks);
    const result = joined.subarray(0, length);
    const rest = joined.subarray(length);

    this.chunks = rest.length > 0 ? [rest] : [];
    this.buffered = rest.length;
    return result;
  }
}
