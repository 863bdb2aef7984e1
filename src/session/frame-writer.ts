/**
 * Single-writer queue for outbound frames.
 *
 * Every frame is encoded into one buffer and handed to the socket only after
 * the previous frame's write callback has fired, so frames from the sender
 * loop and the command dispatcher never interleave and leave in enqueue order.
 *
 * @module session/frame-writer
 */

import type { Writable } from 'node:stream';
import type { Envelope } from '../protocol/envelope.js';
import { encodeFrame } from '../protocol/frame-codec.js';
import { WriteFailureError } from '../protocol/errors.js';

/**
 * Counters for a {@link FrameWriter}.
 */
export interface FrameWriterStats {
  readonly framesWritten: number;
  readonly bytesWritten: number;
  readonly queued: number;
  readonly failed: boolean;
  readonly lastWrittenAt: number | null;
}

/**
 * Serializes frame writes onto a writable stream.
 *
 * After the first failed write the writer is poisoned: queued and future
 * writes reject with the same {@link WriteFailureError}.
 */
export class FrameWriter {
  private tail: Promise<void> = Promise.resolve();
  private failure: WriteFailureError | null = null;
  private queued = 0;

  private framesWritten = 0;
  private bytesWritten = 0;
  private lastWrittenAt: number | null = null;

  constructor(private readonly stream: Writable) {}

  /**
   * Enqueues one envelope.
   *
   * @returns Promise that resolves once the frame has been flushed to the stream
   * @throws {WriteFailureError} If this or an earlier write failed
   */
  write(envelope: Envelope): Promise<void> {
    if (this.failure) {
      return Promise.reject(this.failure);
    }

    const frame = encodeFrame(envelope);
    this.queued++;

    const run = this.tail.then(() => this.writeFrame(frame));
    this.tail = run.then(
      () => {
        this.queued--;
      },
      () => {
        this.queued--;
      },
    );
    return run;
  }

  /**
   * Resolves when every frame enqueued so far has been written or rejected.
   */
  flush(): Promise<void> {
    return this.tail;
  }

  /**
   * Returns whether a write has failed.
   */
  hasFailed(): boolean {
    return this.failure !== null;
  }

  /**
   * Returns the error every write rejects with once the writer has failed.
   */
  getFailure(): WriteFailureError | null {
    return this.failure;
  }

  getStats(): FrameWriterStats {
    return {
      framesWritten: this.framesWritten,
      bytesWritten: this.bytesWritten,
      queued: this.queued,
      failed: this.failure !== null,
      lastWrittenAt: this.lastWrittenAt,
    };
  }

  // ===========================================================================
  // Private Methods
  // ===========================================================================

  private writeFrame(frame: Buffer): Promise<void> {
    if (this.failure) {
      return Promise.reject(this.failure);
    }

    if (this.stream.destroyed || this.stream.writableEnded) {
      return Promise.reject(this.fail(new Error('Stream is closed')));
    }

    return new Promise<void>((resolve, reject) => {
      this.stream.write(frame, (err) => {
        if (err) {
          reject(this.fail(err));
          return;
        }

        this.framesWritten++;
        this.bytesWritten += frame.length;
        this.lastWrittenAt = Date.now();
        resolve();
      });
    });
  }

  private fail(cause: unknown): WriteFailureError {
    if (!this.failure) {
      this.failure = new WriteFailureError(cause);
    }
    return this.failure;
  }
}
