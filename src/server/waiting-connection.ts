/**
 * A client that is connected but not yet served.
 *
 * The socket is read while it waits so that a disconnect is noticed.
 * Anything the client sends in the meantime is kept and put back into the
 * socket's read buffer when the session takes it over.
 *
 * @module server/waiting-connection
 */

import type { Socket } from 'node:net';

/**
 * Why a waiting client was dropped.
 */
export type WaitingDropReason = 'disconnected' | 'overflow';

export class WaitingConnection {
  private readonly early: Buffer[] = [];
  private earlyBytes = 0;
  private watching = false;

  constructor(
    readonly socket: Socket,
    readonly peer: string,
    private readonly maxEarlyBytes: number,
    private readonly onDrop: (waiting: WaitingConnection, reason: WaitingDropReason) => void,
  ) {}

  /**
   * Bytes received while waiting.
   */
  getEarlyBytes(): number {
    return this.earlyBytes;
  }

  /**
   * Starts reading the socket until {@link release} is called.
   */
  watch(): void {
    if (this.watching) return;
    this.watching = true;
    this.socket.on('data', this.onData);
    this.socket.on('end', this.onGone);
    this.socket.on('close', this.onGone);
    this.socket.resume();
  }

  /**
   * Stops watching and returns the paused socket with its early bytes
   * unread again.
   */
  release(): Socket {
    if (this.watching) {
      this.watching = false;
      this.socket.off('data', this.onData);
      this.socket.off('end', this.onGone);
      this.socket.off('close', this.onGone);
      this.socket.pause();
    }
    if (this.early.length > 0) {
      this.socket.unshift(Buffer.concat(this.early));
      this.early.length = 0;
    }
    return this.socket;
  }

  private readonly onData = (chunk: Buffer | string): void => {
    const bytes = typeof chunk === 'string' ? Buffer.from(chunk, 'utf-8') : chunk;
    this.early.push(bytes);
    this.earlyBytes += bytes.length;
    if (this.earlyBytes > this.maxEarlyBytes) {
      this.onDrop(this, 'overflow');
    }
  };

  private readonly onGone = (): void => {
    this.onDrop(this, 'disconnected');
  };
}
