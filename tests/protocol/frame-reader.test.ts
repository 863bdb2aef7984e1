/**
 * Tests for exact-length reads over a readable stream.
 */

import { PassThrough } from 'node:stream';
import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { StreamReader } from '../../src/protocol/frame-reader.js';
import { ConnectionClosedError } from '../../src/protocol/errors.js';
import { waitFor } from '../helpers/test-helpers.js';

describe('StreamReader', () => {
  let stream: PassThrough;
  let reader: StreamReader;

  beforeEach(() => {
    stream = new PassThrough();
    reader = new StreamReader(stream);
  });

  afterEach(() => {
    reader.dispose();
    stream.destroy();
  });

  it('resolves once enough bytes have arrived across chunks', async () => {
    const read = reader.readExact(5);
    stream.write(Buffer.from('ab'));
    stream.write(Buffer.from('cd'));
    stream.write(Buffer.from('efg'));

    expect((await read).toString()).toBe('abcde');
    expect((await reader.readExact(2)).toString()).toBe('fg');
  });

  it('serves reads from bytes buffered before the call', async () => {
    stream.write(Buffer.from('hello world'));
    await new Promise((resolve) => setImmediate(resolve));

    expect((await reader.readExact(5)).toString()).toBe('hello');
    expect((await reader.readExact(6)).toString()).toBe(' world');
  });

  it('returns an empty buffer for a zero-length read', async () => {
    const bytes = await reader.readExact(0);
    expect(bytes.length).toBe(0);
  });

  it('rejects a second read while one is pending', async () => {
    const first = reader.readExact(4);
    await expect(reader.readExact(1)).rejects.toThrow(
      'StreamReader does not support concurrent reads',
    );

    stream.write(Buffer.from('1234'));
    expect((await first).toString()).toBe('1234');
  });

  it('rejects with ConnectionClosedError when the stream ends mid-read', async () => {
    const read = reader.readExact(10);
    stream.write(Buffer.from('abc'));
    stream.end();

    const error = await read.catch((e: unknown) => e);
    expect(error).toBeInstanceOf(ConnectionClosedError);
    expect(error).toMatchObject({
      bytesExpected: 10,
      bytesReceived: 3,
      message: 'Connection closed after 3 of 10 bytes',
    });
  });

  it('rejects a read issued after the end on a clean boundary', async () => {
    stream.end();
    await waitFor(() => reader.isEnded());

    const error = await reader.readExact(4).catch((e: unknown) => e);
    expect(error).toBeInstanceOf(ConnectionClosedError);
    expect(error).toMatchObject({ message: 'Connection closed' });
    expect(reader.isEnded()).toBe(true);
  });

  it('fails pending reads when disposed', async () => {
    const read = reader.readExact(4);
    reader.dispose();
    await expect(read).rejects.toBeInstanceOf(ConnectionClosedError);
  });

  it('counts every byte received', async () => {
    stream.write(Buffer.from('abcdef'));
    await reader.readExact(2);
    expect(reader.getBytesRead()).toBe(6);
  });
});
