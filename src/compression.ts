/**
 * zlib-stream decompression.
 *
 * With transport compression the service deflates the whole connection as one
 * stream and flushes it at the end of every message. One inflate context lives
 * for the lifetime of a connection; a frame that does not end with the flush
 * marker is only part of a message.
 */

import { createInflate, constants } from 'node:zlib';
import type { Inflate } from 'node:zlib';
import createDebug from 'debug';
import { ProtocolError } from './errors.ts';

const debug = createDebug('shard-gateway:compression');

const ZLIB_SUFFIX = Buffer.from([0x00, 0x00, 0xff, 0xff]);

export class ZlibStreamInflater {
  private _inflate: Inflate;
  private _pending: Buffer[] = [];
  private _output: Buffer[] = [];
  private _error: Error | null = null;
  private _closed = false;
  private _tail: Promise<unknown> = Promise.resolve();

  constructor() {
    this._inflate = createInflate({ chunkSize: 64 * 1024 });
    this._inflate.on('data', (chunk: Buffer) => {
      this._output.push(chunk);
    });
    this._inflate.on('error', (err: Error) => {
      debug('inflate error: %o', err);
      this._error = err;
    });
  }

  /**
   * Feed one frame. Frames must be pushed in arrival order; concurrent calls
   * are queued behind each other.
   *
   * @returns The decompressed message once a frame completes it, otherwise `null`
   * @throws ProtocolError if the stream is corrupt or the inflater was closed
   */
  push(chunk: Buffer): Promise<string | null> {
    const result = this._tail.then(() => this._process(chunk));
    this._tail = result.catch(() => undefined);
    return result;
  }

  close(): void {
    if (this._closed) return;
    this._closed = true;
    this._pending = [];
    this._output = [];
    this._inflate.close();
  }

  private async _process(chunk: Buffer): Promise<string | null> {
    if (this._closed) throw new ProtocolError('Inflater closed');
    if (this._error) throw new ProtocolError(`Corrupt compressed stream: ${this._error.message}`);

    this._pending.push(chunk);
    if (!endsWithSuffix(chunk)) return null;

    const input = Buffer.concat(this._pending);
    this._pending = [];

    // A failed write may never call back, so an error also ends the wait.
    await new Promise<void>((resolve) => {
      const done = () => {
        this._inflate.off('error', done);
        resolve();
      };
      this._inflate.once('error', done);
      this._inflate.write(input);
      this._inflate.flush(constants.Z_SYNC_FLUSH, done);
    });

    if (this._error) throw new ProtocolError(`Corrupt compressed stream: ${this._error.message}`);

    const output = Buffer.concat(this._output).toString('utf8');
    this._output = [];
    return output;
  }
}

function endsWithSuffix(chunk: Buffer): boolean {
  if (chunk.length < ZLIB_SUFFIX.length) return false;
  return chunk.subarray(chunk.length - ZLIB_SUFFIX.length).equals(ZLIB_SUFFIX);
}
