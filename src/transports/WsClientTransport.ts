/**
 * Client transport using the `ws` package.
 *
 * Provides a single WebSocket session. The shard handles reconnection and
 * payload decoding; this transport only deals with raw frames.
 */

import { WebSocket } from 'ws';
import type { RawData } from 'ws';
import createDebug from 'debug';
import { TransportError } from '../errors.ts';
import type { ClientTransport } from './ClientTransport.ts';

const debug = createDebug('shard-gateway:ws-client-transport');

type ConnectionState = 'idle' | 'connecting' | 'connected' | 'closed';

export interface WsClientTransportOptions {
  /** Handshake timeout in milliseconds. Default: 10000 */
  handshakeTimeoutMs?: number;
  /** Largest accepted frame in bytes. Default: 100 MiB */
  maxPayload?: number;
}

function toBuffer(data: RawData): Buffer {
  if (Buffer.isBuffer(data)) return data;
  if (Array.isArray(data)) return Buffer.concat(data);
  return Buffer.from(data);
}

export class WsClientTransport implements ClientTransport {
  private _ws: WebSocket | null = null;
  private _state: ConnectionState = 'idle';
  private _handshakeTimeoutMs: number;
  private _maxPayload: number;

  private _onClose: ((code: number, reason: string) => void)[] = [];
  private _onError: ((err: Error) => void)[] = [];
  private _onMessage: ((data: string | Buffer) => void)[] = [];

  constructor(options: WsClientTransportOptions = {}) {
    this._handshakeTimeoutMs = options.handshakeTimeoutMs ?? 10000;
    this._maxPayload = options.maxPayload ?? 100 * 1024 * 1024;
  }

  get connected(): boolean {
    return this._state === 'connected';
  }

  onClose(cb: (code: number, reason: string) => void): void {
    this._onClose.push(cb);
  }
  onError(cb: (err: Error) => void): void {
    this._onError.push(cb);
  }
  onMessage(cb: (data: string | Buffer) => void): void {
    this._onMessage.push(cb);
  }

  connect(url: string): Promise<void> {
    if (this._state !== 'idle') {
      return Promise.reject(new TransportError(`Transport already used (state: ${this._state})`));
    }

    return new Promise((resolve, reject) => {
      let settled = false;
      let opened = false;
      const finish = (err?: Error) => {
        if (settled) return;
        settled = true;
        if (err) reject(err);
        else resolve();
      };

      this._state = 'connecting';
      debug('Connecting to %s', url);

      const ws = new WebSocket(url, {
        handshakeTimeout: this._handshakeTimeoutMs,
        maxPayload: this._maxPayload,
        perMessageDeflate: false,
      });
      this._ws = ws;

      ws.on('open', () => {
        this._state = 'connected';
        opened = true;
        debug('Connected to %s', url);
        finish();
      });

      ws.on('message', (data: RawData, isBinary: boolean) => {
        const payload = isBinary ? toBuffer(data) : toBuffer(data).toString('utf8');
        for (const cb of this._onMessage) cb(payload);
      });

      ws.on('close', (code: number, reason: Buffer) => {
        this._state = 'closed';
        this._ws = null;
        const reasonText = reason.toString();
        debug('Disconnected from %s (code: %d)', url, code);

        // If we never connected, treat as failure for the connect() Promise.
        if (!settled) {
          finish(new TransportError(`WebSocket closed before open (code: ${code})`));
        }
        if (opened) {
          for (const cb of this._onClose) cb(code, reasonText);
        }
      });

      ws.on('error', (err: Error) => {
        debug('WebSocket error on %s: %o', url, err);

        if (!settled) {
          finish(new TransportError(`WebSocket handshake failed: ${err.message}`));
          return;
        }

        for (const cb of this._onError) cb(err);
      });
    });
  }

  send(text: string): void {
    if (!this._ws || this._state !== 'connected') {
      throw new TransportError('Cannot send, not connected');
    }
    this._ws.send(text);
  }

  close(code = 1000, reason = ''): void {
    if (this._ws) {
      if (this._state === 'connecting') {
        this._ws.terminate();
      } else {
        this._ws.close(code, reason);
      }
    }
    this._state = 'closed';
  }
}
