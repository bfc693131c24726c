/**
 * Test utilities: in-process transports, a scripted gateway and polling helpers.
 */

import { createDeflate, constants } from 'node:zlib';
import type { Deflate } from 'node:zlib';
import { format } from 'node:util';
import type { Logger, LogLevel } from '../src/logger.ts';
import type { ClientTransport } from '../src/transports/ClientTransport.ts';
import { TransportError } from '../src/errors.ts';

/**
 * Promise-based delay.
 */
export function delay(ms: number): Promise<void> {
  return new Promise((resolve) => setTimeout(resolve, ms));
}

/**
 * Wait until a condition becomes true, with polling and timeout.
 *
 * @param timeout - Maximum time to wait in milliseconds (default: 5000)
 * @param pollInterval - How often to check in milliseconds (default: 5)
 */
export async function waitUntil(condition: () => boolean, timeout = 5000, pollInterval = 5): Promise<void> {
  const start = Date.now();
  while (!condition()) {
    if (Date.now() - start > timeout) {
      throw new Error(`Timeout waiting for condition after ${timeout}ms`);
    }
    await delay(pollInterval);
  }
}

export interface SentFrame {
  op: number;
  d: unknown;
}

function parseFrame(text: string): SentFrame {
  const parsed: unknown = JSON.parse(text);
  if (typeof parsed !== 'object' || parsed === null || !('op' in parsed) || typeof parsed.op !== 'number') {
    throw new Error(`Not a gateway frame: ${text}`);
  }
  return { op: parsed.op, d: 'd' in parsed ? parsed.d : undefined };
}

export interface FakeTransportOptions {
  /** Reject connect() with a TransportError instead of opening. */
  failConnect?: boolean;
  /** Called once the transport is open. */
  onOpen?: (transport: FakeTransport) => void;
  /** Called for every frame the client writes. */
  onSend?: (transport: FakeTransport, frame: SentFrame) => void;
}

/**
 * In-memory transport. The test plays the service through `serverSend` and
 * `serverClose`; everything the client writes is kept in `sent`.
 */
export class FakeTransport implements ClientTransport {
  url: string | null = null;
  sent: string[] = [];
  closedWith: { code: number; reason: string } | null = null;

  private _connected = false;
  private _options: FakeTransportOptions;
  private _onClose: ((code: number, reason: string) => void)[] = [];
  private _onError: ((err: Error) => void)[] = [];
  private _onMessage: ((data: string | Buffer) => void)[] = [];

  constructor(options: FakeTransportOptions = {}) {
    this._options = options;
  }

  get connected(): boolean {
    return this._connected;
  }

  connect(url: string): Promise<void> {
    this.url = url;
    if (this._options.failConnect) {
      return Promise.reject(new TransportError('connection refused'));
    }
    this._connected = true;
    const onOpen = this._options.onOpen;
    if (onOpen) {
      setImmediate(() => {
        if (this._connected) onOpen(this);
      });
    }
    return Promise.resolve();
  }

  close(code = 1000, reason = ''): void {
    if (this.closedWith === null) this.closedWith = { code, reason };
    this._connected = false;
  }

  send(text: string): void {
    if (!this._connected) {
      throw new TransportError('Cannot send, not connected');
    }
    this.sent.push(text);
    this._options.onSend?.(this, parseFrame(text));
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

  /**
   * Deliver a frame as if the service sent it. Works after close too, to
   * simulate frames that were already in flight.
   */
  serverSend(payload: object): void {
    this.serverSendRaw(JSON.stringify(payload));
  }

  serverSendRaw(data: string | Buffer): void {
    for (const cb of this._onMessage) cb(data);
  }

  serverClose(code: number, reason = ''): void {
    this._connected = false;
    for (const cb of this._onClose) cb(code, reason);
  }

  frames(): SentFrame[] {
    return this.sent.map(parseFrame);
  }

  framesWithOp(op: number): SentFrame[] {
    return this.frames().filter((f) => f.op === op);
  }
}

/**
 * Transport factory that records every transport it hands out.
 *
 * @param perAttempt - Options for the n-th transport; the last entry repeats
 */
export function createTransportFactory(perAttempt: FakeTransportOptions[] = [{}]) {
  const transports: FakeTransport[] = [];
  const factory = (): ClientTransport => {
    const options = perAttempt[Math.min(transports.length, perAttempt.length - 1)] ?? {};
    const transport = new FakeTransport(options);
    transports.push(transport);
    return transport;
  };
  return { factory, transports };
}

export interface GatewayIdentify {
  shard: number;
  at: number;
  transport: FakeTransport;
}

/**
 * Scripted service: Hello on open, READY for Identify, RESUMED for Resume and
 * an ack for every heartbeat.
 */
export class FakeGateway {
  transports: FakeTransport[] = [];
  identifies: GatewayIdentify[] = [];
  resumes: { sessionId: string; seq: number | null }[] = [];
  heartbeatIntervalMs = 45000;
  resumeUrl = 'wss://resume.test';

  readonly factory = (): ClientTransport => {
    const transport = new FakeTransport({
      onOpen: (t) => t.serverSend({ op: 10, d: { heartbeat_interval: this.heartbeatIntervalMs } }),
      onSend: (t, frame) => this._respond(t, frame),
    });
    this.transports.push(transport);
    return transport;
  };

  /**
   * The transport that most recently identified as `shard`.
   */
  transportFor(shard: number): FakeTransport | undefined {
    const matches = this.identifies.filter((i) => i.shard === shard);
    return matches[matches.length - 1]?.transport;
  }

  private _respond(transport: FakeTransport, frame: SentFrame): void {
    const d = frame.d;
    switch (frame.op) {
      case 1:
        setImmediate(() => transport.serverSend({ op: 11 }));
        return;
      case 2: {
        const shard = readShardIndex(d);
        this.identifies.push({ shard, at: Date.now(), transport });
        setImmediate(() =>
          transport.serverSend({
            op: 0,
            s: 1,
            t: 'READY',
            d: {
              v: 10,
              session_id: `session-${shard}`,
              resume_gateway_url: this.resumeUrl,
              user: { id: '1000' },
            },
          })
        );
        return;
      }
      case 6: {
        const resume = readResume(d);
        this.resumes.push(resume);
        setImmediate(() => transport.serverSend({ op: 0, s: (resume.seq ?? 0) + 1, t: 'RESUMED', d: null }));
        return;
      }
    }
  }
}

function readShardIndex(d: unknown): number {
  if (typeof d === 'object' && d !== null && 'shard' in d && Array.isArray(d.shard)) {
    const index: unknown = d.shard[0];
    if (typeof index === 'number') return index;
  }
  throw new Error('Identify without shard');
}

function readResume(d: unknown): { sessionId: string; seq: number | null } {
  if (typeof d === 'object' && d !== null && 'session_id' in d && typeof d.session_id === 'string') {
    const seq = 'seq' in d && typeof d.seq === 'number' ? d.seq : null;
    return { sessionId: d.session_id, seq };
  }
  throw new Error('Resume without session_id');
}

/**
 * Logger that keeps formatted lines instead of printing them.
 */
export function createCaptureLogger() {
  const lines: { level: LogLevel; text: string }[] = [];
  const make = (level: LogLevel) => (formatter: string, ...args: unknown[]) => {
    lines.push({ level, text: format(formatter, ...args) });
  };
  const logger: Logger = {
    debug: make('debug'),
    info: make('info'),
    warn: make('warn'),
    error: make('error'),
    critical: make('critical'),
  };
  return { logger, lines };
}

/**
 * One zlib-stream context, the service side of transport compression.
 */
export class StreamDeflater {
  private _deflate: Deflate;
  private _chunks: Buffer[] = [];

  constructor() {
    this._deflate = createDeflate();
    this._deflate.on('data', (chunk: Buffer) => this._chunks.push(chunk));
  }

  /**
   * Compress one message and flush, so the output ends with the flush marker.
   */
  compress(text: string): Promise<Buffer> {
    return new Promise((resolve) => {
      this._deflate.write(text);
      this._deflate.flush(constants.Z_SYNC_FLUSH, () => {
        const out = Buffer.concat(this._chunks);
        this._chunks = [];
        resolve(out);
      });
    });
  }

  close(): void {
    this._deflate.close();
  }
}
