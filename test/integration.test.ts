/**
 * End-to-end tests over real WebSockets against an in-process server.
 */

import { describe, it, afterEach } from 'node:test';
import assert from 'node:assert';
import { WebSocketServer } from 'ws';
import type { RawData, WebSocket } from 'ws';
import { GatewayManager } from '../src/GatewayManager.ts';
import type { FatalError } from '../src/errors.ts';
import type { DispatchEvent, GatewayManagerOptions } from '../src/types.ts';
import { StreamDeflater, createCaptureLogger, waitUntil } from './helpers.ts';

interface ServerConnection {
  url: string;
  socket: WebSocket;
  received: { op: number; d: unknown }[];
  closeCode: number | null;
  send: (payload: object) => Promise<void>;
}

interface TestServer {
  url: string;
  connections: ServerConnection[];
  close: () => Promise<void>;
}

interface TestServerOptions {
  compress?: boolean;
  /** Close with this code instead of answering Identify. */
  rejectIdentifyWith?: number;
}

function toText(data: RawData): string {
  if (Buffer.isBuffer(data)) return data.toString('utf8');
  if (Array.isArray(data)) return Buffer.concat(data).toString('utf8');
  return Buffer.from(data).toString('utf8');
}

function field(d: unknown, key: string): unknown {
  if (typeof d === 'object' && d !== null && key in d) {
    return Object.entries(d).find(([k]) => k === key)?.[1];
  }
  return undefined;
}

async function startServer(options: TestServerOptions = {}): Promise<TestServer> {
  const wss = new WebSocketServer({ host: '127.0.0.1', port: 0 });
  await new Promise<void>((resolve) => wss.once('listening', () => resolve()));

  const address = wss.address();
  if (typeof address === 'string') throw new Error(`unexpected address ${address}`);
  const url = `ws://127.0.0.1:${address.port}`;
  const connections: ServerConnection[] = [];

  wss.on('connection', (socket, request) => {
    const deflater = options.compress ? new StreamDeflater() : null;
    const conn: ServerConnection = {
      url: request.url ?? '',
      socket,
      received: [],
      closeCode: null,
      send: async (payload) => {
        const text = JSON.stringify(payload);
        socket.send(deflater ? await deflater.compress(text) : text);
      },
    };
    connections.push(conn);

    socket.on('close', (code: number) => {
      conn.closeCode = code;
      deflater?.close();
    });

    socket.on('message', (data: RawData) => {
      const frame: unknown = JSON.parse(toText(data));
      const op = field(frame, 'op');
      const d = field(frame, 'd');
      if (typeof op !== 'number') return;
      conn.received.push({ op, d });

      if (op === 1) {
        void conn.send({ op: 11 });
      } else if (op === 2) {
        if (options.rejectIdentifyWith) {
          socket.close(options.rejectIdentifyWith, 'Authentication failed.');
          return;
        }
        void conn.send({
          op: 0,
          s: 1,
          t: 'READY',
          d: { v: 10, session_id: 'integration-session', resume_gateway_url: url, user: { id: '1000' } },
        });
      } else if (op === 6) {
        const seq = field(d, 'seq');
        void conn.send({ op: 0, s: (typeof seq === 'number' ? seq : 0) + 1, t: 'RESUMED', d: null });
      }
    });

    void conn.send({ op: 10, d: { heartbeat_interval: 45000 } });
  });

  return {
    url,
    connections,
    close: () =>
      new Promise<void>((resolve) => {
        for (const client of wss.clients) client.terminate();
        wss.close(() => resolve());
      }),
  };
}

describe('Integration over ws', () => {
  let server: TestServer | null = null;
  let manager: GatewayManager | null = null;

  afterEach(async () => {
    manager?.disconnect();
    manager = null;
    await server?.close();
    server = null;
  });

  function createManager(url: string, overrides: Partial<GatewayManagerOptions> = {}): GatewayManager {
    const m = new GatewayManager({
      token: 'test-token',
      intents: 513,
      gateway: {
        url,
        shards: 1,
        session_start_limit: { total: 1000, remaining: 1000, reset_after: 0, max_concurrency: 1 },
      },
      random: () => 0,
      backoff: { minDelayMs: 5, maxDelayMs: 20 },
      logger: createCaptureLogger().logger,
      ...overrides,
    });
    manager = m;
    return m;
  }

  async function nextEvent(stream: AsyncIterableIterator<DispatchEvent>): Promise<DispatchEvent> {
    const next = await stream.next();
    if (next.done) throw new Error('stream ended');
    return next.value;
  }

  it('should identify, receive dispatches and resume after a server close', async () => {
    const s = await startServer();
    server = s;
    const m = createManager(s.url);
    const events = m.makeEventsStream();

    await m.connect();
    assert.strictEqual(m.state, 'ready');
    assert.strictEqual(s.connections[0]?.url, '/?v=10&encoding=json');
    assert.strictEqual((await nextEvent(events)).type, 'READY');

    const identify = s.connections[0]?.received.find((f) => f.op === 2);
    assert.strictEqual(field(identify?.d, 'token'), 'test-token');
    assert.deepStrictEqual(field(identify?.d, 'shard'), [0, 1]);

    await s.connections[0]?.send({ op: 0, s: 2, t: 'MESSAGE_CREATE', d: { content: 'hi' } });
    const message = await nextEvent(events);
    assert.strictEqual(message.type, 'MESSAGE_CREATE');
    assert.strictEqual(message.sequence, 2);
    assert.deepStrictEqual(message.data, { content: 'hi' });

    s.connections[0]?.socket.close(4000, 'unknown error');
    const resumed = await nextEvent(events);
    assert.strictEqual(resumed.type, 'RESUMED');
    assert.strictEqual(resumed.sequence, 3);

    const resume = s.connections[1]?.received.find((f) => f.op === 6);
    assert.deepStrictEqual(resume?.d, { token: 'test-token', session_id: 'integration-session', seq: 2 });
    assert.strictEqual(s.connections[1]?.received.some((f) => f.op === 2), false);

    m.disconnect();
    await waitUntil(() => s.connections[1]?.closeCode === 1000);
    assert.deepStrictEqual(await events.next(), { value: undefined, done: true });
  });

  it('should speak zlib-stream when compression is on', async () => {
    const s = await startServer({ compress: true });
    server = s;
    const m = createManager(s.url, { compress: true });
    const events = m.makeEventsStream();

    await m.connect();
    assert.strictEqual(s.connections[0]?.url, '/?v=10&encoding=json&compress=zlib-stream');
    assert.strictEqual((await nextEvent(events)).type, 'READY');

    await s.connections[0]?.send({ op: 0, s: 2, t: 'GUILD_CREATE', d: { id: '42' } });
    const guild = await nextEvent(events);
    assert.deepStrictEqual(guild.data, { id: '42' });
  });

  it('should stop on a fatal close code', async () => {
    const s = await startServer({ rejectIdentifyWith: 4004 });
    server = s;
    const m = createManager(s.url);
    const fatals: FatalError[] = [];
    m.on('fatal', (_index: number, err: FatalError) => fatals.push(err));

    await m.connect();
    assert.strictEqual(m.state, 'stopped');
    assert.strictEqual(fatals[0]?.closeCode, 4004);
    assert.strictEqual(fatals[0]?.reason, 'Authentication failed.');
    assert.strictEqual(s.connections.length, 1);
  });
});
