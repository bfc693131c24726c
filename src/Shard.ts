/**
 * Shard class - one gateway connection.
 *
 * Owns a transport, runs the protocol state machine, the heartbeat loop and the
 * session used for resuming. Every connection attempt gets a new connection id;
 * frames, closes and timers belonging to an older id are ignored.
 */

import { EventEmitter } from 'events';
import { Backoff } from './Backoff.ts';
import { CloseCode, classifyCloseCode, describeCloseCode } from './closeCodes.ts';
import type { CloseClass } from './closeCodes.ts';
import { buildGatewayUrl, decodePayload, decodeReady, encodePayload } from './codec.ts';
import { ZlibStreamInflater } from './compression.ts';
import {
  CancelledError,
  ConnectionError,
  FatalError,
  NotReadyError,
  SessionError,
  TransportError,
  closeClassForError,
} from './errors.ts';
import { Heartbeat } from './Heartbeat.ts';
import { delay, randomBetween } from './helpers.ts';
import type { IdentifyRateLimiter } from './IdentifyRateLimiter.ts';
import { createLogger, prefixLogger } from './logger.ts';
import type { Logger } from './logger.ts';
import { SendQueue } from './SendQueue.ts';
import type { ClientTransport } from './transports/ClientTransport.ts';
import { WsClientTransport } from './transports/WsClientTransport.ts';
import type {
  ConnectionState,
  DispatchEvent,
  SessionInfo,
  ShardDescriptor,
  ShardOptions,
} from './types.ts';
import { Opcode } from './wire.ts';
import type {
  DispatchPayload,
  GatewayCommand,
  IdentifyData,
  IdentifyProperties,
  InboundPayload,
  PresenceUpdate,
  RequestGuildMembers,
  VoiceStateUpdate,
} from './wire.ts';

/**
 * Events emitted by Shard
 */
export interface ShardEvents {
  state: [state: ConnectionState, previous: ConnectionState];
  fatal: [error: FatalError];
  sessionInvalidated: [error: SessionError];
}

const DEFAULT_PROPERTIES: IdentifyProperties = {
  os: process.platform,
  browser: 'shard-gateway',
  device: 'shard-gateway',
};

export class Shard extends EventEmitter<ShardEvents> {
  private _token: string;
  private _intents: number;
  private _descriptor: ShardDescriptor;
  private _gatewayUrl: string;
  private _version: number;
  private _compress: boolean;
  private _presence: PresenceUpdate | undefined;
  private _largeThreshold: number | undefined;
  private _properties: IdentifyProperties;
  private _connectTimeoutMs: number;
  private _readyResetIntervals: number;
  private _invalidSessionDelayMs: [number, number];
  private _random: () => number;
  private _createTransport: () => ClientTransport;
  private _limiter: IdentifyRateLimiter;
  private _log: Logger;
  private _onDispatch: ShardOptions['onDispatch'];

  private _state: ConnectionState = 'noSession';
  private _connectionId = 0;
  private _transport: ClientTransport | null = null;
  private _abort: AbortController | null = null;
  private _inflater: ZlibStreamInflater | null = null;
  private _receiveChain: Promise<void> = Promise.resolve();

  // Session
  private _sessionId: string | null = null;
  private _resumeUrl: string | null = null;
  private _sequence: number | null = null;
  private _canResume = false;

  // Timers
  private _connectTimer: ReturnType<typeof setTimeout> | null = null;
  private _reconnectTimer: ReturnType<typeof setTimeout> | null = null;
  private _stableTimer: ReturnType<typeof setTimeout> | null = null;

  private _backoff: Backoff;
  private _heartbeat: Heartbeat;
  private _sendQueue: SendQueue;
  private _connectWaiters: (() => void)[] = [];

  constructor(options: ShardOptions) {
    super();
    const { index, count } = options.shard;
    if (!Number.isInteger(index) || !Number.isInteger(count) || index < 0 || index >= count) {
      throw new RangeError(`Invalid shard [${index}, ${count}]`);
    }

    this._token = options.token;
    this._intents = options.intents;
    this._descriptor = { index, count };
    this._gatewayUrl = options.gatewayUrl;
    this._version = options.version ?? 10;
    this._compress = options.compress ?? false;
    this._presence = options.presence;
    this._largeThreshold = options.largeThreshold;
    this._properties = options.properties ?? DEFAULT_PROPERTIES;
    this._connectTimeoutMs = options.connectTimeoutMs ?? 10000;
    this._readyResetIntervals = options.readyResetIntervals ?? 3;
    this._invalidSessionDelayMs = options.invalidSessionDelayMs ?? [1000, 5000];
    this._random = options.random ?? Math.random;
    this._createTransport = options.transportFactory ?? (() => new WsClientTransport());
    this._limiter = options.identifyLimiter;
    this._log = prefixLogger(options.logger ?? createLogger('shard-gateway:shard'), `[shard ${index}/${count}]`);
    this._onDispatch = options.onDispatch;

    this._backoff = new Backoff(options.backoff);
    this._heartbeat = new Heartbeat(
      {
        beat: () => this._sendHeartbeat(),
        zombie: () => this._handleZombie(),
      },
      this._random
    );
    this._sendQueue = new SendQueue((text) => this._write(text), options.commandRateLimit);
  }

  get shard(): ShardDescriptor {
    return { ...this._descriptor };
  }

  get state(): ConnectionState {
    return this._state;
  }

  /**
   * Incremented on every connection attempt and on disconnect.
   */
  get connectionId(): number {
    return this._connectionId;
  }

  get session(): SessionInfo | null {
    if (this._sessionId === null) return null;
    return {
      sessionId: this._sessionId,
      lastSequence: this._sequence,
      resumeUrl: this._resumeUrl,
    };
  }

  get lastSequence(): number | null {
    return this._sequence;
  }

  /**
   * Round trip of the last acknowledged heartbeat.
   */
  get latencyMs(): number | null {
    return this._heartbeat.latencyMs;
  }

  get heartbeatIntervalMs(): number {
    return this._heartbeat.intervalMs;
  }

  /**
   * Start connecting. Resolves once the shard is ready or stopped; never rejects.
   */
  connect(): Promise<void> {
    if (this._state === 'stopped' || this._state === 'ready') return Promise.resolve();

    const settled = new Promise<void>((resolve) => this._connectWaiters.push(resolve));
    if (this._state === 'noSession') {
      this._openConnection();
    }
    return settled;
  }

  /**
   * Close the connection for good. Safe from any state.
   */
  disconnect(): void {
    if (this._state === 'stopped') return;
    this._log.info('Disconnecting');
    this._stop();
  }

  /**
   * Send an application command. Only allowed while ready.
   */
  send(command: GatewayCommand): Promise<void> {
    if (this._state !== 'ready') {
      return Promise.reject(new NotReadyError(this._descriptor.index, this._state));
    }
    if (command.op === Opcode.PresenceUpdate) {
      this._presence = command.d;
    }
    return this._sendQueue.enqueue(encodePayload(command));
  }

  requestGuildMembers(payload: RequestGuildMembers): Promise<void> {
    return this.send({ op: Opcode.RequestGuildMembers, d: payload });
  }

  updatePresence(payload: PresenceUpdate): Promise<void> {
    return this.send({ op: Opcode.PresenceUpdate, d: payload });
  }

  /**
   * Replace the presence sent with future identifies, without sending anything.
   */
  setPresence(presence: PresenceUpdate): void {
    this._presence = presence;
  }

  updateVoiceState(payload: VoiceStateUpdate): Promise<void> {
    return this.send({ op: Opcode.VoiceStateUpdate, d: payload });
  }

  // ----- connection lifecycle -----

  private _openConnection(): void {
    const id = ++this._connectionId;
    this._abort = new AbortController();
    this._inflater = this._compress ? new ZlibStreamInflater() : null;
    this._receiveChain = Promise.resolve();
    this._setState('connecting');

    const base = this._canResume && this._resumeUrl ? this._resumeUrl : this._gatewayUrl;
    const url = buildGatewayUrl(base, { version: this._version, compress: this._compress });

    const transport = this._createTransport();
    this._transport = transport;
    transport.onMessage((data) => this._receive(id, data));
    transport.onClose((code, reason) => this._handleClose(id, code, reason));
    transport.onError((err) => {
      if (this._isCurrent(id)) this._log.warn('Transport error: %s', err.message);
    });

    this._connectTimer = setTimeout(() => {
      this._connectTimer = null;
      this._connectionLost(id, 'resumable', `no Hello within ${this._connectTimeoutMs}ms`);
    }, this._connectTimeoutMs);

    this._log.debug('Connecting to %s (connection %d)', url, id);
    transport.connect(url).then(
      () => {
        if (this._isCurrent(id)) this._log.debug('Transport open (connection %d)', id);
      },
      (err: unknown) => {
        this._handleFailure(id, err instanceof Error ? err : new TransportError(String(err)));
      }
    );
  }

  private _isCurrent(id: number): boolean {
    return id === this._connectionId && this._transport !== null;
  }

  /**
   * Drop the current connection and schedule the next attempt.
   */
  private _connectionLost(id: number, kind: Exclude<CloseClass, 'fatal'>, reason: string): void {
    if (!this._isCurrent(id)) return;

    const transport = this._teardown();
    transport?.close(kind === 'resumable' ? CloseCode.CLIENT_RESUME : CloseCode.NORMAL);

    if (kind === 'nonResumable') {
      this._clearSession();
    }
    this._canResume = kind === 'resumable' && this._sessionId !== null;
    this._log.warn('Connection %d lost (%s), %s', id, reason, this._canResume ? 'will resume' : 'will identify');

    this._setState('reconnecting');
    this._scheduleReconnect();
  }

  private _scheduleReconnect(): void {
    const wait = this._backoff.next();
    this._log.info('Reconnecting in %dms (attempt %d)', wait, this._backoff.attempt);
    this._reconnectTimer = setTimeout(() => {
      this._reconnectTimer = null;
      if (this._state === 'reconnecting') this._openConnection();
    }, wait);
  }

  private _handleClose(id: number, code: number, reason: string): void {
    if (!this._isCurrent(id)) return;

    const kind = classifyCloseCode(code);
    if (kind === 'fatal') {
      this._fatal(new FatalError(code, reason, describeCloseCode(code)));
      return;
    }
    this._connectionLost(id, kind, `closed with ${code}${reason ? ` ${reason}` : ''}`);
  }

  private _handleFailure(id: number, err: unknown): void {
    if (err instanceof CancelledError || !this._isCurrent(id)) return;

    const message = err instanceof Error ? err.message : String(err);
    this._log.error('%s', message);
    this._connectionLost(id, closeClassForError(err), message);
  }

  private _handleZombie(): void {
    this._log.warn('No heartbeat ack within %dms, connection is zombied', this._heartbeat.intervalMs);
    this._connectionLost(this._connectionId, 'resumable', 'heartbeat not acknowledged');
  }

  private _fatal(err: FatalError): void {
    this._log.critical('%s', err.message);
    this._stop();
    this.emit('fatal', err);
  }

  private _stop(): void {
    this._connectionId++;
    const transport = this._teardown();
    transport?.close(CloseCode.NORMAL);

    if (this._reconnectTimer) {
      clearTimeout(this._reconnectTimer);
      this._reconnectTimer = null;
    }
    this._clearSession();
    this._canResume = false;
    this._setState('stopped');
  }

  /**
   * Release everything tied to the current connection.
   *
   * @returns The transport that was current, for the caller to close
   */
  private _teardown(): ClientTransport | null {
    const transport = this._transport;
    this._transport = null;

    this._abort?.abort();
    this._abort = null;

    if (this._connectTimer) {
      clearTimeout(this._connectTimer);
      this._connectTimer = null;
    }
    if (this._stableTimer) {
      clearTimeout(this._stableTimer);
      this._stableTimer = null;
    }

    this._heartbeat.stop();
    this._inflater?.close();
    this._inflater = null;
    this._sendQueue.reset(`Shard ${this._descriptor.index} connection closed`);
    return transport;
  }

  private _clearSession(): void {
    this._sessionId = null;
    this._resumeUrl = null;
    this._sequence = null;
  }

  private _setState(next: ConnectionState): void {
    const previous = this._state;
    if (previous === next) return;
    this._state = next;
    this._log.debug('State %s -> %s', previous, next);
    this.emit('state', next, previous);

    if (next === 'ready' || next === 'stopped') {
      const waiters = this._connectWaiters;
      this._connectWaiters = [];
      for (const resolve of waiters) resolve();
    }
  }

  // ----- receive path -----

  private _receive(id: number, data: string | Buffer): void {
    if (!this._isCurrent(id)) {
      this._log.debug('Dropping frame from superseded connection %d', id);
      return;
    }
    this._receiveChain = this._receiveChain
      .then(() => this._processFrame(id, data))
      .catch((err: unknown) => this._handleFailure(id, err));
  }

  private async _processFrame(id: number, data: string | Buffer): Promise<void> {
    if (!this._isCurrent(id)) return;

    let text: string | null;
    if (this._inflater) {
      text = await this._inflater.push(typeof data === 'string' ? Buffer.from(data) : data);
    } else {
      text = typeof data === 'string' ? data : data.toString('utf8');
    }
    if (text === null || !this._isCurrent(id)) return;

    const payload = decodePayload(text);
    if (!payload) {
      this._log.debug('Ignoring frame with unhandled opcode');
      return;
    }
    await this._handlePayload(id, payload);
  }

  private async _handlePayload(id: number, payload: InboundPayload): Promise<void> {
    switch (payload.op) {
      case Opcode.Hello:
        this._handleHello(id, payload.d.heartbeat_interval);
        return;
      case Opcode.Heartbeat:
        this._heartbeat.beat();
        return;
      case Opcode.HeartbeatAck:
        this._heartbeat.ack();
        return;
      case Opcode.Reconnect:
        this._connectionLost(id, 'resumable', 'gateway requested reconnect');
        return;
      case Opcode.InvalidSession:
        this._handleInvalidSession(id, payload.d);
        return;
      case Opcode.Dispatch:
        await this._handleDispatch(payload);
        return;
    }
  }

  private _handleHello(id: number, intervalMs: number): void {
    if (this._connectTimer) {
      clearTimeout(this._connectTimer);
      this._connectTimer = null;
    }
    this._log.debug('Hello, heartbeat interval %dms', intervalMs);
    this._heartbeat.start(intervalMs);

    if (this._canResume && this._sessionId !== null) {
      this._sendResume();
    } else {
      this._beginIdentify(id);
    }
  }

  private _handleInvalidSession(id: number, resumable: boolean): void {
    if (!resumable) {
      const err = new SessionError(`Session ${this._sessionId ?? '(none)'} invalidated`);
      this._log.warn('%s, identifying again', err.message);
      this._clearSession();
      this._canResume = false;
      this.emit('sessionInvalidated', err);
    } else {
      this._log.info('Session invalidated but resumable');
    }
    // Commands are refused from here on; the session they were meant for is gone.
    this._setState(resumable && this._sessionId !== null ? 'resuming' : 'identifying');
    this._sendQueue.rejectPending(`Shard ${this._descriptor.index} session invalidated`);

    const [min, max] = this._invalidSessionDelayMs;
    delay(randomBetween(min, max, this._random), this._abort?.signal)
      .then(() => {
        if (!this._isCurrent(id)) return;
        if (resumable && this._sessionId !== null) {
          this._sendResume();
        } else {
          this._beginIdentify(id);
        }
      })
      .catch((err: unknown) => this._handleFailure(id, err));
  }

  private async _handleDispatch(payload: DispatchPayload): Promise<void> {
    this._sequence = payload.s;

    if (payload.t === 'READY') {
      const ready = decodeReady(payload.d);
      this._sessionId = ready.session_id;
      this._resumeUrl = ready.resume_gateway_url;
      this._canResume = true;
      this._log.info('Ready, session %s', ready.session_id);
      this._enterReady();
    } else if (payload.t === 'RESUMED') {
      this._log.info('Resumed session %s at sequence %d', this._sessionId, payload.s);
      this._enterReady();
    }

    if (this._onDispatch) {
      const event: DispatchEvent = {
        shard: { ...this._descriptor },
        sequence: payload.s,
        type: payload.t,
        data: payload.d,
      };
      await this._onDispatch(event);
    }
  }

  private _enterReady(): void {
    this._setState('ready');

    if (this._stableTimer) clearTimeout(this._stableTimer);
    this._stableTimer = setTimeout(() => {
      this._stableTimer = null;
      this._backoff.reset();
    }, this._readyResetIntervals * this._heartbeat.intervalMs);
  }

  // ----- send path -----

  private _write(text: string): void {
    const transport = this._transport;
    if (!transport) {
      throw new ConnectionError(`Shard ${this._descriptor.index} is not connected`);
    }
    transport.send(text);
  }

  private _beginIdentify(id: number): void {
    this._setState('identifying');
    this._limiter
      .acquire(this._descriptor.index, this._abort?.signal)
      .then(() => {
        if (this._isCurrent(id)) this._sendIdentify();
      })
      .catch((err: unknown) => this._handleFailure(id, err));
  }

  private _sendIdentify(): void {
    const data: IdentifyData = {
      token: this._token,
      intents: this._intents,
      properties: this._properties,
      shard: [this._descriptor.index, this._descriptor.count],
      compress: false,
    };
    if (this._presence) data.presence = this._presence;
    if (this._largeThreshold !== undefined) data.large_threshold = this._largeThreshold;

    this._log.info('Identifying');
    this._sendQueue.sendNow(encodePayload({ op: Opcode.Identify, d: data }));
  }

  private _sendResume(): void {
    const sessionId = this._sessionId;
    if (sessionId === null) {
      throw new SessionError('No session to resume');
    }
    this._setState('resuming');
    this._log.info('Resuming session %s from sequence %s', sessionId, this._sequence);
    this._sendQueue.sendNow(
      encodePayload({
        op: Opcode.Resume,
        d: { token: this._token, session_id: sessionId, seq: this._sequence },
      })
    );
  }

  private _sendHeartbeat(): void {
    try {
      this._sendQueue.sendNow(encodePayload({ op: Opcode.Heartbeat, d: this._sequence }));
    } catch (err) {
      this._log.warn('Heartbeat not sent: %s', err instanceof Error ? err.message : String(err));
    }
  }
}
