/**
 * GatewayManager class - the public entry point.
 *
 * Runs a set of shards sharing one identify rate limiter and one event
 * broadcaster, and routes commands to the shard that owns them.
 *
 * @example
 * ```ts
 * const manager = new GatewayManager({
 *   token: process.env.GATEWAY_TOKEN ?? '',
 *   intents: GatewayIntents.Guilds | GatewayIntents.GuildMessages,
 *   gatewayInfo: new RestGatewayInfoProvider({ token, baseUrl: 'https://api.example.com/v10' }),
 * });
 * const events = manager.makeEventsStream();
 * await manager.connect();
 * for await (const event of events) console.log(event.type);
 * ```
 */

import { EventEmitter } from 'events';
import { Backoff } from './Backoff.ts';
import { validateManagerOptions, validateShardIds } from './config.ts';
import { CancelledError, FatalError, UnknownShardError } from './errors.ts';
import { EventBroadcaster } from './EventStream.ts';
import { delay, shardIndexForGuild } from './helpers.ts';
import { IdentifyRateLimiter } from './IdentifyRateLimiter.ts';
import { createLogger } from './logger.ts';
import type { Logger } from './logger.ts';
import { Shard } from './Shard.ts';
import type {
  ConnectionState,
  DispatchEvent,
  GatewayBotInfo,
  GatewayManagerOptions,
} from './types.ts';
import type { PresenceUpdate, RequestGuildMembers, VoiceStateUpdate } from './wire.ts';

/**
 * Events emitted by GatewayManager
 */
export interface GatewayManagerEvents {
  state: [shardIndex: number, state: ConnectionState, previous: ConnectionState];
  /** `shardIndex` is -1 when gateway discovery itself failed fatally. */
  fatal: [shardIndex: number, error: FatalError];
}

export class GatewayManager extends EventEmitter<GatewayManagerEvents> {
  private _options: GatewayManagerOptions;
  private _log: Logger;
  private _eventBufferSize: number;

  private _shards: Shard[] = [];
  private _retiredConnectionIds = 0;
  private _shardCount: number | null = null;
  private _limiter: IdentifyRateLimiter | null = null;
  private _events: EventBroadcaster<DispatchEvent>;
  private _abort: AbortController | null = null;
  private _connectPromise: Promise<void> | null = null;
  private _stopped = false;
  private _presence: PresenceUpdate | undefined;

  constructor(options: GatewayManagerOptions) {
    super();
    validateManagerOptions(options);
    this._options = options;
    this._log = options.logger ?? createLogger('shard-gateway:manager');
    this._eventBufferSize = options.eventBufferSize ?? EventBroadcaster.DEFAULT_CAPACITY;
    this._events = new EventBroadcaster(this._eventBufferSize);
    this._presence = options.presence;
  }

  /**
   * Aggregate state of the running shards.
   *
   * `stopped` once every shard stopped; otherwise the least advanced state among
   * the shards still running (`reconnecting` before `connecting` before `ready`).
   */
  get state(): ConnectionState {
    const running = this._shards.filter((s) => s.state !== 'stopped');
    if (this._shards.length === 0) {
      if (this._stopped) return 'stopped';
      return this._connectPromise ? 'connecting' : 'noSession';
    }
    if (running.length === 0) return 'stopped';
    if (running.every((s) => s.state === 'ready')) return 'ready';
    if (running.some((s) => s.state === 'reconnecting')) return 'reconnecting';
    if (running.some((s) => s.state === 'noSession')) return 'noSession';
    return 'connecting';
  }

  /**
   * Sum of the connection ids of every shard this manager has run. Changes on
   * any shard's reconnect or stop.
   */
  get connectionId(): number {
    return this._shards.reduce((sum, s) => sum + s.connectionId, this._retiredConnectionIds);
  }

  get shards(): readonly Shard[] {
    return this._shards;
  }

  /**
   * Total shard count, known once `connect()` resolved gateway info.
   */
  get shardCount(): number | null {
    return this._shardCount;
  }

  shard(index: number): Shard | undefined {
    return this._shards.find((s) => s.shard.index === index);
  }

  shardIndexForGuild(guildId: string): number {
    return shardIndexForGuild(guildId, this._shardCount ?? this._options.shardCount ?? 1);
  }

  /**
   * Discover the gateway and start every shard.
   *
   * Resolves once each shard is ready or stopped. Transient failures are retried
   * and never reject; fatal ones stop the affected shard and emit `fatal`.
   *
   * @throws ValidationError when `shardIds` do not fit the discovered shard count
   */
  connect(): Promise<void> {
    if (this._connectPromise) return this._connectPromise;
    const promise = this._connect().finally(() => {
      if (this._connectPromise === promise) this._connectPromise = null;
    });
    this._connectPromise = promise;
    return promise;
  }

  /**
   * Stop every shard and end every event stream.
   */
  disconnect(): void {
    this._log.info('Disconnecting %d shard(s)', this._shards.length);
    this._stopped = true;
    this._abort?.abort();
    this._abort = null;
    this._connectPromise = null;
    for (const shard of this._shards) {
      shard.disconnect();
    }
    this._limiter?.close();
    this._events.close();
  }

  /**
   * A stream of dispatch events from every shard, ordered per shard.
   *
   * The stream ends once the manager is fully stopped; one made while stopped
   * is already ended. A subscriber that stops reading holds back the shards once
   * its buffer is full; call `return()` (or `break` out of `for await`) to
   * unsubscribe.
   */
  makeEventsStream(): AsyncIterableIterator<DispatchEvent> {
    return this._events.subscribe();
  }

  /**
   * Ask the shard owning `payload.guild_id` for a chunk of members.
   */
  async requestGuildMembersChunk(payload: RequestGuildMembers): Promise<void> {
    const index = this.shardIndexForGuild(payload.guild_id);
    const shard = this.shard(index);
    if (!shard) throw new UnknownShardError(index);
    await shard.requestGuildMembers(payload);
  }

  /**
   * Update the presence on every shard. Shards that are not ready send it with
   * their next identify.
   */
  async updatePresence(payload: PresenceUpdate): Promise<void> {
    this._presence = payload;
    await Promise.all(
      this._shards.map((shard) => {
        if (shard.state === 'ready') return shard.updatePresence(payload);
        shard.setPresence(payload);
        return Promise.resolve();
      })
    );
  }

  /**
   * Join, move or leave a voice channel through the shard owning the guild.
   */
  async updateVoiceState(payload: VoiceStateUpdate): Promise<void> {
    const index = this.shardIndexForGuild(payload.guild_id);
    const shard = this.shard(index);
    if (!shard) throw new UnknownShardError(index);
    await shard.updateVoiceState(payload);
  }

  private async _connect(): Promise<void> {
    const running = this._shards.filter((s) => s.state !== 'stopped');
    if (running.length > 0) {
      await Promise.all(running.map((s) => s.connect()));
      return;
    }

    this._stopped = false;
    const abort = new AbortController();
    this._abort = abort;
    if (this._events.closed) {
      this._events = new EventBroadcaster(this._eventBufferSize);
    }

    let info: GatewayBotInfo;
    try {
      info = await this._resolveGateway(abort.signal);

      const limit = info.session_start_limit;
      const wanted = this._options.shardIds?.length ?? this._options.shardCount ?? info.shards;
      if (limit.remaining < wanted) {
        this._log.warn(
          'Only %d of %d session starts left, waiting %dms for the limit to reset',
          limit.remaining,
          limit.total,
          limit.reset_after
        );
        await delay(limit.reset_after, abort.signal);
      }
    } catch (err) {
      if (err instanceof CancelledError || abort.signal.aborted) return;
      if (err instanceof FatalError) {
        this._log.critical('%s', err.message);
        this._stopped = true;
        this._events.close();
        this.emit('fatal', -1, err);
        return;
      }
      throw err;
    }
    if (abort.signal.aborted) return;

    const shardCount = this._options.shardCount ?? info.shards;
    const shardIds = this._options.shardIds ?? Array.from({ length: shardCount }, (_, i) => i);
    validateShardIds(shardIds, shardCount);
    const maxConcurrency = this._options.maxConcurrency ?? info.session_start_limit.max_concurrency;

    this._retiredConnectionIds += this._shards.reduce((sum, s) => sum + s.connectionId, 0);
    this._shardCount = shardCount;
    this._limiter = new IdentifyRateLimiter({
      maxConcurrency,
      spacingMs: this._options.identifySpacingMs ?? IdentifyRateLimiter.DEFAULT_SPACING_MS,
    });
    this._shards = [...shardIds].sort((a, b) => a - b).map((index) => this._createShard(index, shardCount, info.url));

    this._log.info(
      'Starting %d of %d shard(s), max concurrency %d',
      this._shards.length,
      shardCount,
      maxConcurrency
    );
    await Promise.all(this._shards.map((s) => s.connect()));
  }

  /**
   * Static info, or ask the provider until it answers.
   *
   * @throws CancelledError when disconnected while retrying
   * @throws FatalError when the provider reports a non-retryable failure
   */
  private async _resolveGateway(signal: AbortSignal): Promise<GatewayBotInfo> {
    if (this._options.gateway) return this._options.gateway;

    const provider = this._options.gatewayInfo;
    if (!provider) {
      throw new FatalError(0, '', 'no gateway info source');
    }

    const backoff = new Backoff(this._options.backoff);
    for (;;) {
      try {
        return await provider.getGatewayBot();
      } catch (err) {
        if (err instanceof FatalError) throw err;
        const wait = backoff.next();
        this._log.warn(
          'Gateway discovery failed: %s, retrying in %dms',
          err instanceof Error ? err.message : String(err),
          wait
        );
        await delay(wait, signal);
      }
    }
  }

  private _createShard(index: number, count: number, gatewayUrl: string): Shard {
    const limiter = this._limiter;
    if (!limiter) {
      throw new Error('Identify limiter not initialized');
    }

    const shard = new Shard({
      ...this._options,
      presence: this._presence,
      shard: { index, count },
      gatewayUrl,
      identifyLimiter: limiter,
      onDispatch: (event) => this._events.publish(event),
    });

    shard.on('state', (state: ConnectionState, previous: ConnectionState) => {
      this.emit('state', index, state, previous);
      if (state === 'stopped') this._checkStopped();
    });
    shard.on('fatal', (err: FatalError) => {
      this.emit('fatal', index, err);
    });

    return shard;
  }

  private _checkStopped(): void {
    if (this._shards.length === 0) return;
    if (this._shards.every((s) => s.state === 'stopped')) {
      this._log.info('All shards stopped');
      this._limiter?.close();
      this._events.close();
    }
  }
}
