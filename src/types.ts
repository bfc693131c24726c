/**
 * Core type definitions for the gateway client.
 */

import type { ClientTransport } from './transports/ClientTransport.ts';
import type { IdentifyRateLimiter } from './IdentifyRateLimiter.ts';
import type { Logger } from './logger.ts';
import type { IdentifyProperties, PresenceUpdate } from './wire.ts';

/**
 * Lifecycle of a single shard connection. `stopped` is terminal.
 */
export type ConnectionState =
  | 'noSession'
  | 'connecting'
  | 'identifying'
  | 'resuming'
  | 'ready'
  | 'reconnecting'
  | 'stopped';

/**
 * Session a shard can resume after a resumable close.
 */
export interface SessionInfo {
  sessionId: string;
  lastSequence: number | null;
  resumeUrl: string | null;
}

/**
 * Position of a shard in the partitioned client. `0 <= index < count`.
 */
export interface ShardDescriptor {
  index: number;
  count: number;
}

/**
 * A dispatch event forwarded to event streams.
 *
 * `data` is left as received; decode it for the kinds you handle.
 */
export interface DispatchEvent {
  shard: ShardDescriptor;
  sequence: number;
  type: string;
  data: unknown;
}

/**
 * Response of the "get gateway endpoint" REST call.
 */
export interface GatewayBotInfo {
  url: string;
  shards: number;
  session_start_limit: {
    total: number;
    remaining: number;
    reset_after: number;
    max_concurrency: number;
  };
}

/**
 * HTTP collaborator providing gateway discovery.
 */
export interface GatewayInfoProvider {
  getGatewayBot(): Promise<GatewayBotInfo>;
}

/**
 * Bounded exponential backoff. Defaults: 1000ms doubling to 60000ms.
 */
export interface BackoffOptions {
  minDelayMs?: number;
  maxDelayMs?: number;
  factor?: number;
}

/**
 * Options shared by the manager and every shard it creates.
 */
export interface ConnectionOptions {
  /** Gateway protocol version. Default: 10 */
  version?: number;
  /** Enable zlib-stream transport compression. Default: false */
  compress?: boolean;
  presence?: PresenceUpdate;
  /** Member count above which offline members are not sent. */
  largeThreshold?: number;
  properties?: IdentifyProperties;
  /** Time allowed from starting a connection attempt to receiving Hello. Default: 10000 */
  connectTimeoutMs?: number;
  backoff?: BackoffOptions;
  /** Sustained ready time, in heartbeat intervals, after which backoff resets. Default: 3 */
  readyResetIntervals?: number;
  /** Range of the random wait before re-identifying after InvalidSession. Default: [1000, 5000] */
  invalidSessionDelayMs?: [number, number];
  /** Commands allowed per window. Default: 110 per 60000ms */
  commandRateLimit?: { limit: number; windowMs: number };
  /**
   * Override the client transport implementation.
   * Called once per connection attempt. Default: `ws` transport.
   */
  transportFactory?: () => ClientTransport;
  /** Source of randomness for heartbeat jitter and invalid-session waits. */
  random?: () => number;
}

/**
 * Shard configuration.
 */
export interface ShardOptions extends ConnectionOptions {
  token: string;
  intents: number;
  shard: ShardDescriptor;
  gatewayUrl: string;
  identifyLimiter: IdentifyRateLimiter;
  logger?: Logger;
  /** Awaited for every dispatch; a slow sink holds back this shard's frames. */
  onDispatch?: (event: DispatchEvent) => Promise<void> | void;
}

/**
 * Gateway manager configuration.
 */
export interface GatewayManagerOptions extends ConnectionOptions {
  token: string;
  intents: number;
  /** Total shard count. Default: the count suggested by the gateway, or 1. */
  shardCount?: number;
  /** Shards to run in this process. Default: all of them. */
  shardIds?: number[];
  /** Identify buckets. Default: the gateway's max_concurrency, or 1. */
  maxConcurrency?: number;
  /** Minimum spacing between identifies in one bucket. Default: 5000 */
  identifySpacingMs?: number;
  /** Static gateway info; skips the REST call. */
  gateway?: GatewayBotInfo;
  gatewayInfo?: GatewayInfoProvider;
  logger?: Logger;
  /** Per-subscriber event buffer before the producing shard blocks. Default: 256 */
  eventBufferSize?: number;
}
