/**
 * shard-gateway: resilient client for a sharded, stateful WebSocket push gateway.
 *
 * ## Public API
 * - `GatewayManager` runs every shard and merges their dispatch events.
 * - `Shard` is a single connection, usable on its own with an `IdentifyRateLimiter`.
 * - Codec, close-code and error helpers for code that inspects the wire.
 *
 * ## Example
 * ```ts
 * import { GatewayManager, GatewayIntents, RestGatewayInfoProvider } from 'shard-gateway';
 *
 * const token = process.env.GATEWAY_TOKEN ?? '';
 * const manager = new GatewayManager({
 *   token,
 *   intents: GatewayIntents.Guilds | GatewayIntents.GuildMessages,
 *   gatewayInfo: new RestGatewayInfoProvider({ token, baseUrl: 'https://api.example.com/v10' }),
 * });
 *
 * manager.on('fatal', (shard, err) => console.error(`shard ${shard}: ${err.message}`));
 *
 * const events = manager.makeEventsStream();
 * void manager.connect();
 * for await (const event of events) {
 *   console.log(event.shard.index, event.type);
 * }
 * ```
 *
 * Logging goes through `debug`; enable it with `DEBUG=shard-gateway:*`.
 */

export { GatewayManager } from './GatewayManager.ts';
export type { GatewayManagerEvents } from './GatewayManager.ts';
export { Shard } from './Shard.ts';
export type { ShardEvents } from './Shard.ts';
export { IdentifyRateLimiter } from './IdentifyRateLimiter.ts';
export type { IdentifyRateLimiterOptions } from './IdentifyRateLimiter.ts';
export { EventBroadcaster } from './EventStream.ts';
export { Backoff } from './Backoff.ts';
export { RestGatewayInfoProvider } from './rest.ts';
export type { RestGatewayInfoProviderOptions } from './rest.ts';

export { WsClientTransport } from './transports/WsClientTransport.ts';
export type { WsClientTransportOptions } from './transports/WsClientTransport.ts';
export type { ClientTransport } from './transports/ClientTransport.ts';

export { buildGatewayUrl, decodePayload, decodeReady, encodePayload } from './codec.ts';
export { ZlibStreamInflater } from './compression.ts';
export { CloseCode, classifyCloseCode, describeCloseCode } from './closeCodes.ts';
export type { CloseClass } from './closeCodes.ts';
export { GatewayIntents, Opcode } from './wire.ts';
export type {
  Activity,
  GatewayCommand,
  HelloData,
  IdentifyData,
  IdentifyProperties,
  InboundPayload,
  OutboundPayload,
  PresenceStatus,
  PresenceUpdate,
  ReadyData,
  RequestGuildMembers,
  ResumeData,
  VoiceStateUpdate,
} from './wire.ts';

export {
  ErrorCode,
  CancelledError,
  ConnectionError,
  FatalError,
  NotReadyError,
  ProtocolError,
  SessionError,
  TransportError,
  UnknownShardError,
  ValidationError,
  getErrorCode,
  hasErrorCode,
} from './errors.ts';
export type { ErrorCodeType } from './errors.ts';

export { createLogger } from './logger.ts';
export type { LogFn, LogLevel, Logger } from './logger.ts';

export type {
  BackoffOptions,
  ConnectionOptions,
  ConnectionState,
  DispatchEvent,
  GatewayBotInfo,
  GatewayInfoProvider,
  GatewayManagerOptions,
  SessionInfo,
  ShardDescriptor,
  ShardOptions,
} from './types.ts';
