/**
 * Gateway wire protocol: opcodes, envelopes and payload shapes.
 *
 * Every frame is a JSON envelope `{ op, d, s, t }`. `s` and `t` are only set on
 * Dispatch (op 0); the shape of `d` depends on `op` and, for Dispatch, on `t`.
 */

export const Opcode = {
  Dispatch: 0,
  Heartbeat: 1,
  Identify: 2,
  PresenceUpdate: 3,
  VoiceStateUpdate: 4,
  Resume: 6,
  Reconnect: 7,
  RequestGuildMembers: 8,
  InvalidSession: 9,
  Hello: 10,
  HeartbeatAck: 11,
} as const;

export type OpcodeType = (typeof Opcode)[keyof typeof Opcode];

/**
 * Intent bit flags passed in Identify.
 */
export const GatewayIntents = {
  Guilds: 1 << 0,
  GuildMembers: 1 << 1,
  GuildModeration: 1 << 2,
  GuildEmojisAndStickers: 1 << 3,
  GuildIntegrations: 1 << 4,
  GuildWebhooks: 1 << 5,
  GuildInvites: 1 << 6,
  GuildVoiceStates: 1 << 7,
  GuildPresences: 1 << 8,
  GuildMessages: 1 << 9,
  GuildMessageReactions: 1 << 10,
  GuildMessageTyping: 1 << 11,
  DirectMessages: 1 << 12,
  DirectMessageReactions: 1 << 13,
  DirectMessageTyping: 1 << 14,
  MessageContent: 1 << 15,
  GuildScheduledEvents: 1 << 16,
  AutoModerationConfiguration: 1 << 20,
  AutoModerationExecution: 1 << 21,
} as const;

// Raw envelope as received, before per-opcode decoding.
export interface RawEnvelope {
  op: number;
  d?: unknown;
  s?: number | null;
  t?: string | null;
}

export interface HelloData {
  heartbeat_interval: number;
}

export interface ReadyData {
  v: number;
  session_id: string;
  resume_gateway_url: string;
  user: { id: string; username?: string; bot?: boolean };
  shard?: [number, number];
}

// Service -> Client (decoded)
export interface DispatchPayload {
  op: typeof Opcode.Dispatch;
  s: number;
  t: string;
  /** Decoded per kind on demand, see `decodeReady`. */
  d: unknown;
}

export interface HeartbeatRequestPayload {
  op: typeof Opcode.Heartbeat;
}

export interface ReconnectPayload {
  op: typeof Opcode.Reconnect;
}

export interface InvalidSessionPayload {
  op: typeof Opcode.InvalidSession;
  /** Whether the session may still be resumed. */
  d: boolean;
}

export interface HelloPayload {
  op: typeof Opcode.Hello;
  d: HelloData;
}

export interface HeartbeatAckPayload {
  op: typeof Opcode.HeartbeatAck;
}

export type InboundPayload =
  | DispatchPayload
  | HeartbeatRequestPayload
  | ReconnectPayload
  | InvalidSessionPayload
  | HelloPayload
  | HeartbeatAckPayload;

// Client -> Service
export interface Activity {
  name: string;
  type: number;
  url?: string | null;
  state?: string;
}

export type PresenceStatus = 'online' | 'dnd' | 'idle' | 'invisible' | 'offline';

export interface PresenceUpdate {
  since: number | null;
  activities: Activity[];
  status: PresenceStatus;
  afk: boolean;
}

export interface IdentifyProperties {
  os: string;
  browser: string;
  device: string;
}

export interface IdentifyData {
  token: string;
  intents: number;
  properties: IdentifyProperties;
  shard: [number, number];
  presence?: PresenceUpdate;
  compress: boolean;
  large_threshold?: number;
}

export interface ResumeData {
  token: string;
  session_id: string;
  seq: number | null;
}

export interface RequestGuildMembers {
  guild_id: string;
  query?: string;
  limit: number;
  presences?: boolean;
  user_ids?: string | string[];
  nonce?: string;
}

export interface VoiceStateUpdate {
  guild_id: string;
  channel_id: string | null;
  self_mute: boolean;
  self_deaf: boolean;
}

export type OutboundPayload =
  | { op: typeof Opcode.Heartbeat; d: number | null }
  | { op: typeof Opcode.Identify; d: IdentifyData }
  | { op: typeof Opcode.Resume; d: ResumeData }
  | { op: typeof Opcode.PresenceUpdate; d: PresenceUpdate }
  | { op: typeof Opcode.VoiceStateUpdate; d: VoiceStateUpdate }
  | { op: typeof Opcode.RequestGuildMembers; d: RequestGuildMembers };

/**
 * Application commands, sent only while the shard is ready.
 */
export type GatewayCommand = Extract<
  OutboundPayload,
  { op: typeof Opcode.PresenceUpdate | typeof Opcode.VoiceStateUpdate | typeof Opcode.RequestGuildMembers }
>;
