/**
 * Gateway close codes and how each one is recovered from.
 */

export const CloseCode = {
  NORMAL: 1000,
  GOING_AWAY: 1001,
  UNKNOWN_ERROR: 4000,
  UNKNOWN_OPCODE: 4001,
  DECODE_ERROR: 4002,
  NOT_AUTHENTICATED: 4003,
  AUTHENTICATION_FAILED: 4004,
  ALREADY_AUTHENTICATED: 4005,
  INVALID_SEQ: 4007,
  RATE_LIMITED: 4008,
  SESSION_TIMED_OUT: 4009,
  INVALID_SHARD: 4010,
  SHARDING_REQUIRED: 4011,
  INVALID_API_VERSION: 4012,
  INVALID_INTENTS: 4013,
  DISALLOWED_INTENTS: 4014,
  /** Sent by this client when it drops a connection it intends to resume. */
  CLIENT_RESUME: 4900,
} as const;

/**
 * - `resumable`: reconnect and resume the preserved session
 * - `nonResumable`: reconnect with a fresh Identify
 * - `fatal`: stop, never retry
 */
export type CloseClass = 'resumable' | 'nonResumable' | 'fatal';

const NON_RESUMABLE = new Set<number>([
  CloseCode.NOT_AUTHENTICATED,
  CloseCode.INVALID_SEQ,
  CloseCode.RATE_LIMITED,
]);

const FATAL = new Map<number, string>([
  [CloseCode.AUTHENTICATION_FAILED, 'authentication failed'],
  [CloseCode.INVALID_SHARD, 'invalid shard'],
  [CloseCode.SHARDING_REQUIRED, 'sharding required'],
  [CloseCode.INVALID_API_VERSION, 'invalid API version'],
  [CloseCode.INVALID_INTENTS, 'invalid intents'],
  [CloseCode.DISALLOWED_INTENTS, 'disallowed intents'],
]);

/**
 * Classify a close code. Unlisted codes are resumable.
 */
export function classifyCloseCode(code: number): CloseClass {
  if (FATAL.has(code)) return 'fatal';
  if (NON_RESUMABLE.has(code)) return 'nonResumable';
  return 'resumable';
}

export function describeCloseCode(code: number): string {
  return FATAL.get(code) ?? `close code ${code}`;
}
