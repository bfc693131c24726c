/**
 * Structured error classes for the gateway client.
 */

import type { CloseClass } from './closeCodes.ts';

/**
 * Error codes used throughout the library.
 */
export const ErrorCode = {
  VALIDATION_FAILED: 'VALIDATION_FAILED',
  TRANSPORT_FAILED: 'TRANSPORT_FAILED',
  PROTOCOL_ERROR: 'PROTOCOL_ERROR',
  SESSION_INVALIDATED: 'SESSION_INVALIDATED',
  FATAL_CLOSE: 'FATAL_CLOSE',
  CONNECTION_FAILED: 'CONNECTION_FAILED',
  NOT_READY: 'NOT_READY',
  UNKNOWN_SHARD: 'UNKNOWN_SHARD',
  CANCELLED: 'CANCELLED',
} as const;

/**
 * Type representing valid error codes.
 */
export type ErrorCodeType = (typeof ErrorCode)[keyof typeof ErrorCode];

/**
 * Base error class with code property.
 */
abstract class BaseError extends Error {
  abstract readonly code: ErrorCodeType;

  constructor(message: string) {
    super(message);
    this.name = this.constructor.name;
    Error.captureStackTrace?.(this, this.constructor);
  }

  toJSON() {
    return {
      message: this.message,
      name: this.name,
      code: this.code,
      stack: this.stack,
    };
  }
}

/**
 * Thrown when options or a REST body fail schema validation.
 */
export class ValidationError extends BaseError {
  readonly code = 'VALIDATION_FAILED' as const;

  constructor(message: string) {
    super(`Validation failed! ${message}`);
  }
}

/**
 * The WebSocket could not be opened, timed out, or failed mid-stream.
 * Recovered with a resumable reconnect.
 */
export class TransportError extends BaseError {
  readonly code = 'TRANSPORT_FAILED' as const;

  constructor(message = 'Transport failed') {
    super(message);
  }
}

/**
 * Malformed envelope or corrupt compressed stream.
 * Recovered with a fresh (non-resumable) reconnect.
 */
export class ProtocolError extends BaseError {
  readonly code = 'PROTOCOL_ERROR' as const;

  constructor(message: string) {
    super(message);
  }
}

/**
 * The service reported the session as invalid and not resumable.
 */
export class SessionError extends BaseError {
  readonly code = 'SESSION_INVALIDATED' as const;

  constructor(message = 'Session invalidated') {
    super(message);
  }
}

/**
 * The service closed the connection with a code that must not be retried.
 */
export class FatalError extends BaseError {
  readonly code = 'FATAL_CLOSE' as const;
  readonly closeCode: number;
  readonly reason: string;

  constructor(closeCode: number, reason: string, description: string) {
    super(`Gateway closed with fatal code ${closeCode} (${description})${reason ? `: ${reason}` : ''}`);
    this.closeCode = closeCode;
    this.reason = reason;
  }
}

/**
 * A queued command lost the connection it was waiting on.
 */
export class ConnectionError extends BaseError {
  readonly code = 'CONNECTION_FAILED' as const;

  constructor(message = 'Connection closed') {
    super(message);
  }
}

/**
 * A command was sent to a shard that is not ready.
 */
export class NotReadyError extends BaseError {
  readonly code = 'NOT_READY' as const;

  constructor(shardIndex: number, state: string) {
    super(`Shard ${shardIndex} is not ready (state: ${state})`);
  }
}

/**
 * A command was routed to a shard this manager does not run.
 */
export class UnknownShardError extends BaseError {
  readonly code = 'UNKNOWN_SHARD' as const;

  constructor(shardIndex: number) {
    super(`Shard ${shardIndex} is not run by this manager`);
  }
}

/**
 * A pending wait was aborted, usually by disconnect().
 */
export class CancelledError extends BaseError {
  readonly code = 'CANCELLED' as const;

  constructor(message = 'Operation cancelled') {
    super(message);
  }
}

/**
 * Close class implied by an error raised while a connection is live.
 */
export function closeClassForError(err: unknown): Exclude<CloseClass, 'fatal'> {
  if (err instanceof ProtocolError || err instanceof SessionError) return 'nonResumable';
  return 'resumable';
}

/**
 * Type guard for errors with a code property.
 */
export function hasErrorCode(err: unknown): err is Error & { code: string } {
  return err instanceof Error && 'code' in err && typeof err.code === 'string';
}

/**
 * Extract error code safely, returning undefined if not present.
 */
export function getErrorCode(err: unknown): string | undefined {
  if (hasErrorCode(err)) {
    return err.code;
  }
  return undefined;
}
