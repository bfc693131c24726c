/**
 * Payload codec for the `{ op, d, s, t }` envelope.
 *
 * Decoding validates the envelope and the control payloads the shard acts on.
 * Dispatch data is left undecoded until a consumer asks for a specific kind.
 */

import { ProtocolError } from './errors.ts';
import { envelopeValidator, helloValidator, readyValidator } from './validation.ts';
import { Opcode } from './wire.ts';
import type { InboundPayload, OutboundPayload, ReadyData } from './wire.ts';

/**
 * Decode one inbound text frame.
 *
 * @returns The decoded payload, or `null` for opcodes this client does not handle
 * @throws ProtocolError on malformed JSON, envelope or control payload
 */
export function decodePayload(text: string): InboundPayload | null {
  let parsed: unknown;
  try {
    parsed = JSON.parse(text);
  } catch (err) {
    throw new ProtocolError(`Malformed JSON frame: ${err instanceof Error ? err.message : String(err)}`);
  }

  if (!envelopeValidator.check(parsed)) {
    throw new ProtocolError(`Malformed envelope: ${envelopeValidator.describe(parsed)}`);
  }
  const envelope = parsed;

  switch (envelope.op) {
    case Opcode.Dispatch: {
      if (typeof envelope.s !== 'number' || typeof envelope.t !== 'string') {
        throw new ProtocolError('Dispatch without sequence or type');
      }
      return { op: Opcode.Dispatch, s: envelope.s, t: envelope.t, d: envelope.d ?? null };
    }
    case Opcode.Heartbeat:
      return { op: Opcode.Heartbeat };
    case Opcode.Reconnect:
      return { op: Opcode.Reconnect };
    case Opcode.InvalidSession:
      return { op: Opcode.InvalidSession, d: envelope.d === true };
    case Opcode.Hello: {
      if (!helloValidator.check(envelope.d)) {
        throw new ProtocolError(`Malformed Hello: ${helloValidator.describe(envelope.d)}`);
      }
      return { op: Opcode.Hello, d: envelope.d };
    }
    case Opcode.HeartbeatAck:
      return { op: Opcode.HeartbeatAck };
    default:
      return null;
  }
}

export function encodePayload(payload: OutboundPayload): string {
  return JSON.stringify(payload);
}

/**
 * Decode the data of a READY dispatch.
 *
 * @throws ProtocolError if the data lacks the session fields
 */
export function decodeReady(data: unknown): ReadyData {
  if (!readyValidator.check(data)) {
    throw new ProtocolError(`Malformed READY: ${readyValidator.describe(data)}`);
  }
  return data;
}

/**
 * Append version, encoding and compression parameters to a gateway URL.
 */
export function buildGatewayUrl(base: string, params: { version: number; compress: boolean }): string {
  const url = new URL(base);
  url.searchParams.set('v', String(params.version));
  url.searchParams.set('encoding', 'json');
  if (params.compress) {
    url.searchParams.set('compress', 'zlib-stream');
  } else {
    url.searchParams.delete('compress');
  }
  return url.toString();
}
