/**
 * Validation utilities using TypeBox.
 *
 * Schemas for everything the client reads from the network, compiled once at
 * module load.
 */

import { Type } from 'typebox';
import type { TSchema } from 'typebox';
import { Compile } from 'typebox/compile';
import { ValidationError } from './errors.ts';
import type { GatewayBotInfo } from './types.ts';
import type { HelloData, RawEnvelope, ReadyData } from './wire.ts';

/**
 * Compiled validator for a schema.
 */
export interface CompiledValidator<T> {
  /** Check if value is valid */
  check: (value: unknown) => value is T;
  /** Validate and throw on error */
  validate: (value: unknown) => T;
  /** Describe why a value is invalid */
  describe: (value: unknown) => string;
}

/**
 * TypeBox localized validation error type.
 */
interface LocalizedValidationError {
  instancePath: string;
  message: string;
}

function formatErrors(errors: LocalizedValidationError[]): string {
  if (errors.length === 0) {
    return 'Unknown validation error';
  }
  return errors.map((e) => `${e.instancePath || '/'}: ${e.message}`).join('; ');
}

/**
 * Compile a TypeBox schema into a validator for `T`.
 *
 * `T` is declared by the caller; keep it in step with the schema.
 */
export function compileSchema<T>(schema: TSchema): CompiledValidator<T> {
  const compiled = Compile(schema);

  const check = (value: unknown): value is T => compiled.Check(value);
  const describe = (value: unknown): string => formatErrors(compiled.Errors(value));

  return {
    check,
    describe,
    validate: (value: unknown): T => {
      if (!check(value)) {
        throw new ValidationError(describe(value));
      }
      return value;
    },
  };
}

export const EnvelopeSchema = Type.Object({
  op: Type.Integer(),
  d: Type.Optional(Type.Unknown()),
  s: Type.Optional(Type.Union([Type.Integer(), Type.Null()])),
  t: Type.Optional(Type.Union([Type.String(), Type.Null()])),
});

export const HelloSchema = Type.Object({
  heartbeat_interval: Type.Number({ exclusiveMinimum: 0 }),
});

export const ReadySchema = Type.Object({
  v: Type.Integer(),
  session_id: Type.String({ minLength: 1 }),
  resume_gateway_url: Type.String({ minLength: 1 }),
  user: Type.Object({
    id: Type.String(),
    username: Type.Optional(Type.String()),
    bot: Type.Optional(Type.Boolean()),
  }),
  shard: Type.Optional(Type.Tuple([Type.Integer(), Type.Integer()])),
});

export const GatewayBotSchema = Type.Object({
  url: Type.String({ minLength: 1 }),
  shards: Type.Integer({ minimum: 1 }),
  session_start_limit: Type.Object({
    total: Type.Integer({ minimum: 0 }),
    remaining: Type.Integer({ minimum: 0 }),
    reset_after: Type.Integer({ minimum: 0 }),
    max_concurrency: Type.Integer({ minimum: 1 }),
  }),
});

export const envelopeValidator = compileSchema<RawEnvelope>(EnvelopeSchema);
export const helloValidator = compileSchema<HelloData>(HelloSchema);
export const readyValidator = compileSchema<ReadyData>(ReadySchema);
export const gatewayBotValidator = compileSchema<GatewayBotInfo>(GatewayBotSchema);
