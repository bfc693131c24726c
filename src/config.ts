/**
 * Option validation for the gateway manager.
 */

import { Type } from 'typebox';
import { ValidationError } from './errors.ts';
import type { GatewayManagerOptions } from './types.ts';
import { compileSchema } from './validation.ts';

const BackoffSchema = Type.Object({
  minDelayMs: Type.Optional(Type.Number({ exclusiveMinimum: 0 })),
  maxDelayMs: Type.Optional(Type.Number({ exclusiveMinimum: 0 })),
  factor: Type.Optional(Type.Number({ minimum: 1 })),
});

// Callbacks and collaborators (logger, transportFactory, gatewayInfo) pass
// through unchecked.
const ManagerOptionsSchema = Type.Object({
  token: Type.String({ minLength: 1 }),
  intents: Type.Integer({ minimum: 0 }),
  shardCount: Type.Optional(Type.Integer({ minimum: 1 })),
  shardIds: Type.Optional(Type.Array(Type.Integer({ minimum: 0 }), { minItems: 1 })),
  maxConcurrency: Type.Optional(Type.Integer({ minimum: 1 })),
  identifySpacingMs: Type.Optional(Type.Number({ minimum: 0 })),
  version: Type.Optional(Type.Integer({ minimum: 1 })),
  compress: Type.Optional(Type.Boolean()),
  largeThreshold: Type.Optional(Type.Integer({ minimum: 50, maximum: 250 })),
  connectTimeoutMs: Type.Optional(Type.Number({ exclusiveMinimum: 0 })),
  readyResetIntervals: Type.Optional(Type.Number({ exclusiveMinimum: 0 })),
  invalidSessionDelayMs: Type.Optional(Type.Tuple([Type.Number({ minimum: 0 }), Type.Number({ minimum: 0 })])),
  commandRateLimit: Type.Optional(
    Type.Object({
      limit: Type.Integer({ minimum: 1 }),
      windowMs: Type.Number({ exclusiveMinimum: 0 }),
    })
  ),
  eventBufferSize: Type.Optional(Type.Integer({ minimum: 1 })),
  backoff: Type.Optional(BackoffSchema),
});

const managerOptionsValidator = compileSchema<GatewayManagerOptions>(ManagerOptionsSchema);

/**
 * Check manager options, including rules that span several fields.
 *
 * @throws ValidationError
 */
export function validateManagerOptions(options: GatewayManagerOptions): void {
  if (!managerOptionsValidator.check(options)) {
    throw new ValidationError(managerOptionsValidator.describe(options));
  }

  if (!options.gateway && !options.gatewayInfo) {
    throw new ValidationError('one of "gateway" or "gatewayInfo" is required');
  }

  const { shardCount, shardIds } = options;
  if (shardCount !== undefined && shardIds) {
    validateShardIds(shardIds, shardCount);
  }
  if (shardIds && new Set(shardIds).size !== shardIds.length) {
    throw new ValidationError('/shardIds: duplicate shard ids');
  }

  const delays = options.invalidSessionDelayMs;
  if (delays && delays[0] > delays[1]) {
    throw new ValidationError('/invalidSessionDelayMs: minimum above maximum');
  }
}

/**
 * @throws ValidationError when an id is not below the shard count
 */
export function validateShardIds(shardIds: readonly number[], shardCount: number): void {
  const outOfRange = shardIds.filter((id) => id >= shardCount);
  if (outOfRange.length > 0) {
    throw new ValidationError(`/shardIds: ${outOfRange.join(', ')} not below shardCount ${shardCount}`);
  }
}
