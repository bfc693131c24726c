/**
 * Utility functions.
 */

import { CancelledError, ValidationError } from './errors.ts';

/**
 * Promise-based delay that can be cut short.
 *
 * @param ms - Delay in milliseconds
 * @param signal - Rejects with CancelledError when aborted
 */
export function delay(ms: number, signal?: AbortSignal): Promise<void> {
  return new Promise((resolve, reject) => {
    if (signal?.aborted) {
      reject(new CancelledError());
      return;
    }

    const onAbort = () => {
      clearTimeout(timer);
      reject(new CancelledError());
    };

    const timer = setTimeout(() => {
      signal?.removeEventListener('abort', onAbort);
      resolve();
    }, ms);

    signal?.addEventListener('abort', onAbort, { once: true });
  });
}

/**
 * Pick a value in `[min, max)` from a `[0, 1)` source.
 */
export function randomBetween(min: number, max: number, random: () => number = Math.random): number {
  return min + Math.floor(random() * (max - min));
}

/**
 * Shard owning a guild: `(guildId >> 22) % shardCount`.
 *
 * @param guildId - Snowflake as a decimal string
 */
export function shardIndexForGuild(guildId: string, shardCount: number): number {
  if (!/^\d+$/.test(guildId)) {
    throw new ValidationError(`/guild_id: "${guildId}" is not a snowflake`);
  }
  return Number((BigInt(guildId) >> 22n) % BigInt(shardCount));
}
