/**
 * Cross-shard identify quota.
 *
 * Shards are split into `maxConcurrency` buckets by `index % maxConcurrency`.
 * Within a bucket, grants are at least `spacingMs` apart; a grant frees its slot
 * by the passage of time, not by the identify completing. Waiting shards are
 * served lowest index first.
 */

import createDebug from 'debug';
import { CancelledError } from './errors.ts';

const debug = createDebug('shard-gateway:identify-limiter');

interface Waiter {
  shardIndex: number;
  resolve: () => void;
  reject: (err: Error) => void;
  cleanup: () => void;
}

interface Bucket {
  queue: Waiter[];
  nextAt: number;
  timer: ReturnType<typeof setTimeout> | null;
}

export interface IdentifyRateLimiterOptions {
  maxConcurrency: number;
  /** Minimum time between grants in one bucket. Default: 5000 */
  spacingMs?: number;
}

export class IdentifyRateLimiter {
  static readonly DEFAULT_SPACING_MS = 5000;

  private _maxConcurrency: number;
  private _spacingMs: number;
  private _buckets = new Map<number, Bucket>();
  private _closed = false;

  constructor(options: IdentifyRateLimiterOptions) {
    if (!Number.isInteger(options.maxConcurrency) || options.maxConcurrency < 1) {
      throw new RangeError(`maxConcurrency must be a positive integer, got ${options.maxConcurrency}`);
    }
    this._maxConcurrency = options.maxConcurrency;
    this._spacingMs = options.spacingMs ?? IdentifyRateLimiter.DEFAULT_SPACING_MS;
  }

  get maxConcurrency(): number {
    return this._maxConcurrency;
  }

  get spacingMs(): number {
    return this._spacingMs;
  }

  bucketFor(shardIndex: number): number {
    return shardIndex % this._maxConcurrency;
  }

  /**
   * Number of shards waiting for a grant.
   */
  get waiting(): number {
    let count = 0;
    for (const bucket of this._buckets.values()) count += bucket.queue.length;
    return count;
  }

  /**
   * Wait for permission to identify.
   *
   * @param signal - Aborting removes the waiter and rejects with CancelledError
   */
  acquire(shardIndex: number, signal?: AbortSignal): Promise<void> {
    if (this._closed) return Promise.reject(new CancelledError('Identify limiter closed'));
    if (signal?.aborted) return Promise.reject(new CancelledError());

    const bucketId = this.bucketFor(shardIndex);
    const bucket = this._bucket(bucketId);

    return new Promise((resolve, reject) => {
      const onAbort = () => {
        const idx = bucket.queue.indexOf(waiter);
        if (idx !== -1) bucket.queue.splice(idx, 1);
        reject(new CancelledError());
      };

      const waiter: Waiter = {
        shardIndex,
        resolve,
        reject,
        cleanup: () => signal?.removeEventListener('abort', onAbort),
      };

      signal?.addEventListener('abort', onAbort, { once: true });

      // Keep the queue ordered by shard index; equal indexes stay FIFO.
      let at = bucket.queue.length;
      while (at > 0 && (bucket.queue[at - 1]?.shardIndex ?? -1) > shardIndex) at--;
      bucket.queue.splice(at, 0, waiter);

      this._pump(bucketId, bucket);
    });
  }

  /**
   * Reject every waiter and stop all timers.
   */
  close(): void {
    this._closed = true;
    for (const bucket of this._buckets.values()) {
      if (bucket.timer) {
        clearTimeout(bucket.timer);
        bucket.timer = null;
      }
      const queue = bucket.queue;
      bucket.queue = [];
      for (const waiter of queue) {
        waiter.cleanup();
        waiter.reject(new CancelledError('Identify limiter closed'));
      }
    }
  }

  private _bucket(bucketId: number): Bucket {
    let bucket = this._buckets.get(bucketId);
    if (!bucket) {
      bucket = { queue: [], nextAt: 0, timer: null };
      this._buckets.set(bucketId, bucket);
    }
    return bucket;
  }

  private _pump(bucketId: number, bucket: Bucket): void {
    if (bucket.timer || bucket.queue.length === 0) return;

    const now = Date.now();
    if (now >= bucket.nextAt) {
      const waiter = bucket.queue.shift();
      if (!waiter) return;
      bucket.nextAt = now + this._spacingMs;
      waiter.cleanup();
      debug('Granted identify to shard %d (bucket %d)', waiter.shardIndex, bucketId);
      waiter.resolve();
    }

    if (bucket.queue.length > 0) {
      bucket.timer = setTimeout(() => {
        bucket.timer = null;
        this._pump(bucketId, bucket);
      }, Math.max(1, bucket.nextAt - Date.now()));
    }
  }
}
