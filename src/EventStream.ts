/**
 * Multi-subscriber broadcast with producer-blocking backpressure.
 *
 * Each subscriber owns a bounded buffer. `publish()` resolves once every live
 * subscriber has accepted the value, so a full buffer holds the producer back
 * instead of dropping events.
 */

import createDebug from 'debug';

const debug = createDebug('shard-gateway:event-stream');

class Subscription<T> implements AsyncIterableIterator<T> {
  private _buffer: { value: T }[] = [];
  private _capacity: number;
  private _reader: ((result: IteratorResult<T>) => void) | null = null;
  private _blocked: (() => void)[] = [];
  private _ended = false;
  private _cancelled = false;
  private _detached = false;
  private _onDetach: (sub: Subscription<T>) => void;

  constructor(capacity: number, onDetach: (sub: Subscription<T>) => void) {
    this._capacity = capacity;
    this._onDetach = onDetach;
  }

  get buffered(): number {
    return this._buffer.length;
  }

  /**
   * Hand a value to this subscriber, waiting while its buffer is full.
   */
  offer(value: T): Promise<void> {
    if (this._ended) return Promise.resolve();

    if (this._reader) {
      const reader = this._reader;
      this._reader = null;
      reader({ value, done: false });
      return Promise.resolve();
    }

    if (this._buffer.length < this._capacity) {
      this._buffer.push({ value });
      return Promise.resolve();
    }

    return new Promise((resolve) => {
      this._blocked.push(() => {
        if (!this._cancelled) this._buffer.push({ value });
        resolve();
      });
    });
  }

  /**
   * No more values will be offered; buffered ones can still be read.
   */
  end(): void {
    if (this._ended) return;
    this._ended = true;
    this._releaseBlocked();
    if (this._reader && this._buffer.length === 0) {
      const reader = this._reader;
      this._reader = null;
      reader({ value: undefined, done: true });
    }
  }

  next(): Promise<IteratorResult<T>> {
    const item = this._buffer.shift();
    if (item) {
      this._blocked.shift()?.();
      return Promise.resolve({ value: item.value, done: false });
    }
    if (this._ended) {
      this._detach();
      return Promise.resolve({ value: undefined, done: true });
    }
    return new Promise((resolve) => {
      this._reader = resolve;
    });
  }

  return(): Promise<IteratorResult<T>> {
    this._cancelled = true;
    this._buffer = [];
    this.end();
    this._detach();
    return Promise.resolve({ value: undefined, done: true });
  }

  [Symbol.asyncIterator](): AsyncIterableIterator<T> {
    return this;
  }

  private _releaseBlocked(): void {
    const blocked = this._blocked;
    this._blocked = [];
    for (const release of blocked) release();
  }

  private _detach(): void {
    if (this._detached) return;
    this._detached = true;
    this._onDetach(this);
  }
}

export class EventBroadcaster<T> {
  static readonly DEFAULT_CAPACITY = 256;

  private _capacity: number;
  private _subscriptions = new Set<Subscription<T>>();
  private _closed = false;

  constructor(capacity = EventBroadcaster.DEFAULT_CAPACITY) {
    if (!Number.isInteger(capacity) || capacity < 1) {
      throw new RangeError(`capacity must be a positive integer, got ${capacity}`);
    }
    this._capacity = capacity;
  }

  get closed(): boolean {
    return this._closed;
  }

  get subscriberCount(): number {
    return this._subscriptions.size;
  }

  /**
   * Start a new stream. It sees values published from now on and ends after
   * `close()`, once its buffer is drained. Streams made after `close()` are empty.
   */
  subscribe(): AsyncIterableIterator<T> {
    const sub = new Subscription<T>(this._capacity, (s) => this._subscriptions.delete(s));
    if (this._closed) {
      sub.end();
    } else {
      this._subscriptions.add(sub);
    }
    return sub;
  }

  /**
   * Deliver a value to every subscriber.
   *
   * @returns Resolves when every subscriber has room for the value
   */
  async publish(value: T): Promise<void> {
    if (this._closed) {
      debug('Dropping value published after close');
      return;
    }
    await Promise.all([...this._subscriptions].map((sub) => sub.offer(value)));
  }

  /**
   * End every stream and release blocked producers.
   */
  close(): void {
    if (this._closed) return;
    this._closed = true;
    for (const sub of this._subscriptions) sub.end();
  }
}
