/**
 * Single writer for one shard's transport.
 *
 * Protocol frames (heartbeat, identify, resume) are written at once. Application
 * commands are written in order, at most `limit` per sliding `windowMs`, so the
 * protocol frames always fit under the service's per-connection send limit.
 */

import createDebug from 'debug';
import { ConnectionError } from './errors.ts';

const debug = createDebug('shard-gateway:send-queue');

interface PendingCommand {
  text: string;
  resolve: () => void;
  reject: (err: Error) => void;
}

export interface SendQueueOptions {
  limit: number;
  windowMs: number;
}

export class SendQueue {
  static readonly DEFAULT_LIMIT = 110;
  static readonly DEFAULT_WINDOW_MS = 60000;

  private _write: (text: string) => void;
  private _limit: number;
  private _windowMs: number;
  private _pending: PendingCommand[] = [];
  private _sentAt: number[] = [];
  private _timer: ReturnType<typeof setTimeout> | null = null;

  constructor(write: (text: string) => void, options: Partial<SendQueueOptions> = {}) {
    this._write = write;
    this._limit = options.limit ?? SendQueue.DEFAULT_LIMIT;
    this._windowMs = options.windowMs ?? SendQueue.DEFAULT_WINDOW_MS;
  }

  get pending(): number {
    return this._pending.length;
  }

  /**
   * Write a protocol frame now, ahead of queued commands.
   */
  sendNow(text: string): void {
    this._write(text);
  }

  /**
   * Queue an application command.
   *
   * @returns Resolves once written; rejects if the queue is reset first
   */
  enqueue(text: string): Promise<void> {
    return new Promise((resolve, reject) => {
      this._pending.push({ text, resolve, reject });
      this._pump();
    });
  }

  /**
   * Drop queued commands, rejecting them, and forget the send window.
   */
  reset(reason = 'Connection closed'): void {
    this.rejectPending(reason);
    this._sentAt = [];
  }

  /**
   * Reject queued commands but keep counting what this connection already sent.
   */
  rejectPending(reason: string): void {
    if (this._timer) {
      clearTimeout(this._timer);
      this._timer = null;
    }
    const pending = this._pending;
    this._pending = [];
    for (const cmd of pending) {
      cmd.reject(new ConnectionError(reason));
    }
  }

  private _pump(): void {
    if (this._timer) return;

    const now = Date.now();
    while (this._sentAt.length > 0 && now - (this._sentAt[0] ?? now) >= this._windowMs) {
      this._sentAt.shift();
    }

    while (this._pending.length > 0 && this._sentAt.length < this._limit) {
      const cmd = this._pending.shift();
      if (!cmd) break;
      try {
        this._write(cmd.text);
        this._sentAt.push(now);
        cmd.resolve();
      } catch (err) {
        cmd.reject(err instanceof Error ? err : new Error(String(err)));
      }
    }

    if (this._pending.length > 0) {
      const oldest = this._sentAt[0] ?? now;
      const wait = Math.max(1, oldest + this._windowMs - now);
      debug('Command window full, %d queued, waiting %dms', this._pending.length, wait);
      this._timer = setTimeout(() => {
        this._timer = null;
        this._pump();
      }, wait);
    }
  }
}
