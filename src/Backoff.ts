/**
 * Bounded exponential reconnect delay.
 */

import type { BackoffOptions } from './types.ts';

export class Backoff {
  static readonly MIN_DELAY = 1000;
  static readonly MAX_DELAY = 60000;
  static readonly FACTOR = 2;

  private _min: number;
  private _max: number;
  private _factor: number;
  private _attempt = 0;

  constructor(options: BackoffOptions = {}) {
    this._min = options.minDelayMs ?? Backoff.MIN_DELAY;
    this._max = options.maxDelayMs ?? Backoff.MAX_DELAY;
    this._factor = options.factor ?? Backoff.FACTOR;
  }

  get attempt(): number {
    return this._attempt;
  }

  /**
   * Delay before the next attempt; grows until it reaches the cap.
   */
  next(): number {
    const delay = Math.min(this._min * Math.pow(this._factor, this._attempt), this._max);
    this._attempt++;
    return delay;
  }

  reset(): void {
    this._attempt = 0;
  }
}
