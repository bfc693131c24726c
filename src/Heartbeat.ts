/**
 * Heartbeat loop for one connection.
 *
 * The first beat goes out after a random fraction of the interval, then every
 * interval. A tick that finds the previous beat unacknowledged reports a zombied
 * connection and stops the loop.
 */

export interface HeartbeatHandlers {
  /** Write a heartbeat frame. */
  beat: () => void;
  /** The previous beat was never acknowledged. */
  zombie: () => void;
}

export class Heartbeat {
  private _handlers: HeartbeatHandlers;
  private _random: () => number;

  private _intervalMs = 0;
  private _acked = true;
  private _missedAcks = 0;
  private _lastSentAt = 0;
  private _latencyMs: number | null = null;
  private _timer: ReturnType<typeof setTimeout> | null = null;
  private _interval: ReturnType<typeof setInterval> | null = null;

  constructor(handlers: HeartbeatHandlers, random: () => number = Math.random) {
    this._handlers = handlers;
    this._random = random;
  }

  get intervalMs(): number {
    return this._intervalMs;
  }

  get acked(): boolean {
    return this._acked;
  }

  get missedAcks(): number {
    return this._missedAcks;
  }

  /**
   * Round trip of the last acknowledged beat, if any.
   */
  get latencyMs(): number | null {
    return this._latencyMs;
  }

  get running(): boolean {
    return this._timer !== null || this._interval !== null;
  }

  start(intervalMs: number): void {
    this.stop();
    this._intervalMs = intervalMs;
    this._acked = true;
    this._missedAcks = 0;

    const jitter = Math.floor(this._random() * intervalMs);
    this._timer = setTimeout(() => {
      this._timer = null;
      this._interval = setInterval(() => this._tick(), intervalMs);
      this._tick();
    }, jitter);
  }

  stop(): void {
    if (this._timer) {
      clearTimeout(this._timer);
      this._timer = null;
    }
    if (this._interval) {
      clearInterval(this._interval);
      this._interval = null;
    }
  }

  /**
   * Send a beat now, e.g. when the service asks for one.
   */
  beat(): void {
    this._acked = false;
    this._lastSentAt = Date.now();
    this._handlers.beat();
  }

  ack(): void {
    this._acked = true;
    this._missedAcks = 0;
    if (this._lastSentAt > 0) {
      this._latencyMs = Date.now() - this._lastSentAt;
    }
  }

  private _tick(): void {
    if (!this._acked) {
      this._missedAcks++;
      this.stop();
      this._handlers.zombie();
      return;
    }
    this.beat();
  }
}
