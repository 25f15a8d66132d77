/**
 * Clock synchronization over ping/pong.
 *
 * The client periodically pings with its local time; the server answers with
 * the echoed client time and its own. From each pong the client derives the
 * round-trip time and the offset between the two clocks, both smoothed with
 * an exponential moving average. Times are in seconds.
 */

import { performance } from 'node:perf_hooks';
import { PongMessage } from './messages.ts';
import type { MessageOf, PingMessage } from './messages.ts';
import type { NetworkConnection } from './NetworkConnection.ts';

/**
 * Exponential moving average over roughly `n` samples.
 */
export class ExponentialMovingAverage {
  private _alpha: number;
  private _initialized = false;

  value = 0;
  variance = 0;

  constructor(n: number) {
    this._alpha = 2 / (n + 1);
  }

  get initialized(): boolean {
    return this._initialized;
  }

  add(newValue: number): void {
    if (!this._initialized) {
      this.value = newValue;
      this._initialized = true;
      return;
    }
    const delta = newValue - this.value;
    this.value += this._alpha * delta;
    this.variance = (1 - this._alpha) * (this.variance + this._alpha * delta * delta);
  }
}

export class NetworkTime {
  /** Samples in the RTT and offset averages. */
  pingWindowSize = 10;

  private _clock: () => number;
  private _rtt: ExponentialMovingAverage;
  private _offset: ExponentialMovingAverage;
  // Bounds the true offset must lie within, tightened by every pong.
  private _offsetMin = Number.NEGATIVE_INFINITY;
  private _offsetMax = Number.POSITIVE_INFINITY;

  /**
   * @param clock - local time source in seconds (default: monotonic process clock)
   */
  constructor(clock: () => number = () => performance.now() / 1000) {
    this._clock = clock;
    this._rtt = new ExponentialMovingAverage(this.pingWindowSize);
    this._offset = new ExponentialMovingAverage(this.pingWindowSize);
  }

  get localTime(): number {
    return this._clock();
  }

  /** Estimated server time. */
  get time(): number {
    return this.localTime - this._offset.value;
  }

  get offset(): number {
    return this._offset.value;
  }

  get rtt(): number {
    return this._rtt.value;
  }

  get rttVariance(): number {
    return this._rtt.variance;
  }

  /** True once a pong has been folded in since the last reset. */
  get isSynchronized(): boolean {
    return this._offset.initialized;
  }

  reset(): void {
    this._rtt = new ExponentialMovingAverage(this.pingWindowSize);
    this._offset = new ExponentialMovingAverage(this.pingWindowSize);
    this._offsetMin = Number.NEGATIVE_INFINITY;
    this._offsetMax = Number.POSITIVE_INFINITY;
  }

  createPing(): MessageOf<typeof PingMessage> {
    return { clientTime: this.localTime };
  }

  /**
   * Server side: answer a ping.
   */
  onServerPing = (msg: MessageOf<typeof PingMessage>, conn: NetworkConnection): void => {
    conn.send(PongMessage, { clientTime: msg.clientTime, serverTime: this.localTime });
  };

  /**
   * Client side: fold a pong into the RTT and offset estimates.
   */
  onClientPong = (msg: MessageOf<typeof PongMessage>): void => {
    const now = this.localTime;

    const newRtt = now - msg.clientTime;
    this._rtt.add(newRtt);

    const newOffset = now - newRtt * 0.5 - msg.serverTime;
    const newOffsetMin = now - newRtt - msg.serverTime;
    const newOffsetMax = now - msg.serverTime;
    this._offsetMin = Math.max(this._offsetMin, newOffsetMin);
    this._offsetMax = Math.min(this._offsetMax, newOffsetMax);

    if (!this._offset.initialized || this._offset.value < this._offsetMin || this._offset.value > this._offsetMax) {
      // Estimate fell outside the known bounds: start over from this sample.
      this._offset = new ExponentialMovingAverage(this.pingWindowSize);
      this._offset.add(newOffset);
    } else if (newOffset >= this._offsetMin && newOffset <= this._offsetMax) {
      this._offset.add(newOffset);
    }
  };
}
