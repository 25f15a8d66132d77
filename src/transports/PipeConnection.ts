/**
 * In-memory pipe used for host mode.
 *
 * Two linked channels: what one end sends, the other end's read-loop
 * receives, in order. Payloads are handed over without copying and nothing
 * touches the network, but the Send/frames contract is the one every other
 * transport honors, so upper layers cannot tell the difference.
 */

import createDebug from 'debug';
import { ChannelClosedError, MessageTooLargeError } from '../errors.ts';
import type { ChannelKind } from '../types.ts';
import { FrameQueue } from './FrameQueue.ts';
import type { TransportConnection } from './Transport.ts';

const debug = createDebug('peerlink:pipe');

export interface PipeOptions {
  /** Largest payload accepted per send. Default: unbounded */
  maxMessageSize?: number;
}

let nextPipeId = 1;

export class PipeConnection implements TransportConnection {
  readonly address: string;
  readonly maxMessageSize: number;

  private _queue = new FrameQueue();
  private _peer: PipeConnection | null = null;
  private _disconnected = false;

  constructor(address: string, options: PipeOptions = {}) {
    this.address = address;
    this.maxMessageSize = options.maxMessageSize ?? Number.POSITIVE_INFINITY;
  }

  get connected(): boolean {
    return !this._disconnected;
  }

  send(payload: Uint8Array, _channel: ChannelKind): Promise<void> {
    const peer = this._peer;
    if (this._disconnected || !peer) {
      return Promise.reject(new ChannelClosedError(`Pipe ${this.address} is closed`));
    }
    if (payload.length > this.maxMessageSize) {
      return Promise.reject(new MessageTooLargeError(payload.length, this.maxMessageSize));
    }
    if (!peer._queue.push(payload)) {
      return Promise.reject(new ChannelClosedError(`Pipe peer ${peer.address} is closed`));
    }
    return Promise.resolve();
  }

  frames(): AsyncIterable<Uint8Array> {
    return this._queue;
  }

  disconnect(): void {
    if (this._disconnected) return;
    this._disconnected = true;
    debug('disconnect %s', this.address);

    this._queue.clear();
    this._queue.close();

    // The peer still reads whatever we sent before closing.
    this._peer?._queue.close();
  }

  /**
   * Link two pipe ends.
   */
  static link(a: PipeConnection, b: PipeConnection): void {
    a._peer = b;
    b._peer = a;
  }
}

/**
 * Create a linked pair of in-memory channels.
 */
export function createPipe(options: PipeOptions = {}): [PipeConnection, PipeConnection] {
  const id = nextPipeId++;
  const a = new PipeConnection(`pipe://${id}/a`, options);
  const b = new PipeConnection(`pipe://${id}/b`, options);
  PipeConnection.link(a, b);
  return [a, b];
}
