/**
 * A logical peer link over one transport channel.
 *
 * Owns the message envelope, the per-connection handler map and the
 * read-loop. Client and server both drive their peers through this class,
 * whatever transport sits underneath.
 */

import createDebug from 'debug';
import {
  ChannelClosedError,
  DuplicateHandlerError,
  HandlerError,
  MessageTooLargeError,
} from './errors.ts';
import { decodeBody, encodeMessage } from './messages.ts';
import type { MessageType } from './messages.ts';
import type { TransportConnection } from './transports/Transport.ts';
import { Channel } from './types.ts';
import type { ChannelKind } from './types.ts';
import { decodeEnvelope } from './wire.ts';

const debug = createDebug('peerlink:connection');

/**
 * Handler for one message type.
 *
 * Handlers run one at a time, in arrival order. A returned promise is not
 * awaited; its rejection is logged like a thrown error.
 */
export type MessageHandler<T> = (message: T, conn: NetworkConnection) => void;

interface HandlerEntry {
  name: string;
  requireAuthentication: boolean;
  /** Decode the body (throws DecodeError) and run the handler. */
  dispatch: (body: Uint8Array) => void;
}

let nextConnectionId = 1;

export class NetworkConnection {
  readonly id: number;

  /**
   * Application-owned entity bound to this peer (e.g. its player object).
   */
  identity: object | null = null;

  /**
   * Set by the application once the peer may receive game traffic.
   */
  isReady = false;

  isAuthenticated = false;

  private _channel: TransportConnection;
  private _handlers = new Map<number, HandlerEntry>();
  private _processing = false;
  private _finished = false;
  private _disconnected = false;

  constructor(channel: TransportConnection) {
    this.id = nextConnectionId++;
    this._channel = channel;
  }

  get address(): string {
    return this._channel.address;
  }

  /**
   * The transport channel backing this connection.
   */
  get channel(): TransportConnection {
    return this._channel;
  }

  get isDisconnected(): boolean {
    return this._disconnected || this._finished;
  }

  /**
   * Register the handler for a message type.
   *
   * @param requireAuthentication - drop this message type until the
   *   connection is authenticated (default: true)
   * @throws DuplicateHandlerError if the type key already has a handler
   */
  registerHandler<T>(type: MessageType<T>, handler: MessageHandler<T>, requireAuthentication = true): void {
    const existing = this._handlers.get(type.key);
    if (existing) {
      throw new DuplicateHandlerError(type.name, existing.name, type.key);
    }

    this._handlers.set(type.key, {
      name: type.name,
      requireAuthentication,
      dispatch: (body) => {
        const message = decodeBody(type, body);
        this._invoke(type.name, () => handler(message, this));
      },
    });
  }

  /**
   * Remove the handler for a message type.
   *
   * @returns whether a handler was removed
   */
  unregisterHandler<T>(type: MessageType<T>): boolean {
    const existing = this._handlers.get(type.key);
    if (!existing || existing.name !== type.name) return false;
    return this._handlers.delete(type.key);
  }

  hasHandler<T>(type: MessageType<T>): boolean {
    return this._handlers.get(type.key)?.name === type.name;
  }

  /**
   * Send a message and wait for the transport to accept it.
   *
   * Rejects with ValidationError, MessageTooLargeError or ChannelClosedError.
   * A failed send never closes the connection.
   */
  sendAsync<T>(type: MessageType<T>, message: T, channel: ChannelKind = Channel.Reliable): Promise<void> {
    let payload: Buffer;
    try {
      payload = encodeMessage(type, message);
    } catch (err) {
      return Promise.reject(err);
    }
    return this.sendPayload(payload, channel);
  }

  /**
   * Best-effort send. Failures are logged, not reported.
   */
  send<T>(type: MessageType<T>, message: T, channel: ChannelKind = Channel.Reliable): void {
    this.sendAsync(type, message, channel).catch((err) => {
      debug('%s: send %s failed: %o', this, type.name, err);
    });
  }

  /**
   * Send an already encoded envelope.
   */
  sendPayload(payload: Uint8Array, channel: ChannelKind = Channel.Reliable): Promise<void> {
    if (this._disconnected || this._finished) {
      return Promise.reject(new ChannelClosedError(`${this} is disconnected`));
    }
    if (payload.length > this._channel.maxMessageSize) {
      return Promise.reject(new MessageTooLargeError(payload.length, this._channel.maxMessageSize));
    }
    return this._channel.send(payload, channel);
  }

  /**
   * Send one message to many connections, encoding it once.
   *
   * Each recipient fails independently; failures are logged.
   */
  static broadcast<T>(
    connections: Iterable<NetworkConnection>,
    type: MessageType<T>,
    message: T,
    channel: ChannelKind = Channel.Reliable
  ): void {
    let payload: Buffer;
    try {
      payload = encodeMessage(type, message);
    } catch (err) {
      debug('broadcast %s failed: %o', type.name, err);
      return;
    }

    for (const conn of [...connections]) {
      conn.sendPayload(payload, channel).catch((err) => {
        debug('%s: broadcast %s failed: %o', conn, type.name, err);
      });
    }
  }

  /**
   * Run the read-loop until the channel closes.
   *
   * Unknown message types are dropped. Handler failures are logged and the
   * loop continues. A malformed frame rejects with DecodeError and ends the
   * connection. Once this settles the connection is disconnected for good.
   */
  async processMessages(): Promise<void> {
    if (this._processing) {
      throw new Error(`${this} is already processing messages`);
    }
    if (this._finished) {
      throw new Error(`${this} has finished and cannot be reused`);
    }
    this._processing = true;

    try {
      for await (const payload of this._channel.frames()) {
        this._handleFrame(payload);
      }
    } finally {
      this._processing = false;
      this._finished = true;
      this.disconnect();
    }
  }

  /**
   * Close the connection. Idempotent.
   */
  disconnect(): void {
    if (this._disconnected) return;
    this._disconnected = true;
    debug('%s: disconnect', this);
    this._channel.disconnect();
  }

  toString(): string {
    return `connection(${this.id}) ${this._channel.address}`;
  }

  private _handleFrame(payload: Uint8Array): void {
    const { key, body } = decodeEnvelope(payload);

    const entry = this._handlers.get(key);
    if (!entry) {
      debug('%s: no handler for type key 0x%s, dropped', this, key.toString(16).padStart(8, '0'));
      return;
    }

    if (entry.requireAuthentication && !this.isAuthenticated) {
      debug('%s: %s requires authentication, dropped', this, entry.name);
      return;
    }

    entry.dispatch(body);
  }

  private _invoke(name: string, call: () => unknown): void {
    let result: unknown;
    try {
      result = call();
    } catch (err) {
      debug('%s: %o', this, new HandlerError(name, err));
      return;
    }
    if (result instanceof Promise) {
      result.catch((err: unknown) => {
        debug('%s: %o', this, new HandlerError(name, err));
      });
    }
  }
}
