/**
 * Transport abstraction.
 *
 * A transport establishes channels (listen/accept and dial) and moves whole
 * frames over them. Message framing, dispatch and authentication live above
 * it in `NetworkConnection`, so every transport (TCP, WebSocket, in-memory
 * pipe) shares the same upper layers.
 */

import type { Signal } from '../Signal.ts';
import type { ChannelKind } from '../types.ts';

/**
 * One raw peer channel.
 */
export interface TransportConnection {
  /**
   * Remote address, for logging.
   */
  readonly address: string;

  /**
   * Largest payload `send()` accepts, in bytes.
   */
  readonly maxMessageSize: number;

  /**
   * Send one payload. Rejects when the channel is closed or the payload is
   * too large.
   */
  send(payload: Uint8Array, channel: ChannelKind): Promise<void>;

  /**
   * Received payloads in arrival order. Ends when the remote side closes or
   * `disconnect()` is called; throws if the channel fails. Single consumer.
   */
  frames(): AsyncIterable<Uint8Array>;

  /**
   * Close the channel. Idempotent.
   */
  disconnect(): void;
}

export interface Transport {
  /**
   * URL schemes this transport dials, first one is the default.
   */
  readonly scheme: readonly string[];

  /**
   * Fires for every accepted peer while listening.
   */
  readonly connected: Signal<[TransportConnection]>;

  /**
   * Fires once listening has started.
   */
  readonly started: Signal<[]>;

  /**
   * Start accepting connections. Resolves once accepting.
   */
  listen(): Promise<void>;

  /**
   * Dial a server. Rejects with `ConnectError`.
   */
  connect(uri: URL): Promise<TransportConnection>;

  /**
   * Stop accepting connections. Open channels are left to their owners.
   */
  close(): Promise<void>;

  /**
   * Addresses clients can use to reach this transport while listening.
   */
  serverUri(): URL[];
}
