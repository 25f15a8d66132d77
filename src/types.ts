/**
 * Core type definitions for the networking runtime.
 */

import type { Authenticator } from './Authenticator.ts';
import type { Transport } from './transports/Transport.ts';

/**
 * Delivery classes a sender may request per message.
 *
 * Transports without a separate unreliable path deliver `Unreliable` messages
 * over their reliable ordered stream.
 */
export const Channel = {
  Reliable: 0,
  Unreliable: 1,
} as const;

export type ChannelKind = (typeof Channel)[keyof typeof Channel];

/**
 * Client connection state.
 */
export type ConnectState = 'disconnected' | 'connecting' | 'connected';

/**
 * Client configuration options.
 */
export interface ClientOptions {
  /** Transport used by `connect()`. Not needed for host mode. */
  transport?: Transport;
  /** Authenticator run once the connection is up. Default: none (trusted). */
  authenticator?: Authenticator;
  /** Ping interval for clock sync in milliseconds, 0 to disable. Default: 2000 */
  pingIntervalMs?: number;
}

/**
 * Server configuration options.
 */
export interface ServerOptions {
  transport?: Transport;
  authenticator?: Authenticator;
  /** Maximum number of concurrent connections. Default: 4 */
  maxConnections?: number;
  /**
   * Accept connections from the transport. Disable for a host-only session
   * where the in-process client is the only peer. Default: true
   */
  listening?: boolean;
}
