/**
 * Authentication capability consumed by client and server.
 *
 * The owning role calls `onServerAuthenticate` / `onClientAuthenticate` once
 * a connection is up. The authenticator decides, possibly after exchanging
 * messages, and then calls one of the accept/reject helpers. Until accepted,
 * handlers registered with `requireAuthentication` do not run for that
 * connection.
 */

import { Signal } from './Signal.ts';
import type { NetworkConnection } from './NetworkConnection.ts';

export abstract class Authenticator {
  /** Fires when the server side accepts a connection. */
  readonly serverAuthenticated = new Signal<[NetworkConnection]>();

  /** Fires when the client side accepts its connection. */
  readonly clientAuthenticated = new Signal<[NetworkConnection]>();

  /**
   * Start authenticating a freshly accepted connection (server side).
   */
  abstract onServerAuthenticate(conn: NetworkConnection): void;

  /**
   * Start authenticating the client's connection (client side).
   */
  abstract onClientAuthenticate(conn: NetworkConnection): void;

  protected serverAccept(conn: NetworkConnection): void {
    this.serverAuthenticated.invoke(conn);
  }

  protected serverReject(conn: NetworkConnection): void {
    conn.disconnect();
  }

  protected clientAccept(conn: NetworkConnection): void {
    this.clientAuthenticated.invoke(conn);
  }

  protected clientReject(conn: NetworkConnection): void {
    conn.isAuthenticated = false;
    conn.disconnect();
  }
}
