/**
 * NetworkServer - accepts peers and drives their connections.
 *
 * Remote peers arrive through the transport; the host-mode client arrives
 * through `addLocalConnection()`. Both take the same acceptance path:
 * capacity check, `connected`, authentication, read-loop, and on loop exit
 * removal plus `disconnected`. The read-loop's exit is the only place a
 * connection leaves the active set.
 */

import createDebug from 'debug';
import { CapacityExceededError, MissingTransportError } from './errors.ts';
import type { Authenticator } from './Authenticator.ts';
import type { MessageType } from './messages.ts';
import { PingMessage } from './messages.ts';
import { NetworkConnection } from './NetworkConnection.ts';
import { NetworkTime } from './NetworkTime.ts';
import { Signal } from './Signal.ts';
import type { Transport, TransportConnection } from './transports/Transport.ts';
import { Channel } from './types.ts';
import type { ChannelKind, ServerOptions } from './types.ts';

const debug = createDebug('peerlink:server');

export class NetworkServer {
  /** Maximum number of concurrent connections, host client included. */
  maxConnections: number;

  /** Accept connections from the transport (false: host-only session). */
  listening: boolean;

  transport: Transport | null;
  authenticator: Authenticator | null;

  /** Fires once the server is active. */
  readonly started = new Signal();
  /** Fires when a peer has been accepted. */
  readonly connected = new Signal<[NetworkConnection]>();
  /** Fires when a peer has passed authentication. */
  readonly authenticated = new Signal<[NetworkConnection]>();
  /** Fires once per accepted peer when its connection ends. */
  readonly disconnected = new Signal<[NetworkConnection]>();
  /** Fires when the server shuts down. */
  readonly stopped = new Signal();

  readonly time = new NetworkTime();

  /** Server-side end of the host-mode client, if any. */
  localConnection: NetworkConnection | null = null;

  private _connections = new Set<NetworkConnection>();
  private _initialized = false;
  private _active = false;
  // Bumped on every teardown; a listen() that resumes into a newer session bails out.
  private _session = 0;

  // Transport and authenticator wired by the current session, for teardown.
  private _listeningTransport: Transport | null = null;
  private _sessionAuthenticator: Authenticator | null = null;

  constructor(options: ServerOptions = {}) {
    this.transport = options.transport ?? null;
    this.authenticator = options.authenticator ?? null;
    this.maxConnections = options.maxConnections ?? 4;
    this.listening = options.listening ?? true;
  }

  /**
   * Active connections.
   */
  get connections(): ReadonlySet<NetworkConnection> {
    return this._connections;
  }

  get numPlayers(): number {
    return this._connections.size;
  }

  /**
   * True between a successful `listen()` and `disconnect()`.
   */
  get active(): boolean {
    return this._active;
  }

  /**
   * Start the server.
   *
   * @throws MissingTransportError if listening without a transport
   */
  async listen(): Promise<void> {
    this._initialize();

    const transport = this.transport;
    if (!this.listening || !transport) {
      debug('Server started without listening');
      this._start();
      return;
    }

    const session = this._session;
    transport.connected.add(this._onTransportConnected);
    this._listeningTransport = transport;
    try {
      await transport.listen();
    } catch (err) {
      debug('Server failed to listen: %o', err);
      if (session === this._session) {
        transport.connected.remove(this._onTransportConnected);
        this._listeningTransport = null;
        this._cleanup();
      }
      throw err;
    }

    if (session !== this._session) {
      // disconnect() ran while the transport was binding.
      debug('Server disconnected before it started listening');
      if (this._listeningTransport !== transport) await transport.close();
      throw new Error('NetworkServer was disconnected before it started listening');
    }

    debug('Server started listening');
    this._start();
  }

  /**
   * Accept the server end of a host-mode pipe as if a remote peer connected.
   */
  addLocalConnection(channel: TransportConnection): NetworkConnection {
    if (!this._initialized) {
      throw new Error('NetworkServer must be started before a host client connects');
    }
    const conn = new NetworkConnection(channel);
    this.localConnection = conn;
    this._connectionAccepted(conn).catch((err) => debug('local connection failed: %o', err));
    return conn;
  }

  /**
   * Send a message to every active connection. Best effort per recipient.
   */
  sendToAll<T>(type: MessageType<T>, message: T, channel: ChannelKind = Channel.Reliable): void {
    debug('Server.SendToAll %s to %d connections', type.name, this._connections.size);
    NetworkConnection.broadcast(this._connections, type, message, channel);
  }

  /**
   * Disconnect every peer and stop listening. The server can listen again
   * afterwards.
   */
  disconnect(): void {
    if (!this._initialized) return;
    debug('Server disconnect');

    // Connections leave the set as their read-loops end; iterate a copy.
    for (const conn of [...this._connections]) {
      conn.disconnect();
    }

    const transport = this._listeningTransport;
    if (transport) {
      this._listeningTransport = null;
      transport.connected.remove(this._onTransportConnected);
      transport.close().catch((err) => debug('transport close failed: %o', err));
    }

    this._cleanup();
  }

  private _initialize(): void {
    if (this._initialized) {
      throw new Error('NetworkServer is already started');
    }
    if (this.listening && !this.transport) {
      throw new MissingTransportError();
    }
    this._initialized = true;

    const authenticator = this.authenticator;
    if (authenticator) {
      authenticator.serverAuthenticated.add(this._onAuthenticated);
      this.connected.add(this._authenticate);
      this._sessionAuthenticator = authenticator;
    } else {
      // No authenticator: every connection is trusted.
      this.connected.add(this._onAuthenticated);
    }
  }

  private _start(): void {
    this._active = true;
    this.started.invoke();
  }

  private _cleanup(): void {
    const authenticator = this._sessionAuthenticator;
    if (authenticator) {
      authenticator.serverAuthenticated.remove(this._onAuthenticated);
      this._sessionAuthenticator = null;
    }
    this.connected.remove(this._authenticate);
    this.connected.remove(this._onAuthenticated);

    const wasActive = this._active;
    this._session++;
    this._initialized = false;
    this._active = false;
    if (wasActive) this.stopped.invoke();
  }

  private _onTransportConnected = (channel: TransportConnection): void => {
    const conn = new NetworkConnection(channel);
    this._connectionAccepted(conn).catch((err) => debug('connection failed: %o', err));
  };

  private _authenticate = (conn: NetworkConnection): void => {
    this._sessionAuthenticator?.onServerAuthenticate(conn);
  };

  private _onAuthenticated = (conn: NetworkConnection): void => {
    // A shared authenticator reports other servers' peers too.
    if (!this._connections.has(conn)) return;
    if (conn.isAuthenticated || conn.isDisconnected) return;
    debug('Server authenticate client: %s', conn);
    conn.isAuthenticated = true;
    this.authenticated.invoke(conn);
  };

  private async _connectionAccepted(conn: NetworkConnection): Promise<void> {
    debug('Server accepted client: %s', conn);

    if (this._connections.size >= this.maxConnections) {
      conn.disconnect();
      debug('Server full, kicked client %s: %o', conn, new CapacityExceededError(this.maxConnections));
      return;
    }

    this._connections.add(conn);
    conn.registerHandler(PingMessage, this.time.onServerPing);

    this.connected.invoke(conn);

    try {
      await conn.processMessages();
    } catch (err) {
      debug('%s closed with error: %o', conn, err);
    } finally {
      this._onDisconnected(conn);
    }
  }

  private _onDisconnected(conn: NetworkConnection): void {
    debug('Server disconnect client: %s', conn);

    this._connections.delete(conn);
    if (this.localConnection === conn) this.localConnection = null;

    this.disconnected.invoke(conn);

    conn.identity = null;
  }
}
