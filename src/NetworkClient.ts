/**
 * NetworkClient - drives one outbound connection.
 *
 * `connect()` dials through the transport; `connectHost()` links to an
 * in-process server over a pipe instead. Either way the resulting
 * connection runs the same authentication and read-loop, and its end fires
 * `disconnected` exactly once.
 */

import createDebug from 'debug';
import { ConnectError, NotConnectedError } from './errors.ts';
import type { Authenticator } from './Authenticator.ts';
import { toUri } from './helpers.ts';
import type { MessageType } from './messages.ts';
import { PingMessage, PongMessage } from './messages.ts';
import { NetworkConnection } from './NetworkConnection.ts';
import type { NetworkServer } from './NetworkServer.ts';
import { NetworkTime } from './NetworkTime.ts';
import { Signal } from './Signal.ts';
import { createPipe } from './transports/PipeConnection.ts';
import type { Transport, TransportConnection } from './transports/Transport.ts';
import { Channel } from './types.ts';
import type { ChannelKind, ClientOptions, ConnectState } from './types.ts';

const debug = createDebug('peerlink:client');

export class NetworkClient {
  transport: Transport | null;
  authenticator: Authenticator | null;

  /** Fires once the client has connected to its server. */
  readonly connected = new Signal<[NetworkConnection]>();
  /** Fires once the connection has been authenticated. */
  readonly authenticated = new Signal<[NetworkConnection]>();
  /** Fires after the connection has ended and the client has cleaned up. */
  readonly disconnected = new Signal();

  readonly time = new NetworkTime();

  /** The active connection, or null. */
  connection: NetworkConnection | null = null;

  private _state: ConnectState = 'disconnected';
  private _attempt = 0;
  private _pingIntervalMs: number;
  private _pingTimer: ReturnType<typeof setInterval> | null = null;
  private _hostServer: NetworkServer | null = null;

  // Authenticator wired for the current connection, for teardown.
  private _sessionAuthenticator: Authenticator | null = null;

  constructor(options: ClientOptions = {}) {
    this.transport = options.transport ?? null;
    this.authenticator = options.authenticator ?? null;
    this._pingIntervalMs = options.pingIntervalMs ?? 2000;
  }

  get state(): ConnectState {
    return this._state;
  }

  /**
   * True while connecting or connected.
   */
  get active(): boolean {
    return this._state === 'connecting' || this._state === 'connected';
  }

  get isConnected(): boolean {
    return this._state === 'connected';
  }

  /**
   * True while connected to an in-process server.
   */
  get isLocalClient(): boolean {
    return this._hostServer !== null;
  }

  /**
   * Connect to a server.
   *
   * @param address - "host", "host:port" or a URL such as "tcp4://host:port"
   * @throws ConnectError if there is no transport, the client is already
   *   active, the dial fails, or `disconnect()` aborts the attempt
   */
  async connect(address: string | URL): Promise<void> {
    const transport = this.transport;
    if (!transport) {
      throw new ConnectError('Transport could not be found for NetworkClient');
    }
    if (this.active) {
      throw new ConnectError('NetworkClient is already connecting or connected');
    }

    const uri = toUri(address, transport.scheme[0] ?? 'tcp4');
    debug('Client connect: %s', uri.href);

    const attempt = ++this._attempt;
    this._state = 'connecting';

    let channel: TransportConnection;
    try {
      channel = await transport.connect(uri);
    } catch (err) {
      if (attempt === this._attempt) this._state = 'disconnected';
      if (err instanceof ConnectError) throw err;
      throw new ConnectError(`Failed to connect to ${uri.href}: ${err instanceof Error ? err.message : String(err)}`, {
        cause: err,
      });
    }

    if (attempt !== this._attempt || this._state !== 'connecting') {
      channel.disconnect();
      throw new ConnectError(`Connect to ${uri.href} was aborted`);
    }

    this._initializeAuthEvents();

    const conn = new NetworkConnection(channel);
    this.connection = conn;
    this.time.reset();
    conn.registerHandler(PongMessage, this.time.onClientPong);

    this._run(conn);
    this._startPinging(conn);
  }

  /**
   * Host mode: connect to a server in this process over an in-memory pipe.
   * The client is connected on return; there is no connecting state.
   */
  connectHost(server: NetworkServer): void {
    if (this.active) {
      throw new ConnectError('NetworkClient is already connecting or connected');
    }
    debug('Client connect host to server');

    const [local, remote] = createPipe();
    server.addLocalConnection(remote);

    this._attempt++;
    this._initializeAuthEvents();
    this._hostServer = server;

    const conn = new NetworkConnection(local);
    this.connection = conn;
    // Host time is the server's time; pongs are not expected but tolerated.
    conn.registerHandler(PongMessage, () => {});

    this._run(conn);
  }

  /**
   * Disconnect from the server. While connecting, aborts the attempt.
   */
  disconnect(): void {
    if (this._state === 'connecting' && !this.connection) {
      debug('Client connect aborted');
      this._attempt++;
      this._state = 'disconnected';
      return;
    }
    this.connection?.disconnect();
  }

  /**
   * Send a message to the server and wait for the transport to accept it.
   */
  sendAsync<T>(type: MessageType<T>, message: T, channel: ChannelKind = Channel.Reliable): Promise<void> {
    const conn = this.connection;
    if (!conn) return Promise.reject(new NotConnectedError());
    return conn.sendAsync(type, message, channel);
  }

  /**
   * Best-effort send; transport failures are logged.
   *
   * @throws NotConnectedError when there is no connection
   */
  send<T>(type: MessageType<T>, message: T, channel: ChannelKind = Channel.Reliable): void {
    const conn = this.connection;
    if (!conn) throw new NotConnectedError();
    conn.send(type, message, channel);
  }

  private _initializeAuthEvents(): void {
    const authenticator = this.authenticator;
    if (authenticator) {
      authenticator.clientAuthenticated.add(this._onAuthenticated);
      this.connected.add(this._authenticate);
      this._sessionAuthenticator = authenticator;
    } else {
      // No authenticator: the connection is trusted as soon as it is up.
      this.connected.add(this._onAuthenticated);
    }
  }

  private _authenticate = (conn: NetworkConnection): void => {
    this._sessionAuthenticator?.onClientAuthenticate(conn);
  };

  private _onAuthenticated = (conn: NetworkConnection): void => {
    if (conn !== this.connection || conn.isAuthenticated) return;
    conn.isAuthenticated = true;
    this.authenticated.invoke(conn);
  };

  private _run(conn: NetworkConnection): void {
    // Handlers may send, so the state is set before anyone is told.
    this._state = 'connected';
    this.connected.invoke(conn);

    this._processMessages(conn).catch((err) => debug('client loop failed: %o', err));
  }

  private async _processMessages(conn: NetworkConnection): Promise<void> {
    try {
      await conn.processMessages();
    } catch (err) {
      debug('Client connection closed with error: %o', err);
    } finally {
      this._cleanup(conn);
      this.disconnected.invoke();
    }
  }

  private _startPinging(conn: NetworkConnection): void {
    if (this._pingIntervalMs <= 0 || conn.isDisconnected) return;

    const ping = () => conn.send(PingMessage, this.time.createPing());
    ping();
    this._pingTimer = setInterval(ping, this._pingIntervalMs);
    this._pingTimer.unref();
  }

  private _cleanup(conn: NetworkConnection): void {
    debug('Shutting down client.');

    if (this._pingTimer) {
      clearInterval(this._pingTimer);
      this._pingTimer = null;
    }

    const authenticator = this._sessionAuthenticator;
    if (authenticator) {
      authenticator.clientAuthenticated.remove(this._onAuthenticated);
      this._sessionAuthenticator = null;
    }
    this.connected.remove(this._authenticate);
    this.connected.remove(this._onAuthenticated);

    if (this.connection === conn) this.connection = null;
    this._hostServer = null;
    this._state = 'disconnected';
  }
}
