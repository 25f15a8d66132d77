/**
 * NetworkManager - starts and stops a server, a client, or both (host).
 */

import createDebug from 'debug';
import type { Authenticator } from './Authenticator.ts';
import { NetworkClient } from './NetworkClient.ts';
import { NetworkServer } from './NetworkServer.ts';
import { Signal } from './Signal.ts';
import type { Transport } from './transports/Transport.ts';

const debug = createDebug('peerlink:manager');

export type NetworkManagerMode = 'offline' | 'server' | 'client' | 'host';

export interface NetworkManagerOptions {
  /** Transport shared by server and client. */
  transport?: Transport;
  serverAuthenticator?: Authenticator;
  clientAuthenticator?: Authenticator;
  /** Default: 4 */
  maxConnections?: number;
  /** Client ping interval in milliseconds. Default: 2000 */
  pingIntervalMs?: number;
}

export class NetworkManager {
  readonly server: NetworkServer;
  readonly client: NetworkClient;

  readonly onStartHost = new Signal();
  readonly onStopHost = new Signal();

  constructor(options: NetworkManagerOptions = {}) {
    this.server = new NetworkServer({
      ...(options.transport ? { transport: options.transport } : {}),
      ...(options.serverAuthenticator ? { authenticator: options.serverAuthenticator } : {}),
      ...(options.maxConnections !== undefined ? { maxConnections: options.maxConnections } : {}),
    });
    this.client = new NetworkClient({
      ...(options.transport ? { transport: options.transport } : {}),
      ...(options.clientAuthenticator ? { authenticator: options.clientAuthenticator } : {}),
      ...(options.pingIntervalMs !== undefined ? { pingIntervalMs: options.pingIntervalMs } : {}),
    });
  }

  get mode(): NetworkManagerMode {
    if (this.server.active) {
      return this.client.isLocalClient ? 'host' : 'server';
    }
    return this.client.active ? 'client' : 'offline';
  }

  get isNetworkActive(): boolean {
    return this.server.active || this.client.active;
  }

  startServer(): Promise<void> {
    debug('NetworkManager StartServer');
    return this.server.listen();
  }

  startClient(address: string | URL): Promise<void> {
    debug('NetworkManager StartClient address: %s', String(address));
    return this.client.connect(address);
  }

  /**
   * Start the server, then connect the in-process client to it.
   */
  async startHost(): Promise<void> {
    debug('NetworkManager StartHost');
    await this.server.listen();
    this.client.connectHost(this.server);
    this.onStartHost.invoke();
  }

  stopHost(): void {
    this.onStopHost.invoke();
    this.stopClient();
    this.stopServer();
  }

  stopServer(): void {
    this.server.disconnect();
  }

  stopClient(): void {
    this.client.disconnect();
  }
}
