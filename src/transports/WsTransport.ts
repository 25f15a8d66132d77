/**
 * WebSocket transport using the `ws` package.
 *
 * One binary WebSocket message carries one payload, so no length prefix is
 * needed. Both kinds of channel ride the same reliable ordered socket.
 */

import { WebSocket, WebSocketServer } from 'ws';
import type { RawData } from 'ws';
import createDebug from 'debug';
import { ChannelClosedError, ConnectError, MessageTooLargeError } from '../errors.ts';
import { Signal } from '../Signal.ts';
import type { ChannelKind } from '../types.ts';
import { FrameQueue } from './FrameQueue.ts';
import type { Transport, TransportConnection } from './Transport.ts';

const debug = createDebug('peerlink:ws-transport');

export interface WsTransportOptions {
  /** Bind address when listening. Default: 0.0.0.0 */
  host?: string;
  /** Listen port, and the port dialled when an address has none. Default: 7778 */
  port?: number;
  /** WebSocket path. Default: / */
  path?: string;
  /** Largest payload per message. Default: 16384 */
  maxMessageSize?: number;
  /** Handshake timeout in milliseconds. Default: 5000 */
  connectTimeoutMs?: number;
}

function toBuffer(data: RawData): Buffer {
  if (Array.isArray(data)) return Buffer.concat(data);
  if (data instanceof ArrayBuffer) return Buffer.from(data);
  return data;
}

export class WsConnection implements TransportConnection {
  readonly address: string;
  readonly maxMessageSize: number;

  private _ws: WebSocket;
  private _queue = new FrameQueue();
  private _disconnected = false;

  constructor(ws: WebSocket, address: string, maxMessageSize: number) {
    this._ws = ws;
    this.address = address;
    this.maxMessageSize = maxMessageSize;

    ws.binaryType = 'nodebuffer';

    ws.on('message', (data: RawData) => {
      this._queue.push(toBuffer(data));
    });

    ws.on('error', (err) => {
      debug('WebSocket error on %s: %o', this.address, err);
    });

    ws.on('close', (code) => {
      debug('closed %s (code: %d)', this.address, code);
      this._queue.close();
    });
  }

  send(payload: Uint8Array, _channel: ChannelKind): Promise<void> {
    if (this._disconnected || this._ws.readyState !== WebSocket.OPEN) {
      return Promise.reject(new ChannelClosedError(`WebSocket ${this.address} is closed`));
    }
    if (payload.length > this.maxMessageSize) {
      return Promise.reject(new MessageTooLargeError(payload.length, this.maxMessageSize));
    }

    return new Promise((resolve, reject) => {
      this._ws.send(payload, { binary: true }, (err) => {
        if (err) reject(new ChannelClosedError(`WebSocket send to ${this.address} failed: ${err.message}`));
        else resolve();
      });
    });
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
    this._ws.close(1000);
  }
}

export class WsTransport implements Transport {
  readonly scheme = ['ws'] as const;
  readonly connected = new Signal<[TransportConnection]>();
  readonly started = new Signal();

  private _options: { host: string; port: number; path: string; maxMessageSize: number; connectTimeoutMs: number };
  private _server: WebSocketServer | null = null;

  constructor(options: WsTransportOptions = {}) {
    this._options = {
      host: options.host ?? '0.0.0.0',
      port: options.port ?? 7778,
      path: options.path ?? '/',
      maxMessageSize: options.maxMessageSize ?? 16 * 1024,
      connectTimeoutMs: options.connectTimeoutMs ?? 5000,
    };
  }

  /**
   * Bound port while listening (useful with port 0), else the configured one.
   */
  get port(): number {
    const address = this._server?.address();
    if (address && typeof address === 'object') return address.port;
    return this._options.port;
  }

  listen(): Promise<void> {
    if (this._server) {
      return Promise.reject(new Error('WsTransport is already listening'));
    }
    const { host, port, path, maxMessageSize } = this._options;

    return new Promise((resolve, reject) => {
      const server = new WebSocketServer({ host, port, path, maxPayload: maxMessageSize });

      server.on('connection', (ws, req) => {
        const address = `${req.socket.remoteAddress ?? 'unknown'}:${req.socket.remotePort ?? 0}`;
        const conn = new WsConnection(ws, address, maxMessageSize);
        debug('accepted %s', address);
        this.connected.invoke(conn);
      });

      const onStartupError = (err: Error) => {
        reject(err);
      };
      server.once('error', onStartupError);

      server.once('listening', () => {
        server.off('error', onStartupError);
        server.on('error', (err) => debug('server error: %o', err));
        this._server = server;
        debug('listening on %s:%d%s', host, this.port, path);
        this.started.invoke();
        resolve();
      });
    });
  }

  connect(uri: URL): Promise<TransportConnection> {
    const host = uri.hostname || 'localhost';
    const port = uri.port ? Number(uri.port) : this._options.port;
    const path = uri.pathname && uri.pathname !== '/' ? uri.pathname : this._options.path;
    const url = `ws://${host}:${port}${path}`;
    const { maxMessageSize, connectTimeoutMs } = this._options;

    return new Promise((resolve, reject) => {
      debug('connecting to %s', url);
      const ws = new WebSocket(url, { maxPayload: maxMessageSize, handshakeTimeout: connectTimeoutMs });

      let settled = false;
      const fail = (message: string, cause?: unknown) => {
        if (settled) return;
        settled = true;
        reject(new ConnectError(message, { cause }));
      };

      ws.once('open', () => {
        if (settled) return;
        settled = true;
        ws.off('error', onError);
        resolve(new WsConnection(ws, `${host}:${port}`, maxMessageSize));
      });

      const onError = (err: Error) => fail(`Failed to connect to ${url}: ${err.message}`, err);
      ws.on('error', onError);

      ws.once('close', (code) => fail(`WebSocket to ${url} closed before open (code: ${code})`));
    });
  }

  close(): Promise<void> {
    const server = this._server;
    if (!server) return Promise.resolve();
    this._server = null;

    return new Promise((resolve) => {
      server.close(() => {
        debug('closed');
        resolve();
      });
    });
  }

  serverUri(): URL[] {
    return [new URL(`ws://${this._options.host}:${this.port}${this._options.path}`)];
  }
}
