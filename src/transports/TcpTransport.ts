/**
 * TCP transport using `node:net`.
 *
 * Each payload is written as a frame with a 2-byte big-endian length prefix;
 * the receiving side reassembles frames from arbitrarily split chunks.
 */

import net from 'node:net';
import createDebug from 'debug';
import { ChannelClosedError, ConnectError, MessageTooLargeError } from '../errors.ts';
import { Signal } from '../Signal.ts';
import type { ChannelKind } from '../types.ts';
import { FrameReader, MAX_FRAME_SIZE, encodeFrame } from '../wire.ts';
import { FrameQueue } from './FrameQueue.ts';
import type { Transport, TransportConnection } from './Transport.ts';

const debug = createDebug('peerlink:tcp-transport');

export interface TcpTransportOptions {
  /** Bind address when listening. Default: 0.0.0.0 */
  host?: string;
  /** Listen port, and the port dialled when an address has none. Default: 7777 */
  port?: number;
  /** Largest payload per frame. Default and upper bound: 65535 */
  maxMessageSize?: number;
  /** Dial timeout in milliseconds. Default: 5000 */
  connectTimeoutMs?: number;
}

export class TcpConnection implements TransportConnection {
  readonly address: string;
  readonly maxMessageSize: number;

  private _socket: net.Socket;
  private _queue = new FrameQueue();
  private _reader: FrameReader;
  private _disconnected = false;

  constructor(socket: net.Socket, maxMessageSize: number) {
    this._socket = socket;
    this.maxMessageSize = maxMessageSize;
    this.address = `${socket.remoteAddress ?? 'unknown'}:${socket.remotePort ?? 0}`;
    this._reader = new FrameReader(maxMessageSize);

    socket.setNoDelay(true);

    socket.on('data', (chunk: Buffer) => {
      let frames: Buffer[];
      try {
        frames = this._reader.push(chunk);
      } catch (err) {
        debug('bad frame from %s: %o', this.address, err);
        this._queue.close(err instanceof Error ? err : new Error(String(err)));
        socket.destroy();
        return;
      }
      for (const frame of frames) this._queue.push(frame);
    });

    socket.on('error', (err) => {
      debug('socket error on %s: %o', this.address, err);
    });

    socket.on('close', () => {
      debug('socket closed %s', this.address);
      this._queue.close();
    });
  }

  send(payload: Uint8Array, _channel: ChannelKind): Promise<void> {
    if (this._disconnected || this._socket.destroyed || !this._socket.writable) {
      return Promise.reject(new ChannelClosedError(`TCP connection ${this.address} is closed`));
    }
    if (payload.length > this.maxMessageSize) {
      return Promise.reject(new MessageTooLargeError(payload.length, this.maxMessageSize));
    }

    const frame = encodeFrame(payload);
    return new Promise((resolve, reject) => {
      this._socket.write(frame, (err) => {
        if (err) reject(new ChannelClosedError(`TCP write to ${this.address} failed: ${err.message}`));
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

    // Flush what was already written, then release the socket.
    this._socket.end(() => this._socket.destroy());
  }
}

export class TcpTransport implements Transport {
  readonly scheme = ['tcp4'] as const;
  readonly connected = new Signal<[TransportConnection]>();
  readonly started = new Signal();

  private _options: { host: string; port: number; maxMessageSize: number; connectTimeoutMs: number };
  private _server: net.Server | null = null;

  constructor(options: TcpTransportOptions = {}) {
    this._options = {
      host: options.host ?? '0.0.0.0',
      port: options.port ?? 7777,
      maxMessageSize: Math.min(options.maxMessageSize ?? MAX_FRAME_SIZE, MAX_FRAME_SIZE),
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
      return Promise.reject(new Error('TcpTransport is already listening'));
    }
    const { host, port, maxMessageSize } = this._options;

    return new Promise((resolve, reject) => {
      const server = net.createServer((socket) => {
        const conn = new TcpConnection(socket, maxMessageSize);
        debug('accepted %s', conn.address);
        this.connected.invoke(conn);
      });

      const onStartupError = (err: Error) => {
        reject(err);
      };
      server.once('error', onStartupError);

      server.listen(port, host, () => {
        server.off('error', onStartupError);
        server.on('error', (err) => debug('server error: %o', err));
        this._server = server;
        debug('listening on %s:%d', host, this.port);
        this.started.invoke();
        resolve();
      });
    });
  }

  connect(uri: URL): Promise<TransportConnection> {
    const host = uri.hostname || 'localhost';
    const port = uri.port ? Number(uri.port) : this._options.port;
    const { maxMessageSize, connectTimeoutMs } = this._options;

    return new Promise((resolve, reject) => {
      debug('connecting to %s:%d', host, port);
      const socket = net.connect({ host, port });

      const timer = setTimeout(() => {
        socket.off('error', onError);
        socket.destroy();
        reject(new ConnectError(`Timed out connecting to ${host}:${port}`));
      }, connectTimeoutMs);

      const onError = (err: Error) => {
        clearTimeout(timer);
        reject(new ConnectError(`Failed to connect to ${host}:${port}: ${err.message}`, { cause: err }));
      };
      socket.once('error', onError);

      socket.once('connect', () => {
        clearTimeout(timer);
        socket.off('error', onError);
        resolve(new TcpConnection(socket, maxMessageSize));
      });
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
    return [new URL(`tcp4://${this._options.host}:${this.port}`)];
  }
}
