/**
 * peerlink: multiplayer networking runtime.
 *
 * A process can run a `NetworkServer` accepting remote peers, a
 * `NetworkClient` connected to one server, or both at once (host mode),
 * where the client reaches the in-process server over an in-memory pipe.
 * Messages are typed with TypeBox schemas and routed by a stable hash of
 * their name.
 *
 * ## Example (host mode)
 * ```ts
 * import { Type } from 'typebox';
 * import { NetworkManager, TcpTransport, defineMessage } from 'peerlink';
 *
 * const Chat = defineMessage('game.Chat', Type.Object({ text: Type.String() }));
 *
 * const manager = new NetworkManager({ transport: new TcpTransport({ port: 7777 }) });
 *
 * manager.server.authenticated.add((conn) => {
 *   conn.registerHandler(Chat, (msg) => manager.server.sendToAll(Chat, msg));
 * });
 * manager.client.authenticated.add((conn) => {
 *   conn.registerHandler(Chat, (msg) => console.log('chat:', msg.text));
 * });
 *
 * await manager.startHost();
 * manager.client.send(Chat, { text: 'hello' });
 * ```
 *
 * @packageDocumentation
 */

export { NetworkClient } from './NetworkClient.ts';
export { NetworkServer } from './NetworkServer.ts';
export { NetworkConnection } from './NetworkConnection.ts';
export { NetworkManager } from './NetworkManager.ts';
export { NetworkTime, ExponentialMovingAverage } from './NetworkTime.ts';
export { Authenticator } from './Authenticator.ts';
export { BasicAuthenticator, AuthCode } from './authenticators/BasicAuthenticator.ts';
export { Signal } from './Signal.ts';
export { Channel } from './types.ts';
export {
  defineMessage,
  encodeMessage,
  decodeBody,
  PingMessage,
  PongMessage,
  AuthRequestMessage,
  AuthResponseMessage,
} from './messages.ts';
export { stableTypeKey, waitFor, delay } from './helpers.ts';
export { createPipe, PipeConnection, TcpTransport, WsTransport, FrameQueue } from './transports/index.ts';
export {
  ErrorCode,
  hasErrorCode,
  getErrorCode,
  BaseError,
  ConnectError,
  DuplicateHandlerError,
  DecodeError,
  HandlerError,
  CapacityExceededError,
  NotConnectedError,
  MissingTransportError,
  MessageTooLargeError,
  ChannelClosedError,
  ValidationError,
} from './errors.ts';

// Type-only exports
export type { ChannelKind, ConnectState, ClientOptions, ServerOptions } from './types.ts';
export type { MessageType, MessageOf } from './messages.ts';
export type { MessageHandler } from './NetworkConnection.ts';
export type { NetworkManagerMode, NetworkManagerOptions } from './NetworkManager.ts';
export type { BasicAuthenticatorOptions } from './authenticators/BasicAuthenticator.ts';
export type { Listener } from './Signal.ts';
export type { ErrorCodeType } from './errors.ts';
export type {
  Transport,
  TransportConnection,
  PipeOptions,
  TcpTransportOptions,
  WsTransportOptions,
} from './transports/index.ts';
