/**
 * Transport layer exports.
 */

export type { Transport, TransportConnection } from './Transport.ts';
export type { PipeOptions } from './PipeConnection.ts';
export type { TcpTransportOptions } from './TcpTransport.ts';
export type { WsTransportOptions } from './WsTransport.ts';

export { FrameQueue } from './FrameQueue.ts';
export { PipeConnection, createPipe } from './PipeConnection.ts';
export { TcpConnection, TcpTransport } from './TcpTransport.ts';
export { WsConnection, WsTransport } from './WsTransport.ts';
