/**
 * Wire format.
 *
 * Every message travels as an envelope: a 4-byte big-endian type key followed
 * by the UTF-8 JSON body. Stream transports additionally wrap each envelope in
 * a frame carrying a 2-byte big-endian length prefix; message-oriented
 * transports (WebSocket, pipe) carry one envelope per message.
 */

import { DecodeError, MessageTooLargeError } from './errors.ts';

export const TYPE_KEY_SIZE = 4;
export const LENGTH_PREFIX_SIZE = 2;

/** Largest payload a 2-byte length prefix can describe. */
export const MAX_FRAME_SIZE = 0xffff;

export interface Envelope {
  key: number;
  body: Buffer;
}

export function encodeEnvelope(key: number, body: Uint8Array): Buffer {
  const out = Buffer.allocUnsafe(TYPE_KEY_SIZE + body.length);
  out.writeUInt32BE(key, 0);
  out.set(body, TYPE_KEY_SIZE);
  return out;
}

export function decodeEnvelope(payload: Uint8Array): Envelope {
  if (payload.length < TYPE_KEY_SIZE) {
    throw new DecodeError(`envelope of ${payload.length} bytes is shorter than the type key`);
  }
  const buf = Buffer.from(payload.buffer, payload.byteOffset, payload.byteLength);
  return { key: buf.readUInt32BE(0), body: buf.subarray(TYPE_KEY_SIZE) };
}

/**
 * Prefix a payload with its length.
 */
export function encodeFrame(payload: Uint8Array): Buffer {
  if (payload.length > MAX_FRAME_SIZE) {
    throw new MessageTooLargeError(payload.length, MAX_FRAME_SIZE);
  }
  const out = Buffer.allocUnsafe(LENGTH_PREFIX_SIZE + payload.length);
  out.writeUInt16BE(payload.length, 0);
  out.set(payload, LENGTH_PREFIX_SIZE);
  return out;
}

/**
 * Reassembles length-prefixed frames from arbitrarily split stream chunks.
 */
export class FrameReader {
  private _pending: Buffer = Buffer.alloc(0);
  private _maxFrameSize: number;

  constructor(maxFrameSize = MAX_FRAME_SIZE) {
    this._maxFrameSize = maxFrameSize;
  }

  /** Bytes received but not yet part of a complete frame. */
  get buffered(): number {
    return this._pending.length;
  }

  /**
   * Append a chunk and return every frame it completes.
   *
   * @throws DecodeError when a frame announces more than the maximum size
   */
  push(chunk: Buffer): Buffer[] {
    this._pending = this._pending.length === 0 ? chunk : Buffer.concat([this._pending, chunk]);

    const frames: Buffer[] = [];
    let offset = 0;
    while (this._pending.length - offset >= LENGTH_PREFIX_SIZE) {
      const length = this._pending.readUInt16BE(offset);
      if (length > this._maxFrameSize) {
        throw new DecodeError(`frame of ${length} bytes exceeds the maximum of ${this._maxFrameSize} bytes`);
      }
      const end = offset + LENGTH_PREFIX_SIZE + length;
      if (end > this._pending.length) break;
      // Copy out of the shared receive chunk.
      frames.push(Buffer.from(this._pending.subarray(offset + LENGTH_PREFIX_SIZE, end)));
      offset = end;
    }

    this._pending = this._pending.subarray(offset);
    return frames;
  }
}
