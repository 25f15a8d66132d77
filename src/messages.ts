/**
 * Message type definitions.
 *
 * A message type pairs a stable name with a TypeBox schema. Its type key is
 * derived from the name alone, so sender and receiver never need to agree on
 * a registration order.
 *
 * @example
 * ```ts
 * import { Type } from 'typebox';
 *
 * const ChatMessage = defineMessage('game.Chat', Type.Object({ text: Type.String() }));
 *
 * conn.registerHandler(ChatMessage, (msg) => console.log(msg.text));
 * conn.send(ChatMessage, { text: 'hello' });
 * ```
 */

import { Type } from 'typebox';
import type { Static, TSchema } from 'typebox';
import { DecodeError, ValidationError } from './errors.ts';
import { stableTypeKey } from './helpers.ts';
import { compileSchema } from './validation.ts';
import type { CompiledValidator } from './validation.ts';
import { encodeEnvelope } from './wire.ts';

export interface MessageType<T> {
  readonly name: string;
  readonly key: number;
  readonly validator: CompiledValidator<T>;
}

/**
 * Extract the message shape from a message type.
 */
export type MessageOf<M> = M extends MessageType<infer T> ? T : never;

export function defineMessage<S extends TSchema>(name: string, schema: S): MessageType<Static<S>> {
  return {
    name,
    key: stableTypeKey(name),
    validator: compileSchema(schema),
  };
}

/**
 * Validate and encode a message into an envelope.
 *
 * @throws ValidationError when the message does not match its schema
 */
export function encodeMessage<T>(type: MessageType<T>, message: T): Buffer {
  if (!type.validator.check(message)) {
    throw new ValidationError(`${type.name}: ${type.validator.explain(message)}`);
  }
  const body = Buffer.from(JSON.stringify(message), 'utf8');
  return encodeEnvelope(type.key, body);
}

/**
 * Decode an envelope body into a message.
 *
 * @throws DecodeError on malformed JSON or a schema mismatch
 */
export function decodeBody<T>(type: MessageType<T>, body: Uint8Array): T {
  let value: unknown;
  try {
    value = JSON.parse(Buffer.from(body.buffer, body.byteOffset, body.byteLength).toString('utf8'));
  } catch (err) {
    throw new DecodeError(`${type.name}: body is not valid JSON`, { cause: err });
  }
  if (!type.validator.check(value)) {
    throw new DecodeError(`${type.name}: ${type.validator.explain(value)}`);
  }
  return value;
}

// Built-in messages.

export const PingMessage = defineMessage(
  'peerlink.Ping',
  Type.Object({ clientTime: Type.Number() })
);

export const PongMessage = defineMessage(
  'peerlink.Pong',
  Type.Object({ clientTime: Type.Number(), serverTime: Type.Number() })
);

export const AuthRequestMessage = defineMessage(
  'peerlink.AuthRequest',
  Type.Object({ username: Type.String(), password: Type.String() })
);

export const AuthResponseMessage = defineMessage(
  'peerlink.AuthResponse',
  Type.Object({ code: Type.Integer(), message: Type.String() })
);
