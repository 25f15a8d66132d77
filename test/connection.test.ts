/**
 * NetworkConnection tests over an in-memory pipe: dispatch order, unknown
 * types, handler failures, decode failures and the authentication gate.
 */

import { describe, it } from 'node:test';
import assert from 'node:assert';
import { Type } from 'typebox';
import { ChannelClosedError, DecodeError, DuplicateHandlerError, MessageTooLargeError } from '../src/errors.ts';
import { defineMessage } from '../src/messages.ts';
import { NetworkConnection } from '../src/NetworkConnection.ts';
import { createPipe } from '../src/transports/PipeConnection.ts';
import type { PipeOptions } from '../src/transports/PipeConnection.ts';
import { Channel } from '../src/types.ts';
import { encodeEnvelope } from '../src/wire.ts';
import { BoomMessage, ChatMessage, CountMessage, waitUntil } from './helpers.ts';

function connectedPair(options: PipeOptions = {}): { sender: NetworkConnection; receiver: NetworkConnection } {
  const [a, b] = createPipe(options);
  const sender = new NetworkConnection(a);
  const receiver = new NetworkConnection(b);
  sender.isAuthenticated = true;
  receiver.isAuthenticated = true;
  return { sender, receiver };
}

describe('NetworkConnection', () => {
  describe('dispatch', () => {
    it('should deliver every message once, in send order', async () => {
      const { sender, receiver } = connectedPair();
      const received: number[] = [];
      receiver.registerHandler(CountMessage, (msg) => received.push(msg.n));
      const loop = receiver.processMessages();

      for (let n = 0; n < 100; n++) {
        await sender.sendAsync(CountMessage, { n });
      }
      sender.disconnect();
      await loop;

      assert.deepStrictEqual(
        received,
        Array.from({ length: 100 }, (_, i) => i)
      );
      assert.strictEqual(receiver.isDisconnected, true);
    });

    it('should pass the receiving connection to the handler', async () => {
      const { sender, receiver } = connectedPair();
      let seen: NetworkConnection | null = null;
      receiver.registerHandler(ChatMessage, (_msg, conn) => {
        seen = conn;
      });
      const loop = receiver.processMessages();

      await sender.sendAsync(ChatMessage, { text: 'hi' });
      sender.disconnect();
      await loop;

      assert.strictEqual(seen, receiver);
    });

    it('should drop messages without a handler and keep the connection open', async () => {
      const { sender, receiver } = connectedPair();
      const chats: string[] = [];
      receiver.registerHandler(ChatMessage, (msg) => chats.push(msg.text));
      const loop = receiver.processMessages();

      await sender.sendAsync(CountMessage, { n: 1 });
      await sender.sendAsync(ChatMessage, { text: 'after' });
      await waitUntil(() => chats.length === 1);

      assert.deepStrictEqual(chats, ['after']);
      assert.strictEqual(receiver.isDisconnected, false);

      sender.disconnect();
      await loop;
    });

    it('should keep processing after a handler throws', async () => {
      const { sender, receiver } = connectedPair();
      const chats: string[] = [];
      receiver.registerHandler(BoomMessage, () => {
        throw new Error('boom');
      });
      receiver.registerHandler(ChatMessage, (msg) => chats.push(msg.text));
      const loop = receiver.processMessages();

      await sender.sendAsync(BoomMessage, {});
      await sender.sendAsync(ChatMessage, { text: 'still here' });
      sender.disconnect();
      await loop;

      assert.deepStrictEqual(chats, ['still here']);
    });

    it('should keep processing after an async handler rejects', async () => {
      const { sender, receiver } = connectedPair();
      const chats: string[] = [];
      receiver.registerHandler(BoomMessage, async () => {
        throw new Error('async boom');
      });
      receiver.registerHandler(ChatMessage, (msg) => chats.push(msg.text));
      const loop = receiver.processMessages();

      await sender.sendAsync(BoomMessage, {});
      await sender.sendAsync(ChatMessage, { text: 'still here' });
      sender.disconnect();
      await loop;

      assert.deepStrictEqual(chats, ['still here']);
    });

    it('should pick up handlers registered while the loop runs', async () => {
      const { sender, receiver } = connectedPair();
      const chats: string[] = [];
      receiver.registerHandler(CountMessage, () => {
        receiver.registerHandler(ChatMessage, (msg) => chats.push(msg.text));
      });
      const loop = receiver.processMessages();

      await sender.sendAsync(CountMessage, { n: 0 });
      await sender.sendAsync(ChatMessage, { text: 'late' });
      sender.disconnect();
      await loop;

      assert.deepStrictEqual(chats, ['late']);
    });
  });

  describe('handler registry', () => {
    it('should reject a second handler for the same type', () => {
      const { receiver } = connectedPair();
      receiver.registerHandler(ChatMessage, () => {});

      assert.throws(() => receiver.registerHandler(ChatMessage, () => {}), DuplicateHandlerError);
    });

    it('should reject a different type whose name hashes to the same key', () => {
      const first = defineMessage('test.Collide12090', Type.Object({}));
      const second = defineMessage('test.Collide118559', Type.Object({}));
      assert.strictEqual(first.key, second.key);

      const { receiver } = connectedPair();
      receiver.registerHandler(first, () => {});

      assert.throws(
        () => receiver.registerHandler(second, () => {}),
        (err: unknown) =>
          err instanceof DuplicateHandlerError &&
          err.message === 'Message test.Collide118559 collides with test.Collide12090 (type key 0x780de3bf)'
      );
    });

    it('should stop dispatching a type once its handler is removed', async () => {
      const { sender, receiver } = connectedPair();
      const chats: string[] = [];
      const counts: number[] = [];
      receiver.registerHandler(ChatMessage, (msg) => chats.push(msg.text));
      receiver.registerHandler(CountMessage, (msg) => counts.push(msg.n));

      assert.strictEqual(receiver.hasHandler(ChatMessage), true);
      assert.strictEqual(receiver.unregisterHandler(ChatMessage), true);
      assert.strictEqual(receiver.unregisterHandler(ChatMessage), false);
      assert.strictEqual(receiver.hasHandler(ChatMessage), false);

      const loop = receiver.processMessages();
      await sender.sendAsync(ChatMessage, { text: 'ignored' });
      await sender.sendAsync(CountMessage, { n: 7 });
      sender.disconnect();
      await loop;

      assert.deepStrictEqual(chats, []);
      assert.deepStrictEqual(counts, [7]);
    });
  });

  describe('decode failures', () => {
    it('should end the loop with DecodeError on a malformed body', async () => {
      const { sender, receiver } = connectedPair();
      const chats: string[] = [];
      receiver.registerHandler(ChatMessage, (msg) => chats.push(msg.text));
      const loop = receiver.processMessages();

      await sender.sendPayload(encodeEnvelope(ChatMessage.key, Buffer.from('not json')));

      await assert.rejects(loop, DecodeError);
      assert.deepStrictEqual(chats, []);
      assert.strictEqual(receiver.isDisconnected, true);
    });

    it('should end the loop with DecodeError on a body that fails its schema', async () => {
      const { sender, receiver } = connectedPair();
      receiver.registerHandler(ChatMessage, () => {});
      const loop = receiver.processMessages();

      await sender.sendPayload(encodeEnvelope(ChatMessage.key, Buffer.from('{"text":5}')));

      await assert.rejects(loop, DecodeError);
    });

    it('should end the loop with DecodeError on a payload shorter than a type key', async () => {
      const { sender, receiver } = connectedPair();
      const loop = receiver.processMessages();

      await sender.sendPayload(new Uint8Array([1, 2]));

      await assert.rejects(loop, DecodeError);
    });

    it('should close the sending side when the receiver fails', async () => {
      const { sender, receiver } = connectedPair();
      const senderLoop = sender.processMessages();
      const receiverLoop = receiver.processMessages();

      await sender.sendPayload(new Uint8Array([1, 2]));

      await assert.rejects(receiverLoop, DecodeError);
      await senderLoop;
      assert.strictEqual(sender.isDisconnected, true);
    });
  });

  describe('authentication gate', () => {
    it('should drop gated messages until the connection is authenticated', async () => {
      const { sender, receiver } = connectedPair();
      receiver.isAuthenticated = false;

      const chats: string[] = [];
      const counts: number[] = [];
      receiver.registerHandler(ChatMessage, (msg) => chats.push(msg.text));
      receiver.registerHandler(CountMessage, (msg) => counts.push(msg.n), false);
      const loop = receiver.processMessages();

      await sender.sendAsync(ChatMessage, { text: 'before' });
      await sender.sendAsync(CountMessage, { n: 1 });
      await waitUntil(() => counts.length === 1);

      receiver.isAuthenticated = true;
      await sender.sendAsync(ChatMessage, { text: 'after' });
      await waitUntil(() => chats.length === 1);

      assert.deepStrictEqual(chats, ['after']);
      assert.deepStrictEqual(counts, [1]);
      assert.strictEqual(receiver.isDisconnected, false);

      sender.disconnect();
      await loop;
    });
  });

  describe('sending', () => {
    it('should reject a message larger than the channel maximum and deliver nothing', async () => {
      const { sender, receiver } = connectedPair({ maxMessageSize: 128 });
      const chats: string[] = [];
      receiver.registerHandler(ChatMessage, (msg) => chats.push(msg.text));
      const loop = receiver.processMessages();

      // 4-byte key + {"text":"..."} is 15 bytes plus the text.
      await assert.rejects(sender.sendAsync(ChatMessage, { text: 'x'.repeat(114) }), MessageTooLargeError);
      await sender.sendAsync(ChatMessage, { text: 'y'.repeat(113) });
      sender.disconnect();
      await loop;

      assert.deepStrictEqual(chats, ['y'.repeat(113)]);
    });

    it('should reject sends after disconnect', async () => {
      const { sender } = connectedPair();
      sender.disconnect();

      await assert.rejects(sender.sendAsync(ChatMessage, { text: 'late' }), ChannelClosedError);
      assert.doesNotThrow(() => sender.send(ChatMessage, { text: 'late' }));
    });

    it('should reject sends once the peer has gone', async () => {
      const { sender, receiver } = connectedPair();
      receiver.disconnect();

      await assert.rejects(sender.sendAsync(ChatMessage, { text: 'late' }), ChannelClosedError);
    });

    it('should broadcast to every open connection despite a closed one', async () => {
      const closed = connectedPair();
      const open = connectedPair();
      const chats: string[] = [];
      open.receiver.registerHandler(ChatMessage, (msg) => chats.push(msg.text));
      const loop = open.receiver.processMessages();

      closed.sender.disconnect();
      NetworkConnection.broadcast([closed.sender, open.sender], ChatMessage, { text: 'all' }, Channel.Unreliable);
      await waitUntil(() => chats.length === 1);

      assert.deepStrictEqual(chats, ['all']);

      open.sender.disconnect();
      await loop;
    });
  });

  describe('lifecycle', () => {
    it('should tolerate repeated disconnects', async () => {
      const { sender, receiver } = connectedPair();
      const loop = receiver.processMessages();

      receiver.disconnect();
      receiver.disconnect();
      await loop;

      assert.strictEqual(receiver.isDisconnected, true);
      await assert.rejects(sender.sendAsync(ChatMessage, { text: 'x' }), ChannelClosedError);
    });

    it('should refuse a second read-loop', async () => {
      const { sender, receiver } = connectedPair();
      const loop = receiver.processMessages();

      await assert.rejects(receiver.processMessages(), /already processing messages/);

      sender.disconnect();
      await loop;
      await assert.rejects(receiver.processMessages(), /cannot be reused/);
    });
  });
});
