/**
 * TCP transport tests over loopback.
 */

import { describe, it, before, after } from 'node:test';
import assert from 'node:assert';
import { ConnectError, MessageTooLargeError } from '../src/errors.ts';
import { NetworkClient } from '../src/NetworkClient.ts';
import { NetworkServer } from '../src/NetworkServer.ts';
import { TcpTransport } from '../src/transports/TcpTransport.ts';
import { ChatMessage, CountMessage, waitFor, waitUntil } from './helpers.ts';

describe('TcpTransport', () => {
  let serverTransport: TcpTransport;
  let server: NetworkServer;
  let client: NetworkClient;
  const chats: string[] = [];
  const echoes: number[] = [];

  before(async () => {
    serverTransport = new TcpTransport({ host: '127.0.0.1', port: 0 });
    server = new NetworkServer({ transport: serverTransport });
    server.authenticated.add((conn) => {
      conn.registerHandler(CountMessage, (msg, c) => c.send(CountMessage, msg));
      conn.registerHandler(ChatMessage, (msg) => chats.push(msg.text));
    });
    await server.listen();

    client = new NetworkClient({ transport: new TcpTransport(), pingIntervalMs: 0 });
    client.authenticated.add((conn) => {
      conn.registerHandler(CountMessage, (msg) => echoes.push(msg.n));
    });
    await client.connect(`127.0.0.1:${serverTransport.port}`);
  });

  after(async () => {
    const done = waitFor(client.disconnected);
    client.disconnect();
    await done;
    server.disconnect();
  });

  it('should report the bound port', () => {
    assert.notStrictEqual(serverTransport.port, 0);
    assert.strictEqual(serverTransport.serverUri()[0]?.href, `tcp4://127.0.0.1:${serverTransport.port}`);
  });

  it('should deliver messages in order both ways', async () => {
    for (let n = 0; n < 50; n++) {
      client.send(CountMessage, { n });
    }
    await waitUntil(() => echoes.length === 50);

    assert.deepStrictEqual(
      echoes,
      Array.from({ length: 50 }, (_, i) => i)
    );
  });

  it('should reassemble a frame close to the maximum size', async () => {
    const text = 'x'.repeat(60000);
    await client.sendAsync(ChatMessage, { text });
    await waitUntil(() => chats.length === 1);

    assert.strictEqual(chats[0], text);
  });

  it('should reject a message over the frame limit without closing', async () => {
    // 4-byte key + 11 bytes of JSON around the text: one byte over 65535.
    await assert.rejects(client.sendAsync(ChatMessage, { text: 'x'.repeat(65521) }), MessageTooLargeError);

    await client.sendAsync(ChatMessage, { text: 'after' });
    await waitUntil(() => chats.includes('after'));
    assert.strictEqual(client.isConnected, true);
  });

  it('should fail to connect to a closed port', async () => {
    const scratch = new TcpTransport({ host: '127.0.0.1', port: 0 });
    await scratch.listen();
    const port = scratch.port;
    await scratch.close();

    const other = new NetworkClient({ transport: new TcpTransport(), pingIntervalMs: 0 });
    await assert.rejects(other.connect(`127.0.0.1:${port}`), ConnectError);
    assert.strictEqual(other.state, 'disconnected');
  });

  it('should tell the server when the client leaves', async () => {
    const other = new NetworkClient({ transport: new TcpTransport(), pingIntervalMs: 0 });
    await other.connect(`127.0.0.1:${serverTransport.port}`);
    await waitUntil(() => server.numPlayers === 2);

    const left = waitFor(server.disconnected);
    other.disconnect();
    await left;

    assert.strictEqual(server.numPlayers, 1);
  });
});
