/**
 * Host Mode Chat Example
 *
 * One process hosts a game: its own client talks to the in-process server
 * over a pipe while a remote player joins over TCP. Both pass the
 * username/password authenticator, and every chat line is relayed to all.
 *
 * Run with: node --import tsx examples/chat-host.ts
 */

import { Type } from 'typebox';
import { BasicAuthenticator, NetworkClient, NetworkManager, TcpTransport, defineMessage, delay, waitFor } from '../src/index.ts';

const Chat = defineMessage('example.Chat', Type.Object({ from: Type.String(), text: Type.String() }));

async function main() {
  const credentials = { username: 'player', password: 'test-secret' };

  // 1. The host runs server and local client from one manager
  const host = new NetworkManager({
    transport: new TcpTransport({ host: '127.0.0.1', port: 7777 }),
    serverAuthenticator: new BasicAuthenticator(credentials),
    clientAuthenticator: new BasicAuthenticator(credentials),
  });

  // Relay chat only from authenticated peers
  host.server.connected.add((conn) => {
    conn.registerHandler(Chat, (msg) => host.server.sendToAll(Chat, msg));
  });
  host.server.disconnected.add((conn) => {
    console.log(`[Server] ${conn.address} left (${host.server.numPlayers} remaining)`);
  });

  host.client.authenticated.add((conn) => {
    conn.registerHandler(Chat, (msg) => console.log(`[Host] ${msg.from}: ${msg.text}`));
  });

  const hostReady = waitFor(host.client.authenticated);
  await host.startHost();
  await hostReady;
  console.log(`[Host] mode=${host.mode}, listening on ${host.server.transport?.serverUri()[0]?.href}`);

  // 2. A remote player dials in over TCP
  const remote = new NetworkClient({
    transport: new TcpTransport(),
    authenticator: new BasicAuthenticator(credentials),
    pingIntervalMs: 50,
  });
  remote.authenticated.add((conn) => {
    conn.registerHandler(Chat, (msg) => console.log(`[Remote] ${msg.from}: ${msg.text}`));
  });

  const remoteReady = waitFor(remote.authenticated);
  await remote.connect('127.0.0.1:7777');
  await remoteReady;

  // 3. Both sides chat; each line reaches everyone
  host.client.send(Chat, { from: 'host', text: 'welcome!' });
  remote.send(Chat, { from: 'remote', text: 'thanks, glad to be here' });
  await delay(100);

  console.log(`[Remote] rtt to host: ${(remote.time.rtt * 1000).toFixed(2)}ms`);

  // 4. Cleanup
  const remoteGone = waitFor(remote.disconnected);
  remote.disconnect();
  await remoteGone;
  host.stopHost();
  console.log('Done!');
}

main().catch((err) => {
  console.error(err);
  process.exit(1);
});
